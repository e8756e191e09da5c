import type Database from 'better-sqlite3';
import { z } from 'zod';
import { CommitteeRefSchema, type CongressEvent } from '../../matching/types.js';

const EventRowSchema = z.object({
  event_id: z.string(),
  congress: z.number(),
  chamber: z.string(),
  title: z.string(),
  date: z.string().nullable(),
  event_type: z.string(),
  status: z.string(),
  committee_name: z.string(),
  committee_code: z.string(),
  committees: z.string(),
});

type EventRow = z.infer<typeof EventRowSchema>;

function fromRow(row: EventRow): CongressEvent {
  const committees = z.array(CommitteeRefSchema).safeParse(JSON.parse(row.committees));
  return {
    eventId: row.event_id,
    congress: row.congress,
    chamber: row.chamber,
    title: row.title,
    date: row.date,
    eventType: row.event_type,
    status: row.status,
    committeeName: row.committee_name,
    committeeCode: row.committee_code,
    committees: committees.success ? committees.data : [],
  };
}

export interface EventStats {
  total: number;
  undated: number;
  earliest: string | null;
  latest: string | null;
  byType: Array<{ type: string; count: number }>;
}

export function createEventModel(db: Database.Database) {
  const upsertStmt = db.prepare(`
    INSERT INTO congress_events (event_id, congress, chamber, title, date, event_type, status, committee_name, committee_code, committees)
    VALUES (@event_id, @congress, @chamber, @title, @date, @event_type, @status, @committee_name, @committee_code, @committees)
    ON CONFLICT(event_id) DO UPDATE SET
      congress = excluded.congress,
      chamber = excluded.chamber,
      title = excluded.title,
      date = excluded.date,
      event_type = excluded.event_type,
      status = excluded.status,
      committee_name = excluded.committee_name,
      committee_code = excluded.committee_code,
      committees = excluded.committees,
      fetched_at = datetime('now')
  `);

  const upsertMany = db.transaction((events: CongressEvent[]) => {
    for (const e of events) {
      upsertStmt.run({
        event_id: e.eventId,
        congress: e.congress,
        chamber: e.chamber,
        title: e.title,
        date: e.date,
        event_type: e.eventType,
        status: e.status,
        committee_name: e.committeeName,
        committee_code: e.committeeCode,
        committees: JSON.stringify(e.committees),
      });
    }
    return events.length;
  });

  const readRows = (rows: unknown[]): CongressEvent[] =>
    rows.map(row => fromRow(EventRowSchema.parse(row)));

  return {
    upsert(events: CongressEvent[]): number {
      return upsertMany(events);
    },

    has(eventId: string): boolean {
      return db.prepare('SELECT 1 FROM congress_events WHERE event_id = ?').get(eventId) !== undefined;
    },

    getById(eventId: string): CongressEvent | undefined {
      const row: unknown = db.prepare('SELECT * FROM congress_events WHERE event_id = ?').get(eventId);
      return row === undefined ? undefined : fromRow(EventRowSchema.parse(row));
    },

    /** Newest first, undated last. */
    listAll(): CongressEvent[] {
      return readRows(
        db.prepare('SELECT * FROM congress_events ORDER BY date IS NULL, date DESC, event_id').all(),
      );
    },

    count(): number {
      const row = z.object({ n: z.number() }).parse(db.prepare('SELECT COUNT(*) AS n FROM congress_events').get());
      return row.n;
    },

    getStats(): EventStats {
      const totals = z
        .object({ total: z.number(), undated: z.number(), earliest: z.string().nullable(), latest: z.string().nullable() })
        .parse(
          db.prepare(`
            SELECT COUNT(*) AS total,
                   COALESCE(SUM(CASE WHEN date IS NULL THEN 1 ELSE 0 END), 0) AS undated,
                   MIN(date) AS earliest,
                   MAX(date) AS latest
            FROM congress_events
          `).get(),
        );

      const byType = z
        .array(z.object({ type: z.string(), count: z.number() }))
        .parse(
          db.prepare(`
            SELECT CASE WHEN event_type = '' THEN 'Unknown' ELSE event_type END AS type, COUNT(*) AS count
            FROM congress_events
            GROUP BY type
            ORDER BY count DESC, type
          `).all(),
        );

      return { ...totals, byType };
    },
  };
}

export type EventModel = ReturnType<typeof createEventModel>;
