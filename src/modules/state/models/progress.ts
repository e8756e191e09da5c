import type Database from 'better-sqlite3';
import { z } from 'zod';

/** Checkpoint storage for resumable fetch runners. */
export interface ProgressStore<T> {
  load(key: string): T | null;
  save(key: string, state: T): void;
  clear(key: string): void;
}

/**
 * Checkpoints as JSON rows keyed by runner. A stored state that no longer
 * fits `schema` is treated as absent so the runner starts over.
 */
export function createProgressModel<T>(
  db: Database.Database,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): ProgressStore<T> {
  const select = db.prepare('SELECT state FROM fetch_progress WHERE key = ?');
  const upsert = db.prepare(`
    INSERT INTO fetch_progress (key, state) VALUES (?, ?)
    ON CONFLICT(key) DO UPDATE SET state = excluded.state, updated_at = datetime('now')
  `);
  const remove = db.prepare('DELETE FROM fetch_progress WHERE key = ?');

  return {
    load(key: string): T | null {
      const row = z.object({ state: z.string() }).safeParse(select.get(key));
      if (!row.success) return null;
      let raw: unknown;
      try {
        raw = JSON.parse(row.data.state);
      } catch {
        return null;
      }
      const parsed = schema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    },

    save(key: string, state: T): void {
      upsert.run(key, JSON.stringify(state));
    },

    clear(key: string): void {
      remove.run(key);
    },
  };
}
