import { z } from 'zod';
import { getLogger } from '../../utils/logger.js';
import type { CongressEvent } from '../matching/types.js';
import type { ProgressStore } from '../state/models/progress.js';
import type { CongressApi, MeetingPage } from './congress-api.js';
import { toCongressEvent } from './events.js';

export const MeetingCheckpointSchema = z.object({
  completed: z.array(z.number()),
  current: z.object({ congress: z.number(), offset: z.number() }).nullable(),
});

export type MeetingCheckpoint = z.infer<typeof MeetingCheckpointSchema>;

/** Where fetched events go; the event model satisfies this. */
export interface EventSink {
  has(eventId: string): boolean;
  upsert(events: CongressEvent[]): number;
}

export interface FetchMeetingsOptions {
  congresses: number[];
  chamber: string;
  api: Pick<CongressApi, 'listMeetings' | 'getMeeting'>;
  events: EventSink;
  progress: ProgressStore<MeetingCheckpoint>;
  /** Stop after this many pages in total; the checkpoint lets the next run continue */
  maxPages?: number;
  onPage?: (info: { congress: number; offset: number; stored: number }) => void;
}

export interface FetchMeetingsResult {
  stored: number;
  skipped: number;
  failed: number;
  pages: number;
  /** Congresses that ended early on a page error */
  incomplete: number[];
}

export function checkpointKey(chamber: string): string {
  return `committee-meetings:${chamber.toLowerCase()}`;
}

/**
 * Fetch every committee meeting for the given congresses, resuming from the
 * last checkpoint. Per-meeting failures are skipped and counted; a failed
 * listing page ends that congress early and leaves its checkpoint in place.
 */
export async function fetchAllMeetings(options: FetchMeetingsOptions): Promise<FetchMeetingsResult> {
  const log = getLogger();
  const { api, events, progress, chamber } = options;
  const key = checkpointKey(chamber);

  const checkpoint: MeetingCheckpoint = progress.load(key) ?? { completed: [], current: null };
  if (checkpoint.completed.length > 0 || checkpoint.current) {
    log.info({ completed: checkpoint.completed, current: checkpoint.current }, 'Resuming from checkpoint');
  }

  const result: FetchMeetingsResult = { stored: 0, skipped: 0, failed: 0, pages: 0, incomplete: [] };
  let pageBudgetLeft = options.maxPages ?? Number.POSITIVE_INFINITY;

  for (const congress of options.congresses) {
    if (checkpoint.completed.includes(congress)) {
      log.info({ congress }, 'Congress already fetched');
      continue;
    }

    let offset = checkpoint.current?.congress === congress ? checkpoint.current.offset : 0;
    let finished = false;
    let pageFailed = false;

    while (pageBudgetLeft > 0) {
      let page: MeetingPage;
      try {
        page = await api.listMeetings(congress, chamber, offset);
      } catch (err) {
        log.warn({ congress, offset, err: err instanceof Error ? err.message : String(err) }, 'Meeting list page failed');
        result.incomplete.push(congress);
        pageFailed = true;
        break;
      }
      pageBudgetLeft--;
      result.pages++;

      const fresh: CongressEvent[] = [];
      for (const summary of page.meetings) {
        if (events.has(summary.eventId)) {
          result.skipped++;
          continue;
        }
        try {
          const detail = await api.getMeeting(congress, chamber, summary.eventId);
          if (!detail) {
            result.failed++;
            continue;
          }
          fresh.push(toCongressEvent(detail, congress, chamber));
        } catch (err) {
          result.failed++;
          log.warn({ congress, eventId: summary.eventId, err: err instanceof Error ? err.message : String(err) }, 'Meeting detail failed');
        }
      }

      result.stored += events.upsert(fresh);
      offset += page.meetings.length;
      options.onPage?.({ congress, offset, stored: result.stored });

      if (!page.hasMore || page.meetings.length === 0) {
        finished = true;
        break;
      }
      checkpoint.current = { congress, offset };
      progress.save(key, checkpoint);
    }

    if (pageFailed) continue;
    if (!finished) break; // page budget spent

    checkpoint.completed.push(congress);
    checkpoint.current = null;
    progress.save(key, checkpoint);
    log.info({ congress, stored: result.stored }, 'Congress fetched');
  }

  if (options.congresses.every(c => checkpoint.completed.includes(c))) {
    progress.clear(key);
  }

  return result;
}
