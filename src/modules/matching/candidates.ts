import { shiftDate, type CalendarDate } from '../../utils/dates.js';
import type { CongressEvent, VideoRecord } from './types.js';

/**
 * Offsets of the Congress.gov date relative to the video date.
 * The official date usually equals or precedes the upload, rarely follows it.
 */
export interface CandidateWindow {
  daysBefore: number;
  daysAfter: number;
}

export const DEFAULT_WINDOW: CandidateWindow = { daysBefore: 3, daysAfter: 1 };

export interface DateIndex {
  byDate: Map<CalendarDate, CongressEvent[]>;
  all: CongressEvent[];
}

export interface CandidateSelection {
  candidates: CongressEvent[];
  /** True when the window was empty (or the video undated) and every event is a candidate */
  fallback: boolean;
}

/** Build once per matching run, not per video. */
export function buildDateIndex(events: CongressEvent[]): DateIndex {
  const byDate = new Map<CalendarDate, CongressEvent[]>();
  for (const event of events) {
    if (!event.date) continue;
    const bucket = byDate.get(event.date);
    if (bucket) bucket.push(event);
    else byDate.set(event.date, [event]);
  }
  return { byDate, all: events };
}

export function selectCandidates(
  video: VideoRecord,
  index: DateIndex,
  window: CandidateWindow = DEFAULT_WINDOW,
): CandidateSelection {
  if (!video.date) {
    return { candidates: index.all, fallback: true };
  }

  const offsets = [0];
  for (let d = -window.daysBefore; d <= window.daysAfter; d++) {
    if (d !== 0) offsets.push(d);
  }

  const candidates: CongressEvent[] = [];
  for (const offset of offsets) {
    const bucket = index.byDate.get(shiftDate(video.date, offset));
    if (bucket) candidates.push(...bucket);
  }

  if (candidates.length === 0) {
    return { candidates: index.all, fallback: true };
  }
  return { candidates, fallback: false };
}
