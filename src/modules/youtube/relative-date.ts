import { subDays } from 'date-fns';
import { today, type CalendarDate } from '../../utils/dates.js';

const RELATIVE = /(?:streamed\s+)?(\d+)\s+(second|minute|hour|day|week|month|year)s?\s+ago/i;

// Channel pages only say "3 months ago"; months and years are approximated
const DAYS_PER_UNIT: Record<string, number> = {
  second: 0,
  minute: 0,
  hour: 0,
  day: 1,
  week: 7,
  month: 30,
  year: 365,
};

/**
 * "Streamed 3 months ago" → calendar date relative to `now`.
 * Returns null for anything that is not a relative age.
 */
export function parseRelativeDate(text: string | null | undefined, now: Date = new Date()): CalendarDate | null {
  if (!text) return null;
  const match = RELATIVE.exec(text);
  if (!match?.[1] || !match[2]) return null;

  const perUnit = DAYS_PER_UNIT[match[2].toLowerCase()];
  if (perUnit === undefined) return null;

  return today(subDays(now, Number(match[1]) * perUnit));
}
