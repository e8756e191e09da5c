import { addDays, differenceInCalendarDays, format, isValid, parse, parseISO } from 'date-fns';

/** ISO calendar date, `YYYY-MM-DD`. */
export type CalendarDate = string;

const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

function validIsoDate(value: string): CalendarDate | null {
  return isValid(parse(value, 'yyyy-MM-dd', new Date())) ? value : null;
}

/**
 * Coerce an API or scraper date into a calendar date.
 * ISO timestamps are truncated, not converted, so "2024-03-05T23:30:00Z" stays on the 5th.
 */
export function toCalendarDate(value: string | Date | null | undefined): CalendarDate | null {
  if (value == null) return null;
  if (value instanceof Date) {
    return isValid(value) ? format(value, 'yyyy-MM-dd') : null;
  }

  const trimmed = value.trim();
  if (!trimmed) return null;

  const iso = ISO_DATE_PREFIX.exec(trimmed);
  if (iso?.[1]) return validIsoDate(iso[1]);

  // yt-dlp style 20240305
  const compact = COMPACT_DATE.exec(trimmed);
  if (compact) return validIsoDate(`${compact[1]}-${compact[2]}-${compact[3]}`);

  // RFC 822 feed dates and other free-form strings
  const parsed = new Date(trimmed);
  return isValid(parsed) ? format(parsed, 'yyyy-MM-dd') : null;
}

/** Signed number of calendar days from `b` to `a`. */
export function daysBetween(a: CalendarDate, b: CalendarDate): number {
  return differenceInCalendarDays(parseISO(a), parseISO(b));
}

export function shiftDate(date: CalendarDate, days: number): CalendarDate {
  return format(addDays(parseISO(date), days), 'yyyy-MM-dd');
}

export function today(now: Date = new Date()): CalendarDate {
  return format(now, 'yyyy-MM-dd');
}
