import Papa from 'papaparse';
import type { MatchReport } from '../matching/types.js';

export const CSV_HEADER = [
  'YouTube ID',
  'YouTube Title',
  'YouTube Date',
  'YouTube URL',
  'Congress Event ID',
  'Congress Title',
  'Congress Date',
  'Match Score',
  'Method',
  'Match Reasons',
  'Status',
];

const score = (value: number | null): string => (value === null ? '' : value.toFixed(2));

/** Matches first, then unmatched videos; CRLF line endings with a trailing CRLF. */
export function toCsv(report: MatchReport): string {
  const rows: string[][] = [];

  for (const m of report.matches) {
    rows.push([
      m.video.videoId,
      m.video.title,
      m.video.date ?? '',
      m.video.url,
      m.event.eventId,
      m.event.title,
      m.event.date ?? '',
      score(m.score),
      m.method,
      m.reasons.join(' | '),
      'Matched',
    ]);
  }

  for (const u of report.unmatched) {
    rows.push([
      u.video.videoId,
      u.video.title,
      u.video.date ?? '',
      u.video.url,
      '',
      '',
      '',
      score(u.bestScore),
      '',
      u.reasons.join(' | '),
      `Unmatched (${u.disposition})`,
    ]);
  }

  return `${Papa.unparse({ fields: CSV_HEADER, data: rows }, { newline: '\r\n' })}\r\n`;
}
