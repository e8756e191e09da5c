import fs from 'node:fs';
import path from 'node:path';
import { MatchReportSchema, type MatchReport } from '../matching/types.js';

export function writeReport(filePath: string, report: MatchReport): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
}

/** Read and validate a report written by `writeReport`. */
export function readReport(filePath: string): MatchReport {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const parsed = MatchReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`${filePath} is not a match report: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

export function reportFileName(committeeId: string | undefined, now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[:.]/g, '-').slice(0, 19);
  return `matches-${committeeId ?? 'all'}-${stamp}.json`;
}
