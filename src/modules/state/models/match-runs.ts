import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { MatchReport } from '../../matching/types.js';

const MatchRunSchema = z.object({
  id: z.number(),
  committee_id: z.string().nullable(),
  total_videos: z.number(),
  total_events: z.number(),
  matched: z.number(),
  algorithmic: z.number(),
  adjudicated: z.number(),
  threshold_high: z.number(),
  threshold_low: z.number(),
  report_path: z.string().nullable(),
  cost_cents: z.number(),
  created_at: z.string(),
});

export type MatchRun = z.infer<typeof MatchRunSchema>;

export function createMatchRunModel(db: Database.Database) {
  const insert = db.prepare(`
    INSERT INTO match_runs (committee_id, total_videos, total_events, matched, algorithmic, adjudicated,
                            threshold_high, threshold_low, report_path, cost_cents)
    VALUES (@committee_id, @total_videos, @total_events, @matched, @algorithmic, @adjudicated,
            @threshold_high, @threshold_low, @report_path, @cost_cents)
  `);

  return {
    record(report: MatchReport, opts: { committeeId?: string; reportPath?: string; costCents?: number } = {}): number {
      const { metadata } = report;
      const result = insert.run({
        committee_id: opts.committeeId ?? null,
        total_videos: metadata.totalVideos,
        total_events: metadata.totalEvents,
        matched: metadata.matched,
        algorithmic: metadata.algorithmicMatches,
        adjudicated: metadata.adjudicatedMatches,
        threshold_high: metadata.thresholds.high,
        threshold_low: metadata.thresholds.low,
        report_path: opts.reportPath ?? null,
        cost_cents: opts.costCents ?? 0,
      });
      return Number(result.lastInsertRowid);
    },

    getRecent(limit = 10): MatchRun[] {
      return z.array(MatchRunSchema).parse(
        db.prepare('SELECT * FROM match_runs ORDER BY id DESC LIMIT ?').all(limit),
      );
    },
  };
}

export type MatchRunModel = ReturnType<typeof createMatchRunModel>;
