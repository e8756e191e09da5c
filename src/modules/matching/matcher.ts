import type { MatchThresholds } from '../../config.js';
import { getLogger } from '../../utils/logger.js';
import type { Adjudicator } from './adjudicator.js';
import { buildDateIndex, DEFAULT_WINDOW, selectCandidates, type CandidateWindow } from './candidates.js';
import { decide, DEFAULT_REFERRAL, type ReferralPolicy } from './decision.js';
import { DEFAULT_WEIGHTS, rankCandidates, type ScoringWeights } from './scorer.js';
import type { CongressEvent, MatchReport, MatchResult, UnmatchedResult, VideoRecord } from './types.js';

export interface MatchOptions {
  thresholds: MatchThresholds;
  sameDayTitleFloor: number;
  weights?: ScoringWeights;
  window?: CandidateWindow;
  referral?: ReferralPolicy;
  adjudicator?: Adjudicator | null;
  /** Called after each video with its 1-based position */
  onProgress?: (done: number, total: number) => void;
  now?: Date;
}

/** Newest first; undated videos keep their relative order at the end. */
export function orderVideos(videos: VideoRecord[]): VideoRecord[] {
  const seen = new Set<string>();
  const unique = videos.filter(v => {
    if (seen.has(v.videoId)) return false;
    seen.add(v.videoId);
    return true;
  });

  return unique.sort((a, b) => {
    if (a.date === b.date) return 0;
    if (a.date === null) return 1;
    if (b.date === null) return -1;
    return a.date < b.date ? 1 : -1;
  });
}

function formatRate(matched: number, total: number): string {
  if (total === 0) return '0.0%';
  return `${((matched / total) * 100).toFixed(1)}%`;
}

/**
 * Match every video against the event set.
 * The report holds exactly one entry per distinct video ID, in processing order.
 */
export async function matchVideos(
  videos: VideoRecord[],
  events: CongressEvent[],
  options: MatchOptions,
): Promise<MatchReport> {
  const log = getLogger();
  const ordered = orderVideos(videos);
  const index = buildDateIndex(events);
  const ctx = {
    thresholds: options.thresholds,
    referral: options.referral ?? DEFAULT_REFERRAL,
    adjudicator: options.adjudicator ?? null,
  };

  const matches: MatchResult[] = [];
  const unmatched: UnmatchedResult[] = [];
  let fallbacks = 0;

  for (const [i, video] of ordered.entries()) {
    const selection = selectCandidates(video, index, options.window ?? DEFAULT_WINDOW);
    if (selection.fallback) fallbacks++;

    const ranked = rankCandidates(video, selection.candidates, {
      weights: options.weights ?? DEFAULT_WEIGHTS,
      sameDayTitleFloor: options.sameDayTitleFloor,
    });

    const outcome = await decide(video, ranked, ctx);
    if (outcome.kind === 'matched') matches.push(outcome);
    else unmatched.push(outcome);

    log.debug(
      { videoId: video.videoId, kind: outcome.kind, candidates: selection.candidates.length, fallback: selection.fallback },
      'Video matched',
    );
    options.onProgress?.(i + 1, ordered.length);
  }

  log.info(
    { videos: ordered.length, events: events.length, matched: matches.length, fallbacks },
    'Matching complete',
  );

  return {
    metadata: {
      totalVideos: ordered.length,
      totalEvents: events.length,
      matched: matches.length,
      unmatched: unmatched.length,
      matchRate: formatRate(matches.length, ordered.length),
      algorithmicMatches: matches.filter(m => m.method === 'algorithmic').length,
      adjudicatedMatches: matches.filter(m => m.method === 'adjudicated').length,
      thresholds: { ...options.thresholds },
      generatedAt: (options.now ?? new Date()).toISOString(),
    },
    matches,
    unmatched,
  };
}
