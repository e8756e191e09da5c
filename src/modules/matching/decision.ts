import type { MatchThresholds } from '../../config.js';
import { getLogger } from '../../utils/logger.js';
import type { AdjudicationDecision, Adjudicator } from './adjudicator.js';
import type { CandidateScore } from './scorer.js';
import type { CongressEvent, MatchOutcome, UnmatchedDisposition, UnmatchedResult, VideoRecord } from './types.js';

export type Disposition = 'accept' | 'refer' | 'reject';

export interface ReferralPolicy {
  maxCandidates: number;
  maxDayDiff: number;
}

export const DEFAULT_REFERRAL: ReferralPolicy = { maxCandidates: 10, maxDayDiff: 7 };

export interface DecisionContext {
  thresholds: MatchThresholds;
  referral: ReferralPolicy;
  adjudicator: Adjudicator | null;
}

/** `high` and `low` are inclusive lower bounds of their bands. */
export function classifyScore(score: number, thresholds: MatchThresholds): Disposition {
  if (score >= thresholds.high) return 'accept';
  if (score >= thresholds.low) return 'refer';
  return 'reject';
}

/**
 * Events to show the adjudicator: the top-ranked ones within a week of the
 * video. An undated video gets the top-ranked ones regardless of date.
 */
export function referralCandidates(
  video: VideoRecord,
  ranked: CandidateScore[],
  policy: ReferralPolicy = DEFAULT_REFERRAL,
): CongressEvent[] {
  const top = ranked.slice(0, policy.maxCandidates);
  if (!video.date) return top.map(c => c.event);
  return top
    .filter(c => c.dayDiff !== null && c.dayDiff <= policy.maxDayDiff)
    .map(c => c.event);
}

function unmatched(
  video: VideoRecord,
  best: CandidateScore | undefined,
  disposition: UnmatchedDisposition,
  extraReasons: string[] = [],
): UnmatchedResult {
  return {
    kind: 'unmatched',
    video,
    bestScore: best?.score ?? null,
    bestMatchTitle: best?.event.title ?? null,
    bestMatchEventId: best?.event.eventId ?? null,
    reasons: [...(best?.reasons ?? []), ...extraReasons],
    disposition,
  };
}

/**
 * Turn a ranked candidate list into exactly one outcome for the video.
 * Adjudicator failures degrade to an unmatched entry; nothing here throws.
 */
export async function decide(
  video: VideoRecord,
  ranked: CandidateScore[],
  ctx: DecisionContext,
): Promise<MatchOutcome> {
  const log = getLogger();
  const best = ranked[0];
  if (!best) return unmatched(video, undefined, 'no-events');

  const disposition = classifyScore(best.score, ctx.thresholds);

  if (disposition === 'accept') {
    return {
      kind: 'matched',
      video,
      event: best.event,
      score: best.score,
      reasons: best.reasons,
      titleSimilarity: best.titleSimilarity,
      method: 'algorithmic',
    };
  }

  if (disposition === 'reject') {
    return unmatched(video, best, 'low-confidence');
  }

  const referred = referralCandidates(video, ranked, ctx.referral);
  if (referred.length === 0) {
    return unmatched(video, best, 'no-referral-candidates');
  }
  if (!ctx.adjudicator) {
    return unmatched(video, best, 'adjudication-unavailable', ['No adjudicator configured']);
  }

  let decision: AdjudicationDecision | null;
  try {
    decision = await ctx.adjudicator.adjudicate(video, referred);
  } catch (err) {
    log.warn({ err, videoId: video.videoId }, 'Adjudicator threw; treating as unavailable');
    decision = null;
  }

  if (!decision) {
    return unmatched(video, best, 'adjudication-unavailable');
  }

  const chosenId = decision.eventId;
  const chosen = chosenId === null
    ? undefined
    : ranked.find(c => c.event.eventId === chosenId && referred.includes(c.event));

  if (!chosen) {
    return unmatched(video, best, 'adjudication-declined', [`Adjudicator: ${decision.reasoning}`]);
  }

  return {
    kind: 'matched',
    video,
    event: chosen.event,
    // Algorithmic score of the chosen pair; adjudication never rewrites it
    score: chosen.score,
    reasons: chosen.reasons,
    titleSimilarity: chosen.titleSimilarity,
    method: 'adjudicated',
    adjudication: {
      confidence: decision.confidence,
      reasoning: decision.reasoning,
    },
  };
}
