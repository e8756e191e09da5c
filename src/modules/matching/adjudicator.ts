import type { CongressEvent, VideoRecord } from './types.js';

export type AdjudicationConfidence = 'high' | 'medium' | 'low';

export interface AdjudicationDecision {
  /** One of the referred candidates' event IDs, or null for "none of these" */
  eventId: string | null;
  confidence: AdjudicationConfidence;
  reasoning: string;
}

/**
 * Second opinion for scores in the ambiguous band.
 * Implementations return null instead of throwing when they cannot decide.
 */
export interface Adjudicator {
  adjudicate(video: VideoRecord, candidates: CongressEvent[]): Promise<AdjudicationDecision | null>;
}
