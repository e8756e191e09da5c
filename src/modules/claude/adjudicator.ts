import { z } from 'zod';
import { getLogger } from '../../utils/logger.js';
import { calculateCostCents } from '../../utils/pricing.js';
import type { AdjudicationDecision, Adjudicator } from '../matching/adjudicator.js';
import type { CongressEvent, VideoRecord } from '../matching/types.js';
import type { ClaudeClient } from './client.js';
import { ADJUDICATE_SYSTEM, buildAdjudicatePrompt } from './prompts/adjudicate.js';

export const AdjudicationResponseSchema = z.object({
  event_id: z
    .union([z.string(), z.number()])
    .nullable()
    .transform(id => (id === null || id === '' ? null : String(id))),
  confidence: z.enum(['high', 'medium', 'low']),
  reasoning: z.string(),
});

export interface AdjudicationUsage {
  calls: number;
  failures: number;
  inputTokens: number;
  outputTokens: number;
  costCents: number;
}

/**
 * Claude-backed adjudicator. Every failure (network, timeout, bad JSON,
 * schema mismatch) is logged and reported as "no decision".
 */
export class ClaudeAdjudicator implements Adjudicator {
  private log = getLogger();
  private stats: AdjudicationUsage = { calls: 0, failures: 0, inputTokens: 0, outputTokens: 0, costCents: 0 };

  constructor(private readonly claude: ClaudeClient) {}

  async adjudicate(video: VideoRecord, candidates: CongressEvent[]): Promise<AdjudicationDecision | null> {
    if (candidates.length === 0) return null;

    this.stats.calls++;
    try {
      const result = await this.claude.structured(
        ADJUDICATE_SYSTEM,
        buildAdjudicatePrompt(video, candidates),
        AdjudicationResponseSchema,
      );

      this.stats.inputTokens += result.inputTokens;
      this.stats.outputTokens += result.outputTokens;
      this.stats.costCents += calculateCostCents(result.model, result.inputTokens, result.outputTokens);

      this.log.debug(
        { videoId: video.videoId, eventId: result.data.event_id, confidence: result.data.confidence },
        'Adjudication decided',
      );

      return {
        eventId: result.data.event_id,
        confidence: result.data.confidence,
        reasoning: result.data.reasoning,
      };
    } catch (err) {
      this.stats.failures++;
      this.log.warn(
        { videoId: video.videoId, err: err instanceof Error ? err.message : String(err) },
        'Adjudication failed',
      );
      return null;
    }
  }

  get usage(): AdjudicationUsage {
    return { ...this.stats };
  }
}
