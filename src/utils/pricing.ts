/**
 * Anthropic model pricing, per million tokens.
 * Unknown models cost 0 so usage summaries still print.
 */

interface ModelPricing {
  inputPerMTok: number;   // $ per 1M input tokens
  outputPerMTok: number;  // $ per 1M output tokens
}

const MODEL_PRICING: Record<string, ModelPricing> = {
  'claude-sonnet-4-5-20250929':   { inputPerMTok: 3,    outputPerMTok: 15 },
  'claude-haiku-4-5-20251001':    { inputPerMTok: 1,    outputPerMTok: 5  },
  'claude-3-5-haiku-20241022':    { inputPerMTok: 0.80, outputPerMTok: 4  },
};

export function calculateCostCents(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = MODEL_PRICING[model];
  if (!pricing) return 0;

  const inputCost = (inputTokens / 1_000_000) * pricing.inputPerMTok;
  const outputCost = (outputTokens / 1_000_000) * pricing.outputPerMTok;

  return (inputCost + outputCost) * 100; // cents
}

export function modelDisplayName(model: string): string {
  if (model.includes('opus')) return 'Opus';
  if (model.includes('sonnet')) return 'Sonnet';
  if (model.includes('haiku')) return 'Haiku';
  return model;
}
