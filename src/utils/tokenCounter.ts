/**
 * Token estimation and cost arithmetic.
 * Provider-reported usage wins when present; these are the fallbacks.
 */

export interface IModelPricing {
  readonly inputPricePerMToken: number;
  readonly outputPricePerMToken: number;
}

/**
 * Approximate token count using the ~4 chars per token heuristic.
 */
export function estimateTokenCount(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Calculate cost in USD from token usage; rounded to micro-dollars.
 */
export function calculateCost(
  pricing: IModelPricing | undefined,
  inputTokens: number,
  outputTokens: number,
): number {
  if (!pricing) {
    return 0;
  }

  const inputCost = (inputTokens / 1_000_000) * pricing.inputPricePerMToken;
  const outputCost = (outputTokens / 1_000_000) * pricing.outputPricePerMToken;

  return Math.round((inputCost + outputCost) * 1_000_000) / 1_000_000;
}

/**
 * Format cost for display (e.g., "$0.04").
 */
export function formatCost(costUsd: number): string {
  if (costUsd < 0.01) {
    return `$${costUsd.toFixed(4)}`;
  }
  return `$${costUsd.toFixed(2)}`;
}
