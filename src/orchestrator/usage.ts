import type { TokenUsage } from '../types/run.js';
import type { PricingConfig } from '../config/index.js';

export const DEFAULT_PRICING: PricingConfig = {
  inputPerMillion: 2.0,
  outputPerMillion: 12.0,
};

/**
 * Estimated cost in USD.
 */
export function calculateCost(usage: TokenUsage, pricing: PricingConfig = DEFAULT_PRICING): number {
  return (
    (usage.promptTokens / 1_000_000) * pricing.inputPerMillion +
    (usage.outputTokens / 1_000_000) * pricing.outputPerMillion
  );
}

const count = new Intl.NumberFormat('en-US');

/**
 * e.g. `Tokens: 1,000 in / 500 out / 1,500 total | Cost: $0.0080`
 */
export function formatUsage(usage: TokenUsage, pricing: PricingConfig = DEFAULT_PRICING): string {
  const cost = calculateCost(usage, pricing);
  return (
    `Tokens: ${count.format(usage.promptTokens)} in / ${count.format(usage.outputTokens)} out / ` +
    `${count.format(usage.totalTokens)} total | Cost: $${cost.toFixed(4)}`
  );
}
