/**
 * Token Estimator Service
 *
 * Coarse token and cost accounting for conversation turns.
 * Backends that report usage win; otherwise text length is used
 * (rough estimate: 4 chars per token).
 *
 * @example
 * const cost = estimateCost('reasoning', { inputTokens: 1200, outputTokens: 300 });
 */

import { COST_CONFIG } from '../constants.js';
import type { BackendId } from '../types.js';

const CHARS_PER_TOKEN = 4;

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Cost in USD, rounded to 6 decimals
 */
export function estimateCost(
  backend: BackendId | 'none',
  usage: TokenUsage,
  rates: Record<BackendId, number> = COST_CONFIG
): number {
  if (backend === 'none') return 0;
  const total = usage.inputTokens + usage.outputTokens;
  return Math.round((total / 1000) * rates[backend] * 1e6) / 1e6;
}
