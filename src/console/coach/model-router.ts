/**
 * Model Router
 *
 * Picks the LLM backend for a classified question. A pure decision over
 * typed metadata: no I/O, no state, same input same output.
 *
 * Routing order:
 * 1. SENSITIVE -> local, unconditionally
 * 2. structured output requested -> validation
 * 3. HIGH complexity -> reasoning
 * 4. MEDIUM -> validation (local when cost-constrained)
 * 5. LOW -> local
 */

import type { BackendId, PrivacySensitivity, QueryComplexity } from '../../common/types.js';

export interface RoutingMetadata {
  complexity: QueryComplexity;
  privacy: PrivacySensitivity;
  requiresStructuredOutput: boolean;
}

export interface RoutingOptions {
  costConstrained: boolean;
}

/**
 * Fallback priority. After the selected backend fails, the next one in
 * this order is tried once; local wraps around to reasoning.
 */
export const BACKEND_PRIORITY: readonly BackendId[] = ['reasoning', 'validation', 'local'];

export function selectBackend(metadata: RoutingMetadata, options: RoutingOptions): BackendId {
  if (metadata.privacy === 'SENSITIVE') return 'local';
  if (metadata.requiresStructuredOutput) return 'validation';
  switch (metadata.complexity) {
    case 'HIGH':
      return 'reasoning';
    case 'MEDIUM':
      return options.costConstrained ? 'local' : 'validation';
    case 'LOW':
      return 'local';
  }
}

/**
 * Backends to try, in order: the selected one, then one retry.
 * Sensitive requests have no retry target.
 */
export function fallbackChain(selected: BackendId, privacy: PrivacySensitivity): BackendId[] {
  if (privacy === 'SENSITIVE') return ['local'];
  const idx = BACKEND_PRIORITY.indexOf(selected);
  const next = BACKEND_PRIORITY[(idx + 1) % BACKEND_PRIORITY.length];
  return [selected, next];
}
