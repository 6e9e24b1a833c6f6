/**
 * Coach Metrics Service
 *
 * In-memory query statistics for monitoring (resets on restart).
 *
 * Tracks:
 * - Intent distribution and confidence
 * - Backend usage, fallbacks and failures
 * - Privacy fail-closed count
 * - Token consumption and latency
 */

import type { BackendId, Intent, TurnStatus } from '../../common/types.js';

// =============================================================================
// TYPES
// =============================================================================

interface IntentStats {
  count: number;
  totalConfidence: number;
  avgConfidence: number;
}

interface BackendStats {
  attempts: number;
  successes: number;
  failures: number;
  totalDurationMs: number;
}

export interface CoachMetricsSnapshot {
  totalQueries: number;
  deliveredQueries: number;
  failedQueries: number;
  fallbacks: number;
  privacyFailClosed: number;
  scenarioRuns: number;

  totalInputTokens: number;
  totalOutputTokens: number;
  totalCostUsd: number;

  totalDurationMs: number;
  avgDurationMs: number;
  maxDurationMs: number;

  lastQueryTimestamp: string | null;

  byIntent: Partial<Record<Intent, IntentStats>>;
  byBackend: Partial<Record<BackendId, BackendStats>>;
}

export interface QueryMetricsInput {
  intent: Intent;
  status: TurnStatus;
  confidence: number;
  durationMs: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  attempts: Array<{ backend: BackendId; ok: boolean; durationMs: number }>;
  privacyFailClosed: boolean;
}

const createEmptyMetrics = (): CoachMetricsSnapshot => ({
  totalQueries: 0,
  deliveredQueries: 0,
  failedQueries: 0,
  fallbacks: 0,
  privacyFailClosed: 0,
  scenarioRuns: 0,

  totalInputTokens: 0,
  totalOutputTokens: 0,
  totalCostUsd: 0,

  totalDurationMs: 0,
  avgDurationMs: 0,
  maxDurationMs: 0,

  lastQueryTimestamp: null,

  byIntent: {},
  byBackend: {},
});

// =============================================================================
// RECORDER
// =============================================================================

export class CoachMetrics {
  private metrics: CoachMetricsSnapshot = createEmptyMetrics();

  recordQuery(input: QueryMetricsInput): void {
    const m = this.metrics;
    m.totalQueries++;
    if (input.status === 'DELIVERED') m.deliveredQueries++;
    else m.failedQueries++;
    if (input.privacyFailClosed) m.privacyFailClosed++;
    if (input.attempts.length > 1) m.fallbacks++;

    m.totalInputTokens += input.inputTokens;
    m.totalOutputTokens += input.outputTokens;
    m.totalCostUsd = Math.round((m.totalCostUsd + input.costUsd) * 1e6) / 1e6;

    m.totalDurationMs += input.durationMs;
    m.avgDurationMs = m.totalDurationMs / m.totalQueries;
    m.maxDurationMs = Math.max(m.maxDurationMs, input.durationMs);
    m.lastQueryTimestamp = new Date().toISOString();

    const intentStats = m.byIntent[input.intent] ?? { count: 0, totalConfidence: 0, avgConfidence: 0 };
    intentStats.count++;
    intentStats.totalConfidence += input.confidence;
    intentStats.avgConfidence = intentStats.totalConfidence / intentStats.count;
    m.byIntent[input.intent] = intentStats;

    for (const attempt of input.attempts) {
      const stats = m.byBackend[attempt.backend] ?? { attempts: 0, successes: 0, failures: 0, totalDurationMs: 0 };
      stats.attempts++;
      if (attempt.ok) stats.successes++;
      else stats.failures++;
      stats.totalDurationMs += attempt.durationMs;
      m.byBackend[attempt.backend] = stats;
    }
  }

  recordScenarioRun(): void {
    this.metrics.scenarioRuns++;
  }

  getMetrics(): CoachMetricsSnapshot {
    return structuredClone(this.metrics);
  }

  reset(): void {
    this.metrics = createEmptyMetrics();
  }

  /**
   * One-line summary for CLI output
   */
  formatSummary(): string {
    const m = this.metrics;
    if (m.totalQueries === 0) return 'No queries recorded';
    const rate = ((m.deliveredQueries / m.totalQueries) * 100).toFixed(1);
    return `${m.totalQueries} queries, ${rate}% delivered, ${m.fallbacks} fallbacks, avg ${Math.round(m.avgDurationMs)}ms, $${m.totalCostUsd.toFixed(4)}`;
  }
}

let metricsInstance: CoachMetrics | null = null;

/**
 * Process-wide metrics (singleton)
 */
export function getCoachMetrics(): CoachMetrics {
  if (!metricsInstance) {
    metricsInstance = new CoachMetrics();
  }
  return metricsInstance;
}
