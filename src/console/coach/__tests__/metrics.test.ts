/**
 * Jest Unit Tests for Coach Metrics
 */

import { CoachMetrics } from '../metrics.js';
import type { QueryMetricsInput } from '../metrics.js';

function query(overrides: Partial<QueryMetricsInput> = {}): QueryMetricsInput {
  return {
    intent: 'DATA_LOOKUP',
    status: 'DELIVERED',
    confidence: 0.8,
    durationMs: 100,
    inputTokens: 500,
    outputTokens: 50,
    costUsd: 0.001,
    attempts: [{ backend: 'local', ok: true, durationMs: 90 }],
    privacyFailClosed: false,
    ...overrides,
  };
}

describe('CoachMetrics', () => {
  let metrics: CoachMetrics;

  beforeEach(() => {
    metrics = new CoachMetrics();
  });

  test('starts empty', () => {
    expect(metrics.getMetrics().totalQueries).toBe(0);
    expect(metrics.formatSummary()).toBe('No queries recorded');
  });

  test('aggregates queries by intent and backend', () => {
    metrics.recordQuery(query());
    metrics.recordQuery(
      query({
        intent: 'TREND',
        confidence: 0.6,
        durationMs: 300,
        costUsd: 0.002,
        attempts: [
          { backend: 'validation', ok: false, durationMs: 200 },
          { backend: 'local', ok: true, durationMs: 80 },
        ],
      })
    );
    metrics.recordQuery(
      query({ status: 'FAILED', confidence: 0.4, durationMs: 200, costUsd: 0, attempts: [], privacyFailClosed: true })
    );

    const m = metrics.getMetrics();
    expect(m).toMatchObject({
      totalQueries: 3,
      deliveredQueries: 2,
      failedQueries: 1,
      fallbacks: 1,
      privacyFailClosed: 1,
      totalInputTokens: 1500,
      totalCostUsd: 0.003,
      avgDurationMs: 200,
      maxDurationMs: 300,
    });
    expect(m.byIntent.DATA_LOOKUP?.count).toBe(2);
    expect(m.byIntent.DATA_LOOKUP?.avgConfidence).toBeCloseTo(0.6, 10);
    expect(m.byBackend.local).toEqual({ attempts: 2, successes: 2, failures: 0, totalDurationMs: 170 });
    expect(m.byBackend.validation).toEqual({ attempts: 1, successes: 0, failures: 1, totalDurationMs: 200 });
    expect(metrics.formatSummary()).toBe('3 queries, 66.7% delivered, 1 fallbacks, avg 200ms, $0.0030');
  });

  test('snapshots are copies', () => {
    metrics.recordQuery(query());
    metrics.getMetrics().byIntent.DATA_LOOKUP = undefined;
    expect(metrics.getMetrics().byIntent.DATA_LOOKUP?.count).toBe(1);
  });

  test('reset clears counters', () => {
    metrics.recordQuery(query());
    metrics.recordScenarioRun();
    metrics.reset();
    expect(metrics.getMetrics()).toMatchObject({ totalQueries: 0, scenarioRuns: 0, byIntent: {} });
  });
});
