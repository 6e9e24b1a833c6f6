/**
 * Small descriptive statistics over sparse metric series.
 */

import type { DailyHealthRecord, MetricName } from '../types.js';

export function values(records: DailyHealthRecord[], metric: MetricName): number[] {
  const out: number[] = [];
  for (const record of records) {
    const value = record[metric];
    if (value !== undefined) out.push(value);
  }
  return out;
}

export function mean(xs: number[]): number | null {
  if (xs.length === 0) return null;
  return xs.reduce((sum, x) => sum + x, 0) / xs.length;
}

/** Sample standard deviation (n - 1) */
export function stdDev(xs: number[]): number | null {
  if (xs.length < 2) return null;
  const m = xs.reduce((sum, x) => sum + x, 0) / xs.length;
  const variance = xs.reduce((sum, x) => sum + (x - m) ** 2, 0) / (xs.length - 1);
  return Math.sqrt(variance);
}

/**
 * Linear-interpolated percentile over a sorted array, p in [0, 100]
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) throw new Error('percentile of empty series');
  if (sorted.length === 1) return sorted[0];
  const rank = (p / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (rank - lo);
}

export function round(x: number, digits = 1): number {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

export function metricMean(records: DailyHealthRecord[], metric: MetricName): number | null {
  return mean(values(records, metric));
}
