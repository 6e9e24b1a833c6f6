/**
 * Claim Checker
 *
 * Post-processing for model output. Dates and blood-pressure figures the
 * response cites are cross-checked against the context the model was given.
 * A claim with nothing behind it is flagged and lowers confidence; the
 * response text itself is left alone.
 */

import type { ContextBundle } from '../../common/types.js';
import { isIsoDate, localIsoDate } from '../../common/utils/dates.js';
import { round } from '../../common/utils/stats.js';
import { findMonthDayDates } from './date-resolver.js';

export interface Citation {
  date: string;
  source: 'record' | 'similar_day' | 'supplemental' | 'scope';
}

export interface ClaimCheckResult {
  citations: Citation[];
  unsupportedClaims: string[];
  confidence: number;
}

const UNSUPPORTED_PENALTY = 0.15;
const DEGRADED_PENALTY = 0.1;
const CONFIDENCE_FLOOR = 0.1;
/** Readings are cited to one decimal; allow the model to round to the unit */
const VALUE_TOLERANCE = 0.5;
/** Smaller mmHg figures are changes, not readings */
const MIN_BP_READING = 60;

const ISO_DATE_PATTERN = /\b(\d{4}-\d{2}-\d{2})\b/g;
const BP_PAIR_PATTERN = /\b(\d{2,3}(?:\.\d+)?)\s*\/\s*(\d{2,3}(?:\.\d+)?)\s*mm\s*hg\b/gi;
const BP_SINGLE_PATTERN = /(?<![\d./])(\d{2,3}(?:\.\d+)?)\s*mm\s*hg\b/gi;
const NUMBER_PATTERN = /\d+(?:\.\d+)?/g;

function dateSources(bundle: ContextBundle): Map<string, Citation['source']> {
  const sources = new Map<string, Citation['source']>();
  const { trendWindow, comparison, recentHistory } = bundle.supplemental;
  const supplemental = [
    ...(trendWindow ?? []),
    ...(comparison?.weekday ?? []),
    ...(comparison?.weekend ?? []),
    ...(recentHistory ?? []),
  ];
  for (const r of supplemental) sources.set(r.date, 'supplemental');
  for (const d of bundle.similarDays) sources.set(d.date, 'similar_day');
  for (const r of bundle.records) sources.set(r.date, 'record');
  return sources;
}

function inScope(date: string, bundle: ContextBundle): boolean {
  const scope = bundle.dateScope;
  return scope !== null && date >= scope.start && date <= scope.end;
}

/**
 * Every number that appears in the text the model was shown
 */
export function numbersIn(text: string): number[] {
  return Array.from(text.matchAll(NUMBER_PATTERN), m => parseFloat(m[0]));
}

/**
 * Confidence after the degraded-context and unsupported-claim penalties,
 * floored and rounded to two decimals
 */
export function penalizedConfidence(baseConfidence: number, degraded: boolean, unsupportedCount: number): number {
  let confidence = baseConfidence;
  if (degraded) confidence -= DEGRADED_PENALTY;
  confidence -= UNSUPPORTED_PENALTY * unsupportedCount;
  return round(Math.max(CONFIDENCE_FLOOR, confidence), 2);
}

function supported(value: number, known: number[]): boolean {
  return known.some(k => Math.abs(k - value) <= VALUE_TOLERANCE);
}

/**
 * Year anchor for "Month D" dates: the caller's date, else the end of the
 * scope, else the newest date in the context.
 */
function anchorDate(bundle: ContextBundle, sources: Map<string, Citation['source']>, referenceDate?: string): string {
  if (referenceDate) return referenceDate;
  if (bundle.dateScope) return bundle.dateScope.end;
  const known = [...sources.keys()].sort();
  return known[known.length - 1] ?? localIsoDate();
}

/**
 * @param contextDocument - the rendered context the model saw
 * @param baseConfidence - classification confidence before post-processing
 * @param referenceDate - date the question was asked on
 */
export function checkClaims(
  response: string,
  bundle: ContextBundle,
  contextDocument: string,
  baseConfidence: number,
  referenceDate?: string
): ClaimCheckResult {
  const sources = dateSources(bundle);
  const knownNumbers = numbersIn(contextDocument);
  const citations: Citation[] = [];
  const unsupported: string[] = [];
  const seenDates = new Set<string>();

  const isoDates = Array.from(response.matchAll(ISO_DATE_PATTERN), m => m[1]).filter(isIsoDate);
  const monthDayDates = findMonthDayDates(response, anchorDate(bundle, sources, referenceDate));

  for (const date of [...isoDates, ...monthDayDates]) {
    if (seenDates.has(date)) continue;
    seenDates.add(date);
    const source = sources.get(date);
    if (source) {
      citations.push({ date, source });
    } else if (inScope(date, bundle)) {
      citations.push({ date, source: 'scope' });
    } else {
      unsupported.push(`date ${date}`);
    }
  }

  const pairSpans: Array<[number, number]> = [];
  for (const m of response.matchAll(BP_PAIR_PATTERN)) {
    const start = m.index ?? 0;
    pairSpans.push([start, start + m[0].length]);
    const sys = parseFloat(m[1]);
    const dia = parseFloat(m[2]);
    if (!supported(sys, knownNumbers) || !supported(dia, knownNumbers)) {
      unsupported.push(`reading ${m[1]}/${m[2]} mmHg`);
    }
  }

  for (const m of response.matchAll(BP_SINGLE_PATTERN)) {
    const start = m.index ?? 0;
    if (pairSpans.some(([s, e]) => start >= s && start < e)) continue;
    const value = parseFloat(m[1]);
    if (value < MIN_BP_READING) continue;
    if (!supported(value, knownNumbers)) unsupported.push(`reading ${m[1]} mmHg`);
  }

  return {
    citations,
    unsupportedClaims: unsupported,
    confidence: penalizedConfidence(baseConfidence, bundle.degraded, unsupported.length),
  };
}
