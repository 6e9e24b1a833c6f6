/**
 * Scenario Engine
 *
 * Counterfactual blood-pressure prediction: "what happens to my BP if my
 * VO2 max goes up 5 points and I sleep an hour more?"
 *
 * The model is linear. Each lifestyle factor has a fitted coefficient
 * (mmHg of systolic change per unit) with a standard error. The point
 * estimate is the sum of coefficient x delta; the confidence band comes
 * from Monte Carlo draws that perturb every coefficient by its standard
 * error. Everything is pure: trials and seed are parameters.
 */

import { BASELINE_DEFAULTS } from '../../common/constants.js';
import { ValidationError } from '../../common/errors.js';
import type { DailyHealthRecord } from '../../common/types.js';
import { createRandom } from '../../common/utils/random.js';
import { percentile, round } from '../../common/utils/stats.js';

// =============================================================================
// COEFFICIENTS
// =============================================================================

export type ScenarioFactor = 'vo2Max' | 'sleepHours' | 'steps' | 'sleepEfficiency';

export const SCENARIO_FACTORS: readonly ScenarioFactor[] = ['vo2Max', 'sleepHours', 'steps', 'sleepEfficiency'];

export interface ImpactCoefficient {
  factor: ScenarioFactor;
  label: string;
  unit: string;
  /** Systolic change per unit of the factor */
  mmHgPerUnit: number;
  standardError: number;
  /** Diastolic change as a fraction of systolic change for this factor */
  diastolicRatio: number;
  /** Sustainable change per month */
  monthlyRate: number;
  /** Days before a change starts to show in BP */
  lagDays: number;
  /** Physiological bounds for the resulting value */
  min: number;
  max: number;
}

export const IMPACT_COEFFICIENTS: Readonly<Record<ScenarioFactor, ImpactCoefficient>> = {
  vo2Max: {
    factor: 'vo2Max',
    label: 'VO2 max',
    unit: 'ml/kg/min',
    mmHgPerUnit: -1.96,
    standardError: 0.45,
    diastolicRatio: 0.55,
    monthlyRate: 1.0,
    lagDays: 14,
    min: 15,
    max: 70,
  },
  sleepHours: {
    factor: 'sleepHours',
    label: 'sleep',
    unit: 'hours',
    mmHgPerUnit: -3.1,
    standardError: 0.9,
    diastolicRatio: 0.6,
    monthlyRate: 0.5,
    lagDays: 3,
    min: 3,
    max: 11,
  },
  steps: {
    factor: 'steps',
    label: 'daily steps',
    unit: 'steps',
    mmHgPerUnit: -0.0003,
    standardError: 0.0001,
    diastolicRatio: 0.5,
    monthlyRate: 2000,
    lagDays: 7,
    min: 0,
    max: 40000,
  },
  sleepEfficiency: {
    factor: 'sleepEfficiency',
    label: 'sleep efficiency',
    unit: '%',
    mmHgPerUnit: -0.2,
    standardError: 0.08,
    diastolicRatio: 0.45,
    monthlyRate: 3,
    lagDays: 3,
    min: 50,
    max: 100,
  },
};

// =============================================================================
// TYPES
// =============================================================================

export type ScenarioDeltas = Partial<Record<ScenarioFactor, number>>;

export interface ScenarioBaseline extends Partial<Record<ScenarioFactor, number>> {
  systolic: number;
  diastolic?: number;
}

export interface ScenarioRequest {
  baseline: ScenarioBaseline;
  deltas: ScenarioDeltas;
  horizonWeeks?: number;
}

/**
 * How diastolic change is derived from systolic change
 * - fixed: one ratio for every factor
 * - coefficient: each factor's own ratio
 * - historical: the user's own ratio, see estimateDiastolicRatio()
 */
export type DiastolicSetting =
  | { mode: 'fixed'; ratio: number }
  | { mode: 'coefficient' }
  | { mode: 'historical'; ratio: number };

export interface ScenarioOptions {
  trials: number;
  seed: number;
  coefficients?: Readonly<Record<ScenarioFactor, ImpactCoefficient>>;
  diastolic?: DiastolicSetting;
  horizonWeeks?: number;
}

export type FeasibilityTier = 'HIGH' | 'MODERATE' | 'LOW' | 'INFEASIBLE';

export interface FactorFeasibility {
  factor: ScenarioFactor;
  tier: FeasibilityTier;
  /** |delta| over what is achievable within the horizon */
  ratio: number;
  reason?: string;
}

export interface FactorTimeline {
  factor: ScenarioFactor;
  lagDays: number;
  rampDays: number;
  totalDays: number;
}

export interface ScenarioResult {
  baseline: ScenarioBaseline;
  deltas: ScenarioDeltas;
  contributions: Array<{ factor: ScenarioFactor; delta: number; systolicChange: number }>;
  systolicChange: number;
  diastolicChange: number;
  predictedSystolic: number;
  predictedDiastolic: number | null;
  /** 95% band on the systolic change */
  confidenceInterval: { lower: number; upper: number; level: number };
  standardError: number;
  feasibility: { tier: FeasibilityTier; factors: FactorFeasibility[]; infeasibleFactors: ScenarioFactor[] };
  timeline: { days: number; weeks: number; factors: FactorTimeline[] };
  recommendations: string[];
  trials: number;
  seed: number;
  horizonWeeks: number;
}

const DEFAULT_HORIZON_WEEKS = 12;
const TIER_ORDER: FeasibilityTier[] = ['HIGH', 'MODERATE', 'LOW', 'INFEASIBLE'];

// =============================================================================
// PREDICTION
// =============================================================================

function activeFactors(deltas: ScenarioDeltas): Array<[ScenarioFactor, number]> {
  const out: Array<[ScenarioFactor, number]> = [];
  for (const factor of SCENARIO_FACTORS) {
    const delta = deltas[factor];
    if (delta !== undefined && delta !== 0) out.push([factor, delta]);
  }
  return out;
}

function diastolicRatioFor(coef: ImpactCoefficient, setting: DiastolicSetting): number {
  return setting.mode === 'coefficient' ? coef.diastolicRatio : setting.ratio;
}

/**
 * Monte Carlo band on the systolic change. Every trial draws one normal
 * per factor in table order, including factors left unchanged, so adding
 * a factor to a scenario only ever adds variance on the same draws.
 */
function simulate(
  factors: Array<[ScenarioFactor, number]>,
  coefficients: Readonly<Record<ScenarioFactor, ImpactCoefficient>>,
  trials: number,
  seed: number
): { lower: number; upper: number } {
  if (factors.length === 0) return { lower: 0, upper: 0 };

  const rng = createRandom(seed);
  const deltas = new Map(factors);
  const samples = new Array<number>(trials);

  for (let t = 0; t < trials; t++) {
    let total = 0;
    for (const factor of SCENARIO_FACTORS) {
      const z = rng.gaussian();
      const delta = deltas.get(factor);
      if (delta === undefined) continue;
      const coef = coefficients[factor];
      total += (coef.mmHgPerUnit + coef.standardError * z) * delta;
    }
    samples[t] = total;
  }

  samples.sort((a, b) => a - b);
  return { lower: percentile(samples, 2.5), upper: percentile(samples, 97.5) };
}

function assessFeasibility(
  baseline: ScenarioBaseline,
  factors: Array<[ScenarioFactor, number]>,
  coefficients: Readonly<Record<ScenarioFactor, ImpactCoefficient>>,
  horizonWeeks: number
): ScenarioResult['feasibility'] {
  const months = (horizonWeeks * 7) / 30;
  const assessed = factors.map(([factor, delta]): FactorFeasibility => {
    const coef = coefficients[factor];
    const ratio = round(Math.abs(delta) / (coef.monthlyRate * months), 2);
    const current = baseline[factor] ?? BASELINE_DEFAULTS[factor];
    const target = current + delta;

    if (target < coef.min || target > coef.max) {
      return {
        factor,
        tier: 'INFEASIBLE',
        ratio,
        reason: `${coef.label} of ${round(target, 1)} ${coef.unit} is outside ${coef.min}-${coef.max}`,
      };
    }

    const tier: FeasibilityTier = ratio <= 0.5 ? 'HIGH' : ratio <= 1 ? 'MODERATE' : ratio <= 2 ? 'LOW' : 'INFEASIBLE';
    return tier === 'INFEASIBLE'
      ? { factor, tier, ratio, reason: `${coef.label} change exceeds a realistic pace for ${horizonWeeks} weeks` }
      : { factor, tier, ratio };
  });

  const worst = assessed.reduce<FeasibilityTier>(
    (acc, f) => (TIER_ORDER.indexOf(f.tier) > TIER_ORDER.indexOf(acc) ? f.tier : acc),
    'HIGH'
  );

  return {
    tier: worst,
    factors: assessed,
    infeasibleFactors: assessed.filter(f => f.tier === 'INFEASIBLE').map(f => f.factor),
  };
}

function buildTimeline(
  factors: Array<[ScenarioFactor, number]>,
  coefficients: Readonly<Record<ScenarioFactor, ImpactCoefficient>>
): ScenarioResult['timeline'] {
  const perFactor: FactorTimeline[] = factors.map(([factor, delta]) => {
    const coef = coefficients[factor];
    const rampDays = Math.ceil(Math.abs(delta) / (coef.monthlyRate / 30));
    return { factor, lagDays: coef.lagDays, rampDays, totalDays: coef.lagDays + rampDays };
  });
  const days = perFactor.reduce((max, f) => Math.max(max, f.totalDays), 0);
  return { days, weeks: Math.ceil(days / 7), factors: perFactor };
}

function buildRecommendations(
  baseline: ScenarioBaseline,
  factors: Array<[ScenarioFactor, number]>,
  coefficients: Readonly<Record<ScenarioFactor, ImpactCoefficient>>
): string[] {
  const recs: string[] = [];
  for (const [factor, delta] of factors) {
    const coef = coefficients[factor];
    if (delta < 0) {
      recs.push(
        `Reducing ${coef.label} by ${Math.abs(delta)} ${coef.unit} is expected to raise systolic BP by about ${round(Math.abs(coef.mmHgPerUnit * delta), 1)} mmHg.`
      );
      continue;
    }
    switch (factor) {
      case 'vo2Max':
        recs.push('Build cardio fitness: 4-5 sessions per week of 30-45 minutes, including 2 interval sessions.');
        break;
      case 'sleepHours': {
        const target = round((baseline.sleepHours ?? BASELINE_DEFAULTS.sleepHours) + delta, 1);
        recs.push(`Aim for ${target} hours of sleep: keep a consistent bedtime and stop screens an hour before.`);
        break;
      }
      case 'steps':
        recs.push(`Add ${Math.round(delta).toLocaleString('en-US')} daily steps (about ${Math.round(delta / 100)} minutes of walking).`);
        break;
      case 'sleepEfficiency':
        recs.push('Improve sleep efficiency: keep the bedroom dark and cool, and avoid caffeine after noon.');
        break;
    }
  }
  return recs;
}

/**
 * Predict the BP effect of a set of lifestyle deltas.
 */
export function predict(request: ScenarioRequest, options: ScenarioOptions): ScenarioResult {
  if (!Number.isInteger(options.trials) || options.trials < 1) {
    throw new ValidationError('Invalid scenario options', [`trials must be a positive integer, got ${options.trials}`]);
  }
  const coefficients = options.coefficients ?? IMPACT_COEFFICIENTS;
  const diastolic = options.diastolic ?? { mode: 'fixed', ratio: 0.5 };
  const horizonWeeks = request.horizonWeeks ?? options.horizonWeeks ?? DEFAULT_HORIZON_WEEKS;
  const factors = activeFactors(request.deltas);

  const contributions = factors.map(([factor, delta]) => ({
    factor,
    delta,
    systolicChange: round(coefficients[factor].mmHgPerUnit * delta, 2),
  }));

  let systolicChange = 0;
  let diastolicChange = 0;
  for (const [factor, delta] of factors) {
    const coef = coefficients[factor];
    const change = coef.mmHgPerUnit * delta;
    systolicChange += change;
    diastolicChange += change * diastolicRatioFor(coef, diastolic);
  }

  const standardError = Math.sqrt(
    factors.reduce((sum, [factor, delta]) => sum + (coefficients[factor].standardError * delta) ** 2, 0)
  );
  const band = simulate(factors, coefficients, options.trials, options.seed);

  const appliedDeltas: ScenarioDeltas = {};
  for (const [factor, delta] of factors) appliedDeltas[factor] = delta;

  return {
    baseline: request.baseline,
    deltas: appliedDeltas,
    contributions,
    systolicChange: round(systolicChange, 2),
    diastolicChange: round(diastolicChange, 2),
    predictedSystolic: round(request.baseline.systolic + systolicChange, 1),
    predictedDiastolic:
      request.baseline.diastolic === undefined ? null : round(request.baseline.diastolic + diastolicChange, 1),
    confidenceInterval: { lower: round(band.lower, 2), upper: round(band.upper, 2), level: 0.95 },
    standardError: round(standardError, 3),
    feasibility: assessFeasibility(request.baseline, factors, coefficients, horizonWeeks),
    timeline: buildTimeline(factors, coefficients),
    recommendations: buildRecommendations(request.baseline, factors, coefficients),
    trials: options.trials,
    seed: options.seed,
    horizonWeeks,
  };
}

/**
 * Run several scenarios against one baseline, best (largest BP drop) first
 */
export function compareScenarios(
  baseline: ScenarioBaseline,
  scenarios: Array<{ name: string; deltas: ScenarioDeltas }>,
  options: ScenarioOptions
): Array<{ name: string; result: ScenarioResult }> {
  return scenarios
    .map(s => ({ name: s.name, result: predict({ baseline, deltas: s.deltas }, options) }))
    .sort((a, b) => a.result.systolicChange - b.result.systolicChange);
}

// =============================================================================
// BASELINE HELPERS
// =============================================================================

/**
 * Slope of diastolic on systolic across the user's own days.
 * Null with fewer than 10 paired days or a slope outside (0, 1.5].
 */
export function estimateDiastolicRatio(records: DailyHealthRecord[]): number | null {
  const pairs: Array<[number, number]> = [];
  for (const r of records) {
    if (r.systolic !== undefined && r.diastolic !== undefined) pairs.push([r.systolic, r.diastolic]);
  }
  if (pairs.length < 10) return null;

  const meanS = pairs.reduce((s, [x]) => s + x, 0) / pairs.length;
  const meanD = pairs.reduce((s, [, y]) => s + y, 0) / pairs.length;
  let cov = 0;
  let varS = 0;
  for (const [x, y] of pairs) {
    cov += (x - meanS) * (y - meanD);
    varS += (x - meanS) ** 2;
  }
  if (varS === 0) return null;
  const slope = cov / varS;
  return slope > 0 && slope <= 1.5 ? round(slope, 3) : null;
}

/**
 * Format a result as plain text, used when scenarios are not narrated
 */
export function formatScenarioResult(result: ScenarioResult): string {
  const lines: string[] = [];
  const sign = (x: number) => (x > 0 ? `+${x}` : `${x}`);
  const changes = result.contributions
    .map(c => `${IMPACT_COEFFICIENTS[c.factor].label} ${sign(c.delta)}`)
    .join(', ');

  if (result.contributions.length === 0) {
    return `No change requested. Expected systolic BP stays at ${result.baseline.systolic} mmHg.`;
  }

  lines.push(`Scenario: ${changes}.`);
  const diastolic = result.predictedDiastolic === null ? '' : `/${result.predictedDiastolic}`;
  lines.push(
    `Predicted BP: ${result.predictedSystolic}${diastolic} mmHg (systolic change ${sign(result.systolicChange)} mmHg, ` +
      `95% range ${result.confidenceInterval.lower} to ${result.confidenceInterval.upper}).`
  );
  lines.push(`Feasibility: ${result.feasibility.tier}. Expected timeline: about ${result.timeline.weeks} weeks.`);
  for (const f of result.feasibility.factors) {
    if (f.reason) lines.push(`Note: ${f.reason}.`);
  }
  for (const rec of result.recommendations) lines.push(`- ${rec}`);
  return lines.join('\n');
}
