/**
 * Daily Briefing
 *
 * Morning summary for a target date: yesterday's readings with their
 * categories, an expected BP for today and up to three recommendations.
 *
 * The expected BP starts from the profile baseline and moves by yesterday's
 * deviation from baseline on each scenario factor, weighted by the impact
 * coefficients. Without a record for yesterday the briefing falls back to
 * the historical averages with a wider margin. It never fails on missing data.
 */

import { BASELINE_DEFAULTS, GOAL_DEFAULTS } from '../../common/constants.js';
import { describeError } from '../../common/errors.js';
import type { HealthStore } from '../../common/services/health-store.js';
import { logWarn } from '../../common/services/logger.js';
import type { DailyHealthRecord, UserProfile } from '../../common/types.js';
import { addDays, formatLongDate } from '../../common/utils/dates.js';
import { activityLevel, bpCategory, formatBp, sleepQuality } from '../../common/utils/health-categories.js';
import { round } from '../../common/utils/stats.js';
import { IMPACT_COEFFICIENTS, SCENARIO_FACTORS } from '../coach/scenario-engine.js';
import type { ScenarioFactor } from '../coach/scenario-engine.js';
import { baselineFromProfile } from '../coach/scenario-context.js';

export const BRIEFING_MARGIN_MMHG = 8;
export const FALLBACK_MARGIN_MMHG = 10;

export interface BriefingPrediction {
  expectedSystolic: number;
  margin: number;
  /** Factor with the largest pull on today's estimate */
  mainFactor: ScenarioFactor | 'baseline' | 'insufficient data';
}

export interface DailyBriefing {
  date: string;
  yesterday: DailyHealthRecord | null;
  prediction: BriefingPrediction;
  recommendations: string[];
  briefingText: string;
}

// =============================================================================
// PREDICTION
// =============================================================================

export function predictToday(yesterday: DailyHealthRecord | null, profile: UserProfile | null): BriefingPrediction {
  const baseline = baselineFromProfile(profile);

  if (!yesterday) {
    return {
      expectedSystolic: round(baseline.systolic, 0),
      margin: FALLBACK_MARGIN_MMHG,
      mainFactor: 'insufficient data',
    };
  }

  let change = 0;
  let mainFactor: BriefingPrediction['mainFactor'] = 'baseline';
  let strongest = 0;
  for (const factor of SCENARIO_FACTORS) {
    const value = yesterday[factor];
    const reference = baseline[factor];
    if (value === undefined || reference === undefined) continue;
    const contribution = IMPACT_COEFFICIENTS[factor].mmHgPerUnit * (value - reference);
    change += contribution;
    if (Math.abs(contribution) > strongest) {
      strongest = Math.abs(contribution);
      mainFactor = factor;
    }
  }

  return {
    expectedSystolic: round(baseline.systolic + change, 0),
    margin: BRIEFING_MARGIN_MMHG,
    mainFactor,
  };
}

// =============================================================================
// RECOMMENDATIONS
// =============================================================================

export function briefingRecommendations(yesterday: DailyHealthRecord, profile: UserProfile | null): string[] {
  const recommendations: string[] = [];
  const vo2Goal = profile?.goals.find(g => g.metric === 'vo2Max')?.goal ?? GOAL_DEFAULTS.vo2Max.goal;
  const stepsGoal = profile?.goals.find(g => g.metric === 'steps')?.goal ?? GOAL_DEFAULTS.steps.goal;

  if (yesterday.sleepHours !== undefined && yesterday.sleepHours < 7) {
    recommendations.push(`Prioritize sleep tonight: aim for 7+ hours (you got ${yesterday.sleepHours.toFixed(1)} hrs)`);
  }

  if (yesterday.steps !== undefined && yesterday.steps < stepsGoal) {
    const gap = Math.round(stepsGoal - yesterday.steps);
    recommendations.push(`Add ${gap.toLocaleString('en-US')} more steps today to hit your goal`);
  }

  if (yesterday.vo2Max !== undefined && yesterday.vo2Max < vo2Goal) {
    recommendations.push('Include cardio exercise to improve VO2 Max, your strongest BP factor');
  }

  if (recommendations.length === 0) {
    recommendations.push('Maintain your current healthy habits!');
  }
  return recommendations.slice(0, 3);
}

function motivationalLine(yesterday: DailyHealthRecord, profile: UserProfile | null): string {
  const average = profile?.baselines.systolic ?? BASELINE_DEFAULTS.systolic;
  if (yesterday.systolic !== undefined && yesterday.systolic < average - 5) {
    return 'Great job! Your BP was below your average yesterday. Keep it up.';
  }
  if (yesterday.systolic !== undefined && yesterday.systolic > average + 5) {
    return 'Yesterday was a tougher day for BP. Today is a fresh start!';
  }
  return 'Consistency is key. Every healthy choice adds up over time.';
}

// =============================================================================
// COMPOSITION
// =============================================================================

function composeBriefing(
  date: string,
  yesterday: DailyHealthRecord | null,
  prediction: BriefingPrediction,
  recommendations: string[],
  profile: UserProfile | null
): string {
  const header = `MORNING BRIEFING: ${formatLongDate(date)}`;
  const expected = `Expected BP: ${prediction.expectedSystolic} mmHg (±${prediction.margin})`;

  if (!yesterday) {
    return [
      header,
      '',
      'No data available for yesterday. Please make sure your health data is synced.',
      '',
      "Today's prediction is based on your historical averages.",
      expected,
      `Key factor: ${prediction.mainFactor}`,
    ].join('\n');
  }

  const bp = formatBp(yesterday);
  const bpLine = bp && yesterday.systolic !== undefined ? `${bp} mmHg (${bpCategory(yesterday.systolic)})` : 'N/A';
  const sleepLine =
    yesterday.sleepHours !== undefined
      ? `${yesterday.sleepHours.toFixed(1)} hrs` +
        (yesterday.sleepEfficiency !== undefined ? ` (${Math.round(yesterday.sleepEfficiency)}% efficiency)` : '') +
        ` - ${sleepQuality(yesterday.sleepHours)}`
      : 'N/A';
  const activityLine =
    yesterday.steps !== undefined
      ? `${Math.round(yesterday.steps).toLocaleString('en-US')} steps - ${activityLevel(yesterday.steps)}`
      : 'N/A';

  return [
    header,
    '',
    "YESTERDAY'S SUMMARY:",
    `- BP: ${bpLine}`,
    `- Sleep: ${sleepLine}`,
    `- Activity: ${activityLine}`,
    '',
    "TODAY'S PREDICTION:",
    expected,
    `Key factor: ${prediction.mainFactor === 'baseline' ? 'baseline' : IMPACT_COEFFICIENTS[prediction.mainFactor].label}`,
    '',
    'RECOMMENDATIONS:',
    ...recommendations.map((r, i) => `${i + 1}. ${r}`),
    '',
    motivationalLine(yesterday, profile),
  ].join('\n');
}

/**
 * Build the briefing for `date` from the record of the day before.
 * Store failures degrade to the no-data briefing.
 */
export async function generateDailyBriefing(
  store: Pick<HealthStore, 'getRecord' | 'getProfile'>,
  date: string
): Promise<DailyBriefing> {
  const yesterdayDate = addDays(date, -1);

  const [yesterday, profile] = await Promise.all([
    store.getRecord(yesterdayDate).catch((error: unknown) => {
      logWarn('Briefing record unavailable', { job: 'daily_briefing', error: describeError(error) });
      return null;
    }),
    store.getProfile().catch((error: unknown) => {
      logWarn('Briefing profile unavailable', { job: 'daily_briefing', error: describeError(error) });
      return null;
    }),
  ]);

  const prediction = predictToday(yesterday, profile);
  const recommendations = yesterday ? briefingRecommendations(yesterday, profile) : [];

  return {
    date,
    yesterday,
    prediction,
    recommendations,
    briefingText: composeBriefing(date, yesterday, prediction, recommendations, profile),
  };
}
