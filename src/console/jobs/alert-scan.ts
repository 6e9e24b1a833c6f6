/**
 * Alert Scan
 *
 * Pattern checks over the 28 days ending on the check date. Each check is a
 * pure function of the window; `scanAlerts` appends whatever fires.
 *
 * Streaks count consecutive calendar days ending on the check date, so a
 * day without a record breaks them.
 */

import { GOAL_DEFAULTS } from '../../common/constants.js';
import type { HealthStore } from '../../common/services/health-store.js';
import { logInfo } from '../../common/services/logger.js';
import type { DailyHealthRecord, HealthAlert, MetricGoal } from '../../common/types.js';
import { addDays } from '../../common/utils/dates.js';
import { mean, stdDev, values } from '../../common/utils/stats.js';

const WINDOW_DAYS = 28;

export const ALERT_THRESHOLDS = {
  poorSleepHours: 6,
  poorSleepStreak: 3,
  spikeSigma: 2,
  spikeFloor: 140,
  spikeHistoryDays: 14,
  bpGoalStreak: 5,
  stepsTarget: 10000,
  activityStreak: 7,
  trendWindowDays: 14,
  trendDelta: 3,
} as const;

type Check = (byDate: Map<string, DailyHealthRecord>, checkDate: string, goals: MetricGoal[]) => HealthAlert | null;

// =============================================================================
// HELPERS
// =============================================================================

function streak(
  byDate: Map<string, DailyHealthRecord>,
  checkDate: string,
  predicate: (record: DailyHealthRecord) => boolean
): number {
  let count = 0;
  let date = checkDate;
  for (;;) {
    const record = byDate.get(date);
    if (!record || !predicate(record)) return count;
    count++;
    date = addDays(date, -1);
  }
}

function between(byDate: Map<string, DailyHealthRecord>, start: string, end: string): DailyHealthRecord[] {
  return [...byDate.values()].filter(r => r.date >= start && r.date <= end);
}

// =============================================================================
// CHECKS
// =============================================================================

export const checkPoorSleepStreak: Check = (byDate, checkDate) => {
  const nights = streak(
    byDate,
    checkDate,
    r => r.sleepHours !== undefined && r.sleepHours < ALERT_THRESHOLDS.poorSleepHours
  );
  if (nights < ALERT_THRESHOLDS.poorSleepStreak) return null;
  return {
    date: checkDate,
    type: 'poor_sleep_streak',
    priority: 'warning',
    title: 'Poor sleep streak',
    message: `${nights} consecutive nights under ${ALERT_THRESHOLDS.poorSleepHours} hours of sleep. Prioritize 7+ hours tonight.`,
    metricValue: nights,
  };
};

export const checkBpSpike: Check = (byDate, checkDate) => {
  const today = byDate.get(checkDate)?.systolic;
  if (today === undefined) return null;

  const history = values(
    between(byDate, addDays(checkDate, -ALERT_THRESHOLDS.spikeHistoryDays), addDays(checkDate, -1)),
    'systolic'
  );
  const avg = mean(history);
  const sd = stdDev(history);
  if (avg === null || sd === null || history.length < 3) return null;

  if (today > avg + ALERT_THRESHOLDS.spikeSigma * sd && today > ALERT_THRESHOLDS.spikeFloor) {
    return {
      date: checkDate,
      type: 'bp_spike',
      priority: 'warning',
      title: 'Elevated BP detected',
      message: `Today's systolic (${today.toFixed(0)} mmHg) is well above your recent average (${avg.toFixed(0)} mmHg). Check sleep, stress and activity.`,
      metricValue: today,
    };
  }
  return null;
};

export const checkBpGoalStreak: Check = (byDate, checkDate, goals) => {
  const goal = goals.find(g => g.metric === 'systolic')?.goal ?? GOAL_DEFAULTS.systolic.goal;
  const days = streak(byDate, checkDate, r => r.systolic !== undefined && r.systolic < goal);
  if (days < ALERT_THRESHOLDS.bpGoalStreak) return null;
  return {
    date: checkDate,
    type: 'bp_goal_streak',
    priority: 'celebration',
    title: `${days}-day BP streak`,
    message: `${days} consecutive days with systolic under ${goal} mmHg. Keep it going!`,
    metricValue: days,
  };
};

export const checkActivityStreak: Check = (byDate, checkDate) => {
  const days = streak(byDate, checkDate, r => r.steps !== undefined && r.steps >= ALERT_THRESHOLDS.stepsTarget);
  if (days < ALERT_THRESHOLDS.activityStreak) return null;
  return {
    date: checkDate,
    type: 'activity_streak',
    priority: 'celebration',
    title: 'Activity streak',
    message: `${days} consecutive days with 10,000+ steps.`,
    metricValue: days,
  };
};

/**
 * Compares the second week of the 14-day window with the first.
 */
export const checkTrend: Check = (byDate, checkDate) => {
  const half = ALERT_THRESHOLDS.trendWindowDays / 2;
  const recent = values(between(byDate, addDays(checkDate, -(half - 1)), checkDate), 'systolic');
  const earlier = values(
    between(byDate, addDays(checkDate, -(ALERT_THRESHOLDS.trendWindowDays - 1)), addDays(checkDate, -half)),
    'systolic'
  );
  if (recent.length < 3 || earlier.length < 3) return null;

  const recentAvg = mean(recent);
  const earlierAvg = mean(earlier);
  if (recentAvg === null || earlierAvg === null) return null;
  const change = recentAvg - earlierAvg;

  if (change >= ALERT_THRESHOLDS.trendDelta) {
    return {
      date: checkDate,
      type: 'trend_warning',
      priority: 'warning',
      title: 'BP trending up',
      message: `Average systolic rose ${change.toFixed(1)} mmHg this week (from ${earlierAvg.toFixed(0)} to ${recentAvg.toFixed(0)} mmHg).`,
      metricValue: Math.round(change * 10) / 10,
    };
  }
  if (change <= -ALERT_THRESHOLDS.trendDelta) {
    return {
      date: checkDate,
      type: 'trend_positive',
      priority: 'celebration',
      title: 'BP trending down',
      message: `Average systolic fell ${Math.abs(change).toFixed(1)} mmHg this week (from ${earlierAvg.toFixed(0)} to ${recentAvg.toFixed(0)} mmHg).`,
      metricValue: Math.round(change * 10) / 10,
    };
  }
  return null;
};

const CHECKS: readonly Check[] = [checkPoorSleepStreak, checkBpSpike, checkBpGoalStreak, checkActivityStreak, checkTrend];

// =============================================================================
// ENTRY POINTS
// =============================================================================

export function detectAlerts(records: DailyHealthRecord[], checkDate: string, goals: MetricGoal[]): HealthAlert[] {
  const byDate = new Map(records.map(r => [r.date, r]));
  const alerts: HealthAlert[] = [];
  for (const check of CHECKS) {
    const alert = check(byDate, checkDate, goals);
    if (alert) alerts.push(alert);
  }
  return alerts;
}

export async function scanAlerts(
  store: Pick<HealthStore, 'getRange' | 'getProfile' | 'appendAlert'>,
  checkDate: string
): Promise<HealthAlert[]> {
  const [records, profile] = await Promise.all([
    store.getRange(addDays(checkDate, -(WINDOW_DAYS - 1)), checkDate),
    store.getProfile(),
  ]);

  const alerts = detectAlerts(records, checkDate, profile.goals);
  for (const alert of alerts) {
    await store.appendAlert(alert);
  }
  logInfo('Alert scan complete', { job: 'alert_scan', date: checkDate, alerts: alerts.length, records: records.length });
  return alerts;
}
