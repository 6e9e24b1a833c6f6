/**
 * Goal Tracker
 *
 * Progress of each profile goal from its 90-day baseline towards the goal
 * value, measured on the 7-day average ending on the snapshot date.
 */

import type { HealthStore } from '../../common/services/health-store.js';
import type { DailyHealthRecord, GoalSnapshot, GoalStatus, MetricGoal, UserProfile } from '../../common/types.js';
import { addDays } from '../../common/utils/dates.js';
import { metricMean, round } from '../../common/utils/stats.js';

const CURRENT_WINDOW_DAYS = 7;
const ON_TRACK_PCT = 50;

function meetsGoal(goal: MetricGoal, value: number): boolean {
  return goal.direction === 'lower' ? value <= goal.goal : value >= goal.goal;
}

/**
 * Share of the baseline-to-goal distance already covered, 0-100.
 * Movement away from the goal counts as zero.
 */
export function progressPct(goal: MetricGoal, baseline: number, current: number): number {
  if (meetsGoal(goal, current)) return 100;
  const needed = goal.direction === 'lower' ? baseline - goal.goal : goal.goal - baseline;
  if (needed <= 0) return 0;
  const achieved = goal.direction === 'lower' ? baseline - current : current - baseline;
  return round(Math.min(100, Math.max(0, (achieved / needed) * 100)), 1);
}

export function goalStatus(goal: MetricGoal, current: number | null, pct: number): GoalStatus {
  if (current === null) return 'no_data';
  if (meetsGoal(goal, current)) return 'achieved';
  if (pct >= ON_TRACK_PCT) return 'on_track';
  if (pct > 0) return 'progressing';
  return 'needs_attention';
}

export function trackGoals(profile: UserProfile, recent: DailyHealthRecord[], date: string): GoalSnapshot[] {
  return profile.goals.map(goal => {
    const average = metricMean(recent, goal.metric);
    const current = average === null ? null : round(average, 1);
    const baseline = profile.baselines[goal.metric] ?? current;
    let pct = 0;
    let gap: number | null = null;
    if (current !== null && baseline !== null) {
      pct = progressPct(goal, baseline, current);
      gap = meetsGoal(goal, current) ? 0 : round(Math.abs(current - goal.goal), 1);
    }
    return {
      date,
      metric: goal.metric,
      goal: goal.goal,
      currentValue: current,
      progressPct: pct,
      gap,
      status: goalStatus(goal, current, pct),
    };
  });
}

export function formatGoalSnapshots(snapshots: GoalSnapshot[]): string {
  if (snapshots.length === 0) return 'No goals configured.';
  return snapshots
    .map(s => {
      const current = s.currentValue === null ? 'no data' : String(s.currentValue);
      return `${s.metric}: ${current} vs goal ${s.goal} (${s.progressPct}%, ${s.status.replace('_', ' ')})`;
    })
    .join('\n');
}

export async function snapshotGoals(
  store: Pick<HealthStore, 'getRange' | 'getProfile' | 'appendGoalSnapshot'>,
  date: string
): Promise<GoalSnapshot[]> {
  const [profile, recent] = await Promise.all([
    store.getProfile(),
    store.getRange(addDays(date, -(CURRENT_WINDOW_DAYS - 1)), date),
  ]);
  const snapshots = trackGoals(profile, recent, date);
  for (const snapshot of snapshots) {
    await store.appendGoalSnapshot(snapshot);
  }
  return snapshots;
}
