/**
 * Weekly Report
 *
 * Seven days ending on `weekEnd` compared with the seven days before:
 * BP, sleep, activity and VO2 max statistics, best and worst BP day,
 * the within-week trend, up to five actions and a projection for next week.
 */

import { GOAL_DEFAULTS } from '../../common/constants.js';
import type { HealthStore } from '../../common/services/health-store.js';
import type { DailyHealthRecord, MetricGoal, MetricName } from '../../common/types.js';
import { addDays, parseIsoDate } from '../../common/utils/dates.js';
import { mean, round, stdDev, values } from '../../common/utils/stats.js';

// =============================================================================
// TYPES
// =============================================================================

export interface WeekStats {
  days: number;
  bpAvg: number | null;
  bpMin: number | null;
  bpMax: number | null;
  bpStd: number | null;
  bpDays: number;
  diastolicAvg: number | null;
  sleepAvg: number | null;
  nightsUnder7: number;
  stepsAvg: number | null;
  stepsTotal: number;
  daysOver10k: number;
  vo2Latest: number | null;
}

export type WeekTrend = 'improving' | 'worsening' | 'stable';

export interface BpDay {
  date: string;
  systolic: number;
  sleepHours?: number;
  steps?: number;
}

export interface WeeklyAction {
  action: string;
  reason: string;
  target: string;
}

export interface WeeklyReport {
  weekStart: string;
  weekEnd: string;
  current: WeekStats;
  previous: WeekStats;
  bestDay: BpDay | null;
  worstDay: BpDay | null;
  trend: WeekTrend | null;
  observations: string[];
  actions: WeeklyAction[];
  projectedSystolic: number | null;
  reportText: string;
}

const TREND_THRESHOLD_MMHG = 2;
const RULE = '='.repeat(60);

// =============================================================================
// STATISTICS
// =============================================================================

export function calculateWeekStats(records: DailyHealthRecord[]): WeekStats {
  const systolic = values(records, 'systolic');
  const sleep = values(records, 'sleepHours');
  const steps = values(records, 'steps');
  const vo2 = values(records, 'vo2Max');

  return {
    days: records.length,
    bpAvg: mean(systolic),
    bpMin: systolic.length > 0 ? Math.min(...systolic) : null,
    bpMax: systolic.length > 0 ? Math.max(...systolic) : null,
    bpStd: systolic.length > 1 ? stdDev(systolic) : systolic.length === 1 ? 0 : null,
    bpDays: systolic.length,
    diastolicAvg: mean(values(records, 'diastolic')),
    sleepAvg: mean(sleep),
    nightsUnder7: sleep.filter(h => h < 7).length,
    stepsAvg: mean(steps),
    stepsTotal: steps.reduce((sum, s) => sum + s, 0),
    daysOver10k: steps.filter(s => s >= 10000).length,
    vo2Latest: vo2.length > 0 ? vo2[vo2.length - 1] : null,
  };
}

function bpDays(records: DailyHealthRecord[]): BpDay[] {
  const days: BpDay[] = [];
  for (const r of records) {
    if (r.systolic === undefined) continue;
    const day: BpDay = { date: r.date, systolic: r.systolic };
    if (r.sleepHours !== undefined) day.sleepHours = r.sleepHours;
    if (r.steps !== undefined) day.steps = r.steps;
    days.push(day);
  }
  return days;
}

/**
 * Compares the later half of the week's readings with the earlier half.
 * Needs at least three readings.
 */
export function weekTrend(records: DailyHealthRecord[]): WeekTrend | null {
  const readings = values(records, 'systolic');
  if (readings.length < 3) return null;
  const split = Math.floor(readings.length / 2);
  const early = mean(readings.slice(0, split));
  const late = mean(readings.slice(split));
  if (early === null || late === null) return null;
  if (late < early - TREND_THRESHOLD_MMHG) return 'improving';
  if (late > early + TREND_THRESHOLD_MMHG) return 'worsening';
  return 'stable';
}

function observations(best: BpDay | null, worst: BpDay | null): string[] {
  if (!best || !worst || best.date === worst.date) return [];
  const notes: string[] = [];
  if (best.sleepHours !== undefined && worst.sleepHours !== undefined) {
    const diff = best.sleepHours - worst.sleepHours;
    if (Math.abs(diff) > 1) notes.push(`Best day had ${formatSigned(diff, 1)} hrs more sleep than the hardest day`);
  }
  if (best.steps !== undefined && worst.steps !== undefined) {
    const diff = best.steps - worst.steps;
    if (Math.abs(diff) > 2000) notes.push(`Best day had ${formatSigned(diff, 0)} more steps than the hardest day`);
  }
  return notes;
}

function goalFor(goals: MetricGoal[], metric: MetricName, fallback: number): number {
  return goals.find(g => g.metric === metric)?.goal ?? fallback;
}

export function weeklyActions(
  stats: WeekStats,
  best: BpDay | null,
  hasObservations: boolean,
  goals: MetricGoal[]
): WeeklyAction[] {
  const actions: WeeklyAction[] = [];
  const bpGoal = goalFor(goals, 'systolic', GOAL_DEFAULTS.systolic.goal);
  const vo2Goal = goalFor(goals, 'vo2Max', GOAL_DEFAULTS.vo2Max.goal);

  if (stats.nightsUnder7 >= 3) {
    actions.push({
      action: 'Prioritize sleep',
      reason: `You had ${stats.nightsUnder7} nights under 7 hours this week`,
      target: '7+ hours every night',
    });
  }

  if (stats.stepsAvg !== null && stats.daysOver10k < 4) {
    actions.push({
      action: 'Increase daily activity',
      reason: `Only ${stats.daysOver10k} days hit 10,000 steps`,
      target: 'Hit 10,000 steps at least 5 days',
    });
  }

  if (stats.bpAvg !== null && stats.bpAvg > bpGoal) {
    const gap = stats.bpAvg - bpGoal;
    actions.push({
      action: 'Focus on BP reduction',
      reason: `Average systolic is ${gap.toFixed(0)} mmHg above your ${bpGoal} mmHg goal`,
      target: `Reduce average systolic by ${Math.min(gap, 5).toFixed(0)} mmHg`,
    });
  }

  if (stats.vo2Latest !== null && stats.vo2Latest < vo2Goal) {
    actions.push({
      action: 'Add cardio sessions',
      reason: 'VO2 max has the strongest effect on your BP',
      target: '3-4 cardio sessions of 30+ minutes',
    });
  }

  if (best && hasObservations) {
    actions.push({
      action: 'Replicate your best day',
      reason: `Your best reading (${best.systolic.toFixed(0)} mmHg) shows what works`,
      target: 'Follow the same sleep and activity pattern 4+ days',
    });
  }

  return actions.slice(0, 5);
}

function projectSystolic(stats: WeekStats, trend: WeekTrend | null): number | null {
  if (stats.bpAvg === null) return null;
  const shift = trend === 'improving' ? -2 : trend === 'worsening' ? 2 : 0;
  return round(stats.bpAvg + shift, 0);
}

// =============================================================================
// FORMATTING
// =============================================================================

function formatSigned(value: number, digits: number): string {
  const text = Math.abs(value).toLocaleString('en-US', {
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  });
  return `${value < 0 ? '-' : '+'}${text}`;
}

function arrow(change: number): string {
  return change < 0 ? '↓' : change > 0 ? '↑' : '→';
}

function shortDate(iso: string, withYear: boolean): string {
  return parseIsoDate(iso).toLocaleDateString('en-US', {
    month: 'long',
    day: '2-digit',
    year: withYear ? 'numeric' : undefined,
    timeZone: 'UTC',
  });
}

function section(title: string): string[] {
  return ['', RULE, title, RULE];
}

function composeReport(r: Omit<WeeklyReport, 'reportText'>): string {
  const { current: s, previous: p } = r;
  const lines = [`WEEKLY HEALTH REPORT: ${shortDate(r.weekStart, false)} - ${shortDate(r.weekEnd, true)}`];

  if (s.days === 0) {
    lines.push('', 'No health data available for this week.', 'Please make sure your health data is synced.');
    return lines.join('\n');
  }

  lines.push(...section('1. BLOOD PRESSURE SUMMARY'));
  if (s.bpAvg !== null && s.bpMin !== null && s.bpMax !== null) {
    const dia = s.diastolicAvg !== null ? `/${s.diastolicAvg.toFixed(0)}` : '';
    lines.push(
      `Average: ${s.bpAvg.toFixed(0)}${dia} mmHg`,
      `Range: ${s.bpMin.toFixed(0)} - ${s.bpMax.toFixed(0)} mmHg (systolic)`,
      `Variability: ±${(s.bpStd ?? 0).toFixed(1)} mmHg`,
      `Days with readings: ${s.bpDays}/7`
    );
    if (p.bpAvg !== null) {
      const change = s.bpAvg - p.bpAvg;
      lines.push(`vs Previous Week: ${formatSigned(change, 1)} mmHg ${arrow(change)}`);
    }
  } else {
    lines.push('No BP readings recorded this week.');
  }

  lines.push(...section('2. SLEEP ANALYSIS'));
  if (s.sleepAvg !== null) {
    lines.push(`Average: ${s.sleepAvg.toFixed(1)} hours/night`, `Nights under 7 hours: ${s.nightsUnder7}/7`);
    if (p.sleepAvg !== null) {
      const change = s.sleepAvg - p.sleepAvg;
      lines.push(`vs Previous Week: ${formatSigned(change, 1)} hours ${arrow(change)}`);
    }
  } else {
    lines.push('No sleep data recorded this week.');
  }

  lines.push(...section('3. ACTIVITY SUMMARY'));
  if (s.stepsAvg !== null) {
    lines.push(
      `Daily Average: ${Math.round(s.stepsAvg).toLocaleString('en-US')} steps`,
      `Weekly Total: ${Math.round(s.stepsTotal).toLocaleString('en-US')} steps`,
      `Days over 10,000: ${s.daysOver10k}/7`
    );
    if (p.stepsAvg !== null) {
      const change = s.stepsAvg - p.stepsAvg;
      lines.push(`vs Previous Week: ${formatSigned(change, 0)} steps ${arrow(change)}`);
    }
  } else {
    lines.push('No step data recorded this week.');
  }

  if (s.vo2Latest !== null) {
    lines.push(...section('4. FITNESS (VO2 MAX)'), `Current: ${s.vo2Latest.toFixed(1)} mL/kg/min`);
  }

  lines.push(...section('5. KEY INSIGHTS'));
  if (r.bestDay) lines.push(`Best day: ${r.bestDay.date} (${r.bestDay.systolic.toFixed(0)} mmHg)`);
  if (r.worstDay) lines.push(`Challenging day: ${r.worstDay.date} (${r.worstDay.systolic.toFixed(0)} mmHg)`);
  for (const note of r.observations) lines.push(`- ${note}`);
  if (r.trend === 'improving') lines.push('Trend: BP improving through the week.');
  else if (r.trend === 'worsening') lines.push('Trend: BP increased through the week. Review sleep and stress.');
  else if (r.trend === 'stable') lines.push('Trend: BP stable throughout the week.');

  lines.push(...section('6. ACTION PLAN FOR NEXT WEEK'));
  r.actions.forEach((a, i) => {
    lines.push(`${i + 1}. ${a.action}`, `   Why: ${a.reason}`, `   Target: ${a.target}`);
  });

  if (r.projectedSystolic !== null) {
    lines.push(
      ...section('7. NEXT WEEK FORECAST'),
      'If current habits continue:',
      `- Expected BP: ${r.projectedSystolic} mmHg (±5)`
    );
  }

  return lines.join('\n');
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function generateWeeklyReport(
  store: Pick<HealthStore, 'getRange' | 'getProfile'>,
  weekEnd: string
): Promise<WeeklyReport> {
  const weekStart = addDays(weekEnd, -6);
  const [week, previousWeek, profile] = await Promise.all([
    store.getRange(weekStart, weekEnd),
    store.getRange(addDays(weekStart, -7), addDays(weekStart, -1)),
    store.getProfile(),
  ]);

  const current = calculateWeekStats(week);
  const days = bpDays(week);
  const sorted = [...days].sort((a, b) => a.systolic - b.systolic);
  const bestDay = sorted[0] ?? null;
  const worstDay = sorted[sorted.length - 1] ?? null;
  const trend = weekTrend(week);
  const notes = observations(bestDay, worstDay);

  const report: Omit<WeeklyReport, 'reportText'> = {
    weekStart,
    weekEnd,
    current,
    previous: calculateWeekStats(previousWeek),
    bestDay,
    worstDay,
    trend,
    observations: notes,
    actions: weeklyActions(current, bestDay, notes.length > 0, profile.goals),
    projectedSystolic: projectSystolic(current, trend),
  };
  return { ...report, reportText: composeReport(report) };
}
