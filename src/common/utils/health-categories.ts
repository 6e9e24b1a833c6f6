/**
 * Category labels shared by summaries, briefings and reports.
 */

import type { DailyHealthRecord } from '../types.js';

export type BpCategory = 'normal' | 'elevated' | 'stage 1 hypertension' | 'stage 2 hypertension';

export function bpCategory(systolic: number): BpCategory {
  if (systolic < 120) return 'normal';
  if (systolic < 130) return 'elevated';
  if (systolic < 140) return 'stage 1 hypertension';
  return 'stage 2 hypertension';
}

export function sleepQuality(hours: number): 'good' | 'fair' | 'poor' {
  if (hours >= 7) return 'good';
  if (hours >= 6) return 'fair';
  return 'poor';
}

export function activityLevel(steps: number): 'active' | 'moderate' | 'low' {
  if (steps >= 10000) return 'active';
  if (steps >= 5000) return 'moderate';
  return 'low';
}

export function formatBp(record: Pick<DailyHealthRecord, 'systolic' | 'diastolic'>): string | null {
  if (record.systolic === undefined) return null;
  const sys = record.systolic.toFixed(1);
  return record.diastolic === undefined ? `${sys}` : `${sys}/${record.diastolic.toFixed(1)}`;
}

/**
 * One-line text rendering of a day. The same text is embedded into the
 * vector store and shown to the model as a similar-day summary.
 *
 * "2026-01-05: BP 138.5/88.0 mmHg (stage 1 hypertension). Sleep 6.2 hrs (fair). Activity 7,400 steps (moderate). VO2 Max 38.1."
 */
export function renderDailySummary(record: DailyHealthRecord): string {
  const parts: string[] = [];
  const bp = formatBp(record);
  if (bp !== null && record.systolic !== undefined) {
    parts.push(`BP ${bp} mmHg (${bpCategory(record.systolic)})`);
  }
  if (record.sleepHours !== undefined) {
    const eff = record.sleepEfficiency !== undefined ? `, ${record.sleepEfficiency.toFixed(0)}% efficiency` : '';
    parts.push(`Sleep ${record.sleepHours.toFixed(1)} hrs (${sleepQuality(record.sleepHours)}${eff})`);
  }
  if (record.steps !== undefined) {
    parts.push(`Activity ${Math.round(record.steps).toLocaleString('en-US')} steps (${activityLevel(record.steps)})`);
  }
  if (record.vo2Max !== undefined) parts.push(`VO2 Max ${record.vo2Max.toFixed(1)}`);
  if (record.heartRate !== undefined) parts.push(`Heart rate ${record.heartRate.toFixed(0)} bpm`);
  if (record.hrv !== undefined) parts.push(`HRV ${record.hrv.toFixed(0)} ms`);

  return parts.length === 0 ? `${record.date}: no metrics recorded.` : `${record.date}: ${parts.join('. ')}.`;
}
