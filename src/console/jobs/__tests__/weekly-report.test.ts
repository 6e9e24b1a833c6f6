/**
 * Jest Unit Tests for the Weekly Report
 */

import { SqliteHealthStore } from '../../../common/services/health-store.js';
import type { DailyHealthRecord } from '../../../common/types.js';
import { calculateWeekStats, generateWeeklyReport, weekTrend } from '../weekly-report.js';

const WEEK: DailyHealthRecord[] = [
  { date: '2026-01-01', systolic: 140, sleepHours: 6.0, steps: 8000 },
  { date: '2026-01-02', systolic: 138, sleepHours: 6.5, steps: 9000 },
  { date: '2026-01-03', systolic: 136, sleepHours: 7.5, steps: 11000 },
  { date: '2026-01-04', systolic: 134, sleepHours: 6.8, steps: 7000 },
  { date: '2026-01-05', systolic: 132, sleepHours: 8.0, steps: 12000 },
  { date: '2026-01-06', systolic: 131, sleepHours: 7.2, steps: 10500 },
  { date: '2026-01-07', systolic: 130, sleepHours: 7.9, steps: 10000 },
];

function sys(...readings: number[]): DailyHealthRecord[] {
  return readings.map((systolic, i) => ({ date: `2026-01-0${i + 1}`, systolic }));
}

describe('WeeklyReport', () => {
  // ==========================================================================
  // STATISTICS
  // ==========================================================================

  describe('calculateWeekStats', () => {
    test('summarises BP, sleep and activity', () => {
      const stats = calculateWeekStats(WEEK);
      expect(stats).toMatchObject({
        days: 7,
        bpMin: 130,
        bpMax: 140,
        bpDays: 7,
        diastolicAvg: null,
        nightsUnder7: 3,
        stepsTotal: 67500,
        daysOver10k: 4,
        vo2Latest: null,
      });
      expect(stats.bpAvg).toBeCloseTo(134.43, 2);
    });

    test('an empty week has no averages', () => {
      expect(calculateWeekStats([])).toMatchObject({ days: 0, bpAvg: null, bpStd: null, sleepAvg: null, stepsTotal: 0 });
    });

    test('a single reading has zero variability', () => {
      expect(calculateWeekStats(sys(130)).bpStd).toBe(0);
    });
  });

  describe('weekTrend', () => {
    test.each<[number[], string | null]>([
      [[140, 138, 136, 134, 132, 131, 130], 'improving'],
      [[128, 130, 134, 136], 'worsening'],
      [[135, 136, 135], 'stable'],
      [[140, 130], null],
    ])('%p -> %p', (readings, trend) => {
      expect(weekTrend(sys(...readings))).toBe(trend);
    });
  });

  // ==========================================================================
  // REPORT
  // ==========================================================================

  describe('generateWeeklyReport', () => {
    let store: SqliteHealthStore;

    beforeEach(() => {
      store = new SqliteHealthStore({ path: ':memory:' });
    });

    afterEach(() => {
      store.close();
    });

    test('compares the week with the week before', async () => {
      store.upsertRecords([
        { date: '2025-12-30', systolic: 139 },
        { date: '2025-12-31', systolic: 141 },
        ...WEEK,
      ]);
      const report = await generateWeeklyReport(store, '2026-01-07');

      expect(report.weekStart).toBe('2026-01-01');
      expect(report.previous.bpAvg).toBe(140);
      expect(report.bestDay).toEqual({ date: '2026-01-07', systolic: 130, sleepHours: 7.9, steps: 10000 });
      expect(report.worstDay).toEqual({ date: '2026-01-01', systolic: 140, sleepHours: 6, steps: 8000 });
      expect(report.trend).toBe('improving');
      expect(report.observations).toEqual(['Best day had +1.9 hrs more sleep than the hardest day']);
      expect(report.actions.map(a => a.action)).toEqual([
        'Prioritize sleep',
        'Focus on BP reduction',
        'Replicate your best day',
      ]);
      expect(report.actions[1].reason).toBe('Average systolic is 4 mmHg above your 130 mmHg goal');
      expect(report.projectedSystolic).toBe(132);

      const lines = report.reportText.split('\n');
      expect(lines[0]).toBe('WEEKLY HEALTH REPORT: January 01 - January 07, 2026');
      expect(lines).toContain('vs Previous Week: -5.6 mmHg ↓');
      expect(lines).toContain('Days over 10,000: 4/7');
      expect(lines).toContain('- Expected BP: 132 mmHg (±5)');
    });

    test('a week without data says so', async () => {
      const report = await generateWeeklyReport(store, '2026-01-07');
      expect(report.projectedSystolic).toBeNull();
      expect(report.reportText.split('\n').slice(1)).toEqual([
        '',
        'No health data available for this week.',
        'Please make sure your health data is synced.',
      ]);
    });
  });
});
