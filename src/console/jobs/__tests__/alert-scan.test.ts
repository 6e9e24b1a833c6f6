/**
 * Jest Unit Tests for the Alert Scan
 */

import type { HealthStore } from '../../../common/services/health-store.js';
import type { DailyHealthRecord, HealthAlert, UserProfile } from '../../../common/types.js';
import { addDays } from '../../../common/utils/dates.js';
import { detectAlerts, scanAlerts } from '../alert-scan.js';

const CHECK_DATE = '2026-01-07';

/** Consecutive days ending on the check date, one record per value */
function days(build: (i: number) => Omit<DailyHealthRecord, 'date'>, count: number): DailyHealthRecord[] {
  return Array.from({ length: count }, (_, i) => ({ date: addDays(CHECK_DATE, i - count + 1), ...build(i) }));
}

describe('AlertScan', () => {
  // ==========================================================================
  // STREAKS
  // ==========================================================================

  describe('Poor sleep streak', () => {
    test('three short nights in a row raise a warning', () => {
      const alerts = detectAlerts(days(i => ({ sleepHours: [5.5, 5.0, 5.8][i] }), 3), CHECK_DATE, []);
      expect(alerts).toEqual([
        {
          date: CHECK_DATE,
          type: 'poor_sleep_streak',
          priority: 'warning',
          title: 'Poor sleep streak',
          message: '3 consecutive nights under 6 hours of sleep. Prioritize 7+ hours tonight.',
          metricValue: 3,
        },
      ]);
    });

    test('a missing day breaks the streak', () => {
      const records: DailyHealthRecord[] = [
        { date: '2026-01-04', sleepHours: 5 },
        { date: '2026-01-05', sleepHours: 5 },
        { date: '2026-01-07', sleepHours: 5 },
      ];
      expect(detectAlerts(records, CHECK_DATE, [])).toEqual([]);
    });
  });

  describe('Celebrations', () => {
    test('a week under goal with 10k steps celebrates both streaks', () => {
      const alerts = detectAlerts(days(() => ({ systolic: 125, steps: 10000 }), 7), CHECK_DATE, []);
      expect(alerts.map(a => [a.type, a.title, a.metricValue])).toEqual([
        ['bp_goal_streak', '7-day BP streak', 7],
        ['activity_streak', 'Activity streak', 7],
      ]);
    });

    test('the BP goal comes from the profile', () => {
      const goals = [{ metric: 'systolic' as const, goal: 120, direction: 'lower' as const }];
      expect(detectAlerts(days(() => ({ systolic: 125 }), 7), CHECK_DATE, goals)).toEqual([]);
    });
  });

  // ==========================================================================
  // SPIKES AND TRENDS
  // ==========================================================================

  describe('BP spike', () => {
    test('a reading far above the recent average is flagged', () => {
      const alerts = detectAlerts(days(i => ({ systolic: [130, 132, 131, 133, 130, 132, 150][i] }), 7), CHECK_DATE, []);
      expect(alerts).toHaveLength(1);
      expect(alerts[0]).toMatchObject({ type: 'bp_spike', metricValue: 150 });
      expect(alerts[0].message).toBe(
        "Today's systolic (150 mmHg) is well above your recent average (131 mmHg). Check sleep, stress and activity."
      );
    });

    test('a jump that stays under 140 is not a spike', () => {
      const alerts = detectAlerts(days(i => ({ systolic: [120, 121, 122, 120, 121, 122, 139][i] }), 7), CHECK_DATE, []);
      expect(alerts).toEqual([]);
    });
  });

  describe('Trend', () => {
    test('a rising second week warns', () => {
      const alerts = detectAlerts(days(i => ({ systolic: i < 7 ? 130 : 135 }), 14), CHECK_DATE, []);
      expect(alerts).toEqual([
        {
          date: CHECK_DATE,
          type: 'trend_warning',
          priority: 'warning',
          title: 'BP trending up',
          message: 'Average systolic rose 5.0 mmHg this week (from 130 to 135 mmHg).',
          metricValue: 5,
        },
      ]);
    });

    test('a falling second week celebrates', () => {
      const alerts = detectAlerts(days(i => ({ systolic: i < 7 ? 140 : 134 }), 14), CHECK_DATE, []);
      expect(alerts.map(a => [a.type, a.priority, a.metricValue])).toEqual([['trend_positive', 'celebration', -6]]);
    });

    test('one week of data is not a trend', () => {
      expect(detectAlerts(days(() => ({ systolic: 135 }), 7), CHECK_DATE, [])).toEqual([]);
    });
  });

  // ==========================================================================
  // STORE INTEGRATION
  // ==========================================================================

  describe('scanAlerts', () => {
    test('appends every alert that fires', async () => {
      const appended: HealthAlert[] = [];
      const profile: UserProfile = { name: 'User', baselines: {}, goals: [], baselineDays: 0 };
      const getRange = jest.fn(async () => days(() => ({ sleepHours: 5 }), 4));
      const store: Pick<HealthStore, 'getRange' | 'getProfile' | 'appendAlert'> = {
        getRange,
        getProfile: async () => profile,
        appendAlert: async alert => {
          appended.push(alert);
        },
      };

      const alerts = await scanAlerts(store, CHECK_DATE);

      expect(getRange).toHaveBeenCalledWith('2025-12-11', CHECK_DATE);
      expect(alerts.map(a => a.metricValue)).toEqual([4]);
      expect(appended).toEqual(alerts);
    });
  });
});
