/**
 * Jest Unit Tests for the Goal Tracker
 */

import { SqliteHealthStore } from '../../../common/services/health-store.js';
import type { MetricGoal, UserProfile } from '../../../common/types.js';
import { formatGoalSnapshots, goalStatus, progressPct, snapshotGoals, trackGoals } from '../goal-tracker.js';

const BP_GOAL: MetricGoal = { metric: 'systolic', goal: 130, direction: 'lower' };
const STEPS_GOAL: MetricGoal = { metric: 'steps', goal: 10000, direction: 'higher' };

describe('GoalTracker', () => {
  // ==========================================================================
  // PROGRESS
  // ==========================================================================

  describe('progressPct', () => {
    test.each<[string, MetricGoal, number, number, number]>([
      ['halfway down', BP_GOAL, 142, 136, 50],
      ['goal met', BP_GOAL, 142, 128, 100],
      ['moved away', BP_GOAL, 142, 145, 0],
      ['halfway up', STEPS_GOAL, 8000, 9000, 50],
      ['baseline already past goal', { metric: 'sleepHours', goal: 7, direction: 'higher' }, 7.5, 6.8, 0],
    ])('%s', (_label, goal, baseline, current, expected) => {
      expect(progressPct(goal, baseline, current)).toBe(expected);
    });
  });

  describe('goalStatus', () => {
    test.each<[number | null, number, string]>([
      [null, 0, 'no_data'],
      [128, 100, 'achieved'],
      [136, 50, 'on_track'],
      [140, 20, 'progressing'],
      [145, 0, 'needs_attention'],
    ])('current %p at %p%% -> %s', (current, pct, status) => {
      expect(goalStatus(BP_GOAL, current, pct)).toBe(status);
    });
  });

  // ==========================================================================
  // SNAPSHOTS
  // ==========================================================================

  describe('trackGoals', () => {
    const profile: UserProfile = {
      name: 'User',
      baselines: { systolic: 142, steps: 8000 },
      goals: [BP_GOAL, STEPS_GOAL, { metric: 'vo2Max', goal: 43, direction: 'higher' }],
      baselineDays: 90,
    };
    const recent = [
      { date: '2026-01-06', systolic: 136, steps: 9000 },
      { date: '2026-01-07', systolic: 137, steps: 9500 },
    ];

    test('measures each goal on the recent average', () => {
      expect(trackGoals(profile, recent, '2026-01-07')).toEqual([
        {
          date: '2026-01-07',
          metric: 'systolic',
          goal: 130,
          currentValue: 136.5,
          progressPct: 45.8,
          gap: 6.5,
          status: 'progressing',
        },
        {
          date: '2026-01-07',
          metric: 'steps',
          goal: 10000,
          currentValue: 9250,
          progressPct: 62.5,
          gap: 750,
          status: 'on_track',
        },
        {
          date: '2026-01-07',
          metric: 'vo2Max',
          goal: 43,
          currentValue: null,
          progressPct: 0,
          gap: null,
          status: 'no_data',
        },
      ]);
    });

    test('formats one line per goal', () => {
      expect(formatGoalSnapshots(trackGoals(profile, recent, '2026-01-07')).split('\n')).toEqual([
        'systolic: 136.5 vs goal 130 (45.8%, progressing)',
        'steps: 9250 vs goal 10000 (62.5%, on track)',
        'vo2Max: no data vs goal 43 (0%, no data)',
      ]);
    });

    test('no goals formats to a single line', () => {
      expect(formatGoalSnapshots([])).toBe('No goals configured.');
    });
  });

  describe('snapshotGoals', () => {
    let store: SqliteHealthStore;

    beforeEach(() => {
      store = new SqliteHealthStore({ path: ':memory:' });
    });

    afterEach(() => {
      store.close();
    });

    test('snapshots the default goals against the last 7 days', async () => {
      store.upsertRecords([
        { date: '2025-12-31', steps: 2000 },
        { date: '2026-01-01', steps: 10000 },
        { date: '2026-01-07', steps: 12000 },
      ]);

      const snapshots = await snapshotGoals(store, '2026-01-07');
      const steps = snapshots.find(s => s.metric === 'steps');

      expect(snapshots).toHaveLength(4);
      expect(steps).toMatchObject({ currentValue: 11000, status: 'achieved', gap: 0, progressPct: 100 });
    });
  });
});
