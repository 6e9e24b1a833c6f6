/**
 * Jest Unit Tests for the Scenario Parser
 *
 * Default baseline: VO2 max 37, sleep 6.5 h, 9000 steps, 85% efficiency.
 */

import { hasDeltas, parseScenarioDeltas } from '../scenario-parser.js';
import type { ScenarioDeltas } from '../scenario-engine.js';

describe('ScenarioParser', () => {
  // ==========================================================================
  // SINGLE FACTORS
  // ==========================================================================

  test.each<[string, ScenarioDeltas]>([
    ['What if I increased my VO2 max by 5?', { vo2Max: 5 }],
    ['What if I reduce my VO2 max by 3?', { vo2Max: -3 }],
    ['What if my VO2 max went to 42?', { vo2Max: 5 }],
    ['What if my VO2 max improved by 5?', { vo2Max: 5 }],
    ['What if my VO2 max dropped by 2?', { vo2Max: -2 }],
    ['What if my VO2 max increased to 40?', { vo2Max: 3 }],
    ['What if I slept 8 hours?', { sleepHours: 1.5 }],
    ['What if I sleep 8 hour a night?', { sleepHours: 1.5 }],
    ['What if I got 7.5 hr of sleep?', { sleepHours: 1 }],
    ['What if I got an extra hour of sleep?', { sleepHours: 1 }],
    ['What if I walked 12k steps a day?', { steps: 3000 }],
    ['What if I took 2,000 more steps?', { steps: 2000 }],
    ['What if I took 1500 fewer steps?', { steps: -1500 }],
    ['What if my sleep efficiency went up to 90%?', { sleepEfficiency: 5 }],
  ])('"%s"', (text, expected) => {
    expect(parseScenarioDeltas(text)).toEqual(expected);
  });

  // ==========================================================================
  // BASELINE AND COMBINATIONS
  // ==========================================================================

  test('absolute targets are measured from the given baseline', () => {
    expect(parseScenarioDeltas('What if I slept 8 hours?', { sleepHours: 7.25 })).toEqual({ sleepHours: 0.75 });
  });

  test('several factors in one question', () => {
    expect(parseScenarioDeltas('What if I increased my VO2 max by 5 and slept 8 hours?')).toEqual({
      vo2Max: 5,
      sleepHours: 1.5,
    });
  });

  test('a question without deltas yields nothing', () => {
    const deltas = parseScenarioDeltas('What if I felt better?');
    expect(deltas).toEqual({});
    expect(hasDeltas(deltas)).toBe(false);
  });

  test('hasDeltas ignores zero changes', () => {
    expect(hasDeltas({ vo2Max: 0 })).toBe(false);
    expect(hasDeltas({ vo2Max: 0, steps: 500 })).toBe(true);
  });
});
