/**
 * Jest Unit Tests for Coach Configuration
 */

import { DEFAULT_COACH_CONFIG, loadCoachConfig, validateConfig } from '../config.js';

describe('CoachConfig', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  test('defaults are valid', () => {
    expect(validateConfig(DEFAULT_COACH_CONFIG)).toEqual([]);
  });

  test('environment overrides defaults and explicit overrides win', () => {
    process.env.COACH_SIMILAR_DAYS = '5';
    process.env.COACH_COST_CONSTRAINED = 'true';
    process.env.COACH_DIASTOLIC_MODE = 'historical';
    process.env.COACH_SCENARIO_TRIALS = '500';

    const config = loadCoachConfig({ scenarioTrials: 2000 });

    expect(config.similarDays).toBe(5);
    expect(config.costConstrained).toBe(true);
    expect(config.diastolicMode).toBe('historical');
    expect(config.scenarioTrials).toBe(2000);
    expect(config.historyTurns).toBe(10);
  });

  test('an unknown diastolic mode keeps the default', () => {
    process.env.COACH_DIASTOLIC_MODE = 'median';
    expect(loadCoachConfig().diastolicMode).toBe('fixed');
  });

  test('out-of-range values are reported', () => {
    expect(
      validateConfig({ ...DEFAULT_COACH_CONFIG, similarDays: 9, backendTimeoutMs: 10, diastolicRatio: 2 })
    ).toEqual([
      'similarDays must be an integer between 3 and 5',
      'backendTimeoutMs must be between 1,000 and 300,000',
      'diastolicRatio must be between 0 and 1.5',
    ]);
  });

  test('a non-numeric environment value fails validation', () => {
    process.env.COACH_HISTORY_TURNS = 'ten';
    expect(validateConfig(loadCoachConfig())).toEqual(['historyTurns must be an integer between 0 and 50']);
  });

  test('NaN ratios are reported instead of slipping past the range checks', () => {
    expect(
      validateConfig({ ...DEFAULT_COACH_CONFIG, similarityFloor: Number.NaN, diastolicRatio: Number.NaN })
    ).toEqual(['similarityFloor must be between 0 and 1', 'diastolicRatio must be between 0 and 1.5']);
  });

  test('a non-numeric similarity floor from the environment fails validation', () => {
    process.env.COACH_SIMILARITY_FLOOR = 'abc';
    expect(validateConfig(loadCoachConfig())).toEqual(['similarityFloor must be between 0 and 1']);
  });

  test.each([1.5, Number.NaN])('a scenario seed of %p is reported', (scenarioSeed) => {
    expect(validateConfig({ ...DEFAULT_COACH_CONFIG, scenarioSeed })).toEqual(['scenarioSeed must be an integer']);
  });

  test('a non-numeric seed from the environment fails validation', () => {
    process.env.COACH_SCENARIO_SEED = 'lucky';
    expect(validateConfig(loadCoachConfig())).toEqual(['scenarioSeed must be an integer']);
  });
});
