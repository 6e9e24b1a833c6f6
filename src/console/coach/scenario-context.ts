/**
 * Scenario inputs drawn from the user's own data: the baseline from the
 * profile and the diastolic setting from configuration (and, in
 * 'historical' mode, from the stored readings).
 */

import { BASELINE_DEFAULTS } from '../../common/constants.js';
import type { HealthStore } from '../../common/services/health-store.js';
import { logWarn } from '../../common/services/logger.js';
import type { UserProfile } from '../../common/types.js';
import { addDays } from '../../common/utils/dates.js';
import type { CoachConfig } from './config.js';
import { estimateDiastolicRatio } from './scenario-engine.js';
import type { DiastolicSetting, ScenarioBaseline } from './scenario-engine.js';

const HISTORICAL_WINDOW_DAYS = 90;

export function baselineFromProfile(profile: UserProfile | null): ScenarioBaseline {
  const b = profile?.baselines ?? {};
  return {
    systolic: b.systolic ?? BASELINE_DEFAULTS.systolic,
    diastolic: b.diastolic ?? BASELINE_DEFAULTS.diastolic,
    vo2Max: b.vo2Max ?? BASELINE_DEFAULTS.vo2Max,
    sleepHours: b.sleepHours ?? BASELINE_DEFAULTS.sleepHours,
    steps: b.steps ?? BASELINE_DEFAULTS.steps,
    sleepEfficiency: b.sleepEfficiency ?? BASELINE_DEFAULTS.sleepEfficiency,
  };
}

/**
 * 'historical' falls back to the fixed ratio when there are too few
 * paired readings or the store cannot be read.
 */
export async function resolveDiastolicSetting(
  config: Pick<CoachConfig, 'diastolicMode' | 'diastolicRatio'>,
  store: Pick<HealthStore, 'getRange'>,
  today: string
): Promise<DiastolicSetting> {
  switch (config.diastolicMode) {
    case 'coefficient':
      return { mode: 'coefficient' };
    case 'fixed':
      return { mode: 'fixed', ratio: config.diastolicRatio };
    case 'historical': {
      try {
        const records = await store.getRange(addDays(today, -HISTORICAL_WINDOW_DAYS), today);
        const ratio = estimateDiastolicRatio(records);
        if (ratio !== null) return { mode: 'historical', ratio };
      } catch (error) {
        logWarn('Historical diastolic ratio unavailable', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return { mode: 'fixed', ratio: config.diastolicRatio };
    }
  }
}
