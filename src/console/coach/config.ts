/**
 * Coach Configuration
 *
 * Default configuration values for the query pipeline and scenario engine.
 * Can be overridden via environment variables or per-instance.
 */

import { LLM_CONFIG } from '../../common/constants.js';

export type DiastolicMode = 'fixed' | 'coefficient' | 'historical';

export interface CoachConfig {
  /** Prior turns of the session included in the prompt */
  historyTurns: number;
  /** k for similar-day search (3-5) */
  similarDays: number;
  /** Similar days scoring below this are marked weak */
  similarityFloor: number;
  /** Per-call backend timeout; a timeout counts as a failure */
  backendTimeoutMs: number;
  /** MEDIUM complexity goes to the local backend instead of validation */
  costConstrained: boolean;
  scenarioTrials: number;
  scenarioSeed: number;
  /** Horizon used for feasibility when the caller gives none */
  horizonWeeks: number;
  diastolicMode: DiastolicMode;
  /** Used when diastolicMode is 'fixed' */
  diastolicRatio: number;
  /** false: SCENARIO answers are the numeric result without an LLM call */
  narrateScenarios: boolean;
  claudeModel: string;
  openaiModel: string;
  localModel: string;
  maxOutputTokens: number;
}

/**
 * Default coach configuration
 */
export const DEFAULT_COACH_CONFIG: CoachConfig = {
  historyTurns: 10,
  similarDays: 4,
  similarityFloor: 0.35,
  backendTimeoutMs: 30000,
  costConstrained: false,
  scenarioTrials: 1000,
  scenarioSeed: 42,
  horizonWeeks: 12,
  diastolicMode: 'fixed',
  diastolicRatio: 0.5,
  narrateScenarios: true,
  claudeModel: LLM_CONFIG.CLAUDE_MODEL,
  openaiModel: LLM_CONFIG.OPENAI_MODEL,
  localModel: LLM_CONFIG.LOCAL_MODEL,
  maxOutputTokens: LLM_CONFIG.MAX_OUTPUT_TOKENS,
};

function parseDiastolicMode(value: string): DiastolicMode | undefined {
  if (value === 'fixed' || value === 'coefficient' || value === 'historical') return value;
  return undefined;
}

/**
 * Load configuration from environment variables
 */
export function loadCoachConfig(overrides?: Partial<CoachConfig>): CoachConfig {
  const envConfig: Partial<CoachConfig> = {};

  if (process.env.COACH_HISTORY_TURNS) {
    envConfig.historyTurns = parseInt(process.env.COACH_HISTORY_TURNS, 10);
  }

  if (process.env.COACH_SIMILAR_DAYS) {
    envConfig.similarDays = parseInt(process.env.COACH_SIMILAR_DAYS, 10);
  }

  if (process.env.COACH_SIMILARITY_FLOOR) {
    envConfig.similarityFloor = parseFloat(process.env.COACH_SIMILARITY_FLOOR);
  }

  if (process.env.COACH_BACKEND_TIMEOUT_MS) {
    envConfig.backendTimeoutMs = parseInt(process.env.COACH_BACKEND_TIMEOUT_MS, 10);
  }

  if (process.env.COACH_COST_CONSTRAINED) {
    envConfig.costConstrained = process.env.COACH_COST_CONSTRAINED === 'true';
  }

  if (process.env.COACH_SCENARIO_TRIALS) {
    envConfig.scenarioTrials = parseInt(process.env.COACH_SCENARIO_TRIALS, 10);
  }

  if (process.env.COACH_SCENARIO_SEED) {
    envConfig.scenarioSeed = parseInt(process.env.COACH_SCENARIO_SEED, 10);
  }

  if (process.env.COACH_HORIZON_WEEKS) {
    envConfig.horizonWeeks = parseInt(process.env.COACH_HORIZON_WEEKS, 10);
  }

  if (process.env.COACH_DIASTOLIC_MODE) {
    const mode = parseDiastolicMode(process.env.COACH_DIASTOLIC_MODE);
    if (mode) envConfig.diastolicMode = mode;
  }

  if (process.env.COACH_DIASTOLIC_RATIO) {
    envConfig.diastolicRatio = parseFloat(process.env.COACH_DIASTOLIC_RATIO);
  }

  if (process.env.COACH_NARRATE_SCENARIOS) {
    envConfig.narrateScenarios = process.env.COACH_NARRATE_SCENARIOS === 'true';
  }

  // Merge: defaults < env < overrides
  return {
    ...DEFAULT_COACH_CONFIG,
    ...envConfig,
    ...overrides,
  };
}

// Singleton config instance
let configInstance: CoachConfig | null = null;

/**
 * Get the current coach configuration (singleton)
 */
export function getCoachConfig(): CoachConfig {
  if (!configInstance) {
    configInstance = loadCoachConfig();
  }
  return configInstance;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: CoachConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.historyTurns) || config.historyTurns < 0 || config.historyTurns > 50) {
    errors.push('historyTurns must be an integer between 0 and 50');
  }

  if (!Number.isInteger(config.similarDays) || config.similarDays < 3 || config.similarDays > 5) {
    errors.push('similarDays must be an integer between 3 and 5');
  }

  if (!Number.isFinite(config.similarityFloor) || config.similarityFloor < 0 || config.similarityFloor > 1) {
    errors.push('similarityFloor must be between 0 and 1');
  }

  if (!(config.backendTimeoutMs >= 1000 && config.backendTimeoutMs <= 300000)) {
    errors.push('backendTimeoutMs must be between 1,000 and 300,000');
  }

  if (!Number.isInteger(config.scenarioTrials) || config.scenarioTrials < 100 || config.scenarioTrials > 100000) {
    errors.push('scenarioTrials must be an integer between 100 and 100,000');
  }

  if (!Number.isInteger(config.scenarioSeed)) {
    errors.push('scenarioSeed must be an integer');
  }

  if (!Number.isInteger(config.horizonWeeks) || config.horizonWeeks < 1 || config.horizonWeeks > 104) {
    errors.push('horizonWeeks must be an integer between 1 and 104');
  }

  if (!Number.isFinite(config.diastolicRatio) || config.diastolicRatio < 0 || config.diastolicRatio > 1.5) {
    errors.push('diastolicRatio must be between 0 and 1.5');
  }

  return errors;
}
