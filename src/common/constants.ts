/**
 * Constants for the BP Health Coach
 *
 * Environment-backed settings for the stores and the LLM backends.
 * Behavioural knobs for the coach itself live in console/coach/config.ts.
 */

// =============================================================================
// ENVIRONMENT CONFIGURATION
// =============================================================================

/**
 * SQLite health database (daily records, profile goals, conversations, job history)
 */
export const SQLITE_CONFIG = {
  DB_PATH: process.env.HEALTH_DB_PATH || './data/health.db',
  /** Days of data averaged into the profile baselines */
  BASELINE_WINDOW_DAYS: parseInt(process.env.BASELINE_WINDOW_DAYS || '90', 10),
} as const;

/**
 * Qdrant vector database configuration
 */
export const QDRANT_CONFIG = {
  HOST: process.env.QDRANT_HOST || 'http://localhost:6333',
  API_KEY: process.env.QDRANT_API_KEY || '',
  COLLECTION: process.env.HEALTH_COLLECTION_NAME || 'health_days',
  VECTOR_SIZE: parseInt(process.env.VECTOR_SIZE || process.env.EMBEDDING_DIMENSIONS || '1024', 10),
  DISTANCE_METRIC: 'Cosine' as const,
} as const;

/**
 * Voyage AI embedding configuration
 */
export const VOYAGE_CONFIG = {
  API_KEY: process.env.VOYAGE_API_KEY || '',
  MODEL: process.env.EMBEDDING_MODEL || 'voyage-3.5-lite',
  DIMENSIONS: parseInt(process.env.VECTOR_SIZE || process.env.EMBEDDING_DIMENSIONS || '1024', 10),
  INPUT_TYPE_DOCUMENT: 'document' as const,
  INPUT_TYPE_QUERY: 'query' as const,
} as const;

/**
 * LLM backends
 *
 * reasoning  = Anthropic (multi-factor explanations, predictions)
 * validation = OpenAI (structured output, medium queries)
 * local      = Ollama through its OpenAI-compatible endpoint (private data)
 */
export const LLM_CONFIG = {
  ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY || '',
  CLAUDE_MODEL: process.env.CLAUDE_MODEL || 'claude-sonnet-4-20250514',
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '',
  OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4o',
  LOCAL_BASE_URL: process.env.LOCAL_LLM_BASE_URL || 'http://localhost:11434/v1',
  LOCAL_MODEL: process.env.LOCAL_LLM_MODEL || 'llama3.1:8b',
  MAX_OUTPUT_TOKENS: parseInt(process.env.LLM_MAX_OUTPUT_TOKENS || '1024', 10),
} as const;

/**
 * Coarse per-1K-token cost used for turn accounting (USD)
 */
export const COST_CONFIG = {
  reasoning: parseFloat(process.env.COST_REASONING_PER_1K || '0.015'),
  validation: parseFloat(process.env.COST_VALIDATION_PER_1K || '0.03'),
  local: 0,
} as const;

// =============================================================================
// HEALTH DEFAULTS
// =============================================================================

/**
 * Fallbacks when the profile has no baseline for a metric
 */
export const BASELINE_DEFAULTS = {
  systolic: 142,
  diastolic: 88,
  vo2Max: 37,
  sleepHours: 6.5,
  steps: 9000,
  sleepEfficiency: 85,
} as const;

/**
 * Goals used when the profile table has none stored
 */
export const GOAL_DEFAULTS = {
  systolic: { goal: 130, direction: 'lower' },
  sleepHours: { goal: 7, direction: 'higher' },
  steps: { goal: 10000, direction: 'higher' },
  vo2Max: { goal: 43, direction: 'higher' },
} as const;
