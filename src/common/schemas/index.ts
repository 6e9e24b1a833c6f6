/**
 * Zod validation schemas
 *
 * Facade and CLI input, plus rows read back from the health store.
 */

import { z } from 'zod';
import { isIsoDate } from '../utils/dates.js';

// =============================================================================
// SHARED ENUMS
// =============================================================================

export const IntentSchema = z.enum([
  'DATA_LOOKUP',
  'EXPLANATION',
  'PREDICTION',
  'SCENARIO',
  'RECOMMENDATION',
  'TREND',
  'COMPARISON',
  'GENERAL',
]);

export const BackendIdSchema = z.enum(['reasoning', 'validation', 'local']);

export const MetricNameSchema = z.enum([
  'systolic',
  'diastolic',
  'heartRate',
  'steps',
  'sleepHours',
  'sleepEfficiency',
  'vo2Max',
  'hrv',
  'respiratoryRate',
  'activeCalories',
  'exerciseMinutes',
]);

export const IsoDateSchema = z
  .string()
  .refine(isIsoDate, { message: 'Date must be a valid YYYY-MM-DD calendar date' });

// =============================================================================
// FACADE INPUT
// =============================================================================

/**
 * answerQuery input
 */
export const AnswerQuerySchema = z.object({
  text: z
    .string()
    .trim()
    .min(1, 'Question must not be empty')
    .max(2000, 'Question must be at most 2000 characters'),
  sessionId: z
    .string()
    .min(1)
    .max(128)
    .regex(/^[A-Za-z0-9_.:-]+$/, 'Session id may only contain letters, digits and _ . : -')
    .optional(),
});

export type AnswerQueryInput = z.infer<typeof AnswerQuerySchema>;

/**
 * runScenario input. Deltas are not range-clipped: implausible
 * values are reported as infeasible by the engine.
 */
export const ScenarioInputSchema = z.object({
  vo2Delta: z.number().finite().default(0),
  sleepDelta: z.number().finite().default(0),
  stepsDelta: z.number().finite().default(0),
  sleepEfficiencyDelta: z.number().finite().default(0),
  horizonWeeks: z.number().int().min(1).max(104).optional(),
  trials: z.number().int().min(100).max(100000).optional(),
  seed: z.number().int().optional(),
});

export type ScenarioInput = z.input<typeof ScenarioInputSchema>;

export const BriefingInputSchema = z.object({
  date: IsoDateSchema.optional(),
});

export const JobNameSchema = z.enum(['daily_briefing', 'weekly_report', 'alert_scan', 'goal_snapshot']);

// =============================================================================
// STORE ROWS
// =============================================================================

export const BackendAttemptSchema = z.object({
  backend: BackendIdSchema,
  ok: z.boolean(),
  durationMs: z.number(),
  errorClass: z.string().optional(),
  errorMessage: z.string().optional(),
});

export const BackendAttemptListSchema = z.array(BackendAttemptSchema);

export const TurnRowSchema = z.object({
  session_id: z.string(),
  turn_index: z.number().int(),
  created_at: z.string(),
  query_text: z.string(),
  intent: IntentSchema,
  backend: z.union([BackendIdSchema, z.literal('none')]),
  status: z.enum(['DELIVERED', 'FAILED']),
  response_text: z.string(),
  confidence: z.number(),
  input_tokens: z.number().int(),
  output_tokens: z.number().int(),
  cost_usd: z.number(),
  attempts: z.string(),
  error_class: z.string().nullable(),
});

export const GoalRowSchema = z.object({
  metric: MetricNameSchema,
  goal: z.number(),
  direction: z.enum(['lower', 'higher']),
});

export const JobRowSchema = z.object({
  job_name: JobNameSchema,
  run_at: z.string(),
  status: z.enum(['success', 'error']),
  detail: z.string(),
});
