/**
 * Shared types for the BP Health Coach
 *
 * Dates are ISO calendar strings (YYYY-MM-DD) throughout.
 */

// =============================================================================
// HEALTH DATA
// =============================================================================

/**
 * Metrics a daily record may carry. Every metric is optional: exports are sparse.
 */
export type MetricName =
  | 'systolic'
  | 'diastolic'
  | 'heartRate'
  | 'steps'
  | 'sleepHours'
  | 'sleepEfficiency'
  | 'vo2Max'
  | 'hrv'
  | 'respiratoryRate'
  | 'activeCalories'
  | 'exerciseMinutes';

export const METRIC_NAMES: readonly MetricName[] = [
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
];

export type DailyHealthRecord = {
  date: string;
} & Partial<Record<MetricName, number>>;

export type GoalDirection = 'lower' | 'higher';

export interface MetricGoal {
  metric: MetricName;
  goal: number;
  direction: GoalDirection;
}

/**
 * Single-user profile. Baselines are averages over the most recent
 * window of stored data.
 */
export interface UserProfile {
  name: string;
  baselines: Partial<Record<MetricName, number>>;
  goals: MetricGoal[];
  /** Number of days that contributed to the baselines */
  baselineDays: number;
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

export type Intent =
  | 'DATA_LOOKUP'
  | 'EXPLANATION'
  | 'PREDICTION'
  | 'SCENARIO'
  | 'RECOMMENDATION'
  | 'TREND'
  | 'COMPARISON'
  | 'GENERAL';

export type QueryComplexity = 'LOW' | 'MEDIUM' | 'HIGH';

export type PrivacySensitivity = 'NORMAL' | 'SENSITIVE';

export interface DateScope {
  kind: 'single' | 'range';
  start: string;
  end: string;
  /** Text that produced the scope, or the default that was applied */
  phrase: string;
  defaulted: boolean;
}

export interface IntentClassification {
  intent: Intent;
  confidence: number;
  dateScope: DateScope | null;
  complexity: QueryComplexity;
  privacy: PrivacySensitivity;
  requiresStructuredOutput: boolean;
  /** Metrics named in the question */
  metrics: MetricName[];
}

// =============================================================================
// CONVERSATION
// =============================================================================

export type BackendId = 'reasoning' | 'validation' | 'local';

export type TurnStatus = 'DELIVERED' | 'FAILED';

export interface Query {
  text: string;
  sessionId: string;
  submittedAt: Date;
}

export interface BackendAttempt {
  backend: BackendId;
  ok: boolean;
  durationMs: number;
  errorClass?: string;
  errorMessage?: string;
}

export interface ConversationTurn {
  sessionId: string;
  turnIndex: number;
  createdAt: string;
  queryText: string;
  intent: Intent;
  /** 'none' when the answer was produced without an LLM */
  backend: BackendId | 'none';
  status: TurnStatus;
  responseText: string;
  confidence: number;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  attempts: BackendAttempt[];
  errorClass?: string;
}

export type NewConversationTurn = Omit<ConversationTurn, 'turnIndex'>;

export interface SimilarDay {
  date: string;
  score: number;
  summary: string;
  /** Score under the configured floor; prompts should down-weight it */
  weak: boolean;
}

export interface ComparisonGroups {
  weekday: DailyHealthRecord[];
  weekend: DailyHealthRecord[];
}

export interface SupplementalContext {
  trendWindow?: DailyHealthRecord[];
  comparison?: ComparisonGroups;
  recentHistory?: DailyHealthRecord[];
}

export type ContextSource = 'profile' | 'structured' | 'vector' | 'history' | 'supplemental';

export interface ContextBundle {
  profile: UserProfile | null;
  dateScope: DateScope | null;
  records: DailyHealthRecord[];
  similarDays: SimilarDay[];
  history: ConversationTurn[];
  supplemental: SupplementalContext;
  degraded: boolean;
  degradedSources: ContextSource[];
}

// =============================================================================
// JOBS
// =============================================================================

export type AlertPriority = 'critical' | 'warning' | 'info' | 'celebration';

export interface HealthAlert {
  date: string;
  type: string;
  priority: AlertPriority;
  title: string;
  message: string;
  metricValue?: number;
}

export type GoalStatus = 'achieved' | 'on_track' | 'progressing' | 'needs_attention' | 'no_data';

export interface GoalSnapshot {
  date: string;
  metric: MetricName;
  goal: number;
  currentValue: number | null;
  progressPct: number;
  gap: number | null;
  status: GoalStatus;
}

export type JobName = 'daily_briefing' | 'weekly_report' | 'alert_scan' | 'goal_snapshot';

export interface JobResult {
  jobName: JobName;
  runAt: string;
  status: 'success' | 'error';
  detail: string;
}
