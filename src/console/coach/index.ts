/**
 * Health Coach
 *
 * Public facade over the query pipeline, the scenario engine and the jobs.
 *
 * Components:
 * - ConversationManager: classify, retrieve, route, invoke, check, persist
 * - ContextRetriever: profile cache + health store + vector store + history
 * - BackendInvoker: fallback chain with per-backend circuit breakers
 * - Scenario engine: counterfactual BP predictions
 * - Jobs: daily briefing, weekly report, alert scan, goal snapshots
 *
 * Every collaborator is injected, so tests run against in-memory fakes.
 */

import { randomUUID } from 'crypto';
import { VOYAGE_CONFIG } from '../../common/constants.js';
import { ValidationError, describeError } from '../../common/errors.js';
import { createBackendBreakers } from '../../common/services/circuit-breaker.js';
import type { BackendBreakers } from '../../common/services/circuit-breaker.js';
import { VoyageEmbeddingService } from '../../common/services/embedding-service.js';
import { SqliteHealthStore } from '../../common/services/health-store.js';
import type { HealthStore } from '../../common/services/health-store.js';
import { logInfo, logWarn } from '../../common/services/logger.js';
import { ProfileCache } from '../../common/services/profile-cache.js';
import { DisabledVectorStore, QdrantVectorStore } from '../../common/services/vector-store.js';
import type { VectorStore } from '../../common/services/vector-store.js';
import { AnswerQuerySchema, BriefingInputSchema, ScenarioInputSchema } from '../../common/schemas/index.js';
import type { ScenarioInput } from '../../common/schemas/index.js';
import type { BackendId, ConversationTurn, JobName, TurnStatus, Intent, UserProfile } from '../../common/types.js';
import { localIsoDate } from '../../common/utils/dates.js';
import { generateDailyBriefing } from '../jobs/daily-briefing.js';
import { runJob } from '../jobs/job-runner.js';
import type { JobRunOutput } from '../jobs/job-runner.js';
import { BackendInvoker } from './backends/backend-invoker.js';
import { ClaudeBackend } from './backends/claude-backend.js';
import { createLocalBackend, createValidationBackend } from './backends/openai-backend.js';
import type { BackendRegistry } from './backends/types.js';
import type { Citation } from './claim-checker.js';
import { loadCoachConfig, validateConfig } from './config.js';
import type { CoachConfig } from './config.js';
import { ContextRetriever } from './context-retriever.js';
import { ConversationManager } from './conversation-manager.js';
import { CoachMetrics } from './metrics.js';
import type { CoachMetricsSnapshot } from './metrics.js';
import { baselineFromProfile, resolveDiastolicSetting } from './scenario-context.js';
import { predict } from './scenario-engine.js';
import type { ScenarioResult } from './scenario-engine.js';

// =============================================================================
// TYPES
// =============================================================================

export interface HealthCoachDeps {
  store: HealthStore;
  vectors: VectorStore;
  backends: BackendRegistry;
  config?: Partial<CoachConfig>;
  metrics?: CoachMetrics;
  breakers?: BackendBreakers;
  /** Local calendar date; defaults to the system clock */
  today?: () => string;
  now?: () => Date;
  profileCacheTtlMs?: number;
}

export interface AnswerResult {
  response: string;
  intent: Intent;
  confidence: number;
  sessionId: string;
  backend: BackendId | 'none';
  status: TurnStatus;
  citations: Citation[];
  unsupportedClaims: string[];
  degraded: boolean;
  scenario?: ScenarioResult;
}

export interface BriefingResult {
  date: string;
  briefingText: string;
}

export interface ScenarioSummary {
  predictedBpChange: number;
  predictedDiastolicChange: number;
  confidenceInterval: ScenarioResult['confidenceInterval'];
  standardError: number;
  timeline: ScenarioResult['timeline'];
  feasibility: ScenarioResult['feasibility'];
  baselineSystolic: number;
  predictedSystolic: number;
  predictedDiastolic: number | null;
  recommendations: string[];
  result: ScenarioResult;
}

export type ScenarioOptionsInput = Omit<ScenarioInput, 'vo2Delta' | 'sleepDelta' | 'stepsDelta'>;

// =============================================================================
// FACADE
// =============================================================================

export class HealthCoach {
  readonly config: CoachConfig;
  readonly metrics: CoachMetrics;
  readonly profiles: ProfileCache;
  private manager: ConversationManager;
  private store: HealthStore;
  private today: () => string;
  private now: () => Date;

  constructor(deps: HealthCoachDeps) {
    this.config = loadCoachConfig(deps.config);
    const configErrors = validateConfig(this.config);
    if (configErrors.length > 0) {
      throw new ValidationError('Invalid coach configuration', configErrors);
    }

    this.store = deps.store;
    this.metrics = deps.metrics ?? new CoachMetrics();
    this.today = deps.today ?? (() => localIsoDate());
    this.now = deps.now ?? (() => new Date());
    this.profiles = new ProfileCache(deps.store, deps.profileCacheTtlMs);

    const retriever = new ContextRetriever(deps.store, deps.vectors, this.profiles, {
      historyTurns: this.config.historyTurns,
      similarDays: this.config.similarDays,
      similarityFloor: this.config.similarityFloor,
    });
    const invoker = new BackendInvoker(
      deps.backends,
      deps.breakers ?? createBackendBreakers(),
      this.config.backendTimeoutMs
    );

    this.manager = new ConversationManager({
      store: deps.store,
      retriever,
      invoker,
      config: this.config,
      metrics: this.metrics,
      today: this.today,
    });
  }

  /**
   * Answer a question. A new session is started when no id is given.
   * Backend failures come back as a FAILED answer, not as an error.
   */
  async answerQuery(text: string, sessionId?: string): Promise<AnswerResult> {
    const parsed = AnswerQuerySchema.safeParse({ text, sessionId });
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid question',
        parsed.error.issues.map(i => i.message)
      );
    }

    const response = await this.manager.handle({
      text: parsed.data.text,
      sessionId: parsed.data.sessionId ?? `session_${randomUUID()}`,
      submittedAt: this.now(),
    });

    const result: AnswerResult = {
      response: response.text,
      intent: response.intent,
      confidence: response.confidence,
      sessionId: response.sessionId,
      backend: response.backend,
      status: response.status,
      citations: response.citations,
      unsupportedClaims: response.unsupportedClaims,
      degraded: response.degraded,
    };
    if (response.scenario) result.scenario = response.scenario;
    return result;
  }

  /**
   * Morning briefing for `date` (today by default). Never fails on
   * missing data; the briefing falls back to historical averages.
   */
  async generateBriefing(date?: string): Promise<BriefingResult> {
    const parsed = BriefingInputSchema.safeParse({ date });
    if (!parsed.success) {
      throw new ValidationError('Invalid briefing date', parsed.error.issues.map(i => i.message));
    }
    const target = parsed.data.date ?? this.today();
    const briefing = await generateDailyBriefing(this.store, target);
    return { date: briefing.date, briefingText: briefing.briefingText };
  }

  /**
   * Counterfactual BP prediction against the profile baselines.
   */
  async runScenario(
    vo2Delta: number,
    sleepDelta: number,
    stepsDelta: number,
    options: ScenarioOptionsInput = {}
  ): Promise<ScenarioSummary> {
    const parsed = ScenarioInputSchema.safeParse({ ...options, vo2Delta, sleepDelta, stepsDelta });
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid scenario',
        parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
      );
    }
    const input = parsed.data;

    const baseline = baselineFromProfile(await this.profileOrNull());
    const result = predict(
      {
        baseline,
        deltas: {
          vo2Max: input.vo2Delta,
          sleepHours: input.sleepDelta,
          steps: input.stepsDelta,
          sleepEfficiency: input.sleepEfficiencyDelta,
        },
        horizonWeeks: input.horizonWeeks,
      },
      {
        trials: input.trials ?? this.config.scenarioTrials,
        seed: input.seed ?? this.config.scenarioSeed,
        horizonWeeks: this.config.horizonWeeks,
        diastolic: await resolveDiastolicSetting(this.config, this.store, this.today()),
      }
    );
    this.metrics.recordScenarioRun();

    return {
      predictedBpChange: result.systolicChange,
      predictedDiastolicChange: result.diastolicChange,
      confidenceInterval: result.confidenceInterval,
      standardError: result.standardError,
      timeline: result.timeline,
      feasibility: result.feasibility,
      baselineSystolic: baseline.systolic,
      predictedSystolic: result.predictedSystolic,
      predictedDiastolic: result.predictedDiastolic,
      recommendations: result.recommendations,
      result,
    };
  }

  /**
   * Last `limit` turns of a session, oldest first
   */
  getHistory(sessionId: string, limit = 50): Promise<ConversationTurn[]> {
    return this.store.getSessionTurns(sessionId, limit);
  }

  runJob(name: JobName, date?: string): Promise<JobRunOutput> {
    return runJob(name, { store: this.store, today: this.today, now: this.now }, date);
  }

  /**
   * Call after writing goals or the profile name
   */
  invalidateProfile(): void {
    this.profiles.invalidate();
  }

  getMetrics(): CoachMetricsSnapshot {
    return this.metrics.getMetrics();
  }

  private async profileOrNull(): Promise<UserProfile | null> {
    try {
      return await this.profiles.get();
    } catch (error) {
      logWarn('Profile unavailable, using default baselines', { error: describeError(error) });
      return null;
    }
  }
}

export function createHealthCoach(deps: HealthCoachDeps): HealthCoach {
  return new HealthCoach(deps);
}

/**
 * Wire the shipped adapters from environment configuration: SQLite store,
 * Qdrant + Voyage similarity search, Anthropic / OpenAI / Ollama backends.
 */
export function createDefaultHealthCoach(config?: Partial<CoachConfig>): {
  coach: HealthCoach;
  store: SqliteHealthStore;
} {
  const resolved = loadCoachConfig(config);
  const store = new SqliteHealthStore();

  let vectors: VectorStore;
  if (VOYAGE_CONFIG.API_KEY) {
    vectors = new QdrantVectorStore(new VoyageEmbeddingService());
  } else {
    logWarn('VOYAGE_API_KEY not set - similar-day search disabled');
    vectors = new DisabledVectorStore('VOYAGE_API_KEY not set');
  }

  const coach = createHealthCoach({
    store,
    vectors,
    backends: {
      reasoning: new ClaudeBackend(resolved.claudeModel),
      validation: createValidationBackend(resolved.openaiModel),
      local: createLocalBackend(resolved.localModel),
    },
    config: resolved,
  });
  logInfo('Health coach initialized', { similar_days: resolved.similarDays, history_turns: resolved.historyTurns });
  return { coach, store };
}

export { ConversationManager } from './conversation-manager.js';
export type { CoachResponse } from './conversation-manager.js';
export { classify } from './intent-classifier.js';
export { selectBackend, fallbackChain } from './model-router.js';
export { predict, compareScenarios } from './scenario-engine.js';
export type { ScenarioResult } from './scenario-engine.js';
export type { CoachConfig } from './config.js';
