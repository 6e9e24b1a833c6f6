/**
 * Conversation Manager
 *
 * Runs one question through the pipeline:
 *
 *   CLASSIFY -> RETRIEVE_CONTEXT -> ROUTE -> BUILD_PROMPT -> INVOKE_BACKEND
 *            -> POSTPROCESS -> PERSIST_TURN -> DELIVERED | FAILED
 *
 * Every question ends in exactly one persisted turn, successful or not,
 * and the caller always gets a response object rather than an error.
 * Turns of one session are processed strictly in order.
 */

import { errorClassOf, describeError } from '../../common/errors.js';
import type { HealthStore } from '../../common/services/health-store.js';
import { generateQueryId, logDebug, logError, logInfo } from '../../common/services/logger.js';
import { estimateCost, estimateTokens } from '../../common/services/token-estimator.js';
import type {
  BackendAttempt,
  BackendId,
  ContextBundle,
  Intent,
  IntentClassification,
  Query,
  TurnStatus,
} from '../../common/types.js';
import { localIsoDate } from '../../common/utils/dates.js';
import type { BackendInvoker } from './backends/backend-invoker.js';
import { checkClaims, penalizedConfidence } from './claim-checker.js';
import type { Citation } from './claim-checker.js';
import type { CoachConfig } from './config.js';
import type { ContextRetriever } from './context-retriever.js';
import { classify } from './intent-classifier.js';
import { SessionQueue } from './memory/session-queue.js';
import type { CoachMetrics } from './metrics.js';
import { fallbackChain, selectBackend } from './model-router.js';
import { buildContextDocument, buildPrompt } from './prompt-builder.js';
import { baselineFromProfile, resolveDiastolicSetting } from './scenario-context.js';
import { formatScenarioResult, predict } from './scenario-engine.js';
import type { ScenarioResult } from './scenario-engine.js';
import { hasDeltas, parseScenarioDeltas } from './scenario-parser.js';

// =============================================================================
// TYPES
// =============================================================================

export type PipelineState =
  | 'CLASSIFY'
  | 'RETRIEVE_CONTEXT'
  | 'ROUTE'
  | 'BUILD_PROMPT'
  | 'INVOKE_BACKEND'
  | 'POSTPROCESS'
  | 'PERSIST_TURN'
  | 'DELIVERED'
  | 'FAILED';

export interface CoachResponse {
  text: string;
  intent: Intent;
  confidence: number;
  citations: Citation[];
  status: TurnStatus;
  backend: BackendId | 'none';
  sessionId: string;
  unsupportedClaims: string[];
  degraded: boolean;
  scenario?: ScenarioResult;
  /** Undefined when the turn could not be persisted */
  turnIndex?: number;
}

export interface ConversationManagerDeps {
  store: HealthStore;
  retriever: ContextRetriever;
  invoker: BackendInvoker;
  config: CoachConfig;
  metrics: CoachMetrics;
  /** Local calendar date used for relative phrases */
  today?: () => string;
}

export const UNAVAILABLE_MESSAGE =
  "I'm temporarily unavailable and couldn't answer that. Please try again in a few minutes.";

export const PRIVACY_UNAVAILABLE_MESSAGE =
  "I'm temporarily unavailable for this question (privacy-protected). It involves private health " +
  'information, so only the on-device model may answer it, and that model is not responding. ' +
  'Your question was not sent to any other service.';

interface Outcome {
  status: TurnStatus;
  text: string;
  backend: BackendId | 'none';
  confidence: number;
  citations: Citation[];
  unsupportedClaims: string[];
  attempts: BackendAttempt[];
  inputTokens: number;
  outputTokens: number;
  errorClass?: string;
  privacyFailClosed: boolean;
}

// =============================================================================
// CONVERSATION MANAGER
// =============================================================================

export class ConversationManager {
  private queue = new SessionQueue();
  private today: () => string;

  constructor(private deps: ConversationManagerDeps) {
    this.today = deps.today ?? (() => localIsoDate());
  }

  handle(query: Query): Promise<CoachResponse> {
    return this.queue.run(query.sessionId, () => this.process(query));
  }

  private async process(query: Query): Promise<CoachResponse> {
    const queryId = generateQueryId();
    const startTime = Date.now();
    const today = this.today();
    const ctx = { query_id: queryId, session_id: query.sessionId };

    this.enter('CLASSIFY', ctx);
    const classification = classify(query.text, today);
    logInfo('Question classified', {
      ...ctx,
      intent: classification.intent,
      complexity: classification.complexity,
      date_scope: classification.dateScope ? `${classification.dateScope.start}..${classification.dateScope.end}` : null,
    });

    let bundle: ContextBundle | null = null;
    let scenario: ScenarioResult | undefined;
    let outcome: Outcome;

    try {
      this.enter('RETRIEVE_CONTEXT', ctx);
      bundle = await this.deps.retriever.retrieve(classification, query.text, query.sessionId, today, queryId);
      scenario = await this.runScenarioIfAsked(classification, query.text, bundle, today);

      if (scenario && !this.deps.config.narrateScenarios) {
        outcome = this.numericScenarioOutcome(classification, bundle, scenario);
      } else {
        outcome = await this.answerWithBackend(query, classification, bundle, scenario, today, queryId, ctx);
      }
    } catch (error) {
      // Anything unexpected still ends as a persisted FAILED turn
      logError('Pipeline error', { ...ctx, error_class: errorClassOf(error), error: describeError(error) });
      outcome = {
        status: 'FAILED',
        text: classification.privacy === 'SENSITIVE' ? PRIVACY_UNAVAILABLE_MESSAGE : UNAVAILABLE_MESSAGE,
        backend: 'none',
        confidence: 0,
        citations: [],
        unsupportedClaims: [],
        attempts: [],
        inputTokens: 0,
        outputTokens: 0,
        errorClass: errorClassOf(error),
        privacyFailClosed: false,
      };
    }

    const costUsd = estimateCost(outcome.backend, outcome);
    const turnIndex = await this.persist(query, classification.intent, outcome, costUsd, ctx);

    this.enter(outcome.status, ctx);
    const durationMs = Date.now() - startTime;
    this.deps.metrics.recordQuery({
      intent: classification.intent,
      status: outcome.status,
      confidence: outcome.confidence,
      durationMs,
      inputTokens: outcome.inputTokens,
      outputTokens: outcome.outputTokens,
      costUsd,
      attempts: outcome.attempts,
      privacyFailClosed: outcome.privacyFailClosed,
    });
    logInfo('Question answered', {
      ...ctx,
      status: outcome.status,
      backend: outcome.backend,
      duration_ms: durationMs,
      confidence: outcome.confidence,
      error_class: outcome.errorClass,
    });

    const response: CoachResponse = {
      text: outcome.text,
      intent: classification.intent,
      confidence: outcome.confidence,
      citations: outcome.citations,
      status: outcome.status,
      backend: outcome.backend,
      sessionId: query.sessionId,
      unsupportedClaims: outcome.unsupportedClaims,
      degraded: bundle?.degraded ?? false,
    };
    if (scenario) response.scenario = scenario;
    if (turnIndex !== null) response.turnIndex = turnIndex;
    return response;
  }

  // ---------------------------------------------------------------------------
  // Pipeline steps
  // ---------------------------------------------------------------------------

  private async runScenarioIfAsked(
    classification: IntentClassification,
    text: string,
    bundle: ContextBundle,
    today: string
  ): Promise<ScenarioResult | undefined> {
    if (classification.intent !== 'SCENARIO') return undefined;
    const baseline = baselineFromProfile(bundle.profile);
    const deltas = parseScenarioDeltas(text, baseline);
    if (!hasDeltas(deltas)) return undefined;

    const { config } = this.deps;
    const result = predict(
      { baseline, deltas },
      {
        trials: config.scenarioTrials,
        seed: config.scenarioSeed,
        horizonWeeks: config.horizonWeeks,
        diastolic: await resolveDiastolicSetting(config, this.deps.store, today),
      }
    );
    this.deps.metrics.recordScenarioRun();
    return result;
  }

  private numericScenarioOutcome(
    classification: IntentClassification,
    bundle: ContextBundle,
    scenario: ScenarioResult
  ): Outcome {
    return {
      status: 'DELIVERED',
      text: formatScenarioResult(scenario),
      backend: 'none',
      confidence: penalizedConfidence(classification.confidence, bundle.degraded, 0),
      citations: [],
      unsupportedClaims: [],
      attempts: [],
      inputTokens: 0,
      outputTokens: 0,
      privacyFailClosed: false,
    };
  }

  private async answerWithBackend(
    query: Query,
    classification: IntentClassification,
    bundle: ContextBundle,
    scenario: ScenarioResult | undefined,
    today: string,
    queryId: string,
    ctx: Record<string, string>
  ): Promise<Outcome> {
    const { config } = this.deps;

    this.enter('ROUTE', ctx);
    const selected = selectBackend(classification, { costConstrained: config.costConstrained });
    const chain = fallbackChain(selected, classification.privacy);
    logDebug('Backend selected', { ...ctx, backend: selected, chain: chain.join('>') });

    this.enter('BUILD_PROMPT', ctx);
    const prompt = buildPrompt(query.text, classification, bundle, scenario);
    const contextDocument = buildContextDocument(bundle, scenario);

    this.enter('INVOKE_BACKEND', ctx);
    const invocation = await this.deps.invoker.invoke(
      chain,
      prompt,
      { maxTokens: config.maxOutputTokens, jsonOutput: classification.requiresStructuredOutput },
      { privacy: classification.privacy, queryId }
    );

    if (!invocation.ok) {
      const sensitive = classification.privacy === 'SENSITIVE';
      return {
        status: 'FAILED',
        text: sensitive ? PRIVACY_UNAVAILABLE_MESSAGE : UNAVAILABLE_MESSAGE,
        backend: invocation.attempts[invocation.attempts.length - 1]?.backend ?? selected,
        confidence: 0,
        citations: [],
        unsupportedClaims: [],
        attempts: invocation.attempts,
        inputTokens: 0,
        outputTokens: 0,
        errorClass: invocation.errorClass,
        privacyFailClosed: sensitive,
      };
    }

    this.enter('POSTPROCESS', ctx);
    const { result } = invocation;
    const check = checkClaims(result.text, bundle, contextDocument, classification.confidence, today);
    if (check.unsupportedClaims.length > 0) {
      logInfo('Unsupported claims in response', {
        ...ctx,
        backend: invocation.backend,
        claims: check.unsupportedClaims.join('; '),
      });
    }

    const promptText = [prompt.system, ...prompt.messages.map(m => m.content)].join('\n');
    return {
      status: 'DELIVERED',
      text: result.text,
      backend: invocation.backend,
      confidence: check.confidence,
      citations: check.citations,
      unsupportedClaims: check.unsupportedClaims,
      attempts: invocation.attempts,
      inputTokens: result.inputTokens ?? estimateTokens(promptText),
      outputTokens: result.outputTokens ?? estimateTokens(result.text),
      privacyFailClosed: false,
    };
  }

  private async persist(
    query: Query,
    intent: Intent,
    outcome: Outcome,
    costUsd: number,
    ctx: Record<string, string>
  ): Promise<number | null> {
    this.enter('PERSIST_TURN', ctx);
    try {
      const turn = await this.deps.store.appendTurn({
        sessionId: query.sessionId,
        createdAt: query.submittedAt.toISOString(),
        queryText: query.text,
        intent,
        backend: outcome.backend,
        status: outcome.status,
        responseText: outcome.text,
        confidence: outcome.confidence,
        inputTokens: outcome.inputTokens,
        outputTokens: outcome.outputTokens,
        costUsd,
        attempts: outcome.attempts,
        errorClass: outcome.errorClass,
      });
      return turn.turnIndex;
    } catch (error) {
      logError('Turn not persisted', { ...ctx, error_class: errorClassOf(error), error: describeError(error) });
      return null;
    }
  }

  private enter(state: PipelineState, ctx: Record<string, string>): void {
    logDebug('Pipeline state', { ...ctx, state });
  }
}
