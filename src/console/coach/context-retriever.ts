/**
 * Context Retriever
 *
 * Builds the bounded ContextBundle for one question from four read-only
 * sources: the profile cache, the structured store, the vector store and
 * the session history. Sources are fetched concurrently. A failing source
 * leaves its field empty and marks the bundle degraded; retrieval itself
 * never throws.
 */

import { ContextUnavailableError, describeError } from '../../common/errors.js';
import type { HealthStore } from '../../common/services/health-store.js';
import { logWarn } from '../../common/services/logger.js';
import type { ProfileCache } from '../../common/services/profile-cache.js';
import type { VectorStore } from '../../common/services/vector-store.js';
import type {
  ContextBundle,
  ContextSource,
  ConversationTurn,
  DailyHealthRecord,
  Intent,
  IntentClassification,
  SimilarDay,
  SupplementalContext,
  UserProfile,
} from '../../common/types.js';
import { addDays, isWeekend } from '../../common/utils/dates.js';
import { renderDailySummary } from '../../common/utils/health-categories.js';

export interface RetrieverOptions {
  historyTurns: number;
  similarDays: number;
  similarityFloor: number;
}

const SIMILARITY_INTENTS: ReadonlySet<Intent> = new Set<Intent>(['EXPLANATION', 'SCENARIO', 'RECOMMENDATION']);

const TREND_WINDOW_DAYS = 30;
const COMPARISON_WINDOW_DAYS = 30;
const PREDICTION_WINDOW_DAYS = 14;

type Fetched<T> = { ok: true; value: T } | { ok: false; source: ContextSource };

export class ContextRetriever {
  constructor(
    private store: HealthStore,
    private vectors: VectorStore,
    private profiles: ProfileCache,
    private options: RetrieverOptions
  ) {}

  /**
   * @param today - reference date for the intent-specific windows
   */
  async retrieve(
    classification: IntentClassification,
    queryText: string,
    sessionId: string,
    today: string,
    queryId?: string
  ): Promise<ContextBundle> {
    const scope = classification.dateScope;

    const [profile, records, history, supplemental] = await Promise.all([
      this.attempt<UserProfile>('profile', () => this.profiles.get(), queryId),
      scope
        ? this.attempt<DailyHealthRecord[]>('structured', () => this.store.getRange(scope.start, scope.end), queryId)
        : Promise.resolve<Fetched<DailyHealthRecord[]>>({ ok: true, value: [] }),
      this.attempt<ConversationTurn[]>(
        'history',
        () => this.store.getSessionTurns(sessionId, this.options.historyTurns),
        queryId
      ),
      this.attempt<SupplementalContext>(
        'supplemental',
        () => this.fetchSupplemental(classification.intent, today),
        queryId
      ),
    ]);

    const recordList = records.ok ? records.value : [];

    // Similarity anchors on the scoped day when it has a record, so it runs after the range read
    const similar = SIMILARITY_INTENTS.has(classification.intent)
      ? await this.attempt<SimilarDay[]>(
          'vector',
          () => this.fetchSimilar(queryText, scope?.kind === 'single' ? recordList[0] : undefined),
          queryId
        )
      : { ok: true as const, value: [] };

    const degradedSources: ContextSource[] = [];
    for (const result of [profile, records, history, supplemental, similar]) {
      if (!result.ok) degradedSources.push(result.source);
    }

    return {
      profile: profile.ok ? profile.value : null,
      dateScope: scope,
      records: recordList,
      similarDays: similar.ok ? similar.value : [],
      history: history.ok ? history.value : [],
      supplemental: supplemental.ok ? supplemental.value : {},
      degraded: degradedSources.length > 0,
      degradedSources,
    };
  }

  private async attempt<T>(source: ContextSource, fn: () => Promise<T>, queryId?: string): Promise<Fetched<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (error) {
      const wrapped = new ContextUnavailableError(source, error);
      logWarn('Context source unavailable', {
        query_id: queryId,
        source,
        error_class: wrapped.errorClass,
        error: describeError(error),
      });
      return { ok: false, source };
    }
  }

  private async fetchSimilar(queryText: string, anchor: DailyHealthRecord | undefined): Promise<SimilarDay[]> {
    const text = anchor ? renderDailySummary(anchor) : queryText;
    // The anchor day is its own best match; ask for one more and drop it
    const k = anchor ? this.options.similarDays + 1 : this.options.similarDays;
    const matches = await this.vectors.querySimilar(text, k);
    return matches
      .filter(m => !anchor || m.date !== anchor.date)
      .slice(0, this.options.similarDays)
      .map(m => ({ ...m, weak: m.score < this.options.similarityFloor }));
  }

  private async fetchSupplemental(intent: Intent, today: string): Promise<SupplementalContext> {
    const end = addDays(today, -1);
    switch (intent) {
      case 'TREND':
        return { trendWindow: await this.store.getRange(addDays(end, -(TREND_WINDOW_DAYS - 1)), end) };
      case 'COMPARISON': {
        const window = await this.store.getRange(addDays(end, -(COMPARISON_WINDOW_DAYS - 1)), end);
        return {
          comparison: {
            weekday: window.filter(r => !isWeekend(r.date)),
            weekend: window.filter(r => isWeekend(r.date)),
          },
        };
      }
      case 'PREDICTION':
        return { recentHistory: await this.store.getRange(addDays(end, -(PREDICTION_WINDOW_DAYS - 1)), end) };
      default:
        return {};
    }
  }
}
