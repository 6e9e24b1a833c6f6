/**
 * Jest Unit Tests for the Context Retriever
 *
 * Uses an in-memory store and a stub vector store.
 */

import { SqliteHealthStore } from '../../../common/services/health-store.js';
import { ProfileCache } from '../../../common/services/profile-cache.js';
import { DisabledVectorStore } from '../../../common/services/vector-store.js';
import type { VectorStore } from '../../../common/services/vector-store.js';
import type { ConversationTurn, DateScope, Intent, IntentClassification } from '../../../common/types.js';
import { ContextRetriever } from '../context-retriever.js';
import { StubVectorStore } from './fakes.js';

const TODAY = '2026-01-08';
const OPTIONS = { historyTurns: 10, similarDays: 3, similarityFloor: 0.35 };

const JAN_5: DateScope = { kind: 'single', start: '2026-01-05', end: '2026-01-05', phrase: '2026-01-05', defaulted: false };

function classification(intent: Intent, dateScope: DateScope | null): IntentClassification {
  return {
    intent,
    confidence: 0.85,
    dateScope,
    complexity: 'LOW',
    privacy: 'NORMAL',
    requiresStructuredOutput: false,
    metrics: [],
  };
}

class HistoryDownStore extends SqliteHealthStore {
  async getSessionTurns(_sessionId: string, _limit: number): Promise<ConversationTurn[]> {
    throw new Error('database is locked');
  }
}

describe('ContextRetriever', () => {
  let store: SqliteHealthStore;

  function retriever(vectors: VectorStore, source: SqliteHealthStore = store): ContextRetriever {
    return new ContextRetriever(source, vectors, new ProfileCache(source), OPTIONS);
  }

  beforeEach(() => {
    store = new SqliteHealthStore({ path: ':memory:' });
    store.upsertRecords([
      { date: '2026-01-03', systolic: 141 },
      { date: '2026-01-05', systolic: 138.5, diastolic: 88 },
    ]);
  });

  afterEach(() => {
    store.close();
  });

  // ==========================================================================
  // SIMILAR DAYS
  // ==========================================================================

  describe('Similar days', () => {
    const matches = [
      { date: '2026-01-05', score: 0.99, summary: 'anchor' },
      { date: '2026-01-01', score: 0.8, summary: 'a' },
      { date: '2025-12-20', score: 0.3, summary: 'b' },
      { date: '2025-12-15', score: 0.6, summary: 'c' },
      { date: '2025-12-10', score: 0.5, summary: 'd' },
    ];

    test('anchors on the scoped day and drops it from the matches', async () => {
      const vectors = new StubVectorStore(matches);

      const bundle = await retriever(vectors).retrieve(classification('EXPLANATION', JAN_5), 'Why?', 's1', TODAY);

      expect(vectors.queries).toEqual([
        { text: '2026-01-05: BP 138.5/88.0 mmHg (stage 1 hypertension).', k: 4 },
      ]);
      expect(bundle.similarDays).toEqual([
        { date: '2026-01-01', score: 0.8, summary: 'a', weak: false },
        { date: '2025-12-20', score: 0.3, summary: 'b', weak: true },
        { date: '2025-12-15', score: 0.6, summary: 'c', weak: false },
      ]);
      expect(bundle.degraded).toBe(false);
    });

    test('without a record for the scope the question text is embedded', async () => {
      const vectors = new StubVectorStore(matches);
      const scope: DateScope = { ...JAN_5, start: '2026-01-06', end: '2026-01-06', phrase: '2026-01-06' };

      await retriever(vectors).retrieve(classification('EXPLANATION', scope), 'Why was it high?', 's1', TODAY);

      expect(vectors.queries).toEqual([{ text: 'Why was it high?', k: 3 }]);
    });

    test('lookups skip similarity search', async () => {
      const vectors = new StubVectorStore(matches);
      const bundle = await retriever(vectors).retrieve(classification('DATA_LOOKUP', JAN_5), 'BP?', 's1', TODAY);
      expect(vectors.queries).toEqual([]);
      expect(bundle.records).toEqual([{ date: '2026-01-05', systolic: 138.5, diastolic: 88 }]);
    });
  });

  // ==========================================================================
  // SUPPLEMENTAL CONTEXT
  // ==========================================================================

  describe('Supplemental context', () => {
    test('comparison splits the last 30 days into weekdays and weekends', async () => {
      const bundle = await retriever(new StubVectorStore()).retrieve(
        classification('COMPARISON', null),
        'Compare weekdays and weekends',
        's1',
        TODAY
      );
      expect(bundle.supplemental.comparison?.weekday.map(r => r.date)).toEqual(['2026-01-05']);
      expect(bundle.supplemental.comparison?.weekend.map(r => r.date)).toEqual(['2026-01-03']);
    });

    test('prediction reads the two weeks before today', async () => {
      const bundle = await retriever(new StubVectorStore()).retrieve(
        classification('PREDICTION', null),
        'What will my BP be?',
        's1',
        TODAY
      );
      expect(bundle.supplemental.recentHistory?.map(r => r.date)).toEqual(['2026-01-03', '2026-01-05']);
      expect(bundle.records).toEqual([]);
    });
  });

  // ==========================================================================
  // DEGRADATION
  // ==========================================================================

  describe('Degraded sources', () => {
    test('a disabled vector store degrades only the similar days', async () => {
      const bundle = await retriever(new DisabledVectorStore('no key')).retrieve(
        classification('EXPLANATION', JAN_5),
        'Why?',
        's1',
        TODAY
      );
      expect(bundle.degradedSources).toEqual(['vector']);
      expect(bundle.similarDays).toEqual([]);
      expect(bundle.records).toHaveLength(1);
    });

    test('a failing history read leaves history empty', async () => {
      const down = new HistoryDownStore({ path: ':memory:' });
      try {
        const bundle = await retriever(new StubVectorStore(), down).retrieve(
          classification('GENERAL', null),
          'Hello',
          's1',
          TODAY
        );
        expect(bundle.degraded).toBe(true);
        expect(bundle.degradedSources).toEqual(['history']);
        expect(bundle.history).toEqual([]);
        expect(bundle.profile?.name).toBe('User');
      } finally {
        down.close();
      }
    });
  });
});
