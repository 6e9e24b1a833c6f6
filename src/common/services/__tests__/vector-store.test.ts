/**
 * Jest Unit Tests for the Vector Store
 *
 * Only paths that never reach Qdrant; the client is constructed but not called.
 */

import type { Embedder, EmbeddingInputType } from '../embedding-service.js';
import { dateToPointId, DisabledVectorStore, QdrantVectorStore } from '../vector-store.js';

class RecordingEmbedder implements Embedder {
  readonly calls: Array<{ text: string; inputType: EmbeddingInputType | undefined }> = [];

  async embed(text: string, inputType?: EmbeddingInputType): Promise<number[]> {
    this.calls.push({ text, inputType });
    return [0.1, 0.2, 0.3, 0.4];
  }
}

describe('VectorStore', () => {
  test('point ids are the date as an integer', () => {
    expect(dateToPointId('2026-01-05')).toBe(20260105);
  });

  describe('QdrantVectorStore', () => {
    test('questions are embedded with the query input type', async () => {
      const embedder = new RecordingEmbedder();
      const store = new QdrantVectorStore(embedder, 'test_days', 4);

      await expect(store.embed('Why was my BP high?')).resolves.toEqual([0.1, 0.2, 0.3, 0.4]);
      expect(embedder.calls).toEqual([{ text: 'Why was my BP high?', inputType: 'query' }]);
    });

    test('a vector of the wrong size is rejected before any write', async () => {
      const store = new QdrantVectorStore(new RecordingEmbedder(), 'test_days', 4);
      await expect(store.upsert('2026-01-05', 'summary', [0.1, 0.2])).rejects.toThrow(
        'Vector for 2026-01-05 has 2 dimensions, collection expects 4'
      );
    });
  });

  test('the disabled store fails every call with its reason', async () => {
    const store = new DisabledVectorStore('no key');
    await expect(store.querySimilar()).rejects.toThrow('Vector store disabled: no key');
    await expect(store.embed()).rejects.toThrow('Vector store disabled: no key');
  });
});
