/**
 * Vector Store
 *
 * Similar-day search over embedded daily summaries. The import pipeline
 * writes one point per date; the coach only queries.
 *
 * Point ids are the date as an integer (2026-01-05 -> 20260105) so an
 * upsert for the same day replaces the previous vector.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { LRUCache } from 'lru-cache';
import { QDRANT_CONFIG, VOYAGE_CONFIG } from '../constants.js';
import type { Embedder } from './embedding-service.js';

export interface SimilarityMatch {
  date: string;
  score: number;
  summary: string;
}

export interface VectorStore {
  embed(text: string): Promise<number[]>;
  /** Top-k by cosine similarity, best first */
  querySimilar(text: string, k: number): Promise<SimilarityMatch[]>;
  upsert(date: string, text: string, vector: number[]): Promise<void>;
}

export function dateToPointId(date: string): number {
  return parseInt(date.replace(/-/g, ''), 10);
}

const CACHE_MAX = parseInt(process.env.CACHE_MAX_ENTRIES || '200', 10);
const CACHE_TTL = parseInt(process.env.CACHE_TTL_MS || '1800000', 10);

export class QdrantVectorStore implements VectorStore {
  private client: QdrantClient;
  private searchCache = new LRUCache<string, SimilarityMatch[]>({ max: CACHE_MAX, ttl: CACHE_TTL });
  private collectionReady = false;

  constructor(
    private embedder: Embedder,
    private collection: string = QDRANT_CONFIG.COLLECTION,
    private vectorSize: number = QDRANT_CONFIG.VECTOR_SIZE
  ) {
    const config: { url: string; apiKey?: string; checkCompatibility?: boolean } = {
      url: QDRANT_CONFIG.HOST,
      checkCompatibility: false,
    };
    if (QDRANT_CONFIG.API_KEY) {
      config.apiKey = QDRANT_CONFIG.API_KEY;
    }
    this.client = new QdrantClient(config);
    console.error('[Vector] Qdrant client initialized:', QDRANT_CONFIG.HOST);
  }

  embed(text: string): Promise<number[]> {
    return this.embedder.embed(text, VOYAGE_CONFIG.INPUT_TYPE_QUERY);
  }

  async querySimilar(text: string, k: number): Promise<SimilarityMatch[]> {
    const key = JSON.stringify({ text: text.trim().toLowerCase(), k });
    const cached = this.searchCache.get(key);
    if (cached) return cached;

    const vector = await this.embedder.embed(text, VOYAGE_CONFIG.INPUT_TYPE_QUERY);
    const results = await this.client.search(this.collection, {
      vector,
      limit: k,
      with_payload: true,
    });

    const matches: SimilarityMatch[] = [];
    for (const r of results) {
      const payload = r.payload ?? {};
      const date = payload.date;
      const summary = payload.summary;
      if (typeof date === 'string' && typeof summary === 'string') {
        matches.push({ date, score: r.score, summary });
      }
    }

    this.searchCache.set(key, matches);
    return matches;
  }

  async upsert(date: string, text: string, vector: number[]): Promise<void> {
    if (vector.length !== this.vectorSize) {
      throw new Error(`Vector for ${date} has ${vector.length} dimensions, collection expects ${this.vectorSize}`);
    }
    await this.ensureCollection();
    await this.client.upsert(this.collection, {
      wait: true,
      points: [{ id: dateToPointId(date), vector, payload: { date, summary: text } }],
    });
    this.searchCache.clear();
  }

  private async ensureCollection(): Promise<void> {
    if (this.collectionReady) return;
    const collections = await this.client.getCollections();
    if (!collections.collections.some(c => c.name === this.collection)) {
      await this.client.createCollection(this.collection, {
        vectors: { size: this.vectorSize, distance: QDRANT_CONFIG.DISTANCE_METRIC },
      });
      console.error(`[Vector] Created collection ${this.collection} (${this.vectorSize} dims)`);
    }
    this.collectionReady = true;
  }
}

/**
 * Stand-in used when no embedding key is configured. Every call fails,
 * so similar-day context degrades instead of blocking the coach.
 */
export class DisabledVectorStore implements VectorStore {
  constructor(private reason: string) {}

  async embed(): Promise<number[]> {
    throw new Error(`Vector store disabled: ${this.reason}`);
  }

  async querySimilar(): Promise<SimilarityMatch[]> {
    throw new Error(`Vector store disabled: ${this.reason}`);
  }

  async upsert(): Promise<void> {
    throw new Error(`Vector store disabled: ${this.reason}`);
  }
}
