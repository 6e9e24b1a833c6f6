/**
 * Embedding Service
 *
 * Generates vector embeddings using Voyage AI. Day summaries are embedded
 * as 'document', questions and anchor days as 'query'.
 */

import { VoyageAIClient } from 'voyageai';
import { VOYAGE_CONFIG } from '../constants.js';

export type EmbeddingInputType = 'document' | 'query';

export interface Embedder {
  embed(text: string, inputType?: EmbeddingInputType): Promise<number[]>;
}

const MAX_CHARS_PER_TEXT = 30000;

/**
 * Remove control characters that the API rejects, keep newlines and tabs
 */
export function sanitizeText(text: string): string {
  const clean = text.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F]/g, '');
  if (clean.trim().length === 0) return '[empty]';
  return clean.length > MAX_CHARS_PER_TEXT ? clean.slice(0, MAX_CHARS_PER_TEXT) : clean;
}

export class VoyageEmbeddingService implements Embedder {
  private client: VoyageAIClient;

  constructor(
    apiKey: string = VOYAGE_CONFIG.API_KEY,
    private model: string = VOYAGE_CONFIG.MODEL,
    private dimensions: number = VOYAGE_CONFIG.DIMENSIONS
  ) {
    if (!apiKey) {
      throw new Error('VOYAGE_API_KEY not set - embedding service disabled');
    }
    this.client = new VoyageAIClient({ apiKey });
    console.error(`[Embedding] Voyage AI service initialized (model: ${model}, dimensions: ${dimensions})`);
  }

  async embed(text: string, inputType: EmbeddingInputType = VOYAGE_CONFIG.INPUT_TYPE_DOCUMENT): Promise<number[]> {
    const response = await this.client.embed({
      input: sanitizeText(text),
      model: this.model,
      inputType,
    });

    const embedding = response.data?.[0]?.embedding;
    if (!embedding) {
      throw new Error('Invalid embedding response');
    }
    if (embedding.length !== this.dimensions) {
      throw new Error(`Embedding has ${embedding.length} dimensions, expected ${this.dimensions}`);
    }
    return embedding;
  }
}
