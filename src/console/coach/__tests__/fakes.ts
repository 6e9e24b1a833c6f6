/**
 * In-process stand-ins for the LLM backends and the vector store
 */

import type { SimilarityMatch, VectorStore } from '../../../common/services/vector-store.js';
import type { BackendId } from '../../../common/types.js';
import type { BackendRegistry, CompletionOptions, CompletionPrompt, CompletionResult, LLMBackend } from '../backends/types.js';

export type FakeBehavior =
  | { kind: 'reply'; text: string; inputTokens?: number; outputTokens?: number }
  | { kind: 'fail'; message: string }
  | { kind: 'hang' }
  | { kind: 'unavailable' };

export class FakeBackend implements LLMBackend {
  readonly calls: Array<{ prompt: CompletionPrompt; options: CompletionOptions }> = [];

  constructor(
    readonly id: BackendId,
    readonly remote: boolean,
    public behavior: FakeBehavior
  ) {}

  async isAvailable(): Promise<boolean> {
    return this.behavior.kind !== 'unavailable';
  }

  async complete(prompt: CompletionPrompt, options: CompletionOptions): Promise<CompletionResult> {
    this.calls.push({ prompt, options });
    switch (this.behavior.kind) {
      case 'reply':
        return {
          text: this.behavior.text,
          model: `fake-${this.id}`,
          inputTokens: this.behavior.inputTokens,
          outputTokens: this.behavior.outputTokens,
        };
      case 'fail':
        throw new Error(this.behavior.message);
      case 'hang':
        return new Promise<CompletionResult>(() => undefined);
      case 'unavailable':
        throw new Error('complete() called on an unavailable backend');
    }
  }
}

export type FakeBackends = BackendRegistry & Record<BackendId, FakeBackend>;

/**
 * reasoning and validation are remote, local is on-device
 */
export function fakeBackends(behaviors: Partial<Record<BackendId, FakeBehavior>> = {}): FakeBackends {
  const fallback: FakeBehavior = { kind: 'fail', message: 'not scripted' };
  return {
    reasoning: new FakeBackend('reasoning', true, behaviors.reasoning ?? fallback),
    validation: new FakeBackend('validation', true, behaviors.validation ?? fallback),
    local: new FakeBackend('local', false, behaviors.local ?? fallback),
  };
}

export class StubVectorStore implements VectorStore {
  readonly queries: Array<{ text: string; k: number }> = [];

  constructor(private matches: SimilarityMatch[] = []) {}

  async embed(): Promise<number[]> {
    return [0.1, 0.2, 0.3];
  }

  async querySimilar(text: string, k: number): Promise<SimilarityMatch[]> {
    this.queries.push({ text, k });
    return this.matches.slice(0, k);
  }

  async upsert(): Promise<void> {
    return undefined;
  }
}
