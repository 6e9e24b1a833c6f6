/**
 * LLM backend contract
 *
 * All three backends take the same prompt shape; the conversation
 * manager never sees an SDK type.
 */

import type { BackendId } from '../../../common/types.js';

export interface PromptMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionPrompt {
  system: string;
  messages: PromptMessage[];
}

export interface CompletionOptions {
  maxTokens: number;
  temperature?: number;
  /** Ask for a JSON object where the backend supports it */
  jsonOutput?: boolean;
  /** Applied by the SDK as well as by the invoker's own timer */
  timeoutMs?: number;
}

export interface CompletionResult {
  text: string;
  model: string;
  /** Reported by the backend; the caller estimates when absent */
  inputTokens?: number;
  outputTokens?: number;
}

export interface LLMBackend {
  readonly id: BackendId;
  /** Remote backends run outside the user's machine */
  readonly remote: boolean;
  complete(prompt: CompletionPrompt, options: CompletionOptions): Promise<CompletionResult>;
  isAvailable(): Promise<boolean>;
}

export type BackendRegistry = Record<BackendId, LLMBackend>;
