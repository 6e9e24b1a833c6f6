/**
 * OpenAI-compatible backends
 *
 * validation = OpenAI chat completions (structured output, medium queries)
 * local      = Ollama's OpenAI-compatible endpoint on this machine
 *
 * Same client, different base URL. Only the local one may see
 * privacy-sensitive questions.
 */

import OpenAI from 'openai';
import { LLM_CONFIG } from '../../../common/constants.js';
import { withTimeout } from '../../../common/utils/timeout.js';
import type { BackendId } from '../../../common/types.js';
import type { CompletionOptions, CompletionPrompt, CompletionResult, LLMBackend } from './types.js';

export interface OpenAIBackendConfig {
  id: BackendId;
  remote: boolean;
  model: string;
  apiKey: string;
  baseUrl?: string;
  /** How long a successful availability check is trusted */
  availabilityTtlMs?: number;
}

const AVAILABILITY_TIMEOUT_MS = 2000;

export class OpenAICompatibleBackend implements LLMBackend {
  readonly id: BackendId;
  readonly remote: boolean;
  private openai: OpenAI | null;
  private model: string;
  private availabilityTtlMs: number;
  private lastAvailability: { at: number; ok: boolean } | null = null;

  constructor(config: OpenAIBackendConfig) {
    this.id = config.id;
    this.remote = config.remote;
    this.model = config.model;
    this.availabilityTtlMs = config.availabilityTtlMs ?? 30000;
    this.openai = config.apiKey
      ? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 })
      : null;
    if (!this.openai) {
      console.error(`[OpenAI] No API key for ${config.id} backend - disabled`);
    }
  }

  /**
   * Remote: configured means available. Local: list the models,
   * since the daemon may simply not be running.
   */
  async isAvailable(): Promise<boolean> {
    const client = this.openai;
    if (!client) return false;
    if (this.remote) return true;

    if (this.lastAvailability && Date.now() - this.lastAvailability.at < this.availabilityTtlMs) {
      return this.lastAvailability.ok;
    }
    let ok: boolean;
    try {
      await withTimeout(client.models.list(), AVAILABILITY_TIMEOUT_MS, () => new Error('availability check timed out'));
      ok = true;
    } catch (error) {
      console.error(`[OpenAI] ${this.id} availability check failed:`, error instanceof Error ? error.message : error);
      ok = false;
    }
    this.lastAvailability = { at: Date.now(), ok };
    return ok;
  }

  async complete(prompt: CompletionPrompt, options: CompletionOptions): Promise<CompletionResult> {
    if (!this.openai) {
      throw new Error(`${this.id} backend not configured`);
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: prompt.system },
      ...prompt.messages.map((m): OpenAI.Chat.ChatCompletionMessageParam =>
        m.role === 'user' ? { role: 'user', content: m.content } : { role: 'assistant', content: m.content }
      ),
    ];

    const completion = await this.openai.chat.completions.create(
      {
        model: this.model,
        messages,
        temperature: options.temperature ?? 0.3,
        max_tokens: options.maxTokens,
        stream: false,
        ...(options.jsonOutput && { response_format: { type: 'json_object' as const } }),
      },
      options.timeoutMs ? { timeout: options.timeoutMs } : undefined
    );

    return {
      text: completion.choices[0]?.message?.content ?? '',
      model: completion.model,
      inputTokens: completion.usage?.prompt_tokens,
      outputTokens: completion.usage?.completion_tokens,
    };
  }
}

export function createValidationBackend(model: string = LLM_CONFIG.OPENAI_MODEL): OpenAICompatibleBackend {
  return new OpenAICompatibleBackend({
    id: 'validation',
    remote: true,
    model,
    apiKey: LLM_CONFIG.OPENAI_API_KEY,
  });
}

/**
 * Ollama ignores the key but the client requires one
 */
export function createLocalBackend(model: string = LLM_CONFIG.LOCAL_MODEL): OpenAICompatibleBackend {
  return new OpenAICompatibleBackend({
    id: 'local',
    remote: false,
    model,
    apiKey: 'ollama',
    baseUrl: LLM_CONFIG.LOCAL_BASE_URL,
  });
}
