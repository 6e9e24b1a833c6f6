/**
 * Reasoning backend (Anthropic)
 *
 * Multi-factor explanations, predictions and scenario narration.
 */

import Anthropic from '@anthropic-ai/sdk';
import { LLM_CONFIG } from '../../../common/constants.js';
import type { CompletionOptions, CompletionPrompt, CompletionResult, LLMBackend } from './types.js';

export class ClaudeBackend implements LLMBackend {
  readonly id = 'reasoning' as const;
  readonly remote = true;
  private client: Anthropic | null;

  constructor(
    private model: string = LLM_CONFIG.CLAUDE_MODEL,
    apiKey: string = LLM_CONFIG.ANTHROPIC_API_KEY
  ) {
    this.client = apiKey ? new Anthropic({ apiKey, maxRetries: 0 }) : null;
    if (!this.client) {
      console.error('[ClaudeBackend] ANTHROPIC_API_KEY not set - reasoning backend disabled');
    }
  }

  async isAvailable(): Promise<boolean> {
    return this.client !== null;
  }

  async complete(prompt: CompletionPrompt, options: CompletionOptions): Promise<CompletionResult> {
    if (!this.client) {
      throw new Error('Anthropic client not configured');
    }

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options.maxTokens,
        temperature: options.temperature ?? 0.3,
        system: prompt.system,
        messages: prompt.messages,
      },
      options.timeoutMs ? { timeout: options.timeoutMs } : undefined
    );

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .filter(Boolean)
      .join('\n');

    return {
      text,
      model: response.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
  }
}
