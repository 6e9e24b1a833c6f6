/**
 * Backend Invoker
 *
 * Runs a fallback chain from the router: each backend gets one time-boxed
 * call behind its circuit breaker, and the first success wins. A timeout
 * is a failure like any other.
 *
 * Sensitive requests are checked against each backend before anything is
 * sent; a remote backend is refused outright.
 */

import {
  BackendTimeoutError,
  BackendUnavailableError,
  PrivacyViolationRiskError,
  describeError,
  errorClassOf,
} from '../../../common/errors.js';
import type { BackendBreakers } from '../../../common/services/circuit-breaker.js';
import { logInfo, logWarn } from '../../../common/services/logger.js';
import type { BackendAttempt, BackendId, PrivacySensitivity } from '../../../common/types.js';
import { withTimeout } from '../../../common/utils/timeout.js';
import type { BackendRegistry, CompletionOptions, CompletionPrompt, CompletionResult } from './types.js';

export type InvocationOutcome =
  | { ok: true; backend: BackendId; result: CompletionResult; attempts: BackendAttempt[] }
  | { ok: false; attempts: BackendAttempt[]; errorClass: string };

export interface InvocationContext {
  privacy: PrivacySensitivity;
  queryId?: string;
}

export class BackendInvoker {
  constructor(
    private backends: BackendRegistry,
    private breakers: BackendBreakers,
    private timeoutMs: number
  ) {}

  async invoke(
    chain: BackendId[],
    prompt: CompletionPrompt,
    options: CompletionOptions,
    context: InvocationContext
  ): Promise<InvocationOutcome> {
    const attempts: BackendAttempt[] = [];

    for (const id of chain) {
      const startTime = Date.now();
      try {
        const result = await this.callOnce(id, prompt, options, context);
        const durationMs = Date.now() - startTime;
        attempts.push({ backend: id, ok: true, durationMs });
        logInfo('Backend responded', {
          query_id: context.queryId,
          backend: id,
          duration_ms: durationMs,
        });
        return { ok: true, backend: id, result, attempts };
      } catch (error) {
        const durationMs = Date.now() - startTime;
        const errorClass = errorClassOf(error);
        attempts.push({
          backend: id,
          ok: false,
          durationMs,
          errorClass,
          errorMessage: describeError(error),
        });
        logWarn('Backend attempt failed', {
          query_id: context.queryId,
          backend: id,
          duration_ms: durationMs,
          error_class: errorClass,
          error: describeError(error),
        });
      }
    }

    const last = attempts[attempts.length - 1];
    return { ok: false, attempts, errorClass: last?.errorClass ?? 'BackendUnavailable' };
  }

  private async callOnce(
    id: BackendId,
    prompt: CompletionPrompt,
    options: CompletionOptions,
    context: InvocationContext
  ): Promise<CompletionResult> {
    const backend = this.backends[id];

    if (context.privacy === 'SENSITIVE' && backend.remote) {
      throw new PrivacyViolationRiskError(id);
    }

    if (!(await backend.isAvailable())) {
      throw new BackendUnavailableError(id, 'not available');
    }

    return this.breakers[id].execute(
      () =>
        withTimeout(
          backend.complete(prompt, { ...options, timeoutMs: this.timeoutMs }),
          this.timeoutMs,
          () => new BackendTimeoutError(id, this.timeoutMs)
        ),
      { query_id: context.queryId }
    );
  }
}
