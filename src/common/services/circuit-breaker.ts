/**
 * Circuit Breaker Service
 *
 * One breaker per LLM backend. While a backend is failing the breaker
 * rejects immediately, so the fallback chain moves on without waiting
 * for another timeout.
 *
 * States:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Failing fast, rejecting requests immediately
 * - HALF-OPEN: Testing if backend recovered, limited requests allowed
 */

import { logInfo, logWarn, logError } from './logger.js';
import type { BackendId } from '../types.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerConfig {
  failureThreshold: number;    // Open after N consecutive failures
  resetTimeoutMs: number;      // Try half-open after this time
  halfOpenRequests: number;    // Successes needed in half-open before closing
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 3,
  resetTimeoutMs: 60000,
  halfOpenRequests: 1,
};

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private lastFailureTime = 0;
  private halfOpenSuccesses = 0;

  constructor(
    private name: string,
    private config: CircuitBreakerConfig = DEFAULT_CONFIG,
    private now: () => number = Date.now
  ) {}

  /**
   * Execute a function with circuit breaker protection
   *
   * @throws CircuitBreakerOpenError if circuit is OPEN
   */
  async execute<T>(fn: () => Promise<T>, context?: { query_id?: string }): Promise<T> {
    const logCtx = {
      service: this.name,
      circuit_state: this.state,
      ...context,
    };

    if (this.state === 'open') {
      const timeSinceFailure = this.now() - this.lastFailureTime;
      if (timeSinceFailure > this.config.resetTimeoutMs) {
        this.state = 'half-open';
        this.halfOpenSuccesses = 0;
        logInfo('Circuit breaker half-open', {
          ...logCtx,
          circuit_state: 'half-open',
          reason: 'reset_timeout_elapsed',
        });
      } else {
        const remainingMs = this.config.resetTimeoutMs - timeSinceFailure;
        logWarn('Circuit breaker rejecting request', {
          ...logCtx,
          remaining_ms: remainingMs,
          consecutive_failures: this.consecutiveFailures,
        });
        throw new CircuitBreakerOpenError(this.name, remainingMs);
      }
    }

    try {
      const result = await fn();
      this.onSuccess(logCtx);
      return result;
    } catch (error) {
      this.onFailure(error, logCtx);
      throw error;
    }
  }

  private onSuccess(logCtx: Record<string, unknown>): void {
    if (this.state === 'half-open') {
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.config.halfOpenRequests) {
        this.state = 'closed';
        this.consecutiveFailures = 0;
        logInfo('Circuit breaker closed', {
          ...logCtx,
          circuit_state: 'closed',
          reason: 'service_recovered',
        });
      }
    } else {
      this.consecutiveFailures = 0;
    }
  }

  private onFailure(error: unknown, logCtx: Record<string, unknown>): void {
    this.consecutiveFailures++;
    this.lastFailureTime = this.now();

    const errMsg = error instanceof Error ? error.message : String(error);

    if (this.state === 'half-open') {
      this.state = 'open';
      logWarn('Circuit breaker re-opened', {
        ...logCtx,
        circuit_state: 'open',
        reason: 'half_open_failure',
        error: errMsg,
      });
    } else if (this.consecutiveFailures >= this.config.failureThreshold) {
      this.state = 'open';
      logError('Circuit breaker opened', {
        ...logCtx,
        circuit_state: 'open',
        reason: 'failure_threshold_breached',
        consecutive_failures: this.consecutiveFailures,
        error: errMsg,
      });
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): { state: CircuitState; consecutiveFailures: number; lastFailureTime: number } {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      lastFailureTime: this.lastFailureTime,
    };
  }

  reset(): void {
    this.state = 'closed';
    this.consecutiveFailures = 0;
    this.halfOpenSuccesses = 0;
  }
}

/**
 * Thrown instead of calling the backend.
 * Lets callers distinguish "didn't try" from "tried and failed".
 */
export class CircuitBreakerOpenError extends Error {
  constructor(
    public readonly service: string,
    public readonly remainingMs: number
  ) {
    super(`Circuit breaker [${service}] is OPEN - failing fast (retry in ${Math.round(remainingMs / 1000)}s)`);
    this.name = 'CircuitBreakerOpenError';
  }
}

// =============================================================================
// PER-BACKEND BREAKERS
// =============================================================================

export type BackendBreakers = Record<BackendId, CircuitBreaker>;

/**
 * Remote APIs get a longer cool-down than the local model, which usually
 * comes back as soon as the daemon restarts.
 */
export function createBackendBreakers(now: () => number = Date.now): BackendBreakers {
  return {
    reasoning: new CircuitBreaker('reasoning', { failureThreshold: 3, resetTimeoutMs: 60000, halfOpenRequests: 1 }, now),
    validation: new CircuitBreaker('validation', { failureThreshold: 3, resetTimeoutMs: 60000, halfOpenRequests: 1 }, now),
    local: new CircuitBreaker('local', { failureThreshold: 2, resetTimeoutMs: 15000, halfOpenRequests: 1 }, now),
  };
}
