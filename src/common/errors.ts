/**
 * Error taxonomy
 *
 * Every coach error carries a stable `errorClass` string. That string is what
 * gets logged and persisted on turns and job results, so renaming a class
 * does not change stored history.
 */

import type { BackendId } from './types.js';

export class CoachError extends Error {
  constructor(
    message: string,
    public readonly errorClass: string
  ) {
    super(message);
    this.name = errorClass;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A read source (profile, structured store, vector store, history) failed.
 * The retriever catches this and marks the bundle degraded.
 */
export class ContextUnavailableError extends CoachError {
  constructor(
    public readonly source: string,
    cause: unknown
  ) {
    super(`${source} unavailable: ${describeError(cause)}`, 'ContextUnavailable');
  }
}

export class BackendUnavailableError extends CoachError {
  constructor(
    public readonly backend: BackendId,
    reason: string
  ) {
    super(`Backend ${backend} unavailable: ${reason}`, 'BackendUnavailable');
  }
}

export class BackendTimeoutError extends CoachError {
  constructor(
    public readonly backend: BackendId,
    public readonly timeoutMs: number
  ) {
    super(`Backend ${backend} timed out after ${timeoutMs}ms`, 'BackendTimeout');
  }
}

/**
 * Raised when a SENSITIVE request is about to leave the local backend.
 * Nothing is sent; the request fails closed.
 */
export class PrivacyViolationRiskError extends CoachError {
  constructor(public readonly backend: BackendId) {
    super(`Refusing to send privacy-sensitive request to ${backend}`, 'PrivacyViolationRisk');
  }
}

/**
 * Invalid caller input (facade arguments, CLI options).
 */
export class ValidationError extends CoachError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'ValidationError');
  }
}

export class StoreError extends CoachError {
  constructor(operation: string, cause: unknown) {
    super(`Health store ${operation} failed: ${describeError(cause)}`, 'StoreError');
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Stable class name for logs and persisted attempts.
 */
export function errorClassOf(error: unknown): string {
  if (error instanceof CoachError) return error.errorClass;
  if (error instanceof Error) return error.name || 'Error';
  return 'UnknownError';
}
