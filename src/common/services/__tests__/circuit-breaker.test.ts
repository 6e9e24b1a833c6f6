/**
 * Jest Unit Tests for the Circuit Breaker
 *
 * Uses an injected clock, so no real time passes.
 */

import { CircuitBreaker, CircuitBreakerOpenError, createBackendBreakers } from '../circuit-breaker.js';

const CONFIG = { failureThreshold: 3, resetTimeoutMs: 1000, halfOpenRequests: 1 };

function failing(): Promise<never> {
  return Promise.reject(new Error('backend down'));
}

describe('CircuitBreaker', () => {
  let clock: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = 10_000;
    breaker = new CircuitBreaker('test', CONFIG, () => clock);
  });

  async function failTimes(n: number): Promise<void> {
    for (let i = 0; i < n; i++) {
      await expect(breaker.execute(failing)).rejects.toThrow('backend down');
    }
  }

  // ==========================================================================
  // STATE TRANSITIONS
  // ==========================================================================

  test('passes results through while closed', async () => {
    await expect(breaker.execute(async () => 42)).resolves.toBe(42);
    expect(breaker.getState()).toBe('closed');
  });

  test('stays closed below the failure threshold', async () => {
    await failTimes(2);
    expect(breaker.getState()).toBe('closed');
    expect(breaker.getStats().consecutiveFailures).toBe(2);
  });

  test('a success resets the failure count', async () => {
    await failTimes(2);
    await breaker.execute(async () => 'ok');
    await failTimes(2);
    expect(breaker.getState()).toBe('closed');
  });

  test('opens at the threshold and rejects without calling', async () => {
    await failTimes(3);
    expect(breaker.getState()).toBe('open');

    const fn = jest.fn(async () => 'never');
    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitBreakerOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  test('half-opens after the reset timeout and closes on success', async () => {
    await failTimes(3);
    clock += 1001;
    await expect(breaker.execute(async () => 'recovered')).resolves.toBe('recovered');
    expect(breaker.getState()).toBe('closed');
  });

  test('a failure while half-open re-opens the circuit', async () => {
    await failTimes(3);
    clock += 1001;
    await failTimes(1);
    expect(breaker.getState()).toBe('open');
  });

  test('open error reports the remaining wait', async () => {
    await failTimes(3);
    clock += 400;
    const error = await breaker.execute(async () => 1).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CircuitBreakerOpenError);
    if (error instanceof CircuitBreakerOpenError) {
      expect(error.service).toBe('test');
      expect(error.remainingMs).toBe(600);
    }
  });

  test('reset closes the circuit', async () => {
    await failTimes(3);
    breaker.reset();
    expect(breaker.getState()).toBe('closed');
  });
});

describe('createBackendBreakers', () => {
  test('the local breaker opens after two failures', async () => {
    const breakers = createBackendBreakers(() => 0);
    for (let i = 0; i < 2; i++) {
      await expect(breakers.local.execute(failing)).rejects.toThrow();
    }
    expect(breakers.local.getState()).toBe('open');
    expect(breakers.reasoning.getState()).toBe('closed');
  });
});
