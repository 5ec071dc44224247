/**
 * FILE PURPOSE: Explicit retry policy composed around a single async call
 *
 * WHY: Annotation calls and sink upserts both need bounded, exponential
 *      retry, but with different budgets and different ideas of what is
 *      retryable. A policy object plus one loop keeps that testable without
 *      wrapping functions in decorators.
 *
 * HOW: runWithRetry() never throws for a failed call. It returns a tagged
 *      outcome carrying the attempt count and the last error, and whether the
 *      budget ran out (exhausted) or shouldRetry() declined (gave up early).
 */

import { ConfigError, toError } from '../errors.js';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Uniform jitter bound in ms, applied as ±jitterMs. */
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30_000,
  jitterMs: 250,
};

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new ConfigError(`maxAttempts must be a positive integer, got ${policy.maxAttempts}`);
  }
  if (policy.baseDelayMs < 0 || policy.maxDelayMs < 0 || policy.jitterMs < 0) {
    throw new ConfigError('Retry delays must be non-negative');
  }
  if (policy.multiplier < 1) {
    throw new ConfigError(`multiplier must be >= 1, got ${policy.multiplier}`);
  }
  return policy;
}

/**
 * Delay to wait before `attempt` (1-based).
 *
 * Attempt 1 runs immediately. Attempt k >= 2 waits
 * min(maxDelayMs, baseDelayMs * multiplier^(k-2)) plus uniform jitter in
 * [-jitterMs, +jitterMs], never below zero.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  if (attempt <= 1) return 0;
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 2);
  const capped = Math.min(policy.maxDelayMs, exponential);
  const jitter = policy.jitterMs > 0 ? (random() * 2 - 1) * policy.jitterMs : 0;
  return Math.max(0, Math.round(capped + jitter));
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** setTimeout-backed sleep; rejects with an AbortError when the signal fires. */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

function abortError(): Error {
  const err = new Error('Sleep aborted');
  err.name = 'AbortError';
  return err;
}

export interface RetryOptions {
  /** Return false to stop retrying this error. Defaults to retrying everything. */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  /** Called after a failed attempt when another one is scheduled. */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Checked before every attempt and while waiting. */
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | {
      ok: false;
      error: Error;
      attempts: number;
      /** True when every allowed attempt was used. */
      exhausted: boolean;
      /** True when the signal stopped the loop before the budget ran out. */
      aborted: boolean;
    };

export async function runWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? sleep;
  let lastError: Error = new Error('No attempt was made');
  let attempts = 0;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (options.signal?.aborted) {
      return { ok: false, error: lastError, attempts, exhausted: false, aborted: true };
    }

    attempts = attempt;
    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts };
    } catch (err) {
      lastError = toError(err);
    }

    if (attempt === policy.maxAttempts) break;
    if (options.shouldRetry && !options.shouldRetry(lastError, attempt)) {
      return { ok: false, error: lastError, attempts, exhausted: false, aborted: false };
    }

    const delayMs = computeBackoffDelay(attempt + 1, policy, options.random);
    options.onRetry?.(lastError, attempt, delayMs);

    try {
      await wait(delayMs, options.signal);
    } catch (err) {
      if (options.signal?.aborted) {
        return { ok: false, error: lastError, attempts, exhausted: false, aborted: true };
      }
      throw err;
    }
  }

  return { ok: false, error: lastError, attempts, exhausted: true, aborted: false };
}
