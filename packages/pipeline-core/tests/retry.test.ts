import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  createRetryPolicy,
  runWithRetry,
  sleep,
} from '../src/scheduler/retry.js';
import type { RetryPolicy } from '../src/scheduler/retry.js';
import { ConfigError } from '../src/errors.js';

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, multiplier: 2, maxDelayMs: 30_000, jitterMs: 250 };
const noJitter = () => 0.5;

describe('computeBackoffDelay', () => {
  it('runs the first attempt immediately', () => {
    expect(computeBackoffDelay(1, policy, noJitter)).toBe(0);
  });

  it('grows exponentially from the base delay', () => {
    expect([2, 3, 4].map((k) => computeBackoffDelay(k, policy, noJitter))).toEqual([1000, 2000, 4000]);
  });

  it('caps at maxDelayMs', () => {
    expect(computeBackoffDelay(10, policy, noJitter)).toBe(30_000);
  });

  it('applies jitter within ±jitterMs', () => {
    expect(computeBackoffDelay(2, policy, () => 0)).toBe(750);
    expect(computeBackoffDelay(2, policy, () => 1)).toBe(1250);
  });

  it('never goes below zero', () => {
    expect(computeBackoffDelay(2, { ...policy, baseDelayMs: 100 }, () => 0)).toBe(0);
  });

  it('stays within the bounded window for any random draw', () => {
    for (let k = 1; k <= 6; k++) {
      const centre = Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.multiplier ** (k - 1));
      for (const draw of [0, 0.1, 0.37, 0.5, 0.82, 0.999]) {
        const delay = computeBackoffDelay(k + 1, policy, () => draw);
        expect(delay).toBeGreaterThanOrEqual(centre - policy.jitterMs);
        expect(delay).toBeLessThanOrEqual(centre + policy.jitterMs);
      }
    }
  });
});

describe('createRetryPolicy', () => {
  it('fills defaults', () => {
    expect(createRetryPolicy({ maxAttempts: 5 })).toEqual({ ...DEFAULT_RETRY_POLICY, maxAttempts: 5 });
  });

  it.each([{ maxAttempts: 0 }, { maxAttempts: 1.5 }, { baseDelayMs: -1 }, { multiplier: 0.5 }])(
    'rejects %j',
    (overrides) => {
      expect(() => createRetryPolicy(overrides)).toThrow(ConfigError);
    },
  );
});

describe('runWithRetry', () => {
  it('makes exactly maxAttempts attempts with backoff between them', async () => {
    const wait = vi.fn().mockResolvedValue(undefined);
    const fn = vi.fn().mockRejectedValue(new Error('boom'));

    const outcome = await runWithRetry(fn, policy, { sleep: wait, random: noJitter });

    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    expect(outcome).toMatchObject({ ok: false, attempts: 3, exhausted: true, aborted: false });
    if (!outcome.ok) expect(outcome.error.message).toBe('boom');
  });

  it('returns the value and attempt count once a call succeeds', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('done');

    const outcome = await runWithRetry(fn, policy, {
      sleep: () => Promise.resolve(),
      random: noJitter,
      onRetry,
    });

    expect(outcome).toEqual({ ok: true, value: 'done', attempts: 2 });
    expect(onRetry).toHaveBeenCalledOnce();
    expect(onRetry).toHaveBeenCalledWith(new Error('flaky'), 1, 1000);
  });

  it('stops early when shouldRetry declines', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('permanent'));
    const outcome = await runWithRetry(fn, policy, { shouldRetry: () => false, sleep: () => Promise.resolve() });
    expect(fn).toHaveBeenCalledOnce();
    expect(outcome).toMatchObject({ ok: false, attempts: 1, exhausted: false, aborted: false });
  });

  it('normalizes non-Error rejections', async () => {
    const outcome = await runWithRetry(() => Promise.reject('plain string'), { ...policy, maxAttempts: 1 });
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.message).toBe('plain string');
  });

  it('reports an abort during the backoff wait', async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockRejectedValue(new Error('down'));

    const outcome = await runWithRetry(fn, policy, {
      signal: controller.signal,
      sleep: (_ms, signal) => {
        controller.abort();
        return sleep(0, signal);
      },
    });

    expect(fn).toHaveBeenCalledOnce();
    expect(outcome).toMatchObject({ ok: false, attempts: 1, exhausted: false, aborted: true });
  });

  it('makes no attempt when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn();
    const outcome = await runWithRetry(fn, policy, { signal: controller.signal });
    expect(fn).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ ok: false, attempts: 0, aborted: true });
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    const done = vi.fn();
    const pending = sleep(500).then(done);
    await vi.advanceTimersByTimeAsync(499);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledOnce();
  });

  it('rejects with an AbortError when the signal fires', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });
});
