/**
 * FILE PURPOSE: Environment-driven pipeline configuration
 *
 * HOW: Parsed once at startup. Unset or unparsable values fall back to the
 *      defaults below; values that parse but are out of range throw
 *      ConfigError so a typo like PIPELINE_CONCURRENCY=0 does not silently
 *      stall the run.
 */

import { ConfigError } from './errors.js';
import type { RetryPolicy } from './scheduler/retry.js';

export interface PipelineConfig {
  concurrency: number;
  annotationRetry: RetryPolicy;
  persistRetry: RetryPolicy;
  idPrefix: string;
  idWidth: number;
  retryFailed: boolean;
  shutdownGraceMs: number;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes';
}

function requireAtLeast(key: string, value: number, min: number): number {
  if (value < min) {
    throw new ConfigError(`${key} must be >= ${min}, got ${value}`);
  }
  return value;
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const concurrency = requireAtLeast('PIPELINE_CONCURRENCY', Math.floor(readNumber(env, 'PIPELINE_CONCURRENCY', 5)), 1);

  const annotationRetry: RetryPolicy = {
    maxAttempts: requireAtLeast('PIPELINE_MAX_ATTEMPTS', Math.floor(readNumber(env, 'PIPELINE_MAX_ATTEMPTS', 3)), 1),
    baseDelayMs: requireAtLeast('PIPELINE_BASE_DELAY_MS', readNumber(env, 'PIPELINE_BASE_DELAY_MS', 1000), 0),
    multiplier: requireAtLeast('PIPELINE_BACKOFF_MULTIPLIER', readNumber(env, 'PIPELINE_BACKOFF_MULTIPLIER', 2), 1),
    maxDelayMs: requireAtLeast('PIPELINE_MAX_DELAY_MS', readNumber(env, 'PIPELINE_MAX_DELAY_MS', 30_000), 0),
    jitterMs: requireAtLeast('PIPELINE_JITTER_MS', readNumber(env, 'PIPELINE_JITTER_MS', 250), 0),
  };

  const persistRetry: RetryPolicy = {
    maxAttempts: requireAtLeast('PERSIST_MAX_ATTEMPTS', Math.floor(readNumber(env, 'PERSIST_MAX_ATTEMPTS', 3)), 1),
    baseDelayMs: requireAtLeast('PERSIST_BASE_DELAY_MS', readNumber(env, 'PERSIST_BASE_DELAY_MS', 500), 0),
    multiplier: 2,
    maxDelayMs: 10_000,
    jitterMs: 0,
  };

  const idPrefix = env.PIPELINE_ID_PREFIX?.trim() || 'pub';
  if (!/^[A-Za-z0-9-]+$/.test(idPrefix)) {
    throw new ConfigError(`PIPELINE_ID_PREFIX must be alphanumeric, got "${idPrefix}"`);
  }

  return {
    concurrency,
    annotationRetry,
    persistRetry,
    idPrefix,
    idWidth: requireAtLeast('PIPELINE_ID_WIDTH', Math.floor(readNumber(env, 'PIPELINE_ID_WIDTH', 3)), 1),
    retryFailed: readBoolean(env, 'PIPELINE_RETRY_FAILED', false),
    shutdownGraceMs: requireAtLeast('PIPELINE_SHUTDOWN_GRACE_MS', readNumber(env, 'PIPELINE_SHUTDOWN_GRACE_MS', 10_000), 0),
  };
}
