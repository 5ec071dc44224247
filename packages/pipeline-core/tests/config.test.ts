import { describe, it, expect } from 'vitest';
import { loadPipelineConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadPipelineConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadPipelineConfig({})).toEqual({
      concurrency: 5,
      annotationRetry: { maxAttempts: 3, baseDelayMs: 1000, multiplier: 2, maxDelayMs: 30_000, jitterMs: 250 },
      persistRetry: { maxAttempts: 3, baseDelayMs: 500, multiplier: 2, maxDelayMs: 10_000, jitterMs: 0 },
      idPrefix: 'pub',
      idWidth: 3,
      retryFailed: false,
      shutdownGraceMs: 10_000,
    });
  });

  it('reads overrides', () => {
    const config = loadPipelineConfig({
      PIPELINE_CONCURRENCY: '12',
      PIPELINE_MAX_ATTEMPTS: '5',
      PIPELINE_JITTER_MS: '0',
      PERSIST_MAX_ATTEMPTS: '2',
      PIPELINE_ID_PREFIX: 'doc',
      PIPELINE_ID_WIDTH: '5',
      PIPELINE_RETRY_FAILED: 'true',
      PIPELINE_SHUTDOWN_GRACE_MS: '2500',
    });

    expect(config.concurrency).toBe(12);
    expect(config.annotationRetry.maxAttempts).toBe(5);
    expect(config.annotationRetry.jitterMs).toBe(0);
    expect(config.persistRetry.maxAttempts).toBe(2);
    expect(config.idPrefix).toBe('doc');
    expect(config.idWidth).toBe(5);
    expect(config.retryFailed).toBe(true);
    expect(config.shutdownGraceMs).toBe(2500);
  });

  it('falls back on unparsable numbers', () => {
    expect(loadPipelineConfig({ PIPELINE_CONCURRENCY: 'lots' }).concurrency).toBe(5);
  });

  it('treats anything but 1/true/yes as false', () => {
    expect(loadPipelineConfig({ PIPELINE_RETRY_FAILED: 'YES' }).retryFailed).toBe(true);
    expect(loadPipelineConfig({ PIPELINE_RETRY_FAILED: 'off' }).retryFailed).toBe(false);
  });

  it('rejects out-of-range values', () => {
    expect(() => loadPipelineConfig({ PIPELINE_CONCURRENCY: '0' })).toThrow(
      new ConfigError('PIPELINE_CONCURRENCY must be >= 1, got 0'),
    );
    expect(() => loadPipelineConfig({ PIPELINE_BACKOFF_MULTIPLIER: '0.5' })).toThrow(ConfigError);
  });

  it('rejects an id prefix that would break generated ids', () => {
    expect(() => loadPipelineConfig({ PIPELINE_ID_PREFIX: 'pub_x' })).toThrow(
      'PIPELINE_ID_PREFIX must be alphanumeric, got "pub_x"',
    );
  });
});
