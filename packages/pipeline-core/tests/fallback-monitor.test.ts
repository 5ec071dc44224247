import { describe, it, expect, beforeEach } from 'vitest';
import { FallbackMonitor, ANNOTATION_PARSE_FEATURE } from '../src/fallback-monitor.js';

describe('FallbackMonitor', () => {
  let monitor: FallbackMonitor;

  beforeEach(() => {
    monitor = new FallbackMonitor(50, () => 1_700_000_000_000);
  });

  it('tracks primary and fallback invocations separately', () => {
    monitor.recordPrimary(ANNOTATION_PARSE_FEATURE);
    monitor.recordPrimary(ANNOTATION_PARSE_FEATURE);
    monitor.recordFallback(ANNOTATION_PARSE_FEATURE, 'fenced');
    const stats = monitor.getStats(ANNOTATION_PARSE_FEATURE);
    expect(stats.primaryCount).toBe(2);
    expect(stats.fallbackCount).toBe(1);
    expect(stats.recentFallbacks).toEqual([
      { feature: ANNOTATION_PARSE_FEATURE, reason: 'fenced', timestamp: 1_700_000_000_000 },
    ]);
  });

  it('calculates fallback rate correctly', () => {
    for (let i = 0; i < 8; i++) monitor.recordPrimary('feature-a');
    for (let i = 0; i < 2; i++) monitor.recordFallback('feature-a', 'direct+repair');
    expect(monitor.getFallbackRate('feature-a')).toBeCloseTo(0.2, 5);
  });

  it('returns 0 fallback rate for unknown features', () => {
    expect(monitor.getFallbackRate('nonexistent')).toBe(0);
    expect(monitor.getAlertLevel('nonexistent')).toBe('ok');
  });

  it.each([
    [95, 5, 'ok'],
    [80, 20, 'warn'],
    [60, 40, 'page'],
    [50, 50, 'rollback'],
  ] as const)('%i primary / %i fallback → %s', (primary, fallback, level) => {
    for (let i = 0; i < primary; i++) monitor.recordPrimary('f');
    for (let i = 0; i < fallback; i++) monitor.recordFallback('f', 'fenced');
    expect(monitor.getAlertLevel('f')).toBe(level);
  });

  it('keeps only the most recent fallback events', () => {
    const small = new FallbackMonitor(2);
    small.recordFallback('f', 'one');
    small.recordFallback('f', 'two');
    small.recordFallback('f', 'three');
    expect(small.getStats('f').recentFallbacks.map((e) => e.reason)).toEqual(['two', 'three']);
    expect(small.getStats('f').fallbackCount).toBe(3);
  });

  it('reset clears all counters', () => {
    monitor.recordFallback('f', 'fenced');
    monitor.reset();
    expect(monitor.getStats('f')).toEqual({
      feature: 'f',
      primaryCount: 0,
      fallbackCount: 0,
      fallbackRate: 0,
      recentFallbacks: [],
    });
  });
});
