/**
 * FILE PURPOSE: Track how often annotation output needs the fallback parse path
 *
 * WHY: JSON repair and fence extraction hide malformed output from the
 *      pipeline, and with it prompt or model degradation from operators.
 *      A response that parses directly counts as primary; one that needed the
 *      fenced stage or a repair counts as a fallback.
 * HOW: Counter per feature. Alert thresholds at 10% (warn), 30% (page),
 *      50% (rollback).
 */

export interface FallbackEvent {
  feature: string;
  reason: string;
  timestamp: number;
}

export interface FallbackStats {
  feature: string;
  primaryCount: number;
  fallbackCount: number;
  fallbackRate: number;
  recentFallbacks: FallbackEvent[];
}

export type AlertLevel = 'ok' | 'warn' | 'page' | 'rollback';

/** Feature name the scheduler records parse outcomes under. */
export const ANNOTATION_PARSE_FEATURE = 'annotation-parse';

/**
 * EXAMPLE:
 * ```typescript
 * const monitor = new FallbackMonitor();
 * monitor.recordPrimary('annotation-parse');
 * monitor.recordFallback('annotation-parse', 'fenced');
 * monitor.getStats('annotation-parse').fallbackRate; // 0.5
 * ```
 */
export class FallbackMonitor {
  private counters: Map<string, { primary: number; fallback: number }> = new Map();
  private recentFallbacks: Map<string, FallbackEvent[]> = new Map();
  private readonly maxRecentEvents: number;
  private readonly now: () => number;

  constructor(maxRecentEvents = 50, now: () => number = Date.now) {
    this.maxRecentEvents = maxRecentEvents;
    this.now = now;
  }

  recordPrimary(feature: string): void {
    const c = this.counters.get(feature) || { primary: 0, fallback: 0 };
    c.primary++;
    this.counters.set(feature, c);
  }

  recordFallback(feature: string, reason: string): void {
    const c = this.counters.get(feature) || { primary: 0, fallback: 0 };
    c.fallback++;
    this.counters.set(feature, c);

    const events = this.recentFallbacks.get(feature) || [];
    events.push({ feature, reason, timestamp: this.now() });
    if (events.length > this.maxRecentEvents) events.shift();
    this.recentFallbacks.set(feature, events);
  }

  /** 0 when nothing was recorded. */
  getFallbackRate(feature: string): number {
    const c = this.counters.get(feature);
    if (!c || (c.primary + c.fallback) === 0) return 0;
    return c.fallback / (c.primary + c.fallback);
  }

  getStats(feature: string): FallbackStats {
    const c = this.counters.get(feature) || { primary: 0, fallback: 0 };
    const total = c.primary + c.fallback;
    return {
      feature,
      primaryCount: c.primary,
      fallbackCount: c.fallback,
      fallbackRate: total > 0 ? c.fallback / total : 0,
      recentFallbacks: [...(this.recentFallbacks.get(feature) || [])],
    };
  }

  /**
   * - ok:       < 10%
   * - warn:     10-30% (check the prompt and schema description)
   * - page:     30-50%
   * - rollback: >= 50% (primary path is broken)
   */
  getAlertLevel(feature: string): AlertLevel {
    const rate = this.getFallbackRate(feature);
    if (rate >= 0.50) return 'rollback';
    if (rate >= 0.30) return 'page';
    if (rate >= 0.10) return 'warn';
    return 'ok';
  }

  reset(): void {
    this.counters.clear();
    this.recentFallbacks.clear();
  }
}
