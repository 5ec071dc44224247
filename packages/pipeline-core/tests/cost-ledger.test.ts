import { describe, it, expect, beforeEach } from 'vitest';
import { CostLedger } from '../src/cost-ledger.js';
import { CostLimitExceededError, FatalError } from '../src/errors.js';

describe('CostLedger', () => {
  let ledger: CostLedger;

  beforeEach(() => {
    ledger = new CostLedger(10);
  });

  it('tracks total cost from recordCall with correct pricing math', () => {
    // claude-sonnet: $3.00/1M input, $15.00/1M output
    ledger.recordCall('annotator', 'claude-sonnet', 1_000_000, 100_000, 1200, true);
    const report = ledger.getReport();
    expect(report.totalCostUSD).toBeCloseTo(4.5, 4);
    expect(report.totalInputTokens).toBe(1_000_000);
    expect(report.totalOutputTokens).toBe(100_000);
    expect(report.currency).toBe('USD');
  });

  it('uses default pricing for unknown models', () => {
    ledger.recordCall('annotator', 'some-unknown-model', 1_000_000, 0, 500, true);
    expect(ledger.getReport().totalCostUSD).toBeCloseTo(3.0, 4);
  });

  it('tracks per-agent usage and call outcomes', () => {
    ledger.recordCall('annotator', 'gpt-4o-mini', 500, 100, 200, true);
    ledger.recordCall('annotator', 'gpt-4o-mini', 300, 0, 400, false);
    ledger.recordCall('reviewer', 'gpt-4o', 1000, 200, 300, true);
    const report = ledger.getReport();
    expect(report.byAgent['annotator']?.input).toBe(800);
    expect(report.byAgent['reviewer']?.model).toBe('gpt-4o');
    expect(report.totalCalls).toBe(3);
    expect(report.failedCalls).toBe(1);
    expect(report.avgLatencyMs).toBe(300);
  });

  it('ensureBudget throws a fatal CostLimitExceededError once spend reaches the budget', () => {
    // $2.50 + $10.00 = $12.50
    ledger.recordCall('annotator', 'gpt-4o', 1_000_000, 1_000_000, 5000, true);
    expect(() => ledger.ensureBudget()).toThrow(CostLimitExceededError);

    try {
      ledger.ensureBudget();
      expect.fail('Should have thrown');
    } catch (e) {
      expect(e).toBeInstanceOf(FatalError);
      expect(e).toHaveProperty('name', 'CostLimitExceededError');
      expect(e).toHaveProperty('message', 'Cost limit exceeded: $12.5000 (Limit: $10.00)');
    }
  });

  it('ensureBudget passes under budget', () => {
    ledger.recordCall('annotator', 'gpt-4o-mini', 1_000_000, 0, 100, true);
    expect(() => ledger.ensureBudget()).not.toThrow();
  });

  it('a zero budget refuses the first call', () => {
    expect(() => new CostLedger(0).ensureBudget()).toThrow(CostLimitExceededError);
  });

  it('reset clears all totals', () => {
    ledger.recordCall('annotator', 'gpt-4o', 500, 100, 200, true);
    ledger.reset();
    const report = ledger.getReport();
    expect(report.totalCostUSD).toBe(0);
    expect(report.totalCalls).toBe(0);
    expect(report.byAgent).toEqual({});
  });
});
