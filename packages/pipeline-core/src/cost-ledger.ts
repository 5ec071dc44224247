/**
 * FILE PURPOSE: Token and cost accounting for annotation calls
 *
 * WHY: A run over a large backlog can spend real money. The ledger records
 *      every call (including failed and retried ones) and enforces a hard
 *      budget: ensureBudget() throws CostLimitExceededError, a FatalError, so
 *      the coordinator stops the run instead of failing records one by one.
 *
 * EDGE CASES:
 * - Unknown model → default pricing (fail-expensive, not fail-silent)
 * - One ledger per run; nothing here is global
 */

import { CostLimitExceededError } from './errors.js';

export interface TokenUsage {
  input: number;
  output: number;
  costUSD: number;
  model: string;
}

export interface CostReport {
  totalCostUSD: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalCalls: number;
  failedCalls: number;
  avgLatencyMs: number;
  byAgent: Record<string, TokenUsage>;
  currency: 'USD';
}

// Per 1M tokens. Update when models change.
const PRICING: Record<string, { input: number; output: number }> = {
  'gpt-4o': { input: 2.50, output: 10.00 },
  'gpt-4o-mini': { input: 0.15, output: 0.60 },
  'claude-haiku': { input: 1.00, output: 5.00 },
  'claude-sonnet': { input: 3.00, output: 15.00 },
  'deepseek-v3': { input: 0.15, output: 0.60 },
};
const DEFAULT_PRICING = { input: 3.00, output: 15.00 };

export class CostLedger {
  private readonly usages = new Map<string, TokenUsage>();
  private totalInput = 0;
  private totalOutput = 0;
  private totalCost = 0;
  private totalCalls = 0;
  private failedCalls = 0;
  private totalLatencyMs = 0;
  readonly maxBudgetUSD: number;

  constructor(maxBudgetUSD = 10) {
    this.maxBudgetUSD = maxBudgetUSD;
  }

  /** Throws CostLimitExceededError once spend reaches the budget. */
  ensureBudget(): void {
    if (this.totalCost >= this.maxBudgetUSD) {
      throw new CostLimitExceededError(this.totalCost, this.maxBudgetUSD);
    }
  }

  recordCall(
    agentName: string,
    model: string,
    inputTokens: number,
    outputTokens: number,
    latencyMs: number,
    success: boolean,
  ): void {
    const pricing = PRICING[model] ?? DEFAULT_PRICING;
    const costUSD = (inputTokens / 1_000_000) * pricing.input
                  + (outputTokens / 1_000_000) * pricing.output;

    this.totalInput += inputTokens;
    this.totalOutput += outputTokens;
    this.totalCost += costUSD;
    this.totalCalls++;
    this.totalLatencyMs += latencyMs;
    if (!success) this.failedCalls++;

    const current = this.usages.get(agentName) ?? { input: 0, output: 0, costUSD: 0, model };
    this.usages.set(agentName, {
      input: current.input + inputTokens,
      output: current.output + outputTokens,
      costUSD: current.costUSD + costUSD,
      model,
    });
  }

  getReport(): CostReport {
    return {
      totalCostUSD: Number(this.totalCost.toFixed(4)),
      totalInputTokens: this.totalInput,
      totalOutputTokens: this.totalOutput,
      totalCalls: this.totalCalls,
      failedCalls: this.failedCalls,
      avgLatencyMs: this.totalCalls > 0 ? Math.round(this.totalLatencyMs / this.totalCalls) : 0,
      byAgent: Object.fromEntries(this.usages),
      currency: 'USD',
    };
  }

  reset(): void {
    this.usages.clear();
    this.totalInput = 0;
    this.totalOutput = 0;
    this.totalCost = 0;
    this.totalCalls = 0;
    this.failedCalls = 0;
    this.totalLatencyMs = 0;
  }
}
