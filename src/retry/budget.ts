/**
 * @fileoverview Per-run tool-call budget.
 *
 * Every router call counts as one tool call. Once the budget is spent the
 * engine stops granting retries and the run is marked degraded.
 */

export interface BudgetSpec {
  maxToolCalls: number;
}

export const DEFAULT_BUDGET: BudgetSpec = {
  maxToolCalls: 20,
};

export interface BudgetDecision {
  allowRetry: boolean;
  degradeReason?: string;
}

export interface BudgetSummary {
  toolCalls: number;
  maxToolCalls: number;
  retries: number;
  degraded: boolean;
  degradeReasons: string[];
}

export class BudgetTracker {
  private calls = 0;
  private retryCount = 0;
  private readonly reasons: string[] = [];

  get toolCalls(): number {
    return this.calls;
  }

  get retries(): number {
    return this.retryCount;
  }

  get degraded(): boolean {
    return this.reasons.length > 0;
  }

  get degradeReasons(): readonly string[] {
    return this.reasons;
  }

  recordToolCall(): void {
    this.calls += 1;
  }

  recordRetry(): void {
    this.retryCount += 1;
  }

  /** Repeated reasons are kept once. */
  recordDegrade(reason: string): void {
    if (!this.reasons.includes(reason)) {
      this.reasons.push(reason);
    }
  }

  toSummary(spec: BudgetSpec): BudgetSummary {
    return {
      toolCalls: this.calls,
      maxToolCalls: spec.maxToolCalls,
      retries: this.retryCount,
      degraded: this.degraded,
      degradeReasons: [...this.reasons],
    };
  }
}

export function decideBudget(spec: BudgetSpec, tracker: BudgetTracker): BudgetDecision {
  if (tracker.toolCalls >= spec.maxToolCalls) {
    return {
      allowRetry: false,
      degradeReason: `tool_calls_exhausted:${tracker.toolCalls}/${spec.maxToolCalls}`,
    };
  }
  return { allowRetry: true };
}
