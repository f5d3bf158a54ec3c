/**
 * @fileoverview Fail-code driven retry decisions and the attempt cost ledger.
 *
 * The manager maps gate fail codes to remediation strategies the router can
 * act on. Safety and infrastructure codes are never retried.
 */

import { ValidationError } from '../core/errors.js';
import { isTerminalFailCode, type FailCode } from '../quality/fail_codes.js';
import { logInfo } from '../telemetry/logger.js';

// ============================================================================
// STRATEGIES
// ============================================================================

export type RemediationAction = 'add_search' | 'extract_locators' | 'expand_search' | 'soften_language';

export interface RetryStrategy {
  action: RemediationAction;
  description: string;
}

export interface RemediationStep extends RetryStrategy {
  code: FailCode;
}

export const RETRY_STRATEGIES: Partial<Record<FailCode, RetryStrategy>> = {
  CITATION_MISSING: {
    action: 'add_search',
    description: 'Add another literature search to find citable evidence',
  },
  LOCATOR_MISSING: {
    action: 'extract_locators',
    description: 'Re-extract evidence with locator information',
  },
  EVIDENCE_WEAK: {
    action: 'expand_search',
    description: 'Expand the search to cover unsupported claims',
  },
  ASSERTION_DANGER: {
    action: 'soften_language',
    description: 'Rewrite with hedging language',
  },
};

// ============================================================================
// LEDGER
// ============================================================================

export interface RetryAttempt {
  attempt: number;
  changes: string[];
  improved: boolean;
  cost: number;
  timeMs: number;
  /** ISO-8601 */
  timestamp: string;
}

export interface RetrySummary {
  totalAttempts: number;
  totalCost: number;
  anyImproved: boolean;
  attempts: RetryAttempt[];
}

export interface RetryManagerOptions {
  /** Attempt number at or above which no retry is granted */
  maxRetries?: number;
  /** Accumulated cost (USD) at or above which no retry is granted */
  costLimit?: number;
}

export const DEFAULT_RETRY_MANAGER = {
  maxRetries: 3,
  costLimit: 10,
} as const;

export class RetryManager {
  readonly maxRetries: number;
  readonly costLimit: number;
  private readonly ledger: RetryAttempt[] = [];
  private accumulatedCost = 0;

  constructor(options: RetryManagerOptions = {}) {
    this.maxRetries = options.maxRetries ?? DEFAULT_RETRY_MANAGER.maxRetries;
    this.costLimit = options.costLimit ?? DEFAULT_RETRY_MANAGER.costLimit;
  }

  get totalCost(): number {
    return this.accumulatedCost;
  }

  get attempts(): readonly RetryAttempt[] {
    return this.ledger;
  }

  shouldRetry(failCodes: readonly FailCode[], attempt: number): boolean {
    if (attempt >= this.maxRetries) {
      logInfo(`Max retries (${this.maxRetries}) reached`, { attempt });
      return false;
    }
    if (this.accumulatedCost >= this.costLimit) {
      logInfo(`Cost limit (${this.costLimit}) reached`, { totalCost: this.accumulatedCost });
      return false;
    }
    const terminal = failCodes.filter(isTerminalFailCode);
    if (terminal.length > 0) {
      logInfo('Terminal fail codes present; not retrying', { codes: terminal });
      return false;
    }
    return failCodes.some((code) => RETRY_STRATEGIES[code] !== undefined);
  }

  /** Remediation steps for the retryable codes, in input order, one per code. */
  getRetryStrategy(failCodes: readonly FailCode[]): RemediationStep[] {
    const steps: RemediationStep[] = [];
    const seen = new Set<FailCode>();
    for (const code of failCodes) {
      const strategy = RETRY_STRATEGIES[code];
      if (!strategy || seen.has(code)) continue;
      seen.add(code);
      steps.push({ code, ...strategy });
    }
    return steps;
  }

  /**
   * @throws ValidationError for a negative or non-finite cost
   */
  recordAttempt(attempt: number, changes: readonly string[], improved: boolean, cost: number, timeMs: number): void {
    if (!Number.isFinite(cost) || cost < 0) {
      throw new ValidationError('cost', 'a finite number >= 0', String(cost));
    }
    this.ledger.push({
      attempt,
      changes: [...changes],
      improved,
      cost,
      timeMs,
      timestamp: new Date().toISOString(),
    });
    this.accumulatedCost += cost;
  }

  getSummary(): RetrySummary {
    return {
      totalAttempts: this.ledger.length,
      totalCost: this.accumulatedCost,
      anyImproved: this.ledger.some((entry) => entry.improved),
      attempts: this.ledger.map((entry) => ({ ...entry, changes: [...entry.changes] })),
    };
  }
}
