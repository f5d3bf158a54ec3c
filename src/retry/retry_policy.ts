/**
 * @fileoverview Exponential backoff executor and evaluation retry decisions.
 */

import type { EvaluationResult } from '../types.js';
import { getErrorMessage, ValidationError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';

export interface RetryPolicyOptions {
  /** Total calls, including the first */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Multiply each delay by a factor in [0.5, 1.5) */
  jitter?: boolean;
  /** Errors rejected here are re-thrown without another attempt */
  isRetryable?: (error: unknown) => boolean;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  /** Label used in log lines */
  name?: string;
}

export type RetryDecisionReason = 'validation_failed' | 'max_attempts_reached' | '';

export interface RetryDecision {
  shouldRetry: boolean;
  reason: RetryDecisionReason;
}

export const DEFAULT_RETRY_POLICY = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  jitter: true,
} as const;

function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function requireNonNegative(field: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(field, 'a finite number >= 0', String(value));
  }
  return value;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: boolean;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly name: string;

  constructor(options: RetryPolicyOptions = {}) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ValidationError('maxAttempts', 'an integer >= 1', String(maxAttempts));
    }
    this.maxAttempts = maxAttempts;
    this.baseDelayMs = requireNonNegative('baseDelayMs', options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs);
    this.maxDelayMs = requireNonNegative('maxDelayMs', options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs);
    this.jitter = options.jitter ?? DEFAULT_RETRY_POLICY.jitter;
    this.isRetryable = options.isRetryable ?? (() => true);
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? delay;
    this.name = options.name ?? 'retry';
  }

  /**
   * Delay in ms before the attempt after `attempt` (1-based).
   * Jitter is applied after the cap, so a jittered delay may exceed `maxDelayMs`.
   */
  computeDelay(attempt: number): number {
    if (attempt <= 0) return 0;
    const capped = Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(2, attempt - 1));
    const factor = this.jitter ? 0.5 + this.random() : 1;
    return Math.max(0, Math.round(capped * factor));
  }

  /**
   * Run `fn` until it resolves, the attempts are used up, or it throws an
   * error `isRetryable` rejects. The last error is re-thrown.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (attempt >= this.maxAttempts || !this.isRetryable(error)) {
          throw error;
        }
        logWarning(`${this.name} attempt ${attempt}/${this.maxAttempts} failed, retrying`, {
          error: getErrorMessage(error),
        });
        await this.backoff(attempt);
      }
    }
  }

  /** Sleep for {@link computeDelay} and return the delay used. */
  async backoff(attempt: number): Promise<number> {
    const waitMs = this.computeDelay(attempt);
    await this.sleep(waitMs);
    return waitMs;
  }

  decide(evaluation: EvaluationResult, attempt: number): RetryDecision {
    if (evaluation.ok) {
      return { shouldRetry: false, reason: '' };
    }
    if (attempt < this.maxAttempts) {
      return { shouldRetry: true, reason: 'validation_failed' };
    }
    return { shouldRetry: false, reason: 'max_attempts_reached' };
  }
}
