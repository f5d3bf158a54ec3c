/**
 * @fileoverview Execution engine.
 *
 * Plans a root task once, then runs its subtasks one after another through the
 * router. The engine is the only authority on task status: producer-reported
 * status is advisory, citations are re-validated against the evidence store,
 * and the quality gate and evaluator decide whether an attempt is retried.
 *
 * Per subtask:
 *   start -> router (transport retries) -> parse -> resolve status
 *   -> quality gate -> evaluator -> retry decision (policy, fail codes, budget)
 *   -> loop with remediation, or complete
 *
 * Only infrastructure failures throw (router, planner, engine misuse). Bad
 * producer output is reported as status and warnings.
 */

import { CitationValidator } from '../citations/citation_validator.js';
import { parseLocator } from '../citations/locator.js';
import {
  ExecutionError,
  getErrorMessage,
  PlannerError,
  RouterError,
  toError,
} from '../core/errors.js';
import type { EvidenceStore } from '../evidence/evidence_store.js';
import { FailCodes, type FailCode, isTerminalFailCode } from '../quality/fail_codes.js';
import type { QualityGateVerifier } from '../quality/quality_gate.js';
import { BudgetTracker, decideBudget, DEFAULT_BUDGET, type BudgetSpec, type BudgetSummary } from '../retry/budget.js';
import { RetryManager, type RemediationStep, type RetrySummary } from '../retry/retry_manager.js';
import { RetryPolicy } from '../retry/retry_policy.js';
import { logDebug, logError, logInfo, logWarning } from '../telemetry/logger.js';
import type {
  AgentResult,
  EvaluationResult,
  FailReason,
  GateCitation,
  ProposedStatus,
  ResolvedStatus,
  ValidatedCitation,
  VerifyResult,
} from '../types.js';
import { type AttemptContext, type Evaluator, parseAgentResult, type Planner, type Router } from './contracts.js';
import { resolveStatus } from './status_resolver.js';
import type { CompletePayload, Task } from './task.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ExecutionEngineOptions {
  planner: Planner;
  router: Router;
  store: EvidenceStore;
  /** Defaults to a validator over `store` with default thresholds */
  validator?: CitationValidator;
  verifier?: QualityGateVerifier;
  evaluator?: Evaluator;
  /** Evaluation-driven retries. Defaults to a single attempt. */
  retryPolicy?: RetryPolicy;
  /** Transport retries around each router call. Defaults to a single attempt. */
  routerRetryPolicy?: RetryPolicy;
  retryManager?: RetryManager;
  budget?: BudgetSpec;
  /** Block the remaining subtasks after one fails. Default true. */
  haltOnFailure?: boolean;
}

export interface SubtaskOutcome {
  task: Task;
  resolution: ResolvedStatus;
  attempts: number;
  verify?: VerifyResult;
  evaluation?: EvaluationResult;
}

export interface EngineRunReport {
  rootTaskId: string;
  subtasks: Task[];
  outcomes: SubtaskOutcome[];
  /** True when every subtask finished DONE */
  succeeded: boolean;
  budget: BudgetSummary;
  retry: RetrySummary;
}

export const EngineWarnings = {
  routerError: 'router_error',
  budgetRetryBlocked: 'budget_retry_blocked',
  evaluationFailed: 'evaluation_failed',
} as const;

interface AttemptOutcome {
  result: AgentResult;
  /** Absent when the router output was malformed or its status invalid */
  proposedStatus?: ProposedStatus;
  resolution: ResolvedStatus;
  warnings: string[];
  citations: ValidatedCitation[];
  verify?: VerifyResult;
  evaluation?: EvaluationResult;
  failReasons: FailReason[];
}

// ============================================================================
// ENGINE
// ============================================================================

export class ExecutionEngine {
  private readonly planner: Planner;
  private readonly router: Router;
  private readonly validator: CitationValidator;
  private readonly verifier?: QualityGateVerifier;
  private readonly evaluator?: Evaluator;
  private readonly retryPolicy: RetryPolicy;
  private readonly routerRetryPolicy: RetryPolicy;
  private readonly retryManager: RetryManager;
  private readonly budget: BudgetSpec;
  private readonly haltOnFailure: boolean;
  private running = false;
  private tracker = new BudgetTracker();

  constructor(options: ExecutionEngineOptions) {
    this.planner = options.planner;
    this.router = options.router;
    this.validator = options.validator ?? new CitationValidator(options.store);
    this.verifier = options.verifier;
    this.evaluator = options.evaluator;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy({ maxAttempts: 1, name: 'evaluation' });
    this.routerRetryPolicy = options.routerRetryPolicy ?? new RetryPolicy({ maxAttempts: 1, name: 'router' });
    this.retryManager = options.retryManager ?? new RetryManager();
    this.budget = options.budget ?? DEFAULT_BUDGET;
    this.haltOnFailure = options.haltOnFailure ?? true;
  }

  /**
   * Plan `rootTask` and execute every subtask in order.
   *
   * @throws ExecutionError when a run is already in progress or the plan is empty
   * @throws PlannerError when planning fails
   * @throws RouterError when the router keeps failing for a subtask
   */
  async run(rootTask: Task): Promise<EngineRunReport> {
    if (this.running) {
      throw new ExecutionError('engine_busy', `cannot start ${rootTask.id} while another run is in progress`);
    }
    this.running = true;
    this.tracker = new BudgetTracker();
    try {
      return await this.runPlanned(rootTask);
    } finally {
      this.running = false;
    }
  }

  /**
   * Run `rootTask` and return the answer of the last completed subtask, with a
   * budget note appended when the run was degraded.
   */
  async runAndGetAnswer(rootTask: Task): Promise<string> {
    const report = await this.run(rootTask);
    let answer = '';
    for (let i = report.subtasks.length - 1; i >= 0; i -= 1) {
      const completion = report.subtasks[i]?.completion;
      if (completion) {
        answer = completion.answer;
        break;
      }
    }
    if (report.budget.degraded) {
      answer +=
        `\n\n---\nBudget: ${report.budget.toolCalls} tool calls, ` +
        `degraded due to: ${report.budget.degradeReasons.join(', ')}`;
    }
    return answer;
  }

  private async runPlanned(rootTask: Task): Promise<EngineRunReport> {
    logInfo('Engine run started', { rootTaskId: rootTask.id, category: rootTask.inputs.category });

    let subtasks: Task[];
    try {
      subtasks = await this.planner.plan(rootTask);
    } catch (error) {
      logError('Planner failed', { rootTaskId: rootTask.id, error: getErrorMessage(error) });
      throw new PlannerError(rootTask.id, toError(error));
    }
    if (subtasks.length === 0) {
      throw new ExecutionError('empty_plan', `planner returned no subtasks for ${rootTask.id}`);
    }

    const outcomes: SubtaskOutcome[] = [];
    for (const [index, subtask] of subtasks.entries()) {
      let outcome: SubtaskOutcome;
      try {
        outcome = await this.executeSubtask(subtask);
      } catch (error) {
        this.blockRemaining(subtasks.slice(index + 1), subtask);
        throw error;
      }
      outcomes.push(outcome);
      if (subtask.status === 'FAILED') {
        this.blockRemaining(subtasks.slice(index + 1), subtask);
        if (this.haltOnFailure) break;
      }
    }

    const report: EngineRunReport = {
      rootTaskId: rootTask.id,
      subtasks,
      outcomes,
      succeeded: subtasks.every((task) => task.status === 'DONE'),
      budget: this.tracker.toSummary(this.budget),
      retry: this.retryManager.getSummary(),
    };
    logInfo('Engine run finished', {
      rootTaskId: rootTask.id,
      succeeded: report.succeeded,
      subtasks: subtasks.length,
      toolCalls: report.budget.toolCalls,
    });
    return report;
  }

  private blockRemaining(remaining: readonly Task[], failed: Task): void {
    if (!this.haltOnFailure) return;
    for (const task of remaining) {
      if (task.status === 'PENDING') {
        task.block(failed.id);
      }
    }
  }

  // ==========================================================================
  // SUBTASK LOOP
  // ==========================================================================

  private async executeSubtask(task: Task): Promise<SubtaskOutcome> {
    task.start();

    let attempt = 1;
    let remediation: RemediationStep[] = [];
    let previousWarnings: string[] = [];
    let previousProblems: number | undefined;

    for (;;) {
      const startedAt = Date.now();
      const context: AttemptContext = { attempt, remediation, previousWarnings };
      const raw = await this.callRouter(task, context);
      const outcome = await this.evaluateAttempt(raw);

      const problems = countProblems(outcome);
      this.retryManager.recordAttempt(
        attempt,
        remediation.map((step) => step.action),
        previousProblems !== undefined && problems < previousProblems,
        outcome.result.meta.costUsd ?? 0,
        Date.now() - startedAt,
      );
      previousProblems = problems;

      const retryReason = this.decideRetry(task, outcome, attempt);
      if (!retryReason) {
        return this.finish(task, outcome, attempt);
      }

      const gateCodes = failingCodes(outcome.verify);
      remediation = this.retryManager.getRetryStrategy(gateCodes);
      previousWarnings = [
        ...outcome.warnings,
        ...outcome.failReasons.map((reason) => `${reason.code}: ${reason.message}`),
        ...(outcome.evaluation?.errors ?? []),
      ];
      this.tracker.recordRetry();

      logInfo('Retrying subtask', { taskId: task.id, attempt, reason: retryReason });
      const delayMs = await this.retryPolicy.backoff(attempt);
      task.recordRetry({
        attempt,
        reason: retryReason,
        remediation: remediation.map((step) => step.action),
        delayMs,
      });
      attempt += 1;
    }
  }

  /** Router call with transport retries. Finalizes the task FAILED before throwing. */
  private async callRouter(task: Task, context: AttemptContext): Promise<unknown> {
    try {
      return await this.routerRetryPolicy.execute(() => {
        this.tracker.recordToolCall();
        return this.router.run(task, context);
      });
    } catch (error) {
      const message = getErrorMessage(error);
      logError('Router failed', { taskId: task.id, attempt: context.attempt, error: message });
      task.complete('FAILED', {
        agentStatus: 'FAIL',
        qualityWarnings: [EngineWarnings.routerError],
        attempts: context.attempt,
        answer: '',
        citations: [],
        failReasons: [],
        evaluationErrors: [message],
      });
      throw new RouterError(task.id, context.attempt, toError(error));
    }
  }

  private async evaluateAttempt(raw: unknown): Promise<AttemptOutcome> {
    const parsed = parseAgentResult(raw);
    if (parsed.malformed) {
      logWarning('Router returned a malformed agent result', { issues: parsed.issues });
    } else if (parsed.issues.length > 0) {
      logWarning('Router returned invalid advisory fields; dropped them', { issues: parsed.issues });
    }
    const result = parsed.result;
    const resolution = resolveStatus(result, this.validator);
    const warnings = [...parsed.warnings, ...resolution.warnings];

    let verify: VerifyResult | undefined;
    if (this.verifier) {
      verify =
        resolution.status === 'FAIL'
          ? this.verifier.unverifiedResult()
          : this.verifier.verify(
              result.answer,
              resolution.validCitations.map(toGateCitation),
              result.meta.claims,
              result.meta.evidence,
            );
    }

    let evaluation: EvaluationResult | undefined;
    if (this.evaluator) {
      try {
        evaluation = await this.evaluator(result);
      } catch (error) {
        logWarning('Evaluator threw; treating as failed evaluation', { error: getErrorMessage(error) });
        evaluation = { ok: false, errors: [getErrorMessage(error)] };
      }
    }

    return {
      result,
      proposedStatus: parsed.proposedStatus,
      resolution: resolution.status,
      warnings,
      citations: resolution.validCitations,
      verify,
      evaluation,
      failReasons: verify ? [...verify.failReasons] : [],
    };
  }

  /**
   * Returns the retry reason, or `undefined` to stop. May add budget warnings
   * to `outcome`.
   */
  private decideRetry(task: Task, outcome: AttemptOutcome, attempt: number): string | undefined {
    const gateCodes = failingCodes(outcome.verify);
    const terminal = gateCodes.filter(isTerminalFailCode);
    if (terminal.length > 0) {
      logDebug('Terminal fail codes; not retrying', { taskId: task.id, codes: terminal });
      return undefined;
    }

    let reason: string | undefined;
    if (outcome.evaluation && this.retryPolicy.decide(outcome.evaluation, attempt).shouldRetry) {
      reason = 'validation_failed';
    } else if (gateCodes.length > 0 && this.retryManager.shouldRetry(gateCodes, attempt)) {
      reason = 'quality_gate_failed';
    }
    if (!reason) return undefined;

    const budget = decideBudget(this.budget, this.tracker);
    if (!budget.allowRetry) {
      this.tracker.recordDegrade(EngineWarnings.budgetRetryBlocked);
      outcome.warnings.push(EngineWarnings.budgetRetryBlocked);
      outcome.failReasons.push({
        code: FailCodes.BUDGET_EXCEEDED,
        message: `Retry blocked by budget (${budget.degradeReason ?? 'exhausted'}).`,
        severity: 'warning',
      });
      logInfo('Budget blocked retry', { taskId: task.id, reason: budget.degradeReason });
      return undefined;
    }
    return reason;
  }

  private finish(task: Task, outcome: AttemptOutcome, attempts: number): SubtaskOutcome {
    const passed =
      outcome.resolution !== 'FAIL' &&
      (outcome.evaluation?.ok ?? true) &&
      (outcome.verify?.gatePassed ?? true);

    const evaluationErrors = outcome.evaluation?.errors ?? [];
    // a FAILED task always says why
    if (!passed && outcome.warnings.length === 0 && outcome.failReasons.length === 0 && evaluationErrors.length === 0) {
      outcome.warnings.push(EngineWarnings.evaluationFailed);
    }

    const payload: CompletePayload = {
      agentStatus: outcome.resolution,
      proposedStatus: outcome.proposedStatus,
      qualityWarnings: outcome.warnings,
      attempts,
      answer: outcome.result.answer,
      citations: outcome.citations,
      failReasons: outcome.failReasons,
      evaluationErrors,
    };
    task.complete(passed ? 'DONE' : 'FAILED', payload);

    logDebug('Subtask complete', { taskId: task.id, status: task.status, resolution: outcome.resolution, attempts });
    return {
      task,
      resolution: outcome.resolution,
      attempts,
      verify: outcome.verify,
      evaluation: outcome.evaluation,
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function toGateCitation(citation: ValidatedCitation): GateCitation {
  return { chunkId: citation.chunkId, locator: parseLocator(citation.locator) };
}

function failingCodes(verify: VerifyResult | undefined): FailCode[] {
  if (!verify || verify.gatePassed) return [];
  const codes = new Set<FailCode>();
  for (const reason of verify.failReasons) {
    if (reason.severity === 'error') codes.add(reason.code);
  }
  return [...codes];
}

/** Rough badness of an attempt, used to mark later attempts as improved. */
function countProblems(outcome: AttemptOutcome): number {
  const resolutionPenalty = outcome.resolution === 'FAIL' ? 2 : outcome.resolution === 'PARTIAL' ? 1 : 0;
  const gateErrors = outcome.failReasons.filter((reason) => reason.severity === 'error').length;
  const evaluationErrors = outcome.evaluation && !outcome.evaluation.ok ? Math.max(1, outcome.evaluation.errors.length) : 0;
  return resolutionPenalty + gateErrors + evaluationErrors;
}
