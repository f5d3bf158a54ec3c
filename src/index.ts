/**
 * @fileoverview citegate - grounding and quality-gate execution engine
 *
 * Validates agent answers against an append-only evidence store, classifies
 * failures into a fixed fail-code vocabulary, and drives a bounded retry loop.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createEngine, EvidenceStore, Task } from 'citegate';
 *
 * const store = new EvidenceStore();
 * const chunkId = store.addChunk('cd73.pdf', 'section:Results#page:5', 'CD73 is expressed on regulatory T cells.');
 *
 * const { engine } = createEngine({
 *   store,
 *   planner: { plan: (task) => [task] },
 *   router: { run: async (task, context) => callAgent(task, context) },
 *   config: { retryManager: { maxRetries: 2 } },
 * });
 *
 * const report = await engine.run(
 *   new Task({ title: 'Survey', inputs: { category: 'paper_survey', query: 'CD73 expression' } }),
 * );
 * ```
 *
 * @packageDocumentation
 */

// Types
export type {
  AgentResult,
  AgentResultMeta,
  Chunk,
  Citation,
  Claim,
  EvaluationResult,
  EvidenceLink,
  FailReason,
  GateCitation,
  ProposedStatus,
  ResolvedStatus,
  Severity,
  StructuredLocator,
  ValidatedCitation,
  VerifyMetrics,
  VerifyResult,
} from './types.js';

// Evidence
export { EvidenceStore, computeChunkId, clipQuote, CHUNK_ID_PREFIX, DEFAULT_QUOTE_LENGTH } from './evidence/evidence_store.js';
export { tokenize, jaccard, tokenOverlap, DEFAULT_MIN_TOKEN_LENGTH } from './evidence/tokenize.js';
export { SqliteChunkArchive } from './evidence/chunk_archive.js';

// Citations
export { parseLocator, formatLocator } from './citations/locator.js';
export {
  CitationValidator,
  CitationWarnings,
  DEFAULT_MIN_RELEVANCE,
  type CitationValidatorOptions,
  type CitationValidationResult,
} from './citations/citation_validator.js';

// Quality gate
export {
  FAIL_CODES,
  FailCodes,
  FAIL_CODE_CATEGORY,
  isFailCode,
  getFailCategory,
  isTerminalFailCode,
  type FailCode,
  type FailCategory,
} from './quality/fail_codes.js';
export {
  ASSERTION_RULES,
  PII_RULES,
  DEFAULT_QUALITY_RULES,
  compileRules,
  scanRules,
  type QualityRuleSpec,
  type CompiledQualityRule,
  type RuleMatch,
} from './quality/rules.js';
export {
  QualityGateVerifier,
  DEFAULT_QUALITY_GATE_CONFIG,
  DEFAULT_METRIC_THRESHOLDS,
  createUnverifiedResult,
  computeEvidenceCoverage,
  formatFailReasons,
  toEvalSummary,
  checkMetricThresholds,
  type QualityGateConfig,
  type QualityGateOptions,
  type LocatorField,
  type EvalSummary,
  type MetricThresholds,
  type ThresholdCheck,
  type ReportMetrics,
} from './quality/quality_gate.js';
export {
  Judge,
  createJudgeEvaluator,
  DEFAULT_FORMAT_THRESHOLD,
  DEFAULT_CITATION_THRESHOLD,
  type JudgeOptions,
  type JudgeResult,
} from './quality/judge.js';

// Retry
export {
  RetryPolicy,
  DEFAULT_RETRY_POLICY,
  type RetryPolicyOptions,
  type RetryDecision,
  type RetryDecisionReason,
} from './retry/retry_policy.js';
export {
  RetryManager,
  RETRY_STRATEGIES,
  DEFAULT_RETRY_MANAGER,
  type RetryAttempt,
  type RetryStrategy,
  type RemediationAction,
  type RemediationStep,
  type RetrySummary,
  type RetryManagerOptions,
} from './retry/retry_manager.js';
export {
  BudgetTracker,
  decideBudget,
  DEFAULT_BUDGET,
  type BudgetSpec,
  type BudgetDecision,
  type BudgetSummary,
} from './retry/budget.js';

// Engine
export {
  Task,
  TaskInputsSchema,
  canTransition,
  isTerminalStatus,
  describeInputs,
  type TaskInit,
  type TaskInputs,
  type TaskCategory,
  type TaskStatus,
  type TaskHistoryEvent,
  type CompletePayload,
  type RetryPayload,
  type BlockedPayload,
} from './engine/task.js';
export {
  AgentResultSchema,
  MALFORMED_AGENT_RESULT,
  AgentResultWarnings,
  parseAgentResult,
  type AttemptContext,
  type Router,
  type Planner,
  type Evaluator,
  type ParsedAgentResult,
} from './engine/contracts.js';
export { resolveStatus, StatusWarnings, type StatusResolution } from './engine/status_resolver.js';
export {
  ExecutionEngine,
  EngineWarnings,
  type ExecutionEngineOptions,
  type EngineRunReport,
  type SubtaskOutcome,
} from './engine/execution_engine.js';
export { createEngine, type CreateEngineOptions, type CreatedEngine } from './engine/create_engine.js';

// Configuration
export {
  EngineConfigSchema,
  resolveEngineConfig,
  loadEngineConfig,
  SUPPORTED_CONFIG_EXTENSIONS,
  type EngineConfig,
  type EngineConfigInput,
} from './config/engine_config.js';

// Infrastructure
export {
  CitegateError,
  EvidenceStoreError,
  RouterError,
  PlannerError,
  TaskStateError,
  ExecutionError,
  ValidationError,
  ConfigurationError,
  isCitegateError,
  getErrorMessage,
  type ErrorJSON,
} from './core/errors.js';
export { Ok, Err, safeAsync, mapError, type Result } from './core/result.js';
export { setLogLevel, getLogLevel, LOG_LEVEL_ENV, type LogLevel } from './telemetry/logger.js';
