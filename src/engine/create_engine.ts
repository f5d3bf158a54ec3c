import { CitationValidator } from '../citations/citation_validator.js';
import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from '../config/engine_config.js';
import type { EvidenceStore } from '../evidence/evidence_store.js';
import { createJudgeEvaluator } from '../quality/judge.js';
import { QualityGateVerifier, type QualityGateOptions } from '../quality/quality_gate.js';
import { RetryManager } from '../retry/retry_manager.js';
import { RetryPolicy } from '../retry/retry_policy.js';
import type { Evaluator, Planner, Router } from './contracts.js';
import { ExecutionEngine } from './execution_engine.js';

export interface CreateEngineOptions {
  planner: Planner;
  router: Router;
  store: EvidenceStore;
  /** Takes precedence over the judge enabled in config */
  evaluator?: Evaluator;
  config?: EngineConfigInput;
  /** Replaces the default rule list of the quality gate */
  rules?: QualityGateOptions['rules'];
  /** Backoff sleep for both retry policies */
  sleep?: (ms: number) => Promise<void>;
}

export interface CreatedEngine {
  engine: ExecutionEngine;
  config: EngineConfig;
}

/**
 * Build an engine and all of its collaborators from one config.
 *
 * @throws ConfigurationError when `config` does not validate
 */
export function createEngine(options: CreateEngineOptions): CreatedEngine {
  const config = resolveEngineConfig(options.config ?? {});

  const validator = new CitationValidator(options.store, {
    minRelevance: config.relevance.minRelevance,
    minTokenLength: config.relevance.minTokenLength,
    quoteMaxLength: config.quoteMaxLength,
  });

  const verifier = config.gate.enabled
    ? new QualityGateVerifier({
        requireCitations: config.gate.requireCitations,
        requireLocators: config.gate.requireLocators,
        minEvidenceCoverage: config.gate.minEvidenceCoverage,
        requiredLocatorFields: config.gate.requiredLocatorFields,
        rules: options.rules,
      })
    : undefined;

  const evaluator =
    options.evaluator ??
    (config.judge.enabled
      ? createJudgeEvaluator({
          formatThreshold: config.judge.formatThreshold,
          citationThreshold: config.judge.citationThreshold,
        })
      : undefined);

  const engine = new ExecutionEngine({
    planner: options.planner,
    router: options.router,
    store: options.store,
    validator,
    verifier,
    evaluator,
    retryPolicy: new RetryPolicy({ ...config.retry, sleep: options.sleep, name: 'evaluation' }),
    routerRetryPolicy: new RetryPolicy({ ...config.routerRetry, sleep: options.sleep, name: 'router' }),
    retryManager: new RetryManager(config.retryManager),
    budget: config.budget,
    haltOnFailure: config.haltOnFailure,
  });

  return { engine, config };
}
