/**
 * @fileoverview Collaborator contracts for the execution engine.
 *
 * Routers, planners and evaluators live outside this package (LLM adapters,
 * literature search clients). Router output is parsed here before anything in
 * the engine reads it.
 */

import { z } from 'zod';
import type { AgentResult, EvaluationResult, ProposedStatus } from '../types.js';
import type { RemediationStep } from '../retry/retry_manager.js';
import type { Task } from './task.js';

// ============================================================================
// COLLABORATORS
// ============================================================================

export interface AttemptContext {
  /** 1-based */
  attempt: number;
  /** Remediation derived from the previous attempt's fail codes */
  remediation: RemediationStep[];
  /** Quality warnings and fail messages from the previous attempt */
  previousWarnings: string[];
}

export interface Router {
  /** May resolve to anything; the engine parses the value as an AgentResult. */
  run(task: Task, context: AttemptContext): Promise<unknown>;
}

export interface Planner {
  plan(task: Task): Promise<Task[]> | Task[];
}

export type Evaluator = (result: AgentResult) => EvaluationResult | Promise<EvaluationResult>;

// ============================================================================
// AGENT RESULT PARSING
// ============================================================================

const CitationSchema = z.object({
  chunkId: z.string(),
  source: z.string().optional(),
  locator: z.string().optional(),
  quote: z.string().optional(),
});

const ProposedStatusSchema = z.enum(['success', 'partial', 'fail']);

const metaFields = {
  costUsd: z.number().finite().nonnegative(),
  latencyMs: z.number().finite().nonnegative(),
  model: z.string(),
  warnings: z.array(z.string()),
  claims: z.array(z.object({ claimId: z.string(), text: z.string() })),
  evidence: z.array(z.object({ claimId: z.string().optional(), chunkId: z.string().optional() })),
};

// Each meta field is advisory: an invalid one is dropped, not the result.
const AgentResultMetaSchema = z
  .object({
    costUsd: metaFields.costUsd.optional().catch(undefined),
    latencyMs: metaFields.latencyMs.optional().catch(undefined),
    model: metaFields.model.optional().catch(undefined),
    warnings: metaFields.warnings.optional().catch(undefined),
    claims: metaFields.claims.optional().catch(undefined),
    evidence: metaFields.evidence.optional().catch(undefined),
  })
  .catch({});

/**
 * Only `answer` and `citations` are load-bearing. A missing or unknown
 * `status` reads as `success`; the resolver decides the real status anyway.
 */
export const AgentResultSchema: z.ZodType<AgentResult, z.ZodTypeDef, unknown> = z.object({
  answer: z.string(),
  citations: z.array(CitationSchema).default([]),
  status: ProposedStatusSchema.catch('success'),
  meta: AgentResultMetaSchema,
});

/** Strict view of the advisory fields, used to report what the lenient parse dropped. */
const AdvisoryFieldsSchema = z.object({
  status: ProposedStatusSchema.optional(),
  meta: z.object(metaFields).partial().optional(),
});

export const MALFORMED_AGENT_RESULT = 'malformed_agent_result';

export const AgentResultWarnings = {
  malformed: MALFORMED_AGENT_RESULT,
  invalidStatus: 'invalid_proposed_status',
  invalidMeta: 'invalid_agent_meta',
} as const;

export interface ParsedAgentResult {
  result: AgentResult;
  /** The producer's own status; absent when it was invalid or the value was malformed */
  proposedStatus?: ProposedStatus;
  /** True when the value was unusable and `result` is the empty fallback */
  malformed: boolean;
  warnings: string[];
  issues: string[];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

/**
 * Parse raw router output. A value without a string `answer` or with a
 * malformed `citations` list becomes an empty `fail` result carrying
 * {@link MALFORMED_AGENT_RESULT}. Invalid advisory fields are dropped with a
 * warning.
 */
export function parseAgentResult(raw: unknown): ParsedAgentResult {
  const parsed = AgentResultSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      result: { answer: '', citations: [], status: 'fail', meta: {} },
      malformed: true,
      warnings: [AgentResultWarnings.malformed],
      issues: formatIssues(parsed.error),
    };
  }

  const advisory = AdvisoryFieldsSchema.safeParse(raw);
  if (advisory.success) {
    return { result: parsed.data, proposedStatus: parsed.data.status, malformed: false, warnings: [], issues: [] };
  }

  const badFields = new Set(advisory.error.issues.map((issue) => issue.path[0]));
  const warnings: string[] = [];
  if (badFields.has('status')) warnings.push(AgentResultWarnings.invalidStatus);
  if (badFields.has('meta')) warnings.push(AgentResultWarnings.invalidMeta);
  return {
    result: parsed.data,
    proposedStatus: badFields.has('status') ? undefined : parsed.data.status,
    malformed: false,
    warnings,
    issues: formatIssues(advisory.error),
  };
}
