/**
 * @fileoverview Authoritative status for an agent result.
 *
 * The producer's own status is advisory. The resolved status is computed from
 * the answer and the citations that survive validation:
 *
 * 1. empty answer -> FAIL (`empty_answer`), nothing else is checked
 * 2. no valid citation -> PARTIAL with the validator's warnings,
 *    or `no_valid_citations` when none were supplied
 * 3. otherwise SUCCESS
 *
 * A producer that reports `fail` for output that passed (1) is overruled to
 * PARTIAL with `agent_reported_fail_but_output_valid`.
 */

import type { CitationValidator } from '../citations/citation_validator.js';
import type { AgentResult, ResolvedStatus, ValidatedCitation } from '../types.js';

export const StatusWarnings = {
  emptyAnswer: 'empty_answer',
  noValidCitations: 'no_valid_citations',
  agentReportedFail: 'agent_reported_fail_but_output_valid',
} as const;

export interface StatusResolution {
  status: ResolvedStatus;
  warnings: string[];
  validCitations: ValidatedCitation[];
}

export function resolveStatus(result: AgentResult, validator: CitationValidator): StatusResolution {
  if (!result.answer.trim()) {
    return { status: 'FAIL', warnings: [StatusWarnings.emptyAnswer], validCitations: [] };
  }

  const { valid, warnings } = validator.validate(result.answer, result.citations);
  const resolved: StatusResolution =
    valid.length === 0
      ? {
          status: 'PARTIAL',
          warnings: result.citations.length === 0 ? [StatusWarnings.noValidCitations] : warnings,
          validCitations: [],
        }
      : { status: 'SUCCESS', warnings, validCitations: valid };

  if (result.status === 'fail') {
    return {
      ...resolved,
      status: 'PARTIAL',
      warnings: [...resolved.warnings, StatusWarnings.agentReportedFail],
    };
  }
  return resolved;
}
