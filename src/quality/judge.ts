/**
 * @fileoverview Two-part judge for agent results.
 *
 * The format score checks that the result carries an answer, citations,
 * claims and evidence links. The citation score is the share of claims backed
 * by at least one evidence link. Each has its own threshold; the judge passes
 * only when both do.
 */

import type { AgentResult, Claim, EvidenceLink } from '../types.js';
import type { Evaluator } from '../engine/contracts.js';

export interface JudgeOptions {
  /** 0..1, default 0.7 */
  formatThreshold?: number;
  /** 0..1, default 0.6 */
  citationThreshold?: number;
}

export interface JudgeResult {
  passed: boolean;
  formatScore: number;
  citationScore: number;
  /** Mean of the two scores */
  overallScore: number;
  issues: string[];
}

export const DEFAULT_FORMAT_THRESHOLD = 0.7;
export const DEFAULT_CITATION_THRESHOLD = 0.6;

// Format penalties in tenths, so scores stay exact decimals.
const FORMAT_PENALTIES = {
  answer: 3,
  citations: 3,
  claims: 2,
  evidence: 2,
} as const;

export class Judge {
  readonly formatThreshold: number;
  readonly citationThreshold: number;

  constructor(options: JudgeOptions = {}) {
    this.formatThreshold = options.formatThreshold ?? DEFAULT_FORMAT_THRESHOLD;
    this.citationThreshold = options.citationThreshold ?? DEFAULT_CITATION_THRESHOLD;
  }

  judge(result: AgentResult): JudgeResult {
    const claims = result.meta.claims ?? [];
    const evidence = result.meta.evidence ?? [];
    const issues: string[] = [];

    const formatScore = scoreFormat(result, claims, evidence);
    if (formatScore < this.formatThreshold) {
      issues.push(`Format score ${formatScore.toFixed(2)} below threshold ${this.formatThreshold}`);
    }

    const citationScore = scoreCitationCoherence(claims, evidence);
    if (citationScore < this.citationThreshold) {
      issues.push(`Citation coherence ${citationScore.toFixed(2)} below threshold ${this.citationThreshold}`);
    }

    return {
      passed: formatScore >= this.formatThreshold && citationScore >= this.citationThreshold,
      formatScore,
      citationScore,
      overallScore: (formatScore + citationScore) / 2,
      issues,
    };
  }
}

/** An {@link Evaluator} that fails results the judge rejects, listing its issues. */
export function createJudgeEvaluator(options: JudgeOptions = {}): Evaluator {
  const judge = new Judge(options);
  return (result) => {
    const verdict = judge.judge(result);
    return { ok: verdict.passed, errors: verdict.issues };
  };
}

function scoreFormat(result: AgentResult, claims: readonly Claim[], evidence: readonly EvidenceLink[]): number {
  let penalty = 0;
  if (!result.answer.trim()) penalty += FORMAT_PENALTIES.answer;
  if (result.citations.length === 0) penalty += FORMAT_PENALTIES.citations;
  if (claims.length === 0) penalty += FORMAT_PENALTIES.claims;
  if (evidence.length === 0) penalty += FORMAT_PENALTIES.evidence;
  return Math.max(0, 10 - penalty) / 10;
}

/** Claims whose id appears in some evidence link, over all claims. Zero without claims. */
function scoreCitationCoherence(claims: readonly Claim[], evidence: readonly EvidenceLink[]): number {
  if (claims.length === 0) return 0;
  const backed = new Set<string>();
  for (const link of evidence) {
    if (link.claimId) backed.add(link.claimId);
  }
  return claims.filter((claim) => backed.has(claim.claimId)).length / claims.length;
}
