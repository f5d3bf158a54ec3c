/**
 * @fileoverview Quality gate verifier.
 *
 * Turns an answer, its validated citations and optional claim/evidence sets
 * into a closed list of FailReasons and a pass/fail decision. The decision is
 * derived from severities alone: any `error` fails the gate, `warning`s never do.
 *
 * Severities are policy. Over-assertive language is a warning (the answer
 * should hedge), personal data is always an error.
 *
 * @packageDocumentation
 */

import type {
  Claim,
  EvidenceLink,
  FailReason,
  GateCitation,
  StructuredLocator,
  VerifyMetrics,
  VerifyResult,
} from '../types.js';
import { FailCodes, type FailCode } from './fail_codes.js';
import {
  compileRules,
  DEFAULT_QUALITY_RULES,
  scanRules,
  type CompiledQualityRule,
  type QualityRuleSpec,
  type RuleMatch,
} from './rules.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export type LocatorField = 'section' | 'page' | 'paragraph' | 'line';

export interface QualityGateConfig {
  requireCitations: boolean;
  requireLocators: boolean;
  /** 0..1; claims covered by evidence over all claims */
  minEvidenceCoverage: number;
  /** A citation's locator must carry every one of these */
  requiredLocatorFields: LocatorField[];
}

export interface QualityGateOptions extends Partial<QualityGateConfig> {
  rules?: readonly QualityRuleSpec[];
}

export const DEFAULT_QUALITY_GATE_CONFIG: QualityGateConfig = {
  requireCitations: true,
  requireLocators: true,
  minEvidenceCoverage: 0.5,
  requiredLocatorFields: ['section'],
};

const MAX_QUOTED_MATCHES = 3;

// ============================================================================
// VERIFIER
// ============================================================================

export class QualityGateVerifier {
  readonly config: QualityGateConfig;
  private readonly rules: CompiledQualityRule[];

  constructor(options: QualityGateOptions = {}) {
    this.config = {
      requireCitations: options.requireCitations ?? DEFAULT_QUALITY_GATE_CONFIG.requireCitations,
      requireLocators: options.requireLocators ?? DEFAULT_QUALITY_GATE_CONFIG.requireLocators,
      minEvidenceCoverage: options.minEvidenceCoverage ?? DEFAULT_QUALITY_GATE_CONFIG.minEvidenceCoverage,
      requiredLocatorFields: options.requiredLocatorFields ?? [...DEFAULT_QUALITY_GATE_CONFIG.requiredLocatorFields],
    };
    this.rules = compileRules(options.rules ?? DEFAULT_QUALITY_RULES);
  }

  verify(
    answer: string,
    citations: readonly GateCitation[],
    claims?: readonly Claim[],
    evidence?: readonly EvidenceLink[],
  ): VerifyResult {
    const failReasons: FailReason[] = [];
    const metrics: VerifyMetrics = {};

    if (this.config.requireCitations && citations.length === 0) {
      failReasons.push({
        code: FailCodes.CITATION_MISSING,
        message: 'Citations are required but none were provided.',
        severity: 'error',
      });
    }

    metrics.citationCount = citations.length;

    if (this.config.requireLocators && citations.length > 0) {
      const missing = citations.filter((citation) => !this.hasRequiredLocator(citation.locator)).length;
      if (missing > 0) {
        failReasons.push({
          code: FailCodes.LOCATOR_MISSING,
          message: `${missing} citation(s) missing locator information (${this.config.requiredLocatorFields.join(', ')}).`,
          severity: 'error',
        });
      }
      metrics.locatorCoverage = 1 - missing / citations.length;
    }

    const matches = scanRules(answer, this.rules);
    failReasons.push(...summarizeMatches(matches));
    metrics.assertionCount = countByCode(matches, FailCodes.ASSERTION_DANGER);
    metrics.piiCount = countByCode(matches, FailCodes.PII_DETECTED);

    if (claims && claims.length > 0 && evidence && evidence.length > 0) {
      const coverage = computeEvidenceCoverage(claims, evidence);
      metrics.evidenceCoverage = coverage;
      if (coverage < this.config.minEvidenceCoverage) {
        failReasons.push({
          code: FailCodes.EVIDENCE_WEAK,
          message: `Evidence coverage ${coverage.toFixed(2)} below threshold ${this.config.minEvidenceCoverage}.`,
          severity: 'error',
        });
      }
    }

    return {
      gatePassed: !failReasons.some((reason) => reason.severity === 'error'),
      failReasons,
      metrics,
      verified: true,
    };
  }

  /** Result for a run where the gate was bypassed. Always a hard failure. */
  unverifiedResult(): VerifyResult {
    return createUnverifiedResult();
  }

  private hasRequiredLocator(locator: StructuredLocator | undefined): boolean {
    if (!locator) return false;
    return this.config.requiredLocatorFields.every((field) => {
      const value = locator[field];
      return typeof value === 'string' ? value.trim().length > 0 : value !== undefined;
    });
  }
}

export function createUnverifiedResult(): VerifyResult {
  return {
    gatePassed: false,
    failReasons: [
      {
        code: FailCodes.VERIFY_NOT_RUN,
        message: 'Quality gate verification was not executed.',
        severity: 'error',
      },
    ],
    metrics: {},
    verified: false,
  };
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * One FailReason per fail code, in first-match order. A code's severity is the
 * most severe among its matching rules.
 */
function summarizeMatches(matches: readonly RuleMatch[]): FailReason[] {
  const byCode = new Map<FailCode, RuleMatch[]>();
  for (const match of matches) {
    const bucket = byCode.get(match.code);
    if (bucket) {
      bucket.push(match);
    } else {
      byCode.set(match.code, [match]);
    }
  }

  const reasons: FailReason[] = [];
  for (const [code, bucket] of byCode) {
    const severity = bucket.some((match) => match.severity === 'error') ? 'error' : 'warning';
    reasons.push({ code, severity, message: describeMatches(code, bucket) });
  }
  return reasons;
}

function describeMatches(code: FailCode, matches: readonly RuleMatch[]): string {
  if (code === FailCodes.PII_DETECTED) {
    // never echo the personal data itself
    return `PII detected in answer: ${matches.length} match(es).`;
  }
  if (code === FailCodes.ASSERTION_DANGER) {
    const quoted = matches.slice(0, MAX_QUOTED_MATCHES).map((match) => `"${match.text}"`);
    return `Over-assertive language detected: ${quoted.join(', ')}. Consider hedging.`;
  }
  return `${matches.length} match(es) for ${code}.`;
}

function countByCode(matches: readonly RuleMatch[], code: FailCode): number {
  return matches.filter((match) => match.code === code).length;
}

/**
 * Distinct claim ids of `claims` referenced by evidence, over `claims.length`.
 * A repeated claim counts once in the numerator and every time in the
 * denominator. Links to claim ids outside `claims` are ignored.
 */
export function computeEvidenceCoverage(claims: readonly Claim[], evidence: readonly EvidenceLink[]): number {
  if (claims.length === 0) return 0;
  const claimIds = new Set(claims.map((claim) => claim.claimId));
  const covered = new Set<string>();
  for (const link of evidence) {
    if (link.claimId && claimIds.has(link.claimId)) {
      covered.add(link.claimId);
    }
  }
  return covered.size / claims.length;
}

// ============================================================================
// REPORTING
// ============================================================================

export function formatFailReasons(reasons: readonly FailReason[]): string {
  if (reasons.length === 0) return 'No issues detected.';
  const lines = ['Quality gate issues:'];
  for (const reason of reasons) {
    const marker = reason.severity === 'error' ? 'ERROR' : 'WARN';
    lines.push(`  ${marker} [${reason.code}] ${reason.message}`);
  }
  return lines.join('\n');
}

export interface EvalSummary {
  run_id: string;
  status: 'pass' | 'fail';
  gate_passed: boolean;
  fail_reasons: Array<{ code: FailCode; msg: string; severity: FailReason['severity'] }>;
  metrics: {
    citation_count?: number;
    locator_coverage?: number;
    assertion_count?: number;
    pii_count?: number;
    evidence_coverage?: number;
  };
  verified: boolean;
}

/** Snake-case shape written to `eval_summary.json` by reporting tools. */
export function toEvalSummary(result: VerifyResult, runId: string): EvalSummary {
  const metrics: EvalSummary['metrics'] = {};
  if (result.metrics.citationCount !== undefined) metrics.citation_count = result.metrics.citationCount;
  if (result.metrics.locatorCoverage !== undefined) metrics.locator_coverage = result.metrics.locatorCoverage;
  if (result.metrics.assertionCount !== undefined) metrics.assertion_count = result.metrics.assertionCount;
  if (result.metrics.piiCount !== undefined) metrics.pii_count = result.metrics.piiCount;
  if (result.metrics.evidenceCoverage !== undefined) metrics.evidence_coverage = result.metrics.evidenceCoverage;

  return {
    run_id: runId,
    status: result.gatePassed ? 'pass' : 'fail',
    gate_passed: result.gatePassed,
    fail_reasons: result.failReasons.map((reason) => ({
      code: reason.code,
      msg: reason.message,
      severity: reason.severity,
    })),
    metrics,
    verified: result.verified,
  };
}

export interface MetricThresholds {
  minCitationCount: number;
  minEvidenceCoverage: number;
  minLocatorCoverage: number;
  minFormatScore: number;
  minCitationScore: number;
}

export const DEFAULT_METRIC_THRESHOLDS: MetricThresholds = {
  minCitationCount: 1,
  minEvidenceCoverage: 0.5,
  minLocatorCoverage: 0.8,
  minFormatScore: 0.7,
  minCitationScore: 0.6,
};

/** Gate metrics plus the judge scores, when a judge ran. */
export interface ReportMetrics extends VerifyMetrics {
  formatScore?: number;
  citationScore?: number;
}

export interface ThresholdCheck {
  passed: boolean;
  /** One entry per violated threshold, e.g. `citation_count=0 < 1` */
  violations: string[];
}

/**
 * Compares recorded metrics against reporting thresholds. Metrics that were
 * not computed are skipped.
 */
export function checkMetricThresholds(
  metrics: ReportMetrics,
  thresholds: MetricThresholds = DEFAULT_METRIC_THRESHOLDS,
): ThresholdCheck {
  const violations: string[] = [];
  if (metrics.citationCount !== undefined && metrics.citationCount < thresholds.minCitationCount) {
    violations.push(`citation_count=${metrics.citationCount} < ${thresholds.minCitationCount}`);
  }
  if (metrics.evidenceCoverage !== undefined && metrics.evidenceCoverage < thresholds.minEvidenceCoverage) {
    violations.push(`evidence_coverage=${metrics.evidenceCoverage.toFixed(2)} < ${thresholds.minEvidenceCoverage}`);
  }
  if (metrics.locatorCoverage !== undefined && metrics.locatorCoverage < thresholds.minLocatorCoverage) {
    violations.push(`locator_coverage=${metrics.locatorCoverage.toFixed(2)} < ${thresholds.minLocatorCoverage}`);
  }
  if (metrics.formatScore !== undefined && metrics.formatScore < thresholds.minFormatScore) {
    violations.push(`format_score=${metrics.formatScore.toFixed(2)} < ${thresholds.minFormatScore}`);
  }
  if (metrics.citationScore !== undefined && metrics.citationScore < thresholds.minCitationScore) {
    violations.push(`citation_score=${metrics.citationScore.toFixed(2)} < ${thresholds.minCitationScore}`);
  }
  return { passed: violations.length === 0, violations };
}
