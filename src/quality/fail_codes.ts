/**
 * @fileoverview Fail-code vocabulary.
 *
 * These identifiers are a wire contract shared with reporting and retry
 * tooling. Do not rename them.
 */

export const FAIL_CODES = [
  'CITATION_MISSING',
  'LOCATOR_MISSING',
  'EVIDENCE_WEAK',
  'ASSERTION_DANGER',
  'PII_DETECTED',
  'FETCH_FAIL',
  'INDEX_MISSING',
  'BUDGET_EXCEEDED',
  'VERIFY_NOT_RUN',
] as const;

export type FailCode = (typeof FAIL_CODES)[number];

export const FailCodes = {
  CITATION_MISSING: 'CITATION_MISSING',
  LOCATOR_MISSING: 'LOCATOR_MISSING',
  EVIDENCE_WEAK: 'EVIDENCE_WEAK',
  ASSERTION_DANGER: 'ASSERTION_DANGER',
  PII_DETECTED: 'PII_DETECTED',
  FETCH_FAIL: 'FETCH_FAIL',
  INDEX_MISSING: 'INDEX_MISSING',
  BUDGET_EXCEEDED: 'BUDGET_EXCEEDED',
  VERIFY_NOT_RUN: 'VERIFY_NOT_RUN',
} as const satisfies { [K in FailCode]: K };

// ============================================================================
// TAXONOMY
// ============================================================================

/**
 * - grounding: evidence-gathering remediation can fix it
 * - quality: a content rewrite can fix it
 * - safety: never retried
 * - infrastructure: surfaced to the caller as-is, never retried
 * - verification: the gate did not run at all
 */
export type FailCategory = 'grounding' | 'quality' | 'safety' | 'infrastructure' | 'verification';

export const FAIL_CODE_CATEGORY: Record<FailCode, FailCategory> = {
  CITATION_MISSING: 'grounding',
  LOCATOR_MISSING: 'grounding',
  EVIDENCE_WEAK: 'quality',
  ASSERTION_DANGER: 'quality',
  PII_DETECTED: 'safety',
  FETCH_FAIL: 'infrastructure',
  INDEX_MISSING: 'infrastructure',
  BUDGET_EXCEEDED: 'infrastructure',
  VERIFY_NOT_RUN: 'verification',
};

export function isFailCode(value: unknown): value is FailCode {
  return typeof value === 'string' && FAIL_CODES.some((code) => code === value);
}

export function getFailCategory(code: FailCode): FailCategory {
  return FAIL_CODE_CATEGORY[code];
}

/** Codes that end a retry loop no matter how much budget is left. */
export function isTerminalFailCode(code: FailCode): boolean {
  const category = FAIL_CODE_CATEGORY[code];
  return category === 'safety' || category === 'infrastructure';
}
