/**
 * @fileoverview Pattern rules for the quality gate.
 *
 * A rule is a (pattern, code, severity) tuple. Rules are compiled once when a
 * verifier is constructed and evaluated in list order.
 */

import type { Severity } from '../types.js';
import { isFailCode, type FailCode } from './fail_codes.js';
import { ValidationError } from '../core/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export interface QualityRuleSpec {
  /** Stable identifier, used in messages and tests */
  id: string;
  /** Regular expression source */
  pattern: string;
  /** Extra flags; `g` and `u` are always added */
  flags?: string;
  code: FailCode;
  severity: Severity;
}

export interface CompiledQualityRule {
  readonly id: string;
  readonly regex: RegExp;
  readonly code: FailCode;
  readonly severity: Severity;
}

export interface RuleMatch {
  ruleId: string;
  code: FailCode;
  severity: Severity;
  text: string;
}

// ============================================================================
// DEFAULT RULES
// ============================================================================

/** Over-assertive phrasing. Advisory: the answer should hedge. */
export const ASSERTION_RULES: readonly QualityRuleSpec[] = [
  { id: 'en.is_definitely', pattern: '\\bis\\s+definitely\\b', flags: 'i', code: 'ASSERTION_DANGER', severity: 'warning' },
  { id: 'en.will_certainly', pattern: '\\bwill\\s+certainly\\b', flags: 'i', code: 'ASSERTION_DANGER', severity: 'warning' },
  { id: 'en.proven_fact', pattern: '\\bproven\\s+fact\\b', flags: 'i', code: 'ASSERTION_DANGER', severity: 'warning' },
  { id: 'en.absolutely', pattern: '\\babsolutely\\b', flags: 'i', code: 'ASSERTION_DANGER', severity: 'warning' },
  { id: 'en.undoubtedly', pattern: '\\bundoubtedly\\b', flags: 'i', code: 'ASSERTION_DANGER', severity: 'warning' },
  { id: 'ja.kakujitsu', pattern: '確実に', code: 'ASSERTION_DANGER', severity: 'warning' },
  { id: 'ja.machigainaku', pattern: '間違いなく', code: 'ASSERTION_DANGER', severity: 'warning' },
  { id: 'ja.zettai', pattern: '絶対に', code: 'ASSERTION_DANGER', severity: 'warning' },
];

/** Personal data. Always blocking. */
export const PII_RULES: readonly QualityRuleSpec[] = [
  { id: 'pii.ssn', pattern: '\\b\\d{3}-\\d{2}-\\d{4}\\b', code: 'PII_DETECTED', severity: 'error' },
  {
    id: 'pii.email',
    pattern: '\\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\\.[A-Za-z]{2,}\\b',
    code: 'PII_DETECTED',
    severity: 'error',
  },
  { id: 'pii.phone', pattern: '\\b\\d{3}-\\d{3}-\\d{4}\\b', code: 'PII_DETECTED', severity: 'error' },
];

export const DEFAULT_QUALITY_RULES: readonly QualityRuleSpec[] = [...ASSERTION_RULES, ...PII_RULES];

// ============================================================================
// COMPILATION
// ============================================================================

function mergeFlags(flags: string | undefined): string {
  const set = new Set(`${flags ?? ''}gu`.split(''));
  return Array.from(set).join('');
}

export function compileRules(specs: readonly QualityRuleSpec[]): CompiledQualityRule[] {
  const seen = new Set<string>();
  return specs.map((spec) => {
    if (seen.has(spec.id)) {
      throw new ValidationError('rules.id', 'unique rule ids', spec.id);
    }
    seen.add(spec.id);
    if (!isFailCode(spec.code)) {
      throw new ValidationError(`rules.${spec.id}.code`, 'a known fail code', String(spec.code));
    }
    let regex: RegExp;
    try {
      regex = new RegExp(spec.pattern, mergeFlags(spec.flags));
    } catch (error) {
      throw new ValidationError(
        `rules.${spec.id}.pattern`,
        'a valid regular expression',
        error instanceof Error ? error.message : String(error),
      );
    }
    return { id: spec.id, regex, code: spec.code, severity: spec.severity };
  });
}

/**
 * Every match of every rule, in rule order then position order.
 */
export function scanRules(text: string, rules: readonly CompiledQualityRule[]): RuleMatch[] {
  const matches: RuleMatch[] = [];
  if (!text) return matches;
  for (const rule of rules) {
    for (const match of text.matchAll(rule.regex)) {
      matches.push({ ruleId: rule.id, code: rule.code, severity: rule.severity, text: match[0] });
    }
  }
  return matches;
}
