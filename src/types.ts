/**
 * @fileoverview Shared domain types for the grounding engine.
 *
 * Producer-supplied data (agent results, citations) and engine-computed data
 * (validated citations, resolved statuses) are kept in separate types so an
 * untrusted value can never be mistaken for an authoritative one.
 */

import type { FailCode } from './quality/fail_codes.js';

// ============================================================================
// EVIDENCE
// ============================================================================

export interface Chunk {
  readonly chunkId: string;
  readonly source: string;
  readonly locator: string;
  readonly text: string;
}

/** Structured form of a chunk locator string such as `section:Results#page:5`. */
export interface StructuredLocator {
  section?: string;
  page?: number;
  paragraph?: number;
  line?: number;
  /** Remaining `key:value` segments (e.g. `pdf`, `url`, `file`) */
  extra: Record<string, string>;
}

// ============================================================================
// CITATIONS
// ============================================================================

/** A citation as an agent reports it. Everything except `chunkId` is ignored. */
export interface Citation {
  chunkId: string;
  source?: string;
  locator?: string;
  quote?: string;
}

/** A citation rebuilt from the evidence store. */
export interface ValidatedCitation {
  readonly chunkId: string;
  readonly source: string;
  readonly locator: string;
  readonly quote: string;
  /** Token-set overlap between the answer and the chunk text, 0..1 */
  readonly relevance: number;
}

/** Citation shape consumed by the quality gate. */
export interface GateCitation {
  chunkId: string;
  locator?: StructuredLocator;
}

// ============================================================================
// AGENT RESULTS
// ============================================================================

/** Status the producer claims for its own output. Advisory only. */
export type ProposedStatus = 'success' | 'partial' | 'fail';

/** Status computed by the engine from objective checks. */
export type ResolvedStatus = 'SUCCESS' | 'PARTIAL' | 'FAIL';

export interface Claim {
  claimId: string;
  text: string;
}

/** Links a piece of evidence (usually a chunk) to the claim it supports. */
export interface EvidenceLink {
  claimId?: string;
  chunkId?: string;
}

export interface AgentResultMeta {
  costUsd?: number;
  latencyMs?: number;
  model?: string;
  warnings?: string[];
  claims?: Claim[];
  evidence?: EvidenceLink[];
}

export interface AgentResult {
  answer: string;
  citations: Citation[];
  status: ProposedStatus;
  meta: AgentResultMeta;
}

export interface EvaluationResult {
  ok: boolean;
  errors: string[];
}

// ============================================================================
// QUALITY GATE
// ============================================================================

export type Severity = 'error' | 'warning';

export interface FailReason {
  code: FailCode;
  message: string;
  severity: Severity;
}

/** Empty when the gate was skipped. */
export interface VerifyMetrics {
  citationCount?: number;
  locatorCoverage?: number;
  assertionCount?: number;
  piiCount?: number;
  evidenceCoverage?: number;
}

export interface VerifyResult {
  gatePassed: boolean;
  failReasons: FailReason[];
  metrics: VerifyMetrics;
  /** False only when the gate itself was skipped */
  verified: boolean;
}
