/**
 * @fileoverview Citation validation against the evidence store.
 *
 * Agent-reported citations are untrusted. Only `chunkId` is read from them;
 * source, locator and quote are rebuilt from the store. Citations that do not
 * resolve, or whose chunk shares too little vocabulary with the answer, are
 * dropped with a warning. Validation never throws for bad input.
 */

import type { Citation, ValidatedCitation } from '../types.js';
import type { EvidenceStore } from '../evidence/evidence_store.js';
import { DEFAULT_QUOTE_LENGTH } from '../evidence/evidence_store.js';
import { DEFAULT_MIN_TOKEN_LENGTH, jaccard, tokenize } from '../evidence/tokenize.js';

export interface CitationValidatorOptions {
  /** 0..1 Jaccard overlap between answer and chunk tokens */
  minRelevance?: number;
  minTokenLength?: number;
  quoteMaxLength?: number;
}

export interface CitationValidationResult {
  valid: ValidatedCitation[];
  warnings: string[];
}

/**
 * Jaccard shrinks with chunk length: an answer fully contained in a chunk
 * scores `|answer| / |chunk|`. 0.02 keeps paragraph-sized chunks (up to ~50x
 * the answer's vocabulary) while still dropping chunks with no shared terms.
 */
export const DEFAULT_MIN_RELEVANCE = 0.02;

export const CitationWarnings = {
  missingChunkId: 'citation_missing_chunk_id',
  notInStore: (chunkId: string) => `chunk_not_in_evidence_store:${chunkId}`,
  notRelevant: (chunkId: string) => `citation_not_relevant:${chunkId}`,
  duplicate: (chunkId: string) => `citation_duplicate:${chunkId}`,
} as const;

export class CitationValidator {
  readonly minRelevance: number;
  readonly minTokenLength: number;
  readonly quoteMaxLength: number;

  constructor(
    private readonly store: EvidenceStore,
    options: CitationValidatorOptions = {},
  ) {
    this.minRelevance = options.minRelevance ?? DEFAULT_MIN_RELEVANCE;
    this.minTokenLength = options.minTokenLength ?? DEFAULT_MIN_TOKEN_LENGTH;
    this.quoteMaxLength = options.quoteMaxLength ?? DEFAULT_QUOTE_LENGTH;
  }

  validate(answer: string, citations: readonly Citation[]): CitationValidationResult {
    const valid: ValidatedCitation[] = [];
    const warnings: string[] = [];
    const seen = new Set<string>();
    const answerTokens = tokenize(answer, this.minTokenLength);

    for (const citation of citations) {
      const chunkId = citation.chunkId.trim();
      if (!chunkId) {
        warnings.push(CitationWarnings.missingChunkId);
        continue;
      }

      const chunk = this.store.getChunk(chunkId);
      if (!chunk) {
        warnings.push(CitationWarnings.notInStore(chunkId));
        continue;
      }

      if (seen.has(chunkId)) {
        warnings.push(CitationWarnings.duplicate(chunkId));
        continue;
      }

      const relevance = jaccard(answerTokens, tokenize(chunk.text, this.minTokenLength));
      if (relevance < this.minRelevance) {
        warnings.push(CitationWarnings.notRelevant(chunkId));
        continue;
      }

      seen.add(chunkId);
      valid.push({
        chunkId,
        source: chunk.source,
        locator: chunk.locator,
        quote: this.store.getQuote(chunkId, this.quoteMaxLength),
        relevance,
      });
    }

    return { valid, warnings };
  }
}
