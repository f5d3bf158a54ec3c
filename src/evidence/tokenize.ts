/**
 * @fileoverview Tokenization and token-set overlap used for citation relevance.
 *
 * Text is NFKC-normalized and lowercased, then split into runs of Unicode
 * letters, numbers and underscores. Scripts written without spaces (CJK)
 * therefore yield one token per run.
 */

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;

export const DEFAULT_MIN_TOKEN_LENGTH = 2;

export function tokenize(text: string, minTokenLength = DEFAULT_MIN_TOKEN_LENGTH): Set<string> {
  const tokens = new Set<string>();
  if (!text) return tokens;
  const normalized = text.normalize('NFKC').toLowerCase();
  for (const match of normalized.matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    if (token.length >= minTokenLength) {
      tokens.add(token);
    }
  }
  return tokens;
}

/**
 * Jaccard index `|A ∩ B| / |A ∪ B|`. Zero when either set is empty.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  for (const token of small) {
    if (large.has(token)) shared += 1;
  }
  return shared / (a.size + b.size - shared);
}

export function tokenOverlap(left: string, right: string, minTokenLength = DEFAULT_MIN_TOKEN_LENGTH): number {
  return jaccard(tokenize(left, minTokenLength), tokenize(right, minTokenLength));
}
