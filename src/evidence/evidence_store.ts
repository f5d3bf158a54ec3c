/**
 * @fileoverview Append-only, content-addressed registry of evidence chunks.
 *
 * A chunk id is derived from the chunk's content, so the same
 * `(source, locator, text)` tuple always maps to the same id and re-adding it
 * is a no-op. Chunks are never updated or removed.
 */

import { createHash } from 'node:crypto';
import type { Chunk } from '../types.js';
import { EvidenceStoreError, ValidationError } from '../core/errors.js';

export const CHUNK_ID_PREFIX = 'chunk_';
export const DEFAULT_QUOTE_LENGTH = 200;

const ELLIPSIS = '...';

export function computeChunkId(source: string, locator: string, text: string): string {
  const digest = createHash('sha256').update([source, locator, text].join('\u0000')).digest('hex');
  return `${CHUNK_ID_PREFIX}${digest.slice(0, 16)}`;
}

export class EvidenceStore {
  private readonly byId = new Map<string, Chunk>();
  private frozen = false;

  /**
   * Register a chunk and return its id. Identical tuples return the existing id.
   *
   * @throws ValidationError when `source` or `text` is empty
   * @throws EvidenceStoreError after {@link freeze}
   */
  addChunk(source: string, locator: string, text: string): string {
    if (this.frozen) {
      throw new EvidenceStoreError('add', 'store is frozen');
    }
    if (!source.trim()) {
      throw new ValidationError('source', 'non-empty string', JSON.stringify(source));
    }
    if (!text.trim()) {
      throw new ValidationError('text', 'non-empty string', JSON.stringify(text));
    }

    const chunkId = computeChunkId(source, locator, text);
    if (!this.byId.has(chunkId)) {
      this.byId.set(chunkId, Object.freeze({ chunkId, source, locator, text }));
    }
    return chunkId;
  }

  getChunk(chunkId: string): Chunk | undefined {
    return this.byId.get(chunkId);
  }

  hasChunk(chunkId: string): boolean {
    return this.byId.has(chunkId);
  }

  /** Display quote for a chunk, clipped to `maxLength` characters. `''` for unknown ids. */
  getQuote(chunkId: string, maxLength = DEFAULT_QUOTE_LENGTH): string {
    const chunk = this.byId.get(chunkId);
    if (!chunk) return '';
    return clipQuote(chunk.text, maxLength);
  }

  /** Reject further additions. Reads are unaffected. */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.byId.size;
  }

  /** Chunks in insertion order. */
  chunks(): Iterable<Chunk> {
    return this.byId.values();
  }
}

export function clipQuote(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  let room = Math.max(0, maxLength - ELLIPSIS.length);
  // keep surrogate pairs whole
  if (room > 0 && isHighSurrogate(text.charCodeAt(room - 1))) room -= 1;
  return `${text.slice(0, room).trimEnd()}${ELLIPSIS}`;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
