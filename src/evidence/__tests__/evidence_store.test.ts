import { describe, expect, it } from 'vitest';
import { clipQuote, computeChunkId, EvidenceStore } from '../evidence_store.js';
import { EvidenceStoreError, ValidationError } from '../../core/errors.js';

describe('EvidenceStore', () => {
  it('derives a stable prefixed id from content', () => {
    const store = new EvidenceStore();

    const id = store.addChunk('paper.pdf', 'section:Results', 'CD73 is expressed on regulatory T cells.');

    expect(id).toMatch(/^chunk_[0-9a-f]{16}$/);
    expect(id).toBe(computeChunkId('paper.pdf', 'section:Results', 'CD73 is expressed on regulatory T cells.'));
  });

  it('is idempotent for identical tuples', () => {
    const store = new EvidenceStore();

    const first = store.addChunk('paper.pdf', 'page:1', 'same text');
    const second = store.addChunk('paper.pdf', 'page:1', 'same text');

    expect(second).toBe(first);
    expect(store.size).toBe(1);
  });

  it('gives distinct ids to chunks differing in any field', () => {
    const store = new EvidenceStore();
    const ids = new Set([
      store.addChunk('a.pdf', 'page:1', 'text'),
      store.addChunk('b.pdf', 'page:1', 'text'),
      store.addChunk('a.pdf', 'page:2', 'text'),
      store.addChunk('a.pdf', 'page:1', 'text!'),
    ]);

    expect(ids.size).toBe(4);
    expect(store.size).toBe(4);
  });

  it('does not confuse field boundaries', () => {
    expect(computeChunkId('ab', 'c', 'text')).not.toBe(computeChunkId('a', 'bc', 'text'));
  });

  it('rejects empty source or text', () => {
    const store = new EvidenceStore();

    expect(() => store.addChunk('', 'page:1', 'text')).toThrow(ValidationError);
    expect(() => store.addChunk('a.pdf', 'page:1', '   ')).toThrow(ValidationError);
    expect(store.size).toBe(0);
  });

  it('accepts an empty locator', () => {
    const store = new EvidenceStore();

    const id = store.addChunk('a.pdf', '', 'text');

    expect(store.getChunk(id)?.locator).toBe('');
  });

  it('returns chunks and membership', () => {
    const store = new EvidenceStore();
    const id = store.addChunk('a.pdf', 'page:1', 'text');

    expect(store.hasChunk(id)).toBe(true);
    expect(store.hasChunk('chunk_missing')).toBe(false);
    expect(store.getChunk(id)).toEqual({ chunkId: id, source: 'a.pdf', locator: 'page:1', text: 'text' });
    expect(store.getChunk('chunk_missing')).toBeUndefined();
  });

  it('iterates chunks in insertion order', () => {
    const store = new EvidenceStore();
    store.addChunk('b.pdf', '', 'second source first');
    store.addChunk('a.pdf', '', 'first source second');

    expect([...store.chunks()].map((chunk) => chunk.source)).toEqual(['b.pdf', 'a.pdf']);
  });

  it('rejects additions once frozen but keeps serving reads', () => {
    const store = new EvidenceStore();
    const id = store.addChunk('a.pdf', 'page:1', 'text');

    store.freeze();

    expect(store.isFrozen).toBe(true);
    expect(() => store.addChunk('a.pdf', 'page:2', 'more')).toThrow(EvidenceStoreError);
    expect(store.getQuote(id)).toBe('text');
  });

  describe('getQuote', () => {
    it('returns the full text when it fits', () => {
      const store = new EvidenceStore();
      const id = store.addChunk('a.pdf', '', 'short text');

      expect(store.getQuote(id, 10)).toBe('short text');
    });

    it('clips long text and appends an ellipsis', () => {
      const store = new EvidenceStore();
      const id = store.addChunk('a.pdf', '', 'x'.repeat(250));

      const quote = store.getQuote(id);

      expect(quote).toHaveLength(200);
      expect(quote.endsWith('...')).toBe(true);
    });

    it('returns an empty string for unknown ids', () => {
      expect(new EvidenceStore().getQuote('chunk_missing')).toBe('');
    });
  });
});

describe('clipQuote', () => {
  it('trims trailing whitespace before the ellipsis', () => {
    expect(clipQuote('alpha beta gamma', 9)).toBe('alpha...');
  });

  it('never splits a surrogate pair', () => {
    // room of 5 code units ends inside the emoji at index 4..5
    expect(clipQuote('abcd\u{1F600}efgh', 8)).toBe('abcd...');
    expect(clipQuote('abc\u{1F600}efgh', 8)).toBe('abc\u{1F600}...');
  });
});
