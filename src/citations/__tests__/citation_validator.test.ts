import { describe, expect, it } from 'vitest';
import { CitationValidator } from '../citation_validator.js';
import { EvidenceStore } from '../../evidence/evidence_store.js';

const ANSWER = 'CD73 is expressed on T cells';
const CHUNK_TEXT = 'CD73 is expressed on regulatory T cells.';

function setup() {
  const store = new EvidenceStore();
  const chunkId = store.addChunk('cd73.pdf', 'section:Results#page:5', CHUNK_TEXT);
  const unrelatedId = store.addChunk('weather.pdf', 'section:Forecast', 'Rain expected tomorrow afternoon.');
  return { store, chunkId, unrelatedId, validator: new CitationValidator(store) };
}

describe('CitationValidator', () => {
  it('accepts a resolvable, relevant citation with no warnings', () => {
    const { validator, chunkId } = setup();

    const result = validator.validate(ANSWER, [{ chunkId }]);

    expect(result.warnings).toEqual([]);
    expect(result.valid).toHaveLength(1);
    expect(result.valid[0]?.relevance).toBeCloseTo(5 / 6, 10);
  });

  it('rebuilds source, locator and quote from the store', () => {
    const { validator, chunkId } = setup();

    const result = validator.validate(ANSWER, [
      { chunkId, source: 'forged.pdf', locator: 'page:999', quote: 'made up' },
    ]);

    expect(result.valid[0]).toMatchObject({
      chunkId,
      source: 'cd73.pdf',
      locator: 'section:Results#page:5',
      quote: CHUNK_TEXT,
    });
  });

  it('drops citations whose chunk is not in the store', () => {
    const { validator } = setup();

    const result = validator.validate(ANSWER, [{ chunkId: 'missing-id' }]);

    expect(result.valid).toEqual([]);
    expect(result.warnings).toEqual(['chunk_not_in_evidence_store:missing-id']);
  });

  it('drops citations with an empty chunk id', () => {
    const { validator } = setup();

    const result = validator.validate(ANSWER, [{ chunkId: '  ' }]);

    expect(result.warnings).toEqual(['citation_missing_chunk_id']);
  });

  it('accepts a paragraph-length chunk that contains the whole answer', () => {
    const store = new EvidenceStore();
    const filler = Array.from({ length: 60 }, (_, index) => `filler${index}`).join(' ');
    const longId = store.addChunk('cd73.pdf', 'section:Discussion', `${CHUNK_TEXT} ${filler}`);

    const accepted = new CitationValidator(store).validate(ANSWER, [{ chunkId: longId }]);
    const strict = new CitationValidator(store, { minRelevance: 0.1 }).validate(ANSWER, [{ chunkId: longId }]);

    // five answer tokens, all shared, out of 6 + 60 chunk tokens
    expect(accepted.valid).toHaveLength(1);
    expect(accepted.valid[0]?.relevance).toBeCloseTo(5 / 66, 10);
    expect(strict.warnings).toEqual([`citation_not_relevant:${longId}`]);
  });

  it('drops irrelevant citations without failing the rest', () => {
    const { validator, chunkId, unrelatedId } = setup();

    const result = validator.validate(ANSWER, [{ chunkId: unrelatedId }, { chunkId }]);

    expect(result.valid.map((citation) => citation.chunkId)).toEqual([chunkId]);
    expect(result.warnings).toEqual([`citation_not_relevant:${unrelatedId}`]);
  });

  it('keeps a repeated citation once', () => {
    const { validator, chunkId } = setup();

    const result = validator.validate(ANSWER, [{ chunkId }, { chunkId }]);

    expect(result.valid).toHaveLength(1);
    expect(result.warnings).toEqual([`citation_duplicate:${chunkId}`]);
  });

  it('reports warnings in citation order', () => {
    const { validator, chunkId } = setup();

    const result = validator.validate(ANSWER, [{ chunkId: 'x1' }, { chunkId: '' }, { chunkId }, { chunkId: 'x2' }]);

    expect(result.warnings).toEqual([
      'chunk_not_in_evidence_store:x1',
      'citation_missing_chunk_id',
      'chunk_not_in_evidence_store:x2',
    ]);
  });

  it('accepts a citation iff the chunk exists and overlap meets the threshold', () => {
    const { store, chunkId, unrelatedId } = setup();
    for (const minRelevance of [0, 0.5, 0.84, 0.9]) {
      const validator = new CitationValidator(store, { minRelevance });
      for (const id of [chunkId, unrelatedId, 'missing']) {
        const accepted = validator.validate(ANSWER, [{ chunkId: id }]).valid.length === 1;
        const overlap = id === chunkId ? 5 / 6 : 0;
        expect(accepted).toBe(store.hasChunk(id) && overlap >= minRelevance);
      }
    }
  });

  it('returns nothing for an empty citation list', () => {
    const { validator } = setup();

    expect(validator.validate(ANSWER, [])).toEqual({ valid: [], warnings: [] });
  });

  it('clips quotes to the configured length', () => {
    const store = new EvidenceStore();
    const chunkId = store.addChunk('long.pdf', '', `CD73 is expressed on regulatory T cells ${'and more '.repeat(10)}`);
    const validator = new CitationValidator(store, { quoteMaxLength: 20 });

    const result = validator.validate(ANSWER, [{ chunkId }]);

    expect(result.valid[0]?.quote).toBe('CD73 is expressed...');
  });
});
