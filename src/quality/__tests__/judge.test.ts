import { describe, expect, it } from 'vitest';
import { createJudgeEvaluator, Judge } from '../judge.js';
import type { AgentResult } from '../../types.js';

function agentResult(overrides: Partial<AgentResult> = {}): AgentResult {
  return {
    answer: 'CD73 is expressed on T cells',
    citations: [{ chunkId: 'chunk_a' }],
    status: 'success',
    meta: {
      claims: [
        { claimId: 'c1', text: 'CD73 is expressed' },
        { claimId: 'c2', text: 'on T cells' },
      ],
      evidence: [
        { claimId: 'c1', chunkId: 'chunk_a' },
        { claimId: 'c2', chunkId: 'chunk_a' },
      ],
    },
    ...overrides,
  };
}

describe('Judge', () => {
  it('passes a complete, fully backed result', () => {
    expect(new Judge().judge(agentResult())).toEqual({
      passed: true,
      formatScore: 1,
      citationScore: 1,
      overallScore: 1,
      issues: [],
    });
  });

  it('deducts for each missing part of the format', () => {
    const judge = new Judge();

    expect(judge.judge(agentResult({ answer: '  ' })).formatScore).toBe(0.7);
    expect(judge.judge(agentResult({ citations: [] })).formatScore).toBe(0.7);
    expect(judge.judge(agentResult({ answer: '', citations: [], meta: {} })).formatScore).toBe(0);
  });

  it('scores citation coherence as the share of backed claims', () => {
    const result = new Judge().judge(
      agentResult({
        meta: {
          claims: [
            { claimId: 'c1', text: 'one' },
            { claimId: 'c2', text: 'two' },
          ],
          evidence: [{ claimId: 'c1' }, { chunkId: 'chunk_a' }],
        },
      }),
    );

    expect(result.citationScore).toBe(0.5);
    expect(result.passed).toBe(false);
    expect(result.overallScore).toBe(0.75);
    expect(result.issues).toEqual(['Citation coherence 0.50 below threshold 0.6']);
  });

  it('reports both scores when claims and evidence are absent', () => {
    const result = new Judge().judge(agentResult({ meta: {} }));

    expect(result.formatScore).toBe(0.6);
    expect(result.citationScore).toBe(0);
    expect(result.issues).toEqual([
      'Format score 0.60 below threshold 0.7',
      'Citation coherence 0.00 below threshold 0.6',
    ]);
  });

  it('honors custom thresholds', () => {
    const result = new Judge({ formatThreshold: 0.5, citationThreshold: 0.5 }).judge(
      agentResult({ citations: [], meta: { claims: [{ claimId: 'c1', text: 'one' }], evidence: [{ claimId: 'c1' }] } }),
    );

    expect(result.formatScore).toBe(0.7);
    expect(result.passed).toBe(true);
  });
});

describe('createJudgeEvaluator', () => {
  it('maps the verdict to an evaluation result', async () => {
    const evaluate = createJudgeEvaluator();

    expect(await evaluate(agentResult())).toEqual({ ok: true, errors: [] });
    expect(await evaluate(agentResult({ meta: {} }))).toEqual({
      ok: false,
      errors: ['Format score 0.60 below threshold 0.7', 'Citation coherence 0.00 below threshold 0.6'],
    });
  });
});
