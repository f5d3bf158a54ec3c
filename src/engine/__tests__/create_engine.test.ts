import { beforeAll, describe, expect, it } from 'vitest';
import { createEngine } from '../create_engine.js';
import { Task } from '../task.js';
import type { Router } from '../contracts.js';
import { EvidenceStore } from '../../evidence/evidence_store.js';
import { ConfigurationError } from '../../core/errors.js';
import { setLogLevel } from '../../telemetry/logger.js';

beforeAll(() => {
  setLogLevel('silent');
});

function task(id: string): Task {
  return new Task({ id, title: id, inputs: { category: 'generic', goal: 'explain CD73' } });
}

describe('createEngine', () => {
  it('wires the gate and retries from config', async () => {
    const store = new EvidenceStore();
    const located = store.addChunk('cd73.pdf', 'section:Results', 'CD73 is expressed on regulatory T cells.');
    const unlocated = store.addChunk('cd73.pdf', '', 'CD73 is expressed on many T cells.');
    const responses = [unlocated, located];
    let calls = 0;
    const router: Router = {
      run: async () => {
        const chunkId = responses[Math.min(calls, responses.length - 1)] ?? located;
        calls += 1;
        return { answer: 'CD73 is expressed on T cells', citations: [{ chunkId }], status: 'success' };
      },
    };
    const subtask = task('s1');

    const { engine, config } = createEngine({
      planner: { plan: () => [subtask] },
      router,
      store,
      config: { retryManager: { maxRetries: 2 } },
      sleep: async () => {},
    });
    const report = await engine.run(task('root'));

    expect(config.gate.enabled).toBe(true);
    expect(calls).toBe(2);
    expect(subtask.status).toBe('DONE');
    expect(report.retry.totalAttempts).toBe(2);
  });

  it('runs without a gate when disabled', async () => {
    const store = new EvidenceStore();
    const router: Router = {
      run: async () => ({ answer: 'An answer without citations', citations: [], status: 'success' }),
    };
    const subtask = task('s1');

    const { engine } = createEngine({
      planner: { plan: () => [subtask] },
      router,
      store,
      config: { gate: { enabled: false } },
    });
    const report = await engine.run(task('root'));

    expect(subtask.status).toBe('DONE');
    expect(subtask.completion?.agentStatus).toBe('PARTIAL');
    expect(report.outcomes[0]?.verify).toBeUndefined();
  });

  it('uses the judge as evaluator when enabled', async () => {
    const store = new EvidenceStore();
    const located = store.addChunk('cd73.pdf', 'section:Results', 'CD73 is expressed on regulatory T cells.');
    const bare: Router = {
      run: async () => ({ answer: 'CD73 is expressed on T cells', citations: [{ chunkId: located }], status: 'success' }),
    };
    const backed: Router = {
      run: async () => ({
        answer: 'CD73 is expressed on T cells',
        citations: [{ chunkId: located }],
        status: 'success',
        meta: {
          claims: [{ claimId: 'c1', text: 'CD73 is expressed on T cells' }],
          evidence: [{ claimId: 'c1', chunkId: located }],
        },
      }),
    };
    const rejected = task('s1');
    const accepted = task('s2');

    await createEngine({ planner: { plan: () => [rejected] }, router: bare, store, config: { judge: { enabled: true } } })
      .engine.run(task('root'));
    await createEngine({ planner: { plan: () => [accepted] }, router: backed, store, config: { judge: { enabled: true } } })
      .engine.run(task('root'));

    expect(rejected.status).toBe('FAILED');
    expect(rejected.completion?.evaluationErrors).toEqual([
      'Format score 0.60 below threshold 0.7',
      'Citation coherence 0.00 below threshold 0.6',
    ]);
    expect(accepted.status).toBe('DONE');
  });

  it('rejects an invalid config', () => {
    expect(() =>
      createEngine({
        planner: { plan: () => [] },
        router: { run: async () => ({}) },
        store: new EvidenceStore(),
        config: { budget: { maxToolCalls: -1 } },
      }),
    ).toThrow(ConfigurationError);
  });
});
