import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadEngineConfig, resolveEngineConfig } from '../engine_config.js';
import { ConfigurationError } from '../../core/errors.js';

describe('resolveEngineConfig', () => {
  it('fills every default from an empty object', () => {
    expect(resolveEngineConfig({})).toEqual({
      relevance: { minRelevance: 0.02, minTokenLength: 2 },
      quoteMaxLength: 200,
      gate: {
        enabled: true,
        requireCitations: true,
        requireLocators: true,
        minEvidenceCoverage: 0.5,
        requiredLocatorFields: ['section'],
      },
      retry: { maxAttempts: 1, baseDelayMs: 500, maxDelayMs: 8000, jitter: true },
      routerRetry: { maxAttempts: 1, baseDelayMs: 500, maxDelayMs: 8000, jitter: true },
      retryManager: { maxRetries: 3, costLimit: 10 },
      budget: { maxToolCalls: 20 },
      judge: { enabled: false, formatThreshold: 0.7, citationThreshold: 0.6 },
      haltOnFailure: true,
    });
  });

  it('merges partial sections with defaults', () => {
    const config = resolveEngineConfig({ gate: { requireLocators: false }, retry: { maxAttempts: 3 } });

    expect(config.gate.requireLocators).toBe(false);
    expect(config.gate.requireCitations).toBe(true);
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000, jitter: true });
  });

  it('lists every issue in the thrown error', () => {
    try {
      resolveEngineConfig({ relevance: { minRelevance: 2 }, budget: { maxToolCalls: 0 }, unknownKey: true });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(3);
        expect(error.issues.some((issue) => issue.startsWith('relevance.minRelevance:'))).toBe(true);
        expect(error.issues.some((issue) => issue.startsWith('budget.maxToolCalls:'))).toBe(true);
      }
    }
  });
});

describe('loadEngineConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'citegate-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads YAML', async () => {
    const path = join(dir, 'engine.yaml');
    writeFileSync(path, 'retryManager:\n  costLimit: 5\nbudget:\n  maxToolCalls: 4\n');

    const result = await loadEngineConfig(path);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.retryManager).toEqual({ maxRetries: 3, costLimit: 5 });
      expect(result.value.budget.maxToolCalls).toBe(4);
    }
  });

  it('reads JSON', async () => {
    const path = join(dir, 'engine.json');
    writeFileSync(path, JSON.stringify({ haltOnFailure: false }));

    const result = await loadEngineConfig(path);

    expect(result.ok && result.value.haltOnFailure).toBe(false);
    expect(result.ok).toBe(true);
  });

  it('treats an empty YAML file as defaults', async () => {
    const path = join(dir, 'empty.yml');
    writeFileSync(path, '');

    const result = await loadEngineConfig(path);

    expect(result.ok && result.value.quoteMaxLength).toBe(200);
  });

  it('reports schema violations with the file as source', async () => {
    const path = join(dir, 'bad.yaml');
    writeFileSync(path, 'quoteMaxLength: 1\n');

    const result = await loadEngineConfig(path);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.source).toBe(path);
      expect(result.error.issues).toHaveLength(1);
    }
  });

  it('reports unparseable, missing and unsupported files', async () => {
    const broken = join(dir, 'broken.json');
    writeFileSync(broken, '{ not json');

    expect((await loadEngineConfig(broken)).ok).toBe(false);
    expect((await loadEngineConfig(join(dir, 'missing.yaml'))).ok).toBe(false);
    expect((await loadEngineConfig(join(dir, 'engine.toml'))).ok).toBe(false);
  });

  it('names the failing step in the error', async () => {
    const broken = join(dir, 'broken.yaml');
    writeFileSync(broken, 'a: [unclosed\n');

    const missing = await loadEngineConfig(join(dir, 'missing.yaml'));
    const unparseable = await loadEngineConfig(broken);

    expect(!missing.ok && missing.error.message).toContain('cannot read file: ');
    expect(!missing.ok && missing.error.source).toBe(join(dir, 'missing.yaml'));
    expect(!unparseable.ok && unparseable.error.message).toContain('cannot parse file: ');
  });
});
