/**
 * @fileoverview Engine configuration.
 *
 * One zod schema describes every tunable of a run. Missing sections and fields
 * take their defaults, unknown keys are rejected so a typo in a config file
 * does not silently fall back to a default.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import YAML from 'yaml';
import { z, type ZodError } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { Err, mapError, Ok, safeAsync, type Result } from '../core/result.js';
import { DEFAULT_MIN_RELEVANCE } from '../citations/citation_validator.js';
import { DEFAULT_CITATION_THRESHOLD, DEFAULT_FORMAT_THRESHOLD } from '../quality/judge.js';

// ============================================================================
// SCHEMA
// ============================================================================

const RetrySectionSchema = (defaultAttempts: number) =>
  z
    .object({
      maxAttempts: z.number().int().min(1).default(defaultAttempts),
      baseDelayMs: z.number().min(0).default(500),
      maxDelayMs: z.number().min(0).default(8_000),
      jitter: z.boolean().default(true),
    })
    .strict()
    .default({});

export const EngineConfigSchema = z
  .object({
    relevance: z
      .object({
        minRelevance: z.number().min(0).max(1).default(DEFAULT_MIN_RELEVANCE),
        minTokenLength: z.number().int().min(1).default(2),
      })
      .strict()
      .default({}),
    quoteMaxLength: z.number().int().min(4).default(200),
    gate: z
      .object({
        enabled: z.boolean().default(true),
        requireCitations: z.boolean().default(true),
        requireLocators: z.boolean().default(true),
        minEvidenceCoverage: z.number().min(0).max(1).default(0.5),
        requiredLocatorFields: z.array(z.enum(['section', 'page', 'paragraph', 'line'])).default(['section']),
      })
      .strict()
      .default({}),
    retry: RetrySectionSchema(1),
    routerRetry: RetrySectionSchema(1),
    retryManager: z
      .object({
        maxRetries: z.number().int().min(0).default(3),
        costLimit: z.number().min(0).default(10),
      })
      .strict()
      .default({}),
    budget: z
      .object({
        maxToolCalls: z.number().int().min(1).default(20),
      })
      .strict()
      .default({}),
    judge: z
      .object({
        enabled: z.boolean().default(false),
        formatThreshold: z.number().min(0).max(1).default(DEFAULT_FORMAT_THRESHOLD),
        citationThreshold: z.number().min(0).max(1).default(DEFAULT_CITATION_THRESHOLD),
      })
      .strict()
      .default({}),
    haltOnFailure: z.boolean().default(true),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

// ============================================================================
// RESOLUTION
// ============================================================================

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

/**
 * Validate a (partial) config and fill defaults.
 *
 * @throws ConfigurationError listing every schema issue
 */
export function resolveEngineConfig(input: unknown = {}, source?: string): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(issues.join('; '), issues, source);
  }
  return parsed.data;
}

export const SUPPORTED_CONFIG_EXTENSIONS = ['.yaml', '.yml', '.json'] as const;

/**
 * Read a YAML or JSON config file. An empty file yields the defaults.
 */
export async function loadEngineConfig(path: string): Promise<Result<EngineConfig, ConfigurationError>> {
  const extension = extname(path).toLowerCase();
  if (!SUPPORTED_CONFIG_EXTENSIONS.some((supported) => supported === extension)) {
    return Err(new ConfigurationError(`unsupported config extension "${extension}"`, [], path));
  }

  const raw = mapError(
    await safeAsync(() => readFile(path, 'utf8')),
    (error) => new ConfigurationError(`cannot read file: ${error.message}`, [], path),
  );
  if (!raw.ok) return raw;
  const text = raw.value;

  const document = mapError(
    await safeAsync(async (): Promise<unknown> => (extension === '.json' ? JSON.parse(text) : YAML.parse(text))),
    (error) => new ConfigurationError(`cannot parse file: ${error.message}`, [], path),
  );
  if (!document.ok) return document;

  try {
    return Ok(resolveEngineConfig(document.value ?? {}, path));
  } catch (error) {
    if (error instanceof ConfigurationError) return Err(error);
    throw error;
  }
}
