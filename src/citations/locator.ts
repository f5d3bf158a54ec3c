/**
 * @fileoverview Locator strings.
 *
 * Chunk locators are stored as strings such as
 * `pdf:papers/cd73.pdf#section:Results#page:5` or `section:Methods;line:12`.
 * Segments are separated by `#` or `;` and split into key and value at the
 * first `:`. `section`, `page`, `paragraph` and `line` are lifted into typed
 * fields; every other key lands in `extra`.
 */

import type { StructuredLocator } from '../types.js';

const SEGMENT_SEPARATOR = /[#;]/;
const NUMERIC_FIELDS = ['page', 'paragraph', 'line'] as const;
type NumericField = (typeof NUMERIC_FIELDS)[number];

/** Key for a leading segment that carries no `key:` prefix. */
export const BARE_SEGMENT_KEY = 'ref';

function isNumericField(key: string): key is NumericField {
  return NUMERIC_FIELDS.some((field) => field === key);
}

function parsePositiveInt(value: string): number | undefined {
  if (!/^\d+$/.test(value)) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export function parseLocator(locator: string): StructuredLocator {
  const result: StructuredLocator = { extra: {} };
  if (!locator) return result;

  for (const rawSegment of locator.split(SEGMENT_SEPARATOR)) {
    const segment = rawSegment.trim();
    if (!segment) continue;

    const colon = segment.indexOf(':');
    if (colon < 0) {
      result.extra[BARE_SEGMENT_KEY] ??= segment;
      continue;
    }

    const key = segment.slice(0, colon).trim().toLowerCase();
    const value = segment.slice(colon + 1).trim();
    if (!key || !value) continue;

    if (key === 'section') {
      result.section ??= value;
    } else if (isNumericField(key)) {
      const parsed = parsePositiveInt(value);
      if (parsed === undefined) {
        result.extra[key] ??= value;
      } else {
        result[key] ??= parsed;
      }
    } else {
      result.extra[key] ??= value;
    }
  }

  return result;
}

/** Inverse of {@link parseLocator} up to whitespace and segment order. */
export function formatLocator(locator: StructuredLocator): string {
  const segments: string[] = [];
  for (const [key, value] of Object.entries(locator.extra)) {
    segments.push(key === BARE_SEGMENT_KEY ? value : `${key}:${value}`);
  }
  if (locator.section !== undefined) segments.push(`section:${locator.section}`);
  for (const field of NUMERIC_FIELDS) {
    const value = locator[field];
    if (value !== undefined) segments.push(`${field}:${value}`);
  }
  return segments.join('#');
}
