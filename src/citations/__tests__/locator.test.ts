import { describe, expect, it } from 'vitest';
import { formatLocator, parseLocator } from '../locator.js';

describe('parseLocator', () => {
  it('lifts known fields and keeps the rest in extra', () => {
    expect(parseLocator('pdf:papers/cd73.pdf#section:Results#page:5#chunk:0')).toEqual({
      section: 'Results',
      page: 5,
      extra: { pdf: 'papers/cd73.pdf', chunk: '0' },
    });
  });

  it('accepts semicolons and surrounding whitespace', () => {
    expect(parseLocator(' section : Methods ; line:12;paragraph:3 ')).toEqual({
      section: 'Methods',
      line: 12,
      paragraph: 3,
      extra: {},
    });
  });

  it('splits at the first colon only', () => {
    expect(parseLocator('url:https://example.org/a#section:Intro')).toEqual({
      section: 'Intro',
      extra: { url: 'https://example.org/a' },
    });
  });

  it('keeps non-numeric page values as extra', () => {
    expect(parseLocator('page:iv')).toEqual({ extra: { page: 'iv' } });
  });

  it('records a bare segment and skips empty ones', () => {
    expect(parseLocator('notes.md##section:')).toEqual({ extra: { ref: 'notes.md' } });
  });

  it('keeps the first occurrence of a repeated key', () => {
    expect(parseLocator('section:A#section:B').section).toBe('A');
  });

  it('returns an empty locator for an empty string', () => {
    expect(parseLocator('')).toEqual({ extra: {} });
  });
});

describe('formatLocator', () => {
  it('renders extra segments first, then typed fields', () => {
    expect(formatLocator({ section: 'Results', page: 5, extra: { pdf: 'a.pdf' } })).toBe(
      'pdf:a.pdf#section:Results#page:5',
    );
  });

  it('parses back to the same structure', () => {
    const locator = parseLocator('notes.md#section:Intro#line:4');

    expect(parseLocator(formatLocator(locator))).toEqual(locator);
  });
});
