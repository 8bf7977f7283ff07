import { describe, expect, it } from 'vitest';

import { HUMAN, aiAuthor } from './entry.js';
import { formatFull, formatHit, formatPickerLine, formatShort, formatTimestamp, toEntryRecord } from './format.js';
import type { Entry } from './types.js';

const CREATED = Date.parse('2025-01-01T00:00:00.000Z');

function entry(overrides: Partial<Entry> = {}): Entry {
  return {
    id: 1,
    body: 'hello world',
    author: HUMAN,
    created_at: CREATED,
    updated_at: CREATED,
    ...overrides
  };
}

describe('formatTimestamp', () => {
  it('renders UTC without milliseconds', () => {
    expect(formatTimestamp(CREATED)).toBe('2025-01-01 00:00:00');
  });
});

describe('formatShort', () => {
  it('renders id, time and preview', () => {
    expect(formatShort(entry())).toBe('[1] 2025-01-01 00:00:00\n     hello world');
  });

  it('marks agent entries and includes the source', () => {
    const text = formatShort(entry({ author: aiAuthor('claude'), source: 'https://example.com' }));
    expect(text).toBe('[1] 2025-01-01 00:00:00 (ai:claude)  https://example.com\n     hello world');
  });

  it('shows the first line only, cut to 60 characters', () => {
    expect(formatShort(entry({ body: 'first line\nsecond line' })).split('\n')[1]).toBe('     first line');
    expect(formatShort(entry({ body: 'x'.repeat(100) })).split('\n')[1]).toBe(`     ${'x'.repeat(60)}`);
  });

  it('appends the score for search hits', () => {
    expect(formatHit({ entry: entry(), score: 1.23456 })).toBe(
      '[1] 2025-01-01 00:00:00  score=1.235\n     hello world'
    );
  });
});

describe('formatFull', () => {
  it('lists metadata before the body', () => {
    const text = formatFull(entry({ id: 42, body: 'full note', source: 'src', author: aiAuthor('claude') }));
    expect(text).toBe(
      ['id: 42', 'author: ai:claude', 'created: 2025-01-01 00:00:00', 'source: src', '', 'full note'].join('\n')
    );
  });

  it('adds the update time once the entry has been edited', () => {
    const text = formatFull(entry({ updated_at: Date.parse('2025-01-02T03:04:05.000Z') }));
    expect(text.split('\n')).toEqual([
      'id: 1',
      'author: human',
      'created: 2025-01-01 00:00:00',
      'updated: 2025-01-02 03:04:05',
      '',
      'hello world'
    ]);
  });
});

describe('toEntryRecord', () => {
  it('serializes the author and omits a missing source', () => {
    expect(toEntryRecord(entry({ author: aiAuthor('claude') }))).toEqual({
      id: 1,
      body: 'hello world',
      author: 'ai:claude',
      created_at: CREATED,
      updated_at: CREATED
    });
    expect(toEntryRecord(entry({ source: 'book' })).source).toBe('book');
  });
});

describe('formatPickerLine', () => {
  it('puts the preview after the timestamp', () => {
    expect(formatPickerLine(entry())).toBe('[1] 2025-01-01 00:00:00 | hello world');
  });
});
