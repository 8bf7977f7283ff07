import type { HighlightsDatabase } from './database.js';
import { ValidationError } from './errors.js';
import type { AuthorFilter, Entry, SearchHit, SearchPlan } from './types.js';

export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 100;

// The trigram tokenizer cannot match anything shorter than this
const MIN_PHRASE_LENGTH = 3;

function checkLimit(limit: number): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}`);
  }
  return limit;
}

/**
 * Treats the trimmed query as a single substring, spaces included, so a hit
 * always contains the query text verbatim (ignoring case).
 */
export function planQuery(text: string): SearchPlan {
  const query = text.trim();
  if (query.length === 0) {
    throw new ValidationError('Search query must not be empty');
  }
  return [...query].length >= MIN_PHRASE_LENGTH
    ? { kind: 'phrase', text: query }
    : { kind: 'substring', text: query };
}

export class QueryEngine {
  constructor(private readonly db: HighlightsDatabase) {}

  /**
   * Relevance-ordered hits; the score grows with how often the query occurs
   * and how rare it is. Equal scores put the most recently created entry first.
   */
  search(text: string, limit: number = DEFAULT_LIMIT): SearchHit[] {
    const plan = planQuery(text);
    return this.db.searchIndex(plan, checkLimit(limit));
  }

  recent(limit: number = DEFAULT_LIMIT, filter?: AuthorFilter): Entry[] {
    return this.db.list(filter, checkLimit(limit));
  }
}
