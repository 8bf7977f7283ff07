export type AuthorKind =
  | { kind: 'human' }
  | { kind: 'ai'; agent: string };

export interface Entry {
  id: number;                    // Monotonic, never reused
  body: string;                  // Trimmed, non-empty
  source?: string;               // URL, book, paper, conversation
  author: AuthorKind;
  created_at: number;            // Unix timestamp (ms)
  updated_at: number;            // Unix timestamp (ms)
}

/** Restricts listings to human entries, all agents, or one agent. */
export type AuthorFilter =
  | { kind: 'human' }
  | { kind: 'ai'; agent?: string };

export interface SearchHit {
  entry: Entry;
  score: number;
}

/**
 * A parsed search request: the whole trimmed query, matched as one
 * case-insensitive substring. A `phrase` goes to the trigram index; a
 * `substring` is too short for trigrams and is scanned for directly.
 */
export type SearchPlan =
  | { kind: 'phrase'; text: string }
  | { kind: 'substring'; text: string };
