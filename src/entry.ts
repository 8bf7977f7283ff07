import { ValidationError } from './errors.js';
import type { AuthorFilter, AuthorKind, Entry } from './types.js';

const AGENT_NAME = /^[^\s:]+$/;

export const HUMAN: AuthorKind = { kind: 'human' };

export function aiAuthor(agent: string): AuthorKind {
  const name = agent.trim();
  if (!AGENT_NAME.test(name)) {
    throw new ValidationError(`Invalid agent name: "${agent}"`);
  }
  return { kind: 'ai', agent: name };
}

export function normalizeAuthor(author: AuthorKind): AuthorKind {
  return author.kind === 'ai' ? aiAuthor(author.agent) : HUMAN;
}

export function normalizeBody(body: string): string {
  const trimmed = body.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Highlight body must not be empty');
  }
  return trimmed;
}

export function normalizeSource(source?: string | null): string | undefined {
  const trimmed = source?.trim();
  return trimmed ? trimmed : undefined;
}

export function formatAuthor(author: AuthorKind): string {
  switch (author.kind) {
    case 'human':
      return 'human';
    case 'ai':
      return `ai:${author.agent}`;
  }
}

export function parseAuthor(text: string): AuthorKind {
  if (text === 'human') {
    return HUMAN;
  }
  if (text.startsWith('ai:')) {
    return aiAuthor(text.slice(3));
  }
  throw new ValidationError(`Invalid author: "${text}"`);
}

/**
 * Accepts `human`, `ai` or `ai:*` for every agent, and `ai:<agent>` for one.
 */
export function parseAuthorFilter(text: string): AuthorFilter {
  const value = text.trim();
  if (value === 'human') {
    return { kind: 'human' };
  }
  if (value === 'ai' || value === 'ai:*') {
    return { kind: 'ai' };
  }
  if (value.startsWith('ai:')) {
    return aiAuthor(value.slice(3));
  }
  throw new ValidationError(`Invalid author filter: "${text}" (expected human, ai, ai:* or ai:<agent>)`);
}

export interface EntryFields {
  id: number;
  body: string;
  source?: string | null;
  author: AuthorKind;
  created_at: number;
  updated_at: number;
}

/** The only way an Entry is built; the store routes every row through here. */
export function createEntry(fields: EntryFields): Entry {
  if (!Number.isInteger(fields.id) || fields.id < 1) {
    throw new ValidationError(`Invalid entry id: ${fields.id}`);
  }
  const entry: Entry = {
    id: fields.id,
    body: normalizeBody(fields.body),
    author: normalizeAuthor(fields.author),
    created_at: fields.created_at,
    updated_at: fields.updated_at
  };
  const source = normalizeSource(fields.source);
  if (source !== undefined) {
    entry.source = source;
  }
  return entry;
}

export function parseEntryId(text: string): number {
  const id = Number(text);
  if (!/^\d+$/.test(text.trim()) || !Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`Invalid entry id: "${text}"`);
  }
  return id;
}
