import { formatAuthor } from './entry.js';
import type { Entry, SearchHit } from './types.js';

const PREVIEW_LENGTH = 60;

/** JSON shape used by the MCP tools. */
export type EntryRecord = {
  id: number;
  body: string;
  source?: string;
  author: string;
  created_at: number;
  updated_at: number;
};

export function toEntryRecord(entry: Entry): EntryRecord {
  const record: EntryRecord = {
    id: entry.id,
    body: entry.body,
    author: formatAuthor(entry.author),
    created_at: entry.created_at,
    updated_at: entry.updated_at
  };
  if (entry.source !== undefined) {
    record.source = entry.source;
  }
  return record;
}

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().replace('T', ' ').slice(0, 19);
}

export function preview(body: string): string {
  return (body.split('\n')[0] ?? '').slice(0, PREVIEW_LENGTH);
}

export function formatShort(entry: Entry, score?: number): string {
  const authorMark = entry.author.kind === 'ai' ? ` (${formatAuthor(entry.author)})` : '';
  const sourcePart = entry.source ? `  ${entry.source}` : '';
  const scorePart = score !== undefined ? `  score=${score.toFixed(3)}` : '';
  return `[${entry.id}] ${formatTimestamp(entry.created_at)}${authorMark}${sourcePart}${scorePart}\n     ${preview(entry.body)}`;
}

export function formatHit(hit: SearchHit): string {
  return formatShort(hit.entry, hit.score);
}

export function formatFull(entry: Entry): string {
  const lines = [
    `id: ${entry.id}`,
    `author: ${formatAuthor(entry.author)}`,
    `created: ${formatTimestamp(entry.created_at)}`
  ];
  if (entry.updated_at !== entry.created_at) {
    lines.push(`updated: ${formatTimestamp(entry.updated_at)}`);
  }
  if (entry.source) {
    lines.push(`source: ${entry.source}`);
  }
  lines.push('', entry.body);
  return lines.join('\n');
}

export function formatPickerLine(entry: Entry): string {
  return `[${entry.id}] ${formatTimestamp(entry.created_at)} | ${preview(entry.body)}`;
}
