import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { HighlightsDatabase } from './database.js';
import { aiAuthor, parseAuthorFilter } from './entry.js';
import { describeError, isHighlightError } from './errors.js';
import { toEntryRecord } from './format.js';
import { createLogger, type Logger } from './logger.js';
import { DEFAULT_LIMIT, MAX_LIMIT, QueryEngine } from './query.js';
import { withBusyRetry } from './retry.js';

export interface HighlightsServerOptions {
  /** Entries created through this server are tagged `ai:<agentName>`. */
  agentName: string;
  busyRetries?: number;
  logger?: Logger;
}

/**
 * Builds an MCP server over an open store. The server keeps no state of its
 * own; every tool call goes straight to the store or the query engine.
 */
export function createHighlightsServer(db: HighlightsDatabase, options: HighlightsServerOptions): McpServer {
  const server = new McpServer({
    name: 'hl',
    version: '1.0.0'
  });

  const author = aiAuthor(options.agentName);
  const query = new QueryEngine(db);
  const logger = options.logger ?? createLogger(false);

  // Core errors become tool results the agent can read; anything else is a server fault
  const run = async <T extends Record<string, unknown>>(tool: string, operation: () => T): Promise<CallToolResult> => {
    try {
      const output = await withBusyRetry(operation, { retries: options.busyRetries ?? 3, logger });
      return {
        content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
        structuredContent: output
      };
    } catch (error) {
      if (!isHighlightError(error)) {
        throw error;
      }
      logger.debug(`${tool} failed`, { kind: error.kind });
      return {
        content: [{ type: 'text', text: describeError(error) }],
        isError: true
      };
    }
  };

  // Define Entry schema for output
  const EntrySchema = z.object({
    id: z.number(),
    body: z.string(),
    source: z.string().optional(),
    author: z.string(),
    created_at: z.number(),
    updated_at: z.number()
  });

  const limitSchema = z.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT);

  // Tool 1: hl_add
  server.registerTool(
    'hl_add',
    {
      title: 'Add Highlight',
      description: `Capture a highlight. The author is recorded as "ai:${options.agentName}".`,
      inputSchema: {
        body: z.string().min(1).describe('The highlight: a quote, idea, insight, or note'),
        source: z.string().optional().describe('Where this came from (URL, book, paper, conversation)')
      },
      outputSchema: {
        id: z.number().describe('Assigned entry ID'),
        author: z.string().describe('Recorded author'),
        created_at: z.number().describe('Creation timestamp (ms)')
      }
    },
    async ({ body, source }) =>
      run('hl_add', () => {
        const entry = db.create(body, source, author);
        return {
          id: entry.id,
          author: toEntryRecord(entry).author,
          created_at: entry.created_at
        };
      })
  );

  // Tool 2: hl_search
  server.registerTool(
    'hl_search',
    {
      title: 'Search Highlights',
      description: 'Full-text search across highlight bodies and sources, best match first',
      inputSchema: {
        query: z.string().min(1).describe('Search terms; every term must appear in a hit'),
        limit: limitSchema.describe('Max results')
      },
      outputSchema: {
        results: z
          .array(z.object({ entry: EntrySchema, score: z.number() }))
          .describe('Matching highlights with relevance scores'),
        count: z.number().describe('Number of results returned')
      }
    },
    async ({ query: text, limit }) =>
      run('hl_search', () => {
        const hits = query.search(text, limit ?? DEFAULT_LIMIT);
        return {
          results: hits.map((hit) => ({ entry: toEntryRecord(hit.entry), score: hit.score })),
          count: hits.length
        };
      })
  );

  // Tool 3: hl_show
  server.registerTool(
    'hl_show',
    {
      title: 'Show Highlight',
      description: 'Retrieve a highlight by ID',
      inputSchema: {
        id: z.number().int().min(1).describe('Entry ID')
      },
      outputSchema: {
        entry: EntrySchema.describe('The highlight')
      }
    },
    async ({ id }) => run('hl_show', () => ({ entry: toEntryRecord(db.get(id)) }))
  );

  // Tool 4: hl_recent
  server.registerTool(
    'hl_recent',
    {
      title: 'Recent Highlights',
      description: 'List recent highlights, newest first, optionally filtered by author',
      inputSchema: {
        limit: limitSchema.describe('Max results'),
        author: z.string().optional().describe('Author filter: "human", "ai", "ai:*" or "ai:<agent>"')
      },
      outputSchema: {
        results: z.array(EntrySchema).describe('Highlights, newest first'),
        count: z.number().describe('Number of results returned'),
        total: z.number().describe('Highlights in the store matching the author filter')
      }
    },
    async ({ limit, author: filterText }) =>
      run('hl_recent', () => {
        const filter = filterText !== undefined ? parseAuthorFilter(filterText) : undefined;
        const entries = query.recent(limit ?? DEFAULT_LIMIT, filter);
        return {
          results: entries.map(toEntryRecord),
          count: entries.length,
          total: db.count(filter)
        };
      })
  );

  return server;
}
