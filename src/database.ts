import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync, existsSync } from 'fs';
import { createEntry, formatAuthor, normalizeAuthor, normalizeBody, normalizeSource, parseAuthor } from './entry.js';
import { BusyError, NotFoundError, isSqliteBusyError, errorCode } from './errors.js';
import { defaultDbPath } from './config.js';
import type { AuthorFilter, AuthorKind, Entry, SearchHit, SearchPlan } from './types.js';

interface EntryRow {
  id: number;
  body: string;
  source: string | null;
  author: string;
  created_at: number;
  updated_at: number;
}

type ScoredRow = EntryRow & { score: number };

export interface DatabaseOptions {
  /** How long a writer waits on a locked database before BusyError. */
  busyTimeoutMs?: number;
}

const DEFAULT_BUSY_TIMEOUT_MS = 5000;

const MIGRATIONS: Array<{ version: number; up: (db: Database.Database) => void }> = [
  {
    version: 1,
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS entries (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          body TEXT NOT NULL CHECK (length(body) > 0),
          source TEXT,
          author TEXT NOT NULL CHECK (author = 'human' OR author LIKE 'ai:_%'),
          created_at INTEGER NOT NULL,
          updated_at INTEGER NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_entries_created_at ON entries(created_at DESC, id DESC);
        CREATE INDEX IF NOT EXISTS idx_entries_author ON entries(author);
      `);

      // Trigram tokens give case-insensitive substring matching
      db.exec(`
        CREATE VIRTUAL TABLE IF NOT EXISTS entries_fts USING fts5(
          body,
          source,
          content='entries',
          content_rowid='id',
          tokenize='trigram'
        );
      `);

      // External-content tables need the 'delete' command with the old values
      db.exec(`
        CREATE TRIGGER IF NOT EXISTS entries_ai AFTER INSERT ON entries BEGIN
          INSERT INTO entries_fts(rowid, body, source)
          VALUES (new.id, new.body, new.source);
        END;

        CREATE TRIGGER IF NOT EXISTS entries_ad AFTER DELETE ON entries BEGIN
          INSERT INTO entries_fts(entries_fts, rowid, body, source)
          VALUES ('delete', old.id, old.body, old.source);
        END;

        CREATE TRIGGER IF NOT EXISTS entries_au AFTER UPDATE OF body, source ON entries BEGIN
          INSERT INTO entries_fts(entries_fts, rowid, body, source)
          VALUES ('delete', old.id, old.body, old.source);
          INSERT INTO entries_fts(rowid, body, source)
          VALUES (new.id, new.body, new.source);
        END;
      `);
    }
  }
];

const ENTRY_COLUMNS = 'e.id, e.body, e.source, e.author, e.created_at, e.updated_at';

const LATEST_VERSION = MIGRATIONS.reduce((latest, migration) => Math.max(latest, migration.version), 0);

// SQL lower() and LIKE fold ASCII only; the trigram index folds all of Unicode
const FOLD_FUNCTION = 'hl_fold';

function foldCase(value: unknown): string | null {
  return typeof value === 'string' ? value.toLowerCase() : null;
}

function quotePhrase(phrase: string): string {
  return `"${phrase.replace(/"/g, '""')}"`;
}

function authorClause(filter: AuthorFilter | undefined): { sql: string; params: string[] } {
  if (!filter) {
    return { sql: '', params: [] };
  }
  if (filter.kind === 'human') {
    return { sql: "e.author = 'human'", params: [] };
  }
  if (filter.agent === undefined) {
    return { sql: "e.author LIKE 'ai:%'", params: [] };
  }
  return { sql: 'e.author = ?', params: [formatAuthor({ kind: 'ai', agent: filter.agent })] };
}

/**
 * Highlight store backed by SQLite. Every write runs in one immediate
 * transaction; the FTS rows are maintained by triggers inside it, so an
 * entry and its index row commit or roll back together.
 */
export class HighlightsDatabase {
  private db: Database.Database;
  readonly path: string;

  constructor(dbPath: string = defaultDbPath(), options: DatabaseOptions = {}) {
    this.path = dbPath;

    // Ensure directory exists
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    this.db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS });
    this.db.function(FOLD_FUNCTION, { deterministic: true }, foldCase);
    this.guard(() => {
      if (this.db.pragma('journal_mode', { simple: true }) !== 'wal') {
        this.db.pragma('journal_mode = WAL');
      }
    });
    this.initSchema();
  }

  getSchemaVersion(): number {
    const table = this.db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_migrations'")
      .get();
    if (!table) {
      return 0;
    }
    const row = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
      .get();
    return row?.version ?? 0;
  }

  private initSchema(): void {
    // A current file opens as a plain reader, without the write lock
    if (this.guard(() => this.getSchemaVersion()) >= LATEST_VERSION) {
      return;
    }

    // Two processes may open a fresh file at once; re-read the version under the write lock
    this.write(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_migrations (
          version INTEGER PRIMARY KEY,
          applied_at INTEGER NOT NULL
        );
      `);
      const current = this.getSchemaVersion();
      for (const migration of MIGRATIONS) {
        if (migration.version <= current) continue;
        migration.up(this.db);
        this.db
          .prepare('INSERT INTO schema_migrations (version, applied_at) VALUES (?, ?)')
          .run(migration.version, Date.now());
      }
    });
  }

  private guard<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      if (isSqliteBusyError(error)) {
        throw new BusyError(`Database is locked by another process: ${this.path}`);
      }
      throw error;
    }
  }

  /** Runs `operation` inside BEGIN IMMEDIATE; any throw rolls everything back. */
  private write<T>(operation: () => T): T {
    return this.guard(() => this.db.transaction(operation).immediate());
  }

  private findRow(id: number): EntryRow | undefined {
    return this.db
      .prepare<[number], EntryRow>(`SELECT ${ENTRY_COLUMNS} FROM entries e WHERE e.id = ?`)
      .get(id);
  }

  private rowToEntry(row: EntryRow): Entry {
    return createEntry({
      id: row.id,
      body: row.body,
      source: row.source,
      author: parseAuthor(row.author),
      created_at: row.created_at,
      updated_at: row.updated_at
    });
  }

  private requireEntry(id: number): Entry {
    const row = this.findRow(id);
    if (!row) {
      throw new NotFoundError(id);
    }
    return this.rowToEntry(row);
  }

  create(body: string, source: string | undefined, author: AuthorKind): Entry {
    const text = normalizeBody(body);
    const provenance = normalizeSource(source) ?? null;
    const authorText = formatAuthor(normalizeAuthor(author));

    return this.write(() => {
      const now = Date.now();
      const result = this.db
        .prepare(`
          INSERT INTO entries (body, source, author, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?)
        `)
        .run(text, provenance, authorText, now, now);
      return this.requireEntry(Number(result.lastInsertRowid));
    });
  }

  get(id: number): Entry {
    return this.guard(() => this.requireEntry(id));
  }

  update(id: number, body: string): Entry {
    const text = normalizeBody(body);

    return this.write(() => {
      const existing = this.findRow(id);
      if (!existing) {
        throw new NotFoundError(id);
      }
      // Strictly increasing even when the clock has not moved
      const updatedAt = Math.max(Date.now(), existing.updated_at + 1);
      this.db
        .prepare('UPDATE entries SET body = ?, updated_at = ? WHERE id = ?')
        .run(text, updatedAt, id);
      return this.requireEntry(id);
    });
  }

  updateSource(id: number, source: string | undefined): Entry {
    const provenance = normalizeSource(source) ?? null;

    return this.write(() => {
      const existing = this.findRow(id);
      if (!existing) {
        throw new NotFoundError(id);
      }
      const updatedAt = Math.max(Date.now(), existing.updated_at + 1);
      this.db
        .prepare('UPDATE entries SET source = ?, updated_at = ? WHERE id = ?')
        .run(provenance, updatedAt, id);
      return this.requireEntry(id);
    });
  }

  delete(id: number): void {
    this.write(() => {
      const result = this.db.prepare('DELETE FROM entries WHERE id = ?').run(id);
      if (result.changes === 0) {
        throw new NotFoundError(id);
      }
    });
  }

  /** Newest first. A missing limit returns every matching entry. */
  list(filter?: AuthorFilter, limit?: number): Entry[] {
    const where = authorClause(filter);
    const sql = `
      SELECT ${ENTRY_COLUMNS} FROM entries e
      ${where.sql ? `WHERE ${where.sql}` : ''}
      ORDER BY e.created_at DESC, e.id DESC
      LIMIT ?
    `;

    return this.guard(() =>
      this.db
        .prepare<unknown[], EntryRow>(sql)
        .all(...where.params, limit ?? -1)
        .map((row) => this.rowToEntry(row))
    );
  }

  count(filter?: AuthorFilter): number {
    const where = authorClause(filter);
    const sql = `SELECT COUNT(*) AS total FROM entries e ${where.sql ? `WHERE ${where.sql}` : ''}`;
    const row = this.guard(() => this.db.prepare<unknown[], { total: number }>(sql).get(...where.params));
    return row?.total ?? 0;
  }

  /**
   * Executes a parsed query. A phrase is matched through the trigram index and
   * ranked by bm25 (body weighted over source); a substring too short for
   * trigrams is scanned for in case-folded body and source and scores 0.
   */
  searchIndex(plan: SearchPlan, limit: number): SearchHit[] {
    const folded = foldCase(plan.text);
    const [sql, params]: [string, unknown[]] =
      plan.kind === 'phrase'
        ? [
            `
              SELECT ${ENTRY_COLUMNS}, -bm25(entries_fts, 1.0, 0.5) AS score
              FROM entries_fts
              JOIN entries e ON e.id = entries_fts.rowid
              WHERE entries_fts MATCH ?
              ORDER BY score DESC, e.created_at DESC, e.id DESC
              LIMIT ?
            `,
            [quotePhrase(plan.text), limit]
          ]
        : [
            `
              SELECT ${ENTRY_COLUMNS}, 0 AS score
              FROM entries e
              WHERE instr(${FOLD_FUNCTION}(e.body), ?) > 0
                 OR instr(${FOLD_FUNCTION}(coalesce(e.source, '')), ?) > 0
              ORDER BY e.created_at DESC, e.id DESC
              LIMIT ?
            `,
            [folded, folded, limit]
          ];

    return this.guard(() =>
      this.db
        .prepare<unknown[], ScoredRow>(sql)
        .all(...params)
        .map((row) => ({ entry: this.rowToEntry(row), score: row.score }))
    );
  }

  /** Checks the FTS index against the entry table. */
  verifyIndex(): boolean {
    try {
      this.guard(() =>
        this.db.prepare("INSERT INTO entries_fts(entries_fts, rank) VALUES ('integrity-check', 1)").run()
      );
      return true;
    } catch (error) {
      if (errorCode(error)?.startsWith('SQLITE_CORRUPT')) {
        return false;
      }
      throw error;
    }
  }

  /** Regenerates the index from the entry table; entries are never touched. */
  rebuildIndex(): void {
    this.write(() => {
      this.db.prepare("INSERT INTO entries_fts(entries_fts) VALUES ('rebuild')").run();
    });
  }

  close(): void {
    this.db.close();
  }
}
