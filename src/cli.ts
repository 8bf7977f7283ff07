import { Command, CommanderError } from 'commander';
import { dirname, join } from 'path';
import { createInterface } from 'readline/promises';
import { CaptureWorkflow } from './capture.js';
import { loadConfig, type HlConfig } from './config.js';
import { HighlightsDatabase } from './database.js';
import { createEditorSession, resolveEditorCommand, type EditorSession } from './editor.js';
import { HUMAN, parseAuthorFilter, parseEntryId } from './entry.js';
import { describeError, isHighlightError, ValidationError } from './errors.js';
import { formatFull, formatHit, formatPickerLine, formatShort } from './format.js';
import { EditorLock } from './lock.js';
import { createLogger, type Logger } from './logger.js';
import { pick } from './picker.js';
import { DEFAULT_LIMIT, QueryEngine } from './query.js';
import { withBusyRetry } from './retry.js';

const PICKER_SIZE = 50;

interface TextSink {
  write(text: string): unknown;
}

export interface CliContext {
  config: HlConfig;
  logger: Logger;
  stdout: TextSink;
  stderr: TextSink;
  session: EditorSession;
  confirm: (question: string) => Promise<boolean>;
  pick: (items: string[]) => Promise<number | null>;
  openDatabase?: (dbPath: string) => HighlightsDatabase;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(limit) || limit < 1) {
    throw new ValidationError(`Invalid limit: "${value}"`);
  }
  return limit;
}

async function confirmOnTerminal(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

export function defaultCliContext(): CliContext {
  const config = loadConfig();
  return {
    config,
    logger: createLogger(config.debug),
    stdout: process.stdout,
    stderr: process.stderr,
    session: createEditorSession({ command: resolveEditorCommand(config.editor) }),
    confirm: confirmOnTerminal,
    pick: (items) => pick(items, process.stdin, process.stdout)
  };
}

/**
 * Runs one `hl` invocation and resolves to its exit code. Core errors are
 * printed to stderr as `<kind>: <message>` and give exit code 1.
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const { config, logger, stdout, stderr } = ctx;
  let exitCode = 0;
  const opened: { db?: HighlightsDatabase } = {};

  const print = (text: string) => {
    stdout.write(`${text}\n`);
  };

  const program = new Command();

  program
    .name('hl')
    .description('Capture and search highlights')
    .version('1.0.0')
    .option('--db-path <path>', 'Database file path', config.dbPath)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text)
    });

  const openDatabase = (): HighlightsDatabase => {
    if (!opened.db) {
      const dbPath: string = program.opts<{ dbPath: string }>().dbPath;
      logger.debug(`opening ${dbPath}`);
      opened.db = ctx.openDatabase
        ? ctx.openDatabase(dbPath)
        : new HighlightsDatabase(dbPath, { busyTimeoutMs: config.busyTimeoutMs });
    }
    return opened.db;
  };

  const retry = <T>(operation: () => T): Promise<T> =>
    withBusyRetry(operation, { retries: config.busyRetries, logger });

  const workflow = (): CaptureWorkflow => {
    const store = openDatabase();
    return new CaptureWorkflow({
      db: store,
      session: ctx.session,
      lock: new EditorLock(join(dirname(store.path), 'locks')),
      busyRetries: config.busyRetries,
      logger
    });
  };

  program
    .command('add')
    .description('Open the editor to capture a highlight')
    .option('-s, --source <source>', 'Where this came from (URL, book, etc)')
    .action(async (options: { source?: string }) => {
      const entry = await workflow().capture({ source: options.source, author: HUMAN });
      if (!entry) {
        print('Aborted: empty.');
        exitCode = 1;
        return;
      }
      print(`Saved #${entry.id}`);
    });

  program
    .command('search')
    .description('Full-text search over highlights')
    .argument('<terms...>', 'Search terms')
    .option('-n, --limit <n>', 'Max results', parseLimit, DEFAULT_LIMIT)
    .action(async (terms: string[], options: { limit: number }) => {
      const query = new QueryEngine(openDatabase());
      const hits = await retry(() => query.search(terms.join(' '), options.limit));
      if (hits.length === 0) {
        print('No results.');
        exitCode = 1;
        return;
      }
      print(hits.map(formatHit).join('\n\n'));
    });

  program
    .command('show')
    .description('Show a highlight in full')
    .argument('<id>', 'Entry ID')
    .action(async (id: string) => {
      const store = openDatabase();
      const entry = await retry(() => store.get(parseEntryId(id)));
      print(formatFull(entry));
    });

  program
    .command('recent')
    .alias('ls')
    .description('List recent highlights, newest first')
    .option('-n, --limit <n>', 'Max results', parseLimit, DEFAULT_LIMIT)
    .option('-a, --author <filter>', 'human, ai, ai:* or ai:<agent>')
    .action(async (options: { limit: number; author?: string }) => {
      const filter = options.author !== undefined ? parseAuthorFilter(options.author) : undefined;
      const query = new QueryEngine(openDatabase());
      const entries = await retry(() => query.recent(options.limit, filter));
      if (entries.length === 0) {
        print('No highlights yet.');
        return;
      }
      print(entries.map((entry) => formatShort(entry)).join('\n'));
    });

  program
    .command('ed')
    .description('Edit a highlight in the editor (pick one when no id is given)')
    .argument('[id]', 'Entry ID')
    .option('-s, --source <source>', 'Set the source instead of editing the text ("" clears it)')
    .action(async (id: string | undefined, options: { source?: string }) => {
      let entryId: number;
      if (id === undefined) {
        const query = new QueryEngine(openDatabase());
        const entries = await retry(() => query.recent(PICKER_SIZE));
        if (entries.length === 0) {
          print('No highlights yet.');
          return;
        }
        const index = await ctx.pick(entries.map(formatPickerLine));
        const picked = index === null ? undefined : entries[index];
        if (!picked) {
          return;
        }
        entryId = picked.id;
      } else {
        entryId = parseEntryId(id);
      }

      if (options.source !== undefined) {
        const store = openDatabase();
        const source = options.source;
        await retry(() => store.updateSource(entryId, source));
        print(`Updated #${entryId}`);
        return;
      }

      const outcome = await workflow().edit(entryId);
      switch (outcome.status) {
        case 'updated':
          print(`Updated #${outcome.entry.id}`);
          break;
        case 'unchanged':
        case 'cancelled':
          print('No changes.');
          break;
      }
    });

  program
    .command('rm')
    .description('Delete a highlight')
    .argument('<id>', 'Entry ID')
    .option('-f, --force', 'Skip confirmation', false)
    .action(async (id: string, options: { force: boolean }) => {
      const entryId = parseEntryId(id);
      const store = openDatabase();
      const entry = await retry(() => store.get(entryId));

      if (!options.force) {
        print(formatShort(entry));
        if (!(await ctx.confirm('Delete? [y/N] '))) {
          return;
        }
      }

      await retry(() => store.delete(entryId));
      print(`Deleted #${entryId}`);
    });

  program
    .command('reindex')
    .description('Rebuild the search index from the stored highlights')
    .option('--check', 'Only verify the index against the stored highlights', false)
    .action(async (options: { check: boolean }) => {
      const store = openDatabase();
      if (options.check) {
        if (await retry(() => store.verifyIndex())) {
          print('Index OK.');
        } else {
          print('Index is inconsistent; run "hl reindex" to rebuild it.');
          exitCode = 1;
        }
        return;
      }

      await retry(() => store.rebuildIndex());
      const total = await retry(() => store.count());
      print(`Rebuilt index for ${total} highlight${total === 1 ? '' : 's'}.`);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isHighlightError(error)) {
      logger.debug('command failed', { kind: error.kind });
      stderr.write(`${describeError(error)}\n`);
      return 1;
    }
    throw error;
  } finally {
    opened.db?.close();
  }
}
