import type { HighlightsDatabase } from './database.js';
import type { EditorSession } from './editor.js';
import type { EditorLock } from './lock.js';
import type { Logger } from './logger.js';
import { withBusyRetry } from './retry.js';
import type { AuthorKind, Entry } from './types.js';

export type EditOutcome =
  | { status: 'updated'; entry: Entry }
  | { status: 'unchanged'; entry: Entry }
  | { status: 'cancelled'; entry: Entry };

export interface CaptureWorkflowOptions {
  db: HighlightsDatabase;
  session: EditorSession;
  lock?: EditorLock;
  busyRetries?: number;
  logger?: Logger;
}

/**
 * Produces entry text through an external editor and hands it to the store.
 * The editor always runs outside any database transaction.
 */
export class CaptureWorkflow {
  constructor(private readonly options: CaptureWorkflowOptions) {}

  private persist<T>(operation: () => T): Promise<T> {
    return withBusyRetry(operation, {
      retries: this.options.busyRetries ?? 3,
      logger: this.options.logger
    });
  }

  /** Resolves to null when the user leaves the buffer empty. */
  async capture(params: { source?: string; author: AuthorKind }): Promise<Entry | null> {
    const text = await this.options.session('');
    if (text === null) {
      return null;
    }
    const { db } = this.options;
    return this.persist(() => db.create(text, params.source, params.author));
  }

  async edit(id: number): Promise<EditOutcome> {
    const { db, lock, session } = this.options;
    const entry = await this.persist(() => db.get(id));

    lock?.acquire(id);
    try {
      const text = await session(entry.body);
      if (text === null) {
        return { status: 'cancelled', entry };
      }
      if (text === entry.body) {
        return { status: 'unchanged', entry };
      }
      const updated = await this.persist(() => db.update(id, text));
      return { status: 'updated', entry: updated };
    } finally {
      lock?.release(id);
    }
  }
}
