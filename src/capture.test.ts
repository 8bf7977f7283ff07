import { existsSync } from 'fs';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CaptureWorkflow } from './capture.js';
import { HighlightsDatabase } from './database.js';
import type { EditorSession } from './editor.js';
import { HUMAN } from './entry.js';
import { EditorError, EditorLockError, NotFoundError } from './errors.js';
import { EditorLock } from './lock.js';

async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'hl-capture-test-'));
}

describe('CaptureWorkflow', () => {
  let db: HighlightsDatabase;
  let lock: EditorLock;

  beforeEach(async () => {
    const dir = await createTempDir();
    db = new HighlightsDatabase(path.join(dir, 'highlights.db'));
    lock = new EditorLock(path.join(dir, 'locks'));
  });

  afterEach(() => {
    db.close();
  });

  function workflow(session: EditorSession): CaptureWorkflow {
    return new CaptureWorkflow({ db, session, lock, busyRetries: 0 });
  }

  describe('capture', () => {
    it('stores the text from an empty buffer', async () => {
      const session = vi.fn<EditorSession>().mockResolvedValue('captured text');

      const entry = await workflow(session).capture({ source: 'talk', author: HUMAN });

      expect(session).toHaveBeenCalledWith('');
      expect(entry?.body).toBe('captured text');
      expect(entry?.source).toBe('talk');
      expect(db.count()).toBe(1);
    });

    it('stores nothing when the buffer is left empty', async () => {
      const session = vi.fn<EditorSession>().mockResolvedValue(null);

      await expect(workflow(session).capture({ author: HUMAN })).resolves.toBeNull();
      expect(db.count()).toBe(0);
    });

    it('stores nothing when the editor fails', async () => {
      const session = vi.fn<EditorSession>().mockRejectedValue(new EditorError('crashed'));

      await expect(workflow(session).capture({ author: HUMAN })).rejects.toThrow(EditorError);
      expect(db.count()).toBe(0);
    });
  });

  describe('edit', () => {
    it('seeds the editor with the body and saves a change', async () => {
      const entry = db.create('original body', undefined, HUMAN);
      const session = vi.fn<EditorSession>().mockResolvedValue('edited body');

      const outcome = await workflow(session).edit(entry.id);

      expect(session).toHaveBeenCalledWith('original body');
      expect(outcome.status).toBe('updated');
      expect(outcome.entry.body).toBe('edited body');
      expect(db.get(entry.id).body).toBe('edited body');
    });

    it('reports an identical buffer as unchanged', async () => {
      const entry = db.create('same body', undefined, HUMAN);
      const session = vi.fn<EditorSession>().mockResolvedValue('same body');

      const outcome = await workflow(session).edit(entry.id);

      expect(outcome).toEqual({ status: 'unchanged', entry });
      expect(db.get(entry.id).updated_at).toBe(entry.updated_at);
    });

    it('keeps the entry when the buffer is emptied', async () => {
      const entry = db.create('keep me', undefined, HUMAN);
      const session = vi.fn<EditorSession>().mockResolvedValue(null);

      await expect(workflow(session).edit(entry.id)).resolves.toEqual({ status: 'cancelled', entry });
      expect(db.get(entry.id)).toEqual(entry);
    });

    it('fails before opening the editor for an unknown id', async () => {
      const session = vi.fn<EditorSession>();

      await expect(workflow(session).edit(99)).rejects.toThrow(NotFoundError);
      expect(session).not.toHaveBeenCalled();
    });

    it('holds the entry lock only while the editor is open', async () => {
      const entry = db.create('locked body', undefined, HUMAN);
      let lockedDuringSession = false;
      const session = vi.fn<EditorSession>(async () => {
        lockedDuringSession = existsSync(lock.lockPath(entry.id));
        return 'unlocked body';
      });

      await workflow(session).edit(entry.id);

      expect(lockedDuringSession).toBe(true);
      expect(existsSync(lock.lockPath(entry.id))).toBe(false);
    });

    it('releases the lock when the editor fails', async () => {
      const entry = db.create('body', undefined, HUMAN);
      const session = vi.fn<EditorSession>().mockRejectedValue(new EditorError('crashed'));

      await expect(workflow(session).edit(entry.id)).rejects.toThrow(EditorError);
      expect(existsSync(lock.lockPath(entry.id))).toBe(false);
      expect(db.get(entry.id).body).toBe('body');
    });

    it('refuses to open an entry another process is editing', async () => {
      const entry = db.create('busy body', undefined, HUMAN);
      new EditorLock(lock.dir, process.ppid).acquire(entry.id);
      const session = vi.fn<EditorSession>();

      await expect(workflow(session).edit(entry.id)).rejects.toThrow(EditorLockError);
      expect(session).not.toHaveBeenCalled();
    });

    it('reports an entry deleted while the editor was open', async () => {
      const entry = db.create('doomed', undefined, HUMAN);
      const session = vi.fn<EditorSession>(async () => {
        db.delete(entry.id);
        return 'too late';
      });

      await expect(workflow(session).edit(entry.id)).rejects.toThrow(NotFoundError);
      expect(existsSync(lock.lockPath(entry.id))).toBe(false);
      expect(db.count()).toBe(0);
    });
  });
});
