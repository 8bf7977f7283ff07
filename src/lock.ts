import { mkdirSync, readFileSync, unlinkSync, writeFileSync } from 'fs';
import path from 'path';
import { EditorLockError, errorCode } from './errors.js';

function pidAlive(pid: number): boolean {
  try {
    // Signal 0 only checks for existence
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user
    return errorCode(error) === 'EPERM';
  }
}

function livePid(text: string): number | undefined {
  const pid = /^\d+$/.test(text) ? Number(text) : NaN;
  return Number.isSafeInteger(pid) && pid > 0 && pidAlive(pid) ? pid : undefined;
}

/**
 * Per-entry editor locks held as `<dir>/<id>.lock` files containing the
 * owner's PID. A lock whose PID is gone, or whose file is unreadable as a
 * PID, is stale and gets taken over.
 */
export class EditorLock {
  constructor(
    readonly dir: string,
    private readonly pid: number = process.pid
  ) {}

  lockPath(entryId: number): string {
    return path.join(this.dir, `${entryId}.lock`);
  }

  private read(entryId: number): string | undefined {
    try {
      return readFileSync(this.lockPath(entryId), 'utf8').trim();
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  /** Returns the live PID holding the lock, if any. */
  holder(entryId: number): number | undefined {
    const text = this.read(entryId);
    return text === undefined ? undefined : livePid(text);
  }

  acquire(entryId: number): void {
    mkdirSync(this.dir, { recursive: true });
    if (this.create(entryId)) {
      return;
    }

    const seen = this.read(entryId);
    const current = seen === undefined ? undefined : livePid(seen);
    if (current !== undefined) {
      throw new EditorLockError(entryId, current);
    }

    // Only remove the stale file we inspected; a contender may already have replaced it
    if (seen !== undefined && this.read(entryId) === seen) {
      this.release(entryId);
    }
    if (!this.create(entryId)) {
      throw new EditorLockError(entryId, this.holder(entryId) ?? -1);
    }
  }

  /** Exclusive create; false when a lock file already exists. */
  private create(entryId: number): boolean {
    try {
      writeFileSync(this.lockPath(entryId), String(this.pid), { flag: 'wx' });
      return true;
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return false;
      }
      throw error;
    }
  }

  release(entryId: number): void {
    try {
      unlinkSync(this.lockPath(entryId));
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }
}
