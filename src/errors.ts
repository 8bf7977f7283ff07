export type ErrorKind =
  | 'ValidationError'
  | 'NotFoundError'
  | 'BusyError'
  | 'EditorError'
  | 'EditorLockError';

/**
 * Base class for every error a core operation raises.
 * Surfaces switch on `kind` to build a message for their transport.
 */
export abstract class HighlightError extends Error {
  abstract readonly kind: ErrorKind;
}

export class ValidationError extends HighlightError {
  readonly kind = 'ValidationError';
}

export class NotFoundError extends HighlightError {
  readonly kind = 'NotFoundError';

  constructor(readonly entryId: number) {
    super(`No entry with id ${entryId}`);
  }
}

/** Transient lock contention on the database file; safe to retry. */
export class BusyError extends HighlightError {
  readonly kind = 'BusyError';
}

export class EditorError extends HighlightError {
  readonly kind = 'EditorError';
}

export class EditorLockError extends HighlightError {
  readonly kind = 'EditorLockError';

  constructor(
    readonly entryId: number,
    readonly pid: number
  ) {
    super(`Entry #${entryId} is already being edited (pid ${pid})`);
  }
}

export function isHighlightError(error: unknown): error is HighlightError {
  return error instanceof HighlightError;
}

export function describeError(error: unknown): string {
  if (isHighlightError(error)) {
    return `${error.kind}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

const BUSY_CODES = new Set(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_BUSY_RECOVERY', 'SQLITE_LOCKED']);

export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isSqliteBusyError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && BUSY_CODES.has(code);
}
