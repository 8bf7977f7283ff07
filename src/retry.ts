import { BusyError } from './errors.js';
import type { Logger } from './logger.js';

export interface RetryOptions {
  /** Extra attempts after the first one. */
  retries: number;
  delayMs?: number;
  logger?: Logger;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Re-runs `operation` while it fails with BusyError, up to `retries` times
 * with a linear backoff. Any other error propagates at once.
 */
export async function withBusyRetry<T>(operation: () => T | Promise<T>, options: RetryOptions): Promise<T> {
  const delayMs = options.delayMs ?? 100;
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof BusyError) || attempt >= options.retries) {
        throw error;
      }
      options.logger?.debug(`database busy, retrying (${attempt + 1}/${options.retries})`);
      await sleep(delayMs * (attempt + 1));
    }
  }
}
