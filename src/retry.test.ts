import { describe, expect, it, vi } from 'vitest';

import { BusyError, ValidationError } from './errors.js';
import type { Logger } from './logger.js';
import { withBusyRetry } from './retry.js';

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('withBusyRetry', () => {
  it('returns the result once the database frees up', async () => {
    const logger = silentLogger();
    let calls = 0;
    const result = await withBusyRetry(
      () => {
        calls++;
        if (calls < 3) {
          throw new BusyError('locked');
        }
        return 'ok';
      },
      { retries: 3, delayMs: 0, logger }
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(logger.debug).toHaveBeenCalledWith('database busy, retrying (1/3)');
    expect(logger.debug).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured retries', async () => {
    let calls = 0;
    const operation = () => {
      calls++;
      throw new BusyError('still locked');
    };

    await expect(withBusyRetry(operation, { retries: 1, delayMs: 0 })).rejects.toThrow(BusyError);
    expect(calls).toBe(2);
  });

  it('does not retry other errors', async () => {
    let calls = 0;
    const operation = () => {
      calls++;
      throw new ValidationError('bad');
    };

    await expect(withBusyRetry(operation, { retries: 3, delayMs: 0 })).rejects.toThrow(ValidationError);
    expect(calls).toBe(1);
  });
});
