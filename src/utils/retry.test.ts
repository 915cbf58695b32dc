import { afterEach, describe, expect, it, vi } from 'vitest';
import { withRetry } from './retry.js';

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('waits the same delay before every retry when factor is 1', async () => {
    vi.useFakeTimers();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');

    const pending = withRetry(fn, { maxAttempts: 3, initialDelayMs: 2000, maxDelayMs: 2000, factor: 1 });

    await vi.advanceTimersByTimeAsync(1999);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(1999);
    expect(fn).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(3);

    await expect(pending).resolves.toBe('ok');
    expect(fn.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('last'));

    await expect(withRetry(fn, { maxAttempts: 2, initialDelayMs: 0 })).rejects.toThrow('last');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry after a success', async () => {
    const fn = vi.fn<(attempt: number) => Promise<number>>().mockResolvedValue(42);

    await expect(withRetry(fn, { maxAttempts: 3, initialDelayMs: 0 })).resolves.toBe(42);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
