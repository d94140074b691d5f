import { describe, it, expect, vi } from 'vitest';
import {
  NonRetryableError,
  TransientError,
  calculateDelay,
  isRetryableStatus,
  isTransientError,
  withRetry,
  type RetryInfo,
} from './retry';

describe('isRetryableStatus', () => {
  it('retries rate limits and server errors only', () => {
    expect(isRetryableStatus(429)).toBe(true);
    expect(isRetryableStatus(500)).toBe(true);
    expect(isRetryableStatus(503)).toBe(true);
    expect(isRetryableStatus(401)).toBe(false);
    expect(isRetryableStatus(404)).toBe(false);
    expect(isRetryableStatus(505)).toBe(false);
  });
});

describe('isTransientError', () => {
  it('classifies typed errors by their class', () => {
    expect(isTransientError(new TransientError('slow down', 429))).toBe(true);
    expect(isTransientError(new NonRetryableError('fetch failed', 404))).toBe(false);
  });

  it('recognizes network failures by message', () => {
    expect(isTransientError(new Error('read ECONNRESET'))).toBe(true);
    expect(isTransientError(new TypeError('fetch failed'))).toBe(true);
    expect(isTransientError(new Error('Unexpected token < in JSON'))).toBe(false);
  });

  it('treats aborted requests as transient', () => {
    const err = new Error('The operation was aborted due to timeout');
    err.name = 'TimeoutError';
    expect(isTransientError(err)).toBe(true);
  });
});

describe('calculateDelay', () => {
  it('grows exponentially and caps at maxDelay without jitter', () => {
    const config = { minDelay: 100, maxDelay: 500, jitter: 0, backoffMultiplier: 2 };
    expect(calculateDelay(1, config)).toBe(100);
    expect(calculateDelay(2, config)).toBe(200);
    expect(calculateDelay(3, config)).toBe(400);
    expect(calculateDelay(4, config)).toBe(500);
  });
});

describe('withRetry', () => {
  const fast = { minDelay: 0, maxDelay: 0, jitter: 0 };

  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');
    await expect(withRetry(fn, fast)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
  });

  it('repeats transient failures until one succeeds', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientError('HTTP 503', 503))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce('done');

    await expect(withRetry(fn, fast)).resolves.toBe('done');
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
  });

  it('gives up after maxAttempts with the last error', async () => {
    const fn = vi.fn().mockRejectedValue(new TransientError('HTTP 502', 502));
    const seen: RetryInfo[] = [];

    await expect(
      withRetry(fn, { ...fast, maxAttempts: 2, onRetry: (info) => seen.push(info) }),
    ).rejects.toThrow('HTTP 502');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(seen.map((i) => i.willRetry)).toEqual([true, false]);
  });

  it('does not repeat non-retryable failures', async () => {
    const fn = vi.fn().mockRejectedValue(new NonRetryableError('HTTP 401', 401));

    await expect(withRetry(fn, fast)).rejects.toBeInstanceOf(NonRetryableError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('wraps thrown non-errors', async () => {
    const fn = vi.fn().mockRejectedValue('boom');
    await expect(withRetry(fn, { ...fast, maxAttempts: 1 })).rejects.toThrow('boom');
  });
});
