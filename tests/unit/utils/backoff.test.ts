/**
 * Unit tests for retry with exponential backoff
 *
 * @module tests/unit/utils/backoff
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { retryDelay, withRetry } from '../../../src/utils/backoff.js';

const NO_JITTER = { baseDelayMs: 100, maxDelayMs: 1000, jitterFraction: 0 };

describe('retryDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should double per attempt up to the cap', () => {
    expect([0, 1, 2, 3, 4, 5].map((a) => retryDelay(a, NO_JITTER))).toEqual([100, 200, 400, 800, 1000, 1000]);
  });

  it('should spread delays by the jitter fraction', () => {
    vi.spyOn(Math, 'random').mockReturnValue(1);
    expect(retryDelay(0, { baseDelayMs: 100, jitterFraction: 0.25 })).toBe(125);

    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(retryDelay(0, { baseDelayMs: 100, jitterFraction: 0.25 })).toBe(75);
  });
});

describe('withRetry', () => {
  const fast = { baseDelayMs: 1, maxDelayMs: 1, jitterFraction: 0 };

  it('should return the first successful result', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok');

    await expect(withRetry(fn, () => true, fast)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should stop after maxAttempts and rethrow the last error', async () => {
    let calls = 0;
    const fn = async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry(fn, () => true, { ...fast, maxAttempts: 4 })).rejects.toThrow('failure 4');
    expect(calls).toBe(4);
  });

  it('should not retry errors the predicate rejects', async () => {
    const fn = vi.fn().mockRejectedValue(new TypeError('bug'));

    await expect(withRetry(fn, (e) => !(e instanceof TypeError), fast)).rejects.toThrow('bug');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
