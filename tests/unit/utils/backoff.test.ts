import { describe, it, expect, vi, afterEach } from 'vitest';
import { calculateBackoffDelay, withRetry } from '../../../src/utils/backoff.js';

const NO_DELAY = { baseDelayMs: 0, maxDelayMs: 0 };

describe('calculateBackoffDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('doubles per attempt up to the cap without jitter', () => {
    const config = { baseDelayMs: 500, maxDelayMs: 10_000, jitterFraction: 0 };
    expect(calculateBackoffDelay(0, config)).toBe(500);
    expect(calculateBackoffDelay(1, config)).toBe(1000);
    expect(calculateBackoffDelay(3, config)).toBe(4000);
    expect(calculateBackoffDelay(5, config)).toBe(10_000);
  });

  it('applies jitter around the delay', () => {
    vi.spyOn(Math, 'random').mockReturnValue(1);
    expect(calculateBackoffDelay(0, { baseDelayMs: 1000, jitterFraction: 0.25 })).toBe(1250);
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateBackoffDelay(0, { baseDelayMs: 1000, jitterFraction: 0.25 })).toBe(750);
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('transient'))
      .mockRejectedValueOnce(new Error('transient'))
      .mockResolvedValueOnce('done');

    await expect(withRetry(fn, () => true, { ...NO_DELAY, maxAttempts: 3 })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('re-throws errors the predicate rejects without retrying', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('fatal'));
    await expect(withRetry(fn, () => false, { ...NO_DELAY, maxAttempts: 3 })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws the last error once attempts are exhausted', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));
    await expect(withRetry(fn, () => true, { ...NO_DELAY, maxAttempts: 2 })).rejects.toThrow('second');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
