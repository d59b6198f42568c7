import { describe, expect, it, vi } from 'vitest';
import { CancelledError } from './errors.ts';
import { calculateBackoff, withRetry } from './retry.ts';

describe('calculateBackoff', () => {
  it('should grow linearly or exponentially', () => {
    expect([0, 1, 2].map((attempt) => calculateBackoff(attempt, 'linear', 100))).toEqual([
      100, 200, 300,
    ]);
    expect([0, 1, 2].map((attempt) => calculateBackoff(attempt, 'exponential', 100))).toEqual([
      100, 200, 400,
    ]);
  });
});

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn(async (attempt: number) => `attempt ${attempt}`);
    await expect(withRetry(fn, { count: 2, backoff: 'linear', baseDelay: 0 })).resolves.toBe(
      'attempt 1'
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry until an attempt succeeds', async () => {
    const retries: number[] = [];
    const result = await withRetry(
      async (attempt) => {
        if (attempt < 3) throw new Error(`fail ${attempt}`);
        return attempt;
      },
      { count: 3, backoff: 'linear', baseDelay: 1 },
      { onRetry: (attempt) => retries.push(attempt) }
    );
    expect(result).toBe(3);
    expect(retries).toEqual([1, 2]);
  });

  it('should throw the last error once retries are exhausted', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async (attempt) => {
          calls++;
          throw new Error(`fail ${attempt}`);
        },
        { count: 1, backoff: 'linear', baseDelay: 0 }
      )
    ).rejects.toThrow('fail 2');
    expect(calls).toBe(2);
  });

  it('should stop when shouldRetry refuses', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new CancelledError('stop');
        },
        { count: 5, backoff: 'linear', baseDelay: 0 },
        { shouldRetry: (error) => !(error instanceof CancelledError) }
      )
    ).rejects.toBeInstanceOf(CancelledError);
    expect(calls).toBe(1);
  });

  it('should abort the backoff wait', async () => {
    const controller = new AbortController();
    const pending = withRetry(
      async () => {
        throw new Error('boom');
      },
      { count: 1, backoff: 'linear', baseDelay: 60_000 },
      { signal: controller.signal, onRetry: () => controller.abort() }
    );
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
