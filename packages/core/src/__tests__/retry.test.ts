import { describe, it, expect, vi } from 'vitest';
import { computeBackoff, withRetry, sleep, RetryExhaustedError } from '../retry.js';
import type { RetryPolicy } from '../retry.js';

const fast: RetryPolicy = { attempts: 3, baseDelayMs: 1, maxDelayMs: 4 };

describe('computeBackoff', () => {
  const policy: RetryPolicy = { attempts: 5, baseDelayMs: 1000, maxDelayMs: 30_000 };

  it('should double the delay per attempt', () => {
    expect([1, 2, 3, 4].map((attempt) => computeBackoff(policy, attempt))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('should cap at maxDelayMs', () => {
    expect(computeBackoff(policy, 10)).toBe(30_000);
  });

  it('should keep jittered delays within [delay/2, delay]', () => {
    const jittered = { ...policy, jitter: true };
    expect(computeBackoff(jittered, 3, () => 0)).toBe(2000);
    expect(computeBackoff(jittered, 3, () => 1)).toBe(4000);
  });
});

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const operation = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`transient ${attempt}`);
      return 'ok';
    });

    await expect(withRetry(operation, fast)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should report each retry', async () => {
    const onRetry = vi.fn();
    await withRetry(
      async (attempt) => {
        if (attempt === 1) throw new Error('once');
        return attempt;
      },
      fast,
      { onRetry }
    );

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[1]).toBe(1);
  });

  it('should throw RetryExhaustedError carrying the last failure', async () => {
    const failure = await withRetry(async (attempt) => {
      throw new Error(`attempt ${attempt}`);
    }, fast).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(RetryExhaustedError);
    expect(failure).toMatchObject({ attempts: 3, message: 'Gave up after 3 attempt(s): attempt 3' });
  });

  it('should rethrow non-retryable errors immediately', async () => {
    const operation = vi.fn(async () => {
      throw new Error('checksum mismatch');
    });

    await expect(withRetry(operation, fast, { shouldRetry: () => false })).rejects.toThrow('checksum mismatch');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should stop once the signal aborts', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      controller.abort(new Error('cancelled'));
      throw new Error('network down');
    });

    await expect(withRetry(operation, fast, { signal: controller.signal })).rejects.toThrow('network down');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('sleep', () => {
  it('should reject with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('stop'));
    await expect(pending).rejects.toThrow('stop');
  });
});
