/**
 * Fetch-level retry. Stages themselves are never retried.
 */

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Randomise each delay within [delay/2, delay]. */
  jitter?: boolean;
}

export const DEFAULT_FETCH_RETRY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitter: true,
};

export interface RetryOptions {
  signal?: AbortSignal;
  /** Return false to surface the error immediately. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`,
      { cause: lastError }
    );
    this.name = 'RetryExhaustedError';
  }
}

/** Exponential backoff capped at `maxDelayMs`. `attempt` is 1-based. */
export function computeBackoff(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  if (!policy.jitter) return exponential;
  return Math.round(exponential / 2 + random() * (exponential / 2));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation` until it succeeds or the policy is exhausted.
 * Throws `RetryExhaustedError` carrying the last failure; an abort or a
 * non-retryable error is rethrown as-is.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (err) {
      if (options.signal?.aborted) throw err;
      if (options.shouldRetry && !options.shouldRetry(err, attempt)) throw err;
      lastError = err;
      if (attempt < attempts) {
        const delay = computeBackoff(policy, attempt);
        options.onRetry?.(err, attempt, delay);
        await sleep(delay, options.signal);
      }
    }
  }

  throw new RetryExhaustedError(attempts, lastError);
}
