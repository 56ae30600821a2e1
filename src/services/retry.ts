import { AbortedError } from '../errors.js';
import { systemClock, type Clock } from '../types/clock.js';

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs?: number;
  multiplier?: number;
}

/** delay = initialDelay * multiplier^(attempt-1), capped. `attempt` is 1-based. */
export function backoffDelay(attempt: number, options: BackoffOptions): number {
  const { initialDelayMs, maxDelayMs = 8_000, multiplier = 2 } = options;
  return Math.min(initialDelayMs * Math.pow(multiplier, attempt - 1), maxDelayMs);
}

/**
 * Sleep with abort support.
 */
export function sleepWithAbort(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions extends BackoffOptions {
  maxAttempts: number;
  /** Retries stop once the next delay would end past this bound. */
  maxElapsedMs: number;
  shouldRetry: (error: unknown) => boolean;
  signal?: AbortSignal;
  now?: Clock;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (event: RetryEvent) => void;
}

/**
 * Runs `operation` until it succeeds, throws a non-retryable error, or the
 * attempt or elapsed-time bound is reached; the last error is rethrown.
 * An aborted signal ends the loop with `AbortedError`.
 */
export async function retry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const now = options.now ?? systemClock;
  const sleep = options.sleep ?? sleepWithAbort;
  const startedAt = now().getTime();

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new AbortedError();
    }

    try {
      return await operation(attempt);
    } catch (error) {
      if (options.signal?.aborted) {
        throw new AbortedError();
      }
      if (attempt >= options.maxAttempts || !options.shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, options);
      if (now().getTime() - startedAt + delayMs > options.maxElapsedMs) {
        throw error;
      }
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }
}
