import { describe, it, expect, vi } from 'vitest';
import { AbortedError, PermanentUpstreamError, TransientUpstreamError } from '../../src/errors.js';
import { backoffDelay, retry, sleepWithAbort, type RetryOptions } from '../../src/services/retry.js';
import { createClock } from '../helpers/factories.js';

const transient = () => new TransientUpstreamError('timeout', 'timed out');

function options(overrides: Partial<RetryOptions> = {}): RetryOptions & { delays: number[] } {
  const delays: number[] = [];
  return {
    maxAttempts: 3,
    initialDelayMs: 500,
    maxElapsedMs: 30_000,
    shouldRetry: (error) => error instanceof TransientUpstreamError,
    sleep: async (ms) => {
      delays.push(ms);
    },
    ...overrides,
    delays,
  };
}

describe('backoffDelay', () => {
  it('doubles per attempt up to the cap', () => {
    expect(backoffDelay(1, { initialDelayMs: 500 })).toBe(500);
    expect(backoffDelay(4, { initialDelayMs: 500 })).toBe(4_000);
    expect(backoffDelay(10, { initialDelayMs: 500 })).toBe(8_000);
    expect(backoffDelay(3, { initialDelayMs: 100, multiplier: 3, maxDelayMs: 500 })).toBe(500);
  });
});

describe('retry', () => {
  it('retries transient failures with growing delays', async () => {
    const opts = options();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce('done');

    await expect(retry(operation, opts)).resolves.toBe('done');
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(opts.delays).toEqual([500, 1_000]);
  });

  it('gives up after the last attempt with the last error', async () => {
    const opts = options();
    const last = transient();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(last);

    await expect(retry(operation, opts)).rejects.toBe(last);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors the policy rejects', async () => {
    const opts = options();
    const operation = vi.fn(async () => {
      throw new PermanentUpstreamError('bad request');
    });

    await expect(retry(operation, opts)).rejects.toBeInstanceOf(PermanentUpstreamError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(opts.delays).toEqual([]);
  });

  it('stops when the next delay would pass the elapsed bound', async () => {
    const clock = createClock('2026-03-10T12:00:00Z');
    const opts = options({
      maxAttempts: 10,
      maxElapsedMs: 1_200,
      now: clock.now,
      sleep: async (ms) => {
        clock.advance(ms);
      },
    });
    const operation = vi.fn(async () => {
      throw transient();
    });

    await expect(retry(operation, opts)).rejects.toBeInstanceOf(TransientUpstreamError);
    // 500ms after the first attempt; a further 1000ms would end at 1500ms.
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('reports each retry', async () => {
    const onRetry = vi.fn();
    const error = transient();
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValueOnce(error).mockResolvedValueOnce('ok');

    await retry(operation, options({ onRetry }));
    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, delayMs: 500, error });
  });

  it('does not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'never');

    await expect(retry(operation, options({ signal: controller.signal }))).rejects.toBeInstanceOf(AbortedError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('turns a failure after abort into AbortedError', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async () => {
      controller.abort();
      throw transient();
    });

    await expect(retry(operation, options({ signal: controller.signal }))).rejects.toBeInstanceOf(AbortedError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('sleepWithAbort', () => {
  it('resolves after the delay', async () => {
    await expect(sleepWithAbort(1)).resolves.toBeUndefined();
  });

  it('rejects when the signal fires', async () => {
    const controller = new AbortController();
    const sleeping = sleepWithAbort(60_000, controller.signal);
    controller.abort();

    await expect(sleeping).rejects.toBeInstanceOf(AbortedError);
  });

  it('rejects immediately for an aborted signal', async () => {
    await expect(sleepWithAbort(60_000, AbortSignal.abort())).rejects.toBeInstanceOf(AbortedError);
  });
});
