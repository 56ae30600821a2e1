import { AbortedError, CircuitOpenError, RateLimitedError, TransientUpstreamError, describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { CircuitBreaker, CallOutcome } from './circuit-breaker.js';
import type { CostController } from './cost-controller.js';
import type { LlmClient, LlmCompletion, LlmRequest } from './llm-client.js';
import type { SlidingWindowRateLimiter } from './rate-limiter.js';
import { retry, type RetryOptions } from './retry.js';

export type RetryPolicy = Pick<RetryOptions, 'maxAttempts' | 'initialDelayMs' | 'maxDelayMs' | 'maxElapsedMs' | 'sleep'>;

export interface InvocationGuardOptions {
  client: LlmClient;
  rateLimiter: SlidingWindowRateLimiter;
  circuitBreaker: CircuitBreaker;
  costController: CostController;
  retry: RetryPolicy;
  /** Spend the budget pre-check reserves for one call. */
  estimatedCallUsd: number;
  logger: Logger;
}

/** Connection drops and timeouts are worth another attempt; 429s are not. */
export function isRetryable(error: unknown): boolean {
  return error instanceof TransientUpstreamError && error.reason !== 'throttled';
}

/** Only transient upstream failures (429s included) move the breaker. */
export function circuitOutcome(error: unknown): CallOutcome {
  return error instanceof TransientUpstreamError ? 'failure' : 'ignored';
}

/**
 * Wraps every LLM call. In order: per-chat rate limit, budget pre-check,
 * then retry of transient failures with each attempt passing through the
 * circuit breaker. Every call that reached the provider is charged to the
 * cost ledger once; an aborted call is not charged.
 */
export class InvocationGuard {
  private readonly logger: Logger;

  constructor(private readonly options: InvocationGuardOptions) {
    this.logger = options.logger.child({ component: 'invocation-guard' });
  }

  async invoke(chatId: string, request: LlmRequest, options: { signal?: AbortSignal } = {}): Promise<LlmCompletion> {
    const { client, rateLimiter, circuitBreaker, costController } = this.options;

    const decision = rateLimiter.tryAcquire(chatId);
    if (!decision.allowed) {
      throw new RateLimitedError(chatId, decision.retryAfterMs);
    }

    costController.assertBudget(this.options.estimatedCallUsd);

    let attempts = 0;
    let completion: LlmCompletion;
    try {
      completion = await retry(
        () =>
          circuitBreaker.execute(() => {
            attempts++;
            return client.complete(request, { signal: options.signal });
          }),
        {
          ...this.options.retry,
          shouldRetry: isRetryable,
          signal: options.signal,
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger.warn({ chatId, attempt, delayMs, error: describeError(error) }, 'Retrying LLM call');
          },
        }
      );
    } catch (error) {
      if (attempts > 0 && !(error instanceof AbortedError)) {
        costController.record(0, 'failure');
      }
      if (error instanceof CircuitOpenError) {
        this.logger.warn({ chatId, retryAt: error.retryAt }, 'LLM circuit open');
      } else if (!(error instanceof AbortedError)) {
        this.logger.error({ chatId, attempts, error: describeError(error) }, 'LLM call failed');
      }
      throw error;
    }

    const costUsd = costController.costOf(completion.usage);
    costController.record(costUsd, 'success');
    this.logger.debug({ chatId, attempts, costUsd, ...completion.usage }, 'LLM call completed');
    return completion;
  }
}
