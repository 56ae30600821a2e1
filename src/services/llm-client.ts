import fs from 'fs';
import { fileURLToPath } from 'url';
import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  RateLimitError,
} from 'openai';
import { AbortedError, PermanentUpstreamError, TransientUpstreamError } from '../errors.js';
import type { TokenUsage } from './cost-controller.js';
import { formatInTimezone } from './timezone.js';

export interface LlmRequest {
  text: string;
  now: Date;
  timezone: string;
}

export interface LlmCompletion {
  text: string;
  usage: TokenUsage;
}

/** The one call the pipeline makes to a language model. */
export interface LlmClient {
  complete(request: LlmRequest, options?: { signal?: AbortSignal }): Promise<LlmCompletion>;
}

export const DEFAULT_PROMPT_PATH = fileURLToPath(new URL('../../prompts/command-system.txt', import.meta.url));

export function loadSystemPrompt(path: string = DEFAULT_PROMPT_PATH): string {
  return fs.readFileSync(path, 'utf8').trim();
}

/**
 * Maps SDK failures onto the pipeline's taxonomy. 429s (rate limit and
 * quota) are `throttled`; other 4xx answers are permanent. Anything that is
 * not an SDK error is returned unchanged.
 */
export function toUpstreamError(error: unknown): unknown {
  if (error instanceof APIUserAbortError) {
    return new AbortedError('LLM request aborted');
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new TransientUpstreamError('timeout', 'LLM request timed out', { cause: error });
  }
  if (error instanceof APIConnectionError) {
    return new TransientUpstreamError('connection', 'Could not reach the LLM provider', { cause: error });
  }
  if (error instanceof RateLimitError) {
    return new TransientUpstreamError('throttled', 'LLM provider rate limit or quota exceeded', { cause: error });
  }
  if (error instanceof APIError) {
    if (error.status !== undefined && error.status >= 500) {
      return new TransientUpstreamError('connection', `LLM provider error ${error.status}`, { cause: error });
    }
    return new PermanentUpstreamError(`LLM request rejected: ${error.message}`, { cause: error });
  }
  return error;
}

export interface OpenAiLlmClientOptions {
  apiKey: string;
  model: string;
  /** Per-attempt timeout; expiry surfaces as a transient `timeout` error. */
  timeoutMs: number;
  systemPrompt?: string;
}

export class OpenAiLlmClient implements LlmClient {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly systemPrompt: string;

  constructor(options: OpenAiLlmClientOptions) {
    // Retries belong to the invocation guard, never to the SDK.
    this.client = new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.systemPrompt = options.systemPrompt ?? loadSystemPrompt();
  }

  async complete(request: LlmRequest, options: { signal?: AbortSignal } = {}): Promise<LlmCompletion> {
    const response = await this.client.chat.completions
      .create(
        {
          model: this.model,
          temperature: 0,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: this.systemPrompt },
            {
              role: 'user',
              content: [
                `Message: ${request.text}`,
                `Current local time: ${formatInTimezone(request.now, request.timezone, "yyyy-MM-dd'T'HH:mmXXX, EEEE")}`,
                `Time zone: ${request.timezone}`,
              ].join('\n'),
            },
          ],
        },
        { signal: options.signal, timeout: this.timeoutMs, maxRetries: 0 }
      )
      .catch((error: unknown) => {
        throw toUpstreamError(error);
      });

    const text = response.choices[0]?.message.content?.trim() ?? '';
    if (!text) {
      throw new PermanentUpstreamError('LLM returned an empty response');
    }
    return {
      text,
      usage: {
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
      },
    };
  }
}
