/**
 * Chat Completions Client
 *
 * Talks to any OpenAI-compatible `/chat/completions` endpoint over fetch.
 * Each call carries its own timeout, transient server failures are retried
 * with backoff, and all calls share one circuit breaker.
 *
 * @module services/llm/client
 */

import { z } from 'zod';

import { withRetry } from '../../utils/backoff.js';
import { CircuitBreaker, type CircuitBreakerStatus } from './circuit-breaker.js';
import { type LLMConfig, maskApiKey } from './config.js';
import { LLMCallError, classifyHttpStatus, toLLMCallError } from './errors.js';
import type { CompletionRequest, TextCompletionCollaborator } from './types.js';

export type FetchFn = typeof fetch;

export interface ChatCompletionClientOptions {
  /** Replaces the global fetch (tests) */
  fetchFn?: FetchFn;
  /** Shares a breaker across clients */
  circuitBreaker?: CircuitBreaker;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

/**
 * Retry only transient server failures. A timed out request already spent
 * its whole budget and is not repeated.
 */
function isRetryable(error: unknown): boolean {
  const callError = toLLMCallError(error);
  return callError.kind === 'service' && !callError.timedOut;
}

export class ChatCompletionClient implements TextCompletionCollaborator {
  private readonly config: LLMConfig;
  private readonly apiKey: string;
  private readonly fetchFn: FetchFn;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(config: LLMConfig, options: ChatCompletionClientOptions = {}) {
    if (!config.apiKey) {
      throw new LLMCallError('Chat completion client requires an API key', 'authentication');
    }
    this.config = config;
    this.apiKey = config.apiKey;
    this.fetchFn = options.fetchFn ?? fetch;
    this.circuitBreaker =
      options.circuitBreaker ??
      new CircuitBreaker({
        failureThreshold: config.circuitBreaker.failureThreshold,
        recoveryTimeMs: config.circuitBreaker.recoveryTimeMs,
      });

    console.error(
      `[LLMClient] Initialized: model=${config.model} baseUrl=${config.baseUrl} key=${maskApiKey(config.apiKey)}`
    );
  }

  async complete(request: CompletionRequest): Promise<string> {
    try {
      return await this.circuitBreaker.execute(() =>
        withRetry(() => this.callChatCompletions(request), isRetryable, this.config.retry, 'LLMClient')
      );
    } catch (error) {
      throw toLLMCallError(error);
    }
  }

  private async callChatCompletions(request: CompletionRequest): Promise<string> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

    let rawResponse: Response;
    let payload: unknown;
    try {
      rawResponse = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.config.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
          temperature: request.temperature,
          max_tokens: request.maxOutputTokens,
        }),
        signal: controller.signal,
      });

      if (!rawResponse.ok) {
        const body = await rawResponse.text().catch(() => '');
        throw new LLMCallError(
          `Chat completions error ${rawResponse.status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`,
          classifyHttpStatus(rawResponse.status),
          rawResponse.status
        );
      }

      payload = await rawResponse.json();
    } catch (error) {
      throw toLLMCallError(error);
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new LLMCallError(
        `Unexpected chat completions response: ${parsed.error.errors[0]?.message ?? 'invalid shape'}`,
        'unknown'
      );
    }

    return parsed.data.choices[0].message.content ?? '';
  }

  getStatus(): { model: string; baseUrl: string; circuitBreaker: CircuitBreakerStatus } {
    return {
      model: this.config.model,
      baseUrl: this.config.baseUrl,
      circuitBreaker: this.circuitBreaker.getStatus(),
    };
  }

  reset(): void {
    this.circuitBreaker.reset();
  }
}
