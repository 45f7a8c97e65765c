/**
 * Language Model Call Errors
 *
 * Every failure of a chat completions call is reported as an LLMCallError
 * carrying one of a closed set of failure kinds. Callers switch on `kind`;
 * they never inspect messages or error class names.
 *
 * @module services/llm/errors
 */

export type LLMFailureKind = 'authentication' | 'rate_limit' | 'service' | 'unknown';

export class LLMCallError extends Error {
  constructor(
    message: string,
    public readonly kind: LLMFailureKind,
    public readonly statusCode?: number,
    public readonly timedOut: boolean = false
  ) {
    super(message);
    this.name = 'LLMCallError';
  }
}

/**
 * Error thrown by the circuit breaker while the circuit is open
 */
export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}

/**
 * Map an HTTP status of a failed response to a failure kind
 */
export function classifyHttpStatus(status: number): LLMFailureKind {
  if (status === 401 || status === 403) return 'authentication';
  if (status === 429) return 'rate_limit';
  if (status >= 500 || status === 408) return 'service';
  return 'unknown';
}

const NETWORK_ERROR_PATTERN =
  /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|EAI_AGAIN|socket hang up|fetch failed/i;

/**
 * Normalize any thrown value into an LLMCallError.
 *
 * Aborts (timeouts), network failures and an open circuit are service
 * failures. Anything unrecognized is 'unknown'.
 */
export function toLLMCallError(error: unknown): LLMCallError {
  if (error instanceof LLMCallError) {
    return error;
  }

  if (error instanceof CircuitBreakerOpenError) {
    return new LLMCallError(error.message, 'service');
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new LLMCallError(`Request timed out: ${error.message}`, 'service', undefined, true);
    }

    const cause = error.cause instanceof Error ? error.cause : undefined;
    const causeCode =
      cause && 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
    const combined = `${error.message} ${cause?.message ?? ''} ${causeCode}`;
    if (NETWORK_ERROR_PATTERN.test(combined)) {
      return new LLMCallError(error.message, 'service');
    }

    return new LLMCallError(error.message, 'unknown');
  }

  return new LLMCallError(String(error), 'unknown');
}
