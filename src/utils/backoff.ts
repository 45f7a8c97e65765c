/**
 * Exponential Backoff with Jitter
 *
 * Delay doubles each attempt from `baseDelayMs`, capped at `maxDelayMs`.
 * Jitter spreads retries by +/- `jitterFraction` of the delay.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
  /** Fraction of the delay used as +/- jitter (0.25 = +/-25%) */
  jitterFraction: number;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 10000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

/**
 * Delay for a zero-indexed attempt: min(base * 2^attempt, max) +/- jitter
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying errors accepted by `shouldRetry` up to `maxAttempts`
 * times in total. Other errors, and the last failure, are re-thrown.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>,
  label = 'Backoff'
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error) || attempt === cfg.maxAttempts - 1) throw error;

      const delay = calculateBackoffDelay(attempt, cfg);
      const message = error instanceof Error ? error.message : String(error);
      console.error(
        `[${label}] Attempt ${attempt + 1}/${cfg.maxAttempts} failed: ${message}. Retrying in ${delay}ms`
      );
      await sleep(delay);
    }
  }

  throw lastError;
}
