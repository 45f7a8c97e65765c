/**
 * Language Model Configuration
 *
 * Settings for the OpenAI-compatible chat completions endpoint used for
 * page structuring and document summaries. Read once at startup and injected
 * into the client and the structuring engine.
 *
 * @module services/llm/config
 */

import { z } from 'zod';

export const DEFAULT_LLM_MODEL = 'gpt-4o-mini';
export const DEFAULT_LLM_BASE_URL = 'https://api.openai.com/v1';

export const LLMConfigSchema = z.object({
  // Missing key disables structuring (pages are tagged no_api_key)
  apiKey: z.string().min(1).optional(),

  baseUrl: z.string().url().default(DEFAULT_LLM_BASE_URL),
  model: z.string().min(1).default(DEFAULT_LLM_MODEL),

  // Page structuring call
  structureTemperature: z.number().min(0).max(2).default(0),
  structureMaxOutputTokens: z.number().int().positive().default(2500),
  structureTimeoutMs: z.number().int().positive().default(45_000),

  // Document summary call
  summaryTemperature: z.number().min(0).max(2).default(0.3),
  summaryMaxOutputTokens: z.number().int().positive().default(500),
  summaryTimeoutMs: z.number().int().positive().default(60_000),

  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().min(0).default(500),
      maxDelayMs: z.number().int().min(0).default(10_000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeMs: z.number().int().min(0).default(60_000),
    })
    .default({}),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type LLMConfigInput = z.input<typeof LLMConfigSchema>;

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Load language model configuration from environment variables.
 *
 * Environment variables:
 *   LLM_API_KEY              - API key (falls back to OPENAI_API_KEY)
 *   LLM_BASE_URL             - Endpoint base URL (default: https://api.openai.com/v1)
 *   LLM_MODEL                - Model name (default: gpt-4o-mini)
 *   LLM_STRUCTURE_TIMEOUT_MS - Page structuring timeout (default: 45000)
 *   LLM_SUMMARY_TIMEOUT_MS   - Document summary timeout (default: 60000)
 *   LLM_MAX_ATTEMPTS         - Attempts for transient server failures (default: 3)
 */
export function loadLLMConfig(overrides?: LLMConfigInput): LLMConfig {
  const envConfig: LLMConfigInput = {
    apiKey: nonEmpty(process.env.LLM_API_KEY) ?? nonEmpty(process.env.OPENAI_API_KEY),
    baseUrl: nonEmpty(process.env.LLM_BASE_URL),
    model: nonEmpty(process.env.LLM_MODEL),
    structureTimeoutMs: parseIntEnv('LLM_STRUCTURE_TIMEOUT_MS'),
    summaryTimeoutMs: parseIntEnv('LLM_SUMMARY_TIMEOUT_MS'),
  };

  const maxAttempts = parseIntEnv('LLM_MAX_ATTEMPTS');
  if (maxAttempts !== undefined) {
    envConfig.retry = { maxAttempts };
  }

  return LLMConfigSchema.parse({ ...envConfig, ...overrides });
}

/**
 * Mask an API key for logs: only the last four characters are shown
 */
export function maskApiKey(apiKey: string | undefined): string {
  if (!apiKey) return 'None';
  return `...${apiKey.slice(-4)}`;
}
