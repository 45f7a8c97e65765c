import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  DEFAULT_LLM_BASE_URL,
  DEFAULT_LLM_MODEL,
  loadLLMConfig,
  maskApiKey,
} from '../../../src/services/llm/config.js';

const ENV_VARS = [
  'LLM_API_KEY',
  'OPENAI_API_KEY',
  'LLM_BASE_URL',
  'LLM_MODEL',
  'LLM_STRUCTURE_TIMEOUT_MS',
  'LLM_SUMMARY_TIMEOUT_MS',
  'LLM_MAX_ATTEMPTS',
];

describe('loadLLMConfig', () => {
  beforeEach(() => {
    for (const name of ENV_VARS) vi.stubEnv(name, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('uses defaults when nothing is set', () => {
    const config = loadLLMConfig();
    expect(config.apiKey).toBeUndefined();
    expect(config.baseUrl).toBe(DEFAULT_LLM_BASE_URL);
    expect(config.model).toBe(DEFAULT_LLM_MODEL);
    expect(config.structureTemperature).toBe(0);
    expect(config.structureMaxOutputTokens).toBe(2500);
    expect(config.structureTimeoutMs).toBe(45_000);
    expect(config.summaryTemperature).toBe(0.3);
    expect(config.summaryMaxOutputTokens).toBe(500);
    expect(config.summaryTimeoutMs).toBe(60_000);
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 10_000 });
    expect(config.circuitBreaker).toEqual({ failureThreshold: 5, recoveryTimeMs: 60_000 });
  });

  it('reads settings from the environment', () => {
    vi.stubEnv('LLM_API_KEY', '  test-secret  ');
    vi.stubEnv('LLM_BASE_URL', 'http://localhost:11434/v1');
    vi.stubEnv('LLM_MODEL', 'local-model');
    vi.stubEnv('LLM_STRUCTURE_TIMEOUT_MS', '1000');
    vi.stubEnv('LLM_SUMMARY_TIMEOUT_MS', '2000');
    vi.stubEnv('LLM_MAX_ATTEMPTS', '5');

    const config = loadLLMConfig();
    expect(config.apiKey).toBe('test-secret');
    expect(config.baseUrl).toBe('http://localhost:11434/v1');
    expect(config.model).toBe('local-model');
    expect(config.structureTimeoutMs).toBe(1000);
    expect(config.summaryTimeoutMs).toBe(2000);
    expect(config.retry).toEqual({ maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 10_000 });
  });

  it('falls back to OPENAI_API_KEY', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret-fallback');
    expect(loadLLMConfig().apiKey).toBe('test-secret-fallback');
  });

  it('lets overrides win over the environment', () => {
    vi.stubEnv('LLM_MODEL', 'from-env');
    expect(loadLLMConfig({ model: 'from-override' }).model).toBe('from-override');
  });

  it('rejects a non-numeric timeout', () => {
    vi.stubEnv('LLM_STRUCTURE_TIMEOUT_MS', 'soon');
    expect(() => loadLLMConfig()).toThrow('Invalid numeric env var LLM_STRUCTURE_TIMEOUT_MS: "soon"');
  });

  it('rejects an invalid base URL', () => {
    vi.stubEnv('LLM_BASE_URL', 'not a url');
    expect(() => loadLLMConfig()).toThrow();
  });
});

describe('maskApiKey', () => {
  it('shows only the last four characters', () => {
    expect(maskApiKey('test-secret-abcd')).toBe('...abcd');
  });

  it('returns None for a missing key', () => {
    expect(maskApiKey(undefined)).toBe('None');
    expect(maskApiKey('')).toBe('None');
  });
});
