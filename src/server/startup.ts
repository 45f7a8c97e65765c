/**
 * Startup configuration and validation
 *
 * Reads server settings from the environment and warns about a missing or
 * malformed API key. Warnings only: without a key, pages are stored with a
 * placeholder summary instead of being structured.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { z } from 'zod';

import { type LLMConfig, maskApiKey } from '../services/llm/config.js';
import { getDefaultDatabasePath } from '../services/storage/database/index.js';
import type { ServerConfig } from './types.js';

const BooleanEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const ServerConfigSchema = z.object({
  dbPath: z.string().min(1),
  ocrEnabled: BooleanEnv.default('true'),
  ocrmypdfPath: z.string().min(1).default('ocrmypdf'),
});

function envValue(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Environment variables:
 *   PDF_PIPELINE_DB_PATH - SQLite file (default: ~/.pdf-pipeline/pipeline.db)
 *   OCR_ENABLED          - true/false (default: true)
 *   OCRMYPDF_PATH        - ocrmypdf executable (default: ocrmypdf)
 *
 * @throws Error naming the offending variable
 */
export function loadServerConfig(): ServerConfig {
  const result = ServerConfigSchema.safeParse({
    dbPath: getDefaultDatabasePath(),
    ocrEnabled: envValue('OCR_ENABLED')?.toLowerCase(),
    ocrmypdfPath: envValue('OCRMYPDF_PATH'),
  });
  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid server configuration: ${details}`);
  }
  return result.data;
}

/**
 * Collect startup warnings for the language model configuration
 */
export function collectStartupWarnings(llmConfig: LLMConfig): string[] {
  const warnings: string[] = [];
  if (!llmConfig.apiKey) {
    warnings.push(
      'LLM_API_KEY is not set. Pages will be stored unstructured with a placeholder summary.'
    );
  } else if (!llmConfig.apiKey.startsWith('sk-')) {
    warnings.push('LLM_API_KEY does not start with "sk-". Check that the key is correct.');
  }
  return warnings;
}

/**
 * Log configuration and warnings to stderr
 */
export function validateStartupDependencies(config: ServerConfig, llmConfig: LLMConfig): void {
  const warnings = collectStartupWarnings(llmConfig);
  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  console.error(
    `[Config] model=${llmConfig.model} baseUrl=${llmConfig.baseUrl} key=${maskApiKey(llmConfig.apiKey)}`
  );
  console.error(
    `[Config] db=${config.dbPath} ocr=${config.ocrEnabled ? config.ocrmypdfPath : 'disabled'}`
  );
}
