/**
 * Shared setup for tool handler tests
 *
 * Opens a real database in a temp directory and wires the pipeline with a
 * static page extractor, no OCR and a scripted completion collaborator.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { ExtractedPage } from '../../../src/models/page.js';
import { initializeState, resetState } from '../../../src/server/state.js';
import type { PipelineServices } from '../../../src/server/types.js';
import type { PageTextExtractor } from '../../../src/services/ingestion/index.js';
import type { CompletionRequest, TextCompletionCollaborator } from '../../../src/services/llm/types.js';
import type { ToolResponse } from '../../../src/tools/shared.js';
import { testLLMConfig } from '../structuring/helpers.js';

export const PAGE_TEXTS = [
  'Pump maintenance invoice for the north plant.',
  'Seal gap measured at 12.5 mm after service.',
];

export class StaticExtractor implements PageTextExtractor {
  constructor(private readonly texts: readonly string[] = PAGE_TEXTS) {}

  async extractPages(_filePath: string): Promise<ExtractedPage[]> {
    return this.texts.map((raw_text, index) => ({
      page_num: index + 1,
      raw_text,
      text_length: raw_text.length,
    }));
  }

  async samplePages(_filePath: string, count: number): Promise<string[]> {
    return this.texts.slice(0, count);
  }
}

/**
 * Holds every completion call until release() is called
 */
export class BlockingCollaborator implements TextCompletionCollaborator {
  private readonly waiting: Array<() => void> = [];

  constructor(private readonly reply: string) {}

  complete(_request: CompletionRequest): Promise<string> {
    return new Promise((resolve) => {
      this.waiting.push(() => resolve(this.reply));
    });
  }

  get pending(): number {
    return this.waiting.length;
  }

  release(): void {
    for (const resolve of this.waiting.splice(0)) resolve();
  }
}

export interface ToolTestContext {
  dir: string;
  services: PipelineServices;
  /** Write a PDF-named file with the given content and return its path */
  writePdf(name: string, content?: string): string;
}

export function setupToolTest(
  collaborator: TextCompletionCollaborator | null,
  texts: readonly string[] = PAGE_TEXTS
): ToolTestContext {
  const dir = mkdtempSync(join(tmpdir(), 'test-tools-'));
  const services = initializeState({
    config: { dbPath: join(dir, 'pipeline.db'), ocrEnabled: false },
    llmConfig: testLLMConfig(),
    collaborator,
    extractor: new StaticExtractor(texts),
    preprocessor: null,
  });
  return {
    dir,
    services,
    writePdf(name: string, content = `%PDF-1.4 ${name}`): string {
      const filePath = join(dir, name);
      writeFileSync(filePath, content);
      return filePath;
    },
  };
}

export async function teardownToolTest(context: ToolTestContext | undefined): Promise<void> {
  if (!context) return;
  await context.services.scheduler.waitForIdle();
  resetState();
  rmSync(context.dir, { recursive: true, force: true });
}

/**
 * Parse the JSON body of a tool response
 */
export function parseResponse(response: ToolResponse) {
  return JSON.parse(response.content[0].text);
}
