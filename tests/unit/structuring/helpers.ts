/**
 * Shared test doubles for structuring tests
 *
 * ScriptedCollaborator answers completion calls from a queue of replies or
 * errors; InMemoryStructuringStorage keeps pages in a Map.
 */

import type { PageRecord } from '../../../src/models/page.js';
import type { StructuredRecord } from '../../../src/models/structured.js';
import type { LLMConfig } from '../../../src/services/llm/config.js';
import { LLMConfigSchema } from '../../../src/services/llm/config.js';
import type { CompletionRequest, TextCompletionCollaborator } from '../../../src/services/llm/types.js';
import type { StructuringStorage } from '../../../src/services/structuring/storage.js';

// ═══════════════════════════════════════════════════════════════════════════════
// COLLABORATOR
// ═══════════════════════════════════════════════════════════════════════════════

export type ScriptedReply = string | Error | ((request: CompletionRequest) => string);

export class ScriptedCollaborator implements TextCompletionCollaborator {
  readonly requests: CompletionRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  enqueue(...replies: ScriptedReply[]): void {
    this.replies.push(...replies);
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('ScriptedCollaborator: no reply queued');
    }
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(request) : reply;
  }
}

export function testLLMConfig(): LLMConfig {
  return LLMConfigSchema.parse({ apiKey: 'test-secret' });
}

/**
 * JSON reply with all six keys
 */
export function validReply(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    summary: 'Invoice for pump maintenance',
    keywords: ['invoice', 'pump'],
    sections: [{ title: 'Items', content: 'Pump service' }],
    measurements: [{ value: 12.5, unit: 'mm', context: 'seal gap' }],
    key_fields: { invoice_number: 'INV-1' },
    tables: [[{ item: 'service', price: '100' }]],
    ...overrides,
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE
// ═══════════════════════════════════════════════════════════════════════════════

export function makePage(pageNum: number, overrides: Partial<PageRecord> = {}): PageRecord {
  const rawText = overrides.raw_text ?? `Text of page ${pageNum}`;
  return {
    doc_id: 'doc-1',
    page_num: pageNum,
    raw_text: rawText,
    text_length: rawText.length,
    status: 'raw',
    structured_data: null,
    page_summary: '',
    keywords: [],
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: null,
    ...overrides,
  };
}

export interface StoredMetadata {
  summary: string;
  keywords: string[];
}

export class InMemoryStructuringStorage implements StructuringStorage {
  readonly pages = new Map<string, PageRecord[]>();
  readonly metadata = new Map<string, StoredMetadata>();
  readonly persistCalls: Array<{ docId: string; pageNum: number; status: string }> = [];
  /** Page numbers whose persistPage resolves false */
  readonly failingPages = new Set<number>();
  failMetadata = false;

  constructor(docId?: string, pages: PageRecord[] = []) {
    if (docId !== undefined) this.pages.set(docId, pages);
  }

  async loadPages(docId: string): Promise<PageRecord[]> {
    return [...(this.pages.get(docId) ?? [])]
      .sort((a, b) => a.page_num - b.page_num)
      .map((page) => ({ ...page }));
  }

  async persistPage(
    docId: string,
    pageNum: number,
    structuredData: StructuredRecord,
    pageSummary: string,
    keywords: string[]
  ): Promise<boolean> {
    this.persistCalls.push({ docId, pageNum, status: structuredData.processing_status });
    if (this.failingPages.has(pageNum)) return false;

    const page = this.pages.get(docId)?.find((candidate) => candidate.page_num === pageNum);
    if (!page) return false;

    page.status = 'structured';
    page.structured_data = structuredData;
    page.page_summary = pageSummary;
    page.keywords = [...keywords];
    return true;
  }

  async persistDocumentMetadata(docId: string, summary: string, keywords: string[]): Promise<void> {
    if (this.failMetadata) {
      throw new Error('metadata write failed');
    }
    this.metadata.set(docId, { summary, keywords: [...keywords] });
  }

  page(docId: string, pageNum: number): PageRecord | undefined {
    return this.pages.get(docId)?.find((candidate) => candidate.page_num === pageNum);
  }
}
