/**
 * PipelineOrchestrator - structures every page of a document
 *
 * Pages run one at a time in ascending page order. A failing page never
 * stops the batch: structuring failures come back as tagged records and
 * persistence failures are counted. Once the loop ends the document summary
 * and keywords are rebuilt from every non-empty page summary.
 *
 * DocumentProcessingScheduler runs at most one orchestration per document
 * in the background.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/structuring/pipeline
 */

import { buildDocumentMetadata } from './aggregation.js';
import type { StructuringEngine } from './engine.js';
import { completeStructuringAttempt, decidePageProcessing } from './page-state.js';
import { createDefaultStructure } from './record.js';
import type { StructuringStorage } from './storage.js';

/** page_summary written when no API key is configured */
export const NO_API_KEY_SUMMARY = '[No API key - processing skipped]';

export interface ProcessDocumentOptions {
  /** Re-run structured pages even when they carry a summary */
  force?: boolean;
}

export interface ProcessDocumentResult {
  doc_id: string;
  total_pages: number;
  /** Pages whose attempt completed and was stored */
  processed: number;
  /** no_api_key attempts plus pages that could not be stored */
  failed: number;
  /** Pages already structured with a summary */
  skipped: number;
  /** Structured pages with an empty summary that were attempted again */
  retried: number;
  document_summary_updated: boolean;
}

function emptyResult(docId: string, totalPages: number): ProcessDocumentResult {
  return {
    doc_id: docId,
    total_pages: totalPages,
    processed: 0,
    failed: 0,
    skipped: 0,
    retried: 0,
    document_summary_updated: false,
  };
}

export class PipelineOrchestrator {
  constructor(
    private readonly engine: StructuringEngine,
    private readonly storage: StructuringStorage
  ) {}

  async processDocument(
    docId: string,
    options: ProcessDocumentOptions = {}
  ): Promise<ProcessDocumentResult> {
    const pages = await this.storage.loadPages(docId);
    if (pages.length === 0) {
      console.error(`[Pipeline] WARNING: No pages found for document ${docId}`);
      return emptyResult(docId, 0);
    }

    const result = emptyResult(docId, pages.length);

    if (!this.engine.isConfigured()) {
      console.error(
        `[Pipeline] No API key configured: marking ${pages.length} pages of ${docId} as skipped`
      );
      for (const page of pages) {
        const stored = await this.storage
          .persistPage(docId, page.page_num, createDefaultStructure('no_api_key'), NO_API_KEY_SUMMARY, [])
          .catch((error: unknown) => {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[Pipeline] Persisting page ${page.page_num} failed: ${message}`);
            return false;
          });
        if (!stored) {
          console.error(`[Pipeline] Failed to store skipped page ${page.page_num} of ${docId}`);
        }
        result.failed++;
      }
      return result;
    }

    console.error(`[Pipeline] Processing document ${docId}: ${pages.length} pages`);

    const summaries: string[] = [];
    const keywords: string[] = [];

    for (const [index, page] of pages.entries()) {
      const progress = `[${index + 1}/${pages.length}]`;
      const decision = decidePageProcessing(page, options.force);

      if (decision.action === 'skip') {
        console.error(`[Pipeline] ${progress} Page ${page.page_num} already structured, skipping`);
        summaries.push(page.page_summary);
        keywords.push(...page.keywords);
        result.skipped++;
        continue;
      }

      if (decision.reason === 'retry_empty_summary') {
        console.error(
          `[Pipeline] ${progress} Retrying page ${page.page_num} (structured but missing summary)`
        );
        result.retried++;
      } else {
        console.error(
          `[Pipeline] ${progress} Processing page ${page.page_num} (${page.raw_text.length} chars)`
        );
      }

      const record = await this.engine.structureText(page.raw_text);
      if (record.processing_status !== 'success') {
        console.error(
          `[Pipeline] ${progress} Page ${page.page_num} finished with status ${record.processing_status}`
        );
      }

      const stored = await completeStructuringAttempt(this.storage, docId, page.page_num, record);
      if (!stored) {
        console.error(`[Pipeline] ${progress} Failed to store page ${page.page_num}`);
        result.failed++;
        continue;
      }

      if (record.processing_status === 'no_api_key') {
        result.failed++;
      } else {
        result.processed++;
      }

      if (record.summary) summaries.push(record.summary);
      keywords.push(...record.keywords);
    }

    if (summaries.length > 0) {
      result.document_summary_updated = await this.updateDocumentMetadata(
        docId,
        summaries,
        keywords
      );
    }

    console.error(
      `[Pipeline] Document ${docId} complete: processed=${result.processed} skipped=${result.skipped} ` +
        `retried=${result.retried} failed=${result.failed} of ${result.total_pages}`
    );
    return result;
  }

  private async updateDocumentMetadata(
    docId: string,
    summaries: readonly string[],
    keywords: readonly string[]
  ): Promise<boolean> {
    try {
      const metadata = await buildDocumentMetadata(this.engine, summaries, keywords);
      await this.storage.persistDocumentMetadata(docId, metadata.summary, metadata.keywords);
      console.error(
        `[Pipeline] Updated document ${docId}: ${metadata.keywords.length} keywords, summary ${metadata.summary.length} chars`
      );
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Pipeline] Failed to update document metadata for ${docId}: ${message}`);
      return false;
    }
  }
}

/**
 * Background runner keeping at most one orchestration per document
 */
export class DocumentProcessingScheduler {
  private readonly running = new Map<string, Promise<ProcessDocumentResult | null>>();

  constructor(private readonly orchestrator: PipelineOrchestrator) {}

  /**
   * Start processing in the background. While a run for the same document
   * is in flight its promise is returned instead. Resolves null when the run
   * failed; the failure is logged.
   */
  schedule(docId: string, options: ProcessDocumentOptions = {}): Promise<ProcessDocumentResult | null> {
    const inFlight = this.running.get(docId);
    if (inFlight) return inFlight;

    const task = this.orchestrator
      .processDocument(docId, options)
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Scheduler] Processing of ${docId} failed: ${message}`);
        return null;
      })
      .finally(() => {
        this.running.delete(docId);
      });

    this.running.set(docId, task);
    return task;
  }

  isRunning(docId: string): boolean {
    return this.running.has(docId);
  }

  runningDocuments(): string[] {
    return [...this.running.keys()];
  }

  /** Resolves once no document is being processed */
  async waitForIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running.values());
    }
  }
}
