/**
 * DocumentIngestor - PDF file to stored document with raw pages
 *
 * Flow: hash the file, sample the first pages to decide whether OCR
 * preprocessing is needed, extract every page (per-page OCR fallback only
 * when preprocessing is unavailable), copy the PDF into the store, then insert
 * the document and its pages in one transaction. A file whose hash is already stored is not inserted
 * again.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/ingestion/ingest
 */

import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

import type { DocumentRecord } from '../../models/document.js';
import type { ExtractedPage } from '../../models/page.js';
import { hashFile } from '../../utils/hash.js';
import { ValidationError } from '../../utils/validation.js';
import type { NewDocument } from '../storage/database/types.js';
import { OCR_SAMPLE_PAGES, isTextScannable, needsOcr } from '../structuring/text-gate.js';
import { IngestionError } from './errors.js';
import { type OcrPreprocessor, type PageOcr, removeOcrOutput } from './ocr.js';
import type { PdfStore } from './pdf-store.js';
import type { PageTextExtractor } from './pdf-text.js';

/** Page text stored when per-page OCR fails */
export const OCR_FAILED_TEXT = '[OCR FAILED]';

/**
 * Persistence the ingestor needs; implemented by DatabaseService
 */
export interface DocumentSink {
  getDocumentByHash(fileHash: string): DocumentRecord | null;
  insertDocumentWithPages(doc: NewDocument, pages: readonly ExtractedPage[]): string;
}

export interface DocumentIngestorOptions {
  extractor: PageTextExtractor;
  sink: DocumentSink;
  pdfStore: PdfStore;
  /** null disables document-level OCR */
  preprocessor?: OcrPreprocessor | null;
  pageOcr?: PageOcr | null;
}

export interface IngestResult {
  doc_id: string;
  filename: string;
  page_count: number;
  ocr_applied: boolean;
  /** True when the same file content was already ingested */
  duplicate: boolean;
}

export class DocumentIngestor {
  private readonly extractor: PageTextExtractor;
  private readonly sink: DocumentSink;
  private readonly pdfStore: PdfStore;
  private readonly preprocessor: OcrPreprocessor | null;
  private readonly pageOcr: PageOcr | null;

  constructor(options: DocumentIngestorOptions) {
    this.extractor = options.extractor;
    this.sink = options.sink;
    this.pdfStore = options.pdfStore;
    this.preprocessor = options.preprocessor ?? null;
    this.pageOcr = options.pageOcr ?? null;
  }

  async ingestFile(filePath: string): Promise<IngestResult> {
    const absolutePath = path.resolve(filePath);
    const filename = path.basename(absolutePath);

    if (path.extname(filename).toLowerCase() !== '.pdf') {
      throw new ValidationError(`Invalid file type: ${filename}. Only PDF files are allowed`);
    }

    let fileHash: string;
    try {
      fileHash = await hashFile(absolutePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new IngestionError(message, 'FILE_NOT_FOUND', absolutePath);
    }

    const existing = this.sink.getDocumentByHash(fileHash);
    if (existing) {
      console.error(`[Ingest] ${filename} already ingested as ${existing.doc_id}`);
      return {
        doc_id: existing.doc_id,
        filename: existing.filename,
        page_count: existing.total_pages,
        ocr_applied: false,
        duplicate: true,
      };
    }

    const { pages, ocrApplied } = await this.extractWithOcr(absolutePath);
    if (pages.length === 0) {
      throw new ValidationError('Could not extract text from PDF');
    }

    const newId = uuidv4();
    const storedPath = this.pdfStore.save(absolutePath, newId);
    let docId: string;
    try {
      docId = this.sink.insertDocumentWithPages(
        { doc_id: newId, filename, file_path: storedPath, file_hash: fileHash },
        pages
      );
    } catch (error) {
      this.pdfStore.remove(storedPath);
      throw error;
    }
    console.error(`[Ingest] Stored ${filename} as ${docId}: ${pages.length} pages`);

    return {
      doc_id: docId,
      filename,
      page_count: pages.length,
      ocr_applied: ocrApplied,
      duplicate: false,
    };
  }

  private async extractWithOcr(
    filePath: string
  ): Promise<{ pages: ExtractedPage[]; ocrApplied: boolean }> {
    const preprocessingAvailable =
      this.preprocessor !== null && (await this.preprocessor.isAvailable());

    let ocrPath: string | null = null;
    if (this.preprocessor !== null && preprocessingAvailable && (await this.checkNeedsOcr(filePath))) {
      ocrPath = await this.preprocessor.preprocess(filePath);
    }

    try {
      const pages = await this.extractor.extractPages(ocrPath ?? filePath);
      if (preprocessingAvailable || this.pageOcr === null) {
        return { pages, ocrApplied: ocrPath !== null };
      }
      return { pages: await this.recognizeSparsePages(filePath, pages), ocrApplied: false };
    } finally {
      if (ocrPath !== null) removeOcrOutput(ocrPath);
    }
  }

  private async checkNeedsOcr(filePath: string): Promise<boolean> {
    try {
      const samples = await this.extractor.samplePages(filePath, OCR_SAMPLE_PAGES);
      const result = needsOcr(samples);
      console.error(`[Ingest] OCR ${result ? 'needed' : 'not needed'} for ${path.basename(filePath)}`);
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Ingest] Sampling failed, assuming OCR is needed: ${message}`);
      return true;
    }
  }

  private async recognizeSparsePages(
    filePath: string,
    pages: readonly ExtractedPage[]
  ): Promise<ExtractedPage[]> {
    const result: ExtractedPage[] = [];
    for (const page of pages) {
      if (this.pageOcr === null || !isTextScannable(page.text_length)) {
        result.push(page);
        continue;
      }

      console.error(`[Ingest] Page ${page.page_num} needs per-page OCR`);
      let text: string;
      try {
        text = await this.pageOcr.recognizePage(filePath, page.page_num);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Ingest] OCR failed on page ${page.page_num}: ${message}`);
        text = OCR_FAILED_TEXT;
      }
      result.push({ page_num: page.page_num, raw_text: text, text_length: text.length });
    }
    return result;
  }
}
