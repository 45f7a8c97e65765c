/**
 * Page interfaces
 *
 * One PageRecord per extracted PDF page. Created in bulk at ingestion,
 * mutated once per structuring attempt, removed only with its document.
 *
 * @module models/page
 */

import type { StructuredRecord } from './structured.js';

/**
 * Page status. 'structured' means a structuring attempt completed, not that
 * it succeeded; see structured_data.processing_status for the outcome.
 */
export type PageStatus = 'raw' | 'structured';

export interface PageRecord {
  doc_id: string;

  /** 1-based, unique per doc_id */
  page_num: number;

  /** Extracted (or OCR) text, immutable after ingestion */
  raw_text: string;

  text_length: number;

  status: PageStatus;

  /**
   * Result of the last structuring attempt. null before the first attempt;
   * `unknown` content when a stored value is not a well-formed record.
   */
  structured_data: StructuredRecord | Record<string, unknown> | null;

  /** Denormalized copy of structured_data.summary */
  page_summary: string;

  /** Denormalized copy of structured_data.keywords */
  keywords: string[];

  created_at: string;
  updated_at: string | null;
}

/**
 * Page text as produced by the extraction step, before it is stored
 */
export interface ExtractedPage {
  page_num: number;
  raw_text: string;
  text_length: number;
}
