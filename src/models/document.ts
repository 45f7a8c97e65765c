/**
 * Document interfaces
 *
 * A document is one uploaded PDF composed of an ordered sequence of pages.
 *
 * @module models/document
 */

import type { PageRecord } from './page.js';
import type { AggregateStructure } from './structured.js';

/**
 * Stored document status. Only aggregation finalization sets 'structured';
 * every status shown to callers is recomputed from page counts.
 */
export type StoredDocumentStatus = 'raw' | 'structured';

/**
 * Derived document status: 'structured' once every page is structured
 */
export type DocumentStatus = 'structured' | 'processing';

export interface DocumentRecord {
  /** UUID v4 identifier */
  doc_id: string;

  /** Original filename */
  filename: string;

  /** Stored copy of the PDF, `<store>/<doc_id>.pdf` */
  file_path: string;

  /** SHA-256 hash of file content (format: 'sha256:...') */
  file_hash: string;

  total_pages: number;

  status: StoredDocumentStatus;

  /** Empty until aggregation runs */
  document_summary: string;

  /** Deduplicated, first-seen order, at most 30 */
  keywords: string[];

  created_at: string;
  updated_at: string | null;
}

/**
 * Document with page-count derived status, used for listings
 */
export interface DocumentListEntry extends Omit<DocumentRecord, 'status'> {
  status: DocumentStatus;
  processed_pages: number;
  page_count: number;
}

export interface DocumentStatusView {
  doc_id: string;
  filename: string;
  total_pages: number;
  processed_pages: number;
  is_complete: boolean;
  has_pdf_file: boolean;
}

export interface DocumentDetails extends DocumentRecord {
  pages: PageRecord[];
}

/**
 * Aggregate plus the document context it was built for
 */
export interface DocumentStructure extends AggregateStructure {
  doc_id: string;
  filename: string;
  total_pages: number;
  pages: PageRecord[];
  document_summary: string;
  document_keywords: string[];
}

/** Maximum number of document-level keywords */
export const MAX_DOCUMENT_KEYWORDS = 30;

/**
 * Derive the document status from page counts
 */
export function deriveDocumentStatus(pageCount: number, processedPages: number): DocumentStatus {
  return pageCount > 0 && pageCount === processedPages ? 'structured' : 'processing';
}
