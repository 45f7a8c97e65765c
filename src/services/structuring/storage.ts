/**
 * Storage contract consumed by the structuring pipeline
 *
 * @module services/structuring/storage
 */

import type { PageRecord } from '../../models/page.js';
import type { StructuredRecord } from '../../models/structured.js';

export interface StructuringStorage {
  /** Pages of a document in ascending page_num order */
  loadPages(docId: string): Promise<PageRecord[]>;

  /**
   * Set status 'structured' together with structured_data, page_summary and
   * keywords in one write. Resolves false on any failure, never rejects.
   */
  persistPage(
    docId: string,
    pageNum: number,
    structuredData: StructuredRecord,
    pageSummary: string,
    keywords: string[]
  ): Promise<boolean>;

  /** Store document summary and keywords, mark the document structured */
  persistDocumentMetadata(docId: string, summary: string, keywords: string[]): Promise<void>;
}
