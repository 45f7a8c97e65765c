/**
 * StructuringStorage backed by DatabaseService
 */

import type { PageRecord } from '../../../models/page.js';
import type { StructuredRecord } from '../../../models/structured.js';
import type { StructuringStorage } from '../../structuring/storage.js';
import type { DatabaseService } from './service.js';

export class DatabaseStructuringStorage implements StructuringStorage {
  constructor(private readonly db: DatabaseService) {}

  async loadPages(docId: string): Promise<PageRecord[]> {
    return this.db.getPages(docId);
  }

  async persistPage(
    docId: string,
    pageNum: number,
    structuredData: StructuredRecord,
    pageSummary: string,
    keywords: string[]
  ): Promise<boolean> {
    try {
      const changes = this.db.updatePageData(docId, pageNum, structuredData, pageSummary, keywords);
      if (changes === 0) {
        console.error(`[Storage] No page ${pageNum} for document ${docId}`);
        return false;
      }
      return true;
    } catch (error) {
      console.error(
        `[Storage] Failed to update page ${pageNum} of ${docId}:`,
        error instanceof Error ? error.message : String(error)
      );
      return false;
    }
  }

  async persistDocumentMetadata(docId: string, summary: string, keywords: string[]): Promise<void> {
    if (!this.db.updateDocumentMetadata(docId, summary, keywords)) {
      console.error(`[Storage] Document ${docId} not found while storing metadata`);
    }
  }
}
