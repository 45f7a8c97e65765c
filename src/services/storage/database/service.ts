/**
 * DatabaseService class for all database operations
 *
 * Documents, pages and keyword search on one SQLite file. Uses prepared
 * statements throughout.
 */

import Database from 'better-sqlite3';
import { chmodSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type {
  DocumentDetails,
  DocumentListEntry,
  DocumentRecord,
  DocumentStatusView,
} from '../../../models/document.js';
import type { ExtractedPage, PageRecord } from '../../../models/page.js';
import type { StructuredRecord } from '../../../models/structured.js';
import { migrateToLatest, verifySchema } from '../migrations/index.js';
import * as docOps from './document-operations.js';
import { getDefaultDatabasePath } from './helpers.js';
import * as pageOps from './page-operations.js';
import * as searchOps from './search-operations.js';
import {
  DatabaseError,
  DatabaseErrorCode,
  type ListDocumentsOptions,
  type NewDocument,
  type SearchResult,
} from './types.js';

export class DatabaseService {
  private constructor(
    private readonly db: Database.Database,
    private readonly path: string
  ) {}

  /**
   * Open (creating when missing) the database at `dbPath` and bring its
   * schema up to date
   *
   * @throws DatabaseError when the file cannot be opened or the schema is incomplete
   */
  static open(dbPath: string = getDefaultDatabasePath()): DatabaseService {
    const isNew = !existsSync(dbPath);
    if (isNew) {
      mkdirSync(dirname(dbPath), { recursive: true, mode: 0o700 });
    }

    let db: Database.Database;
    try {
      db = new Database(dbPath);
    } catch (error) {
      throw new DatabaseError(
        `Failed to open database at ${dbPath}: ${String(error)}`,
        DatabaseErrorCode.DATABASE_LOCKED,
        error
      );
    }

    if (isNew) {
      chmodSync(dbPath, 0o600);
    }

    try {
      migrateToLatest(db);
    } catch (error) {
      db.close();
      throw error;
    }

    const verification = verifySchema(db);
    if (!verification.valid) {
      db.close();
      throw new DatabaseError(
        `Database schema incomplete, missing tables: ${verification.missingTables.join(', ')}`,
        DatabaseErrorCode.SCHEMA_MISMATCH
      );
    }

    return new DatabaseService(db, dbPath);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  getPath(): string {
    return this.path;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  // ==================== DOCUMENT OPERATIONS ====================

  insertDocumentWithPages(doc: NewDocument, pages: readonly ExtractedPage[]): string {
    return docOps.insertDocumentWithPages(this.db, doc, pages);
  }

  getDocument(docId: string): DocumentRecord | null {
    return docOps.getDocument(this.db, docId);
  }

  getDocumentByHash(fileHash: string): DocumentRecord | null {
    return docOps.getDocumentByHash(this.db, fileHash);
  }

  listDocuments(options?: ListDocumentsOptions): DocumentListEntry[] {
    return docOps.listDocuments(this.db, options);
  }

  getDocumentStatus(docId: string): DocumentStatusView | null {
    return docOps.getDocumentStatus(this.db, docId);
  }

  getDocumentDetails(docId: string): DocumentDetails | null {
    return docOps.getDocumentDetails(this.db, docId);
  }

  updateDocumentMetadata(docId: string, summary: string, keywords: readonly string[]): boolean {
    return docOps.updateDocumentMetadata(this.db, docId, summary, keywords);
  }

  deleteDocument(docId: string): boolean {
    return this.transaction(() => docOps.deleteDocument(this.db, docId));
  }

  // ==================== PAGE OPERATIONS ====================

  getPages(docId: string, pageNum?: number): PageRecord[] {
    return pageOps.getPages(this.db, docId, pageNum);
  }

  updatePageData(
    docId: string,
    pageNum: number,
    structuredData: StructuredRecord,
    pageSummary: string,
    keywords: readonly string[]
  ): number {
    return pageOps.updatePageData(this.db, docId, pageNum, structuredData, pageSummary, keywords);
  }

  // ==================== SEARCH ====================

  searchPages(query: string, limit?: number): SearchResult[] {
    return searchOps.searchPages(this.db, query, limit);
  }
}
