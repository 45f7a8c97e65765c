/**
 * Document operations for DatabaseService
 *
 * Insert (with pages), get, list with computed status, metadata update and
 * delete with cascade.
 */

import Database from 'better-sqlite3';
import type {
  DocumentDetails,
  DocumentListEntry,
  DocumentRecord,
  DocumentStatusView,
} from '../../../models/document.js';
import type { ExtractedPage } from '../../../models/page.js';
import { existsSync } from 'fs';
import { rowToDocument, rowToDocumentListEntry } from './converters.js';
import { runWithConstraintCheck } from './helpers.js';
import { getPages } from './page-operations.js';
import type {
  DocumentListRow,
  DocumentRow,
  ListDocumentsOptions,
  NewDocument,
  PageCountRow,
} from './types.js';

/**
 * Insert a document and its raw pages in one transaction
 *
 * @returns The document ID
 */
export function insertDocumentWithPages(
  db: Database.Database,
  doc: NewDocument,
  pages: readonly ExtractedPage[]
): string {
  const now = new Date().toISOString();

  const insertDoc = db.prepare(`
    INSERT INTO documents (doc_id, filename, file_path, file_hash, total_pages, status, created_at)
    VALUES (?, ?, ?, ?, ?, 'raw', ?)
  `);
  const insertPage = db.prepare(`
    INSERT INTO pages (doc_id, page_num, raw_text, text_length, status, created_at)
    VALUES (?, ?, ?, ?, 'raw', ?)
  `);

  db.transaction(() => {
    runWithConstraintCheck(
      () => insertDoc.run(doc.doc_id, doc.filename, doc.file_path, doc.file_hash, pages.length, now),
      `inserting document ${doc.doc_id}`
    );
    for (const page of pages) {
      runWithConstraintCheck(
        () => insertPage.run(doc.doc_id, page.page_num, page.raw_text, page.text_length, now),
        `inserting page ${page.page_num} of ${doc.doc_id}`
      );
    }
  })();

  return doc.doc_id;
}

export function getDocument(db: Database.Database, docId: string): DocumentRecord | null {
  const row = db
    .prepare<[string], DocumentRow>('SELECT * FROM documents WHERE doc_id = ?')
    .get(docId);
  return row ? rowToDocument(row) : null;
}

export function getDocumentByHash(db: Database.Database, fileHash: string): DocumentRecord | null {
  const row = db
    .prepare<[string], DocumentRow>(
      'SELECT * FROM documents WHERE file_hash = ? ORDER BY created_at DESC LIMIT 1'
    )
    .get(fileHash);
  return row ? rowToDocument(row) : null;
}

/**
 * All documents, newest first, with status derived from page counts
 */
export function listDocuments(
  db: Database.Database,
  options: ListDocumentsOptions = {}
): DocumentListEntry[] {
  const limit = options.limit ?? -1;
  const offset = options.offset ?? 0;
  const rows = db
    .prepare<[number, number], DocumentListRow>(
      `SELECT d.*,
         (SELECT COUNT(*) FROM pages p WHERE p.doc_id = d.doc_id) AS page_count,
         (SELECT COUNT(*) FROM pages p WHERE p.doc_id = d.doc_id AND p.status = 'structured') AS processed_pages
       FROM documents d
       ORDER BY d.created_at DESC, d.rowid DESC
       LIMIT ? OFFSET ?`
    )
    .all(limit, offset);
  return rows.map(rowToDocumentListEntry);
}

export function countPages(db: Database.Database, docId: string): PageCountRow {
  const row = db
    .prepare<[string], PageCountRow>(
      `SELECT COUNT(*) AS page_count,
         COALESCE(SUM(CASE WHEN status = 'structured' THEN 1 ELSE 0 END), 0) AS processed_pages
       FROM pages WHERE doc_id = ?`
    )
    .get(docId);
  return row ?? { page_count: 0, processed_pages: 0 };
}

/**
 * Processing progress view, null when the document does not exist
 */
export function getDocumentStatus(db: Database.Database, docId: string): DocumentStatusView | null {
  const doc = getDocument(db, docId);
  if (!doc) return null;

  const counts = countPages(db, docId);
  return {
    doc_id: doc.doc_id,
    filename: doc.filename,
    total_pages: counts.page_count,
    processed_pages: counts.processed_pages,
    is_complete: counts.page_count > 0 && counts.page_count === counts.processed_pages,
    has_pdf_file: existsSync(doc.file_path),
  };
}

export function getDocumentDetails(db: Database.Database, docId: string): DocumentDetails | null {
  const doc = getDocument(db, docId);
  if (!doc) return null;
  return { ...doc, pages: getPages(db, docId) };
}

/**
 * Store document summary and keywords and mark the document structured
 *
 * @returns false when the document does not exist
 */
export function updateDocumentMetadata(
  db: Database.Database,
  docId: string,
  summary: string,
  keywords: readonly string[]
): boolean {
  const result = db
    .prepare(
      `UPDATE documents
       SET document_summary = ?, keywords = ?, status = 'structured', updated_at = ?
       WHERE doc_id = ?`
    )
    .run(summary, JSON.stringify(keywords), new Date().toISOString(), docId);
  return result.changes > 0;
}

/**
 * Delete a document; its pages and their search entries go with it
 *
 * @returns false when the document does not exist
 */
export function deleteDocument(db: Database.Database, docId: string): boolean {
  const result = db.prepare('DELETE FROM documents WHERE doc_id = ?').run(docId);
  return result.changes > 0;
}
