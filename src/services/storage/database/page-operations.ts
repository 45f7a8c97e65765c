/**
 * Page operations for DatabaseService
 */

import Database from 'better-sqlite3';
import type { PageRecord } from '../../../models/page.js';
import type { StructuredRecord } from '../../../models/structured.js';
import { rowToPage } from './converters.js';
import type { PageRow } from './types.js';

/**
 * Pages of a document in ascending page order, or the single page asked for
 */
export function getPages(db: Database.Database, docId: string, pageNum?: number): PageRecord[] {
  if (pageNum !== undefined) {
    const row = db
      .prepare<[string, number], PageRow>('SELECT * FROM pages WHERE doc_id = ? AND page_num = ?')
      .get(docId, pageNum);
    return row ? [rowToPage(row)] : [];
  }

  return db
    .prepare<[string], PageRow>('SELECT * FROM pages WHERE doc_id = ? ORDER BY page_num ASC')
    .all(docId)
    .map(rowToPage);
}

/**
 * Write the outcome of a structuring attempt. status, structured_data,
 * page_summary and keywords change in a single UPDATE.
 *
 * @returns Number of rows changed (0 when the page does not exist)
 */
export function updatePageData(
  db: Database.Database,
  docId: string,
  pageNum: number,
  structuredData: StructuredRecord,
  pageSummary: string,
  keywords: readonly string[]
): number {
  const result = db
    .prepare(
      `UPDATE pages
       SET status = 'structured', structured_data = ?, page_summary = ?, keywords = ?, updated_at = ?
       WHERE doc_id = ? AND page_num = ?`
    )
    .run(
      JSON.stringify(structuredData),
      pageSummary,
      JSON.stringify(keywords),
      new Date().toISOString(),
      docId,
      pageNum
    );
  return result.changes;
}
