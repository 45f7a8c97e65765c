/**
 * Type definitions for DatabaseService
 *
 * Row types, options and the database error class.
 */

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  DOCUMENT_NOT_FOUND = 'DOCUMENT_NOT_FOUND',
  PAGE_NOT_FOUND = 'PAGE_NOT_FOUND',
  DUPLICATE_PAGE = 'DUPLICATE_PAGE',
  FOREIGN_KEY_VIOLATION = 'FOREIGN_KEY_VIOLATION',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_QUERY = 'INVALID_QUERY',
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export interface DocumentRow {
  doc_id: string;
  filename: string;
  file_path: string;
  file_hash: string;
  total_pages: number;
  status: string;
  document_summary: string;
  keywords: string;
  created_at: string;
  updated_at: string | null;
}

export interface DocumentListRow extends DocumentRow {
  processed_pages: number;
  page_count: number;
}

export interface PageRow {
  doc_id: string;
  page_num: number;
  raw_text: string;
  text_length: number;
  status: string;
  structured_data: string | null;
  page_summary: string;
  keywords: string;
  created_at: string;
  updated_at: string | null;
}

export interface PageCountRow {
  page_count: number;
  processed_pages: number;
}

export interface SearchRow {
  doc_id: string;
  page_num: number;
  raw_text: string;
  page_summary: string;
  keywords: string;
  filename: string | null;
  score: number;
}

export interface ListDocumentsOptions {
  limit?: number;
  offset?: number;
}

/**
 * Fields supplied when a document is inserted
 */
export interface NewDocument {
  doc_id: string;
  filename: string;
  file_path: string;
  file_hash: string;
}

/**
 * One keyword search hit
 */
export interface SearchResult {
  doc_id: string;
  filename: string;
  page_num: number;
  page_summary: string;
  keywords: string[];
  /** First 300 characters of the page text followed by "..." */
  text_snippet: string;
  /** Higher is more relevant */
  search_score: number;
}
