/**
 * Row conversion functions for DatabaseService
 *
 * Converts database rows to domain model interfaces. JSON columns are parsed
 * defensively: a corrupt value is logged and replaced by an empty value.
 */

import type { DocumentListEntry, DocumentRecord, StoredDocumentStatus } from '../../../models/document.js';
import { deriveDocumentStatus } from '../../../models/document.js';
import type { PageRecord, PageStatus } from '../../../models/page.js';
import { isPlainObject, isStructuredRecord } from '../../structuring/record.js';
import type { DocumentListRow, DocumentRow, PageRow } from './types.js';

function parseStatus(value: string, context: string): 'raw' | 'structured' {
  if (value === 'raw' || value === 'structured') return value;
  throw new Error(`Invalid status "${value}" in ${context}. Valid values: raw, structured`);
}

function parseJson(raw: string, context: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    console.error(
      `[converters] Corrupt JSON in ${context}:`,
      error instanceof Error ? error.message : String(error)
    );
    return null;
  }
}

/**
 * Keyword column: JSON array of strings
 */
export function parseKeywords(raw: string, context: string): string[] {
  const value = parseJson(raw, context);
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

function parseStructuredData(raw: string | null, context: string): PageRecord['structured_data'] {
  if (raw === null) return null;
  const value = parseJson(raw, context);
  if (isStructuredRecord(value)) return value;
  return isPlainObject(value) ? value : null;
}

export function rowToDocument(row: DocumentRow): DocumentRecord {
  const status: StoredDocumentStatus = parseStatus(row.status, `document ${row.doc_id}`);
  return {
    doc_id: row.doc_id,
    filename: row.filename,
    file_path: row.file_path,
    file_hash: row.file_hash,
    total_pages: row.total_pages,
    status,
    document_summary: row.document_summary,
    keywords: parseKeywords(row.keywords, `document ${row.doc_id} keywords`),
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function rowToDocumentListEntry(row: DocumentListRow): DocumentListEntry {
  const document = rowToDocument(row);
  return {
    ...document,
    status: deriveDocumentStatus(row.page_count, row.processed_pages),
    processed_pages: row.processed_pages,
    page_count: row.page_count,
  };
}

export function rowToPage(row: PageRow): PageRecord {
  const context = `page ${row.page_num} of ${row.doc_id}`;
  const status: PageStatus = parseStatus(row.status, context);
  return {
    doc_id: row.doc_id,
    page_num: row.page_num,
    raw_text: row.raw_text,
    text_length: row.text_length,
    status,
    structured_data: parseStructuredData(row.structured_data, `${context} structured_data`),
    page_summary: row.page_summary,
    keywords: parseKeywords(row.keywords, `${context} keywords`),
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}
