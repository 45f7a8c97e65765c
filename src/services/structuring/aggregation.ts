/**
 * Document aggregation
 *
 * Folds page records into the document-wide structure and builds the
 * document summary and keyword list.
 *
 * @module services/structuring/aggregation
 */

import { MAX_DOCUMENT_KEYWORDS } from '../../models/document.js';
import type { PageRecord } from '../../models/page.js';
import type { AggregateStructure } from '../../models/structured.js';
import { isPlainObject } from './record.js';

export interface DocumentSummarizer {
  summarizeDocument(pageSummaries: readonly string[]): Promise<string>;
}

export interface DocumentMetadata {
  summary: string;
  keywords: string[];
}

/**
 * Concatenate sections, measurements and tables in ascending page order and
 * overwrite key_fields page by page (later pages win). Pages without a
 * structured object, and fields of the wrong type, are skipped.
 */
export function buildAggregate(pages: readonly PageRecord[]): AggregateStructure {
  const aggregate: AggregateStructure = {
    all_sections: [],
    all_measurements: [],
    all_tables: [],
    all_key_fields: {},
  };

  const ordered = [...pages].sort((a, b) => a.page_num - b.page_num);
  for (const page of ordered) {
    const data: unknown = page.structured_data;
    if (!isPlainObject(data)) continue;

    if (Array.isArray(data.sections)) aggregate.all_sections.push(...data.sections);
    if (Array.isArray(data.measurements)) aggregate.all_measurements.push(...data.measurements);
    if (Array.isArray(data.tables)) aggregate.all_tables.push(...data.tables);
    if (isPlainObject(data.key_fields)) Object.assign(aggregate.all_key_fields, data.key_fields);
  }

  return aggregate;
}

/**
 * First occurrence wins, capped at `limit`
 */
export function dedupeKeywords(
  keywords: readonly string[],
  limit: number = MAX_DOCUMENT_KEYWORDS
): string[] {
  return [...new Set(keywords)].slice(0, limit);
}

export async function buildDocumentMetadata(
  summarizer: DocumentSummarizer,
  pageSummaries: readonly string[],
  allKeywords: readonly string[]
): Promise<DocumentMetadata> {
  const summary = await summarizer.summarizeDocument(pageSummaries);
  return { summary, keywords: dedupeKeywords(allKeywords) };
}
