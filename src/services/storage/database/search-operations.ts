/**
 * Keyword search over page text, keywords and summaries (FTS5 + BM25)
 */

import Database from 'better-sqlite3';
import { parseKeywords } from './converters.js';
import { DatabaseError, DatabaseErrorCode, type SearchResult, type SearchRow } from './types.js';

export const DEFAULT_SEARCH_LIMIT = 20;
export const MAX_SEARCH_LIMIT = 100;
const SNIPPET_LENGTH = 300;

const FTS5_OPERATORS = new Set(['AND', 'OR', 'NOT']);

/**
 * Turn free text into a safe FTS5 expression.
 *
 * Terms are stripped of FTS5 syntax characters, split on hyphens and quoted.
 * Explicit AND/OR/NOT are kept; adjacent terms are joined with OR so that a
 * page matching any term is found (BM25 ranks pages matching more terms
 * higher). Dangling and repeated operators are dropped.
 *
 * @throws DatabaseError INVALID_QUERY when no term survives
 */
export function sanitizeFTS5Query(query: string): string {
  const tokens: string[] = [];
  for (const raw of query.trim().split(/\s+/)) {
    if (!raw) continue;
    if (FTS5_OPERATORS.has(raw.toUpperCase())) {
      tokens.push(raw.toUpperCase());
      continue;
    }
    const parts = raw
      .split('-')
      .map((part) => part.replace(/['"()*:^~+{}[\];@<>#!$%&|,./`?=\\]/g, ''))
      .filter((part) => part.length > 0);
    tokens.push(...parts.map((part) => `"${part}"`));
  }

  while (tokens.length > 0 && FTS5_OPERATORS.has(tokens[0])) tokens.shift();
  while (tokens.length > 0 && FTS5_OPERATORS.has(tokens[tokens.length - 1])) tokens.pop();

  const cleaned: string[] = [];
  for (const token of tokens) {
    const previous = cleaned[cleaned.length - 1];
    const isOperator = FTS5_OPERATORS.has(token);
    if (previous !== undefined) {
      const previousIsOperator = FTS5_OPERATORS.has(previous);
      if (isOperator && previousIsOperator) continue;
      if (!isOperator && !previousIsOperator) cleaned.push('OR');
    }
    cleaned.push(token);
  }

  if (cleaned.length === 0) {
    throw new DatabaseError(
      'Query contains no valid search tokens after sanitization',
      DatabaseErrorCode.INVALID_QUERY
    );
  }
  return cleaned.join(' ');
}

/**
 * Clamp a requested result count to 1..100, defaulting to 20
 */
export function normalizeSearchLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_SEARCH_LIMIT;
  return Math.max(1, Math.min(Math.floor(limit), MAX_SEARCH_LIMIT));
}

/**
 * Pages matching `query`, best match first
 */
export function searchPages(db: Database.Database, query: string, limit?: number): SearchResult[] {
  const ftsQuery = sanitizeFTS5Query(query);
  const rows = db
    .prepare<[string, number], SearchRow>(
      `SELECT p.doc_id, p.page_num, p.raw_text, p.page_summary, p.keywords,
         d.filename, bm25(pages_fts) AS score
       FROM pages_fts
       JOIN pages p ON p.rowid = pages_fts.rowid
       LEFT JOIN documents d ON d.doc_id = p.doc_id
       WHERE pages_fts MATCH ?
       ORDER BY bm25(pages_fts)
       LIMIT ?`
    )
    .all(ftsQuery, normalizeSearchLimit(limit));

  return rows.map((row) => ({
    doc_id: row.doc_id,
    filename: row.filename ?? 'Unknown',
    page_num: row.page_num,
    page_summary: row.page_summary,
    keywords: parseKeywords(row.keywords, `page ${row.page_num} of ${row.doc_id} keywords`),
    text_snippet: `${row.raw_text.slice(0, SNIPPET_LENGTH)}...`,
    // bm25() is lower-is-better
    search_score: -row.score,
  }));
}
