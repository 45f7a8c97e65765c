/**
 * Page state machine
 *
 * raw -> structured, re-entrant. A page counts as done only when it is
 * structured AND carries a non-empty summary; structured pages with an empty
 * summary are attempted again.
 *
 * @module services/structuring/page-state
 */

import type { PageRecord } from '../../models/page.js';
import type { StructuredRecord } from '../../models/structured.js';
import type { StructuringStorage } from './storage.js';

export type ProcessingDecision =
  | { action: 'skip'; reason: 'already_structured' }
  | { action: 'process'; reason: 'first_attempt' | 'retry_empty_summary' | 'forced' };

export function decidePageProcessing(
  page: Pick<PageRecord, 'status' | 'page_summary'>,
  force = false
): ProcessingDecision {
  if (page.status === 'structured') {
    if (page.page_summary === '') return { action: 'process', reason: 'retry_empty_summary' };
    return force
      ? { action: 'process', reason: 'forced' }
      : { action: 'skip', reason: 'already_structured' };
  }
  return { action: 'process', reason: force ? 'forced' : 'first_attempt' };
}

/**
 * Persist the outcome of one structuring attempt. The four page fields move
 * together; summary and keywords are copied out of the record.
 */
export async function completeStructuringAttempt(
  storage: StructuringStorage,
  docId: string,
  pageNum: number,
  record: StructuredRecord
): Promise<boolean> {
  try {
    return await storage.persistPage(docId, pageNum, record, record.summary, record.keywords);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[PageState] Persisting page ${pageNum} of ${docId} failed: ${message}`);
    return false;
  }
}
