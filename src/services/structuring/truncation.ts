/**
 * Bounding of model input size
 *
 * @module services/structuring/truncation
 */

export const DEFAULT_MAX_CHARS = 8000;

export const PAGE_TRUNCATION_MARKER = '\n\n[...middle content truncated...]\n\n';
export const SUMMARY_OMISSION_MARKER = '\n\n[...intermediate pages omitted...]\n\n';

/** Page-summary context above this size is cut to head and tail */
export const SUMMARY_CONTEXT_LIMIT = 12000;
export const SUMMARY_CONTEXT_EDGE = 6000;

const HEAD_SHARE = 0.7;
const TAIL_SHARE = 0.3;

/**
 * Keep the first 70% and the last 30% of the `maxChars` budget with a marker
 * between them. Text within budget is returned unchanged.
 */
export function truncatePageText(text: string, maxChars: number = DEFAULT_MAX_CHARS): string {
  if (text.length <= maxChars) return text;

  const headLength = Math.floor(maxChars * HEAD_SHARE);
  const tailLength = Math.floor(maxChars * TAIL_SHARE);
  const tail = tailLength > 0 ? text.slice(-tailLength) : '';
  return text.slice(0, headLength) + PAGE_TRUNCATION_MARKER + tail;
}

/**
 * Cut a page-summary context to its first and last 6000 characters once it
 * exceeds 12000.
 */
export function truncateSummaryContext(context: string): string {
  if (context.length <= SUMMARY_CONTEXT_LIMIT) return context;
  return (
    context.slice(0, SUMMARY_CONTEXT_EDGE) +
    SUMMARY_OMISSION_MARKER +
    context.slice(-SUMMARY_CONTEXT_EDGE)
  );
}
