/**
 * Text extraction gate
 *
 * Decides whether a PDF needs OCR from the text of its first pages.
 *
 * @module services/structuring/text-gate
 */

/** Pages with fewer trimmed characters than this are treated as image-only */
export const OCR_TEXT_THRESHOLD = 50;

/** Number of leading pages inspected */
export const OCR_SAMPLE_PAGES = 3;

/**
 * True when any of the first three sampled pages has too little text.
 * Callers pass `true` themselves when sampling failed.
 */
export function needsOcr(sampleTexts: readonly string[]): boolean {
  return sampleTexts
    .slice(0, OCR_SAMPLE_PAGES)
    .some((text) => text.trim().length < OCR_TEXT_THRESHOLD);
}

/**
 * Per-page fallback trigger, used only when document-level OCR did not run
 */
export function isTextScannable(length: number, threshold: number = OCR_TEXT_THRESHOLD): boolean {
  return length < threshold;
}
