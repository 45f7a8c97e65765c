/**
 * Ingestion Services
 *
 * @module services/ingestion
 */

export { IngestionError } from './errors.js';
export {
  DocumentIngestor,
  OCR_FAILED_TEXT,
  type DocumentIngestorOptions,
  type DocumentSink,
  type IngestResult,
} from './ingest.js';
export {
  OCR_TEMP_PREFIX,
  OcrMyPdfPreprocessor,
  removeOcrOutput,
  type OcrMyPdfConfig,
  type OcrPreprocessor,
  type PageOcr,
} from './ocr.js';
export { PDF_STORE_DIRNAME, PdfStore } from './pdf-store.js';
export { PdfJsTextExtractor, layoutPageText, type PageTextExtractor } from './pdf-text.js';
