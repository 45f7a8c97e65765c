/**
 * Ingestion Error Classes
 *
 * Raised while reading a PDF into pages. OCR preprocessing never raises;
 * its failures fall back to the original file.
 */

type IngestionErrorCategory =
  | 'PDF_READ_ERROR'
  | 'PDF_EMPTY'
  | 'PDF_STORE_ERROR'
  | 'FILE_NOT_FOUND'
  | 'UNSUPPORTED_FILE';

export class IngestionError extends Error {
  constructor(
    message: string,
    public readonly category: IngestionErrorCategory,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'IngestionError';
  }
}
