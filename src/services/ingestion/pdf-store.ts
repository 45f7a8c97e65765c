/**
 * Managed copies of ingested PDFs
 *
 * Every ingested file is copied to `<directory>/<doc_id>.pdf`, so the stored
 * document keeps its PDF when the caller's file moves. Only files inside the
 * store directory are ever removed.
 *
 * @module services/ingestion/pdf-store
 */

import * as fs from 'fs';
import * as path from 'path';
import { IngestionError } from './errors.js';

/** Store directory name, created beside the database file */
export const PDF_STORE_DIRNAME = 'pdfs';

export class PdfStore {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  /** Store directory for a database file */
  static besideDatabase(dbPath: string): PdfStore {
    return new PdfStore(path.join(path.dirname(path.resolve(dbPath)), PDF_STORE_DIRNAME));
  }

  pathFor(docId: string): string {
    return path.join(this.directory, `${docId}.pdf`);
  }

  /**
   * Copy `sourcePath` into the store
   *
   * @returns The stored path
   * @throws IngestionError PDF_STORE_ERROR when the copy fails
   */
  save(sourcePath: string, docId: string): string {
    const target = this.pathFor(docId);
    try {
      fs.mkdirSync(this.directory, { recursive: true });
      fs.copyFileSync(sourcePath, target);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new IngestionError(`Failed to store PDF copy: ${message}`, 'PDF_STORE_ERROR', sourcePath);
    }
    return target;
  }

  /**
   * Delete a stored copy. Paths outside the store are left alone.
   *
   * @returns true when a file was removed
   */
  remove(storedPath: string): boolean {
    const resolved = path.resolve(storedPath);
    if (path.dirname(resolved) !== this.directory) {
      console.error(`[PdfStore] Not removing ${resolved}: outside ${this.directory}`);
      return false;
    }
    if (!fs.existsSync(resolved)) return false;

    fs.rmSync(resolved, { force: true });
    console.error(`[PdfStore] Removed ${path.basename(resolved)}`);
    return true;
  }
}
