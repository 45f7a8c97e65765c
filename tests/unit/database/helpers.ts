/**
 * Shared test helpers for DatabaseService tests
 */

import { mkdtempSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService } from '../../../src/services/storage/database/index.js';
import type { NewDocument } from '../../../src/services/storage/database/index.js';
import type { ExtractedPage } from '../../../src/models/page.js';
import { computeHash } from '../../../src/utils/hash.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST DATA FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export function createTestDocument(overrides: Partial<NewDocument> = {}): NewDocument {
  const docId = uuidv4();
  return {
    doc_id: docId,
    filename: 'invoice.pdf',
    file_path: join(tmpdir(), 'test-db-missing', `${docId}.pdf`),
    file_hash: computeHash(`test file ${docId}`),
    ...overrides,
  };
}

/**
 * Pages numbered from 1 in list order
 */
export function createTestPages(texts: readonly string[]): ExtractedPage[] {
  return texts.map((raw_text, index) => ({
    page_num: index + 1,
    raw_text,
    text_length: raw_text.length,
  }));
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════════

export interface TestDatabase {
  dir: string;
  db: DatabaseService;
}

export function openTestDatabase(prefix = 'test-db-'): TestDatabase {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return { dir, db: DatabaseService.open(join(dir, 'pipeline.db')) };
}

export function closeTestDatabase(testDb: TestDatabase | undefined): void {
  if (!testDb) return;
  try {
    testDb.db.close();
  } catch {
    // Already closed
  }
  if (existsSync(testDb.dir)) {
    rmSync(testDb.dir, { recursive: true, force: true });
  }
}
