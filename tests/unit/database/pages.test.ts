/**
 * Page operation tests for DatabaseService and DatabaseStructuringStorage
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatabaseStructuringStorage } from '../../../src/services/storage/database/index.js';
import type { StructuredRecord } from '../../../src/models/structured.js';
import {
  type TestDatabase,
  closeTestDatabase,
  createTestDocument,
  createTestPages,
  openTestDatabase,
} from './helpers.js';

const RECORD: StructuredRecord = {
  summary: 'Seal replacement',
  keywords: ['seal', 'pump'],
  sections: [{ title: 'Work', content: 'Replaced seal' }],
  measurements: [{ value: 4.2, unit: 'bar', context: 'test pressure' }],
  key_fields: { order: 'A-17' },
  tables: [],
  processing_status: 'success',
};

describe('DatabaseService - pages', () => {
  let testDb: TestDatabase | undefined;
  let docId: string;

  beforeEach(() => {
    testDb = openTestDatabase();
    const doc = createTestDocument();
    docId = doc.doc_id;
    testDb.db.insertDocumentWithPages(doc, [
      { page_num: 2, raw_text: 'second', text_length: 6 },
      { page_num: 1, raw_text: 'first', text_length: 5 },
    ]);
  });

  afterEach(() => {
    closeTestDatabase(testDb);
    testDb = undefined;
  });

  function db() {
    if (!testDb) throw new Error('test database not open');
    return testDb.db;
  }

  it('returns pages in ascending page order', () => {
    expect(db().getPages(docId).map((page) => page.page_num)).toEqual([1, 2]);
  });

  it('returns raw pages with empty structure fields', () => {
    expect(db().getPages(docId, 1)).toEqual([
      expect.objectContaining({
        doc_id: docId,
        page_num: 1,
        raw_text: 'first',
        text_length: 5,
        status: 'raw',
        structured_data: null,
        page_summary: '',
        keywords: [],
        updated_at: null,
      }),
    ]);
  });

  it('returns an empty list for a missing page', () => {
    expect(db().getPages(docId, 9)).toEqual([]);
  });

  it('writes a structuring outcome in one update', () => {
    expect(db().updatePageData(docId, 2, RECORD, 'Seal replacement', ['seal', 'pump'])).toBe(1);

    const [page] = db().getPages(docId, 2);
    expect(page.status).toBe('structured');
    expect(page.structured_data).toEqual(RECORD);
    expect(page.page_summary).toBe('Seal replacement');
    expect(page.keywords).toEqual(['seal', 'pump']);
    expect(page.updated_at).not.toBeNull();
    expect(page.raw_text).toBe('second');
  });

  it('returns 0 changes for a missing page', () => {
    expect(db().updatePageData(docId, 9, RECORD, '', [])).toBe(0);
  });

  it('reads corrupt JSON columns as empty values', () => {
    db()
      .getConnection()
      .prepare(`UPDATE pages SET structured_data = '{broken', keywords = '"seal"' WHERE doc_id = ? AND page_num = 1`)
      .run(docId);

    const [page] = db().getPages(docId, 1);
    expect(page.structured_data).toBeNull();
    expect(page.keywords).toEqual([]);
  });

  it('keeps a stored object that is not a full record', () => {
    db()
      .getConnection()
      .prepare(`UPDATE pages SET structured_data = '{"summary":"legacy"}' WHERE doc_id = ? AND page_num = 1`)
      .run(docId);

    expect(db().getPages(docId, 1)[0].structured_data).toEqual({ summary: 'legacy' });
  });
});

describe('DatabaseStructuringStorage', () => {
  let testDb: TestDatabase | undefined;

  beforeEach(() => {
    testDb = openTestDatabase();
  });

  afterEach(() => {
    closeTestDatabase(testDb);
    testDb = undefined;
  });

  function storage(): { storage: DatabaseStructuringStorage; docId: string } {
    if (!testDb) throw new Error('test database not open');
    const doc = createTestDocument();
    testDb.db.insertDocumentWithPages(doc, createTestPages(['alpha', 'beta']));
    return { storage: new DatabaseStructuringStorage(testDb.db), docId: doc.doc_id };
  }

  it('loads pages in order', async () => {
    const { storage: store, docId } = storage();
    expect((await store.loadPages(docId)).map((page) => page.raw_text)).toEqual(['alpha', 'beta']);
  });

  it('reports whether a page was stored', async () => {
    const { storage: store, docId } = storage();
    await expect(store.persistPage(docId, 1, RECORD, 'Seal replacement', ['seal'])).resolves.toBe(true);
    await expect(store.persistPage(docId, 5, RECORD, 'Seal replacement', ['seal'])).resolves.toBe(false);
  });

  it('stores document metadata and tolerates an unknown document', async () => {
    const { storage: store, docId } = storage();
    await store.persistDocumentMetadata(docId, 'Summary', ['seal']);
    expect(testDb?.db.getDocument(docId)?.document_summary).toBe('Summary');

    await expect(store.persistDocumentMetadata('missing', 'Summary', [])).resolves.toBeUndefined();
  });
});
