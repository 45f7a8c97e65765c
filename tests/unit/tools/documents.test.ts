/**
 * Tests for doc_list, doc_status, doc_get, doc_structure, doc_delete and doc_download
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import {
  handleDocDelete,
  handleDocDownload,
  handleDocGet,
  handleDocList,
  handleDocStatus,
  handleDocStructure,
} from '../../../src/tools/documents.js';
import { handleDocIngest, handleDocProcess } from '../../../src/tools/ingestion.js';
import { ScriptedCollaborator, validReply } from '../structuring/helpers.js';
import {
  BlockingCollaborator,
  type ToolTestContext,
  parseResponse,
  setupToolTest,
  teardownToolTest,
} from './helpers.js';

describe('Document tools', () => {
  let context: ToolTestContext | undefined;

  afterEach(async () => {
    await teardownToolTest(context);
    context = undefined;
  });

  async function ingest(ctx: ToolTestContext, name = 'invoice.pdf'): Promise<string> {
    const result = parseResponse(await handleDocIngest({ file_path: ctx.writePdf(name), process: false }));
    return result.data.doc_id;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // doc_list
  // ═══════════════════════════════════════════════════════════════════════════

  describe('doc_list', () => {
    it('lists documents newest first with derived status', async () => {
      context = setupToolTest(null);
      const first = await ingest(context, 'first.pdf');
      const second = await ingest(context, 'second.pdf');

      const result = parseResponse(await handleDocList({}));

      expect(result.data.count).toBe(2);
      expect(result.data.documents.map((doc: { doc_id: string }) => doc.doc_id)).toEqual([second, first]);
      expect(result.data.documents[0]).toMatchObject({
        filename: 'second.pdf',
        status: 'processing',
        page_count: 2,
        processed_pages: 0,
      });
    });

    it('pages through results', async () => {
      context = setupToolTest(null);
      await ingest(context, 'a.pdf');
      await ingest(context, 'b.pdf');

      const result = parseResponse(await handleDocList({ limit: 1, offset: 1 }));
      expect(result.data.documents.map((doc: { filename: string }) => doc.filename)).toEqual(['a.pdf']);
    });

    it('rejects a limit of zero', async () => {
      context = setupToolTest(null);
      const result = parseResponse(await handleDocList({ limit: 0 }));
      expect(result.error.category).toBe('VALIDATION_ERROR');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // doc_status
  // ═══════════════════════════════════════════════════════════════════════════

  describe('doc_status', () => {
    it('reports progress for a stored document', async () => {
      context = setupToolTest(null);
      const docId = await ingest(context);

      const result = parseResponse(await handleDocStatus({ doc_id: docId }));
      expect(result.data).toEqual({
        doc_id: docId,
        filename: 'invoice.pdf',
        total_pages: 2,
        processed_pages: 0,
        is_complete: false,
        has_pdf_file: true,
        is_processing: false,
      });
    });

    it('keeps the stored copy when the ingested file is removed', async () => {
      context = setupToolTest(null);
      const sourcePath = context.writePdf('moved.pdf');
      const ingested = parseResponse(await handleDocIngest({ file_path: sourcePath, process: false }));
      rmSync(sourcePath);

      const result = parseResponse(await handleDocStatus({ doc_id: ingested.data.doc_id }));
      expect(result.data.has_pdf_file).toBe(true);
    });

    it('reports an unknown document', async () => {
      context = setupToolTest(null);
      const result = parseResponse(await handleDocStatus({ doc_id: 'missing' }));
      expect(result.error.category).toBe('DOCUMENT_NOT_FOUND');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // doc_get
  // ═══════════════════════════════════════════════════════════════════════════

  describe('doc_get', () => {
    it('returns the document with all pages', async () => {
      context = setupToolTest(null);
      const docId = await ingest(context);

      const result = parseResponse(await handleDocGet({ doc_id: docId }));
      expect(result.data.doc_id).toBe(docId);
      expect(result.data.pages.map((page: { page_num: number }) => page.page_num)).toEqual([1, 2]);
      expect(result.data.pages[1].raw_text).toBe('Seal gap measured at 12.5 mm after service.');
    });

    it('returns a single page', async () => {
      context = setupToolTest(null);
      const docId = await ingest(context);

      const result = parseResponse(await handleDocGet({ doc_id: docId, page_num: 2 }));
      expect(result.data.pages).toHaveLength(1);
      expect(result.data.pages[0].page_num).toBe(2);
    });

    it('omits page text when include_text=false', async () => {
      context = setupToolTest(null);
      const docId = await ingest(context);

      const result = parseResponse(await handleDocGet({ doc_id: docId, include_text: false }));
      expect(result.data.pages[0]).not.toHaveProperty('raw_text');
      expect(result.data.pages[0].text_length).toBe(45);
    });

    it('reports a missing page', async () => {
      context = setupToolTest(null);
      const docId = await ingest(context);

      const result = parseResponse(await handleDocGet({ doc_id: docId, page_num: 5 }));
      expect(result.error.category).toBe('PAGE_NOT_FOUND');
      expect(result.error.message).toBe(`Page 5 not found in document ${docId}`);
    });

    it('reports an unknown document', async () => {
      context = setupToolTest(null);
      const result = parseResponse(await handleDocGet({ doc_id: 'missing' }));
      expect(result.error.category).toBe('DOCUMENT_NOT_FOUND');
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // doc_structure
  // ═══════════════════════════════════════════════════════════════════════════

  describe('doc_structure', () => {
    it('returns empty aggregates before processing', async () => {
      context = setupToolTest(null);
      const docId = await ingest(context);

      const result = parseResponse(await handleDocStructure({ doc_id: docId }));
      expect(result.data).toMatchObject({
        doc_id: docId,
        filename: 'invoice.pdf',
        total_pages: 2,
        all_sections: [],
        all_measurements: [],
        all_tables: [],
        all_key_fields: {},
        document_summary: '',
        document_keywords: [],
      });
    });

    it('merges the structured pages of a processed document', async () => {
      const collaborator = new ScriptedCollaborator([
        validReply({
          sections: [{ title: 'Header', content: 'North plant' }],
          key_fields: { invoice_number: 'INV-1', plant: 'north' },
          measurements: [],
          tables: [],
        }),
        validReply({
          sections: [{ title: 'Measurement', content: 'Seal gap' }],
          key_fields: { invoice_number: 'INV-2' },
          measurements: [{ value: 12.5, unit: 'mm', context: 'seal gap' }],
          tables: [],
        }),
        'Invoice with a seal gap measurement.',
      ]);
      context = setupToolTest(collaborator);
      const docId = await ingest(context);
      await handleDocProcess({ doc_id: docId, wait: true });

      const result = parseResponse(await handleDocStructure({ doc_id: docId }));
      expect(result.data.all_sections).toEqual([
        { title: 'Header', content: 'North plant' },
        { title: 'Measurement', content: 'Seal gap' },
      ]);
      expect(result.data.all_measurements).toEqual([{ value: 12.5, unit: 'mm', context: 'seal gap' }]);
      expect(result.data.all_key_fields).toEqual({ invoice_number: 'INV-2', plant: 'north' });
      expect(result.data.document_summary).toBe('Invoice with a seal gap measurement.');
      expect(result.data.document_keywords).toEqual(['invoice', 'pump']);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // doc_delete
  // ═══════════════════════════════════════════════════════════════════════════

  describe('doc_delete', () => {
    it('deletes the document and its pages', async () => {
      context = setupToolTest(null);
      const docId = await ingest(context);

      const result = parseResponse(await handleDocDelete({ doc_id: docId }));
      expect(result.data).toEqual({ doc_id: docId, deleted: true, pdf_removed: true });
      expect(parseResponse(await handleDocGet({ doc_id: docId })).error.category).toBe('DOCUMENT_NOT_FOUND');
      expect(context.services.db.getPages(docId)).toEqual([]);
    });

    it('removes the stored copy but not the ingested file', async () => {
      context = setupToolTest(null);
      const sourcePath = context.writePdf('keep.pdf');
      const ingested = parseResponse(await handleDocIngest({ file_path: sourcePath, process: false }));
      const storedPath = join(context.dir, 'pdfs', `${ingested.data.doc_id}.pdf`);
      expect(existsSync(storedPath)).toBe(true);

      await handleDocDelete({ doc_id: ingested.data.doc_id });

      expect(existsSync(storedPath)).toBe(false);
      expect(existsSync(sourcePath)).toBe(true);
    });

    it('reports an unknown document', async () => {
      context = setupToolTest(null);
      const result = parseResponse(await handleDocDelete({ doc_id: 'missing' }));
      expect(result.error.category).toBe('DOCUMENT_NOT_FOUND');
    });

    it('refuses while the document is being processed', async () => {
      const collaborator = new BlockingCollaborator(validReply());
      context = setupToolTest(collaborator, ['Only page of text.']);
      const docId = await ingest(context);
      await handleDocProcess({ doc_id: docId });

      const result = parseResponse(await handleDocDelete({ doc_id: docId }));
      expect(result.error.category).toBe('VALIDATION_ERROR');
      expect(context.services.db.getDocument(docId)).not.toBeNull();

      await vi.waitFor(() => expect(collaborator.pending).toBe(1));
      collaborator.release();
      await context.services.scheduler.waitForIdle();
      expect(parseResponse(await handleDocDelete({ doc_id: docId })).data.deleted).toBe(true);
    });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // doc_download
  // ═══════════════════════════════════════════════════════════════════════════

  describe('doc_download', () => {
    it('returns the stored copy of the PDF', async () => {
      context = setupToolTest(null);
      const sourcePath = context.writePdf('invoice.pdf', '%PDF-1.4 download me');
      const ingested = parseResponse(await handleDocIngest({ file_path: sourcePath, process: false }));
      const docId: string = ingested.data.doc_id;

      const result = parseResponse(await handleDocDownload({ doc_id: docId }));

      expect(result.data).toEqual({
        doc_id: docId,
        filename: 'invoice.pdf',
        file_path: join(context.dir, 'pdfs', `${docId}.pdf`),
        size_bytes: 20,
        content_type: 'application/pdf',
      });
      expect(readFileSync(result.data.file_path, 'utf-8')).toBe('%PDF-1.4 download me');
    });

    it('reports a stored copy that has gone missing', async () => {
      context = setupToolTest(null);
      const docId = await ingest(context);
      rmSync(join(context.dir, 'pdfs', `${docId}.pdf`));

      const result = parseResponse(await handleDocDownload({ doc_id: docId }));
      expect(result.error.category).toBe('PATH_NOT_FOUND');
      expect(result.error.message).toBe(`Stored PDF of document ${docId} is missing`);
    });

    it('reports an unknown document', async () => {
      context = setupToolTest(null);
      const result = parseResponse(await handleDocDownload({ doc_id: 'missing' }));
      expect(result.error.category).toBe('DOCUMENT_NOT_FOUND');
    });
  });
});
