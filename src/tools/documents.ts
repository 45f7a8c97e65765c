/**
 * Document Management MCP Tools
 *
 * Tools: doc_list, doc_status, doc_get, doc_structure, doc_delete, doc_download
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/documents
 */

import type { DocumentDetails, DocumentStructure } from '../models/document.js';
import type { PageRecord } from '../models/page.js';
import { existsSync, statSync } from 'fs';
import { MCPError, documentNotFoundError, pageNotFoundError } from '../server/errors.js';
import { requireServices } from '../server/state.js';
import { successResult } from '../server/types.js';
import { buildAggregate } from '../services/structuring/aggregation.js';
import {
  DocDeleteInput,
  DocDownloadInput,
  DocGetInput,
  DocListInput,
  DocStatusInput,
  DocStructureInput,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Unified document view: page results concatenated in page order, key
 * fields merged with later pages winning
 */
export function buildDocumentStructure(details: DocumentDetails): DocumentStructure {
  return {
    doc_id: details.doc_id,
    filename: details.filename,
    total_pages: details.pages.length,
    ...buildAggregate(details.pages),
    pages: details.pages,
    document_summary: details.document_summary,
    document_keywords: details.keywords,
  };
}

function withoutText(page: PageRecord): Omit<PageRecord, 'raw_text'> {
  const { raw_text: _rawText, ...rest } = page;
  return rest;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleDocList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocListInput, params);
    const { db } = requireServices();

    const documents = db.listDocuments({ limit: input.limit, offset: input.offset });
    return formatResponse(successResult({ documents, count: documents.length }));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocStatus(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocStatusInput, params);
    const { db, scheduler } = requireServices();

    const status = db.getDocumentStatus(input.doc_id);
    if (!status) {
      throw documentNotFoundError(input.doc_id);
    }
    return formatResponse(
      successResult({ ...status, is_processing: scheduler.isRunning(input.doc_id) })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocGetInput, params);
    const { db } = requireServices();

    const doc = db.getDocument(input.doc_id);
    if (!doc) {
      throw documentNotFoundError(input.doc_id);
    }

    const pages = db.getPages(input.doc_id, input.page_num);
    if (input.page_num !== undefined && pages.length === 0) {
      throw pageNotFoundError(input.doc_id, input.page_num);
    }

    return formatResponse(
      successResult({
        ...doc,
        pages: input.include_text ? pages : pages.map(withoutText),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocStructure(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocStructureInput, params);
    const { db } = requireServices();

    const details = db.getDocumentDetails(input.doc_id);
    if (!details) {
      throw documentNotFoundError(input.doc_id);
    }
    return formatResponse(successResult(buildDocumentStructure(details)));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocDelete(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocDeleteInput, params);
    const { db, scheduler, pdfStore } = requireServices();

    if (scheduler.isRunning(input.doc_id)) {
      throw new MCPError(
        'VALIDATION_ERROR',
        `Document ${input.doc_id} is being processed. Wait for doc_status to report completion, then retry.`,
        { docId: input.doc_id }
      );
    }

    const doc = db.getDocument(input.doc_id);
    if (!doc || !db.deleteDocument(input.doc_id)) {
      throw documentNotFoundError(input.doc_id);
    }
    const pdfRemoved = pdfStore.remove(doc.file_path);
    console.error(`[Documents] Deleted document ${input.doc_id}`);
    return formatResponse(
      successResult({ doc_id: input.doc_id, deleted: true, pdf_removed: pdfRemoved })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocDownload(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocDownloadInput, params);
    const { db } = requireServices();

    const doc = db.getDocument(input.doc_id);
    if (!doc) {
      throw documentNotFoundError(input.doc_id);
    }
    if (!existsSync(doc.file_path)) {
      throw new MCPError('PATH_NOT_FOUND', `Stored PDF of document ${input.doc_id} is missing`, {
        docId: input.doc_id,
        filePath: doc.file_path,
      });
    }

    return formatResponse(
      successResult({
        doc_id: doc.doc_id,
        filename: doc.filename,
        file_path: doc.file_path,
        size_bytes: statSync(doc.file_path).size,
        content_type: 'application/pdf',
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const documentTools: Record<string, ToolDefinition> = {
  doc_list: {
    description:
      'List documents, newest first, with status (structured once every page is structured) and processed page counts.',
    inputSchema: DocListInput.shape,
    handler: handleDocList,
  },
  doc_status: {
    description:
      'Processing progress of one document: total and processed pages, completion, and whether the stored PDF copy is on disk.',
    inputSchema: DocStatusInput.shape,
    handler: handleDocStatus,
  },
  doc_get: {
    description:
      'Full document record with its pages (raw text, structured data, summaries, keywords). Use page_num for a single page.',
    inputSchema: DocGetInput.shape,
    handler: handleDocGet,
  },
  doc_structure: {
    description:
      'Document-wide structure: sections, measurements and tables of all pages in page order, merged key fields, document summary and keywords.',
    inputSchema: DocStructureInput.shape,
    handler: handleDocStructure,
  },
  doc_delete: {
    description: 'Delete a document, all of its pages and its stored PDF copy.',
    inputSchema: DocDeleteInput.shape,
    handler: handleDocDelete,
  },
  doc_download: {
    description:
      'Locate the stored copy of a document\'s PDF: path on disk, original filename and size in bytes.',
    inputSchema: DocDownloadInput.shape,
    handler: handleDocDownload,
  },
};
