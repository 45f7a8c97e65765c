/**
 * Ingestion MCP Tools
 *
 * Tools: doc_ingest, doc_process
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/ingestion
 */

import { MCPError, documentNotFoundError } from '../server/errors.js';
import { requireServices } from '../server/state.js';
import { successResult } from '../server/types.js';
import {
  DocIngestInput,
  DocProcessInput,
  sanitizePath,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleDocIngest(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocIngestInput, params);
    const { ingestor, scheduler } = requireServices();

    const result = await ingestor.ingestFile(sanitizePath(input.file_path));

    const processingStarted = input.process && !result.duplicate;
    if (processingStarted) {
      // resolves null on failure, never rejects
      void scheduler.schedule(result.doc_id);
    }

    return formatResponse(
      successResult({
        ...result,
        processing_started: processingStarted,
        message: result.duplicate
          ? 'File was already ingested. Use doc_process to structure it again.'
          : processingStarted
            ? 'File uploaded successfully. Processing started in background.'
            : 'File uploaded successfully. Use doc_process to start structuring.',
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocProcess(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocProcessInput, params);
    const { db, scheduler } = requireServices();

    if (!db.getDocument(input.doc_id)) {
      throw documentNotFoundError(input.doc_id);
    }

    const alreadyRunning = scheduler.isRunning(input.doc_id);

    if (!input.wait) {
      void scheduler.schedule(input.doc_id, { force: input.force });
      return formatResponse(
        successResult({
          doc_id: input.doc_id,
          processing_started: !alreadyRunning,
          already_running: alreadyRunning,
        })
      );
    }

    const result = await scheduler.schedule(input.doc_id, { force: input.force });
    if (!result) {
      throw new MCPError('INTERNAL_ERROR', `Processing of document ${input.doc_id} failed`, {
        docId: input.doc_id,
      });
    }
    return formatResponse(successResult({ ...result, already_running: alreadyRunning }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export const ingestionTools: Record<string, ToolDefinition> = {
  doc_ingest: {
    description:
      'Ingest a PDF file: extracts the text of every page (OCR for scanned files when available) and stores the document. Structuring starts in the background unless process=false.',
    inputSchema: DocIngestInput.shape,
    handler: handleDocIngest,
  },
  doc_process: {
    description:
      'Structure the pages of a document with the language model. Pages already structured with a summary are skipped unless force=true. Use wait=true to get the page counts.',
    inputSchema: DocProcessInput.shape,
    handler: handleDocProcess,
  },
};
