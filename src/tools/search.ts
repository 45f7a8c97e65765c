/**
 * Search MCP Tools
 *
 * Tools: doc_search
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/search
 */

import { requireServices } from '../server/state.js';
import { successResult } from '../server/types.js';
import { DocSearchInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleDocSearch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocSearchInput, params);
    const { db } = requireServices();

    const results = db.searchPages(input.q, input.limit);
    return formatResponse(successResult({ query: input.q, count: results.length, results }));
  } catch (error) {
    return handleError(error);
  }
}

export const searchTools: Record<string, ToolDefinition> = {
  doc_search: {
    description:
      'Keyword search over page text, page summaries and keywords (BM25 ranking). Any term may match. Returns page hits with a 300-character text snippet.',
    inputSchema: DocSearchInput.shape,
    handler: handleDocSearch,
  },
};
