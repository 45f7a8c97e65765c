/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Max response size in bytes before truncation (700KB) */
export const MAX_RESPONSE_BYTES = 700 * 1024;

/** Arrays at or below this length are never cut */
const MIN_TRUNCATABLE_LENGTH = 5;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format tool result as MCP content response.
 * If the serialized JSON exceeds maxBytes, the largest arrays are cut and a
 * `_response_truncated` note lists what was cut.
 */
export function formatResponse(result: unknown, maxBytes: number = MAX_RESPONSE_BYTES): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= maxBytes || !isRecord(result)) {
    return { content: [{ type: 'text', text: json }] };
  }

  const truncated = truncateResult(result, maxBytes);
  return { content: [{ type: 'text', text: JSON.stringify(truncated, null, 2) }] };
}

interface ArrayLocation {
  path: string[];
  length: number;
  size: number;
}

function findArrays(value: unknown, path: string[], found: ArrayLocation[]): void {
  if (Array.isArray(value)) {
    found.push({ path, length: value.length, size: JSON.stringify(value).length });
    return;
  }
  if (isRecord(value)) {
    for (const [key, child] of Object.entries(value)) {
      findArrays(child, [...path, key], found);
    }
  }
}

/**
 * Parent object of `path` inside `root`, or null when the path leaves
 * plain objects
 */
function parentOf(root: Record<string, unknown>, path: readonly string[]): Record<string, unknown> | null {
  let current = root;
  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (!isRecord(next)) return null;
    current = next;
  }
  return current;
}

function truncateResult(obj: Record<string, unknown>, maxBytes: number): Record<string, unknown> {
  const arrays: ArrayLocation[] = [];
  findArrays(obj, [], arrays);
  arrays.sort((a, b) => b.size - a.size);

  const parsed: unknown = JSON.parse(JSON.stringify(obj));
  const copy = isRecord(parsed) ? parsed : {};
  let currentSize = JSON.stringify(copy, null, 2).length;
  const truncatedFields: string[] = [];

  for (const { path, length } of arrays) {
    if (currentSize <= maxBytes) break;
    if (length <= MIN_TRUNCATABLE_LENGTH) continue;

    const parent = parentOf(copy, path);
    const key = path[path.length - 1];
    const target = parent?.[key];
    if (!parent || !Array.isArray(target)) continue;

    const cap = Math.min(50, Math.max(MIN_TRUNCATABLE_LENGTH, Math.floor(length * 0.1)));
    parent[key] = target.slice(0, cap);
    parent[`_${key}_total`] = length;
    truncatedFields.push(`${path.join('.')} (${length} → ${cap})`);
    currentSize = JSON.stringify(copy, null, 2).length;
  }

  const reason = `Response exceeded ${Math.round(maxBytes / 1024)}KB limit`;
  if (currentSize > maxBytes) {
    return {
      _response_truncated: {
        reason: `${reason} and could not be reduced by array truncation`,
        original_size_bytes: JSON.stringify(obj, null, 2).length,
        suggestion: 'Use limit/offset or page_num parameters to reduce response size',
      },
    };
  }

  copy._response_truncated = {
    reason,
    truncated_fields: truncatedFields,
    suggestion: 'Use limit/offset or page_num parameters to reduce response size',
  };
  return copy;
}

/**
 * Handle errors uniformly
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}
