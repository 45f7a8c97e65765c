/**
 * Zod validation schemas for MCP tool inputs
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';

import { DEFAULT_SEARCH_LIMIT } from '../services/storage/database/search-operations.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError listing every failing field
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const fieldPath = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${fieldPath}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

/**
 * Resolve a user-supplied file path
 *
 * @throws ValidationError if the path contains null bytes
 */
export function sanitizePath(filePath: string): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }
  return path.resolve(filePath);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocIdSchema = z.string().min(1, 'doc_id is required').describe('Document ID');

// ═══════════════════════════════════════════════════════════════════════════════
// INGESTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocIngestInput = z.object({
  file_path: z.string().min(1, 'file_path is required').describe('Path to a PDF file'),
  process: z.boolean().default(true).describe('Start structuring in the background after ingestion'),
});

export const DocProcessInput = z.object({
  doc_id: DocIdSchema,
  wait: z.boolean().default(false).describe('Wait for processing to finish and return counts'),
  force: z
    .boolean()
    .default(false)
    .describe('Re-structure pages that already have a summary'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocListInput = z.object({
  limit: z.number().int().min(1).max(1000).optional().describe('Maximum results (default: all)'),
  offset: z.number().int().min(0).default(0).describe('Offset for pagination'),
});

export const DocStatusInput = z.object({
  doc_id: DocIdSchema,
});

export const DocGetInput = z.object({
  doc_id: DocIdSchema,
  page_num: z.number().int().min(1).optional().describe('Return only this page'),
  include_text: z.boolean().default(true).describe('Include raw page text'),
});

export const DocStructureInput = z.object({
  doc_id: DocIdSchema,
});

export const DocDeleteInput = z.object({
  doc_id: DocIdSchema,
});

export const DocDownloadInput = z.object({
  doc_id: DocIdSchema,
});

// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocSearchInput = z.object({
  q: z.string().trim().min(1, 'Search query (q) is required').describe('Search terms'),
  // clamped to 1..100 by the search operation
  limit: z.number().int().default(DEFAULT_SEARCH_LIMIT).describe('Maximum results (1-100)'),
});
