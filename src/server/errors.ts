/**
 * MCP Server Error Handling
 *
 * Every tool failure is reported as an MCPError with a category and a
 * recovery hint naming the tool to call next.
 *
 * @module server/errors
 */

import { IngestionError } from '../services/ingestion/errors.js';
import { CircuitBreakerOpenError, LLMCallError } from '../services/llm/errors.js';
import { MigrationError } from '../services/storage/migrations/types.js';
import { DatabaseError, DatabaseErrorCode } from '../services/storage/database/types.js';
import { ValidationError } from '../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Database errors
  | 'DATABASE_NOT_OPEN'
  | 'DATABASE_ERROR'

  // Document errors
  | 'DOCUMENT_NOT_FOUND'
  | 'PAGE_NOT_FOUND'

  // Ingestion errors
  | 'PATH_NOT_FOUND'
  | 'INGESTION_ERROR'

  // Language model errors
  | 'LLM_API_ERROR'
  | 'LLM_RATE_LIMIT'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

function categoryForDatabaseError(error: DatabaseError): ErrorCategory {
  switch (error.code) {
    case DatabaseErrorCode.DOCUMENT_NOT_FOUND:
      return 'DOCUMENT_NOT_FOUND';
    case DatabaseErrorCode.PAGE_NOT_FOUND:
      return 'PAGE_NOT_FOUND';
    case DatabaseErrorCode.INVALID_QUERY:
      return 'VALIDATION_ERROR';
    default:
      return 'DATABASE_ERROR';
  }
}

function categoryForIngestionError(error: IngestionError): ErrorCategory {
  switch (error.category) {
    case 'FILE_NOT_FOUND':
      return 'PATH_NOT_FOUND';
    case 'UNSUPPORTED_FILE':
      return 'VALIDATION_ERROR';
    default:
      return 'INGESTION_ERROR';
  }
}

function categoryForLLMError(error: LLMCallError): ErrorCategory {
  switch (error.kind) {
    case 'rate_limit':
      return 'LLM_RATE_LIMIT';
    case 'authentication':
      return 'CONFIGURATION_ERROR';
    default:
      return 'LLM_API_ERROR';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof ValidationError) {
      return new MCPError('VALIDATION_ERROR', error.message);
    }

    if (error instanceof DatabaseError) {
      return new MCPError(categoryForDatabaseError(error), error.message, {
        originalName: error.name,
        errorCode: error.code,
      });
    }

    if (error instanceof MigrationError) {
      return new MCPError('DATABASE_ERROR', error.message, { originalName: error.name });
    }

    if (error instanceof IngestionError) {
      return new MCPError(categoryForIngestionError(error), error.message, {
        originalName: error.name,
        errorCode: error.category,
        filePath: error.filePath,
      });
    }

    if (error instanceof LLMCallError) {
      return new MCPError(categoryForLLMError(error), error.message, {
        originalName: error.name,
        kind: error.kind,
        ...(error.statusCode !== undefined && { statusCode: error.statusCode }),
      });
    }

    if (error instanceof CircuitBreakerOpenError) {
      return new MCPError('LLM_API_ERROR', error.message, {
        originalName: error.name,
        timeToRecovery: error.timeToRecovery,
      });
    }

    if (error instanceof Error) {
      return new MCPError(defaultCategory, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Suggested next tool and a human-readable hint
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'doc_list', hint: 'Check parameter types and required fields' },
  DATABASE_NOT_OPEN: {
    tool: 'doc_list',
    hint: 'The database failed to open at startup; check PDF_PIPELINE_DB_PATH and restart',
  },
  DATABASE_ERROR: { tool: 'doc_list', hint: 'Check the database file and its permissions' },
  DOCUMENT_NOT_FOUND: { tool: 'doc_list', hint: 'Use doc_list to browse available documents' },
  PAGE_NOT_FOUND: { tool: 'doc_status', hint: 'Use doc_status to see the page count' },
  PATH_NOT_FOUND: { tool: 'doc_ingest', hint: 'Verify the file path exists on the filesystem' },
  INGESTION_ERROR: { tool: 'doc_ingest', hint: 'Check that the file is a readable PDF' },
  LLM_API_ERROR: {
    tool: 'doc_process',
    hint: 'The language model service failed; retry doc_process later',
  },
  LLM_RATE_LIMIT: { tool: 'doc_process', hint: 'Wait for the rate limit to reset, then retry' },
  CONFIGURATION_ERROR: {
    tool: 'doc_status',
    hint: 'Check environment variables: LLM_API_KEY, LLM_BASE_URL, LLM_MODEL',
  },
  INTERNAL_ERROR: { tool: 'doc_list', hint: 'See server stderr for diagnostics' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

export function databaseNotOpenError(): MCPError {
  return new MCPError('DATABASE_NOT_OPEN', 'Database is not open');
}

export function documentNotFoundError(docId: string): MCPError {
  return new MCPError(
    'DOCUMENT_NOT_FOUND',
    `Document not found: ${docId}. Use doc_list to browse available documents.`,
    { docId }
  );
}

export function pageNotFoundError(docId: string, pageNum: number): MCPError {
  return new MCPError('PAGE_NOT_FOUND', `Page ${pageNum} not found in document ${docId}`, {
    docId,
    pageNum,
  });
}
