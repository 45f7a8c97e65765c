/**
 * Helper functions for DatabaseService
 *
 * Path resolution and constraint error mapping.
 */

import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Database file used when neither an explicit path nor a non-blank
 * PDF_PIPELINE_DB_PATH is given
 */
export function getDefaultDatabasePath(): string {
  return (
    process.env.PDF_PIPELINE_DB_PATH?.trim() || join(homedir(), '.pdf-pipeline', 'pipeline.db')
  );
}

/**
 * Run a write, converting SQLite constraint errors to DatabaseError
 */
export function runWithConstraintCheck<T>(write: () => T, context: string): T {
  try {
    return write();
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Foreign key violation ${context}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    if (error instanceof Error && error.message.includes('UNIQUE constraint failed')) {
      throw new DatabaseError(`Duplicate row ${context}`, DatabaseErrorCode.DUPLICATE_PAGE, error);
    }
    throw error;
  }
}
