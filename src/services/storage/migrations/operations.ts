/**
 * Schema initialization and migrations
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import { SCHEMA_VERSION } from './schema-definitions.js';
import {
  configurePragmas,
  createFTSTables,
  createIndexes,
  createTables,
  initializeSchemaVersion,
} from './schema-helpers.js';

/**
 * Schema version stored in the database, 0 when none
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const table = db
      .prepare<[], { name: string }>(
        `SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'`
      )
      .get();
    if (!table) return 0;

    const row = db
      .prepare<[number], { version: number }>('SELECT version FROM schema_version WHERE id = ?')
      .get(1);
    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Create every table, index and trigger. Idempotent.
 * The version is stamped last, inside the same transaction.
 */
export function initializeDatabase(db: Database.Database): void {
  configurePragmas(db);

  db.transaction(() => {
    createTables(db);
    createIndexes(db);
    createFTSTables(db);
    initializeSchemaVersion(db);
  })();
}

/**
 * Open an existing database at SCHEMA_VERSION, or initialize an empty one
 */
export function migrateToLatest(db: Database.Database): void {
  const current = checkSchemaVersion(db);

  if (current === 0) {
    initializeDatabase(db);
    return;
  }

  if (current > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version ${current} is newer than supported version ${SCHEMA_VERSION}`,
      'version_check'
    );
  }

  configurePragmas(db);
}
