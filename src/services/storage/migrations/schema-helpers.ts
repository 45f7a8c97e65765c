/**
 * Schema Helper Functions for Database Migrations
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  CREATE_INDEXES,
  CREATE_PAGES_FTS_TABLE,
  CREATE_PAGES_FTS_TRIGGERS,
  CREATE_SCHEMA_VERSION_TABLE,
  DATABASE_PRAGMAS,
  SCHEMA_VERSION,
  TABLE_DEFINITIONS,
} from './schema-definitions.js';

export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new MigrationError(`Failed to set pragma: ${pragma}`, 'pragma', undefined, error);
    }
  }
}

/**
 * Stamp the schema version, replacing a stale row
 */
export function initializeSchemaVersion(db: Database.Database, version: number = SCHEMA_VERSION): void {
  try {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);
    const now = new Date().toISOString();
    db.prepare(
      `INSERT INTO schema_version (id, version, created_at, updated_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at`
    ).run(1, version, now, now);
  } catch (error) {
    throw new MigrationError(
      'Failed to initialize schema version table',
      'create_table',
      'schema_version',
      error
    );
  }
}

export function createTables(db: Database.Database): void {
  for (const table of TABLE_DEFINITIONS) {
    try {
      db.exec(table.sql);
    } catch (error) {
      throw new MigrationError(`Failed to create table: ${table.name}`, 'create_table', table.name, error);
    }
  }
}

export function createIndexes(db: Database.Database): void {
  for (const indexSql of CREATE_INDEXES) {
    try {
      db.exec(indexSql);
    } catch (error) {
      throw new MigrationError(`Failed to create index: ${indexSql}`, 'create_index', undefined, error);
    }
  }
}

export function createFTSTables(db: Database.Database): void {
  try {
    db.exec(CREATE_PAGES_FTS_TABLE);
    for (const trigger of CREATE_PAGES_FTS_TRIGGERS) {
      db.exec(trigger);
    }
  } catch (error) {
    throw new MigrationError(
      'Failed to create pages_fts. SQLite must be built with FTS5.',
      'create_virtual_table',
      'pages_fts',
      error
    );
  }
}
