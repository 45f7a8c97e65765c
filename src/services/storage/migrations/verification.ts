/**
 * Schema verification
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES } from './schema-definitions.js';

/**
 * Names of required tables missing from the database
 */
export function verifySchema(db: Database.Database): { valid: boolean; missingTables: string[] } {
  const rows = db
    .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table'`)
    .all();
  const present = new Set(rows.map((row) => row.name));
  const missingTables = REQUIRED_TABLES.filter((name) => !present.has(name));
  return { valid: missingTables.length === 0, missingTables };
}
