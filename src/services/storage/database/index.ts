/**
 * Database Module - Public API
 */

export { MigrationError } from '../migrations/index.js';

export type {
  ListDocumentsOptions,
  NewDocument,
  SearchResult,
} from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';

export { DatabaseService } from './service.js';
export { DatabaseStructuringStorage } from './structuring-storage.js';
export { getDefaultDatabasePath } from './helpers.js';
export {
  sanitizeFTS5Query,
  normalizeSearchLimit,
  DEFAULT_SEARCH_LIMIT,
  MAX_SEARCH_LIMIT,
} from './search-operations.js';
