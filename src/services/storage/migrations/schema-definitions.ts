/**
 * SQL Schema Definitions
 *
 * Table creation SQL, indexes, FTS5 search index and pragmas used by the
 * migration system.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -64000',
  'PRAGMA busy_timeout = 30000',
] as const;

export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * One row per ingested PDF. `status` is only set to 'structured' when the
 * document summary is written; listings recompute it from page counts.
 */
export const CREATE_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS documents (
  doc_id TEXT PRIMARY KEY,
  filename TEXT NOT NULL,
  file_path TEXT NOT NULL,
  file_hash TEXT NOT NULL,
  total_pages INTEGER NOT NULL CHECK (total_pages >= 0),
  status TEXT NOT NULL DEFAULT 'raw' CHECK (status IN ('raw', 'structured')),
  document_summary TEXT NOT NULL DEFAULT '',
  keywords TEXT NOT NULL DEFAULT '[]',
  created_at TEXT NOT NULL,
  updated_at TEXT
)
`;

/**
 * One row per page. structured_data and keywords hold JSON text.
 */
export const CREATE_PAGES_TABLE = `
CREATE TABLE IF NOT EXISTS pages (
  doc_id TEXT NOT NULL REFERENCES documents(doc_id) ON DELETE CASCADE,
  page_num INTEGER NOT NULL CHECK (page_num >= 1),
  raw_text TEXT NOT NULL,
  text_length INTEGER NOT NULL,
  status TEXT NOT NULL DEFAULT 'raw' CHECK (status IN ('raw', 'structured')),
  structured_data TEXT,
  page_summary TEXT NOT NULL DEFAULT '',
  keywords TEXT NOT NULL DEFAULT '[]',
  created_at TEXT NOT NULL,
  updated_at TEXT,
  UNIQUE (doc_id, page_num)
)
`;

export const TABLE_DEFINITIONS = [
  { name: 'documents', sql: CREATE_DOCUMENTS_TABLE },
  { name: 'pages', sql: CREATE_PAGES_TABLE },
] as const;

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_documents_created_at ON documents(created_at)',
  'CREATE INDEX IF NOT EXISTS idx_documents_file_hash ON documents(file_hash)',
  'CREATE INDEX IF NOT EXISTS idx_pages_doc_status ON pages(doc_id, status)',
] as const;

/**
 * FTS5 index over page text, keywords and summary.
 * External content mode: reads from the pages table.
 */
export const CREATE_PAGES_FTS_TABLE = `
CREATE VIRTUAL TABLE IF NOT EXISTS pages_fts USING fts5(
  raw_text,
  keywords,
  page_summary,
  content='pages',
  content_rowid='rowid',
  tokenize='unicode61 remove_diacritics 2'
)
`;

export const CREATE_PAGES_FTS_TRIGGERS = [
  `CREATE TRIGGER IF NOT EXISTS pages_fts_ai AFTER INSERT ON pages BEGIN
    INSERT INTO pages_fts(rowid, raw_text, keywords, page_summary)
    VALUES (new.rowid, new.raw_text, new.keywords, new.page_summary);
  END`,
  `CREATE TRIGGER IF NOT EXISTS pages_fts_ad AFTER DELETE ON pages BEGIN
    INSERT INTO pages_fts(pages_fts, rowid, raw_text, keywords, page_summary)
    VALUES ('delete', old.rowid, old.raw_text, old.keywords, old.page_summary);
  END`,
  `CREATE TRIGGER IF NOT EXISTS pages_fts_au AFTER UPDATE OF raw_text, keywords, page_summary ON pages BEGIN
    INSERT INTO pages_fts(pages_fts, rowid, raw_text, keywords, page_summary)
    VALUES ('delete', old.rowid, old.raw_text, old.keywords, old.page_summary);
    INSERT INTO pages_fts(rowid, raw_text, keywords, page_summary)
    VALUES (new.rowid, new.raw_text, new.keywords, new.page_summary);
  END`,
] as const;

export const REQUIRED_TABLES = ['schema_version', 'documents', 'pages', 'pages_fts'] as const;
