/**
 * Structured page record produced by the structuring engine
 *
 * Every structuring attempt yields a record with the same six content fields.
 * The processing_status tag says how the record was obtained; it never changes
 * the shape of the record.
 *
 * @module models/structured
 */

/**
 * Diagnostic tag attached to every structuring attempt
 */
export type ProcessingStatus =
  | 'success'
  | 'partial_success'
  | 'json_error'
  | 'no_api_key'
  | 'empty_text'
  | 'auth_error'
  | 'rate_limit_error'
  | 'api_error'
  | 'unknown_error'
  | 'failed';

export interface Section {
  title: string;
  content: string;
}

export interface Measurement {
  value: unknown;
  unit: string;
  context: string;
}

/** One table as returned by the model: a list of rows, each row a list or a column map */
export type TableRows = unknown[];

/**
 * The six content fields requested from the model
 */
export interface StructuredContent {
  summary: string;
  keywords: string[];
  sections: Section[];
  measurements: Measurement[];
  key_fields: Record<string, unknown>;
  tables: TableRows[];
}

export interface StructuredRecord extends StructuredContent {
  processing_status: ProcessingStatus;
}

/** Top-level keys the model must return */
export const REQUIRED_KEYS = [
  'summary',
  'keywords',
  'sections',
  'measurements',
  'key_fields',
  'tables',
] as const satisfies readonly (keyof StructuredContent)[];

/**
 * Document-wide merge of all page records. Derived on demand, never stored.
 */
export interface AggregateStructure {
  all_sections: unknown[];
  all_measurements: unknown[];
  all_tables: unknown[];
  all_key_fields: Record<string, unknown>;
}
