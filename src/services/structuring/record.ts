/**
 * Structured record construction, validation and merging
 *
 * Model output is untrusted JSON. Everything here turns an arbitrary parsed
 * value into a StructuredContent whose six fields always have the right
 * container types.
 *
 * @module services/structuring/record
 */

import {
  REQUIRED_KEYS,
  type Measurement,
  type ProcessingStatus,
  type Section,
  type StructuredContent,
  type StructuredRecord,
  type TableRows,
} from '../../models/structured.js';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Empty structure carrying the given tag. Tag defaults to 'failed'.
 */
export function createDefaultStructure(status: ProcessingStatus = 'failed'): StructuredRecord {
  return {
    summary: '',
    keywords: [],
    sections: [],
    measurements: [],
    key_fields: {},
    tables: [],
    processing_status: status,
  };
}

/**
 * True when all six keys are present with the expected container type
 */
export function hasRequiredShape(data: Record<string, unknown>): boolean {
  if (!REQUIRED_KEYS.every((key) => key in data)) return false;
  return (
    typeof data.summary === 'string' &&
    Array.isArray(data.keywords) &&
    Array.isArray(data.sections) &&
    Array.isArray(data.measurements) &&
    isPlainObject(data.key_fields) &&
    Array.isArray(data.tables)
  );
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

interface DropCounter {
  count: number;
}

// null and undefined entries carry nothing and are not counted as dropped
function isBlank(item: unknown): boolean {
  return item === null || item === undefined;
}

function normalizeKeywords(items: unknown[], drops: DropCounter): string[] {
  const keywords: string[] = [];
  for (const item of items) {
    if (typeof item !== 'string' && typeof item !== 'number' && typeof item !== 'boolean') {
      if (!isBlank(item)) drops.count++;
      continue;
    }
    const text = asText(item).trim();
    if (text) keywords.push(text);
  }
  return keywords;
}

// A bare string or number is the section body
function normalizeSections(items: unknown[], drops: DropCounter): Section[] {
  const sections: Section[] = [];
  for (const item of items) {
    if (isPlainObject(item)) {
      sections.push({ title: asText(item.title), content: asText(item.content) });
    } else if (typeof item === 'string' || typeof item === 'number') {
      sections.push({ title: '', content: String(item) });
    } else if (!isBlank(item)) {
      drops.count++;
    }
  }
  return sections;
}

// A bare string or number is the measured value
function normalizeMeasurements(items: unknown[], drops: DropCounter): Measurement[] {
  const measurements: Measurement[] = [];
  for (const item of items) {
    if (isPlainObject(item)) {
      measurements.push({
        value: item.value ?? null,
        unit: asText(item.unit),
        context: asText(item.context),
      });
    } else if (typeof item === 'string' || typeof item === 'number') {
      measurements.push({ value: item, unit: '', context: '' });
    } else if (!isBlank(item)) {
      drops.count++;
    }
  }
  return measurements;
}

// A bare column map is a one-row table
function normalizeTables(items: unknown[], drops: DropCounter): TableRows[] {
  const tables: TableRows[] = [];
  for (const item of items) {
    if (Array.isArray(item)) {
      tables.push(item);
    } else if (isPlainObject(item)) {
      tables.push([item]);
    } else if (!isBlank(item)) {
      drops.count++;
    }
  }
  return tables;
}

export interface NormalizedContent {
  content: Partial<StructuredContent>;
  /** List entries that could not be mapped to their shape */
  droppedEntries: number;
}

/**
 * Keep only the recognized fields of a parsed object, each coerced to its
 * container type. Fields with the wrong type are left out, and so are keys
 * outside the six. List entries that cannot be mapped are counted in
 * `droppedEntries`.
 */
export function normalizeContent(data: Record<string, unknown>): NormalizedContent {
  const content: Partial<StructuredContent> = {};
  const drops: DropCounter = { count: 0 };

  if (typeof data.summary === 'string') content.summary = data.summary.trim();
  if (Array.isArray(data.keywords)) content.keywords = normalizeKeywords(data.keywords, drops);
  if (Array.isArray(data.sections)) content.sections = normalizeSections(data.sections, drops);
  if (Array.isArray(data.measurements)) {
    content.measurements = normalizeMeasurements(data.measurements, drops);
  }
  if (isPlainObject(data.key_fields)) content.key_fields = { ...data.key_fields };
  if (Array.isArray(data.tables)) content.tables = normalizeTables(data.tables, drops);

  return { content, droppedEntries: drops.count };
}

/**
 * Fold `incoming` over `base`.
 *
 * - summary: incoming wins when non-empty
 * - keywords, sections, measurements, tables: incoming replaces base only
 *   when it is a non-empty list
 * - key_fields: shallow union, incoming wins on collision
 */
export function mergeStructuredRecord(
  base: StructuredContent,
  incoming: Partial<StructuredContent>
): StructuredContent {
  return {
    summary: incoming.summary ? incoming.summary : base.summary,
    keywords: incoming.keywords?.length ? [...incoming.keywords] : [...base.keywords],
    sections: incoming.sections?.length ? [...incoming.sections] : [...base.sections],
    measurements: incoming.measurements?.length
      ? [...incoming.measurements]
      : [...base.measurements],
    key_fields: { ...base.key_fields, ...incoming.key_fields },
    tables: incoming.tables?.length ? [...incoming.tables] : [...base.tables],
  };
}

/**
 * Narrow a stored structured_data value to a well-formed record
 */
export function isStructuredRecord(value: unknown): value is StructuredRecord {
  return (
    isPlainObject(value) && hasRequiredShape(value) && typeof value.processing_status === 'string'
  );
}
