/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { DocumentIngestor } from '../services/ingestion/ingest.js';
import type { PdfStore } from '../services/ingestion/pdf-store.js';
import type { LLMConfig } from '../services/llm/config.js';
import type { DatabaseService } from '../services/storage/database/index.js';
import type { StructuringEngine } from '../services/structuring/engine.js';
import type {
  DocumentProcessingScheduler,
  PipelineOrchestrator,
} from '../services/structuring/pipeline.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerConfig {
  /** SQLite database file */
  dbPath: string;

  /** Run ocrmypdf on scanned PDFs during ingestion */
  ocrEnabled: boolean;

  /** ocrmypdf executable */
  ocrmypdfPath: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Services wired around the open database
 */
export interface PipelineServices {
  db: DatabaseService;
  engine: StructuringEngine;
  orchestrator: PipelineOrchestrator;
  scheduler: DocumentProcessingScheduler;
  ingestor: DocumentIngestor;
  pdfStore: PdfStore;
}

export interface ServerState {
  config: ServerConfig;
  llmConfig: LLMConfig | null;
  services: PipelineServices | null;
}
