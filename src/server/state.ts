/**
 * MCP Server State Management
 *
 * Holds the open database and the pipeline services built around it.
 * FAIL FAST: All state access throws immediately if preconditions not met.
 *
 * @module server/state
 */

import { DocumentIngestor } from '../services/ingestion/ingest.js';
import { OcrMyPdfPreprocessor, type OcrPreprocessor, type PageOcr } from '../services/ingestion/ocr.js';
import { PdfStore } from '../services/ingestion/pdf-store.js';
import { PdfJsTextExtractor, type PageTextExtractor } from '../services/ingestion/pdf-text.js';
import type { ChatCompletionClientOptions } from '../services/llm/client.js';
import { type LLMConfig, loadLLMConfig } from '../services/llm/config.js';
import type { TextCompletionCollaborator } from '../services/llm/types.js';
import {
  DatabaseService,
  DatabaseStructuringStorage,
  getDefaultDatabasePath,
} from '../services/storage/database/index.js';
import { StructuringEngine, createStructuringEngine } from '../services/structuring/engine.js';
import {
  DocumentProcessingScheduler,
  PipelineOrchestrator,
} from '../services/structuring/pipeline.js';
import { databaseNotOpenError } from './errors.js';
import type { PipelineServices, ServerConfig, ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

function defaultConfig(): ServerConfig {
  return {
    dbPath: getDefaultDatabasePath(),
    ocrEnabled: true,
    ocrmypdfPath: 'ocrmypdf',
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export const state: ServerState = {
  config: defaultConfig(),
  llmConfig: null,
  services: null,
};

/**
 * Collaborators replacing the defaults built from configuration
 */
export interface InitializeStateOptions {
  config?: Partial<ServerConfig>;
  llmConfig?: LLMConfig;
  /** Replaces the chat completions client; null runs without a key */
  collaborator?: TextCompletionCollaborator | null;
  clientOptions?: ChatCompletionClientOptions;
  extractor?: PageTextExtractor;
  preprocessor?: OcrPreprocessor | null;
  pageOcr?: PageOcr | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Open the database and build the pipeline services. Any previously open
 * database is closed first.
 */
export function initializeState(options: InitializeStateOptions = {}): PipelineServices {
  resetState();

  const config: ServerConfig = { ...defaultConfig(), ...options.config };
  const llmConfig = options.llmConfig ?? loadLLMConfig();

  const db = DatabaseService.open(config.dbPath);

  const engine =
    options.collaborator !== undefined
      ? new StructuringEngine(options.collaborator, llmConfig)
      : createStructuringEngine(llmConfig, options.clientOptions);
  const orchestrator = new PipelineOrchestrator(engine, new DatabaseStructuringStorage(db));
  const scheduler = new DocumentProcessingScheduler(orchestrator);

  const preprocessor =
    options.preprocessor !== undefined
      ? options.preprocessor
      : config.ocrEnabled
        ? new OcrMyPdfPreprocessor({ command: config.ocrmypdfPath })
        : null;
  const pdfStore = PdfStore.besideDatabase(config.dbPath);
  const ingestor = new DocumentIngestor({
    extractor: options.extractor ?? new PdfJsTextExtractor(),
    sink: db,
    pdfStore,
    preprocessor,
    pageOcr: options.pageOcr,
  });

  const services: PipelineServices = { db, engine, orchestrator, scheduler, ingestor, pdfStore };
  state.config = config;
  state.llmConfig = llmConfig;
  state.services = services;

  console.error(
    `[State] Database opened at ${db.getPath()} (structuring ${engine.isConfigured() ? 'enabled' : 'disabled: no API key'})`
  );
  return services;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Require the pipeline services - FAIL FAST if the database is not open
 *
 * @throws MCPError with DATABASE_NOT_OPEN
 */
export function requireServices(): PipelineServices {
  if (!state.services) {
    throw databaseNotOpenError();
  }
  return state.services;
}

/**
 * Require the open database - FAIL FAST if not open
 */
export function requireDatabase(): DatabaseService {
  return requireServices().db;
}

export function getConfig(): ServerConfig {
  return { ...state.config };
}

/**
 * Close the database and drop all services. Background runs still in flight
 * keep their own references.
 */
export function resetState(): void {
  if (state.services) {
    const running = state.services.scheduler.runningDocuments();
    if (running.length > 0) {
      console.error(`[State] Closing database with ${running.length} document(s) still processing`);
    }
    state.services.db.close();
  }
  state.services = null;
  state.llmConfig = null;
  state.config = defaultConfig();
}
