/**
 * StructuringEngine - page text to structured record
 *
 * Sends one page of raw text to the text completion collaborator and turns
 * the reply into a StructuredRecord. Every outcome, including a missing key,
 * an unparseable reply or a failed call, yields a record with all six fields
 * and a processing_status tag. Nothing is thrown to the caller.
 *
 * Also produces the document-level synthesis from page summaries.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/structuring/engine
 */

import type { ProcessingStatus, StructuredRecord } from '../../models/structured.js';
import { ChatCompletionClient, type ChatCompletionClientOptions } from '../llm/client.js';
import type { LLMConfig } from '../llm/config.js';
import { type LLMFailureKind, toLLMCallError } from '../llm/errors.js';
import type { TextCompletionCollaborator } from '../llm/types.js';
import {
  DOCUMENT_SUMMARY_PROMPT,
  PAGE_STRUCTURING_PROMPT,
  buildPageSummaryContext,
  buildStructuringMessage,
  buildSummaryMessage,
} from './prompts.js';
import {
  createDefaultStructure,
  hasRequiredShape,
  isPlainObject,
  mergeStructuredRecord,
  normalizeContent,
} from './record.js';
import { DEFAULT_MAX_CHARS, truncatePageText, truncateSummaryContext } from './truncation.js';

/**
 * Call settings the engine needs from the language model configuration
 */
export type StructuringCallSettings = Pick<
  LLMConfig,
  | 'structureTemperature'
  | 'structureMaxOutputTokens'
  | 'structureTimeoutMs'
  | 'summaryTemperature'
  | 'summaryMaxOutputTokens'
  | 'summaryTimeoutMs'
>;

/**
 * Tag for a failed completion call
 */
export function statusForFailure(kind: LLMFailureKind): ProcessingStatus {
  switch (kind) {
    case 'authentication':
      return 'auth_error';
    case 'rate_limit':
      return 'rate_limit_error';
    case 'service':
      return 'api_error';
    case 'unknown':
      return 'unknown_error';
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

/**
 * Remove markdown code fences the model may add despite instructions
 */
export function stripCodeFences(content: string): string {
  return content.replaceAll('```json', '').replaceAll('```', '').trim();
}

/**
 * Interpret a cleaned model reply
 */
export function parseStructuredReply(content: string): StructuredRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(
      `[StructuringEngine] JSON parse error: ${message}. Reply (truncated): ${content.slice(0, 500)}`
    );
    return createDefaultStructure('json_error');
  }

  if (!isPlainObject(parsed)) {
    console.error('[StructuringEngine] Reply is valid JSON but not an object');
    return createDefaultStructure('json_error');
  }

  const normalized = normalizeContent(parsed);
  const merged = mergeStructuredRecord(createDefaultStructure(), normalized.content);
  const complete = hasRequiredShape(parsed);

  if (complete && normalized.droppedEntries === 0) {
    return { ...merged, processing_status: 'success' };
  }

  if (!complete) {
    console.error(
      `[StructuringEngine] Reply missing required keys, merging with default. Received keys: ${Object.keys(parsed).join(', ')}`
    );
  }
  if (normalized.droppedEntries > 0) {
    console.error(`[StructuringEngine] Dropped ${normalized.droppedEntries} malformed list entries from reply`);
  }
  return { ...merged, processing_status: 'partial_success' };
}

export class StructuringEngine {
  constructor(
    private readonly collaborator: TextCompletionCollaborator | null,
    private readonly settings: StructuringCallSettings
  ) {}

  /** True when a completion collaborator is available */
  isConfigured(): boolean {
    return this.collaborator !== null;
  }

  async structureText(rawText: string, maxChars: number = DEFAULT_MAX_CHARS): Promise<StructuredRecord> {
    if (this.collaborator === null) {
      console.error('[StructuringEngine] Cannot structure text: no API key configured');
      return createDefaultStructure('no_api_key');
    }

    if (rawText.trim().length === 0) {
      console.error('[StructuringEngine] Empty text provided for structuring');
      return createDefaultStructure('empty_text');
    }

    const text = truncatePageText(rawText, maxChars);
    if (text.length !== rawText.length) {
      console.error(
        `[StructuringEngine] Text too long (${rawText.length} chars), truncated to ${maxChars}`
      );
    }

    let reply: string;
    try {
      reply = await this.collaborator.complete({
        system: PAGE_STRUCTURING_PROMPT,
        user: buildStructuringMessage(text),
        temperature: this.settings.structureTemperature,
        maxOutputTokens: this.settings.structureMaxOutputTokens,
        timeoutMs: this.settings.structureTimeoutMs,
      });
    } catch (error) {
      const callError = toLLMCallError(error);
      const status = statusForFailure(callError.kind);
      console.error(`[StructuringEngine] Structuring call failed (${status}): ${callError.message}`);
      return createDefaultStructure(status);
    }

    return parseStructuredReply(stripCodeFences(reply));
  }

  /**
   * Document-level synthesis. Zero summaries give '', one is returned as is,
   * and a failed or empty reply falls back to "Document with N pages. " plus
   * the first summary.
   */
  async summarizeDocument(pageSummaries: readonly string[]): Promise<string> {
    if (pageSummaries.length === 0) return '';
    if (pageSummaries.length === 1) return pageSummaries[0];

    const fallback = `Document with ${pageSummaries.length} pages. ${pageSummaries[0]}`;
    if (this.collaborator === null) return fallback;

    const context = truncateSummaryContext(buildPageSummaryContext(pageSummaries));

    try {
      console.error(
        `[StructuringEngine] Generating document summary from ${pageSummaries.length} pages`
      );
      const reply = await this.collaborator.complete({
        system: DOCUMENT_SUMMARY_PROMPT,
        user: buildSummaryMessage(context),
        temperature: this.settings.summaryTemperature,
        maxOutputTokens: this.settings.summaryMaxOutputTokens,
        timeoutMs: this.settings.summaryTimeoutMs,
      });
      const summary = reply.trim();
      return summary || fallback;
    } catch (error) {
      const callError = toLLMCallError(error);
      console.error(`[StructuringEngine] Document summary failed: ${callError.message}`);
      return fallback;
    }
  }
}

/**
 * Engine backed by a chat completions client, or an unconfigured engine when
 * the configuration carries no API key.
 */
export function createStructuringEngine(
  config: LLMConfig,
  options: ChatCompletionClientOptions = {}
): StructuringEngine {
  const collaborator = config.apiKey ? new ChatCompletionClient(config, options) : null;
  return new StructuringEngine(collaborator, config);
}
