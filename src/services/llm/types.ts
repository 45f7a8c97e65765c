/**
 * Text completion contract consumed by the structuring engine
 *
 * @module services/llm/types
 */

export interface CompletionRequest {
  /** System instruction */
  system: string;
  /** User message */
  user: string;
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

/**
 * One chat completion call. Resolves with the raw reply text and rejects with
 * an LLMCallError whose `kind` names the failure.
 */
export interface TextCompletionCollaborator {
  complete(request: CompletionRequest): Promise<string>;
}
