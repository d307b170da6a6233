/**
 * LLMProvider — the contract every chat provider implements.
 */

import type { ChatMessage, LLMResponse, ToolDefinition } from "../types/index.js";

/** Arguments for one `chat()` call. */
export interface ChatRequest {
  readonly messages: readonly ChatMessage[];
  /** Tools offered to the model; the model chooses freely among them. */
  readonly tools?: readonly ToolDefinition[];
  /** Defaults to the provider's default model. */
  readonly model?: string;
  /** Default 4096. */
  readonly max_tokens?: number;
  /** Default 0.7. */
  readonly temperature?: number;
  /** Cancels the call; the promise then rejects with `AbortError`. */
  readonly signal?: AbortSignal;
}

/**
 * Base class for chat providers.
 *
 * `chat()` resolves even when the provider fails: failures come back as a
 * response whose `finish_reason` is `"error"`.
 */
export abstract class LLMProvider {
  protected readonly apiKey: string | undefined;
  protected readonly apiBase: string | undefined;

  protected constructor(apiKey?: string, apiBase?: string) {
    this.apiKey = apiKey;
    this.apiBase = apiBase;
  }

  abstract chat(request: ChatRequest): Promise<LLMResponse>;

  abstract getDefaultModel(): string;
}
