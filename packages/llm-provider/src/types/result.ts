/**
 * The unified result returned by every `chat()` call.
 */

import { FinishReason } from "./enums.js";

// ---------------------------------------------------------------------------
// ToolCallRequest
// ---------------------------------------------------------------------------

/** A model-initiated tool invocation. */
export interface ToolCallRequest {
  readonly id: string;
  readonly name: string;
  /** Parsed arguments; `{ raw }` when the model sent text that is not a JSON object. */
  readonly arguments: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// TokenUsage
// ---------------------------------------------------------------------------

/** Token counters. Empty when the transport reported no usage. */
export interface TokenUsage {
  readonly prompt_tokens?: number;
  readonly completion_tokens?: number;
  readonly total_tokens?: number;
}

// ---------------------------------------------------------------------------
// LLMResponse
// ---------------------------------------------------------------------------

export interface LLMResponse {
  /** Text with `<think>` blocks removed; null when nothing remains. */
  readonly content: string | null;
  readonly tool_calls: readonly ToolCallRequest[];
  /** `"stop"` when the transport reported none, `"error"` on failure. */
  readonly finish_reason: FinishReason | (string & {});
  readonly usage: TokenUsage;
  /** Reasoning text exactly as the transport exposed it. */
  readonly reasoning_content: string | null;
}

export function hasToolCalls(response: LLMResponse): boolean {
  return response.tool_calls.length > 0;
}

/** Build the result for a failed call. */
export function createErrorResponse(description: string): LLMResponse {
  return {
    content: `Error calling LLM: ${description}`,
    tool_calls: [],
    finish_reason: FinishReason.ERROR,
    usage: {},
    reasoning_content: null,
  };
}
