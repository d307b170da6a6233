/**
 * Message and tool definition shapes passed through to the transport.
 *
 * These follow the OpenAI chat-completions wire format, which the
 * multiplexing transport translates for every provider.
 */

import type { Role } from "./enums.js";

// ---------------------------------------------------------------------------
// ChatMessage
// ---------------------------------------------------------------------------

/** A tool call as echoed back in an assistant message. */
export interface ChatToolCall {
  readonly id: string;
  readonly type: "function";
  readonly function: {
    readonly name: string;
    /** JSON-encoded arguments. */
    readonly arguments: string;
  };
}

/** One conversation turn. */
export interface ChatMessage {
  readonly role: Role;
  /** Plain text, or provider content parts (images, documents). */
  readonly content?: string | readonly Record<string, unknown>[] | null;
  readonly name?: string;
  readonly tool_calls?: readonly ChatToolCall[];
  /** Set on `tool` messages. */
  readonly tool_call_id?: string;
  readonly reasoning_content?: string | null;
}

// ---------------------------------------------------------------------------
// ToolDefinition
// ---------------------------------------------------------------------------

/** A function tool offered to the model. */
export interface ToolDefinition {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description?: string;
    /** JSON Schema for the arguments (root must be "object"). */
    readonly parameters?: Record<string, unknown>;
  };
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function createSystemMessage(text: string): ChatMessage {
  return { role: "system", content: text };
}

export function createUserMessage(text: string): ChatMessage {
  return { role: "user", content: text };
}

/** Result of executing a tool call, linked back by its id. */
export function createToolResultMessage(
  toolCallId: string,
  name: string,
  content: string,
): ChatMessage {
  return { role: "tool", tool_call_id: toolCallId, name, content };
}
