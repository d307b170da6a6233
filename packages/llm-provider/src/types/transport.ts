/**
 * The boundary with the multiplexing completion transport.
 *
 * Response and chunk shapes follow OpenAI chat completions:
 * - { choices: [{ message: {...}, finish_reason }], usage }
 * - { choices: [{ delta: {...}, finish_reason }], usage? }  (one per chunk)
 * Optional fields may be absent or null on any provider.
 */

import type { ChatMessage, ToolDefinition } from "./message.js";

// ---------------------------------------------------------------------------
// CompletionRequest
// ---------------------------------------------------------------------------

/** Arguments for one transport call. Built fresh per `chat()` call. */
export interface CompletionRequest {
  /** Resolved, routing-prefixed model identifier. */
  model: string;
  messages: readonly ChatMessage[];
  max_tokens: number;
  temperature: number;
  stream: boolean;
  tools?: readonly ToolDefinition[];
  tool_choice?: "auto";
  api_key?: string;
  api_base?: string;
  extra_headers?: Record<string, string>;
  /** Provider-specific parameters merged in by model overrides. */
  [param: string]: unknown;
}

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

export interface TransportUsage {
  prompt_tokens?: number | null;
  completion_tokens?: number | null;
  total_tokens?: number | null;
}

export interface TransportToolCall {
  id?: string | null;
  type?: string;
  function: {
    name?: string | null;
    /** JSON text, though some providers hand back an object. */
    arguments?: string | Record<string, unknown> | null;
  };
}

export interface TransportMessage {
  role?: string;
  content?: string | null;
  tool_calls?: TransportToolCall[] | null;
  /** Chain-of-thought text exposed by reasoning models. */
  reasoning_content?: string | null;
}

export interface TransportChoice {
  index?: number;
  message: TransportMessage;
  finish_reason?: string | null;
}

/** A complete (non-streaming) completion. */
export interface TransportResponse {
  id?: string;
  model?: string;
  choices: TransportChoice[];
  usage?: TransportUsage | null;
}

// ---------------------------------------------------------------------------
// Chunk shapes
// ---------------------------------------------------------------------------

export interface TransportToolCallDelta {
  /** Position of the tool call this fragment belongs to. */
  index?: number;
  id?: string | null;
  type?: string;
  function?: {
    name?: string | null;
    /** A fragment of the JSON argument text. */
    arguments?: string | null;
  } | null;
}

export interface TransportDelta {
  role?: string;
  content?: string | null;
  reasoning_content?: string | null;
  tool_calls?: TransportToolCallDelta[] | null;
}

export interface TransportChunkChoice {
  index?: number;
  delta?: TransportDelta | null;
  finish_reason?: string | null;
}

/** One incremental chunk of a streamed completion. */
export interface TransportChunk {
  id?: string;
  model?: string;
  /** Empty on usage-only trailing chunks. */
  choices: TransportChunkChoice[];
  usage?: TransportUsage | null;
}

// ---------------------------------------------------------------------------
// CompletionTransport
// ---------------------------------------------------------------------------

export interface TransportCallOptions {
  signal?: AbortSignal;
}

/**
 * The multiplexing completion call. Resolves to a single response, or to an
 * ordered, single-pass sequence of chunks when the request streams (or the
 * provider always streams).
 */
export type CompletionTransport = (
  request: CompletionRequest,
  options: TransportCallOptions,
) => Promise<TransportResponse | AsyncIterable<TransportChunk>>;

/** Whether a transport result is a chunk sequence rather than a response. */
export function isChunkStream(
  value: TransportResponse | AsyncIterable<TransportChunk>,
): value is AsyncIterable<TransportChunk> {
  return Symbol.asyncIterator in value;
}
