/**
 * Reassemble a chat-completions chunk stream into a single LLMResponse.
 *
 * Chunks look like:
 * - {"choices":[{"delta":{"content":"text"}, "finish_reason": null}]}
 * - {"choices":[{"delta":{"tool_calls":[{"index":0,"id":"...","function":{...}}]}}]}
 * - {"choices":[], "usage":{...}}
 */

import {
  AbortError,
  FinishReason,
  StreamStateError,
  type LLMResponse,
  type TokenUsage,
  type ToolCallRequest,
  type TransportChunk,
  type TransportToolCallDelta,
} from "../types/index.js";
import { normalizeUsage, parseToolArguments, stripThinking } from "./shared.js";

// ---------------------------------------------------------------------------
// Streaming state
// ---------------------------------------------------------------------------

/**
 * A tool call still receiving fragments. Each index moves
 * absent → pending → finalized, driven only by chunk arrival.
 */
interface PendingToolCall {
  index: number;
  id: string;
  name: string;
  argChunks: string[];
}

/**
 * Collects chunks into a complete response.
 *
 * Usage:
 * ```ts
 * const reassembler = new StreamReassembler();
 * for await (const chunk of chunks) {
 *   reassembler.push(chunk);
 * }
 * const response = reassembler.finish();
 * ```
 */
export class StreamReassembler {
  private readonly contentChunks: string[] = [];
  private readonly reasoningChunks: string[] = [];
  private readonly pending = new Map<number, PendingToolCall>();
  private finishReason: string | undefined;
  private usage: TokenUsage = {};
  private finalized = false;

  /** Fold one chunk into the accumulated state. */
  push(chunk: TransportChunk): void {
    if (this.finalized) {
      throw new StreamStateError("Cannot push a chunk after the stream was finalized");
    }

    // Usage normally arrives once, on the final chunk.
    if (chunk.usage) {
      this.usage = normalizeUsage(chunk.usage);
    }

    const choice = chunk.choices?.[0];
    if (!choice) return;

    const delta = choice.delta;
    if (delta) {
      if (delta.content) {
        this.contentChunks.push(delta.content);
      }
      if (delta.reasoning_content) {
        this.reasoningChunks.push(delta.reasoning_content);
      }
      for (const fragment of delta.tool_calls ?? []) {
        this.mergeToolCall(fragment);
      }
    }

    if (choice.finish_reason) {
      this.finishReason = choice.finish_reason;
    }
  }

  private mergeToolCall(fragment: TransportToolCallDelta): void {
    const index = fragment.index ?? 0;

    let entry = this.pending.get(index);
    if (!entry) {
      entry = { index, id: "", name: "", argChunks: [] };
      this.pending.set(index, entry);
    }

    if (fragment.id) {
      entry.id = fragment.id;
    }
    if (fragment.function?.name) {
      entry.name = fragment.function.name;
    }
    if (fragment.function?.arguments) {
      entry.argChunks.push(fragment.function.arguments);
    }
  }

  /**
   * Finalize every pending tool call and build the response. The
   * reassembler accepts no chunks afterwards.
   */
  finish(): LLMResponse {
    if (this.finalized) {
      throw new StreamStateError("Stream was already finalized");
    }
    this.finalized = true;

    const toolCalls: ToolCallRequest[] = [...this.pending.values()]
      .sort((a, b) => a.index - b.index)
      .map((entry) => ({
        id: entry.id,
        name: entry.name,
        arguments: parseToolArguments(entry.argChunks.join("")),
      }));
    this.pending.clear();

    const reasoning = this.reasoningChunks.join("");

    return {
      content: stripThinking(this.contentChunks.join("")),
      tool_calls: toolCalls,
      finish_reason: this.finishReason ?? FinishReason.STOP,
      usage: this.usage,
      reasoning_content: reasoning || null,
    };
  }

  /** Number of tool calls seen so far. */
  get pendingToolCalls(): number {
    return this.pending.size;
  }

  /** Content accumulated so far, before thinking blocks are stripped. */
  get text(): string {
    return this.contentChunks.join("");
  }
}

// ---------------------------------------------------------------------------
// reassembleStream
// ---------------------------------------------------------------------------

/**
 * Consume a chunk sequence to completion and return the reassembled
 * response.
 *
 * Rejects with `AbortError` if `signal` fires mid-stream; partial state is
 * dropped and the iterator is closed.
 */
export async function reassembleStream(
  chunks: AsyncIterable<TransportChunk>,
  signal?: AbortSignal,
): Promise<LLMResponse> {
  const reassembler = new StreamReassembler();

  for await (const chunk of chunks) {
    if (signal?.aborted) {
      throw new AbortError("Stream cancelled", { cause: signal.reason });
    }
    reassembler.push(chunk);
  }

  return reassembler.finish();
}
