/**
 * Translate a complete transport response into the unified LLMResponse.
 */

import {
  FinishReason,
  MalformedResponseError,
  type LLMResponse,
  type ToolCallRequest,
  type TransportResponse,
} from "../types/index.js";
import { normalizeUsage, parseToolArguments, stripThinking } from "./shared.js";

/**
 * Parse the first choice of a non-streaming response.
 *
 * Throws `MalformedResponseError` when the response carries no choice.
 */
export function parseResponse(response: TransportResponse): LLMResponse {
  const choice = response.choices?.[0];
  if (!choice) {
    throw new MalformedResponseError("Transport response contained no choices");
  }
  const message = choice.message ?? {};

  const toolCalls: ToolCallRequest[] = (message.tool_calls ?? []).map((tc) => ({
    id: tc.id ?? "",
    name: tc.function?.name ?? "",
    arguments: parseToolArguments(tc.function?.arguments),
  }));

  return {
    content: stripThinking(message.content),
    tool_calls: toolCalls,
    finish_reason: choice.finish_reason || FinishReason.STOP,
    usage: normalizeUsage(response.usage),
    reasoning_content: message.reasoning_content || null,
  };
}
