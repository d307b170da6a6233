/**
 * Normalization rules shared by the response parser and the stream
 * reassembler, so both produce identical results for the same logical reply.
 */

import type { TokenUsage, TransportUsage } from "../types/index.js";

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/g;

/**
 * Remove `<think>…</think>` blocks (tags are case-sensitive) and trim the
 * remainder. Returns null when nothing is left.
 */
export function stripThinking(text: string | null | undefined): string | null {
  if (!text) {
    return null;
  }
  return text.replace(THINK_BLOCK, "").trim() || null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode tool-call arguments.
 *
 * Objects pass through. Text must decode to a JSON object; anything else is
 * kept verbatim as `{ raw: text }`. Missing or empty text means no arguments.
 */
export function parseToolArguments(
  args: string | Record<string, unknown> | null | undefined,
): Record<string, unknown> {
  if (args === null || args === undefined) {
    return {};
  }
  if (typeof args !== "string") {
    return args;
  }
  if (args.trim() === "") {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(args);
  } catch {
    return { raw: args };
  }
  return isRecord(parsed) ? parsed : { raw: args };
}

/** Copy usage counters, reading missing ones as 0. Absent usage maps to `{}`. */
export function normalizeUsage(usage: TransportUsage | null | undefined): TokenUsage {
  if (!usage) {
    return {};
  }
  return {
    prompt_tokens: usage.prompt_tokens ?? 0,
    completion_tokens: usage.completion_tokens ?? 0,
    total_tokens: usage.total_tokens ?? 0,
  };
}
