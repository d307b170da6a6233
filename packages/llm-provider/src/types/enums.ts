/**
 * Core enums for the provider adapter.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** Chat message roles understood by OpenAI-format transports. */
export const Role = {
  SYSTEM: "system",
  USER: "user",
  ASSISTANT: "assistant",
  /** Tool execution results, linked by tool_call_id. */
  TOOL: "tool",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// FinishReason
// ---------------------------------------------------------------------------

/**
 * Finish reasons with special meaning to callers. Transports may report
 * others; those pass through untouched.
 */
export const FinishReason = {
  /** Natural end of turn. Used when the transport reports none. */
  STOP: "stop",
  /** Token limit reached. */
  LENGTH: "length",
  /** The model wants tools executed. */
  TOOL_CALLS: "tool_calls",
  CONTENT_FILTER: "content_filter",
  /** The call failed; `content` carries the error description. */
  ERROR: "error",
} as const satisfies Record<string, string>;

export type FinishReason = (typeof FinishReason)[keyof typeof FinishReason];
