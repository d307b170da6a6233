/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role, FinishReason } from "./enums.js";

// Message types
export type { ChatMessage, ChatToolCall, ToolDefinition } from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createToolResultMessage,
} from "./message.js";

// Transport boundary
export type {
  CompletionRequest,
  CompletionTransport,
  TransportCallOptions,
  TransportResponse,
  TransportChoice,
  TransportMessage,
  TransportToolCall,
  TransportUsage,
  TransportChunk,
  TransportChunkChoice,
  TransportDelta,
  TransportToolCallDelta,
} from "./transport.js";
export { isChunkStream } from "./transport.js";

// Result types
export type { LLMResponse, ToolCallRequest, TokenUsage } from "./result.js";
export { hasToolCalls, createErrorResponse } from "./result.js";

// Error types
export {
  LLMProviderError,
  ConfigurationError,
  MalformedResponseError,
  StreamStateError,
  AbortError,
  describeError,
} from "./errors.js";
