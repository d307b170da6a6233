/**
 * Error hierarchy for the provider adapter.
 *
 * `RegistryProvider.chat` never rejects with these except `AbortError`; the
 * rest are thrown by construction-time validation or caught and encoded in
 * an error result.
 */

// ---------------------------------------------------------------------------
// LLMProviderError — base for all adapter errors
// ---------------------------------------------------------------------------

/** Base error for all provider adapter errors. */
export class LLMProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "LLMProviderError";
  }
}

// ---------------------------------------------------------------------------
// Subclasses
// ---------------------------------------------------------------------------

/** Invalid provider settings. Thrown from the constructor. */
export class ConfigurationError extends LLMProviderError {
  /** One entry per failed setting, formatted as `path: message`. */
  readonly issues: readonly string[];

  constructor(message: string, options?: { cause?: unknown; issues?: readonly string[] }) {
    super(message, { cause: options?.cause });
    this.name = "ConfigurationError";
    this.issues = options?.issues ?? [];
  }
}

/** The transport returned something that is not a usable completion. */
export class MalformedResponseError extends LLMProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedResponseError";
  }
}

/** A chunk was pushed into a reassembler that has already finished. */
export class StreamStateError extends LLMProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StreamStateError";
  }
}

/** The caller cancelled the operation. */
export class AbortError extends LLMProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AbortError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Human-readable text for any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
