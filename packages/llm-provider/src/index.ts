export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export providers
export * from "./providers/index.js";

// Request resolution
export { resolveModel, applyModelOverrides } from "./resolve.js";
export type { ResolveContext } from "./resolve.js";

// Environment publication
export {
  configureEnvironment,
  ProcessEnvStore,
  MemoryEnvStore,
} from "./environment.js";
export type { EnvStore, EnvironmentOptions } from "./environment.js";

// Response normalization
export { parseResponse } from "./normalize/response.js";
export { StreamReassembler, reassembleStream } from "./normalize/stream.js";
export { stripThinking, parseToolArguments, normalizeUsage } from "./normalize/shared.js";

// Configuration and logging
export {
  DEFAULT_MODEL,
  LoggerConfigSchema,
  ProviderSettingsSchema,
  loadLoggerConfig,
  parseProviderSettings,
} from "./config.js";
export type {
  LoggerConfig,
  ProviderSettings,
  ProviderSettingsInput,
} from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
