/**
 * Barrel re-export for providers.
 */

export { LLMProvider } from "./base.js";
export type { ChatRequest } from "./base.js";

export { RegistryProvider } from "./registry-provider.js";
export type { RegistryProviderOptions } from "./registry-provider.js";
