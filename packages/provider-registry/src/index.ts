/**
 * Barrel re-export for the provider registry.
 */

export type {
  ProviderSpec,
  ProviderRegistry,
  ModelOverride,
  EnvExtra,
} from "./types.js";

export {
  ProviderSpecSchema,
  RegistryValidationError,
  defineProvider,
} from "./schema.js";
export type { ProviderSpecInput } from "./schema.js";

export {
  createRegistry,
  defaultRegistry,
  findByModel,
  findGateway,
  findByName,
  listProviders,
} from "./registry.js";
