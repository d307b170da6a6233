/**
 * Descriptor types for the provider registry.
 */

// ---------------------------------------------------------------------------
// ModelOverride
// ---------------------------------------------------------------------------

/**
 * A `[pattern, overrides]` pair. When `pattern` occurs in the lower-cased
 * model name, `overrides` is merged into the completion request.
 */
export type ModelOverride = readonly [
  pattern: string,
  overrides: Readonly<Record<string, unknown>>,
];

/**
 * An `[envName, template]` pair. Templates may reference `{api_key}` and
 * `{api_base}`.
 */
export type EnvExtra = readonly [envName: string, template: string];

// ---------------------------------------------------------------------------
// ProviderSpec
// ---------------------------------------------------------------------------

/** Naming and credential conventions for one provider or gateway. */
export interface ProviderSpec {
  /** Registry key, also accepted as the configured provider name. */
  readonly name: string;
  /** Lower-case substrings that identify this provider's models. */
  readonly keywords: readonly string[];
  /** Environment variable the transport reads the credential from. */
  readonly envKey: string;
  /** Human-readable label. */
  readonly displayName: string;
  /** Routing prefix the transport expects, e.g. `deepseek` in `deepseek/deepseek-chat`. Empty for none. */
  readonly modelPrefix: string;
  /** Model prefixes that mean the name is already routed. */
  readonly skipPrefixes: readonly string[];
  readonly envExtras: readonly EnvExtra[];
  /** Aggregating endpoint that routes any model (OpenRouter, AiHubMix). */
  readonly isGateway: boolean;
  /** Self-hosted endpoint (vLLM, Open WebUI). */
  readonly isLocal: boolean;
  /** Credential prefix that identifies this gateway, e.g. `sk-or-`. */
  readonly detectByKeyPrefix?: string;
  /** Substring of the base URL that identifies this gateway. */
  readonly detectByBaseKeyword?: string;
  readonly defaultApiBase?: string;
  /** Drop any `vendor/` segment before applying `modelPrefix`. */
  readonly stripModelPrefix: boolean;
  /** Checked in order; only the first match applies. */
  readonly modelOverrides: readonly ModelOverride[];
  /** The endpoint answers with incremental chunks whatever `stream` says. */
  readonly forceStream: boolean;
}

// ---------------------------------------------------------------------------
// ProviderRegistry
// ---------------------------------------------------------------------------

/** Read-only lookups over an ordered descriptor table. */
export interface ProviderRegistry {
  /** Match a standard (non-gateway, non-local) provider by model keyword. */
  findByModel(model: string): ProviderSpec | undefined;
  /**
   * Detect a gateway or local deployment. The configured provider name wins;
   * the credential prefix and base URL keyword are fallbacks.
   */
  findGateway(
    providerName?: string,
    apiKey?: string,
    apiBase?: string,
  ): ProviderSpec | undefined;
  findByName(name: string): ProviderSpec | undefined;
  listProviders(): ProviderSpec[];
}
