/**
 * Publish credentials for the transport through environment variables.
 *
 * The transport reads provider credentials from well-known variables
 * (`ANTHROPIC_API_KEY`, `OPENROUTER_API_KEY`, ...). Writes go through an
 * `EnvStore` so callers and tests can supply their own store instead of
 * mutating `process.env`.
 */

import type { ProviderSpec } from "@modelgate/provider-registry";

// ---------------------------------------------------------------------------
// EnvStore
// ---------------------------------------------------------------------------

/** A process-wide key-value store of environment variables. */
export interface EnvStore {
  get(name: string): string | undefined;
  set(name: string, value: string): void;
}

/** Reads and writes `process.env`. */
export class ProcessEnvStore implements EnvStore {
  get(name: string): string | undefined {
    return process.env[name];
  }

  set(name: string, value: string): void {
    process.env[name] = value;
  }
}

/** Keeps variables in memory. */
export class MemoryEnvStore implements EnvStore {
  private readonly values: Map<string, string>;

  constructor(initial?: Record<string, string>) {
    this.values = new Map(Object.entries(initial ?? {}));
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  set(name: string, value: string): void {
    this.values.set(name, value);
  }

  /** A plain-object copy of the current variables. */
  snapshot(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

// ---------------------------------------------------------------------------
// configureEnvironment
// ---------------------------------------------------------------------------

export interface EnvironmentOptions {
  /** Effective descriptor: the gateway, else the default model's provider. */
  spec: ProviderSpec | undefined;
  /** Gateway mode overwrites the credential variable. */
  isGateway: boolean;
  apiKey: string;
  /** Explicit base URL; falls back to `spec.defaultApiBase` in templates. */
  apiBase?: string;
  env: EnvStore;
}

/**
 * Set the descriptor's credential variable and extra variables.
 *
 * The credential is force-set in gateway mode and set only when unset
 * otherwise. Extra variables are always set-if-absent; `{api_key}` and
 * `{api_base}` are substituted in their templates, and a template needing a
 * base URL when none is known is skipped.
 *
 * Returns the names of the variables written.
 */
export function configureEnvironment(options: EnvironmentOptions): string[] {
  const { spec, isGateway, apiKey, apiBase, env } = options;
  if (!spec) {
    return [];
  }

  const written: string[] = [];

  if (isGateway || env.get(spec.envKey) === undefined) {
    env.set(spec.envKey, apiKey);
    written.push(spec.envKey);
  }

  const effectiveBase = apiBase ?? spec.defaultApiBase;
  for (const [envName, template] of spec.envExtras) {
    if (env.get(envName) !== undefined) continue;
    if (template.includes("{api_base}") && effectiveBase === undefined) continue;

    const resolved = template
      .replaceAll("{api_key}", apiKey)
      .replaceAll("{api_base}", effectiveBase ?? "");
    env.set(envName, resolved);
    written.push(envName);
  }

  return written;
}
