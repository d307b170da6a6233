/**
 * Per-call request resolution: the routed model name and the
 * model-specific parameter overrides.
 */

import type { ProviderRegistry, ProviderSpec } from "@modelgate/provider-registry";
import type { CompletionRequest } from "./types/index.js";

export interface ResolveContext {
  /** Detected gateway; when set, per-model prefix rules are not consulted. */
  gateway?: ProviderSpec;
  registry: ProviderRegistry;
}

/**
 * Apply the gateway or provider routing prefix to a model name.
 *
 * Gateway mode optionally strips any existing `vendor/` segments, then adds
 * the gateway prefix unless already present. Standard mode adds the matched
 * provider's prefix unless the name starts with one of its skip-prefixes or
 * with the prefix itself. Applying it twice gives the same name.
 */
export function resolveModel(model: string, context: ResolveContext): string {
  const { gateway, registry } = context;

  if (gateway) {
    let resolved = model;
    if (gateway.stripModelPrefix) {
      resolved = resolved.split("/").at(-1) ?? resolved;
    }
    const prefix = gateway.modelPrefix;
    if (prefix && !resolved.startsWith(`${prefix}/`)) {
      resolved = `${prefix}/${resolved}`;
    }
    return resolved;
  }

  const spec = registry.findByModel(model);
  if (!spec || !spec.modelPrefix) {
    return model;
  }

  const prefixed = `${spec.modelPrefix}/`;
  const alreadyRouted =
    model.startsWith(prefixed) || spec.skipPrefixes.some((skip) => model.startsWith(skip));
  return alreadyRouted ? model : `${prefixed}${model}`;
}

/**
 * Merge the first matching override rule into a copy of the request.
 *
 * Rules are checked in declared order against the lower-cased model name;
 * only the first rule whose pattern is a substring applies. Its values
 * replace whatever the request already had.
 */
export function applyModelOverrides(
  model: string,
  request: CompletionRequest,
  spec: ProviderSpec | undefined,
): CompletionRequest {
  if (!spec) {
    return request;
  }

  const modelLower = model.toLowerCase();
  const rule = spec.modelOverrides.find(([pattern]) => modelLower.includes(pattern));
  if (!rule) {
    return request;
  }

  const [, overrides] = rule;
  return { ...request, ...overrides };
}
