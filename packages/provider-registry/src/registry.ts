/**
 * Provider registry — the descriptor table and its lookups.
 *
 * Order matters: gateways are listed first so credential and base URL
 * detection prefers them, and `findByModel` returns the first standard
 * provider whose keyword matches.
 */

import type { ProviderRegistry, ProviderSpec } from "./types.js";
import {
  defineProvider,
  RegistryValidationError,
  type ProviderSpecInput,
} from "./schema.js";

// ---------------------------------------------------------------------------
// Built-in descriptors
// ---------------------------------------------------------------------------

const BUILTIN_PROVIDERS: ProviderSpecInput[] = [
  // -- Gateways --
  {
    // Any OpenAI-compatible endpoint named explicitly in configuration.
    name: "custom",
    envKey: "OPENAI_API_KEY",
    displayName: "Custom",
    modelPrefix: "openai",
    isGateway: true,
    stripModelPrefix: true,
  },
  {
    name: "openrouter",
    keywords: ["openrouter"],
    envKey: "OPENROUTER_API_KEY",
    displayName: "OpenRouter",
    modelPrefix: "openrouter",
    isGateway: true,
    detectByKeyPrefix: "sk-or-",
    detectByBaseKeyword: "openrouter",
    defaultApiBase: "https://openrouter.ai/api/v1",
  },
  {
    // Routes through its OpenAI-compatible surface with bare model names.
    name: "aihubmix",
    keywords: ["aihubmix"],
    envKey: "OPENAI_API_KEY",
    displayName: "AiHubMix",
    modelPrefix: "openai",
    isGateway: true,
    detectByBaseKeyword: "aihubmix",
    defaultApiBase: "https://aihubmix.com/v1",
    stripModelPrefix: true,
  },

  // -- Local deployments --
  {
    // Open WebUI proxies answer with SSE even for non-streaming requests.
    name: "open_webui",
    keywords: ["open_webui", "openwebui"],
    envKey: "OPENAI_API_KEY",
    displayName: "Open WebUI",
    modelPrefix: "openai",
    isLocal: true,
    detectByBaseKeyword: "openwebui",
    forceStream: true,
  },
  {
    name: "vllm",
    keywords: ["vllm"],
    envKey: "HOSTED_VLLM_API_KEY",
    displayName: "vLLM",
    modelPrefix: "hosted_vllm",
    isLocal: true,
  },

  // -- Standard providers --
  {
    name: "anthropic",
    keywords: ["anthropic", "claude"],
    envKey: "ANTHROPIC_API_KEY",
    displayName: "Anthropic",
  },
  {
    name: "openai",
    keywords: ["openai", "gpt"],
    envKey: "OPENAI_API_KEY",
    displayName: "OpenAI",
  },
  {
    name: "deepseek",
    keywords: ["deepseek"],
    envKey: "DEEPSEEK_API_KEY",
    displayName: "DeepSeek",
    modelPrefix: "deepseek",
    skipPrefixes: ["deepseek/"],
  },
  {
    name: "gemini",
    keywords: ["gemini"],
    envKey: "GEMINI_API_KEY",
    displayName: "Gemini",
    modelPrefix: "gemini",
    skipPrefixes: ["gemini/"],
  },
  {
    name: "zhipu",
    keywords: ["zhipu", "glm", "zai"],
    envKey: "ZAI_API_KEY",
    displayName: "Zhipu AI",
    modelPrefix: "zai",
    skipPrefixes: ["zhipu/", "zai/", "openrouter/", "hosted_vllm/"],
    envExtras: [["ZHIPUAI_API_KEY", "{api_key}"]],
  },
  {
    name: "dashscope",
    keywords: ["qwen", "dashscope"],
    envKey: "DASHSCOPE_API_KEY",
    displayName: "DashScope",
    modelPrefix: "dashscope",
    skipPrefixes: ["dashscope/", "openrouter/"],
  },
  {
    name: "moonshot",
    keywords: ["moonshot", "kimi"],
    envKey: "MOONSHOT_API_KEY",
    displayName: "Moonshot",
    modelPrefix: "moonshot",
    skipPrefixes: ["moonshot/", "openrouter/"],
    envExtras: [["MOONSHOT_API_BASE", "{api_base}"]],
    defaultApiBase: "https://api.moonshot.ai/v1",
    // kimi-k2.5 rejects any temperature other than 1.0
    modelOverrides: [["kimi-k2.5", { temperature: 1.0 }]],
  },
  {
    name: "minimax",
    keywords: ["minimax"],
    envKey: "MINIMAX_API_KEY",
    displayName: "MiniMax",
    modelPrefix: "minimax",
    skipPrefixes: ["minimax/", "openrouter/"],
    defaultApiBase: "https://api.minimax.io/v1",
  },
  {
    name: "groq",
    keywords: ["groq"],
    envKey: "GROQ_API_KEY",
    displayName: "Groq",
    modelPrefix: "groq",
    skipPrefixes: ["groq/"],
  },
];

// ---------------------------------------------------------------------------
// Registry construction
// ---------------------------------------------------------------------------

/**
 * Build a registry over an ordered descriptor table.
 *
 * Every entry is validated and frozen. Throws `RegistryValidationError` on
 * an invalid entry or a duplicate name.
 */
export function createRegistry(
  inputs: readonly (ProviderSpecInput | ProviderSpec)[],
): ProviderRegistry {
  const specs: ProviderSpec[] = [];
  const byName = new Map<string, ProviderSpec>();

  for (const input of inputs) {
    const spec = defineProvider(input);
    if (byName.has(spec.name)) {
      throw new RegistryValidationError(
        `Duplicate provider descriptor "${spec.name}"`,
        spec.name,
      );
    }
    byName.set(spec.name, spec);
    specs.push(spec);
  }

  const table: readonly ProviderSpec[] = Object.freeze(specs);

  return {
    findByModel(model: string): ProviderSpec | undefined {
      const modelLower = model.toLowerCase();
      return table.find(
        (spec) =>
          !spec.isGateway &&
          !spec.isLocal &&
          spec.keywords.some((kw) => modelLower.includes(kw)),
      );
    },

    findGateway(
      providerName?: string,
      apiKey?: string,
      apiBase?: string,
    ): ProviderSpec | undefined {
      if (providerName) {
        const named = byName.get(providerName);
        if (named && (named.isGateway || named.isLocal)) {
          return named;
        }
      }

      return table.find(
        (spec) =>
          (spec.detectByKeyPrefix !== undefined &&
            apiKey !== undefined &&
            apiKey.startsWith(spec.detectByKeyPrefix)) ||
          (spec.detectByBaseKeyword !== undefined &&
            apiBase !== undefined &&
            apiBase.includes(spec.detectByBaseKeyword)),
      );
    },

    findByName(name: string): ProviderSpec | undefined {
      return byName.get(name);
    },

    listProviders(): ProviderSpec[] {
      return [...table];
    },
  };
}

// ---------------------------------------------------------------------------
// Public API (built-in table)
// ---------------------------------------------------------------------------

/** Registry over the built-in descriptor table. */
export const defaultRegistry: ProviderRegistry = createRegistry(BUILTIN_PROVIDERS);

/**
 * Match a standard provider by model name.
 *
 * Returns `undefined` for unknown models; gateways and local deployments are
 * never matched by model name.
 */
export function findByModel(model: string): ProviderSpec | undefined {
  return defaultRegistry.findByModel(model);
}

/** Detect a gateway or local deployment from configuration. */
export function findGateway(
  providerName?: string,
  apiKey?: string,
  apiBase?: string,
): ProviderSpec | undefined {
  return defaultRegistry.findGateway(providerName, apiKey, apiBase);
}

export function findByName(name: string): ProviderSpec | undefined {
  return defaultRegistry.findByName(name);
}

/**
 * List built-in descriptors, optionally only gateways and local deployments
 * (`"gateway"`) or only standard providers (`"standard"`).
 */
export function listProviders(kind?: "gateway" | "standard"): ProviderSpec[] {
  const all = defaultRegistry.listProviders();
  if (kind === undefined) {
    return all;
  }
  return all.filter((spec) =>
    kind === "gateway" ? spec.isGateway || spec.isLocal : !spec.isGateway && !spec.isLocal,
  );
}
