/**
 * RegistryProvider — chat over a multiplexing transport, with provider
 * quirks driven by the registry instead of per-provider branches.
 *
 * Construction detects a gateway and publishes credentials. Each call
 * resolves the routed model name, applies model overrides, calls the
 * transport and normalizes whatever comes back.
 */

import {
  defaultRegistry,
  type ProviderRegistry,
  type ProviderSpec,
} from "@modelgate/provider-registry";
import {
  parseProviderSettings,
  loadLoggerConfig,
  type ProviderSettings,
  type ProviderSettingsInput,
} from "../config.js";
import { configureEnvironment, ProcessEnvStore, type EnvStore } from "../environment.js";
import { createLogger, type Logger } from "../logger.js";
import { parseResponse } from "../normalize/response.js";
import { reassembleStream } from "../normalize/stream.js";
import { applyModelOverrides, resolveModel } from "../resolve.js";
import {
  AbortError,
  createErrorResponse,
  describeError,
  isChunkStream,
  type CompletionRequest,
  type CompletionTransport,
  type LLMResponse,
} from "../types/index.js";
import { LLMProvider, type ChatRequest } from "./base.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Configuration for the RegistryProvider constructor. */
export interface RegistryProviderOptions extends ProviderSettingsInput {
  /** The multiplexing completion call. */
  transport: CompletionTransport;
  /** Where credentials are published. Defaults to `process.env`. */
  env?: EnvStore;
  /** Descriptor lookups. Defaults to the built-in table. */
  registry?: ProviderRegistry;
  logger?: Logger;
}

const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TEMPERATURE = 0.7;

// ---------------------------------------------------------------------------
// RegistryProvider
// ---------------------------------------------------------------------------

export class RegistryProvider extends LLMProvider {
  private readonly settings: ProviderSettings;
  private readonly transport: CompletionTransport;
  private readonly registry: ProviderRegistry;
  private readonly logger: Logger;
  /** Detected gateway or local deployment; fixed for the instance's life. */
  private readonly gateway: ProviderSpec | undefined;

  /**
   * Throws `ConfigurationError` when the settings are invalid.
   */
  constructor(options: RegistryProviderOptions) {
    const settings = parseProviderSettings({
      apiKey: options.apiKey,
      apiBase: options.apiBase,
      defaultModel: options.defaultModel,
      extraHeaders: options.extraHeaders,
      providerName: options.providerName,
    });
    super(settings.apiKey, settings.apiBase);

    this.settings = settings;
    this.transport = options.transport;
    this.registry = options.registry ?? defaultRegistry;
    this.logger =
      options.logger ?? createLogger(loadLoggerConfig(), { component: "llm-provider" });

    // The configured provider name is the primary signal; the credential
    // and base URL are fallbacks.
    this.gateway = this.registry.findGateway(
      settings.providerName,
      settings.apiKey,
      settings.apiBase,
    );
    if (this.gateway) {
      this.logger.debug({ gateway: this.gateway.name }, "Detected gateway");
    }

    if (settings.apiKey) {
      const spec = this.gateway ?? this.registry.findByModel(settings.defaultModel);
      const written = configureEnvironment({
        spec,
        isGateway: this.gateway !== undefined,
        apiKey: settings.apiKey,
        apiBase: settings.apiBase,
        env: options.env ?? new ProcessEnvStore(),
      });
      if (written.length > 0) {
        this.logger.debug({ provider: spec?.name, variables: written }, "Published credentials");
      }
    }
  }

  // -----------------------------------------------------------------------
  // Resolution
  // -----------------------------------------------------------------------

  /** The routed model name the transport will receive. */
  resolveModel(model: string): string {
    return resolveModel(model, { gateway: this.gateway, registry: this.registry });
  }

  /** The gateway descriptor, else the descriptor matched by model name. */
  private effectiveSpec(model: string): ProviderSpec | undefined {
    return this.gateway ?? this.registry.findByModel(model);
  }

  /** Assemble the transport arguments for a call. */
  buildRequest(request: ChatRequest): CompletionRequest {
    const model = this.resolveModel(request.model ?? this.settings.defaultModel);
    const spec = this.effectiveSpec(model);

    let completion: CompletionRequest = {
      model,
      messages: request.messages,
      max_tokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
      temperature: request.temperature ?? DEFAULT_TEMPERATURE,
      stream: false,
    };

    completion = applyModelOverrides(model, completion, spec);

    if (this.apiKey) {
      completion.api_key = this.apiKey;
    }
    if (this.apiBase) {
      completion.api_base = this.apiBase;
    }
    if (Object.keys(this.settings.extraHeaders).length > 0) {
      completion.extra_headers = { ...this.settings.extraHeaders };
    }
    if (request.tools && request.tools.length > 0) {
      completion.tools = request.tools;
      completion.tool_choice = "auto";
    }

    if (spec?.forceStream) {
      completion.stream = true;
    }

    return completion;
  }

  // -----------------------------------------------------------------------
  // chat()
  // -----------------------------------------------------------------------

  /**
   * Send a chat completion through the transport.
   *
   * Never rejects on failure: transport errors and malformed responses come
   * back as `{ finish_reason: "error", content: "Error calling LLM: ..." }`.
   * Rejects with `AbortError` only when `request.signal` is aborted.
   */
  async chat(request: ChatRequest): Promise<LLMResponse> {
    const { signal } = request;
    let model = request.model ?? this.settings.defaultModel;

    try {
      const completion = this.buildRequest(request);
      model = completion.model;
      this.logger.debug(
        { model, stream: completion.stream, tools: completion.tools?.length ?? 0 },
        "Dispatching completion",
      );

      const result = await this.transport(completion, { signal });
      if (signal?.aborted) {
        throw new AbortError("Request cancelled", { cause: signal.reason });
      }

      if (isChunkStream(result)) {
        return await reassembleStream(result, signal);
      }
      return parseResponse(result);
    } catch (error) {
      if (error instanceof AbortError || signal?.aborted) {
        throw error instanceof AbortError
          ? error
          : new AbortError("Request cancelled", { cause: error });
      }
      this.logger.warn({ err: error, model }, "LLM call failed");
      return createErrorResponse(describeError(error));
    }
  }

  getDefaultModel(): string {
    return this.settings.defaultModel;
  }

  /** The detected gateway's name, if any. */
  get gatewayName(): string | undefined {
    return this.gateway?.name;
  }
}
