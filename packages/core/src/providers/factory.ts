/**
 * Adapter factory: turns a provider descriptor plus its resolved credential
 * into a ready adapter instance.
 *
 * Each adapter type maps to a builder. OpenAI-style vendors (Mistral, Groq,
 * OpenRouter, custom endpoints) are presets of the Chat Completions adapter.
 * Instances are cached per provider identifier and rebuilt when the
 * descriptor or credential changes.
 */

import { AdapterType } from "../types/enums.js";
import { ConfigurationError } from "../types/errors.js";
import type { ProviderDescriptor } from "../types/descriptors.js";
import { sha256, stableStringify } from "../utils/hash.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { ProviderAdapter } from "./adapter.js";
import type { AdapterConfig } from "./shared.js";
import { AnthropicAdapter } from "./anthropic/index.js";
import { AzureOpenAIAdapter } from "./azure-openai/index.js";
import { GeminiAdapter } from "./gemini/index.js";
import { OllamaAdapter } from "./ollama/index.js";
import {
  OpenAICompatibleAdapter,
  OpenAICompatibleChatAdapter,
} from "./openai-compatible/index.js";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Base URL per dialect when the descriptor leaves `endpoint` empty. */
export const DEFAULT_ENDPOINTS = {
  [AdapterType.OPENAI]: "https://api.openai.com/v1",
  [AdapterType.ANTHROPIC]: "https://api.anthropic.com/v1",
  [AdapterType.GEMINI]: "https://generativelanguage.googleapis.com/v1beta",
  [AdapterType.OLLAMA]: "http://localhost:11434",
  [AdapterType.OPENROUTER]: "https://openrouter.ai/api/v1",
  [AdapterType.MISTRAL]: "https://api.mistral.ai/v1",
  [AdapterType.GROQ]: "https://api.groq.com/openai/v1",
  [AdapterType.AZURE_OPENAI]: "",
  [AdapterType.CUSTOM]: "",
} as const satisfies Record<AdapterType, string>;

const PRESET_MODELS: Partial<Record<AdapterType, { chat: string; embedding?: string }>> = {
  [AdapterType.OPENAI]: { chat: "gpt-4o-mini", embedding: "text-embedding-3-small" },
  [AdapterType.MISTRAL]: { chat: "mistral-large-latest", embedding: "mistral-embed" },
  [AdapterType.GROQ]: { chat: "llama-3.3-70b-versatile" },
  [AdapterType.OPENROUTER]: {
    chat: "anthropic/claude-sonnet-4-5",
    embedding: "openai/text-embedding-3-small",
  },
};

/** Dialects that authenticate without an API key. */
const KEYLESS = new Set<AdapterType>([AdapterType.OLLAMA, AdapterType.CUSTOM]);

export function requiresCredential(type: AdapterType): boolean {
  return !KEYLESS.has(type);
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export type AdapterBuilder = (
  config: AdapterConfig,
  descriptor: ProviderDescriptor,
) => ProviderAdapter;

function openRouterHeaders(options: Readonly<Record<string, string>>): Record<string, string> {
  const headers: Record<string, string> = {};
  if (options["site_url"]) headers["HTTP-Referer"] = options["site_url"];
  if (options["app_name"]) headers["X-Title"] = options["app_name"];
  return headers;
}

export const BUILTIN_BUILDERS: Readonly<Record<AdapterType, AdapterBuilder>> = {
  [AdapterType.OPENAI]: (config) =>
    new OpenAICompatibleAdapter({ ...config, type: AdapterType.OPENAI }),
  [AdapterType.MISTRAL]: (config) =>
    new OpenAICompatibleAdapter({ ...config, type: AdapterType.MISTRAL }),
  // Groq serves no embeddings endpoint
  [AdapterType.GROQ]: (config) =>
    new OpenAICompatibleChatAdapter({ ...config, type: AdapterType.GROQ }),
  [AdapterType.OPENROUTER]: (config) =>
    new OpenAICompatibleAdapter({
      ...config,
      type: AdapterType.OPENROUTER,
      defaultHeaders: { ...openRouterHeaders(config.options ?? {}), ...config.defaultHeaders },
    }),
  [AdapterType.CUSTOM]: (config) => {
    if (!config.baseUrl) {
      throw new ConfigurationError("A custom provider requires an endpoint", {
        provider: config.id,
      });
    }
    return new OpenAICompatibleAdapter({ ...config, type: AdapterType.CUSTOM });
  },
  [AdapterType.AZURE_OPENAI]: (config) => new AzureOpenAIAdapter(config),
  [AdapterType.ANTHROPIC]: (config) => new AnthropicAdapter(config),
  [AdapterType.GEMINI]: (config) => new GeminiAdapter(config),
  [AdapterType.OLLAMA]: (config) => new OllamaAdapter(config),
};

/** Translate a descriptor into the adapter constructor config. */
export function adapterConfig(
  descriptor: ProviderDescriptor,
  credential: string | undefined,
): AdapterConfig {
  const preset = PRESET_MODELS[descriptor.adapter_type];
  const options = descriptor.options;
  return {
    id: descriptor.identifier,
    name: descriptor.name,
    baseUrl: descriptor.endpoint || DEFAULT_ENDPOINTS[descriptor.adapter_type],
    apiKey: credential,
    timeoutMs: descriptor.timeout_ms,
    defaultModel: options["default_model"] ?? preset?.chat,
    defaultEmbeddingModel: options["default_embedding_model"] ?? preset?.embedding,
    options,
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface AdapterFactoryOptions {
  logger?: Logger;
  /** Builder table; defaults to the built-in dialects. */
  builders?: Partial<Record<AdapterType, AdapterBuilder>>;
}

export class AdapterFactory {
  private readonly builders: Map<AdapterType, AdapterBuilder>;
  private readonly instances = new Map<string, { fingerprint: string; adapter: ProviderAdapter }>();
  private readonly logger: Logger;

  constructor(options: AdapterFactoryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.builders = new Map();
    const table = options.builders ?? BUILTIN_BUILDERS;
    for (const type of Object.values(AdapterType)) {
      const builder = table[type];
      if (builder) this.builders.set(type, builder);
    }
  }

  /** Register or replace the builder for an adapter type. */
  register(type: AdapterType, builder: AdapterBuilder): void {
    this.builders.set(type, builder);
  }

  /**
   * The adapter for a descriptor, built on first use and rebuilt when the
   * descriptor or credential differs from the cached one. A type without a
   * builder falls back to the OpenAI-compatible adapter.
   *
   * @throws {ConfigurationError} when the dialect needs an endpoint and none is set.
   */
  create(descriptor: ProviderDescriptor, credential?: string): ProviderAdapter {
    const fingerprint = sha256(stableStringify({ descriptor, credential: credential ?? null }));
    const cached = this.instances.get(descriptor.identifier);
    if (cached?.fingerprint === fingerprint) return cached.adapter;

    let builder = this.builders.get(descriptor.adapter_type);
    if (!builder) {
      this.logger.warn("Unknown adapter type, using OpenAI-compatible adapter", {
        provider: descriptor.identifier,
        adapter_type: descriptor.adapter_type,
      });
      builder = BUILTIN_BUILDERS[AdapterType.OPENAI];
    }

    const adapter = builder(adapterConfig(descriptor, credential), descriptor);
    this.instances.set(descriptor.identifier, { fingerprint, adapter });
    this.logger.debug(cached ? "Adapter rebuilt" : "Adapter created", {
      provider: descriptor.identifier,
      adapter_type: descriptor.adapter_type,
    });
    return adapter;
  }

  /** Drop cached instances, for one provider or all of them. */
  clearCache(identifier?: string): void {
    if (identifier === undefined) this.instances.clear();
    else this.instances.delete(identifier);
  }
}

/** One-off adapter construction without a shared factory. */
export function createAdapter(
  descriptor: ProviderDescriptor,
  credential?: string,
  options?: AdapterFactoryOptions,
): ProviderAdapter {
  return new AdapterFactory(options).create(descriptor, credential);
}
