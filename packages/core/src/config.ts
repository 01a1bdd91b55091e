/**
 * Configuration sources: where provider and model descriptors and
 * credentials come from.
 *
 * Persistence is the host's concern; it implements `ConfigurationSource`
 * over its own storage. Credentials are resolved on demand by reference and
 * never stored on descriptors.
 */

import { loadBuiltinModels } from "./catalog.js";
import { AdapterType } from "./types/enums.js";
import {
  createModelDescriptor,
  createProviderDescriptor,
  type ModelDescriptor,
  type ModelDescriptorInit,
  type ProviderDescriptor,
  type ProviderDescriptorInit,
} from "./types/descriptors.js";

export interface ConfigurationSource {
  loadProviders(): Promise<ProviderDescriptor[]>;
  loadModels(): Promise<ModelDescriptor[]>;
  /** The secret behind a descriptor's `credential_ref`, if any. */
  resolveCredential(ref: string): Promise<string | undefined>;
  /** Identifier of the configured default provider. */
  defaultProvider(): Promise<string | undefined>;
}

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

export interface InMemoryConfiguration {
  providers: ProviderDescriptorInit[];
  models?: ModelDescriptorInit[];
  /** credential_ref → secret. */
  credentials?: Record<string, string>;
  defaultProvider?: string;
}

export class InMemoryConfigurationSource implements ConfigurationSource {
  private readonly providers: ProviderDescriptor[];
  private readonly models: ModelDescriptor[];
  private readonly credentials: Map<string, string>;
  private readonly defaultId: string | undefined;

  constructor(config: InMemoryConfiguration) {
    this.providers = config.providers.map(createProviderDescriptor);
    this.models = (config.models ?? []).map(createModelDescriptor);
    this.credentials = new Map(Object.entries(config.credentials ?? {}));
    this.defaultId = config.defaultProvider;
  }

  async loadProviders(): Promise<ProviderDescriptor[]> {
    return [...this.providers];
  }

  async loadModels(): Promise<ModelDescriptor[]> {
    return [...this.models];
  }

  async resolveCredential(ref: string): Promise<string | undefined> {
    return this.credentials.get(ref);
  }

  async defaultProvider(): Promise<string | undefined> {
    return this.defaultId;
  }
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

type Env = Readonly<Record<string, string | undefined>>;

interface EnvProvider {
  type: AdapterType;
  name: string;
  /** Variables holding the key, first match wins. */
  keys: string[];
  priority: number;
}

const ENV_PROVIDERS: EnvProvider[] = [
  { type: AdapterType.OPENAI, name: "OpenAI", keys: ["OPENAI_API_KEY"], priority: 100 },
  { type: AdapterType.ANTHROPIC, name: "Anthropic", keys: ["ANTHROPIC_API_KEY"], priority: 90 },
  {
    type: AdapterType.GEMINI,
    name: "Google Gemini",
    keys: ["GEMINI_API_KEY", "GOOGLE_API_KEY"],
    priority: 80,
  },
  { type: AdapterType.MISTRAL, name: "Mistral", keys: ["MISTRAL_API_KEY"], priority: 70 },
  { type: AdapterType.GROQ, name: "Groq", keys: ["GROQ_API_KEY"], priority: 60 },
  { type: AdapterType.OPENROUTER, name: "OpenRouter", keys: ["OPENROUTER_API_KEY"], priority: 50 },
];

/**
 * Providers for every API key present in `env`, plus Ollama when
 * `OLLAMA_BASE_URL` is set. `LLM_DEFAULT_PROVIDER` names the default.
 * Models come from the built-in catalog.
 */
export function environmentConfiguration(env: Env = process.env): ConfigurationSource {
  const providers: ProviderDescriptorInit[] = [];

  for (const spec of ENV_PROVIDERS) {
    const ref = spec.keys.find((key) => env[key]);
    if (ref === undefined) continue;
    providers.push({
      identifier: spec.type,
      name: spec.name,
      adapter_type: spec.type,
      credential_ref: ref,
      priority: spec.priority,
    });
  }

  const ollamaUrl = env["OLLAMA_BASE_URL"];
  if (ollamaUrl) {
    providers.push({
      identifier: AdapterType.OLLAMA,
      name: "Ollama",
      adapter_type: AdapterType.OLLAMA,
      endpoint: ollamaUrl,
      priority: 10,
    });
  }

  const ids = new Set(providers.map((p) => p.identifier));
  const credentials: Record<string, string> = {};
  for (const provider of providers) {
    const ref = provider.credential_ref;
    const secret = ref ? env[ref] : undefined;
    if (ref && secret) credentials[ref] = secret;
  }

  return new InMemoryConfigurationSource({
    providers,
    models: loadBuiltinModels().filter((model) => ids.has(model.provider)),
    credentials,
    defaultProvider: env["LLM_DEFAULT_PROVIDER"] || undefined,
  });
}
