/**
 * Barrel re-export for the capability contracts and provider adapters.
 */

export type {
  ProviderAdapter,
  EmbeddingCapable,
  VisionCapable,
  StreamingCapable,
  ToolCapable,
} from "./adapter.js";
export {
  supportsEmbeddings,
  supportsVision,
  supportsStreaming,
  supportsTools,
  hasCapability,
  adapterCapabilities,
} from "./adapter.js";

export type { AdapterConfig } from "./shared.js";

export {
  OpenAICompatibleAdapter,
  OpenAICompatibleChatAdapter,
} from "./openai-compatible/index.js";
export type { OpenAICompatibleConfig } from "./openai-compatible/index.js";

export { AzureOpenAIAdapter, DEFAULT_AZURE_API_VERSION } from "./azure-openai/index.js";
export { AnthropicAdapter, DEFAULT_ANTHROPIC_MODEL } from "./anthropic/index.js";
export { GeminiAdapter, DEFAULT_GEMINI_MODEL } from "./gemini/index.js";
export { OllamaAdapter, DEFAULT_OLLAMA_MODEL } from "./ollama/index.js";

export {
  AdapterFactory,
  BUILTIN_BUILDERS,
  DEFAULT_ENDPOINTS,
  adapterConfig,
  createAdapter,
  requiresCredential,
} from "./factory.js";
export type { AdapterBuilder, AdapterFactoryOptions } from "./factory.js";
