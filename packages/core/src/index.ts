/**
 * @llm-switchboard/core: provider orchestration for LLM calls.
 */

export * from "./types/index.js";
export * from "./utils/index.js";
export * from "./providers/index.js";

export { ProviderRegistry } from "./registry.js";
export type { ProviderEntry, RegisteredProvider } from "./registry.js";

export { ModelCatalog, loadBuiltinModels } from "./catalog.js";
export type { ModelQuery, ProviderLookup, ProviderTraits } from "./catalog.js";

export {
  ResponseCache,
  MemoryCacheClient,
  DEFAULT_COMPLETION_CACHE_TTL,
} from "./cache.js";
export type { CacheClient, ResponseCacheOptions } from "./cache.js";

export { EventBus } from "./events.js";
export type {
  AfterResponseEvent,
  BeforeRequestEvent,
  Listener,
  LlmEventKind,
  LlmEventMap,
} from "./events.js";

export { InMemoryUsageRecorder } from "./usage.js";
export type { UsageEntry, UsageRecorder, UsageReportFilter, UsageReportRow } from "./usage.js";

export { InMemoryConfigurationSource, environmentConfiguration } from "./config.js";
export type { ConfigurationSource, InMemoryConfiguration } from "./config.js";

export { guardStream } from "./stream-guard.js";
export type { StreamGuardOptions } from "./stream-guard.js";

export {
  LlmServiceManager,
  CallState,
  DEFAULT_TEMPERATURE,
  DEFAULT_MAX_TOKENS,
  DEFAULT_FIRST_CHUNK_TIMEOUT_MS,
  DEFAULT_CHUNK_TIMEOUT_MS,
} from "./manager.js";
export type {
  CallContext,
  FromConfigurationOptions,
  LlmServiceManagerOptions,
  OptionsRequest,
  OrchestratorConfig,
  ProviderSummary,
} from "./manager.js";
