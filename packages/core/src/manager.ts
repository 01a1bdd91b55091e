/**
 * LlmServiceManager: the orchestration layer.
 *
 * Resolves options, selects a provider, consults the cache, dispatches to
 * the adapter capability, retries retryable failures, emits events and
 * records usage. Holds no per-call state; the registry and cache are the
 * only long-lived structures.
 *
 * Call lifecycle:
 *
 *   pending → resolving → dispatching → succeeded
 *                             ↓ ↑
 *                          retrying → failed
 */

import { ModelCatalog } from "./catalog.js";
import { ResponseCache } from "./cache.js";
import type { ConfigurationSource } from "./config.js";
import { EventBus, type Listener, type LlmEventKind } from "./events.js";
import {
  adapterCapabilities,
  hasCapability,
  supportsEmbeddings,
  supportsStreaming,
  supportsTools,
  supportsVision,
  type ProviderAdapter,
  type StreamingCapable,
} from "./providers/adapter.js";
import { AdapterFactory, requiresCredential } from "./providers/factory.js";
import { ProviderRegistry, type RegisteredProvider } from "./registry.js";
import { guardStream } from "./stream-guard.js";
import type { UsageRecorder } from "./usage.js";
import type { AdapterType } from "./types/enums.js";
import { Capability, DetailLevel, Operation, ResponseFormat, Role } from "./types/enums.js";
import {
  createLlmConfiguration,
  type LlmConfiguration,
  type LlmConfigurationInit,
} from "./types/descriptors.js";
import {
  ConfigurationError,
  LlmError,
  UnsupportedCapabilityError,
  toLlmError,
} from "./types/errors.js";
import { systemMessage, userMessage, type ContentPart, type Message } from "./types/message.js";
import {
  clampInteger,
  clampNumber,
  createChatOptions,
  createEmbeddingOptions,
  createToolOptions,
  createVisionOptions,
  PENALTY_RANGE,
  TEMPERATURE_RANGE,
  TOP_P_RANGE,
  type ChatOptions,
  type EmbeddingOptions,
  type ToolOptions,
  type VisionOptions,
} from "./types/options.js";
import type {
  ResolvedChatOptions,
  ResolvedEmbeddingOptions,
  ResolvedOptions,
  ResolvedToolOptions,
  ResolvedVisionOptions,
} from "./types/request.js";
import {
  CompletionResponse,
  EmbeddingResponse,
  UsageStatistics,
  VisionResponse,
} from "./types/response.js";
import { StreamChunkType, type StreamChunk } from "./types/stream.js";
import type { ToolDefinition } from "./types/tool.js";
import { retry, type RetryPolicy } from "./utils/retry.js";
import { silentLogger, type Logger } from "./utils/logger.js";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export const CallState = {
  PENDING: "pending",
  RESOLVING: "resolving",
  DISPATCHING: "dispatching",
  RETRYING: "retrying",
  SUCCEEDED: "succeeded",
  FAILED: "failed",
} as const satisfies Record<string, string>;

export type CallState = (typeof CallState)[keyof typeof CallState];

export interface OrchestratorConfig {
  defaults?: {
    temperature?: number;
    max_tokens?: number;
  };
  /** Backoff tuning. The retry budget itself is the provider's `max_retries`. */
  retry?: Partial<Omit<RetryPolicy, "maxRetries" | "onRetry">>;
  stream?: {
    firstChunkTimeoutMs?: number;
    chunkTimeoutMs?: number;
  };
}

export interface LlmServiceManagerOptions extends OrchestratorConfig {
  registry: ProviderRegistry;
  catalog?: ModelCatalog;
  /** Omit to disable caching. */
  cache?: ResponseCache;
  events?: EventBus;
  usage?: UsageRecorder;
  logger?: Logger;
}

export interface FromConfigurationOptions extends Omit<LlmServiceManagerOptions, "registry" | "catalog"> {
  factory?: AdapterFactory;
}

/** Tags a call for usage accounting. */
export interface CallContext {
  /** Feature name recorded instead of the operation. */
  feature?: string;
  /** Characters processed, for translation accounting. */
  characters?: number;
}

export interface ProviderSummary {
  identifier: string;
  name: string;
  adapter_type: AdapterType;
  priority: number;
  active: boolean;
  available: boolean;
  is_default: boolean;
  capabilities: Capability[];
}

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 4096;
export const DEFAULT_FIRST_CHUNK_TIMEOUT_MS = 30_000;
export const DEFAULT_CHUNK_TIMEOUT_MS = 30_000;

export type OptionsRequest =
  | { operation: typeof Operation.CHAT | typeof Operation.STREAM; options?: ChatOptions }
  | { operation: typeof Operation.TOOLS; options: ToolOptions }
  | { operation: typeof Operation.VISION; options?: VisionOptions }
  | { operation: typeof Operation.EMBEDDING; options?: EmbeddingOptions };

// ---------------------------------------------------------------------------
// Internal call description
// ---------------------------------------------------------------------------

interface Dispatch<O extends ResolvedOptions, R> {
  operation: Operation;
  entry: RegisteredProvider;
  messages: readonly Message[];
  options: O;
  context: CallContext;
  /** Re-applies clamping after listeners had a chance to edit the options. */
  normalize: (options: O) => O;
  cache?: {
    key: (options: O) => string | undefined;
    read: (key: string) => Promise<R | undefined>;
    write: (key: string, response: R, options: O) => Promise<void>;
  };
  send: (options: O) => Promise<R>;
  usageOf: (response: R) => UsageStatistics;
  withUsage: (response: R, usage: UsageStatistics) => R;
}

// ---------------------------------------------------------------------------
// LlmServiceManager
// ---------------------------------------------------------------------------

export class LlmServiceManager {
  readonly registry: ProviderRegistry;
  readonly catalog: ModelCatalog;
  private readonly cache: ResponseCache | undefined;
  private readonly events: EventBus;
  private readonly usage: UsageRecorder | undefined;
  private readonly logger: Logger;
  private readonly defaultTemperature: number;
  private readonly defaultMaxTokens: number;
  private readonly retryTuning: Partial<RetryPolicy>;
  private readonly firstChunkTimeoutMs: number;
  private readonly chunkTimeoutMs: number;

  constructor(options: LlmServiceManagerOptions) {
    this.registry = options.registry;
    this.catalog = options.catalog ?? new ModelCatalog();
    this.cache = options.cache;
    this.logger = options.logger ?? silentLogger;
    this.events = options.events ?? new EventBus({ logger: this.logger });
    this.usage = options.usage;
    this.defaultTemperature =
      clampNumber(options.defaults?.temperature, TEMPERATURE_RANGE.min, TEMPERATURE_RANGE.max) ??
      DEFAULT_TEMPERATURE;
    this.defaultMaxTokens = clampInteger(options.defaults?.max_tokens, 1) ?? DEFAULT_MAX_TOKENS;
    this.retryTuning = { ...options.retry };
    this.firstChunkTimeoutMs = options.stream?.firstChunkTimeoutMs ?? DEFAULT_FIRST_CHUNK_TIMEOUT_MS;
    this.chunkTimeoutMs = options.stream?.chunkTimeoutMs ?? DEFAULT_CHUNK_TIMEOUT_MS;
  }

  /**
   * Build a manager from a configuration source: one adapter per provider
   * descriptor, credentials resolved by reference, models into the catalog.
   * A provider whose adapter cannot be built is logged and left out.
   */
  static async fromConfiguration(
    source: ConfigurationSource,
    options: FromConfigurationOptions = {},
  ): Promise<LlmServiceManager> {
    const logger = options.logger ?? silentLogger;
    const factory = options.factory ?? new AdapterFactory({ logger });
    const registry = new ProviderRegistry({ logger });

    for (const descriptor of await source.loadProviders()) {
      const credential = descriptor.credential_ref
        ? await source.resolveCredential(descriptor.credential_ref)
        : undefined;
      let adapter: ProviderAdapter;
      try {
        adapter = factory.create(descriptor, credential);
      } catch (err: unknown) {
        logger.error("Skipping provider with invalid configuration", err, {
          provider: descriptor.identifier,
        });
        continue;
      }
      registry.register({
        descriptor,
        adapter,
        hasCredential: Boolean(credential) || !requiresCredential(descriptor.adapter_type),
      });
    }

    const defaultId = await source.defaultProvider();
    if (defaultId !== undefined) {
      if (registry.has(defaultId)) registry.setDefault(defaultId);
      else logger.warn("Configured default provider is not registered", { provider: defaultId });
    }

    return new LlmServiceManager({
      ...options,
      registry,
      catalog: new ModelCatalog(await source.loadModels()),
      logger,
    });
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  /** Blocking chat completion. */
  async chat(
    messages: readonly Message[],
    options?: ChatOptions,
    context: CallContext = {},
  ): Promise<CompletionResponse> {
    const { entry, resolved, prepared } = this.prepareChat(messages, options);
    const adapter = entry.adapter;

    return this.execute({
      operation: Operation.CHAT,
      entry,
      messages: prepared,
      options: resolved,
      context,
      normalize: (o) => normalizeChat(o, entry.descriptor.identifier),
      cache: this.completionCache((o) =>
        ResponseCache.isCacheableChat(o)
          ? ResponseCache.key(o.provider, o.model, { operation: Operation.CHAT, messages: prepared, options: o })
          : undefined,
      ),
      send: (o) => adapter.complete(prepared, o),
      usageOf: (r) => r.usage,
      withUsage: (r, usage) => r.with({ usage }),
    });
  }

  /** Single-prompt convenience over `chat`. */
  complete(prompt: string, options?: ChatOptions, context?: CallContext): Promise<CompletionResponse> {
    return this.chat([userMessage(prompt)], options, context);
  }

  /** Chat with tool definitions. Never cached. */
  async chatWithTools(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: Omit<ToolOptions, "tools"> = {},
    context: CallContext = {},
  ): Promise<CompletionResponse> {
    this.transition(CallState.RESOLVING, Operation.TOOLS);
    const toolOptions = createToolOptions({ ...options, tools });
    const entry = this.registry.select(toolOptions.provider);
    const adapter = entry.adapter;
    if (!supportsTools(adapter)) {
      throw new UnsupportedCapabilityError(entry.descriptor.identifier, Capability.TOOLS);
    }
    const resolved = this.resolveToolsFor(entry, toolOptions);
    const prepared = withSystemPrompt(messages, toolOptions.system_prompt);

    return this.execute({
      operation: Operation.TOOLS,
      entry,
      messages: prepared,
      options: resolved,
      context,
      normalize: (o) => normalizeChat(o, entry.descriptor.identifier),
      send: (o) => adapter.completeWithTools(prepared, o.tools, o),
      usageOf: (r) => r.usage,
      withUsage: (r, usage) => r.with({ usage }),
    });
  }

  /** Embed one text or a batch; vectors come back in input order. */
  async embed(
    input: string | readonly string[],
    options?: EmbeddingOptions,
    context: CallContext = {},
  ): Promise<EmbeddingResponse> {
    this.transition(CallState.RESOLVING, Operation.EMBEDDING);
    const inputs = typeof input === "string" ? [input] : [...input];
    if (inputs.length === 0) {
      throw new LlmError("embed() needs at least one input");
    }
    const normalized = createEmbeddingOptions(options);
    const entry = this.registry.select(normalized.provider);
    const adapter = entry.adapter;
    if (!supportsEmbeddings(adapter)) {
      throw new UnsupportedCapabilityError(entry.descriptor.identifier, Capability.EMBEDDING);
    }
    const resolved = this.resolveEmbeddingFor(entry, normalized, adapter.defaultEmbeddingModel);
    const cache = this.cache;

    return this.execute({
      operation: Operation.EMBEDDING,
      entry,
      messages: [],
      options: resolved,
      context,
      normalize: (o) => normalizeEmbedding(o, entry.descriptor.identifier),
      cache: cache && {
        key: (o) =>
          ResponseCache.isCacheableEmbedding(o)
            ? ResponseCache.key(o.provider, o.model, {
                operation: Operation.EMBEDDING,
                inputs,
                dimensions: o.dimensions,
              })
            : undefined,
        read: (key) => cache.getEmbedding(key),
        write: (key, response, o) => cache.setEmbedding(key, response, o.cache_ttl),
      },
      send: (o) => adapter.embed(inputs, o),
      usageOf: (r) => r.usage,
      withUsage: (r, usage) =>
        new EmbeddingResponse({ vectors: r.vectors, model: r.model, provider: r.provider, usage }),
    });
  }

  /** Analyse images. `content` carries the prompt text and the image parts. */
  async vision(
    content: readonly ContentPart[],
    options?: VisionOptions,
    context: CallContext = {},
  ): Promise<VisionResponse> {
    this.transition(CallState.RESOLVING, Operation.VISION);
    const normalized = createVisionOptions(options);
    const entry = this.registry.select(normalized.provider);
    const adapter = entry.adapter;
    if (!supportsVision(adapter)) {
      throw new UnsupportedCapabilityError(entry.descriptor.identifier, Capability.VISION);
    }
    const resolved = this.resolveVisionFor(entry, normalized);
    const cache = this.cache;
    const parts = [...content];

    return this.execute({
      operation: Operation.VISION,
      entry,
      messages: [userMessage(parts)],
      options: resolved,
      context,
      normalize: (o) => normalizeVision(o, entry.descriptor.identifier),
      cache: cache && {
        key: (o) =>
          ResponseCache.isCacheableVision(o)
            ? ResponseCache.key(o.provider, o.model, { operation: Operation.VISION, content: parts, options: o })
            : undefined,
        read: (key) => cache.getVision(key),
        write: (key, response) => cache.setVision(key, response),
      },
      send: (o) => adapter.analyzeImage(parts, o),
      usageOf: (r) => r.usage,
      withUsage: (r, usage) =>
        new VisionResponse({
          description: r.description,
          model: r.model,
          provider: r.provider,
          usage,
          confidence: r.confidence,
          metadata: r.metadata,
        }),
    });
  }

  /**
   * Stream content deltas. Selection and capability errors throw here;
   * transport errors surface from the iterator. Only failures before the
   * first chunk are retried. Streams are never cached.
   */
  streamChat(
    messages: readonly Message[],
    options?: ChatOptions,
    context: CallContext = {},
  ): AsyncIterableIterator<string> {
    const { entry, resolved, prepared } = this.prepareChat(messages, options, Operation.STREAM);
    const adapter = entry.adapter;
    if (!supportsStreaming(adapter)) {
      throw new UnsupportedCapabilityError(entry.descriptor.identifier, Capability.STREAMING);
    }
    return this.runStream(entry, adapter, prepared, resolved, context);
  }

  // -------------------------------------------------------------------------
  // Configurations
  // -------------------------------------------------------------------------

  /**
   * The chat options a configuration stands for. With selection criteria the
   * catalog picks the model, and so the provider, among available providers.
   *
   * @throws {ConfigurationError} for an inactive configuration, or when no
   * model meets its criteria.
   */
  configurationOptions(configuration: LlmConfiguration | LlmConfigurationInit): ChatOptions {
    const config = createLlmConfiguration(configuration);
    if (!config.active) {
      throw new ConfigurationError(`Configuration "${config.identifier}" is inactive`);
    }

    let provider = config.provider;
    let model = config.model;
    if (config.criteria) {
      const selected = this.catalog.selectModel(config.criteria, (id) => {
        const entry = this.registry.get(id);
        if (!entry || !this.registry.isAvailable(id)) return undefined;
        return { adapter_type: entry.descriptor.adapter_type, priority: entry.priority };
      });
      if (!selected) {
        throw new ConfigurationError(
          `No model meets the selection criteria of configuration "${config.identifier}"`,
        );
      }
      provider = selected.provider;
      model = selected.identifier;
    } else if (!provider && model) {
      provider = this.catalog.get(model)?.provider ?? "";
    }

    return createChatOptions({
      provider,
      model,
      system_prompt: config.system_prompt,
      temperature: config.temperature,
      max_tokens: config.max_tokens,
      top_p: config.top_p,
      frequency_penalty: config.frequency_penalty,
      presence_penalty: config.presence_penalty,
    });
  }

  chatWithConfiguration(
    messages: readonly Message[],
    configuration: LlmConfiguration | LlmConfigurationInit,
    context?: CallContext,
  ): Promise<CompletionResponse> {
    return this.chat(messages, this.configurationOptions(configuration), context);
  }

  completeWithConfiguration(
    prompt: string,
    configuration: LlmConfiguration | LlmConfigurationInit,
    context?: CallContext,
  ): Promise<CompletionResponse> {
    return this.chat([userMessage(prompt)], this.configurationOptions(configuration), context);
  }

  streamChatWithConfiguration(
    messages: readonly Message[],
    configuration: LlmConfiguration | LlmConfigurationInit,
    context?: CallContext,
  ): AsyncIterableIterator<string> {
    return this.streamChat(messages, this.configurationOptions(configuration), context);
  }

  // -------------------------------------------------------------------------
  // Introspection
  // -------------------------------------------------------------------------

  /** Whether a provider (or the one a call would select) implements a capability. */
  supportsFeature(capability: Capability, provider?: string): boolean {
    const entry = this.registry.peek(provider);
    return entry !== undefined && hasCapability(entry.adapter, capability);
  }

  getProviderList(): ProviderSummary[] {
    return this.registry.list().map((entry) => this.summarize(entry));
  }

  /** Available providers in selection order. */
  getAvailableProviders(): ProviderSummary[] {
    return this.registry.selectByPriority().map((entry) => this.summarize(entry));
  }

  hasAvailableProvider(): boolean {
    return this.registry.selectByPriority().length > 0;
  }

  setDefaultProvider(identifier: string): void {
    this.registry.setDefault(identifier);
    this.logger.info("Default provider changed", { provider: identifier });
  }

  on<K extends LlmEventKind>(kind: K, listener: Listener<K>): () => void {
    return this.events.on(kind, listener);
  }

  /** The options a call would send, without sending it. */
  resolveOptions(request: OptionsRequest): ResolvedOptions {
    switch (request.operation) {
      case Operation.CHAT:
      case Operation.STREAM: {
        const normalized = createChatOptions(request.options);
        return this.resolveChatFor(this.registry.select(normalized.provider), normalized);
      }
      case Operation.TOOLS: {
        const normalized = createToolOptions(request.options);
        return this.resolveToolsFor(this.registry.select(normalized.provider), normalized);
      }
      case Operation.VISION: {
        const normalized = createVisionOptions(request.options);
        return this.resolveVisionFor(this.registry.select(normalized.provider), normalized);
      }
      case Operation.EMBEDDING: {
        const normalized = createEmbeddingOptions(request.options);
        const entry = this.registry.select(normalized.provider);
        const fallback = supportsEmbeddings(entry.adapter)
          ? entry.adapter.defaultEmbeddingModel
          : entry.adapter.defaultModel;
        return this.resolveEmbeddingFor(entry, normalized, fallback);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  private prepareChat(
    messages: readonly Message[],
    options: ChatOptions | undefined,
    operation: Operation = Operation.CHAT,
  ): { entry: RegisteredProvider; resolved: ResolvedChatOptions; prepared: readonly Message[] } {
    this.transition(CallState.RESOLVING, operation);
    const normalized = createChatOptions(options);
    const entry = this.registry.select(normalized.provider);
    return {
      entry,
      resolved: this.resolveChatFor(entry, normalized),
      prepared: withSystemPrompt(messages, normalized.system_prompt),
    };
  }

  private resolveModel(
    entry: RegisteredProvider,
    capability: Capability,
    requested: string | undefined,
    fallback: string,
  ): string {
    return (
      this.catalog.resolveModelId(entry.descriptor.identifier, capability, requested) ?? fallback
    );
  }

  private resolveChatFor(entry: RegisteredProvider, options: ChatOptions): ResolvedChatOptions {
    return {
      provider: entry.descriptor.identifier,
      model: this.resolveModel(entry, Capability.CHAT, options.model, entry.adapter.defaultModel),
      temperature: options.temperature ?? this.defaultTemperature,
      max_tokens: options.max_tokens ?? this.defaultMaxTokens,
      top_p: options.top_p,
      frequency_penalty: options.frequency_penalty,
      presence_penalty: options.presence_penalty,
      response_format: options.response_format ?? ResponseFormat.TEXT,
      stop_sequences: options.stop_sequences,
    };
  }

  private resolveToolsFor(entry: RegisteredProvider, options: ToolOptions): ResolvedToolOptions {
    const chat = this.resolveChatFor(entry, options);
    return {
      ...chat,
      model: this.resolveModel(entry, Capability.TOOLS, options.model, chat.model),
      tools: options.tools,
      tool_choice: options.tool_choice ?? "auto",
    };
  }

  private resolveVisionFor(entry: RegisteredProvider, options: VisionOptions): ResolvedVisionOptions {
    return {
      provider: entry.descriptor.identifier,
      model: this.resolveModel(entry, Capability.VISION, options.model, entry.adapter.defaultModel),
      temperature: options.temperature ?? this.defaultTemperature,
      max_tokens: options.max_tokens ?? this.defaultMaxTokens,
      detail_level: options.detail_level ?? DetailLevel.AUTO,
      system_prompt: options.system_prompt,
    };
  }

  private resolveEmbeddingFor(
    entry: RegisteredProvider,
    options: EmbeddingOptions,
    fallbackModel: string,
  ): ResolvedEmbeddingOptions {
    return {
      provider: entry.descriptor.identifier,
      model: this.resolveModel(entry, Capability.EMBEDDING, options.model, fallbackModel),
      dimensions: options.dimensions,
      cache_ttl: options.cache_ttl,
    };
  }

  private completionCache(
    key: (options: ResolvedChatOptions) => string | undefined,
  ): Dispatch<ResolvedChatOptions, CompletionResponse>["cache"] {
    const cache = this.cache;
    return (
      cache && {
        key,
        read: (k) => cache.getCompletion(k),
        write: (k, response) => cache.setCompletion(k, response),
      }
    );
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  private async execute<O extends ResolvedOptions, R>(call: Dispatch<O, R>): Promise<R> {
    const provider = call.entry.descriptor.identifier;
    const started = Date.now();

    const event = { operation: call.operation, provider, messages: call.messages, options: call.options };
    this.events.emit("before_request", event);
    const options = call.normalize(listenerOptions(event.options, call.options));
    const model = options.model;

    const key = call.cache?.key(options);
    if (call.cache && key !== undefined) {
      const hit = await call.cache.read(key);
      if (hit !== undefined) {
        this.logger.debug("Cache hit", { provider, model, operation: call.operation });
        this.transition(CallState.SUCCEEDED, call.operation, { cached: true });
        this.events.emit("after_response", {
          operation: call.operation,
          provider,
          model,
          response: hit,
          usage: call.usageOf(hit),
          duration_ms: Date.now() - started,
          attempts: 0,
          cached: true,
          streamed: false,
        });
        return hit;
      }
    }

    let attempts = 0;
    let response: R;
    try {
      response = await retry(async (attempt) => {
        attempts = attempt + 1;
        this.transition(CallState.DISPATCHING, call.operation, { provider, attempt: attempts });
        try {
          return await call.send(options);
        } catch (err: unknown) {
          throw toLlmError(err, provider);
        }
      }, this.retryPolicy(call.entry, call.operation));
    } catch (err: unknown) {
      const error = toLlmError(err, provider);
      this.transition(CallState.FAILED, call.operation, { provider, attempts });
      this.logger.error(`${call.operation} call failed`, error, { provider, model, attempts });
      this.events.emit("after_response", {
        operation: call.operation,
        provider,
        model,
        error,
        duration_ms: Date.now() - started,
        attempts,
        cached: false,
        streamed: false,
      });
      throw error;
    }

    const usage = this.priced(provider, model, call.usageOf(response));
    response = call.withUsage(response, usage);
    this.transition(CallState.SUCCEEDED, call.operation, { provider, attempts });
    this.events.emit("after_response", {
      operation: call.operation,
      provider,
      model,
      response,
      usage,
      duration_ms: Date.now() - started,
      attempts,
      cached: false,
      streamed: false,
    });

    if (call.cache && key !== undefined) {
      await call.cache.write(key, response, options);
    }
    this.recordUsage(call.context.feature ?? call.operation, provider, model, usage, call.context);
    return response;
  }

  private async *runStream(
    entry: RegisteredProvider,
    adapter: ProviderAdapter & StreamingCapable,
    messages: readonly Message[],
    initial: ResolvedChatOptions,
    context: CallContext,
  ): AsyncIterableIterator<string> {
    const provider = entry.descriptor.identifier;
    const started = Date.now();

    const event = { operation: Operation.STREAM, provider, messages, options: initial };
    this.events.emit("before_request", event);
    const options = normalizeChat(listenerOptions(event.options, initial), provider);

    let attempts = 0;
    let opened: { iterator: AsyncIterableIterator<StreamChunk>; first: IteratorResult<StreamChunk> };
    try {
      opened = await retry(async (attempt) => {
        attempts = attempt + 1;
        this.transition(CallState.DISPATCHING, Operation.STREAM, { provider, attempt: attempts });
        const controller = new AbortController();
        const guarded = guardStream(adapter.stream(messages, options, controller.signal), {
          firstChunkTimeoutMs: this.firstChunkTimeoutMs,
          chunkTimeoutMs: this.chunkTimeoutMs,
          controller,
          provider,
          logger: this.logger,
        });
        try {
          return { iterator: guarded, first: await guarded.next() };
        } catch (err: unknown) {
          throw toLlmError(err, provider);
        }
      }, this.retryPolicy(entry, Operation.STREAM));
    } catch (err: unknown) {
      throw this.streamFailed(err, provider, options.model, started, attempts);
    }
    const { iterator, first } = opened;

    let usage: UsageStatistics | undefined;
    let model = options.model;
    let finished = false;
    let failed = false;
    try {
      for (let result = first; !result.done; result = await iterator.next()) {
        const chunk = result.value;
        if (chunk.type === StreamChunkType.TEXT_DELTA) {
          yield chunk.delta;
        } else {
          usage = chunk.usage;
          model = chunk.model ?? model;
        }
      }
      finished = true;
    } catch (err: unknown) {
      failed = true;
      throw this.streamFailed(err, provider, model, started, attempts);
    } finally {
      if (!finished) {
        try {
          await iterator.return?.();
        } finally {
          // the consumer stopped early; what it received stands
          if (!failed) this.streamSucceeded(provider, model, usage, started, attempts, context, true);
        }
      }
    }
    this.streamSucceeded(provider, model, usage, started, attempts, context, false);
  }

  private streamSucceeded(
    provider: string,
    model: string,
    usage: UsageStatistics | undefined,
    started: number,
    attempts: number,
    context: CallContext,
    cancelled: boolean,
  ): void {
    const priced = usage && this.priced(provider, model, usage);
    this.transition(CallState.SUCCEEDED, Operation.STREAM, { provider, attempts, cancelled });
    this.events.emit("after_response", {
      operation: Operation.STREAM,
      provider,
      model,
      usage: priced,
      duration_ms: Date.now() - started,
      attempts,
      cached: false,
      streamed: true,
      cancelled,
    });
    if (priced) {
      this.recordUsage(context.feature ?? Operation.STREAM, provider, model, priced, context);
    }
  }

  private streamFailed(
    err: unknown,
    provider: string,
    model: string,
    started: number,
    attempts: number,
  ): LlmError {
    const error = toLlmError(err, provider);
    this.transition(CallState.FAILED, Operation.STREAM, { provider, attempts });
    this.logger.error("stream call failed", error, { provider, model, attempts });
    this.events.emit("after_response", {
      operation: Operation.STREAM,
      provider,
      model,
      error,
      duration_ms: Date.now() - started,
      attempts,
      cached: false,
      streamed: true,
    });
    return error;
  }

  private retryPolicy(entry: RegisteredProvider, operation: Operation): Partial<RetryPolicy> {
    return {
      ...this.retryTuning,
      maxRetries: entry.descriptor.max_retries,
      onRetry: (error, attempt, delay) => {
        this.transition(CallState.RETRYING, operation, {
          provider: entry.descriptor.identifier,
          retry: attempt + 1,
        });
        this.logger.warn("Retrying after retryable error", {
          provider: entry.descriptor.identifier,
          operation,
          retry: attempt + 1,
          delay_ms: Math.round(delay),
          error: error.message,
        });
      },
    };
  }

  private priced(provider: string, model: string, usage: UsageStatistics): UsageStatistics {
    const cost = this.catalog.estimateCost(provider, model, usage);
    return cost === undefined ? usage : usage.withCost(cost);
  }

  private recordUsage(
    feature: string,
    provider: string,
    model: string,
    usage: UsageStatistics,
    context: CallContext,
  ): void {
    const recorder = this.usage;
    if (!recorder) return;
    const onFailure = (err: unknown): void => {
      this.logger.warn("Usage recording failed", { provider, feature, error: String(err) });
    };
    try {
      const pending = recorder.record({
        feature,
        provider,
        model,
        prompt_tokens: usage.prompt_tokens,
        completion_tokens: usage.completion_tokens,
        total_tokens: usage.total_tokens,
        characters: context.characters,
        estimated_cost: usage.estimated_cost,
        timestamp: new Date(),
      });
      if (pending instanceof Promise) pending.catch(onFailure);
    } catch (err: unknown) {
      onFailure(err);
    }
  }

  private summarize(entry: RegisteredProvider): ProviderSummary {
    const id = entry.descriptor.identifier;
    return {
      identifier: id,
      name: entry.descriptor.name,
      adapter_type: entry.descriptor.adapter_type,
      priority: entry.priority,
      active: entry.descriptor.active,
      available: this.registry.isAvailable(id),
      is_default: this.registry.defaultProvider === id,
      capabilities: adapterCapabilities(entry.adapter),
    };
  }

  private transition(state: CallState, operation: Operation, context: Record<string, unknown> = {}): void {
    this.logger.debug(`call ${state}`, { operation, ...context });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Prepend the system prompt unless the conversation already has one. */
function withSystemPrompt(messages: readonly Message[], systemPrompt: string | undefined): readonly Message[] {
  if (!systemPrompt || messages.some((m) => m.role === Role.SYSTEM)) return messages;
  return [systemMessage(systemPrompt), ...messages];
}

/** Listeners may assign anything; keep the original when the replacement is not an object. */
function listenerOptions<O extends ResolvedOptions>(edited: ResolvedOptions, original: O): O {
  return typeof edited === "object" && edited !== null ? { ...original, ...edited } : original;
}

function normalizeChat<O extends ResolvedChatOptions>(options: O, provider: string): O {
  return {
    ...options,
    provider,
    temperature:
      clampNumber(options.temperature, TEMPERATURE_RANGE.min, TEMPERATURE_RANGE.max) ?? DEFAULT_TEMPERATURE,
    max_tokens: clampInteger(options.max_tokens, 1) ?? DEFAULT_MAX_TOKENS,
    top_p: clampNumber(options.top_p, TOP_P_RANGE.min, TOP_P_RANGE.max),
    frequency_penalty: clampNumber(options.frequency_penalty, PENALTY_RANGE.min, PENALTY_RANGE.max),
    presence_penalty: clampNumber(options.presence_penalty, PENALTY_RANGE.min, PENALTY_RANGE.max),
  };
}

function normalizeVision(options: ResolvedVisionOptions, provider: string): ResolvedVisionOptions {
  return {
    ...options,
    provider,
    temperature:
      clampNumber(options.temperature, TEMPERATURE_RANGE.min, TEMPERATURE_RANGE.max) ?? DEFAULT_TEMPERATURE,
    max_tokens: clampInteger(options.max_tokens, 1) ?? DEFAULT_MAX_TOKENS,
  };
}

function normalizeEmbedding(options: ResolvedEmbeddingOptions, provider: string): ResolvedEmbeddingOptions {
  return {
    ...options,
    provider,
    dimensions: clampInteger(options.dimensions, 1),
    cache_ttl: clampInteger(options.cache_ttl, 0) ?? 0,
  };
}
