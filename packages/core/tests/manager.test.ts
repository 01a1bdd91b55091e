import { describe, it, expect, afterEach, vi } from "vitest";
import { MemoryCacheClient, ResponseCache } from "../src/cache.js";
import { ModelCatalog } from "../src/catalog.js";
import { InMemoryConfigurationSource } from "../src/config.js";
import type { AfterResponseEvent } from "../src/events.js";
import { LlmServiceManager, type LlmServiceManagerOptions } from "../src/manager.js";
import type { ProviderAdapter } from "../src/providers/adapter.js";
import { GeminiAdapter } from "../src/providers/gemini/index.js";
import { OpenAICompatibleAdapter } from "../src/providers/openai-compatible/index.js";
import { ProviderRegistry } from "../src/registry.js";
import { InMemoryUsageRecorder } from "../src/usage.js";
import { createProviderDescriptor, type ProviderDescriptorInit } from "../src/types/descriptors.js";
import {
  AuthenticationError,
  ConfigurationError,
  LlmError,
  RateLimitError,
  TransportError,
  UnsupportedCapabilityError,
} from "../src/types/errors.js";
import { imagePart, systemMessage, textPart, userMessage } from "../src/types/message.js";
import { UsageStatistics } from "../src/types/response.js";
import type { StreamChunk } from "../src/types/stream.js";
import {
  ChatOnlyAdapter,
  FakeAdapter,
  collect,
  jsonResponse,
  mockFetch,
  sentRequest,
  sseResponse,
} from "./helpers.js";
import { weatherTool } from "./providers/fixtures.js";

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllGlobals();
});

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

interface Setup {
  adapter?: ProviderAdapter & { id: string };
  descriptor?: Partial<ProviderDescriptorInit>;
  options?: Partial<LlmServiceManagerOptions>;
}

function setup(init: Setup = {}) {
  const fake = new FakeAdapter("fake");
  const adapter = init.adapter ?? fake;
  const registry = new ProviderRegistry();
  registry.register({
    descriptor: createProviderDescriptor({
      identifier: adapter.id,
      adapter_type: "custom",
      ...init.descriptor,
    }),
    adapter,
    hasCredential: true,
  });
  const usage = new InMemoryUsageRecorder();
  const logger = spyLogger();
  const events: AfterResponseEvent[] = [];
  const manager = new LlmServiceManager({
    registry,
    usage,
    logger,
    retry: { baseDelay: 0, jitter: false },
    ...init.options,
  });
  manager.on("after_response", (event) => {
    events.push(event);
  });
  return { manager, fake, usage, logger, events, registry };
}

function withCache(): Partial<LlmServiceManagerOptions> {
  return { cache: new ResponseCache(new MemoryCacheClient()) };
}

async function* chunks(...items: StreamChunk[]): AsyncIterableIterator<StreamChunk> {
  for (const item of items) yield item;
}

// ---------------------------------------------------------------------------
// chat
// ---------------------------------------------------------------------------

describe("LlmServiceManager.chat", () => {
  it("resolves defaults before dispatch", async () => {
    const { manager, fake } = setup();
    const response = await manager.chat([userMessage("hi")]);

    expect(response.content).toBe("reply from fake");
    expect(fake.completeMock.mock.calls[0]?.[1]).toMatchObject({
      provider: "fake",
      model: "fake-model",
      temperature: 0.7,
      max_tokens: 4096,
      response_format: "text",
    });
  });

  it("applies configured defaults", async () => {
    const { manager, fake } = setup({ options: { defaults: { temperature: 0.2, max_tokens: 512 } } });
    await manager.complete("hi");
    expect(fake.completeMock.mock.calls[0]?.[1]).toMatchObject({ temperature: 0.2, max_tokens: 512 });
  });

  it("prepends the system prompt unless one is present", async () => {
    const { manager, fake } = setup();
    await manager.complete("hi", { system_prompt: "Be brief." });
    await manager.chat([systemMessage("Existing."), userMessage("hi")], { system_prompt: "Be brief." });

    expect(fake.completeMock.mock.calls[0]?.[0]).toEqual([systemMessage("Be brief."), userMessage("hi")]);
    expect(fake.completeMock.mock.calls[1]?.[0]).toEqual([systemMessage("Existing."), userMessage("hi")]);
  });

  it("maps catalog identifiers to vendor model ids", async () => {
    const catalog = new ModelCatalog([
      { identifier: "fake-large", provider: "fake", model_id: "fake-large-v2" },
      { identifier: "fake-small", provider: "fake", model_id: "fake-small-v1", is_default: true },
    ]);
    const { manager, fake } = setup({ options: { catalog } });

    await manager.complete("a", { model: "fake-large" });
    await manager.complete("b");

    expect(fake.completeMock.mock.calls[0]?.[1].model).toBe("fake-large-v2");
    expect(fake.completeMock.mock.calls[1]?.[1].model).toBe("fake-small-v1");
  });

  it("prices usage from the catalog", async () => {
    const catalog = new ModelCatalog([
      {
        identifier: "priced",
        provider: "fake",
        model_id: "fake-model",
        input_cost_per_million: 100_000,
        output_cost_per_million: 200_000,
      },
    ]);
    const { manager, usage } = setup({ options: { catalog } });
    const response = await manager.complete("hi");

    // (100000 * 10 + 200000 * 5) / 1e6
    expect(response.usage.estimated_cost).toBe(2);
    expect(usage.entries[0]?.estimated_cost).toBe(2);
  });

  it("clamps options a before_request listener edits", async () => {
    const { manager, fake } = setup();
    manager.on("before_request", (event) => {
      event.options = { ...event.options, temperature: 5 };
    });
    await manager.complete("hi");
    expect(fake.completeMock.mock.calls[0]?.[1].temperature).toBe(2);
  });

  it("routes to an explicitly requested provider", async () => {
    const { manager, registry } = setup();
    const other = new FakeAdapter("other");
    registry.register({
      descriptor: createProviderDescriptor({ identifier: "other", adapter_type: "custom" }),
      adapter: other,
      hasCredential: true,
    });

    const response = await manager.complete("hi", { provider: "other" });
    expect(response.content).toBe("reply from other");
    expect(other.completeMock).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// Caching
// ---------------------------------------------------------------------------

describe("LlmServiceManager caching", () => {
  it("serves a repeated deterministic completion from cache", async () => {
    const { manager, fake, usage, events } = setup({ options: withCache() });

    const first = await manager.complete("hi", { temperature: 0 });
    const second = await manager.complete("hi", { temperature: 0 });

    expect(fake.completeMock).toHaveBeenCalledTimes(1);
    expect(second.content).toBe(first.content);
    expect(usage.entries).toHaveLength(1);
    expect(events.map((e) => [e.cached, e.attempts])).toEqual([
      [false, 1],
      [true, 0],
    ]);
  });

  it("bypasses the cache for a sampled call after cached ones", async () => {
    const { manager, fake, events } = setup({ options: withCache() });

    await manager.complete("hi", { temperature: 0 });
    await manager.complete("hi", { temperature: 0 });
    await manager.complete("hi", { temperature: 0.7 });

    expect(fake.completeMock).toHaveBeenCalledTimes(2);
    expect(fake.completeMock.mock.calls[1]?.[1].temperature).toBe(0.7);
    expect(events.map((e) => e.cached)).toEqual([false, true, false]);
  });

  it("never caches sampled completions", async () => {
    const { manager, fake } = setup({ options: withCache() });
    await manager.complete("hi");
    await manager.complete("hi");
    expect(fake.completeMock).toHaveBeenCalledTimes(2);
  });

  it("caches embeddings unless cache_ttl is 0", async () => {
    const { manager, fake } = setup({ options: withCache() });
    await manager.embed("text");
    await manager.embed("text");
    expect(fake.embedMock).toHaveBeenCalledTimes(1);

    await manager.embed("text", { cache_ttl: 0 });
    expect(fake.embedMock).toHaveBeenCalledTimes(2);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe("LlmServiceManager failures", () => {
  it("retries a retryable failure within the provider budget", async () => {
    const { manager, fake, events, logger } = setup();
    fake.completeMock.mockRejectedValueOnce(new TransportError("socket hang up", { provider: "fake" }));

    const response = await manager.complete("hi");
    expect(response.content).toBe("reply from fake");
    expect(fake.completeMock).toHaveBeenCalledTimes(2);
    expect(events[0]?.attempts).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith(
      "Retrying after retryable error",
      expect.objectContaining({ provider: "fake", retry: 1, error: "socket hang up" }),
    );
  });

  it("gives up after max_retries", async () => {
    const { manager, fake } = setup({ descriptor: { max_retries: 1 } });
    fake.completeMock.mockRejectedValue(new TransportError("down", { provider: "fake" }));

    await expect(manager.complete("hi")).rejects.toBeInstanceOf(TransportError);
    expect(fake.completeMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry authentication failures and reports them", async () => {
    const { manager, fake, events } = setup();
    fake.completeMock.mockRejectedValue(
      new AuthenticationError("Invalid API key", { provider: "fake", status_code: 401 }),
    );

    await expect(manager.complete("hi")).rejects.toBeInstanceOf(AuthenticationError);
    expect(fake.completeMock).toHaveBeenCalledTimes(1);
    expect(events[0]?.error?.message).toBe("Invalid API key");
    expect(events[0]?.cached).toBe(false);
  });

  it("does not retry a fault raised inside the adapter", async () => {
    const { manager, fake, logger } = setup({ descriptor: { max_retries: 3 } });
    fake.completeMock.mockRejectedValue(new TypeError("Cannot read properties of undefined"));

    const error = await manager.complete("hi").catch((err: unknown) => err);
    expect(fake.completeMock).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(LlmError);
    expect(error).not.toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: "Cannot read properties of undefined",
      provider: "fake",
      retryable: false,
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("retries HTTP 429 up to max_retries, then surfaces it", async () => {
    const adapter = new OpenAICompatibleAdapter({
      id: "limited",
      baseUrl: "https://api.test/v1",
      apiKey: "test-secret",
    });
    const { manager, events } = setup({ adapter, descriptor: { max_retries: 2 } });
    const fetch = mockFetch(
      jsonResponse({ error: { message: "Slow down" } }, 429),
      jsonResponse({ error: { message: "Slow down" } }, 429),
      jsonResponse({ error: { message: "Slow down" } }, 429),
    );

    const error = await manager.complete("hi").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RateLimitError);
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(events[0]).toMatchObject({ attempts: 3, cached: false });
  });

  it("waits for the Retry-After hint before retrying a 429", async () => {
    vi.useFakeTimers();
    const adapter = new OpenAICompatibleAdapter({
      id: "limited",
      baseUrl: "https://api.test/v1",
      apiKey: "test-secret",
    });
    const { manager, logger } = setup({ adapter, descriptor: { max_retries: 1 } });
    const fetch = mockFetch(
      jsonResponse({ error: { message: "Slow down" } }, 429, { "Retry-After": "2" }),
      jsonResponse({ choices: [{ message: { content: "done" }, finish_reason: "stop" }] }),
    );

    const pending = manager.complete("hi");
    await vi.advanceTimersByTimeAsync(1_999);
    expect(fetch).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);

    await expect(pending).resolves.toMatchObject({ content: "done" });
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      "Retrying after retryable error",
      expect.objectContaining({ provider: "limited", delay_ms: 2000 }),
    );
  });

  it("keeps the Gemini key out of transport errors and logs", async () => {
    const adapter = new GeminiAdapter({
      id: "gemini",
      baseUrl: "https://generativelanguage.googleapis.com/v1beta",
      apiKey: "test-secret",
    });
    const { manager, logger } = setup({ adapter, descriptor: { max_retries: 0 } });
    const fetch = mockFetch();
    fetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    const error = await manager.complete("hi").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message:
        "Request to https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent failed: fetch failed",
    });
    expect(logger.error).toHaveBeenCalledWith("chat call failed", error, {
      provider: "gemini",
      model: "gemini-2.5-flash",
      attempts: 1,
    });
    expect(sentRequest(fetch).url).not.toContain("test-secret");
  });

  it("rejects capabilities the adapter lacks", async () => {
    const { manager } = setup({ adapter: new ChatOnlyAdapter("plain") });

    await expect(manager.embed("x")).rejects.toBeInstanceOf(UnsupportedCapabilityError);
    await expect(manager.vision([textPart("x")])).rejects.toThrow(
      'Provider "plain" does not support vision',
    );
    await expect(manager.chatWithTools([userMessage("x")], [weatherTool])).rejects.toBeInstanceOf(
      UnsupportedCapabilityError,
    );
    expect(() => manager.streamChat([userMessage("x")])).toThrow(UnsupportedCapabilityError);
    expect(manager.supportsFeature("chat")).toBe(true);
    expect(manager.supportsFeature("embedding")).toBe(false);
  });

  it("keeps the response when usage recording fails", async () => {
    const { manager, logger } = setup({
      options: { usage: { record: () => Promise.reject(new Error("db down")) } },
    });

    await expect(manager.complete("hi")).resolves.toMatchObject({ content: "reply from fake" });
    await vi.waitFor(() => {
      expect(logger.warn).toHaveBeenCalledWith("Usage recording failed", {
        provider: "fake",
        feature: "chat",
        error: "Error: db down",
      });
    });
  });
});

// ---------------------------------------------------------------------------
// Other operations
// ---------------------------------------------------------------------------

describe("LlmServiceManager operations", () => {
  it("records the feature and characters of the call context", async () => {
    const { manager, usage } = setup();
    await manager.complete("hola", {}, { feature: "translation", characters: 4 });
    expect(usage.entries[0]).toMatchObject({
      feature: "translation",
      provider: "fake",
      model: "fake-model",
      prompt_tokens: 10,
      completion_tokens: 5,
      total_tokens: 15,
      characters: 4,
    });
  });

  it("embeds a batch in input order", async () => {
    const { manager, fake } = setup();
    const response = await manager.embed(["a", "b"]);
    expect(response.vectors).toEqual([
      [1, 0],
      [2, 0],
    ]);
    expect(fake.embedMock.mock.calls[0]?.[1]).toMatchObject({ model: "fake-embed", cache_ttl: 86_400 });
  });

  it("refuses an empty embedding batch", async () => {
    const { manager } = setup();
    await expect(manager.embed([])).rejects.toBeInstanceOf(LlmError);
  });

  it("sends vision content to the adapter", async () => {
    const { manager, fake, usage } = setup();
    const content = [textPart("What is this?"), imagePart("https://img.test/cat.png", "low")];
    const response = await manager.vision(content, { max_tokens: 50 });

    expect(response.description).toBe("image seen by fake");
    expect(fake.visionMock.mock.calls[0]?.[0]).toEqual(content);
    expect(fake.visionMock.mock.calls[0]?.[1]).toMatchObject({ max_tokens: 50, detail_level: "auto" });
    expect(usage.entries[0]?.feature).toBe("vision");
  });

  it("passes tools and the tool choice through", async () => {
    const { manager, fake } = setup();
    const response = await manager.chatWithTools([userMessage("weather?")], [weatherTool], {
      tool_choice: "required",
    });
    expect(response.finish_reason).toBe("tool_calls");
    expect(fake.toolsMock.mock.calls[0]?.[1]).toEqual([weatherTool]);
    expect(fake.toolsMock.mock.calls[0]?.[2].tool_choice).toBe("required");
  });
});

// ---------------------------------------------------------------------------
// Streaming
// ---------------------------------------------------------------------------

describe("LlmServiceManager.streamChat", () => {
  it("yields deltas and records usage from the finish chunk", async () => {
    const { manager, fake, usage, events } = setup();
    fake.streamMock.mockReturnValue(
      chunks(
        { type: "text_delta", delta: "Hel" },
        { type: "text_delta", delta: "lo" },
        { type: "finish", finish_reason: "stop", usage: UsageStatistics.fromTokens(3, 2) },
      ),
    );

    const parts = await collect(manager.streamChat([userMessage("hi")]));
    expect(parts.join("")).toBe("Hello");
    expect(usage.entries[0]).toMatchObject({ feature: "stream", total_tokens: 5 });
    expect(events[0]).toMatchObject({ operation: "stream", streamed: true, attempts: 1 });
  });

  it("reports a stream the consumer stopped early", async () => {
    const { manager, fake, usage, events } = setup();
    const source = chunks(
      { type: "text_delta", delta: "a" },
      { type: "text_delta", delta: "b" },
      { type: "finish", finish_reason: "stop", usage: UsageStatistics.fromTokens(3, 2) },
    );
    fake.streamMock.mockReturnValue(source);

    const seen: string[] = [];
    for await (const delta of manager.streamChat([userMessage("hi")])) {
      seen.push(delta);
      break;
    }

    expect(seen).toEqual(["a"]);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      operation: "stream",
      streamed: true,
      cancelled: true,
      attempts: 1,
      usage: undefined,
    });
    expect(events[0]?.error).toBeUndefined();
    expect(usage.entries).toHaveLength(0);
    expect(await source.next()).toEqual({ value: undefined, done: true });
  });

  it("does not mark a stream read to its end as cancelled", async () => {
    const { manager, fake, events } = setup();
    fake.streamMock.mockReturnValue(chunks({ type: "text_delta", delta: "x" }));
    await collect(manager.streamChat([userMessage("hi")]));
    expect(events[0]?.cancelled).toBe(false);
  });

  it("streams the same text a blocking call returns", async () => {
    const adapter = new OpenAICompatibleAdapter({
      id: "openai",
      baseUrl: "https://api.test/v1",
      apiKey: "test-secret",
    });
    const { manager } = setup({ adapter });
    mockFetch(
      jsonResponse({
        model: "gpt-4o-mini",
        choices: [{ message: { content: "Hello there" }, finish_reason: "stop" }],
        usage: { prompt_tokens: 4, completion_tokens: 2 },
      }),
      sseResponse(
        [
          { model: "gpt-4o-mini", choices: [{ delta: { content: "Hello" }, finish_reason: null }] },
          { choices: [{ delta: { content: " there" }, finish_reason: "stop" }] },
          { choices: [], usage: { prompt_tokens: 4, completion_tokens: 2 } },
        ],
        ["data: [DONE]\n\n"],
      ),
    );

    const blocking = await manager.chat([userMessage("hi")]);
    const streamed = await collect(manager.streamChat([userMessage("hi")]));
    expect(streamed.join("")).toBe(blocking.content);
    expect(blocking.content).toBe("Hello there");
  });

  it("retries a failure before the first chunk", async () => {
    const { manager, fake } = setup();
    fake.streamMock
      .mockImplementationOnce(async function* (): AsyncIterableIterator<StreamChunk> {
        throw new TransportError("reset", { provider: "fake" });
      })
      .mockReturnValueOnce(chunks({ type: "text_delta", delta: "ok" }));

    expect(await collect(manager.streamChat([userMessage("hi")]))).toEqual(["ok"]);
    expect(fake.streamMock).toHaveBeenCalledTimes(2);
  });

  it("surfaces a failure after the first chunk without retrying", async () => {
    const { manager, fake, events } = setup();
    fake.streamMock.mockImplementation(async function* (): AsyncIterableIterator<StreamChunk> {
      yield { type: "text_delta", delta: "partial" };
      throw new TransportError("cut", { provider: "fake" });
    });

    const seen: string[] = [];
    const consume = (async () => {
      for await (const delta of manager.streamChat([userMessage("hi")])) seen.push(delta);
    })();
    await expect(consume).rejects.toThrow("cut");
    expect(seen).toEqual(["partial"]);
    expect(fake.streamMock).toHaveBeenCalledTimes(1);
    expect(events[0]?.error).toBeInstanceOf(TransportError);
  });
});

// ---------------------------------------------------------------------------
// Configurations
// ---------------------------------------------------------------------------

describe("LlmServiceManager configurations", () => {
  function withSecondProvider() {
    const catalog = new ModelCatalog([
      { identifier: "fake-large", provider: "fake", model_id: "fake-large-v2", context_length: 32_000 },
      {
        identifier: "second-long",
        provider: "second",
        model_id: "second-long-v1",
        context_length: 200_000,
        capabilities: ["chat", "vision"],
      },
      {
        identifier: "fake-cheap",
        provider: "fake",
        model_id: "fake-cheap-v1",
        context_length: 128_000,
        input_cost_per_million: 100,
        output_cost_per_million: 200,
      },
    ]);
    const context = setup({ options: { catalog } });
    const second = new FakeAdapter("second");
    context.registry.register({
      descriptor: createProviderDescriptor({ identifier: "second", adapter_type: "custom", priority: 50 }),
      adapter: second,
      hasCredential: true,
    });
    return { ...context, second };
  }

  it("applies a fixed model, its provider and the tuning", async () => {
    const { manager, fake } = withSecondProvider();
    await manager.completeWithConfiguration("Long text", {
      identifier: "summaries",
      model: "fake-large",
      system_prompt: "Summarize.",
      temperature: 0.2,
      max_tokens: 300,
    });

    expect(fake.completeMock.mock.calls[0]?.[0]).toEqual([systemMessage("Summarize."), userMessage("Long text")]);
    expect(fake.completeMock.mock.calls[0]?.[1]).toMatchObject({
      provider: "fake",
      model: "fake-large-v2",
      temperature: 0.2,
      max_tokens: 300,
    });
  });

  it("selects the model by criteria among available providers", async () => {
    const { manager, fake, second } = withSecondProvider();
    const configuration = { identifier: "long-context", criteria: { min_context_length: 100_000 } };

    expect(manager.configurationOptions(configuration)).toMatchObject({
      provider: "second",
      model: "second-long",
    });
    await manager.chatWithConfiguration([userMessage("hi")], configuration);
    expect(second.completeMock.mock.calls[0]?.[1].model).toBe("second-long-v1");
    expect(fake.completeMock).not.toHaveBeenCalled();
  });

  it("streams through the configured provider", async () => {
    const { manager, second } = withSecondProvider();
    second.streamMock.mockReturnValue(chunks({ type: "text_delta", delta: "seen" }));

    const parts = await collect(
      manager.streamChatWithConfiguration([userMessage("hi")], {
        identifier: "vision-chat",
        criteria: { capabilities: ["vision"] },
      }),
    );
    expect(parts).toEqual(["seen"]);
    expect(second.streamMock.mock.calls[0]?.[1].model).toBe("second-long-v1");
  });

  it("rejects an inactive configuration or one nothing satisfies", () => {
    const { manager } = withSecondProvider();
    expect(() => manager.configurationOptions({ identifier: "old", model: "fake-large", active: false })).toThrow(
      new ConfigurationError('Configuration "old" is inactive'),
    );
    expect(() =>
      manager.configurationOptions({ identifier: "huge", criteria: { min_context_length: 1_000_000 } }),
    ).toThrow('No model meets the selection criteria of configuration "huge"');
  });
});

// ---------------------------------------------------------------------------
// Introspection and construction
// ---------------------------------------------------------------------------

describe("LlmServiceManager introspection", () => {
  it("summarizes providers", () => {
    const { manager } = setup({ descriptor: { priority: 7 } });
    expect(manager.getProviderList()).toEqual([
      {
        identifier: "fake",
        name: "fake",
        adapter_type: "custom",
        priority: 7,
        active: true,
        available: true,
        is_default: false,
        capabilities: ["chat", "embedding", "vision", "streaming", "tools", "json_mode"],
      },
    ]);
    expect(manager.hasAvailableProvider()).toBe(true);
  });

  it("resolves options without sending", () => {
    const { manager, fake } = setup();
    expect(manager.resolveOptions({ operation: "chat" })).toMatchObject({
      provider: "fake",
      model: "fake-model",
      max_tokens: 4096,
    });
    expect(manager.resolveOptions({ operation: "chat", options: { max_tokens: 0 } })).toMatchObject({
      max_tokens: 1,
    });
    expect(manager.resolveOptions({ operation: "embedding" })).toMatchObject({ model: "fake-embed" });
    expect(fake.completeMock).not.toHaveBeenCalled();
  });

  it("builds from a configuration source", async () => {
    const logger = spyLogger();
    const source = new InMemoryConfigurationSource({
      providers: [
        { identifier: "primary", adapter_type: "openai", credential_ref: "PRIMARY_KEY", priority: 10 },
        { identifier: "nokey", adapter_type: "anthropic", credential_ref: "MISSING_KEY", priority: 50 },
        { identifier: "local", adapter_type: "ollama", priority: 1 },
        { identifier: "broken", adapter_type: "custom" },
      ],
      credentials: { PRIMARY_KEY: "test-secret" },
      defaultProvider: "local",
    });

    const manager = await LlmServiceManager.fromConfiguration(source, { logger });
    const list = manager.getProviderList();

    expect(list.map((p) => [p.identifier, p.available, p.is_default])).toEqual([
      ["primary", true, false],
      ["nokey", false, false],
      ["local", true, true],
    ]);
    expect(manager.getAvailableProviders().map((p) => p.identifier)).toEqual(["primary", "local"]);
    expect(logger.error).toHaveBeenCalledWith(
      "Skipping provider with invalid configuration",
      expect.any(Error),
      { provider: "broken" },
    );
  });
});
