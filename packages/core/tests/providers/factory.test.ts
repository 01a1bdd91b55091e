import { describe, it, expect, afterEach, vi } from "vitest";
import {
  AdapterFactory,
  DEFAULT_ENDPOINTS,
  adapterConfig,
  createAdapter,
  requiresCredential,
} from "../../src/providers/factory.js";
import { adapterCapabilities, supportsEmbeddings } from "../../src/providers/adapter.js";
import { AnthropicAdapter } from "../../src/providers/anthropic/index.js";
import { AzureOpenAIAdapter } from "../../src/providers/azure-openai/index.js";
import { GeminiAdapter } from "../../src/providers/gemini/index.js";
import { OllamaAdapter } from "../../src/providers/ollama/index.js";
import { OpenAICompatibleAdapter } from "../../src/providers/openai-compatible/index.js";
import { createProviderDescriptor } from "../../src/types/descriptors.js";
import type { AdapterType } from "../../src/types/enums.js";
import { ConfigurationError } from "../../src/types/errors.js";
import { userMessage } from "../../src/types/message.js";
import type { Logger } from "../../src/utils/logger.js";
import { jsonResponse, mockFetch, sentRequest } from "../helpers.js";
import { chatOptions } from "./fixtures.js";

afterEach(() => {
  vi.unstubAllGlobals();
});

function spyLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("adapterConfig", () => {
  it("fills the dialect endpoint and preset models", () => {
    const config = adapterConfig(
      createProviderDescriptor({ identifier: "mistral-eu", adapter_type: "mistral" }),
      "test-secret",
    );
    expect(config).toMatchObject({
      id: "mistral-eu",
      name: "mistral-eu",
      baseUrl: DEFAULT_ENDPOINTS.mistral,
      apiKey: "test-secret",
      timeoutMs: 30_000,
      defaultModel: "mistral-large-latest",
      defaultEmbeddingModel: "mistral-embed",
    });
  });

  it("lets descriptor options override the preset models", () => {
    const config = adapterConfig(
      createProviderDescriptor({
        identifier: "openai",
        adapter_type: "openai",
        endpoint: "https://proxy.internal/v1",
        options: { default_model: "gpt-4o" },
      }),
      undefined,
    );
    expect(config.baseUrl).toBe("https://proxy.internal/v1");
    expect(config.defaultModel).toBe("gpt-4o");
  });
});

describe("requiresCredential", () => {
  it("is false only for keyless dialects", () => {
    expect(requiresCredential("ollama")).toBe(false);
    expect(requiresCredential("custom")).toBe(false);
    expect(requiresCredential("anthropic")).toBe(true);
  });
});

describe("AdapterFactory", () => {
  it("builds the adapter class for each dialect", () => {
    const factory = new AdapterFactory();
    const build = (identifier: string, adapter_type: AdapterType, endpoint = "") =>
      factory.create(createProviderDescriptor({ identifier, adapter_type, endpoint }), "test-secret");

    expect(build("a", "anthropic")).toBeInstanceOf(AnthropicAdapter);
    expect(build("g", "gemini")).toBeInstanceOf(GeminiAdapter);
    expect(build("o", "ollama")).toBeInstanceOf(OllamaAdapter);
    expect(build("z", "azure_openai", "https://r.openai.azure.com")).toBeInstanceOf(AzureOpenAIAdapter);
    expect(build("m", "mistral")).toBeInstanceOf(OpenAICompatibleAdapter);
  });

  it("gives Groq no embedding capability", () => {
    const groq = createAdapter(
      createProviderDescriptor({ identifier: "groq", adapter_type: "groq" }),
      "test-secret",
    );
    expect(supportsEmbeddings(groq)).toBe(false);
    expect(adapterCapabilities(groq)).toEqual(["chat", "vision", "streaming", "tools", "json_mode"]);
  });

  it("caches instances per identifier until cleared", () => {
    const factory = new AdapterFactory();
    const descriptor = createProviderDescriptor({ identifier: "openai", adapter_type: "openai" });

    const first = factory.create(descriptor, "test-secret");
    expect(factory.create(descriptor, "test-secret")).toBe(first);

    factory.clearCache("openai");
    expect(factory.create(descriptor, "test-secret")).not.toBe(first);
  });

  it("rebuilds the adapter when the credential or endpoint changes", async () => {
    const factory = new AdapterFactory();
    const descriptor = createProviderDescriptor({ identifier: "openai", adapter_type: "openai" });
    const first = factory.create(descriptor, "test-secret");

    const rotated = factory.create(descriptor, "test-secret-2");
    expect(rotated).not.toBe(first);
    const moved = factory.create(
      createProviderDescriptor({ identifier: "openai", adapter_type: "openai", endpoint: "https://proxy.test/v1" }),
      "test-secret-2",
    );
    expect(moved).not.toBe(rotated);

    const fetch = mockFetch(
      jsonResponse({ choices: [{ message: { content: "ok" }, finish_reason: "stop" }] }),
    );
    await rotated.complete([userMessage("x")], chatOptions());
    expect(sentRequest(fetch).headers["authorization"]).toBe("Bearer test-secret-2");
  });

  it("rejects a custom provider without an endpoint", () => {
    expect(() =>
      createAdapter(createProviderDescriptor({ identifier: "local", adapter_type: "custom" })),
    ).toThrow(ConfigurationError);
  });

  it("falls back to the OpenAI-compatible adapter for a type without a builder", () => {
    const logger = spyLogger();
    const factory = new AdapterFactory({ logger, builders: {} });

    const adapter = factory.create(
      createProviderDescriptor({ identifier: "x", adapter_type: "mistral" }),
      "test-secret",
    );

    expect(adapter).toBeInstanceOf(OpenAICompatibleAdapter);
    expect(logger.warn).toHaveBeenCalledWith("Unknown adapter type, using OpenAI-compatible adapter", {
      provider: "x",
      adapter_type: "mistral",
    });
  });

  it("uses a registered builder", () => {
    const factory = new AdapterFactory();
    const custom = new OllamaAdapter({ id: "stub", baseUrl: "http://127.0.0.1:1" });
    factory.register("openai", () => custom);

    expect(
      factory.create(createProviderDescriptor({ identifier: "openai", adapter_type: "openai" })),
    ).toBe(custom);
  });

  it("sends OpenRouter attribution headers", async () => {
    const fetch = mockFetch(jsonResponse({ choices: [{ message: { content: "ok" } }] }));
    const adapter = createAdapter(
      createProviderDescriptor({
        identifier: "openrouter",
        adapter_type: "openrouter",
        options: { site_url: "https://example.com", app_name: "Switchboard Demo" },
      }),
      "test-secret",
    );

    await adapter.complete([userMessage("x")], chatOptions());

    const sent = sentRequest(fetch);
    expect(sent.url).toBe("https://openrouter.ai/api/v1/chat/completions");
    expect(sent.headers["http-referer"]).toBe("https://example.com");
    expect(sent.headers["x-title"]).toBe("Switchboard Demo");
  });
});
