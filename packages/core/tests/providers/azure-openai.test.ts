import { describe, it, expect, afterEach, vi } from "vitest";
import { AzureOpenAIAdapter } from "../../src/providers/azure-openai/index.js";
import { ConfigurationError } from "../../src/types/errors.js";
import { userMessage } from "../../src/types/message.js";
import { jsonResponse, mockFetch, sentRequest } from "../helpers.js";
import { chatOptions, embeddingOptions } from "./fixtures.js";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("AzureOpenAIAdapter", () => {
  const adapter = new AzureOpenAIAdapter({
    id: "azure",
    baseUrl: "https://contoso.openai.azure.com",
    apiKey: "test-secret",
    options: { api_version: "2024-06-01" },
  });

  it("requires an endpoint", () => {
    expect(() => new AzureOpenAIAdapter({ id: "azure", baseUrl: "" })).toThrow(ConfigurationError);
  });

  it("routes chat to the deployment with api-version and api-key", async () => {
    const fetch = mockFetch(
      jsonResponse({ choices: [{ message: { content: "hi" }, finish_reason: "stop" }] }),
    );

    await adapter.complete([userMessage("hello")], chatOptions({ model: "my gpt4o" }));

    const sent = sentRequest(fetch);
    expect(sent.url).toBe(
      "https://contoso.openai.azure.com/openai/deployments/my%20gpt4o/chat/completions?api-version=2024-06-01",
    );
    expect(sent.headers["api-key"]).toBe("test-secret");
    expect(sent.headers["authorization"]).toBeUndefined();
  });

  it("routes embeddings to the deployment", async () => {
    const fetch = mockFetch(jsonResponse({ data: [{ index: 0, embedding: [1, 2, 3] }] }));

    const response = await adapter.embed(["text"], embeddingOptions({ model: "embed-small" }));

    expect(sentRequest(fetch).url).toBe(
      "https://contoso.openai.azure.com/openai/deployments/embed-small/embeddings?api-version=2024-06-01",
    );
    expect(response.dimensions).toBe(3);
  });

  it("falls back to the default api version", async () => {
    const fetch = mockFetch(jsonResponse({ choices: [] }));
    const plain = new AzureOpenAIAdapter({ id: "azure", baseUrl: "https://r.openai.azure.com/" });

    await plain.complete([userMessage("x")], chatOptions({ model: "d" }));

    expect(sentRequest(fetch).url).toBe(
      "https://r.openai.azure.com/openai/deployments/d/chat/completions?api-version=2024-10-21",
    );
  });
});
