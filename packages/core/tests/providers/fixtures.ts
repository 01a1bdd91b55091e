/**
 * Resolved option objects as the orchestrator hands them to adapters.
 */

import type {
  ResolvedChatOptions,
  ResolvedEmbeddingOptions,
  ResolvedToolOptions,
  ResolvedVisionOptions,
} from "../../src/types/request.js";

export function chatOptions(overrides: Partial<ResolvedChatOptions> = {}): ResolvedChatOptions {
  return {
    provider: "test",
    model: "test-model",
    temperature: 0.7,
    max_tokens: 256,
    response_format: "text",
    ...overrides,
  };
}

export function toolOptions(overrides: Partial<ResolvedToolOptions> = {}): ResolvedToolOptions {
  return { ...chatOptions(), tools: [], tool_choice: "auto", ...overrides };
}

export function visionOptions(overrides: Partial<ResolvedVisionOptions> = {}): ResolvedVisionOptions {
  return {
    provider: "test",
    model: "test-vision",
    temperature: 0.5,
    max_tokens: 100,
    detail_level: "auto",
    ...overrides,
  };
}

export function embeddingOptions(
  overrides: Partial<ResolvedEmbeddingOptions> = {},
): ResolvedEmbeddingOptions {
  return { provider: "test", model: "test-embed", cache_ttl: 0, ...overrides };
}

export const weatherTool = {
  name: "get_weather",
  description: "Current weather for a city",
  parameters: {
    type: "object",
    properties: { city: { type: "string" } },
    required: ["city"],
  },
} as const;
