import { describe, it, expect, afterEach, vi } from "vitest";
import { AnthropicAdapter } from "../../src/providers/anthropic/index.js";
import {
  translateMessages,
  translateRequest,
  translateToolRequest,
  translateVisionRequest,
} from "../../src/providers/anthropic/translate-request.js";
import { translateResponse } from "../../src/providers/anthropic/translate-response.js";
import { translateStream } from "../../src/providers/anthropic/stream.js";
import { supportsEmbeddings, supportsStreaming } from "../../src/providers/adapter.js";
import {
  assistantMessage,
  imagePart,
  systemMessage,
  textPart,
  toolMessage,
  userMessage,
} from "../../src/types/message.js";
import { RateLimitError } from "../../src/types/errors.js";
import type { SSEEvent } from "../../src/utils/sse.js";
import { collect, jsonResponse, mockFetch, sentRequest } from "../helpers.js";
import { chatOptions, toolOptions, visionOptions, weatherTool } from "./fixtures.js";

afterEach(() => {
  vi.unstubAllGlobals();
});

async function* events(list: SSEEvent[]): AsyncIterableIterator<SSEEvent> {
  for (const event of list) {
    yield event;
  }
}

function event(type: string, data: Record<string, unknown>): SSEEvent {
  return { event: type, data: JSON.stringify({ type, ...data }) };
}

// ===========================================================================
// Request translation
// ===========================================================================

describe("Anthropic translate-request", () => {
  it("lifts system messages into the system field", () => {
    const translated = translateMessages([
      systemMessage("Rule one."),
      systemMessage("Rule two."),
      userMessage("Hello"),
    ]);

    expect(translated.system).toBe("Rule one.\n\nRule two.");
    expect(translated.messages).toEqual([{ role: "user", content: [{ type: "text", text: "Hello" }] }]);
  });

  it("merges consecutive same-role turns and sends tool results as user blocks", () => {
    const translated = translateMessages([
      userMessage("Weather in Oslo?"),
      assistantMessage("Checking.", [{ id: "tu_1", name: "get_weather", arguments: { city: "Oslo" } }]),
      toolMessage("tu_1", "-3C"),
      userMessage("Thanks"),
    ]);

    expect(translated.messages).toHaveLength(3);
    expect(translated.messages[1]).toEqual({
      role: "assistant",
      content: [
        { type: "text", text: "Checking." },
        { type: "tool_use", id: "tu_1", name: "get_weather", input: { city: "Oslo" } },
      ],
    });
    expect(translated.messages[2]).toEqual({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "tu_1", content: "-3C" },
        { type: "text", text: "Thanks" },
      ],
    });
  });

  it("caps temperature at 1", () => {
    const body = translateRequest([userMessage("x")], chatOptions({ temperature: 1.6 }));
    expect(body.temperature).toBe(1);
    expect(body.max_tokens).toBe(256);
  });

  it("maps required tool choice to any", () => {
    const body = translateToolRequest(
      [userMessage("x")],
      [weatherTool],
      toolOptions({ tool_choice: "required" }),
    );
    expect(body.tool_choice).toEqual({ type: "any" });
    expect(body.tools?.[0]?.input_schema).toEqual(weatherTool.parameters);
  });

  it("sends inline images as base64 sources", () => {
    const body = translateVisionRequest(
      [textPart("What is this?"), imagePart("data:image/jpeg;base64,QUJD")],
      visionOptions(),
    );
    expect(body.messages[0]?.content).toEqual([
      { type: "text", text: "What is this?" },
      { type: "image", source: { type: "base64", media_type: "image/jpeg", data: "QUJD" } },
    ]);
  });
});

// ===========================================================================
// Response translation
// ===========================================================================

describe("Anthropic translate-response", () => {
  it("joins text blocks and collects tool_use blocks", () => {
    const response = translateResponse(
      {
        id: "msg_1",
        model: "claude-sonnet-4-5-20250929",
        content: [
          { type: "text", text: "Let me check. " },
          { type: "tool_use", id: "tu_2", name: "get_weather", input: { city: "Bergen" } },
        ],
        stop_reason: "tool_use",
        usage: { input_tokens: 30, output_tokens: 12 },
      },
      "anthropic",
    );

    expect(response.content).toBe("Let me check. ");
    expect(response.finish_reason).toBe("tool_calls");
    expect(response.tool_calls).toEqual([
      { id: "tu_2", name: "get_weather", arguments: { city: "Bergen" } },
    ]);
    expect(response.usage.total_tokens).toBe(42);
  });

  it("maps max_tokens to length", () => {
    const response = translateResponse({ content: [], stop_reason: "max_tokens" }, "anthropic");
    expect(response.wasTruncated()).toBe(true);
  });
});

// ===========================================================================
// Stream translation
// ===========================================================================

describe("Anthropic translateStream", () => {
  it("emits text deltas and a finish chunk with usage", async () => {
    const chunks = await collect(
      translateStream(
        events([
          event("message_start", {
            message: { model: "claude-haiku-4-5", usage: { input_tokens: 9 } },
          }),
          event("content_block_delta", { delta: { type: "text_delta", text: "Hi" } }),
          event("content_block_delta", { delta: { type: "input_json_delta", partial_json: "{" } }),
          event("content_block_delta", { delta: { type: "text_delta", text: " there" } }),
          event("message_delta", { delta: { stop_reason: "end_turn" }, usage: { output_tokens: 3 } }),
          event("message_stop", {}),
        ]),
        "anthropic",
      ),
    );

    expect(chunks.slice(0, 2)).toEqual([
      { type: "text_delta", delta: "Hi" },
      { type: "text_delta", delta: " there" },
    ]);
    const finish = chunks[2];
    expect(finish?.type).toBe("finish");
    if (finish?.type !== "finish") return;
    expect(finish.model).toBe("claude-haiku-4-5");
    expect(finish.usage?.toJSON()).toEqual({
      prompt_tokens: 9,
      completion_tokens: 3,
      total_tokens: 12,
    });
  });

  it("maps an in-stream rate limit error", async () => {
    await expect(
      collect(
        translateStream(
          events([event("error", { error: { type: "rate_limit_error", message: "Too busy" } })]),
          "anthropic",
        ),
      ),
    ).rejects.toBeInstanceOf(RateLimitError);
  });
});

// ===========================================================================
// Adapter
// ===========================================================================

describe("AnthropicAdapter", () => {
  const adapter = new AnthropicAdapter({
    id: "anthropic",
    baseUrl: "https://api.anthropic.com/v1",
    apiKey: "test-secret",
  });

  it("posts to /messages with the version header", async () => {
    const fetch = mockFetch(
      jsonResponse({ content: [{ type: "text", text: "Hello" }], stop_reason: "end_turn" }),
    );

    const response = await adapter.complete(
      [systemMessage("Be kind."), userMessage("Hi")],
      chatOptions({ model: "claude-haiku-4-5" }),
    );

    const sent = sentRequest(fetch);
    expect(sent.url).toBe("https://api.anthropic.com/v1/messages");
    expect(sent.headers["x-api-key"]).toBe("test-secret");
    expect(sent.headers["anthropic-version"]).toBe("2023-06-01");
    expect(sent.body).toMatchObject({ model: "claude-haiku-4-5", system: "Be kind." });
    expect(response.content).toBe("Hello");
    expect(response.model).toBe("claude-haiku-4-5");
  });

  it("streams but has no embeddings", () => {
    expect(supportsStreaming(adapter)).toBe(true);
    expect(supportsEmbeddings(adapter)).toBe(false);
  });
});
