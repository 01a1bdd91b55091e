/**
 * Shared fixtures for adapter and orchestrator tests: canned fetch
 * responses, byte streams and a scriptable in-process adapter.
 */

import { vi } from "vitest";
import type {
  EmbeddingCapable,
  ProviderAdapter,
  StreamingCapable,
  ToolCapable,
  VisionCapable,
} from "../src/providers/adapter.js";
import { AdapterType } from "../src/types/enums.js";
import type { ContentPart, Message } from "../src/types/message.js";
import type {
  ResolvedChatOptions,
  ResolvedEmbeddingOptions,
  ResolvedToolOptions,
  ResolvedVisionOptions,
} from "../src/types/request.js";
import {
  CompletionResponse,
  EmbeddingResponse,
  UsageStatistics,
  VisionResponse,
} from "../src/types/response.js";
import type { StreamChunk } from "../src/types/stream.js";
import type { ToolDefinition } from "../src/types/tool.js";

// ---------------------------------------------------------------------------
// fetch stand-ins
// ---------------------------------------------------------------------------

export type FetchMock = ReturnType<typeof mockFetch>;

/** Stub the global fetch with a mock answering each call from `responses` in turn. */
export function mockFetch(...responses: Response[]) {
  const fn = vi.fn<(input: RequestInfo | URL, init?: RequestInit) => Promise<Response>>();
  for (const response of responses) {
    fn.mockResolvedValueOnce(response);
  }
  vi.stubGlobal("fetch", fn);
  return fn;
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function chunkedStream(chunks: readonly string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

/** An SSE response with one `data:` event per payload. */
export function sseResponse(payloads: readonly unknown[], tail: readonly string[] = []): Response {
  const events = payloads.map((payload) => `data: ${JSON.stringify(payload)}\n\n`);
  return new Response(chunkedStream([...events, ...tail]), {
    status: 200,
    headers: { "Content-Type": "text/event-stream" },
  });
}

export function ndjsonResponse(records: readonly unknown[]): Response {
  return new Response(chunkedStream(records.map((record) => `${JSON.stringify(record)}\n`)), {
    status: 200,
    headers: { "Content-Type": "application/x-ndjson" },
  });
}

/** URL and parsed JSON body of the nth fetch call. */
export function sentRequest(
  fn: FetchMock,
  index = 0,
): { url: string; body: unknown; headers: Record<string, string> } {
  const call = fn.mock.calls[index];
  if (!call) throw new Error(`fetch was not called ${index + 1} time(s)`);
  const [input, init] = call;
  const rawBody = init?.body;
  const headers: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    headers[key] = value;
  });
  return {
    url: String(input),
    body: typeof rawBody === "string" ? JSON.parse(rawBody) : undefined,
    headers,
  };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

// ---------------------------------------------------------------------------
// Scriptable adapter
// ---------------------------------------------------------------------------

export function completion(content: string, overrides: Partial<{
  model: string;
  provider: string;
  finish_reason: CompletionResponse["finish_reason"];
  prompt_tokens: number;
  completion_tokens: number;
}> = {}): CompletionResponse {
  return new CompletionResponse({
    content,
    model: overrides.model ?? "fake-model",
    provider: overrides.provider ?? "fake",
    finish_reason: overrides.finish_reason,
    usage: UsageStatistics.fromTokens(overrides.prompt_tokens ?? 10, overrides.completion_tokens ?? 5),
  });
}

/**
 * Adapter with every capability, answering from vi.fn mocks. Tests script
 * the mocks per case.
 */
export class FakeAdapter
  implements ProviderAdapter, EmbeddingCapable, VisionCapable, StreamingCapable, ToolCapable
{
  readonly type = AdapterType.CUSTOM;
  readonly name: string;
  readonly defaultModel = "fake-model";
  readonly defaultEmbeddingModel = "fake-embed";

  readonly completeMock = vi.fn<
    (messages: readonly Message[], options: ResolvedChatOptions) => Promise<CompletionResponse>
  >();
  readonly toolsMock = vi.fn<
    (
      messages: readonly Message[],
      tools: readonly ToolDefinition[],
      options: ResolvedToolOptions,
    ) => Promise<CompletionResponse>
  >();
  readonly embedMock = vi.fn<
    (inputs: readonly string[], options: ResolvedEmbeddingOptions) => Promise<EmbeddingResponse>
  >();
  readonly visionMock = vi.fn<
    (content: readonly ContentPart[], options: ResolvedVisionOptions) => Promise<VisionResponse>
  >();
  readonly streamMock = vi.fn<
    (messages: readonly Message[], options: ResolvedChatOptions) => AsyncIterableIterator<StreamChunk>
  >();

  constructor(readonly id: string) {
    this.name = id;
    this.completeMock.mockImplementation(async (_messages, options) =>
      completion(`reply from ${id}`, { model: options.model, provider: id }),
    );
    this.embedMock.mockImplementation(async (inputs, options) =>
      new EmbeddingResponse({
        vectors: inputs.map((_, i) => [i + 1, 0]),
        model: options.model,
        usage: UsageStatistics.fromTokens(inputs.length, 0),
        provider: id,
      }),
    );
    this.visionMock.mockImplementation(async (_content, options) =>
      new VisionResponse({
        description: `image seen by ${id}`,
        model: options.model,
        usage: UsageStatistics.fromTokens(20, 8),
        provider: id,
      }),
    );
    this.toolsMock.mockImplementation(async (_messages, _tools, options) =>
      completion("", { model: options.model, provider: id, finish_reason: "tool_calls" }),
    );
  }

  complete(messages: readonly Message[], options: ResolvedChatOptions): Promise<CompletionResponse> {
    return this.completeMock(messages, options);
  }

  completeWithTools(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: ResolvedToolOptions,
  ): Promise<CompletionResponse> {
    return this.toolsMock(messages, tools, options);
  }

  embed(inputs: readonly string[], options: ResolvedEmbeddingOptions): Promise<EmbeddingResponse> {
    return this.embedMock(inputs, options);
  }

  analyzeImage(content: readonly ContentPart[], options: ResolvedVisionOptions): Promise<VisionResponse> {
    return this.visionMock(content, options);
  }

  stream(messages: readonly Message[], options: ResolvedChatOptions): AsyncIterableIterator<StreamChunk> {
    return this.streamMock(messages, options);
  }
}

/** Chat-only adapter, for capability checks. */
export class ChatOnlyAdapter implements ProviderAdapter {
  readonly type = AdapterType.CUSTOM;
  readonly name: string;
  readonly defaultModel = "chat-only";

  constructor(readonly id: string) {
    this.name = id;
  }

  async complete(_messages: readonly Message[], options: ResolvedChatOptions): Promise<CompletionResponse> {
    return completion("plain", { model: options.model, provider: this.id });
  }
}
