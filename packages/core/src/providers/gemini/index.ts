/**
 * Google Gemini adapter.
 *
 * POST {baseUrl}/models/{model}:generateContent, authenticated with the
 * `x-goog-api-key` header. Streams via :streamGenerateContent?alt=sse and
 * embeds via :batchEmbedContents.
 */

import { AdapterType } from "../../types/enums.js";
import type { ContentPart, Message } from "../../types/message.js";
import type {
  ResolvedChatOptions,
  ResolvedEmbeddingOptions,
  ResolvedToolOptions,
  ResolvedVisionOptions,
} from "../../types/request.js";
import type {
  CompletionResponse,
  EmbeddingResponse,
  VisionResponse,
} from "../../types/response.js";
import type { StreamChunk } from "../../types/stream.js";
import type { ToolDefinition } from "../../types/tool.js";
import { joinUrl, mergeHeaders, parseSSEStream } from "../../utils/index.js";
import type {
  EmbeddingCapable,
  ProviderAdapter,
  StreamingCapable,
  ToolCapable,
  VisionCapable,
} from "../adapter.js";
import { openStream, postJson, type AdapterConfig } from "../shared.js";
import {
  translateEmbeddingRequest,
  translateRequest,
  translateToolRequest,
  translateVisionRequest,
} from "./translate-request.js";
import {
  translateEmbeddingResponse,
  translateResponse,
  translateVisionResponse,
} from "./translate-response.js";
import { translateStream } from "./stream.js";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
export const DEFAULT_GEMINI_EMBEDDING_MODEL = "text-embedding-004";

export class GeminiAdapter
  implements ProviderAdapter, EmbeddingCapable, VisionCapable, StreamingCapable, ToolCapable
{
  readonly id: string;
  readonly type = AdapterType.GEMINI;
  readonly name: string;
  readonly defaultModel: string;
  readonly defaultEmbeddingModel: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number | undefined;
  private readonly defaultHeaders: Record<string, string>;

  constructor(config: AdapterConfig) {
    this.id = config.id;
    this.name = config.name ?? "Google Gemini";
    this.defaultModel = config.defaultModel ?? DEFAULT_GEMINI_MODEL;
    this.defaultEmbeddingModel = config.defaultEmbeddingModel ?? DEFAULT_GEMINI_EMBEDDING_MODEL;
    this.apiKey = config.apiKey ?? "";
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs;
    this.defaultHeaders = config.defaultHeaders ?? {};
  }

  private modelUrl(model: string, method: string, query: Record<string, string> = {}): string {
    const url = joinUrl(this.baseUrl, `models/${encodeURIComponent(model)}:${method}`);
    const params = new URLSearchParams(query).toString();
    return params ? `${url}?${params}` : url;
  }

  private headers(): Record<string, string> {
    return mergeHeaders(this.defaultHeaders, { "x-goog-api-key": this.apiKey });
  }

  private send(url: string, body: unknown) {
    return postJson(url, body, this.headers(), {
      provider: this.id,
      timeout: this.timeoutMs,
    });
  }

  async complete(
    messages: readonly Message[],
    options: ResolvedChatOptions,
  ): Promise<CompletionResponse> {
    const body = await this.send(
      this.modelUrl(options.model, "generateContent"),
      translateRequest(messages, options),
    );
    return translateResponse(body, this.id, options.model);
  }

  async completeWithTools(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: ResolvedToolOptions,
  ): Promise<CompletionResponse> {
    const body = await this.send(
      this.modelUrl(options.model, "generateContent"),
      translateToolRequest(messages, tools, options),
    );
    return translateResponse(body, this.id, options.model);
  }

  async analyzeImage(
    content: readonly ContentPart[],
    options: ResolvedVisionOptions,
  ): Promise<VisionResponse> {
    const body = await this.send(
      this.modelUrl(options.model, "generateContent"),
      translateVisionRequest(content, options),
    );
    return translateVisionResponse(body, this.id, options.model);
  }

  async embed(
    inputs: readonly string[],
    options: ResolvedEmbeddingOptions,
  ): Promise<EmbeddingResponse> {
    const body = await this.send(
      this.modelUrl(options.model, "batchEmbedContents"),
      translateEmbeddingRequest(inputs, options),
    );
    return translateEmbeddingResponse(body, this.id, options.model);
  }

  async *stream(
    messages: readonly Message[],
    options: ResolvedChatOptions,
    signal?: AbortSignal,
  ): AsyncIterableIterator<StreamChunk> {
    const stream = await openStream(
      this.modelUrl(options.model, "streamGenerateContent", { alt: "sse" }),
      translateRequest(messages, options),
      this.headers(),
      { provider: this.id, signal },
    );
    yield* translateStream(parseSSEStream(stream));
  }
}

export { translateRequest, translateMessages, translateToolRequest } from "./translate-request.js";
export { translateResponse, mapFinishReason } from "./translate-response.js";
export { translateStream } from "./stream.js";
