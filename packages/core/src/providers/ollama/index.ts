/**
 * Ollama adapter for locally hosted models.
 *
 * Native API: POST {baseUrl}/api/chat and {baseUrl}/api/embed. No API key.
 * Streams newline-delimited JSON.
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
import { joinUrl, mergeHeaders, parseNDJSONStream } from "../../utils/index.js";
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

export const DEFAULT_OLLAMA_MODEL = "llama3.2";
export const DEFAULT_OLLAMA_EMBEDDING_MODEL = "nomic-embed-text";

export class OllamaAdapter
  implements ProviderAdapter, EmbeddingCapable, VisionCapable, StreamingCapable, ToolCapable
{
  readonly id: string;
  readonly type = AdapterType.OLLAMA;
  readonly name: string;
  readonly defaultModel: string;
  readonly defaultEmbeddingModel: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number | undefined;
  private readonly headers: Record<string, string>;

  constructor(config: AdapterConfig) {
    this.id = config.id;
    this.name = config.name ?? "Ollama";
    this.defaultModel = config.defaultModel ?? DEFAULT_OLLAMA_MODEL;
    this.defaultEmbeddingModel = config.defaultEmbeddingModel ?? DEFAULT_OLLAMA_EMBEDDING_MODEL;
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs;
    this.headers = mergeHeaders(config.defaultHeaders);
  }

  private send(path: string, body: unknown) {
    return postJson(joinUrl(this.baseUrl, path), body, this.headers, {
      provider: this.id,
      timeout: this.timeoutMs,
    });
  }

  async complete(
    messages: readonly Message[],
    options: ResolvedChatOptions,
  ): Promise<CompletionResponse> {
    const body = await this.send("api/chat", translateRequest(messages, options));
    return translateResponse(body, this.id, options.model);
  }

  async completeWithTools(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: ResolvedToolOptions,
  ): Promise<CompletionResponse> {
    const body = await this.send("api/chat", translateToolRequest(messages, tools, options));
    return translateResponse(body, this.id, options.model);
  }

  async analyzeImage(
    content: readonly ContentPart[],
    options: ResolvedVisionOptions,
  ): Promise<VisionResponse> {
    const body = await this.send("api/chat", translateVisionRequest(content, options));
    return translateVisionResponse(body, this.id, options.model);
  }

  async embed(
    inputs: readonly string[],
    options: ResolvedEmbeddingOptions,
  ): Promise<EmbeddingResponse> {
    const body = await this.send("api/embed", translateEmbeddingRequest(inputs, options));
    return translateEmbeddingResponse(body, this.id, options.model);
  }

  async *stream(
    messages: readonly Message[],
    options: ResolvedChatOptions,
    signal?: AbortSignal,
  ): AsyncIterableIterator<StreamChunk> {
    const stream = await openStream(
      joinUrl(this.baseUrl, "api/chat"),
      translateRequest(messages, options, true),
      this.headers,
      { provider: this.id, signal },
    );
    yield* translateStream(parseNDJSONStream(stream), this.id);
  }
}

export { translateRequest, translateMessage, translateToolRequest } from "./translate-request.js";
export { translateResponse, mapDoneReason } from "./translate-response.js";
export { translateStream } from "./stream.js";
