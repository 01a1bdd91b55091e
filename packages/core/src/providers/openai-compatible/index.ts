/**
 * OpenAI Chat Completions dialect adapters.
 *
 * `OpenAICompatibleChatAdapter` covers chat, tools, vision and streaming;
 * `OpenAICompatibleAdapter` adds embeddings. Vendors without an embeddings
 * endpoint (Groq) get the chat-only class so the capability guards see the
 * truth.
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

export interface OpenAICompatibleConfig extends AdapterConfig {
  /** Dialect this instance was configured for (openai, mistral, groq, …). */
  type?: AdapterType;
}

export class OpenAICompatibleChatAdapter
  implements ProviderAdapter, VisionCapable, StreamingCapable, ToolCapable
{
  readonly id: string;
  readonly type: AdapterType;
  readonly name: string;
  readonly defaultModel: string;
  protected readonly apiKey: string | undefined;
  protected readonly baseUrl: string;
  protected readonly timeoutMs: number | undefined;
  protected readonly defaultHeaders: Record<string, string>;

  constructor(config: OpenAICompatibleConfig) {
    this.id = config.id;
    this.type = config.type ?? AdapterType.OPENAI;
    this.name = config.name ?? config.id;
    this.defaultModel = config.defaultModel ?? "gpt-4o-mini";
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs;
    this.defaultHeaders = config.defaultHeaders ?? {};
  }

  protected buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }
    return mergeHeaders(headers, this.defaultHeaders);
  }

  /** URL of the chat completions endpoint for a model. */
  protected chatUrl(_model: string): string {
    return joinUrl(this.baseUrl, "chat/completions");
  }

  async complete(
    messages: readonly Message[],
    options: ResolvedChatOptions,
  ): Promise<CompletionResponse> {
    const body = await postJson(
      this.chatUrl(options.model),
      translateRequest(messages, options),
      this.buildHeaders(),
      { provider: this.id, timeout: this.timeoutMs },
    );
    return translateResponse(body, this.id, options.model);
  }

  async completeWithTools(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: ResolvedToolOptions,
  ): Promise<CompletionResponse> {
    const body = await postJson(
      this.chatUrl(options.model),
      translateToolRequest(messages, tools, options),
      this.buildHeaders(),
      { provider: this.id, timeout: this.timeoutMs },
    );
    return translateResponse(body, this.id, options.model);
  }

  async analyzeImage(
    content: readonly ContentPart[],
    options: ResolvedVisionOptions,
  ): Promise<VisionResponse> {
    const body = await postJson(
      this.chatUrl(options.model),
      translateVisionRequest(content, options),
      this.buildHeaders(),
      { provider: this.id, timeout: this.timeoutMs },
    );
    return translateVisionResponse(body, this.id, options.model);
  }

  async *stream(
    messages: readonly Message[],
    options: ResolvedChatOptions,
    signal?: AbortSignal,
  ): AsyncIterableIterator<StreamChunk> {
    const body = {
      ...translateRequest(messages, options),
      stream: true,
      stream_options: { include_usage: true },
    };
    const stream = await openStream(this.chatUrl(options.model), body, this.buildHeaders(), {
      provider: this.id,
      signal,
    });
    yield* translateStream(parseSSEStream(stream), this.id);
  }
}

export class OpenAICompatibleAdapter
  extends OpenAICompatibleChatAdapter
  implements EmbeddingCapable
{
  readonly defaultEmbeddingModel: string;

  constructor(config: OpenAICompatibleConfig) {
    super(config);
    this.defaultEmbeddingModel = config.defaultEmbeddingModel ?? "text-embedding-3-small";
  }

  protected embeddingsUrl(_model: string): string {
    return joinUrl(this.baseUrl, "embeddings");
  }

  async embed(
    inputs: readonly string[],
    options: ResolvedEmbeddingOptions,
  ): Promise<EmbeddingResponse> {
    const body = await postJson(
      this.embeddingsUrl(options.model),
      translateEmbeddingRequest(inputs, options),
      this.buildHeaders(),
      { provider: this.id, timeout: this.timeoutMs },
    );
    return translateEmbeddingResponse(body, this.id, options.model);
  }
}

export { translateRequest, translateToolRequest, translateVisionRequest } from "./translate-request.js";
export { translateResponse, translateEmbeddingResponse, mapFinishReason } from "./translate-response.js";
export { translateStream } from "./stream.js";
