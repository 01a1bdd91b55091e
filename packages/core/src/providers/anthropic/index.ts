/**
 * Anthropic Messages API adapter.
 *
 * POST {baseUrl}/messages, authenticated with `x-api-key` plus the
 * `anthropic-version` header. Streams via SSE. No embeddings endpoint.
 */

import { AdapterType } from "../../types/enums.js";
import type { ContentPart, Message } from "../../types/message.js";
import type {
  ResolvedChatOptions,
  ResolvedToolOptions,
  ResolvedVisionOptions,
} from "../../types/request.js";
import type { CompletionResponse, VisionResponse } from "../../types/response.js";
import type { StreamChunk } from "../../types/stream.js";
import type { ToolDefinition } from "../../types/tool.js";
import { joinUrl, mergeHeaders, parseSSEStream } from "../../utils/index.js";
import type {
  ProviderAdapter,
  StreamingCapable,
  ToolCapable,
  VisionCapable,
} from "../adapter.js";
import { openStream, postJson, type AdapterConfig } from "../shared.js";
import {
  ANTHROPIC_VERSION,
  translateRequest,
  translateToolRequest,
  translateVisionRequest,
} from "./translate-request.js";
import { translateResponse, translateVisionResponse } from "./translate-response.js";
import { translateStream } from "./stream.js";

export const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-5-20250929";

export class AnthropicAdapter
  implements ProviderAdapter, VisionCapable, StreamingCapable, ToolCapable
{
  readonly id: string;
  readonly type = AdapterType.ANTHROPIC;
  readonly name: string;
  readonly defaultModel: string;
  private readonly apiKey: string;
  private readonly url: string;
  private readonly timeoutMs: number | undefined;
  private readonly defaultHeaders: Record<string, string>;

  constructor(config: AdapterConfig) {
    this.id = config.id;
    this.name = config.name ?? "Anthropic Claude";
    this.defaultModel = config.defaultModel ?? DEFAULT_ANTHROPIC_MODEL;
    this.apiKey = config.apiKey ?? "";
    this.url = joinUrl(config.baseUrl, "messages");
    this.timeoutMs = config.timeoutMs;
    this.defaultHeaders = config.defaultHeaders ?? {};
  }

  private buildHeaders(): Record<string, string> {
    return mergeHeaders(
      {
        "x-api-key": this.apiKey,
        "anthropic-version": ANTHROPIC_VERSION,
      },
      this.defaultHeaders,
    );
  }

  private send(body: unknown) {
    return postJson(this.url, body, this.buildHeaders(), {
      provider: this.id,
      timeout: this.timeoutMs,
    });
  }

  async complete(
    messages: readonly Message[],
    options: ResolvedChatOptions,
  ): Promise<CompletionResponse> {
    const body = await this.send(translateRequest(messages, options));
    return translateResponse(body, this.id, options.model);
  }

  async completeWithTools(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: ResolvedToolOptions,
  ): Promise<CompletionResponse> {
    const body = await this.send(translateToolRequest(messages, tools, options));
    return translateResponse(body, this.id, options.model);
  }

  async analyzeImage(
    content: readonly ContentPart[],
    options: ResolvedVisionOptions,
  ): Promise<VisionResponse> {
    const body = await this.send(translateVisionRequest(content, options));
    return translateVisionResponse(body, this.id, options.model);
  }

  async *stream(
    messages: readonly Message[],
    options: ResolvedChatOptions,
    signal?: AbortSignal,
  ): AsyncIterableIterator<StreamChunk> {
    const body = { ...translateRequest(messages, options), stream: true };
    const stream = await openStream(this.url, body, this.buildHeaders(), {
      provider: this.id,
      signal,
    });
    yield* translateStream(parseSSEStream(stream), this.id);
  }
}

export { translateRequest, translateMessages, translateToolRequest } from "./translate-request.js";
export { translateResponse, mapStopReason } from "./translate-response.js";
export { translateStream } from "./stream.js";
