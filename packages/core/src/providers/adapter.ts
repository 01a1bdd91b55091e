/**
 * Capability contracts every provider adapter is built from.
 *
 * `ProviderAdapter` is the base contract (blocking chat). The optional
 * capabilities are separate interfaces; an adapter has a capability exactly
 * when it implements the method, and the guards below check for that method
 * at run time. There are no boolean capability flags to drift out of sync.
 */

import type { AdapterType } from "../types/enums.js";
import { Capability } from "../types/enums.js";
import type { ContentPart, Message } from "../types/message.js";
import type {
  ResolvedChatOptions,
  ResolvedEmbeddingOptions,
  ResolvedToolOptions,
  ResolvedVisionOptions,
} from "../types/request.js";
import type { CompletionResponse, EmbeddingResponse, VisionResponse } from "../types/response.js";
import type { StreamChunk } from "../types/stream.js";
import type { ToolDefinition } from "../types/tool.js";

// ---------------------------------------------------------------------------
// Contracts
// ---------------------------------------------------------------------------

export interface ProviderAdapter {
  /** Provider identifier this adapter instance serves. */
  readonly id: string;
  readonly type: AdapterType;
  /** Human-readable label. */
  readonly name: string;
  /** Chat model used when neither the caller nor the catalog names one. */
  readonly defaultModel: string;

  /** Send a conversation and wait for the full answer. Never retries. */
  complete(messages: readonly Message[], options: ResolvedChatOptions): Promise<CompletionResponse>;
}

export interface EmbeddingCapable {
  /** Embed each input; vectors come back in input order. */
  embed(inputs: readonly string[], options: ResolvedEmbeddingOptions): Promise<EmbeddingResponse>;
  /** Embedding model used when none is resolved. */
  readonly defaultEmbeddingModel: string;
}

export interface VisionCapable {
  /** Describe or analyse images. `content` holds the prompt text and image parts. */
  analyzeImage(
    content: readonly ContentPart[],
    options: ResolvedVisionOptions,
  ): Promise<VisionResponse>;
}

export interface StreamingCapable {
  /**
   * Stream a completion as chunks in transport order. The iterator is
   * single-pass; `signal` aborts the underlying network read.
   */
  stream(
    messages: readonly Message[],
    options: ResolvedChatOptions,
    signal?: AbortSignal,
  ): AsyncIterableIterator<StreamChunk>;
}

export interface ToolCapable {
  completeWithTools(
    messages: readonly Message[],
    tools: readonly ToolDefinition[],
    options: ResolvedToolOptions,
  ): Promise<CompletionResponse>;
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function supportsEmbeddings(
  adapter: ProviderAdapter,
): adapter is ProviderAdapter & EmbeddingCapable {
  return "embed" in adapter && typeof adapter.embed === "function";
}

export function supportsVision(
  adapter: ProviderAdapter,
): adapter is ProviderAdapter & VisionCapable {
  return "analyzeImage" in adapter && typeof adapter.analyzeImage === "function";
}

export function supportsStreaming(
  adapter: ProviderAdapter,
): adapter is ProviderAdapter & StreamingCapable {
  return "stream" in adapter && typeof adapter.stream === "function";
}

export function supportsTools(
  adapter: ProviderAdapter,
): adapter is ProviderAdapter & ToolCapable {
  return "completeWithTools" in adapter && typeof adapter.completeWithTools === "function";
}

/** Whether the adapter implements the contract behind a capability. */
export function hasCapability(adapter: ProviderAdapter, capability: Capability): boolean {
  switch (capability) {
    case Capability.CHAT:
    case Capability.JSON_MODE:
      return true;
    case Capability.EMBEDDING:
      return supportsEmbeddings(adapter);
    case Capability.VISION:
      return supportsVision(adapter);
    case Capability.STREAMING:
      return supportsStreaming(adapter);
    case Capability.TOOLS:
      return supportsTools(adapter);
    case Capability.AUDIO:
      return false;
  }
}

/** Every capability the adapter implements. */
export function adapterCapabilities(adapter: ProviderAdapter): Capability[] {
  return Object.values(Capability).filter((capability) => hasCapability(adapter, capability));
}
