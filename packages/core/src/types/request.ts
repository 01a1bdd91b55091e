/**
 * Resolved request options: what adapters receive.
 *
 * The orchestrator turns caller options into these: provider selected, model
 * resolved, defaults filled, system prompt already folded into the messages.
 */

import type { DetailLevel, ResponseFormat } from "./enums.js";
import type { ToolChoice, ToolDefinition } from "./tool.js";

export interface ResolvedChatOptions {
  readonly provider: string;
  /** Vendor model id sent on the wire. */
  readonly model: string;
  readonly temperature: number;
  readonly max_tokens: number;
  readonly top_p?: number;
  readonly frequency_penalty?: number;
  readonly presence_penalty?: number;
  readonly response_format: ResponseFormat;
  readonly stop_sequences?: readonly string[];
}

export interface ResolvedToolOptions extends ResolvedChatOptions {
  readonly tools: readonly ToolDefinition[];
  readonly tool_choice: ToolChoice;
}

export interface ResolvedVisionOptions {
  readonly provider: string;
  readonly model: string;
  readonly temperature: number;
  readonly max_tokens: number;
  readonly detail_level: DetailLevel;
  readonly system_prompt?: string;
}

export interface ResolvedEmbeddingOptions {
  readonly provider: string;
  readonly model: string;
  readonly dimensions?: number;
  readonly cache_ttl: number;
}

export type ResolvedOptions =
  | ResolvedChatOptions
  | ResolvedToolOptions
  | ResolvedVisionOptions
  | ResolvedEmbeddingOptions;
