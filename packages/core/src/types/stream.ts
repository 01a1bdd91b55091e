/**
 * Stream chunk types produced by adapter stream translators.
 */

import type { FinishReason } from "./enums.js";
import type { UsageStatistics } from "./response.js";

export const StreamChunkType = {
  TEXT_DELTA: "text_delta",
  FINISH: "finish",
} as const satisfies Record<string, string>;

export type StreamChunkType = (typeof StreamChunkType)[keyof typeof StreamChunkType];

/** Incremental content, in transport order. */
export interface TextDeltaChunk {
  readonly type: typeof StreamChunkType.TEXT_DELTA;
  readonly delta: string;
}

/** Terminal chunk; at most one per stream. */
export interface FinishChunk {
  readonly type: typeof StreamChunkType.FINISH;
  readonly finish_reason: FinishReason;
  readonly usage?: UsageStatistics;
  readonly model?: string;
}

export type StreamChunk = TextDeltaChunk | FinishChunk;
