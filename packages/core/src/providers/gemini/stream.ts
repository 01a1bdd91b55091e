/**
 * Gemini streaming translation (`streamGenerateContent?alt=sse`).
 *
 * Every SSE event carries a partial GenerateContentResponse; text parts are
 * deltas, and the last event holds the finish reason and usage.
 */

import { FinishReason } from "../../types/enums.js";
import type { UsageStatistics } from "../../types/response.js";
import { StreamChunkType, type StreamChunk } from "../../types/stream.js";
import {
  getOptionalString,
  getRecord,
  isRecord,
  parseJson,
} from "../../utils/json.js";
import type { SSEEvent } from "../../utils/sse.js";
import { usageFrom } from "../shared.js";
import { mapFinishReason, readCandidate } from "./translate-response.js";

export async function* translateStream(
  events: AsyncIterable<SSEEvent>,
): AsyncIterableIterator<StreamChunk> {
  let finishReason: FinishReason = FinishReason.STOP;
  let usage: UsageStatistics | undefined;
  let model: string | undefined;

  for await (const event of events) {
    const parsed = parseJson(event.data);
    if (!isRecord(parsed)) continue;

    const { text, finishReason: reason } = readCandidate(parsed);
    if (text !== "") {
      yield { type: StreamChunkType.TEXT_DELTA, delta: text };
    }
    if (reason) finishReason = mapFinishReason(reason);

    model ??= getOptionalString(parsed, "modelVersion");
    const rawUsage = parsed["usageMetadata"];
    if (isRecord(rawUsage)) {
      usage = usageFrom(rawUsage["promptTokenCount"], rawUsage["candidatesTokenCount"]);
    }
    if (getOptionalString(getRecord(parsed, "promptFeedback"), "blockReason") !== undefined) {
      finishReason = FinishReason.CONTENT_FILTER;
    }
  }

  yield { type: StreamChunkType.FINISH, finish_reason: finishReason, usage, model };
}
