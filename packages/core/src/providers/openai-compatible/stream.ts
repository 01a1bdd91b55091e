/**
 * Chat Completions streaming translation.
 *
 * - data: {"choices":[{"delta":{"content":"text"},"finish_reason":null}]}
 * - data: {"choices":[],"usage":{...}}   (with stream_options.include_usage)
 * - data: [DONE]
 */

import { FinishReason } from "../../types/enums.js";
import { VendorError } from "../../types/errors.js";
import type { UsageStatistics } from "../../types/response.js";
import { StreamChunkType, type StreamChunk } from "../../types/stream.js";
import {
  getOptionalString,
  getRecord,
  getRecords,
  isRecord,
  parseJson,
} from "../../utils/json.js";
import type { SSEEvent } from "../../utils/sse.js";
import { usageFrom } from "../shared.js";
import { mapFinishReason } from "./translate-response.js";

export async function* translateStream(
  events: AsyncIterable<SSEEvent>,
  provider: string,
): AsyncIterableIterator<StreamChunk> {
  let finishReason: FinishReason = FinishReason.STOP;
  let usage: UsageStatistics | undefined;
  let model: string | undefined;

  for await (const event of events) {
    const data = event.data.trim();
    if (data === "") continue;
    if (data === "[DONE]") break;

    const parsed = parseJson(data);
    if (!isRecord(parsed)) continue;

    const error = parsed["error"];
    if (isRecord(error)) {
      throw new VendorError(
        getOptionalString(error, "message") ?? "Stream reported an error",
        { provider, raw: parsed },
      );
    }

    model ??= getOptionalString(parsed, "model");

    const rawUsage = parsed["usage"];
    if (isRecord(rawUsage)) {
      usage = usageFrom(rawUsage["prompt_tokens"], rawUsage["completion_tokens"]);
    }

    const choice = getRecords(parsed, "choices")[0];
    if (!choice) continue;

    const delta = getOptionalString(getRecord(choice, "delta"), "content");
    if (delta) {
      yield { type: StreamChunkType.TEXT_DELTA, delta };
    }

    const reason = getOptionalString(choice, "finish_reason");
    if (reason) finishReason = mapFinishReason(reason);
  }

  yield { type: StreamChunkType.FINISH, finish_reason: finishReason, usage, model };
}
