/**
 * Anthropic Messages streaming translation.
 *
 * - message_start: model and input token count
 * - content_block_delta with a text_delta: incremental text
 * - message_delta: stop_reason and output token count
 * - message_stop: end of stream
 * - error: mapped to the error taxonomy
 */

import { FinishReason } from "../../types/enums.js";
import { StreamChunkType, type StreamChunk } from "../../types/stream.js";
import { mapHttpError } from "../../utils/error-mapping.js";
import {
  getNumber,
  getOptionalString,
  getRecord,
  getString,
  isRecord,
  parseJson,
} from "../../utils/json.js";
import type { SSEEvent } from "../../utils/sse.js";
import { usageFrom } from "../shared.js";
import { mapStopReason } from "./translate-response.js";

/** Status equivalent of the error types Anthropic sends inside a stream. */
const STREAM_ERROR_STATUS: Record<string, number> = {
  invalid_request_error: 400,
  authentication_error: 401,
  permission_error: 403,
  rate_limit_error: 429,
  api_error: 500,
  overloaded_error: 529,
};

export async function* translateStream(
  events: AsyncIterable<SSEEvent>,
  provider: string,
): AsyncIterableIterator<StreamChunk> {
  let model: string | undefined;
  let inputTokens = 0;
  let outputTokens = 0;
  let finishReason: FinishReason = FinishReason.STOP;

  for await (const event of events) {
    const parsed = parseJson(event.data);
    if (!isRecord(parsed)) continue;
    const type = event.event ?? getString(parsed, "type");

    switch (type) {
      case "message_start": {
        const message = getRecord(parsed, "message");
        model = getOptionalString(message, "model");
        inputTokens = getNumber(getRecord(message, "usage"), "input_tokens") ?? 0;
        break;
      }
      case "content_block_delta": {
        const delta = getRecord(parsed, "delta");
        if (getString(delta, "type") === "text_delta") {
          const text = getString(delta, "text");
          if (text !== "") yield { type: StreamChunkType.TEXT_DELTA, delta: text };
        }
        break;
      }
      case "message_delta": {
        const reason = getOptionalString(getRecord(parsed, "delta"), "stop_reason");
        if (reason) finishReason = mapStopReason(reason);
        outputTokens = getNumber(getRecord(parsed, "usage"), "output_tokens") ?? outputTokens;
        break;
      }
      case "error": {
        const error = getRecord(parsed, "error");
        const status = STREAM_ERROR_STATUS[getString(error, "type")] ?? 500;
        throw mapHttpError(status, parsed, provider);
      }
    }

    if (type === "message_stop") break;
  }

  yield {
    type: StreamChunkType.FINISH,
    finish_reason: finishReason,
    usage: usageFrom(inputTokens, outputTokens),
    model,
  };
}
