/**
 * Ollama streaming translation. The body is newline-delimited JSON; each
 * record carries `message.content` as a delta and the last has `done: true`
 * with the token counts.
 */

import { VendorError } from "../../types/errors.js";
import { StreamChunkType, type StreamChunk } from "../../types/stream.js";
import { getOptionalString, getRecord, getString, type JsonRecord } from "../../utils/json.js";
import { usageFrom } from "../shared.js";
import { mapDoneReason } from "./translate-response.js";

export async function* translateStream(
  records: AsyncIterable<JsonRecord>,
  provider: string,
): AsyncIterableIterator<StreamChunk> {
  for await (const record of records) {
    const error = getOptionalString(record, "error");
    if (error !== undefined) {
      throw new VendorError(error, { provider, raw: record });
    }

    const delta = getString(getRecord(record, "message"), "content");
    if (delta !== "") {
      yield { type: StreamChunkType.TEXT_DELTA, delta };
    }

    if (record["done"] === true) {
      yield {
        type: StreamChunkType.FINISH,
        finish_reason: mapDoneReason(getOptionalString(record, "done_reason")),
        usage: usageFrom(record["prompt_eval_count"], record["eval_count"]),
        model: getOptionalString(record, "model"),
      };
      return;
    }
  }

  // connection closed without a done record
  yield { type: StreamChunkType.FINISH, finish_reason: mapDoneReason(undefined) };
}
