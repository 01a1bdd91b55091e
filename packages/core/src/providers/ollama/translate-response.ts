/**
 * Response translation for Ollama's native API.
 */

import { FinishReason } from "../../types/enums.js";
import {
  CompletionResponse,
  EmbeddingResponse,
  VisionResponse,
} from "../../types/response.js";
import type { ToolCall } from "../../types/tool.js";
import {
  asRecord,
  getArray,
  getOptionalString,
  getRecord,
  getRecords,
  getString,
  toNumberArray,
  type JsonRecord,
} from "../../utils/json.js";
import { syntheticCallId, usageFrom } from "../shared.js";

/** `done_reason`: "length" → length, anything else → stop. */
export function mapDoneReason(raw: string | undefined): FinishReason {
  return raw === "length" ? FinishReason.LENGTH : FinishReason.STOP;
}

function toolCallsOf(message: JsonRecord): ToolCall[] {
  const calls: ToolCall[] = [];
  for (const item of getRecords(message, "tool_calls")) {
    const fn = getRecord(item, "function");
    const name = getOptionalString(fn, "name");
    if (name === undefined) continue;
    calls.push({ id: syntheticCallId(calls.length), name, arguments: getRecord(fn, "arguments") });
  }
  return calls;
}

export function translateResponse(
  body: unknown,
  provider: string,
  requestedModel = "",
): CompletionResponse {
  const root = asRecord(body);
  const message = getRecord(root, "message");
  const toolCalls = toolCallsOf(message);

  return new CompletionResponse({
    content: getString(message, "content"),
    model: getString(root, "model", requestedModel),
    usage: usageFrom(root["prompt_eval_count"], root["eval_count"]),
    finish_reason:
      toolCalls.length > 0
        ? FinishReason.TOOL_CALLS
        : mapDoneReason(getOptionalString(root, "done_reason")),
    provider,
    tool_calls: toolCalls,
  });
}

export function translateVisionResponse(
  body: unknown,
  provider: string,
  requestedModel = "",
): VisionResponse {
  const completion = translateResponse(body, provider, requestedModel);
  return new VisionResponse({
    description: completion.content,
    model: completion.model,
    usage: completion.usage,
    provider,
    metadata: { finish_reason: completion.finish_reason },
  });
}

/** `/api/embed`: `embeddings` is an array of vectors in input order. */
export function translateEmbeddingResponse(
  body: unknown,
  provider: string,
  requestedModel: string,
): EmbeddingResponse {
  const root = asRecord(body);
  return new EmbeddingResponse({
    vectors: getArray(root, "embeddings").map(toNumberArray),
    model: getString(root, "model", requestedModel),
    usage: usageFrom(root["prompt_eval_count"], 0),
    provider,
  });
}
