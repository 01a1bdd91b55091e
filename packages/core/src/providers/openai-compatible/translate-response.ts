/**
 * Response translation for the Chat Completions dialect.
 *
 * - choices[0].message.content → content (null or missing → "")
 * - choices[0].message.tool_calls → tool calls with parsed arguments
 * - usage.prompt_tokens / completion_tokens → usage
 * - embeddings: data[].embedding, ordered by `index`
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
  getNumber,
  getOptionalString,
  getRecord,
  getRecords,
  getString,
  parseJsonObject,
  toNumberArray,
  type JsonRecord,
} from "../../utils/json.js";
import { syntheticCallId, usageFrom } from "../shared.js";

export function mapFinishReason(raw: string | undefined): FinishReason {
  switch (raw) {
    case "length":
      return FinishReason.LENGTH;
    case "content_filter":
      return FinishReason.CONTENT_FILTER;
    case "tool_calls":
    case "function_call":
      return FinishReason.TOOL_CALLS;
    default:
      return FinishReason.STOP;
  }
}

function translateToolCalls(message: JsonRecord): ToolCall[] {
  return getRecords(message, "tool_calls").map((call, index) => {
    const fn = getRecord(call, "function");
    return {
      id: getOptionalString(call, "id") ?? syntheticCallId(index),
      name: getString(fn, "name"),
      arguments: parseJsonObject(getString(fn, "arguments", "{}")),
    };
  });
}

export function translateResponse(
  body: unknown,
  provider: string,
  requestedModel = "",
): CompletionResponse {
  const root = asRecord(body);
  const choice = getRecords(root, "choices")[0] ?? {};
  const message = getRecord(choice, "message");
  const usage = getRecord(root, "usage");
  const id = getOptionalString(root, "id");

  return new CompletionResponse({
    content: getString(message, "content"),
    model: getString(root, "model", requestedModel),
    usage: usageFrom(usage["prompt_tokens"], usage["completion_tokens"]),
    finish_reason: mapFinishReason(getOptionalString(choice, "finish_reason")),
    provider,
    tool_calls: translateToolCalls(message),
    metadata: id ? { id } : undefined,
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

export function translateEmbeddingResponse(
  body: unknown,
  provider: string,
  requestedModel = "",
): EmbeddingResponse {
  const root = asRecord(body);
  const items = getRecords(root, "data")
    .map((item, position) => ({ index: getNumber(item, "index") ?? position, item }))
    .sort((a, b) => a.index - b.index);
  const usage = getRecord(root, "usage");

  return new EmbeddingResponse({
    vectors: items.map(({ item }) => toNumberArray(item["embedding"])),
    model: getString(root, "model", requestedModel),
    usage: usageFrom(usage["prompt_tokens"], 0),
    provider,
  });
}
