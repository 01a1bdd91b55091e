/**
 * Response translation for the Anthropic Messages API.
 *
 * - content[] text blocks are concatenated; tool_use blocks become tool calls
 * - stop_reason: end_turn/stop_sequence → stop, max_tokens → length,
 *   tool_use → tool_calls, refusal → content_filter
 * - usage.input_tokens / output_tokens → usage
 */

import { FinishReason } from "../../types/enums.js";
import { CompletionResponse, VisionResponse } from "../../types/response.js";
import type { ToolCall } from "../../types/tool.js";
import {
  asRecord,
  getOptionalString,
  getRecord,
  getRecords,
  getString,
} from "../../utils/json.js";
import { syntheticCallId, usageFrom } from "../shared.js";

export function mapStopReason(raw: string | undefined): FinishReason {
  switch (raw) {
    case "max_tokens":
      return FinishReason.LENGTH;
    case "tool_use":
      return FinishReason.TOOL_CALLS;
    case "refusal":
      return FinishReason.CONTENT_FILTER;
    default:
      return FinishReason.STOP;
  }
}

export function translateResponse(
  body: unknown,
  provider: string,
  requestedModel = "",
): CompletionResponse {
  const root = asRecord(body);
  const blocks = getRecords(root, "content");
  const usage = getRecord(root, "usage");

  let content = "";
  const toolCalls: ToolCall[] = [];
  for (const block of blocks) {
    const type = getString(block, "type");
    if (type === "text") {
      content += getString(block, "text");
    } else if (type === "tool_use") {
      toolCalls.push({
        id: getOptionalString(block, "id") ?? syntheticCallId(toolCalls.length),
        name: getString(block, "name"),
        arguments: getRecord(block, "input"),
      });
    }
  }

  const id = getOptionalString(root, "id");
  return new CompletionResponse({
    content,
    model: getString(root, "model", requestedModel),
    usage: usageFrom(usage["input_tokens"], usage["output_tokens"]),
    finish_reason: mapStopReason(getOptionalString(root, "stop_reason")),
    provider,
    tool_calls: toolCalls,
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
