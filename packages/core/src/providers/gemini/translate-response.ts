/**
 * Response translation for the Gemini API.
 *
 * - candidates[0].content.parts: text parts concatenated, functionCall parts
 *   become tool calls
 * - finishReason: STOP → stop, MAX_TOKENS → length, SAFETY/RECITATION/
 *   BLOCKLIST/PROHIBITED_CONTENT → content_filter
 * - usageMetadata.promptTokenCount / candidatesTokenCount → usage
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
  getOptionalString,
  getRecord,
  getRecords,
  getString,
  toNumberArray,
  type JsonRecord,
} from "../../utils/json.js";
import { syntheticCallId, usageFrom } from "../shared.js";

export function mapFinishReason(raw: string | undefined): FinishReason {
  switch (raw) {
    case "MAX_TOKENS":
      return FinishReason.LENGTH;
    case "SAFETY":
    case "RECITATION":
    case "BLOCKLIST":
    case "PROHIBITED_CONTENT":
    case "SPII":
      return FinishReason.CONTENT_FILTER;
    default:
      return FinishReason.STOP;
  }
}

/** Text and tool calls of the first candidate. */
export function readCandidate(root: JsonRecord): {
  text: string;
  toolCalls: ToolCall[];
  finishReason?: string;
} {
  const candidate = getRecords(root, "candidates")[0] ?? {};
  let text = "";
  const toolCalls: ToolCall[] = [];

  for (const part of getRecords(getRecord(candidate, "content"), "parts")) {
    const chunk = getOptionalString(part, "text");
    if (chunk !== undefined) text += chunk;

    const call = getRecord(part, "functionCall");
    const name = getOptionalString(call, "name");
    if (name !== undefined) {
      toolCalls.push({
        id: syntheticCallId(toolCalls.length),
        name,
        arguments: getRecord(call, "args"),
      });
    }
  }

  return { text, toolCalls, finishReason: getOptionalString(candidate, "finishReason") };
}

export function translateResponse(
  body: unknown,
  provider: string,
  requestedModel = "",
): CompletionResponse {
  const root = asRecord(body);
  const { text, toolCalls, finishReason } = readCandidate(root);
  const usage = getRecord(root, "usageMetadata");
  // a prompt blocked before generation has no candidates, only promptFeedback
  const blocked = getOptionalString(getRecord(root, "promptFeedback"), "blockReason");

  return new CompletionResponse({
    content: text,
    model: getString(root, "modelVersion", requestedModel),
    usage: usageFrom(usage["promptTokenCount"], usage["candidatesTokenCount"]),
    finish_reason:
      blocked !== undefined
        ? FinishReason.CONTENT_FILTER
        : toolCalls.length > 0
          ? FinishReason.TOOL_CALLS
          : mapFinishReason(finishReason),
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

/** batchEmbedContents: embeddings[].values, in request order. No token usage is reported. */
export function translateEmbeddingResponse(
  body: unknown,
  provider: string,
  requestedModel: string,
): EmbeddingResponse {
  const root = asRecord(body);
  return new EmbeddingResponse({
    vectors: getRecords(root, "embeddings").map((item) => toNumberArray(item["values"])),
    model: requestedModel,
    usage: usageFrom(0, 0),
    provider,
  });
}
