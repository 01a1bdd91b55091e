/**
 * Request translation for the Gemini generateContent API.
 *
 * - system messages → `systemInstruction`
 * - assistant → role "model"; tool results → `functionResponse` parts
 * - images → `inline_data` (base64) or `file_data` (URL)
 * - sampling options → `generationConfig`
 */

import { ResponseFormat, Role } from "../../types/enums.js";
import { messageText, type ContentPart, type Message } from "../../types/message.js";
import type {
  ResolvedChatOptions,
  ResolvedEmbeddingOptions,
  ResolvedToolOptions,
  ResolvedVisionOptions,
} from "../../types/request.js";
import type { ToolChoice, ToolDefinition } from "../../types/tool.js";

// ---------------------------------------------------------------------------
// Wire types
// ---------------------------------------------------------------------------

export type GeminiPart =
  | { text: string }
  | { inline_data: { mime_type: string; data: string } }
  | { file_data: { mime_type?: string; file_uri: string } }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: Record<string, unknown> } };

export interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

export interface GenerationConfig {
  temperature: number;
  maxOutputTokens: number;
  topP?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stopSequences?: string[];
  responseMimeType?: string;
}

export interface GeminiBody {
  contents: GeminiContent[];
  systemInstruction?: { parts: Array<{ text: string }> };
  generationConfig: GenerationConfig;
  tools?: Array<{
    functionDeclarations: Array<{
      name: string;
      description: string;
      parameters: Record<string, unknown>;
    }>;
  }>;
  toolConfig?: {
    functionCallingConfig: { mode: "AUTO" | "ANY" | "NONE"; allowedFunctionNames?: string[] };
  };
}

export interface GeminiEmbedBody {
  requests: Array<{
    model: string;
    content: { parts: Array<{ text: string }> };
    outputDimensionality?: number;
  }>;
}

// ---------------------------------------------------------------------------
// Content
// ---------------------------------------------------------------------------

function translatePart(part: ContentPart): GeminiPart {
  if (part.type === "text") return { text: part.text };
  if (part.data) {
    return { inline_data: { mime_type: part.media_type ?? "image/png", data: part.data } };
  }
  return part.media_type
    ? { file_data: { mime_type: part.media_type, file_uri: part.url ?? "" } }
    : { file_data: { file_uri: part.url ?? "" } };
}

/**
 * Gemini answers tool results by function name, not call id; the name is
 * recovered from the assistant message that made the call.
 */
function toolNameFor(messages: readonly Message[], callId: string | undefined): string {
  for (const message of messages) {
    for (const call of message.tool_calls ?? []) {
      if (call.id === callId) return call.name;
    }
  }
  return callId ?? "";
}

export function translateMessages(messages: readonly Message[]): {
  systemInstruction?: { parts: Array<{ text: string }> };
  contents: GeminiContent[];
} {
  const system: string[] = [];
  const contents: GeminiContent[] = [];

  for (const message of messages) {
    let entry: GeminiContent;
    switch (message.role) {
      case Role.SYSTEM:
        system.push(messageText(message));
        continue;
      case Role.ASSISTANT: {
        const parts: GeminiPart[] = [];
        const text = messageText(message);
        if (text !== "") parts.push({ text });
        for (const call of message.tool_calls ?? []) {
          parts.push({ functionCall: { name: call.name, args: { ...call.arguments } } });
        }
        entry = { role: "model", parts };
        break;
      }
      case Role.TOOL:
        entry = {
          role: "user",
          parts: [
            {
              functionResponse: {
                name: toolNameFor(messages, message.tool_call_id),
                response: { content: messageText(message) },
              },
            },
          ],
        };
        break;
      default:
        entry = {
          role: "user",
          parts:
            typeof message.content === "string"
              ? [{ text: message.content }]
              : message.content.map(translatePart),
        };
    }
    if (entry.parts.length > 0) contents.push(entry);
  }

  const text = system.filter((part) => part !== "").join("\n\n");
  return text === ""
    ? { contents }
    : { systemInstruction: { parts: [{ text }] }, contents };
}

// ---------------------------------------------------------------------------
// Bodies
// ---------------------------------------------------------------------------

function generationConfig(options: ResolvedChatOptions): GenerationConfig {
  const config: GenerationConfig = {
    temperature: options.temperature,
    maxOutputTokens: options.max_tokens,
  };
  if (options.top_p !== undefined) config.topP = options.top_p;
  if (options.frequency_penalty !== undefined) config.frequencyPenalty = options.frequency_penalty;
  if (options.presence_penalty !== undefined) config.presencePenalty = options.presence_penalty;
  if (options.stop_sequences && options.stop_sequences.length > 0) {
    config.stopSequences = [...options.stop_sequences];
  }
  if (options.response_format === ResponseFormat.JSON) {
    config.responseMimeType = "application/json";
  }
  return config;
}

export function translateRequest(
  messages: readonly Message[],
  options: ResolvedChatOptions,
): GeminiBody {
  return { ...translateMessages(messages), generationConfig: generationConfig(options) };
}

export function translateToolChoice(choice: ToolChoice): NonNullable<GeminiBody["toolConfig"]> {
  switch (choice) {
    case "auto":
      return { functionCallingConfig: { mode: "AUTO" } };
    case "none":
      return { functionCallingConfig: { mode: "NONE" } };
    case "required":
      return { functionCallingConfig: { mode: "ANY" } };
    default:
      return { functionCallingConfig: { mode: "ANY", allowedFunctionNames: [choice.name] } };
  }
}

export function translateToolRequest(
  messages: readonly Message[],
  tools: readonly ToolDefinition[],
  options: ResolvedToolOptions,
): GeminiBody {
  const body = translateRequest(messages, options);
  if (tools.length > 0) {
    body.tools = [
      {
        functionDeclarations: tools.map((tool) => ({
          name: tool.name,
          description: tool.description,
          parameters: { ...tool.parameters },
        })),
      },
    ];
    body.toolConfig = translateToolChoice(options.tool_choice);
  }
  return body;
}

export function translateVisionRequest(
  content: readonly ContentPart[],
  options: ResolvedVisionOptions,
): GeminiBody {
  const body: GeminiBody = {
    contents: [{ role: "user", parts: content.map(translatePart) }],
    generationConfig: { temperature: options.temperature, maxOutputTokens: options.max_tokens },
  };
  if (options.system_prompt) {
    body.systemInstruction = { parts: [{ text: options.system_prompt }] };
  }
  return body;
}

export function translateEmbeddingRequest(
  inputs: readonly string[],
  options: ResolvedEmbeddingOptions,
): GeminiEmbedBody {
  return {
    requests: inputs.map((text) => {
      const request: GeminiEmbedBody["requests"][number] = {
        model: `models/${options.model}`,
        content: { parts: [{ text }] },
      };
      if (options.dimensions !== undefined) request.outputDimensionality = options.dimensions;
      return request;
    }),
  };
}
