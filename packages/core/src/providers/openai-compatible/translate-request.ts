/**
 * Request translation for the OpenAI Chat Completions dialect.
 *
 * Shared by OpenAI, Azure OpenAI, Mistral, Groq, OpenRouter and custom
 * endpoints.
 *   - system messages stay in the messages array
 *   - image parts become `image_url` parts (`data:` URLs for inline images)
 *   - tool results use role "tool" with `tool_call_id`
 *   - json response format becomes `{ type: "json_object" }`
 */

import { DetailLevel, ResponseFormat, Role } from "../../types/enums.js";
import { imageUrl, textPart, type ContentPart, type Message } from "../../types/message.js";
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

export type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string; detail?: string } };

export interface ChatToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type ChatMessage =
  | { role: "system" | "user"; content: string | ChatContentPart[] }
  | { role: "assistant"; content: string | null; tool_calls?: ChatToolCall[] }
  | { role: "tool"; content: string; tool_call_id: string };

export interface ChatTool {
  type: "function";
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export type ChatToolChoice =
  | "auto"
  | "none"
  | "required"
  | { type: "function"; function: { name: string } };

export interface ChatCompletionsBody {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  top_p?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
  stop?: string[];
  response_format?: { type: "json_object" };
  tools?: ChatTool[];
  tool_choice?: ChatToolChoice;
  stream?: boolean;
  stream_options?: { include_usage: boolean };
}

export interface EmbeddingsBody {
  model: string;
  input: string[];
  dimensions?: number;
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

function translatePart(part: ContentPart, defaultDetail?: DetailLevel): ChatContentPart {
  if (part.type === "text") {
    return { type: "text", text: part.text };
  }
  const detail = part.detail ?? defaultDetail;
  return {
    type: "image_url",
    image_url: detail ? { url: imageUrl(part), detail } : { url: imageUrl(part) },
  };
}

function flatten(content: string | readonly ContentPart[]): string {
  if (typeof content === "string") return content;
  return content.map((part) => (part.type === "text" ? part.text : "")).join("");
}

export function translateMessage(message: Message): ChatMessage {
  switch (message.role) {
    case Role.SYSTEM:
      return { role: "system", content: flatten(message.content) };
    case Role.USER:
      return {
        role: "user",
        content:
          typeof message.content === "string"
            ? message.content
            : message.content.map((part) => translatePart(part)),
      };
    case Role.ASSISTANT: {
      const text = flatten(message.content);
      if (message.tool_calls && message.tool_calls.length > 0) {
        return {
          role: "assistant",
          content: text === "" ? null : text,
          tool_calls: message.tool_calls.map((call) => ({
            id: call.id,
            type: "function",
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      }
      return { role: "assistant", content: text };
    }
    case Role.TOOL:
      return {
        role: "tool",
        content: flatten(message.content),
        tool_call_id: message.tool_call_id ?? "",
      };
  }
}

// ---------------------------------------------------------------------------
// Bodies
// ---------------------------------------------------------------------------

export function translateRequest(
  messages: readonly Message[],
  options: ResolvedChatOptions,
): ChatCompletionsBody {
  const body: ChatCompletionsBody = {
    model: options.model,
    messages: messages.map(translateMessage),
    temperature: options.temperature,
    max_tokens: options.max_tokens,
  };
  if (options.top_p !== undefined) body.top_p = options.top_p;
  if (options.frequency_penalty !== undefined) body.frequency_penalty = options.frequency_penalty;
  if (options.presence_penalty !== undefined) body.presence_penalty = options.presence_penalty;
  if (options.stop_sequences && options.stop_sequences.length > 0) {
    body.stop = [...options.stop_sequences];
  }
  if (options.response_format === ResponseFormat.JSON) {
    body.response_format = { type: "json_object" };
  }
  return body;
}

export function translateToolChoice(choice: ToolChoice): ChatToolChoice {
  return typeof choice === "string"
    ? choice
    : { type: "function", function: { name: choice.name } };
}

export function translateTools(tools: readonly ToolDefinition[]): ChatTool[] {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { ...tool.parameters },
    },
  }));
}

export function translateToolRequest(
  messages: readonly Message[],
  tools: readonly ToolDefinition[],
  options: ResolvedToolOptions,
): ChatCompletionsBody {
  const body = translateRequest(messages, options);
  if (tools.length > 0) {
    body.tools = translateTools(tools);
    body.tool_choice = translateToolChoice(options.tool_choice);
  }
  return body;
}

export function translateVisionRequest(
  content: readonly ContentPart[],
  options: ResolvedVisionOptions,
): ChatCompletionsBody {
  const messages: ChatMessage[] = [];
  if (options.system_prompt) {
    messages.push({ role: "system", content: options.system_prompt });
  }
  const parts = content.length > 0 ? content : [textPart("")];
  messages.push({
    role: "user",
    content: parts.map((part) => translatePart(part, options.detail_level)),
  });
  return {
    model: options.model,
    messages,
    temperature: options.temperature,
    max_tokens: options.max_tokens,
  };
}

export function translateEmbeddingRequest(
  inputs: readonly string[],
  options: ResolvedEmbeddingOptions,
): EmbeddingsBody {
  const body: EmbeddingsBody = { model: options.model, input: [...inputs] };
  if (options.dimensions !== undefined) body.dimensions = options.dimensions;
  return body;
}
