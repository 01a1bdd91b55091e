/**
 * Request translation for Ollama's native API (`/api/chat`, `/api/embed`).
 *
 * Sampling options live under `options` (`num_predict` for the token cap);
 * images are sent as bare base64 strings on the message.
 */

import { ResponseFormat, Role } from "../../types/enums.js";
import { ConfigurationError } from "../../types/errors.js";
import {
  messageText,
  parseDataUrl,
  type ContentPart,
  type ImagePart,
  type Message,
} from "../../types/message.js";
import type {
  ResolvedChatOptions,
  ResolvedEmbeddingOptions,
  ResolvedToolOptions,
  ResolvedVisionOptions,
} from "../../types/request.js";
import type { ToolDefinition } from "../../types/tool.js";

export interface OllamaMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  images?: string[];
  tool_calls?: Array<{ function: { name: string; arguments: Record<string, unknown> } }>;
}

export interface OllamaOptions {
  temperature: number;
  num_predict: number;
  top_p?: number;
  frequency_penalty?: number;
  presence_penalty?: number;
  stop?: string[];
}

export interface OllamaChatBody {
  model: string;
  messages: OllamaMessage[];
  stream: boolean;
  options: OllamaOptions;
  format?: "json";
  tools?: Array<{
    type: "function";
    function: { name: string; description: string; parameters: Record<string, unknown> };
  }>;
}

export interface OllamaEmbedBody {
  model: string;
  input: string[];
  dimensions?: number;
}

/**
 * Base64 payload of an image part. Ollama cannot fetch remote images, so a
 * URL-only part is a configuration error.
 */
export function imageData(part: ImagePart, provider: string): string {
  if (part.data) return part.data;
  const inline = part.url ? parseDataUrl(part.url) : undefined;
  if (inline) return inline.data;
  throw new ConfigurationError(
    `Provider "${provider}" only accepts inline base64 images, got URL ${part.url ?? "(none)"}`,
  );
}

function translateContent(
  content: readonly ContentPart[],
  provider: string,
): Pick<OllamaMessage, "content" | "images"> {
  let text = "";
  const images: string[] = [];
  for (const part of content) {
    if (part.type === "text") text += part.text;
    else images.push(imageData(part, provider));
  }
  return images.length > 0 ? { content: text, images } : { content: text };
}

export function translateMessage(message: Message, provider: string): OllamaMessage {
  switch (message.role) {
    case Role.ASSISTANT: {
      const out: OllamaMessage = { role: "assistant", content: messageText(message) };
      if (message.tool_calls && message.tool_calls.length > 0) {
        out.tool_calls = message.tool_calls.map((call) => ({
          function: { name: call.name, arguments: { ...call.arguments } },
        }));
      }
      return out;
    }
    case Role.TOOL:
      return { role: "tool", content: messageText(message) };
    case Role.SYSTEM:
      return { role: "system", content: messageText(message) };
    default:
      return typeof message.content === "string"
        ? { role: "user", content: message.content }
        : { role: "user", ...translateContent(message.content, provider) };
  }
}

function translateOptions(options: ResolvedChatOptions): OllamaOptions {
  const out: OllamaOptions = {
    temperature: options.temperature,
    num_predict: options.max_tokens,
  };
  if (options.top_p !== undefined) out.top_p = options.top_p;
  if (options.frequency_penalty !== undefined) out.frequency_penalty = options.frequency_penalty;
  if (options.presence_penalty !== undefined) out.presence_penalty = options.presence_penalty;
  if (options.stop_sequences && options.stop_sequences.length > 0) {
    out.stop = [...options.stop_sequences];
  }
  return out;
}

export function translateRequest(
  messages: readonly Message[],
  options: ResolvedChatOptions,
  stream = false,
): OllamaChatBody {
  const body: OllamaChatBody = {
    model: options.model,
    messages: messages.map((message) => translateMessage(message, options.provider)),
    stream,
    options: translateOptions(options),
  };
  if (options.response_format === ResponseFormat.JSON) body.format = "json";
  return body;
}

/** Ollama has no tool_choice; "none" simply omits the tools. */
export function translateToolRequest(
  messages: readonly Message[],
  tools: readonly ToolDefinition[],
  options: ResolvedToolOptions,
): OllamaChatBody {
  const body = translateRequest(messages, options);
  if (tools.length > 0 && options.tool_choice !== "none") {
    body.tools = tools.map((tool) => ({
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: { ...tool.parameters },
      },
    }));
  }
  return body;
}

export function translateVisionRequest(
  content: readonly ContentPart[],
  options: ResolvedVisionOptions,
): OllamaChatBody {
  const messages: OllamaMessage[] = [];
  if (options.system_prompt) {
    messages.push({ role: "system", content: options.system_prompt });
  }
  messages.push({ role: "user", ...translateContent(content, options.provider) });
  return {
    model: options.model,
    messages,
    stream: false,
    options: { temperature: options.temperature, num_predict: options.max_tokens },
  };
}

export function translateEmbeddingRequest(
  inputs: readonly string[],
  options: ResolvedEmbeddingOptions,
): OllamaEmbedBody {
  const body: OllamaEmbedBody = { model: options.model, input: [...inputs] };
  if (options.dimensions !== undefined) body.dimensions = options.dimensions;
  return body;
}
