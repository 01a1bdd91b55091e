/**
 * Request translation for the Anthropic Messages API.
 *
 * - system messages are pulled out into the top-level `system` field
 * - tool results travel as `tool_result` blocks inside a user message
 * - consecutive same-role messages are merged (the API requires alternation)
 * - images become base64 or url `source` blocks
 */

import { Role } from "../../types/enums.js";
import {
  messageText,
  type ContentPart,
  type Message,
} from "../../types/message.js";
import type {
  ResolvedChatOptions,
  ResolvedToolOptions,
  ResolvedVisionOptions,
} from "../../types/request.js";
import type { ToolChoice, ToolDefinition } from "../../types/tool.js";

export const ANTHROPIC_VERSION = "2023-06-01";

// ---------------------------------------------------------------------------
// Wire types
// ---------------------------------------------------------------------------

export type AnthropicImageSource =
  | { type: "base64"; media_type: string; data: string }
  | { type: "url"; url: string };

export type AnthropicBlock =
  | { type: "text"; text: string }
  | { type: "image"; source: AnthropicImageSource }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string };

export interface AnthropicMessage {
  role: "user" | "assistant";
  content: AnthropicBlock[];
}

export interface AnthropicTool {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export type AnthropicToolChoice =
  | { type: "auto" }
  | { type: "any" }
  | { type: "none" }
  | { type: "tool"; name: string };

export interface AnthropicBody {
  model: string;
  max_tokens: number;
  messages: AnthropicMessage[];
  system?: string;
  temperature?: number;
  top_p?: number;
  stop_sequences?: string[];
  tools?: AnthropicTool[];
  tool_choice?: AnthropicToolChoice;
  stream?: boolean;
}

// ---------------------------------------------------------------------------
// Content
// ---------------------------------------------------------------------------

function translatePart(part: ContentPart): AnthropicBlock {
  if (part.type === "text") return { type: "text", text: part.text };
  if (part.data) {
    return {
      type: "image",
      source: { type: "base64", media_type: part.media_type ?? "image/png", data: part.data },
    };
  }
  return { type: "image", source: { type: "url", url: part.url ?? "" } };
}

function toBlocks(message: Message): AnthropicBlock[] {
  switch (message.role) {
    case Role.TOOL:
      return [
        {
          type: "tool_result",
          tool_use_id: message.tool_call_id ?? "",
          content: messageText(message),
        },
      ];
    case Role.ASSISTANT: {
      const blocks: AnthropicBlock[] = [];
      const text = messageText(message);
      if (text !== "") blocks.push({ type: "text", text });
      for (const call of message.tool_calls ?? []) {
        blocks.push({ type: "tool_use", id: call.id, name: call.name, input: { ...call.arguments } });
      }
      return blocks;
    }
    default:
      return typeof message.content === "string"
        ? [{ type: "text", text: message.content }]
        : message.content.map(translatePart);
  }
}

/** Split off the system prompt and convert the rest into alternating turns. */
export function translateMessages(messages: readonly Message[]): {
  system?: string;
  messages: AnthropicMessage[];
} {
  const systemParts: string[] = [];
  const out: AnthropicMessage[] = [];

  for (const message of messages) {
    if (message.role === Role.SYSTEM) {
      systemParts.push(messageText(message));
      continue;
    }
    const role = message.role === Role.ASSISTANT ? "assistant" : "user";
    const blocks = toBlocks(message);
    if (blocks.length === 0) continue;

    const previous = out[out.length - 1];
    if (previous && previous.role === role) {
      previous.content.push(...blocks);
    } else {
      out.push({ role, content: blocks });
    }
  }

  const system = systemParts.filter((part) => part !== "").join("\n\n");
  return system === "" ? { messages: out } : { system, messages: out };
}

// ---------------------------------------------------------------------------
// Bodies
// ---------------------------------------------------------------------------

export function translateRequest(
  messages: readonly Message[],
  options: ResolvedChatOptions,
): AnthropicBody {
  const translated = translateMessages(messages);
  const body: AnthropicBody = {
    model: options.model,
    max_tokens: options.max_tokens,
    messages: translated.messages,
    temperature: Math.min(options.temperature, 1),
  };
  if (translated.system !== undefined) body.system = translated.system;
  if (options.top_p !== undefined) body.top_p = options.top_p;
  if (options.stop_sequences && options.stop_sequences.length > 0) {
    body.stop_sequences = [...options.stop_sequences];
  }
  return body;
}

export function translateToolChoice(choice: ToolChoice): AnthropicToolChoice {
  switch (choice) {
    case "auto":
      return { type: "auto" };
    case "none":
      return { type: "none" };
    case "required":
      return { type: "any" };
    default:
      return { type: "tool", name: choice.name };
  }
}

export function translateToolRequest(
  messages: readonly Message[],
  tools: readonly ToolDefinition[],
  options: ResolvedToolOptions,
): AnthropicBody {
  const body = translateRequest(messages, options);
  if (tools.length > 0) {
    body.tools = tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: { ...tool.parameters },
    }));
    body.tool_choice = translateToolChoice(options.tool_choice);
  }
  return body;
}

export function translateVisionRequest(
  content: readonly ContentPart[],
  options: ResolvedVisionOptions,
): AnthropicBody {
  const body: AnthropicBody = {
    model: options.model,
    max_tokens: options.max_tokens,
    messages: [{ role: "user", content: content.map(translatePart) }],
    temperature: Math.min(options.temperature, 1),
  };
  if (options.system_prompt) body.system = options.system_prompt;
  return body;
}
