/**
 * Message and ContentPart types.
 *
 * Messages are immutable and keep their sequence order; nothing in the
 * pipeline reorders them.
 */

import { Role } from "./enums.js";
import type { DetailLevel } from "./enums.js";
import type { ToolCall } from "./tool.js";

// ---------------------------------------------------------------------------
// Content parts
// ---------------------------------------------------------------------------

export interface TextPart {
  readonly type: "text";
  readonly text: string;
}

/** Image given by URL, or by base64 data with a media type. */
export interface ImagePart {
  readonly type: "image";
  readonly url?: string;
  /** Base64-encoded bytes. */
  readonly data?: string;
  /** MIME type, e.g. "image/png". Required with `data`. */
  readonly media_type?: string;
  readonly detail?: DetailLevel;
}

export type ContentPart = TextPart | ImagePart;

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

export interface Message {
  readonly role: Role;
  /** Plain text, or ordered content parts (text and images). */
  readonly content: string | readonly ContentPart[];
  /** Links a tool message to the call it answers. */
  readonly tool_call_id?: string;
  /** Calls requested by an assistant message. */
  readonly tool_calls?: readonly ToolCall[];
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function systemMessage(text: string): Message {
  return { role: Role.SYSTEM, content: text };
}

export function userMessage(content: string | readonly ContentPart[]): Message {
  return { role: Role.USER, content };
}

export function assistantMessage(
  text: string,
  toolCalls?: readonly ToolCall[],
): Message {
  return toolCalls && toolCalls.length > 0
    ? { role: Role.ASSISTANT, content: text, tool_calls: toolCalls }
    : { role: Role.ASSISTANT, content: text };
}

export function toolMessage(toolCallId: string, output: string): Message {
  return { role: Role.TOOL, content: output, tool_call_id: toolCallId };
}

export function textPart(text: string): TextPart {
  return { type: "text", text };
}

/**
 * Build an image part from a URL. `data:` URLs are split into base64 data
 * and media type so dialects that only accept inline bytes can use them.
 */
export function imagePart(url: string, detail?: DetailLevel): ImagePart {
  const inline = parseDataUrl(url);
  if (inline) {
    return { type: "image", data: inline.data, media_type: inline.media_type, detail };
  }
  return { type: "image", url, detail };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Split a base64 `data:` URL into its media type and payload. */
export function parseDataUrl(
  url: string,
): { media_type: string; data: string } | undefined {
  const match = /^data:([^;,]+);base64,(.*)$/s.exec(url);
  if (!match) return undefined;
  const [, mediaType, data] = match;
  if (mediaType === undefined || data === undefined) return undefined;
  return { media_type: mediaType, data };
}

/** The URL form of an image part (`data:` URL for inline images). */
export function imageUrl(part: ImagePart): string {
  if (part.url) return part.url;
  return `data:${part.media_type ?? "image/png"};base64,${part.data ?? ""}`;
}

/** Concatenated text of a message, ignoring non-text parts. */
export function messageText(message: Message): string {
  if (typeof message.content === "string") return message.content;
  return message.content
    .filter((part): part is TextPart => part.type === "text")
    .map((part) => part.text)
    .join("");
}

/** Content as an array of parts, wrapping plain strings in a text part. */
export function contentParts(message: Message): readonly ContentPart[] {
  return typeof message.content === "string"
    ? [textPart(message.content)]
    : message.content;
}
