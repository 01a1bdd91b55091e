/**
 * Core enums for the switchboard.
 *
 * Uses `as const satisfies` objects instead of TypeScript enums so the values
 * stay plain strings on the wire and in configuration files.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** Conversation roles understood by every adapter. */
export const Role = {
  /** Instructions shaping model behaviour. Typically first. */
  SYSTEM: "system",
  /** Human input. */
  USER: "user",
  /** Model output. */
  ASSISTANT: "assistant",
  /** Tool execution result, linked by `tool_call_id`. */
  TOOL: "tool",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// FinishReason
// ---------------------------------------------------------------------------

/** Why generation stopped, normalised across vendors. */
export const FinishReason = {
  STOP: "stop",
  LENGTH: "length",
  CONTENT_FILTER: "content_filter",
  TOOL_CALLS: "tool_calls",
} as const satisfies Record<string, string>;

export type FinishReason = (typeof FinishReason)[keyof typeof FinishReason];

// ---------------------------------------------------------------------------
// Capability
// ---------------------------------------------------------------------------

/** What a model (catalog) or an adapter (contracts) can do. */
export const Capability = {
  CHAT: "chat",
  EMBEDDING: "embedding",
  VISION: "vision",
  STREAMING: "streaming",
  TOOLS: "tools",
  JSON_MODE: "json_mode",
  AUDIO: "audio",
} as const satisfies Record<string, string>;

export type Capability = (typeof Capability)[keyof typeof Capability];

// ---------------------------------------------------------------------------
// AdapterType
// ---------------------------------------------------------------------------

/** Wire dialect a provider speaks. */
export const AdapterType = {
  OPENAI: "openai",
  ANTHROPIC: "anthropic",
  GEMINI: "gemini",
  OLLAMA: "ollama",
  OPENROUTER: "openrouter",
  MISTRAL: "mistral",
  GROQ: "groq",
  AZURE_OPENAI: "azure_openai",
  CUSTOM: "custom",
} as const satisfies Record<string, string>;

export type AdapterType = (typeof AdapterType)[keyof typeof AdapterType];

// ---------------------------------------------------------------------------
// Request option enums
// ---------------------------------------------------------------------------

export const ResponseFormat = {
  TEXT: "text",
  JSON: "json",
  MARKDOWN: "markdown",
} as const satisfies Record<string, string>;

export type ResponseFormat = (typeof ResponseFormat)[keyof typeof ResponseFormat];

/** Image processing fidelity hint for vision calls. */
export const DetailLevel = {
  AUTO: "auto",
  LOW: "low",
  HIGH: "high",
} as const satisfies Record<string, string>;

export type DetailLevel = (typeof DetailLevel)[keyof typeof DetailLevel];

// ---------------------------------------------------------------------------
// Operation
// ---------------------------------------------------------------------------

/** The kind of call the orchestrator is dispatching. */
export const Operation = {
  CHAT: "chat",
  TOOLS: "tools",
  EMBEDDING: "embedding",
  VISION: "vision",
  STREAM: "stream",
} as const satisfies Record<string, string>;

export type Operation = (typeof Operation)[keyof typeof Operation];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Narrow an arbitrary value to one of the values of a const enum object. */
export function isEnumValue<T extends Record<string, string>>(
  values: T,
  value: unknown,
): value is T[keyof T] {
  return (
    typeof value === "string" &&
    Object.values(values).some((candidate) => candidate === value)
  );
}
