/**
 * Tool-calling types.
 */

/** A tool the model may call, described by a JSON Schema. */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  /** JSON Schema for the arguments object. */
  readonly parameters: Readonly<Record<string, unknown>>;
}

/** A model-initiated tool invocation extracted from a response. */
export interface ToolCall {
  /** Unique identifier (provider-assigned or synthesised). */
  readonly id: string;
  readonly name: string;
  /** Parsed JSON arguments. */
  readonly arguments: Readonly<Record<string, unknown>>;
}

/**
 * Controls whether and how the model uses tools.
 *
 * `{ name }` forces a specific tool.
 */
export type ToolChoice = "auto" | "none" | "required" | { readonly name: string };

/** Narrow an arbitrary value to a ToolChoice, or `undefined`. */
export function toToolChoice(value: unknown): ToolChoice | undefined {
  if (value === "auto" || value === "none" || value === "required") {
    return value;
  }
  if (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    value.name !== ""
  ) {
    return { name: value.name };
  }
  return undefined;
}
