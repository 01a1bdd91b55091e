/**
 * Narrowing helpers for untyped vendor JSON.
 *
 * Adapters read every vendor field through these so a missing or mistyped
 * optional field degrades to an empty value instead of crashing.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** The value as a record, or `{}`. */
export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function getRecord(obj: JsonRecord, key: string): JsonRecord {
  return asRecord(obj[key]);
}

export function getString(obj: JsonRecord, key: string, fallback = ""): string {
  const value = obj[key];
  return typeof value === "string" ? value : fallback;
}

export function getOptionalString(obj: JsonRecord, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

export function getNumber(obj: JsonRecord, key: string): number | undefined {
  const value = obj[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function getArray(obj: JsonRecord, key: string): unknown[] {
  const value = obj[key];
  return Array.isArray(value) ? value : [];
}

/** Array elements that are records; anything else is dropped. */
export function getRecords(obj: JsonRecord, key: string): JsonRecord[] {
  return getArray(obj, key).filter(isRecord);
}

/** A numeric array, or `[]` if any element is not a finite number. */
export function toNumberArray(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  const out: number[] = [];
  for (const item of value) {
    if (typeof item !== "number" || !Number.isFinite(item)) return [];
    out.push(item);
  }
  return out;
}

/** A vendor token count: negative, fractional or non-numeric values become safe integers. */
export function tokenCount(value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.floor(value);
}

/** Parse JSON text, returning `undefined` when it is not valid JSON. */
export function parseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

/** Parse a JSON object (tool-call arguments); anything else becomes `{}`. */
export function parseJsonObject(text: string): JsonRecord {
  return asRecord(parseJson(text));
}
