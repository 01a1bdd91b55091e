/**
 * Canonical JSON and hashing for cache keys.
 */

import { createHash } from "node:crypto";
import { isRecord } from "./json.js";

/**
 * JSON with object keys sorted recursively. `undefined` members are dropped,
 * so two option objects that differ only in unset fields produce the same
 * text.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : canonicalize(item)));
  }
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member = value[key];
      if (member !== undefined) out[key] = canonicalize(member);
    }
    return out;
  }
  return value;
}

export function sha256(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}
