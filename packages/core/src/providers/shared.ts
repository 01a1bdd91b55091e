/**
 * Plumbing shared by the dialect adapters: configuration shape, the
 * request/raise cycle and usage extraction.
 */

import { UsageStatistics } from "../types/response.js";
import {
  httpPost,
  httpStream,
  isSuccess,
  readErrorBody,
  mapHttpError,
  asRecord,
  type JsonRecord,
} from "../utils/index.js";

/** Everything an adapter instance needs; built by the adapter factory. */
export interface AdapterConfig {
  /** Provider identifier. */
  id: string;
  name?: string;
  /** Base URL including the API version segment. */
  baseUrl: string;
  /** Absent for keyless dialects (Ollama). */
  apiKey?: string;
  /** Per-request deadline for blocking calls. */
  timeoutMs?: number;
  defaultModel?: string;
  defaultEmbeddingModel?: string;
  /** Extra headers sent with every request. */
  defaultHeaders?: Record<string, string>;
  /** Dialect extras from the provider descriptor. */
  options?: Readonly<Record<string, string>>;
}

export interface SendOptions {
  provider: string;
  timeout?: number;
}

/**
 * POST a JSON body and return the parsed JSON object, raising the mapped
 * error for any non-2xx status.
 */
export async function postJson(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options: SendOptions,
): Promise<JsonRecord> {
  const res = await httpPost(url, body, headers, options);
  if (!isSuccess(res.status)) {
    throw mapHttpError(res.status, res.body ?? res.text, options.provider, res.headers);
  }
  return asRecord(res.body);
}

/**
 * POST a JSON body and return the streaming body. Non-2xx responses are
 * drained and raised as mapped errors before any chunk is produced.
 */
export async function openStream(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options: { provider: string; signal?: AbortSignal },
): Promise<ReadableStream<Uint8Array>> {
  const res = await httpStream(url, body, headers, options);
  if (!isSuccess(res.status)) {
    const errorBody = await readErrorBody(res.body);
    throw mapHttpError(res.status, errorBody, options.provider, res.headers);
  }
  return res.body;
}

/** Usage from vendor counts; missing or malformed counts become 0. */
export function usageFrom(prompt: unknown, completion: unknown): UsageStatistics {
  return UsageStatistics.fromTokens(toCount(prompt), toCount(completion));
}

function toCount(value: unknown): number {
  return typeof value === "number" ? value : 0;
}

/** Synthesised id for tool calls whose dialect does not assign one. */
export function syntheticCallId(index: number): string {
  return `call_${index}_${Date.now().toString(36)}`;
}
