/**
 * Thin HTTP wrapper around the native `fetch` API.
 *
 * JSON-oriented helpers for POST requests (used by every provider adapter)
 * and a streaming variant that returns the raw ReadableStream. Network
 * failures are raised as `TransportError`, deadline expiry as `TimeoutError`;
 * non-2xx statuses are returned for the adapter to map.
 */

import { TimeoutError, TransportError } from "../types/errors.js";
import { parseJson } from "./json.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Resolved response from a non-streaming HTTP request. */
export interface HttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body, or `undefined` when the body was not valid JSON. */
  body: unknown;
  /** Raw response text. */
  text: string;
}

/** Resolved response from a streaming HTTP request. */
export interface HttpStreamResponse {
  status: number;
  headers: Headers;
  body: ReadableStream<Uint8Array>;
}

export interface HttpRequestOptions {
  /** Request deadline in milliseconds. Combined with any caller signal. */
  timeout?: number;
  signal?: AbortSignal;
  /** Provider identifier attached to transport errors. */
  provider?: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge header objects; later entries override earlier ones.
 * `Content-Type: application/json` is present unless overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) {
      for (const [key, value] of Object.entries(set)) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/** Join a base URL and a path with exactly one slash between them. */
export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

function buildSignal(options?: HttpRequestOptions): AbortSignal | undefined {
  const signals: AbortSignal[] = [];

  if (options?.signal) {
    signals.push(options.signal);
  }

  if (options?.timeout != null && options.timeout > 0) {
    signals.push(AbortSignal.timeout(options.timeout));
  }

  if (signals.length <= 1) return signals[0];
  return AbortSignal.any(signals);
}

function isNamedError(err: unknown, name: string): boolean {
  return typeof err === "object" && err !== null && "name" in err && err.name === name;
}

/** The URL without query or fragment, for error messages. */
export function redactUrl(url: string): string {
  const end = url.search(/[?#]/);
  return end === -1 ? url : url.slice(0, end);
}

/** Map a fetch rejection to the transport error taxonomy. */
function toTransportFailure(err: unknown, rawUrl: string, options?: HttpRequestOptions): Error {
  const provider = options?.provider;
  const url = redactUrl(rawUrl);
  if (isNamedError(err, "TimeoutError")) {
    return new TimeoutError(`Request to ${url} timed out after ${options?.timeout ?? 0}ms`, {
      cause: err,
      provider,
    });
  }
  if (isNamedError(err, "AbortError")) {
    return new TimeoutError(`Request to ${url} was aborted`, { cause: err, provider });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(`Request to ${url} failed: ${message}`, { cause: err, provider });
}

async function send(
  method: "GET" | "POST",
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<Response> {
  try {
    return await fetch(url, {
      method,
      headers: mergeHeaders(headers),
      body: method === "POST" ? JSON.stringify(body) : undefined,
      signal: buildSignal(options),
    });
  } catch (err: unknown) {
    throw toTransportFailure(err, url, options);
  }
}

async function readAll(res: Response, url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
  let text: string;
  try {
    text = await res.text();
  } catch (err: unknown) {
    throw toTransportFailure(err, url, options);
  }
  return {
    status: res.status,
    headers: res.headers,
    body: parseJson(text),
    text,
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Send a JSON POST request and return the parsed response.
 *
 * On non-2xx status codes the promise still resolves; the adapter inspects
 * `status` and maps the body with `mapHttpError`.
 */
export async function httpPost(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const res = await send("POST", url, body, headers, options);
  return readAll(res, url, options);
}

/** Send a GET request and return the parsed response. */
export async function httpGet(
  url: string,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const res = await send("GET", url, undefined, headers, options);
  return readAll(res, url, options);
}

/**
 * Send a JSON POST request and return the response body as a stream.
 *
 * The caller consumes the stream. Non-2xx responses are returned as-is; use
 * `readErrorBody` to drain them.
 */
export async function httpStream(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpStreamResponse> {
  const res = await send("POST", url, body, headers, options);

  if (!res.body) {
    throw new TransportError(`Response from ${redactUrl(url)} has no body to stream`, {
      provider: options?.provider,
    });
  }

  return {
    status: res.status,
    headers: res.headers,
    body: res.body,
  };
}

/**
 * Read the next chunk of a response body. A failed read is a network
 * failure, so it is raised in the transport taxonomy.
 */
export async function readChunk(
  reader: ReadableStreamDefaultReader<Uint8Array>,
): Promise<ReadableStreamReadResult<Uint8Array>> {
  try {
    return await reader.read();
  } catch (err: unknown) {
    if (err instanceof TimeoutError || err instanceof TransportError) throw err;
    if (isNamedError(err, "TimeoutError") || isNamedError(err, "AbortError")) {
      throw new TimeoutError("Response stream was aborted", { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Response stream failed: ${message}`, { cause: err });
  }
}

/** Drain an error stream and parse it as JSON where possible. */
export async function readErrorBody(stream: ReadableStream<Uint8Array>): Promise<unknown> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let text = "";
  try {
    for (;;) {
      const { value, done } = await readChunk(reader);
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }
  } finally {
    reader.releaseLock();
  }
  text += decoder.decode();
  return parseJson(text) ?? text;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}
