/**
 * Maps vendor HTTP error responses onto the error taxonomy.
 */

import {
  AuthenticationError,
  ContentFilterError,
  RateLimitError,
  TimeoutError,
  VendorError,
  type ProviderError,
  type ProviderErrorOptions,
} from "../types/errors.js";
import { getOptionalString, getRecord, isRecord } from "./json.js";

// ---------------------------------------------------------------------------
// Body inspection
// ---------------------------------------------------------------------------

/** Human-readable message from `error.message`, `message`, `error` or the raw body. */
function extractMessage(body: unknown, status: number): string {
  if (isRecord(body)) {
    const message =
      getOptionalString(getRecord(body, "error"), "message") ??
      getOptionalString(body, "message") ??
      getOptionalString(body, "error");
    if (message) return message;
  }
  if (typeof body === "string" && body.trim() !== "") return body.trim();
  return `HTTP ${status}`;
}

function extractErrorCode(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const nested = getRecord(body, "error");
  return (
    getOptionalString(nested, "code") ??
    getOptionalString(nested, "type") ??
    getOptionalString(nested, "status") ??
    getOptionalString(body, "code") ??
    getOptionalString(body, "type")
  );
}

/** `Retry-After` in seconds. Only the numeric form is honoured. */
function parseRetryAfter(headers?: Headers): number | undefined {
  const raw = headers?.get("retry-after");
  if (raw == null) return undefined;
  const seconds = parseFloat(raw);
  return !Number.isNaN(seconds) && seconds >= 0 ? seconds : undefined;
}

// ---------------------------------------------------------------------------
// Message-based classification
// ---------------------------------------------------------------------------

type ErrorOptions = Omit<ProviderErrorOptions, "retryable">;

/** Vendors report some failures under generic statuses (e.g. Gemini's 400 for a bad key). */
const MESSAGE_PATTERNS: Array<{
  patterns: RegExp[];
  classify: (message: string, opts: ErrorOptions) => ProviderError;
}> = [
  {
    patterns: [/api key not valid/i, /invalid api key/i, /incorrect api key/i, /unauthorized/i],
    classify: (msg, opts) => new AuthenticationError(msg, opts),
  },
  {
    patterns: [/content filter/i, /content management policy/i, /safety/i],
    classify: (msg, opts) => new ContentFilterError(msg, opts),
  },
  {
    patterns: [/rate limit/i, /too many requests/i],
    classify: (msg, opts) => new RateLimitError(msg, opts),
  },
];

function classifyByMessage(message: string, opts: ErrorOptions): ProviderError | undefined {
  for (const { patterns, classify } of MESSAGE_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(message))) {
      return classify(message, opts);
    }
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Map a non-2xx response to a typed error.
 *
 * 401/403 → AuthenticationError, 408 → TimeoutError, 429 → RateLimitError,
 * content-filter bodies → ContentFilterError, anything else → VendorError
 * (retryable for 5xx).
 */
export function mapHttpError(
  status: number,
  body: unknown,
  provider: string,
  headers?: Headers,
): ProviderError | TimeoutError {
  const message = extractMessage(body, status);
  const opts: ErrorOptions = {
    provider,
    status_code: status,
    error_code: extractErrorCode(body),
    retry_after: parseRetryAfter(headers),
    raw: isRecord(body) ? body : undefined,
  };

  switch (status) {
    case 401:
    case 403:
      return new AuthenticationError(message, opts);
    case 408:
      return new TimeoutError(message, { provider });
    case 429:
      return new RateLimitError(message, opts);
  }

  if (status >= 500) {
    return new VendorError(message, opts);
  }

  return classifyByMessage(message, opts) ?? new VendorError(message, opts);
}
