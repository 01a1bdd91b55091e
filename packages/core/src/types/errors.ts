/**
 * Error taxonomy shared by every adapter and the orchestrator.
 *
 * All library errors inherit from LlmError. `retryable` drives the retry
 * loop; callers branch on the class.
 */

// ---------------------------------------------------------------------------
// LlmError: base for all library errors
// ---------------------------------------------------------------------------

export interface LlmErrorOptions {
  cause?: unknown;
  retryable?: boolean;
  /** Identifier of the provider involved, when one was selected. */
  provider?: string;
  status_code?: number;
}

export class LlmError extends Error {
  /** Whether this error is safe to retry. */
  readonly retryable: boolean;
  readonly provider?: string;
  readonly status_code?: number;

  constructor(message: string, options?: LlmErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "LlmError";
    this.retryable = options?.retryable ?? false;
    this.provider = options?.provider;
    this.status_code = options?.status_code;
  }
}

// ---------------------------------------------------------------------------
// Configuration errors: never retried
// ---------------------------------------------------------------------------

export class ConfigurationError extends LlmError {
  constructor(message: string, options?: { cause?: unknown; provider?: string }) {
    super(message, { ...options, retryable: false });
    this.name = "ConfigurationError";
  }
}

/** The requested provider identifier is not registered. */
export class ProviderNotFoundError extends ConfigurationError {
  constructor(provider: string) {
    super(`Provider "${provider}" is not registered`, { provider });
    this.name = "ProviderNotFoundError";
  }
}

/** The provider exists but is inactive or lacks a required credential. */
export class ProviderNotConfiguredError extends ConfigurationError {
  constructor(provider: string, reason: string) {
    super(`Provider "${provider}" is not available: ${reason}`, { provider });
    this.name = "ProviderNotConfiguredError";
  }
}

/** No explicit, default or prioritised provider could be selected. */
export class NoProviderAvailableError extends ConfigurationError {
  constructor(message = "No active LLM provider is available") {
    super(message);
    this.name = "NoProviderAvailableError";
  }
}

/** The selected provider does not implement the requested capability. */
export class UnsupportedCapabilityError extends LlmError {
  readonly capability: string;

  constructor(provider: string, capability: string) {
    super(`Provider "${provider}" does not support ${capability}`, {
      provider,
      retryable: false,
    });
    this.name = "UnsupportedCapabilityError";
    this.capability = capability;
  }
}

// ---------------------------------------------------------------------------
// ProviderError: errors reported by a vendor over HTTP
// ---------------------------------------------------------------------------

export interface ProviderErrorOptions {
  provider: string;
  status_code?: number;
  /** Vendor error code or type. */
  error_code?: string;
  retryable?: boolean;
  /** Seconds to wait before retrying. */
  retry_after?: number;
  /** Raw error response body. */
  raw?: Record<string, unknown>;
  cause?: unknown;
}

export class ProviderError extends LlmError {
  declare readonly provider: string;
  readonly error_code?: string;
  readonly retry_after?: number;
  readonly raw?: Record<string, unknown>;

  constructor(message: string, options: ProviderErrorOptions) {
    super(message, {
      cause: options.cause,
      retryable: options.retryable ?? false,
      provider: options.provider,
      status_code: options.status_code,
    });
    this.name = "ProviderError";
    this.error_code = options.error_code;
    this.retry_after = options.retry_after;
    this.raw = options.raw;
  }
}

type FixedRetryOptions = Omit<ProviderErrorOptions, "retryable">;

/** 401/403: invalid or insufficient credential. */
export class AuthenticationError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AuthenticationError";
  }
}

/** 429: rate limit exceeded. */
export class RateLimitError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, { ...options, retryable: true });
    this.name = "RateLimitError";
  }
}

/** Response blocked by the vendor's safety or content filter. */
export class ContentFilterError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, { ...options, retryable: false });
    this.name = "ContentFilterError";
  }
}

/** Any other non-2xx answer. Retryable only for 5xx. */
export class VendorError extends ProviderError {
  constructor(message: string, options: FixedRetryOptions) {
    super(message, {
      ...options,
      retryable: options.status_code !== undefined && options.status_code >= 500,
    });
    this.name = "VendorError";
  }
}

// ---------------------------------------------------------------------------
// Transport-level errors: retryable
// ---------------------------------------------------------------------------

/** Request, connect or stream-chunk deadline exceeded. */
export class TimeoutError extends LlmError {
  constructor(message: string, options?: { cause?: unknown; provider?: string }) {
    super(message, { ...options, retryable: true });
    this.name = "TimeoutError";
  }
}

/** Network-level failure: connect, send or body read. */
export class TransportError extends LlmError {
  constructor(message: string, options?: { cause?: unknown; provider?: string }) {
    super(message, { ...options, retryable: true });
    this.name = "TransportError";
  }
}

// ---------------------------------------------------------------------------
// Value errors
// ---------------------------------------------------------------------------

/** Vector operations on vectors of different length. */
export class DimensionMismatchError extends LlmError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Vector dimensions do not match: ${expected} vs ${actual}`, {
      retryable: false,
    });
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Normalise anything thrown below the orchestrator into an LlmError.
 * Network failures already arrive as TransportError from the HTTP layer;
 * anything else is a fault in the adapter and is not retried.
 */
export function toLlmError(err: unknown, provider?: string): LlmError {
  if (err instanceof LlmError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new LlmError(message, { cause: err, provider, retryable: false });
}
