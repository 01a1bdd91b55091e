/**
 * Errors raised by the feature services on top of the core taxonomy.
 */

import { LlmError } from "@llm-switchboard/core";

/** Caller input rejected before any provider is contacted. */
export class InvalidInputError extends LlmError {
  constructor(message: string) {
    super(message, { retryable: false });
    this.name = "InvalidInputError";
  }
}

/** The model answered, but not in the requested format. */
export class ResponseFormatError extends LlmError {
  /** The raw model output. */
  readonly content: string;

  constructor(message: string, content: string, options?: { cause?: unknown; provider?: string }) {
    super(message, { ...options, retryable: false });
    this.name = "ResponseFormatError";
    this.content = content;
  }
}
