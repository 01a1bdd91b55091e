/**
 * Retry with exponential backoff and jitter.
 *
 *   - delay = min(baseDelay * multiplier^attempt, maxDelay), times a jitter
 *     factor in [0.5, 1.5) when enabled
 *   - a `retry_after` hint (seconds) on the error replaces the computed delay
 *   - only errors with `retryable === true` are retried
 *
 * Adapters never retry; the orchestrator wraps each dispatch in `retry`.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Retries after the initial attempt. */
  maxRetries: number;
  /** Milliseconds before the first retry. */
  baseDelay: number;
  /** Upper bound for any single wait, in milliseconds. */
  maxDelay: number;
  backoffMultiplier: number;
  jitter: boolean;
  /** Called before each wait with the error, the 0-based retry index and the delay. */
  onRetry?: (error: Error, attempt: number, delay: number) => void;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxRetries: 2,
  baseDelay: 1000,
  maxDelay: 60_000,
  backoffMultiplier: 2,
  jitter: true,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Backoff delay for the given 0-based retry index. */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  const delay = Math.min(
    policy.baseDelay * Math.pow(policy.backoffMultiplier, attempt),
    policy.maxDelay,
  );
  return policy.jitter ? delay * (0.5 + Math.random()) : delay;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetryable(err: unknown): boolean {
  return err instanceof Error && "retryable" in err && err.retryable === true;
}

/** The error's `retry_after` in milliseconds, when it carries a positive one. */
function retryAfterMs(err: Error): number | undefined {
  if (!("retry_after" in err)) return undefined;
  const hint = err.retry_after;
  return typeof hint === "number" && hint > 0 ? hint * 1000 : undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run `fn`, retrying retryable failures according to `policy`.
 *
 * A `retry_after` hint longer than `maxDelay` surfaces the error at once
 * rather than waiting. When the budget is spent the last error is thrown
 * unchanged.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  policy?: Partial<RetryPolicy>,
): Promise<T> {
  const p: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));

      if (attempt >= p.maxRetries || !isRetryable(error)) {
        throw error;
      }

      const hinted = retryAfterMs(error);
      if (hinted !== undefined && hinted > p.maxDelay) {
        throw error;
      }
      const delay = hinted ?? calculateDelay(attempt, p);

      p.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}
