/**
 * Chunk deadlines for streamed responses.
 *
 * The first chunk and each following chunk have their own deadline. When one
 * expires the network read is aborted and a `TimeoutError` is raised at the
 * current position; chunks already yielded stay yielded.
 */

import { TimeoutError } from "./types/errors.js";
import { silentLogger, type Logger } from "./utils/logger.js";

export interface StreamGuardOptions {
  /** Milliseconds to wait for the first chunk; 0 disables the deadline. */
  firstChunkTimeoutMs: number;
  /** Milliseconds allowed between chunks; 0 disables the deadline. */
  chunkTimeoutMs: number;
  /** Aborted when a deadline expires or the consumer stops early. */
  controller?: AbortController;
  provider?: string;
  logger?: Logger;
}

export async function* guardStream<T>(
  source: AsyncIterator<T>,
  options: StreamGuardOptions,
): AsyncIterableIterator<T> {
  const logger = options.logger ?? silentLogger;
  let first = true;
  let finished = false;
  let timedOut = false;

  const nextWithin = async (ms: number): Promise<IteratorResult<T>> => {
    const pending = source.next();
    if (ms <= 0) return pending;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(
          new TimeoutError(
            first
              ? `No stream chunk within ${ms}ms`
              : `Stream stalled for more than ${ms}ms between chunks`,
            { provider: options.provider },
          ),
        );
      }, ms);
    });

    try {
      return await Promise.race([pending, deadline]);
    } catch (err: unknown) {
      if (timedOut) {
        options.controller?.abort();
        // the aborted read settles later; its outcome no longer matters
        pending.catch((late: unknown) => {
          logger.debug("Stream read ended after timeout", {
            provider: options.provider,
            error: String(late),
          });
        });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  };

  try {
    for (;;) {
      const result = await nextWithin(first ? options.firstChunkTimeoutMs : options.chunkTimeoutMs);
      first = false;
      if (result.done) {
        finished = true;
        return;
      }
      yield result.value;
    }
  } finally {
    if (!finished) {
      options.controller?.abort();
      if (!timedOut) await source.return?.();
    }
  }
}
