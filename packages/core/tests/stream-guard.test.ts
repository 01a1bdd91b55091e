import { describe, it, expect, vi, afterEach } from "vitest";
import { guardStream } from "../src/stream-guard.js";
import { TimeoutError } from "../src/types/errors.js";
import { collect } from "./helpers.js";

/** Yields `values`, then hangs forever. */
function stallingSource(values: number[]) {
  let index = 0;
  const source = {
    next: (): Promise<IteratorResult<number>> => {
      const value = values[index++];
      return value === undefined
        ? new Promise<IteratorResult<number>>(() => undefined)
        : Promise.resolve({ value, done: false });
    },
    return: vi.fn(async (): Promise<IteratorResult<number>> => ({ value: undefined, done: true })),
  };
  return source;
}

async function* numbers(...values: number[]): AsyncGenerator<number> {
  for (const value of values) yield value;
}

afterEach(() => {
  vi.useRealTimers();
});

describe("guardStream", () => {
  it("passes chunks through within the deadlines", async () => {
    const chunks = await collect(
      guardStream(numbers(1, 2, 3), { firstChunkTimeoutMs: 1000, chunkTimeoutMs: 1000 }),
    );
    expect(chunks).toEqual([1, 2, 3]);
  });

  it("times out waiting for the first chunk and aborts the read", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const stream = guardStream(stallingSource([]), {
      firstChunkTimeoutMs: 100,
      chunkTimeoutMs: 50,
      controller,
      provider: "slow",
    });

    const pending = stream.next();
    const assertion = expect(pending).rejects.toThrow("No stream chunk within 100ms");
    await vi.advanceTimersByTimeAsync(100);
    await assertion;
    expect(controller.signal.aborted).toBe(true);
  });

  it("times out between chunks after yielding the earlier ones", async () => {
    vi.useFakeTimers();
    const stream = guardStream(stallingSource([1]), { firstChunkTimeoutMs: 100, chunkTimeoutMs: 50 });

    expect(await stream.next()).toEqual({ value: 1, done: false });
    const pending = stream.next();
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it("raises the between-chunk message once streaming started", async () => {
    vi.useFakeTimers();
    const stream = guardStream(stallingSource([1]), { firstChunkTimeoutMs: 100, chunkTimeoutMs: 50 });
    await stream.next();

    const assertion = expect(stream.next()).rejects.toThrow(
      "Stream stalled for more than 50ms between chunks",
    );
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it("closes the source when the consumer stops early", async () => {
    const source = stallingSource([1, 2, 3]);
    const controller = new AbortController();
    for await (const chunk of guardStream(source, {
      firstChunkTimeoutMs: 0,
      chunkTimeoutMs: 0,
      controller,
    })) {
      expect(chunk).toBe(1);
      break;
    }
    expect(source.return).toHaveBeenCalledTimes(1);
    expect(controller.signal.aborted).toBe(true);
  });

  it("does not abort a stream that finished normally", async () => {
    const controller = new AbortController();
    await collect(guardStream(numbers(1), { firstChunkTimeoutMs: 0, chunkTimeoutMs: 0, controller }));
    expect(controller.signal.aborted).toBe(false);
  });
});
