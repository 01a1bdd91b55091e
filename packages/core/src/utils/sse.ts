/**
 * Server-Sent Events parser.
 *
 * Turns a `ReadableStream<Uint8Array>` into an async iterator of events,
 * reading one network chunk at a time:
 *   - `event:` sets the event type
 *   - `data:` lines form the payload, joined with "\n"
 *   - lines starting with `:` are comments
 *   - a blank line dispatches the accumulated event
 *
 * Chunks may split anywhere, including inside a line or a multi-byte
 * character.
 */

import { readChunk } from "./http.js";

export interface SSEEvent {
  /** From the `event:` line; `undefined` when absent. */
  event?: string;
  data: string;
  /** Reconnection interval from a `retry:` line, in milliseconds. */
  retry?: number;
}

interface PendingEvent {
  event: string | undefined;
  data: string[];
  retry: number | undefined;
}

const LINE_BREAK = /\r\n|\r|\n/;

function emptyPending(): PendingEvent {
  return { event: undefined, data: [], retry: undefined };
}

function applyField(line: string, pending: PendingEvent): void {
  const colon = line.indexOf(":");
  const field = colon === -1 ? line : line.slice(0, colon);
  let value = colon === -1 ? "" : line.slice(colon + 1);
  if (value.startsWith(" ")) value = value.slice(1);

  switch (field) {
    case "event":
      pending.event = value;
      break;
    case "data":
      pending.data.push(value);
      break;
    case "retry": {
      const ms = parseInt(value, 10);
      if (!Number.isNaN(ms)) pending.retry = ms;
      break;
    }
    // other fields are ignored
  }
}

function toEvent(pending: PendingEvent): SSEEvent | undefined {
  if (pending.data.length === 0) return undefined;
  return { event: pending.event, data: pending.data.join("\n"), retry: pending.retry };
}

/**
 * Parse an SSE byte stream. The iterator ends when the stream closes; a
 * trailing event without its blank line is still delivered.
 */
export async function* parseSSEStream(
  stream: ReadableStream<Uint8Array>,
): AsyncIterableIterator<SSEEvent> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let pending = emptyPending();

  try {
    for (;;) {
      const { value, done } = await readChunk(reader);

      if (done) {
        buffer = (buffer + decoder.decode()).replace(/\r$/, "");
        if (buffer !== "" && !buffer.startsWith(":")) applyField(buffer, pending);
        const last = toEvent(pending);
        if (last) yield last;
        return;
      }

      buffer += decoder.decode(value, { stream: true });
      // a trailing \r may be the first half of a \r\n split across chunks
      const held = buffer.endsWith("\r") ? "\r" : "";
      const lines = (held ? buffer.slice(0, -1) : buffer).split(LINE_BREAK);
      // the final segment is incomplete until the next chunk arrives
      buffer = (lines.pop() ?? "") + held;

      for (const line of lines) {
        if (line === "") {
          const event = toEvent(pending);
          pending = emptyPending();
          if (event) yield event;
        } else if (!line.startsWith(":")) {
          applyField(line, pending);
        }
      }
    }
  } finally {
    reader.releaseLock();
  }
}
