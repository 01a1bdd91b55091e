/**
 * Newline-delimited JSON stream parser (Ollama's streaming format).
 */

import { readChunk } from "./http.js";
import { isRecord, parseJson, type JsonRecord } from "./json.js";

/**
 * Yield one record per JSON line, reading the stream lazily. Blank lines and
 * lines that are not JSON objects are skipped.
 */
export async function* parseNDJSONStream(
  stream: ReadableStream<Uint8Array>,
): AsyncIterableIterator<JsonRecord> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    for (;;) {
      const { value, done } = await readChunk(reader);
      if (done) {
        buffer += decoder.decode();
        const last = parseLine(buffer);
        if (last) yield last;
        return;
      }

      buffer += decoder.decode(value, { stream: true });
      let newline = buffer.indexOf("\n");
      while (newline !== -1) {
        const record = parseLine(buffer.slice(0, newline));
        buffer = buffer.slice(newline + 1);
        if (record) yield record;
        newline = buffer.indexOf("\n");
      }
    }
  } finally {
    reader.releaseLock();
  }
}

function parseLine(line: string): JsonRecord | undefined {
  const trimmed = line.trim();
  if (trimmed === "") return undefined;
  const parsed = parseJson(trimmed);
  return isRecord(parsed) ? parsed : undefined;
}
