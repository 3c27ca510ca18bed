/**
 * Line-oriented reader for server-sent-event bodies.
 *
 * The gateway frames every payload on its own `data: ` line, so lines are
 * handed on one at a time as soon as they are complete rather than being
 * grouped into blank-line-delimited events. Lines are terminated by \r\n,
 * \r, or \n; a trailing line with no terminator is still delivered.
 */

import { abortable, closeReader } from "./http.js";

/** Prefix marking a payload line. */
export const DATA_PREFIX = "data: ";

/**
 * Split a byte stream into text lines.
 *
 * Every read is bound to `signal`. The stream is cancelled if iteration stops
 * before the end (consumer `break`, error, abort) and only unlocked otherwise.
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  signal?: AbortSignal,
): AsyncIterableIterator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();

  // Buffer for an incomplete line across chunk boundaries.
  let buffer = "";
  let finished = false;

  try {
    for (;;) {
      const { value, done } = await abortable(reader.read(), signal);

      if (done) {
        finished = true;
        buffer += decoder.decode();
        if (buffer.length > 0) {
          const line = buffer;
          buffer = "";
          yield line;
        }
        break;
      }

      buffer += decoder.decode(value, { stream: true });

      const lines = buffer.split(/\r\n|\r|\n/);
      // The last element is "" (chunk ended on a newline) or a partial line.
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        yield line;
      }
    }
  } finally {
    await closeReader(reader, finished);
  }
}

/**
 * Keep only payload lines and strip their prefix.
 *
 * Lines are trimmed first; anything not starting with `data: ` (comments,
 * `event:` lines, blank separators) is skipped.
 */
export async function* readDataPayloads(
  lines: AsyncIterable<string> | Iterable<string>,
): AsyncIterableIterator<string> {
  for await (const raw of lines) {
    const line = raw.trim();
    if (!line.startsWith(DATA_PREFIX)) continue;
    yield line.slice(DATA_PREFIX.length);
  }
}
