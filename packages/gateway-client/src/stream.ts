/**
 * Streaming adapter: SSE data payloads in, canonical chat deltas out.
 *
 * Both dialects stream the same record shape,
 *
 *   data: {"type":"completion","model":"...","delta":"...","completion":"...","finishReason":"..."}
 *
 * with OpenAI-style streams filling `delta` and Claude-style streams filling
 * `completion`. Records with any other `type` (pings, metadata) are skipped,
 * so one parser serves every dialect. `data: [DONE]` ends the stream.
 */

import type { ChatDelta } from "./types/index.js";
import { optionalString, parseJsonObject } from "./utils/json.js";

/** Payload that terminates a stream. */
export const DONE_SENTINEL = "[DONE]";

/** The only record type that carries text. Records without a type count too. */
export const COMPLETION_RECORD_TYPE = "completion";

/** One decoded stream record. */
export interface DeltaRecord {
  type?: string;
  model?: string;
  delta?: string;
  completion?: string;
  finishReason?: string;
}

/**
 * Decode one data payload.
 *
 * @throws {DecodeError} When the payload is not a JSON object or a field has
 *   the wrong type.
 */
export function parseDeltaRecord(payload: string): DeltaRecord {
  const data = parseJsonObject(payload, "stream delta");
  return {
    type: optionalString(data, "type", payload),
    model: optionalString(data, "model", payload),
    delta: optionalString(data, "delta", payload),
    completion: optionalString(data, "completion", payload),
    finishReason: optionalString(data, "finishReason", payload),
  };
}

function toDelta(record: DeltaRecord): ChatDelta {
  return {
    text: record.completion || record.delta || "",
    isFinal: false,
    ...(record.model ? { model: record.model } : {}),
    ...(record.finishReason ? { finish_reason: record.finishReason } : {}),
  };
}

/**
 * Translate data payloads into chat deltas.
 *
 * Yields one non-final delta per accepted record, in payload order, then
 * exactly one `{ text: "", isFinal: true }` once the payloads end or the
 * `[DONE]` sentinel arrives. Reading stops at the sentinel; nothing after it
 * is consumed. Any error from `payloads` or from decoding ends the iteration
 * without the final delta.
 */
export async function* translateStream(
  payloads: AsyncIterable<string>,
): AsyncIterableIterator<ChatDelta> {
  for await (const payload of payloads) {
    if (payload === DONE_SENTINEL) break;

    const record = parseDeltaRecord(payload);
    if (record.type && record.type !== COMPLETION_RECORD_TYPE) continue;

    yield toDelta(record);
  }

  yield { text: "", isFinal: true };
}
