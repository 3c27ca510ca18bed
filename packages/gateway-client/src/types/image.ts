/**
 * Image attachment for multimodal chat messages.
 *
 * An Image owns a byte source and only reads it when the request carrying it
 * is encoded. In-memory sources can be encoded repeatedly; streamed sources
 * are single-pass and may be encoded once.
 */

import { ImageEncodingError } from "./errors.js";
import { bytesToBase64, concatBytes } from "../utils/base64.js";
import { abortable, closeReader } from "../utils/http.js";
import { logger } from "../utils/logger.js";

/** Anything an Image can read its bytes from. */
export type ByteSource =
  | Uint8Array
  | ReadableStream<Uint8Array>
  | AsyncIterable<Uint8Array>;

/** Prefix of every encoded image payload. */
export const IMAGE_DATA_URI_PREFIX = "data:image/jpeg;base64,";

export class Image {
  private readonly source: ByteSource;
  private consumed = false;

  constructor(source: ByteSource) {
    this.source = source;
  }

  /** Whether the source can be read more than once. */
  get reusable(): boolean {
    return this.source instanceof Uint8Array;
  }

  /**
   * Read the whole source and return it as a `data:image/jpeg;base64,` URI.
   * Every read is bound to `signal`; an abort rejects with the signal's
   * AbortError or RequestTimeoutError and closes the source.
   *
   * @throws {ImageEncodingError} If the source fails mid-read, or a
   *   single-pass source has already been read.
   */
  async toDataURI(signal?: AbortSignal): Promise<string> {
    const bytes = await this.readSource(signal);
    return `${IMAGE_DATA_URI_PREFIX}${bytesToBase64(bytes)}`;
  }

  private async readSource(signal?: AbortSignal): Promise<Uint8Array> {
    if (this.source instanceof Uint8Array) {
      return this.source;
    }
    if (this.consumed) {
      throw new ImageEncodingError("Image source is single-pass and has already been read");
    }
    this.consumed = true;

    try {
      if ("getReader" in this.source) {
        return await readStream(this.source, signal);
      }
      return await readIterable(this.source, signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new ImageEncodingError("Failed to read image source", { cause: err });
    }
  }
}

async function readStream(
  stream: ReadableStream<Uint8Array>,
  signal: AbortSignal | undefined,
): Promise<Uint8Array> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let finished = false;
  try {
    for (;;) {
      const { value, done } = await abortable(reader.read(), signal);
      if (done) {
        finished = true;
        break;
      }
      chunks.push(value);
    }
  } finally {
    await closeReader(reader, finished);
  }
  return concatBytes(chunks);
}

async function readIterable(
  source: AsyncIterable<Uint8Array>,
  signal: AbortSignal | undefined,
): Promise<Uint8Array> {
  const iterator = source[Symbol.asyncIterator]();
  const chunks: Uint8Array[] = [];
  let finished = false;
  try {
    for (;;) {
      const result = await abortable(iterator.next(), signal);
      if (result.done) {
        finished = true;
        break;
      }
      chunks.push(result.value);
    }
  } finally {
    if (!finished) {
      // Not awaited: a stalled iterator settles return() only after its pending next().
      iterator.return?.().catch((err: unknown) => {
        logger.debug({ err }, "closing image source failed");
      });
    }
  }
  return concatBytes(chunks);
}
