import { vi } from "vitest";
import type { HttpRequest, HttpResponse, HttpTransport } from "../src/utils/http.js";

// ---------------------------------------------------------------------------
// Streams
// ---------------------------------------------------------------------------

export interface TrackedStream {
  stream: ReadableStream<Uint8Array>;
  /** Called when the stream is cancelled by its consumer. */
  cancel: ReturnType<typeof vi.fn>;
}

/**
 * A byte stream that hands out `chunks` one pull at a time. With `hang`, it
 * never closes after the last chunk, like a connection that stalls.
 */
export function trackedStream(
  chunks: string[],
  options: { hang?: boolean } = {},
): TrackedStream {
  const encoder = new TextEncoder();
  const queue = [...chunks];
  const cancel = vi.fn();

  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      const next = queue.shift();
      if (next !== undefined) {
        controller.enqueue(encoder.encode(next));
        return;
      }
      if (options.hang) {
        return new Promise<void>(() => {});
      }
      controller.close();
    },
    cancel(reason) {
      cancel(reason);
    },
  });

  return { stream, cancel };
}

/** A byte stream that delivers `chunks` and then fails with `error`. */
export function failingStream(chunks: string[], error: Error): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const queue = [...chunks];
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const next = queue.shift();
      if (next !== undefined) {
        controller.enqueue(encoder.encode(next));
        return;
      }
      controller.error(error);
    },
  });
}

/** Collect everything an async iterable yields. */
export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iter) {
    items.push(item);
  }
  return items;
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

/** Build a transport response around a body stream. */
export function streamResponse(
  status: number,
  stream: ReadableStream<Uint8Array> | null,
  headers: Record<string, string> = {},
): HttpResponse {
  return { status, headers: new Headers(headers), body: stream };
}

/** Build a transport response with a text body. */
export function textResponse(
  status: number,
  text: string,
  headers: Record<string, string> = { "Content-Type": "application/json" },
): TrackedStream & { response: HttpResponse } {
  const tracked = trackedStream(text === "" ? [] : [text]);
  return { ...tracked, response: streamResponse(status, tracked.stream, headers) };
}

/** In-process transport that records requests and answers from a handler. */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly handler: (request: HttpRequest) => HttpResponse;

  constructor(handler: (request: HttpRequest) => HttpResponse) {
    this.handler = handler;
  }

  async execute(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.handler(request);
  }

  /** The only request sent; fails the test if there were none or several. */
  get lastRequest(): HttpRequest {
    const last = this.requests[this.requests.length - 1];
    if (!last || this.requests.length !== 1) {
      throw new Error(`expected exactly one request, got ${this.requests.length}`);
    }
    return last;
  }
}
