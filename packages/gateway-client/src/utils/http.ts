/**
 * HTTP transport port and the default `fetch`-backed transport.
 *
 * The client never touches `fetch` directly: it hands an `HttpRequest` to an
 * `HttpTransport` and gets back a response whose body it must release. The
 * helpers here read or release that body so every exit path leaves it closed.
 */

import { AbortError, RequestTimeoutError, SDKError } from "../types/errors.js";
import { concatBytes } from "./base64.js";
import { logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type HttpMethod = "GET" | "POST";

/** A fully built request, ready for the transport. */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

/**
 * Response handed back by a transport.
 *
 * `body` is unread; whoever receives it must consume or cancel it.
 */
export interface HttpResponse {
  status: number;
  headers: Headers;
  body: ReadableStream<Uint8Array> | null;
}

/** The one capability the client needs from the network. Must be safe for concurrent use. */
export interface HttpTransport {
  execute(request: HttpRequest): Promise<HttpResponse>;
}

/** Per-call cancellation options. */
export interface HttpRequestOptions {
  /**
   * Timeout in milliseconds. It starts before any image is encoded and covers
   * the transport call and every body read.
   */
  timeout?: number;
  /** Optional caller-provided abort signal. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Gateway request headers: JSON content type first, then each set in order.
 * The Azure speech route replaces the content type with SSML this way.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = { "Content-Type": "application/json" };
  for (const set of headerSets) {
    if (set) Object.assign(merged, set);
  }
  return merged;
}

/**
 * The one signal a client call runs under: the caller's signal, a
 * `TimeoutError` after `timeout` ms, or both. `undefined` when the call has
 * neither, so the request runs unbounded.
 */
export function buildSignal(options: HttpRequestOptions = {}): AbortSignal | undefined {
  const { signal, timeout } = options;
  const deadline =
    timeout !== undefined && timeout > 0 ? AbortSignal.timeout(timeout) : undefined;
  if (!signal) return deadline;
  if (!deadline) return signal;
  return AbortSignal.any([signal, deadline]);
}

/** Translate an aborted signal's reason into a library error. */
export function abortError(signal: AbortSignal): SDKError {
  const reason: unknown = signal.reason;
  if (reason instanceof SDKError) return reason;
  if (reason instanceof Error && reason.name === "TimeoutError") {
    return new RequestTimeoutError("Request timed out", { cause: reason });
  }
  return new AbortError("Request was aborted", { cause: reason });
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts, whichever
 * comes first. The losing promise is left to the caller to clean up.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(abortError(signal));

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Release a reader. A reader that did not reach the end of its stream
 * cancels it first; one that did only drops its lock.
 */
export async function closeReader(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  finished: boolean,
): Promise<void> {
  if (!finished) {
    try {
      await reader.cancel();
    } catch (err) {
      // The stream already errored; that error is what the caller sees.
      logger.debug({ err }, "cancelling response body failed");
    }
  }
  reader.releaseLock();
}

// ---------------------------------------------------------------------------
// Body helpers
// ---------------------------------------------------------------------------

/**
 * Drain a response body into memory. The body is closed afterwards whether
 * reading succeeded or not.
 */
export async function readBody(
  response: HttpResponse,
  signal?: AbortSignal,
): Promise<Uint8Array> {
  if (!response.body) return new Uint8Array(0);

  const reader = response.body.getReader();
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

/** Drain a response body and decode it as UTF-8. */
export async function readText(
  response: HttpResponse,
  signal?: AbortSignal,
): Promise<string> {
  const bytes = await readBody(response, signal);
  return new TextDecoder().decode(bytes);
}

/**
 * Cancel a body nobody has read yet. A body that was already drained or
 * cancelled is closed, so this never releases the same stream twice.
 */
export async function releaseBody(response: HttpResponse): Promise<void> {
  if (!response.body || response.body.locked) return;
  try {
    await response.body.cancel();
  } catch (err) {
    logger.debug({ err }, "releasing response body failed");
  }
}

// ---------------------------------------------------------------------------
// FetchTransport
// ---------------------------------------------------------------------------

/** Default transport over the runtime's global `fetch`. */
export class FetchTransport implements HttpTransport {
  async execute(request: HttpRequest): Promise<HttpResponse> {
    let res: Response;
    try {
      res = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: request.signal,
      });
    } catch (err) {
      if (request.signal?.aborted) {
        throw abortError(request.signal);
      }
      throw err;
    }

    return {
      status: res.status,
      headers: res.headers,
      body: res.body,
    };
  }
}
