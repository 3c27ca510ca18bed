/**
 * ChatDialect interface: the contract every wire dialect implements.
 *
 * A dialect owns both directions of the translation: canonical request to
 * wire body, and wire response back to the canonical shape. Streaming needs
 * nothing dialect-specific; every dialect's deltas go through one parser.
 */

import type { Dialect } from "../types/enums.js";
import type { ChatRequest } from "../types/request.js";
import type { ChatResponse } from "../types/response.js";

/** Wire request produced by a dialect: where to send it and what to send. */
export interface DialectRequest {
  /** Path relative to the client's base URL. */
  readonly path: string;
  /** JSON-serializable body. */
  readonly body: object;
}

export interface ChatDialect {
  readonly name: Dialect;

  /**
   * Translate a canonical request. Encodes any attached images, reading
   * their sources under `signal`.
   */
  buildRequest(request: ChatRequest, signal?: AbortSignal): Promise<DialectRequest>;

  /**
   * Translate a successful (200) response body.
   *
   * @throws {DecodeError} On malformed JSON or an unexpected shape.
   */
  decodeResponse(text: string): ChatResponse;
}
