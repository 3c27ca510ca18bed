/**
 * GatewayClient: the caller-facing operations.
 *
 * Routes chat requests to their dialect, sends every request through the
 * configured transport, and makes sure each response body is released on
 * every exit path. The client keeps no per-call state and can be shared
 * between concurrent callers.
 */

import {
  SpeechModel,
  ConfigurationError,
  DecodeError,
  ProtocolMismatchError,
  type APIError,
  type ChatDelta,
  type ChatRequest,
  type ChatResponse,
  type DeltaCallback,
  type ImageRequest,
  type SpeechRequest,
  type Usage,
} from "./types/index.js";
import { createDialects, selectDialect, type ChatDialect, type DialectTable } from "./dialects/index.js";
import {
  FetchTransport,
  abortError,
  buildSignal,
  mergeHeaders,
  readBody,
  readText,
  releaseBody,
  type HttpMethod,
  type HttpRequestOptions,
  type HttpResponse,
  type HttpTransport,
} from "./utils/http.js";
import { readDataPayloads, readLines } from "./utils/sse.js";
import { apiErrorFrom } from "./utils/error-mapping.js";
import { base64ToBytes } from "./utils/base64.js";
import {
  isRecord,
  optionalArray,
  optionalNumber,
  optionalNumberMap,
  optionalString,
  parseJsonObject,
} from "./utils/json.js";
import { createLogger, type Logger } from "./utils/logger.js";
import { translateStream } from "./stream.js";
import {
  AZURE_SPEECH_PATH,
  azureSpeechHeaders,
  buildSsml,
  type AzureSpeechOptions,
} from "./speech.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const IMAGE_GENERATIONS_PATH = "/1/images/generations";
export const SPEECH_PATH = "/v1/audio/speech";
export const USAGE_PATH = "/1.1/me/usage";

export const DEFAULT_USER_AGENT = "gateway-client/0.1.0";

/** Streaming responses must carry a content type with this prefix. */
export const EVENT_STREAM_CONTENT_TYPE = "text/event-stream";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Configuration for the GatewayClient constructor. */
export interface ClientConfig {
  /** Bearer token sent with every request. */
  token: string;
  /** Gateway origin, e.g. "https://gateway.example.com". */
  baseUrl: string;
  /** Transport to send requests with. Defaults to `FetchTransport`. */
  transport?: HttpTransport;
  /** `User-Agent` header value. */
  userAgent?: string;
  /** Default timeout in milliseconds when a call passes none. */
  timeout?: number;
  /** Output format and region for the Azure speech route. */
  azureSpeech?: AzureSpeechOptions;
  /** Parent pino logger. */
  logger?: Logger;
}

/** Per-call cancellation: an abort signal and/or a timeout. */
export type RequestOptions = HttpRequestOptions;

type Env = Record<string, string | undefined>;

type BodyDecoder<T> = (response: HttpResponse, signal: AbortSignal | undefined) => Promise<T>;

// ---------------------------------------------------------------------------
// GatewayClient
// ---------------------------------------------------------------------------

export class GatewayClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly transport: HttpTransport;
  private readonly userAgent: string;
  private readonly timeout: number | undefined;
  private readonly azureSpeech: AzureSpeechOptions;
  private readonly log: Logger;
  private readonly dialects: DialectTable;

  constructor(config: ClientConfig) {
    if (!config.token) {
      throw new ConfigurationError("A gateway token is required");
    }
    if (!config.baseUrl) {
      throw new ConfigurationError("A gateway base URL is required");
    }
    try {
      new URL(config.baseUrl);
    } catch (err) {
      throw new ConfigurationError(`Invalid gateway base URL "${config.baseUrl}"`, { cause: err });
    }

    this.token = config.token;
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.transport = config.transport ?? new FetchTransport();
    this.userAgent = config.userAgent ?? DEFAULT_USER_AGENT;
    this.timeout = config.timeout;
    this.azureSpeech = { ...config.azureSpeech };
    this.log = createLogger({ module: "client" }, config.logger);
    this.dialects = createDialects({ logger: config.logger });
  }

  // -----------------------------------------------------------------------
  // Static factory
  // -----------------------------------------------------------------------

  /**
   * Create a client from environment variables.
   *
   * Reads `GATEWAY_TOKEN`, `GATEWAY_BASE_URL` and, optionally,
   * `GATEWAY_TIMEOUT_MS`.
   */
  static fromEnv(env: Env = process.env): GatewayClient {
    const token = env.GATEWAY_TOKEN;
    const baseUrl = env.GATEWAY_BASE_URL;
    if (!token) {
      throw new ConfigurationError("GATEWAY_TOKEN is not set");
    }
    if (!baseUrl) {
      throw new ConfigurationError("GATEWAY_BASE_URL is not set");
    }

    let timeout: number | undefined;
    const rawTimeout = env.GATEWAY_TIMEOUT_MS;
    if (rawTimeout) {
      timeout = Number(rawTimeout);
      if (!Number.isInteger(timeout) || timeout <= 0) {
        throw new ConfigurationError(
          `GATEWAY_TIMEOUT_MS must be a positive integer, got "${rawTimeout}"`,
        );
      }
    }

    return new GatewayClient({ token, baseUrl, timeout });
  }

  // -----------------------------------------------------------------------
  // Chat
  // -----------------------------------------------------------------------

  /**
   * Non-streaming chat.
   *
   * @throws {ProtocolMismatchError} If `request.stream` is true. Nothing is sent.
   * @throws {APIError} On any non-200 status.
   */
  async chat(request: ChatRequest, options?: RequestOptions): Promise<ChatResponse> {
    if (request.stream) {
      throw new ProtocolMismatchError("Use stream() or streamChat() for streaming chat requests");
    }

    const dialect = this.dialectFor(request.model);
    const signal = this.resolveSignal(options);
    const wire = await dialect.buildRequest(request, signal);

    return this.request(
      "POST",
      wire.path,
      JSON.stringify(wire.body),
      signal,
      undefined,
      async (res, signal) => dialect.decodeResponse(await readText(res, signal)),
    );
  }

  /**
   * Streaming chat as an async iterator.
   *
   * Yields one delta per accepted record in arrival order, then a single
   * `{ text: "", isFinal: true }`. Breaking out of the loop early releases
   * the response.
   *
   * @throws {ProtocolMismatchError} If `request.stream` is not true. Nothing is sent.
   * @throws {APIError} On a non-200 status or a non event-stream response.
   */
  async *stream(request: ChatRequest, options?: RequestOptions): AsyncIterableIterator<ChatDelta> {
    if (request.stream !== true) {
      throw new ProtocolMismatchError("Use chat() for non-streaming chat requests");
    }

    const dialect = this.dialectFor(request.model);
    const signal = this.resolveSignal(options);
    const wire = await dialect.buildRequest(request, signal);
    const res = await this.send("POST", wire.path, JSON.stringify(wire.body), signal);

    try {
      const contentType = res.headers.get("content-type") ?? "";
      if (res.status !== 200 || !contentType.startsWith(EVENT_STREAM_CONTENT_TYPE)) {
        throw await this.fail(res, signal);
      }

      const lines = res.body ? readLines(res.body, signal) : [];
      yield* translateStream(readDataPayloads(lines));
    } finally {
      await releaseBody(res);
    }
  }

  /**
   * Streaming chat driving a callback: `onDelta(text, false)` per delta,
   * then `onDelta("", true)` exactly once when the stream completes. On
   * error the promise rejects and the final call never happens.
   */
  async streamChat(
    request: ChatRequest,
    onDelta: DeltaCallback,
    options?: RequestOptions,
  ): Promise<void> {
    for await (const delta of this.stream(request, options)) {
      onDelta(delta.text, delta.isFinal);
    }
  }

  // -----------------------------------------------------------------------
  // Images
  // -----------------------------------------------------------------------

  /** Generate images. Resolves with one byte array per image. */
  async generateImage(request: ImageRequest, options?: RequestOptions): Promise<Uint8Array[]> {
    return this.request(
      "POST",
      IMAGE_GENERATIONS_PATH,
      JSON.stringify(request),
      this.resolveSignal(options),
      undefined,
      async (res, signal) => decodeImages(await readText(res, signal)),
    );
  }

  // -----------------------------------------------------------------------
  // Speech
  // -----------------------------------------------------------------------

  /**
   * Synthesize speech. Resolves with the raw audio bytes as returned by the
   * gateway; there is no JSON envelope.
   */
  async synthesizeSpeech(request: SpeechRequest, options?: RequestOptions): Promise<Uint8Array> {
    if (request.model === SpeechModel.AZURE) {
      return this.request(
        "POST",
        AZURE_SPEECH_PATH,
        buildSsml(request),
        this.resolveSignal(options),
        azureSpeechHeaders(this.azureSpeech),
        readBody,
      );
    }
    return this.request(
      "POST",
      SPEECH_PATH,
      JSON.stringify(request),
      this.resolveSignal(options),
      undefined,
      readBody,
    );
  }

  // -----------------------------------------------------------------------
  // Usage
  // -----------------------------------------------------------------------

  /** Current account usage, one entry per product. */
  async usage(options?: RequestOptions): Promise<Usage[]> {
    return this.request(
      "GET",
      USAGE_PATH,
      undefined,
      this.resolveSignal(options),
      undefined,
      async (res, signal) => decodeUsage(await readText(res, signal)),
    );
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private dialectFor(model: string): ChatDialect {
    return this.dialects[selectDialect(model)];
  }

  private resolveSignal(options?: RequestOptions): AbortSignal | undefined {
    return buildSignal({
      signal: options?.signal,
      timeout: options?.timeout ?? this.timeout,
    });
  }

  private buildHeaders(extra?: Record<string, string>): Record<string, string> {
    return mergeHeaders(
      {
        Authorization: `Bearer ${this.token}`,
        "User-Agent": this.userAgent,
        Accept: "*/*",
      },
      extra,
    );
  }

  private async send(
    method: HttpMethod,
    path: string,
    body: string | undefined,
    signal: AbortSignal | undefined,
    extraHeaders?: Record<string, string>,
  ): Promise<HttpResponse> {
    if (signal?.aborted) {
      throw abortError(signal);
    }
    this.log.debug({ method, path }, "sending gateway request");
    return this.transport.execute({
      method,
      url: `${this.baseUrl}${path}`,
      headers: this.buildHeaders(extraHeaders),
      body,
      signal,
    });
  }

  /** Send, check for 200, decode, and release the body whatever happens. */
  private async request<T>(
    method: HttpMethod,
    path: string,
    body: string | undefined,
    signal: AbortSignal | undefined,
    extraHeaders: Record<string, string> | undefined,
    decode: BodyDecoder<T>,
  ): Promise<T> {
    const res = await this.send(method, path, body, signal, extraHeaders);
    try {
      if (res.status !== 200) {
        throw await this.fail(res, signal);
      }
      return await decode(res, signal);
    } finally {
      await releaseBody(res);
    }
  }

  private async fail(res: HttpResponse, signal: AbortSignal | undefined): Promise<APIError> {
    const err = await apiErrorFrom(res, signal);
    this.log.debug({ status: err.status_code }, "gateway returned an error");
    return err;
  }
}

// ---------------------------------------------------------------------------
// Response decoding for the pass-through operations
// ---------------------------------------------------------------------------

function decodeImages(text: string): Uint8Array[] {
  const data = parseJsonObject(text, "image response");
  const images = optionalArray(data, "image_data", text) ?? [];
  return images.map((encoded, i) => {
    if (typeof encoded !== "string") {
      throw new DecodeError(`image_data[${i}] must be a base64 string`, text);
    }
    try {
      return base64ToBytes(encoded);
    } catch (err) {
      throw new DecodeError(`image_data[${i}] is not valid base64`, text, { cause: err });
    }
  });
}

function decodeUsage(text: string): Usage[] {
  const data = parseJsonObject(text, "usage response");
  const entries = optionalArray(data, "data", text) ?? [];
  return entries.map((entry, i) => {
    if (!isRecord(entry)) {
      throw new DecodeError(`data[${i}] must be an object`, text);
    }
    return {
      id: optionalString(entry, "id", text) ?? "",
      limit: optionalNumber(entry, "limit", text) ?? 0,
      product: optionalString(entry, "product", text) ?? "",
      usage: optionalNumberMap(entry, "usage", text) ?? {},
    };
  });
}
