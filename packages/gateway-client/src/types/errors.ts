/**
 * Error hierarchy for the gateway client.
 *
 * All library errors inherit from SDKError. Transport failures are not
 * wrapped: whatever the transport rejects with reaches the caller as-is.
 */

// ---------------------------------------------------------------------------
// SDKError: base for all library errors
// ---------------------------------------------------------------------------

/** Base error for all gateway client errors. */
export class SDKError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "SDKError";
  }
}

// ---------------------------------------------------------------------------
// Upstream errors
// ---------------------------------------------------------------------------

/**
 * Non-200 response from the gateway.
 *
 * Providers do not share an error schema, so the body is kept verbatim and
 * never parsed.
 */
export class APIError extends SDKError {
  /** HTTP status code returned by the gateway. */
  readonly status_code: number;
  /** Raw response body. */
  readonly body: string;

  constructor(status_code: number, body: string) {
    super(`API returned error: code=${status_code}, body=${body}`);
    this.name = "APIError";
    this.status_code = status_code;
    this.body = body;
  }
}

// ---------------------------------------------------------------------------
// Client-side errors
// ---------------------------------------------------------------------------

/** The operation called does not match the request's `stream` flag. */
export class ProtocolMismatchError extends SDKError {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolMismatchError";
  }
}

/** A response body or stream payload was not valid JSON of the expected shape. */
export class DecodeError extends SDKError {
  /** The text that failed to decode. */
  readonly payload: string;

  constructor(message: string, payload: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
    this.payload = payload;
  }
}

/** Reading an image byte source failed or the source was already consumed. */
export class ImageEncodingError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImageEncodingError";
  }
}

/** Client misconfiguration (missing token, bad base URL). */
export class ConfigurationError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** Request cancelled via abort signal. */
export class AbortError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AbortError";
  }
}

/** Request or stream exceeded its timeout. */
export class RequestTimeoutError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RequestTimeoutError";
  }
}
