/**
 * Barrel re-export for utility modules.
 */

// HTTP transport port and body helpers
export {
  FetchTransport,
  mergeHeaders,
  buildSignal,
  abortError,
  readBody,
  readText,
  releaseBody,
} from "./http.js";
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  HttpRequestOptions,
} from "./http.js";

// SSE line reader
export { readLines, readDataPayloads, DATA_PREFIX } from "./sse.js";

// Error construction
export { apiErrorFrom } from "./error-mapping.js";

// Logging
export { createLogger, logger } from "./logger.js";
export type { LogContext, Logger } from "./logger.js";
