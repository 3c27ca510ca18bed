/**
 * Structured logging with pino.
 *
 * The base level comes from `GATEWAY_LOG_LEVEL` (default: warn) so the client
 * stays quiet inside host applications unless asked otherwise.
 *
 * Usage:
 *   const log = createLogger({ module: "client" })
 *   log.debug({ path: "/1/chat" }, "sending request")
 */

import { pino, type Logger } from "pino";

const logLevel: string = process.env.GATEWAY_LOG_LEVEL ?? "warn";

const baseLogger: Logger = pino({
  name: "gateway-client",
  level: logLevel,
});

export interface LogContext {
  module?: string;
  dialect?: string;
  [key: string]: unknown;
}

/** Create a scoped logger with context tags. */
export function createLogger(context: LogContext, parent: Logger = baseLogger): Logger {
  return parent.child(context);
}

/** Default logger instance. */
export const logger: Logger = baseLogger;

export type { Logger };
