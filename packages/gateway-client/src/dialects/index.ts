/**
 * Barrel re-export for the chat dialects and the model router.
 */

import type { ChatDialect } from "./dialect.js";
import { Dialect } from "../types/enums.js";
import type { Logger } from "../utils/logger.js";
import { ClaudeCompatibleDialect } from "./claude-compatible/index.js";
import { OpenAICompatibleDialect } from "./openai-compatible/index.js";

export type { ChatDialect, DialectRequest } from "./dialect.js";
export { selectDialect, CLAUDE_MODEL_PREFIX } from "./router.js";
export { OpenAICompatibleDialect } from "./openai-compatible/index.js";
export { ClaudeCompatibleDialect } from "./claude-compatible/index.js";
export type { ClaudeCompatibleDialectOptions } from "./claude-compatible/index.js";

/** One instance of every dialect, keyed by name. */
export type DialectTable = Readonly<Record<Dialect, ChatDialect>>;

export function createDialects(options: { logger?: Logger } = {}): DialectTable {
  return {
    [Dialect.OPENAI_COMPATIBLE]: new OpenAICompatibleDialect(),
    [Dialect.CLAUDE_COMPATIBLE]: new ClaudeCompatibleDialect({ logger: options.logger }),
  };
}
