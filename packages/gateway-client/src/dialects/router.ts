/**
 * Model router: maps a model identifier to its wire dialect.
 */

import { Dialect } from "../types/enums.js";

/** Identifiers with this prefix speak the Claude-compatible dialect. */
export const CLAUDE_MODEL_PREFIX = "claude";

/**
 * Pick the wire dialect for a model. A literal `claude` prefix selects the
 * Claude-compatible dialect; everything else is OpenAI-compatible.
 */
export function selectDialect(model: string): Dialect {
  if (model.startsWith(CLAUDE_MODEL_PREFIX)) {
    return Dialect.CLAUDE_COMPATIBLE;
  }
  return Dialect.OPENAI_COMPATIBLE;
}
