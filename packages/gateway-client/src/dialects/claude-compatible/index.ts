/**
 * Claude-compatible completion dialect.
 *
 * Selected for every model whose identifier starts with `claude`.
 */

import type { ChatDialect, DialectRequest } from "../dialect.js";
import { Dialect, type ChatRequest, type ChatResponse } from "../../types/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";
import { CLAUDE_COMPATIBLE_COMPLETE_PATH, translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";

export interface ClaudeCompatibleDialectOptions {
  logger?: Logger;
}

export class ClaudeCompatibleDialect implements ChatDialect {
  readonly name = Dialect.CLAUDE_COMPATIBLE;
  private readonly log: Logger;

  constructor(options: ClaudeCompatibleDialectOptions = {}) {
    this.log = createLogger({ dialect: this.name }, options.logger);
  }

  async buildRequest(request: ChatRequest): Promise<DialectRequest> {
    const { body, droppedImages } = translateRequest(request);
    if (droppedImages > 0) {
      this.log.warn(
        { model: request.model, droppedImages },
        "images are not supported by this dialect and were not sent",
      );
    }
    return { path: CLAUDE_COMPATIBLE_COMPLETE_PATH, body };
  }

  decodeResponse(text: string): ChatResponse {
    return translateResponse(text);
  }
}

export {
  translateRequest,
  buildPrompt,
  CLAUDE_COMPATIBLE_COMPLETE_PATH,
  HUMAN_TURN,
  ASSISTANT_TURN,
  ASSISTANT_CUE,
} from "./translate-request.js";
export type {
  ClaudeCompatibleRequestBody,
  TranslatedRequest,
} from "./translate-request.js";
export { translateResponse, CHAT_COMPLETION_OBJECT } from "./translate-response.js";
