/**
 * OpenAI-compatible chat dialect.
 *
 * Used for every model that does not carry the `claude` prefix: the OpenAI
 * family as well as the other providers the gateway fronts with the same
 * flat schema.
 */

import type { ChatDialect, DialectRequest } from "../dialect.js";
import { Dialect, type ChatRequest, type ChatResponse } from "../../types/index.js";
import { OPENAI_COMPATIBLE_CHAT_PATH, translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";

export class OpenAICompatibleDialect implements ChatDialect {
  readonly name = Dialect.OPENAI_COMPATIBLE;

  async buildRequest(request: ChatRequest, signal?: AbortSignal): Promise<DialectRequest> {
    const body = await translateRequest(request, signal);
    return { path: OPENAI_COMPATIBLE_CHAT_PATH, body };
  }

  decodeResponse(text: string): ChatResponse {
    return translateResponse(text);
  }
}

export { translateRequest, OPENAI_COMPATIBLE_CHAT_PATH } from "./translate-request.js";
export type {
  OpenAICompatibleMessage,
  OpenAICompatibleRequestBody,
} from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
