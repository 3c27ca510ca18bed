/**
 * Decode a Claude-compatible completion response into the canonical shape.
 *
 * Wire shape: { type, id, model, completion, stop_reason }. It becomes a
 * "chat.completion" with one assistant choice carrying the completion.
 */

import { Role, type ChatResponse } from "../../types/index.js";
import { optionalString, parseJsonObject } from "../../utils/json.js";

/** Object tag given to responses synthesized from completions. */
export const CHAT_COMPLETION_OBJECT = "chat.completion";

export function translateResponse(text: string): ChatResponse {
  const data = parseJsonObject(text, "completion response");

  return {
    id: optionalString(data, "id", text) ?? "",
    object: CHAT_COMPLETION_OBJECT,
    created: 0,
    model: optionalString(data, "model", text) ?? "",
    choices: [
      {
        index: 0,
        message: {
          role: Role.ASSISTANT,
          content: optionalString(data, "completion", text) ?? "",
        },
        finish_reason: optionalString(data, "stop_reason", text) ?? "",
      },
    ],
  };
}
