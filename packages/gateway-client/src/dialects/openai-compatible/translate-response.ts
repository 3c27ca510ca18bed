/**
 * Decode an OpenAI-compatible chat response.
 *
 * The wire shape already is the canonical one. Decoding checks the field
 * types it relies on and passes everything else through: role strings are
 * kept as sent, and usage keeps only its numeric counters.
 */

import {
  DecodeError,
  Role,
  type ChatResponse,
  type ChatResponseChoice,
} from "../../types/index.js";
import {
  isRecord,
  optionalArray,
  optionalNumber,
  optionalNumberMap,
  optionalString,
  parseJsonObject,
} from "../../utils/json.js";

function translateChoice(raw: unknown, position: number, payload: string): ChatResponseChoice {
  if (!isRecord(raw)) {
    throw new DecodeError(`Choice ${position} must be an object`, payload);
  }
  const message = raw["message"] ?? {};
  if (!isRecord(message)) {
    throw new DecodeError(`Choice ${position} message must be an object`, payload);
  }

  return {
    index: optionalNumber(raw, "index", payload) ?? position,
    message: {
      role: optionalString(message, "role", payload) ?? Role.ASSISTANT,
      content: optionalString(message, "content", payload) ?? "",
    },
    finish_reason: optionalString(raw, "finish_reason", payload) ?? "",
  };
}

export function translateResponse(text: string): ChatResponse {
  const data = parseJsonObject(text, "chat response");
  const choices = (optionalArray(data, "choices", text) ?? []).map((choice, i) =>
    translateChoice(choice, i, text),
  );
  const usage = optionalNumberMap(data, "usage", text);

  const response: ChatResponse = {
    id: optionalString(data, "id", text) ?? "",
    object: optionalString(data, "object", text) ?? "",
    created: optionalNumber(data, "created", text) ?? 0,
    model: optionalString(data, "model", text) ?? "",
    choices,
  };
  return usage ? { ...response, usage } : response;
}
