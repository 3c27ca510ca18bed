/**
 * Translate a canonical ChatRequest into the Claude-compatible completion body.
 *
 * The completion endpoint has no message list. The conversation is flattened
 * into a single prompt of role-tagged turns ending in an assistant cue:
 *
 *   "\n\nHuman: A\n\nHuman: B\n\nAssistant: C\n\nAssistant:"
 *
 * System turns are sent as Human turns. Images cannot be expressed and are
 * dropped; `droppedImages` reports how many.
 */

import { Role, type ChatRequest, type Message } from "../../types/index.js";

// ---------------------------------------------------------------------------
// Wire types
// ---------------------------------------------------------------------------

export interface ClaudeCompatibleRequestBody {
  model: string;
  temperature?: number;
  stream: boolean;
  max_tokens_to_sample?: number;
  prompt: string;
}

/** Completion path, relative to the base URL. */
export const CLAUDE_COMPATIBLE_COMPLETE_PATH = "/v1/complete";

export const HUMAN_TURN = "\n\nHuman: ";
export const ASSISTANT_TURN = "\n\nAssistant: ";
export const ASSISTANT_CUE = "\n\nAssistant:";

// ---------------------------------------------------------------------------
// Translation
// ---------------------------------------------------------------------------

function turnPrefix(role: Role): string {
  switch (role) {
    case Role.SYSTEM:
    case Role.USER:
      return HUMAN_TURN;
    case Role.ASSISTANT:
      return ASSISTANT_TURN;
    default:
      return "";
  }
}

/** Flatten a conversation into a single completion prompt. */
export function buildPrompt(messages: readonly Message[]): string {
  let prompt = "";
  for (const message of messages) {
    prompt += turnPrefix(message.role) + message.content;
  }
  return prompt + ASSISTANT_CUE;
}

export interface TranslatedRequest {
  body: ClaudeCompatibleRequestBody;
  /** Number of image attachments that could not be sent. */
  droppedImages: number;
}

export function translateRequest(request: ChatRequest): TranslatedRequest {
  const body: ClaudeCompatibleRequestBody = {
    model: request.model,
    stream: request.stream ?? false,
    prompt: buildPrompt(request.messages),
  };
  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.maxTokens !== undefined) body.max_tokens_to_sample = request.maxTokens;

  let droppedImages = 0;
  for (const message of request.messages) {
    droppedImages += message.images?.length ?? 0;
  }

  return { body, droppedImages };
}
