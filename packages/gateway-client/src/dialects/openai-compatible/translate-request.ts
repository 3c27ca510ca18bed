/**
 * Translate a canonical ChatRequest into the OpenAI-compatible chat body.
 *
 * The gateway's chat endpoint takes the canonical fields almost verbatim;
 * the only work is encoding image attachments into inline data URIs.
 */

import type { ChatRequest, Message, Role } from "../../types/index.js";

// ---------------------------------------------------------------------------
// Wire types
// ---------------------------------------------------------------------------

export interface OpenAICompatibleMessage {
  role: Role;
  content: string;
  /** `data:image/jpeg;base64,` URIs, omitted when the message has no images. */
  images?: string[];
}

export interface OpenAICompatibleRequestBody {
  model: string;
  temperature?: number;
  maxTokens?: number;
  stream?: boolean;
  messages: OpenAICompatibleMessage[];
}

/** Chat path, relative to the base URL. */
export const OPENAI_COMPATIBLE_CHAT_PATH = "/1/chat";

// ---------------------------------------------------------------------------
// Translation
// ---------------------------------------------------------------------------

async function translateMessage(
  message: Message,
  signal: AbortSignal | undefined,
): Promise<OpenAICompatibleMessage> {
  const images = message.images ?? [];
  if (images.length === 0) {
    return { role: message.role, content: message.content };
  }

  // Sequential: single-pass sources are read in message order.
  const encoded: string[] = [];
  for (const image of images) {
    encoded.push(await image.toDataURI(signal));
  }
  return { role: message.role, content: message.content, images: encoded };
}

export async function translateRequest(
  request: ChatRequest,
  signal?: AbortSignal,
): Promise<OpenAICompatibleRequestBody> {
  const messages: OpenAICompatibleMessage[] = [];
  for (const message of request.messages) {
    messages.push(await translateMessage(message, signal));
  }

  const body: OpenAICompatibleRequestBody = {
    model: request.model,
    messages,
  };
  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.maxTokens !== undefined) body.maxTokens = request.maxTokens;
  if (request.stream !== undefined) body.stream = request.stream;
  return body;
}
