/**
 * Message type and factories for the gateway client.
 */

import { Role } from "./enums.js";
import type { Image } from "./image.js";

/** One turn of a conversation. Treated as immutable once sent. */
export interface Message {
  readonly role: Role;
  readonly content: string;
  /** Inline image attachments, in order. Only the OpenAI-compatible dialect sends them. */
  readonly images?: readonly Image[];
}

// ---------------------------------------------------------------------------
// Convenience factory functions
// ---------------------------------------------------------------------------

/** Create a system message from plain text. */
export function createSystemMessage(text: string): Message {
  return { role: Role.SYSTEM, content: text };
}

/** Create a user message, optionally with image attachments. */
export function createUserMessage(text: string, images?: readonly Image[]): Message {
  if (images && images.length > 0) {
    return { role: Role.USER, content: text, images };
  }
  return { role: Role.USER, content: text };
}

/** Create an assistant message from plain text. */
export function createAssistantMessage(text: string): Message {
  return { role: Role.ASSISTANT, content: text };
}
