/**
 * Barrel re-export for all gateway client types.
 */

// Enums
export { Role, Dialect, ChatModel, ImageModel, SpeechModel } from "./enums.js";

// Message and image types
export type { Message } from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
} from "./message.js";
export { Image, IMAGE_DATA_URI_PREFIX } from "./image.js";
export type { ByteSource } from "./image.js";

// Request types
export type {
  ChatRequest,
  ImageRequest,
  DallEParams,
  StableDiffusionXLParams,
  SpeechRequest,
} from "./request.js";

// Response types
export type { ChatResponse, ChatResponseChoice, Usage } from "./response.js";

// Stream types
export type { ChatDelta, DeltaCallback } from "./stream.js";

// Errors
export {
  SDKError,
  APIError,
  ProtocolMismatchError,
  DecodeError,
  ImageEncodingError,
  ConfigurationError,
  AbortError,
  RequestTimeoutError,
} from "./errors.js";
