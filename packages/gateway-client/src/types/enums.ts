/**
 * Core enums for the gateway client.
 *
 * Uses `as const satisfies` objects instead of TypeScript enums so the values
 * stay plain strings on the wire.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** Conversation roles understood by every dialect. */
export const Role = {
  /** Instructions shaping model behavior. */
  SYSTEM: "system",
  /** Human input. Text and images. */
  USER: "user",
  /** Model output. */
  ASSISTANT: "assistant",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// Dialect
// ---------------------------------------------------------------------------

/** Wire dialects multiplexed behind the chat operations. */
export const Dialect = {
  /** Flat chat schema, messages sent as-is. */
  OPENAI_COMPATIBLE: "openai-compatible",
  /** Prompt-flattened completion schema. */
  CLAUDE_COMPATIBLE: "claude-compatible",
} as const satisfies Record<string, string>;

export type Dialect = (typeof Dialect)[keyof typeof Dialect];

// ---------------------------------------------------------------------------
// Model identifiers
// ---------------------------------------------------------------------------

/** Chat model identifiers known to the gateway. Any other string is accepted too. */
export const ChatModel = {
  GPT_3_5_TURBO: "gpt-3.5-turbo",
  GPT_3_5_TURBO_16K: "gpt-3.5-turbo-16k",
  GPT_4: "gpt-4",
  GPT_4_32K: "gpt-4-32k",
  GPT_4_TURBO: "gpt-4-1106-preview",
  GPT_4_VISION_PREVIEW: "gpt-4-vision-preview",
  CLAUDE_INSTANT_1: "claude-instant-v1",
  CLAUDE_2: "claude-2.1",
  GEMINI_PRO: "gemini-pro",
  GEMINI_PRO_VISION: "gemini-pro-vision",
  ERNIE_BOT: "ERNIE-Bot",
  ERNIE_BOT_TURBO: "ERNIE-Bot-Turbo",
  ERNIE_BOT_4: "ERNIE-Bot-4",
  QWEN_TURBO: "qwen-turbo",
  QWEN_PLUS: "qwen-plus",
  SPARK_DESK_V1: "SparkDesk-V1.5",
  SPARK_DESK_V2: "SparkDesk-V2.0",
  SPARK_DESK_V3: "SparkDesk-V3.0",
} as const satisfies Record<string, string>;

export type ChatModel = (typeof ChatModel)[keyof typeof ChatModel];

export const ImageModel = {
  DALL_E_2: "dall-e-2",
  DALL_E_3: "dall-e-3",
  STABLE_DIFFUSION_XL: "stable_diffusion_xl",
} as const satisfies Record<string, string>;

export type ImageModel = (typeof ImageModel)[keyof typeof ImageModel];

export const SpeechModel = {
  TTS_1: "tts-1",
  /** Sentinel routing speech synthesis to the Azure SSML endpoint. */
  AZURE: "__azure",
} as const satisfies Record<string, string>;

export type SpeechModel = (typeof SpeechModel)[keyof typeof SpeechModel];
