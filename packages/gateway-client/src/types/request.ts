/**
 * Request types for the gateway client.
 */

import type { Message } from "./message.js";
import type { ChatModel, ImageModel, SpeechModel } from "./enums.js";

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

/**
 * Input for both `chat()` and `stream()` / `streamChat()`.
 *
 * `stream` selects the operation: `chat()` rejects `true`, the streaming
 * operations reject anything else.
 */
export interface ChatRequest {
  /** Model identifier; a `claude` prefix selects the Claude-compatible dialect. */
  readonly model: ChatModel | (string & {});
  readonly messages: readonly Message[];
  /** Sampling temperature. */
  readonly temperature?: number;
  /** Maximum tokens to generate. */
  readonly maxTokens?: number;
  readonly stream?: boolean;
}

// ---------------------------------------------------------------------------
// Image generation
// ---------------------------------------------------------------------------

export interface DallEParams {
  readonly quality: string;
  readonly style: string;
}

export interface StableDiffusionXLParams {
  readonly steps: number;
  readonly sampler: string;
  readonly style_preset: string;
  readonly scale: number;
}

export interface ImageRequest {
  readonly width: number;
  readonly height: number;
  /** Number of images to generate. */
  readonly num: number;
  readonly model: ImageModel | (string & {});
  readonly prompt: string;
  readonly negativePrompt?: string;
  readonly dallE?: DallEParams;
  readonly stable_diffusion_xl?: StableDiffusionXLParams;
}

// ---------------------------------------------------------------------------
// Speech
// ---------------------------------------------------------------------------

export interface SpeechRequest {
  /** Text to synthesize. */
  readonly input: string;
  readonly voice: string;
  /** `__azure` routes to the Azure SSML endpoint. */
  readonly model: SpeechModel | (string & {});
}
