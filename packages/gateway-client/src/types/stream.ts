/**
 * Streaming types for the gateway client.
 */

/** One delivery from a streaming chat. */
export interface ChatDelta {
  /** Incremental text; empty on the final delivery. */
  readonly text: string;
  /** True exactly once, on the last delivery of a successful stream. */
  readonly isFinal: boolean;
  /** Model reported by the delta record, if any. */
  readonly model?: string;
  /** Finish reason reported by the delta record, if any. */
  readonly finish_reason?: string;
}

/** Callback form of a chat stream, driven by `streamChat()`. */
export type DeltaCallback = (text: string, isFinal: boolean) => void;
