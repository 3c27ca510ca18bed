/**
 * Canonical response types for the gateway client.
 */

import type { Role } from "./enums.js";

/** One generated alternative. Every current dialect produces exactly one. */
export interface ChatResponseChoice {
  readonly index: number;
  readonly message: {
    /** Upstream providers may answer with roles of their own, e.g. `"model"`. */
    readonly role: Role | (string & {});
    readonly content: string;
  };
  readonly finish_reason: string;
}

/** The single provider-agnostic chat response. */
export interface ChatResponse {
  readonly id: string;
  /** Object tag, `"chat.completion"` for synthesized responses. */
  readonly object: string;
  /** Unix seconds; 0 when the dialect does not report it. */
  readonly created: number;
  readonly model: string;
  readonly choices: readonly ChatResponseChoice[];
  /** Token counts keyed by metric name, when the provider reports them. */
  readonly usage?: Readonly<Record<string, number>>;
}

/** Account usage for one product, as reported by the usage endpoint. */
export interface Usage {
  readonly id: string;
  readonly limit: number;
  readonly product: string;
  /** Usage metric name to value. */
  readonly usage: Readonly<Record<string, number>>;
}
