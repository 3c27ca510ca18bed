/**
 * Model catalog: static metadata for the chat models the gateway serves.
 *
 * Provides lookup and listing. The dialect of each entry comes from the
 * router, so the catalog can never disagree with how requests are sent.
 */

import { ChatModel, type Dialect } from "./types/enums.js";
import { selectDialect } from "./dialects/router.js";

// ---------------------------------------------------------------------------
// ModelInfo
// ---------------------------------------------------------------------------

/** Static metadata about a known chat model. */
export interface ModelInfo {
  /** Identifier sent as `model`. */
  id: string;
  /** Upstream provider behind the gateway. */
  provider: string;
  /** Human-readable label. */
  displayName: string;
  /** Wire dialect used for this model. */
  dialect: Dialect;
  /** Whether image attachments reach the model. */
  supportsVision: boolean;
}

// ---------------------------------------------------------------------------
// Catalog data
// ---------------------------------------------------------------------------

type CatalogEntry = Omit<ModelInfo, "dialect">;

const ENTRIES: CatalogEntry[] = [
  // -- OpenAI --
  { id: ChatModel.GPT_4_TURBO, provider: "openai", displayName: "GPT-4 Turbo", supportsVision: false },
  { id: ChatModel.GPT_4_VISION_PREVIEW, provider: "openai", displayName: "GPT-4 Vision (Preview)", supportsVision: true },
  { id: ChatModel.GPT_4, provider: "openai", displayName: "GPT-4", supportsVision: false },
  { id: ChatModel.GPT_4_32K, provider: "openai", displayName: "GPT-4 32K", supportsVision: false },
  { id: ChatModel.GPT_3_5_TURBO, provider: "openai", displayName: "GPT-3.5 Turbo", supportsVision: false },
  { id: ChatModel.GPT_3_5_TURBO_16K, provider: "openai", displayName: "GPT-3.5 Turbo 16K", supportsVision: false },

  // -- Anthropic --
  { id: ChatModel.CLAUDE_2, provider: "anthropic", displayName: "Claude 2.1", supportsVision: false },
  { id: ChatModel.CLAUDE_INSTANT_1, provider: "anthropic", displayName: "Claude Instant", supportsVision: false },

  // -- Google --
  { id: ChatModel.GEMINI_PRO, provider: "google", displayName: "Gemini Pro", supportsVision: false },
  { id: ChatModel.GEMINI_PRO_VISION, provider: "google", displayName: "Gemini Pro Vision", supportsVision: true },

  // -- Baidu --
  { id: ChatModel.ERNIE_BOT_4, provider: "baidu", displayName: "ERNIE Bot 4", supportsVision: false },
  { id: ChatModel.ERNIE_BOT, provider: "baidu", displayName: "ERNIE Bot", supportsVision: false },
  { id: ChatModel.ERNIE_BOT_TURBO, provider: "baidu", displayName: "ERNIE Bot Turbo", supportsVision: false },

  // -- Alibaba --
  { id: ChatModel.QWEN_PLUS, provider: "alibaba", displayName: "Qwen Plus", supportsVision: false },
  { id: ChatModel.QWEN_TURBO, provider: "alibaba", displayName: "Qwen Turbo", supportsVision: false },

  // -- iFlytek --
  { id: ChatModel.SPARK_DESK_V3, provider: "iflytek", displayName: "SparkDesk 3.0", supportsVision: false },
  { id: ChatModel.SPARK_DESK_V2, provider: "iflytek", displayName: "SparkDesk 2.0", supportsVision: false },
  { id: ChatModel.SPARK_DESK_V1, provider: "iflytek", displayName: "SparkDesk 1.5", supportsVision: false },
];

const MODELS: ModelInfo[] = ENTRIES.map((entry) => ({
  ...entry,
  dialect: selectDialect(entry.id),
}));

const MODEL_MAP = new Map<string, ModelInfo>(MODELS.map((m) => [m.id, m]));

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Look up a model by its ID.
 *
 * Returns `undefined` if the model is not in the catalog.
 */
export function getModelInfo(modelId: string): ModelInfo | undefined {
  return MODEL_MAP.get(modelId);
}

/**
 * List all known models, optionally filtered by provider name.
 */
export function listModels(provider?: string): ModelInfo[] {
  if (provider === undefined) {
    return [...MODELS];
  }
  return MODELS.filter((m) => m.provider === provider);
}

/**
 * Get the "latest" (first listed) model for a provider, optionally one that
 * accepts images.
 */
export function getLatestModel(
  provider: string,
  capability?: "vision",
): ModelInfo | undefined {
  const candidates = MODELS.filter((m) => m.provider === provider);
  if (capability === "vision") {
    return candidates.find((m) => m.supportsVision);
  }
  return candidates[0];
}
