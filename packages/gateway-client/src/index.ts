export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export transport, SSE and logging utilities
export * from "./utils/index.js";

// Re-export dialects and the model router
export * from "./dialects/index.js";

// Re-export the streaming adapter
export { translateStream, parseDeltaRecord, DONE_SENTINEL } from "./stream.js";
export type { DeltaRecord } from "./stream.js";

// Re-export Azure speech helpers
export { buildSsml, escapeXml, azureSpeechHeaders } from "./speech.js";
export type { AzureSpeechOptions } from "./speech.js";

// Re-export GatewayClient and related types
export { GatewayClient } from "./client.js";
export type { ClientConfig, RequestOptions } from "./client.js";

// Re-export model catalog
export { getModelInfo, listModels, getLatestModel } from "./catalog.js";
export type { ModelInfo } from "./catalog.js";

// ---------------------------------------------------------------------------
// Module-level default client
// ---------------------------------------------------------------------------

import { GatewayClient } from "./client.js";

let defaultClient: GatewayClient | undefined;

/**
 * Set the module-level default GatewayClient instance.
 */
export function setDefaultClient(client: GatewayClient): void {
  defaultClient = client;
}

/**
 * Get the module-level default GatewayClient instance.
 *
 * If none has been set, creates one via `GatewayClient.fromEnv()` and caches it.
 */
export function getDefaultClient(): GatewayClient {
  if (!defaultClient) {
    defaultClient = GatewayClient.fromEnv();
  }
  return defaultClient;
}

/**
 * Reset the module-level default client to undefined.
 * Primarily useful for testing.
 */
export function resetDefaultClient(): void {
  defaultClient = undefined;
}
