/**
 * Azure speech synthesis: SSML document and headers.
 *
 * Requests whose model is the `__azure` sentinel bypass the JSON speech
 * endpoint and post an SSML document to the gateway's Azure route instead.
 */

import type { SpeechRequest } from "./types/index.js";

/** Path of the Azure SSML route, relative to the base URL. */
export const AZURE_SPEECH_PATH = "/cognitiveservices/v1";

export const SSML_CONTENT_TYPE = "application/ssml+xml";

export const DEFAULT_AZURE_OUTPUT_FORMAT = "audio-16khz-128kbitrate-mono-mp3";
export const DEFAULT_AZURE_REGION = "eastasia";

export interface AzureSpeechOptions {
  /** Value of `X-Microsoft-OutputFormat`. */
  outputFormat?: string;
  /** Value of `X-Region`. */
  region?: string;
}

const XML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "'": "&#39;",
  '"': "&#34;",
};

/** Escape text for use in XML content and attribute values. */
export function escapeXml(text: string): string {
  return text.replace(/[&<>'"]/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

/** Build the SSML document for one synthesis request. */
export function buildSsml(request: SpeechRequest): string {
  return [
    "",
    '<speak version="1.0" xml:lang="en-US">',
    `<voice xml:lang="en-US" name="${escapeXml(request.voice)}">${escapeXml(request.input)}</voice>`,
    "</speak>",
    "",
  ].join("\n");
}

/** Headers the Azure route needs on top of the fixed set. */
export function azureSpeechHeaders(options: AzureSpeechOptions = {}): Record<string, string> {
  return {
    "Content-Type": SSML_CONTENT_TYPE,
    "X-Microsoft-OutputFormat": options.outputFormat ?? DEFAULT_AZURE_OUTPUT_FORMAT,
    "X-Region": options.region ?? DEFAULT_AZURE_REGION,
  };
}
