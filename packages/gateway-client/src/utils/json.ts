/**
 * Shape checks for decoded JSON.
 *
 * Decoders read untrusted wire bodies; these helpers narrow `unknown` values
 * and raise DecodeError with the offending payload attached.
 */

import { DecodeError } from "../types/errors.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

/** Parse `text` as JSON, raising DecodeError on malformed input. */
export function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DecodeError(`Malformed JSON in ${what}`, text, { cause: err });
  }
}

/** Parse `text` as a JSON object. */
export function parseJsonObject(text: string, what: string): Record<string, unknown> {
  const value = parseJson(text, what);
  if (!isRecord(value)) {
    throw new DecodeError(`Expected a JSON object in ${what}`, text);
  }
  return value;
}

/**
 * Read an optional string field. `null` and a missing key both read as
 * `undefined`; any other non-string value is a DecodeError.
 */
export function optionalString(
  obj: Record<string, unknown>,
  key: string,
  payload: string,
): string | undefined {
  const value = obj[key];
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new DecodeError(`Field "${key}" must be a string`, payload);
  }
  return value;
}

/** Read an optional number field, with the same rules as `optionalString`. */
export function optionalNumber(
  obj: Record<string, unknown>,
  key: string,
  payload: string,
): number | undefined {
  const value = obj[key];
  if (value == null) return undefined;
  if (typeof value !== "number") {
    throw new DecodeError(`Field "${key}" must be a number`, payload);
  }
  return value;
}

/** Read an optional array field. */
export function optionalArray(
  obj: Record<string, unknown>,
  key: string,
  payload: string,
): unknown[] | undefined {
  const value = obj[key];
  if (value == null) return undefined;
  if (!Array.isArray(value)) {
    throw new DecodeError(`Field "${key}" must be an array`, payload);
  }
  return value;
}

/**
 * Read an optional object of numeric counters. Entries that are not numbers
 * (nested detail objects, labels) are left out.
 */
export function optionalNumberMap(
  obj: Record<string, unknown>,
  key: string,
  payload: string,
): Record<string, number> | undefined {
  const value = obj[key];
  if (value == null) return undefined;
  if (!isRecord(value)) {
    throw new DecodeError(`Field "${key}" must be an object`, payload);
  }
  const out: Record<string, number> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry === "number") {
      out[name] = entry;
    }
  }
  return out;
}
