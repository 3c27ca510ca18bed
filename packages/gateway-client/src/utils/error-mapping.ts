/**
 * Build the library error for a failed gateway response.
 *
 * The gateway fronts several providers with unrelated error schemas, so the
 * body is captured as text and never classified further.
 */

import { APIError } from "../types/errors.js";
import { readText, type HttpResponse } from "./http.js";

/**
 * Drain the response body and wrap it, with the status, in an `APIError`.
 * The body is closed as a side effect.
 */
export async function apiErrorFrom(
  response: HttpResponse,
  signal?: AbortSignal,
): Promise<APIError> {
  const body = await readText(response, signal);
  return new APIError(response.status, body);
}
