/**
 * Conference Bot — src/lib/http.ts
 * WHAT: Thin JSON-over-HTTP helper on top of the global fetch.
 * WHY: Both the ticketing and the schedule client need the same timeout,
 *      status check and error shape (FetchError) so the caches can decide
 *      on fallback without caring which API failed.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { FetchError } from "./errors.js";
import { logger } from "./logger.js";
import { HTTP_TIMEOUT_MS } from "./constants.js";

export interface FetchJsonOptions {
  headers?: Record<string, string>;
  query?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * GET a URL and parse the body as JSON.
 *
 * Any failure (DNS, refused connection, timeout, non-2xx status, body that
 * is not JSON) becomes a FetchError so callers only ever catch one kind.
 */
export async function fetchJson(url: string, options: FetchJsonOptions = {}): Promise<unknown> {
  const target = new URL(url);
  for (const [key, value] of Object.entries(options.query ?? {})) {
    target.searchParams.set(key, value);
  }

  let response: Response;
  try {
    response = await fetch(target, {
      method: "GET",
      headers: { Accept: "application/json", ...options.headers },
      signal: AbortSignal.timeout(options.timeoutMs ?? HTTP_TIMEOUT_MS),
    });
  } catch (err) {
    throw new FetchError(`Request to ${target.host} failed`, { url: target.toString(), cause: err });
  }

  if (!response.ok) {
    logger.warn({ status: response.status, url: target.toString() }, "[http] non-success status");
    throw new FetchError(`HTTP ${response.status} from ${target.host}`, {
      url: target.toString(),
      status: response.status,
    });
  }

  try {
    return await response.json();
  } catch (err) {
    throw new FetchError(`Invalid JSON from ${target.host}`, {
      url: target.toString(),
      status: response.status,
      cause: err,
    });
  }
}
