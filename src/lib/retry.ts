/**
 * Conference Bot — src/lib/retry.ts
 * WHAT: Retry with exponential backoff for background refreshes.
 * WHY: The ticketing and schedule APIs occasionally time out; a periodic
 *      refresh should ride out a blip instead of waiting five more minutes.
 * FLOWS:
 *  - withRetry(fn, options) → retries fn while the classified error is recoverable
 * USAGE:
 *  const tickets = await withRetry(() => client.fetchAllTickets(), { label: "pretix_refresh" });
 *
 * NOTE: user-triggered lookups (registration form) never go through here.
 * The user gets a "try again" message instead of a slow modal.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { classifyError, isRecoverable, type ClassifiedError } from "./errors.js";

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Delay before the first retry in ms (default: 500) */
  initialDelayMs?: number;
  /** Cap for any single delay in ms (default: 10000) */
  maxDelayMs?: number;
  /** Multiplier applied after each retry (default: 2) */
  backoffMultiplier?: number;
  /** Override the default recoverability check */
  shouldRetry?: (err: ClassifiedError, attempt: number) => boolean;
  /** Label for logging */
  label?: string;
}

/**
 * Run fn, retrying recoverable failures with jittered exponential backoff.
 * Throws the last error once attempts are exhausted or the error is not
 * worth retrying.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 500,
    maxDelayMs = 10_000,
    backoffMultiplier = 2,
    shouldRetry = (err) => isRecoverable(err),
    label = "operation",
  } = options;

  if (maxAttempts < 1) {
    throw new Error(`withRetry: maxAttempts must be >= 1, got ${maxAttempts}`);
  }

  let delayMs = initialDelayMs;
  let attempt = 0;

  for (;;) {
    attempt += 1;
    try {
      return await fn();
    } catch (err) {
      const classified = classifyError(err);

      if (attempt >= maxAttempts || !shouldRetry(classified, attempt)) {
        logger.warn(
          {
            evt: "retry_exhausted",
            label,
            attempt,
            maxAttempts,
            errorKind: classified.kind,
            errorMessage: classified.message,
          },
          `[retry] ${label} failed after ${attempt} attempts`
        );
        throw err;
      }

      // Jitter 0.5x..1.5x so parallel refreshes don't retry in lockstep
      const waitMs = Math.floor(delayMs * (0.5 + Math.random()));
      logger.debug(
        { evt: "retry_attempt", label, attempt, maxAttempts, delayMs: waitMs, errorKind: classified.kind },
        `[retry] ${label} attempt ${attempt} failed, retrying in ${waitMs}ms`
      );

      await new Promise<void>((resolve) => setTimeout(resolve, waitMs));
      delayMs = Math.min(delayMs * backoffMultiplier, maxDelayMs);
    }
  }
}
