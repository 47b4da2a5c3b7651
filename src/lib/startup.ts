/**
 * Conference Bot — src/lib/startup.ts
 * WHAT: Runs one ready-time startup stage and contains its failure.
 * WHY: Registration, programme and command sync start independently; one
 *      failing stage must not keep the others from coming up.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";

/**
 * Resolves to the stage's result, or null after logging and reporting the
 * error.
 */
export async function runStartupStage<T>(stage: string, fn: () => Promise<T>): Promise<T | null> {
  const startedAt = Date.now();
  try {
    const result = await fn();
    logger.info({ stage, ms: Date.now() - startedAt }, "[startup] stage complete");
    return result;
  } catch (err) {
    logger.error({ err, stage }, "[startup] stage failed");
    captureException(err, { area: "startup", stage });
    return null;
  }
}
