/**
 * Conference Bot — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture/contexts.
 * WHY: Centralizes error tracking with safe shutdown and guardrails when DSN is invalid.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import {
  consoleIntegration,
  onUncaughtExceptionIntegration,
  onUnhandledRejectionIntegration,
} from "@sentry/node";
import { env } from "./env.js";
import { logger, redact } from "./logger.js";
import fs from "node:fs";
import path from "node:path";

let sentryEnabled = false;

/**
 * Structural check only: https://{key}@{host}/{project}. A DSN that parses
 * but is revoked is caught at runtime by the 403 handler below.
 */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

// Release tag for Sentry, read from package.json in the working directory
function getVersion(): string {
  try {
    const packagePath = path.join(process.cwd(), "package.json");
    const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    if (packageJson && typeof packageJson === "object" && "version" in packageJson) {
      return String(packageJson.version);
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates if SENTRY_DSN is valid and we are not under Vitest.
 */
export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
      release: `conference-discord-bot@${getVersion()}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,

      integrations: [
        consoleIntegration(),
        onUncaughtExceptionIntegration({
          onFatalError: async (err: Error) => {
            logger.fatal({ err }, "Uncaught exception detected by Sentry");
            process.exit(1);
          },
        }),
        onUnhandledRejectionIntegration({ mode: "warn" }),
      ],

      beforeSend(event) {
        // Tokens in error messages would leak straight into the Sentry UI.
        if (event.message) {
          event.message = redact(event.message);
        }
        return event;
      },

      // Transient network noise; the fetch layer logs these with more context.
      ignoreErrors: ["DiscordAPIError", "AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
      debug: env.NODE_ENV === "development",
    });

    sentryEnabled = true;
    logger.info({ environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV }, "Sentry initialized");

    // 403 = stale or revoked DSN. Stop sending instead of spamming rejected events.
    const client = Sentry.getClient();
    if (client) {
      client.on("afterSendEvent", (_event, response) => {
        if (response?.statusCode === 403) {
          logger.warn({ statusCode: 403 }, "Sentry unauthorized (403); disabling capture");
          sentryEnabled = false;
          client.close(0).then(undefined, () => undefined);
        }
      });
    }
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

/**
 * Add breadcrumb for debugging context
 */
export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;
  Sentry.addBreadcrumb(breadcrumb);
}

export function setTag(key: string, value: string): void {
  if (!sentryEnabled) return;
  Sentry.setTag(key, value);
}

export function setContext(name: string, context: Record<string, unknown>): void {
  if (!sentryEnabled) return;
  Sentry.setContext(name, context);
}

/**
 * Flush any pending events (use before shutdown)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.error({ err }, "Failed to flush Sentry events");
    return false;
  }
}
