/**
 * Conference Bot — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: Centralizes structured logging to keep other modules clean.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - Pino: https://getpino.io/#/docs/api
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Redaction patterns for secrets that might leak into logs.
 *
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * Pretix pattern: "Token xyz" authorization headers from the ticketing client.
 * Mention pattern: @everyone/@here usually means user input leaked through.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const pretixAuthRe = /\bToken\s+[A-Za-z0-9]{16,}/g;
const mentionRe = /@(everyone|here)/gi;

let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled or external data
 * (ticket ids and names typed into the registration form, API error bodies).
 * Truncates at 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(pretixAuthRe, "Token [redacted]");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

function serializeError(e: unknown) {
  if (e instanceof Error) {
    const code: unknown = Reflect.get(e, "code");
    return { name: e.name, code, message: e.message, stack: e.stack };
  }
  return { message: String(e) };
}

/**
 * Log level defaults to "info" but can be overridden via LOG_LEVEL.
 * Pretty printing: always under Vitest, and on a TTY when LOG_PRETTY=true.
 * Production emits newline-delimited JSON.
 */
const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : {}),
  base: undefined,
  serializers: {
    err: serializeError,
  },
  /**
   * Intercepts error-level logs and forwards attached errors to Sentry, so
   * logger.error({ err }, "...") is all a call site needs.
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object"
              ? Reflect.get(firstArg, "err")
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import avoids the logger <-> sentry import cycle.
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", importErr);
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
