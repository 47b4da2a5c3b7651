/**
 * Conference Bot — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers.
 * WHY: A failing "ready" or "interactionCreate" handler must not take the bot down mid-conference.
 * USAGE:
 *  client.on(Events.InteractionCreate, wrapEvent("interactionCreate", async (i) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

const DEFAULT_EVENT_TIMEOUT_MS = 30_000;

/**
 * Wrap an event handler so it never rejects. Errors and timeouts are
 * classified, logged, and sent to Sentry when reportable.
 *
 * @param timeoutMs - the ready handler purges and reposts the welcome
 *   message, so the default is generous
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        handler(...args),
        new Promise<void>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)),
            timeoutMs
          );
          timer.unref();
        }),
      ]);
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
        },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err, {
          event: eventName,
          errorKind: classified.kind,
          ...contextIds,
        });
      }
    } finally {
      if (timer) clearTimeout(timer);
    }
  };
}

function readId(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * guild/user/channel ids from whatever discord.js passed, for log context.
 */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const guildId = readId(arg, "guildId");
    if (guildId) context.guildId = guildId;

    const user: unknown = Reflect.get(arg, "user");
    if (user && typeof user === "object") {
      const userId = readId(user, "id");
      if (userId) context.userId = userId;
    }

    const channelId = readId(arg, "channelId");
    if (channelId) context.channelId = channelId;
  }

  return context;
}
