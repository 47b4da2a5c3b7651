/**
 * Conference Bot — src/lib/reqctx.ts
 * WHAT: Async-local context carrying a trace id through interaction handlers and scheduler ticks.
 * WHY: A registration touches the ticket cache, the live API, the guild and the log file;
 *      one trace id ties those log lines together without threading it through every call.
 * FLOWS: newTraceId() → runWithCtx(meta, fn) → ctx() inside nested helpers
 * DOCS:
 *  - Node AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export type ReqKind = "slash" | "button" | "modal" | "scheduler";

export type ReqContext = {
  traceId: string;
  cmd?: string;
  kind?: ReqKind;
  userId?: string;
  guildId?: string | null;
};

const storage = new AsyncLocalStorage<ReqContext>();

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const TRACE_ID_LENGTH = 11;

/**
 * 11-char base62 id (~65 bits). Short enough to read in a log line or an
 * error reply an attendee pastes into the help channel.
 */
export function newTraceId(): string {
  const bytes = randomBytes(TRACE_ID_LENGTH);
  let out = "";
  for (const byte of bytes) {
    out += BASE62[byte % BASE62.length];
  }
  return out;
}

/**
 * Runs fn with a context merged over the parent one. discord.js event
 * callbacks do not inherit it; handlers must enter it themselves.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  const parent = storage.getStore();
  const next: ReqContext = {
    traceId: meta.traceId ?? parent?.traceId ?? newTraceId(),
    cmd: meta.cmd ?? parent?.cmd,
    kind: meta.kind ?? parent?.kind,
    userId: meta.userId ?? parent?.userId,
    guildId: meta.guildId ?? parent?.guildId ?? null,
  };
  return storage.run(next, fn);
}

export function ctx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}
