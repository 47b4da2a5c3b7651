/**
 * Conference Bot — tests/lib/eventWrap.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({ logger: loggerMock }));

const sentryMock = vi.hoisted(() => ({ captureException: vi.fn() }));
vi.mock("../../src/lib/sentry.js", () => sentryMock);

import { extractEventContext, wrapEvent } from "../../src/lib/eventWrap.js";

describe("wrapEvent", () => {
  it("passes arguments through", async () => {
    const handler = vi.fn();
    await wrapEvent("interactionCreate", handler)("a", 1);
    expect(handler).toHaveBeenCalledWith("a", 1);
  });

  it("never rejects and logs the failure with ids from the arguments", async () => {
    const wrapped = wrapEvent("interactionCreate", async (_interaction: object) => {
      throw new Error("boom");
    });

    await expect(wrapped({ guildId: "g1", user: { id: "u1" } })).resolves.toBeUndefined();
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "event_error", event: "interactionCreate", guildId: "g1", userId: "u1" }),
      "[interactionCreate] event handler failed: boom"
    );
    expect(sentryMock.captureException).toHaveBeenCalledOnce();
  });

  it("gives up on a handler that never settles", async () => {
    const wrapped = wrapEvent("ClientReady", () => new Promise<void>(() => undefined), 10);
    await wrapped();
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: "ClientReady" }),
      "[ClientReady] event handler failed: Event handler timeout after 10ms"
    );
  });
});

describe("extractEventContext", () => {
  it("collects guild, user and channel ids", () => {
    expect(extractEventContext([{ guildId: "g", user: { id: "u" }, channelId: "c" }, null, "x"])).toEqual({
      guildId: "g",
      userId: "u",
      channelId: "c",
    });
  });
});
