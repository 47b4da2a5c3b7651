/**
 * Conference Bot — tests/lib/startup.test.ts
 * WHAT: Tests for guarded startup stages.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock("../../src/lib/sentry.js", () => ({
  captureException: vi.fn(),
}));

import { runStartupStage } from "../../src/lib/startup.js";
import { logger } from "../../src/lib/logger.js";
import { captureException } from "../../src/lib/sentry.js";

describe("runStartupStage", () => {
  it("returns the stage result", async () => {
    await expect(runStartupStage("registration", async () => 42)).resolves.toBe(42);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("logs, reports and returns null when the stage throws", async () => {
    const err = new Error("Missing Permissions");

    await expect(
      runStartupStage("welcome form", async () => {
        throw err;
      })
    ).resolves.toBeNull();

    expect(logger.error).toHaveBeenCalledWith({ err, stage: "welcome form" }, "[startup] stage failed");
    expect(captureException).toHaveBeenCalledWith(err, { area: "startup", stage: "welcome form" });
  });

  it("lets later stages run after one fails", async () => {
    const ran: string[] = [];
    await runStartupStage("welcome form", async () => {
      throw new Error("boom");
    });
    await runStartupStage("programme", async () => {
      ran.push("programme");
    });
    expect(ran).toEqual(["programme"]);
  });
});
