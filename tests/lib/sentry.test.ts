/**
 * Conference Bot — tests/lib/sentry.test.ts
 * WHAT: Proves Sentry stays off under tests and that capture helpers no-op when disabled.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect } from "vitest";
import {
  addBreadcrumb,
  captureException,
  flushSentry,
  hasValidDsn,
  initializeSentry,
  isSentryEnabled,
  setContext,
  setTag,
} from "../../src/lib/sentry.js";

describe("hasValidDsn", () => {
  it("accepts a DSN with key, host and project", () => {
    expect(hasValidDsn("https://publickey@sentry.example.test/42")).toBe(true);
  });

  it.each([undefined, "", "not a url", "https://sentry.example.test/42", "https://key@sentry.example.test/", "ftp://key@host/1"])(
    "rejects %s",
    (dsn) => {
      expect(hasValidDsn(dsn)).toBe(false);
    }
  );
});

describe("disabled Sentry", () => {
  it("does not initialize under Vitest", () => {
    initializeSentry();
    expect(isSentryEnabled()).toBe(false);
  });

  it("turns every helper into a no-op", async () => {
    expect(captureException(new Error("boom"))).toBeNull();
    expect(() => addBreadcrumb({ message: "step", category: "cmd" })).not.toThrow();
    expect(() => setTag("cmd", "register")).not.toThrow();
    expect(() => setContext("discord", { userId: "1" })).not.toThrow();
    await expect(flushSentry()).resolves.toBe(true);
  });
});
