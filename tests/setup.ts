/**
 * Conference Bot — tests/setup.ts
 * WHAT: Global Vitest setup for deterministic tests.
 * WHY: Placeholder secrets so src/lib/env.ts validates, schedulers off, real timers after each test.
 *
 * This file runs before EVERY test file via the setupFiles config in vitest.config.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

// Top level, not beforeAll: env.ts parses process.env when first imported
process.env.DISCORD_TOKEN ??= "test-token";
process.env.CLIENT_ID ??= "test-client";
process.env.PRETIX_TOKEN ??= "test-secret";
process.env.NODE_ENV = "test";

// Background intervals would fire unpredictably between assertions
process.env.TICKET_REFRESH_DISABLED = "1";
process.env.PROGRAMME_SCHEDULER_DISABLED = "1";

afterEach(() => {
  // A test using vi.useFakeTimers() must not leak into the next one
  vi.clearAllTimers();
  vi.useRealTimers();
});
