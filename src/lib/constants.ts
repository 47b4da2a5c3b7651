/**
 * Conference Bot — src/lib/constants.ts
 * WHAT: Centralized constants for timeouts, intervals, and Discord limits
 * WHY: Single source of truth for magic numbers
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/**
 * Suppresses all @mentions in log-channel posts that quote user input
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

// ===== Discord API Constraints =====

/** Discord nickname length limit */
export const MAX_NICKNAME_LENGTH = 32;

/** Discord embed field value length limit */
export const MAX_EMBED_FIELD_VALUE = 1024;

/** Discord rate limit buffer for bulk command sync (keeps us under 2 req/sec) */
export const DISCORD_COMMAND_SYNC_DELAY_MS = 650;

// ===== Timeouts & Intervals =====

/** Timeout for a single request to the ticketing or schedule API */
export const HTTP_TIMEOUT_MS = 10_000;

/** Full ticket refreshes closer together than this are skipped */
export const TICKET_REFRESH_MIN_INTERVAL_MS = 2 * 60 * 1000;

/** Periodic ticket refresh */
export const TICKET_REFRESH_INTERVAL_MS = 5 * 60 * 1000;

/** Periodic schedule + livestream refresh */
export const SCHEDULE_REFRESH_INTERVAL_MS = 5 * 60 * 1000;

/** Notification tick in normal operation */
export const NOTIFY_TICK_MS = 60 * 1000;

/** Notification tick when a simulated clock runs in fast mode */
export const NOTIFY_TICK_FAST_MS = 2 * 1000;

/** Simulated clock speed-up in fast mode */
export const FAST_MODE_MULTIPLIER = 60;

/** Health check timeout before aborting */
export const HEALTH_CHECK_TIMEOUT_MS = 5000;

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

// ===== Ticket Matching =====

/** Name permutations are capped to stop abuse of the order+name lookup */
export const MAX_NAME_COMPONENTS = 5;
