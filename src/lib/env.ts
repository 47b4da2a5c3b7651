/**
 * Conference Bot — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: false in tests so test env vars set before import win.
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST_WORKER_ID;
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Schema defines what's required vs optional. Secrets the bot cannot run
 * without fail at startup instead of on first use.
 */
export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  // Only needed for guild-scoped command deployment
  GUILD_ID: z.string().optional(),
  PRETIX_TOKEN: z.string().min(1, "Missing PRETIX_TOKEN"),
  CONFIG_FILE: z.string().default("config/conference.json"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.string().optional(),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Every variable gets trimmed; stray whitespace from copy-pasted .env lines
 * is the most common misconfiguration. Empty strings count as unset.
 */
export function readRawEnv(source: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const raw: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = source[key]?.trim();
    raw[key] = value === "" ? undefined : value;
  }
  return raw;
}

/**
 * Validates the given environment. Returns all issues at once (safeParse)
 * rather than the first one.
 */
export function parseEnv(
  source: NodeJS.ProcessEnv
): { ok: true; env: Env } | { ok: false; issues: string[] } {
  const parsed = envSchema.safeParse(readRawEnv(source));
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`),
    };
  }
  return { ok: true, env: parsed.data };
}

function loadEnv(): Env {
  const result = parseEnv(process.env);
  if (!result.ok) {
    console.error(`Environment validation failed:\n${result.issues.join("\n")}`);
    process.exit(1);
  }
  return result.env;
}

export const env = loadEnv();
