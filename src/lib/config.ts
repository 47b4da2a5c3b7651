/**
 * Conference Bot — src/lib/config.ts
 * WHAT: Loads and validates the structured conference configuration (JSON + zod).
 * WHY: Role tables, channel names and file paths change per event; secrets stay in .env.
 * FLOWS: read CONFIG_FILE → JSON.parse → zod validate → freeze role tables → ConferenceConfig
 *
 * Paths inside the file are resolved relative to the working directory, the
 * same convention src/lib/env.ts uses for .env.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const roleTableSchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(1));

export const registrationConfigSchema = z.object({
  formChannelName: z.string().min(1),
  helpChannelName: z.string().min(1),
  logChannelName: z.string().min(1),
  pretixBaseUrl: z.string().url(),
  ticketCacheFile: z.string().min(1),
  registrationLogFile: z.string().min(1),
  itemToRoles: roleTableSchema,
  variationToRoles: roleTableSchema.default({}),
});

export const programNotificationsConfigSchema = z
  .object({
    apiUrl: z.string().url(),
    scheduleCacheFile: z.string().min(1),
    livestreamFile: z.string().min(1),
    mainNotificationChannelName: z.string().min(1),
    roomsToChannelNames: z.record(z.string().min(1), z.string().min(1)),
    leadMinutes: z.number().int().positive().default(5),
    // ISO timestamp with offset, e.g. "2025-07-16T09:15:00+02:00"
    simulatedStartTime: z.string().datetime({ offset: true }).optional(),
    fastMode: z.boolean().default(false),
  })
  .refine((cfg) => !cfg.fastMode || cfg.simulatedStartTime !== undefined, {
    message: "fastMode requires simulatedStartTime",
    path: ["fastMode"],
  });

export const guildStatisticsConfigSchema = z.object({
  requiredRole: z.string().min(1),
});

export const activityLogConfigSchema = z.object({
  channelName: z.string().min(1),
});

export const conferenceConfigSchema = z.object({
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  registration: registrationConfigSchema,
  programNotifications: programNotificationsConfigSchema,
  guildStatistics: guildStatisticsConfigSchema,
  // Omit to turn the activity log off
  activityLog: activityLogConfigSchema.optional(),
});

export type RegistrationConfig = z.infer<typeof registrationConfigSchema>;
export type ProgramNotificationsConfig = z.infer<typeof programNotificationsConfigSchema>;
export type GuildStatisticsConfig = z.infer<typeof guildStatisticsConfigSchema>;
export type ActivityLogConfig = z.infer<typeof activityLogConfigSchema>;
export type ConferenceConfig = z.infer<typeof conferenceConfigSchema>;

/**
 * Validate an already-parsed config object. Throws ConfigError listing every
 * issue, keyed by the first offending path.
 */
export function parseConferenceConfig(raw: unknown): ConferenceConfig {
  const parsed = conferenceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`);
    const firstKey = parsed.error.issues[0]?.path.join(".") ?? "config";
    throw new ConfigError(firstKey, `Invalid configuration:\n${issues.join("\n")}`);
  }

  const config = parsed.data;
  freezeRoleTable(config.registration.itemToRoles);
  freezeRoleTable(config.registration.variationToRoles);
  return config;
}

/**
 * Read and validate the config file. Missing file and malformed JSON are
 * ConfigErrors too; the entrypoint treats any ConfigError as fatal.
 */
export function loadConferenceConfig(filePath: string): ConferenceConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError("CONFIG_FILE", `Cannot read config file ${filePath}: ${String(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError("CONFIG_FILE", `Config file ${filePath} is not valid JSON: ${String(err)}`);
  }

  return parseConferenceConfig(raw);
}

function freezeRoleTable(table: Record<string, string[]>): void {
  for (const roles of Object.values(table)) {
    Object.freeze(roles);
  }
  Object.freeze(table);
}
