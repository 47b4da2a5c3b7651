/**
 * Conference Bot — src/lib/errors.ts
 * WHAT: Error classes for the registration/programme flows plus a discriminated
 *       union classifier for anything caught at a boundary.
 * WHY: Enables specific recovery strategies (cache fallback, user rejection)
 *      and keeps Sentry free of expected outcomes.
 * FLOWS:
 *  - throw new FetchError(...) / TicketNotFoundError / DuplicateRegistrationError
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (worth retrying)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, isRecoverable } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "fetch" && classified.status === 401) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Thrown Error Classes =====

/**
 * External API unreachable or answered with a non-success status.
 * `status` is undefined when the request never got a response.
 */
export class FetchError extends Error {
  readonly kind = "fetch" as const;
  readonly url: string;
  readonly status?: number;

  constructor(message: string, options: { url: string; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.url = options.url;
    this.status = options.status;
  }
}

/** Ticket id unknown to both the cache and the live API. */
export class TicketNotFoundError extends Error {
  readonly kind = "not_found" as const;
  readonly ticketId: string;

  constructor(ticketId: string) {
    super(`No ticket found for ${ticketId}`);
    this.name = "TicketNotFoundError";
    this.ticketId = ticketId;
  }
}

export type DuplicateReason = "user" | "ticket";

/**
 * The Discord user already registered, or the ticket was already claimed
 * by someone else.
 */
export class DuplicateRegistrationError extends Error {
  readonly kind = "duplicate_registration" as const;
  readonly reason: DuplicateReason;

  constructor(reason: DuplicateReason, message: string) {
    super(message);
    this.name = "DuplicateRegistrationError";
    this.reason = reason;
  }
}

/**
 * A cache or log file could not be written. Logged, never fatal: the
 * in-memory state is already updated when this is raised.
 */
export class PersistenceWarning extends Error {
  readonly kind = "persistence" as const;
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to write ${filePath}`, { cause });
    this.name = "PersistenceWarning";
    this.filePath = filePath;
  }
}

/** Startup configuration missing or invalid. The only process-fatal kind. */
export class ConfigError extends Error {
  readonly kind = "config" as const;
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.key = key;
  }
}

// ===== Classified Error Definitions =====

/**
 * Base shape for the discriminated union. `kind` is the discriminator; it
 * narrows in switch statements and works across module boundaries where
 * instanceof checks can fail (mocked modules in tests, duplicated deps).
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

export interface FetchFailure extends AppError {
  kind: "fetch";
  url: string;
  status?: number;
}

export interface NotFoundFailure extends AppError {
  kind: "not_found";
  ticketId: string;
}

export interface DuplicateFailure extends AppError {
  kind: "duplicate_registration";
  reason: DuplicateReason;
}

export interface PersistenceFailure extends AppError {
  kind: "persistence";
  filePath: string;
}

export interface ConfigFailure extends AppError {
  kind: "config";
  key: string;
}

/**
 * Discord API errors. Discord uses numeric codes (not HTTP status):
 * - 10062: Unknown Interaction (3s timeout expired)
 * - 40060: Already acknowledged
 * - 50013: Missing Permissions (role hierarchy, usually)
 * - 50001: Missing Access
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
}

/** Node system errors: the request never reached the server. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | FetchFailure
  | NotFoundFailure
  | DuplicateFailure
  | PersistenceFailure
  | ConfigFailure
  | DiscordApiError
  | PermissionError
  | NetworkError
  | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function readProp(obj: unknown, key: string): unknown {
  if (obj && typeof obj === "object") {
    return Reflect.get(obj, key);
  }
  return undefined;
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function asNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

// ===== Error Classification =====

/**
 * Classify any caught error into the discriminated union.
 *
 * Ordered from most specific to least: our own classes, then Discord REST
 * errors, then Node network errors (including undici's "fetch failed" whose
 * real code sits on `cause`), then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;

  if (err instanceof FetchError) {
    return { kind: "fetch", url: err.url, status: err.status, message: err.message, cause };
  }
  if (err instanceof TicketNotFoundError) {
    return { kind: "not_found", ticketId: err.ticketId, message: err.message, cause };
  }
  if (err instanceof DuplicateRegistrationError) {
    return { kind: "duplicate_registration", reason: err.reason, message: err.message, cause };
  }
  if (err instanceof PersistenceWarning) {
    return { kind: "persistence", filePath: err.filePath, message: err.message, cause };
  }
  if (err instanceof ConfigError) {
    return { kind: "config", key: err.key, message: err.message, cause };
  }

  const message = asString(readProp(err, "message")) ?? String(err);
  const code = readProp(err, "code");
  const name = asString(readProp(err, "name"));

  if (name === "DiscordAPIError" || (name?.includes("Discord") && typeof code === "number")) {
    if (code === 50013 || code === 50001) {
      return {
        kind: "permission",
        needed: code === 50013 ? ["ManageRoles"] : ["ViewChannel"],
        message,
        cause,
      };
    }
    return {
      kind: "discord_api",
      code: asNumber(code) ?? 0,
      httpStatus: asNumber(readProp(err, "status")) ?? asNumber(readProp(err, "httpStatus")),
      method: asString(readProp(err, "method")),
      path: asString(readProp(err, "url")) ?? asString(readProp(err, "path")),
      message,
      cause,
    };
  }

  const networkCode = typeof code === "string" ? code : asString(readProp(readProp(err, "cause"), "code"));
  if (networkCode && NETWORK_CODES.includes(networkCode)) {
    return {
      kind: "network",
      code: networkCode,
      host: asString(readProp(err, "hostname")) ?? asString(readProp(err, "host")),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Check if error is recoverable (worth retrying).
 *
 * Conservative: a 4xx from the ticketing API means a bad token or URL and
 * will fail again; 429 and 5xx are the ticketing service having a bad day.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;

    case "fetch": {
      if (err.status === undefined) return true;
      return err.status === 429 || (err.status >= 500 && err.status < 600);
    }

    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }

    default:
      return false;
  }
}

/**
 * Sentry should mean "something is broken", not "an attendee mistyped
 * their order code".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Already acknowledged
        10008, // Unknown message
        10003, // Unknown channel
      ];
      return !ignoredCodes.includes(err.code);
    }

    case "not_found":
    case "duplicate_registration":
    case "persistence":
    case "network":
    case "permission":
      return false;

    default:
      return true;
  }
}

export function isInteractionExpired(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 10062;
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "fetch":
      return { ...base, url: err.url, httpStatus: err.status };
    case "not_found":
      return { ...base, ticketId: err.ticketId };
    case "duplicate_registration":
      return { ...base, duplicateReason: err.reason };
    case "persistence":
      return { ...base, filePath: err.filePath };
    case "config":
      return { ...base, configKey: err.key };
    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "permission":
      return { ...base, neededPerms: err.needed };
    default:
      return base;
  }
}

/**
 * Get a user-friendly error message for display
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "fetch":
    case "network":
      return "The ticket system is not reachable right now. Please try again in a few minutes.";

    case "not_found":
      return "We cannot find your ticket. Please double check your input and try again.";

    case "duplicate_registration":
      return err.reason === "user"
        ? "You have already registered."
        : "This ticket has already been used to register another account.";

    case "persistence":
      return "Your registration could not be saved.";

    case "discord_api":
      if (err.code === 10062) {
        return "This interaction has expired. Please try again.";
      }
      return "Discord API error occurred.";

    case "permission":
      return `Missing permissions: ${err.needed.join(", ")}`;

    case "config":
      return `Configuration error: ${err.key} is not set correctly.`;

    default:
      return "An unexpected error occurred.";
  }
}
