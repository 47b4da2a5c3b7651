/**
 * Conference Bot — src/features/registration/registrationLog.ts
 * WHAT: Append-only record of who registered with which ticket.
 * WHY: Roles are granted at most once per Discord user and per ticket,
 *      across restarts.
 * FLOWS:
 *  - RegistrationLog.load(file) → parse "userId ticketId isoTimestamp" lines → in-memory index
 *  - markRegistered(user, ticket, grant?) → [serialised] duplicate check → grant → index → append line
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../../lib/logger.js";
import { DuplicateRegistrationError, PersistenceWarning } from "../../lib/errors.js";

export interface RegisteredUser {
  readonly discordUserId: string;
  readonly ticketId: string;
  readonly registeredAt: Date;
}

export interface MarkResult {
  entry: RegisteredUser;
  /** false when the line could not be appended; memory still holds the entry */
  persisted: boolean;
}

export function formatLogLine(entry: RegisteredUser): string {
  return `${entry.discordUserId} ${entry.ticketId} ${entry.registeredAt.toISOString()}\n`;
}

export function parseLogLine(line: string): RegisteredUser | null {
  const [discordUserId, ticketId, timestamp] = line.trim().split(/\s+/);
  if (!discordUserId || !ticketId || !timestamp) return null;
  const registeredAt = new Date(timestamp);
  if (Number.isNaN(registeredAt.getTime())) return null;
  return { discordUserId, ticketId, registeredAt };
}

export class RegistrationLog {
  private readonly byUser = new Map<string, RegisteredUser>();
  private readonly byTicket = new Map<string, RegisteredUser>();
  private tail: Promise<void> = Promise.resolve();

  private constructor(private readonly filePath: string) {}

  /**
   * Read the log file. A missing file starts an empty log; malformed lines
   * are skipped and counted.
   */
  static async load(filePath: string): Promise<RegistrationLog> {
    const log = new RegistrationLog(filePath);

    let text = "";
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      logger.info({ file: filePath, err }, "[registration] no log file yet, starting fresh");
    }

    let skipped = 0;
    for (const line of text.split("\n")) {
      if (!line.trim()) continue;
      const entry = parseLogLine(line);
      if (entry) {
        log.index(entry);
      } else {
        skipped++;
      }
    }

    logger.info({ file: filePath, registered: log.size, skipped }, "[registration] log loaded");
    return log;
  }

  get size(): number {
    return this.byUser.size;
  }

  isUserRegistered(discordUserId: string): boolean {
    return this.byUser.has(discordUserId);
  }

  /** The user who claimed the ticket, if any. */
  ticketOwner(ticketId: string): string | undefined {
    return this.byTicket.get(ticketId)?.discordUserId;
  }

  /**
   * Check-and-append, serialised so two submissions for the same user or
   * ticket cannot both pass. Throws DuplicateRegistrationError on either
   * conflict. `grant` runs inside the same critical section, after the
   * check and before the entry is indexed; if it throws, nothing is
   * recorded and the error propagates. A failed file append is logged as a
   * PersistenceWarning and reported through `persisted: false`.
   */
  markRegistered(
    discordUserId: string,
    ticketId: string,
    registeredAt?: Date,
    grant?: () => Promise<void>
  ): Promise<MarkResult> {
    return this.exclusive(async () => {
      if (this.byUser.has(discordUserId)) {
        throw new DuplicateRegistrationError("user", `User ${discordUserId} is already registered`);
      }
      const owner = this.ticketOwner(ticketId);
      if (owner !== undefined) {
        throw new DuplicateRegistrationError("ticket", `Ticket ${ticketId} is already claimed by ${owner}`);
      }

      if (grant) await grant();

      const entry: RegisteredUser = { discordUserId, ticketId, registeredAt: registeredAt ?? new Date() };
      this.index(entry);

      try {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.appendFile(this.filePath, formatLogLine(entry), "utf-8");
      } catch (err) {
        const warning = new PersistenceWarning(this.filePath, err);
        logger.warn({ err: warning, cause: err, userId: discordUserId, ticketId }, "[registration] log append failed");
        return { entry, persisted: false };
      }

      logger.info({ userId: discordUserId, ticketId }, "[registration] marked as registered");
      return { entry, persisted: true };
    });
  }

  private index(entry: RegisteredUser): void {
    this.byUser.set(entry.discordUserId, entry);
    this.byTicket.set(entry.ticketId, entry);
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
