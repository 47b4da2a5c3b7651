/**
 * Conference Bot — src/features/registration/registrationFlow.ts
 * WHAT: One registration attempt from form input to granted roles.
 * WHY: Kept free of discord.js so every rejection path is testable with plain fakes.
 * FLOWS:
 *  - normalise id → already registered? → cache lookup → one live lookup → not found?
 *    → ticket claimed? → roles → [log lock: re-check → assign roles + nickname → append]
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger, redact } from "../../lib/logger.js";
import {
  classifyError,
  DuplicateRegistrationError,
  FetchError,
  TicketNotFoundError,
} from "../../lib/errors.js";
import { MAX_NICKNAME_LENGTH } from "../../lib/constants.js";
import type { RegistrationLog } from "./registrationLog.js";
import { ticketMatchesName, type TicketCache } from "./ticketCache.js";
import { rolesForTicket, type RoleTables } from "./roleMapper.js";
import { normalizeTicketId, parseTicketId, type Ticket } from "./ticket.js";

/**
 * Guild-side effects of a registration. The discord.js adapter lives in
 * form.ts; tests use a recording fake.
 */
export interface RoleGateway {
  /** Throws when a role name does not exist in the guild. */
  assignRoles(userId: string, roleNames: readonly string[]): Promise<void>;
  setNickname(userId: string, nickname: string): Promise<void>;
}

export interface RegistrationRequest {
  userId: string;
  /** As typed: "#ABC12-1", "abc12-1" or just the order code */
  ticketId: string;
  /** Name on the ticket; required when only the order code is given */
  name?: string;
}

export type RegistrationRejection = TicketNotFoundError | DuplicateRegistrationError | FetchError;

export type RegistrationOutcome =
  | {
      status: "registered";
      ticket: Ticket;
      roles: string[];
      nickname: string;
      /** false when the log line could not be written */
      persisted: boolean;
    }
  | { status: "rejected"; error: RegistrationRejection }
  | { status: "no_roles"; ticket: Ticket };

export interface RegistrationFlowDeps {
  cache: TicketCache;
  log: RegistrationLog;
  gateway: RoleGateway;
  roleTables: RoleTables;
}

export class RegistrationFlow {
  constructor(private readonly deps: RegistrationFlowDeps) {}

  async register(request: RegistrationRequest): Promise<RegistrationOutcome> {
    const { cache, log, gateway, roleTables } = this.deps;
    const ticketId = normalizeTicketId(request.ticketId);
    const meta = { userId: request.userId, ticketId: redact(ticketId) };

    if (log.isUserRegistered(request.userId)) {
      logger.info(meta, "[registration] user already registered");
      return rejected(new DuplicateRegistrationError("user", `User ${request.userId} is already registered`));
    }

    let ticket: Ticket | undefined;
    try {
      ticket = await this.resolveTicket(ticketId, request.name);
    } catch (err) {
      if (err instanceof FetchError) {
        logger.warn({ ...meta, err }, "[registration] live ticket lookup failed");
        return rejected(err);
      }
      throw err;
    }

    if (!ticket) {
      logger.info(meta, "[registration] ticket not found");
      return rejected(new TicketNotFoundError(ticketId));
    }

    const owner = log.ticketOwner(ticket.id);
    if (owner !== undefined && owner !== request.userId) {
      logger.info({ ...meta, owner }, "[registration] ticket already claimed");
      return rejected(
        new DuplicateRegistrationError("ticket", `Ticket ${ticket.id} is already claimed by ${owner}`)
      );
    }

    const roles = rolesForTicket(ticket, roleTables);
    if (roles.length === 0) {
      logger.info({ ...meta, item: ticket.itemName, variation: ticket.variationName }, "[registration] ticket grants no roles");
      return { status: "no_roles", ticket };
    }

    const nickname = ticket.ownerName.slice(0, MAX_NICKNAME_LENGTH);
    const grant = async (): Promise<void> => {
      await gateway.assignRoles(request.userId, roles);
      try {
        await gateway.setNickname(request.userId, nickname);
      } catch (err) {
        // The guild owner and members above the bot cannot be renamed
        if (classifyError(err).kind !== "permission") throw err;
        logger.warn({ ...meta, err }, "[registration] could not set nickname");
      }
    };

    // Roles are granted under the log's lock so a racing submission for the
    // same ticket or user is rejected before it reaches the guild.
    let persisted: boolean;
    try {
      ({ persisted } = await log.markRegistered(request.userId, ticket.id, undefined, grant));
    } catch (err) {
      if (err instanceof DuplicateRegistrationError) {
        logger.info({ ...meta, reason: err.message }, "[registration] lost a concurrent claim");
        return rejected(err);
      }
      throw err;
    }

    logger.info({ ...meta, roles, persisted }, "[registration] registered");
    return { status: "registered", ticket, roles, nickname, persisted };
  }

  /**
   * Cache first, then exactly one live lookup. With a position number the
   * id decides and the name, when given, must match; with an order code
   * alone the name picks the ticket.
   */
  private async resolveTicket(ticketId: string, name: string | undefined): Promise<Ticket | undefined> {
    const { cache } = this.deps;
    const { orderCode, position } = parseTicketId(ticketId);

    if (position !== null) {
      const ticket = cache.lookup(ticketId) ?? (await cache.fetchTicket(ticketId));
      if (ticket && name !== undefined && !ticketMatchesName(ticket, name)) return undefined;
      return ticket;
    }

    if (name === undefined || orderCode === "") return undefined;
    const cached = cache.findByOrderAndName(orderCode, name);
    if (cached) return cached;
    const live = await cache.fetchOrderTickets(orderCode);
    return live.find((ticket) => ticketMatchesName(ticket, name));
  }
}

function rejected(error: RegistrationRejection): RegistrationOutcome {
  return { status: "rejected", error };
}
