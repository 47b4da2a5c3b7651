/**
 * Conference Bot — src/features/registration/ticketCache.ts
 * WHAT: In-memory ticket index refreshed from Pretix and mirrored to a JSON file.
 * WHY: Registration must keep working when Pretix is slow or down during the
 *      opening-day rush; the file is the last known good copy.
 * FLOWS:
 *  - refresh() → skip if < 2 min since last → items + paid orders → replace index → write file
 *  - refresh() failure → keep memory | load file | throw FetchError
 *  - lookup(id) / findByOrderAndName(order, name) → memory only
 *  - fetchTicket(id) → one live order fetch → merge into index
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { logger } from "../../lib/logger.js";
import { FetchError, PersistenceWarning } from "../../lib/errors.js";
import { withRetry, type RetryOptions } from "../../lib/retry.js";
import { TICKET_REFRESH_MIN_INTERVAL_MS } from "../../lib/constants.js";
import {
  isPaid,
  ticketsFromOrder,
  UnknownItemError,
  type ItemNames,
  type PretixOrder,
  type TicketSource,
} from "./pretixClient.js";
import { namePermutations, parseTicketId, sanitizeName, ticketNameKey, type Ticket } from "./ticket.js";

const cacheFileSchema = z.object({
  fetchedAt: z.string(),
  itemNames: z.record(z.string(), z.string()),
  tickets: z.array(
    z.object({
      id: z.string(),
      orderCode: z.string(),
      itemName: z.string(),
      variationName: z.string().nullable(),
      ownerName: z.string(),
    })
  ),
});

type CacheFile = z.infer<typeof cacheFileSchema>;

/**
 * - refreshed: live data replaced the index
 * - skipped: last refresh too recent
 * - kept: live fetch failed, previous in-memory data kept
 * - fallback: live fetch failed, index loaded from the cache file
 */
export type RefreshOutcome = "refreshed" | "skipped" | "kept" | "fallback";

export interface TicketCacheOptions {
  source: TicketSource;
  cacheFile: string;
  now?: () => number;
  retry?: RetryOptions;
}

export class TicketCache {
  private readonly source: TicketSource;
  private readonly cacheFile: string;
  private readonly now: () => number;
  private readonly retry: RetryOptions;

  private ticketsById = new Map<string, Ticket>();
  private ticketsByNameKey = new Map<string, Ticket[]>();
  private itemNames: ItemNames = new Map();
  private lastRefreshAt: number | null = null;
  private inFlight: Promise<RefreshOutcome> | null = null;

  constructor(options: TicketCacheOptions) {
    this.source = options.source;
    this.cacheFile = options.cacheFile;
    this.now = options.now ?? Date.now;
    this.retry = options.retry ?? {};
  }

  get size(): number {
    return this.ticketsById.size;
  }

  /** Epoch ms of the last successful live refresh, null before the first. */
  get lastRefresh(): number | null {
    return this.lastRefreshAt;
  }

  lookup(ticketId: string): Ticket | undefined {
    return this.ticketsById.get(ticketId);
  }

  /**
   * Order code plus the name on the ticket, parts in any order.
   */
  findByOrderAndName(orderCode: string, name: string): Ticket | undefined {
    for (const candidate of namePermutations(name)) {
      const hit = this.ticketsByNameKey.get(ticketNameKey(orderCode, candidate))?.[0];
      if (hit) return hit;
    }
    return undefined;
  }

  /**
   * Full refresh. Concurrent callers share the in-flight fetch; a call
   * within two minutes of the last success is skipped unless forced.
   */
  refresh(options: { force?: boolean } = {}): Promise<RefreshOutcome> {
    if (this.inFlight) return this.inFlight;

    if (
      !options.force &&
      this.lastRefreshAt !== null &&
      this.now() - this.lastRefreshAt < TICKET_REFRESH_MIN_INTERVAL_MS
    ) {
      logger.info(
        { lastRefreshAt: new Date(this.lastRefreshAt).toISOString() },
        "[tickets] skipping refresh, last one is recent"
      );
      return Promise.resolve("skipped");
    }

    this.inFlight = this.doRefresh().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /**
   * Live lookup of a single ticket id. Merges the order into the index.
   * Returns undefined for unknown or unpaid orders and for ids without a
   * position number. Network failures propagate as FetchError.
   */
  async fetchTicket(ticketId: string): Promise<Ticket | undefined> {
    const { orderCode, position } = parseTicketId(ticketId);
    if (position === null) return undefined;
    const tickets = await this.fetchOrderTickets(orderCode);
    return tickets.find((t) => t.id === ticketId);
  }

  /**
   * Live lookup of every ticket in one order. Unpaid orders are dropped
   * from the index.
   */
  async fetchOrderTickets(orderCode: string): Promise<Ticket[]> {
    const order = await this.source.fetchOrder(orderCode);
    if (!order) return [];

    if (!isPaid(order)) {
      this.removeOrder(orderCode);
      return [];
    }

    const tickets = await this.ticketsWithFreshItemNames(order);
    this.removeOrder(orderCode);
    for (const ticket of tickets) this.index(ticket);
    await this.persist();
    return tickets;
  }

  /** Load the cache file into memory. False when missing, empty or unreadable. */
  async loadFromFile(): Promise<boolean> {
    let text: string;
    try {
      text = await fs.readFile(this.cacheFile, "utf-8");
    } catch (err) {
      logger.info({ file: this.cacheFile, err }, "[tickets] no cache file to load");
      return false;
    }
    if (!text.trim()) return false;

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      logger.warn({ file: this.cacheFile, err }, "[tickets] cache file is not valid JSON");
      return false;
    }
    const parsed = cacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ file: this.cacheFile, issues: parsed.error.issues.length }, "[tickets] cache file has unexpected shape");
      return false;
    }

    const itemNames: ItemNames = new Map();
    for (const [id, name] of Object.entries(parsed.data.itemNames)) {
      itemNames.set(Number(id), name);
    }
    this.replace(parsed.data.tickets, itemNames);
    logger.info(
      { file: this.cacheFile, tickets: this.size, fetchedAt: parsed.data.fetchedAt },
      "[tickets] loaded cache file"
    );
    return true;
  }

  private async doRefresh(): Promise<RefreshOutcome> {
    let fetched: { itemNames: ItemNames; tickets: Ticket[] };
    try {
      fetched = await withRetry(
        async () => {
          const itemNames = await this.source.fetchItemNames();
          const tickets = await this.source.fetchPaidTickets(itemNames);
          return { itemNames, tickets };
        },
        { label: "ticket_refresh", ...this.retry }
      );
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;

      if (this.size > 0) {
        logger.warn({ err, tickets: this.size }, "[tickets] refresh failed, keeping in-memory tickets");
        return "kept";
      }
      if (await this.loadFromFile()) {
        logger.warn({ err, tickets: this.size }, "[tickets] refresh failed, using cache file");
        return "fallback";
      }
      throw err;
    }

    this.replace(fetched.tickets, fetched.itemNames);
    this.lastRefreshAt = this.now();
    logger.info({ tickets: this.size }, "[tickets] refreshed from Pretix");
    await this.persist();
    return "refreshed";
  }

  private async ticketsWithFreshItemNames(order: PretixOrder): Promise<Ticket[]> {
    try {
      return ticketsFromOrder(order, this.itemNames);
    } catch (err) {
      if (!(err instanceof UnknownItemError)) throw err;
      logger.info({ itemId: err.itemId }, "[tickets] unknown item, refreshing item names");
      this.itemNames = await this.source.fetchItemNames();
      return ticketsFromOrder(order, this.itemNames);
    }
  }

  private replace(tickets: Ticket[], itemNames: ItemNames): void {
    this.ticketsById = new Map();
    this.ticketsByNameKey = new Map();
    this.itemNames = itemNames;
    for (const ticket of tickets) this.index(ticket);
  }

  private index(ticket: Ticket): void {
    this.ticketsById.set(ticket.id, ticket);
    const key = ticketNameKey(ticket.orderCode, ticket.ownerName);
    const bucket = this.ticketsByNameKey.get(key);
    if (bucket) {
      bucket.push(ticket);
    } else {
      this.ticketsByNameKey.set(key, [ticket]);
    }
  }

  private removeOrder(orderCode: string): void {
    for (const ticket of [...this.ticketsById.values()]) {
      if (ticket.orderCode !== orderCode) continue;
      this.ticketsById.delete(ticket.id);
      this.ticketsByNameKey.delete(ticketNameKey(ticket.orderCode, ticket.ownerName));
    }
  }

  /** Best effort: a failed write is logged and the in-memory index stays authoritative. */
  private async persist(): Promise<void> {
    const payload: CacheFile = {
      fetchedAt: new Date(this.lastRefreshAt ?? this.now()).toISOString(),
      itemNames: Object.fromEntries([...this.itemNames].map(([id, name]) => [String(id), name])),
      tickets: [...this.ticketsById.values()],
    };
    try {
      await fs.mkdir(path.dirname(this.cacheFile), { recursive: true });
      await fs.writeFile(this.cacheFile, JSON.stringify(payload), "utf-8");
    } catch (err) {
      const warning = new PersistenceWarning(this.cacheFile, err);
      logger.warn({ err: warning, cause: err }, "[tickets] could not write cache file");
    }
  }
}

/** True when `name`, parts in any order, matches the name on the ticket. */
export function ticketMatchesName(ticket: Ticket, name: string): boolean {
  const expected = sanitizeName(ticket.ownerName);
  return namePermutations(name).some((candidate) => sanitizeName(candidate) === expected);
}
