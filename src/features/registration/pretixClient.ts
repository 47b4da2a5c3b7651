/**
 * Conference Bot — src/features/registration/pretixClient.ts
 * WHAT: Read-only client for the Pretix REST API (items, orders).
 * WHY: Turns Pretix's paginated, locale-keyed payloads into plain Ticket records.
 * FLOWS:
 *  - fetchItemNames() → /items/ (all pages) → id → English name, variations included
 *  - fetchPaidTickets(names) → /orders/?testmode=false (all pages) → paid positions with a name
 *  - fetchOrder(code) → /orders/{code}/ → order or null on 404
 * DOCS:
 *  - Pagination: https://docs.pretix.eu/en/latest/api/fundamentals.html#pagination
 *  - Orders: https://docs.pretix.eu/en/latest/api/resources/orders.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { fetchJson } from "../../lib/http.js";
import { FetchError } from "../../lib/errors.js";
import { logger } from "../../lib/logger.js";
import { formatTicketId, type Ticket } from "./ticket.js";

const localizedSchema = z.record(z.string(), z.string());

const itemSchema = z.object({
  id: z.number().int(),
  name: localizedSchema,
  variations: z
    .array(z.object({ id: z.number().int(), value: localizedSchema }))
    .default([]),
});

const positionSchema = z.object({
  positionid: z.number().int(),
  item: z.number().int(),
  variation: z.number().int().nullable(),
  attendee_name: z.string().nullable(),
});

const orderSchema = z.object({
  code: z.string(),
  // n: pending, p: paid, e: expired, c: canceled
  status: z.string(),
  positions: z.array(positionSchema),
});

const pageSchema = z.object({
  count: z.number().int().optional(),
  next: z.string().nullable(),
  results: z.array(z.unknown()),
});

export type PretixOrder = z.infer<typeof orderSchema>;

/** Item and variation ids share one id space in Pretix. */
export type ItemNames = Map<number, string>;

/**
 * What the ticket cache needs from the ticketing system. Tests hand the
 * cache a fake implementing this instead of stubbing fetch.
 */
export interface TicketSource {
  fetchItemNames(): Promise<ItemNames>;
  fetchPaidTickets(itemNames: ItemNames): Promise<Ticket[]>;
  fetchOrder(orderCode: string): Promise<PretixOrder | null>;
}

export class UnknownItemError extends Error {
  constructor(readonly itemId: number) {
    super(`Unknown Pretix item id ${itemId}`);
    this.name = "UnknownItemError";
  }
}

function englishName(names: Record<string, string>): string {
  return names.en ?? Object.values(names)[0] ?? "";
}

export function isPaid(order: PretixOrder): boolean {
  return order.status === "p";
}

/**
 * Positions without an attendee name (childcare, T-shirts) are not tickets.
 * An item id missing from `itemNames` throws: the caller refreshes item
 * names and retries.
 */
export function ticketsFromOrder(order: PretixOrder, itemNames: ItemNames): Ticket[] {
  const tickets: Ticket[] = [];
  for (const position of order.positions) {
    const ownerName = position.attendee_name?.trim();
    if (!ownerName) continue;

    const itemName = itemNames.get(position.item);
    if (itemName === undefined) {
      throw new UnknownItemError(position.item);
    }
    const variationName =
      position.variation === null ? null : (itemNames.get(position.variation) ?? null);

    tickets.push({
      id: formatTicketId(order.code.toUpperCase(), position.positionid),
      orderCode: order.code.toUpperCase(),
      itemName,
      variationName,
      ownerName,
    });
  }
  return tickets;
}

export class PretixClient implements TicketSource {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(baseUrl: string, token: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    // https://docs.pretix.eu/en/latest/api/tokenauth.html
    this.headers = { Authorization: `Token ${token}` };
  }

  async fetchItemNames(): Promise<ItemNames> {
    const names: ItemNames = new Map();
    for (const raw of await this.fetchAllPages(`${this.baseUrl}/items/`)) {
      const item = this.parse(itemSchema, raw, "items");
      names.set(item.id, englishName(item.name));
      for (const variation of item.variations) {
        names.set(variation.id, englishName(variation.value));
      }
    }
    logger.debug({ count: names.size }, "[pretix] item names fetched");
    return names;
  }

  async fetchPaidTickets(itemNames: ItemNames): Promise<Ticket[]> {
    const tickets: Ticket[] = [];
    const orders = await this.fetchAllPages(`${this.baseUrl}/orders/`, { testmode: "false" });
    for (const raw of orders) {
      const order = this.parse(orderSchema, raw, "orders");
      if (isPaid(order)) {
        tickets.push(...ticketsFromOrder(order, itemNames));
      }
    }
    logger.info({ orders: orders.length, tickets: tickets.length }, "[pretix] orders fetched");
    return tickets;
  }

  async fetchOrder(orderCode: string): Promise<PretixOrder | null> {
    const url = `${this.baseUrl}/orders/${encodeURIComponent(orderCode)}/`;
    try {
      return this.parse(orderSchema, await fetchJson(url, { headers: this.headers }), "order");
    } catch (err) {
      if (err instanceof FetchError && err.status === 404) return null;
      throw err;
    }
  }

  /** Query params go on the first request only; `next` already carries them. */
  private async fetchAllPages(url: string, query?: Record<string, string>): Promise<unknown[]> {
    const results: unknown[] = [];
    const startedAt = Date.now();
    let nextUrl: string | null = url;
    let first = true;

    while (nextUrl !== null) {
      const page: z.infer<typeof pageSchema> = this.parse(
        pageSchema,
        await fetchJson(nextUrl, { headers: this.headers, query: first ? query : undefined }),
        "page"
      );
      results.push(...page.results);
      nextUrl = page.next;
      first = false;
    }

    logger.debug({ url, count: results.length, ms: Date.now() - startedAt }, "[pretix] pages fetched");
    return results;
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new FetchError(`Unexpected ${what} payload from Pretix: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
        url: this.baseUrl,
      });
    }
    return parsed.data;
  }
}
