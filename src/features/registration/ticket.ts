/**
 * Conference Bot — src/features/registration/ticket.ts
 * WHAT: Ticket record plus the normalisation rules for what attendees type into the form.
 * WHY: Printed ticket ids come as "#abc12-1", "ABC12 - 1" or just "ABC12";
 *      names come with or without accents, in either order.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MAX_NAME_COMPONENTS } from "../../lib/constants.js";

/**
 * One paid order position. `id` is the printed ticket id: order code plus
 * position number, e.g. "ABC12-1".
 */
export interface Ticket {
  readonly id: string;
  readonly orderCode: string;
  readonly itemName: string;
  readonly variationName: string | null;
  readonly ownerName: string;
}

export interface ParsedTicketId {
  orderCode: string;
  /** null when only the order code was typed */
  position: number | null;
}

export function formatTicketId(orderCode: string, position: number): string {
  return `${orderCode}-${position}`;
}

/**
 * Trim, drop a leading "#", remove whitespace, uppercase.
 * "  #abc12 - 1 " → "ABC12-1"
 */
export function normalizeTicketId(raw: string): string {
  return raw.trim().replace(/^#+/, "").replace(/\s+/g, "").toUpperCase();
}

/**
 * Split a normalised id into order code and position. Anything after the
 * first dash that is not a positive integer is ignored, same as an order
 * code typed on its own.
 */
export function parseTicketId(normalized: string): ParsedTicketId {
  const [orderCode = "", positionPart] = normalized.split("-");
  if (positionPart !== undefined && /^\d+$/.test(positionPart)) {
    const position = Number.parseInt(positionPart, 10);
    if (position > 0) return { orderCode, position };
  }
  return { orderCode, position: null };
}

const PUNCTUATION_RE = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

/**
 * Accents stripped, lowercase, whitespace and ASCII punctuation removed.
 * "Zoë O'Brien-Smith" → "zoeobriensmith"
 */
export function sanitizeName(name: string): string {
  return name
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .toLowerCase()
    .replace(/\s+/g, "")
    .replace(PUNCTUATION_RE, "");
}

export function ticketNameKey(orderCode: string, name: string): string {
  return `${orderCode}-${sanitizeName(name)}`;
}

/**
 * Every ordering of the name's parts, for "family name first" tickets.
 * The name is split into at most MAX_NAME_COMPONENTS parts (the last part
 * keeps the remainder), which caps the permutations at 120.
 */
export function namePermutations(name: string): string[] {
  const words = name.trim().split(/\s+/).filter(Boolean);
  const parts =
    words.length > MAX_NAME_COMPONENTS
      ? [...words.slice(0, MAX_NAME_COMPONENTS - 1), words.slice(MAX_NAME_COMPONENTS - 1).join(" ")]
      : words;

  const out: string[] = [];
  const permute = (remaining: string[], prefix: string[]): void => {
    if (remaining.length === 0) {
      out.push(prefix.join(" "));
      return;
    }
    remaining.forEach((part, i) => {
      permute([...remaining.slice(0, i), ...remaining.slice(i + 1)], [...prefix, part]);
    });
  };
  permute(parts, []);
  return out;
}
