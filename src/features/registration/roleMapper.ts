/**
 * Conference Bot — src/features/registration/roleMapper.ts
 * WHAT: Ticket item/variation → Discord role names.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { RegistrationConfig } from "../../lib/config.js";
import type { Ticket } from "./ticket.js";

export type RoleTables = Pick<RegistrationConfig, "itemToRoles" | "variationToRoles">;

/**
 * Union of the item's and the variation's roles, first occurrence order,
 * no duplicates. Empty when neither name is configured.
 */
export function rolesForTicket(
  ticket: Pick<Ticket, "itemName" | "variationName">,
  tables: RoleTables
): string[] {
  const roles = new Set<string>(tables.itemToRoles[ticket.itemName] ?? []);
  if (ticket.variationName !== null) {
    for (const role of tables.variationToRoles[ticket.variationName] ?? []) {
      roles.add(role);
    }
  }
  return [...roles];
}
