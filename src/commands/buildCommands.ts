// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Slash command definitions for bulk registration with Discord.
// Registration itself is a button + modal, not a slash command.

import { data as healthData } from "./health.js";
import { data as participantsData } from "./participants.js";

export function buildCommands() {
  return [healthData.toJSON(), participantsData.toJSON()];
}
