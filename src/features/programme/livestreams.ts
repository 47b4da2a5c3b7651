/**
 * Conference Bot — src/features/programme/livestreams.ts
 * WHAT: Livestream URL table (room → day → url) read from a local JSON file,
 *       plus the pinned "Livestream" message kept in each room channel.
 * WHY: Stream links are only known shortly before each day starts; organizers
 *      edit the file and the bot picks it up on the next refresh.
 * FLOWS:
 *  - reload() → read file → unchanged? stop → validate → swap table → changed=true
 *  - updateLivestreamPins() → per configured room → edit or create the pinned message
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs/promises";
import { z } from "zod";
import { logger } from "../../lib/logger.js";

const livestreamTableSchema = z.record(
  z.string().min(1),
  z.record(z.string().regex(/^\d{4}-\d{2}-\d{2}$/), z.string().url())
);

export type LivestreamTable = z.infer<typeof livestreamTableSchema>;

export const LIVESTREAM_PIN_HEADING = "**Livestream**";

export class LivestreamLinks {
  private table: LivestreamTable = {};
  private lastContent: string | null = null;

  constructor(private readonly filePath: string) {}

  /**
   * Re-read the file. Resolves true only when the content differs from the
   * last successful load; a missing or invalid file keeps the current table.
   */
  async reload(): Promise<boolean> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      logger.info({ err, file: this.filePath }, "[livestreams] file not readable, keeping current links");
      return false;
    }
    if (text === this.lastContent) return false;

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      logger.warn({ err, file: this.filePath }, "[livestreams] file is not valid JSON");
      return false;
    }
    const parsed = livestreamTableSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ file: this.filePath, issues: parsed.error.issues.map((i) => i.path.join(".")) }, "[livestreams] file has unexpected shape");
      return false;
    }

    this.table = parsed.data;
    this.lastContent = text;
    logger.info({ rooms: Object.keys(this.table).length }, "[livestreams] links loaded");
    return true;
  }

  urlFor(room: string, day: string): string | undefined {
    return this.table[room]?.[day];
  }

  roomLinks(room: string): Record<string, string> | undefined {
    return this.table[room];
  }
}

/** Pin text for one room, days in calendar order. */
export function formatLivestreamPin(room: string, links: Record<string, string>): string {
  const lines = Object.entries(links)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([day, url]) => `* ${day}: [YouTube](${url})`);
  return [`${LIVESTREAM_PIN_HEADING} for ${room}`, ...lines].join("\n");
}

export type PinResult = "edited" | "created" | "removed" | "unchanged" | "no_channel";

/** Room channels as seen by the pin updater. */
export interface LivestreamPinTarget {
  upsertLivestreamPin(room: string, content: string): Promise<PinResult>;
  /** Drops the bot's livestream pin; "unchanged" when there is none. */
  removeLivestreamPin(room: string): Promise<PinResult>;
}

/**
 * Push the current links to every configured room. A room whose links were
 * removed from the file loses its pin. Errors in one room are logged and do
 * not stop the others.
 */
export async function updateLivestreamPins(
  links: LivestreamLinks,
  rooms: readonly string[],
  target: LivestreamPinTarget
): Promise<Record<string, PinResult | "failed">> {
  const results: Record<string, PinResult | "failed"> = {};
  for (const room of rooms) {
    const roomLinks = links.roomLinks(room);
    try {
      results[room] =
        roomLinks && Object.keys(roomLinks).length > 0
          ? await target.upsertLivestreamPin(room, formatLivestreamPin(room, roomLinks))
          : await target.removeLivestreamPin(room);
    } catch (err) {
      logger.warn({ err, room }, "[livestreams] pin update failed");
      results[room] = "failed";
    }
  }
  logger.info({ results }, "[livestreams] pins updated");
  return results;
}
