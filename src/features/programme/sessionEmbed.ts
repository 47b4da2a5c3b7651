/**
 * Conference Bot — src/features/programme/sessionEmbed.ts
 * WHAT: Discord embed for an upcoming session.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, escapeMarkdown, time } from "discord.js";
import type { Session, Speaker } from "./models.js";

const AUTHOR_WIDTH = 128;
const ABSTRACT_WIDTH = 200;
const TITLE_WIDTH = 128;
const FIELD_VALUE_EMPTY = "—";

const LEVEL_COLORS: Record<string, number> = {
  ADVANCED: 0xd34847,
  INTERMEDIATE: 0xffcd45,
  BEGINNER: 0x63d452,
};

/**
 * Collapse whitespace and cut at a word boundary so the result, placeholder
 * included, fits in `width`.
 */
export function shorten(text: string, width: number, placeholder = " [...]"): string {
  const collapsed = text.trim().split(/\s+/).filter(Boolean).join(" ");
  if (collapsed.length <= width) return collapsed;

  let out = "";
  for (const word of collapsed.split(" ")) {
    const next = out ? `${out} ${word}` : word;
    if (next.length + placeholder.length > width) break;
    out = next;
  }
  return out ? `${out}${placeholder}` : placeholder.trim();
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

function author(speakers: Speaker[]): { name: string; iconURL?: string; url?: string } | null {
  if (speakers.length === 0) return null;
  const iconURL = speakers.find((s) => s.avatarUrl)?.avatarUrl ?? undefined;
  return {
    name: shorten(speakers.map((s) => s.name).join(", "), AUTHOR_WIDTH),
    iconURL,
    url: speakers[0]?.websiteUrl ?? undefined,
  };
}

/** "This session starts at 09:30:00 (local conference time)", read off the published timestamp. */
export function formatFooter(startIso: string): string {
  const match = /T(\d{2}:\d{2})(:\d{2})?/.exec(startIso);
  const local = match ? `${match[1]}${match[2] ?? ":00"}` : startIso;
  return `This session starts at ${local} (local conference time)`;
}

export function createSessionEmbed(session: Session, livestreamUrl: string | undefined): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(shorten(escapeMarkdown(session.title), TITLE_WIDTH))
    .setURL(session.websiteUrl)
    .addFields(
      { name: "Start Time", value: time(session.start), inline: true },
      { name: "Room", value: session.rooms.join(", ") || FIELD_VALUE_EMPTY, inline: true },
      { name: "Track", value: session.track || FIELD_VALUE_EMPTY, inline: true },
      { name: "Duration", value: `${session.durationMinutes} minutes`, inline: true },
      {
        name: "Livestream",
        value: livestreamUrl ? `[YouTube](${livestreamUrl})` : FIELD_VALUE_EMPTY,
        inline: true,
      },
      { name: "Level", value: capitalize(session.level) || FIELD_VALUE_EMPTY, inline: true }
    )
    .setFooter({ text: formatFooter(session.startIso) });

  const color = LEVEL_COLORS[session.level.toUpperCase()];
  if (color !== undefined) embed.setColor(color);

  if (session.abstract) {
    const abstract = shorten(escapeMarkdown(session.abstract), ABSTRACT_WIDTH);
    embed.setDescription(`${abstract}\n\n[Read more about this session](${session.websiteUrl})`);
  }

  const sessionAuthor = author(session.speakers);
  if (sessionAuthor) embed.setAuthor(sessionAuthor);

  return embed;
}
