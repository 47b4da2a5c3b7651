/**
 * Conference Bot — src/features/programme/notifier.ts
 * WHAT: Decides which sessions to announce on a tick and posts them.
 * WHY: Attendees get a heads-up a few minutes before each talk, in the main
 *      notification channel and in the room's own channel.
 * FLOWS:
 *  - tick() → clock.now() → selectSessionsToNotify() → heading → embed per session → mark notified
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { EmbedBuilder } from "discord.js";
import { logger } from "../../lib/logger.js";
import type { Clock } from "../../lib/clock.js";
import { sessionDay, sessionKey, type Session } from "./models.js";
import { createSessionEmbed } from "./sessionEmbed.js";
import type { LivestreamLinks } from "./livestreams.js";

export interface NotificationMessage {
  content?: string;
  embeds?: EmbedBuilder[];
}

export interface NotificationChannels {
  postToMain(message: NotificationMessage): Promise<void>;
  /** Resolves false when no channel is configured or found for the room. */
  postToRoom(room: string, message: NotificationMessage): Promise<boolean>;
}

/** Session keys already announced. In memory only; a restart starts empty. */
export class NotificationState {
  private readonly notified = new Set<string>();

  has(session: Session): boolean {
    return this.notified.has(sessionKey(session));
  }

  mark(session: Session): void {
    this.notified.add(sessionKey(session));
  }

  reset(): void {
    this.notified.clear();
  }

  get size(): number {
    return this.notified.size;
  }
}

/**
 * Sessions due at `now`: start − lead ≤ now < start, held in exactly one
 * room, not yet notified. A session whose start has passed is never due.
 */
export function selectSessionsToNotify(
  sessions: readonly Session[],
  now: Date,
  leadMinutes: number,
  state: NotificationState
): Session[] {
  const nowMs = now.getTime();
  const leadMs = leadMinutes * 60_000;
  return sessions.filter((session) => {
    const startMs = session.start.getTime();
    return (
      session.rooms.length === 1 &&
      startMs - leadMs <= nowMs &&
      nowMs < startMs &&
      !state.has(session)
    );
  });
}

export interface SessionNotifierDeps {
  clock: Clock;
  leadMinutes: number;
  state: NotificationState;
  sessions: () => readonly Session[];
  livestreams: LivestreamLinks;
  channels: NotificationChannels;
}

export class SessionNotifier {
  constructor(private readonly deps: SessionNotifierDeps) {}

  /**
   * One polling step. Sessions are marked before posting, so a failed post
   * is logged and not retried on the next tick. Each post fails on its own:
   * a lost heading or main-channel embed does not stop the room post.
   */
  async tick(): Promise<Session[]> {
    const { clock, leadMinutes, state, channels, livestreams } = this.deps;
    const now = clock.now();
    const due = selectSessionsToNotify(this.deps.sessions(), now, leadMinutes, state);
    if (due.length === 0) return [];

    for (const session of due) state.mark(session);
    logger.info({ now: now.toISOString(), sessions: due.map(sessionKey) }, "[notifier] sessions due");

    try {
      await channels.postToMain({ content: `# Sessions starting in ${leadMinutes} minutes:` });
    } catch (err) {
      // Room channels still get their posts
      logger.error({ err, sessions: due.map(sessionKey) }, "[notifier] failed to post heading");
    }

    for (const session of due) {
      const room = session.rooms[0] ?? "";
      const embed = createSessionEmbed(session, livestreams.urlFor(room, sessionDay(session)));
      try {
        await channels.postToMain({ embeds: [embed] });
      } catch (err) {
        logger.error({ err, session: sessionKey(session) }, "[notifier] failed to post session to main channel");
      }
      try {
        const posted = await channels.postToRoom(room, {
          content: `# Starting in ${leadMinutes} minutes @ ${room}`,
          embeds: [embed],
        });
        if (!posted) {
          logger.warn({ room, session: sessionKey(session) }, "[notifier] no channel for room");
        }
      } catch (err) {
        logger.error({ err, room, session: sessionKey(session) }, "[notifier] failed to post session to room");
      }
    }

    return due;
  }
}
