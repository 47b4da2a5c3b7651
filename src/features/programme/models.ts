/**
 * Conference Bot — src/features/programme/models.ts
 * WHAT: Schedule JSON schema and the Session record the notifier works with.
 * WHY: The schedule feed changes shape between conference years; zod tells us
 *      at fetch time instead of at 09:25 on the first morning.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";

// ISO timestamp with the venue's offset, e.g. "2025-07-16T09:30:00+02:00"
const startSchema = z.string().datetime({ offset: true });

// Embeds reject links that are not URLs; a speaker's broken link is dropped, not fatal
const optionalUrlSchema = z.string().url().nullable().catch(null);

const speakerSchema = z.object({
  code: z.string(),
  name: z.string(),
  avatar: optionalUrlSchema,
  website_url: optionalUrlSchema,
});

const sessionEventSchema = z.object({
  event_type: z.string(),
  code: z.string(),
  slug: z.string(),
  title: z.string(),
  session_type: z.string(),
  speakers: z.array(speakerSchema),
  tweet: z.string().nullable().default(""),
  level: z.string(),
  track: z.string().nullable(),
  rooms: z.array(z.string()),
  start: startSchema,
  website_url: z.string().url(),
  duration: z.number().int(),
});

const breakEventSchema = z.object({
  // Anything with a code is a session; an invalid one must not pass as a break
  code: z.undefined(),
  event_type: z.string(),
  title: z.string(),
  duration: z.number().int(),
  rooms: z.array(z.string()),
  start: startSchema,
});

const dayScheduleSchema = z.object({
  rooms: z.array(z.string()),
  events: z.array(z.union([sessionEventSchema, breakEventSchema])),
});

export const scheduleSchema = z.object({
  days: z.record(z.string().regex(/^\d{4}-\d{2}-\d{2}$/), dayScheduleSchema),
});

export type RawSchedule = z.infer<typeof scheduleSchema>;

export interface Speaker {
  name: string;
  avatarUrl: string | null;
  websiteUrl: string | null;
}

export interface Session {
  code: string;
  slug: string;
  title: string;
  sessionType: string;
  level: string;
  track: string | null;
  rooms: string[];
  start: Date;
  /** Start as published, offset included; source of the venue-local date and time */
  startIso: string;
  durationMinutes: number;
  speakers: Speaker[];
  websiteUrl: string;
  abstract: string;
}

/** Identity across schedule refreshes: a rescheduled session is a new one. */
export function sessionKey(session: Pick<Session, "code" | "startIso">): string {
  return `${session.code}@${session.startIso}`;
}

/** Venue-local calendar day, "YYYY-MM-DD". */
export function sessionDay(session: Pick<Session, "startIso">): string {
  return session.startIso.slice(0, 10);
}

function isSessionEvent(
  event: RawSchedule["days"][string]["events"][number]
): event is z.infer<typeof sessionEventSchema> {
  return "code" in event;
}

/**
 * Validate the feed and flatten it to sessions sorted by start. Breaks are
 * dropped. Throws ZodError on an unexpected shape.
 */
export function parseSchedule(raw: unknown): Session[] {
  const schedule = scheduleSchema.parse(raw);
  const sessions: Session[] = [];

  for (const day of Object.values(schedule.days)) {
    for (const event of day.events) {
      if (!isSessionEvent(event)) continue;
      sessions.push({
        code: event.code,
        slug: event.slug,
        title: event.title,
        sessionType: event.session_type,
        level: event.level,
        track: event.track,
        rooms: event.rooms,
        start: new Date(event.start),
        startIso: event.start,
        durationMinutes: event.duration,
        speakers: event.speakers.map((s) => ({
          name: s.name,
          avatarUrl: s.avatar,
          websiteUrl: s.website_url,
        })),
        websiteUrl: event.website_url,
        abstract: event.tweet ?? "",
      });
    }
  }

  return sessions.sort((a, b) => a.start.getTime() - b.start.getTime());
}
