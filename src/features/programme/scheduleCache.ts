/**
 * Conference Bot — src/features/programme/scheduleCache.ts
 * WHAT: Sessions fetched from the schedule feed, mirrored to a JSON file.
 * FLOWS:
 *  - refresh() → GET feed → validate → write file → replace sessions
 *  - refresh() failure → keep memory | load file | throw FetchError
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs/promises";
import path from "node:path";
import { ZodError } from "zod";
import { fetchJson } from "../../lib/http.js";
import { logger } from "../../lib/logger.js";
import { FetchError, PersistenceWarning } from "../../lib/errors.js";
import { withRetry, type RetryOptions } from "../../lib/retry.js";
import { parseSchedule, type Session } from "./models.js";

export type ScheduleRefreshOutcome = "refreshed" | "kept" | "fallback";

export interface ScheduleCacheOptions {
  apiUrl: string;
  cacheFile: string;
  /** Defaults to a plain GET of apiUrl */
  fetchSchedule?: () => Promise<unknown>;
  retry?: RetryOptions;
}

export class ScheduleCache {
  private readonly apiUrl: string;
  private readonly cacheFile: string;
  private readonly fetchSchedule: () => Promise<unknown>;
  private readonly retry: RetryOptions;

  private current: Session[] | null = null;
  private inFlight: Promise<ScheduleRefreshOutcome> | null = null;

  constructor(options: ScheduleCacheOptions) {
    this.apiUrl = options.apiUrl;
    this.cacheFile = options.cacheFile;
    this.fetchSchedule = options.fetchSchedule ?? (() => fetchJson(this.apiUrl));
    this.retry = options.retry ?? {};
  }

  /** Empty until the first successful refresh or file load. */
  get sessions(): readonly Session[] {
    return this.current ?? [];
  }

  get loaded(): boolean {
    return this.current !== null;
  }

  refresh(): Promise<ScheduleRefreshOutcome> {
    if (this.inFlight) return this.inFlight;
    this.inFlight = this.doRefresh().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async doRefresh(): Promise<ScheduleRefreshOutcome> {
    let raw: unknown;
    let sessions: Session[];
    try {
      ({ raw, sessions } = await withRetry(
        async () => {
          const body = await this.fetchSchedule();
          return { raw: body, sessions: this.parse(body) };
        },
        { label: "schedule_refresh", ...this.retry }
      ));
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;

      if (this.current !== null) {
        logger.warn({ err }, "[schedule] refresh failed, keeping in-memory schedule");
        return "kept";
      }
      const fromFile = await this.loadFromFile();
      if (fromFile) {
        this.current = fromFile;
        logger.warn({ err, sessions: fromFile.length }, "[schedule] refresh failed, using cache file");
        return "fallback";
      }
      throw err;
    }

    await this.persist(raw);
    this.current = sessions;
    logger.info({ sessions: sessions.length }, "[schedule] refreshed");
    return "refreshed";
  }

  /** A feed that does not match the schema is treated like a failed fetch. */
  private parse(raw: unknown): Session[] {
    try {
      return parseSchedule(raw);
    } catch (err) {
      if (err instanceof ZodError) {
        throw new FetchError(`Unexpected schedule payload: ${err.issues[0]?.message ?? "invalid"}`, {
          url: this.apiUrl,
          cause: err,
        });
      }
      throw err;
    }
  }

  private async loadFromFile(): Promise<Session[] | null> {
    try {
      const text = await fs.readFile(this.cacheFile, "utf-8");
      return parseSchedule(JSON.parse(text));
    } catch (err) {
      logger.warn({ err, file: this.cacheFile }, "[schedule] cache file unusable");
      return null;
    }
  }

  private async persist(raw: unknown): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.cacheFile), { recursive: true });
      await fs.writeFile(this.cacheFile, JSON.stringify(raw, null, 2), "utf-8");
    } catch (err) {
      logger.warn({ err: new PersistenceWarning(this.cacheFile, err), cause: err }, "[schedule] could not write cache file");
    }
  }
}
