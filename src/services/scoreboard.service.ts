/**
 * Scoreboard Service
 *
 * One (league, date) query → one ESPN scoreboard request → normalized
 * GameRecords. Input is validated before any network call, and every call
 * leaves exactly one log entry with its outcome.
 *
 * @module services/scoreboard
 */

import { EspnClient } from "@/lib/espn/client";
import { resolveLeague } from "@/lib/espn/constants";
import { mapScoreboard } from "@/lib/espn/mappers";
import { ParseError, getErrorMessage, isFetchError, type FetchError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";
import { formatIsoDate, parseCalendarDate, todayInZone } from "@/lib/time/calendar-date";
import { err, ok, type Result } from "@/types/result";
import type { GameRecord } from "@/types/scores";

export interface ScoreboardServiceOptions {
    client?: EspnClient;
    logger?: Logger;
    /** Zone whose calendar day is used when no date is given */
    timeZone?: string;
    now?: () => Date;
}

export const toFetchError = (error: unknown): FetchError =>
    isFetchError(error)
        ? error
        : new ParseError(`Unexpected error while reading the response: ${getErrorMessage(error)}`, { cause: error });

export class ScoreboardService {
    private client: EspnClient;
    private logger: Logger;
    private timeZone: string;
    private now: () => Date;

    constructor(options: ScoreboardServiceOptions = {}) {
        this.client = options.client ?? new EspnClient();
        this.logger = options.logger ?? createLogger("ScoreFetcher");
        this.timeZone = options.timeZone ?? "America/New_York";
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Fetches the scoreboard for a league on an ISO date (`YYYY-MM-DD`).
     * Without a date, today in the reference zone is used.
     */
    async fetchScores(league: string, date?: string): Promise<Result<GameRecord[], FetchError>> {
        const dateLabel = date ?? "today";

        try {
            const leagueSpec = resolveLeague(league);
            const day = date === undefined ? todayInZone(this.timeZone, this.now()) : parseCalendarDate(date);

            const data = await this.client.getScoreboard(leagueSpec.apiSlug, day);
            const { games, skipped } = mapScoreboard(data);

            const summary = `${leagueSpec.displayName} on ${formatIsoDate(day)}: ok (${games.length} games`;
            if (skipped.length > 0) this.logger.warn(`${summary}, skipped ${skipped.length} non-team events)`);
            else this.logger.info(`${summary})`);
            return ok(games);
        } catch (error) {
            const fetchError = toFetchError(error);
            this.logger.error(`${league} on ${dateLabel}: failed (${fetchError.name}: ${fetchError.message})`);
            return err(fetchError);
        }
    }
}
