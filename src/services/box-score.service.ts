/**
 * Box Score Service
 *
 * Fetches the ESPN game summary for one event and reshapes its team and
 * player tables. Row order is the provider's and is never re-sorted.
 *
 * @module services/box-score
 */

import { EspnClient } from "@/lib/espn/client";
import { resolveLeague } from "@/lib/espn/constants";
import { mapBoxScore } from "@/lib/espn/mappers";
import { GameNotFoundError, NetworkError, type FetchError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";
import { err, ok, type Result } from "@/types/result";
import type { BoxScore } from "@/types/scores";
import { toFetchError } from "./scoreboard.service";

export interface BoxScoreServiceOptions {
    client?: EspnClient;
    logger?: Logger;
}

export class BoxScoreService {
    private client: EspnClient;
    private logger: Logger;

    constructor(options: BoxScoreServiceOptions = {}) {
        this.client = options.client ?? new EspnClient();
        this.logger = options.logger ?? createLogger("BoxScore");
    }

    async fetchBoxScore(gameId: string, league: string): Promise<Result<BoxScore, FetchError>> {
        try {
            const leagueSpec = resolveLeague(league);
            const data = await this.client.getGameSummary(leagueSpec.apiSlug, gameId);
            const boxScore = mapBoxScore(gameId, data);

            const playerTeams = Object.keys(boxScore.playerStats).length;
            const summary = `Game ${gameId} (${leagueSpec.displayName}): ok (${boxScore.teams.length} teams`;
            if (playerTeams > 0) this.logger.info(`${summary}, ${playerTeams} player tables)`);
            else this.logger.warn(`${summary}, no player stats available)`);
            return ok(boxScore);
        } catch (error) {
            // Expired or unknown events answer 404.
            const fetchError =
                error instanceof NetworkError && error.status === 404
                    ? new GameNotFoundError(gameId)
                    : toFetchError(error);
            this.logger.error(`Game ${gameId} (${league}): failed (${fetchError.name}: ${fetchError.message})`);
            return err(fetchError);
        }
    }
}
