/**
 * Terminal front end for the scoreboard pipeline.
 *
 *   npm run scores -- [league] [date] [filter] [sort] [gameId]
 *
 * Each positional argument falls back to SCORES_LEAGUE, SCORES_DATE,
 * SCORES_FILTER, SCORES_SORT and SCORES_GAME_ID.
 */

import { z } from "zod";
import { loadEnv } from "./load-env";
import { loadConfig } from "@/lib/config";
import { EspnClient } from "@/lib/espn/client";
import { DEFAULT_LEAGUE_KEY, SUPPORTED_LEAGUES } from "@/lib/espn/constants";
import { describeError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { FILTER_OPTIONS, isFilterOption } from "@/lib/scores/filter";
import { formatTeamLine, groupPlayerTables, toResultRow } from "@/lib/scores/format";
import { SORT_KEYS, isSortKey } from "@/lib/scores/sort";
import { ScoreboardViewModel } from "@/lib/scores/view-model";
import { BoxScoreService } from "@/services/box-score.service";
import { ScoreboardService } from "@/services/scoreboard.service";
import type { BoxScore } from "@/types/scores";

const blankToUndefined = (value: string | undefined) => (value && value.trim() ? value.trim() : undefined);

const argsSchema = z.object({
    league: z.string().default(DEFAULT_LEAGUE_KEY),
    date: z.string().optional(),
    filter: z
        .string()
        .default("All")
        .refine(isFilterOption, `Filter must be one of ${FILTER_OPTIONS.join(", ")}.`),
    sort: z
        .string()
        .optional()
        .refine((value) => value === undefined || isSortKey(value), `Sort must be one of ${SORT_KEYS.join(", ")}.`),
    gameId: z.string().optional(),
});

const printBoxScore = (boxScore: BoxScore): void => {
    console.log(`\nBox Score - game ${boxScore.gameId}`);
    for (const team of boxScore.teams) console.log(`  ${formatTeamLine(team)}`);

    for (const [team, rows] of Object.entries(boxScore.teamStats)) {
        console.log(`\nTeam Statistics - ${team}`);
        console.table(rows.map((row) => ({ Statistic: row.label, Value: row.value })));
    }

    const playerTables = groupPlayerTables(boxScore);
    if (playerTables.size === 0) {
        console.log("\nNo player stats available");
    }
    for (const [title, rows] of playerTables) {
        console.log(`\nPlayer Statistics - ${title}`);
        console.table(rows);
    }
};

const run = async (): Promise<void> => {
    loadEnv();
    const config = loadConfig();

    const [, , ...argv] = process.argv;
    const args = argsSchema.safeParse({
        league: blankToUndefined(argv[0] ?? process.env.SCORES_LEAGUE),
        date: blankToUndefined(argv[1] ?? process.env.SCORES_DATE),
        filter: blankToUndefined(argv[2] ?? process.env.SCORES_FILTER),
        sort: blankToUndefined(argv[3] ?? process.env.SCORES_SORT),
        gameId: blankToUndefined(argv[4] ?? process.env.SCORES_GAME_ID),
    });

    if (!args.success) {
        for (const issue of args.error.issues) console.error(`[Ops] ${issue.message}`);
        console.error(`[Ops] Leagues: ${SUPPORTED_LEAGUES.map((league) => league.key).join(", ")}`);
        process.exit(1);
    }

    const client = new EspnClient({ baseUrl: config.apiBaseUrl, timeoutMs: config.requestTimeoutMs });
    const scoreboard = new ScoreboardService({
        client,
        timeZone: config.timeZone,
        logger: createLogger("ScoreFetcher", { file: config.logFile }),
    });
    const boxScores = new BoxScoreService({
        client,
        logger: createLogger("BoxScore", { file: config.logFile }),
    });

    const viewModel = new ScoreboardViewModel(
        {
            fetchScores: (league, date) => scoreboard.fetchScores(league, date),
            fetchBoxScore: (gameId, league) => boxScores.fetchBoxScore(gameId, league),
        },
        config.timeZone
    );

    const { league, date, filter, sort, gameId } = args.data;
    if (isFilterOption(filter)) viewModel.setFilter(filter);

    const state = await viewModel.fetch({ league, date });
    if (state.phase === "error") {
        console.error(`[Ops] ${state.message}`);
        process.exit(1);
    }

    if (sort && isSortKey(sort)) viewModel.sortBy(sort);

    if (viewModel.state.message) console.log(`[Ops] ${viewModel.state.message}`);
    if (viewModel.state.rows.length > 0) {
        console.table(viewModel.state.rows.map((game) => toResultRow(game, config.timeZone)));
        console.log("\nGames:");
        for (const option of viewModel.gameOptions) console.log(`  ${option.gameId}  ${option.label}`);
    }

    if (gameId) {
        const result = await viewModel.showBoxScore(gameId);
        if (!result.ok) {
            console.error(`[Ops] ${describeError(result.error)}`);
            process.exit(1);
        }
        printBoxScore(result.value);
    }
};

run().catch((error: unknown) => {
    console.error(`[Ops] ${describeError(error)}`);
    process.exit(1);
});
