/**
 * ESPN Data Mappers
 *
 * Turns validated ESPN payloads into provider-neutral GameRecord and BoxScore
 * values. This is the only place that knows ESPN field names; a schema change
 * upstream should touch this file and `types.ts` and nothing else.
 *
 * @module lib/espn/mappers
 */

import { GameNotFoundError, ParseError } from "@/lib/errors";
import type {
    BoxScore,
    BoxScoreTeam,
    GameRecord,
    GameStatus,
    PlayerStatCell,
    PlayerStatRow,
    TeamStatRow,
} from "@/types/scores";
import { ESPN_STATE_TO_STATUS } from "./constants";
import type {
    EspnAthleteStat,
    EspnCompetitor,
    EspnEvent,
    EspnPlayerStatCategory,
    EspnScore,
    EspnScoreboardResponse,
    EspnSummaryResponse,
} from "./types";

const INTEGER_PATTERN = /^\d+$/;

export function mapEventStatus(state: string, eventId: string): GameStatus {
    const key = state.trim().toLowerCase();
    if (!Object.hasOwn(ESPN_STATE_TO_STATUS, key)) {
        throw new ParseError(`Unrecognized status "${state}" for game ${eventId}`);
    }
    return ESPN_STATE_TO_STATUS[key];
}

/**
 * Missing or blank scores become null ("no score yet"); anything that is not a
 * whole number is rejected.
 */
export function parseScore(score: EspnScore | undefined, eventId: string): number | null {
    if (score === undefined) return null;

    if (typeof score === "number") {
        if (Number.isInteger(score) && score >= 0) return score;
        throw new ParseError(`Invalid score ${score} for game ${eventId}`);
    }

    if (typeof score === "object") {
        if (score.value !== undefined) return parseScore(score.value, eventId);
        return parseScore(score.displayValue, eventId);
    }

    const trimmed = score.trim();
    if (!trimmed) return null;
    if (!INTEGER_PATTERN.test(trimmed)) {
        throw new ParseError(`Invalid score "${score}" for game ${eventId}`);
    }
    return Number(trimmed);
}

export function parseStartTime(value: string, eventId: string): Date {
    const startTime = new Date(value);
    if (Number.isNaN(startTime.getTime())) {
        throw new ParseError(`Invalid start time "${value}" for game ${eventId}`);
    }
    return startTime;
}

const findSide = (competitors: EspnCompetitor[], side: "home" | "away"): EspnCompetitor[] =>
    competitors.filter((competitor) => competitor.homeAway === side);

/**
 * Maps one scoreboard event. Returns null for events that are not a single
 * home-vs-away contest (no competition, or sides missing).
 *
 * @throws ParseError on an unmapped status, a malformed score or start time
 */
export function mapScoreboardEvent(event: EspnEvent): GameRecord | null {
    const status = mapEventStatus(event.status.type.state, event.id);
    const startTime = parseStartTime(event.date, event.id);

    const competition = event.competitions[0];
    if (!competition) return null;

    const [home, extraHome] = findSide(competition.competitors, "home");
    const [away, extraAway] = findSide(competition.competitors, "away");
    if (!home || !away || extraHome || extraAway) return null;

    // ESPN reports 0-0 before tip-off; a scheduled game has no score yet.
    const scored = status !== "Scheduled";

    return Object.freeze({
        id: event.id,
        homeTeam: home.team.displayName,
        awayTeam: away.team.displayName,
        homeScore: scored ? parseScore(home.score, event.id) : null,
        awayScore: scored ? parseScore(away.score, event.id) : null,
        status,
        startTime,
    });
}

export interface MappedScoreboard {
    games: GameRecord[];
    /** Ids of events skipped as non-team contests */
    skipped: string[];
}

export function mapScoreboard(data: EspnScoreboardResponse): MappedScoreboard {
    const games: GameRecord[] = [];
    const skipped: string[] = [];

    for (const event of data.events) {
        const game = mapScoreboardEvent(event);
        if (game) games.push(game);
        else skipped.push(event.id);
    }

    return { games, skipped };
}

const toPlayerCell = (stat: EspnAthleteStat, index: number, labels: string[]): PlayerStatCell => {
    const fallbackLabel = labels[index] ?? `Stat ${index + 1}`;
    if (typeof stat === "string") {
        return { label: fallbackLabel, value: stat };
    }
    return { label: stat.name ?? fallbackLabel, value: stat.displayValue ?? "N/A" };
};

const mapPlayerCategory = (category: EspnPlayerStatCategory): PlayerStatRow[] => {
    const labels = category.labels ?? [];
    const categoryName = category.name ?? "General";

    return category.athletes.map((line) => ({
        category: categoryName,
        player: line.athlete.displayName,
        stats: line.stats.map((stat, index) => toPlayerCell(stat, index, labels)),
    }));
};

/**
 * Maps a game summary to a BoxScore, keeping the provider's row order.
 *
 * @throws GameNotFoundError when the summary has no header competition
 */
export function mapBoxScore(gameId: string, data: EspnSummaryResponse): BoxScore {
    const competition = data.header?.competitions[0];
    if (!competition || competition.competitors.length === 0) {
        throw new GameNotFoundError(gameId);
    }

    const teams: BoxScoreTeam[] = [];
    for (const competitor of competition.competitors) {
        const side = competitor.homeAway;
        if (side !== "home" && side !== "away") continue;
        teams.push({
            name: competitor.team.displayName,
            homeAway: side,
            score: parseScore(competitor.score, gameId),
        });
    }

    const teamStats: Record<string, TeamStatRow[]> = {};
    for (const entry of data.boxscore.teams) {
        const rows = entry.statistics.map((stat) => ({
            name: stat.name,
            label: stat.label ?? stat.name,
            value: stat.displayValue,
        }));
        teamStats[entry.team.displayName] = [...(teamStats[entry.team.displayName] ?? []), ...rows];
    }

    const playerStats: Record<string, PlayerStatRow[]> = {};
    for (const entry of data.boxscore.players) {
        const rows = entry.statistics.flatMap(mapPlayerCategory);
        playerStats[entry.team.displayName] = [...(playerStats[entry.team.displayName] ?? []), ...rows];
    }

    return { gameId, teams, teamStats, playerStats };
}
