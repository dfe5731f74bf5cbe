/**
 * Domain types for the scoreboard pipeline.
 *
 * Everything here is provider-neutral: ESPN payload shapes live in
 * `lib/espn/types` and are converted by `lib/espn/mappers`.
 */

export interface LeagueSpec {
    /** Selector key, e.g. "premier-league" */
    key: string;
    displayName: string;
    /** Path segment under the site API, e.g. "soccer/eng.1" */
    apiSlug: string;
}

export interface CalendarDate {
    year: number;
    month: number;
    day: number;
}

export type GameStatus = "Live" | "Scheduled" | "Final";

export type FilterOption = "All" | GameStatus;

export interface GameRecord {
    id: string;
    homeTeam: string;
    awayTeam: string;
    homeScore: number | null;
    awayScore: number | null;
    status: GameStatus;
    startTime: Date;
}

export type SortKey = "awayTeam" | "homeTeam" | "awayScore" | "homeScore" | "status" | "startTime";

export type SortDirection = "Asc" | "Desc";

export interface BoxScoreTeam {
    name: string;
    homeAway: "home" | "away";
    score: number | null;
}

export interface TeamStatRow {
    name: string;
    label: string;
    value: string;
}

export interface PlayerStatCell {
    label: string;
    value: string;
}

export interface PlayerStatRow {
    /** Provider stat table the row came from ("passing", "rushing", ...) */
    category: string;
    player: string;
    stats: PlayerStatCell[];
}

export interface BoxScore {
    gameId: string;
    teams: BoxScoreTeam[];
    teamStats: Record<string, TeamStatRow[]>;
    playerStats: Record<string, PlayerStatRow[]>;
}
