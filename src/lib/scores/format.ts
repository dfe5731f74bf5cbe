import { calendarDateInZone, formatClockTime, formatIsoDate } from "@/lib/time/calendar-date";
import type { BoxScore, GameRecord } from "@/types/scores";

export const RESULT_COLUMNS = ["Away Team", "Home Team", "Away Score", "Home Score", "Status", "Date", "Time"] as const;

export type ResultColumn = (typeof RESULT_COLUMNS)[number];

export type ResultRow = Record<ResultColumn, string>;

const scoreCell = (score: number | null): string => (score === null ? "-" : String(score));

export function toResultRow(game: GameRecord, timeZone: string): ResultRow {
    return {
        "Away Team": game.awayTeam,
        "Home Team": game.homeTeam,
        "Away Score": scoreCell(game.awayScore),
        "Home Score": scoreCell(game.homeScore),
        Status: game.status,
        Date: formatIsoDate(calendarDateInZone(game.startTime, timeZone)),
        Time: formatClockTime(game.startTime, timeZone),
    };
}

/** Game selector entry, e.g. `Boston Celtics @ Miami Heat (2024-01-15 07:30 PM EST)` */
export function formatGameOption(game: GameRecord, timeZone: string): string {
    const row = toResultRow(game, timeZone);
    return `${game.awayTeam} @ ${game.homeTeam} (${row.Date} ${row.Time})`;
}

export const formatTeamLine = (team: BoxScore["teams"][number]): string =>
    `${team.name} (${team.homeAway}): ${scoreCell(team.score)}`;

/**
 * Player rows grouped into one table per stat category, keyed
 * `"{team} - {category}"` in provider order.
 */
export function groupPlayerTables(boxScore: BoxScore): Map<string, Array<Record<string, string>>> {
    const tables = new Map<string, Array<Record<string, string>>>();

    for (const [team, rows] of Object.entries(boxScore.playerStats)) {
        for (const row of rows) {
            const title = `${team} - ${row.category}`;
            const line: Record<string, string> = { Player: row.player };
            for (const cell of row.stats) line[cell.label] = cell.value;

            const table = tables.get(title) ?? [];
            table.push(line);
            tables.set(title, table);
        }
    }

    return tables;
}
