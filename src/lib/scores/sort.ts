/**
 * Results table ordering.
 *
 * - strings: localeCompare
 * - scores: numeric, null ("no score yet") first in both directions
 * - startTime: chronological
 *
 * Descending flips the comparator, not the array, so equal keys keep their
 * current relative order.
 *
 * @module lib/scores/sort
 */

import type { GameRecord, SortDirection, SortKey } from "@/types/scores";

export const SORT_KEYS: readonly SortKey[] = ["awayTeam", "homeTeam", "awayScore", "homeScore", "status", "startTime"];

export const isSortKey = (value: string): value is SortKey => (SORT_KEYS as readonly string[]).includes(value);

const compareScores = (a: number | null, b: number | null, sign: 1 | -1): number => {
    if (a === null && b === null) return 0;
    if (a === null) return -1;
    if (b === null) return 1;
    return sign * (a - b);
};

export function compareGames(a: GameRecord, b: GameRecord, key: SortKey, direction: SortDirection): number {
    const sign = direction === "Asc" ? 1 : -1;

    switch (key) {
        case "awayScore":
        case "homeScore":
            return compareScores(a[key], b[key], sign);
        case "startTime":
            return sign * (a.startTime.getTime() - b.startTime.getTime());
        case "awayTeam":
        case "homeTeam":
        case "status":
            return sign * a[key].localeCompare(b[key]);
    }
}

/** Returns a new array; the input is left untouched. */
export function sortGames(records: readonly GameRecord[], key: SortKey, direction: SortDirection): GameRecord[] {
    return [...records].sort((a, b) => compareGames(a, b, key, direction));
}
