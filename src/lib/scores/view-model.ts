/**
 * Scoreboard View Model
 *
 * Owns the table state for one UI: the latest successful fetch, the active
 * filter and sort, and the selected box score. Pipeline calls stay stateless;
 * this class is the single place that applies their results.
 *
 * Phases per query cycle:
 *   idle → fetching → displaying | error
 *   displaying → fetching (new query), error → fetching (retry)
 *   filter / sort never leave the current phase and never hit the network.
 *
 * Only the newest request may apply its result. Each fetch and box-score call
 * takes a token; a result that comes back under an older token is dropped.
 *
 * @module lib/scores/view-model
 */

import { GameNotFoundError, describeError, type FetchError } from "@/lib/errors";
import { err, type Result } from "@/types/result";
import type { BoxScore, FilterOption, GameRecord, SortDirection, SortKey } from "@/types/scores";
import { filterGames } from "./filter";
import { formatGameOption } from "./format";
import { sortGames } from "./sort";

export type ScoreboardPhase = "idle" | "fetching" | "displaying" | "error";

export type BoxScorePhase = "idle" | "fetching" | "ready" | "error";

export interface ScoreboardQuery {
    league: string;
    /** ISO `YYYY-MM-DD`; omitted means today in the reference zone */
    date?: string;
}

export interface BoxScoreState {
    phase: BoxScorePhase;
    gameId: string | null;
    data: BoxScore | null;
    error: FetchError | null;
}

export interface ViewState {
    phase: ScoreboardPhase;
    /** Query of the most recent fetch request, successful or not */
    query: ScoreboardQuery | null;
    /** Query that produced `games` */
    displayedQuery: ScoreboardQuery | null;
    /** Every record from the latest successful fetch, in provider order */
    games: readonly GameRecord[];
    /** `games` after filter and sort; what the table shows */
    rows: readonly GameRecord[];
    filter: FilterOption;
    sortKey: SortKey | null;
    sortDirection: SortDirection;
    /** User-facing error or notice for the last action */
    message: string | null;
    error: FetchError | null;
    boxScore: BoxScoreState;
}

export interface GameOption {
    label: string;
    gameId: string;
}

export interface ScoresPipeline {
    fetchScores(league: string, date?: string): Promise<Result<GameRecord[], FetchError>>;
    fetchBoxScore(gameId: string, league: string): Promise<Result<BoxScore, FetchError>>;
}

export type ViewStateListener = (state: ViewState) => void;

const IDLE_BOX_SCORE: BoxScoreState = { phase: "idle", gameId: null, data: null, error: null };

export const NO_GAMES_MESSAGE = "No games found for the selected league and date.";

export const noFilteredGamesMessage = (filter: FilterOption): string =>
    `No ${filter.toLowerCase()} games found for the selected league and date.`;

const emptyResultMessage = (games: readonly GameRecord[], rows: readonly GameRecord[], filter: FilterOption) => {
    if (games.length === 0) return NO_GAMES_MESSAGE;
    if (rows.length === 0) return noFilteredGamesMessage(filter);
    return null;
};

export class ScoreboardViewModel {
    private current: ViewState;
    private listeners = new Set<ViewStateListener>();
    private fetchToken = 0;
    private boxScoreToken = 0;

    constructor(
        private pipeline: ScoresPipeline,
        private timeZone: string,
        initial: { filter?: FilterOption } = {}
    ) {
        const state: ViewState = {
            phase: "idle",
            query: null,
            displayedQuery: null,
            games: [],
            rows: [],
            filter: initial.filter ?? "All",
            sortKey: null,
            sortDirection: "Asc",
            message: null,
            error: null,
            boxScore: IDLE_BOX_SCORE,
        };
        this.current = Object.freeze(state);
    }

    get state(): ViewState {
        return this.current;
    }

    get gameOptions(): GameOption[] {
        return this.current.rows.map((game) => ({
            label: formatGameOption(game, this.timeZone),
            gameId: game.id,
        }));
    }

    subscribe(listener: ViewStateListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Starts a new query cycle. A newer fetch supersedes this one; its result
     * is then ignored. On failure the table keeps showing the previous rows.
     */
    async fetch(query: ScoreboardQuery): Promise<ViewState> {
        const token = ++this.fetchToken;
        this.boxScoreToken++;

        this.update({ phase: "fetching", query, message: null, error: null, boxScore: IDLE_BOX_SCORE });

        const result = await this.pipeline.fetchScores(query.league, query.date);
        if (token !== this.fetchToken) return this.current;

        if (!result.ok) {
            this.update({ phase: "error", error: result.error, message: describeError(result.error) });
            return this.current;
        }

        // A box score requested while this fetch was in flight belongs to the old games.
        this.boxScoreToken++;
        const games = Object.freeze([...result.value]);
        const rows = this.deriveRows(games, this.current.filter);
        this.update({
            phase: "displaying",
            displayedQuery: query,
            games,
            rows,
            message: emptyResultMessage(games, rows, this.current.filter),
            boxScore: IDLE_BOX_SCORE,
        });
        return this.current;
    }

    /** Re-issues the last query; the retry path out of `error`. */
    async refresh(): Promise<ViewState> {
        const query = this.current.query;
        if (!query) return this.current;
        return this.fetch(query);
    }

    setFilter(filter: FilterOption): readonly GameRecord[] {
        const rows = this.deriveRows(this.current.games, filter);
        const message =
            this.current.phase === "displaying" ? emptyResultMessage(this.current.games, rows, filter) : this.current.message;
        this.update({ filter, rows, message });
        return rows;
    }

    /**
     * Sorts the visible rows by `key`. Repeating the current key flips the
     * direction; a new key starts ascending.
     */
    sortBy(key: SortKey): readonly GameRecord[] {
        const direction: SortDirection =
            this.current.sortKey === key && this.current.sortDirection === "Asc" ? "Desc" : "Asc";
        const rows = sortGames(this.current.rows, key, direction);
        this.update({ sortKey: key, sortDirection: direction, rows });
        return rows;
    }

    /**
     * Loads the box score for a game of the latest successful fetch. Ids from
     * an earlier fetch fail with GameNotFoundError without a network call.
     * Table rows are never touched here.
     */
    async showBoxScore(gameId: string): Promise<Result<BoxScore, FetchError>> {
        const token = ++this.boxScoreToken;
        const league = this.current.displayedQuery?.league;

        if (!league || !this.current.games.some((game) => game.id === gameId)) {
            const error = new GameNotFoundError(gameId);
            this.update({
                boxScore: { phase: "error", gameId, data: null, error },
                message: describeError(error),
            });
            return err(error);
        }

        this.update({ boxScore: { phase: "fetching", gameId, data: null, error: null } });

        const result = await this.pipeline.fetchBoxScore(gameId, league);
        if (token !== this.boxScoreToken) return result;

        if (result.ok) {
            this.update({ boxScore: { phase: "ready", gameId, data: result.value, error: null } });
        } else {
            this.update({
                boxScore: { phase: "error", gameId, data: null, error: result.error },
                message: describeError(result.error),
            });
        }
        return result;
    }

    private deriveRows(games: readonly GameRecord[], filter: FilterOption): readonly GameRecord[] {
        const filtered = filterGames(games, filter);
        const { sortKey, sortDirection } = this.current;
        return Object.freeze(sortKey ? sortGames(filtered, sortKey, sortDirection) : [...filtered]);
    }

    private update(patch: Partial<ViewState>): void {
        this.current = Object.freeze({ ...this.current, ...patch });
        for (const listener of this.listeners) listener(this.current);
    }
}
