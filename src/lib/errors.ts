/**
 * Error taxonomy for the scoreboard pipeline.
 *
 * Each class carries a `code` so callers can switch on the kind without
 * `instanceof` chains, and `describeError` turns any of them into the
 * message shown to the user.
 *
 * @module lib/errors
 */

export type ScoresErrorCode =
    | "INVALID_DATE"
    | "UNSUPPORTED_LEAGUE"
    | "NETWORK"
    | "PARSE"
    | "GAME_NOT_FOUND"
    | "CONFIG";

export abstract class ScoresError extends Error {
    abstract readonly code: ScoresErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidDateError extends ScoresError {
    readonly code = "INVALID_DATE";

    constructor(readonly input: string) {
        super(`Invalid date "${input}". Expected YYYY-MM-DD.`);
    }
}

export class UnsupportedLeagueError extends ScoresError {
    readonly code = "UNSUPPORTED_LEAGUE";

    constructor(readonly league: string) {
        super(`League "${league}" is not supported.`);
    }
}

export class NetworkError extends ScoresError {
    readonly code = "NETWORK";

    /** HTTP status when the provider answered; undefined for transport failures. */
    readonly status?: number;

    /** Start of the error response body, when one was read. */
    readonly body?: string;

    constructor(message: string, options?: { status?: number; body?: string; cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.status = options?.status;
        this.body = options?.body;
    }
}

export class ParseError extends ScoresError {
    readonly code = "PARSE";
}

export class GameNotFoundError extends ScoresError {
    readonly code = "GAME_NOT_FOUND";

    constructor(readonly gameId: string) {
        super(`Game ${gameId} was not found.`);
    }
}

export class ConfigError extends ScoresError {
    readonly code = "CONFIG";

    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join("; ")}`);
    }
}

export type FetchError =
    | InvalidDateError
    | UnsupportedLeagueError
    | NetworkError
    | ParseError
    | GameNotFoundError;

export const isFetchError = (error: unknown): error is FetchError =>
    error instanceof ScoresError && error.code !== "CONFIG";

export const getErrorMessage = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    if (typeof error === "string") return error;
    return String(error);
};

/**
 * User-facing message naming the cause of a failed call.
 */
export function describeError(error: unknown): string {
    if (!(error instanceof ScoresError)) {
        return `An unexpected error occurred: ${getErrorMessage(error)}`;
    }

    switch (error.code) {
        case "INVALID_DATE":
            return "Invalid date format. Please use YYYY-MM-DD.";
        case "UNSUPPORTED_LEAGUE":
            return "Selected league is not supported.";
        case "NETWORK":
            return `Failed to connect: ${error.message}`;
        case "PARSE":
            return `Unexpected response from the score provider: ${error.message}`;
        case "GAME_NOT_FOUND":
            return "The selected game is no longer available. Fetch scores again and reselect it.";
        case "CONFIG":
            return error.message;
    }
}
