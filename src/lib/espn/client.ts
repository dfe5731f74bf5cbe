import type { z } from "zod";
import { DEFAULT_ESPN_SITE_API_BASE } from "@/lib/config";
import { NetworkError, ParseError, getErrorMessage } from "@/lib/errors";
import { toApiDate } from "@/lib/time/calendar-date";
import type { CalendarDate } from "@/types/scores";
import { ESPN_REQUEST_HEADERS } from "./constants";
import {
    EspnScoreboardSchema,
    EspnSummarySchema,
    type EspnScoreboardResponse,
    type EspnSummaryResponse,
} from "./types";

export interface EspnClientOptions {
    baseUrl?: string;
    timeoutMs?: number;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/**
 * Read-only client for the ESPN site API.
 *
 * Transport failures, timeouts and non-2xx answers throw NetworkError;
 * bodies that are not JSON or do not match the schema throw ParseError.
 */
export class EspnClient {
    private baseUrl: string;
    private timeoutMs: number;

    constructor(options: EspnClientOptions = {}) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_ESPN_SITE_API_BASE).replace(/\/+$/, "");
        this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    }

    buildScoreboardUrl(apiSlug: string, date: CalendarDate): string {
        const query = new URLSearchParams({ dates: toApiDate(date) });
        return `${this.baseUrl}/${apiSlug}/scoreboard?${query.toString()}`;
    }

    buildSummaryUrl(apiSlug: string, gameId: string): string {
        const query = new URLSearchParams({ event: gameId });
        return `${this.baseUrl}/${apiSlug}/summary?${query.toString()}`;
    }

    async getScoreboard(apiSlug: string, date: CalendarDate): Promise<EspnScoreboardResponse> {
        return this.fetchJson(this.buildScoreboardUrl(apiSlug, date), EspnScoreboardSchema, "scoreboard");
    }

    async getGameSummary(apiSlug: string, gameId: string): Promise<EspnSummaryResponse> {
        return this.fetchJson(this.buildSummaryUrl(apiSlug, gameId), EspnSummarySchema, "summary");
    }

    private async fetchJson<S extends z.ZodTypeAny>(url: string, schema: S, label: string): Promise<z.output<S>> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);

        let text: string;
        try {
            const response = await fetch(url, {
                headers: { ...ESPN_REQUEST_HEADERS },
                signal: controller.signal,
            });

            if (!response.ok) {
                const errorText = await response.text().catch(() => "");
                throw new NetworkError(`ESPN API Error: ${response.status} ${response.statusText}`, {
                    status: response.status,
                    body: errorText.substring(0, 500),
                });
            }

            text = await response.text();
        } catch (error) {
            if (error instanceof NetworkError) throw error;
            if (controller.signal.aborted) {
                throw new NetworkError(`ESPN ${label} request timed out after ${this.timeoutMs}ms`, { cause: error });
            }
            throw new NetworkError(`ESPN ${label} request failed: ${getErrorMessage(error)}`, { cause: error });
        } finally {
            clearTimeout(timer);
        }

        let body: unknown;
        try {
            body = JSON.parse(text);
        } catch (error) {
            throw new ParseError(`Invalid JSON from ESPN ${label}: ${text.substring(0, 200)}`, { cause: error });
        }

        const parsed = schema.safeParse(body);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
            throw new ParseError(`Unexpected ESPN ${label} shape at ${where}: ${issue?.message ?? "invalid"}`, {
                cause: parsed.error,
            });
        }

        return parsed.data;
    }
}
