import { z } from "zod";
import { ConfigError } from "@/lib/errors";
import { isValidTimeZone } from "@/lib/time/calendar-date";

export const DEFAULT_ESPN_SITE_API_BASE = "https://site.api.espn.com/apis/site/v2/sports";

export const configSchema = z.object({
    ESPN_SITE_API_BASE: z
        .string()
        .trim()
        .url("ESPN_SITE_API_BASE must be an absolute URL.")
        .default(DEFAULT_ESPN_SITE_API_BASE)
        .transform((value) => value.replace(/\/+$/, "")),
    SCORES_TIMEZONE: z
        .string()
        .trim()
        .default("America/New_York")
        .refine(isValidTimeZone, "SCORES_TIMEZONE must be an IANA time zone, e.g. America/New_York."),
    SCORES_REQUEST_TIMEOUT_MS: z.coerce
        .number()
        .int("SCORES_REQUEST_TIMEOUT_MS must be a whole number of milliseconds.")
        .positive("SCORES_REQUEST_TIMEOUT_MS must be positive.")
        .default(10_000),
    SCORES_LOG_FILE: z.string().trim().default("scores.log"),
});

export interface ScoresConfig {
    apiBaseUrl: string;
    timeZone: string;
    requestTimeoutMs: number;
    /** null when the file sink is disabled */
    logFile: string | null;
}

/**
 * Reads pipeline settings from the environment.
 * Unset keys fall back to defaults; an empty SCORES_LOG_FILE turns the file log off.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ScoresConfig {
    const parsed = configSchema.safeParse({
        ESPN_SITE_API_BASE: env.ESPN_SITE_API_BASE || undefined,
        SCORES_TIMEZONE: env.SCORES_TIMEZONE || undefined,
        SCORES_REQUEST_TIMEOUT_MS: env.SCORES_REQUEST_TIMEOUT_MS || undefined,
        SCORES_LOG_FILE: env.SCORES_LOG_FILE,
    });

    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        );
    }

    const data = parsed.data;
    return {
        apiBaseUrl: data.ESPN_SITE_API_BASE,
        timeZone: data.SCORES_TIMEZONE,
        requestTimeoutMs: data.SCORES_REQUEST_TIMEOUT_MS,
        logFile: data.SCORES_LOG_FILE.length > 0 ? data.SCORES_LOG_FILE : null,
    };
}
