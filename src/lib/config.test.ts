import { describe, it, expect } from "vitest";
import { ConfigError } from "@/lib/errors";
import { DEFAULT_ESPN_SITE_API_BASE, loadConfig } from "./config";

describe("loadConfig", () => {
    it("applies defaults for an empty environment", () => {
        expect(loadConfig({})).toEqual({
            apiBaseUrl: DEFAULT_ESPN_SITE_API_BASE,
            timeZone: "America/New_York",
            requestTimeoutMs: 10_000,
            logFile: "scores.log",
        });
    });

    it("reads overrides and trims a trailing slash from the base URL", () => {
        const config = loadConfig({
            ESPN_SITE_API_BASE: "http://localhost:9000/sports/",
            SCORES_TIMEZONE: "Europe/London",
            SCORES_REQUEST_TIMEOUT_MS: "2500",
            SCORES_LOG_FILE: "/tmp/scores-test.log",
        });

        expect(config).toEqual({
            apiBaseUrl: "http://localhost:9000/sports",
            timeZone: "Europe/London",
            requestTimeoutMs: 2500,
            logFile: "/tmp/scores-test.log",
        });
    });

    it("treats blank values as unset, except the log file which is disabled", () => {
        const config = loadConfig({ SCORES_TIMEZONE: "", SCORES_REQUEST_TIMEOUT_MS: "", SCORES_LOG_FILE: "" });
        expect(config.timeZone).toBe("America/New_York");
        expect(config.requestTimeoutMs).toBe(10_000);
        expect(config.logFile).toBeNull();
    });

    it("collects every invalid key into one ConfigError", () => {
        let caught: unknown;
        try {
            loadConfig({ SCORES_TIMEZONE: "Nowhere/Special", SCORES_REQUEST_TIMEOUT_MS: "-5" });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigError);
        const issues = caught instanceof ConfigError ? caught.issues : [];
        expect(issues).toEqual([
            "SCORES_TIMEZONE: SCORES_TIMEZONE must be an IANA time zone, e.g. America/New_York.",
            "SCORES_REQUEST_TIMEOUT_MS: SCORES_REQUEST_TIMEOUT_MS must be positive.",
        ]);
    });

    it("rejects a non-URL base", () => {
        expect(() => loadConfig({ ESPN_SITE_API_BASE: "site api" })).toThrow(
            "ESPN_SITE_API_BASE: ESPN_SITE_API_BASE must be an absolute URL."
        );
    });
});
