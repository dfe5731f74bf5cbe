/**
 * Unit tests for ESPN Data Mappers
 *
 * Validates that parsed ESPN payloads become GameRecords and BoxScores with
 * the right statuses, scores and row order.
 */

import { describe, it, expect } from "vitest";
import { GameNotFoundError, ParseError } from "@/lib/errors";
import { NBA_NIGHT, buildEvent, buildScoreboard, buildSummary } from "@/test-utils/espn-fixtures";
import { mapBoxScore, mapEventStatus, mapScoreboard, mapScoreboardEvent, parseScore } from "./mappers";
import { EspnEventSchema, EspnScoreboardSchema, EspnSummarySchema } from "./types";

const parseEvent = (input: unknown) => EspnEventSchema.parse(input);

describe("mapEventStatus", () => {
    it("maps provider states through the lookup table", () => {
        expect(mapEventStatus("pre", "1")).toBe("Scheduled");
        expect(mapEventStatus("in", "1")).toBe("Live");
        expect(mapEventStatus("POST", "1")).toBe("Final");
    });

    it("fails loudly on unknown states", () => {
        expect(() => mapEventStatus("postponed", "77")).toThrow(ParseError);
        expect(() => mapEventStatus("constructor", "77")).toThrow('Unrecognized status "constructor" for game 77');
    });
});

describe("parseScore", () => {
    it("reads integer strings, numbers and score objects", () => {
        expect(parseScore("102", "1")).toBe(102);
        expect(parseScore(" 7 ", "1")).toBe(7);
        expect(parseScore(3, "1")).toBe(3);
        expect(parseScore({ value: 88, displayValue: "88" }, "1")).toBe(88);
        expect(parseScore({ displayValue: "21" }, "1")).toBe(21);
    });

    it("treats missing or blank scores as null", () => {
        expect(parseScore(undefined, "1")).toBeNull();
        expect(parseScore("", "1")).toBeNull();
        expect(parseScore({}, "1")).toBeNull();
    });

    it("rejects non-integer scores", () => {
        expect(() => parseScore("N/A", "9")).toThrow('Invalid score "N/A" for game 9');
        expect(() => parseScore(1.5, "9")).toThrow(ParseError);
    });
});

describe("mapScoreboardEvent", () => {
    it("maps a final game", () => {
        const game = mapScoreboardEvent(parseEvent(buildEvent(NBA_NIGHT[0])));
        expect(game).toEqual({
            id: "401",
            homeTeam: "Boston Celtics",
            awayTeam: "Houston Rockets",
            homeScore: 145,
            awayScore: 113,
            status: "Final",
            startTime: new Date("2024-01-16T00:30:00Z"),
        });
        expect(Object.isFrozen(game)).toBe(true);
    });

    it("drops the provider's placeholder 0-0 for scheduled games", () => {
        const game = mapScoreboardEvent(
            parseEvent(buildEvent({ id: "9", home: "A", away: "B", homeScore: "0", awayScore: "0", state: "pre" }))
        );
        expect(game?.status).toBe("Scheduled");
        expect(game?.homeScore).toBeNull();
        expect(game?.awayScore).toBeNull();
    });

    it("returns null for events that are not home-vs-away", () => {
        const noCompetition = { ...buildEvent({ id: "5", home: "A", away: "B" }), competitions: [] };
        expect(mapScoreboardEvent(parseEvent(noCompetition))).toBeNull();

        const twoHomes = buildEvent({ id: "6", home: "A", away: "B" });
        twoHomes.competitions[0].competitors[1].homeAway = "home";
        expect(mapScoreboardEvent(parseEvent(twoHomes))).toBeNull();
    });

    it("rejects unparseable start times", () => {
        const event = buildEvent({ id: "7", home: "A", away: "B", date: "soon" });
        expect(() => mapScoreboardEvent(parseEvent(event))).toThrow('Invalid start time "soon" for game 7');
    });
});

describe("mapScoreboard", () => {
    it("maps every event in provider order", () => {
        const { games, skipped } = mapScoreboard(EspnScoreboardSchema.parse(buildScoreboard(NBA_NIGHT)));
        expect(games.map((g) => g.id)).toEqual(["401", "402", "403", "404", "405", "406", "407", "408"]);
        expect(skipped).toEqual([]);
    });

    it("reports skipped events", () => {
        const payload = buildScoreboard(NBA_NIGHT.slice(0, 2));
        payload.events.push({ ...buildEvent({ id: "999", home: "A", away: "B" }), competitions: [] });
        const { games, skipped } = mapScoreboard(EspnScoreboardSchema.parse(payload));
        expect(games).toHaveLength(2);
        expect(skipped).toEqual(["999"]);
    });

    it("fails the whole scoreboard on one unknown status", () => {
        const payload = buildScoreboard([...NBA_NIGHT.slice(0, 2), { id: "410", home: "A", away: "B", state: "delayed" }]);
        expect(() => mapScoreboard(EspnScoreboardSchema.parse(payload))).toThrow(ParseError);
    });
});

describe("mapBoxScore", () => {
    const boxScore = mapBoxScore("401", EspnSummarySchema.parse(buildSummary("401")));

    it("maps header teams with scores", () => {
        expect(boxScore.gameId).toBe("401");
        expect(boxScore.teams).toEqual([
            { name: "Boston Celtics", homeAway: "home", score: 145 },
            { name: "Houston Rockets", homeAway: "away", score: 113 },
        ]);
    });

    it("keeps team stat rows in provider order, labelling by name when needed", () => {
        expect(Object.keys(boxScore.teamStats)).toEqual(["Houston Rockets", "Boston Celtics"]);
        expect(boxScore.teamStats["Boston Celtics"]).toEqual([
            { name: "fieldGoalsMade-fieldGoalsAttempted", label: "FG", value: "55-98" },
            { name: "fieldGoalPct", label: "Field Goal %", value: "56.1" },
            { name: "totalRebounds", label: "totalRebounds", value: "52" },
        ]);
    });

    it("flattens player tables per team, keeping category and athlete order", () => {
        expect(boxScore.playerStats["Houston Rockets"]).toEqual([
            {
                category: "starters",
                player: "Player Alpha",
                stats: [
                    { label: "MIN", value: "34" },
                    { label: "PTS", value: "22" },
                    { label: "REB", value: "7" },
                ],
            },
            {
                category: "starters",
                player: "Player Bravo",
                stats: [
                    { label: "MIN", value: "30" },
                    { label: "PTS", value: "15" },
                    { label: "REB", value: "11" },
                ],
            },
        ]);
        expect(boxScore.playerStats["Boston Celtics"].map((row) => row.player)).toEqual([
            "Player Charlie",
            "Player Delta",
        ]);
    });

    it("reads object-shaped stat cells", () => {
        expect(boxScore.playerStats["Boston Celtics"][1]).toEqual({
            category: "bench",
            player: "Player Delta",
            stats: [
                { label: "MIN", value: "12" },
                { label: "PTS", value: "N/A" },
            ],
        });
    });

    it("falls back to positional labels when a category has none", () => {
        const summary = EspnSummarySchema.parse(buildSummary("401"));
        summary.boxscore.players[0].statistics[0].labels = ["MIN"];
        const mapped = mapBoxScore("401", summary);
        expect(mapped.playerStats["Houston Rockets"][0].stats.map((cell) => cell.label)).toEqual([
            "MIN",
            "Stat 2",
            "Stat 3",
        ]);
    });

    it("returns empty stat maps when the boxscore is missing", () => {
        const { boxscore: _omitted, ...headerOnly } = buildSummary("401");
        const mapped = mapBoxScore("401", EspnSummarySchema.parse(headerOnly));
        expect(mapped.teamStats).toEqual({});
        expect(mapped.playerStats).toEqual({});
        expect(mapped.teams).toHaveLength(2);
    });

    it("throws GameNotFoundError without a header competition", () => {
        expect(() => mapBoxScore("404", EspnSummarySchema.parse({}))).toThrow(GameNotFoundError);
        expect(() => mapBoxScore("404", EspnSummarySchema.parse({ header: { competitions: [] } }))).toThrow(
            "Game 404 was not found."
        );
    });
});
