import type { GameRecord } from "@/types/scores";

export const buildGame = (overrides: Partial<GameRecord> & Pick<GameRecord, "id">): GameRecord => ({
    homeTeam: "Home",
    awayTeam: "Away",
    homeScore: null,
    awayScore: null,
    status: "Scheduled",
    startTime: new Date("2024-01-16T00:00:00Z"),
    ...overrides,
});
