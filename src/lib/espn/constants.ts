import { UnsupportedLeagueError } from "@/lib/errors";
import type { GameStatus, LeagueSpec } from "@/types/scores";

export const SUPPORTED_LEAGUES: readonly LeagueSpec[] = Object.freeze([
    { key: "nfl", displayName: "NFL", apiSlug: "football/nfl" },
    { key: "nba", displayName: "NBA", apiSlug: "basketball/nba" },
    { key: "mlb", displayName: "MLB", apiSlug: "baseball/mlb" },
    { key: "nhl", displayName: "NHL", apiSlug: "hockey/nhl" },
    { key: "mls", displayName: "MLS", apiSlug: "soccer/usa.1" },
    { key: "premier-league", displayName: "Premier League", apiSlug: "soccer/eng.1" },
    { key: "la-liga", displayName: "La Liga", apiSlug: "soccer/esp.1" },
    { key: "bundesliga", displayName: "Bundesliga", apiSlug: "soccer/ger.1" },
    { key: "serie-a", displayName: "Serie A", apiSlug: "soccer/ita.1" },
    { key: "ligue-1", displayName: "Ligue 1", apiSlug: "soccer/fra.1" },
    { key: "uefa-champions", displayName: "UEFA Champions League", apiSlug: "soccer/uefa.champions" },
    { key: "uefa-europa", displayName: "UEFA Europa League", apiSlug: "soccer/uefa.europa" },
    { key: "ncaa-football", displayName: "NCAA Football", apiSlug: "football/college-football" },
    { key: "ncaa-mens-basketball", displayName: "NCAA Men's Basketball", apiSlug: "basketball/mens-college-basketball" },
].map((league) => Object.freeze(league)));

export const DEFAULT_LEAGUE_KEY = "nba";

const LEAGUES_BY_NAME = new Map<string, LeagueSpec>();
for (const league of SUPPORTED_LEAGUES) {
    LEAGUES_BY_NAME.set(league.key, league);
    LEAGUES_BY_NAME.set(league.displayName.toLowerCase(), league);
}

/**
 * Looks a league up by selector key or display name, ignoring case.
 * @throws UnsupportedLeagueError
 */
export function resolveLeague(name: string): LeagueSpec {
    const league = LEAGUES_BY_NAME.get(name.trim().toLowerCase());
    if (!league) throw new UnsupportedLeagueError(name);
    return league;
}

/**
 * ESPN `status.type.state` → display status. Keys outside this table are a
 * parse failure, never a guess.
 */
export const ESPN_STATE_TO_STATUS: Readonly<Record<string, GameStatus>> = Object.freeze({
    pre: "Scheduled",
    in: "Live",
    post: "Final",
});

export const ESPN_REQUEST_HEADERS: Readonly<Record<string, string>> = Object.freeze({
    "User-Agent":
        "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
    Accept: "application/json",
});
