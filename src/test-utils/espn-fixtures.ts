/**
 * Builders for ESPN site API payloads used across unit tests.
 * Shapes follow the live scoreboard/summary endpoints, trimmed to what the
 * mappers read.
 */

export interface EventFixture {
    id: string;
    home: string;
    away: string;
    homeScore?: string;
    awayScore?: string;
    state?: string;
    date?: string;
}

export const buildEvent = ({
    id,
    home,
    away,
    homeScore = "0",
    awayScore = "0",
    state = "post",
    date = "2024-01-16T00:30Z",
}: EventFixture) => ({
    id,
    uid: `s:40~l:46~e:${id}`,
    name: `${away} at ${home}`,
    date,
    status: { type: { state, shortDetail: state === "post" ? "Final" : "1/15 - 7:30 PM EST" } },
    competitions: [
        {
            id,
            competitors: [
                { id: `${id}-h`, homeAway: "home", score: homeScore, team: { id: "1", displayName: home } },
                { id: `${id}-a`, homeAway: "away", score: awayScore, team: { id: "2", displayName: away } },
            ],
        },
    ],
});

/** Eight games on one night: 5 final, 2 live, 1 scheduled. */
export const NBA_NIGHT: EventFixture[] = [
    { id: "401", home: "Boston Celtics", away: "Houston Rockets", homeScore: "145", awayScore: "113" },
    { id: "402", home: "Miami Heat", away: "Orlando Magic", homeScore: "99", awayScore: "104" },
    { id: "403", home: "Denver Nuggets", away: "Utah Jazz", homeScore: "118", awayScore: "118", state: "in" },
    { id: "404", home: "Chicago Bulls", away: "Detroit Pistons", homeScore: "132", awayScore: "123" },
    { id: "405", home: "Phoenix Suns", away: "Atlanta Hawks", homeScore: "115", awayScore: "127" },
    { id: "406", home: "Portland Trail Blazers", away: "Memphis Grizzlies", homeScore: "88", awayScore: "90", state: "in" },
    { id: "407", home: "Los Angeles Lakers", away: "Oklahoma City Thunder", homeScore: "105", awayScore: "129" },
    { id: "408", home: "Golden State Warriors", away: "Sacramento Kings", state: "pre", date: "2024-01-16T03:00Z" },
];

export const buildScoreboard = (events: EventFixture[]) => ({
    leagues: [{ id: "46", abbreviation: "NBA" }],
    events: events.map(buildEvent),
});

export const buildSummary = (gameId = "401") => ({
    header: {
        id: gameId,
        competitions: [
            {
                id: gameId,
                competitors: [
                    { homeAway: "home", score: "145", team: { displayName: "Boston Celtics" } },
                    { homeAway: "away", score: "113", team: { displayName: "Houston Rockets" } },
                ],
            },
        ],
    },
    boxscore: {
        teams: [
            {
                team: { displayName: "Houston Rockets" },
                statistics: [
                    { name: "fieldGoalsMade-fieldGoalsAttempted", label: "FG", displayValue: "41-93" },
                    { name: "fieldGoalPct", label: "Field Goal %", displayValue: "44.1" },
                    { name: "totalRebounds", displayValue: "40" },
                ],
            },
            {
                team: { displayName: "Boston Celtics" },
                statistics: [
                    { name: "fieldGoalsMade-fieldGoalsAttempted", label: "FG", displayValue: "55-98" },
                    { name: "fieldGoalPct", label: "Field Goal %", displayValue: "56.1" },
                    { name: "totalRebounds", displayValue: "52" },
                ],
            },
        ],
        players: [
            {
                team: { displayName: "Houston Rockets" },
                statistics: [
                    {
                        name: "starters",
                        labels: ["MIN", "PTS", "REB"],
                        athletes: [
                            { athlete: { displayName: "Player Alpha" }, stats: ["34", "22", "7"] },
                            { athlete: { displayName: "Player Bravo" }, stats: ["30", "15", "11"] },
                        ],
                    },
                ],
            },
            {
                team: { displayName: "Boston Celtics" },
                statistics: [
                    {
                        name: "starters",
                        labels: ["MIN", "PTS", "REB"],
                        athletes: [{ athlete: { displayName: "Player Charlie" }, stats: ["31", "30", "8"] }],
                    },
                    {
                        name: "bench",
                        athletes: [
                            {
                                athlete: { displayName: "Player Delta" },
                                stats: [{ name: "MIN", displayValue: "12" }, { name: "PTS" }],
                            },
                        ],
                    },
                ],
            },
        ],
    },
});

export const jsonResponse = (body: unknown, status = 200, statusText = "OK") => ({
    ok: status >= 200 && status < 300,
    status,
    statusText,
    text: () => Promise.resolve(typeof body === "string" ? body : JSON.stringify(body)),
});
