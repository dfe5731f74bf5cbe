/**
 * ESPN site API payload schemas (scoreboard + game summary).
 *
 * Only the fields the mappers read are declared; zod strips the rest. A payload
 * that fails these schemas is reported as a ParseError by the client.
 */

import { z } from "zod";

const EspnTeamRefSchema = z.object({
    id: z.string().optional(),
    displayName: z.string(),
    abbreviation: z.string().optional(),
});

/** Scores arrive as "102" on the scoreboard and sometimes as objects elsewhere. */
const EspnScoreSchema = z.union([
    z.string(),
    z.number(),
    z.object({ value: z.number().optional(), displayValue: z.string().optional() }),
]);

const EspnCompetitorSchema = z.object({
    homeAway: z.string(),
    score: EspnScoreSchema.optional(),
    team: EspnTeamRefSchema,
});

const EspnCompetitionSchema = z.object({
    competitors: z.array(EspnCompetitorSchema).default([]),
});

export const EspnEventSchema = z.object({
    id: z.string(),
    date: z.string(),
    status: z.object({
        type: z.object({
            state: z.string(),
            shortDetail: z.string().optional(),
        }),
    }),
    competitions: z.array(EspnCompetitionSchema).default([]),
});

export const EspnScoreboardSchema = z.object({
    events: z.array(EspnEventSchema),
});

const EspnTeamStatisticSchema = z.object({
    name: z.string(),
    label: z.string().optional(),
    displayValue: z.string(),
});

const EspnAthleteStatSchema = z.union([
    z.string(),
    z.object({ name: z.string().optional(), displayValue: z.string().optional() }),
]);

const EspnAthleteLineSchema = z.object({
    athlete: z.object({ displayName: z.string() }),
    stats: z.array(EspnAthleteStatSchema).default([]),
});

const EspnPlayerStatCategorySchema = z.object({
    name: z.string().optional(),
    labels: z.array(z.string()).optional(),
    athletes: z.array(EspnAthleteLineSchema).default([]),
});

export const EspnSummarySchema = z.object({
    header: z
        .object({
            id: z.string().optional(),
            competitions: z.array(EspnCompetitionSchema).default([]),
        })
        .optional(),
    boxscore: z
        .object({
            teams: z
                .array(
                    z.object({
                        team: EspnTeamRefSchema,
                        statistics: z.array(EspnTeamStatisticSchema).default([]),
                    })
                )
                .default([]),
            players: z
                .array(
                    z.object({
                        team: EspnTeamRefSchema,
                        statistics: z.array(EspnPlayerStatCategorySchema).default([]),
                    })
                )
                .default([]),
        })
        .default({}),
});

export type EspnScore = z.infer<typeof EspnScoreSchema>;
export type EspnCompetitor = z.infer<typeof EspnCompetitorSchema>;
export type EspnEvent = z.infer<typeof EspnEventSchema>;
export type EspnScoreboardResponse = z.infer<typeof EspnScoreboardSchema>;
export type EspnAthleteStat = z.infer<typeof EspnAthleteStatSchema>;
export type EspnPlayerStatCategory = z.infer<typeof EspnPlayerStatCategorySchema>;
export type EspnSummaryResponse = z.infer<typeof EspnSummarySchema>;
