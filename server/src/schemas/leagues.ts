/**
 * leagues.ts
 *
 * Parameter schemas for league listing, live league games, tournament prize
 * pools and team info.
 */

import {z} from "zod";
import {countParam, idParam} from "./common.js";

export const leagueListingSchema = z.object({}).strict();

export const liveLeagueGamesSchema = z
    .object({
        league_id: idParam.optional(),
    })
    .strict();

export const tournamentPrizePoolSchema = z
    .object({
        leagueid: idParam.optional(),
    })
    .strict();

export const teamInfoSchema = z
    .object({
        team_id: idParam.optional(),
        start_at_team_id: idParam.optional(),
        teams_requested: countParam.optional(),
    })
    .strict();

export type LeagueListingParams = z.infer<typeof leagueListingSchema>;
export type LiveLeagueGamesParams = z.infer<typeof liveLeagueGamesSchema>;
export type TournamentPrizePoolParams = z.infer<typeof tournamentPrizePoolSchema>;
export type TeamInfoParams = z.infer<typeof teamInfoSchema>;
