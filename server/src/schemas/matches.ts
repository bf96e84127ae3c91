/**
 * matches.ts
 *
 * Parameter schemas for the match endpoints: match history (all filters
 * optional) and match details (`match_id` required).
 */

import {z} from "zod";
import {countParam, flagParam, idParam} from "./common.js";

export const matchHistorySchema = z
    .object({
        account_id: idParam.optional(),
        hero_id: idParam.optional(),
        game_mode: idParam.optional(),
        league_id: idParam.optional(),
        skill: z.preprocess(
            (value) => (typeof value === "string" && /^[0-3]$/.test(value) ? Number(value) : value),
            z.number().int().min(0).max(3),
        ).optional(),
        date_min: idParam.optional(),
        date_max: idParam.optional(),
        matches_requested: countParam.optional(),
        min_players: idParam.optional(),
        start_at_match_id: idParam.optional(),
        tournament_games_only: flagParam.optional(),
    })
    .strict();

export const matchDetailsSchema = z
    .object({
        match_id: idParam,
    })
    .strict();

export type MatchHistoryParams = z.infer<typeof matchHistorySchema>;
export type MatchDetailsParams = z.infer<typeof matchDetailsSchema>;
