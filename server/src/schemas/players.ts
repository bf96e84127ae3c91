/**
 * players.ts
 *
 * Parameter schema for player summaries. `steam_ids` accepts 32-bit account
 * ids and 64-bit Steam ids, as a list or as comma-separated text.
 */

import {z} from "zod";
import {steamIdsParam} from "./common.js";

export const playerSummariesSchema = z
    .object({
        steam_ids: steamIdsParam,
    })
    .strict();

export type PlayerSummariesParams = z.infer<typeof playerSummariesSchema>;
