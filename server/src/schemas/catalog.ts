/**
 * catalog.ts
 *
 * Parameter schema for the static game data listings (heroes, items), which
 * only take an optional `language`.
 */

import {z} from "zod";
import {languageParam} from "./common.js";

export const catalogSchema = z
    .object({
        language: languageParam.optional(),
    })
    .strict();

export type CatalogParams = z.infer<typeof catalogSchema>;
