/**
 * client.ts
 *
 * Construction options of `Dota2Client`. The key itself is checked separately
 * so an empty key still reports `MissingCredentialError`.
 */

import {z} from "zod";
import {languageParam} from "./common.js";

export const clientOptionsSchema = z.object({
    apiKey: z.string(),
    baseUrl: z.string().url().optional(),
    language: languageParam.optional(),
    timeoutSeconds: z.number().positive().finite().optional(),
});
