/**
 * common.ts
 *
 * Zod building blocks shared by the endpoint parameter schemas. Values may
 * arrive typed (library callers) or as query-string text (gateway routes), so
 * numeric and boolean parameters accept their decimal/flag spellings too.
 */

import {z} from "zod";
import {STEAM_ID_64_MAX} from "../dota/steamId.js";

const digits = /^\d+$/;

export const idParam = z.preprocess(
    (value) => (typeof value === "string" && digits.test(value.trim()) ? Number(value) : value),
    z
        .number({invalid_type_error: "Expected a non-negative integer."})
        .int()
        .nonnegative()
        .max(Number.MAX_SAFE_INTEGER),
);

export const countParam = z.preprocess(
    (value) => (typeof value === "string" && digits.test(value.trim()) ? Number(value) : value),
    z.number({invalid_type_error: "Expected a positive integer."}).int().positive().max(Number.MAX_SAFE_INTEGER),
);

export const flagParam = z.preprocess((value) => {
    if (value === "true" || value === "1") return true;
    if (value === "false" || value === "0") return false;
    return value;
}, z.boolean({invalid_type_error: "Expected true/false."}));

export const languageParam = z.string().trim().min(1).max(32);

export const steamIdParam = z.union([
    z.bigint().nonnegative().max(STEAM_ID_64_MAX, {message: "Steam ids must fit in 64 bits."}),
    z
        .string()
        .trim()
        .regex(/^\d{1,20}$/, {message: "Steam ids are decimal digits."})
        .refine((value) => !digits.test(value) || BigInt(value) <= STEAM_ID_64_MAX, {
            message: "Steam ids must fit in 64 bits.",
        }),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
]);

export const steamIdsParam = z.preprocess(
    (value) =>
        typeof value === "string"
            ? value.split(",").map((part) => part.trim()).filter((part) => part.length > 0)
            : value,
    z.array(steamIdParam).min(1, {message: "At least one Steam id is required."}),
);
