/**
 * validation.ts
 *
 * Runs a zod schema over call parameters and converts a failure into
 * `InvalidParamsError`, so no request is built from invalid input.
 */

import type {z} from 'zod';
import {InvalidParamsError} from './errors.js';

export function parseParams<S extends z.ZodTypeAny>(target: string, schema: S, raw: unknown): z.output<S> {
    const result = schema.safeParse(raw);
    if (!result.success) throw new InvalidParamsError(target, result.error.issues);
    return result.data;
}
