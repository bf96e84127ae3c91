/**
 * response.ts
 *
 * `DotaResponse` presents a decoded JSON body through one explicit accessor
 * interface. `get` returns the raw JSON value of a field and the typed
 * getters return that same value narrowed to one JSON type. Lookups of absent
 * fields always throw `MissingFieldError`; `has` is the only non-throwing
 * probe. The wrapped data is a deep-frozen copy, so nothing reachable from a
 * response can be mutated.
 */

import {isJsonObject, jsonTypeOf} from '../../../shared/protocol/types/json.js';
import type {JsonObject, JsonTypeName, JsonValue} from '../../../shared/protocol/types/json.js';
import {FieldTypeError, MissingFieldError} from './errors.js';

function deepFreeze(value: JsonValue): void {
    if (Array.isArray(value)) {
        for (const child of value) deepFreeze(child);
        Object.freeze(value);
    } else if (isJsonObject(value)) {
        for (const key of Object.keys(value)) deepFreeze(value[key]);
        Object.freeze(value);
    }
}

export interface DotaResponseOptions {
    /** Endpoint the payload came from, reported by lookup errors. */
    endpoint?: string;
    /** Dotted path of this object inside the top-level payload. */
    path?: string;
}

export class DotaResponse {
    readonly endpoint: string;
    readonly path: string;
    private readonly data: JsonObject;

    constructor(data: JsonObject, options: DotaResponseOptions = {}) {
        this.endpoint = options.endpoint ?? 'response';
        this.path = options.path ?? '';
        this.data = structuredClone(data);
        deepFreeze(this.data);
    }

    private pathOf(field: string): string {
        return this.path ? `${this.path}.${field}` : field;
    }

    has(field: string): boolean {
        return Object.hasOwn(this.data, field);
    }

    keys(): string[] {
        return Object.keys(this.data);
    }

    get(field: string): JsonValue {
        if (!Object.hasOwn(this.data, field)) throw new MissingFieldError(this.pathOf(field), this.endpoint);
        return this.data[field];
    }

    /**
     * Read a nested value by dotted path, e.g. `result.players.0.hero_id`.
     * Numeric segments index into arrays.
     */
    at(path: string): JsonValue {
        let current: JsonValue = this.data;
        const walked: string[] = [];
        for (const segment of path.split('.')) {
            walked.push(segment);
            if (Array.isArray(current)) {
                const index = /^\d+$/.test(segment) ? Number(segment) : -1;
                if (index < 0 || index >= current.length) {
                    throw new MissingFieldError(this.pathOf(walked.join('.')), this.endpoint);
                }
                current = current[index];
            } else if (isJsonObject(current) && Object.hasOwn(current, segment)) {
                current = current[segment];
            } else {
                throw new MissingFieldError(this.pathOf(walked.join('.')), this.endpoint);
            }
        }
        return current;
    }

    private mismatch(field: string, expected: JsonTypeName, value: JsonValue): FieldTypeError {
        return new FieldTypeError(this.pathOf(field), expected, jsonTypeOf(value));
    }

    getString(field: string): string {
        const value = this.get(field);
        if (typeof value !== 'string') throw this.mismatch(field, 'string', value);
        return value;
    }

    getNumber(field: string): number {
        const value = this.get(field);
        if (typeof value !== 'number') throw this.mismatch(field, 'number', value);
        return value;
    }

    getBoolean(field: string): boolean {
        const value = this.get(field);
        if (typeof value !== 'boolean') throw this.mismatch(field, 'boolean', value);
        return value;
    }

    getArray(field: string): readonly JsonValue[] {
        const value = this.get(field);
        if (!Array.isArray(value)) throw this.mismatch(field, 'array', value);
        return value;
    }

    /** Wrap a nested object field; lookups on the result report the full path. */
    getObject(field: string): DotaResponse {
        const value = this.get(field);
        if (!isJsonObject(value)) throw this.mismatch(field, 'object', value);
        return new DotaResponse(value, {endpoint: this.endpoint, path: this.pathOf(field)});
    }

    toJSON(): JsonObject {
        return this.data;
    }
}
