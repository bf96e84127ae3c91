/**
 * json.ts
 *
 * JSON value shapes shared by the client library and the HTTP gateway. The
 * upstream service answers with arbitrary nested JSON, so payloads are typed
 * as this union rather than as per-endpoint interfaces.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

/** Name of the JSON type of a value, as used in error messages. */
export type JsonTypeName = 'string' | 'number' | 'boolean' | 'null' | 'array' | 'object';

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function jsonTypeOf(value: JsonValue): JsonTypeName {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    switch (typeof value) {
        case 'string':
            return 'string';
        case 'number':
            return 'number';
        case 'boolean':
            return 'boolean';
        default:
            return 'object';
    }
}
