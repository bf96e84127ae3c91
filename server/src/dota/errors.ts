/**
 * errors.ts
 *
 * Failure taxonomy of the client. Every error raised by the library derives
 * from `DotaApiError` and carries a stable `code` so callers (and the HTTP
 * gateway) can branch on the failure kind. URLs attached to errors are always
 * the redacted form; the API key never appears in a message.
 */

import type {ZodIssue} from 'zod';
import type {JsonTypeName} from '../../../shared/protocol/types/json.js';

export type DotaErrorCode =
    | 'MISSING_CREDENTIAL'
    | 'INVALID_PARAMS'
    | 'TRANSPORT_ERROR'
    | 'API_ERROR'
    | 'MISSING_FIELD'
    | 'FIELD_TYPE';

export class DotaApiError extends Error {
    readonly code: DotaErrorCode;

    constructor(code: DotaErrorCode, message: string, options?: ErrorOptions) {
        super(message, options);
        this.code = code;
        this.name = new.target.name;
    }
}

export class MissingCredentialError extends DotaApiError {
    constructor() {
        super('MISSING_CREDENTIAL', 'No API key given: pass `apiKey` or set the D2_API_KEY environment variable');
    }
}

/**
 * Raised before any request is sent when the parameters of a call (or the
 * configuration) do not validate. `target` is the endpoint name or `config`.
 */
export class InvalidParamsError extends DotaApiError {
    readonly target: string;
    readonly issues: ZodIssue[];

    constructor(target: string, issues: ZodIssue[]) {
        const summary = issues
            .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('; ');
        super('INVALID_PARAMS', `Invalid parameters for ${target}: ${summary}`);
        this.target = target;
        this.issues = issues;
    }
}

export class TransportError extends DotaApiError {
    readonly endpoint: string;
    readonly url: string;

    constructor(endpoint: string, url: string, reason: string, options?: ErrorOptions) {
        super('TRANSPORT_ERROR', `${endpoint} request failed: ${reason} (${url})`, options);
        this.endpoint = endpoint;
        this.url = url;
    }
}

export class ApiError extends DotaApiError {
    readonly endpoint: string;
    readonly url: string;
    readonly status: number;
    readonly upstreamMessage: string;

    constructor(endpoint: string, url: string, status: number, upstreamMessage: string) {
        super('API_ERROR', `${endpoint} failed with status ${status}: ${upstreamMessage} (${url})`);
        this.endpoint = endpoint;
        this.url = url;
        this.status = status;
        this.upstreamMessage = upstreamMessage;
    }
}

export class MissingFieldError extends DotaApiError {
    readonly path: string;
    readonly endpoint: string;

    constructor(path: string, endpoint: string) {
        super('MISSING_FIELD', `Field "${path}" is not present in the ${endpoint} response`);
        this.path = path;
        this.endpoint = endpoint;
    }
}

export class FieldTypeError extends DotaApiError {
    readonly path: string;
    readonly expected: JsonTypeName;
    readonly actual: JsonTypeName;

    constructor(path: string, expected: JsonTypeName, actual: JsonTypeName) {
        super('FIELD_TYPE', `Field "${path}" is ${actual}, expected ${expected}`);
        this.path = path;
        this.expected = expected;
        this.actual = actual;
    }
}
