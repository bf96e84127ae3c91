/**
 * gateway.ts
 *
 * Envelope shapes returned by the HTTP gateway. Every route answers with
 * either `GatewayOk` or `GatewayError`; the `error` codes are stable and can
 * be branched on by callers.
 */

import type {JsonObject} from './json.js';

export type GatewayErrorCode =
    | 'VALIDATION_ERROR'
    | 'UPSTREAM_ERROR'
    | 'UPSTREAM_UNAVAILABLE'
    | 'NOT_ALLOWED'
    | 'INTERNAL_ERROR';

export interface GatewayOk {
    ok: true;
    data: JsonObject;
}

export interface GatewayIssue {
    path: (string | number)[];
    message: string;
}

export interface GatewayError {
    ok: false;
    error: GatewayErrorCode;
    msg?: string;
    issues?: GatewayIssue[];
    upstreamStatus?: number;
}

export type GatewayReply = GatewayOk | GatewayError;
