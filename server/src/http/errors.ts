/**
 * errors.ts
 *
 * Maps client failures to gateway replies:
 * - `InvalidParamsError` → 400 `VALIDATION_ERROR` with the zod issues
 * - `ApiError` → 502 `UPSTREAM_ERROR` with the upstream status and message
 * - `TransportError` → 504 `UPSTREAM_UNAVAILABLE`
 * - anything else → 500 `INTERNAL_ERROR`
 */

import type {FastifyInstance, FastifyReply} from 'fastify';
import type {GatewayError} from '../../../shared/protocol/types/gateway.js';
import {ApiError, InvalidParamsError, TransportError} from '../dota/errors.js';

export function sendError(app: FastifyInstance, reply: FastifyReply, err: unknown) {
    if (err instanceof InvalidParamsError) {
        const body: GatewayError = {
            ok: false,
            error: 'VALIDATION_ERROR',
            issues: err.issues.map((issue) => ({path: issue.path, message: issue.message})),
        };
        return reply.code(400).send(body);
    }
    if (err instanceof ApiError) {
        app.log.warn({endpoint: err.endpoint, status: err.status}, 'upstream error');
        const body: GatewayError = {
            ok: false,
            error: 'UPSTREAM_ERROR',
            msg: err.upstreamMessage,
            upstreamStatus: err.status,
        };
        return reply.code(502).send(body);
    }
    if (err instanceof TransportError) {
        app.log.error({endpoint: err.endpoint, err: err.message}, 'upstream unavailable');
        const body: GatewayError = {ok: false, error: 'UPSTREAM_UNAVAILABLE', msg: err.message};
        return reply.code(504).send(body);
    }
    app.log.error({err}, 'unhandled gateway error');
    const body: GatewayError = {ok: false, error: 'INTERNAL_ERROR'};
    return reply.code(500).send(body);
}
