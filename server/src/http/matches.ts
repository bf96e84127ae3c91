/**
 * matches.ts
 *
 * Match routes:
 * - `GET /api/matches`: match history; query parameters are the upstream
 *   filters (`account_id`, `hero_id`, `skill`, ...)
 * - `GET /api/matches/:matchId`: details of one match
 */

import type {FastifyInstance} from 'fastify';
import type {Dota2Client} from '../dota/client.js';
import {parseParams} from '../dota/validation.js';
import {matchDetailsSchema, matchHistorySchema} from '../schemas/matches.js';
import {sendError} from './errors.js';

export async function registerMatchRoutes(app: FastifyInstance, client: Dota2Client) {
    app.get('/api/matches', async (req, reply) => {
        try {
            const params = parseParams('getMatchHistory', matchHistorySchema, req.query);
            const res = await client.getMatchHistory(params);
            return reply.code(200).send({ok: true, data: res.toJSON()});
        } catch (err) {
            return sendError(app, reply, err);
        }
    });

    app.get<{Params: {matchId: string}}>('/api/matches/:matchId', async (req, reply) => {
        try {
            const params = parseParams('getMatchDetails', matchDetailsSchema, {match_id: req.params.matchId});
            const res = await client.getMatchDetails(params);
            return reply.code(200).send({ok: true, data: res.toJSON()});
        } catch (err) {
            return sendError(app, reply, err);
        }
    });
}
