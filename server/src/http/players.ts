/**
 * players.ts
 *
 * Player routes:
 * - `GET /api/players?steam_ids=a,b`: Steam profile summaries
 * - `GET /api/players/:steamId/matches`: match history of one player; the
 *   Steam id (32- or 64-bit) is converted to the 32-bit account id the
 *   history endpoint filters on, remaining query parameters pass through
 */

import {z} from 'zod';
import type {FastifyInstance} from 'fastify';
import type {Dota2Client} from '../dota/client.js';
import {toAccountId32} from '../dota/steamId.js';
import {parseParams} from '../dota/validation.js';
import {steamIdParam} from '../schemas/common.js';
import {matchHistorySchema} from '../schemas/matches.js';
import {playerSummariesSchema} from '../schemas/players.js';
import {sendError} from './errors.js';

const steamIdPathSchema = z.object({steamId: steamIdParam});

export async function registerPlayerRoutes(app: FastifyInstance, client: Dota2Client) {
    app.get('/api/players', async (req, reply) => {
        try {
            const params = parseParams('getPlayerSummaries', playerSummariesSchema, req.query);
            const res = await client.getPlayerSummaries(params);
            return reply.code(200).send({ok: true, data: res.toJSON()});
        } catch (err) {
            return sendError(app, reply, err);
        }
    });

    app.get<{Params: {steamId: string}; Querystring: Record<string, string>}>(
        '/api/players/:steamId/matches',
        async (req, reply) => {
            try {
                const {steamId} = parseParams('getMatchHistory', steamIdPathSchema, req.params);
                const params = parseParams('getMatchHistory', matchHistorySchema, {
                    ...req.query,
                    account_id: toAccountId32(steamId),
                });
                const res = await client.getMatchHistory(params);
                return reply.code(200).send({ok: true, data: res.toJSON()});
            } catch (err) {
                return sendError(app, reply, err);
            }
        },
    );
}
