/**
 * leagues.ts
 *
 * League and team routes:
 * - `GET /api/leagues`: league listing
 * - `GET /api/leagues/live?league_id=`: live league games
 * - `GET /api/leagues/:leagueid/prize-pool`: tournament prize pool
 * - `GET /api/teams?team_id=&start_at_team_id=&teams_requested=`: team info
 */

import type {FastifyInstance} from 'fastify';
import type {Dota2Client} from '../dota/client.js';
import {parseParams} from '../dota/validation.js';
import {
    leagueListingSchema,
    liveLeagueGamesSchema,
    teamInfoSchema,
    tournamentPrizePoolSchema,
} from '../schemas/leagues.js';
import {sendError} from './errors.js';

export async function registerLeagueRoutes(app: FastifyInstance, client: Dota2Client) {
    app.get('/api/leagues', async (req, reply) => {
        try {
            const params = parseParams('getLeagueListing', leagueListingSchema, req.query);
            const res = await client.getLeagueListing(params);
            return reply.code(200).send({ok: true, data: res.toJSON()});
        } catch (err) {
            return sendError(app, reply, err);
        }
    });

    app.get('/api/leagues/live', async (req, reply) => {
        try {
            const params = parseParams('getLiveLeagueGames', liveLeagueGamesSchema, req.query);
            const res = await client.getLiveLeagueGames(params);
            return reply.code(200).send({ok: true, data: res.toJSON()});
        } catch (err) {
            return sendError(app, reply, err);
        }
    });

    app.get<{Params: {leagueid: string}}>('/api/leagues/:leagueid/prize-pool', async (req, reply) => {
        try {
            const params = parseParams('getTournamentPrizePool', tournamentPrizePoolSchema, {
                leagueid: req.params.leagueid,
            });
            const res = await client.getTournamentPrizePool(params);
            return reply.code(200).send({ok: true, data: res.toJSON()});
        } catch (err) {
            return sendError(app, reply, err);
        }
    });

    app.get('/api/teams', async (req, reply) => {
        try {
            const params = parseParams('getTeamInfoByTeamId', teamInfoSchema, req.query);
            const res = await client.getTeamInfoByTeamId(params);
            return reply.code(200).send({ok: true, data: res.toJSON()});
        } catch (err) {
            return sendError(app, reply, err);
        }
    });
}
