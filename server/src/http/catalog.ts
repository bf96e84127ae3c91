/**
 * catalog.ts
 *
 * Static game data routes:
 * - `GET /api/heroes?language=` and `GET /api/items?language=`
 * - `POST /api/admin/reference-data/refresh`: rewrite `heroes.json` and
 *   `items.json` in the configured reference data directory (gated by
 *   `ALLOW_ADMIN`)
 */

import type {FastifyInstance} from 'fastify';
import type {Dota2Client} from '../dota/client.js';
import {updateGameItems, updateHeroes} from '../dota/referenceData.js';
import {parseParams} from '../dota/validation.js';
import {catalogSchema} from '../schemas/catalog.js';
import {sendError} from './errors.js';

export interface CatalogRouteOptions {
    allowAdmin: boolean;
    referenceDataDir: string;
}

export async function registerCatalogRoutes(app: FastifyInstance, client: Dota2Client, options: CatalogRouteOptions) {
    app.get('/api/heroes', async (req, reply) => {
        try {
            const params = parseParams('getHeroes', catalogSchema, req.query);
            const res = await client.getHeroes(params);
            return reply.code(200).send({ok: true, data: res.toJSON()});
        } catch (err) {
            return sendError(app, reply, err);
        }
    });

    app.get('/api/items', async (req, reply) => {
        try {
            const params = parseParams('getGameItems', catalogSchema, req.query);
            const res = await client.getGameItems(params);
            return reply.code(200).send({ok: true, data: res.toJSON()});
        } catch (err) {
            return sendError(app, reply, err);
        }
    });

    app.post('/api/admin/reference-data/refresh', async (req, reply) => {
        if (!options.allowAdmin) {
            return reply.code(403).send({ok: false, error: 'NOT_ALLOWED'});
        }
        try {
            const {language} = parseParams('getHeroes', catalogSchema, req.query);
            const heroes = await updateHeroes(client, options.referenceDataDir, language);
            const items = await updateGameItems(client, options.referenceDataDir, language);
            app.log.info({heroes, items}, 'reference data refreshed');
            return reply.code(200).send({ok: true, data: {files: [heroes, items]}});
        } catch (err) {
            return sendError(app, reply, err);
        }
    });
}
