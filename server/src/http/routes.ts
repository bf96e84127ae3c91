/**
 * routes.ts
 *
 * Central HTTP route registration. This file composes all individual route
 * modules so the application factory can simply call
 * `registerHttpRoutes(app, client, options)` to wire the HTTP surface.
 */

import type {FastifyInstance} from 'fastify';
import type {Dota2Client} from '../dota/client.js';
import {registerCatalogRoutes} from './catalog.js';
import type {CatalogRouteOptions} from './catalog.js';
import {registerHealthRoutes} from './health.js';
import {registerLeagueRoutes} from './leagues.js';
import {registerMatchRoutes} from './matches.js';
import {registerPlayerRoutes} from './players.js';

export async function registerHttpRoutes(app: FastifyInstance, client: Dota2Client, options: CatalogRouteOptions) {
    await registerHealthRoutes(app, client);
    await registerMatchRoutes(app, client);
    await registerPlayerRoutes(app, client);
    await registerLeagueRoutes(app, client);
    await registerCatalogRoutes(app, client, options);
}
