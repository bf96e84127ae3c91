/**
 * app.ts
 *
 * Builds the gateway's Fastify instance around a client: registers CORS and
 * every HTTP route. Kept separate from `index.ts` so tests can drive the app
 * with `inject` without listening on a port.
 */

import Fastify from 'fastify';
import type {FastifyInstance} from 'fastify';
import cors from '@fastify/cors';
import type {ServerConfig} from './config.js';
import type {Dota2Client} from './dota/client.js';
import {registerHttpRoutes} from './http/routes.js';

export interface AppOptions {
    logLevel?: ServerConfig['logLevel'];
    corsOrigin?: string;
    allowAdmin?: boolean;
    referenceDataDir?: string;
}

export async function buildApp(client: Dota2Client, options: AppOptions = {}): Promise<FastifyInstance> {
    const app = Fastify({
        logger: options.logLevel ? {level: options.logLevel} : false,
    });

    await app.register(cors, {
        origin: options.corsOrigin ?? '*',
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['content-type', 'traceparent', 'tracestate'],
        maxAge: 86400,
    });

    await registerHttpRoutes(app, client, {
        allowAdmin: options.allowAdmin ?? false,
        referenceDataDir: options.referenceDataDir ?? './data',
    });

    return app;
}
