/**
 * health.ts
 *
 * Service routes of the gateway:
 * - `GET /api/health`: process uptime and the upstream base URL in use
 * - `GET /metrics`: Prometheus scrape of the upstream call metrics and the
 *   default process metrics
 */

import type {FastifyInstance} from 'fastify';
import type {Dota2Client} from '../dota/client.js';
import {register} from '../observability/metrics.js';

export async function registerHealthRoutes(app: FastifyInstance, client: Dota2Client) {
    app.get('/api/health', async () => {
        return {ok: true, uptimeSeconds: Math.round(process.uptime()), upstream: client.baseUrl};
    });

    app.get('/metrics', async (_req, reply) => {
        const body = await register.metrics();
        return reply.type(register.contentType).send(body);
    });
}
