/**
 * index.ts
 *
 * Gateway entrypoint. Responsibilities:
 * - Read configuration from the environment once
 * - Start OpenTelemetry when enabled
 * - Build the client and the Fastify app, then listen on the configured port
 * - Provide graceful shutdown handlers for SIGINT / SIGTERM
 */

import {buildApp} from './app.js';
import {loadConfig} from './config.js';
import type {AppConfig} from './config.js';
import {Dota2Client} from './dota/client.js';
import {error, info} from './logging.js';
import {startTelemetry, stopTelemetry} from './observability.js';

function readConfig(): AppConfig {
    try {
        return loadConfig(process.env);
    } catch (e) {
        error({err: e instanceof Error ? e.message : String(e)}, 'invalid configuration');
        process.exit(1);
    }
}

const config = readConfig();

if (config.server.otelEnabled) {
    startTelemetry(config.server.otelTracesEndpoint);
    info({endpoint: config.server.otelTracesEndpoint}, 'telemetry started');
}

const client = new Dota2Client(config.client);
const app = await buildApp(client, {
    logLevel: config.server.logLevel,
    corsOrigin: config.server.corsOrigin,
    allowAdmin: config.server.allowAdmin,
    referenceDataDir: config.server.referenceDataDir,
});

// Graceful shutdown: stop telemetry and close Fastify
const shutdown = async () => {
    app.log.info('shutting down...');
    await app.close().catch((e) => app.log.error(e));
    await stopTelemetry().catch((e) => app.log.error(e));
    process.exit(0);
};
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

app.listen({port: config.server.port, host: '0.0.0.0'}).catch((e) => {
    app.log.error(e);
    process.exit(1);
});
