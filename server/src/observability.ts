/**
 * observability.ts
 *
 * OpenTelemetry SDK bootstrap for the gateway. Traces (including the
 * `dota.<endpoint>` spans opened by the client) are exported over OTLP HTTP.
 * Started only when `OTEL_ENABLED` is set; without it the `@opentelemetry/api`
 * calls in the client are no-ops.
 */

import {NodeSDK} from '@opentelemetry/sdk-node';
import {getNodeAutoInstrumentations} from '@opentelemetry/auto-instrumentations-node';
import {OTLPTraceExporter} from '@opentelemetry/exporter-trace-otlp-http';

let sdk: NodeSDK | null = null;

export function startTelemetry(tracesEndpoint: string) {
    if (sdk) return;
    sdk = new NodeSDK({
        serviceName: 'dota2-webapi',
        traceExporter: new OTLPTraceExporter({url: tracesEndpoint}),
        instrumentations: [getNodeAutoInstrumentations()],
    });
    sdk.start();
}

export async function stopTelemetry() {
    if (!sdk) return;
    const running = sdk;
    sdk = null;
    await running.shutdown();
}
