/**
 * metrics.ts
 *
 * Prometheus metrics registry and the upstream-call metrics recorded by the
 * client.
 * - `register` is the central `prom-client` Registry served by `/metrics`.
 * - Default process metrics are collected automatically.
 */

import client from 'prom-client';

export const register = new client.Registry();
client.collectDefaultMetrics({register});

export type UpstreamOutcome = 'ok' | 'api_error' | 'transport_error';

// Counter: upstream calls by endpoint and outcome
export const upstreamRequestsCounter = new client.Counter({
    name: 'dota_upstream_requests_total',
    help: 'Total number of requests sent to the Dota 2 web API',
    labelNames: ['endpoint', 'outcome'] as const,
    registers: [register],
});

// Histogram: upstream round-trip time (seconds)
export const upstreamDurationHistogram = new client.Histogram({
    name: 'dota_upstream_request_duration_seconds',
    help: 'Distribution of Dota 2 web API round-trip times in seconds',
    labelNames: ['endpoint'] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [register],
});

export function recordUpstreamCall(endpoint: string, outcome: UpstreamOutcome, seconds: number) {
    upstreamRequestsCounter.inc({endpoint, outcome});
    upstreamDurationHistogram.observe({endpoint}, seconds);
}
