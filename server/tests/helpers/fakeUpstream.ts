/**
 * fakeUpstream.ts
 *
 * In-process stand-in for the upstream web API. Routes are keyed by the tail
 * of the endpoint path (e.g. `GetMatchDetails/v001/`); every request URL is
 * recorded so tests can assert on what was (or was not) sent.
 */

import type {Executor} from '../../src/dota/client.js';
import type {ClientLogger} from '../../src/logging.js';

export interface FakeReply {
    status?: number;
    statusText?: string;
    body: unknown;
}

export interface FakeUpstream {
    executor: Executor;
    requests: URL[];
}

export function fakeUpstream(routes: Record<string, FakeReply | Error>): FakeUpstream {
    const requests: URL[] = [];
    const executor: Executor = async (url) => {
        const parsed = new URL(url);
        requests.push(parsed);
        const route = Object.keys(routes).find((path) => parsed.pathname.endsWith(path));
        if (!route) return new Response('not found', {status: 404, statusText: 'Not Found'});
        const reply = routes[route];
        if (reply instanceof Error) throw reply;
        const body = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);
        return new Response(body, {
            status: reply.status ?? 200,
            statusText: reply.statusText ?? '',
            headers: {'content-type': 'application/json'},
        });
    };
    return {executor, requests};
}

export const silentLogger: ClientLogger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};
