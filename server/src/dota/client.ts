/**
 * client.ts
 *
 * `Dota2Client` exposes one method per supported Dota 2 web API endpoint.
 * Each call:
 * - validates its parameters (nothing is sent when validation fails)
 * - builds the URL from the endpoint table, injecting key/language/format
 * - issues exactly one GET through the configured executor (no retries)
 * - maps transport failures, HTTP errors and upstream error payloads to the
 *   typed errors in `errors.ts`
 * - wraps the decoded JSON object in a `DotaResponse`
 *
 * The client holds no mutable state after construction; independent calls
 * cannot affect one another.
 */

import {SpanStatusCode, trace} from '@opentelemetry/api';
import {isJsonObject} from '../../../shared/protocol/types/json.js';
import type {JsonObject} from '../../../shared/protocol/types/json.js';
import {consoleLogger} from '../logging.js';
import type {ClientLogger} from '../logging.js';
import {recordUpstreamCall} from '../observability/metrics.js';
import {catalogSchema} from '../schemas/catalog.js';
import {clientOptionsSchema} from '../schemas/client.js';
import type {CatalogParams} from '../schemas/catalog.js';
import {
    leagueListingSchema,
    liveLeagueGamesSchema,
    teamInfoSchema,
    tournamentPrizePoolSchema,
} from '../schemas/leagues.js';
import type {
    LeagueListingParams,
    LiveLeagueGamesParams,
    TeamInfoParams,
    TournamentPrizePoolParams,
} from '../schemas/leagues.js';
import {matchDetailsSchema, matchHistorySchema} from '../schemas/matches.js';
import type {MatchDetailsParams, MatchHistoryParams} from '../schemas/matches.js';
import {playerSummariesSchema} from '../schemas/players.js';
import type {PlayerSummariesParams} from '../schemas/players.js';
import {buildUrl, DEFAULT_BASE_URL, DEFAULT_LANGUAGE, REDACTED, redactUrl} from './endpoints.js';
import type {EndpointName, QueryParams} from './endpoints.js';
import {ApiError, MissingCredentialError, TransportError} from './errors.js';
import {DotaResponse} from './response.js';
import {toSteamId64} from './steamId.js';
import {parseParams} from './validation.js';

/** Fetch-compatible transport; the global `fetch` satisfies it. */
export type Executor = (url: string, init: {signal?: AbortSignal}) => Promise<Response>;

export interface ClientConfig {
    apiKey: string;
    baseUrl?: string;
    /** Language sent with every request unless a call overrides it. */
    language?: string;
    /** Abort a request after this many seconds; unset leaves the transport default. */
    timeoutSeconds?: number;
}

export interface ClientDeps {
    executor?: Executor;
    logger?: ClientLogger;
}

const tracer = trace.getTracer('dota2-webapi');

function reasonOf(err: unknown): string {
    if (typeof err === 'object' && err !== null && 'name' in err) {
        if (err.name === 'TimeoutError' || err.name === 'AbortError') return 'request timed out';
    }
    if (err instanceof Error) return err.message;
    return String(err);
}

/**
 * Find an error reported inside a 2xx body. Valve reports failures as
 * `{result: {error}}` or `{result: {status, statusDetail}}` where a status of
 * 1 means success.
 */
function upstreamFailure(body: JsonObject, httpStatus: number): {status: number; message: string} | null {
    const result = body.result;
    if (!isJsonObject(result)) return null;
    const status = typeof result.status === 'number' ? result.status : httpStatus;
    if (typeof result.error === 'string') return {status, message: result.error};
    if (typeof result.statusDetail === 'string' && status !== 1) return {status, message: result.statusDetail};
    return null;
}

export class Dota2Client {
    readonly baseUrl: string;
    readonly language: string;
    readonly timeoutSeconds: number | undefined;
    private readonly apiKey: string;
    private readonly executor: Executor;
    private readonly log: ClientLogger;

    constructor(config: ClientConfig, deps: ClientDeps = {}) {
        const apiKey = config.apiKey.trim();
        if (!apiKey) throw new MissingCredentialError();
        const options = parseParams('config', clientOptionsSchema, config);
        this.apiKey = apiKey;
        this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
        this.language = options.language ?? DEFAULT_LANGUAGE;
        this.timeoutSeconds = options.timeoutSeconds;
        this.executor = deps.executor ?? ((url, init) => fetch(url, init));
        this.log = deps.logger ?? consoleLogger;
    }

    /** Recent matches, optionally filtered by player, hero, league, skill or date. */
    async getMatchHistory(params: MatchHistoryParams = {}): Promise<DotaResponse> {
        return this.call('getMatchHistory', parseParams('getMatchHistory', matchHistorySchema, params));
    }

    async getMatchDetails(params: MatchDetailsParams): Promise<DotaResponse> {
        return this.call('getMatchDetails', parseParams('getMatchDetails', matchDetailsSchema, params));
    }

    /** Steam profiles; 32-bit account ids are converted to 64-bit Steam ids. */
    async getPlayerSummaries(params: PlayerSummariesParams): Promise<DotaResponse> {
        const {steam_ids} = parseParams('getPlayerSummaries', playerSummariesSchema, params);
        return this.call('getPlayerSummaries', {steamids: steam_ids.map(toSteamId64).join(',')});
    }

    async getLeagueListing(params: LeagueListingParams = {}): Promise<DotaResponse> {
        return this.call('getLeagueListing', parseParams('getLeagueListing', leagueListingSchema, params));
    }

    async getLiveLeagueGames(params: LiveLeagueGamesParams = {}): Promise<DotaResponse> {
        return this.call('getLiveLeagueGames', parseParams('getLiveLeagueGames', liveLeagueGamesSchema, params));
    }

    async getTeamInfoByTeamId(params: TeamInfoParams = {}): Promise<DotaResponse> {
        return this.call('getTeamInfoByTeamId', parseParams('getTeamInfoByTeamId', teamInfoSchema, params));
    }

    async getHeroes(params: CatalogParams = {}): Promise<DotaResponse> {
        return this.call('getHeroes', parseParams('getHeroes', catalogSchema, params));
    }

    async getTournamentPrizePool(params: TournamentPrizePoolParams = {}): Promise<DotaResponse> {
        return this.call(
            'getTournamentPrizePool',
            parseParams('getTournamentPrizePool', tournamentPrizePoolSchema, params),
        );
    }

    async getGameItems(params: CatalogParams = {}): Promise<DotaResponse> {
        return this.call('getGameItems', parseParams('getGameItems', catalogSchema, params));
    }

    private async call(endpoint: EndpointName, query: QueryParams): Promise<DotaResponse> {
        const url = buildUrl(this.baseUrl, endpoint, query, this.apiKey, this.language);
        const safeUrl = redactUrl(url);
        this.log.debug({endpoint, url: safeUrl}, 'dota api request');

        return tracer.startActiveSpan(`dota.${endpoint}`, async (span) => {
            span.setAttribute('dota.endpoint', endpoint);
            const started = performance.now();
            try {
                const body = await this.request(endpoint, url, safeUrl);
                recordUpstreamCall(endpoint, 'ok', (performance.now() - started) / 1000);
                return new DotaResponse(body, {endpoint});
            } catch (err) {
                const outcome = err instanceof ApiError ? 'api_error' : 'transport_error';
                recordUpstreamCall(endpoint, outcome, (performance.now() - started) / 1000);
                span.setStatus({code: SpanStatusCode.ERROR, message: outcome});
                this.log.warn(
                    {endpoint, url: safeUrl, err: err instanceof Error ? err.message : String(err)},
                    'dota api request failed',
                );
                throw err;
            } finally {
                span.end();
            }
        });
    }

    private async request(endpoint: EndpointName, url: string, safeUrl: string): Promise<JsonObject> {
        const signal = this.timeoutSeconds ? AbortSignal.timeout(this.timeoutSeconds * 1000) : undefined;
        let res: Response;
        let text: string;
        try {
            res = await this.executor(url, {signal});
            text = await res.text();
        } catch (err) {
            // transport messages may echo the full URL; keep only the scrubbed reason
            const reason = this.scrub(reasonOf(err));
            throw new TransportError(endpoint, safeUrl, reason, {cause: new Error(reason)});
        }

        if (!res.ok) {
            throw new ApiError(endpoint, safeUrl, res.status, res.statusText || `HTTP ${res.status}`);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch (err) {
            throw new TransportError(endpoint, safeUrl, 'response body is not valid JSON', {cause: err});
        }
        if (!isJsonObject(parsed)) {
            throw new TransportError(endpoint, safeUrl, 'response body is not a JSON object');
        }

        const failure = upstreamFailure(parsed, res.status);
        if (failure) throw new ApiError(endpoint, safeUrl, failure.status, failure.message);
        return parsed;
    }

    private scrub(message: string): string {
        return message.split(this.apiKey).join(REDACTED);
    }
}
