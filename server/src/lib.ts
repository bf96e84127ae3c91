/**
 * lib.ts
 *
 * Public entry point of the library.
 */

export {Dota2Client} from './dota/client.js';
export type {ClientConfig, ClientDeps, Executor} from './dota/client.js';
export {DotaResponse} from './dota/response.js';
export type {DotaResponseOptions} from './dota/response.js';
export {
    ApiError,
    DotaApiError,
    FieldTypeError,
    InvalidParamsError,
    MissingCredentialError,
    MissingFieldError,
    TransportError,
} from './dota/errors.js';
export type {DotaErrorCode} from './dota/errors.js';
export {DEFAULT_BASE_URL, DEFAULT_LANGUAGE, ENDPOINTS, buildUrl, redactUrl} from './dota/endpoints.js';
export type {EndpointName, QueryParams} from './dota/endpoints.js';
export {STEAM_ID_64_OFFSET, toAccountId32, toSteamId64} from './dota/steamId.js';
export {HEROES_FILE, ITEMS_FILE, updateGameItems, updateHeroes} from './dota/referenceData.js';
export {initialise, loadClientConfig, loadConfig} from './config.js';
export type {AppConfig, Env, ServerConfig} from './config.js';
export {buildApp} from './app.js';
export type {AppOptions} from './app.js';
export type {ClientLogger} from './logging.js';
export type {MatchDetailsParams, MatchHistoryParams} from './schemas/matches.js';
export type {PlayerSummariesParams} from './schemas/players.js';
export type {
    LeagueListingParams,
    LiveLeagueGamesParams,
    TeamInfoParams,
    TournamentPrizePoolParams,
} from './schemas/leagues.js';
export type {CatalogParams} from './schemas/catalog.js';
export type {JsonObject, JsonValue} from '../../shared/protocol/types/json.js';
