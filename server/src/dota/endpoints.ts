/**
 * endpoints.ts
 *
 * Static endpoint table and URL construction. Each client operation maps to
 * one upstream path and an ordered list of accepted query parameters; the
 * order of that list is the order parameters appear in the query string, so
 * identical inputs always produce identical URLs.
 */

export const DEFAULT_BASE_URL = 'https://api.steampowered.com/';
export const DEFAULT_LANGUAGE = 'en_us';
export const REDACTED = 'REDACTED';

export interface EndpointDescriptor {
    path: string;
    params: readonly string[];
}

export const ENDPOINTS = {
    getMatchHistory: {
        path: 'IDOTA2Match_570/GetMatchHistory/v001/',
        params: [
            'account_id',
            'hero_id',
            'game_mode',
            'league_id',
            'skill',
            'date_min',
            'date_max',
            'matches_requested',
            'min_players',
            'start_at_match_id',
            'tournament_games_only',
        ],
    },
    getMatchDetails: {
        path: 'IDOTA2Match_570/GetMatchDetails/v001/',
        params: ['match_id'],
    },
    getPlayerSummaries: {
        path: 'ISteamUser/GetPlayerSummaries/v0002/',
        params: ['steamids'],
    },
    getLeagueListing: {
        path: 'IDOTA2Match_570/GetLeagueListing/v0001/',
        params: [],
    },
    getLiveLeagueGames: {
        path: 'IDOTA2Match_570/GetLiveLeagueGames/v0001/',
        params: ['league_id'],
    },
    getTeamInfoByTeamId: {
        path: 'IDOTA2Match_570/GetTeamInfoByTeamID/v001/',
        params: ['team_id', 'start_at_team_id', 'teams_requested'],
    },
    getHeroes: {
        path: 'IEconDOTA2_570/GetHeroes/v0001/',
        params: ['language'],
    },
    getTournamentPrizePool: {
        path: 'IEconDOTA2_570/GetTournamentPrizePool/v1/',
        params: ['leagueid'],
    },
    getGameItems: {
        path: 'IEconDOTA2_570/GetGameItems/v0001/',
        params: ['language'],
    },
} as const satisfies Record<string, EndpointDescriptor>;

export type EndpointName = keyof typeof ENDPOINTS;

export type QueryValue = string | number | boolean;

export type QueryParams = Partial<Record<string, QueryValue>>;

function serialize(value: QueryValue): string {
    if (typeof value === 'boolean') return value ? '1' : '0';
    return String(value);
}

/**
 * Build the full request URL for `endpoint`. Endpoint parameters come first in
 * descriptor order, followed by `key`, `language` (the per-call value when the
 * endpoint accepts one, else `defaultLanguage`) and `format=json`.
 */
export function buildUrl(
    baseUrl: string,
    endpoint: EndpointName,
    params: QueryParams,
    apiKey: string,
    defaultLanguage: string,
): string {
    const descriptor: EndpointDescriptor = ENDPOINTS[endpoint];
    const query = new URLSearchParams();
    for (const name of descriptor.params) {
        if (name === 'language') continue;
        const value = params[name];
        if (value !== undefined) query.set(name, serialize(value));
    }
    query.set('key', apiKey);
    const language = params.language;
    query.set('language', language !== undefined ? serialize(language) : defaultLanguage);
    query.set('format', 'json');
    const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    return `${base}${descriptor.path}?${query.toString()}`;
}

/** Replace the `key` query parameter so the URL is safe to log or report. */
export function redactUrl(url: string): string {
    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        return url.replace(/([?&]key=)[^&]*/, `$1${REDACTED}`);
    }
    if (parsed.searchParams.has('key')) parsed.searchParams.set('key', REDACTED);
    return parsed.toString();
}
