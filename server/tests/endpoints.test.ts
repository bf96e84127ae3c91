/**
 * endpoints.test.ts
 *
 * Unit tests for URL construction: parameter ordering, flag encoding,
 * language handling and key redaction.
 */

import {describe, it, expect} from 'vitest';
import {buildUrl, DEFAULT_BASE_URL, redactUrl} from '../src/dota/endpoints.js';

describe('buildUrl', () => {
    it('orders endpoint parameters by the endpoint table, then key, language and format', () => {
        const url = buildUrl(
            DEFAULT_BASE_URL,
            'getMatchHistory',
            {tournament_games_only: true, skill: 2, account_id: 5},
            'test-key',
            'en_us',
        );
        expect(url).toBe(
            'https://api.steampowered.com/IDOTA2Match_570/GetMatchHistory/v001/' +
            '?account_id=5&skill=2&tournament_games_only=1&key=test-key&language=en_us&format=json',
        );
    });

    it('produces the same URL for the same inputs', () => {
        const a = buildUrl(DEFAULT_BASE_URL, 'getMatchDetails', {match_id: 42}, 'test-key', 'en_us');
        const b = buildUrl(DEFAULT_BASE_URL, 'getMatchDetails', {match_id: 42}, 'test-key', 'en_us');
        expect(a).toBe(b);
    });

    it('uses a per-call language over the default', () => {
        expect(buildUrl(DEFAULT_BASE_URL, 'getHeroes', {language: 'de_de'}, 'test-key', 'en_us')).toBe(
            'https://api.steampowered.com/IEconDOTA2_570/GetHeroes/v0001/?key=test-key&language=de_de&format=json',
        );
        expect(buildUrl(DEFAULT_BASE_URL, 'getGameItems', {}, 'test-key', 'en_us')).toBe(
            'https://api.steampowered.com/IEconDOTA2_570/GetGameItems/v0001/?key=test-key&language=en_us&format=json',
        );
    });

    it('ignores parameters the endpoint does not accept', () => {
        expect(buildUrl('http://localhost:9000', 'getLeagueListing', {match_id: 1}, 'test-key', 'en_us')).toBe(
            'http://localhost:9000/IDOTA2Match_570/GetLeagueListing/v0001/?key=test-key&language=en_us&format=json',
        );
    });
});

describe('redactUrl', () => {
    it('replaces the key value', () => {
        const url = buildUrl(DEFAULT_BASE_URL, 'getMatchDetails', {match_id: 1}, 'test-key', 'en_us');
        expect(redactUrl(url)).toBe(
            'https://api.steampowered.com/IDOTA2Match_570/GetMatchDetails/v001/' +
            '?match_id=1&key=REDACTED&language=en_us&format=json',
        );
    });

    it('leaves URLs without a key unchanged', () => {
        expect(redactUrl('https://api.steampowered.com/ISteamUser/GetPlayerSummaries/v0002/?format=json')).toBe(
            'https://api.steampowered.com/ISteamUser/GetPlayerSummaries/v0002/?format=json',
        );
    });
});
