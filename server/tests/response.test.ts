/**
 * response.test.ts
 *
 * Unit tests for `DotaResponse`: typed getters agree with `get`, absent
 * fields always throw `MissingFieldError`, nested access reports full paths
 * and the wrapped data cannot be mutated.
 */

import {describe, it, expect} from 'vitest';
import {DotaResponse} from '../src/dota/response.js';
import {FieldTypeError, MissingFieldError} from '../src/dota/errors.js';
import {jsonTypeOf} from '../../shared/protocol/types/json.js';
import type {JsonObject} from '../../shared/protocol/types/json.js';
import {matchDetails} from './fixtures/upstream.js';

const flat: JsonObject = {
    match_id: 1000193456,
    radiant_win: false,
    cluster_name: 'test-cluster',
    picks_bans: [1, 2, 3],
    engine: {version: 1},
    lobby: null,
};

function typedRead(res: DotaResponse, field: string) {
    const value = res.get(field);
    switch (jsonTypeOf(value)) {
        case 'string':
            return res.getString(field);
        case 'number':
            return res.getNumber(field);
        case 'boolean':
            return res.getBoolean(field);
        case 'array':
            return res.getArray(field);
        case 'object':
            return res.getObject(field).toJSON();
        default:
            return value;
    }
}

describe('DotaResponse', () => {
    it('returns the same value through get and the typed getters for every field', () => {
        const res = new DotaResponse(flat);
        for (const field of res.keys()) {
            expect(typedRead(res, field)).toEqual(res.get(field));
        }
        expect(res.keys()).toEqual(['match_id', 'radiant_win', 'cluster_name', 'picks_bans', 'engine', 'lobby']);
    });

    it('exposes nested fields through getObject and at', () => {
        const res = new DotaResponse(matchDetails, {endpoint: 'getMatchDetails'});
        const result = res.getObject('result');
        expect(result.getBoolean('radiant_win')).toBe(false);
        expect(result.get('radiant_win')).toBe(false);
        expect(res.at('result.radiant_win')).toBe(false);
        expect(res.at('result.players.1.hero_id')).toBe(2);
        expect(result.path).toBe('result');
        expect(result.endpoint).toBe('getMatchDetails');
    });

    it('throws MissingFieldError for absent fields', () => {
        const res = new DotaResponse(matchDetails, {endpoint: 'getMatchDetails'});
        expect(res.has('nonexistent_field')).toBe(false);
        expect(() => res.get('nonexistent_field')).toThrow(MissingFieldError);
        expect(() => res.getString('nonexistent_field')).toThrow(MissingFieldError);
        expect(() => res.get('nonexistent_field')).toThrow(
            'Field "nonexistent_field" is not present in the getMatchDetails response',
        );
    });

    it('reports the full path of a missing nested field', () => {
        const res = new DotaResponse(matchDetails, {endpoint: 'getMatchDetails'});
        try {
            res.getObject('result').get('nonexistent_field');
            expect.unreachable('lookup should throw');
        } catch (err) {
            expect(err).toBeInstanceOf(MissingFieldError);
            if (err instanceof MissingFieldError) expect(err.path).toBe('result.nonexistent_field');
        }
        expect(() => res.at('result.players.5.hero_id')).toThrow('Field "result.players.5" is not present');
        expect(() => res.at('result.duration.seconds')).toThrow('Field "result.duration.seconds" is not present');
    });

    it('throws FieldTypeError when a typed getter meets another JSON type', () => {
        const res = new DotaResponse(flat);
        try {
            res.getNumber('cluster_name');
            expect.unreachable('getter should throw');
        } catch (err) {
            expect(err).toBeInstanceOf(FieldTypeError);
            if (err instanceof FieldTypeError) {
                expect(err.expected).toBe('number');
                expect(err.actual).toBe('string');
            }
        }
        expect(() => res.getObject('picks_bans')).toThrow('Field "picks_bans" is array, expected object');
        expect(() => res.getBoolean('lobby')).toThrow('Field "lobby" is null, expected boolean');
    });

    it('keeps a frozen copy of the payload', () => {
        const source: JsonObject = {result: {radiant_win: true, players: [{hero_id: 1}]}};
        const res = new DotaResponse(source);
        const data = res.toJSON();
        expect(Object.isFrozen(data)).toBe(true);
        expect(Object.isFrozen(res.at('result.players'))).toBe(true);
        expect(Object.isFrozen(res.at('result.players.0'))).toBe(true);

        source.result = {radiant_win: false};
        expect(res.at('result.radiant_win')).toBe(true);
    });
});
