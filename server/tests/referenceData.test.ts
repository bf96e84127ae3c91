/**
 * referenceData.test.ts
 *
 * Tests for writing hero and item listings to disk. Files go to a temporary
 * directory that is removed afterwards.
 */

import {describe, it, expect, afterEach} from 'vitest';
import {mkdtemp, readFile, rm} from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {Dota2Client} from '../src/dota/client.js';
import {updateGameItems, updateHeroes} from '../src/dota/referenceData.js';
import {fakeUpstream, silentLogger} from './helpers/fakeUpstream.js';
import {heroes, items} from './fixtures/upstream.js';

let tmp: string | null = null;

afterEach(async () => {
    if (tmp) await rm(tmp, {recursive: true, force: true});
    tmp = null;
});

function makeClient() {
    const upstream = fakeUpstream({
        'GetHeroes/v0001/': {body: heroes},
        'GetGameItems/v0001/': {body: items},
    });
    return {
        client: new Dota2Client({apiKey: 'test-key'}, {executor: upstream.executor, logger: silentLogger}),
        upstream,
    };
}

describe('reference data', () => {
    it('writes heroes.json with 4-space indentation', async () => {
        tmp = await mkdtemp(path.join(os.tmpdir(), 'dota-ref-'));
        const {client} = makeClient();

        const written = await updateHeroes(client, tmp);

        expect(written).toBe(path.join(tmp, 'heroes.json'));
        expect(await readFile(written, 'utf8')).toBe(JSON.stringify(heroes, null, 4));
    });

    it('creates the directory and forwards the language', async () => {
        tmp = await mkdtemp(path.join(os.tmpdir(), 'dota-ref-'));
        const {client, upstream} = makeClient();
        const dir = path.join(tmp, 'nested', 'ref');

        const written = await updateGameItems(client, dir, 'de_de');

        expect(written).toBe(path.join(dir, 'items.json'));
        expect(JSON.parse(await readFile(written, 'utf8'))).toEqual(items);
        expect(upstream.requests[0].searchParams.get('language')).toBe('de_de');
    });
});
