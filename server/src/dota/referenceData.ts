/**
 * referenceData.ts
 *
 * Refreshes the static hero and item listings on disk. Each helper fetches the
 * listing through the client and writes it as 4-space indented JSON into the
 * target directory (created when missing), returning the written file path.
 */

import {mkdir, writeFile} from 'node:fs/promises';
import path from 'node:path';
import type {Dota2Client} from './client.js';
import type {DotaResponse} from './response.js';

export const HEROES_FILE = 'heroes.json';
export const ITEMS_FILE = 'items.json';

async function saveResponse(response: DotaResponse, dir: string, fileName: string): Promise<string> {
    await mkdir(dir, {recursive: true});
    const target = path.join(dir, fileName);
    await writeFile(target, JSON.stringify(response.toJSON(), null, 4), 'utf8');
    return target;
}

export async function updateHeroes(client: Pick<Dota2Client, 'getHeroes'>, dir: string, language?: string) {
    return saveResponse(await client.getHeroes({language}), dir, HEROES_FILE);
}

export async function updateGameItems(client: Pick<Dota2Client, 'getGameItems'>, dir: string, language?: string) {
    return saveResponse(await client.getGameItems({language}), dir, ITEMS_FILE);
}
