/**
 * steamId.ts
 *
 * Steam id helpers. Player summaries take 64-bit Steam ids while match data
 * reports 32-bit account ids; 64-bit values exceed the safe integer range, so
 * they are handled as bigint internally and emitted as decimal strings.
 */

export const STEAM_ID_64_OFFSET = 76561197960265728n;
export const STEAM_ID_64_MAX = 2n ** 64n - 1n;

export type SteamIdInput = string | number | bigint;

/** Convert a 32-bit account id to its 64-bit Steam id; 64-bit ids pass through unchanged. */
export function toSteamId64(id: SteamIdInput): string {
    const value = BigInt(id);
    if (value < 0n) throw new RangeError(`Steam id must not be negative: ${value}`);
    if (value > STEAM_ID_64_MAX) throw new RangeError(`Steam id does not fit in 64 bits: ${value}`);
    return (value < STEAM_ID_64_OFFSET ? value + STEAM_ID_64_OFFSET : value).toString();
}

/** Convert a 64-bit Steam id back to the 32-bit account id used in match payloads. */
export function toAccountId32(id: SteamIdInput): number {
    const value = BigInt(id);
    return Number(value >= STEAM_ID_64_OFFSET ? value - STEAM_ID_64_OFFSET : value);
}
