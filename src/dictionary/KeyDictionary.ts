import keyTable from './keys.json';
import { clampVersion, foldGenerations, invert, latestVersion, type Generation } from './generations';

/**
 * Field-name compression table: JSON keys that travel as small integers.
 * Codes are bit-compatible with every peer that speaks the same generation,
 * so a published code never changes meaning.
 */
export const KEY_GENERATIONS: ReadonlyArray<Generation<string, number>> = keyTable.generations.map(g => ({
    version: g.version,
    entries: Object.entries(g.keys),
}));

export const LATEST_KEY_VERSION = latestVersion(KEY_GENERATIONS);

export class KeyDictionary {
    readonly version: number;
    readonly forward: ReadonlyMap<string, number>;
    readonly inverse: ReadonlyMap<number, string>;

    constructor(
        version: number = LATEST_KEY_VERSION,
        generations: ReadonlyArray<Generation<string, number>> = KEY_GENERATIONS
    ) {
        this.version = clampVersion(version, latestVersion(generations));
        this.forward = foldGenerations(generations, this.version);
        this.inverse = invert(this.forward);
    }
}
