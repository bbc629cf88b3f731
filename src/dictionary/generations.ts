/**
 * Versioned, append-only lookup tables.
 *
 * A table is a list of generations. Generation `g` only ever adds entries;
 * the effective table for version `v` is the union of generations `1..v`,
 * folded lowest first. Reassigning a key or reusing a value across
 * generations is a broken table and fails the build of the table.
 */

import { ConfigurationError } from '../errors';

export interface Generation<K, V> {
    version: number;
    entries: ReadonlyArray<readonly [K, V]>;
}

/** Highest generation number in a table (0 for an empty table). */
export function latestVersion<K, V>(generations: ReadonlyArray<Generation<K, V>>): number {
    return generations.reduce((max, g) => Math.max(max, g.version), 0);
}

/**
 * Unknown versions clamp silently to the highest known generation.
 * Zero and below select the empty table.
 */
export function clampVersion(version: number, latest: number): number {
    return Math.max(0, Math.min(Math.trunc(version), latest));
}

/**
 * Folds generations `1..version` into one insertion-ordered map.
 * Iteration order is generation order, then declaration order within a generation.
 */
export function foldGenerations<K, V>(
    generations: ReadonlyArray<Generation<K, V>>,
    version: number
): Map<K, V> {
    const forward = new Map<K, V>();
    const owners = new Map<V, K>();
    const ordered = [...generations].sort((a, b) => a.version - b.version);

    for (const generation of ordered) {
        if (generation.version > version) break;
        for (const [key, value] of generation.entries) {
            const existing = forward.get(key);
            if (existing !== undefined && existing !== value) {
                throw new ConfigurationError(
                    `Generation ${generation.version} reassigns '${String(key)}' from ${String(existing)} to ${String(value)}`
                );
            }
            const owner = owners.get(value);
            if (owner !== undefined && owner !== key) {
                throw new ConfigurationError(
                    `Generation ${generation.version} reuses ${String(value)} for '${String(key)}', already bound to '${String(owner)}'`
                );
            }
            if (existing === undefined) {
                forward.set(key, value);
                owners.set(value, key);
            }
        }
    }
    return forward;
}

/** Swaps keys and values of a folded table. */
export function invert<K, V>(forward: ReadonlyMap<K, V>): Map<V, K> {
    const inverse = new Map<V, K>();
    for (const [key, value] of forward) {
        inverse.set(value, key);
    }
    return inverse;
}
