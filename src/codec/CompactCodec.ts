/**
 * @file CompactCodec.ts
 * @brief Size-reduced binary object encoding for request and response bodies.
 *
 * Bodies travel as CBOR maps. Before encoding, every map key found in the
 * key dictionary is replaced by its integer code; after decoding, integer
 * keys are mapped back. A key is left alone when its code is already taken
 * by a literal key in the same map, so `{"1": ..., "event_id": ...}` keeps
 * `event_id` spelled out.
 *
 * @example
 * ```typescript
 * const codec = new CompactCodec(1);
 * const bytes = codec.encode({ type: 'm.room.message' });
 * codec.decode(bytes); // { type: 'm.room.message' }
 * ```
 */

import { decode as decodeCbor, encode as encodeCbor } from 'cborg';
import { InvalidFrameError } from '../errors';
import { KeyDictionary } from '../dictionary/KeyDictionary';
import type { JsonObject, JsonValue } from '../types';

const MAX_RECURSION_DEPTH = 64;

type WireKey = string | number;
type WireValue = WireKey | boolean | null | WireValue[] | Map<WireKey, WireValue>;

// =============================================================================
// Key substitution
// =============================================================================

function hasOwn(obj: object, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(obj, key);
}

function isJsonObject(value: JsonValue): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Replaces dictionary keys with their codes at every nesting level,
 * including maps nested in lists.
 */
export function compressKeys(
    obj: JsonObject,
    forward: ReadonlyMap<string, number>,
    depth: number = 0
): Map<WireKey, WireValue> {
    if (depth > MAX_RECURSION_DEPTH) {
        throw new InvalidFrameError(`Max nesting depth (${MAX_RECURSION_DEPTH}) exceeded`);
    }
    const out = new Map<WireKey, WireValue>();
    for (const [key, value] of Object.entries(obj)) {
        if (value === undefined) continue;
        const code = forward.get(key);
        const wireKey = code !== undefined && !hasOwn(obj, String(code)) ? code : key;
        out.set(wireKey, compressValue(value, forward, depth + 1));
    }
    return out;
}

function compressValue(value: JsonValue, forward: ReadonlyMap<string, number>, depth: number): WireValue {
    if (Array.isArray(value)) {
        return value.map(item => compressValue(item, forward, depth + 1));
    }
    if (isJsonObject(value)) {
        return compressKeys(value, forward, depth);
    }
    return value;
}

/**
 * Restores field names from integer codes and normalizes every value to a
 * JSON value. A code whose field name is already a literal key of the same
 * map stays as its decimal string.
 */
export function expandKeys(
    map: Map<unknown, unknown>,
    inverse: ReadonlyMap<number, string>,
    depth: number = 0
): JsonObject {
    if (depth > MAX_RECURSION_DEPTH) {
        throw new InvalidFrameError(`Max nesting depth (${MAX_RECURSION_DEPTH}) exceeded`);
    }
    // Keys such as "__proto__" must land as own properties.
    const entries: Array<[string, JsonValue]> = [];
    for (const [key, value] of map) {
        entries.push([restoreKey(key, map, inverse), normalizeValue(value, inverse, depth + 1)]);
    }
    return Object.fromEntries(entries);
}

function restoreKey(key: unknown, map: Map<unknown, unknown>, inverse: ReadonlyMap<number, string>): string {
    if (typeof key === 'string') return key;
    if (typeof key === 'number' || typeof key === 'bigint') {
        const code = Number(key);
        const name = inverse.get(code);
        if (name !== undefined && !map.has(name)) return name;
        return String(code);
    }
    throw new InvalidFrameError(`Map key of type ${typeof key} is not a valid JSON key`);
}

/**
 * Integral numbers come back as plain integers whatever width or float
 * form the wire used.
 */
function normalizeValue(value: unknown, inverse: ReadonlyMap<number, string>, depth: number): JsonValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Object.is(value, -0) ? 0 : value;
    if (typeof value === 'bigint') return Number(value);
    if (Array.isArray(value)) {
        if (depth > MAX_RECURSION_DEPTH) {
            throw new InvalidFrameError(`Max nesting depth (${MAX_RECURSION_DEPTH}) exceeded`);
        }
        return value.map(item => normalizeValue(item, inverse, depth + 1));
    }
    if (value instanceof Map) return expandKeys(value, inverse, depth);
    const kind = value instanceof Uint8Array ? 'byte string' : typeof value;
    throw new InvalidFrameError(`Value of type ${kind} is not a valid JSON value`);
}

// =============================================================================
// Codec
// =============================================================================

export class CompactCodec {
    readonly dictionary: KeyDictionary;

    constructor(versionOrDictionary: number | KeyDictionary = new KeyDictionary()) {
        this.dictionary = typeof versionOrDictionary === 'number'
            ? new KeyDictionary(versionOrDictionary)
            : versionOrDictionary;
    }

    /** Effective key dictionary version, as announced to the peer. */
    get version(): number {
        return this.dictionary.version;
    }

    encode(json: JsonObject): Uint8Array {
        return encodeCbor(compressKeys(json, this.dictionary.forward));
    }

    /**
     * @throws {InvalidFrameError} unless the bytes hold exactly one CBOR map
     */
    decode(bytes: Uint8Array): JsonObject {
        let decoded: unknown;
        try {
            decoded = decodeCbor(bytes, { useMaps: true });
        } catch (error) {
            throw new InvalidFrameError(
                `Invalid CBOR frame: ${error instanceof Error ? error.message : String(error)}`,
                error
            );
        }
        if (!(decoded instanceof Map)) {
            throw new InvalidFrameError('Invalid CBOR frame: top-level value is not a map');
        }
        return expandKeys(decoded, this.dictionary.inverse);
    }
}
