import { z } from 'zod';
import { ProtocolError } from './errors';
import type { JsonObject } from './types';

/**
 * Zod schemas for bodies that arrive from the peer.
 * Whatever channel a response took, its shape is checked at the gate.
 */

const ProtocolErrorBodySchema = z.object({
    errcode: z.string().optional(),
    error: z.string().optional(),
    retry_after_ms: z.number().optional(),
}).passthrough();

/**
 * Builds a ProtocolError from a client-error body.
 * Bodies without the standard fields degrade to `M_UNKNOWN` with the raw body kept.
 */
export function toProtocolError(status: number, body: JsonObject): ProtocolError {
    const result = ProtocolErrorBodySchema.safeParse(body);
    if (!result.success) {
        return new ProtocolError(status, 'M_UNKNOWN', `Unrecognised error body (${status})`, body);
    }
    const { errcode, error, retry_after_ms } = result.data;
    return new ProtocolError(
        status,
        errcode ?? 'M_UNKNOWN',
        error ?? `Request failed with status ${status}`,
        body,
        retry_after_ms
    );
}

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

/**
 * Safely truncates a string for logging/error messages.
 */
export function truncate(str: string, maxLength: number = 200): string {
    if (str.length <= maxLength) return str;
    return str.substring(0, maxLength) + `... (${str.length - maxLength} more chars)`;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decodes bytes as UTF-8, or returns undefined when they are not valid UTF-8.
 */
export function tryDecodeText(bytes: Uint8Array): string | undefined {
    try {
        return utf8.decode(bytes);
    } catch {
        return undefined;
    }
}
