/**
 * Shared types for the low-bandwidth transport.
 */

import type { LowBandwidthError } from './errors';

// =============================================================================
// JSON-like values
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

// =============================================================================
// Requests
// =============================================================================

/** The closed set of request methods the compact channel can carry. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Why a request went over the fallback channel instead of the compact one.
 * `unencodable` means the body nests deeper than the compact codec allows.
 */
export type FallbackReason = 'abandoned' | 'oversized' | 'unencodable' | 'inconclusive' | 'transport-error';

export type AdapterMode = 'compact' | 'abandoned';

/** Point-in-time view of the adapter's degradation state. */
export interface AdapterSnapshot {
    mode: AdapterMode;
    consecutiveFailures: number;
    firstMessagePending: boolean;
}

export interface AdapterEvents {
    [key: string]: unknown[];
    fallback: [reason: FallbackReason, url: string, cause?: LowBandwidthError];
    abandoned: [cause: unknown];
    inconclusive: [consecutiveFailures: number];
}
