import type { CoapOption, RequestCode } from '../coap/CoapMessage';
import type { HttpMethod, JsonObject } from '../types';

/**
 * The two channels the adapter can route a request through.
 * This decouples the decision (compact or fallback) from the wire (UDP, HTTP).
 */

// =============================================================================
// Compact channel
// =============================================================================

export interface CompactRequest {
    code: RequestCode;
    /** Decoded Uri-Path segments */
    path: string[];
    /** `key=value` Uri-Query entries, already percent-encoded */
    query: string[];
    /** Session metadata and any other extra options */
    options: CoapOption[];
    payload?: Uint8Array;
    contentFormat?: number;
}

export interface CompactResponse {
    /** Response code byte; `0` means no conclusive answer arrived. */
    code: number;
    payload: Uint8Array;
}

export const EMPTY_RESPONSE: CompactResponse = Object.freeze({
    code: 0,
    payload: new Uint8Array(0),
});

export interface SendOptions {
    /** Aborting resolves the pending send with the empty response. */
    signal?: AbortSignal;
}

export interface CompactTransport {
    /**
     * Sends one request and waits for its response.
     * Resolves the empty response on timeout; rejects only when the
     * channel itself failed (socket error, unreachable host).
     */
    send(request: CompactRequest, options?: SendOptions): Promise<CompactResponse>;
    close(): void;
}

// =============================================================================
// Fallback channel
// =============================================================================

export interface RawResponse {
    status: number;
    body: Uint8Array;
}

export interface FallbackTransport {
    sendRaw(
        method: HttpMethod,
        url: string,
        json: JsonObject | undefined,
        authenticated: boolean
    ): Promise<RawResponse>;
}
