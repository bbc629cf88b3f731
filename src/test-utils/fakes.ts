import { vi } from 'vitest';
import { CompactCodec } from '../codec/CompactCodec';
import {
    EMPTY_RESPONSE,
    type CompactRequest,
    type CompactResponse,
    type CompactTransport,
    type FallbackTransport,
    type RawResponse,
    type SendOptions,
} from '../transport/Transport';
import type { HttpMethod, JsonObject, JsonValue } from '../types';

/**
 * What the fake compact channel does with the next request:
 * answer it, fail it, answer it later, or wait until the send is aborted.
 */
export type CompactReply = CompactResponse | Error | Promise<CompactResponse> | 'hang';

const defaultCodec = new CompactCodec();

/** A compact response with a CBOR body (`0x45` is 2.05 Content). */
export function compactReply(code: number, body?: JsonObject, codec: CompactCodec = defaultCodec): CompactResponse {
    return { code, payload: body === undefined ? new Uint8Array(0) : codec.encode(body) };
}

export function textReply(code: number, text: string): CompactResponse {
    return { code, payload: new TextEncoder().encode(text) };
}

export function deferred<T>(): { promise: Promise<T>; resolve(value: T): void } {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

/**
 * In-process compact channel. Replies are consumed in order; once the
 * script runs out every request gets an empty 2.05.
 */
export class FakeCompactTransport implements CompactTransport {
    readonly requests: CompactRequest[] = [];
    closed = false;
    private readonly replies: CompactReply[] = [];

    readonly send = vi.fn((request: CompactRequest, options: SendOptions = {}): Promise<CompactResponse> => {
        this.requests.push(request);
        const reply = this.replies.shift() ?? compactReply(0x45);
        if (reply === 'hang') {
            return new Promise((resolve) => {
                options.signal?.addEventListener('abort', () => resolve(EMPTY_RESPONSE), { once: true });
            });
        }
        if (reply instanceof Promise) return reply;
        if (reply instanceof Error) return Promise.reject(reply);
        return Promise.resolve(reply);
    });

    reply(...replies: CompactReply[]): this {
        this.replies.push(...replies);
        return this;
    }

    close(): void {
        this.closed = true;
    }
}

export interface FallbackCall {
    method: HttpMethod;
    url: string;
    json: JsonObject | undefined;
    authenticated: boolean;
}

/** Strings are sent as raw text, anything else as JSON. */
export function rawResponse(status: number, body: JsonValue = {}): RawResponse {
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    return { status, body: new TextEncoder().encode(text) };
}

/**
 * In-process HTTP channel. Replies are consumed in order; once the script
 * runs out every request gets `200 {}`.
 */
export class FakeFallbackTransport implements FallbackTransport {
    readonly calls: FallbackCall[] = [];
    private readonly replies: Array<RawResponse | Error> = [];

    readonly sendRaw = vi.fn((
        method: HttpMethod,
        url: string,
        json: JsonObject | undefined,
        authenticated: boolean
    ): Promise<RawResponse> => {
        this.calls.push({ method, url, json, authenticated });
        const reply = this.replies.shift() ?? rawResponse(200);
        if (reply instanceof Error) return Promise.reject(reply);
        return Promise.resolve(reply);
    });

    reply(...replies: Array<RawResponse | Error>): this {
        this.replies.push(...replies);
        return this;
    }
}
