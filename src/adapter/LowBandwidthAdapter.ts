import { CompactCodec } from '../codec/CompactCodec';
import {
    CONTENT_FORMAT_CBOR,
    EMPTY_CODE,
    OptionNumber,
    RequestCode,
    codeClass,
    codeDetail,
    formatCode,
    isClientError,
    isServerError,
    stringOption,
    uintOption,
    type CoapOption,
} from '../coap/CoapMessage';
import { parseConfig, type LowBandwidthConfig, type ResolvedConfig } from '../config';
import {
    ConnectionTimeoutError,
    InvalidFrameError,
    OversizedPayloadError,
    TransportFailureError,
    UnknownTransportVerbError,
    type LowBandwidthError,
} from '../errors';
import { PathMatcher, toPathSegments } from '../path/PathMatcher';
import {
    EMPTY_RESPONSE,
    type CompactRequest,
    type CompactResponse,
    type CompactTransport,
    type FallbackTransport,
    type RawResponse,
} from '../transport/Transport';
import { UdpCoapTransport } from '../transport/UdpCoapTransport';
import type { AdapterEvents, AdapterSnapshot, FallbackReason, HttpMethod, JsonObject } from '../types';
import { EventEmitter } from '../utils/EventEmitter';
import { LogLevel, logger as rootLogger, type Logger } from '../utils/Logger';
import { isJsonObject, toProtocolError, tryDecodeText, truncate } from '../validation';
import { SessionState } from './SessionState';

export interface AdapterDependencies {
    /** Plain HTTP channel used whenever the compact one cannot be. */
    fallback: FallbackTransport;
    /** Compact channel (default: CoAP over UDP to `host:port`). */
    compact?: CompactTransport;
    logger?: Logger;
}

export interface TransportVerb {
    method: HttpMethod;
    code: RequestCode;
}

/**
 * Resolves a request method to its compact verb, case-insensitively.
 * @throws {UnknownTransportVerbError} for anything but GET, POST, PUT and DELETE
 */
export function toTransportVerb(method: string): TransportVerb {
    switch (method.toUpperCase()) {
        case 'GET':
            return { method: 'GET', code: RequestCode.Get };
        case 'POST':
            return { method: 'POST', code: RequestCode.Post };
        case 'PUT':
            return { method: 'PUT', code: RequestCode.Put };
        case 'DELETE':
            return { method: 'DELETE', code: RequestCode.Delete };
        default:
            throw new UnknownTransportVerbError(method);
    }
}

/** CoAP `4.04` → `404`, the status the same answer would carry over HTTP. */
export function toHttpStatus(code: number): number {
    return codeClass(code) * 100 + codeDetail(code);
}

function toQueryOptions(params: URLSearchParams): string[] {
    return Array.from(params, ([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`);
}

/**
 * Interprets a fallback-channel response the way the compact path would:
 * server errors and unparseable bodies become TransportFailureError, client
 * errors become ProtocolError, and a top-level JSON array is wrapped as
 * `{ chunk: [...] }`.
 */
export function interpretFallbackResponse(response: RawResponse): JsonObject {
    const { status } = response;
    const text = tryDecodeText(response.body);

    if (status >= 500) {
        throw new TransportFailureError(
            `Fallback request failed with status ${status}`,
            status,
            text ? truncate(text) : undefined
        );
    }
    if (text === undefined) {
        throw new TransportFailureError(`Fallback response (${status}) is not valid UTF-8`, status);
    }

    let parsed: unknown;
    if (text.trim() === '') {
        parsed = {};
    } else {
        try {
            parsed = JSON.parse(text);
        } catch (error) {
            throw new TransportFailureError(
                `Fallback response (${status}) is not JSON`,
                status,
                truncate(text),
                error
            );
        }
    }

    let body: JsonObject;
    if (Array.isArray(parsed)) {
        body = { chunk: parsed };
    } else if (isJsonObject(parsed)) {
        body = parsed;
    } else {
        throw new TransportFailureError(`Fallback response (${status}) is not a JSON object`, status, truncate(text));
    }

    if (status >= 400) {
        throw toProtocolError(status, body);
    }
    return body;
}

/**
 * Routes chat-protocol REST calls over a compact binary channel and drops
 * back to plain HTTP when that channel is unfit for a call, or gone.
 *
 * Degradation rules:
 * - the first compact message of a session (and the first after a token
 *   change) carries the access token and the key dictionary version;
 * - a body that encodes larger than `maxMessageSize` goes over HTTP and
 *   does not count against the channel, and neither does one nested too
 *   deeply for the compact codec;
 * - an inconclusive answer (no response within `requestTimeout`) throws
 *   ConnectionTimeoutError, until more than `maxInconclusiveResponses` of
 *   them arrive in a row, after which the call goes over HTTP;
 * - a transport exception abandons the compact channel for good.
 *
 * @example
 * ```typescript
 * const adapter = new LowBandwidthAdapter(
 *     { host: 'chat.example.org', port: 5683, accessToken: 'test-secret' },
 *     { fallback: new FetchFallbackTransport({ tokenProvider: () => adapter.accessToken }) }
 * );
 * adapter.on('fallback', (reason, url) => console.log(reason, url));
 * const versions = await adapter.doRequest('GET', 'https://chat.example.org/_matrix/client/versions');
 * ```
 */
export class LowBandwidthAdapter extends EventEmitter<AdapterEvents> {
    private readonly config: ResolvedConfig;
    private readonly state: SessionState;
    private readonly codec: CompactCodec;
    private readonly matcher: PathMatcher;
    private readonly compact: CompactTransport;
    private readonly fallback: FallbackTransport;
    private readonly log: Logger;

    constructor(config: LowBandwidthConfig, deps: AdapterDependencies) {
        const resolved = parseConfig(config);
        const log = (deps.logger ?? rootLogger).child('Adapter');
        if (resolved.debug) {
            log.setLogLevel(LogLevel.DEBUG);
        }
        super(log);

        this.config = resolved;
        this.log = log;
        this.codec = new CompactCodec(resolved.codecVersion);
        this.matcher = new PathMatcher(resolved.protocolVersion);
        this.state = new SessionState(resolved.accessToken, resolved.maxInconclusiveResponses);
        this.fallback = deps.fallback;
        this.compact = deps.compact ?? new UdpCoapTransport({ host: resolved.host, port: resolved.port, logger: log });
        this.log.debug(
            `Compact channel ${resolved.host}:${resolved.port} (paths v${this.matcher.version}, keys v${this.codec.version})`
        );
    }

    get accessToken(): string | undefined {
        return this.state.accessToken;
    }

    /** Changing the token re-arms the session announcement. */
    set accessToken(token: string | undefined) {
        this.state.setAccessToken(token);
    }

    get codecVersion(): number {
        return this.codec.version;
    }

    get protocolVersion(): number {
        return this.matcher.version;
    }

    getState(): AdapterSnapshot {
        return this.state.snapshot();
    }

    /** The URL a request for `url` is sent to over the compact channel. */
    mapPath(url: string | URL): URL {
        return this.matcher.mapPath(url, this.config.port);
    }

    /**
     * Performs one REST call and returns its JSON body.
     *
     * @throws {UnknownTransportVerbError} before any I/O, for an unsupported method
     * @throws {ConnectionTimeoutError} when the compact channel gave no answer (retryable)
     * @throws {ProtocolError} on a client-error status
     * @throws {TransportFailureError} on a server-error status or an unreadable body
     */
    async doRequest(method: string, url: string | URL, json?: JsonObject): Promise<JsonObject> {
        const verb = toTransportVerb(method);
        const target = String(url);

        if (this.state.isAbandoned) {
            return this.viaFallback(verb.method, target, json, 'abandoned');
        }

        const mapped = this.mapPath(target);
        const request: CompactRequest = {
            code: verb.code,
            path: toPathSegments(mapped.pathname),
            query: toQueryOptions(mapped.searchParams),
            options: [],
        };

        if (json !== undefined) {
            let payload: Uint8Array;
            try {
                payload = this.codec.encode(json);
            } catch (error) {
                if (!(error instanceof InvalidFrameError)) throw error;
                this.log.debug(error.message);
                return this.viaFallback(verb.method, target, json, 'unencodable', error);
            }
            if (payload.length > this.config.maxMessageSize) {
                const oversized = new OversizedPayloadError(payload.length, this.config.maxMessageSize);
                this.log.debug(oversized.message);
                return this.viaFallback(verb.method, target, json, 'oversized', oversized);
            }
            request.payload = payload;
            request.contentFormat = CONTENT_FORMAT_CBOR;
        }

        if (this.state.claimFirstMessage()) {
            request.options.push(...this.sessionOptions());
        }

        this.log.debug(`${verb.method} ${target} -> ${mapped.pathname}`);

        let response: CompactResponse;
        try {
            response = await this.sendWithTimeout(request);
        } catch (error) {
            if (this.state.abandon()) {
                this.log.warn('Compact channel failed; abandoning it for this session', error);
                this.emit('abandoned', error);
            }
            return this.viaFallback(verb.method, target, json, 'transport-error');
        }

        if (response.code === EMPTY_CODE) {
            const outcome = this.state.recordInconclusive();
            this.log.warn(`No answer on the compact channel (${outcome.consecutiveFailures} in a row)`);
            this.emit('inconclusive', outcome.consecutiveFailures);
            if (outcome.exhausted) {
                return this.viaFallback(verb.method, target, json, 'inconclusive');
            }
            throw new ConnectionTimeoutError(outcome.consecutiveFailures);
        }

        this.state.recordConclusive();
        return this.interpretCompactResponse(response);
    }

    /** Closes the compact channel and drops every listener. */
    close(): void {
        this.compact.close();
        this.removeAllListeners();
    }

    private sessionOptions(): CoapOption[] {
        const options: CoapOption[] = [];
        const token = this.state.accessToken;
        if (token !== undefined) {
            options.push(stringOption(OptionNumber.AccessToken, token));
        }
        options.push(uintOption(OptionNumber.CodecVersion, this.codec.version));
        return options;
    }

    /** Bounds a compact send by `requestTimeout`; running out counts as no answer. */
    private async sendWithTimeout(request: CompactRequest): Promise<CompactResponse> {
        const controller = new AbortController();
        let timer: ReturnType<typeof setTimeout> | undefined;
        const expired = new Promise<CompactResponse>((resolve) => {
            timer = setTimeout(() => {
                controller.abort();
                resolve(EMPTY_RESPONSE);
            }, this.config.requestTimeout);
        });
        try {
            return await Promise.race([this.compact.send(request, { signal: controller.signal }), expired]);
        } finally {
            clearTimeout(timer);
        }
    }

    private interpretCompactResponse(response: CompactResponse): JsonObject {
        const status = toHttpStatus(response.code);

        if (isServerError(response.code)) {
            throw new TransportFailureError(
                `Compact request failed with ${formatCode(response.code)}`,
                status,
                this.describePayload(response.payload)
            );
        }

        let body: JsonObject;
        try {
            body = response.payload.length === 0 ? {} : this.codec.decode(response.payload);
        } catch (error) {
            const text = tryDecodeText(response.payload);
            throw new TransportFailureError(
                `Undecodable ${formatCode(response.code)} response`,
                status,
                text ? truncate(text) : undefined,
                error
            );
        }

        if (isClientError(response.code)) {
            throw toProtocolError(status, body);
        }
        return body;
    }

    /** Best-effort text of an error body: decoded JSON, else raw UTF-8. */
    private describePayload(payload: Uint8Array): string | undefined {
        if (payload.length === 0) return undefined;
        try {
            return truncate(JSON.stringify(this.codec.decode(payload)));
        } catch {
            const text = tryDecodeText(payload);
            return text ? truncate(text) : undefined;
        }
    }

    private async viaFallback(
        method: HttpMethod,
        url: string,
        json: JsonObject | undefined,
        reason: FallbackReason,
        cause?: LowBandwidthError
    ): Promise<JsonObject> {
        this.log.info(`Falling back to HTTP (${reason}): ${method} ${url}`);
        this.emit('fallback', reason, url, cause);
        const response = await this.fallback.sendRaw(method, url, json, this.state.accessToken !== undefined);
        return interpretFallbackResponse(response);
    }
}
