/**
 * matrix-lowbandwidth - compact transport for chat-protocol REST calls
 *
 * Requests travel as CoAP datagrams with CBOR bodies whose well-known keys
 * and endpoint paths are replaced by short codes. Whenever that channel is
 * unfit for a call, or gone, the call is made over plain HTTP instead.
 *
 * @example
 * ```typescript
 * import { LowBandwidthAdapter, FetchFallbackTransport } from 'matrix-lowbandwidth';
 *
 * const adapter = new LowBandwidthAdapter(
 *   { host: 'chat.example.org', port: 5683, accessToken: 'test-secret' },
 *   { fallback: new FetchFallbackTransport({ tokenProvider: () => adapter.accessToken }) }
 * );
 *
 * const body = await adapter.doRequest('GET', 'https://chat.example.org/_matrix/client/versions');
 * ```
 *
 * @packageDocumentation
 */

export {
    LowBandwidthAdapter,
    interpretFallbackResponse,
    toHttpStatus,
    toTransportVerb,
} from './adapter/LowBandwidthAdapter';
export type { AdapterDependencies, TransportVerb } from './adapter/LowBandwidthAdapter';
export { SessionState } from './adapter/SessionState';
export type { InconclusiveOutcome } from './adapter/SessionState';

// Dictionaries
export { KeyDictionary, KEY_GENERATIONS, LATEST_KEY_VERSION } from './dictionary/KeyDictionary';
export { PathDictionary, PATH_GENERATIONS, LATEST_PATH_VERSION } from './dictionary/PathDictionary';
export type { Generation } from './dictionary/generations';

// Codec and paths
export { CompactCodec } from './codec/CompactCodec';
export { PathMatcher, toPathSegments } from './path/PathMatcher';
export type { PathMatch } from './path/PathMatcher';

// Transports
export { UdpCoapTransport } from './transport/UdpCoapTransport';
export type { UdpCoapTransportConfig } from './transport/UdpCoapTransport';
export { FetchFallbackTransport } from './transport/FetchFallbackTransport';
export type { FetchFallbackTransportConfig } from './transport/FetchFallbackTransport';
export { EMPTY_RESPONSE } from './transport/Transport';
export type {
    CompactRequest,
    CompactResponse,
    CompactTransport,
    FallbackTransport,
    RawResponse,
    SendOptions,
} from './transport/Transport';

// Config
export {
    LowBandwidthConfigSchema,
    parseConfig,
    DEFAULT_MAX_INCONCLUSIVE_RESPONSES,
    DEFAULT_MAX_MESSAGE_SIZE,
    DEFAULT_REQUEST_TIMEOUT,
} from './config';
export type { LowBandwidthConfig, ResolvedConfig } from './config';

// Types
export type {
    JsonPrimitive,
    JsonValue,
    JsonObject,
    HttpMethod,
    FallbackReason,
    AdapterMode,
    AdapterSnapshot,
    AdapterEvents,
} from './types';

// Errors
export {
    LowBandwidthError,
    ConfigurationError,
    UnknownTransportVerbError,
    ConnectionTimeoutError,
    InvalidFrameError,
    MessageError,
    TransportFailureError,
    ProtocolError,
    KNOWN_ERRCODES,
} from './errors';
export type { KnownErrcode } from './errors';

// Utilities
export { Logger, LogLevel, logger } from './utils/Logger';
export type { LogSink } from './utils/Logger';
export { EventEmitter } from './utils/EventEmitter';
export { debugPacket, hexDump, formatBytes } from './debug';
