/**
 * Error types for the low-bandwidth transport.
 *
 * Every failure the adapter can surface carries a stable `code`, so callers
 * can branch on the kind of failure without string-matching messages.
 */

/**
 * Base class for all low-bandwidth transport errors.
 */
export class LowBandwidthError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'LowBandwidthError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, LowBandwidthError);
        }
    }
}

/**
 * Thrown when adapter configuration or a dictionary table is invalid.
 */
export class ConfigurationError extends LowBandwidthError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when `doRequest` is called with a method the compact transport has no verb for.
 */
export class UnknownTransportVerbError extends LowBandwidthError {
    constructor(public readonly method: string) {
        super(`Unknown transport verb: ${method}`, 'UNKNOWN_TRANSPORT_VERB');
        this.name = 'UnknownTransportVerbError';
    }
}

/**
 * An encoded body larger than the compact transport accepts.
 * Reported through the adapter's `fallback` event; never thrown to callers.
 */
export class OversizedPayloadError extends LowBandwidthError {
    constructor(public readonly size: number, public readonly limit: number) {
        super(`Encoded payload is ${size} bytes, limit is ${limit}`, 'OVERSIZED_PAYLOAD');
        this.name = 'OversizedPayloadError';
    }
}

/**
 * The compact channel gave no conclusive answer. The caller may retry.
 */
export class ConnectionTimeoutError extends LowBandwidthError {
    public readonly isRetryable = true;

    constructor(public readonly consecutiveFailures: number) {
        super(
            `Compact transport timed out (${consecutiveFailures} consecutive inconclusive responses)`,
            'CONNECTION_TIMEOUT'
        );
        this.name = 'ConnectionTimeoutError';
    }
}

/**
 * A binary object that is not exactly one well-formed top-level map.
 */
export class InvalidFrameError extends LowBandwidthError {
    constructor(message: string, public readonly cause?: unknown) {
        super(message, 'INVALID_FRAME');
        this.name = 'InvalidFrameError';
    }
}

/**
 * A malformed compact-transport datagram.
 */
export class MessageError extends LowBandwidthError {
    constructor(message: string, public readonly rawMessage?: Uint8Array) {
        super(message, 'MESSAGE_ERROR');
        this.name = 'MessageError';
    }
}

/**
 * A server-error status, an undecodable body, or a fallback request that never got an answer.
 */
export class TransportFailureError extends LowBandwidthError {
    constructor(
        message: string,
        public readonly status?: number,
        public readonly body?: string,
        public readonly cause?: unknown
    ) {
        super(body ? `${message} - ${body}` : message, 'TRANSPORT_FAILURE');
        this.name = 'TransportFailureError';
    }
}

/**
 * Standard error codes of the chat protocol's client-server API.
 */
export const KNOWN_ERRCODES = [
    'M_UNKNOWN',
    'M_UNKNOWN_TOKEN',
    'M_NOT_FOUND',
    'M_FORBIDDEN',
    'M_LIMIT_EXCEEDED',
    'M_USER_IN_USE',
    'M_THREEPID_IN_USE',
    'M_THREEPID_DENIED',
    'M_THREEPID_NOT_FOUND',
    'M_THREEPID_AUTH_FAILED',
    'M_TOO_LARGE',
    'M_MISSING_PARAM',
    'M_UNSUPPORTED_ROOM_VERSION',
    'M_UNRECOGNIZED',
] as const;

export type KnownErrcode = (typeof KNOWN_ERRCODES)[number];

/**
 * A structured error body returned with a client-error status.
 */
export class ProtocolError extends LowBandwidthError {
    constructor(
        public readonly status: number,
        public readonly errcode: string,
        public readonly error: string,
        public readonly raw: Record<string, unknown>,
        public readonly retryAfterMs?: number
    ) {
        super(`${errcode}: ${error}`, 'PROTOCOL_ERROR');
        this.name = 'ProtocolError';
    }

    isKnownErrcode(): boolean {
        return (KNOWN_ERRCODES as readonly string[]).includes(this.errcode);
    }
}
