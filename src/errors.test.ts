import { describe, it, expect } from 'vitest';
import {
    LowBandwidthError,
    ConfigurationError,
    UnknownTransportVerbError,
    OversizedPayloadError,
    ConnectionTimeoutError,
    InvalidFrameError,
    MessageError,
    TransportFailureError,
    ProtocolError,
} from './errors';

describe('Errors', () => {
    it('LowBandwidthError carries message and code', () => {
        const error = new LowBandwidthError('test message', 'TEST_CODE');
        expect(error).toBeInstanceOf(Error);
        expect(error.message).toBe('test message');
        expect(error.code).toBe('TEST_CODE');
        expect(error.name).toBe('LowBandwidthError');
    });

    it('ConfigurationError', () => {
        const error = new ConfigurationError('bad config');
        expect(error).toBeInstanceOf(LowBandwidthError);
        expect(error.code).toBe('CONFIGURATION_ERROR');
        expect(error.name).toBe('ConfigurationError');
    });

    it('UnknownTransportVerbError names the method', () => {
        const error = new UnknownTransportVerbError('PATCH');
        expect(error.method).toBe('PATCH');
        expect(error.message).toBe('Unknown transport verb: PATCH');
        expect(error.code).toBe('UNKNOWN_TRANSPORT_VERB');
    });

    it('OversizedPayloadError reports size and limit', () => {
        const error = new OversizedPayloadError(2048, 1024);
        expect(error.message).toBe('Encoded payload is 2048 bytes, limit is 1024');
        expect(error.size).toBe(2048);
        expect(error.limit).toBe(1024);
    });

    it('ConnectionTimeoutError is retryable', () => {
        const error = new ConnectionTimeoutError(2);
        expect(error.isRetryable).toBe(true);
        expect(error.consecutiveFailures).toBe(2);
        expect(error.message).toBe('Compact transport timed out (2 consecutive inconclusive responses)');
        expect(error.code).toBe('CONNECTION_TIMEOUT');
    });

    it('InvalidFrameError keeps its cause', () => {
        const cause = new Error('truncated');
        const error = new InvalidFrameError('Invalid CBOR frame: truncated', cause);
        expect(error.cause).toBe(cause);
        expect(error.code).toBe('INVALID_FRAME');
    });

    it('MessageError keeps the raw datagram', () => {
        const raw = new Uint8Array([0x00]);
        const error = new MessageError('CoAP: unsupported version 0', raw);
        expect(error.rawMessage).toBe(raw);
        expect(error.code).toBe('MESSAGE_ERROR');
    });

    describe('TransportFailureError', () => {
        it('appends the body to the message', () => {
            const error = new TransportFailureError('Fallback request failed with status 502', 502, 'Bad Gateway');
            expect(error.message).toBe('Fallback request failed with status 502 - Bad Gateway');
            expect(error.status).toBe(502);
            expect(error.body).toBe('Bad Gateway');
        });

        it('keeps the message alone without a body', () => {
            const error = new TransportFailureError('GET https://a.test/ failed: offline');
            expect(error.message).toBe('GET https://a.test/ failed: offline');
            expect(error.status).toBeUndefined();
        });
    });

    describe('ProtocolError', () => {
        it('formats errcode and error', () => {
            const raw = { errcode: 'M_FORBIDDEN', error: 'You are not invited' };
            const error = new ProtocolError(403, 'M_FORBIDDEN', 'You are not invited', raw);
            expect(error.message).toBe('M_FORBIDDEN: You are not invited');
            expect(error.status).toBe(403);
            expect(error.raw).toBe(raw);
            expect(error.retryAfterMs).toBeUndefined();
        });

        it('recognises standard error codes', () => {
            expect(new ProtocolError(429, 'M_LIMIT_EXCEEDED', 'slow down', {}, 500).isKnownErrcode()).toBe(true);
            expect(new ProtocolError(400, 'X_CUSTOM', 'custom', {}).isKnownErrcode()).toBe(false);
        });
    });
});
