import { describe, it, expect } from 'vitest';
import {
    MessageType,
    OptionNumber,
    RequestCode,
    blockOption,
    decodeMessage,
    encodeMessage,
    formatCode,
    getOptions,
    isClientError,
    isServerError,
    readBlock,
    readString,
    readUint,
    stringOption,
    uintOption,
    type CoapMessage,
} from './CoapMessage';
import { MessageError } from '../errors';

function hex(bytes: Uint8Array): string {
    return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join(' ');
}

function message(overrides: Partial<CoapMessage>): CoapMessage {
    return {
        type: MessageType.Confirmable,
        code: RequestCode.Get,
        messageId: 0x1234,
        token: new Uint8Array(0),
        options: [],
        payload: new Uint8Array(0),
        ...overrides,
    };
}

describe('encodeMessage', () => {
    it('writes header, token and a Uri-Path option', () => {
        const bytes = encodeMessage(message({
            token: new Uint8Array([0xaa]),
            options: [stringOption(OptionNumber.UriPath, 'a')],
        }));
        expect(hex(bytes)).toBe('41 01 12 34 aa b1 61');
    });

    it('adds the payload marker only with a payload', () => {
        const bytes = encodeMessage(message({
            code: RequestCode.Post,
            options: [
                uintOption(OptionNumber.ContentFormat, 60),
                stringOption(OptionNumber.UriPath, 'a'),
            ],
            payload: new Uint8Array([0x01]),
        }));
        expect(hex(bytes)).toBe('40 02 12 34 b1 61 11 3c ff 01');
    });

    it('uses extended deltas for session options', () => {
        const bytes = encodeMessage(message({
            type: MessageType.NonConfirmable,
            code: RequestCode.Post,
            messageId: 1,
            options: [
                stringOption(OptionNumber.AccessToken, 'tok'),
                uintOption(OptionNumber.CodecVersion, 1),
            ],
        }));
        expect(hex(bytes)).toBe('50 02 00 01 d3 f3 74 6f 6b 11 01');
    });

    it('keeps repeated options in request order', () => {
        const decoded = decodeMessage(encodeMessage(message({
            options: [
                stringOption(OptionNumber.UriQuery, 'q=1'),
                stringOption(OptionNumber.UriPath, 'K'),
                stringOption(OptionNumber.UriPath, '!room:example.com'),
            ],
        })));
        expect(decoded.options.map(o => [o.number, readString(o.value)])).toEqual([
            [11, 'K'],
            [11, '!room:example.com'],
            [15, 'q=1'],
        ]);
    });

    it('rejects tokens longer than 8 bytes', () => {
        expect(() => encodeMessage(message({ token: new Uint8Array(9) }))).toThrow(MessageError);
    });
});

describe('decodeMessage', () => {
    it('reads a piggybacked response', () => {
        const decoded = decodeMessage(new Uint8Array([0x61, 0x45, 0x00, 0x07, 0xbe, 0xff, 0xa0]));
        expect(decoded.type).toBe(MessageType.Acknowledgement);
        expect(decoded.code).toBe(0x45);
        expect(decoded.messageId).toBe(7);
        expect(Array.from(decoded.token)).toEqual([0xbe]);
        expect(decoded.options).toEqual([]);
        expect(Array.from(decoded.payload)).toEqual([0xa0]);
    });

    it('reads options with two-byte extended lengths', () => {
        const long = 'x'.repeat(300);
        const decoded = decodeMessage(encodeMessage(message({
            options: [stringOption(2000, long)],
        })));
        expect(decoded.options).toHaveLength(1);
        expect(decoded.options[0]?.number).toBe(2000);
        expect(readString(decoded.options[0]?.value ?? new Uint8Array(0))).toBe(long);
    });

    it('rejects an unsupported version', () => {
        expect(() => decodeMessage(new Uint8Array([0x01, 0x01, 0x00, 0x00]))).toThrow('CoAP: unsupported version 0');
    });

    it('rejects a reserved token length', () => {
        expect(() => decodeMessage(new Uint8Array([0x49, 0x01, 0x00, 0x00]))).toThrow('CoAP: token length 9 is reserved');
    });

    it('rejects a truncated header', () => {
        expect(() => decodeMessage(new Uint8Array([0x41, 0x01, 0x00]))).toThrow('CoAP: unexpected end of datagram');
    });

    it('rejects a payload marker without payload', () => {
        expect(() => decodeMessage(new Uint8Array([0x40, 0x45, 0x00, 0x01, 0xff]))).toThrow(
            'CoAP: payload marker without payload'
        );
    });

    it('rejects the reserved nibble 15', () => {
        expect(() => decodeMessage(new Uint8Array([0x40, 0x45, 0x00, 0x01, 0xf1, 0x00]))).toThrow(
            'CoAP: reserved option nibble 15'
        );
    });

    it('keeps the raw datagram on the error', () => {
        const raw = new Uint8Array([0x00]);
        try {
            decodeMessage(raw);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(MessageError);
            if (error instanceof MessageError) {
                expect(error.rawMessage).toBe(raw);
            }
        }
    });
});

describe('codes', () => {
    it('formats class.detail', () => {
        expect(formatCode(0x45)).toBe('2.05');
        expect(formatCode(0x84)).toBe('4.04');
        expect(formatCode(0xa0)).toBe('5.00');
    });

    it('classifies client and server errors', () => {
        expect(isServerError(0xa0)).toBe(true);
        expect(isServerError(0x84)).toBe(false);
        expect(isClientError(0x80)).toBe(true);
        expect(isClientError(0x9f)).toBe(true);
        expect(isClientError(0xa0)).toBe(false);
        expect(isClientError(0x45)).toBe(false);
    });
});

describe('options', () => {
    it('writes unsigned integers in the shortest form', () => {
        expect(Array.from(uintOption(12, 0).value)).toEqual([]);
        expect(Array.from(uintOption(12, 60).value)).toEqual([0x3c]);
        expect(Array.from(uintOption(12, 300).value)).toEqual([0x01, 0x2c]);
        expect(readUint(uintOption(12, 300).value)).toBe(300);
    });

    it('rejects negative or fractional integers', () => {
        expect(() => uintOption(12, -1)).toThrow(MessageError);
        expect(() => uintOption(12, 1.5)).toThrow(MessageError);
    });

    it('packs block options', () => {
        const option = blockOption(OptionNumber.Block2, { num: 2, more: true, szx: 6 });
        expect(Array.from(option.value)).toEqual([0x2e]);
        expect(readBlock(option.value)).toEqual({ num: 2, more: true, szx: 6 });
    });

    it('filters options by number', () => {
        const msg = message({
            options: [stringOption(OptionNumber.UriPath, 'a'), uintOption(OptionNumber.Block2, 0)],
        });
        expect(getOptions(msg, OptionNumber.Block2)).toHaveLength(1);
        expect(getOptions(msg, OptionNumber.UriQuery)).toEqual([]);
    });
});
