/**
 * @file CoapMessage.ts
 * @brief CoAP (RFC 7252) datagram framing for the compact channel.
 *
 * Wire layout:
 *
 *   BYTE 0:  [VV TT KKKK]  version (always 1), type, token length
 *   BYTE 1:  code           class (3 bits) . detail (5 bits)
 *   BYTE 2-3: message id    big endian
 *   NEXT:    token          0-8 bytes
 *   NEXT:    options        ascending by number, each [DDDD LLLL] delta/length
 *                           nibbles with 13 → +1 byte, 14 → +2 bytes extensions
 *   NEXT:    0xFF payload marker, then payload (only when non-empty)
 */

import { MessageError } from '../errors';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

const COAP_VERSION = 1;
const PAYLOAD_MARKER = 0xff;
const MAX_TOKEN_LENGTH = 8;

export enum MessageType {
    Confirmable = 0,
    NonConfirmable = 1,
    Acknowledgement = 2,
    Reset = 3,
}

/** Request method codes (class 0). */
export enum RequestCode {
    Get = 0x01,
    Post = 0x02,
    Put = 0x03,
    Delete = 0x04,
}

export const EMPTY_CODE = 0x00;

export enum OptionNumber {
    UriPath = 11,
    ContentFormat = 12,
    UriQuery = 15,
    Block2 = 23,
    /** Access token, announced once per session */
    AccessToken = 256,
    /** Key dictionary version, announced once per session */
    CodecVersion = 257,
}

/** Content-Format registry value for `application/cbor`. */
export const CONTENT_FORMAT_CBOR = 60;

export interface CoapOption {
    number: number;
    value: Uint8Array;
}

export interface CoapMessage {
    type: MessageType;
    code: number;
    messageId: number;
    token: Uint8Array;
    options: CoapOption[];
    payload: Uint8Array;
}

// =============================================================================
// Codes
// =============================================================================

export function codeClass(code: number): number {
    return code >> 5;
}

export function codeDetail(code: number): number {
    return code & 0x1f;
}

/** `0x45` → `"2.05"` */
export function formatCode(code: number): string {
    return `${codeClass(code)}.${String(codeDetail(code)).padStart(2, '0')}`;
}

export function isServerError(code: number): boolean {
    return codeClass(code) >= 5;
}

export function isClientError(code: number): boolean {
    return codeClass(code) === 4;
}

// =============================================================================
// Options
// =============================================================================

export function stringOption(number: number, value: string): CoapOption {
    return { number, value: textEncoder.encode(value) };
}

/** Unsigned integer option in the shortest big-endian form (0 is zero-length). */
export function uintOption(number: number, value: number): CoapOption {
    if (!Number.isInteger(value) || value < 0) {
        throw new MessageError(`Option ${number} needs a non-negative integer, got ${value}`);
    }
    const bytes: number[] = [];
    let rest = value;
    while (rest > 0) {
        bytes.unshift(rest % 256);
        rest = Math.floor(rest / 256);
    }
    return { number, value: Uint8Array.from(bytes) };
}

export function readUint(value: Uint8Array): number {
    let result = 0;
    for (const byte of value) {
        result = result * 256 + byte;
    }
    return result;
}

export function readString(value: Uint8Array): string {
    return textDecoder.decode(value);
}

export function getOptions(message: CoapMessage, number: number): CoapOption[] {
    return message.options.filter(option => option.number === number);
}

export interface BlockOption {
    num: number;
    more: boolean;
    /** Block size exponent: size = 2 ** (szx + 4) */
    szx: number;
}

export function blockOption(number: number, block: BlockOption): CoapOption {
    return uintOption(number, block.num * 16 + (block.more ? 8 : 0) + block.szx);
}

export function readBlock(value: Uint8Array): BlockOption {
    const raw = readUint(value);
    return { num: Math.floor(raw / 16), more: (raw & 0x08) !== 0, szx: raw & 0x07 };
}

// =============================================================================
// Encoder
// =============================================================================

class BufferWriter {
    private buf: Uint8Array;
    private offset = 0;

    constructor(initialSize: number = 64) {
        this.buf = new Uint8Array(initialSize);
    }

    private ensure(bytes: number): void {
        if (this.offset + bytes > this.buf.length) {
            const next = new Uint8Array(Math.max(this.buf.length * 2, this.offset + bytes));
            next.set(this.buf);
            this.buf = next;
        }
    }

    writeByte(value: number): void {
        this.ensure(1);
        this.buf[this.offset++] = value & 0xff;
    }

    writeUint16(value: number): void {
        this.writeByte(value >> 8);
        this.writeByte(value);
    }

    writeBytes(bytes: Uint8Array): void {
        this.ensure(bytes.length);
        this.buf.set(bytes, this.offset);
        this.offset += bytes.length;
    }

    finish(): Uint8Array {
        return this.buf.slice(0, this.offset);
    }
}

function nibble(value: number): number {
    if (value < 13) return value;
    if (value < 269) return 13;
    return 14;
}

function writeExtended(writer: BufferWriter, value: number): void {
    if (value >= 269) {
        writer.writeUint16(value - 269);
    } else if (value >= 13) {
        writer.writeByte(value - 13);
    }
}

export function encodeMessage(message: CoapMessage): Uint8Array {
    if (message.token.length > MAX_TOKEN_LENGTH) {
        throw new MessageError(`Token is ${message.token.length} bytes, max is ${MAX_TOKEN_LENGTH}`);
    }
    const writer = new BufferWriter(16 + message.payload.length);
    writer.writeByte((COAP_VERSION << 6) | (message.type << 4) | message.token.length);
    writer.writeByte(message.code);
    writer.writeUint16(message.messageId);
    writer.writeBytes(message.token);

    // Stable sort keeps repeated options (Uri-Path, Uri-Query) in request order.
    const options = [...message.options].sort((a, b) => a.number - b.number);
    let previous = 0;
    for (const option of options) {
        const delta = option.number - previous;
        const length = option.value.length;
        writer.writeByte((nibble(delta) << 4) | nibble(length));
        writeExtended(writer, delta);
        writeExtended(writer, length);
        writer.writeBytes(option.value);
        previous = option.number;
    }

    if (message.payload.length > 0) {
        writer.writeByte(PAYLOAD_MARKER);
        writer.writeBytes(message.payload);
    }
    return writer.finish();
}

// =============================================================================
// Decoder
// =============================================================================

class BufferReader {
    private offset = 0;

    constructor(private readonly buf: Uint8Array) { }

    get remaining(): number {
        return this.buf.length - this.offset;
    }

    readByte(): number {
        const value = this.buf[this.offset];
        if (value === undefined) throw new MessageError('CoAP: unexpected end of datagram', this.buf);
        this.offset++;
        return value;
    }

    readUint16(): number {
        return (this.readByte() << 8) | this.readByte();
    }

    readBytes(length: number): Uint8Array {
        if (this.offset + length > this.buf.length) {
            throw new MessageError('CoAP: unexpected end of datagram', this.buf);
        }
        const bytes = this.buf.slice(this.offset, this.offset + length);
        this.offset += length;
        return bytes;
    }

    readRest(): Uint8Array {
        return this.readBytes(this.remaining);
    }
}

function readExtended(reader: BufferReader, nib: number, data: Uint8Array): number {
    if (nib < 13) return nib;
    if (nib === 13) return reader.readByte() + 13;
    if (nib === 14) return reader.readUint16() + 269;
    throw new MessageError('CoAP: reserved option nibble 15', data);
}

/**
 * @throws {MessageError} on a malformed datagram
 */
export function decodeMessage(data: Uint8Array): CoapMessage {
    const reader = new BufferReader(data);
    const first = reader.readByte();
    const version = first >> 6;
    if (version !== COAP_VERSION) {
        throw new MessageError(`CoAP: unsupported version ${version}`, data);
    }
    const type: MessageType = (first >> 4) & 0x03;
    const tokenLength = first & 0x0f;
    if (tokenLength > MAX_TOKEN_LENGTH) {
        throw new MessageError(`CoAP: token length ${tokenLength} is reserved`, data);
    }
    const code = reader.readByte();
    const messageId = reader.readUint16();
    const token = reader.readBytes(tokenLength);

    const options: CoapOption[] = [];
    let payload = new Uint8Array(0);
    let number = 0;
    while (reader.remaining > 0) {
        const header = reader.readByte();
        if (header === PAYLOAD_MARKER) {
            if (reader.remaining === 0) {
                throw new MessageError('CoAP: payload marker without payload', data);
            }
            payload = reader.readRest();
            break;
        }
        number += readExtended(reader, header >> 4, data);
        const length = readExtended(reader, header & 0x0f, data);
        options.push({ number, value: reader.readBytes(length) });
    }

    return { type, code, messageId, token, options, payload };
}
