/**
 * @file debug.ts
 * @brief Debug utilities for compact-channel datagrams.
 *
 * Helpers for looking at raw CoAP frames and their CBOR bodies while a
 * compact link misbehaves. Development use only.
 *
 * @example
 * ```typescript
 * import { debugPacket } from 'matrix-lowbandwidth';
 *
 * socket.on('message', (data) => {
 *     if (DEBUG_MODE) {
 *         console.log(debugPacket(data));
 *     }
 * });
 * ```
 */

import {
    decodeMessage,
    formatCode,
    MessageType,
    OptionNumber,
    readString,
    readUint,
    type CoapMessage,
} from './coap/CoapMessage';
import { CompactCodec } from './codec/CompactCodec';

const TEXT_OPTIONS = new Set<number>([OptionNumber.UriPath, OptionNumber.UriQuery]);

/**
 * Converts a CoAP datagram to a human-readable description.
 * Falls back to a hex dump when the bytes are not a CoAP message.
 */
export function debugPacket(data: ArrayBuffer | Uint8Array, codec: CompactCodec = new CompactCodec()): string {
    const bytes = data instanceof ArrayBuffer ? new Uint8Array(data) : data;

    if (bytes.length === 0) {
        return '[Empty Packet]';
    }

    let message: CoapMessage;
    try {
        message = decodeMessage(bytes);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return [`[Packet: ${bytes.length} bytes, not CoAP: ${reason}]`, hexDump(bytes)].join('\n');
    }

    const lines: string[] = [
        `[Packet: ${bytes.length} bytes]`,
        `  ${MessageType[message.type]} ${formatCode(message.code)} mid=${message.messageId} token=${toHex(message.token) || '-'}`,
    ];

    for (const option of message.options) {
        lines.push(`  Option ${describeOption(option.number)}: ${describeValue(option.number, option.value)}`);
    }

    if (message.payload.length > 0) {
        lines.push(`  Payload: ${formatBytes(message.payload.length)}`);
        try {
            lines.push(`  Body: ${JSON.stringify(codec.decode(message.payload))}`);
        } catch {
            lines.push(hexDump(message.payload));
        }
    }

    return lines.join('\n');
}

function describeOption(number: number): string {
    const name = OptionNumber[number];
    return name ? `${name}(${number})` : String(number);
}

function describeValue(number: number, value: Uint8Array): string {
    if (number === OptionNumber.AccessToken) return `<redacted:${value.length}>`;
    if (TEXT_OPTIONS.has(number)) return JSON.stringify(readString(value));
    if (number === OptionNumber.ContentFormat || number === OptionNumber.CodecVersion) {
        return String(readUint(value));
    }
    return toHex(value) || '(empty)';
}

function toHex(bytes: Uint8Array): string {
    return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}

/**
 * Creates a hex dump of binary data (like xxd/hexdump).
 *
 * @param bytesPerLine - Bytes per line (default: 16)
 */
export function hexDump(data: ArrayBuffer | Uint8Array, bytesPerLine: number = 16): string {
    const bytes = data instanceof ArrayBuffer ? new Uint8Array(data) : data;

    if (bytes.length === 0) return '(empty)';

    const lines: string[] = [];
    for (let i = 0; i < bytes.length; i += bytesPerLine) {
        const slice = bytes.subarray(i, Math.min(i + bytesPerLine, bytes.length));
        const hex = Array.from(slice).map(b => b.toString(16).padStart(2, '0')).join(' ');
        const ascii = bytesToAscii(slice);
        const offset = i.toString(16).padStart(8, '0');
        lines.push(`${offset}  ${hex.padEnd(bytesPerLine * 3 - 1)}  |${ascii}|`);
    }

    return lines.join('\n');
}

/**
 * Converts bytes to ASCII, replacing non-printable characters with dots.
 */
function bytesToAscii(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map(b => (b >= 32 && b <= 126) ? String.fromCharCode(b) : '.')
        .join('');
}

export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

/**
 * Parses hex text such as `a1 02 61 78` or `a1026178` into bytes.
 * @throws {Error} on an odd digit count or a non-hex character
 */
export function parseHex(text: string): Uint8Array {
    const digits = text.replace(/\s+/g, '');
    if (digits.length % 2 !== 0 || /[^0-9a-fA-F]/.test(digits)) {
        throw new Error(`Not a hex string: ${text}`);
    }
    const bytes = new Uint8Array(digits.length / 2);
    for (let i = 0; i < bytes.length; i++) {
        bytes[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
    }
    return bytes;
}
