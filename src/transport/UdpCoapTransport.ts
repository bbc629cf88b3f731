import { createSocket, type Socket, type SocketType } from 'dgram';
import { randomBytes } from 'crypto';
import {
    CONTENT_FORMAT_CBOR,
    EMPTY_CODE,
    MessageType,
    OptionNumber,
    blockOption,
    decodeMessage,
    encodeMessage,
    formatCode,
    getOptions,
    readBlock,
    stringOption,
    uintOption,
    type CoapMessage,
    type CoapOption,
} from '../coap/CoapMessage';
import { logger as rootLogger, type Logger } from '../utils/Logger';
import {
    EMPTY_RESPONSE,
    type CompactRequest,
    type CompactResponse,
    type CompactTransport,
    type SendOptions,
} from './Transport';

export interface UdpCoapTransportConfig {
    host: string;
    port: number;
    socketType?: SocketType;
    /** Initial retransmission timeout in ms (default: 2000) */
    ackTimeout?: number;
    /** Upper bound of the random spread applied to ackTimeout (default: 1.5) */
    ackRandomFactor?: number;
    /** Retransmissions before a request counts as unanswered (default: 4) */
    maxRetransmit?: number;
    /** Upper bound on Block2 pieces reassembled into one response (default: 256) */
    maxBlocks?: number;
    logger?: Logger;
}

interface PendingExchange {
    messageId: number;
    acknowledge(): void;
    complete(message: CoapMessage | null): void;
    fail(error: Error): void;
}

const SESSION_OPTIONS = new Set<number>([OptionNumber.AccessToken, OptionNumber.CodecVersion]);

function tokenKey(token: Uint8Array): string {
    return Buffer.from(token).toString('hex');
}

function concat(chunks: Uint8Array[]): Uint8Array {
    const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
        out.set(chunk, offset);
        offset += chunk.length;
    }
    return out;
}

/**
 * Builds the option list for a compact request. Session metadata is left
 * out of Block2 follow-ups, which belong to an exchange the peer already knows.
 */
export function buildRequestOptions(request: CompactRequest, followUp: CoapOption[] = []): CoapOption[] {
    const options: CoapOption[] = [
        ...request.path.map(segment => stringOption(OptionNumber.UriPath, segment)),
        ...request.query.map(entry => stringOption(OptionNumber.UriQuery, entry)),
    ];
    if (request.payload && request.payload.length > 0) {
        options.push(uintOption(OptionNumber.ContentFormat, request.contentFormat ?? CONTENT_FORMAT_CBOR));
    }
    const extra = followUp.length > 0
        ? request.options.filter(option => !SESSION_OPTIONS.has(option.number))
        : request.options;
    return [...options, ...extra, ...followUp];
}

/**
 * CoAP over UDP: confirmable requests, retransmitted with exponential
 * back-off until acknowledged, piggybacked or separate responses, and
 * Block2 reassembly for responses larger than one datagram.
 */
export class UdpCoapTransport implements CompactTransport {
    private socket: Socket | null = null;
    private readonly pending = new Map<string, PendingExchange>();
    private nextMessageId: number;
    private readonly log: Logger;
    private readonly ackTimeout: number;
    private readonly ackRandomFactor: number;
    private readonly maxRetransmit: number;
    private readonly maxBlocks: number;

    constructor(private readonly config: UdpCoapTransportConfig) {
        this.ackTimeout = config.ackTimeout ?? 2000;
        this.ackRandomFactor = config.ackRandomFactor ?? 1.5;
        this.maxRetransmit = config.maxRetransmit ?? 4;
        this.maxBlocks = config.maxBlocks ?? 256;
        this.log = (config.logger ?? rootLogger).child('UDP');
        this.nextMessageId = randomBytes(2).readUInt16BE(0);
    }

    public async send(request: CompactRequest, options: SendOptions = {}): Promise<CompactResponse> {
        const chunks: Uint8Array[] = [];
        let followUp: CoapOption[] = [];

        for (let blocks = 0; blocks < this.maxBlocks; blocks++) {
            const response = await this.exchange(request, followUp, options.signal);
            if (!response || response.code === EMPTY_CODE) {
                return EMPTY_RESPONSE;
            }

            const [block2] = getOptions(response, OptionNumber.Block2);
            if (!block2) {
                return { code: response.code, payload: concat([...chunks, response.payload]) };
            }

            const block = readBlock(block2.value);
            if (block.num !== blocks) {
                this.log.warn(`Expected block ${blocks}, got ${block.num}; dropping response`);
                return EMPTY_RESPONSE;
            }
            chunks.push(response.payload);
            if (!block.more) {
                return { code: response.code, payload: concat(chunks) };
            }
            followUp = [blockOption(OptionNumber.Block2, { num: block.num + 1, more: false, szx: block.szx })];
        }

        this.log.warn(`Response exceeded ${this.maxBlocks} blocks; dropping it`);
        return EMPTY_RESPONSE;
    }

    public close(): void {
        for (const exchange of Array.from(this.pending.values())) {
            exchange.complete(null);
        }
        this.pending.clear();
        if (this.socket) {
            this.socket.removeAllListeners();
            this.socket.close();
            this.socket = null;
        }
    }

    private exchange(
        request: CompactRequest,
        followUp: CoapOption[],
        signal: AbortSignal | undefined
    ): Promise<CoapMessage | null> {
        const socket = this.ensureSocket();
        const token = randomBytes(4);
        const key = tokenKey(token);
        const messageId = this.allocateMessageId();
        const datagram = encodeMessage({
            type: MessageType.Confirmable,
            code: request.code,
            messageId,
            token,
            options: buildRequestOptions(request, followUp),
            payload: request.payload ?? new Uint8Array(0),
        });

        return new Promise<CoapMessage | null>((resolve, reject) => {
            if (signal?.aborted) {
                resolve(null);
                return;
            }

            let attempts = 0;
            let acknowledged = false;
            let timeout = this.ackTimeout * (1 + Math.random() * (this.ackRandomFactor - 1));
            let timer: ReturnType<typeof setTimeout> | undefined;

            const cleanup = () => {
                if (timer) clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                this.pending.delete(key);
            };
            const onAbort = () => {
                cleanup();
                resolve(null);
            };
            const transmit = () => {
                socket.send(datagram, this.config.port, this.config.host, (error) => {
                    if (error) {
                        cleanup();
                        reject(error);
                    }
                });
            };
            const onTimer = () => {
                if (acknowledged) return;
                if (attempts >= this.maxRetransmit) {
                    this.log.debug(`No acknowledgement for message ${messageId} after ${attempts} retransmissions`);
                    cleanup();
                    resolve(null);
                    return;
                }
                attempts++;
                timeout *= 2;
                this.log.debug(`Retransmitting message ${messageId} (attempt ${attempts})`);
                transmit();
                timer = setTimeout(onTimer, timeout);
            };

            signal?.addEventListener('abort', onAbort, { once: true });
            this.pending.set(key, {
                messageId,
                acknowledge: () => {
                    acknowledged = true;
                    if (timer) clearTimeout(timer);
                },
                complete: (message) => {
                    cleanup();
                    resolve(message);
                },
                fail: (error) => {
                    cleanup();
                    reject(error);
                },
            });

            transmit();
            timer = setTimeout(onTimer, timeout);
        });
    }

    private ensureSocket(): Socket {
        if (this.socket) return this.socket;

        const socket = createSocket(this.config.socketType ?? 'udp4');
        socket.on('message', (data) => this.handleDatagram(socket, data));
        socket.on('error', (error) => {
            this.log.error('Socket error', error);
            for (const exchange of Array.from(this.pending.values())) {
                exchange.fail(error);
            }
            this.close();
        });
        socket.unref();
        this.socket = socket;
        return socket;
    }

    private handleDatagram(socket: Socket, data: Buffer): void {
        let message: CoapMessage;
        try {
            message = decodeMessage(new Uint8Array(data));
        } catch (error) {
            this.log.warn('Dropping malformed datagram', error);
            return;
        }

        if (message.type === MessageType.Reset || (message.type === MessageType.Acknowledgement && message.code === EMPTY_CODE)) {
            const exchange = this.findByMessageId(message.messageId);
            if (!exchange) return;
            if (message.type === MessageType.Reset) {
                this.log.debug(`Message ${message.messageId} was reset by the peer`);
                exchange.complete(null);
            } else {
                exchange.acknowledge();
            }
            return;
        }

        const exchange = this.pending.get(tokenKey(message.token));
        if (message.type === MessageType.Confirmable) {
            // Separate response: acknowledge it, or reset it if nobody asked.
            this.reply(socket, exchange ? MessageType.Acknowledgement : MessageType.Reset, message.messageId);
        }
        if (!exchange) return;

        this.log.debug(`Response ${formatCode(message.code)} for message ${exchange.messageId}`);
        exchange.complete(message);
    }

    private reply(socket: Socket, type: MessageType, messageId: number): void {
        const datagram = encodeMessage({
            type,
            code: EMPTY_CODE,
            messageId,
            token: new Uint8Array(0),
            options: [],
            payload: new Uint8Array(0),
        });
        socket.send(datagram, this.config.port, this.config.host, (error) => {
            if (error) this.log.warn(`Failed to send ${MessageType[type]} for message ${messageId}`, error);
        });
    }

    private findByMessageId(messageId: number): PendingExchange | undefined {
        for (const exchange of this.pending.values()) {
            if (exchange.messageId === messageId) return exchange;
        }
        return undefined;
    }

    private allocateMessageId(): number {
        const id = this.nextMessageId;
        this.nextMessageId = (this.nextMessageId + 1) & 0xffff;
        return id;
    }
}
