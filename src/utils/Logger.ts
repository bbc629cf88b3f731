/**
 * Internal logging utility.
 * Tagged, levelled output so transport chatter can be silenced in production
 * and turned up when a compact link misbehaves.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

type LogMethod = 'debug' | 'info' | 'warn' | 'error';

/** Anything with console-shaped methods can receive log lines. */
export type LogSink = Pick<Console, LogMethod>;

export class Logger {
    private level: LogLevel = LogLevel.INFO;
    private useJson = false;

    constructor(
        private readonly tag: string = 'LowBandwidth',
        debug: boolean = false,
        private readonly sink: LogSink = console
    ) {
        if (debug) {
            this.level = LogLevel.DEBUG;
        }
    }

    public setLogLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLogLevel(): LogLevel {
        return this.level;
    }

    public setJson(enabled: boolean): void {
        this.useJson = enabled;
    }

    private log(method: LogMethod, levelName: string, message: string, args: unknown[]): void {
        if (this.useJson) {
            const entry = {
                timestamp: new Date().toISOString(),
                tag: this.tag,
                level: levelName,
                message,
                data: args.length > 0 ? Logger.toViewable(args) : undefined
            };
            this.sink[method](JSON.stringify(entry));
            return;
        }
        const prefix = levelName === 'INFO' ? `[${this.tag}]` : `[${this.tag}] ${levelName}`;
        this.sink[method](`${prefix} ${message}`, ...args);
    }

    public debug(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            this.log('debug', 'DEBUG', message, args);
        }
    }

    public info(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.INFO) {
            this.log('info', 'INFO', message, args);
        }
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.WARN) {
            this.log('warn', 'WARN', message, args);
        }
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.ERROR) {
            this.log('error', 'ERROR', message, args);
        }
    }

    /**
     * Creates a child logger with an extended tag, sharing level, mode and sink.
     */
    public child(subTag: string): Logger {
        const child = new Logger(`${this.tag}:${subTag}`, false, this.sink);
        child.setLogLevel(this.level);
        child.setJson(this.useJson);
        return child;
    }

    public toJSON(): { tag: string; level: LogLevel; useJson: boolean } {
        return {
            tag: this.tag,
            level: this.level,
            useJson: this.useJson
        };
    }

    /**
     * Converts a value to a JSON-safe form: bigints become `"<n>n"`,
     * byte arrays become `"<bytes:N>"`.
     */
    public static toViewable(value: unknown): unknown {
        if (value === null || value === undefined) return value;
        if (typeof value === 'bigint') return `${value.toString()}n`;
        if (value instanceof Uint8Array) return `<bytes:${value.length}>`;
        if (value instanceof Error) return { name: value.name, message: value.message };
        if (Array.isArray(value)) return value.map(item => Logger.toViewable(item));
        if (value instanceof Map) {
            return Array.from(value.entries()).map(([k, v]) => [Logger.toViewable(k), Logger.toViewable(v)]);
        }
        if (typeof value === 'object') {
            const result: Record<string, unknown> = {};
            for (const [key, item] of Object.entries(value)) {
                result[key] = Logger.toViewable(item);
            }
            return result;
        }
        return value;
    }
}

// Global default logger
export const logger = new Logger('LowBandwidth');
