import { logger as defaultLogger, type Logger } from './Logger';

type EventMap = Record<string, unknown[]>;
type Handler<T extends EventMap, K extends keyof T> = (...args: T[K]) => void;

/**
 * A tiny, type-safe event emitter.
 *
 * Event names and argument tuples are checked at compile time, `on` returns
 * its own unsubscribe function, and a throwing listener is logged without
 * stopping delivery to the others.
 *
 * @example
 * ```typescript
 * interface LinkEvents { [key: string]: unknown[]; abandoned: [cause: unknown] }
 * const emitter = new EventEmitter<LinkEvents>();
 * const unsub = emitter.on('abandoned', (cause) => report(cause));
 * unsub();
 * ```
 */
export class EventEmitter<T extends EventMap> {
    private listeners: { [K in keyof T]?: Set<Handler<T, K>> } = {};

    constructor(protected readonly eventLogger: Logger = defaultLogger) { }

    /**
     * Subscribe to an event.
     * @returns Unsubscribe function
     */
    on<K extends keyof T>(event: K, handler: Handler<T, K>): () => void {
        let handlers = this.listeners[event];
        if (!handlers) {
            handlers = new Set();
            this.listeners[event] = handlers;
        }
        handlers.add(handler);
        return () => this.off(event, handler);
    }

    off<K extends keyof T>(event: K, handler: Handler<T, K>): void {
        this.listeners[event]?.delete(handler);
    }

    emit<K extends keyof T>(event: K, ...args: T[K]): void {
        const handlers = this.listeners[event];
        if (!handlers) return;

        for (const handler of Array.from(handlers)) {
            try {
                handler(...args);
            } catch (err) {
                this.eventLogger.error(`Listener for '${String(event)}' threw`, err);
            }
        }
    }

    /**
     * Subscribe to an event once.
     */
    once<K extends keyof T>(event: K, handler: Handler<T, K>): () => void {
        const wrapper: Handler<T, K> = (...args) => {
            this.off(event, wrapper);
            handler(...args);
        };
        return this.on(event, wrapper);
    }

    listenerCount(event: keyof T): number {
        return this.listeners[event]?.size ?? 0;
    }

    removeAllListeners(): void {
        this.listeners = {};
    }
}
