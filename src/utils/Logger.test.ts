import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { Logger, LogLevel, logger } from './Logger';

function createSink() {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    };
}

describe('Logger', () => {
    let sink: ReturnType<typeof createSink>;
    let log: Logger;

    beforeEach(() => {
        sink = createSink();
        log = new Logger('Test', false, sink);
    });

    it('logs info messages by default', () => {
        log.info('hello world');
        expect(sink.info).toHaveBeenCalledWith('[Test] hello world');
    });

    it('does not log debug messages by default', () => {
        log.debug('should not see this');
        expect(sink.debug).not.toHaveBeenCalled();
    });

    it('constructor with debug=true sets DEBUG level', () => {
        const debugLogger = new Logger('TestDebug', true, sink);
        debugLogger.debug('debug message');
        expect(sink.debug).toHaveBeenCalledWith('[TestDebug] DEBUG debug message');
        expect(debugLogger.getLogLevel()).toBe(LogLevel.DEBUG);
    });

    it('prefixes warnings and errors with their level', () => {
        log.warn('a warning');
        log.error('something failed');
        expect(sink.warn).toHaveBeenCalledWith('[Test] WARN a warning');
        expect(sink.error).toHaveBeenCalledWith('[Test] ERROR something failed');
    });

    it('passes extra arguments through', () => {
        const cause = new Error('boom');
        log.warn('socket closed', cause);
        expect(sink.warn).toHaveBeenCalledWith('[Test] WARN socket closed', cause);
    });

    it('respects log levels', () => {
        log.setLogLevel(LogLevel.ERROR);
        log.debug('test');
        log.info('test');
        log.warn('test');
        log.error('test');
        expect(sink.debug).not.toHaveBeenCalled();
        expect(sink.info).not.toHaveBeenCalled();
        expect(sink.warn).not.toHaveBeenCalled();
        expect(sink.error).toHaveBeenCalledTimes(1);
    });

    it('NONE silences everything', () => {
        log.setLogLevel(LogLevel.NONE);
        log.error('test');
        expect(sink.error).not.toHaveBeenCalled();
    });

    describe('JSON mode', () => {
        afterEach(() => {
            vi.useRealTimers();
        });

        it('writes one JSON line per entry', () => {
            vi.useFakeTimers();
            vi.setSystemTime(new Date('2024-01-02T03:04:05.000Z'));
            log.setJson(true);
            log.info('sent', { size: 12 });

            expect(sink.info).toHaveBeenCalledTimes(1);
            const [line] = sink.info.mock.calls[0] ?? [];
            expect(JSON.parse(String(line))).toEqual({
                timestamp: '2024-01-02T03:04:05.000Z',
                tag: 'Test',
                level: 'INFO',
                message: 'sent',
                data: [{ size: 12 }],
            });
        });

        it('omits data when there are no arguments', () => {
            log.setJson(true);
            log.warn('plain');
            const [line] = sink.warn.mock.calls[0] ?? [];
            expect(JSON.parse(String(line))).not.toHaveProperty('data');
        });
    });

    describe('child', () => {
        it('extends the tag and shares level, mode and sink', () => {
            log.setLogLevel(LogLevel.DEBUG);
            const child = log.child('UDP');
            child.debug('retransmit');
            expect(sink.debug).toHaveBeenCalledWith('[Test:UDP] DEBUG retransmit');
            expect(child.toJSON()).toEqual({ tag: 'Test:UDP', level: LogLevel.DEBUG, useJson: false });
        });
    });

    describe('toViewable', () => {
        it('makes bigints, bytes and errors JSON-safe', () => {
            expect(Logger.toViewable(10n)).toBe('10n');
            expect(Logger.toViewable(new Uint8Array(3))).toBe('<bytes:3>');
            expect(Logger.toViewable(new TypeError('bad'))).toEqual({ name: 'TypeError', message: 'bad' });
        });

        it('recurses into arrays, maps and objects', () => {
            const value = {
                list: [1n, 'a'],
                map: new Map<unknown, unknown>([[1, new Uint8Array(2)]]),
            };
            expect(Logger.toViewable(value)).toEqual({
                list: ['1n', 'a'],
                map: [[1, '<bytes:2>']],
            });
        });

        it('keeps null and undefined', () => {
            expect(Logger.toViewable(null)).toBeNull();
            expect(Logger.toViewable(undefined)).toBeUndefined();
        });
    });

    it('exports a shared default logger at INFO', () => {
        expect(logger.toJSON()).toEqual({ tag: 'LowBandwidth', level: LogLevel.INFO, useJson: false });
    });
});
