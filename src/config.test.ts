import { describe, it, expect } from 'vitest';
import {
    parseConfig,
    DEFAULT_MAX_INCONCLUSIVE_RESPONSES,
    DEFAULT_MAX_MESSAGE_SIZE,
    DEFAULT_REQUEST_TIMEOUT,
} from './config';
import { ConfigurationError } from './errors';

describe('parseConfig', () => {
    it('fills defaults', () => {
        expect(parseConfig({ host: 'chat.example.org', port: 5683 })).toEqual({
            host: 'chat.example.org',
            port: 5683,
            protocolVersion: 1,
            codecVersion: 1,
            maxMessageSize: DEFAULT_MAX_MESSAGE_SIZE,
            requestTimeout: DEFAULT_REQUEST_TIMEOUT,
            maxInconclusiveResponses: DEFAULT_MAX_INCONCLUSIVE_RESPONSES,
            debug: false,
        });
    });

    it('uses the documented defaults', () => {
        expect(DEFAULT_MAX_MESSAGE_SIZE).toBe(1024);
        expect(DEFAULT_MAX_INCONCLUSIVE_RESPONSES).toBe(2);
        expect(DEFAULT_REQUEST_TIMEOUT).toBe(35_000);
    });

    it('keeps explicit values', () => {
        const config = parseConfig({
            host: 'chat.example.org',
            port: 5683,
            accessToken: 'test-secret',
            maxMessageSize: 512,
            debug: true,
        });
        expect(config.accessToken).toBe('test-secret');
        expect(config.maxMessageSize).toBe(512);
        expect(config.debug).toBe(true);
    });

    it('lists every invalid field', () => {
        const attempt = () => parseConfig({ host: '', port: 70000 });
        expect(attempt).toThrow(ConfigurationError);
        expect(attempt).toThrow(/^Invalid low-bandwidth config: host: .+, port: .+$/);
    });

    it('rejects a non-positive message size', () => {
        expect(() => parseConfig({ host: 'h', port: 1, maxMessageSize: 0 })).toThrow(/maxMessageSize/);
    });
});
