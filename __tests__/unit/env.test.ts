import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { parseEnv } from '../../src/config/env.js';
import { parseScanTargets } from '../../src/config/scan_targets.js';

describe('parseEnv', () => {
    it('applies defaults to an empty environment', () => {
        const env = parseEnv({});

        expect(env.NODE_ENV).toBe('development');
        expect(env.LOG_TO_FILE).toBe(true);
        expect(env.WATCH_MARKETS).toEqual([]);
        expect(env.FEED_RECONNECT_BASE_MS).toBe(5000);
        expect(env.FEED_RECONNECT_MAX_MS).toBe(60000);
        expect(env.QUOTE_TTL_SECONDS).toBe(60);
        expect(env.ARB_THRESHOLD).toBe(0.998);
        expect(env.MIN_PROFIT_PERCENT).toBe(0.2);
        expect(env.MIN_LIQUIDITY_USD).toBe(50);
        expect(env.MAX_POSITION_SIZE_USD).toBe(100);
        expect(env.SCAN_INTERVAL_MS).toBe(100);
        expect(env.NOTIFY_COOLDOWN_MS).toBe(60000);
        expect(env.REDIS_PASSWORD).toBeUndefined();
    });

    it('coerces numbers and splits market lists', () => {
        const env = parseEnv({
            LOG_TO_FILE: 'false',
            WATCH_MARKETS: ' mkt-1, mkt-2 ,,mkt-3 ',
            ARB_THRESHOLD: '0.99',
            REDIS_PORT: '6380',
            REDIS_PASSWORD: 'test-secret',
        });

        expect(env.LOG_TO_FILE).toBe(false);
        expect(env.WATCH_MARKETS).toEqual(['mkt-1', 'mkt-2', 'mkt-3']);
        expect(env.ARB_THRESHOLD).toBe(0.99);
        expect(env.REDIS_PORT).toBe(6380);
        expect(env.REDIS_PASSWORD).toBe('test-secret');
    });

    it('rejects a threshold outside (0, 1)', () => {
        expect(() => parseEnv({ ARB_THRESHOLD: '1' })).toThrow(ZodError);
        expect(() => parseEnv({ ARB_THRESHOLD: '0' })).toThrow(ZodError);
        expect(() => parseEnv({ ARB_THRESHOLD: 'abc' })).toThrow(ZodError);
    });

    it('rejects a reconnect cap below the base delay', () => {
        expect(() => parseEnv({ FEED_RECONNECT_BASE_MS: '5000', FEED_RECONNECT_MAX_MS: '1000' })).toThrow(ZodError);
    });
});

describe('parseScanTargets', () => {
    it('splits entries into instrument and token ids', () => {
        expect(parseScanTargets(['rain:111:222', ' snow : 333 : 444 '])).toEqual({
            targets: [
                { instrumentId: 'rain', yesTokenId: '111', noTokenId: '222' },
                { instrumentId: 'snow', yesTokenId: '333', noTokenId: '444' },
            ],
            invalid: [],
        });
    });

    it('returns malformed entries separately', () => {
        expect(parseScanTargets(['rain:111', 'a:b:c:d', 'x::y', 'ok:1:2'])).toEqual({
            targets: [{ instrumentId: 'ok', yesTokenId: '1', noTokenId: '2' }],
            invalid: ['rain:111', 'a:b:c:d', 'x::y'],
        });
    });
});
