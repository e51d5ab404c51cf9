import { describe, it, expect } from '@jest/globals';
import { connectRedis } from '../../src/infra/redis.js';
import { QuoteStore } from '../../src/data/store/quote_store.js';
import { FakeKeyValueClient } from '../helpers/fakes.js';

const target = { host: '127.0.0.1', port: 6379 };

describe('connectRedis', () => {
    it('reports a successful connect', async () => {
        let calls = 0;
        const client = {
            connect: async () => {
                calls++;
            },
        };

        await expect(connectRedis(client, target)).resolves.toBe(true);
        expect(calls).toBe(1);
    });

    it('resolves false instead of rejecting when the server is unreachable', async () => {
        const client = {
            connect: async () => {
                throw new Error('Connection is closed.');
            },
        };

        await expect(connectRedis(client, target)).resolves.toBe(false);
    });

    it('leaves the store usable in degraded mode after a failed connect', async () => {
        const kv = new FakeKeyValueClient();
        kv.failing = true;
        const client = {
            connect: async () => {
                throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
            },
        };

        const connected = await connectRedis(client, target);
        const store = new QuoteStore(kv, 60);

        expect(connected).toBe(false);
        await expect(store.getPair('mkt-1')).resolves.toBeNull();
        await expect(store.healthCheck()).resolves.toBe(false);
    });
});
