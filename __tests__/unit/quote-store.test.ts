import { describe, it, expect, beforeEach } from '@jest/globals';
import { QuoteStore, storeKeys } from '../../src/data/store/quote_store.js';
import type { Quote } from '../../src/data/polymarket/types.js';
import { FakeKeyValueClient } from '../helpers/fakes.js';

const quote = (side: 'YES' | 'NO', price: number, size = 100): Quote => ({
    instrumentId: 'mkt-1',
    side,
    price,
    size,
    observedAt: 1_700_000_000_000,
});

describe('QuoteStore', () => {
    let client: FakeKeyValueClient;
    let store: QuoteStore;

    beforeEach(() => {
        client = new FakeKeyValueClient();
        store = new QuoteStore(client, 60);
    });

    describe('put / get', () => {
        it('writes JSON under orderbook:{id}:{side} with the TTL', async () => {
            expect(await store.put(quote('YES', 0.48))).toBe(true);

            const raw = await client.get('orderbook:mkt-1:yes');
            expect(raw).toBe('{"price":0.48,"size":100,"timestamp":1700000000000}');
            expect(client.ttlOf('orderbook:mkt-1:yes')).toBe(60);
        });

        it('reads back what was written', async () => {
            await store.put(quote('NO', 0.5, 25));
            expect(await store.get('mkt-1', 'NO')).toEqual(quote('NO', 0.5, 25));
        });

        it('returns null for a side never written', async () => {
            expect(await store.get('mkt-1', 'YES')).toBeNull();
        });

        it('returns null once the TTL has passed', async () => {
            await store.put(quote('YES', 0.48));
            client.nowMs += 59_999;
            expect(await store.get('mkt-1', 'YES')).not.toBeNull();
            client.nowMs += 1;
            expect(await store.get('mkt-1', 'YES')).toBeNull();
        });

        it('keeps the last write', async () => {
            await store.put(quote('YES', 0.48));
            await store.put(quote('YES', 0.47));
            expect((await store.get('mkt-1', 'YES'))?.price).toBe(0.47);
        });

        it('treats an undecodable value as absent', async () => {
            client.rawSet('orderbook:mkt-1:yes', '{not json');
            expect(await store.get('mkt-1', 'YES')).toBeNull();

            client.rawSet('orderbook:mkt-1:yes', '{"price":"0.4","size":1,"timestamp":1}');
            expect(await store.get('mkt-1', 'YES')).toBeNull();
        });
    });

    describe('getPair', () => {
        it('returns both sides when both are fresh', async () => {
            await store.put(quote('YES', 0.48));
            await store.put(quote('NO', 0.5));

            const pair = await store.getPair('mkt-1');
            expect(pair?.yes.price).toBe(0.48);
            expect(pair?.no.price).toBe(0.5);
        });

        it('returns null when one side is missing', async () => {
            await store.put(quote('YES', 0.48));
            expect(await store.getPair('mkt-1')).toBeNull();
        });

        it('returns null when one side has expired and the other is fresh', async () => {
            await store.put(quote('YES', 0.48));
            client.nowMs += 30_000;
            await store.put(quote('NO', 0.5));
            client.nowMs += 30_000;

            expect(await store.get('mkt-1', 'NO')).not.toBeNull();
            expect(await store.getPair('mkt-1')).toBeNull();
        });
    });

    describe('when Redis is unreachable', () => {
        beforeEach(() => {
            client.failing = true;
        });

        it('reports failure instead of throwing', async () => {
            expect(await store.put(quote('YES', 0.48))).toBe(false);
            expect(await store.get('mkt-1', 'YES')).toBeNull();
            expect(await store.getPair('mkt-1')).toBeNull();
            expect(await store.incrementTradeCounter('2024-05-01')).toBe(0);
            expect(await store.getDailyPnl('2024-05-01')).toBe(0);
            expect(await store.setBotStatus('running')).toBe(false);
            expect(await store.healthCheck()).toBe(false);
        });
    });

    describe('auxiliary keys', () => {
        it('stores market status with ten times the quote TTL', async () => {
            expect(await store.setMarketStatus('mkt-1', 'halted')).toBe(true);
            expect(await store.getMarketStatus('mkt-1')).toBe('halted');
            expect(client.ttlOf(storeKeys.marketStatus('mkt-1'))).toBe(600);
        });

        it('counts trades per day with a two-day TTL', async () => {
            expect(await store.incrementTradeCounter('2024-05-01')).toBe(1);
            expect(await store.incrementTradeCounter('2024-05-01')).toBe(2);
            expect(client.ttlOf('trades:count:2024-05-01')).toBe(172800);
        });

        it('stores daily PnL with a seven-day TTL and reads missing as zero', async () => {
            expect(await store.getDailyPnl('2024-05-01')).toBe(0);
            await store.setDailyPnl('2024-05-01', -12.5);
            expect(await store.getDailyPnl('2024-05-01')).toBe(-12.5);
            expect(client.ttlOf('pnl:daily:2024-05-01')).toBe(604800);
        });

        it('aggregates scan bookkeeping into stats', async () => {
            await store.incrementOpportunitiesFound();
            await store.incrementOpportunitiesFound();
            await store.setBotStatus('running');
            await store.setActiveMarkets(['mkt-1', 'mkt-2']);

            expect(await store.getStats()).toEqual({
                opportunitiesFound: 2,
                botStatus: 'running',
                activeMarkets: ['mkt-1', 'mkt-2'],
            });
        });

        it('answers a health check', async () => {
            expect(await store.healthCheck()).toBe(true);
        });
    });
});
