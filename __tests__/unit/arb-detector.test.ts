import { describe, it, expect, beforeEach } from '@jest/globals';
import { ArbDetector } from '../../src/strategy/arb_detector.js';
import { NotificationGate } from '../../src/strategy/notification_gate.js';
import type { QuotePair } from '../../src/data/polymarket/types.js';
import type { QuoteReader } from '../../src/data/store/quote_store.js';
import type { Opportunity } from '../../src/strategy/types.js';
import type { OpportunityExecutor } from '../../src/notify/types.js';
import { MemoryQuoteStore, RecordingNotifier } from '../helpers/fakes.js';

const params = {
    threshold: 0.998,
    minProfitPercent: 0.2,
    minLiquidityUsd: 50,
    maxPositionUsd: 1000,
};

describe('ArbDetector', () => {
    let store: MemoryQuoteStore;
    let notifier: RecordingNotifier;
    let clock: { now: number };
    let detector: ArbDetector;

    const createDetector = (overrides: { store?: QuoteReader; executor?: OpportunityExecutor } = {}) =>
        new ArbDetector({
            store: overrides.store ?? store,
            bookkeeping: store,
            notifier,
            alerts: notifier,
            executor: overrides.executor,
            gate: new NotificationGate(60000, () => clock.now),
            params,
            scanIntervalMs: 5,
        });

    beforeEach(() => {
        store = new MemoryQuoteStore();
        notifier = new RecordingNotifier();
        clock = { now: 0 };
        detector = createDetector();
    });

    describe('scanCycle', () => {
        it('emits simultaneous opportunities by descending profit', async () => {
            store.setPair('low', [0.49, 100], [0.5, 100]);    // sum 0.99
            store.setPair('high', [0.4, 100], [0.5, 100]);    // sum 0.90
            store.setPair('mid', [0.45, 100], [0.5, 100]);    // sum 0.95
            ['low', 'high', 'mid'].forEach(id => detector.addMarket(id));

            const emitted = await detector.scanCycle();

            expect(emitted.map(o => o.instrumentId)).toEqual(['high', 'mid', 'low']);
            expect(notifier.opportunities.map(o => o.instrumentId)).toEqual(['high', 'mid', 'low']);
            expect(store.opportunitiesFound).toBe(3);
        });

        it('skips instruments without both sides', async () => {
            store.setPair('full', [0.48, 100], [0.5, 100]);
            store.quotes.set('half:YES', { instrumentId: 'half', side: 'YES', price: 0.1, size: 100, observedAt: 0 });
            detector.addMarket('full');
            detector.addMarket('half');
            detector.addMarket('none');

            const emitted = await detector.scanCycle();

            expect(emitted.map(o => o.instrumentId)).toEqual(['full']);
        });

        it('emits nothing for an empty watch set', async () => {
            expect(await detector.scanCycle()).toEqual([]);
            expect(detector.getStats().cycles).toBe(1);
        });

        it('does not emit pairs the calculator rejects', async () => {
            store.setPair('fair', [0.5, 100], [0.5, 100]);
            store.setPair('thin', [0.4, 1], [0.5, 1]);
            detector.addMarket('fair');
            detector.addMarket('thin');

            expect(await detector.scanCycle()).toEqual([]);
            expect(notifier.opportunities).toEqual([]);
        });

        it('stops scanning a removed market', async () => {
            store.setPair('m', [0.48, 100], [0.5, 100]);
            detector.addMarket('m');
            detector.removeMarket('m');

            expect(await detector.scanCycle()).toEqual([]);
            expect(detector.getWatched()).toEqual([]);
        });
    });

    describe('notification cooldown', () => {
        beforeEach(() => {
            store.setPair('m', [0.48, 100], [0.5, 100]);
            detector.addMarket('m');
        });

        it('alerts once for a persisting opportunity within the cooldown', async () => {
            await detector.scanCycle();
            clock.now += 1000;
            await detector.scanCycle();

            expect(detector.getStats().opportunitiesFound).toBe(2);
            expect(notifier.opportunities).toHaveLength(1);
        });

        it('alerts again after the cooldown has elapsed', async () => {
            await detector.scanCycle();
            clock.now += 60001;
            await detector.scanCycle();

            expect(notifier.opportunities).toHaveLength(2);
            expect(detector.getStats().notificationsSent).toBe(2);
        });

        it('keeps scanning when delivery fails', async () => {
            notifier.failWith = new Error('telegram 502');

            await expect(detector.scanCycle()).resolves.toHaveLength(1);
            await expect(detector.scanCycle()).resolves.toHaveLength(1);
            expect(notifier.opportunities).toHaveLength(1);
        });
    });

    describe('execution hook', () => {
        it('receives every emitted opportunity, and its failures are contained', async () => {
            const executed: Opportunity[] = [];
            detector = createDetector({
                executor: {
                    execute: async (opportunity: Opportunity) => {
                        executed.push(opportunity);
                        throw new Error('not implemented');
                    },
                },
            });
            store.setPair('m', [0.48, 100], [0.5, 100]);
            detector.addMarket('m');

            await detector.scanCycle();
            await detector.scanCycle();

            expect(executed.map(o => o.instrumentId)).toEqual(['m', 'm']);
        });
    });

    describe('start / stop', () => {
        it('runs cycles until stopped and records bot status', async () => {
            store.setPair('m', [0.48, 100], [0.5, 100]);
            let cycles = 0;
            const countingStore: QuoteReader = {
                get: (id, side) => store.get(id, side),
                getPair: async (id: string): Promise<QuotePair | null> => {
                    cycles++;
                    if (cycles === 3) {
                        detector.stop();
                    }
                    return store.getPair(id);
                },
            };
            detector = createDetector({ store: countingStore });

            await detector.start(['m']);

            expect(cycles).toBe(3);
            expect(detector.getStats()).toMatchObject({ isRunning: false, crashed: false, cycles: 3 });
            expect(store.activeMarkets).toEqual(['m']);
            expect(store.statuses).toEqual(['running', 'stopped']);
        });

        it('terminates and raises a critical alert when a cycle throws', async () => {
            const brokenStore: QuoteReader = {
                get: async () => null,
                getPair: async () => {
                    throw new Error('unexpected reply');
                },
            };
            detector = createDetector({ store: brokenStore });

            await detector.start(['m']);

            expect(detector.getStats()).toMatchObject({ isRunning: false, crashed: true, cycles: 1 });
            expect(notifier.errors).toEqual([{ message: 'Arb detector crashed: unexpected reply', critical: true }]);
            expect(store.statuses).toEqual(['running', 'stopped']);
        });
    });
});
