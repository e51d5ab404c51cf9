import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { FeedIngestor } from '../../src/data/polymarket/feed_ingestor.js';
import { FakeConnector, MemoryQuoteStore } from '../helpers/fakes.js';

describe('FeedIngestor', () => {
    let connector: FakeConnector;
    let store: MemoryQuoteStore;
    let ingestor: FeedIngestor | null;

    const createIngestor = (instruments: string[], groupSize = 2) =>
        new FeedIngestor({
            url: 'wss://feed.test/ws',
            instruments,
            groupSize,
            store,
            connector: connector.connect,
            reconnectBaseMs: 5000,
            reconnectMaxMs: 60000,
        });

    beforeEach(() => {
        jest.useFakeTimers();
        connector = new FakeConnector();
        store = new MemoryQuoteStore();
        ingestor = null;
    });

    afterEach(() => {
        ingestor?.stop();
        jest.useRealTimers();
    });

    it('opens one connection per group of instruments', () => {
        ingestor = createIngestor(['a', 'b', 'c', 'd', 'e']);
        ingestor.start();

        expect(ingestor.getFeedCount()).toBe(3);
        expect(connector.connections).toHaveLength(3);

        connector.connections.forEach(connection => connection.simulateOpen());
        expect(connector.connections.map(c => c.subscribedMarkets())).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    });

    it('drops duplicate instruments', () => {
        ingestor = createIngestor(['a', 'a', 'b']);
        expect(ingestor.getInstruments()).toEqual(['a', 'b']);
        expect(ingestor.getFeedCount()).toBe(1);
    });

    it('adds to a group with room before opening a new one', () => {
        ingestor = createIngestor(['a', 'b', 'c']);
        ingestor.start();
        connector.connections.forEach(connection => connection.simulateOpen());

        ingestor.addInstrument('d');
        expect(ingestor.getFeedCount()).toBe(2);
        expect(connector.connections[1]?.subscribedMarkets()).toEqual(['c', 'd']);

        ingestor.addInstrument('e');
        expect(ingestor.getFeedCount()).toBe(3);
        expect(connector.connections).toHaveLength(3);

        connector.latest.simulateOpen();
        expect(connector.latest.subscribedMarkets()).toEqual(['e']);
    });

    it('starts from an empty watch list', () => {
        ingestor = createIngestor([]);
        ingestor.start();
        expect(connector.connections).toHaveLength(0);

        ingestor.addInstrument('a');
        expect(connector.connections).toHaveLength(1);
    });

    it('removes an instrument from whichever group holds it', () => {
        ingestor = createIngestor(['a', 'b', 'c']);
        expect(ingestor.removeInstrument('c')).toBe(true);
        expect(ingestor.removeInstrument('zzz')).toBe(false);
        expect(ingestor.getInstruments()).toEqual(['a', 'b']);
    });

    it('routes quotes from every group into the shared store', () => {
        ingestor = createIngestor(['a', 'b', 'c']);
        ingestor.start();
        connector.connections.forEach(connection => connection.simulateOpen());

        connector.connections[0]?.simulateMessage({ type: 'book_update', market: 'a', asks: [[0.4, 10]], asset: 'yes' });
        connector.connections[1]?.simulateMessage({ type: 'book_update', market: 'c', asks: [[0.5, 10]], asset: 'no' });

        expect(store.writes.map(q => `${q.instrumentId}:${q.side}`)).toEqual(['a:YES', 'c:NO']);
    });

    it('stops every feed', () => {
        ingestor = createIngestor(['a', 'b', 'c']);
        ingestor.start();
        ingestor.stop();

        expect(connector.connections.every(c => c.closed)).toBe(true);
        expect(ingestor.getStats().map(s => s.state)).toEqual(['DISCONNECTED', 'DISCONNECTED']);
    });
});
