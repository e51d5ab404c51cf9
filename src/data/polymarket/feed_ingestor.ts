import { logger } from '../../infra/logger.js';
import type { QuoteWriter } from '../store/quote_store.js';
import { BookFeed, type BookFeedStats } from './book_feed.js';
import type { FeedConnector } from './ws_connector.js';

export interface FeedIngestorOptions {
    url: string;
    instruments: readonly string[];
    groupSize: number;
    store: QuoteWriter;
    connector: FeedConnector;
    reconnectBaseMs: number;
    reconnectMaxMs: number;
    now?: () => number;
}

/**
 * Splits the watch list into fixed-size groups and runs one BookFeed per group
 */
export class FeedIngestor {
    private readonly feeds: BookFeed[] = [];
    private isRunning = false;
    private nextFeedId = 0;

    constructor(private readonly options: FeedIngestorOptions) {
        const unique = Array.from(new Set(options.instruments));
        for (let i = 0; i < unique.length; i += options.groupSize) {
            this.feeds.push(this.createFeed(unique.slice(i, i + options.groupSize)));
        }
    }

    public start(): void {
        if (this.isRunning) {
            return;
        }

        this.isRunning = true;

        logger.info('feed.ingestor.started', {
            feeds: this.feeds.length,
            instruments: this.getInstruments().length,
            groupSize: this.options.groupSize,
        });

        for (const feed of this.feeds) {
            feed.start();
        }
    }

    public stop(): void {
        this.isRunning = false;

        for (const feed of this.feeds) {
            feed.stop();
        }

        logger.info('feed.ingestor.stopped', { feeds: this.feeds.length });
    }

    /**
     * Add to the first group with room, or open a new group
     */
    public addInstrument(instrumentId: string): void {
        if (this.feeds.some(feed => feed.hasInstrument(instrumentId))) {
            return;
        }

        const target = this.feeds.find(feed => feed.getInstruments().length < this.options.groupSize);
        if (target) {
            target.addInstrument(instrumentId);
            return;
        }

        const feed = this.createFeed([instrumentId]);
        this.feeds.push(feed);

        if (this.isRunning) {
            feed.start();
        }
    }

    public removeInstrument(instrumentId: string): boolean {
        return this.feeds.some(feed => feed.removeInstrument(instrumentId));
    }

    public getInstruments(): string[] {
        return this.feeds.flatMap(feed => feed.getInstruments());
    }

    public getFeedCount(): number {
        return this.feeds.length;
    }

    public getStats(): BookFeedStats[] {
        return this.feeds.map(feed => feed.getStats());
    }

    private createFeed(instruments: readonly string[]): BookFeed {
        return new BookFeed({
            feedId: `book-${this.nextFeedId++}`,
            url: this.options.url,
            instruments,
            store: this.options.store,
            connector: this.options.connector,
            reconnectBaseMs: this.options.reconnectBaseMs,
            reconnectMaxMs: this.options.reconnectMaxMs,
            now: this.options.now,
        });
    }
}
