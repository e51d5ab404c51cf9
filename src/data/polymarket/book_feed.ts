import { logger, errorFields } from '../../infra/logger.js';
import type { QuoteWriter } from '../store/quote_store.js';
import { ReconnectBackoff } from './backoff.js';
import type { FeedConnection, FeedConnector } from './ws_connector.js';
import {
    bookUpdateSchema,
    feedEnvelopeSchema,
    feedErrorSchema,
    subscribedSchema,
    type Quote,
    type Side,
    type SubscribeRequest,
} from './types.js';

/**
 * Connection lifecycle of one feed
 */
export type FeedState = 'DISCONNECTED' | 'CONNECTING' | 'SUBSCRIBED' | 'LISTENING';

export interface BookFeedOptions {
    feedId: string;
    url: string;
    instruments: readonly string[];
    store: QuoteWriter;
    connector: FeedConnector;
    reconnectBaseMs: number;
    reconnectMaxMs: number;
    now?: () => number;
}

export interface BookFeedStats {
    feedId: string;
    state: FeedState;
    instruments: number;
    confirmed: number;
    messages: number;
    quotesWritten: number;
    parseErrors: number;
    reconnects: number;
    nextBackoffMs: number;
}

/**
 * Parse the `asset` field of a book update. Missing means YES.
 */
export function parseSide(asset: string | undefined): Side | null {
    if (asset === undefined) {
        return 'YES';
    }
    switch (asset.trim().toLowerCase()) {
        case 'yes':
            return 'YES';
        case 'no':
            return 'NO';
        default:
            return null;
    }
}

/**
 * Order-book feed for one group of instruments.
 *
 * Keeps a single streaming connection alive, (re)subscribes every watched
 * instrument on open, and writes each side's best ask into the quote store.
 * A bad message is logged and dropped; only a transport close ends a connection.
 */
export class BookFeed {
    private connection: FeedConnection | null = null;
    private state: FeedState = 'DISCONNECTED';
    private reconnectTimer: NodeJS.Timeout | null = null;
    private isRunning = false;

    // Bumped per connection so late events from a dead socket are ignored
    private generation = 0;

    private readonly instruments: Set<string>;
    private readonly confirmed = new Set<string>();
    private readonly backoff: ReconnectBackoff;
    private readonly now: () => number;

    private stats = {
        messages: 0,
        quotesWritten: 0,
        parseErrors: 0,
        reconnects: 0,
    };

    constructor(private readonly options: BookFeedOptions) {
        this.instruments = new Set(options.instruments);
        this.backoff = new ReconnectBackoff(options.reconnectBaseMs, options.reconnectMaxMs);
        this.now = options.now ?? Date.now;
    }

    /**
     * Start the feed
     */
    public start(): void {
        if (this.isRunning) {
            logger.warn('feed.already_running', { feedId: this.options.feedId });
            return;
        }

        this.isRunning = true;
        this.backoff.reset();

        logger.info('feed.started', {
            feedId: this.options.feedId,
            instruments: this.instruments.size,
        });

        this.connect();
    }

    /**
     * Stop the feed. No reconnect is scheduled afterwards.
     */
    public stop(): void {
        this.isRunning = false;

        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }

        this.dropConnection();

        logger.info('feed.stopped', { feedId: this.options.feedId });
    }

    /**
     * Watch one more instrument; subscribed right away when the connection is up
     */
    public addInstrument(instrumentId: string): void {
        if (this.instruments.has(instrumentId)) {
            return;
        }

        this.instruments.add(instrumentId);
        logger.info('feed.instrument.added', { feedId: this.options.feedId, instrumentId });

        // Otherwise picked up by the subscribe pass of the next connection
        if (this.connection && this.connection.isOpen()) {
            this.subscribe(this.connection, instrumentId);
        }
    }

    public removeInstrument(instrumentId: string): boolean {
        if (!this.instruments.delete(instrumentId)) {
            return false;
        }

        this.confirmed.delete(instrumentId);
        logger.info('feed.instrument.removed', { feedId: this.options.feedId, instrumentId });
        return true;
    }

    public hasInstrument(instrumentId: string): boolean {
        return this.instruments.has(instrumentId);
    }

    public getInstruments(): string[] {
        return Array.from(this.instruments);
    }

    public getState(): FeedState {
        return this.state;
    }

    public getStats(): BookFeedStats {
        return {
            feedId: this.options.feedId,
            state: this.state,
            instruments: this.instruments.size,
            confirmed: this.confirmed.size,
            ...this.stats,
            nextBackoffMs: this.backoff.peek(),
        };
    }

    /**
     * Open a fresh connection; nothing from the previous one is reused
     */
    private connect(): void {
        if (!this.isRunning) {
            return;
        }

        const generation = ++this.generation;
        this.state = 'CONNECTING';
        this.confirmed.clear();

        logger.info('feed.ws.connecting', {
            feedId: this.options.feedId,
            url: this.options.url,
            attempt: this.backoff.failures + 1,
        });

        try {
            this.connection = this.options.connector(this.options.url, {
                onOpen: () => {
                    if (generation === this.generation) {
                        this.handleOpen();
                    }
                },
                onMessage: (data: string) => {
                    if (generation === this.generation) {
                        this.handleMessage(data);
                    }
                },
                onError: (error: Error) => {
                    if (generation === this.generation) {
                        logger.error('feed.ws.error', { feedId: this.options.feedId, error: error.message });
                    }
                },
                onClose: (code: number, reason: string) => {
                    if (generation === this.generation) {
                        this.handleClose(code, reason);
                    }
                },
            });
        } catch (error) {
            logger.error('feed.ws.connection_failed', {
                feedId: this.options.feedId,
                ...errorFields(error),
            });
            this.connection = null;
            this.state = 'DISCONNECTED';
            this.scheduleReconnect();
        }
    }

    private handleOpen(): void {
        const connection = this.connection;
        if (!connection) {
            return;
        }

        this.backoff.reset();

        logger.info('feed.ws.connected', {
            feedId: this.options.feedId,
            instruments: this.instruments.size,
        });

        for (const instrumentId of this.instruments) {
            if (!this.subscribe(connection, instrumentId)) {
                // Treat a broken send like a dead transport
                this.dropConnection();
                this.scheduleReconnect();
                return;
            }
        }

        this.state = 'SUBSCRIBED';
    }

    private handleClose(code: number, reason: string): void {
        const wasConnected = this.state === 'SUBSCRIBED' || this.state === 'LISTENING';

        this.connection = null;
        this.state = 'DISCONNECTED';

        logger.warn('feed.ws.disconnected', {
            feedId: this.options.feedId,
            code,
            reason,
            wasConnected,
        });

        this.scheduleReconnect();
    }

    /**
     * Schedule reconnection with exponential backoff
     */
    private scheduleReconnect(): void {
        if (!this.isRunning || this.reconnectTimer) {
            return;
        }

        const delay = this.backoff.next();

        logger.info('feed.ws.reconnecting', {
            feedId: this.options.feedId,
            attempt: this.backoff.failures,
            delayMs: delay,
        });

        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            this.stats.reconnects++;
            this.connect();
        }, delay);
    }

    private dropConnection(): void {
        this.generation++;
        this.state = 'DISCONNECTED';

        if (this.connection) {
            try {
                this.connection.close();
            } catch (error) {
                logger.warn('feed.ws.close_failed', { feedId: this.options.feedId, ...errorFields(error) });
            }
            this.connection = null;
        }
    }

    private subscribe(connection: FeedConnection, instrumentId: string): boolean {
        const request: SubscribeRequest = { type: 'subscribe', channel: 'book', market: instrumentId };

        try {
            connection.send(JSON.stringify(request));
            logger.debug('feed.subscribe.sent', { feedId: this.options.feedId, instrumentId });
            return true;
        } catch (error) {
            logger.error('feed.subscribe.failed', {
                feedId: this.options.feedId,
                instrumentId,
                ...errorFields(error),
            });
            return false;
        }
    }

    /**
     * Classify one inbound message. Never throws.
     */
    private handleMessage(raw: string): void {
        this.stats.messages++;

        if (this.state === 'SUBSCRIBED') {
            this.state = 'LISTENING';
        }

        let decoded: unknown;
        try {
            decoded = JSON.parse(raw);
        } catch (error) {
            this.stats.parseErrors++;
            logger.warn('feed.message.decode_error', {
                feedId: this.options.feedId,
                ...errorFields(error),
            });
            return;
        }

        const envelope = feedEnvelopeSchema.safeParse(decoded);
        if (!envelope.success) {
            this.stats.parseErrors++;
            logger.warn('feed.message.malformed', { feedId: this.options.feedId });
            return;
        }

        switch (envelope.data.type) {
            case 'book_update':
                this.handleBookUpdate(decoded).catch((error: unknown) => {
                    logger.error('feed.book_update.error', {
                        feedId: this.options.feedId,
                        ...errorFields(error),
                    });
                });
                break;
            case 'subscribed': {
                const confirmation = subscribedSchema.safeParse(decoded);
                const market = confirmation.success ? confirmation.data.market : undefined;
                if (market !== undefined) {
                    this.confirmed.add(market);
                }
                logger.info('feed.subscribe.confirmed', { feedId: this.options.feedId, market });
                break;
            }
            case 'error': {
                const feedError = feedErrorSchema.safeParse(decoded);
                logger.error('feed.server_error', {
                    feedId: this.options.feedId,
                    message: feedError.success ? feedError.data.message : undefined,
                    market: feedError.success ? feedError.data.market : undefined,
                });
                break;
            }
            default:
                logger.debug('feed.message.ignored', {
                    feedId: this.options.feedId,
                    type: envelope.data.type,
                });
        }
    }

    /**
     * Normalize a book update into a best-ask quote and store it
     */
    private async handleBookUpdate(decoded: unknown): Promise<void> {
        const parsed = bookUpdateSchema.safeParse(decoded);
        if (!parsed.success) {
            this.stats.parseErrors++;
            logger.warn('feed.book_update.invalid', {
                feedId: this.options.feedId,
                issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
            });
            return;
        }

        const update = parsed.data;

        if (!this.instruments.has(update.market)) {
            logger.debug('feed.book_update.unwatched', { feedId: this.options.feedId, market: update.market });
            return;
        }

        if (update.asks.length === 0) {
            return;
        }

        const side = parseSide(update.asset);
        if (!side) {
            this.stats.parseErrors++;
            logger.warn('feed.book_update.unknown_asset', {
                feedId: this.options.feedId,
                market: update.market,
                asset: update.asset,
            });
            return;
        }

        // asks[0] is the best ask
        const [price, size] = update.asks[0];
        if (price <= 0 || size < 0) {
            this.stats.parseErrors++;
            logger.warn('feed.book_update.invalid_level', {
                feedId: this.options.feedId,
                market: update.market,
                price,
                size,
            });
            return;
        }

        const quote: Quote = {
            instrumentId: update.market,
            side,
            price,
            size,
            observedAt: update.timestamp ?? this.now(),
        };

        const written = await this.options.store.put(quote);
        if (written) {
            this.stats.quotesWritten++;
        }

        logger.debug('feed.book_update', {
            feedId: this.options.feedId,
            market: quote.instrumentId,
            side: quote.side,
            price: quote.price.toFixed(4),
            size: quote.size.toFixed(2),
            written,
        });
    }
}
