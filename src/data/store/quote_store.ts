import { z } from 'zod';
import { logger, errorFields } from '../../infra/logger.js';
import type { Quote, QuotePair, Side } from '../polymarket/types.js';

const DAY_SECONDS = 86400;
const TRADE_COUNTER_TTL_SECONDS = DAY_SECONDS * 2;
const DAILY_PNL_TTL_SECONDS = DAY_SECONDS * 7;
const MARKET_STATUS_TTL_FACTOR = 10;

/**
 * Key layout shared with anything else reading the same store
 */
export const storeKeys = {
    orderbook: (instrumentId: string, side: Side) => `orderbook:${instrumentId}:${side.toLowerCase()}`,
    marketStatus: (instrumentId: string) => `market:status:${instrumentId}`,
    tradeCount: (date: string) => `trades:count:${date}`,
    dailyPnl: (date: string) => `pnl:daily:${date}`,
    opportunitiesFound: () => 'stats:opportunities_found',
    activeMarkets: () => 'bot:active_markets',
    botStatus: () => 'bot:status',
};

/**
 * The slice of a Redis client the store needs. `ioredis` satisfies it.
 */
export interface KeyValueClient {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
    set(key: string, value: string): Promise<unknown>;
    incr(key: string): Promise<number>;
    expire(key: string, seconds: number): Promise<unknown>;
    ping(): Promise<string>;
}

/**
 * Write side, used by the feed ingestor only
 */
export interface QuoteWriter {
    put(quote: Quote): Promise<boolean>;
}

/**
 * Read side, used by the detection loop
 */
export interface QuoteReader {
    get(instrumentId: string, side: Side): Promise<Quote | null>;
    getPair(instrumentId: string): Promise<QuotePair | null>;
}

/**
 * Bookkeeping the detection loop records alongside its scans
 */
export interface ScanBookkeeping {
    incrementOpportunitiesFound(): Promise<number>;
    setActiveMarkets(instrumentIds: readonly string[]): Promise<boolean>;
    setBotStatus(status: string): Promise<boolean>;
}

/**
 * Daily trade bookkeeping, keyed by UTC date (YYYY-MM-DD)
 */
export interface TradeLedger {
    incrementTradeCounter(date: string): Promise<number>;
    getDailyPnl(date: string): Promise<number>;
    setDailyPnl(date: string, pnl: number): Promise<boolean>;
}

export type MarketStatus = 'active' | 'halted' | 'closed';

export interface StoreStats {
    opportunitiesFound: number;
    botStatus: string | null;
    activeMarkets: string[];
}

const storedQuoteSchema = z.object({
    price: z.number().finite(),
    size: z.number().finite(),
    timestamp: z.number().finite(),
});

const activeMarketsSchema = z.array(z.string());

/**
 * Time-expiring best-ask store on Redis.
 *
 * Every quote is written with SET ... EX, so an expired side is simply absent.
 * Failures are reported by return value; nothing here throws.
 */
export class QuoteStore implements QuoteWriter, QuoteReader, ScanBookkeeping, TradeLedger {
    constructor(
        private readonly client: KeyValueClient,
        private readonly ttlSeconds: number
    ) {}

    public async put(quote: Quote): Promise<boolean> {
        const key = storeKeys.orderbook(quote.instrumentId, quote.side);
        const value = JSON.stringify({
            price: quote.price,
            size: quote.size,
            timestamp: quote.observedAt,
        });

        try {
            await this.client.set(key, value, 'EX', this.ttlSeconds);
            return true;
        } catch (error) {
            logger.error('store.put.error', { key, ...errorFields(error) });
            return false;
        }
    }

    public async get(instrumentId: string, side: Side): Promise<Quote | null> {
        const key = storeKeys.orderbook(instrumentId, side);

        let raw: string | null;
        try {
            raw = await this.client.get(key);
        } catch (error) {
            logger.error('store.get.error', { key, ...errorFields(error) });
            return null;
        }

        if (raw === null) {
            return null;
        }

        const parsed = storedQuoteSchema.safeParse(safeJsonParse(raw));
        if (!parsed.success) {
            logger.warn('store.get.invalid_value', { key });
            return null;
        }

        return {
            instrumentId,
            side,
            price: parsed.data.price,
            size: parsed.data.size,
            observedAt: parsed.data.timestamp,
        };
    }

    /**
     * Both sides or nothing
     */
    public async getPair(instrumentId: string): Promise<QuotePair | null> {
        const [yes, no] = await Promise.all([
            this.get(instrumentId, 'YES'),
            this.get(instrumentId, 'NO'),
        ]);

        if (!yes || !no) {
            return null;
        }

        return { yes, no };
    }

    public async setMarketStatus(instrumentId: string, status: MarketStatus): Promise<boolean> {
        const key = storeKeys.marketStatus(instrumentId);
        try {
            await this.client.set(key, status, 'EX', this.ttlSeconds * MARKET_STATUS_TTL_FACTOR);
            return true;
        } catch (error) {
            logger.error('store.market_status.error', { key, ...errorFields(error) });
            return false;
        }
    }

    public async getMarketStatus(instrumentId: string): Promise<string | null> {
        const key = storeKeys.marketStatus(instrumentId);
        try {
            return await this.client.get(key);
        } catch (error) {
            logger.error('store.market_status.error', { key, ...errorFields(error) });
            return null;
        }
    }

    /**
     * @param date - Day bucket, e.g. 2024-05-01
     * @returns The new count, or 0 if the store is unreachable
     */
    public async incrementTradeCounter(date: string): Promise<number> {
        const key = storeKeys.tradeCount(date);
        try {
            const count = await this.client.incr(key);
            await this.client.expire(key, TRADE_COUNTER_TTL_SECONDS);
            return count;
        } catch (error) {
            logger.error('store.trade_counter.error', { key, ...errorFields(error) });
            return 0;
        }
    }

    public async setDailyPnl(date: string, pnl: number): Promise<boolean> {
        const key = storeKeys.dailyPnl(date);
        try {
            await this.client.set(key, String(pnl), 'EX', DAILY_PNL_TTL_SECONDS);
            return true;
        } catch (error) {
            logger.error('store.daily_pnl.error', { key, ...errorFields(error) });
            return false;
        }
    }

    public async getDailyPnl(date: string): Promise<number> {
        const key = storeKeys.dailyPnl(date);
        try {
            const raw = await this.client.get(key);
            const pnl = raw === null ? 0 : Number(raw);
            return Number.isFinite(pnl) ? pnl : 0;
        } catch (error) {
            logger.error('store.daily_pnl.error', { key, ...errorFields(error) });
            return 0;
        }
    }

    public async incrementOpportunitiesFound(): Promise<number> {
        const key = storeKeys.opportunitiesFound();
        try {
            return await this.client.incr(key);
        } catch (error) {
            logger.error('store.opportunities.error', { key, ...errorFields(error) });
            return 0;
        }
    }

    public async setActiveMarkets(instrumentIds: readonly string[]): Promise<boolean> {
        const key = storeKeys.activeMarkets();
        try {
            await this.client.set(key, JSON.stringify(instrumentIds));
            return true;
        } catch (error) {
            logger.error('store.active_markets.error', { key, ...errorFields(error) });
            return false;
        }
    }

    public async setBotStatus(status: string): Promise<boolean> {
        const key = storeKeys.botStatus();
        try {
            await this.client.set(key, status);
            return true;
        } catch (error) {
            logger.error('store.bot_status.error', { key, ...errorFields(error) });
            return false;
        }
    }

    public async getStats(): Promise<StoreStats> {
        try {
            const [found, status, markets] = await Promise.all([
                this.client.get(storeKeys.opportunitiesFound()),
                this.client.get(storeKeys.botStatus()),
                this.client.get(storeKeys.activeMarkets()),
            ]);

            const parsedMarkets = activeMarketsSchema.safeParse(markets === null ? [] : safeJsonParse(markets));

            return {
                opportunitiesFound: found === null ? 0 : Number.parseInt(found, 10) || 0,
                botStatus: status,
                activeMarkets: parsedMarkets.success ? parsedMarkets.data : [],
            };
        } catch (error) {
            logger.error('store.stats.error', errorFields(error));
            return { opportunitiesFound: 0, botStatus: null, activeMarkets: [] };
        }
    }

    public async healthCheck(): Promise<boolean> {
        try {
            return (await this.client.ping()) === 'PONG';
        } catch {
            return false;
        }
    }
}

function safeJsonParse(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch {
        return undefined;
    }
}
