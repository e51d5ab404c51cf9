import { ClobClient, Chain } from '@polymarket/clob-client';
import { logger, errorFields } from '../../infra/logger.js';
import type { PolyOrderbook, PolyOrderbookLevel } from './types.js';

/**
 * Best ask of one REST orderbook, as plain numbers
 */
export interface BestAsk {
    price: number;
    size: number;
}

/**
 * Polymarket CLOB Client Wrapper (read-only)
 */
export class PolyClient {
    private client: ClobClient;

    constructor(host: string) {
        // No credentials: public market data only
        this.client = new ClobClient(host, Chain.POLYGON);

        logger.info('poly.client.init', {
            host,
            chainId: Chain.POLYGON,
            mode: 'read-only',
        });
    }

    /**
     * Fetch orderbook for a given token ID
     */
    async getOrderbook(tokenId: string): Promise<PolyOrderbook | null> {
        try {
            const orderbook = await this.client.getOrderBook(tokenId);

            if (!orderbook) {
                logger.warn('poly.orderbook.empty', {
                    tokenId,
                });
                return null;
            }

            return {
                bids: orderbook.bids || [],
                asks: orderbook.asks || [],
                timestamp: orderbook.timestamp,
                market: orderbook.market,
            };
        } catch (error) {
            logger.error('poly.orderbook.error', {
                tokenId,
                ...errorFields(error),
            });
            return null;
        }
    }

    /**
     * Lowest-priced ask of a token's book, or null if the book is empty or unreadable
     */
    async getBestAsk(tokenId: string): Promise<BestAsk | null> {
        const orderbook = await this.getOrderbook(tokenId);
        if (!orderbook) {
            return null;
        }
        return bestAsk(orderbook.asks);
    }
}

/**
 * Pick the lowest valid ask. REST books are not guaranteed to be sorted.
 */
export function bestAsk(asks: PolyOrderbookLevel[]): BestAsk | null {
    let best: BestAsk | null = null;

    for (const level of asks) {
        const price = parseFloat(level.price);
        const size = parseFloat(level.size);

        if (isNaN(price) || isNaN(size) || price <= 0 || size < 0) {
            continue;
        }
        if (!best || price < best.price) {
            best = { price, size };
        }
    }

    return best;
}
