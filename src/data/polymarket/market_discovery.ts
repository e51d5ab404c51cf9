import { z } from 'zod';
import { logger, errorFields } from '../../infra/logger.js';
import type { ScanTarget } from '../../config/scan_targets.js';

/**
 * The part of `fetch` discovery uses
 */
export type FetchLike = (url: string) => Promise<{
    ok: boolean;
    status: number;
    statusText: string;
    json(): Promise<unknown>;
}>;

/**
 * JSON array, JSON-encoded array string, or bare string
 */
const listField = z.union([z.array(z.unknown()), z.string()]).optional();

const idField = z.union([z.string(), z.number()]).transform(val => String(val));

const gammaMarketSchema = z.object({
    id: idField,
    slug: z.string().optional(),
    question: z.string().default(''),
    closed: z.boolean().optional(),
    enableOrderBook: z.boolean().optional(),
    outcomes: listField,
    clobTokenIds: listField,
    liquidity: z.coerce.number().finite().optional().catch(undefined),
});

const gammaEventSchema = z.object({
    id: idField,
    active: z.boolean().optional(),
    closed: z.boolean().optional(),
    markets: z.array(z.unknown()).optional(),
});

export type GammaMarket = z.infer<typeof gammaMarketSchema>;

export interface DiscoveredMarket extends ScanTarget {
    question: string;
    liquidity: number;
}

const PAGE_SIZE = 100;

export function parseListField(field: unknown): string[] {
    if (Array.isArray(field)) {
        return field.map(item => String(item));
    }
    if (typeof field !== 'string' || field.length === 0) {
        return [];
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(field);
    } catch {
        return [field];
    }
    return Array.isArray(parsed) ? parsed.map(item => String(item)) : [field];
}

/**
 * Pair a binary market's Yes/No outcomes with their CLOB token ids.
 * Null for closed, non-orderbook or non-binary markets.
 */
export function toDiscoveredMarket(market: GammaMarket): DiscoveredMarket | null {
    if (market.closed || market.enableOrderBook === false) {
        return null;
    }

    const outcomes = parseListField(market.outcomes).map(o => o.trim().toLowerCase());
    const tokenIds = parseListField(market.clobTokenIds);
    if (outcomes.length !== 2 || tokenIds.length !== 2) {
        return null;
    }

    const yesTokenId = tokenIds[outcomes.indexOf('yes')];
    const noTokenId = tokenIds[outcomes.indexOf('no')];
    if (!yesTokenId || !noTokenId) {
        return null;
    }

    return {
        instrumentId: market.id,
        yesTokenId,
        noTokenId,
        question: market.question,
        liquidity: market.liquidity ?? 0,
    };
}

/**
 * Active binary markets from the Gamma events endpoint, most liquid first
 */
export class MarketDiscovery {
    constructor(
        private readonly baseUrl: string,
        private readonly fetchFn: FetchLike = fetch
    ) {}

    async discover(limit: number, maxEvents: number): Promise<DiscoveredMarket[]> {
        const found = new Map<string, DiscoveredMarket>();
        let offset = 0;

        while (offset < maxEvents) {
            const events = await this.fetchEventPage(offset);

            for (const event of events) {
                if (event.closed || event.active === false) {
                    continue;
                }
                for (const raw of event.markets ?? []) {
                    const parsed = gammaMarketSchema.safeParse(raw);
                    if (!parsed.success) {
                        logger.warn('discovery.market.parse_error', {
                            eventId: event.id,
                            error: parsed.error.issues[0]?.message,
                        });
                        continue;
                    }
                    const market = toDiscoveredMarket(parsed.data);
                    if (market) {
                        found.set(market.instrumentId, market);
                    }
                }
            }

            offset += PAGE_SIZE;
            if (events.length < PAGE_SIZE) {
                break;
            }
        }

        const ranked = Array.from(found.values())
            .sort((a, b) => b.liquidity - a.liquidity)
            .slice(0, limit);

        logger.info('discovery.complete', {
            eventsScanned: offset,
            binaryMarkets: found.size,
            returned: ranked.length,
        });

        return ranked;
    }

    private async fetchEventPage(offset: number): Promise<Array<z.infer<typeof gammaEventSchema>>> {
        const url = `${this.baseUrl}/events?active=true&closed=false&order=id&ascending=false&limit=${PAGE_SIZE}&offset=${offset}`;
        logger.debug('discovery.events.request', { offset, limit: PAGE_SIZE });

        try {
            const response = await this.fetchFn(url);
            if (!response.ok) {
                throw new Error(`Gamma API error: ${response.status} ${response.statusText}`);
            }
            return z.array(gammaEventSchema).parse(await response.json());
        } catch (error) {
            logger.error('discovery.events.fetch_error', { offset, ...errorFields(error) });
            throw error;
        }
    }
}
