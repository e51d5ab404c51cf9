import { z } from 'zod';

/**
 * Outcome side of a binary instrument
 */
export type Side = 'YES' | 'NO';

/**
 * Best-ask snapshot for one side of an instrument
 */
export interface Quote {
    readonly instrumentId: string;
    readonly side: Side;
    readonly price: number;
    readonly size: number;       // Shares offered at `price`
    readonly observedAt: number; // Epoch ms
}

/**
 * Both sides of one instrument, present and unexpired
 */
export interface QuotePair {
    readonly yes: Quote;
    readonly no: Quote;
}

/**
 * Polymarket REST orderbook level
 */
export interface PolyOrderbookLevel {
    price: string;      // Price as string from API
    size: string;       // Quantity as string from API
}

/**
 * Polymarket REST orderbook
 */
export interface PolyOrderbook {
    bids: PolyOrderbookLevel[];
    asks: PolyOrderbookLevel[];
    timestamp?: string | number;
    market?: string;
}

// ---------------------------------------------------------------------------
// Streaming wire format
// ---------------------------------------------------------------------------

/**
 * Number or numeric string, finite after coercion
 */
const numeric = z
    .union([z.number(), z.string().trim().min(1)])
    .transform(val => Number(val))
    .pipe(z.number().finite());

/**
 * Envelope shared by every inbound message; only `type` is looked at
 */
export const feedEnvelopeSchema = z.object({
    type: z.string(),
}).passthrough();

export const bookUpdateSchema = z.object({
    type: z.literal('book_update'),
    market: z.string().min(1),
    asks: z.array(z.tuple([numeric, numeric]).rest(z.unknown())),
    timestamp: numeric.optional(),
    asset: z.string().optional(),
});

export const subscribedSchema = z.object({
    type: z.literal('subscribed'),
    market: z.string().optional(),
});

export const feedErrorSchema = z.object({
    type: z.literal('error'),
    message: z.string().optional(),
    market: z.string().optional(),
});

/**
 * Outbound subscribe request, one per instrument
 */
export interface SubscribeRequest {
    type: 'subscribe';
    channel: 'book';
    market: string;
}
