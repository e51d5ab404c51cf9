/**
 * Complementary-price arbitrage on one instrument. Immutable once built.
 */
export interface Opportunity {
    readonly instrumentId: string;
    readonly sumPrice: number;          // priceA + priceB
    readonly profitPercent: number;     // (1 - sum) / sum * 100
    readonly priceA: number;            // YES best ask
    readonly sizeA: number;
    readonly priceB: number;            // NO best ask
    readonly sizeB: number;
    readonly maxVolumeUsd: number;      // Notional across both legs, capped
    readonly expectedProfitUsd: number;
}

/**
 * Strategy parameters, fixed for the process lifetime
 */
export interface CalculatorParams {
    threshold: number;          // Strict upper bound on priceA + priceB, in (0, 1)
    minProfitPercent: number;
    minLiquidityUsd: number;
    maxPositionUsd: number;
}

/**
 * Limits applied when an opportunity is filled
 */
export interface ExecutionParams {
    feeRate: number;                // Fraction of each leg's notional
    maxSlippagePercent: number;     // Per leg, absolute
}

/**
 * Why a quote pair produced no opportunity
 */
export type DiscardReason =
    | 'invalid_quote'
    | 'above_threshold'
    | 'insufficient_profit'
    | 'insufficient_liquidity';

export type Evaluation =
    | { ok: true; opportunity: Opportunity }
    | { ok: false; reason: DiscardReason; sumPrice?: number; profitPercent?: number; maxVolumeUsd?: number };

/**
 * One side's input to the calculator; fields may be missing in stored data
 */
export interface LegInput {
    price: number | null | undefined;
    size: number | null | undefined;
}

/**
 * Equal share counts for both legs
 */
export interface TradeSizes {
    sharesA: number;
    sharesB: number;
}
