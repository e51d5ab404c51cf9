import type {
    CalculatorParams,
    Evaluation,
    LegInput,
    Opportunity,
    TradeSizes,
} from './types.js';

export const DEFAULT_FEE_RATE = 0.002;

function isValidPrice(value: number | null | undefined): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isValidSize(value: number | null | undefined): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * USD notional of the largest equal-share position both books can fill.
 * One YES and one NO share redeem together for $1, so share counts must match.
 */
export function calculateMaxVolume(priceA: number, sizeA: number, priceB: number, sizeB: number): number {
    const maxShares = Math.min(sizeA / priceA, sizeB / priceB);
    return maxShares * (priceA + priceB);
}

/**
 * Decide whether a quote pair is an opportunity, and why not if it isn't
 */
export function evaluateOpportunity(
    instrumentId: string,
    legA: LegInput,
    legB: LegInput,
    params: CalculatorParams
): Evaluation {
    const { price: priceA, size: sizeA } = legA;
    const { price: priceB, size: sizeB } = legB;

    if (!isValidPrice(priceA) || !isValidPrice(priceB) || !isValidSize(sizeA) || !isValidSize(sizeB)) {
        return { ok: false, reason: 'invalid_quote' };
    }

    const sumPrice = priceA + priceB;
    if (sumPrice >= params.threshold) {
        return { ok: false, reason: 'above_threshold', sumPrice };
    }

    const profitPercent = ((1 - sumPrice) / sumPrice) * 100;
    if (profitPercent < params.minProfitPercent) {
        return { ok: false, reason: 'insufficient_profit', sumPrice, profitPercent };
    }

    const liquidityUsd = calculateMaxVolume(priceA, sizeA, priceB, sizeB);
    if (liquidityUsd < params.minLiquidityUsd) {
        return { ok: false, reason: 'insufficient_liquidity', sumPrice, profitPercent, maxVolumeUsd: liquidityUsd };
    }

    const maxVolumeUsd = Math.min(liquidityUsd, params.maxPositionUsd);

    const opportunity: Opportunity = Object.freeze({
        instrumentId,
        sumPrice,
        profitPercent,
        priceA,
        sizeA,
        priceB,
        sizeB,
        maxVolumeUsd,
        expectedProfitUsd: maxVolumeUsd * (1 - sumPrice),
    });

    return { ok: true, opportunity };
}

/**
 * Opportunity for the pair, or null
 */
export function calculateOpportunity(
    instrumentId: string,
    legA: LegInput,
    legB: LegInput,
    params: CalculatorParams
): Opportunity | null {
    const evaluation = evaluateOpportunity(instrumentId, legA, legB, params);
    return evaluation.ok ? evaluation.opportunity : null;
}

/**
 * Shares to buy on each leg for a target notional, capped at the opportunity's volume
 */
export function calculateTradeSizes(opportunity: Opportunity, targetVolumeUsd: number): TradeSizes {
    const volume = Math.max(0, Math.min(targetVolumeUsd, opportunity.maxVolumeUsd));
    const shares = volume / (opportunity.priceA + opportunity.priceB);
    return { sharesA: shares, sharesB: shares };
}

/**
 * Slippage in percent; positive means a worse fill than expected
 */
export function calculateSlippage(expectedPrice: number, executedPrice: number): number {
    return ((executedPrice - expectedPrice) / expectedPrice) * 100;
}

export function isSlippageAcceptable(slippagePercent: number, maxSlippagePercent: number): boolean {
    return Math.abs(slippagePercent) <= maxSlippagePercent;
}

export function calculateFees(volumeUsd: number, feeRate: number = DEFAULT_FEE_RATE): number {
    return volumeUsd * feeRate;
}

/**
 * Realized profit after fills: $1 per matched share pair, minus both legs'
 * notional and both legs' fees.
 */
export function calculateNetProfit(
    actualPriceA: number,
    actualPriceB: number,
    volumeUsd: number,
    feeRate: number = DEFAULT_FEE_RATE
): number {
    const shares = volumeUsd / (actualPriceA + actualPriceB);
    const notionalA = shares * actualPriceA;
    const notionalB = shares * actualPriceB;
    const fees = calculateFees(notionalA, feeRate) + calculateFees(notionalB, feeRate);
    const payout = shares * 1;

    return payout - notionalA - notionalB - fees;
}
