import { logger } from '../infra/logger.js';
import type { QuoteReader, TradeLedger } from '../data/store/quote_store.js';
import type { OpportunityExecutor, TradeReporter } from '../notify/types.js';
import {
    calculateNetProfit,
    calculateSlippage,
    calculateTradeSizes,
    isSlippageAcceptable,
} from './arb_calculator.js';
import type { ExecutionParams, Opportunity } from './types.js';

export interface DryRunExecutorOptions {
    quotes: QuoteReader;
    ledger: TradeLedger;
    reporter?: TradeReporter;
    params: ExecutionParams;
    now?: () => number;
}

export type DryRunOutcome =
    | { filled: true; shares: number; volumeUsd: number; netProfitUsd: number }
    | { filled: false; reason: 'quotes_expired' | 'slippage'; slippageA?: number; slippageB?: number };

/**
 * Simulated execution: fills both legs at the asks current at execution time,
 * rejects fills whose slippage exceeds the limit, and books the net result in
 * the daily ledger. No order leaves the process.
 */
export class DryRunExecutor implements OpportunityExecutor {
    private readonly now: () => number;

    constructor(private readonly options: DryRunExecutorOptions) {
        this.now = options.now ?? Date.now;
    }

    public async execute(opportunity: Opportunity): Promise<void> {
        const outcome = await this.simulate(opportunity);
        const date = new Date(this.now()).toISOString().slice(0, 10);

        if (outcome.filled) {
            await this.options.ledger.incrementTradeCounter(date);
            const pnl = await this.options.ledger.getDailyPnl(date);
            await this.options.ledger.setDailyPnl(date, pnl + outcome.netProfitUsd);

            logger.info('exec.dry_run.filled', {
                instrumentId: opportunity.instrumentId,
                shares: outcome.shares.toFixed(2),
                volumeUsd: outcome.volumeUsd.toFixed(2),
                netProfitUsd: outcome.netProfitUsd.toFixed(4),
            });
        } else {
            logger.warn('exec.dry_run.rejected', { instrumentId: opportunity.instrumentId, ...outcome });
        }

        await this.options.reporter?.notifyTrade({
            instrumentId: opportunity.instrumentId,
            volumeUsd: outcome.filled ? outcome.volumeUsd : 0,
            expectedProfitPercent: opportunity.profitPercent,
            success: outcome.filled,
        });
    }

    public async simulate(opportunity: Opportunity): Promise<DryRunOutcome> {
        const pair = await this.options.quotes.getPair(opportunity.instrumentId);
        if (!pair) {
            return { filled: false, reason: 'quotes_expired' };
        }

        const slippageA = calculateSlippage(opportunity.priceA, pair.yes.price);
        const slippageB = calculateSlippage(opportunity.priceB, pair.no.price);
        const { maxSlippagePercent, feeRate } = this.options.params;

        if (!isSlippageAcceptable(slippageA, maxSlippagePercent) || !isSlippageAcceptable(slippageB, maxSlippagePercent)) {
            return { filled: false, reason: 'slippage', slippageA, slippageB };
        }

        const { sharesA: shares } = calculateTradeSizes(opportunity, opportunity.maxVolumeUsd);
        const volumeUsd = shares * (pair.yes.price + pair.no.price);

        return {
            filled: true,
            shares,
            volumeUsd,
            netProfitUsd: calculateNetProfit(pair.yes.price, pair.no.price, volumeUsd, feeRate),
        };
    }
}
