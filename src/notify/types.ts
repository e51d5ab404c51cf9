import type { Opportunity } from '../strategy/types.js';

/**
 * Outbound opportunity alerts. Resolves false when nothing was delivered.
 */
export interface OpportunityNotifier {
    notifyOpportunity(opportunity: Opportunity): Promise<boolean>;
}

/**
 * Outbound fault alerts
 */
export interface AlertSink {
    notifyError(message: string, critical: boolean): Promise<boolean>;
}

/**
 * Hook for a future execution path; called for every emitted opportunity
 */
export interface OpportunityExecutor {
    execute(opportunity: Opportunity): Promise<void>;
}

export interface TradeReport {
    instrumentId: string;
    volumeUsd: number;
    expectedProfitPercent: number;
    success: boolean;
}

export interface DailyReport {
    trades: number;
    profitUsd: number;
    volumeUsd: number;
    winRatePercent: number;
}

/**
 * Outbound trade results
 */
export interface TradeReporter {
    notifyTrade(report: TradeReport): Promise<boolean>;
}
