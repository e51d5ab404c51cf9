import { logger, errorFields } from '../infra/logger.js';
import type { QuoteReader, ScanBookkeeping } from '../data/store/quote_store.js';
import type { AlertSink, OpportunityExecutor, OpportunityNotifier } from '../notify/types.js';
import { evaluateOpportunity } from './arb_calculator.js';
import type { NotificationGate } from './notification_gate.js';
import type { CalculatorParams, Opportunity } from './types.js';

export interface ArbDetectorOptions {
    store: QuoteReader;
    bookkeeping?: ScanBookkeeping;
    notifier: OpportunityNotifier;
    alerts?: AlertSink;
    executor?: OpportunityExecutor;
    gate: NotificationGate;
    params: CalculatorParams;
    scanIntervalMs: number;
}

export interface ArbDetectorStats {
    watched: number;
    isRunning: boolean;
    crashed: boolean;
    scanIntervalMs: number;
    cycles: number;
    opportunitiesFound: number;
    notificationsSent: number;
}

/**
 * Detection loop: samples both sides of every watched instrument on a fixed
 * interval, ranks what the calculator admits, and alerts through the gate.
 *
 * An unexpected error inside a cycle is fatal: it is logged as critical,
 * reported to the alert sink, and the loop ends.
 */
export class ArbDetector {
    private watchSet = new Set<string>();
    private isRunning = false;
    private crashed = false;
    private sleepTimer: NodeJS.Timeout | null = null;
    private wake: (() => void) | null = null;

    private stats = {
        cycles: 0,
        opportunitiesFound: 0,
        notificationsSent: 0,
    };

    constructor(private readonly options: ArbDetectorOptions) {
        logger.info('arb.detector.init', {
            threshold: options.params.threshold,
            minProfitPercent: options.params.minProfitPercent,
            minLiquidityUsd: options.params.minLiquidityUsd,
            maxPositionUsd: options.params.maxPositionUsd,
            scanIntervalMs: options.scanIntervalMs,
        });
    }

    /**
     * Run until stopped or until a cycle fails. Resolves when the loop has exited.
     */
    public async start(instrumentIds: readonly string[] = []): Promise<void> {
        if (this.isRunning) {
            logger.warn('arb.detector.already_running', {});
            return;
        }

        this.isRunning = true;
        this.crashed = false;
        for (const id of instrumentIds) {
            this.watchSet.add(id);
        }

        logger.info('arb.detector.started', {
            watched: this.watchSet.size,
            scanIntervalMs: this.options.scanIntervalMs,
        });

        await this.options.bookkeeping?.setActiveMarkets(Array.from(this.watchSet));
        await this.options.bookkeeping?.setBotStatus('running');

        try {
            while (this.isRunning) {
                await this.scanCycle();
                if (!this.isRunning) {
                    break;
                }
                await this.sleep(this.options.scanIntervalMs);
            }
        } catch (error) {
            this.isRunning = false;
            this.crashed = true;

            logger.critical('arb.detector.crashed', errorFields(error));
            await this.raiseAlert(`Arb detector crashed: ${errorFields(error).error}`);
        } finally {
            await this.options.bookkeeping?.setBotStatus('stopped');
            logger.info('arb.detector.exited', { crashed: this.crashed, cycles: this.stats.cycles });
        }
    }

    /**
     * Let the current cycle finish, then exit
     */
    public stop(): void {
        if (!this.isRunning) {
            return;
        }

        this.isRunning = false;

        if (this.sleepTimer) {
            clearTimeout(this.sleepTimer);
            this.sleepTimer = null;
        }
        if (this.wake) {
            this.wake();
            this.wake = null;
        }

        logger.info('arb.detector.stopping', {});
    }

    /**
     * One pass over a snapshot of the watch set.
     * @returns Emitted opportunities, best profit first
     */
    public async scanCycle(): Promise<Opportunity[]> {
        const snapshot = Array.from(this.watchSet);
        this.stats.cycles++;

        const checked = await Promise.all(snapshot.map(id => this.checkInstrument(id)));

        const opportunities = checked
            .filter((opp): opp is Opportunity => opp !== null)
            .sort((a, b) => b.profitPercent - a.profitPercent);

        for (const opportunity of opportunities) {
            await this.processOpportunity(opportunity);
        }

        return opportunities;
    }

    public addMarket(instrumentId: string): void {
        if (this.watchSet.has(instrumentId)) {
            return;
        }

        this.watchSet.add(instrumentId);
        logger.info('arb.market.added', { instrumentId, watched: this.watchSet.size });
        this.syncActiveMarkets();
    }

    public removeMarket(instrumentId: string): void {
        if (!this.watchSet.delete(instrumentId)) {
            return;
        }

        logger.info('arb.market.removed', { instrumentId, watched: this.watchSet.size });
        this.syncActiveMarkets();
    }

    public getWatched(): string[] {
        return Array.from(this.watchSet);
    }

    public getStats(): ArbDetectorStats {
        return {
            watched: this.watchSet.size,
            isRunning: this.isRunning,
            crashed: this.crashed,
            scanIntervalMs: this.options.scanIntervalMs,
            ...this.stats,
        };
    }

    private async checkInstrument(instrumentId: string): Promise<Opportunity | null> {
        const pair = await this.options.store.getPair(instrumentId);
        if (!pair) {
            return null;
        }

        const evaluation = evaluateOpportunity(instrumentId, pair.yes, pair.no, this.options.params);
        if (!evaluation.ok) {
            if (evaluation.reason !== 'above_threshold') {
                logger.debug('arb.discard', { instrumentId, ...evaluation });
            }
            return null;
        }

        return evaluation.opportunity;
    }

    private async processOpportunity(opportunity: Opportunity): Promise<void> {
        this.stats.opportunitiesFound++;
        await this.options.bookkeeping?.incrementOpportunitiesFound();

        logger.warn('arb.opportunity', {
            instrumentId: opportunity.instrumentId,
            sumPrice: opportunity.sumPrice.toFixed(4),
            profitPercent: opportunity.profitPercent.toFixed(2),
            yes: `${opportunity.priceA.toFixed(4)} x ${opportunity.sizeA.toFixed(2)}`,
            no: `${opportunity.priceB.toFixed(4)} x ${opportunity.sizeB.toFixed(2)}`,
            maxVolumeUsd: opportunity.maxVolumeUsd.toFixed(2),
            expectedProfitUsd: opportunity.expectedProfitUsd.toFixed(2),
        });

        if (this.options.gate.shouldNotify(opportunity.instrumentId)) {
            this.dispatchNotification(opportunity);
            this.options.gate.recordNotification(opportunity.instrumentId);
            this.stats.notificationsSent++;
        }

        if (this.options.executor) {
            try {
                await this.options.executor.execute(opportunity);
            } catch (error) {
                logger.error('arb.execute.failed', {
                    instrumentId: opportunity.instrumentId,
                    ...errorFields(error),
                });
            }
        }
    }

    /**
     * Fire and forget; delivery never affects the scan
     */
    private dispatchNotification(opportunity: Opportunity): void {
        this.options.notifier
            .notifyOpportunity(opportunity)
            .then(sent => {
                if (!sent) {
                    logger.debug('arb.notify.not_sent', { instrumentId: opportunity.instrumentId });
                }
            })
            .catch((error: unknown) => {
                logger.error('arb.notify.failed', {
                    instrumentId: opportunity.instrumentId,
                    ...errorFields(error),
                });
            });
    }

    private async raiseAlert(message: string): Promise<void> {
        if (!this.options.alerts) {
            return;
        }

        try {
            await this.options.alerts.notifyError(message, true);
        } catch (error) {
            logger.error('arb.alert.failed', errorFields(error));
        }
    }

    private syncActiveMarkets(): void {
        this.options.bookkeeping
            ?.setActiveMarkets(Array.from(this.watchSet))
            .catch((error: unknown) => {
                logger.error('arb.active_markets.failed', errorFields(error));
            });
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            this.wake = resolve;
            this.sleepTimer = setTimeout(() => {
                this.sleepTimer = null;
                this.wake = null;
                resolve();
            }, ms);
        });
    }
}
