import TelegramBot from 'node-telegram-bot-api';
import { logger, errorFields } from '../infra/logger.js';
import type { Opportunity } from '../strategy/types.js';
import type { AlertSink, DailyReport, OpportunityNotifier, TradeReport, TradeReporter } from './types.js';

export interface TelegramConfig {
    botToken: string;
    chatId: string;
}

/**
 * The part of the bot API this notifier calls. `TelegramBot` satisfies it.
 */
export interface TelegramTransport {
    sendMessage(chatId: string, text: string, options: { parse_mode: 'HTML' }): Promise<unknown>;
}

function escapeHtml(text: string): string {
    return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatOpportunityMessage(opportunity: Opportunity): string {
    return [
        '🎯 <b>Arbitrage Opportunity</b>',
        '',
        `Market: <code>${escapeHtml(opportunity.instrumentId)}</code>`,
        `Yes Price: ${opportunity.priceA.toFixed(4)}`,
        `No Price: ${opportunity.priceB.toFixed(4)}`,
        `Sum: ${opportunity.sumPrice.toFixed(4)}`,
        `Expected Profit: <b>${opportunity.profitPercent.toFixed(2)}%</b>`,
    ].join('\n');
}

/**
 * Telegram alerts. Disabled without credentials; never throws.
 */
export class TelegramNotifier implements OpportunityNotifier, AlertSink, TradeReporter {
    private readonly transport: TelegramTransport | null;
    private readonly chatId: string;

    constructor(config: TelegramConfig, transport?: TelegramTransport) {
        this.chatId = config.chatId;

        if (!config.botToken || !config.chatId) {
            this.transport = null;
            logger.warn('notify.telegram.disabled', { reason: 'missing credentials' });
            return;
        }

        this.transport = transport ?? new TelegramBot(config.botToken, { polling: false });
        logger.info('notify.telegram.init', { chatId: config.chatId });
    }

    public isEnabled(): boolean {
        return this.transport !== null;
    }

    public async sendMessage(text: string): Promise<boolean> {
        if (!this.transport) {
            return false;
        }

        try {
            await this.transport.sendMessage(this.chatId, text, { parse_mode: 'HTML' });
            return true;
        } catch (error) {
            logger.error('notify.telegram.send_failed', errorFields(error));
            return false;
        }
    }

    public notifyOpportunity(opportunity: Opportunity): Promise<boolean> {
        return this.sendMessage(formatOpportunityMessage(opportunity));
    }

    public notifyError(message: string, critical: boolean): Promise<boolean> {
        const title = critical ? '🚨 <b>CRITICAL</b>' : '⚠️ <b>Error</b>';
        return this.sendMessage(`${title}\n\n${escapeHtml(message)}`);
    }

    public notifyBotStatus(status: 'started' | 'stopped', details = ''): Promise<boolean> {
        const emoji = status === 'started' ? '🟢' : '🔴';
        return this.sendMessage(`${emoji} <b>Bot ${status.toUpperCase()}</b>\n\n${escapeHtml(details)}`);
    }

    public notifyTrade(report: TradeReport): Promise<boolean> {
        const emoji = report.success ? '✅' : '❌';
        const status = report.success ? 'Executed' : 'Failed';
        return this.sendMessage([
            `${emoji} <b>Trade ${status}</b>`,
            '',
            `Market: <code>${escapeHtml(report.instrumentId)}</code>`,
            `Volume: $${report.volumeUsd.toFixed(2)}`,
            `Expected Profit: ${report.expectedProfitPercent.toFixed(2)}%`,
        ].join('\n'));
    }

    public notifyDailyReport(report: DailyReport): Promise<boolean> {
        return this.sendMessage([
            '📊 <b>Daily Report</b>',
            '',
            `Trades: ${report.trades}`,
            `Total Profit: $${report.profitUsd.toFixed(2)}`,
            `Volume: $${report.volumeUsd.toFixed(2)}`,
            `Win Rate: ${report.winRatePercent.toFixed(1)}%`,
        ].join('\n'));
    }
}
