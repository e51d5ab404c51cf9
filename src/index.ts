import { env } from './config/env.js';
import { logger, errorFields } from './infra/logger.js';
import { connectRedis, createRedisClient } from './infra/redis.js';
import { QuoteStore } from './data/store/quote_store.js';
import { FeedIngestor } from './data/polymarket/feed_ingestor.js';
import { createWsConnector } from './data/polymarket/ws_connector.js';
import { TelegramNotifier } from './notify/telegram_notifier.js';
import { NotificationGate } from './strategy/notification_gate.js';
import { ArbDetector } from './strategy/arb_detector.js';
import { DryRunExecutor } from './strategy/dry_run_executor.js';
import { shutdownServices } from './lifecycle.js';

// Process-wide handles, passed by reference into each component
const redis = createRedisClient({
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD,
    db: env.REDIS_DB,
});
let ingestor: FeedIngestor | null = null;
let detector: ArbDetector | null = null;
let detectorDone: Promise<void> | null = null;
let notifier: TelegramNotifier | null = null;
let statsTimer: NodeJS.Timeout | null = null;
let shuttingDown = false;

/**
 * Main application entry point
 */
async function main() {
    logger.info('app.boot', {
        message: 'Application starting...',
        environment: env.NODE_ENV,
    });

    console.log('\n✅ Boot OK');
    console.log(`⏰ Timestamp: ${new Date().toISOString()}`);
    console.log(`🌍 Environment: ${env.NODE_ENV}`);
    console.log(`📝 Log Level: ${env.LOG_LEVEL}`);
    console.log(`💾 Log to File: ${env.LOG_TO_FILE ? 'Enabled' : 'Disabled'}`);
    console.log(`\n🔹 Book Feed:`);
    console.log(`  🔗 WebSocket: ${env.POLY_WS_URL}`);
    console.log(`  🎲 Markets: ${env.WATCH_MARKETS.length}`);
    console.log(`  📦 Group Size: ${env.FEED_GROUP_SIZE}`);
    console.log(`  🔁 Reconnect: ${env.FEED_RECONNECT_BASE_MS}ms → ${env.FEED_RECONNECT_MAX_MS}ms`);
    console.log(`\n🗄️  Redis: ${env.REDIS_HOST}:${env.REDIS_PORT} (TTL ${env.QUOTE_TTL_SECONDS}s)`);
    console.log(`\n🎯 Arbitrage Strategy:`);
    console.log(`  📏 Threshold: ${env.ARB_THRESHOLD}`);
    console.log(`  💰 Min Profit: ${env.MIN_PROFIT_PERCENT}%`);
    console.log(`  💧 Min Liquidity: $${env.MIN_LIQUIDITY_USD}`);
    console.log(`  🛡️  Max Position: $${env.MAX_POSITION_SIZE_USD}`);
    console.log(`  ⏱️  Scan Interval: ${env.SCAN_INTERVAL_MS}ms`);
    console.log(`  🔕 Notify Cooldown: ${env.NOTIFY_COOLDOWN_MS}ms`);
    console.log(`  🧪 Dry-run Execution: ${env.DRY_RUN_EXECUTION ? `on (fee ${env.FEE_RATE}, max slippage ${env.MAX_SLIPPAGE_PERCENT}%)` : 'off'}\n`);

    const redisConnected = await connectRedis(redis, { host: env.REDIS_HOST, port: env.REDIS_PORT });

    const store = new QuoteStore(redis, env.QUOTE_TTL_SECONDS);
    notifier = new TelegramNotifier({ botToken: env.TELEGRAM_BOT_TOKEN, chatId: env.TELEGRAM_CHAT_ID });

    ingestor = new FeedIngestor({
        url: env.POLY_WS_URL,
        instruments: env.WATCH_MARKETS,
        groupSize: env.FEED_GROUP_SIZE,
        store,
        connector: createWsConnector({
            pingIntervalMs: env.FEED_PING_INTERVAL_MS,
            handshakeTimeoutMs: env.FEED_HANDSHAKE_TIMEOUT_MS,
        }),
        reconnectBaseMs: env.FEED_RECONNECT_BASE_MS,
        reconnectMaxMs: env.FEED_RECONNECT_MAX_MS,
    });

    detector = new ArbDetector({
        store,
        bookkeeping: store,
        notifier,
        alerts: notifier,
        executor: env.DRY_RUN_EXECUTION
            ? new DryRunExecutor({
                quotes: store,
                ledger: store,
                reporter: notifier,
                params: {
                    feeRate: env.FEE_RATE,
                    maxSlippagePercent: env.MAX_SLIPPAGE_PERCENT,
                },
            })
            : undefined,
        gate: new NotificationGate(env.NOTIFY_COOLDOWN_MS),
        params: {
            threshold: env.ARB_THRESHOLD,
            minProfitPercent: env.MIN_PROFIT_PERCENT,
            minLiquidityUsd: env.MIN_LIQUIDITY_USD,
            maxPositionUsd: env.MAX_POSITION_SIZE_USD,
        },
        scanIntervalMs: env.SCAN_INTERVAL_MS,
    });

    ingestor.start();
    detectorDone = detector.start(env.WATCH_MARKETS);

    statsTimer = setInterval(() => {
        logStats(store).catch((error: unknown) => {
            logger.error('app.stats.error', errorFields(error));
        });
    }, env.STATS_INTERVAL_MS);

    await notifier.notifyBotStatus('started', `Watching ${env.WATCH_MARKETS.length} market(s)`);

    logger.info('app.ready', {
        message: 'Application initialized successfully',
        features: {
            config: 'loaded',
            logger: 'initialized',
            quoteStore: redisConnected ? 'connected' : 'reconnecting',
            feeds: ingestor.getFeedCount(),
            detector: 'running',
            telegram: notifier.isEnabled() ? 'enabled' : 'disabled',
        },
    });

    await detectorDone;

    // The loop only exits on its own after a fatal cycle
    if (!shuttingDown) {
        await shutdown('detector_exit', 1);
    }
}

async function logStats(store: QuoteStore): Promise<void> {
    logger.info('app.stats', {
        redisHealthy: await store.healthCheck(),
        detector: detector?.getStats(),
        feeds: ingestor?.getStats(),
        store: await store.getStats(),
    });
}

/**
 * Graceful shutdown: stop both loops, tell the operator, close Redis
 */
async function shutdown(reason: string, exitCode: number): Promise<void> {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;

    logger.info('app.shutdown', {
        message: `Shutting down (${reason})...`,
    });

    if (statsTimer) {
        clearInterval(statsTimer);
        statsTimer = null;
    }

    await shutdownServices({ ingestor, detector, detectorDone, notifier, redis }, reason);

    setTimeout(() => {
        process.exit(exitCode);
    }, 1000);
}

function onSignal(signal: string) {
    shutdown(signal, 0).catch((error: unknown) => {
        logger.error('app.shutdown.error', errorFields(error));
        process.exit(1);
    });
}

// Register shutdown handlers
process.on('SIGINT', () => onSignal('SIGINT'));
process.on('SIGTERM', () => onSignal('SIGTERM'));

// Start the application
main().catch((error) => {
    logger.error('app.fatal', {
        message: 'Fatal error during application startup',
        ...errorFields(error),
    });
    process.exit(1);
});
