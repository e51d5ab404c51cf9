import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
loadEnv();

/**
 * Comma-separated list -> trimmed, non-empty entries
 */
const csvList = z
    .string()
    .default('')
    .transform(val => val.split(',').map(s => s.trim()).filter(s => s.length > 0));

// Define the schema for environment variables
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'critical']).default('info'),
    LOG_TO_FILE: z.enum(['true', 'false']).transform(val => val === 'true').default('true'),
    LOG_DIR: z.string().default('./logs'),

    // Polymarket endpoints
    POLY_WS_URL: z.string().url().default('wss://ws-subscriptions-clob.polymarket.com/ws'),
    POLY_REST_URL: z.string().url().default('https://clob.polymarket.com'),
    GAMMA_URL: z.string().url().default('https://gamma-api.polymarket.com'),

    // Book feed
    WATCH_MARKETS: csvList,
    FEED_GROUP_SIZE: z.coerce.number().int().positive().finite().default(50),
    FEED_RECONNECT_BASE_MS: z.coerce.number().int().positive().finite().default(5000),
    FEED_RECONNECT_MAX_MS: z.coerce.number().int().positive().finite().default(60000),
    FEED_PING_INTERVAL_MS: z.coerce.number().int().positive().finite().default(20000),
    FEED_HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().positive().finite().default(10000),

    // Quote store
    REDIS_HOST: z.string().default('localhost'),
    REDIS_PORT: z.coerce.number().int().positive().finite().default(6379),
    REDIS_PASSWORD: z.string().optional().transform(val => (val ? val : undefined)),
    REDIS_DB: z.coerce.number().int().nonnegative().finite().default(0),
    QUOTE_TTL_SECONDS: z.coerce.number().int().positive().finite().default(60),

    // Arbitrage strategy
    ARB_THRESHOLD: z.coerce.number().gt(0).lt(1).default(0.998),
    MIN_PROFIT_PERCENT: z.coerce.number().nonnegative().finite().default(0.2),
    MIN_LIQUIDITY_USD: z.coerce.number().nonnegative().finite().default(50),
    MAX_POSITION_SIZE_USD: z.coerce.number().positive().finite().default(100),
    MAX_SLIPPAGE_PERCENT: z.coerce.number().nonnegative().finite().default(0.5),
    FEE_RATE: z.coerce.number().nonnegative().lt(1).default(0.002),
    DRY_RUN_EXECUTION: z.enum(['true', 'false']).transform(val => val === 'true').default('false'),

    // Detection loop
    SCAN_INTERVAL_MS: z.coerce.number().int().positive().finite().default(100),
    NOTIFY_COOLDOWN_MS: z.coerce.number().int().nonnegative().finite().default(60000),
    STATS_INTERVAL_MS: z.coerce.number().int().positive().finite().default(60000),

    // Telegram
    TELEGRAM_BOT_TOKEN: z.string().default(''),
    TELEGRAM_CHAT_ID: z.string().default(''),

    // One-shot REST scanner: instrumentId:yesTokenId:noTokenId
    SCAN_MARKETS: csvList,
    DISCOVER_LIMIT: z.coerce.number().int().positive().finite().default(50),
    DISCOVER_MAX_EVENTS: z.coerce.number().int().positive().finite().default(1000),
}).refine(
    cfg => cfg.FEED_RECONNECT_MAX_MS >= cfg.FEED_RECONNECT_BASE_MS,
    { message: 'must be >= FEED_RECONNECT_BASE_MS', path: ['FEED_RECONNECT_MAX_MS'] }
);

export type Env = z.infer<typeof envSchema>;

/**
 * Validate a raw environment record. Throws ZodError on invalid input.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
    return envSchema.parse(source);
}

// Parse and validate environment variables
function validateEnv(): Env {
    try {
        return parseEnv(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            console.error('❌ Invalid environment variables:');
            error.errors.forEach(err => {
                console.error(`  - ${err.path.join('.')}: ${err.message}`);
            });
            process.exit(1);
        }
        throw error;
    }
}

// Export validated environment configuration
export const env = validateEnv();
