import { Redis } from 'ioredis';
import { logger, errorFields } from './logger.js';

export interface RedisConnectionOptions {
    host: string;
    port: number;
    password?: string;
    db: number;
}

const MAX_CONNECT_RETRY_DELAY_MS = 3000;

/**
 * Build the shared Redis client. Connection is lazy; call `connect()` once at boot.
 */
export function createRedisClient(options: RedisConnectionOptions): Redis {
    const client = new Redis({
        host: options.host,
        port: options.port,
        password: options.password,
        db: options.db,
        lazyConnect: true,
        connectTimeout: 5000,
        keepAlive: 10000,
        maxRetriesPerRequest: 1,
        retryStrategy: (times: number) => Math.min(times * 100, MAX_CONNECT_RETRY_DELAY_MS),
    });

    client.on('connect', () => {
        logger.info('redis.connected', { host: options.host, port: options.port, db: options.db });
    });

    client.on('error', (err: Error) => {
        logger.error('redis.error', { error: err.message });
    });

    client.on('end', () => {
        logger.warn('redis.disconnected', { host: options.host, port: options.port });
    });

    return client;
}

/**
 * The part of the client the boot step needs
 */
export interface Connectable {
    connect(): Promise<void>;
}

/**
 * Initial connect. A failure is logged and boot carries on: the retry strategy
 * keeps reconnecting and store reads come back empty until it succeeds.
 */
export async function connectRedis(client: Connectable, target: { host: string; port: number }): Promise<boolean> {
    try {
        await client.connect();
        return true;
    } catch (error) {
        logger.error('redis.connect_failed', {
            host: target.host,
            port: target.port,
            ...errorFields(error),
        });
        return false;
    }
}
