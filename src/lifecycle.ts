import { logger, errorFields } from './infra/logger.js';

export interface ShutdownTargets {
    ingestor: { stop(): void } | null;
    detector: { stop(): void } | null;
    detectorDone: Promise<void> | null;
    notifier: { notifyBotStatus(status: 'stopped', details: string): Promise<boolean> } | null;
    redis: { quit(): Promise<unknown> };
}

/**
 * Stop the feeds and the detection loop, wait for the loop to record its final
 * status, then close the store connection.
 */
export async function shutdownServices(targets: ShutdownTargets, reason: string): Promise<void> {
    targets.ingestor?.stop();
    targets.detector?.stop();

    if (targets.detectorDone) {
        await targets.detectorDone;
    }

    if (targets.notifier) {
        await targets.notifier.notifyBotStatus('stopped', reason);
    }

    try {
        await targets.redis.quit();
    } catch (error) {
        logger.warn('app.shutdown.redis_quit_failed', errorFields(error));
    }
}
