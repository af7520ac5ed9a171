import type { ScheduledTask } from 'node-cron';
import type { Forwarder } from '../services/forwarder.service';
import logger from '../utils/logger';
import { everySeconds, scheduleExclusive } from './schedule';

/**
 * Forward unforwarded punches to the remote API
 */
async function forwardPunches(forwarder: Forwarder): Promise<void> {
    const result = await forwarder.runPass();
    if (result.failed > 0) {
        logger.warn('[CRON] Forward pass left punches for retry', { ...result });
    }
}

/**
 * Start forward cron job
 */
export function startForwardJob(forwarder: Forwarder, intervalSeconds: number): ScheduledTask {
    const task = scheduleExclusive('Forwarder', everySeconds(intervalSeconds), () => forwardPunches(forwarder));
    logger.info(`Forward job scheduled (every ${intervalSeconds} seconds)`);
    return task;
}
