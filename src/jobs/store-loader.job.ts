import type { ScheduledTask } from 'node-cron';
import type { StoreLoader } from '../services/store-loader.service';
import logger from '../utils/logger';
import { everySeconds, scheduleExclusive } from './schedule';

/**
 * Absorb new punch log entries into the attendance store
 */
async function absorbPunchLog(loader: StoreLoader): Promise<void> {
    const result = await loader.runPass();
    if (result.considered > 0) {
        logger.info('[CRON] Store loader pass completed', { ...result });
    }
}

/**
 * Start store loader cron job
 */
export function startStoreLoaderJob(loader: StoreLoader, intervalSeconds: number): ScheduledTask {
    const task = scheduleExclusive('Store loader', everySeconds(intervalSeconds), () => absorbPunchLog(loader));
    logger.info(`Store loader job scheduled (every ${intervalSeconds} seconds)`);
    return task;
}
