import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

/**
 * Schedule `task` on a cron expression, skipping a tick while the previous
 * run is still in progress. Failures are logged; the next tick retries.
 */
export function scheduleExclusive(name: string, expression: string, task: () => Promise<void>): ScheduledTask {
    if (!cron.validate(expression)) {
        throw new Error(`Invalid cron expression for ${name}: "${expression}"`);
    }

    let running = false;
    return cron.schedule(expression, async () => {
        if (running) {
            logger.debug(`[CRON] ${name} still running, skipping tick`);
            return;
        }
        running = true;
        try {
            await task();
        } catch (error) {
            logger.error(`[CRON] ${name} failed`, { error: errorMessage(error) });
        } finally {
            running = false;
        }
    });
}

/**
 * Cron expression firing every `seconds` seconds
 */
export function everySeconds(seconds: number): string {
    return `*/${seconds} * * * * *`;
}
