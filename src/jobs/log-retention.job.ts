import type { ScheduledTask } from 'node-cron';
import type { LogNormalizer } from '../services/normalizer.service';
import type { PunchLog } from '../services/punch-log.service';
import type { StateStore } from '../services/state.service';
import { addDays } from '../utils/time';
import logger from '../utils/logger';
import { scheduleExclusive } from './schedule';

export interface RetentionTargets {
    punchLog: PunchLog;
    state: StateStore;
    normalizer: LogNormalizer;
}

/**
 * Remove absorbed punch log entries older than the retention window and
 * forget their dedup keys
 */
export async function sweepPunchLog(targets: RetentionTargets, retentionDays: number, now: Date = new Date()): Promise<number> {
    const threshold = addDays(now, -retentionDays);
    const removed = await targets.punchLog.sweep(threshold, targets.state.get().processingCursor);
    const forgotten = targets.normalizer.forget(removed);
    logger.info('[CRON] Punch log retention sweep completed', {
        removed: removed.length,
        forgotten,
        olderThan: threshold.toISOString(),
    });
    return removed.length;
}

/**
 * Start punch log retention cron job
 */
export function startLogRetentionJob(targets: RetentionTargets, retentionDays: number, schedule: string): ScheduledTask {
    const task = scheduleExclusive('Punch log retention', schedule, async () => {
        await sweepPunchLog(targets, retentionDays);
    });
    logger.info(`Punch log retention job scheduled (${schedule}, keeping ${retentionDays} days)`);
    return task;
}
