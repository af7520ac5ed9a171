import type { ScheduledTask } from 'node-cron';
import type { CommandService } from '../services/command.service';
import logger from '../utils/logger';
import { scheduleExclusive } from './schedule';

/**
 * Start command cycle cron job: each run owes every device its command again
 */
export function startCommandCycleJob(commands: CommandService, schedule: string): ScheduledTask {
    const task = scheduleExclusive('Command cycle', schedule, async () => {
        commands.rearm();
    });
    logger.info(`Command cycle job scheduled (${schedule})`);
    return task;
}
