import type { StateStore } from './state.service';
import type { CommandResult } from '../utils/push-protocol';
import { addDays, formatLocalDate } from '../utils/time';
import logger from '../utils/logger';

export interface IssuedCommand {
    id: number;
    deviceKey: string;
    text: string;
    issuedAt: Date;
}

/**
 * Substitute `{today}` and `{yesterday}` with local `YYYY-MM-DD` dates
 */
export function renderCommand(template: string, now: Date): string {
    return template
        .replace(/\{today\}/g, formatLocalDate(now))
        .replace(/\{yesterday\}/g, formatLocalDate(addDays(now, -1)));
}

export function formatCommand(id: number, text: string): string {
    return `C:${id}:${text}`;
}

/**
 * Hands each device one command per cycle. Ids come from the counter in the
 * state document, shared by every listener.
 */
export class CommandService {
    private readonly servedThisCycle = new Set<string>();
    private readonly outstanding = new Map<number, IssuedCommand>();

    constructor(
        private readonly state: StateStore,
        private readonly template: string,
        private readonly clock: () => Date = () => new Date()
    ) {}

    get enabled(): boolean {
        return this.template.trim().length > 0;
    }

    /**
     * Start a new cycle: every device is owed its command again. Commands
     * still unacknowledged from the last cycle stop being tracked; a late
     * result for one is still accepted.
     */
    rearm(): void {
        const devices = this.servedThisCycle.size;
        const unacknowledged = this.outstanding.size;
        this.servedThisCycle.clear();
        this.outstanding.clear();
        logger.info('Command cycle re-armed', { devicesServed: devices, unacknowledged });
    }

    /**
     * The command line for a polling device, or null when it already got this
     * cycle's command.
     */
    async nextCommand(deviceKey: string): Promise<string | null> {
        if (!this.enabled || this.servedThisCycle.has(deviceKey)) {
            return null;
        }

        // claim before the await so a concurrent poll from the same device gets nothing
        this.servedThisCycle.add(deviceKey);

        let id: number;
        try {
            id = await this.state.nextCommandId();
        } catch (error) {
            this.servedThisCycle.delete(deviceKey);
            throw error;
        }

        const issuedAt = this.clock();
        const text = renderCommand(this.template, issuedAt);
        this.outstanding.set(id, { id, deviceKey, text, issuedAt });

        logger.info('Command issued to device', { id, deviceKey, command: text });
        return formatCommand(id, text);
    }

    /**
     * Process command results reported by a device. A non-negative return
     * code is success. Returns the ids acknowledged.
     */
    async acknowledge(results: CommandResult[], deviceKey: string): Promise<number[]> {
        const acknowledged: number[] = [];

        for (const result of results) {
            const issued = this.outstanding.get(result.id);

            if (result.returnCode < 0) {
                logger.warn('Device reported command failure', { deviceKey, ...result });
                continue;
            }
            if (!issued && result.id >= this.state.get().commandCounter) {
                logger.warn('Device acknowledged a command id that was never issued', { deviceKey, id: result.id });
                continue;
            }

            this.outstanding.delete(result.id);
            await this.state.recordCommandAck(result.id);
            acknowledged.push(result.id);
            logger.info('Device acknowledged command', { deviceKey, ...result });
        }

        return acknowledged;
    }

    get pending(): IssuedCommand[] {
        return [...this.outstanding.values()];
    }
}
