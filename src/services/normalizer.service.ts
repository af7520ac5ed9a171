import { parseAttlogPayload } from './attlog.parser';
import { PunchLogAppendError } from './punch-log.service';
import type { PunchLog } from './punch-log.service';
import { dedupKey } from '../types/punch';
import type { NewPunchLogEntry, PunchLogEntry } from '../types/punch';
import logger from '../utils/logger';

export interface PunchSource {
    serial?: string;
    label: string;
    port?: number;
    peer?: string;
}

export interface RejectedLine {
    line: string;
    reason: string;
}

export interface IngestSummary {
    received: number;
    appended: PunchLogEntry[];
    duplicates: number;
    rejected: RejectedLine[];
}

/**
 * Turns ATTLOG upload bodies into punches and stages the unseen ones in the
 * intermediate log.
 */
export class LogNormalizer {
    private readonly seen = new Set<string>();

    constructor(private readonly punchLog: PunchLog, private readonly clock: () => Date = () => new Date()) {}

    get seenCount(): number {
        return this.seen.size;
    }

    /**
     * Rebuild the seen-set from the log so duplicates are recognized across restarts
     */
    async hydrate(): Promise<void> {
        const entries = await this.punchLog.readAll();
        for (const entry of entries) {
            this.seen.add(dedupKey(entry));
        }
        logger.info('Dedup set hydrated from punch log', { keys: this.seen.size });
    }

    /**
     * Drop the keys of entries that left the log, so the seen-set only
     * covers what the log still holds. Returns how many keys were dropped.
     */
    forget(entries: PunchLogEntry[]): number {
        let dropped = 0;
        for (const entry of entries) {
            if (this.seen.delete(dedupKey(entry))) {
                dropped++;
            }
        }
        if (dropped > 0) {
            logger.info('Dedup keys released after log sweep', { dropped, keys: this.seen.size });
        }
        return dropped;
    }

    async ingest(payload: string, source: PunchSource): Promise<IngestSummary> {
        const results = parseAttlogPayload(payload, { serial: source.serial });
        const receivedAt = this.clock().toISOString();

        const fresh: NewPunchLogEntry[] = [];
        const freshKeys: string[] = [];
        const rejected: RejectedLine[] = [];
        let duplicates = 0;

        // check-and-claim keys synchronously so concurrent uploads cannot both claim one
        for (const result of results) {
            if (!result.ok) {
                rejected.push({ line: result.line, reason: result.reason });
                logger.warn('Skipping malformed ATTLOG line', {
                    line: result.line,
                    reason: result.reason,
                    serial: source.serial,
                    port: source.port,
                });
                continue;
            }

            const key = dedupKey(result.punch);
            if (this.seen.has(key)) {
                duplicates++;
                logger.debug('Duplicate punch dropped', {
                    externalId: result.punch.externalId,
                    timestamp: result.punch.timestamp,
                    eventType: result.punch.eventType,
                });
                continue;
            }

            this.seen.add(key);
            freshKeys.push(key);
            fresh.push({ ...result.punch, deviceLabel: source.label, receivedAt });
        }

        let appended: PunchLogEntry[] = [];
        try {
            appended = await this.punchLog.append(fresh);
        } catch (error) {
            // release the claims of punches that never reached the log so a re-upload can stage them
            const landed = new Set(error instanceof PunchLogAppendError ? error.persisted.map(dedupKey) : []);
            for (const key of freshKeys) {
                if (!landed.has(key)) {
                    this.seen.delete(key);
                }
            }
            throw error;
        }

        logger.info('ATTLOG payload normalized', {
            serial: source.serial,
            port: source.port,
            received: results.length,
            appended: appended.length,
            duplicates,
            rejected: rejected.length,
        });

        return { received: results.length, appended, duplicates, rejected };
    }
}
