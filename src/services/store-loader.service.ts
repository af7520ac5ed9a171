import type { AttendanceStore } from './attendance-store.service';
import type { PunchLog } from './punch-log.service';
import type { StateStore } from './state.service';
import type { PunchLogEntry } from '../types/punch';
import { normalizePunchTimestamp } from '../utils/time';
import { Mutex } from '../utils/mutex';
import logger from '../utils/logger';

export interface LoaderPassResult {
    cursorBefore: number;
    cursorAfter: number;
    considered: number;
    inserted: number;
    alreadyPresent: number;
    skipped: number;
}

/**
 * Absorbs intermediate-log entries past the ProcessingCursor into the
 * attendance store.
 *
 * The cursor is persisted only after the batch commits. Entries re-read after
 * a crash between commit and cursor write are absorbed by the store's unique
 * key.
 */
export class StoreLoader {
    private readonly mutex = new Mutex();

    constructor(
        private readonly punchLog: PunchLog,
        private readonly store: AttendanceStore,
        private readonly state: StateStore
    ) {}

    runPass(): Promise<LoaderPassResult> {
        return this.mutex.run(() => this.absorb());
    }

    private async absorb(): Promise<LoaderPassResult> {
        const cursorBefore = this.state.get().processingCursor;
        const pending = await this.punchLog.readAfter(cursorBefore);

        const result: LoaderPassResult = {
            cursorBefore,
            cursorAfter: cursorBefore,
            considered: pending.length,
            inserted: 0,
            alreadyPresent: 0,
            skipped: 0,
        };

        if (pending.length === 0) {
            logger.debug('No new punch log entries to absorb', { cursor: cursorBefore });
            return result;
        }

        const valid: PunchLogEntry[] = [];
        for (const entry of pending) {
            const timestamp = normalizePunchTimestamp(entry.timestamp);
            if (!timestamp) {
                result.skipped++;
                logger.error('Skipping punch log entry with invalid timestamp', {
                    seq: entry.seq,
                    externalId: entry.externalId,
                    timestamp: entry.timestamp,
                });
                continue;
            }
            valid.push({ ...entry, timestamp });
        }

        // throws on store failure: the cursor stays where it was
        const batch = this.store.insertBatch(valid);
        result.inserted = batch.inserted;
        result.alreadyPresent = batch.alreadyPresent;

        const highestSeq = pending.reduce((max, entry) => Math.max(max, entry.seq), cursorBefore);
        const saved = await this.state.advanceCursor(highestSeq);
        result.cursorAfter = saved.processingCursor;

        logger.info('Punch log absorbed into attendance store', { ...result });
        return result;
    }
}
