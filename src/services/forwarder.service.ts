import type { AttendanceStore } from './attendance-store.service';
import type { RecordSink, RemotePunchPayload } from './remote-api.service';
import type { ForwardStatus, StoredPunch } from '../types/punch';
import { toRemoteTimestamp } from '../utils/time';
import { errorMessage } from '../utils/errors';
import { Mutex } from '../utils/mutex';
import logger from '../utils/logger';

export interface ForwardPassResult {
    selected: number;
    forwarded: number;
    failed: number;
    highWaterMark: number;
}

export function toRemotePayload(row: StoredPunch): RemotePunchPayload {
    return {
        externalId: row.externalId,
        timestamp: toRemoteTimestamp(row.timestamp),
        direction: row.direction,
        eventType: row.eventType,
        deviceSerial: row.deviceSerial,
        deviceLabel: row.deviceLabel,
        deviceRecordId: row.deviceRecordId,
    };
}

/**
 * Posts every unforwarded row once and records the remote identifiers.
 * A pass reads the table in pages of `batchSize` rows until none are left.
 *
 * The high-water mark only skips rows already known to be forwarded: it
 * moves over a row only while every earlier row of the pass succeeded, and
 * selection still requires an unset forward status.
 */
export class Forwarder {
    private highWaterMark = 0;
    private readonly mutex = new Mutex();

    constructor(
        private readonly store: AttendanceStore,
        private readonly sink: RecordSink,
        private readonly batchSize = 100
    ) {}

    get mark(): number {
        return this.highWaterMark;
    }

    resetHighWaterMark(): void {
        this.highWaterMark = 0;
    }

    /**
     * One pass at a time: overlapping passes would post the same rows twice.
     */
    runPass(): Promise<ForwardPassResult> {
        return this.mutex.run(() => this.forwardPending());
    }

    private async forwardPending(): Promise<ForwardPassResult> {
        const result: ForwardPassResult = { selected: 0, forwarded: 0, failed: 0, highWaterMark: this.highWaterMark };

        // page past failing rows so they cannot starve the rows behind them
        let afterId = this.highWaterMark;
        let contiguous = true;
        for (;;) {
            const rows = this.store.selectUnforwarded(afterId, this.batchSize);
            if (rows.length === 0) {
                break;
            }
            result.selected += rows.length;

            for (const row of rows) {
                afterId = row.id;
                const payload = toRemotePayload(row);
                let status: ForwardStatus;
                try {
                    status = await this.sink.createRecord(payload);
                } catch (error) {
                    contiguous = false;
                    result.failed++;
                    logger.error('Failed to forward punch', { id: row.id, payload, error: errorMessage(error) });
                    continue;
                }

                // a store failure here aborts the pass; the row stays unforwarded
                const updated = this.store.markForwarded(row.id, status);
                if (updated) {
                    result.forwarded++;
                    logger.info('Punch forwarded', { externalId: row.externalId, ...status });
                } else {
                    logger.warn('Punch was already marked forwarded', { id: row.id });
                }
                if (contiguous) {
                    this.highWaterMark = row.id;
                }
            }
        }

        if (result.selected === 0) {
            // rescan from the start next time in case a row below the mark was cleared
            this.highWaterMark = 0;
            result.highWaterMark = 0;
            return result;
        }

        result.highWaterMark = this.highWaterMark;
        logger.info('Forward pass completed', { ...result });
        return result;
    }
}
