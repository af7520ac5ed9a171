import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { writeFileAtomic } from '../utils/atomic-file';
import { Mutex } from '../utils/mutex';
import { errorCode, errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import type { NewPunchLogEntry, PunchLogEntry } from '../types/punch';

const punchLogEntrySchema = z.object({
    seq: z.number().int().positive(),
    externalId: z.string().min(1),
    timestamp: z.string(),
    direction: z.number().int(),
    eventType: z.number().int(),
    deviceSerial: z.string(),
    deviceLabel: z.string().default(''),
    deviceRecordId: z.string().default(''),
    auxiliary: z.array(z.string()).default([]),
    receivedAt: z.string(),
});

interface ParsedLog {
    entries: PunchLogEntry[];
    /** bytes after the last newline: a write that never finished */
    tornBytes: number;
}

function parseLog(content: string, file: string): ParsedLog {
    const lastNewline = content.lastIndexOf('\n');
    const complete = lastNewline === -1 ? '' : content.slice(0, lastNewline);
    const tornBytes = Buffer.byteLength(content.slice(lastNewline + 1), 'utf-8');

    const entries: PunchLogEntry[] = [];
    const lines = complete.split('\n');
    lines.forEach((line, index) => {
        if (!line.trim()) {
            return;
        }
        try {
            const parsed = punchLogEntrySchema.safeParse(JSON.parse(line));
            if (parsed.success) {
                entries.push(parsed.data);
                return;
            }
            logger.warn('Skipping invalid punch log line', { file, line: index + 1, error: parsed.error.message });
        } catch (error) {
            logger.warn('Skipping unreadable punch log line', { file, line: index + 1, error: errorMessage(error) });
        }
    });

    return { entries, tornBytes };
}

/**
 * Raised when an append fails. `persisted` holds the entries of the batch
 * that did reach the log before the failure.
 */
export class PunchLogAppendError extends Error {
    constructor(message: string, readonly persisted: PunchLogEntry[], cause: unknown) {
        super(message, { cause });
        this.name = 'PunchLogAppendError';
    }
}

/**
 * Append-only intermediate log: one JSON punch per line.
 *
 * Appends are serialized and written with a single append call; readers only
 * consider newline-terminated lines, so an entry becomes visible whole or not
 * at all. A fragment left by a crash mid-append is cut off by `open()`.
 */
export class PunchLog {
    private readonly mutex = new Mutex();
    private lastSeq = 0;

    constructor(private readonly filePath: string) {}

    get file(): string {
        return this.filePath;
    }

    get lastSequence(): number {
        return this.lastSeq;
    }

    async open(): Promise<void> {
        await this.mutex.run(async () => {
            await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });

            const entries = await this.repairTail();
            this.lastSeq = entries.reduce((max, entry) => Math.max(max, entry.seq), 0);
            logger.info('Punch log opened', { file: this.filePath, entries: entries.length, lastSeq: this.lastSeq });
        });
    }

    async readAll(): Promise<PunchLogEntry[]> {
        return parseLog(await this.readContent(), this.filePath).entries;
    }

    /**
     * Entries with `seq` greater than `afterSeq`, in log order
     */
    async readAfter(afterSeq: number): Promise<PunchLogEntry[]> {
        return (await this.readAll()).filter(entry => entry.seq > afterSeq);
    }

    async append(records: NewPunchLogEntry[]): Promise<PunchLogEntry[]> {
        if (records.length === 0) {
            return [];
        }

        return this.mutex.run(async () => {
            const entries = records.map((record, index) => ({ ...record, seq: this.lastSeq + index + 1 }));
            const chunk = entries.map(entry => JSON.stringify(entry)).join('\n') + '\n';

            try {
                await fs.promises.appendFile(this.filePath, chunk, 'utf-8');
            } catch (error) {
                throw await this.recoverFailedAppend(error, entries.length);
            }
            this.lastSeq += entries.length;

            logger.debug('Appended punches to log', { count: entries.length, lastSeq: this.lastSeq });
            return entries;
        });
    }

    /**
     * Drop entries received before `olderThan` that the store has already
     * absorbed (`seq <= absorbedThrough`). The newest entry always stays so
     * sequence numbers continue after a restart. The file is replaced
     * atomically. Resolves with the removed entries.
     */
    async sweep(olderThan: Date, absorbedThrough: number): Promise<PunchLogEntry[]> {
        return this.mutex.run(async () => {
            const entries = parseLog(await this.readContent(), this.filePath).entries;
            const threshold = olderThan.getTime();

            const kept = entries.filter(
                (entry, index) =>
                    index === entries.length - 1 ||
                    entry.seq > absorbedThrough ||
                    !(Date.parse(entry.receivedAt) < threshold)
            );

            const keptSeqs = new Set(kept.map(entry => entry.seq));
            const removed = entries.filter(entry => !keptSeqs.has(entry.seq));
            if (removed.length > 0) {
                const content = kept.map(entry => JSON.stringify(entry)).join('\n') + (kept.length > 0 ? '\n' : '');
                await writeFileAtomic(this.filePath, content);
                logger.info('Swept punch log', { file: this.filePath, removed: removed.length, kept: kept.length });
            }
            return removed;
        });
    }

    /**
     * Cut the torn tail a failed append may leave and move `lastSeq` past
     * every complete line it did write, so those sequence numbers are never
     * handed out again. When the log cannot be read back, the whole batch's
     * numbers are skipped.
     */
    private async recoverFailedAppend(cause: unknown, attempted: number): Promise<PunchLogAppendError> {
        const before = this.lastSeq;
        let onDisk: PunchLogEntry[];
        try {
            onDisk = await this.repairTail();
        } catch (repairError) {
            this.lastSeq = before + attempted;
            logger.error('Failed to repair punch log after a failed append', {
                file: this.filePath,
                error: errorMessage(repairError),
                lastSeq: this.lastSeq,
            });
            return new PunchLogAppendError(`Punch log append failed: ${errorMessage(cause)}`, [], cause);
        }

        const persisted = onDisk.filter(entry => entry.seq > before);
        this.lastSeq = onDisk.reduce((max, entry) => Math.max(max, entry.seq), before);
        if (persisted.length > 0) {
            logger.warn('Append failed part way, keeping the entries that were written', {
                file: this.filePath,
                persisted: persisted.length,
                lastSeq: this.lastSeq,
            });
        }
        return new PunchLogAppendError(`Punch log append failed: ${errorMessage(cause)}`, persisted, cause);
    }

    private async repairTail(): Promise<PunchLogEntry[]> {
        const content = await this.readContent();
        const { entries, tornBytes } = parseLog(content, this.filePath);

        if (tornBytes > 0) {
            const keep = Buffer.byteLength(content, 'utf-8') - tornBytes;
            await fs.promises.truncate(this.filePath, keep);
            logger.warn('Removed incomplete trailing punch log entry', { file: this.filePath, bytes: tornBytes });
        }
        return entries;
    }

    private async readContent(): Promise<string> {
        try {
            return await fs.promises.readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                return '';
            }
            throw error;
        }
    }
}
