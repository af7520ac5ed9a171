import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AttendanceStore } from './attendance-store.service';
import { LogNormalizer } from './normalizer.service';
import { PunchLog } from './punch-log.service';
import { StateStore } from './state.service';
import { StoreLoader } from './store-loader.service';
import type { NewPunchLogEntry } from '../types/punch';

function punch(externalId: string, timestamp = '2024-03-05 08:15:00'): NewPunchLogEntry {
    return {
        externalId,
        timestamp,
        direction: 0,
        eventType: 1,
        deviceSerial: 'SN1',
        deviceLabel: 'Main',
        deviceRecordId: '',
        auxiliary: [],
        receivedAt: '2024-03-05T10:00:00.000Z',
    };
}

describe('StoreLoader', () => {
    let dir: string;
    let punchLog: PunchLog;
    let state: StateStore;
    let store: AttendanceStore;
    let loader: StoreLoader;

    beforeEach(async () => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-loader-'));
        punchLog = new PunchLog(path.join(dir, 'punches.ndjson'));
        await punchLog.open();
        state = new StateStore(path.join(dir, 'state.json'));
        await state.load();
        store = new AttendanceStore(path.join(dir, 'attendance.db'));
        store.ensureSchema();
        loader = new StoreLoader(punchLog, store, state);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('absorbs new entries and advances the cursor', async () => {
        await punchLog.append([punch('1001'), punch('1002'), punch('1003')]);

        expect(await loader.runPass()).toEqual({
            cursorBefore: 0,
            cursorAfter: 3,
            considered: 3,
            inserted: 3,
            alreadyPresent: 0,
            skipped: 0,
        });
        expect(state.get().processingCursor).toBe(3);
        expect(store.listAll().map(row => row.logSeq)).toEqual([1, 2, 3]);
    });

    it('only reads entries past the cursor', async () => {
        await punchLog.append([punch('1001'), punch('1002'), punch('1003')]);
        await loader.runPass();

        const idle = await loader.runPass();
        expect(idle.considered).toBe(0);
        expect(idle.cursorAfter).toBe(3);

        await punchLog.append([punch('1004'), punch('1005')]);
        const next = await loader.runPass();
        expect(next).toMatchObject({ cursorBefore: 3, cursorAfter: 5, considered: 2, inserted: 2 });
    });

    it('absorbs entries re-read after a crash between commit and cursor write', async () => {
        await punchLog.append([punch('1001'), punch('1002'), punch('1003')]);
        vi.spyOn(state, 'advanceCursor').mockRejectedValueOnce(new Error('disk full'));

        await expect(loader.runPass()).rejects.toThrow('disk full');
        expect(state.get().processingCursor).toBe(0);
        expect(store.listAll()).toHaveLength(3);

        const retry = await loader.runPass();
        expect(retry).toMatchObject({ cursorAfter: 3, inserted: 0, alreadyPresent: 3 });
        expect(store.listAll()).toHaveLength(3);
    });

    it('leaves the cursor in place when the store fails', async () => {
        await punchLog.append([punch('1001')]);
        vi.spyOn(store, 'insertBatch').mockImplementationOnce(() => {
            throw new Error('database is locked');
        });

        await expect(loader.runPass()).rejects.toThrow('database is locked');
        expect(state.get().processingCursor).toBe(0);

        expect((await loader.runPass()).inserted).toBe(1);
    });

    it('skips an entry with an unreadable timestamp and moves past it', async () => {
        await punchLog.append([punch('1001'), punch('1002', 'yesterday morning'), punch('1003')]);

        const result = await loader.runPass();
        expect(result).toMatchObject({ cursorAfter: 3, inserted: 2, skipped: 1 });
        expect(store.listAll().map(row => row.externalId)).toEqual(['1001', '1003']);
    });

    it('runs one pass at a time', async () => {
        await punchLog.append([punch('1001'), punch('1002')]);
        const [first, second] = await Promise.all([loader.runPass(), loader.runPass()]);

        expect(first.inserted).toBe(2);
        expect(second.considered).toBe(0);
    });

    describe('with uploads from the normalizer', () => {
        const source = { serial: 'SN1', label: 'Main', port: 4370 };

        it('stores a repeated upload once', async () => {
            const normalizer = new LogNormalizer(punchLog);
            const payload = '1001\t2024-03-05 08:15:00\t0\t1\n';
            await normalizer.ingest(payload, source);
            await normalizer.ingest(payload, source);
            await loader.runPass();

            expect(store.listAll().map(row => [row.externalId, row.timestamp, row.eventType])).toEqual([
                ['1001', '2024-03-05 08:15:00', 1],
            ]);
        });

        it('stores every valid line of a batch with one malformed line', async () => {
            const lines = Array.from({ length: 9 }, (_, index) => `${3001 + index}\t2024-03-05 10:0${index}:00\t0\t1`);
            lines.splice(6, 0, '3999\t2024-03-05');
            const summary = await new LogNormalizer(punchLog).ingest(lines.join('\n'), source);
            expect(summary.rejected).toHaveLength(1);

            const result = await loader.runPass();
            expect(result).toMatchObject({ considered: 9, inserted: 9, cursorAfter: 9 });
            expect(store.stats().total).toBe(9);
        });

        it('resumes from the persisted cursor after a restart', async () => {
            const normalizer = new LogNormalizer(punchLog);
            await normalizer.ingest('1001 2024-03-05 08:15:00 0 1\n1002 2024-03-05 08:16:00 0 1\n', source);
            await loader.runPass();
            await normalizer.ingest('1003 2024-03-05 08:17:00 0 1\n', source);

            const reloadedState = new StateStore(path.join(dir, 'state.json'));
            await reloadedState.load();
            const reopenedLog = new PunchLog(punchLog.file);
            await reopenedLog.open();

            const result = await new StoreLoader(reopenedLog, store, reloadedState).runPass();
            expect(result).toEqual({
                cursorBefore: 2,
                cursorAfter: 3,
                considered: 1,
                inserted: 1,
                alreadyPresent: 0,
                skipped: 0,
            });
        });
    });
});
