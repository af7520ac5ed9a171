import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AttendanceStore } from './attendance-store.service';
import { Forwarder, toRemotePayload } from './forwarder.service';
import type { RecordSink, RemotePunchPayload } from './remote-api.service';
import type { ForwardStatus, PunchLogEntry } from '../types/punch';

function entry(seq: number, externalId: string): PunchLogEntry {
    return {
        seq,
        externalId,
        timestamp: '2024-03-05 08:15:00',
        direction: 0,
        eventType: 1,
        deviceSerial: 'SN1',
        deviceLabel: 'Main',
        deviceRecordId: '',
        auxiliary: [],
        receivedAt: '2024-03-05T10:00:00.000Z',
    };
}

function acceptingSink() {
    const createRecord = vi.fn(
        async (payload: RemotePunchPayload): Promise<ForwardStatus> => ({
            status: 'success',
            key: `key-${payload.externalId}`,
            id: `rec-${payload.externalId}`,
        })
    );
    const sink: RecordSink = { createRecord };
    return { sink, createRecord };
}

describe('toRemotePayload', () => {
    it('converts the timestamp to the remote layout', () => {
        expect(
            toRemotePayload({ ...entry(1, '1001'), id: 1, logSeq: 1, forwardedAt: null })
        ).toEqual({
            externalId: '1001',
            timestamp: '2024/03/05 08:15:00',
            direction: 0,
            eventType: 1,
            deviceSerial: 'SN1',
            deviceLabel: 'Main',
            deviceRecordId: '',
        });
    });
});

describe('Forwarder', () => {
    let dir: string;
    let store: AttendanceStore;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-forwarder-'));
        store = new AttendanceStore(path.join(dir, 'attendance.db'));
        store.ensureSchema();
        store.insertBatch([entry(1, '1001'), entry(2, '1002'), entry(3, '1003')]);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('posts each row once and records the remote identifiers', async () => {
        const { sink, createRecord } = acceptingSink();
        const forwarder = new Forwarder(store, sink);

        expect(await forwarder.runPass()).toEqual({ selected: 3, forwarded: 3, failed: 0, highWaterMark: 3 });
        expect(createRecord).toHaveBeenCalledTimes(3);
        expect(createRecord.mock.calls.map(([payload]) => payload.externalId)).toEqual(['1001', '1002', '1003']);
        expect(store.findById(2)?.forwardStatus).toEqual({ status: 'success', key: 'key-1002', id: 'rec-1002' });

        expect(await forwarder.runPass()).toEqual({ selected: 0, forwarded: 0, failed: 0, highWaterMark: 0 });
        expect(createRecord).toHaveBeenCalledTimes(3);
    });

    it('leaves a failed row for the next pass and stops the mark before it', async () => {
        const { sink, createRecord } = acceptingSink();
        createRecord.mockImplementation(async payload => {
            if (payload.externalId === '1002' && createRecord.mock.calls.length <= 3) {
                throw new Error('Remote API responded with HTTP 502');
            }
            return { status: 'success', key: `key-${payload.externalId}`, id: `rec-${payload.externalId}` };
        });
        const forwarder = new Forwarder(store, sink);

        expect(await forwarder.runPass()).toEqual({ selected: 3, forwarded: 2, failed: 1, highWaterMark: 1 });
        expect(store.findById(2)?.forwardStatus).toBeUndefined();
        expect(store.findById(3)?.forwardStatus).toEqual({ status: 'success', key: 'key-1003', id: 'rec-1003' });

        expect(await forwarder.runPass()).toEqual({ selected: 1, forwarded: 1, failed: 0, highWaterMark: 2 });
        expect(createRecord).toHaveBeenCalledTimes(4);
        expect(store.stats().pending).toBe(0);
    });

    it('reads the table in pages within one pass', async () => {
        const { sink, createRecord } = acceptingSink();
        const forwarder = new Forwarder(store, sink, 2);

        expect(await forwarder.runPass()).toEqual({ selected: 3, forwarded: 3, failed: 0, highWaterMark: 3 });
        expect(createRecord).toHaveBeenCalledTimes(3);
        expect(forwarder.mark).toBe(3);
    });

    it('forwards rows behind a full page of rejected rows', async () => {
        const { sink, createRecord } = acceptingSink();
        createRecord.mockImplementation(async payload => {
            if (payload.externalId !== '1003') {
                throw new Error('Remote API responded with HTTP 422');
            }
            return { status: 'success', key: 'key-1003', id: 'rec-1003' };
        });
        const forwarder = new Forwarder(store, sink, 2);

        expect(await forwarder.runPass()).toEqual({ selected: 3, forwarded: 1, failed: 2, highWaterMark: 0 });
        expect(store.findById(3)?.forwardStatus).toEqual({ status: 'success', key: 'key-1003', id: 'rec-1003' });

        expect(await forwarder.runPass()).toEqual({ selected: 2, forwarded: 0, failed: 2, highWaterMark: 0 });
        expect(createRecord.mock.calls.filter(([payload]) => payload.externalId === '1003')).toHaveLength(1);
    });

    it('never posts a row twice from overlapping passes', async () => {
        const { sink, createRecord } = acceptingSink();
        const forwarder = new Forwarder(store, sink);

        await Promise.all([forwarder.runPass(), forwarder.runPass()]);
        expect(createRecord).toHaveBeenCalledTimes(3);
    });

    it('stops the pass when the store cannot record a result', async () => {
        const { sink, createRecord } = acceptingSink();
        const forwarder = new Forwarder(store, sink);
        vi.spyOn(store, 'markForwarded').mockImplementationOnce(() => {
            throw new Error('database is locked');
        });

        await expect(forwarder.runPass()).rejects.toThrow('database is locked');
        expect(createRecord).toHaveBeenCalledTimes(1);
        expect(store.findById(1)?.forwardStatus).toBeUndefined();
    });
});
