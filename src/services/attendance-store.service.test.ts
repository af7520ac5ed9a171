import fs from 'fs';
import os from 'os';
import path from 'path';
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AttendanceStore } from './attendance-store.service';
import type { PunchLogEntry } from '../types/punch';

function entry(seq: number, externalId: string, timestamp = '2024-03-05 08:15:00', eventType = 1): PunchLogEntry {
    return {
        seq,
        externalId,
        timestamp,
        direction: 0,
        eventType,
        deviceSerial: 'SN1',
        deviceLabel: 'Main',
        deviceRecordId: '',
        auxiliary: [],
        receivedAt: '2024-03-05T10:00:00.000Z',
    };
}

describe('AttendanceStore', () => {
    let dir: string;
    let file: string;
    let store: AttendanceStore;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-store-'));
        file = path.join(dir, 'attendance.db');
        store = new AttendanceStore(file);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('refuses to work before the schema exists', () => {
        expect(() => store.selectUnforwarded()).toThrow();
        expect(fs.existsSync(file)).toBe(false);
    });

    it('stores one row per external id and timestamp', () => {
        store.ensureSchema();
        expect(store.insertBatch([entry(1, '1001'), entry(2, '1002')])).toEqual({ inserted: 2, alreadyPresent: 0 });
        expect(store.insertBatch([entry(1, '1001'), entry(2, '1002')])).toEqual({ inserted: 0, alreadyPresent: 2 });
        expect(store.insertBatch([entry(3, '1001', '2024-03-05 08:15:00', 15)])).toEqual({ inserted: 0, alreadyPresent: 1 });
        expect(store.listAll()).toHaveLength(2);
    });

    it('maps stored rows back to punches', () => {
        store.ensureSchema();
        store.insertBatch([entry(7, '1001')]);
        expect(store.findById(1)).toEqual({
            id: 1,
            externalId: '1001',
            timestamp: '2024-03-05 08:15:00',
            direction: 0,
            eventType: 1,
            deviceSerial: 'SN1',
            deviceLabel: 'Main',
            deviceRecordId: '',
            logSeq: 7,
            receivedAt: '2024-03-05T10:00:00.000Z',
            forwardedAt: null,
        });
        expect(store.findById(99)).toBeNull();
    });

    it('selects unforwarded rows in id order after a given id', () => {
        store.ensureSchema();
        store.insertBatch([entry(1, '1001'), entry(2, '1002'), entry(3, '1003')]);
        store.markForwarded(2, { status: 'ok', key: 'k2', id: 'r2' });

        expect(store.selectUnforwarded().map(row => row.id)).toEqual([1, 3]);
        expect(store.selectUnforwarded(1).map(row => row.id)).toEqual([3]);
        expect(store.selectUnforwarded(0, 1).map(row => row.id)).toEqual([1]);
    });

    it('records the forward status only once', () => {
        store.ensureSchema();
        store.insertBatch([entry(1, '1001')]);
        const forwardedAt = new Date('2024-03-05T10:05:00.000Z');

        expect(store.markForwarded(1, { status: 'ok', key: 'k1', id: 'r1' }, forwardedAt)).toBe(true);
        expect(store.markForwarded(1, { status: 'ok', key: 'k9', id: 'r9' })).toBe(false);

        const row = store.findById(1);
        expect(row?.forwardStatus).toEqual({ status: 'ok', key: 'k1', id: 'r1' });
        expect(row?.forwardedAt).toBe('2024-03-05T10:05:00.000Z');
    });

    it('reports totals', () => {
        store.ensureSchema();
        expect(store.stats()).toEqual({ total: 0, forwarded: 0, pending: 0, lastLogSeq: null });

        store.insertBatch([entry(1, '1001'), entry(2, '1002'), entry(3, '1003')]);
        store.markForwarded(1, { status: 'ok', key: 'k1', id: 'r1' });
        expect(store.stats()).toEqual({ total: 3, forwarded: 1, pending: 2, lastLogSeq: 3 });
    });

    it('brings an older table up to date', () => {
        const db = new Database(file);
        db.exec(`
            CREATE TABLE attendance (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                external_id TEXT NOT NULL,
                timestamp TEXT NOT NULL,
                direction INTEGER,
                event_type INTEGER
            )
        `);
        db.prepare('INSERT INTO attendance (external_id, timestamp, direction, event_type) VALUES (?, ?, ?, ?)').run(
            '1001',
            '2024-03-05 08:15:00',
            0,
            1
        );
        db.close();

        store.ensureSchema();
        store.ensureSchema();

        const [row] = store.listAll();
        expect(row.deviceSerial).toBe('unknown');
        expect(row.logSeq).toBeNull();
        expect(row.forwardStatus).toBeUndefined();
        expect(store.insertBatch([entry(1, '1001')])).toEqual({ inserted: 0, alreadyPresent: 1 });
        expect(store.selectUnforwarded().map(item => item.externalId)).toEqual(['1001']);
    });
});
