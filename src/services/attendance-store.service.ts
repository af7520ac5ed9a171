import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import logger from '../utils/logger';
import type { ForwardStatus, PunchLogEntry, StoredPunch } from '../types/punch';

interface AttendanceRow {
    id: number;
    external_id: string;
    timestamp: string;
    direction: number;
    event_type: number;
    device_serial: string;
    device_label: string;
    device_record_id: string;
    log_seq: number | null;
    received_at: string | null;
    forward_status: string | null;
    forward_key: string | null;
    forward_id: string | null;
    forwarded_at: string | null;
}

export interface InsertBatchResult {
    inserted: number;
    alreadyPresent: number;
}

export interface StoreStats {
    total: number;
    forwarded: number;
    pending: number;
    lastLogSeq: number | null;
}

const TABLE = 'attendance';
const UNIQUE_INDEX = 'idx_attendance_external_id_timestamp';

/**
 * Columns every attendance table must carry. Older tables get the missing
 * ones added by `ensureSchema`.
 */
const COLUMNS: ReadonlyArray<readonly [name: string, definition: string]> = [
    ['external_id', "TEXT NOT NULL DEFAULT ''"],
    ['timestamp', "TEXT NOT NULL DEFAULT ''"],
    ['direction', 'INTEGER NOT NULL DEFAULT 0'],
    ['event_type', 'INTEGER NOT NULL DEFAULT 0'],
    ['device_serial', "TEXT NOT NULL DEFAULT 'unknown'"],
    ['device_label', "TEXT NOT NULL DEFAULT ''"],
    ['device_record_id', "TEXT NOT NULL DEFAULT ''"],
    ['log_seq', 'INTEGER'],
    ['received_at', 'TEXT'],
    ['forward_status', 'TEXT'],
    ['forward_key', 'TEXT'],
    ['forward_id', 'TEXT'],
    ['forwarded_at', 'TEXT'],
];

function mapRow(row: AttendanceRow): StoredPunch {
    const forwardStatus: ForwardStatus | undefined =
        row.forward_status !== null
            ? { status: row.forward_status, key: row.forward_key ?? '', id: row.forward_id ?? '' }
            : undefined;

    return {
        id: row.id,
        externalId: row.external_id,
        timestamp: row.timestamp,
        direction: row.direction,
        eventType: row.event_type,
        deviceSerial: row.device_serial,
        deviceLabel: row.device_label,
        deviceRecordId: row.device_record_id,
        logSeq: row.log_seq,
        receivedAt: row.received_at,
        forwardedAt: row.forwarded_at,
        ...(forwardStatus ? { forwardStatus } : {}),
    };
}

/**
 * SQLite attendance table with one row per (external_id, timestamp).
 * Every operation opens its own short-lived connection.
 */
export class AttendanceStore {
    constructor(private readonly databaseFile: string, private readonly busyTimeoutMs = 5000) {}

    /**
     * Create the table, or bring an older one up to date: add missing columns
     * and the unique index on (external_id, timestamp).
     */
    ensureSchema(): void {
        fs.mkdirSync(path.dirname(this.databaseFile), { recursive: true });

        this.withConnection(db => {
            db.pragma('journal_mode = WAL');

            const exists = db
                .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
                .get(TABLE);

            if (!exists) {
                db.exec(`
                    CREATE TABLE ${TABLE} (
                        id INTEGER PRIMARY KEY AUTOINCREMENT,
                        ${COLUMNS.map(([name, definition]) => `${name} ${definition}`).join(',\n                        ')}
                    )
                `);
                logger.info('Attendance table created', { file: this.databaseFile });
            } else {
                const existing = new Set(
                    db.prepare<[], { name: string }>(`PRAGMA table_info(${TABLE})`).all().map(column => column.name)
                );
                for (const [name, definition] of COLUMNS) {
                    if (!existing.has(name)) {
                        db.exec(`ALTER TABLE ${TABLE} ADD COLUMN ${name} ${definition}`);
                        logger.info('Attendance column added', { column: name });
                    }
                }
            }

            db.exec(`CREATE UNIQUE INDEX IF NOT EXISTS ${UNIQUE_INDEX} ON ${TABLE} (external_id, timestamp)`);
            db.exec(
                `CREATE INDEX IF NOT EXISTS idx_attendance_pending ON ${TABLE} (id) WHERE forward_status IS NULL`
            );
        }, true);
    }

    /**
     * Insert-if-absent, all entries in one transaction. Rows whose
     * (external_id, timestamp) is already stored are counted, not failed.
     */
    insertBatch(entries: PunchLogEntry[]): InsertBatchResult {
        return this.withConnection(db => {
            const insert = db.prepare(`
                INSERT INTO ${TABLE}
                    (external_id, timestamp, direction, event_type, device_serial, device_label, device_record_id, log_seq, received_at)
                VALUES
                    (@externalId, @timestamp, @direction, @eventType, @deviceSerial, @deviceLabel, @deviceRecordId, @seq, @receivedAt)
                ON CONFLICT (external_id, timestamp) DO NOTHING
            `);

            const run = db.transaction((batch: PunchLogEntry[]) => {
                const result: InsertBatchResult = { inserted: 0, alreadyPresent: 0 };
                for (const entry of batch) {
                    const info = insert.run({
                        externalId: entry.externalId,
                        timestamp: entry.timestamp,
                        direction: entry.direction,
                        eventType: entry.eventType,
                        deviceSerial: entry.deviceSerial,
                        deviceLabel: entry.deviceLabel,
                        deviceRecordId: entry.deviceRecordId,
                        seq: entry.seq,
                        receivedAt: entry.receivedAt,
                    });
                    if (info.changes > 0) {
                        result.inserted++;
                    } else {
                        result.alreadyPresent++;
                        logger.info('Punch already stored', {
                            externalId: entry.externalId,
                            timestamp: entry.timestamp,
                            seq: entry.seq,
                        });
                    }
                }
                return result;
            });

            return run(entries);
        });
    }

    /**
     * Rows not yet forwarded with id above `afterId`, ascending by id
     */
    selectUnforwarded(afterId = 0, limit = 100): StoredPunch[] {
        return this.withConnection(db => {
            const rows = db
                .prepare<[number, number], AttendanceRow>(
                    `SELECT * FROM ${TABLE} WHERE forward_status IS NULL AND id > ? ORDER BY id ASC LIMIT ?`
                )
                .all(afterId, limit);
            return rows.map(mapRow);
        });
    }

    /**
     * Record the remote identifiers in one statement. Returns false when the
     * row was already forwarded (or does not exist); the first status wins.
     */
    markForwarded(id: number, status: ForwardStatus, forwardedAt: Date = new Date()): boolean {
        return this.withConnection(db => {
            const info = db
                .prepare(
                    `UPDATE ${TABLE}
                     SET forward_status = ?, forward_key = ?, forward_id = ?, forwarded_at = ?
                     WHERE id = ? AND forward_status IS NULL`
                )
                .run(status.status, status.key, status.id, forwardedAt.toISOString(), id);
            return info.changes > 0;
        });
    }

    findById(id: number): StoredPunch | null {
        return this.withConnection(db => {
            const row = db.prepare<[number], AttendanceRow>(`SELECT * FROM ${TABLE} WHERE id = ?`).get(id);
            return row ? mapRow(row) : null;
        });
    }

    listAll(): StoredPunch[] {
        return this.withConnection(db => {
            const rows = db.prepare<[], AttendanceRow>(`SELECT * FROM ${TABLE} ORDER BY id ASC`).all();
            return rows.map(mapRow);
        });
    }

    stats(): StoreStats {
        return this.withConnection(db => {
            const row = db
                .prepare<[], { total: number; forwarded: number; lastLogSeq: number | null }>(
                    `SELECT COUNT(*) AS total,
                            COUNT(forward_status) AS forwarded,
                            MAX(log_seq) AS lastLogSeq
                     FROM ${TABLE}`
                )
                .get();
            const total = row?.total ?? 0;
            const forwarded = row?.forwarded ?? 0;
            return { total, forwarded, pending: total - forwarded, lastLogSeq: row?.lastLogSeq ?? null };
        });
    }

    /**
     * Only `ensureSchema` may create the database file; every other operation
     * fails when it is missing.
     */
    private withConnection<T>(fn: (db: Database.Database) => T, create = false): T {
        const db = new Database(this.databaseFile, { fileMustExist: !create, timeout: this.busyTimeoutMs });
        try {
            return fn(db);
        } finally {
            db.close();
        }
    }
}
