/**
 * Remote identifiers recorded once a punch has been forwarded
 */
export interface ForwardStatus {
    status: string;
    key: string;
    id: string;
}

/**
 * One attendance event reported by a terminal.
 *
 * `timestamp` is `YYYY-MM-DD HH:mm:ss` in whatever timezone the device uses.
 * `deviceRecordId` is an empty string when the device does not supply one.
 */
export interface AttendancePunch {
    externalId: string;
    timestamp: string;
    direction: number;
    eventType: number;
    deviceSerial: string;
    deviceLabel: string;
    deviceRecordId: string;
    forwardStatus?: ForwardStatus;
}

/**
 * A punch as staged in the intermediate log
 */
export interface PunchLogEntry extends Omit<AttendancePunch, 'forwardStatus'> {
    /** 1-based, strictly increasing, never reused */
    seq: number;
    auxiliary: string[];
    receivedAt: string;
}

export type NewPunchLogEntry = Omit<PunchLogEntry, 'seq'>;

/**
 * A row of the attendance table
 */
export interface StoredPunch extends AttendancePunch {
    id: number;
    logSeq: number | null;
    receivedAt: string | null;
    forwardedAt: string | null;
}

export const UNKNOWN_DEVICE_SERIAL = 'unknown';

/**
 * Identity used to drop repeated uploads before they reach the log.
 * `deviceRecordId` refines the key only when the device supplied one.
 */
export function dedupKey(punch: Pick<AttendancePunch, 'externalId' | 'timestamp' | 'eventType' | 'deviceRecordId'>): string {
    const base = `${punch.externalId}\u0000${punch.timestamp}\u0000${punch.eventType}`;
    return punch.deviceRecordId ? `${base}\u0000${punch.deviceRecordId}` : base;
}
