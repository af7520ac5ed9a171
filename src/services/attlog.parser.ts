import { normalizePunchTimestamp } from '../utils/time';
import { UNKNOWN_DEVICE_SERIAL } from '../types/punch';

/** externalId, date, time, direction, eventType */
export const MIN_ATTLOG_TOKENS = 5;

/**
 * Extended uploads carry seven auxiliary tokens; the last two are the
 * terminal's serial and its own record id.
 */
const EMBEDDED_SERIAL_INDEX = 5;
const EMBEDDED_RECORD_ID_INDEX = 6;

export interface ParsedPunch {
    externalId: string;
    timestamp: string;
    direction: number;
    eventType: number;
    deviceSerial: string;
    deviceRecordId: string;
    auxiliary: string[];
}

export type ParseResult =
    | { ok: true; punch: ParsedPunch }
    | { ok: false; line: string; reason: string };

export interface AttlogSource {
    /** serial declared by the request, when it had one */
    serial?: string;
}

const HEADER_FRAGMENT = /^(?:[A-Za-z][A-Za-z0-9-]*:\s|(?:GET|POST|PUT|HEAD|OPTIONS)\s+\S+|HTTP\/\d)/;
const INTEGER = /^-?\d+$/;

/**
 * Split an upload body into candidate punch lines, dropping blank lines and
 * protocol header fragments.
 */
export function splitAttlogPayload(payload: string): string[] {
    return payload
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0 && !HEADER_FRAGMENT.test(line));
}

export function parseAttlogLine(line: string, source: AttlogSource = {}): ParseResult {
    const tokens = line.trim().split(/\s+/).filter(Boolean);
    if (tokens.length < MIN_ATTLOG_TOKENS) {
        return { ok: false, line, reason: `expected at least ${MIN_ATTLOG_TOKENS} fields, got ${tokens.length}` };
    }

    const [externalId, date, time, directionText, eventTypeText, ...auxiliary] = tokens;

    const timestamp = normalizePunchTimestamp(`${date} ${time}`);
    if (!timestamp) {
        return { ok: false, line, reason: `invalid timestamp "${date} ${time}"` };
    }
    if (!INTEGER.test(directionText)) {
        return { ok: false, line, reason: `invalid direction "${directionText}"` };
    }
    if (!INTEGER.test(eventTypeText)) {
        return { ok: false, line, reason: `invalid event type "${eventTypeText}"` };
    }

    const embeddedSerial = auxiliary.length > EMBEDDED_RECORD_ID_INDEX ? auxiliary[EMBEDDED_SERIAL_INDEX] : undefined;
    const embeddedRecordId = auxiliary.length > EMBEDDED_RECORD_ID_INDEX ? auxiliary[EMBEDDED_RECORD_ID_INDEX] : undefined;

    return {
        ok: true,
        punch: {
            externalId,
            timestamp,
            direction: Number(directionText),
            eventType: Number(eventTypeText),
            deviceSerial: source.serial || embeddedSerial || UNKNOWN_DEVICE_SERIAL,
            deviceRecordId: embeddedRecordId ?? '',
            auxiliary,
        },
    };
}

export function parseAttlogPayload(payload: string, source: AttlogSource = {}): ParseResult[] {
    return splitAttlogPayload(payload).map(line => parseAttlogLine(line, source));
}
