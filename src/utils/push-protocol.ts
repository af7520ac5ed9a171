import { httpDate } from './time';
import { UNKNOWN_DEVICE_SERIAL } from '../types/punch';

export const DEFAULT_MAX_REQUEST_BYTES = 2 * 1024 * 1024;

export interface PushRequest {
    method: string;
    target: string;
    path: string;
    query: URLSearchParams;
    headers: Record<string, string>;
    body: string;
    /** true when the request was cut at the size cap or by a read timeout */
    truncated: boolean;
    raw: string;
}

export type PushRequestKind = 'poll' | 'attlog' | 'admin-upload' | 'options' | 'command-result' | 'unknown';

export type FrameState = 'incomplete' | 'complete' | 'overflow';

interface HeaderBoundary {
    headerEnd: number;
    bodyStart: number;
}

function findHeaderBoundary(buffer: Buffer): HeaderBoundary | null {
    const crlf = buffer.indexOf('\r\n\r\n');
    const lf = buffer.indexOf('\n\n');
    if (crlf === -1 && lf === -1) {
        return null;
    }
    if (crlf !== -1 && (lf === -1 || crlf <= lf)) {
        return { headerEnd: crlf, bodyStart: crlf + 4 };
    }
    return { headerEnd: lf, bodyStart: lf + 2 };
}

function readContentLength(headerText: string): number | null {
    const match = /^content-length:\s*(\d+)\s*$/im.exec(headerText);
    return match ? Number(match[1]) : null;
}

/**
 * Collects the bytes of one push request from a TCP stream.
 *
 * A request is complete once its header block is terminated and the body
 * holds `Content-Length` bytes. Without that header a GET completes at the
 * header terminator; any other method's body runs until the peer closes or
 * the read times out.
 */
export class RequestAccumulator {
    private chunks: Buffer[] = [];
    private size = 0;
    private expectedTotal: number | null = null;
    private headerParsed = false;
    private bodyUntilClose = false;
    private overflowed = false;

    constructor(private readonly maxBytes: number = DEFAULT_MAX_REQUEST_BYTES) {}

    get byteLength(): number {
        return this.size;
    }

    push(chunk: Buffer): FrameState {
        const room = this.maxBytes - this.size;
        if (chunk.length > room) {
            chunk = chunk.subarray(0, Math.max(room, 0));
            this.overflowed = true;
        }
        if (chunk.length > 0) {
            this.chunks.push(chunk);
            this.size += chunk.length;
        }

        if (!this.headerParsed) {
            const buffer = this.buffer();
            const boundary = findHeaderBoundary(buffer);
            if (boundary) {
                const headerText = buffer.subarray(0, boundary.headerEnd).toString('latin1');
                const contentLength = readContentLength(headerText);
                this.headerParsed = true;
                if (contentLength !== null) {
                    this.expectedTotal = boundary.bodyStart + contentLength;
                } else if (/^(GET|HEAD|OPTIONS)\s/i.test(headerText)) {
                    this.expectedTotal = boundary.bodyStart;
                } else {
                    this.bodyUntilClose = true;
                }
            }
        }

        if (this.expectedTotal !== null && this.size >= this.expectedTotal) {
            return 'complete';
        }
        return this.overflowed ? 'overflow' : 'incomplete';
    }

    buffer(): Buffer {
        if (this.chunks.length > 1) {
            this.chunks = [Buffer.concat(this.chunks)];
        }
        return this.chunks[0] ?? Buffer.alloc(0);
    }

    /** the body has no declared length and ends when the connection does */
    get endsAtClose(): boolean {
        return this.bodyUntilClose;
    }

    /** true when bytes are still missing from the declared request length */
    isShort(): boolean {
        return !this.headerParsed || (this.expectedTotal !== null && this.size < this.expectedTotal);
    }
}

/**
 * Parse a buffered push request. Returns null when not even a request line
 * (`METHOD target`) can be read.
 */
export function parsePushRequest(buffer: Buffer, truncated = false): PushRequest | null {
    const raw = buffer.toString('utf-8');
    const boundary = findHeaderBoundary(buffer);

    const headerText = boundary ? buffer.subarray(0, boundary.headerEnd).toString('utf-8') : raw;
    const [requestLine = '', ...headerLines] = headerText.split(/\r?\n/);
    const parts = requestLine.trim().split(/\s+/);
    if (parts.length < 2) {
        return null;
    }

    const [method, target] = parts;
    const headers: Record<string, string> = {};
    for (const line of headerLines) {
        const colon = line.indexOf(':');
        if (colon > 0) {
            headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
        }
    }

    let body = '';
    if (boundary) {
        const contentLength = readContentLength(buffer.subarray(0, boundary.headerEnd).toString('latin1'));
        const end = contentLength === null ? buffer.length : boundary.bodyStart + contentLength;
        body = buffer.subarray(boundary.bodyStart, Math.min(end, buffer.length)).toString('utf-8');
    }

    if (truncated) {
        // the last line of a cut body is incomplete
        const lastNewline = body.lastIndexOf('\n');
        body = lastNewline === -1 ? '' : body.slice(0, lastNewline + 1);
    }

    const queryStart = target.indexOf('?');
    const path = queryStart === -1 ? target : target.slice(0, queryStart);
    const query = new URLSearchParams(queryStart === -1 ? '' : target.slice(queryStart + 1));

    return { method: method.toUpperCase(), target, path, query, headers, body, truncated, raw };
}

function endsWithSegment(path: string, segment: string): boolean {
    const normalized = path.toLowerCase().replace(/\/+$/, '');
    return normalized === `/${segment}` || normalized.endsWith(`/${segment}`) || normalized === segment;
}

/**
 * Look a query parameter up case-insensitively
 */
export function queryValue(query: URLSearchParams, name: string): string | null {
    const wanted = name.toLowerCase();
    for (const [key, value] of query) {
        if (key.toLowerCase() === wanted) {
            return value;
        }
    }
    return null;
}

export function classifyRequest(request: PushRequest): PushRequestKind {
    const { method, path, query } = request;

    if (method === 'GET' && endsWithSegment(path, 'getrequest')) {
        return 'poll';
    }
    if (endsWithSegment(path, 'cdata')) {
        if (method === 'GET' && queryValue(query, 'options')?.toLowerCase() === 'all') {
            return 'options';
        }
        if (method === 'POST') {
            return queryValue(query, 'table')?.toUpperCase() === 'ATTLOG' ? 'attlog' : 'admin-upload';
        }
    }
    if (method === 'POST' && endsWithSegment(path, 'devicecmd')) {
        return 'command-result';
    }
    return 'unknown';
}

/**
 * Device serial from the `SN` query parameter, else the first `SN=` token
 * anywhere in the raw request.
 */
export function extractSerial(request: Pick<PushRequest, 'query' | 'raw'>): string {
    const fromQuery = queryValue(request.query, 'SN');
    if (fromQuery) {
        return fromQuery;
    }
    const match = /SN=([^&\s]+)/.exec(request.raw);
    return match ? match[1] : UNKNOWN_DEVICE_SERIAL;
}

/**
 * Status-line reply. `Content-Length` is the UTF-8 byte length of `body`.
 */
export function buildReply(body: string, now: Date = new Date()): Buffer {
    const payload = Buffer.from(body, 'utf-8');
    const head =
        'HTTP/1.1 200 OK\r\n' +
        'Content-Type: text/plain\r\n' +
        'Accept-Ranges: bytes\r\n' +
        `Date: ${httpDate(now)}\r\n` +
        `Content-Length: ${payload.length}\r\n` +
        '\r\n';
    return Buffer.concat([Buffer.from(head, 'latin1'), payload]);
}

export interface OptionsDocumentSettings {
    serverName: string;
    /** minutes east of UTC reported to the device */
    timeZoneMinutes: number;
    transInterval: number;
    delay: number;
    errorDelay: number;
}

export const DEFAULT_OPTIONS_SETTINGS: OptionsDocumentSettings = {
    serverName: 'Attendance Push Bridge',
    timeZoneMinutes: 120,
    transInterval: 30,
    delay: 10,
    errorDelay: 120,
};

/**
 * Capability document returned for `GET …/cdata?options=all`
 */
export function buildOptionsDocument(serial: string, settings: OptionsDocumentSettings = DEFAULT_OPTIONS_SETTINGS): string {
    return [
        `GET OPTION FROM:${serial}`,
        'Stamp=9999',
        'OpStamp=9999',
        'PhotoStamp=0',
        'TransFlag=TransData AttLog\tOpLog\tAttPhoto\tEnrollUser\tChgUser\tEnrollFP\tChgFP\tFPImag\tFACE\tUserPic\tWORKCODE\tBioPhoto',
        `ErrorDelay=${settings.errorDelay}`,
        `Delay=${settings.delay}`,
        `TimeZone=${settings.timeZoneMinutes}`,
        'TransTimes=',
        `TransInterval=${settings.transInterval}`,
        'SyncTime=0',
        'Realtime=1',
        'ServerVer=2.2.14 2025/02/19',
        'PushProtVer=2.4.1',
        'PushOptionsFlag=1',
        'ATTLOGStamp=9999',
        'OPERLOGStamp=9999',
        'ATTPHOTOStamp=0',
        `ServerName=${settings.serverName}`,
        'MultiBioDataSupport=0:1:0:0:0:0:0:0:0:',
    ].join('\n');
}

export interface CommandResult {
    id: number;
    returnCode: number;
    command: string;
}

/**
 * Parse `ID=<id>&Return=<code>&CMD=<name>` lines posted to `…/devicecmd`.
 * Lines without a numeric ID and Return are ignored.
 */
export function parseCommandResults(body: string): CommandResult[] {
    const results: CommandResult[] = [];
    for (const line of body.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (!trimmed) {
            continue;
        }
        const params = new URLSearchParams(trimmed);
        const id = Number(queryValue(params, 'ID'));
        const returnText = queryValue(params, 'Return');
        const returnCode = Number(returnText);
        if (!Number.isInteger(id) || id <= 0 || returnText === null || !Number.isInteger(returnCode)) {
            continue;
        }
        results.push({ id, returnCode, command: queryValue(params, 'CMD') ?? '' });
    }
    return results;
}
