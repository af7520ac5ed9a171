const DEVICE_TIMESTAMP = /^(\d{4})[-/](\d{2})[-/](\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/;

function pad(value: number, width = 2): string {
    return String(value).padStart(width, '0');
}

function daysInMonth(year: number, month: number): number {
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Normalize a device timestamp to `YYYY-MM-DD HH:mm:ss`.
 * Accepts `-` or `/` as the date separator. Returns null when the text is not
 * a real calendar time. No timezone conversion is applied.
 */
export function normalizePunchTimestamp(value: string): string | null {
    const match = DEVICE_TIMESTAMP.exec(value.trim());
    if (!match) {
        return null;
    }

    const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
    if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
        return null;
    }
    if (hour > 23 || minute > 59 || second > 59) {
        return null;
    }

    return `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

/**
 * `YYYY-MM-DD HH:mm:ss` → `YYYY/MM/DD HH:mm:ss`, the layout the remote API takes
 */
export function toRemoteTimestamp(timestamp: string): string {
    const [date, time] = timestamp.split(' ');
    return `${date.replace(/-/g, '/')} ${time}`;
}

/**
 * RFC 1123 date for the `Date` response header
 */
export function httpDate(now: Date): string {
    return now.toUTCString();
}

/**
 * Local calendar date as `YYYY-MM-DD`
 */
export function formatLocalDate(date: Date): string {
    return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function addDays(date: Date, days: number): Date {
    const result = new Date(date.getTime());
    result.setDate(result.getDate() + days);
    return result;
}
