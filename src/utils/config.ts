import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

export interface DeviceEndpoint {
    host: string;
    port: number;
    label: string;
}

export interface Config {
    port: number;
    nodeEnv: string;
    remote: {
        url: string;
        token: string;
        timeoutMs: number;
    };
    devices: DeviceEndpoint[];
    gateway: {
        maxRequestBytes: number;
        readTimeoutMs: number;
        maxConnections: number;
        bindRetries: number;
        bindBackoffMs: number;
    };
    commands: {
        template: string;
        cycleSchedule: string;
    };
    sync: {
        loaderIntervalSeconds: number;
        forwardIntervalSeconds: number;
        forwardBatchSize: number;
    };
    storage: {
        dataDir: string;
        punchLogFile: string;
        stateFile: string;
        databaseFile: string;
        retentionDays: number;
        retentionSchedule: string;
    };
    logging: {
        level: string;
        file: string;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    const value = process.env[key] || defaultValue;
    if (!value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
}

function getEnvVarOptional(key: string, defaultValue?: string): string | undefined {
    return process.env[key] || defaultValue;
}

function getIntVar(key: string, defaultValue: number, min = 0, max = Number.MAX_SAFE_INTEGER): number {
    const raw = getEnvVar(key, String(defaultValue));
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new Error(`Environment variable ${key} must be an integer between ${min} and ${max}, got "${raw}"`);
    }
    return value;
}

/**
 * Parse a `port[:label]` comma list, e.g. `4370:Main Entrance,4371`.
 */
export function parseDeviceEndpoints(value: string, host: string): DeviceEndpoint[] {
    const endpoints: DeviceEndpoint[] = [];
    const seen = new Set<number>();

    for (const part of value.split(',')) {
        const entry = part.trim();
        if (!entry) {
            continue;
        }

        const separator = entry.indexOf(':');
        const portText = separator === -1 ? entry : entry.slice(0, separator);
        const label = separator === -1 ? '' : entry.slice(separator + 1).trim();
        const port = Number(portText.trim());

        if (!Number.isInteger(port) || port < 1 || port > 65535) {
            throw new Error(`Invalid device port "${portText}" in DEVICE_ENDPOINTS`);
        }
        if (seen.has(port)) {
            throw new Error(`Device port ${port} is listed more than once in DEVICE_ENDPOINTS`);
        }
        seen.add(port);
        endpoints.push({ host, port, label: label || `port-${port}` });
    }

    if (endpoints.length === 0) {
        throw new Error('DEVICE_ENDPOINTS must list at least one device port');
    }
    return endpoints;
}

function defaultCommand(): string {
    // DEVICE_COMMAND set to an empty value disables command dispatch
    return process.env.DEVICE_COMMAND === '' ? '' : 'DATA QUERY ATTLOG StartTime={yesterday}\tEndTime={today}';
}

const dataDir = getEnvVar('DATA_DIR', './data');
const deviceHost = getEnvVar('DEVICE_HOST', '0.0.0.0');

const config: Config = {
    port: getIntVar('PORT', 3000, 0, 65535),
    nodeEnv: getEnvVar('NODE_ENV', 'development'),
    remote: {
        url: getEnvVar('REMOTE_API_URL'),
        token: getEnvVar('REMOTE_API_TOKEN'),
        timeoutMs: getIntVar('REMOTE_API_TIMEOUT_MS', 15000, 1),
    },
    devices: parseDeviceEndpoints(getEnvVar('DEVICE_ENDPOINTS', '4370'), deviceHost),
    gateway: {
        maxRequestBytes: getIntVar('MAX_REQUEST_BYTES', 2 * 1024 * 1024, 2 * 1024 * 1024),
        readTimeoutMs: getIntVar('DEVICE_READ_TIMEOUT_MS', 15000, 1),
        maxConnections: getIntVar('MAX_DEVICE_CONNECTIONS', 64, 1),
        bindRetries: getIntVar('BIND_RETRIES', 5, 1),
        bindBackoffMs: getIntVar('BIND_BACKOFF_MS', 1000, 0),
    },
    commands: {
        template: getEnvVarOptional('DEVICE_COMMAND') ?? defaultCommand(),
        cycleSchedule: getEnvVar('COMMAND_CYCLE_SCHEDULE', '0 */12 * * *'),
    },
    sync: {
        loaderIntervalSeconds: getIntVar('LOADER_INTERVAL_SECONDS', 10, 1, 59),
        forwardIntervalSeconds: getIntVar('FORWARD_INTERVAL_SECONDS', 10, 1, 59),
        forwardBatchSize: getIntVar('FORWARD_BATCH_SIZE', 100, 1),
    },
    storage: {
        dataDir,
        punchLogFile: getEnvVar('PUNCH_LOG_FILE', path.join(dataDir, 'punches.ndjson')),
        stateFile: getEnvVar('STATE_FILE', path.join(dataDir, 'state.json')),
        databaseFile: getEnvVar('DATABASE_FILE', path.join(dataDir, 'attendance.db')),
        retentionDays: getIntVar('LOG_RETENTION_DAYS', 31, 1),
        retentionSchedule: getEnvVar('LOG_RETENTION_SCHEDULE', '0 3 * * *'),
    },
    logging: {
        level: getEnvVar('LOG_LEVEL', 'info'),
        file: getEnvVar('LOG_FILE', './logs/bridge.log'),
    },
};

// Validate configuration
if (!/^https?:\/\//i.test(config.remote.url)) {
    throw new Error('REMOTE_API_URL must be an http(s) URL');
}

export default config;
