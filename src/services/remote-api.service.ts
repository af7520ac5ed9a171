import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import type { ForwardStatus } from '../types/punch';

export interface RemoteApiOptions {
    url: string;
    token: string;
    timeoutMs: number;
}

/**
 * Fields posted for one punch
 */
export interface RemotePunchPayload {
    externalId: string;
    timestamp: string;
    direction: number;
    eventType: number;
    deviceSerial: string;
    deviceLabel: string;
    deviceRecordId: string;
}

const identifier = z.union([z.string(), z.number()]).transform(value => String(value));

const acknowledgementSchema = z
    .array(
        z.object({
            status: identifier,
            key: identifier,
            id: identifier,
        })
    )
    .min(1);

export class RemoteApiError extends Error {
    constructor(message: string, readonly status?: number) {
        super(message);
        this.name = 'RemoteApiError';
    }
}

export interface RecordSink {
    createRecord(payload: RemotePunchPayload): Promise<ForwardStatus>;
}

/**
 * Client for the remote "create record" endpoint
 */
export class RemoteApiService implements RecordSink {
    private client: AxiosInstance;

    constructor(private readonly options: RemoteApiOptions, client?: AxiosInstance) {
        this.client = client ?? axios.create();
    }

    /**
     * Create one record. Resolves with the identifiers from the first element
     * of the acknowledgement array; rejects on transport errors, non-200
     * statuses and malformed acknowledgements.
     */
    async createRecord(payload: RemotePunchPayload): Promise<ForwardStatus> {
        let status: number;
        let data: unknown;
        try {
            const response = await this.client.post<unknown>(this.options.url, payload, {
                timeout: this.options.timeoutMs,
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${this.options.token}`,
                },
                validateStatus: () => true,
            });
            status = response.status;
            data = response.data;
        } catch (error) {
            throw new RemoteApiError(`Remote API request failed: ${errorMessage(error)}`);
        }

        if (status !== 200) {
            throw new RemoteApiError(`Remote API responded with HTTP ${status}`, status);
        }

        const parsed = acknowledgementSchema.safeParse(data);
        if (!parsed.success) {
            logger.warn('Remote API returned an unexpected acknowledgement', { data });
            throw new RemoteApiError('Remote API acknowledgement is missing status, key or id', status);
        }

        const [first] = parsed.data;
        return { status: first.status, key: first.key, id: first.id };
    }
}
