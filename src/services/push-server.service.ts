import net from 'net';
import { setTimeout as delay } from 'timers/promises';
import { RequestAccumulator, buildReply, parsePushRequest } from '../utils/push-protocol';
import type { PushRequest } from '../utils/push-protocol';
import type { DeviceEndpoint } from '../utils/config';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export type ListenerState = 'idle' | 'binding' | 'listening' | 'failed' | 'stopped';

export interface ConnectionContext {
    endpoint: DeviceEndpoint;
    peer: string;
}

export interface DeviceReply {
    body: string;
    /** runs after the reply has been written */
    afterReply?: () => Promise<void>;
}

export type PushRequestHandler = (request: PushRequest, context: ConnectionContext) => Promise<DeviceReply>;

export interface PushServerOptions {
    maxRequestBytes: number;
    readTimeoutMs: number;
    maxConnections: number;
    bindRetries: number;
    bindBackoffMs: number;
}

export interface ListenerStatus {
    label: string;
    host: string;
    port: number;
    state: ListenerState;
    lastError: string | null;
    activeConnections: number;
    requestsHandled: number;
}

function writeAndEnd(socket: net.Socket, data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
        if (socket.destroyed) {
            reject(new Error('Connection already closed'));
            return;
        }
        socket.once('error', reject);
        socket.end(data, () => {
            socket.off('error', reject);
            resolve();
        });
    });
}

/**
 * TCP listener for one device endpoint. Each connection carries one push
 * request; it always gets a status-line reply and is then closed.
 */
export class PushServer {
    private server: net.Server | null = null;
    private state: ListenerState = 'idle';
    private lastError: string | null = null;
    private requestsHandled = 0;
    private readonly connections = new Set<net.Socket>();

    constructor(
        readonly endpoint: DeviceEndpoint,
        private readonly handler: PushRequestHandler,
        private readonly options: PushServerOptions
    ) {}

    /**
     * Bind, retrying with exponential backoff. Rejects once every attempt has
     * failed; other listeners are unaffected.
     */
    async start(): Promise<void> {
        const { bindRetries, bindBackoffMs } = this.options;
        this.state = 'binding';

        for (let attempt = 1; attempt <= bindRetries; attempt++) {
            try {
                this.server = await this.bind();
                this.state = 'listening';
                this.lastError = null;
                logger.info(`Device listener started on ${this.endpoint.host}:${this.port}`, {
                    label: this.endpoint.label,
                });
                return;
            } catch (error) {
                this.lastError = errorMessage(error);
                logger.warn('Device listener bind failed', {
                    port: this.endpoint.port,
                    attempt,
                    of: bindRetries,
                    error: this.lastError,
                });
                if (attempt < bindRetries) {
                    await delay(bindBackoffMs * 2 ** (attempt - 1));
                }
            }
        }

        this.state = 'failed';
        logger.error('Device listener gave up binding', {
            port: this.endpoint.port,
            label: this.endpoint.label,
            error: this.lastError,
        });
        throw new Error(`Listener on port ${this.endpoint.port} failed after ${bindRetries} attempts: ${this.lastError}`);
    }

    async stop(): Promise<void> {
        const server = this.server;
        this.server = null;
        for (const socket of this.connections) {
            socket.destroy();
        }
        if (server) {
            await new Promise<void>(resolve => server.close(() => resolve()));
        }
        this.state = 'stopped';
    }

    /** bound port (differs from the configured one when that was 0) */
    get port(): number {
        const address = this.server?.address();
        return address && typeof address === 'object' ? address.port : this.endpoint.port;
    }

    status(): ListenerStatus {
        return {
            label: this.endpoint.label,
            host: this.endpoint.host,
            port: this.port,
            state: this.state,
            lastError: this.lastError,
            activeConnections: this.connections.size,
            requestsHandled: this.requestsHandled,
        };
    }

    private bind(): Promise<net.Server> {
        return new Promise((resolve, reject) => {
            // half-open so a device that closes its side after sending still gets the reply
            const server = net.createServer({ allowHalfOpen: true }, socket => this.handleConnection(socket));
            server.maxConnections = this.options.maxConnections;

            server.once('error', reject);
            server.listen(this.endpoint.port, this.endpoint.host, () => {
                server.off('error', reject);
                server.on('error', error => {
                    logger.error('Device listener error', { port: this.endpoint.port, error: error.message });
                });
                resolve(server);
            });
        });
    }

    private handleConnection(socket: net.Socket): void {
        const peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
        const accumulator = new RequestAccumulator(this.options.maxRequestBytes);
        let responded = false;

        this.connections.add(socket);
        logger.debug('Device connected', { peer, port: this.endpoint.port });

        const respond = (truncated: boolean): void => {
            if (responded) {
                return;
            }
            responded = true;
            socket.setTimeout(0);
            void this.processRequest(socket, accumulator.buffer(), truncated, peer);
        };

        socket.setTimeout(this.options.readTimeoutMs);

        socket.on('data', chunk => {
            if (responded) {
                return;
            }
            const frame = accumulator.push(chunk);
            if (frame === 'complete') {
                respond(false);
            } else if (frame === 'overflow') {
                logger.warn('Device request exceeded size limit, processing what arrived', {
                    peer,
                    port: this.endpoint.port,
                    limit: this.options.maxRequestBytes,
                });
                respond(true);
            }
        });

        socket.on('timeout', () => {
            if (responded) {
                return;
            }
            if (accumulator.byteLength === 0) {
                logger.debug('Idle device connection timed out', { peer, port: this.endpoint.port });
                socket.destroy();
                return;
            }
            logger.warn('Device read timed out, processing partial request', {
                peer,
                port: this.endpoint.port,
                bytes: accumulator.byteLength,
            });
            respond(accumulator.isShort() || accumulator.endsAtClose);
        });

        socket.on('end', () => {
            if (responded) {
                return;
            }
            if (accumulator.byteLength === 0) {
                logger.debug('Device closed connection without data', { peer, port: this.endpoint.port });
                socket.end();
                return;
            }
            respond(accumulator.isShort());
        });

        socket.on('error', error => {
            logger.warn('Device connection error', { peer, port: this.endpoint.port, error: error.message });
            socket.destroy();
        });

        socket.on('close', () => {
            this.connections.delete(socket);
        });
    }

    private async processRequest(socket: net.Socket, buffer: Buffer, truncated: boolean, peer: string): Promise<void> {
        const request = parsePushRequest(buffer, truncated);
        let reply: DeviceReply = { body: 'OK' };

        if (!request) {
            logger.warn('Unreadable device request, acknowledging', { peer, port: this.endpoint.port, bytes: buffer.length });
        } else {
            logger.debug('Device request received', { peer, port: this.endpoint.port, method: request.method, target: request.target });
            try {
                reply = await this.handler(request, { endpoint: this.endpoint, peer });
            } catch (error) {
                logger.error('Device request handler failed, acknowledging', {
                    peer,
                    port: this.endpoint.port,
                    target: request.target,
                    error: errorMessage(error),
                });
            }
        }

        try {
            await writeAndEnd(socket, buildReply(reply.body));
            this.requestsHandled++;
        } catch (error) {
            logger.warn('Failed to send device reply', { peer, port: this.endpoint.port, error: errorMessage(error) });
            socket.destroy();
        }

        if (reply.afterReply) {
            try {
                await reply.afterReply();
            } catch (error) {
                logger.error('Processing after device reply failed', {
                    peer,
                    port: this.endpoint.port,
                    error: errorMessage(error),
                });
            }
        }
    }
}
