import net from 'net';
import { afterEach, describe, expect, it } from 'vitest';
import { PushServer } from './push-server.service';
import type { ConnectionContext, DeviceReply, PushRequestHandler, PushServerOptions } from './push-server.service';
import type { PushRequest } from '../utils/push-protocol';

const OPTIONS: PushServerOptions = {
    maxRequestBytes: 2 * 1024 * 1024,
    readTimeoutMs: 200,
    maxConnections: 8,
    bindRetries: 1,
    bindBackoffMs: 1,
};

interface Reply {
    head: string;
    body: string;
}

interface Recorded {
    request: PushRequest;
    context: ConnectionContext;
}

function splitReply(raw: string): Reply {
    const boundary = raw.indexOf('\r\n\r\n');
    return { head: raw.slice(0, boundary), body: raw.slice(boundary + 4) };
}

/**
 * Send `data` and collect everything the server writes until it closes.
 * With `close`, the client ends its side right after sending.
 */
function exchange(port: number, data: string, close = false): Promise<Reply> {
    return new Promise((resolve, reject) => {
        const socket = net.connect(port, '127.0.0.1');
        const chunks: Buffer[] = [];
        socket.on('connect', () => {
            if (close) {
                socket.end(data);
            } else {
                socket.write(data);
            }
        });
        socket.on('data', chunk => chunks.push(chunk));
        socket.on('end', () => resolve(splitReply(Buffer.concat(chunks).toString('utf-8'))));
        socket.on('error', reject);
    });
}

function recording(reply: (request: PushRequest) => DeviceReply): { handler: PushRequestHandler; seen: Recorded[] } {
    const seen: Recorded[] = [];
    const handler: PushRequestHandler = async (request, context) => {
        seen.push({ request, context });
        return reply(request);
    };
    return { handler, seen };
}

describe('PushServer', () => {
    const servers: PushServer[] = [];

    async function listen(handler: PushRequestHandler, port = 0, options: PushServerOptions = OPTIONS): Promise<PushServer> {
        const server = new PushServer({ host: '127.0.0.1', port, label: 'Main' }, handler, options);
        servers.push(server);
        await server.start();
        return server;
    }

    afterEach(async () => {
        await Promise.all(servers.splice(0).map(server => server.stop()));
    });

    it('answers a poll with the handler reply', async () => {
        const { handler, seen } = recording(() => ({ body: 'C:1000:CHECK' }));
        const server = await listen(handler);

        const reply = await exchange(server.port, 'GET /iclock/getrequest?SN=SN1 HTTP/1.1\r\nHost: bridge\r\n\r\n');

        expect(reply.head.split('\r\n')[0]).toBe('HTTP/1.1 200 OK');
        expect(reply.head).toContain('\r\nContent-Length: 12');
        expect(reply.body).toBe('C:1000:CHECK');
        expect(seen).toHaveLength(1);
        expect(seen[0].request.path).toBe('/iclock/getrequest');
        expect(seen[0].context.endpoint.label).toBe('Main');
        expect(server.status()).toMatchObject({ state: 'listening', requestsHandled: 1 });
    });

    it('waits for the declared body and runs the follow-up after replying', async () => {
        let followUp: () => void = () => undefined;
        const staged = new Promise<void>(resolve => {
            followUp = resolve;
        });
        const { handler, seen } = recording(() => ({
            body: 'OK',
            afterReply: async () => followUp(),
        }));
        const server = await listen(handler);
        const body = '1001\t2024-03-05 08:15:00\t0\t1\n';

        const reply = await exchange(
            server.port,
            `POST /iclock/cdata?SN=SN1&table=ATTLOG HTTP/1.1\r\nContent-Length: ${Buffer.byteLength(body)}\r\n\r\n${body}`
        );
        await staged;

        expect(reply.body).toBe('OK');
        expect(reply.head).toContain('\r\nContent-Length: 2');
        expect(seen[0].request.body).toBe(body);
    });

    it('replies OK when the handler fails', async () => {
        const server = await listen(async () => {
            throw new Error('state file unavailable');
        });
        const reply = await exchange(server.port, 'GET /iclock/getrequest?SN=SN1 HTTP/1.1\r\n\r\n');
        expect(reply.body).toBe('OK');
    });

    it('replies OK to an unreadable request without calling the handler', async () => {
        const { handler, seen } = recording(() => ({ body: 'C:1:CHECK' }));
        const server = await listen(handler);
        const reply = await exchange(server.port, 'hello\r\n\r\n');
        expect(reply.body).toBe('OK');
        expect(seen).toEqual([]);
    });

    it('processes what arrived when the device closes early', async () => {
        const { handler, seen } = recording(() => ({ body: 'OK' }));
        const server = await listen(handler);

        await exchange(server.port, 'GET /iclock/getrequest?SN=SN1 HTTP/1.1\r\n', true);
        expect(seen[0].request.path).toBe('/iclock/getrequest');
        expect(seen[0].request.truncated).toBe(true);
    });

    it('processes a partial upload after the read timeout, dropping the cut line', async () => {
        const { handler, seen } = recording(() => ({ body: 'OK' }));
        const server = await listen(handler);

        const reply = await exchange(
            server.port,
            'POST /iclock/cdata?SN=SN1&table=ATTLOG HTTP/1.1\r\nContent-Length: 100\r\n\r\n1001 2024-03-05 08:15:00 0 1\n1002 2024-03'
        );

        expect(reply.body).toBe('OK');
        expect(seen[0].request.body).toBe('1001 2024-03-05 08:15:00 0 1\n');
    });

    it('reads a POST body without Content-Length until the device closes', async () => {
        const { handler, seen } = recording(() => ({ body: 'OK' }));
        const server = await listen(handler);
        const body = '1001\t2024-03-05 08:15:00\t0\t1\n1002\t2024-03-05 08:16:00\t0\t1';

        const reply = await exchange(server.port, `POST /iclock/cdata?SN=SN1&table=ATTLOG HTTP/1.1\r\nHost: bridge\r\n\r\n${body}`, true);

        expect(reply.body).toBe('OK');
        expect(seen).toHaveLength(1);
        expect(seen[0].request.body).toBe(body);
        expect(seen[0].request.truncated).toBe(false);
    });

    it('marks a POST body without Content-Length cut by the read timeout as truncated', async () => {
        const { handler, seen } = recording(() => ({ body: 'OK' }));
        const server = await listen(handler);

        await exchange(
            server.port,
            'POST /iclock/cdata?SN=SN1&table=ATTLOG HTTP/1.1\r\n\r\n1001\t2024-03-05 08:15:00\t0\t1\n1002\t2024-03'
        );

        expect(seen[0].request.body).toBe('1001\t2024-03-05 08:15:00\t0\t1\n');
        expect(seen[0].request.truncated).toBe(true);
    });

    it('marks the listener failed when the port stays taken', async () => {
        const { handler } = recording(() => ({ body: 'OK' }));
        const first = await listen(handler);

        const second = new PushServer({ host: '127.0.0.1', port: first.port, label: 'Back' }, handler, {
            ...OPTIONS,
            bindRetries: 2,
        });
        await expect(second.start()).rejects.toThrow(`Listener on port ${first.port} failed after 2 attempts`);
        expect(second.status().state).toBe('failed');
        expect(first.status().state).toBe('listening');
    });
});
