import { createServer, type IncomingHttpHeaders, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';

export interface ReceivedRequest {
    method: string;
    url: string;
    headers: IncomingHttpHeaders;
    body: Buffer;
}

export interface WebhookStub {
    url: string;
    requests: ReceivedRequest[];
    /** Status and body for the next requests. */
    respondWith(status: number, body?: string): void;
    /** Accept requests but never answer them. */
    hang(): void;
    close(): Promise<void>;
}

/** Local HTTP server standing in for a webhook endpoint. */
export async function startWebhookStub(): Promise<WebhookStub> {
    const requests: ReceivedRequest[] = [];
    let status = 200;
    let responseBody = '';
    let hanging = false;

    const server: Server = createServer((req, res) => {
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer) => chunks.push(chunk));
        req.on('end', () => {
            requests.push({
                method: req.method ?? '',
                url: req.url ?? '',
                headers: req.headers,
                body: Buffer.concat(chunks),
            });
            if (hanging) return;
            res.writeHead(status, { 'content-type': 'text/plain' });
            res.end(responseBody);
        });
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Webhook stub did not bind to a TCP port.');
    }
    const port = address.port;

    return {
        url: `http://127.0.0.1:${port}/hooks/upload`,
        requests,
        respondWith(nextStatus: number, body = '') {
            status = nextStatus;
            responseBody = body;
            hanging = false;
        },
        hang() {
            hanging = true;
        },
        close() {
            server.closeAllConnections();
            return new Promise<void>((resolve, reject) => {
                server.close((err) => (err ? reject(err) : resolve()));
            });
        },
    };
}
