import * as http from 'http';
import { randomUUID } from 'crypto';
import { URL } from 'url';
import { GatewayError } from '../errors/GatewayError.js';
import { HealthReport } from '../managers/BackendSupervisor.js';
import { CapabilityPublisher } from '../services/CapabilityPublisher.js';
import { Dispatcher, OutboundResponse, REQUEST_ID_HEADER } from '../services/Dispatcher.js';
import { ROOT_FIELD } from '../translation/SchemaCompiler.js';
import { GatewaySettings } from '../types/configTypes.js';
import { logger } from '../utils/logger.js';

const MAX_REQUEST_ID_LENGTH = 128;

export interface HealthSource {
    getHealth(): HealthReport;
}

/**
 * The caller-facing HTTP surface: the published API description, the health
 * report, and every backend route via the Dispatcher.
 */
export class HttpInterface {
    private httpServer: http.Server | null = null;

    constructor(
        private readonly dispatcher: Dispatcher,
        private readonly publisher: CapabilityPublisher,
        private readonly health: HealthSource,
        private readonly getSettings: () => GatewaySettings,
    ) { }

    /**
     * Starts listening on the configured host and port.
     * @returns The bound address, useful when port 0 was requested.
     */
    public async start(): Promise<{ host: string; port: number }> {
        if (this.httpServer) {
            throw new Error('HTTP interface already running.');
        }
        const { host, port } = this.getSettings();
        const server = http.createServer((req, res) => {
            this.handleHttpRequest(req, res).catch((err: unknown) => {
                logger.error(`Unhandled error serving ${req.method} ${req.url}: ${describe(err)}`, err);
                if (!res.headersSent) {
                    res.writeHead(500).end();
                }
            });
        });
        this.httpServer = server;

        return new Promise((resolve, reject) => {
            server.once('error', (err: Error) => {
                logger.error(`HTTP server error: ${err.message}`);
                this.httpServer = null;
                reject(err);
            });
            server.listen(port, host, () => {
                const address = server.address();
                const boundPort = typeof address === 'object' && address ? address.port : port;
                const { discoveryPath, routePrefix } = this.getSettings();
                logger.info(`Gateway listening on http://${host}:${boundPort} (routes under ${routePrefix || '/'}, API description at ${discoveryPath})`);
                resolve({ host, port: boundPort });
            });
        });
    }

    public async stop(): Promise<void> {
        const server = this.httpServer;
        if (!server) {
            return;
        }
        logger.info('Stopping HTTP interface...');
        this.httpServer = null;
        await new Promise<void>((resolve, reject) => {
            server.close(err => (err ? reject(err) : resolve()));
            server.closeAllConnections();
        });
        logger.info('HTTP interface stopped.');
    }

    private async handleHttpRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const requestId = readRequestId(req.headers[REQUEST_ID_HEADER]);
        const url = new URL(req.url ?? '/', 'http://gateway.invalid');
        const method = (req.method ?? 'GET').toUpperCase();
        const settings = this.getSettings();
        logger.debug(`[${requestId}] ${method} ${url.pathname}`);

        if (method === 'GET' && url.pathname === settings.discoveryPath) {
            send(res, { status: 200, headers: { [REQUEST_ID_HEADER]: requestId }, body: this.publisher.render() });
            return;
        }
        if (method === 'GET' && url.pathname === settings.healthPath) {
            const report = this.health.getHealth();
            send(res, { status: report.status === 'down' ? 503 : 200, headers: { [REQUEST_ID_HEADER]: requestId }, body: report });
            return;
        }

        // Cancellation: the caller closing the connection aborts the invocation.
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) {
                controller.abort();
            }
        });

        let body: unknown;
        try {
            body = method === 'POST' ? parseJsonBody(await readBody(req, settings.maxBodyBytes)) : undefined;
        } catch (error: unknown) {
            const failure = GatewayError.from(error);
            logger.warn(`[${requestId}] ${method} ${url.pathname} -> ${failure.status} ${failure.message}`);
            send(res, { status: failure.status, headers: { [REQUEST_ID_HEADER]: requestId }, body: failure.toBody(requestId) });
            return;
        }

        const response = await this.dispatcher.dispatch({
            method,
            path: url.pathname,
            query: url.searchParams,
            body,
            headers: req.headers,
            signal: controller.signal,
            requestId,
        });
        if (controller.signal.aborted) {
            logger.debug(`[${requestId}] caller went away; response dropped.`);
            return;
        }
        send(res, response);
    }
}

/**
 * Caller-supplied correlation id when usable, otherwise a fresh UUID.
 */
export function readRequestId(header: string | string[] | undefined): string {
    const value = Array.isArray(header) ? header[0] : header;
    if (value && value.length <= MAX_REQUEST_ID_LENGTH && /^[\x21-\x7e]+$/.test(value)) {
        return value;
    }
    return randomUUID();
}

/**
 * An empty body means "no payload"; anything else must be JSON.
 * @throws GatewayError ValidationError for malformed JSON.
 */
export function parseJsonBody(text: string): unknown {
    if (text.trim() === '') {
        return undefined;
    }
    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch (error: unknown) {
        throw new GatewayError('ValidationError', `Request body is not valid JSON: ${describe(error)}`, { field: ROOT_FIELD });
    }
}

function readBody(req: http.IncomingMessage, maxBytes: number): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        let rejected = false;
        req.on('data', (chunk: Buffer) => {
            if (rejected) return;
            size += chunk.length;
            if (size > maxBytes) {
                rejected = true;
                reject(new GatewayError('ValidationError', `Request body exceeds ${maxBytes} bytes.`, { field: ROOT_FIELD }));
                return;
            }
            chunks.push(chunk);
        });
        req.on('end', () => {
            if (!rejected) resolve(Buffer.concat(chunks).toString('utf-8'));
        });
        req.on('error', err => {
            if (!rejected) reject(err);
        });
    });
}

function send(res: http.ServerResponse, response: OutboundResponse): void {
    const payload = JSON.stringify(response.body);
    res.writeHead(response.status, {
        ...response.headers,
        'content-type': 'application/json; charset=utf-8',
        'content-length': Buffer.byteLength(payload),
    });
    res.end(payload);
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
