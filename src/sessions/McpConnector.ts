import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
    CallToolResult,
    CallToolResultSchema,
    ErrorCode,
    McpError,
    ResultSchema,
    ToolListChangedNotificationSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { BackendTimeoutError, BackendTransportError, InvocationAbortedError } from '../errors/GatewayError.js';
import {
    BackendConnection,
    BackendConnector,
    BackendIdentity,
    CallOptions,
    ConnectOptions,
    InvocationOutcome,
} from '../types/sessionTypes.js';
import { logger } from '../utils/logger.js';

export type TransportFactory = (backend: BackendIdentity) => Transport;

const CLIENT_INFO = { name: 'capability-gateway', version: '0.1.0' };

// Kept loose on purpose: entries are validated one by one by the session.
const ToolPageSchema = z.object({
    tools: z.array(z.unknown()),
    nextCursor: z.string().optional(),
});

/**
 * Opens MCP client sessions to backends. Each connection speaks the MCP
 * tools surface: tools/list for discovery, tools/call for invocation and
 * ping for liveness.
 */
export class McpConnector implements BackendConnector {
    constructor(private readonly createTransport: TransportFactory) { }

    public async connect(backend: BackendIdentity, options: ConnectOptions): Promise<BackendConnection> {
        const transport = this.createTransport(backend);
        const client = new Client(CLIENT_INFO, { capabilities: {} });
        client.onerror = (error: Error) => logger.debug(`Backend "${backend.id}" transport reported: ${error.message}`);

        try {
            await client.connect(transport, { timeout: options.timeoutMs });
        } catch (error: unknown) {
            await client.close().catch((closeError: unknown) =>
                logger.debug(`Backend "${backend.id}" cleanup after failed connect: ${describe(closeError)}`));
            throw classifyFailure(error, 'Connect');
        }

        const version = client.getServerVersion();
        logger.info(`Connected to backend "${backend.id}" (${version ? `${version.name} ${version.version}` : 'unknown server'}).`);
        return new McpConnection(backend.id, client);
    }
}

class McpConnection implements BackendConnection {
    private closing = false;
    private closeListeners: ((reason?: Error) => void)[] = [];
    private capabilityListeners: (() => void)[] = [];

    constructor(private readonly backendId: string, private readonly client: Client) {
        client.onclose = () => {
            if (this.closing) return;
            this.closing = true;
            const reason = new BackendTransportError(`Connection to backend "${backendId}" closed`);
            this.closeListeners.forEach(listener => listener(reason));
        };
        client.setNotificationHandler(ToolListChangedNotificationSchema, async () => {
            this.capabilityListeners.forEach(listener => listener());
        });
    }

    /**
     * Follows nextCursor until the backend stops returning one. A backend that
     * does not implement tools/list, or answers with something unreadable,
     * exposes zero operations.
     */
    public async listOperations(options: { timeoutMs: number }): Promise<unknown[]> {
        const tools: unknown[] = [];
        const seenCursors = new Set<string>();
        let cursor: string | undefined;
        do {
            let raw: unknown;
            try {
                raw = await this.client.request(
                    { method: 'tools/list', params: cursor === undefined ? {} : { cursor } },
                    ResultSchema,
                    { timeout: options.timeoutMs },
                );
            } catch (error: unknown) {
                if (error instanceof McpError && error.code === ErrorCode.MethodNotFound) {
                    logger.warn(`Backend "${this.backendId}" does not implement tools/list; it exposes no operations.`);
                    return [];
                }
                throw classifyFailure(error, 'Discovery');
            }
            const page = ToolPageSchema.safeParse(raw);
            if (!page.success) {
                logger.warn(`Backend "${this.backendId}" returned an unreadable tools/list page; treating it as exposing no operations.`);
                return [];
            }
            tools.push(...page.data.tools);
            if (cursor !== undefined) seenCursors.add(cursor);
            cursor = page.data.nextCursor;
        } while (cursor !== undefined && !seenCursors.has(cursor));
        return tools;
    }

    public async invoke(operationName: string, payload: unknown, options: CallOptions): Promise<InvocationOutcome> {
        let raw: unknown;
        try {
            raw = await this.client.request(
                { method: 'tools/call', params: { name: operationName, arguments: isRecord(payload) ? payload : {} } },
                ResultSchema,
                { timeout: options.timeoutMs, signal: options.signal },
            );
        } catch (error: unknown) {
            if (options.signal.aborted) {
                throw new InvocationAbortedError();
            }
            const failure = classifyFailure(error, `Call to "${operationName}"`);
            if (failure instanceof McpError) {
                return { ok: false, error: { name: ErrorCode[failure.code] ?? 'McpError', message: failure.message } };
            }
            throw failure;
        }

        const parsed = CallToolResultSchema.safeParse(raw);
        if (!parsed.success) {
            // Handed through as-is; response validation decides whether it is acceptable.
            logger.debug(`Backend "${this.backendId}" returned a non-standard result for "${operationName}".`);
            return { ok: true, payload: raw };
        }
        return toOutcome(parsed.data);
    }

    public async ping(options: { timeoutMs: number }): Promise<void> {
        try {
            await this.client.ping({ timeout: options.timeoutMs });
        } catch (error: unknown) {
            throw classifyFailure(error, 'Ping');
        }
    }

    public onCapabilitiesChanged(listener: () => void): void {
        this.capabilityListeners.push(listener);
    }

    public onClose(listener: (reason?: Error) => void): void {
        this.closeListeners.push(listener);
    }

    public async close(): Promise<void> {
        this.closing = true;
        this.closeListeners = [];
        this.capabilityListeners = [];
        await this.client.close();
    }
}

/**
 * Structured content wins; otherwise the content blocks are returned wrapped.
 * A result flagged isError becomes a business error carrying its text.
 */
function toOutcome(result: CallToolResult): InvocationOutcome {
    if (result.isError) {
        const message = result.content
            .map(block => (block.type === 'text' ? block.text : ''))
            .filter(text => text.length > 0)
            .join('\n');
        return { ok: false, error: { name: 'ToolError', message: message || 'Backend reported an error without details.' } };
    }
    if (result.structuredContent !== undefined) {
        return { ok: true, payload: result.structuredContent };
    }
    return { ok: true, payload: { content: result.content } };
}

/**
 * Sorts SDK failures into the connector error kinds. McpErrors other than
 * timeouts and closed connections are protocol-level answers from the
 * backend and are returned unchanged.
 */
function classifyFailure(error: unknown, what: string): Error {
    if (error instanceof McpError) {
        if (error.code === ErrorCode.RequestTimeout) {
            return new BackendTimeoutError(`${what} timed out`, { cause: error });
        }
        if (error.code === ErrorCode.ConnectionClosed) {
            return new BackendTransportError(`${what} failed: connection closed`, { cause: error });
        }
        return error;
    }
    if (error instanceof BackendTimeoutError || error instanceof BackendTransportError || error instanceof InvocationAbortedError) {
        return error;
    }
    return new BackendTransportError(`${what} failed: ${describe(error)}`, { cause: error });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
