import { BackendTransportError } from '../../src/errors/GatewayError';
import { GatewaySettings, GatewaySettingsSchema, StdioBackendConfig } from '../../src/types/configTypes';
import {
    BackendConnection,
    BackendConnector,
    BackendIdentity,
    CallOptions,
    InvocationOutcome,
    SessionOptions,
} from '../../src/types/sessionTypes';

export type InvokeHandler = (operationName: string, payload: unknown, options: CallOptions) => Promise<InvocationOutcome>;

/**
 * Scriptable in-process backend. Tests mutate its fields to change what the
 * next discovery, call or probe sees.
 */
export class FakeBackend {
    public tools: unknown[] = [];
    public handler: InvokeHandler = async (_name, payload) => ({ ok: true, payload });
    public connectFailures = 0;
    public discoveryFailure: Error | null = null;
    public pingFailure: Error | null = null;
    public closeDelayMs = 0;
    public readonly connections: FakeConnection[] = [];
    public invokeCalls = 0;
    public listCalls = 0;

    public get current(): FakeConnection | undefined {
        return this.connections[this.connections.length - 1];
    }
}

export class FakeConnection implements BackendConnection {
    public closed = false;
    private readonly closeListeners: ((reason?: Error) => void)[] = [];
    private readonly capabilityListeners: (() => void)[] = [];

    constructor(private readonly backend: FakeBackend) { }

    public async listOperations(): Promise<unknown[]> {
        this.backend.listCalls++;
        if (this.backend.discoveryFailure) {
            throw this.backend.discoveryFailure;
        }
        return [...this.backend.tools];
    }

    public invoke(operationName: string, payload: unknown, options: CallOptions): Promise<InvocationOutcome> {
        this.backend.invokeCalls++;
        return this.backend.handler(operationName, payload, options);
    }

    public async ping(): Promise<void> {
        if (this.backend.pingFailure) {
            throw this.backend.pingFailure;
        }
    }

    public onCapabilitiesChanged(listener: () => void): void {
        this.capabilityListeners.push(listener);
    }

    public onClose(listener: (reason?: Error) => void): void {
        this.closeListeners.push(listener);
    }

    public async close(): Promise<void> {
        if (this.backend.closeDelayMs > 0) {
            await new Promise(resolve => setTimeout(resolve, this.backend.closeDelayMs));
        }
        this.closed = true;
    }

    /** Simulates the backend going away. */
    public drop(reason: Error = new BackendTransportError('pipe closed')): void {
        this.closeListeners.forEach(listener => listener(reason));
    }

    /** Simulates a capability-change notification. */
    public announceChange(): void {
        this.capabilityListeners.forEach(listener => listener());
    }
}

export class FakeConnector implements BackendConnector {
    private readonly backends = new Map<string, FakeBackend>();

    public backend(id: string): FakeBackend {
        let backend = this.backends.get(id);
        if (!backend) {
            backend = new FakeBackend();
            this.backends.set(id, backend);
        }
        return backend;
    }

    public async connect(identity: BackendIdentity): Promise<BackendConnection> {
        const backend = this.backend(identity.id);
        if (backend.connectFailures > 0) {
            backend.connectFailures--;
            throw new BackendTransportError('connection refused');
        }
        const connection = new FakeConnection(backend);
        backend.connections.push(connection);
        return connection;
    }
}

export function tool(name: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return { name, inputSchema: { type: 'object' }, ...extra };
}

export const ECHO_TOOL = {
    name: 'echo',
    description: 'Echo a message back.',
    inputSchema: {
        type: 'object',
        properties: { message: { type: 'string', minLength: 1 } },
        required: ['message'],
    },
};

/** Settings with short timers so state machine tests finish quickly. */
export function testSettings(overrides: Partial<GatewaySettings> = {}): GatewaySettings {
    return GatewaySettingsSchema.parse({
        routePrefix: '/api',
        queueTimeoutMs: 50,
        connectTimeoutMs: 500,
        discoveryTimeoutMs: 500,
        rediscoveryIntervalMs: 0,
        probeIntervalMs: 10,
        backoff: { initialDelayMs: 5, maxDelayMs: 20, multiplier: 2, jitter: 0 },
        ...overrides,
    });
}

export function testSessionOptions(overrides: Partial<SessionOptions> = {}): SessionOptions {
    const settings = testSettings();
    return {
        concurrencyLimit: settings.concurrencyLimit,
        queueTimeoutMs: settings.queueTimeoutMs,
        connectTimeoutMs: settings.connectTimeoutMs,
        discoveryTimeoutMs: settings.discoveryTimeoutMs,
        rediscoveryIntervalMs: settings.rediscoveryIntervalMs,
        probeIntervalMs: settings.probeIntervalMs,
        maxProbeFailures: settings.maxProbeFailures,
        backoff: settings.backoff,
        ...overrides,
    };
}

export const stdioConfig: StdioBackendConfig = {
    transport: 'stdio',
    command: 'fake-backend',
    args: [],
    env: {},
    enabled: true,
};

/**
 * Polls until the predicate holds, failing after `timeoutMs`.
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
    const started = Date.now();
    while (!predicate()) {
        if (Date.now() - started > timeoutMs) {
            throw new Error('Condition not met in time');
        }
        await new Promise(resolve => setTimeout(resolve, 5));
    }
}

/** A promise plus the functions that settle it. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: Error) => void } {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: Error) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}
