import { BackendConfig, BackoffSettings } from './configTypes.js';
import { OperationDescriptor } from './operationTypes.js';

/**
 * Lifecycle states of a Backend Session. Removal is not a state: a removed
 * session leaves the machine and is discarded.
 */
export type BackendState =
    | 'disconnected' // Not started, or stopped
    | 'connecting'   // Establishing the transport and protocol handshake
    | 'discovering'  // Connected, waiting for the operation list
    | 'ready'        // Serving invocations
    | 'degraded'     // A transport failure was seen; routes stay, calls fail fast while probing
    | 'reconnecting'; // Waiting out a backoff delay before the next connection attempt

/**
 * A stable key plus the address (transport configuration) it is reachable at.
 */
export interface BackendIdentity {
    id: string;
    config: BackendConfig;
}

/**
 * Result of one invocation as reported by the backend. Transport problems are
 * thrown instead (see BackendTransportError / BackendTimeoutError).
 */
export type InvocationOutcome =
    | { ok: true; payload: unknown }
    | { ok: false; error: { name: string; message: string } };

export interface CallOptions {
    timeoutMs: number;
    signal: AbortSignal;
}

/**
 * One live connection to one backend, as produced by a BackendConnector.
 */
export interface BackendConnection {
    /** Raw discovery answer; entries are validated by the session. */
    listOperations(options: { timeoutMs: number }): Promise<unknown[]>;
    invoke(operationName: string, payload: unknown, options: CallOptions): Promise<InvocationOutcome>;
    ping(options: { timeoutMs: number }): Promise<void>;
    /** Called when the backend announces that its operation set changed. */
    onCapabilitiesChanged(listener: () => void): void;
    /** Called once when the connection goes away without close() being called. */
    onClose(listener: (reason?: Error) => void): void;
    close(): Promise<void>;
}

export interface ConnectOptions {
    timeoutMs: number;
}

export interface BackendConnector {
    connect(backend: BackendIdentity, options: ConnectOptions): Promise<BackendConnection>;
}

/**
 * Per-request state owned by the Dispatcher; never shared across requests.
 */
export interface InvocationContext {
    requestId: string;
    backendId: string;
    operationName: string;
    payload: unknown;
    /** Absolute epoch milliseconds. */
    deadline: number;
    signal: AbortSignal;
}

export interface SessionOptions {
    concurrencyLimit: number;
    queueTimeoutMs: number;
    connectTimeoutMs: number;
    discoveryTimeoutMs: number;
    rediscoveryIntervalMs: number;
    probeIntervalMs: number;
    maxProbeFailures: number;
    backoff: BackoffSettings;
}

export interface BackendHealth {
    id: string;
    state: BackendState;
    operations: number;
    inFlight: number;
    reconnectAttempts: number;
    lastError?: string;
    /** ISO timestamp of the last state transition. */
    since: string;
}

export type StateChangeListener = (backendId: string, state: BackendState, previous: BackendState) => void;
export type OperationsChangedListener = (backendId: string, operations: readonly OperationDescriptor[]) => void;
