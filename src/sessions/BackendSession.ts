import { EventEmitter } from 'events';
import {
    BackendTimeoutError,
    BackendTransportError,
    ErrorContext,
    GatewayError,
    InvocationAbortedError,
} from '../errors/GatewayError.js';
import { SessionEvents } from '../types/eventTypes.js';
import { OperationDescriptor, OperationDescriptorSchema } from '../types/operationTypes.js';
import {
    BackendConnection,
    BackendConnector,
    BackendHealth,
    BackendIdentity,
    BackendState,
    InvocationContext,
    OperationsChangedListener,
    SessionOptions,
    StateChangeListener,
} from '../types/sessionTypes.js';
import { linkedAbort, raceAbort, withTimeout } from '../utils/async.js';
import { logger } from '../utils/logger.js';
import { computeBackoffDelay } from './backoff.js';
import { ConcurrencyGate } from './ConcurrencyGate.js';

/**
 * Owns one connection to one backend: connects, discovers its operations,
 * forwards invocations and keeps track of liveness.
 *
 * Lifecycle steps (connect, discovery, probing, loss handling) run one at a
 * time on an internal promise chain, so the results of this backend's
 * discoveries are published in the order they complete. Invocations do not
 * go through that chain; they run concurrently up to the concurrency limit.
 *
 * Emits:
 * - 'operationsChanged' (backendId, operations) after every successful discovery
 *   that follows a (re)connect, and after a re-discovery that changed the set.
 * - 'stateChange' (backendId, state, previous) on every transition.
 */
export class BackendSession extends EventEmitter {
    public readonly identity: BackendIdentity;
    private options: SessionOptions;
    private readonly connector: BackendConnector;
    private readonly gate: ConcurrencyGate;

    private state: BackendState = 'disconnected';
    private stateSince = new Date();
    private connection: BackendConnection | null = null;
    private operations: readonly OperationDescriptor[] = [];
    private fingerprint: string | null = null;
    private rediscoveryPending = false; // A change announced while not ready; honoured on recovery

    // Connections replaced by a reconnect stay open until their in-flight calls settle.
    private readonly inFlightByConnection = new Map<BackendConnection, number>();
    private readonly retiring = new Set<BackendConnection>();

    private reconnectAttempts = 0;
    private probeFailures = 0;
    private lastError: string | undefined;

    private reconnectTimer: NodeJS.Timeout | null = null;
    private rediscoveryTimer: NodeJS.Timeout | null = null;
    private probeTimer: NodeJS.Timeout | null = null;

    private lifecycle: Promise<void> = Promise.resolve();
    private stopped = true;
    private generation = 0; // Bumped by stop() so steps started earlier can tell they are stale

    constructor(identity: BackendIdentity, connector: BackendConnector, options: SessionOptions) {
        super();
        this.identity = identity;
        this.connector = connector;
        this.options = options;
        this.gate = new ConcurrencyGate(options.concurrencyLimit, options.queueTimeoutMs, identity.id);
    }

    public get id(): string {
        return this.identity.id;
    }

    public getState(): BackendState {
        return this.state;
    }

    public getOperations(): readonly OperationDescriptor[] {
        return this.operations;
    }

    public getHealth(): BackendHealth {
        return {
            id: this.identity.id,
            state: this.state,
            operations: this.operations.length,
            inFlight: this.gate.inFlight,
            reconnectAttempts: this.reconnectAttempts,
            lastError: this.lastError,
            since: this.stateSince.toISOString(),
        };
    }

    /**
     * Starts the connect/discover cycle. Resolves when the first attempt has
     * finished, successfully or not; failures are retried in the background.
     */
    public start(): Promise<void> {
        if (!this.stopped) {
            return this.lifecycle;
        }
        this.stopped = false;
        return this.enqueue(() => this.connectAndDiscover());
    }

    /**
     * Leaves the state machine: timers are cancelled and every connection,
     * including retiring ones, is closed immediately.
     */
    public async stop(): Promise<void> {
        if (this.stopped) {
            return;
        }
        this.stopped = true;
        this.generation++;
        this.clearTimers();

        const connections = new Set(this.retiring);
        if (this.connection) connections.add(this.connection);
        this.connection = null;
        this.retiring.clear();
        this.inFlightByConnection.clear();
        this.operations = [];
        this.fingerprint = null;
        this.rediscoveryPending = false;
        this.transition('disconnected');

        await Promise.all([...connections].map(connection => this.closeConnection(connection)));
        logger.info(`Backend "${this.id}" session stopped.`);
    }

    /**
     * Re-issues discovery now. Resolves once the result has been applied.
     */
    public refresh(): Promise<void> {
        const connection = this.connection;
        if (!connection) {
            return this.lifecycle;
        }
        return this.enqueue(() => this.rediscover(connection));
    }

    /**
     * Resolves when every lifecycle step queued so far has run.
     */
    public whenIdle(): Promise<void> {
        return this.lifecycle;
    }

    public updateOptions(options: SessionOptions): void {
        const rearmRediscovery = options.rediscoveryIntervalMs !== this.options.rediscoveryIntervalMs;
        this.options = options;
        this.gate.reconfigure(options.concurrencyLimit, options.queueTimeoutMs);
        if (rearmRediscovery && this.state === 'ready') {
            this.armRediscovery();
        }
    }

    /**
     * Forwards one call to the backend, holding a concurrency slot for its
     * duration and enforcing the context's deadline and cancellation signal.
     * @returns The backend's success payload.
     * @throws GatewayError for every failure.
     */
    public async invoke(context: InvocationContext): Promise<unknown> {
        const errorContext: ErrorContext = { backendId: this.id, operation: context.operationName };
        const connection = this.connection;
        if (!connection || this.state !== 'ready') {
            throw new GatewayError('BackendUnavailable', `Backend is ${this.state}; retry later.`, errorContext);
        }
        const remaining = context.deadline - Date.now();
        if (remaining <= 0) {
            throw new GatewayError('InvocationTimeout', 'Deadline elapsed before the call was dispatched.', errorContext);
        }

        const guard = linkedAbort(context.signal, remaining);
        let release: () => void;
        try {
            release = await this.gate.acquire(context.operationName, guard.signal);
        } catch (error: unknown) {
            guard.dispose();
            throw this.translateFailure(error, guard.timedOut(), context.signal.aborted, remaining, connection, errorContext);
        }

        this.trackInFlight(connection, 1);
        try {
            const outcome = await raceAbort(
                connection.invoke(context.operationName, context.payload, { timeoutMs: remaining, signal: guard.signal }),
                guard.signal,
            );
            if (!outcome.ok) {
                throw new GatewayError('BusinessError', outcome.error.message, { ...errorContext, reason: outcome.error.name });
            }
            return outcome.payload;
        } catch (error: unknown) {
            throw this.translateFailure(error, guard.timedOut(), context.signal.aborted, remaining, connection, errorContext);
        } finally {
            guard.dispose();
            release();
            this.trackInFlight(connection, -1);
        }
    }

    public onStateChange(listener: StateChangeListener): void {
        this.on(SessionEvents.STATE_CHANGE, listener);
    }

    public onOperationsChanged(listener: OperationsChangedListener): void {
        this.on(SessionEvents.OPERATIONS_CHANGED, listener);
    }

    // --- Lifecycle steps ---

    private async connectAndDiscover(): Promise<void> {
        if (this.stopped || this.connection) {
            return;
        }
        const generation = this.generation;
        this.transition('connecting');

        let connection: BackendConnection;
        try {
            connection = await this.openConnection();
        } catch (error: unknown) {
            if (generation !== this.generation) return;
            const unreachable = new GatewayError('BackendUnreachable', `Cannot connect: ${describe(error)}`, { backendId: this.id });
            this.lastError = unreachable.message;
            logger.warn(unreachable.message);
            this.scheduleReconnect();
            return;
        }
        if (generation !== this.generation) {
            await this.closeConnection(connection);
            return;
        }

        this.attach(connection);
        this.transition('discovering');

        let operations: OperationDescriptor[];
        try {
            operations = await this.discover(connection);
        } catch (error: unknown) {
            if (generation !== this.generation || this.connection !== connection) return;
            this.lastError = `Discovery failed: ${describe(error)}`;
            logger.warn(`Backend "${this.id}": ${this.lastError}`);
            this.retire(connection);
            this.scheduleReconnect();
            return;
        }
        if (generation !== this.generation || this.connection !== connection) {
            return;
        }

        this.reconnectAttempts = 0;
        this.probeFailures = 0;
        this.lastError = undefined;
        this.rediscoveryPending = false;
        this.applyOperations(operations, true);
        this.transition('ready');
        this.armRediscovery();
    }

    private async rediscover(connection: BackendConnection): Promise<void> {
        if (this.connection !== connection) {
            return;
        }
        if (this.state !== 'ready') {
            this.rediscoveryPending = true;
            return;
        }
        this.rediscoveryPending = false;
        try {
            const operations = await this.discover(connection);
            if (this.connection !== connection) return;
            if (this.applyOperations(operations, false)) {
                logger.info(`Backend "${this.id}" capability drift detected: ${operations.length} operations now.`);
            }
        } catch (error: unknown) {
            if (this.connection !== connection) return;
            this.lastError = `Re-discovery failed: ${describe(error)}`;
            logger.warn(`Backend "${this.id}": ${this.lastError}`);
            this.markDegraded(connection);
        } finally {
            if (this.state === 'ready' && this.connection === connection) {
                this.armRediscovery();
            }
        }
    }

    private async probe(connection: BackendConnection): Promise<void> {
        if (this.connection !== connection || this.state !== 'degraded') {
            return;
        }
        const timeoutMs = this.options.connectTimeoutMs;
        try {
            await withTimeout(connection.ping({ timeoutMs }), timeoutMs, 'Health probe');
            if (this.connection !== connection) return;
            this.probeFailures = 0;
            logger.info(`Backend "${this.id}" answered its health probe; leaving degraded state.`);
            this.transition('ready');
            if (this.rediscoveryPending) {
                await this.rediscover(connection);
            } else {
                this.armRediscovery();
            }
        } catch (error: unknown) {
            if (this.connection !== connection) return;
            this.probeFailures++;
            this.lastError = `Health probe failed: ${describe(error)}`;
            logger.warn(`Backend "${this.id}": ${this.lastError} (${this.probeFailures}/${this.options.maxProbeFailures})`);
            if (this.probeFailures >= this.options.maxProbeFailures) {
                this.retire(connection);
                this.scheduleReconnect();
            } else {
                this.scheduleProbe(connection);
            }
        }
    }

    private async handleConnectionLost(connection: BackendConnection, reason?: Error): Promise<void> {
        if (this.connection !== connection) {
            return;
        }
        this.lastError = `Connection lost: ${reason?.message ?? 'closed by backend'}`;
        logger.warn(`Backend "${this.id}": ${this.lastError}`);
        this.retire(connection);
        this.scheduleReconnect();
    }

    // --- Helpers ---

    private enqueue(step: () => Promise<void>): Promise<void> {
        this.lifecycle = this.lifecycle.then(step).catch((error: unknown) => {
            logger.error(`Backend "${this.id}" lifecycle step failed: ${describe(error)}`, error);
        });
        return this.lifecycle;
    }

    private async openConnection(): Promise<BackendConnection> {
        const timeoutMs = this.options.connectTimeoutMs;
        const pending = this.connector.connect(this.identity, { timeoutMs });
        try {
            return await withTimeout(pending, timeoutMs, 'Connection');
        } catch (error: unknown) {
            // A connection that completes after the timeout must not leak.
            pending.then(
                late => this.closeConnection(late),
                (lateError: unknown) => logger.debug(`Backend "${this.id}" abandoned connect attempt failed: ${describe(lateError)}`),
            );
            throw error;
        }
    }

    private attach(connection: BackendConnection): void {
        this.connection = connection;
        this.inFlightByConnection.set(connection, 0);
        connection.onClose(reason => {
            void this.enqueue(() => this.handleConnectionLost(connection, reason));
        });
        connection.onCapabilitiesChanged(() => {
            logger.debug(`Backend "${this.id}" announced a capability change.`);
            void this.enqueue(() => this.rediscover(connection));
        });
    }

    /**
     * Runs discovery and keeps only well-formed, uniquely named operations.
     * Transport failures propagate; a malformed answer yields what could be salvaged.
     */
    private async discover(connection: BackendConnection): Promise<OperationDescriptor[]> {
        const timeoutMs = this.options.discoveryTimeoutMs;
        const raw = await withTimeout(connection.listOperations({ timeoutMs }), timeoutMs, 'Discovery');
        const operations: OperationDescriptor[] = [];
        const seen = new Set<string>();
        raw.forEach((candidate, index) => {
            const parsed = OperationDescriptorSchema.safeParse(candidate);
            if (!parsed.success) {
                logger.warn(`Backend "${this.id}" returned a malformed operation at index ${index}; skipping it. ${parsed.error.issues[0]?.message ?? ''}`);
                return;
            }
            if (seen.has(parsed.data.name)) {
                logger.warn(`Backend "${this.id}" declared operation "${parsed.data.name}" more than once; keeping the first.`);
                return;
            }
            seen.add(parsed.data.name);
            operations.push(parsed.data);
        });
        return operations;
    }

    /**
     * Publishes a discovery result. Returns true if listeners were notified.
     * @param force - Notify even if the set is unchanged (routes were purged by a reconnect).
     */
    private applyOperations(operations: OperationDescriptor[], force: boolean): boolean {
        const fingerprint = JSON.stringify(operations);
        if (!force && fingerprint === this.fingerprint) {
            return false;
        }
        this.operations = Object.freeze([...operations]);
        this.fingerprint = fingerprint;
        this.emit(SessionEvents.OPERATIONS_CHANGED, this.id, this.operations);
        return true;
    }

    private markDegraded(connection: BackendConnection): void {
        if (this.connection !== connection || this.state !== 'ready') {
            return;
        }
        this.clearTimer('rediscoveryTimer');
        this.probeFailures = 0;
        this.transition('degraded');
        this.scheduleProbe(connection);
    }

    private scheduleReconnect(): void {
        if (this.stopped) {
            return;
        }
        this.clearTimers();
        this.transition('reconnecting');
        const delay = computeBackoffDelay(this.reconnectAttempts, this.options.backoff);
        this.reconnectAttempts++;
        logger.info(`Backend "${this.id}" reconnect attempt ${this.reconnectAttempts} in ${delay}ms.`);
        const generation = this.generation;
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            if (generation === this.generation) {
                void this.enqueue(() => this.connectAndDiscover());
            }
        }, delay);
        this.reconnectTimer.unref();
    }

    private scheduleProbe(connection: BackendConnection): void {
        this.clearTimer('probeTimer');
        this.probeTimer = setTimeout(() => {
            this.probeTimer = null;
            void this.enqueue(() => this.probe(connection));
        }, this.options.probeIntervalMs);
        this.probeTimer.unref();
    }

    private armRediscovery(): void {
        this.clearTimer('rediscoveryTimer');
        const connection = this.connection;
        if (this.options.rediscoveryIntervalMs <= 0 || !connection) {
            return;
        }
        this.rediscoveryTimer = setTimeout(() => {
            this.rediscoveryTimer = null;
            void this.enqueue(() => this.rediscover(connection));
        }, this.options.rediscoveryIntervalMs);
        this.rediscoveryTimer.unref();
    }

    private clearTimer(name: 'reconnectTimer' | 'rediscoveryTimer' | 'probeTimer'): void {
        const timer = this[name];
        if (timer) {
            clearTimeout(timer);
            this[name] = null;
        }
    }

    private clearTimers(): void {
        this.clearTimer('reconnectTimer');
        this.clearTimer('rediscoveryTimer');
        this.clearTimer('probeTimer');
    }

    /**
     * Detaches a connection from the session. It is closed once nothing is in
     * flight on it; calls already dispatched run to their own deadline.
     */
    private retire(connection: BackendConnection): void {
        if (this.connection === connection) {
            this.connection = null;
        }
        const pending = this.inFlightByConnection.get(connection) ?? 0;
        if (pending > 0) {
            this.retiring.add(connection);
            return;
        }
        this.inFlightByConnection.delete(connection);
        void this.closeConnection(connection);
    }

    private trackInFlight(connection: BackendConnection, delta: number): void {
        if (!this.inFlightByConnection.has(connection)) {
            return; // Session was stopped underneath the call
        }
        const count = (this.inFlightByConnection.get(connection) ?? 0) + delta;
        this.inFlightByConnection.set(connection, count);
        if (count <= 0 && this.retiring.has(connection)) {
            this.retiring.delete(connection);
            this.inFlightByConnection.delete(connection);
            void this.closeConnection(connection);
        }
    }

    private async closeConnection(connection: BackendConnection): Promise<void> {
        try {
            await connection.close();
        } catch (error: unknown) {
            logger.warn(`Error closing connection to backend "${this.id}": ${describe(error)}`);
        }
    }

    private translateFailure(
        error: unknown,
        timedOut: boolean,
        cancelled: boolean,
        timeoutMs: number,
        connection: BackendConnection,
        context: ErrorContext,
    ): GatewayError {
        if (error instanceof GatewayError) {
            return error;
        }
        if (timedOut || error instanceof BackendTimeoutError) {
            return new GatewayError('InvocationTimeout', `Backend did not answer within ${timeoutMs}ms.`, context, { cause: error });
        }
        if (cancelled || error instanceof InvocationAbortedError) {
            return new GatewayError('RequestCancelled', 'Caller went away before the backend answered.', context, { cause: error });
        }
        if (error instanceof BackendTransportError) {
            this.lastError = `Invocation transport failure: ${error.message}`;
            this.markDegraded(connection);
            return new GatewayError('BackendUnavailable', `Transport failed: ${error.message}`, context, { cause: error });
        }
        return GatewayError.from(error, context);
    }

    private transition(next: BackendState): void {
        if (this.state === next) {
            return;
        }
        const previous = this.state;
        this.state = next;
        this.stateSince = new Date();
        logger.debug(`Backend "${this.id}" state: ${previous} -> ${next}`);
        this.emit(SessionEvents.STATE_CHANGE, this.id, next, previous);
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
