import { EventEmitter } from 'events';
import { ConfigurationManager } from '../config/ConfigurationManager.js';
import { BackendSession } from '../sessions/BackendSession.js';
import { translateOperation } from '../translation/SchemaTranslator.js';
import { BackendConfig, GatewaySettings } from '../types/configTypes.js';
import {
    BackendAddedPayload,
    BackendRemovedPayload,
    BackendUpdatedPayload,
    ConfigEvents,
    SessionEvents,
    SettingsUpdatedPayload,
} from '../types/eventTypes.js';
import { OperationDescriptor } from '../types/operationTypes.js';
import { RouteDescriptor } from '../types/routeTypes.js';
import { BackendConnector, BackendHealth, BackendState, SessionOptions } from '../types/sessionTypes.js';
import { logger } from '../utils/logger.js';
import { RouteRegistry } from './RouteRegistry.js';

export type GatewayStatus = 'ok' | 'degraded' | 'down';

export interface BackendHealthReport extends BackendHealth {
    routes: number;
}

export interface HealthReport {
    status: GatewayStatus;
    backends: BackendHealthReport[];
}

/**
 * Owns one Backend Session per enabled backend and is the only writer to the
 * RouteRegistry. A session's discovery result is translated and swapped in
 * as that backend's whole route set; losing the connection withdraws it.
 * A failure in one backend never touches another backend's routes.
 *
 * Re-emits session events as 'stateChange' and 'operationsChanged'.
 */
export class BackendSupervisor extends EventEmitter {
    private readonly sessions = new Map<string, BackendSession>();
    private readonly pending = new Map<string, Promise<void>>(); // Tail of each backend's add/remove chain
    private settings: GatewaySettings;
    private stoppingAll = false; // Prevents config events from starting sessions during shutdown

    constructor(
        private readonly registry: RouteRegistry,
        private readonly connector: BackendConnector,
        settings: GatewaySettings,
    ) {
        super();
        this.settings = settings;
    }

    /**
     * Follows configuration reloads: added, removed and updated backends, and
     * changed settings.
     */
    public attach(configManager: ConfigurationManager): void {
        configManager.on(ConfigEvents.BACKEND_ADDED, ({ backendId, config }: BackendAddedPayload) => {
            this.addBackend(backendId, config).catch((err: unknown) =>
                logger.error(`Failed to add backend "${backendId}" after config change: ${describe(err)}`));
        });
        configManager.on(ConfigEvents.BACKEND_REMOVED, ({ backendId }: BackendRemovedPayload) => {
            this.removeBackend(backendId).catch((err: unknown) =>
                logger.error(`Failed to remove backend "${backendId}" after config change: ${describe(err)}`));
        });
        configManager.on(ConfigEvents.BACKEND_UPDATED, ({ backendId, newConfig }: BackendUpdatedPayload) => {
            logger.info(`Configuration of backend "${backendId}" changed; restarting its session.`);
            this.addBackend(backendId, newConfig).catch((err: unknown) =>
                logger.error(`Failed to restart backend "${backendId}" after config change: ${describe(err)}`));
        });
        configManager.on(ConfigEvents.SETTINGS_UPDATED, ({ newSettings }: SettingsUpdatedPayload) => {
            this.updateSettings(newSettings);
        });
        logger.info('BackendSupervisor listening to ConfigurationManager.');
    }

    /**
     * Starts a session for every enabled backend. Resolves once each has made
     * its first connection attempt; unreachable backends keep retrying.
     */
    public async startAll(backends: Record<string, BackendConfig>): Promise<void> {
        this.stoppingAll = false;
        const ids = Object.keys(backends);
        logger.info(`Starting ${ids.length} backend session(s)...`);
        await Promise.all(ids.map(id => this.addBackend(id, backends[id])));
    }

    public async stopAll(): Promise<void> {
        this.stoppingAll = true;
        logger.info('Stopping all backend sessions...');
        const ids = new Set([...this.sessions.keys(), ...this.pending.keys()]);
        await Promise.allSettled([...ids].map(id => this.removeBackend(id)));
        logger.info('All backend sessions stopped.');
    }

    /**
     * Starts a session for a backend. An existing session under the same id
     * is stopped and its routes purged first.
     */
    public addBackend(backendId: string, config: BackendConfig): Promise<void> {
        return this.serialize(backendId, () => this.addBackendNow(backendId, config));
    }

    /**
     * Stops a backend's session and withdraws its routes. Unknown ids are ignored.
     */
    public removeBackend(backendId: string): Promise<void> {
        return this.serialize(backendId, () => this.removeBackendNow(backendId));
    }

    /**
     * Runs add and remove steps for one backend id one at a time, in call order.
     */
    private serialize(backendId: string, step: () => Promise<void>): Promise<void> {
        const previous = this.pending.get(backendId) ?? Promise.resolve();
        const result = previous.then(step);
        // The chain only orders steps; each caller sees its own step's failure.
        const tail = result.catch(() => undefined);
        this.pending.set(backendId, tail);
        void tail.then(() => {
            if (this.pending.get(backendId) === tail) {
                this.pending.delete(backendId);
            }
        });
        return result;
    }

    private async addBackendNow(backendId: string, config: BackendConfig): Promise<void> {
        if (this.stoppingAll) {
            logger.warn(`Ignoring backend "${backendId}": supervisor is shutting down.`);
            return;
        }
        await this.removeBackendNow(backendId);
        if (this.stoppingAll) {
            logger.warn(`Ignoring backend "${backendId}": supervisor is shutting down.`);
            return;
        }
        if (!config.enabled) {
            logger.info(`Backend "${backendId}" is disabled; not starting it.`);
            return;
        }

        const session = new BackendSession({ id: backendId, config }, this.connector, this.sessionOptions(config));
        session.onOperationsChanged((id, operations) => {
            if (this.sessions.get(id) === session) {
                this.publish(id, operations);
                this.emit(SessionEvents.OPERATIONS_CHANGED, id, operations);
            }
        });
        session.onStateChange((id, state, previous) => {
            if (this.sessions.get(id) !== session) return;
            this.handleStateChange(id, state, previous);
        });
        this.sessions.set(backendId, session);
        logger.info(`Backend "${backendId}" registered (${config.transport}).`);
        await session.start();
    }

    private async removeBackendNow(backendId: string): Promise<void> {
        const session = this.sessions.get(backendId);
        if (!session) {
            return;
        }
        this.sessions.delete(backendId);
        this.registry.removeBackendRoutes(backendId);
        await session.stop();
        logger.info(`Backend "${backendId}" removed.`);
    }

    /**
     * Applies new gateway settings to every session. A changed route prefix
     * republishes every backend's routes under the new prefix.
     */
    public updateSettings(settings: GatewaySettings): void {
        const prefixChanged = settings.routePrefix !== this.settings.routePrefix;
        this.settings = settings;
        for (const session of this.sessions.values()) {
            session.updateOptions(this.sessionOptions(session.identity.config));
            if (prefixChanged && this.registry.getBackendRoutes(session.id).length > 0) {
                this.publish(session.id, session.getOperations());
            }
        }
    }

    public getSession(backendId: string): BackendSession | undefined {
        return this.sessions.get(backendId);
    }

    public getBackendIds(): string[] {
        return [...this.sessions.keys()];
    }

    /**
     * Per-backend health plus an overall status: ok when every backend is
     * ready, down when none can serve, degraded otherwise.
     */
    public getHealth(): HealthReport {
        const backends = [...this.sessions.values()].map(session => ({
            ...session.getHealth(),
            routes: this.registry.getBackendRoutes(session.id).length,
        }));
        return { status: overallStatus(backends.map(b => b.state)), backends };
    }

    private publish(backendId: string, operations: readonly OperationDescriptor[]): void {
        const descriptors: RouteDescriptor[] = [];
        for (const operation of operations) {
            try {
                descriptors.push(translateOperation(backendId, operation, this.settings.routePrefix));
            } catch (error: unknown) {
                logger.warn(`Backend "${backendId}" operation "${operation.name}" could not be translated; skipping it: ${describe(error)}`);
            }
        }
        try {
            this.registry.replaceBackendRoutes(backendId, descriptors);
        } catch (error: unknown) {
            logger.error(`Routes of backend "${backendId}" rejected; previous routes stay active: ${describe(error)}`);
        }
    }

    private handleStateChange(backendId: string, state: BackendState, previous: BackendState): void {
        const message = `Backend "${backendId}" ${previous} -> ${state}`;
        if (state === 'degraded' || state === 'reconnecting') {
            logger.warn(message);
        } else {
            logger.info(message);
        }
        if (state === 'reconnecting' || state === 'disconnected') {
            this.registry.removeBackendRoutes(backendId);
        }
        this.emit(SessionEvents.STATE_CHANGE, backendId, state, previous);
    }

    private sessionOptions(config: BackendConfig): SessionOptions {
        return {
            concurrencyLimit: config.concurrencyLimit ?? this.settings.concurrencyLimit,
            queueTimeoutMs: this.settings.queueTimeoutMs,
            connectTimeoutMs: this.settings.connectTimeoutMs,
            discoveryTimeoutMs: this.settings.discoveryTimeoutMs,
            rediscoveryIntervalMs: this.settings.rediscoveryIntervalMs,
            probeIntervalMs: this.settings.probeIntervalMs,
            maxProbeFailures: this.settings.maxProbeFailures,
            backoff: this.settings.backoff,
        };
    }
}

export function overallStatus(states: BackendState[]): GatewayStatus {
    if (states.every(state => state === 'ready')) return 'ok';
    if (states.some(state => state === 'ready' || state === 'degraded')) return 'degraded';
    return 'down';
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
