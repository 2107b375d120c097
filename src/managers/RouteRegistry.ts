import { EventEmitter } from 'events';
import { normalizePath } from '../translation/SchemaTranslator.js';
import { RegistryEvents } from '../types/eventTypes.js';
import {
    HttpMethod,
    RegistrySnapshot,
    RouteDescriptor,
    RouteEntry,
    RouteLookup,
    RouteMatch,
    RoutesChangedPayload,
} from '../types/routeTypes.js';
import { logger } from '../utils/logger.js';

/**
 * Maps (method, path) to the backend route that serves it.
 *
 * Every write builds a complete new snapshot and swaps it in with a single
 * assignment; readers take the current snapshot and keep using it, so a
 * backend's routes are always seen all-present or all-absent. Writes come
 * from the BackendSupervisor only.
 *
 * Emits 'routesChanged' with a RoutesChangedPayload after each effective swap.
 */
export class RouteRegistry extends EventEmitter implements RouteLookup {
    private current: RegistrySnapshot = buildSnapshot(0, new Map());

    public snapshot(): RegistrySnapshot {
        return this.current;
    }

    /**
     * Finds the route for an inbound request. The path is normalized first so
     * equivalent percent-encodings resolve to the same route.
     */
    public match(method: string, path: string): RouteMatch {
        const normalized = normalizePath(path);
        if (normalized === null) {
            return { kind: 'none' };
        }
        const methods = this.current.byPath.get(normalized);
        if (!methods) {
            return { kind: 'none' };
        }
        const entry = isHttpMethod(method) ? methods.get(method) : undefined;
        if (entry) {
            return { kind: 'found', entry };
        }
        return { kind: 'method-mismatch', allowed: [...methods.keys()] };
    }

    /**
     * Replaces every route of one backend in a single swap. Passing an empty
     * list removes the backend's routes.
     * @throws Error if a descriptor belongs to another backend, or collides with a
     * route of another backend or with another descriptor in the list.
     */
    public replaceBackendRoutes(backendId: string, descriptors: readonly RouteDescriptor[]): RoutesChangedPayload {
        const previous = this.current;
        const incoming = new Map<string, RouteEntry>();
        for (const descriptor of descriptors) {
            if (descriptor.backendId !== backendId) {
                throw new Error(`Route ${descriptor.path} belongs to backend "${descriptor.backendId}", not "${backendId}".`);
            }
            const key = routeKey(descriptor.method, descriptor.path);
            if (incoming.has(key)) {
                throw new Error(`Backend "${backendId}" declares route ${key} more than once.`);
            }
            const owner = previous.routes.get(key);
            if (owner && owner.descriptor.backendId !== backendId) {
                throw new Error(`Route ${key} of backend "${backendId}" collides with backend "${owner.descriptor.backendId}".`);
            }
            incoming.set(key, Object.freeze({ key, descriptor: Object.freeze({ ...descriptor }) }));
        }

        const outgoing = previous.byBackend.get(backendId) ?? [];
        const removed = outgoing.filter(entry => !incoming.has(entry.key)).map(entry => entry.key);
        const added = [...incoming.keys()].filter(key => !previous.routes.has(key));
        const unchanged = removed.length === 0 && added.length === 0 && outgoing.every(
            entry => JSON.stringify(entry.descriptor) === JSON.stringify(incoming.get(entry.key)?.descriptor)
        );
        if (unchanged) {
            return { backendId, added: [], removed: [], version: previous.version };
        }

        const routes = new Map(previous.routes);
        for (const entry of outgoing) {
            routes.delete(entry.key);
        }
        for (const [key, entry] of incoming) {
            routes.set(key, entry);
        }

        this.current = buildSnapshot(previous.version + 1, routes);
        const change: RoutesChangedPayload = { backendId, added, removed, version: this.current.version };
        logger.info(`Routes for backend "${backendId}" swapped: ${incoming.size} active (+${added.length}/-${removed.length}), registry v${change.version}.`);
        this.emit(RegistryEvents.ROUTES_CHANGED, change);
        return change;
    }

    public removeBackendRoutes(backendId: string): RoutesChangedPayload {
        return this.replaceBackendRoutes(backendId, []);
    }

    public getBackendRoutes(backendId: string): readonly RouteEntry[] {
        return this.current.byBackend.get(backendId) ?? [];
    }

    public onRoutesChanged(listener: (change: RoutesChangedPayload) => void): void {
        this.on(RegistryEvents.ROUTES_CHANGED, listener);
    }

    public offRoutesChanged(listener: (change: RoutesChangedPayload) => void): void {
        this.off(RegistryEvents.ROUTES_CHANGED, listener);
    }
}

export function routeKey(method: HttpMethod, path: string): string {
    return `${method} ${path}`;
}

function isHttpMethod(method: string): method is HttpMethod {
    return method === 'GET' || method === 'POST';
}

function buildSnapshot(version: number, routes: Map<string, RouteEntry>): RegistrySnapshot {
    const byPath = new Map<string, Map<HttpMethod, RouteEntry>>();
    const byBackend = new Map<string, RouteEntry[]>();
    for (const entry of routes.values()) {
        const { path, method, backendId } = entry.descriptor;
        let methods = byPath.get(path);
        if (!methods) {
            methods = new Map();
            byPath.set(path, methods);
        }
        methods.set(method, entry);

        let owned = byBackend.get(backendId);
        if (!owned) {
            owned = [];
            byBackend.set(backendId, owned);
        }
        owned.push(entry);
    }
    for (const owned of byBackend.values()) {
        Object.freeze(owned);
    }
    return Object.freeze({ version, routes, byPath, byBackend });
}
