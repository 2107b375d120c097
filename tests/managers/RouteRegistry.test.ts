import { jest } from '@jest/globals';
import { RouteRegistry } from '../../src/managers/RouteRegistry';
import { translateOperation } from '../../src/translation/SchemaTranslator';
import { RouteDescriptor, RoutesChangedPayload } from '../../src/types/routeTypes';

jest.mock('../../src/utils/logger', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

function route(backendId: string, name: string, sideEffect: 'read-only' | 'mutating' = 'mutating'): RouteDescriptor {
    return translateOperation(backendId, { name, description: '', inputSchema: { type: 'object' }, sideEffect }, '/api');
}

describe('RouteRegistry', () => {
    let registry: RouteRegistry;

    beforeEach(() => {
        jest.clearAllMocks();
        registry = new RouteRegistry();
    });

    it('starts empty at version 0', () => {
        expect(registry.snapshot().version).toBe(0);
        expect(registry.snapshot().routes.size).toBe(0);
        expect(registry.match('POST', '/api/a/x')).toEqual({ kind: 'none' });
    });

    it('publishes a backend route set and matches it', () => {
        const change = registry.replaceBackendRoutes('a', [route('a', 'x'), route('a', 'y', 'read-only')]);

        expect(change).toEqual({ backendId: 'a', added: ['POST /api/a/x', 'GET /api/a/y'], removed: [], version: 1 });
        const match = registry.match('POST', '/api/a/x');
        expect(match.kind).toBe('found');
        if (match.kind === 'found') {
            expect(match.entry.descriptor.operationName).toBe('x');
        }
        expect(registry.match('GET', '/api/a/y/').kind).toBe('found');
    });

    it('reports the allowed method when a path exists under another one', () => {
        registry.replaceBackendRoutes('a', [route('a', 'x')]);
        expect(registry.match('GET', '/api/a/x')).toEqual({ kind: 'method-mismatch', allowed: ['POST'] });
        expect(registry.match('DELETE', '/api/a/x')).toEqual({ kind: 'method-mismatch', allowed: ['POST'] });
    });

    it('replaces a backend set wholesale and reports the difference', () => {
        registry.replaceBackendRoutes('a', [route('a', 'x'), route('a', 'y')]);
        const change = registry.replaceBackendRoutes('a', [route('a', 'y'), route('a', 'z')]);

        expect(change).toEqual({ backendId: 'a', added: ['POST /api/a/z'], removed: ['POST /api/a/x'], version: 2 });
        expect(registry.match('POST', '/api/a/x').kind).toBe('none');
        expect(registry.getBackendRoutes('a').map(entry => entry.descriptor.operationName).sort()).toEqual(['y', 'z']);
    });

    it('does not bump the version or notify when nothing changed', () => {
        const listener = jest.fn<(change: RoutesChangedPayload) => void>();
        registry.replaceBackendRoutes('a', [route('a', 'x')]);
        registry.onRoutesChanged(listener);

        const change = registry.replaceBackendRoutes('a', [route('a', 'x')]);

        expect(change.version).toBe(1);
        expect(listener).not.toHaveBeenCalled();
    });

    it('notifies listeners of effective swaps', () => {
        const listener = jest.fn<(change: RoutesChangedPayload) => void>();
        registry.onRoutesChanged(listener);
        registry.replaceBackendRoutes('a', [route('a', 'x')]);
        registry.removeBackendRoutes('a');
        registry.offRoutesChanged(listener);
        registry.replaceBackendRoutes('a', [route('a', 'x')]);

        expect(listener).toHaveBeenCalledTimes(2);
        expect(listener).toHaveBeenLastCalledWith({ backendId: 'a', added: [], removed: ['POST /api/a/x'], version: 2 });
    });

    it('leaves other backends untouched', () => {
        registry.replaceBackendRoutes('a', [route('a', 'x')]);
        registry.replaceBackendRoutes('b', [route('b', 'x')]);
        registry.removeBackendRoutes('a');

        expect(registry.match('POST', '/api/a/x').kind).toBe('none');
        expect(registry.match('POST', '/api/b/x').kind).toBe('found');
    });

    it('rejects descriptors of another backend and duplicate routes without changing anything', () => {
        registry.replaceBackendRoutes('a', [route('a', 'x')]);
        const before = registry.snapshot();

        expect(() => registry.replaceBackendRoutes('a', [route('b', 'y')])).toThrow('belongs to backend "b"');
        expect(() => registry.replaceBackendRoutes('a', [route('a', 'y'), route('a', 'y')])).toThrow('more than once');
        expect(registry.snapshot()).toBe(before);
    });

    it('never exposes a partially applied route set to readers', () => {
        const names = Array.from({ length: 25 }, (_, i) => `op${i}`);
        const setA = names.map(name => route('a', name));
        const setB = names.map(name => route('a', `${name}-next`));

        for (let round = 0; round < 40; round++) {
            registry.replaceBackendRoutes('a', round % 2 === 0 ? setA : setB);
            const snapshot = registry.snapshot();
            const owned = snapshot.byBackend.get('a') ?? [];
            const fromA = owned.filter(entry => !entry.descriptor.operationName.endsWith('-next')).length;
            // All of one set, none of the other
            expect([0, names.length]).toContain(fromA);
            expect(owned.length).toBe(names.length);
        }
    });

    it('keeps snapshots immutable after later swaps', () => {
        registry.replaceBackendRoutes('a', [route('a', 'x')]);
        const old = registry.snapshot();
        registry.replaceBackendRoutes('a', [route('a', 'y')]);

        expect(old.version).toBe(1);
        expect([...old.routes.keys()]).toEqual(['POST /api/a/x']);
        expect(Object.isFrozen(old)).toBe(true);
    });
});
