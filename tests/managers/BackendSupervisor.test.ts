import { jest } from '@jest/globals';
import { ConfigurationManager } from '../../src/config/ConfigurationManager';
import { BackendSupervisor, overallStatus } from '../../src/managers/BackendSupervisor';
import { RouteRegistry } from '../../src/managers/RouteRegistry';
import { Dispatcher } from '../../src/services/Dispatcher';
import { ECHO_TOOL, FakeConnector, stdioConfig, testSettings, tool, waitFor } from '../helpers/fakeBackend';

jest.mock('../../src/utils/logger', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
        getLevel: jest.fn(() => 'info'),
        setLevel: jest.fn(),
    },
}));

describe('BackendSupervisor', () => {
    let registry: RouteRegistry;
    let connector: FakeConnector;
    let supervisor: BackendSupervisor;

    function routeNames(backendId: string): string[] {
        return registry.getBackendRoutes(backendId).map(entry => entry.key).sort();
    }

    beforeEach(() => {
        jest.clearAllMocks();
        registry = new RouteRegistry();
        connector = new FakeConnector();
        supervisor = new BackendSupervisor(registry, connector, testSettings());
        connector.backend('a').tools = [ECHO_TOOL];
    });

    afterEach(async () => {
        await supervisor.stopAll();
    });

    it('publishes the routes of a backend once it is ready', async () => {
        await supervisor.startAll({ a: stdioConfig });

        expect(routeNames('a')).toEqual(['POST /api/a/echo']);
        expect(registry.match('POST', '/api/a/echo').kind).toBe('found');
        expect(supervisor.getHealth()).toEqual({
            status: 'ok',
            backends: [{ id: 'a', state: 'ready', operations: 1, inFlight: 0, reconnectAttempts: 0, since: expect.any(String), routes: 1 }],
        });
    });

    it('keeps serving healthy backends while another cannot connect', async () => {
        connector.backend('b').connectFailures = 1000;

        await supervisor.startAll({ a: stdioConfig, b: stdioConfig });

        expect(routeNames('a')).toEqual(['POST /api/a/echo']);
        expect(routeNames('b')).toEqual([]);
        expect(supervisor.getSession('b')?.getState()).toBe('reconnecting');
        expect(supervisor.getHealth().status).toBe('degraded');

        const dispatcher = new Dispatcher(registry, supervisor, () => testSettings());
        const call = (path: string) => dispatcher.dispatch({
            method: 'POST',
            path,
            query: new URLSearchParams(),
            body: { message: 'hi' },
            headers: {},
            signal: new AbortController().signal,
            requestId: 'req-1',
        });

        const served = await call('/api/a/echo');
        expect(served.status).toBe(200);
        expect(served.body).toEqual({ message: 'hi' });
        expect((await call('/api/b/echo')).status).toBe(404);
    });

    it('swaps the whole route set when the operations change', async () => {
        const backend = connector.backend('a');
        backend.tools = [tool('x'), tool('y')];
        await supervisor.startAll({ a: stdioConfig });
        expect(routeNames('a')).toEqual(['POST /api/a/x', 'POST /api/a/y']);

        backend.tools = [tool('y'), tool('z', { annotations: { readOnlyHint: true } })];
        await supervisor.getSession('a')?.refresh();

        expect(routeNames('a')).toEqual(['GET /api/a/z', 'POST /api/a/y']);
        expect(registry.match('POST', '/api/a/x').kind).toBe('none');
    });

    it('withdraws routes while reconnecting and restores them afterwards', async () => {
        const backend = connector.backend('a');
        await supervisor.startAll({ a: stdioConfig });

        backend.connectFailures = 1000;
        backend.current?.drop();
        await waitFor(() => supervisor.getSession('a')?.getState() === 'reconnecting');
        expect(routeNames('a')).toEqual([]);
        expect(supervisor.getHealth().status).toBe('down');

        backend.connectFailures = 0;
        await waitFor(() => supervisor.getSession('a')?.getState() === 'ready');
        expect(routeNames('a')).toEqual(['POST /api/a/echo']);
    });

    it('re-emits session state changes', async () => {
        const states: string[] = [];
        supervisor.on('stateChange', (id: string, state: string) => states.push(`${id}:${state}`));

        await supervisor.startAll({ a: stdioConfig });

        expect(states).toEqual(['a:connecting', 'a:discovering', 'a:ready']);
    });

    it('removes a backend with its routes and its connection', async () => {
        await supervisor.startAll({ a: stdioConfig });
        const connection = connector.backend('a').current;

        await supervisor.removeBackend('a');

        expect(routeNames('a')).toEqual([]);
        expect(supervisor.getSession('a')).toBeUndefined();
        expect(connection?.closed).toBe(true);
    });

    it('runs overlapping restarts of one backend one after the other', async () => {
        const backend = connector.backend('a');
        await supervisor.startAll({ a: stdioConfig });
        backend.closeDelayMs = 30;

        await Promise.all([
            supervisor.addBackend('a', { ...stdioConfig, args: ['--first'] }),
            supervisor.addBackend('a', { ...stdioConfig, args: ['--second'] }),
        ]);

        expect(backend.connections).toHaveLength(3);
        expect(backend.connections.filter(connection => !connection.closed)).toHaveLength(1);
        expect(supervisor.getSession('a')?.identity.config).toMatchObject({ args: ['--second'] });
        expect(routeNames('a')).toEqual(['POST /api/a/echo']);

        await supervisor.stopAll();

        expect(backend.connections.filter(connection => !connection.closed)).toHaveLength(0);
    });

    it('lets a removal queued behind a restart win', async () => {
        const backend = connector.backend('a');
        await supervisor.startAll({ a: stdioConfig });
        backend.closeDelayMs = 30;

        await Promise.all([
            supervisor.addBackend('a', { ...stdioConfig, args: ['--again'] }),
            supervisor.removeBackend('a'),
        ]);

        expect(supervisor.getSession('a')).toBeUndefined();
        expect(routeNames('a')).toEqual([]);
        expect(backend.connections.filter(connection => !connection.closed)).toHaveLength(0);
    });

    it('does not start disabled backends', async () => {
        await supervisor.startAll({ a: { ...stdioConfig, enabled: false } });

        expect(supervisor.getBackendIds()).toEqual([]);
        expect(connector.backend('a').connections).toHaveLength(0);
    });

    it('republishes under a new route prefix', async () => {
        await supervisor.startAll({ a: stdioConfig });

        supervisor.updateSettings(testSettings({ routePrefix: '/v2' }));

        expect(routeNames('a')).toEqual(['POST /v2/a/echo']);
    });

    it('ignores new backends once shutting down', async () => {
        await supervisor.stopAll();
        await supervisor.addBackend('a', stdioConfig);

        expect(supervisor.getBackendIds()).toEqual([]);
    });

    it('follows configuration changes', async () => {
        connector.backend('b').tools = [tool('ping')];
        const configManager = new ConfigurationManager({});
        supervisor.attach(configManager);

        configManager.applyRawConfig({ backends: { a: { command: 'fake-backend' } } });
        await waitFor(() => routeNames('a').length === 1);

        configManager.applyRawConfig({ backends: { b: { command: 'fake-backend' } } });
        await waitFor(() => routeNames('b').length === 1);

        expect(routeNames('a')).toEqual([]);
        expect(supervisor.getBackendIds()).toEqual(['b']);
    });
});

describe('overallStatus', () => {
    it('is ok when every backend is ready, including none at all', () => {
        expect(overallStatus([])).toBe('ok');
        expect(overallStatus(['ready', 'ready'])).toBe('ok');
    });

    it('is degraded when only some backends can serve', () => {
        expect(overallStatus(['ready', 'reconnecting'])).toBe('degraded');
        expect(overallStatus(['degraded'])).toBe('degraded');
    });

    it('is down when no backend can serve', () => {
        expect(overallStatus(['reconnecting', 'connecting'])).toBe('down');
    });
});
