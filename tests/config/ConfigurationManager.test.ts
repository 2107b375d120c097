import { jest } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ConfigurationError, ConfigurationManager, parseConfig, substituteEnvVars } from '../../src/config/ConfigurationManager';
import { GatewaySettingsSchema } from '../../src/types/configTypes';

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

describe('parseConfig', () => {
    it('fills in defaults', () => {
        const config = parseConfig({ backends: { fs: { command: 'run-fs' } } }, {});

        expect(config.settings).toEqual(GatewaySettingsSchema.parse({}));
        expect(config.settings.routePrefix).toBe('/api');
        expect(config.backends.fs).toEqual({ transport: 'stdio', command: 'run-fs', args: [], env: {}, enabled: true });
    });

    it('accepts an empty document', () => {
        expect(parseConfig({}, {}).backends).toEqual({});
    });

    it('lists schema violations', () => {
        expect(() => parseConfig({ settings: { colour: 'red' } }, {})).toThrow(
            new ConfigurationError("Invalid configuration:\n- settings: Unrecognized key(s) in object: 'colour'"),
        );
    });

    it('rejects delays a timer cannot hold', () => {
        expect(() => parseConfig({ settings: { defaultTimeoutMs: 3_000_000_000 } }, {})).toThrow(
            new ConfigurationError('Invalid configuration:\n- settings.defaultTimeoutMs: Number must be less than or equal to 2147483647'),
        );
        expect(() => parseConfig({ backends: { fs: { command: 'run-fs', timeoutMs: 3_000_000_000 } } }, {})).toThrow(ConfigurationError);
        expect(parseConfig({ settings: { connectTimeoutMs: 2_147_483_647 } }, {}).settings.connectTimeoutMs).toBe(2_147_483_647);
    });

    it('rejects backend ids that cannot be path segments', () => {
        expect(() => parseConfig({ backends: { 'bad id': { command: 'x' } } }, {})).toThrow(/Backend id must start with a letter or digit/);
    });

    it('substitutes environment variables in backend settings', () => {
        const env = { TOKEN: 'test-secret', TOOL_HOME: '/opt/tools' };
        const config = parseConfig({
            backends: {
                web: { transport: 'http', url: 'https://backend.test/${TENANT}/mcp', headers: { authorization: 'Bearer ${TOKEN}' } },
                local: { command: '${TOOL_HOME}/bin/tool', args: ['--root', '${MISSING}'], env: { KEY: '${TOKEN}' }, workingDir: 'data' },
            },
        }, env);

        expect(config.backends.web).toMatchObject({ url: 'https://backend.test//mcp', headers: { authorization: 'Bearer test-secret' } });
        expect(config.backends.local).toMatchObject({
            command: '/opt/tools/bin/tool',
            args: ['--root', ''],
            env: { KEY: 'test-secret' },
            workingDir: path.resolve('data'),
        });
    });
});

describe('substituteEnvVars', () => {
    it('replaces every reference and blanks unset ones', () => {
        expect(substituteEnvVars('${A}-${B}-${A}', { A: 'x' })).toBe('x--x');
    });
});

describe('ConfigurationManager', () => {
    let manager: ConfigurationManager;
    let events: string[];

    beforeEach(() => {
        jest.clearAllMocks();
        manager = new ConfigurationManager({});
        events = [];
        manager.on('backendAdded', ({ backendId }: { backendId: string }) => events.push(`added:${backendId}`));
        manager.on('backendUpdated', ({ backendId }: { backendId: string }) => events.push(`updated:${backendId}`));
        manager.on('backendRemoved', ({ backendId }: { backendId: string }) => events.push(`removed:${backendId}`));
        manager.on('settingsUpdated', () => events.push('settings'));
        manager.on('configChangedProcessed', () => events.push('processed'));
        manager.on('configError', () => events.push('error'));
    });

    afterEach(async () => {
        await manager.closeWatcher();
    });

    it('returns default settings before anything is loaded', () => {
        expect(manager.getCurrentConfig()).toBeNull();
        expect(manager.getGatewaySettings()).toEqual(GatewaySettingsSchema.parse({}));
    });

    it('announces every backend on the first load', () => {
        manager.applyRawConfig({ backends: { a: { command: 'a' }, b: { command: 'b' } } });

        expect(events).toEqual(['added:a', 'added:b', 'settings', 'processed']);
        expect(manager.getBackendConfig('a')).toMatchObject({ command: 'a' });
    });

    it('reports only what changed on later loads', () => {
        manager.applyRawConfig({ backends: { a: { command: 'a' }, b: { command: 'b' } } });
        events = [];

        manager.applyRawConfig({
            backends: { a: { command: 'a', args: ['--verbose'] }, c: { command: 'c' } },
            settings: { port: 9090 },
        });

        expect(events).toEqual(['updated:a', 'added:c', 'removed:b', 'settings', 'processed']);
        expect(manager.getGatewaySettings().port).toBe(9090);
    });

    it('stays silent when nothing changed', () => {
        const first = manager.applyRawConfig({ backends: { a: { command: 'a' } } });
        events = [];

        expect(manager.applyRawConfig({ backends: { a: { command: 'a' } } })).toBe(first);
        expect(events).toEqual([]);
    });

    it('keeps the active configuration when a new one is invalid', () => {
        manager.applyRawConfig({ backends: { a: { command: 'a' } } });

        expect(() => manager.applyRawConfig({ backends: { a: { command: '' } } })).toThrow(ConfigurationError);
        expect(manager.getBackendConfig('a')).toMatchObject({ command: 'a' });
    });

    describe('with a configuration file', () => {
        let dir: string;
        let file: string;

        beforeEach(async () => {
            dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gateway-config-'));
            file = path.join(dir, 'gateway.config.json');
        });

        afterEach(async () => {
            await fs.rm(dir, { recursive: true, force: true });
        });

        it('loads the file and re-reads it on reload', async () => {
            await fs.writeFile(file, JSON.stringify({ backends: { a: { command: 'a' } } }));
            const config = await manager.loadConfig(file, { watch: false });
            expect(Object.keys(config.backends)).toEqual(['a']);
            events = [];

            await fs.writeFile(file, JSON.stringify({ backends: {} }));
            await manager.reload();

            expect(events).toEqual(['removed:a', 'processed']);
        });

        it('reports a broken reload and keeps the previous configuration', async () => {
            await fs.writeFile(file, JSON.stringify({ backends: { a: { command: 'a' } } }));
            await manager.loadConfig(file, { watch: false });
            events = [];

            await fs.writeFile(file, '{ not json');
            await manager.reload();

            expect(events).toEqual(['error']);
            expect(manager.getBackendConfig('a')).toMatchObject({ command: 'a' });
        });

        it('fails the initial load of an unreadable file', async () => {
            await expect(manager.loadConfig(path.join(dir, 'missing.json'), { watch: false })).rejects.toThrow(/Cannot read configuration from/);
        });

        it('refuses a second initial load', async () => {
            await fs.writeFile(file, JSON.stringify({}));
            await manager.loadConfig(file, { watch: false });

            await expect(manager.loadConfig(file, { watch: false })).rejects.toThrow('Configuration already loaded');
        });
    });
});
