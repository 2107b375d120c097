import * as fs from 'fs/promises';
import * as path from 'path';
import { EventEmitter } from 'events';
import chokidar, { FSWatcher } from 'chokidar';
import { BackendConfig, Config, ConfigSchema, GatewaySettings, GatewaySettingsSchema } from '../types/configTypes.js';
import {
    BackendAddedPayload,
    BackendRemovedPayload,
    BackendUpdatedPayload,
    ConfigEvents,
    ConfigProcessedPayload,
    SettingsUpdatedPayload,
} from '../types/eventTypes.js';
import { logger } from '../utils/logger.js';

const DEFAULT_GATEWAY_SETTINGS: GatewaySettings = GatewaySettingsSchema.parse({});

const RELOAD_DEBOUNCE_MS = 500;

/**
 * Raised when a configuration file cannot be read, parsed or validated.
 */
export class ConfigurationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

/**
 * Validates a raw configuration object and applies environment substitution
 * and path resolution.
 * @throws ConfigurationError listing every schema violation.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): Config {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        const problems = result.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
        throw new ConfigurationError(`Invalid configuration:\n- ${problems.join('\n- ')}`);
    }
    return processConfig(result.data, env);
}

/**
 * Loads, validates and watches the gateway configuration file.
 *
 * Every effective change is reported as granular events (backendAdded,
 * backendRemoved, backendUpdated, settingsUpdated) followed by one
 * configChangedProcessed. A reload that fails validation emits configError
 * and leaves the previous configuration active.
 */
export class ConfigurationManager extends EventEmitter {
    private config: Config | null = null;
    private configPath: string | null = null;
    private watcher: FSWatcher | null = null;
    private isLoading = false; // Prevent concurrent reloads
    private debounceTimer: NodeJS.Timeout | null = null;

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
        super();
        this.setMaxListeners(20);
    }

    /**
     * Loads the configuration file once and, if requested, starts watching it.
     * @throws ConfigurationError if the initial load fails.
     */
    public async loadConfig(configPath: string, options: { watch?: boolean } = {}): Promise<Config> {
        if (this.configPath || this.isLoading) {
            throw new ConfigurationError('Configuration already loaded; use reload() to re-read it.');
        }
        this.isLoading = true;
        try {
            this.configPath = path.resolve(configPath);
            logger.info(`Loading initial configuration from: ${this.configPath}`);
            const config = await this.loadAndProcessConfig(this.configPath);
            if (options.watch ?? true) {
                this.setupWatcher(this.configPath);
            }
            return config;
        } catch (error: unknown) {
            this.configPath = null;
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`Failed to load initial configuration: ${message}`);
            throw error instanceof ConfigurationError ? error : new ConfigurationError(message, { cause: error });
        } finally {
            this.isLoading = false;
        }
    }

    /**
     * Re-reads the configuration file. Failures are reported through
     * 'configError' and leave the active configuration untouched.
     */
    public async reload(): Promise<void> {
        if (this.isLoading || !this.configPath) {
            logger.warn('Skipping config reload: already loading or no configuration loaded.');
            return;
        }
        this.isLoading = true;
        try {
            await this.loadAndProcessConfig(this.configPath);
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`Failed to reload configuration: ${message}. Keeping previous configuration active.`);
            this.emit(ConfigEvents.CONFIG_ERROR, error);
        } finally {
            this.isLoading = false;
        }
    }

    /**
     * Applies an already-parsed configuration object as if it had been read
     * from disk, emitting the same events.
     * @throws ConfigurationError if the object is invalid.
     */
    public applyRawConfig(raw: unknown): Config {
        const newConfig = parseConfig(raw, this.env);
        const oldConfig = this.config;
        if (oldConfig && JSON.stringify(oldConfig) === JSON.stringify(newConfig)) {
            logger.info('Configuration reloaded, but no effective changes detected.');
            return oldConfig;
        }

        this.config = newConfig;
        if (newConfig.settings.logLevel !== logger.getLevel()) {
            logger.setLevel(newConfig.settings.logLevel);
        }

        if (oldConfig) {
            this.diffAndEmitChanges(oldConfig, newConfig);
        } else {
            this.emitInitialStateEvents(newConfig);
        }
        const processed: ConfigProcessedPayload = { oldConfig, newConfig };
        this.emit(ConfigEvents.CONFIG_CHANGED_PROCESSED, processed);
        return newConfig;
    }

    public getCurrentConfig(): Config | null {
        return this.config;
    }

    /**
     * Returns the active settings, or the defaults before anything was loaded.
     */
    public getGatewaySettings(): GatewaySettings {
        return this.config?.settings ?? DEFAULT_GATEWAY_SETTINGS;
    }

    public getBackendConfig(backendId: string): BackendConfig | undefined {
        return this.config?.backends[backendId];
    }

    /**
     * Closes the file watcher. Should be called on application shutdown.
     */
    public async closeWatcher(): Promise<void> {
        if (this.debounceTimer) {
            clearTimeout(this.debounceTimer);
            this.debounceTimer = null;
        }
        if (this.watcher) {
            logger.info('Closing configuration file watcher.');
            await this.watcher.close();
            this.watcher = null;
        }
    }

    private async loadAndProcessConfig(filePath: string): Promise<Config> {
        let raw: unknown;
        try {
            const fileContent = await fs.readFile(filePath, 'utf-8');
            raw = JSON.parse(fileContent);
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError(`Cannot read configuration from ${filePath}: ${message}`, { cause: error });
        }
        const config = this.applyRawConfig(raw);
        logger.info(`Configuration from ${filePath} loaded: ${Object.keys(config.backends).length} backend(s).`);
        return config;
    }

    private diffAndEmitChanges(oldConfig: Config, newConfig: Config): void {
        for (const [backendId, newBackend] of Object.entries(newConfig.backends)) {
            const oldBackend = oldConfig.backends[backendId];
            if (!oldBackend) {
                logger.info(`Detected added backend: ${backendId}`);
                const payload: BackendAddedPayload = { backendId, config: newBackend };
                this.emit(ConfigEvents.BACKEND_ADDED, payload);
            } else if (JSON.stringify(oldBackend) !== JSON.stringify(newBackend)) {
                logger.info(`Detected updated backend: ${backendId}`);
                const payload: BackendUpdatedPayload = { backendId, newConfig: newBackend, oldConfig: oldBackend };
                this.emit(ConfigEvents.BACKEND_UPDATED, payload);
            }
        }
        for (const backendId of Object.keys(oldConfig.backends)) {
            if (!(backendId in newConfig.backends)) {
                logger.info(`Detected removed backend: ${backendId}`);
                const payload: BackendRemovedPayload = { backendId };
                this.emit(ConfigEvents.BACKEND_REMOVED, payload);
            }
        }
        if (JSON.stringify(oldConfig.settings) !== JSON.stringify(newConfig.settings)) {
            logger.info('Detected updated settings.');
            const payload: SettingsUpdatedPayload = { newSettings: newConfig.settings, oldSettings: oldConfig.settings };
            this.emit(ConfigEvents.SETTINGS_UPDATED, payload);
        }
    }

    private emitInitialStateEvents(initialConfig: Config): void {
        for (const [backendId, config] of Object.entries(initialConfig.backends)) {
            const payload: BackendAddedPayload = { backendId, config };
            this.emit(ConfigEvents.BACKEND_ADDED, payload);
        }
        const payload: SettingsUpdatedPayload = { newSettings: initialConfig.settings, oldSettings: DEFAULT_GATEWAY_SETTINGS };
        this.emit(ConfigEvents.SETTINGS_UPDATED, payload);
    }

    private setupWatcher(configPath: string): void {
        logger.info(`Setting up watcher for configuration file: ${configPath}`);
        this.watcher = chokidar.watch(configPath, {
            persistent: true,
            ignoreInitial: true,
            awaitWriteFinish: { // Avoids reading half-written files
                stabilityThreshold: 500,
                pollInterval: 100,
            },
        });
        this.watcher
            .on('change', () => this.handleFileChange())
            .on('error', (error: unknown) => logger.error(`Watcher error: ${String(error)}`))
            .on('ready', () => logger.info(`File watcher ready for ${configPath}`));
    }

    private handleFileChange(): void {
        if (this.debounceTimer) {
            clearTimeout(this.debounceTimer);
        }
        this.debounceTimer = setTimeout(() => {
            this.debounceTimer = null;
            logger.info(`Configuration file change detected: ${this.configPath}. Reloading.`);
            void this.reload();
        }, RELOAD_DEBOUNCE_MS);
    }
}

/**
 * Substitutes ${VAR} references in every string a backend is started or
 * reached with, and resolves working directories against the process cwd.
 */
function processConfig(config: Config, env: NodeJS.ProcessEnv): Config {
    const substitute = (value: string) => substituteEnvVars(value, env);
    const substituteRecord = (record: Record<string, string>) =>
        Object.fromEntries(Object.entries(record).map(([key, value]) => [key, substitute(value)]));

    const backends: Record<string, BackendConfig> = {};
    for (const [backendId, backend] of Object.entries(config.backends)) {
        if (backend.transport === 'http') {
            backends[backendId] = { ...backend, url: substitute(backend.url), headers: substituteRecord(backend.headers) };
        } else {
            backends[backendId] = {
                ...backend,
                command: substitute(backend.command),
                args: backend.args.map(substitute),
                env: substituteRecord(backend.env),
                workingDir: backend.workingDir === undefined ? undefined : path.resolve(substitute(backend.workingDir)),
            };
        }
    }
    return { backends, settings: config.settings };
}

/**
 * Replaces ${VAR_NAME} with the variable's value; unset variables become
 * empty strings.
 */
export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv): string {
    return value.replace(/\$\{([^}]+)\}/g, (_match: string, varName: string) => {
        const resolved = env[varName];
        if (resolved === undefined) {
            logger.warn(`Environment variable "${varName}" referenced in configuration is not set; using an empty string.`);
            return '';
        }
        return resolved;
    });
}
