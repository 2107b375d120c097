#!/usr/bin/env node
import { ConfigurationManager } from './config/ConfigurationManager.js';
import { HttpInterface } from './interfaces/HttpInterface.js';
import { BackendSupervisor } from './managers/BackendSupervisor.js';
import { RouteRegistry } from './managers/RouteRegistry.js';
import { CapabilityPublisher } from './services/CapabilityPublisher.js';
import { Dispatcher } from './services/Dispatcher.js';
import { McpConnector } from './sessions/McpConnector.js';
import { createTransport } from './sessions/transports.js';
import { logger } from './utils/logger.js';
import { installShutdownHandlers } from './utils/shutdown.js';

const DEFAULT_CONFIG_FILE = 'gateway.config.json';

// First CLI argument, then GATEWAY_CONFIG, then ./gateway.config.json
const configPath = process.argv[2] ?? process.env.GATEWAY_CONFIG ?? DEFAULT_CONFIG_FILE;

interface Components {
    configManager: ConfigurationManager;
    supervisor: BackendSupervisor | null;
    httpInterface: HttpInterface | null;
}

async function main(): Promise<void> {
    logger.info('--- Capability Gateway Starting ---');

    const components: Components = { configManager: new ConfigurationManager(), supervisor: null, httpInterface: null };
    let shuttingDown = false;
    const shutdown = async (exitCode: number): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        await stopComponents(components, exitCode);
    };
    installShutdownHandlers(shutdown);

    try {
        // 1. Load configuration (sets the log level as a side effect)
        const { configManager } = components;
        const config = await configManager.loadConfig(configPath);
        const settings = () => configManager.getGatewaySettings();

        // 2. Core components
        const registry = new RouteRegistry();
        const supervisor = new BackendSupervisor(registry, new McpConnector(createTransport), config.settings);
        components.supervisor = supervisor;
        const publisher = new CapabilityPublisher(registry, settings);
        const dispatcher = new Dispatcher(registry, supervisor, settings);
        const httpInterface = new HttpInterface(dispatcher, publisher, supervisor, settings);
        components.httpInterface = httpInterface;

        // 3. Listen first so the health report is available while backends come up
        await httpInterface.start();

        // 4. Backends, then follow configuration reloads
        await supervisor.startAll(config.backends);
        supervisor.attach(configManager);

        logger.info('--- Capability Gateway Ready ---');
    } catch (error: unknown) {
        logger.error(`Fatal error during startup: ${describe(error)}`, error);
        await shutdown(1);
    }
}

/**
 * Stops accepting requests, then stops backend sessions, then the config watcher.
 */
async function stopComponents({ configManager, supervisor, httpInterface }: Components, exitCode: number): Promise<void> {
    logger.info('Initiating shutdown sequence...');
    try {
        await httpInterface?.stop();
        await supervisor?.stopAll();
        await configManager.closeWatcher();
    } catch (error: unknown) {
        logger.error(`Error during shutdown: ${describe(error)}`, error);
        exitCode = exitCode || 1;
    } finally {
        logger.info(`--- Capability Gateway Exiting (Code: ${exitCode}) ---`);
        process.exit(exitCode);
    }
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

main().catch((error: unknown) => {
    logger.error(`Unhandled error in main function: ${describe(error)}`, error);
    process.exit(1);
});
