import { logger } from './logger.js';

export type ShutdownFn = (exitCode: number) => Promise<void>;

/**
 * Routes termination signals and uncaught errors to `shutdown`. Installed
 * before any backend is started so a signal during a slow connect still
 * shuts down gracefully.
 */
export function installShutdownHandlers(shutdown: ShutdownFn, target: NodeJS.EventEmitter = process): void {
    const run = (exitCode: number) => {
        shutdown(exitCode).catch((error: unknown) => logger.error('Shutdown failed:', error));
    };
    target.on('SIGINT', () => {
        logger.info('Received SIGINT. Shutting down gracefully...');
        run(0);
    });
    target.on('SIGTERM', () => {
        logger.info('Received SIGTERM. Shutting down gracefully...');
        run(0);
    });
    target.on('uncaughtException', (error: unknown) => {
        logger.error('Unhandled Exception:', error);
        run(1);
    });
    target.on('unhandledRejection', (reason: unknown) => {
        logger.error('Unhandled Rejection:', reason);
        run(1);
    });
}
