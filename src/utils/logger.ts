import { LogLevel } from '../types/loggingTypes.js';

// Defines the numeric level for each log type, used for filtering.
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Leveled console logger for the gateway. Everything goes to stderr so a
 * process supervisor can collect it alongside backend output.
 */
export class Logger {
    private currentLevel: LogLevel = 'info';
    private currentLevelValue: number = LOG_LEVEL_VALUES[this.currentLevel];

    /**
     * Sets the minimum log level to output.
     * Messages with a level lower than this will be ignored.
     */
    public setLevel(level: LogLevel): void {
        this.currentLevel = level;
        this.currentLevelValue = LOG_LEVEL_VALUES[level];
        this.info(`Log level set to: ${level}`);
    }

    public getLevel(): LogLevel {
        return this.currentLevel;
    }

    public isEnabled(level: LogLevel): boolean {
        return LOG_LEVEL_VALUES[level] >= this.currentLevelValue;
    }

    public debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, args);
    }

    public info(message: string, ...args: unknown[]): void {
        this.log('info', message, args);
    }

    public warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, args);
    }

    /**
     * Logs an error message (highest level).
     * @param args - Additional arguments to log (often an Error object).
     */
    public error(message: string, ...args: unknown[]): void {
        this.log('error', message, args);
    }

    /**
     * Logs output captured from a backend process, one line at a time.
     * @param backendId - The backend the output came from.
     * @param output - Raw chunk, possibly several lines.
     * @param isErrorOutput - True when the chunk came from the process's stderr.
     */
    public captureOutput(backendId: string, output: string, isErrorOutput: boolean = false): void {
        // Most backends log to stderr as a matter of course, so it is not treated as an error.
        const level: LogLevel = isErrorOutput ? 'info' : 'debug';
        const prefix = `[${backendId}${isErrorOutput ? '/ERR' : ''}]`;

        output.split(/\r?\n/).forEach(line => {
            const trimmedLine = line.trim();
            if (trimmedLine) {
                this.log(level, `${prefix} ${trimmedLine}`);
            }
        });
    }

    private log(level: LogLevel, message: string, args: unknown[] = []): void {
        if (!this.isEnabled(level)) {
            return;
        }
        const timestamp = new Date().toISOString();
        const formattedMessage = `${timestamp} [${level.toUpperCase()}] ${message}`;

        if (args.length > 0) {
            console.error(formattedMessage, ...args);
        } else {
            console.error(formattedMessage);
        }
    }
}

// Export a singleton instance
export const logger = new Logger();
