/**
 * Defines the possible log levels for the application logger.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
