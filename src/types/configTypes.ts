import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from '../utils/async.js';

// --- Zod Schemas for Validation ---

const DelaySchema = z.number().int().max(MAX_TIMER_DELAY_MS);

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

/**
 * Backend identifiers become path segments, so they are restricted to a URL-safe alphabet.
 */
export const BackendIdSchema = z.string().regex(
    /^[A-Za-z0-9][A-Za-z0-9._-]*$/,
    'Backend id must start with a letter or digit and contain only letters, digits, ".", "_" or "-"'
);

export const BackoffSettingsSchema = z.object({
    initialDelayMs: DelaySchema.positive().default(500),
    maxDelayMs: DelaySchema.positive().default(30000),
    multiplier: z.number().min(1).default(2),
    jitter: z.number().min(0).max(1).default(0.2), // Fraction of the delay that may be shaved off at random
}).strict();

export const GatewaySettingsSchema = z.object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(8080),
    routePrefix: z.string().regex(/^(\/[A-Za-z0-9._~-]+)*$/, 'routePrefix must be empty or "/segment[/segment...]"').default('/api'),
    discoveryPath: z.string().startsWith('/').default('/openapi.json'),
    healthPath: z.string().startsWith('/').default('/health'),
    title: z.string().min(1).default('Capability Gateway'),
    version: z.string().min(1).default('1.0.0'),
    defaultTimeoutMs: DelaySchema.positive().default(30000),
    maxBodyBytes: z.number().int().positive().default(1024 * 1024),
    concurrencyLimit: z.number().int().positive().default(8),
    queueTimeoutMs: DelaySchema.min(0).default(250),
    connectTimeoutMs: DelaySchema.positive().default(10000),
    discoveryTimeoutMs: DelaySchema.positive().default(10000),
    rediscoveryIntervalMs: DelaySchema.min(0).default(60000), // 0 disables periodic re-discovery
    probeIntervalMs: DelaySchema.positive().default(5000),
    maxProbeFailures: z.number().int().positive().default(3),
    backoff: BackoffSettingsSchema.default({}),
    logLevel: LogLevelSchema.default('info'),
}).strict();

const BackendOverridesShape = {
    enabled: z.boolean().default(true),
    concurrencyLimit: z.number().int().positive().optional(),
    timeoutMs: DelaySchema.positive().optional(),
};

export const StdioBackendConfigSchema = z.object({
    transport: z.literal('stdio').default('stdio'),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    workingDir: z.string().optional(), // Resolved against the process cwd during processing
    ...BackendOverridesShape,
}).strict();

export const HttpBackendConfigSchema = z.object({
    transport: z.literal('http'),
    url: z.string().url(),
    headers: z.record(z.string()).default({}),
    ...BackendOverridesShape,
}).strict();

export const BackendConfigSchema = z.union([StdioBackendConfigSchema, HttpBackendConfigSchema]);

export const ConfigSchema = z.object({
    backends: z.record(BackendIdSchema, BackendConfigSchema).default({}),
    settings: GatewaySettingsSchema.default({}),
}).strict();


// --- Derive and export types from Zod schemas ---
export type Config = z.infer<typeof ConfigSchema>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type StdioBackendConfig = z.infer<typeof StdioBackendConfigSchema>;
export type HttpBackendConfig = z.infer<typeof HttpBackendConfigSchema>;
export type GatewaySettings = z.infer<typeof GatewaySettingsSchema>;
export type BackoffSettings = z.infer<typeof BackoffSettingsSchema>;
