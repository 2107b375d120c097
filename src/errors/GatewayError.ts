import { z } from 'zod';

export const GATEWAY_ERROR_CODES = [
    'BackendUnreachable',
    'BackendUnavailable',
    'BackendOverloaded',
    'UnknownRoute',
    'ValidationError',
    'SchemaViolation',
    'InvocationTimeout',
    'BusinessError',
    'RequestCancelled',
    'InternalError',
] as const;

export type GatewayErrorCode = typeof GATEWAY_ERROR_CODES[number];

export const ERROR_HTTP_STATUS: Record<GatewayErrorCode, number> = {
    BackendUnreachable: 503,
    BackendUnavailable: 503,
    BackendOverloaded: 429,
    UnknownRoute: 404,
    ValidationError: 400,
    SchemaViolation: 502,
    InvocationTimeout: 504,
    BusinessError: 422,
    RequestCancelled: 499,
    InternalError: 500,
};

/**
 * Body returned for every failed request.
 */
export const ErrorBodySchema = z.object({
    error: z.object({
        code: z.enum(GATEWAY_ERROR_CODES),
        message: z.string(),
        backend: z.string().optional().describe('Identifier of the backend involved'),
        operation: z.string().optional().describe('Backend operation name involved'),
        field: z.string().optional().describe('Offending payload field for validation failures'),
        reason: z.string().optional().describe('Error name reported by the backend for business errors'),
        requestId: z.string(),
    }),
}).describe('Gateway error envelope');

export type ErrorBody = z.infer<typeof ErrorBodySchema>;

export interface ErrorContext {
    backendId?: string;
    operation?: string;
    field?: string;
    reason?: string;
}

/**
 * The only error type that leaves the Dispatcher. The message always names the
 * backend and operation when they are known.
 */
export class GatewayError extends Error {
    public readonly code: GatewayErrorCode;
    public readonly context: ErrorContext;

    constructor(code: GatewayErrorCode, detail: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
        super(formatMessage(detail, context), options);
        this.name = 'GatewayError';
        this.code = code;
        this.context = context;
    }

    get status(): number {
        return ERROR_HTTP_STATUS[this.code];
    }

    /** Same error, annotated with the route it happened on. */
    withContext(context: ErrorContext): GatewayError {
        const merged: ErrorContext = {
            backendId: this.context.backendId ?? context.backendId,
            operation: this.context.operation ?? context.operation,
            field: this.context.field ?? context.field,
            reason: this.context.reason ?? context.reason,
        };
        return new GatewayError(this.code, stripPrefix(this.message), merged, { cause: this.cause });
    }

    toBody(requestId: string): ErrorBody {
        return {
            error: {
                code: this.code,
                message: this.message,
                backend: this.context.backendId,
                operation: this.context.operation,
                field: this.context.field,
                reason: this.context.reason,
                requestId,
            },
        };
    }

    /**
     * Wraps anything thrown by gateway code that is not already a GatewayError.
     */
    static from(error: unknown, context: ErrorContext = {}): GatewayError {
        if (error instanceof GatewayError) {
            return error.withContext(context);
        }
        const detail = error instanceof Error ? error.message : String(error);
        return new GatewayError('InternalError', detail, context, { cause: error });
    }
}

function formatMessage(detail: string, context: ErrorContext): string {
    if (context.backendId && context.operation) {
        return `[${context.backendId}/${context.operation}] ${detail}`;
    }
    if (context.backendId) {
        return `[${context.backendId}] ${detail}`;
    }
    return detail;
}

function stripPrefix(message: string): string {
    return message.replace(/^\[[^\]]+\] /, '');
}

// --- Connector-level failures, translated by the Backend Session ---

/**
 * The connection to a backend failed underneath an operation (closed pipe,
 * refused socket, broken stream).
 */
export class BackendTransportError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'BackendTransportError';
    }
}

/** The backend did not answer within the allotted time. */
export class BackendTimeoutError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'BackendTimeoutError';
    }
}

/** The caller abandoned the request before the backend answered. */
export class InvocationAbortedError extends Error {
    constructor(message = 'Invocation aborted by caller') {
        super(message);
        this.name = 'InvocationAbortedError';
    }
}
