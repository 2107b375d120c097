import { ErrorContext, GatewayError } from '../errors/GatewayError.js';
import { PayloadValidator } from '../translation/SchemaCompiler.js';
import { GatewaySettings } from '../types/configTypes.js';
import { CanonicalSchema, ObjectSchema, RouteDescriptor, RouteLookup } from '../types/routeTypes.js';
import { BackendIdentity, InvocationContext } from '../types/sessionTypes.js';
import { logger } from '../utils/logger.js';

export const REQUEST_ID_HEADER = 'x-request-id';
export const TIMEOUT_HINT_HEADER = 'x-timeout-ms';

const RETRY_AFTER_SECONDS = '1';

export interface InboundRequest {
    method: string;
    /** Path without query string, as received. */
    path: string;
    query: URLSearchParams;
    /** Parsed JSON body; undefined when the request had none. */
    body: unknown;
    headers: Record<string, string | string[] | undefined>;
    /** Fires when the caller goes away. */
    signal: AbortSignal;
    requestId: string;
}

export interface OutboundResponse {
    status: number;
    headers: Record<string, string>;
    body: unknown;
}

/**
 * What the Dispatcher needs from a Backend Session.
 */
export interface InvocationTarget {
    readonly identity: BackendIdentity;
    invoke(context: InvocationContext): Promise<unknown>;
}

export interface SessionDirectory {
    getSession(backendId: string): InvocationTarget | undefined;
}

/**
 * Serves one caller request end to end: route lookup, request validation,
 * invocation through the owning session, response validation and error
 * mapping. Every failure leaves as a GatewayError rendered to the error body.
 */
export class Dispatcher {
    constructor(
        private readonly lookup: RouteLookup,
        private readonly sessions: SessionDirectory,
        private readonly getSettings: () => GatewaySettings,
        private readonly validator: PayloadValidator = new PayloadValidator(),
    ) { }

    public async dispatch(request: InboundRequest): Promise<OutboundResponse> {
        const headers: Record<string, string> = { [REQUEST_ID_HEADER]: request.requestId };
        let context: ErrorContext = {};
        try {
            const route = this.resolve(request, headers);
            context = { backendId: route.backendId, operation: route.operationName };
            const payload = this.readPayload(request, route);
            const result = await this.invoke(request, route, payload);
            this.checkResponse(route, result, request.requestId);
            logger.debug(`[${request.requestId}] ${request.method} ${route.path} -> 200`);
            return { status: 200, headers, body: result };
        } catch (error: unknown) {
            return this.failure(GatewayError.from(error, context), request, headers);
        }
    }

    private resolve(request: InboundRequest, headers: Record<string, string>): RouteDescriptor {
        const match = this.lookup.match(request.method, request.path);
        switch (match.kind) {
            case 'found':
                return match.entry.descriptor;
            case 'method-mismatch':
                headers.allow = match.allowed.join(', ');
                throw new GatewayError('UnknownRoute', `${request.path} does not accept ${request.method}; use ${match.allowed.join(' or ')}.`);
            case 'none':
                throw new GatewayError('UnknownRoute', `No route for ${request.method} ${request.path}.`);
        }
    }

    private readPayload(request: InboundRequest, route: RouteDescriptor): unknown {
        const candidate = route.method === 'GET'
            ? coerceQuery(request.query, route.requestSchema)
            : request.body ?? {};
        const result = this.validator.validate(route.requestSchema, candidate);
        if (!result.ok) {
            throw new GatewayError('ValidationError', `${result.field}: ${result.message}`, {
                backendId: route.backendId,
                operation: route.operationName,
                field: result.field,
            });
        }
        return result.value;
    }

    private async invoke(request: InboundRequest, route: RouteDescriptor, payload: unknown): Promise<unknown> {
        const session = this.sessions.getSession(route.backendId);
        if (!session) {
            throw new GatewayError('BackendUnavailable', 'Backend is not running.', { backendId: route.backendId, operation: route.operationName });
        }
        const timeoutMs = this.resolveTimeout(request, session.identity);
        return session.invoke({
            requestId: request.requestId,
            backendId: route.backendId,
            operationName: route.operationName,
            payload,
            deadline: Date.now() + timeoutMs,
            signal: request.signal,
        });
    }

    /**
     * The backend's configured timeout (or the default), shortened by the
     * caller's hint if one was sent.
     */
    private resolveTimeout(request: InboundRequest, backend: BackendIdentity): number {
        const configured = backend.config.timeoutMs ?? this.getSettings().defaultTimeoutMs;
        const raw = request.headers[TIMEOUT_HINT_HEADER];
        if (raw === undefined) {
            return configured;
        }
        const value = Array.isArray(raw) ? raw[0] : raw;
        if (!/^\d+$/.test(value) || Number(value) <= 0) {
            throw new GatewayError('ValidationError', `${TIMEOUT_HINT_HEADER} must be a positive integer of milliseconds.`, { field: TIMEOUT_HINT_HEADER });
        }
        return Math.min(configured, Number(value));
    }

    private checkResponse(route: RouteDescriptor, result: unknown, requestId: string): void {
        if (route.responseSchema.kind === 'opaque') {
            return;
        }
        const checked = this.validator.validate(route.responseSchema, result);
        if (!checked.ok) {
            const violation = new GatewayError(
                'SchemaViolation',
                `Backend result does not match its declared schema at ${checked.field}: ${checked.message}`,
                { backendId: route.backendId, operation: route.operationName, field: checked.field },
            );
            logger.error(`[${requestId}] ${violation.message}`);
            throw violation;
        }
    }

    private failure(error: GatewayError, request: InboundRequest, headers: Record<string, string>): OutboundResponse {
        if (error.code === 'BackendOverloaded' || error.status === 503) {
            headers['retry-after'] = RETRY_AFTER_SECONDS;
        }
        const line = `[${request.requestId}] ${request.method} ${request.path} -> ${error.status} ${error.code}: ${error.message}`;
        if (error.code === 'InternalError') {
            logger.error(line, error.cause);
        } else if (error.code === 'RequestCancelled') {
            logger.debug(line);
        } else if (error.code !== 'SchemaViolation') {
            logger.warn(line);
        }
        return { status: error.status, headers, body: error.toBody(request.requestId) };
    }
}

/**
 * Builds a GET payload from the query string, converting each value to the
 * kind its field declares. Values that do not convert are left as strings
 * for validation to reject with the field's name.
 */
export function coerceQuery(query: URLSearchParams, schema: ObjectSchema): Record<string, unknown> {
    const fields = new Map(schema.fields.map(field => [field.name, field.schema]));
    const payload: Record<string, unknown> = {};
    for (const name of new Set(query.keys())) {
        const values = query.getAll(name);
        const fieldSchema = fields.get(name);
        if (!fieldSchema) {
            payload[name] = values.length === 1 ? values[0] : values;
        } else if (fieldSchema.kind === 'array') {
            const items = fieldSchema.items;
            payload[name] = values.map(value => coerceScalar(value, items));
        } else {
            payload[name] = coerceScalar(values[values.length - 1], fieldSchema);
        }
    }
    return payload;
}

function coerceScalar(raw: string, schema: CanonicalSchema): unknown {
    if (raw === 'null' && (schema.nullable || schema.kind === 'null') && schema.kind !== 'string') {
        return null;
    }
    switch (schema.kind) {
        case 'number':
        case 'integer': {
            const value = Number(raw);
            return raw.trim() !== '' && Number.isFinite(value) ? value : raw;
        }
        case 'boolean':
            return raw === 'true' ? true : raw === 'false' ? false : raw;
        case 'object':
        case 'array':
        case 'opaque':
            return parseJson(raw);
        default:
            return raw;
    }
}

function parseJson(raw: string): unknown {
    try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
    } catch {
        return raw;
    }
}
