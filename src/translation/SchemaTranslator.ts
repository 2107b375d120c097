import { GatewayErrorCode } from '../errors/GatewayError.js';
import { JsonSchema, OperationDescriptor, SideEffect } from '../types/operationTypes.js';
import {
    ArraySchema,
    CanonicalField,
    CanonicalSchema,
    HttpMethod,
    NumericSchema,
    ObjectSchema,
    OpaqueSchema,
    RouteDescriptor,
    StringSchema,
} from '../types/routeTypes.js';

// Keywords that combine or reference other schemas; none has a structural canonical form.
const COMPOSITION_KEYWORDS = ['anyOf', 'oneOf', 'allOf', 'not', '$ref', 'if'] as const;

const SUMMARY_MAX_LENGTH = 120;

const UNSTRUCTURED_RESULT: OpaqueSchema = {
    kind: 'opaque',
    description: 'Unstructured result as returned by the backend ({ "content": [...] }).',
};

/**
 * Maps one backend operation to its route. Pure: the same inputs always produce
 * a structurally identical descriptor with identical key order.
 */
export function translateOperation(backendId: string, operation: OperationDescriptor, routePrefix: string): RouteDescriptor {
    const requestSchema = toRequestSchema(translateSchema(operation.inputSchema));
    const responseSchema = operation.outputSchema ? translateSchema(operation.outputSchema) : UNSTRUCTURED_RESULT;

    return {
        backendId,
        operationName: operation.name,
        method: selectMethod(operation.sideEffect, requestSchema),
        path: routePathFor(routePrefix, backendId, operation.name),
        summary: summarize(operation),
        description: operation.description,
        sideEffect: operation.sideEffect,
        requestSchema,
        responseSchema,
        errorCodes: errorCodesFor(responseSchema),
    };
}

export function routePathFor(routePrefix: string, backendId: string, operationName: string): string {
    return `${routePrefix}/${encodeURIComponent(backendId)}/${encodeURIComponent(operationName)}`;
}

/**
 * Read-only operations whose payload can travel in a query string are GETs;
 * everything else, including operations that do not classify themselves, is POST.
 */
export function selectMethod(sideEffect: SideEffect, requestSchema: ObjectSchema): HttpMethod {
    if (sideEffect !== 'read-only') {
        return 'POST';
    }
    return requestSchema.fields.some(field => field.required) ? 'POST' : 'GET';
}

/**
 * Canonical spelling of an inbound path: every segment decoded and re-encoded
 * the way routePathFor encodes, trailing slash dropped. Null for undecodable input.
 */
export function normalizePath(pathname: string): string | null {
    const segments = pathname.split('/');
    const normalized: string[] = [];
    for (const segment of segments) {
        try {
            normalized.push(encodeURIComponent(decodeURIComponent(segment)));
        } catch {
            return null;
        }
    }
    const joined = normalized.join('/');
    return joined.length > 1 && joined.endsWith('/') ? joined.slice(0, -1) : joined;
}

/**
 * Translates a backend JSON Schema fragment into the canonical schema language.
 */
export function translateSchema(fragment: unknown): CanonicalSchema {
    if (!isSchemaObject(fragment)) {
        return opaque(fragment, undefined);
    }
    const description = typeof fragment.description === 'string' ? fragment.description : undefined;

    if (COMPOSITION_KEYWORDS.some(keyword => keyword in fragment)) {
        return opaque(fragment, description);
    }

    let type: unknown = fragment.type;
    let nullable = false;
    if (Array.isArray(type)) {
        const nonNull = type.filter(entry => entry !== 'null');
        if (type.length !== 2 || nonNull.length !== 1) {
            return opaque(fragment, description);
        }
        type = nonNull[0];
        nullable = true;
    }

    if ('const' in fragment) {
        return translateConst(fragment, type, description, nullable);
    }

    if (type === undefined) {
        if (isStringList(fragment.enum)) {
            type = 'string';
        } else if (isSchemaObject(fragment.properties)) {
            type = 'object';
        } else {
            return opaque(fragment, description);
        }
    }

    const base = withBase(description, nullable);
    switch (type) {
        case 'string': {
            if (fragment.enum !== undefined && !isStringList(fragment.enum)) {
                return opaque(fragment, description);
            }
            return compact<StringSchema>({
                kind: 'string',
                ...base,
                enum: isStringList(fragment.enum) ? [...fragment.enum] : undefined,
                format: typeof fragment.format === 'string' ? fragment.format : undefined,
                minLength: finite(fragment.minLength),
                maxLength: finite(fragment.maxLength),
                pattern: typeof fragment.pattern === 'string' ? fragment.pattern : undefined,
            });
        }
        case 'number':
        case 'integer': {
            if (fragment.enum !== undefined && !isNumberList(fragment.enum)) {
                return opaque(fragment, description);
            }
            return compact<NumericSchema>({
                kind: type === 'integer' ? 'integer' : 'number',
                ...base,
                enum: isNumberList(fragment.enum) ? [...fragment.enum] : undefined,
                minimum: finite(fragment.minimum),
                maximum: finite(fragment.maximum),
                exclusiveMinimum: finite(fragment.exclusiveMinimum),
                exclusiveMaximum: finite(fragment.exclusiveMaximum),
            });
        }
        case 'boolean':
            return { kind: 'boolean', ...base };
        case 'null':
            return { kind: 'null', ...withBase(description, false) };
        case 'array': {
            if (Array.isArray(fragment.items)) {
                // Tuple form
                return opaque(fragment, description);
            }
            return compact<ArraySchema>({
                kind: 'array',
                ...base,
                items: fragment.items === undefined ? opaque(undefined, undefined) : translateSchema(fragment.items),
                minItems: finite(fragment.minItems),
                maxItems: finite(fragment.maxItems),
            });
        }
        case 'object':
            return translateObject(fragment, description, nullable);
        default:
            return opaque(fragment, description);
    }
}

function translateObject(fragment: JsonSchema, description: string | undefined, nullable: boolean): ObjectSchema {
    const required = new Set(isStringList(fragment.required) ? fragment.required : []);
    const properties: JsonSchema = isSchemaObject(fragment.properties) ? fragment.properties : {};
    const fields: CanonicalField[] = Object.keys(properties).map(name => ({
        name,
        required: required.has(name),
        schema: translateSchema(properties[name]),
    }));
    return {
        kind: 'object',
        ...withBase(description, nullable),
        fields,
        additionalProperties: fragment.additionalProperties !== false,
    };
}

function translateConst(fragment: JsonSchema, type: unknown, description: string | undefined, nullable: boolean): CanonicalSchema {
    const value = fragment.const;
    const base = withBase(description, nullable);
    if (typeof value === 'string' && (type === undefined || type === 'string')) {
        return { kind: 'string', ...base, enum: [value] };
    }
    if (typeof value === 'number' && (type === undefined || type === 'number' || type === 'integer')) {
        return { kind: type === 'integer' ? 'integer' : 'number', ...base, enum: [value] };
    }
    return opaque(fragment, description);
}

/**
 * The request payload is always an object of named fields. A non-object input
 * schema keeps its guidance but accepts any object.
 */
function toRequestSchema(schema: CanonicalSchema): ObjectSchema {
    if (schema.kind === 'object') {
        return schema;
    }
    return compact<ObjectSchema>({
        kind: 'object',
        description: schema.kind === 'opaque' && schema.constraint
            ? joinGuidance(schema.description, schema.constraint)
            : schema.description,
        fields: [],
        additionalProperties: true,
    });
}

function errorCodesFor(responseSchema: CanonicalSchema): GatewayErrorCode[] {
    const codes: GatewayErrorCode[] = ['ValidationError', 'BusinessError', 'BackendOverloaded'];
    if (responseSchema.kind !== 'opaque') {
        codes.push('SchemaViolation');
    }
    codes.push('BackendUnavailable', 'InvocationTimeout');
    return codes;
}

function summarize(operation: OperationDescriptor): string {
    const firstLine = operation.description.split(/\r?\n/, 1)[0].trim();
    if (!firstLine) {
        return operation.name;
    }
    return firstLine.length > SUMMARY_MAX_LENGTH ? `${firstLine.slice(0, SUMMARY_MAX_LENGTH - 1)}…` : firstLine;
}

function opaque(fragment: unknown, description: string | undefined): OpaqueSchema {
    return compact<OpaqueSchema>({
        kind: 'opaque',
        description,
        constraint: fragment === undefined ? undefined : JSON.stringify(fragment),
    });
}

export function joinGuidance(description: string | undefined, constraint: string): string {
    return description ? `${description}\n\nConstraint: ${constraint}` : `Constraint: ${constraint}`;
}

function withBase(description: string | undefined, nullable: boolean): { description?: string; nullable?: boolean } {
    const base: { description?: string; nullable?: boolean } = {};
    if (description !== undefined) base.description = description;
    if (nullable) base.nullable = true;
    return base;
}

/** Drops keys whose value is undefined so serialized descriptors stay minimal. */
function compact<T extends object>(value: T): T {
    for (const key of Object.keys(value)) {
        if (Reflect.get(value, key) === undefined) {
            Reflect.deleteProperty(value, key);
        }
    }
    return value;
}

function isSchemaObject(value: unknown): value is JsonSchema {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(entry => typeof entry === 'string');
}

function isNumberList(value: unknown): value is number[] {
    return Array.isArray(value) && value.every(entry => typeof entry === 'number' && Number.isFinite(entry));
}

function finite(value: unknown): number | undefined {
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
