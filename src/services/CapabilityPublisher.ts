import { zodToJsonSchema } from 'zod-to-json-schema';
import { ERROR_HTTP_STATUS, ErrorBodySchema, GatewayErrorCode } from '../errors/GatewayError.js';
import { joinGuidance } from '../translation/SchemaTranslator.js';
import { GatewaySettings } from '../types/configTypes.js';
import { CanonicalSchema, ObjectSchema, RegistrySnapshot, RouteDescriptor, RouteLookup } from '../types/routeTypes.js';

export type JsonObject = { [key: string]: unknown };

export interface OpenApiOperation {
    operationId: string;
    summary: string;
    description?: string;
    tags: string[];
    parameters?: JsonObject[];
    requestBody?: JsonObject;
    responses: Record<string, JsonObject>;
    'x-backend': string;
    'x-operation': string;
    'x-side-effect': string;
}

export interface OpenApiDocument {
    openapi: '3.1.0';
    info: { title: string; version: string; description: string };
    tags: { name: string }[];
    paths: Record<string, Record<string, OpenApiOperation>>;
    components: { schemas: Record<string, unknown> };
}

const ERROR_REF = { $ref: '#/components/schemas/GatewayError' };

/**
 * Renders the current route set as an OpenAPI 3.1 document. The document is
 * rebuilt only when the registry snapshot or the settings object changed.
 */
export class CapabilityPublisher {
    private cached: { snapshot: RegistrySnapshot; settings: GatewaySettings; document: OpenApiDocument } | null = null;
    private readonly errorSchema: unknown;

    constructor(
        private readonly lookup: RouteLookup,
        private readonly getSettings: () => GatewaySettings,
    ) {
        const { $schema: _dialect, ...errorSchema } = zodToJsonSchema(ErrorBodySchema, { $refStrategy: 'none' });
        this.errorSchema = errorSchema;
    }

    public render(): OpenApiDocument {
        const snapshot = this.lookup.snapshot();
        const settings = this.getSettings();
        if (this.cached && this.cached.snapshot === snapshot && this.cached.settings === settings) {
            return this.cached.document;
        }
        const document = this.build(snapshot, settings);
        this.cached = { snapshot, settings, document };
        return document;
    }

    private build(snapshot: RegistrySnapshot, settings: GatewaySettings): OpenApiDocument {
        const paths: OpenApiDocument['paths'] = {};
        const backends = new Set<string>();
        const sortedPaths = [...snapshot.byPath.keys()].sort();
        for (const path of sortedPaths) {
            const item: Record<string, OpenApiOperation> = {};
            for (const entry of snapshot.byPath.get(path)?.values() ?? []) {
                item[entry.descriptor.method.toLowerCase()] = describeOperation(entry.descriptor);
                backends.add(entry.descriptor.backendId);
            }
            paths[path] = item;
        }
        return {
            openapi: '3.1.0',
            info: {
                title: settings.title,
                version: settings.version,
                description: `Operations of ${backends.size} backend(s), route set v${snapshot.version}.`,
            },
            tags: [...backends].sort().map(name => ({ name })),
            paths,
            components: { schemas: { GatewayError: this.errorSchema } },
        };
    }
}

function describeOperation(route: RouteDescriptor): OpenApiOperation {
    const operation: OpenApiOperation = {
        operationId: `${route.backendId}__${route.operationName}`,
        summary: route.summary,
        tags: [route.backendId],
        responses: {
            '200': {
                description: 'Operation result',
                content: { 'application/json': { schema: toJsonSchema(route.responseSchema) } },
            },
            ...errorResponses(route.errorCodes),
        },
        'x-backend': route.backendId,
        'x-operation': route.operationName,
        'x-side-effect': route.sideEffect,
    };
    const description = route.requestSchema.description
        ? joinDescription(route.description, route.requestSchema.description)
        : route.description;
    if (description) {
        operation.description = description;
    }
    if (route.method === 'GET') {
        operation.parameters = queryParameters(route.requestSchema);
    } else {
        operation.requestBody = {
            required: route.requestSchema.fields.some(field => field.required),
            content: { 'application/json': { schema: toJsonSchema(route.requestSchema) } },
        };
    }
    return operation;
}

function queryParameters(schema: ObjectSchema): JsonObject[] {
    return schema.fields.map(field => {
        const parameter: JsonObject = {
            name: field.name,
            in: 'query',
            required: field.required,
            schema: toJsonSchema(field.schema),
        };
        if (field.schema.kind === 'array') {
            parameter.style = 'form';
            parameter.explode = true;
        }
        return parameter;
    });
}

/**
 * One response per distinct status; codes that share a status are listed together.
 */
function errorResponses(codes: GatewayErrorCode[]): Record<string, JsonObject> {
    const byStatus = new Map<number, GatewayErrorCode[]>();
    for (const code of codes) {
        const status = ERROR_HTTP_STATUS[code];
        byStatus.set(status, [...(byStatus.get(status) ?? []), code]);
    }
    const responses: Record<string, JsonObject> = {};
    for (const [status, grouped] of byStatus) {
        responses[String(status)] = {
            description: grouped.join(' | '),
            content: { 'application/json': { schema: ERROR_REF } },
        };
    }
    return responses;
}

/**
 * Canonical schema to JSON Schema (2020-12, as used by OpenAPI 3.1).
 * Opaque values carry their original fragment in the description.
 */
export function toJsonSchema(schema: CanonicalSchema): JsonObject {
    const out: JsonObject = {};
    switch (schema.kind) {
        case 'string':
            out.type = schema.kind;
            copy(out, schema, ['format', 'minLength', 'maxLength', 'pattern']);
            if (schema.enum) out.enum = schema.nullable ? [...schema.enum, null] : schema.enum;
            break;
        case 'number':
        case 'integer':
            out.type = schema.kind;
            copy(out, schema, ['minimum', 'maximum', 'exclusiveMinimum', 'exclusiveMaximum']);
            if (schema.enum) out.enum = schema.nullable ? [...schema.enum, null] : schema.enum;
            break;
        case 'boolean':
        case 'null':
            out.type = schema.kind;
            break;
        case 'array':
            out.type = 'array';
            out.items = toJsonSchema(schema.items);
            copy(out, schema, ['minItems', 'maxItems']);
            break;
        case 'object': {
            out.type = 'object';
            const properties: JsonObject = {};
            for (const field of schema.fields) {
                properties[field.name] = toJsonSchema(field.schema);
            }
            out.properties = properties;
            const required = schema.fields.filter(field => field.required).map(field => field.name);
            if (required.length > 0) out.required = required;
            if (!schema.additionalProperties) out.additionalProperties = false;
            break;
        }
        case 'opaque':
            if (schema.constraint) {
                out.description = joinGuidance(schema.description, schema.constraint);
                return out;
            }
            break;
    }
    if (schema.nullable && typeof out.type === 'string' && out.type !== 'null') {
        out.type = [out.type, 'null'];
    }
    if (schema.description) {
        out.description = schema.description;
    }
    return out;
}

function copy<T extends object>(target: JsonObject, source: T, keys: (keyof T & string)[]): void {
    for (const key of keys) {
        if (source[key] !== undefined) {
            target[key] = source[key];
        }
    }
}

function joinDescription(description: string, guidance: string): string {
    return description ? `${description}\n\n${guidance}` : guidance;
}
