import { GatewayErrorCode } from '../errors/GatewayError.js';
import { SideEffect } from './operationTypes.js';

export type HttpMethod = 'GET' | 'POST';

interface SchemaBase {
    description?: string;
    /** Accepts `null` in addition to the declared kind. */
    nullable?: boolean;
}

export interface StringSchema extends SchemaBase {
    kind: 'string';
    enum?: string[];
    format?: string;
    minLength?: number;
    maxLength?: number;
    pattern?: string;
}

export interface NumericSchema extends SchemaBase {
    kind: 'number' | 'integer';
    enum?: number[];
    minimum?: number;
    maximum?: number;
    exclusiveMinimum?: number;
    exclusiveMaximum?: number;
}

export interface BooleanSchema extends SchemaBase {
    kind: 'boolean';
}

export interface NullSchema extends SchemaBase {
    kind: 'null';
}

export interface ArraySchema extends SchemaBase {
    kind: 'array';
    items: CanonicalSchema;
    minItems?: number;
    maxItems?: number;
}

export interface CanonicalField {
    name: string;
    required: boolean;
    schema: CanonicalSchema;
}

export interface ObjectSchema extends SchemaBase {
    kind: 'object';
    /** Declaration order of the backend is preserved. */
    fields: CanonicalField[];
    additionalProperties: boolean;
}

/**
 * A value the gateway cannot describe structurally. `constraint` holds the
 * backend's original schema fragment verbatim.
 */
export interface OpaqueSchema extends SchemaBase {
    kind: 'opaque';
    constraint?: string;
}

export type CanonicalSchema =
    | StringSchema
    | NumericSchema
    | BooleanSchema
    | NullSchema
    | ArraySchema
    | ObjectSchema
    | OpaqueSchema;

/**
 * The gateway's protocol-agnostic representation of one backend operation.
 */
export interface RouteDescriptor {
    backendId: string;
    /** The backend's own operation name, never rewritten. */
    operationName: string;
    method: HttpMethod;
    path: string;
    summary: string;
    description: string;
    sideEffect: SideEffect;
    requestSchema: ObjectSchema;
    responseSchema: CanonicalSchema;
    /** Error codes a caller of this route may receive, in a fixed order. */
    errorCodes: GatewayErrorCode[];
}

export interface RouteEntry {
    /** `METHOD path` */
    readonly key: string;
    readonly descriptor: Readonly<RouteDescriptor>;
}

/**
 * Immutable view of the registry. A new snapshot replaces the previous one on
 * every mutation, so a reader holding one never observes a partial update.
 */
export interface RegistrySnapshot {
    readonly version: number;
    readonly routes: ReadonlyMap<string, RouteEntry>;
    readonly byPath: ReadonlyMap<string, ReadonlyMap<HttpMethod, RouteEntry>>;
    readonly byBackend: ReadonlyMap<string, readonly RouteEntry[]>;
}

export type RouteMatch =
    | { kind: 'found'; entry: RouteEntry }
    | { kind: 'method-mismatch'; allowed: HttpMethod[] }
    | { kind: 'none' };

/**
 * Read-only side of the registry, the only part the Dispatcher and the
 * publisher depend on.
 */
export interface RouteLookup {
    snapshot(): RegistrySnapshot;
    match(method: string, path: string): RouteMatch;
}

export interface RoutesChangedPayload {
    backendId: string;
    added: string[];
    removed: string[];
    version: number;
}
