import { z } from 'zod';

/**
 * A JSON Schema fragment as a backend declares it. Only the subset the
 * translator understands is interpreted; the rest is carried opaquely.
 */
export type JsonSchema = { [key: string]: unknown };

export type SideEffect = 'read-only' | 'mutating' | 'unspecified';

const JsonSchemaObjectSchema = z.record(z.unknown());

/**
 * Shape of one tool entry in a backend's discovery answer. Extra keys are
 * tolerated since backends routinely add vendor metadata.
 */
export const OperationDescriptorSchema = z.object({
    name: z.string().min(1),
    title: z.string().optional(),
    description: z.string().optional(),
    inputSchema: JsonSchemaObjectSchema.optional(),
    outputSchema: JsonSchemaObjectSchema.optional(),
    annotations: z.object({
        title: z.string().optional(),
        readOnlyHint: z.boolean().optional(),
        destructiveHint: z.boolean().optional(),
    }).passthrough().optional(),
}).passthrough().transform((tool): OperationDescriptor => ({
    name: tool.name,
    description: tool.description ?? tool.title ?? tool.annotations?.title ?? '',
    inputSchema: tool.inputSchema ?? { type: 'object' },
    outputSchema: tool.outputSchema,
    sideEffect: classifySideEffect(tool.annotations?.readOnlyHint, tool.annotations?.destructiveHint),
}));

function classifySideEffect(readOnlyHint: boolean | undefined, destructiveHint: boolean | undefined): SideEffect {
    if (readOnlyHint === true) return 'read-only';
    if (readOnlyHint === false || destructiveHint === true) return 'mutating';
    return 'unspecified';
}

/**
 * Backend-native description of one callable operation.
 * Immutable until the backend reports a new discovery result.
 */
export interface OperationDescriptor {
    /** Unique within one backend. */
    readonly name: string;
    readonly description: string;
    readonly inputSchema: JsonSchema;
    readonly outputSchema?: JsonSchema;
    readonly sideEffect: SideEffect;
}
