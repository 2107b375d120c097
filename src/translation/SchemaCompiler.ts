import { z } from 'zod';
import { CanonicalSchema, ObjectSchema } from '../types/routeTypes.js';

export const ROOT_FIELD = '(root)';

export type ValidationResult =
    | { ok: true; value: unknown }
    | { ok: false; field: string; message: string };

/**
 * Builds a zod validator equivalent to a canonical schema. Opaque values are
 * accepted as-is; string formats are advisory and not enforced.
 */
export function compileSchema(schema: CanonicalSchema): z.ZodTypeAny {
    const compiled = compileKind(schema);
    return schema.nullable ? compiled.nullable() : compiled;
}

function compileKind(schema: CanonicalSchema): z.ZodTypeAny {
    switch (schema.kind) {
        case 'string': {
            let validator = z.string();
            if (schema.minLength !== undefined) validator = validator.min(schema.minLength);
            if (schema.maxLength !== undefined) validator = validator.max(schema.maxLength);
            const pattern = schema.pattern !== undefined ? toRegExp(schema.pattern) : null;
            if (pattern) validator = validator.regex(pattern, `Must match pattern ${schema.pattern}`);
            const allowed = schema.enum;
            if (allowed) {
                return validator.refine(value => allowed.includes(value), {
                    message: `Expected one of: ${allowed.join(', ')}`,
                });
            }
            return validator;
        }
        case 'number':
        case 'integer': {
            let validator = z.number();
            if (schema.kind === 'integer') validator = validator.int();
            if (schema.minimum !== undefined) validator = validator.gte(schema.minimum);
            if (schema.maximum !== undefined) validator = validator.lte(schema.maximum);
            if (schema.exclusiveMinimum !== undefined) validator = validator.gt(schema.exclusiveMinimum);
            if (schema.exclusiveMaximum !== undefined) validator = validator.lt(schema.exclusiveMaximum);
            const allowed = schema.enum;
            if (allowed) {
                return validator.refine(value => allowed.includes(value), {
                    message: `Expected one of: ${allowed.join(', ')}`,
                });
            }
            return validator;
        }
        case 'boolean':
            return z.boolean();
        case 'null':
            return z.null();
        case 'array': {
            let validator = z.array(compileSchema(schema.items));
            if (schema.minItems !== undefined) validator = validator.min(schema.minItems);
            if (schema.maxItems !== undefined) validator = validator.max(schema.maxItems);
            return validator;
        }
        case 'object':
            return compileObject(schema);
        case 'opaque':
            return z.unknown();
    }
}

function compileObject(schema: ObjectSchema): z.ZodTypeAny {
    const shape: Record<string, z.ZodTypeAny> = {};
    for (const field of schema.fields) {
        const validator = compileSchema(field.schema);
        if (!field.required) {
            shape[field.name] = validator.optional();
        } else if (field.schema.kind === 'opaque') {
            // z.unknown() would accept a missing key
            shape[field.name] = validator.refine(value => value !== undefined, { message: 'Required' });
        } else {
            shape[field.name] = validator;
        }
    }
    const object = z.object(shape);
    return schema.additionalProperties ? object.passthrough() : object.strict();
}

function toRegExp(pattern: string): RegExp | null {
    try {
        return new RegExp(pattern);
    } catch {
        // An unparseable pattern cannot be enforced; the constraint stays documented.
        return null;
    }
}

/**
 * Validates payloads against canonical schemas, compiling each schema once.
 * Route descriptors are replaced wholesale on re-discovery, so identity is a
 * sound cache key.
 */
export class PayloadValidator {
    private readonly cache = new WeakMap<CanonicalSchema, z.ZodTypeAny>();

    public validate(schema: CanonicalSchema, value: unknown): ValidationResult {
        const result = this.validatorFor(schema).safeParse(value);
        if (result.success) {
            return { ok: true, value: result.data };
        }
        return describeFirstIssue(result.error);
    }

    private validatorFor(schema: CanonicalSchema): z.ZodTypeAny {
        let validator = this.cache.get(schema);
        if (!validator) {
            validator = compileSchema(schema);
            this.cache.set(schema, validator);
        }
        return validator;
    }
}

function describeFirstIssue(error: z.ZodError): ValidationResult {
    const issue = error.issues[0];
    if (!issue) {
        return { ok: false, field: ROOT_FIELD, message: 'Invalid payload' };
    }
    const path = issue.path.map(String);
    if (issue.code === z.ZodIssueCode.unrecognized_keys && issue.keys.length > 0) {
        path.push(issue.keys[0]);
    }
    return {
        ok: false,
        field: path.length > 0 ? path.join('.') : ROOT_FIELD,
        message: issue.message,
    };
}
