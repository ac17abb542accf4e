import { z } from 'zod';
import type { ParamSpec, ToolArgs, ToolDescriptor } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { isRecord } from '../sources/utils.js';

type ArgValue = string | number | boolean | string[];

/** Schema that accepts loosely typed input and yields a coerced value */
type Coercer<T extends ArgValue> = z.ZodType<T, z.ZodTypeDef, unknown>;

const INTEGER_TEXT = /^-?\d+$/;

/**
 * Compile one declared parameter into a zod schema.
 * Integers accept numeric strings, booleans accept "true"/"false",
 * lists accept comma-separated strings.
 */
export function compileParam(spec: ParamSpec): Coercer<ArgValue> {
    switch (spec.type) {
        case 'string': {
            let schema: Coercer<string> = z.string({ invalid_type_error: 'must be a string' });
            if (spec.nonEmpty || spec.required) {
                schema = z.string({ invalid_type_error: 'must be a string' }).trim().min(1, 'must not be empty');
            }
            const allowed = spec.enum;
            if (allowed) {
                schema = schema.refine((value) => allowed.includes(value), {
                    message: `must be one of ${allowed.join(', ')}`,
                });
            }
            return schema;
        }

        case 'integer': {
            let target = z.number().int('must be an integer');
            const { minimum, maximum } = spec;
            const range = minimum !== undefined && maximum !== undefined
                ? `must be between ${minimum} and ${maximum}`
                : undefined;
            if (minimum !== undefined) target = target.min(minimum, range ?? `must be at least ${minimum}`);
            if (maximum !== undefined) target = target.max(maximum, range ?? `must be at most ${maximum}`);
            const allowed = spec.enum;
            const checked = allowed
                ? target.refine((value) => allowed.includes(value), { message: `must be one of ${allowed.join(', ')}` })
                : target;

            return z
                .union(
                    [z.number(), z.string().trim().regex(INTEGER_TEXT, 'must be an integer').transform(Number)],
                    { errorMap: () => ({ message: 'must be an integer' }) }
                )
                .pipe(checked);
        }

        case 'boolean':
            return z.union(
                [z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')],
                { errorMap: () => ({ message: 'must be true or false' }) }
            );

        case 'string[]': {
            const minItems = spec.minItems ?? 0;
            return z
                .union(
                    [z.array(z.string()), z.string().transform((value) => value.split(','))],
                    { errorMap: () => ({ message: 'must be a list of strings' }) }
                )
                .transform((items) => items.map((item) => item.trim()).filter((item) => item.length > 0))
                .refine((items) => items.length >= minItems, {
                    message: `must name at least ${minItems} item${minItems === 1 ? '' : 's'}`,
                });
        }
    }
}

/**
 * Validate raw call arguments against a descriptor.
 * Omitted optional parameters take their declared default; null counts as omitted.
 * Undeclared arguments are dropped.
 */
export function validateArgs(descriptor: ToolDescriptor, raw: unknown): ToolArgs {
    if (raw !== undefined && raw !== null && !isRecord(raw)) {
        throw new ValidationError('arguments', 'must be an object');
    }
    const input = new Map<string, unknown>(isRecord(raw) ? Object.entries(raw) : []);
    const args: ToolArgs = {};

    for (const spec of descriptor.params) {
        const value = input.get(spec.name);

        if (value === undefined || value === null) {
            if (spec.required) {
                throw new ValidationError(spec.name, 'is required');
            }
            if (spec.default !== undefined) {
                args[spec.name] = Array.isArray(spec.default) ? [...spec.default] : spec.default;
            }
            continue;
        }

        const parsed = compileParam(spec).safeParse(value);
        if (!parsed.success) {
            throw new ValidationError(spec.name, parsed.error.issues[0]?.message ?? 'is invalid');
        }
        args[spec.name] = parsed.data;
    }

    descriptor.check?.(args);
    return args;
}

/**
 * Cross-parameter check: when both integers are given, `from` must not exceed `to`.
 */
export function orderedRange(from: string, to: string): (args: ToolArgs) => void {
    return (args) => {
        const low = args[from];
        const high = args[to];
        if (typeof low === 'number' && typeof high === 'number' && low > high) {
            throw new ValidationError(from, `must not be after ${to}`);
        }
    };
}

// ─── Typed readers for handlers ─────────────────────────────

export function readString(args: ToolArgs, name: string): string {
    const value = args[name];
    if (typeof value !== 'string') {
        throw new TypeError(`Argument ${name} is not a string`);
    }
    return value;
}

export function readOptionalString(args: ToolArgs, name: string): string | undefined {
    const value = args[name];
    return typeof value === 'string' && value.trim() ? value : undefined;
}

export function readInt(args: ToolArgs, name: string): number {
    const value = args[name];
    if (typeof value !== 'number') {
        throw new TypeError(`Argument ${name} is not a number`);
    }
    return value;
}

export function readOptionalInt(args: ToolArgs, name: string): number | undefined {
    const value = args[name];
    return typeof value === 'number' ? value : undefined;
}

export function readBool(args: ToolArgs, name: string): boolean {
    return args[name] === true;
}

export function readList(args: ToolArgs, name: string): string[] {
    const value = args[name];
    return Array.isArray(value) ? value : [];
}

/**
 * Narrow a validated string argument to its declared enumeration.
 */
export function readEnum<T extends string>(args: ToolArgs, name: string, allowed: readonly T[]): T {
    const value = readString(args, name);
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
        throw new TypeError(`Argument ${name} is not one of ${allowed.join(', ')}`);
    }
    return match;
}
