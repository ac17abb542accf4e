import type {
    InvokeResult,
    ParamSpec,
    ToolArgs,
    ToolDefinition,
    ToolDescriptor,
    ToolHandler,
} from '../types/index.js';
import { describeError, UnknownOperationError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { validateArgs } from './params.js';

/**
 * JSON Schema property advertised for one parameter.
 */
export interface JsonSchemaProperty {
    type: 'string' | 'integer' | 'boolean' | 'array';
    description: string;
    items?: { type: 'string' };
    enum?: Array<string | number>;
    default?: string | number | boolean | string[];
    minItems?: number;
    minimum?: number;
    maximum?: number;
}

export interface JsonSchemaObject {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
}

/**
 * Name → handler table with declared parameter schemas.
 * Populated once at start-up, then sealed.
 */
export class ToolRegistry {
    private tools = new Map<string, ToolDefinition>();
    private sealed = false;

    register(descriptor: ToolDescriptor, handler: ToolHandler): void {
        if (this.sealed) {
            throw new Error(`Registry is sealed; cannot register ${descriptor.name}`);
        }
        if (this.tools.has(descriptor.name)) {
            throw new Error(`Tool already registered: ${descriptor.name}`);
        }
        checkDescriptor(descriptor);
        this.tools.set(descriptor.name, { descriptor, handler });
    }

    seal(): void {
        this.sealed = true;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    /**
     * Registered descriptors in registration order.
     */
    describe(): ToolDescriptor[] {
        return [...this.tools.values()].map((tool) => tool.descriptor);
    }

    /**
     * Validate and run one tool. Never throws: every failure comes back as
     * `{ ok: false, error }` carrying a kind and a short reason.
     */
    async invoke(name: string, rawArgs: unknown, signal?: AbortSignal): Promise<InvokeResult> {
        const logger = getLogger().child({ tool: name });
        const tool = this.tools.get(name);

        if (!tool) {
            const error = new UnknownOperationError(name);
            logger.warn('Unknown tool requested');
            return { ok: false, error: { kind: error.kind, reason: error.reason, operation: name } };
        }

        let args: ToolArgs;
        try {
            args = validateArgs(tool.descriptor, rawArgs);
        } catch (error) {
            if (error instanceof ValidationError) {
                logger.info({ param: error.param, reason: error.reason }, 'Rejected arguments');
                return { ok: false, error: { kind: error.kind, reason: error.reason, param: error.param } };
            }
            logger.error({ error }, 'Argument validation crashed');
            return { ok: false, error: { ...describeError(error), operation: name } };
        }

        const startTime = Date.now();
        try {
            logger.debug({ args }, 'Invoking tool');
            const output = await tool.handler(args, { signal, logger });
            logger.info({ durationMs: Date.now() - startTime }, 'Tool completed');
            return { ok: true, output };
        } catch (error) {
            const cause = describeError(error);
            logger.error({ error, durationMs: Date.now() - startTime }, 'Tool failed');
            return {
                ok: false,
                error: {
                    kind: 'HandlerError',
                    reason: `${cause.kind}: ${cause.reason}`,
                    operation: name,
                    cause,
                },
            };
        }
    }
}

/**
 * MCP `inputSchema` for a descriptor.
 */
export function toJsonSchema(descriptor: ToolDescriptor): JsonSchemaObject {
    const properties: Record<string, JsonSchemaProperty> = {};

    for (const param of descriptor.params) {
        properties[param.name] = toProperty(param);
    }

    return {
        type: 'object',
        properties,
        required: descriptor.params.filter((param) => param.required).map((param) => param.name),
    };
}

function toProperty(param: ParamSpec): JsonSchemaProperty {
    switch (param.type) {
        case 'string':
            return {
                type: 'string',
                description: param.description,
                ...(param.enum ? { enum: [...param.enum] } : {}),
                ...(param.default !== undefined ? { default: param.default } : {}),
            };
        case 'integer':
            return {
                type: 'integer',
                description: param.description,
                ...(param.enum ? { enum: [...param.enum] } : {}),
                ...(param.minimum !== undefined ? { minimum: param.minimum } : {}),
                ...(param.maximum !== undefined ? { maximum: param.maximum } : {}),
                ...(param.default !== undefined ? { default: param.default } : {}),
            };
        case 'boolean':
            return {
                type: 'boolean',
                description: param.description,
                ...(param.default !== undefined ? { default: param.default } : {}),
            };
        case 'string[]':
            return {
                type: 'array',
                items: { type: 'string' },
                description: `${param.description} (list or comma-separated string)`,
                ...(param.minItems !== undefined ? { minItems: param.minItems } : {}),
                ...(param.default !== undefined ? { default: [...param.default] } : {}),
            };
    }
}

/**
 * Catch descriptor mistakes at start-up rather than on first call.
 */
function checkDescriptor(descriptor: ToolDescriptor): void {
    const seen = new Set<string>();
    for (const param of descriptor.params) {
        if (seen.has(param.name)) {
            throw new Error(`${descriptor.name}: duplicate parameter ${param.name}`);
        }
        seen.add(param.name);
        if (param.required && param.default !== undefined) {
            throw new Error(`${descriptor.name}: required parameter ${param.name} has a default`);
        }
    }
}
