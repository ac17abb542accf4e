import type { Logger } from 'pino';

/**
 * Declared parameter of a tool. Schemas are data: they are written out per
 * operation and compiled into validators, never inferred from handlers.
 */
export type ParamSpec = StringParam | IntegerParam | BooleanParam | StringListParam;

interface BaseParam {
    name: string;
    description: string;
    /** Required parameters have no default */
    required?: boolean;
}

export interface StringParam extends BaseParam {
    type: 'string';
    default?: string;
    enum?: readonly string[];
    /** Rejects blank strings */
    nonEmpty?: boolean;
}

export interface IntegerParam extends BaseParam {
    type: 'integer';
    default?: number;
    minimum?: number;
    maximum?: number;
    enum?: readonly number[];
}

export interface BooleanParam extends BaseParam {
    type: 'boolean';
    default?: boolean;
}

/** Comma-separated string or array of strings */
export interface StringListParam extends BaseParam {
    type: 'string[]';
    default?: string[];
    /** Minimum number of non-blank items */
    minItems?: number;
}

/**
 * Capability description advertised to the calling agent.
 */
export interface ToolDescriptor {
    name: string;
    description: string;
    params: readonly ParamSpec[];
    /**
     * Checks spanning several parameters, run after each parameter is valid.
     * Throws ValidationError.
     */
    check?: (args: ToolArgs) => void;
}

/**
 * JSON value a handler may return as structured output.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * Handler output: formatted text or a structured document.
 */
export type ToolOutput = string | { [key: string]: JsonValue };

/**
 * Validated arguments after coercion and defaults.
 */
export type ToolArgs = Record<string, string | number | boolean | string[] | undefined>;

/**
 * Per-invocation context handed to handlers.
 */
export interface ToolContext {
    signal?: AbortSignal;
    logger: Logger;
}

export type ToolHandler = (args: ToolArgs, context: ToolContext) => Promise<ToolOutput>;

/**
 * Registered tool: descriptor plus the handler that implements it.
 */
export interface ToolDefinition {
    descriptor: ToolDescriptor;
    handler: ToolHandler;
}

/**
 * Caller-visible description of a failure. Never carries stack traces or raw bodies.
 */
export interface ToolFailure {
    kind: string;
    reason: string;
    /** Offending parameter, for validation failures */
    param?: string;
    /** Operation name, for handler failures */
    operation?: string;
    /** Underlying failure, for handler failures */
    cause?: { kind: string; reason: string };
}

export type InvokeResult =
    | { ok: true; output: ToolOutput }
    | { ok: false; error: ToolFailure };
