/**
 * Error kinds surfaced to tool callers.
 */
export type ErrorKind =
    | 'ValidationError'
    | 'AuthError'
    | 'NetworkError'
    | 'RateLimitError'
    | 'ParseError'
    | 'ProviderError'
    | 'NotFound'
    | 'UnknownOperation'
    | 'HandlerError';

/**
 * Base class for every failure this project raises on purpose.
 * `reason` is short and safe to show to a caller.
 */
export abstract class ToolError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(public readonly reason: string, options?: { cause?: unknown }) {
        super(reason, options);
        this.name = new.target.name;
    }
}

/**
 * Bad caller input. Raised before any network call.
 */
export class ValidationError extends ToolError {
    readonly kind = 'ValidationError' as const;

    constructor(public readonly param: string, reason: string) {
        super(`${param}: ${reason}`);
    }
}

/**
 * Missing or rejected credential.
 */
export class AuthError extends ToolError {
    readonly kind = 'AuthError' as const;
}

/**
 * Transport failure, non-2xx status or timeout.
 * `body` is kept for logging only.
 */
export class NetworkError extends ToolError {
    readonly kind: 'NetworkError' | 'RateLimitError' = 'NetworkError';

    constructor(
        reason: string,
        public readonly status: number,
        public readonly details: { body?: string; timeout?: boolean; url?: string } = {},
        options?: { cause?: unknown }
    ) {
        super(reason, options);
    }

    get timeout(): boolean {
        return this.details.timeout ?? false;
    }
}

/**
 * HTTP 429 from an external source.
 */
export class RateLimitError extends NetworkError {
    override readonly kind = 'RateLimitError' as const;

    constructor(
        reason: string,
        public readonly retryAfterMs: number | null,
        details: { body?: string; url?: string } = {}
    ) {
        super(reason, 429, details);
    }
}

/**
 * Malformed response body from an external source.
 */
export class ParseError extends ToolError {
    readonly kind = 'ParseError' as const;
}

/**
 * LLM provider answered but the answer is unusable (refusal, truncation, empty).
 */
export class ProviderError extends ToolError {
    readonly kind = 'ProviderError' as const;
}

/**
 * Identifier was well-formed but the source has no such item.
 */
export class NotFoundError extends ToolError {
    readonly kind = 'NotFound' as const;
}

export class UnknownOperationError extends ToolError {
    readonly kind = 'UnknownOperation' as const;

    constructor(public readonly operation: string) {
        super(`Unknown operation: ${operation}`);
    }
}

/**
 * Reduce any thrown value to a caller-safe kind and reason.
 */
export function describeError(error: unknown): { kind: string; reason: string } {
    if (error instanceof ToolError) {
        return { kind: error.kind, reason: error.reason };
    }
    if (error instanceof Error && error.name === 'AbortError') {
        return { kind: 'NetworkError', reason: 'Request was cancelled' };
    }
    return { kind: 'InternalError', reason: 'Unexpected internal error' };
}
