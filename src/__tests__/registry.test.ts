import { describe, it, expect, vi } from 'vitest';
import { compileParam, orderedRange, readEnum, validateArgs } from '../registry/params.js';
import { toJsonSchema, ToolRegistry } from '../registry/tool-registry.js';
import type { ToolDescriptor, ToolHandler } from '../types/index.js';
import { NetworkError, ValidationError } from '../utils/errors.js';

const SEARCH: ToolDescriptor = {
    name: 'search_things',
    description: 'Search things.',
    params: [
        { name: 'query', type: 'string', description: 'Search text', required: true },
        { name: 'max_results', type: 'integer', description: 'Maximum results', default: 10, minimum: 1, maximum: 50 },
        { name: 'sort', type: 'string', description: 'Order', enum: ['relevance', 'date'], default: 'relevance' },
        { name: 'exact', type: 'boolean', description: 'Exact match', default: false },
        { name: 'tags', type: 'string[]', description: 'Tags' },
    ],
};

function validationFailure(raw: unknown): { param: string; reason: string } | null {
    try {
        validateArgs(SEARCH, raw);
        return null;
    } catch (error) {
        if (error instanceof ValidationError) {
            return { param: error.param, reason: error.reason };
        }
        throw error;
    }
}

describe('validateArgs', () => {
    it('should apply defaults and drop undeclared arguments', () => {
        expect(validateArgs(SEARCH, { query: 'cobalt', extra: 'ignored' })).toEqual({
            query: 'cobalt',
            max_results: 10,
            sort: 'relevance',
            exact: false,
        });
    });

    it('should treat null as omitted', () => {
        expect(validateArgs(SEARCH, { query: 'cobalt', max_results: null })).toMatchObject({ max_results: 10 });
        expect(validationFailure({ query: null })).toEqual({ param: 'query', reason: 'query: is required' });
    });

    it('should coerce loosely typed values', () => {
        expect(validateArgs(SEARCH, { query: ' cobalt ', max_results: '25', exact: 'true', tags: 'ree, coal,,' })).toEqual({
            query: 'cobalt',
            max_results: 25,
            sort: 'relevance',
            exact: true,
            tags: ['ree', 'coal'],
        });
        expect(validateArgs(SEARCH, { query: 'x', tags: [' a ', ''] })).toMatchObject({ tags: ['a'] });
    });

    it.each([
        [{}, 'query', 'query: is required'],
        [{ query: '   ' }, 'query', 'query: must not be empty'],
        [{ query: 42 }, 'query', 'query: must be a string'],
        [{ query: 'x', max_results: 0 }, 'max_results', 'max_results: must be between 1 and 50'],
        [{ query: 'x', max_results: 51 }, 'max_results', 'max_results: must be between 1 and 50'],
        [{ query: 'x', max_results: 2.5 }, 'max_results', 'max_results: must be an integer'],
        [{ query: 'x', max_results: 'ten' }, 'max_results', 'max_results: must be an integer'],
        [{ query: 'x', sort: 'oldest' }, 'sort', 'sort: must be one of relevance, date'],
        [{ query: 'x', exact: 'yes' }, 'exact', 'exact: must be true or false'],
        [{ query: 'x', tags: 7 }, 'tags', 'tags: must be a list of strings'],
    ])('should reject %j', (raw, param, reason) => {
        expect(validationFailure(raw)).toEqual({ param, reason });
    });

    it('should reject non-object arguments', () => {
        expect(validationFailure(['cobalt'])).toEqual({ param: 'arguments', reason: 'arguments: must be an object' });
    });

    it('should accept omitted arguments when nothing is required', () => {
        const descriptor: ToolDescriptor = { name: 'status', description: 'Status.', params: [] };
        expect(validateArgs(descriptor, undefined)).toEqual({});
    });
});

describe('cross-parameter rules', () => {
    const RANGED: ToolDescriptor = {
        name: 'ranged',
        description: 'Ranged search.',
        params: [
            { name: 'level', type: 'integer', description: 'Code digits', default: 4, enum: [2, 4, 6] },
            { name: 'countries', type: 'string[]', description: 'Countries', minItems: 1 },
            { name: 'year_from', type: 'integer', description: 'First year' },
            { name: 'year_to', type: 'integer', description: 'Last year' },
        ],
        check: orderedRange('year_from', 'year_to'),
    };

    function rangedFailure(raw: unknown): { param: string; reason: string } | null {
        try {
            validateArgs(RANGED, raw);
            return null;
        } catch (error) {
            if (error instanceof ValidationError) {
                return { param: error.param, reason: error.reason };
            }
            throw error;
        }
    }

    it('should accept values inside the declared sets and ranges', () => {
        expect(validateArgs(RANGED, { level: '6', countries: 'Chile', year_from: 2020, year_to: 2020 })).toEqual({
            level: 6,
            countries: ['Chile'],
            year_from: 2020,
            year_to: 2020,
        });
    });

    it.each([
        [{ level: 3 }, 'level', 'level: must be one of 2, 4, 6'],
        [{ countries: [] }, 'countries', 'countries: must name at least 1 item'],
        [{ countries: ' , ' }, 'countries', 'countries: must name at least 1 item'],
        [{ year_from: 2022, year_to: 2015 }, 'year_from', 'year_from: must not be after year_to'],
    ])('should reject %j', (raw, param, reason) => {
        expect(rangedFailure(raw)).toEqual({ param, reason });
    });

    it('should leave one-sided ranges alone', () => {
        expect(rangedFailure({ year_from: 2022 })).toBeNull();
        expect(rangedFailure({ year_to: 1990 })).toBeNull();
    });

    it('should advertise the allowed values and the minimum list size', () => {
        const schema = toJsonSchema(RANGED);

        expect(schema.properties['level']).toEqual({
            type: 'integer',
            description: 'Code digits',
            enum: [2, 4, 6],
            default: 4,
        });
        expect(schema.properties['countries']).toEqual({
            type: 'array',
            items: { type: 'string' },
            description: 'Countries (list or comma-separated string)',
            minItems: 1,
        });
    });
});

describe('compileParam', () => {
    it('should describe one-sided integer bounds', () => {
        const atLeastOne = compileParam({ name: 'n', type: 'integer', description: 'n', minimum: 1 });
        const result = atLeastOne.safeParse(0);

        expect(result.success).toBe(false);
        expect(result.error?.issues[0]?.message).toBe('must be at least 1');
    });
});

describe('readEnum', () => {
    it('should narrow a validated value', () => {
        expect(readEnum({ flow: 'X' }, 'flow', ['M', 'X'] as const)).toBe('X');
        expect(() => readEnum({ flow: 'R' }, 'flow', ['M', 'X'] as const)).toThrow(TypeError);
    });
});

describe('ToolRegistry', () => {
    function createRegistry(handler: ToolHandler): ToolRegistry {
        const registry = new ToolRegistry();
        registry.register(SEARCH, handler);
        registry.seal();
        return registry;
    }

    it('should run the handler with validated arguments', async () => {
        const handler = vi.fn<ToolHandler>().mockResolvedValue({ count: 0 });
        const registry = createRegistry(handler);

        const result = await registry.invoke('search_things', { query: 'nickel', max_results: '5' });

        expect(result).toEqual({ ok: true, output: { count: 0 } });
        expect(handler).toHaveBeenCalledOnce();
        expect(handler.mock.calls[0]?.[0]).toEqual({ query: 'nickel', max_results: 5, sort: 'relevance', exact: false });
    });

    it('should pass the abort signal to the handler', async () => {
        const handler = vi.fn<ToolHandler>().mockResolvedValue('done');
        const controller = new AbortController();

        await createRegistry(handler).invoke('search_things', { query: 'nickel' }, controller.signal);

        expect(handler.mock.calls[0]?.[1].signal).toBe(controller.signal);
    });

    it('should report unknown operations without running anything', async () => {
        const handler = vi.fn<ToolHandler>();

        const result = await createRegistry(handler).invoke('search_everything', {});

        expect(result).toEqual({
            ok: false,
            error: { kind: 'UnknownOperation', reason: 'Unknown operation: search_everything', operation: 'search_everything' },
        });
        expect(handler).not.toHaveBeenCalled();
    });

    it('should report invalid arguments without running the handler', async () => {
        const handler = vi.fn<ToolHandler>();

        const result = await createRegistry(handler).invoke('search_things', { query: 'x', max_results: 500 });

        expect(result).toEqual({
            ok: false,
            error: { kind: 'ValidationError', reason: 'max_results: must be between 1 and 50', param: 'max_results' },
        });
        expect(handler).not.toHaveBeenCalled();
    });

    it('should wrap handler failures with the operation and cause', async () => {
        const registry = createRegistry(async () => {
            throw new NetworkError('HTTP 503: Service Unavailable', 503);
        });

        const result = await registry.invoke('search_things', { query: 'x' });

        expect(result).toEqual({
            ok: false,
            error: {
                kind: 'HandlerError',
                reason: 'NetworkError: HTTP 503: Service Unavailable',
                operation: 'search_things',
                cause: { kind: 'NetworkError', reason: 'HTTP 503: Service Unavailable' },
            },
        });
    });

    it('should hide unexpected errors behind InternalError', async () => {
        const registry = createRegistry(async () => {
            throw new Error('secret detail at /home/user/.env');
        });

        const result = await registry.invoke('search_things', { query: 'x' });

        expect(result.ok).toBe(false);
        expect(result.ok ? null : result.error.reason).toBe('InternalError: Unexpected internal error');
    });

    it('should refuse duplicate and late registrations', () => {
        const registry = new ToolRegistry();
        const handler: ToolHandler = async () => 'ok';

        registry.register(SEARCH, handler);
        expect(() => registry.register(SEARCH, handler)).toThrow('Tool already registered: search_things');

        registry.seal();
        expect(registry.isSealed).toBe(true);
        expect(() => registry.register({ ...SEARCH, name: 'other' }, handler)).toThrow('Registry is sealed; cannot register other');
    });

    it('should refuse malformed descriptors', () => {
        const registry = new ToolRegistry();
        const handler: ToolHandler = async () => 'ok';

        expect(() => registry.register(
            {
                name: 'broken',
                description: 'Broken.',
                params: [
                    { name: 'a', type: 'string', description: 'a' },
                    { name: 'a', type: 'integer', description: 'a' },
                ],
            },
            handler
        )).toThrow('broken: duplicate parameter a');
        expect(() => registry.register(
            { name: 'broken', description: 'Broken.', params: [{ name: 'q', type: 'string', description: 'q', required: true, default: 'x' }] },
            handler
        )).toThrow('broken: required parameter q has a default');
    });

    it('should list descriptors in registration order', () => {
        const registry = new ToolRegistry();
        registry.register({ name: 'b', description: 'B.', params: [] }, async () => 'b');
        registry.register({ name: 'a', description: 'A.', params: [] }, async () => 'a');

        expect(registry.describe().map((descriptor) => descriptor.name)).toEqual(['b', 'a']);
        expect(registry.has('a')).toBe(true);
        expect(registry.has('c')).toBe(false);
    });
});

describe('toJsonSchema', () => {
    it('should advertise every declared parameter', () => {
        expect(toJsonSchema(SEARCH)).toEqual({
            type: 'object',
            properties: {
                query: { type: 'string', description: 'Search text' },
                max_results: { type: 'integer', description: 'Maximum results', minimum: 1, maximum: 50, default: 10 },
                sort: { type: 'string', description: 'Order', enum: ['relevance', 'date'], default: 'relevance' },
                exact: { type: 'boolean', description: 'Exact match', default: false },
                tags: { type: 'array', items: { type: 'string' }, description: 'Tags (list or comma-separated string)' },
            },
            required: ['query'],
        });
    });
});
