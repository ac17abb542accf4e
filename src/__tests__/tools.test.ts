import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { describe, it, expect } from 'vitest';
import { createSummarizer } from '../llm/summarizer.js';
import { createMcpServer, toCallToolResult } from '../server/mcp-server.js';
import { bgsCommodityFor } from '../tools/cmm-tools.js';
import { buildRegistry } from '../tools/index.js';
import type { Credentials, ServerName } from '../types/index.js';
import {
    calledBody,
    calledUrl,
    jsonFixture,
    jsonResponse,
    mockFetch,
    readFixture,
    testConfig,
    testHttpClient,
    textResponse,
    type FetchMock,
} from './helpers.js';

function registryFor(servers: ServerName[], credentials: Credentials = {}) {
    const config = testConfig(credentials);
    const httpClient = testHttpClient();
    return buildRegistry(servers, { config, httpClient, summarizer: createSummarizer(config, httpClient) });
}

function firstDataset(): unknown {
    const fixture = jsonFixture('edx-search.json');
    const result = typeof fixture === 'object' && fixture !== null && 'result' in fixture ? fixture.result : null;
    const results = typeof result === 'object' && result !== null && 'results' in result ? result.results : [];
    return Array.isArray(results) ? results[0] : null;
}

/**
 * Answer every request through `route`, by URL and request body.
 */
function routeFetch(fetchMock: FetchMock, route: (url: URL, body: string) => Response): void {
    fetchMock.mockImplementation(async (input, init) => route(new URL(String(input)), String(init?.body)));
}

function openAiAnswer(content: string, finishReason = 'stop'): Response {
    return jsonResponse({
        model: 'gpt-4o-2024-08-06',
        choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: finishReason }],
    });
}

/** package_search answer over three small CLAIMM submissions */
function claimmSample(): Response {
    return jsonResponse({
        success: true,
        result: {
            count: 3,
            results: [
                {
                    id: 'a',
                    title: 'Brine Lithium Survey',
                    notes: 'Produced water brine samples',
                    tags: [{ name: 'lithium' }, { name: 'brine' }, { name: 'coal' }],
                    resources: [{ id: 'r1', format: 'CSV' }, { id: 'r2', format: 'CSV' }, { id: 'r3' }],
                },
                {
                    id: 'b',
                    title: 'Fly Ash Leaching',
                    notes: 'Coal fly ash tests',
                    tags: [{ name: 'coal' }, { name: 'ash' }],
                    resources: [{ id: 'r4', format: 'PDF' }],
                },
                { id: 'c', title: 'Field Notes', tags: [], resources: [] },
            ],
        },
    });
}

describe('buildRegistry', () => {
    it('should register the tools of the chosen servers only', () => {
        const registry = registryFor(['scholar', 'arxiv', 'scholar']);

        expect(registry.isSealed).toBe(true);
        expect(registry.describe().map((tool) => tool.name)).toEqual([
            'search_scholar',
            'search_arxiv',
            'get_arxiv_paper',
            'summarize_paper_with_llm',
            'search_and_summarize',
        ]);
    });

    it('should register every server without name clashes', () => {
        expect(registryFor(['arxiv', 'bgs', 'claimm', 'cmm', 'comtrade', 'scholar']).describe()).toHaveLength(34);
    });
});

describe('CLAIMM tools', () => {
    it('should scope searches to CLAIMM and list datasets with their files', async () => {
        const fetchMock = mockFetch(jsonResponse(jsonFixture('edx-search.json')));

        const result = await registryFor(['claimm']).invoke('search_claimm_data', { query: 'ree' });

        expect(calledUrl(fetchMock).searchParams.get('q')).toBe('claimm ree');
        expect(result).toEqual({
            ok: true,
            output: [
                '**CLAIMM search: "ree"** (2 found)',
                '',
                '1. **REE in Coal Tailings**',
                '   - Dataset ID: `ds-1`',
                '   - Rare earth concentrations in tailings.',
                '   - ree_samples.csv (CSV): https://edx.netl.doe.gov/resource/res-1/download',
                '   - res-2 (PDF): https://edx.netl.doe.gov/resource/res-2/download',
                '',
                '2. **untitled-dataset**',
                '   - Dataset ID: `ds-2`',
                '',
            ].join('\n'),
        });
    });

    it('should build download URLs without a request', async () => {
        const fetchMock = mockFetch();

        const result = await registryFor(['claimm']).invoke('get_download_url', { resource_id: 'res-1' });

        expect(result).toEqual({ ok: true, output: 'https://edx.netl.doe.gov/resource/res-1/download' });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should summarize a dataset with the requested provider', async () => {
        const fetchMock = mockFetch(
            jsonResponse({ success: true, result: firstDataset() }),
            jsonResponse({
                model: 'gpt-4o-2024-08-06',
                choices: [{ index: 0, message: { role: 'assistant', content: 'Tailings hold REE.' }, finish_reason: 'stop' }],
            })
        );

        const result = await registryFor(['claimm'], { openaiApiKey: 'test-secret' }).invoke('summarize_dataset', { dataset_id: 'ds-1' });

        expect(calledUrl(fetchMock, 0).pathname).toBe('/api/3/action/package_show');
        expect(calledBody(fetchMock, 1)).toMatchObject({
            model: 'gpt-4o',
            messages: [
                { role: 'system' },
                { role: 'user', content: expect.stringContaining('Tags: ree, coal\n\nFiles:\n- ree_samples.csv (CSV): Sample concentrations\n- res-2 (PDF)') },
            ],
        });
        expect(result).toEqual({
            ok: true,
            output: [
                'Summary of CLAIMM dataset: REE in Coal Tailings',
                'Generated using: openai (gpt-4o)',
                '',
                'Tailings hold REE.',
                '',
                '---',
                'Dataset ID: ds-1',
            ].join('\n'),
        });
    });

    it('should report a missing LLM key before fetching the dataset', async () => {
        const fetchMock = mockFetch();

        const result = await registryFor(['claimm']).invoke('summarize_dataset', { dataset_id: 'ds-1', llm_provider: 'anthropic' });

        expect(result).toEqual({
            ok: false,
            error: {
                kind: 'HandlerError',
                reason: 'AuthError: ANTHROPIC_API_KEY is not set',
                operation: 'summarize_dataset',
                cause: { kind: 'AuthError', reason: 'ANTHROPIC_API_KEY is not set' },
            },
        });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should keep only files of the requested format', async () => {
        mockFetch(jsonResponse(jsonFixture('edx-search.json')));

        const result = await registryFor(['claimm']).invoke('search_claimm_data', { query: 'ree', format_filter: 'csv' });

        expect(result).toEqual({
            ok: true,
            output: [
                '**CLAIMM search: "ree"** (1 found)',
                '',
                '1. **REE in Coal Tailings**',
                '   - Dataset ID: `ds-1`',
                '   - Rare earth concentrations in tailings.',
                '   - ree_samples.csv (CSV): https://edx.netl.doe.gov/resource/res-1/download',
                '',
            ].join('\n'),
        });
    });

    it('should say when no file has the requested format', async () => {
        mockFetch(jsonResponse(jsonFixture('edx-search.json')));

        const result = await registryFor(['claimm']).invoke('search_claimm_data', { query: 'ree', format_filter: 'xlsx' });

        expect(result).toEqual({ ok: true, output: 'No CLAIMM datasets found for "ree" with xlsx files.' });
    });

    it('should search files by name and format', async () => {
        const fetchMock = mockFetch(jsonResponse({
            success: true,
            result: {
                count: 12,
                results: [
                    { id: 'res-1', name: 'ree_samples.csv', format: 'CSV', size: 2048, package_id: 'ds-1', description: 'Sample concentrations' },
                    { id: 'res-3', name: 'assays.csv', format: 'CSV' },
                ],
            },
        }));

        const result = await registryFor(['claimm']).invoke('search_resources', { query: 'samples', format_filter: 'csv', limit: 2 });

        const url = calledUrl(fetchMock);
        expect(url.pathname).toBe('/api/3/action/resource_search');
        expect(url.searchParams.getAll('query')).toEqual(['name:samples', 'format:CSV']);
        expect(url.searchParams.get('limit')).toBe('2');
        expect(result).toEqual({
            ok: true,
            output: {
                count: 12,
                returned: 2,
                resources: [
                    {
                        id: 'res-1',
                        name: 'ree_samples.csv',
                        description: 'Sample concentrations',
                        format: 'CSV',
                        size: 2048,
                        download_url: 'https://edx.netl.doe.gov/resource/res-1/download',
                        dataset_id: 'ds-1',
                    },
                    {
                        id: 'res-3',
                        name: 'assays.csv',
                        description: null,
                        format: 'CSV',
                        size: null,
                        download_url: 'https://edx.netl.doe.gov/resource/res-3/download',
                        dataset_id: null,
                    },
                ],
            },
        });
    });

    it('should require a name or a format for a file search', async () => {
        const fetchMock = mockFetch();

        const result = await registryFor(['claimm']).invoke('search_resources', {});

        expect(result).toEqual({
            ok: false,
            error: { kind: 'ValidationError', reason: 'query: give a query, a format_filter or both', param: 'query' },
        });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should count formats and tags across submissions', async () => {
        const fetchMock = mockFetch(claimmSample());

        const result = await registryFor(['claimm']).invoke('get_claimm_statistics', {});

        expect(calledUrl(fetchMock).searchParams.get('q')).toBe('claimm');
        expect(calledUrl(fetchMock).searchParams.get('rows')).toBe('200');
        expect(result).toEqual({
            ok: true,
            output: {
                total_datasets: 3,
                total_resources: 4,
                formats: [
                    { format: 'CSV', count: 2 },
                    { format: 'Unknown', count: 1 },
                    { format: 'PDF', count: 1 },
                ],
                top_tags: [
                    { tag: 'coal', count: 2 },
                    { tag: 'lithium', count: 1 },
                    { tag: 'brine', count: 1 },
                    { tag: 'ash', count: 1 },
                ],
            },
        });
    });

    it('should group datasets under the first matching topic', async () => {
        mockFetch(claimmSample());

        const result = await registryFor(['claimm']).invoke('get_datasets_by_category', {});

        expect(result).toEqual({
            ok: true,
            output: {
                total_datasets: 3,
                category_counts: { 'Produced Water': 1, 'Coal & Coal Byproducts': 1, Other: 1 },
                categories: {
                    'Produced Water': [{ id: 'a', title: 'Brine Lithium Survey', resource_count: 3 }],
                    'Coal & Coal Byproducts': [{ id: 'b', title: 'Fly Ash Leaching', resource_count: 1 }],
                    Other: [{ id: 'c', title: 'Field Notes', resource_count: 0 }],
                },
            },
        });
    });

    it('should list matching datasets for a question without an id, with no LLM call', async () => {
        const fetchMock = mockFetch(jsonResponse(jsonFixture('edx-search.json')));

        const result = await registryFor(['claimm']).invoke('ask_about_data', { question: 'what is in tailings' });

        expect(calledUrl(fetchMock).searchParams.get('q')).toBe('claimm what is in tailings');
        expect(calledUrl(fetchMock).searchParams.get('rows')).toBe('5');
        expect(result).toEqual({
            ok: true,
            output: [
                'Based on searching CLAIMM for "what is in tailings", here are relevant datasets:',
                '',
                '- **REE in Coal Tailings** (`ds-1`): Rare earth concentrations in tailings.',
                '- **untitled-dataset** (`ds-2`)',
                '',
                'To get more specific information, please provide a dataset_id or resource_id.',
            ].join('\n'),
        });
        expect(fetchMock).toHaveBeenCalledOnce();
    });

    it('should say when a question matches nothing', async () => {
        mockFetch(jsonResponse({ success: true, result: { count: 0, results: [] } }));

        const result = await registryFor(['claimm']).invoke('ask_about_data', { question: 'unobtainium' });

        expect(result).toEqual({
            ok: true,
            output: "I couldn't find relevant data to answer your question. Try rephrasing or use search_claimm_data first.",
        });
    });

    it('should answer a question about one file even when its dataset is gone', async () => {
        const fetchMock = mockFetch(
            jsonResponse({
                success: true,
                result: { id: 'res-1', name: 'ree_samples.csv', format: 'CSV', package_id: 'ds-gone', description: 'Sample concentrations' },
            }),
            jsonResponse({ success: false, error: { message: 'Not found' } }, 404, 'Not Found'),
            openAiAnswer('Cerium and neodymium.')
        );

        const result = await registryFor(['claimm'], { openaiApiKey: 'test-secret' }).invoke('ask_about_data', {
            question: 'Which elements were measured?',
            resource_id: 'res-1',
        });

        expect(calledUrl(fetchMock, 1).searchParams.get('id')).toBe('ds-gone');
        expect(calledBody(fetchMock, 2)).toMatchObject({
            messages: [
                { role: 'system' },
                {
                    role: 'user',
                    content: expect.stringContaining(
                        'Question: Which elements were measured?\n\n' +
                            'File: ree_samples.csv\n\nFormat: CSV\n\nSize: Unknown size\n\nDescription:\nSample concentrations'
                    ),
                },
            ],
        });
        expect(result).toEqual({
            ok: true,
            output: ['**Question:** Which elements were measured?', 'Answered using: openai (gpt-4o)', '', 'Cerium and neodymium.'].join('\n'),
        });
    });

    it('should check the LLM key before looking up the dataset a question names', async () => {
        const fetchMock = mockFetch();

        const result = await registryFor(['claimm']).invoke('ask_about_data', { question: 'What was sampled?', dataset_id: 'ds-1' });

        expect(result).toMatchObject({ ok: false, error: { kind: 'HandlerError', cause: { kind: 'AuthError' } } });
        expect(fetchMock).not.toHaveBeenCalled();
    });
});

describe('arXiv tools', () => {
    it('should list search results through the registry', async () => {
        const fetchMock = mockFetch(textResponse(readFixture('arxiv-transformer-feed.xml')));

        const result = await registryFor(['arxiv']).invoke('search_arxiv', { query: 'transformer attention', max_results: 2 });

        expect(calledUrl(fetchMock).searchParams.get('search_query')).toBe('all:transformer attention');
        expect(calledUrl(fetchMock).searchParams.get('max_results')).toBe('2');
        const lines = result.ok && typeof result.output === 'string' ? result.output.split('\n') : [];
        expect(lines[0]).toBe("Found 2 papers matching 'transformer attention':");
        expect(lines.filter((line) => /^\d+\. Title: /.test(line))).toEqual([
            '1. Title: Sparse Attention for Ore Grade Logs',
            '2. Title: Transformer Models for Mineral Spectra',
        ]);
    });

    it('should report an unknown paper as NotFound', async () => {
        mockFetch(textResponse('<feed xmlns="http://www.w3.org/2005/Atom"><title>empty</title></feed>'));

        const result = await registryFor(['arxiv']).invoke('get_arxiv_paper', { arxiv_id: '2401.99999' });

        expect(result).toEqual({
            ok: false,
            error: {
                kind: 'HandlerError',
                reason: 'NotFound: Paper not found: 2401.99999',
                operation: 'get_arxiv_paper',
                cause: { kind: 'NotFound', reason: 'Paper not found: 2401.99999' },
            },
        });
    });

    it.each([
        ['summarize_paper_with_llm', { arxiv_id: '2401.10001' }],
        ['search_and_summarize', { query: 'transformer attention' }],
    ])('%s should fail on a missing LLM key before calling arXiv', async (tool, args) => {
        const fetchMock = mockFetch();

        const result = await registryFor(['arxiv']).invoke(tool, args);

        expect(result).toEqual({
            ok: false,
            error: {
                kind: 'HandlerError',
                reason: 'AuthError: OPENAI_API_KEY is not set',
                operation: tool,
                cause: { kind: 'AuthError', reason: 'OPENAI_API_KEY is not set' },
            },
        });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should summarize the top papers in search order and isolate a failed summary', async () => {
        const fetchMock = mockFetch(textResponse(readFixture('arxiv-transformer-feed.xml')));
        routeFetch(fetchMock, (_url, body) => {
            if (body.includes('Transformer Models for Mineral Spectra')) {
                return openAiAnswer('Cut short', 'length');
            }
            return openAiAnswer(body.includes('Sparse Attention for Ore Grade Logs') ? 'First summary.' : 'Third summary.');
        });

        const result = await registryFor(['arxiv'], { openaiApiKey: 'test-secret' }).invoke('search_and_summarize', {
            query: 'transformer attention',
            max_papers: 3,
        });

        const rule = '='.repeat(80);
        expect(calledUrl(fetchMock).searchParams.get('max_results')).toBe('3');
        expect(fetchMock).toHaveBeenCalledTimes(4);
        expect(result).toEqual({
            ok: true,
            output: [
                "Search query: 'transformer attention'",
                'Summaries for the top 3 papers',
                rule,
                '',
                '1. Sparse Attention for Ore Grade Logs (arXiv 2401.10001v1)',
                '',
                'Generated using: openai (gpt-4o)',
                '',
                'First summary.',
                rule,
                '',
                '2. Transformer Models for Mineral Spectra (arXiv 2401.10002v2)',
                '',
                'Summary failed: ProviderError: OpenAI answer was cut off at the token limit',
                rule,
                '',
                '3. Attention Maps over Tailings Imagery (arXiv 2401.10003v1)',
                '',
                'Generated using: openai (gpt-4o)',
                '',
                'Third summary.',
                rule,
            ].join('\n'),
        });
    });
});

describe('CMM tools', () => {
    it('should pick the BGS commodity from the first known mineral term', () => {
        expect(bgsCommodityFor('Rare Earth supply')).toBe('rare earth minerals');
        expect(bgsCommodityFor('nickel and cobalt')).toBe('cobalt, mine');
        expect(bgsCommodityFor('tailings')).toBeNull();
    });

    it('should search both sources and keep a failing source to its own entry', async () => {
        const fetchMock = mockFetch();
        routeFetch(fetchMock, (url) =>
            url.hostname === 'edx.netl.doe.gov'
                ? jsonResponse(jsonFixture('edx-search.json'))
                : jsonResponse({}, 500, 'Server Error')
        );

        const result = await registryFor(['cmm']).invoke('search_all_sources', { query: 'lithium brines', limit: 5 });

        const bgsUrl = fetchMock.mock.calls
            .map((_call, index) => calledUrl(fetchMock, index))
            .find((url) => url.hostname === 'ogcapi.bgs.ac.uk');
        expect(bgsUrl?.searchParams.get('bgs_commodity_trans')).toBe('lithium minerals');
        expect(result).toMatchObject({
            ok: true,
            output: {
                query: 'lithium brines',
                sources: {
                    CLAIMM: { count: 2, datasets: [{ id: 'ds-1', title: 'REE in Coal Tailings' }, { id: 'ds-2' }] },
                    BGS: { error: 'NetworkError: HTTP 500: Server Error' },
                },
            },
        });
    });

    it('should skip BGS when the query names no mineral', async () => {
        const fetchMock = mockFetch();

        const result = await registryFor(['cmm']).invoke('search_all_sources', { query: 'tailings', sources: 'bgs' });

        expect(result).toEqual({
            ok: true,
            output: {
                query: 'tailings',
                sources: { BGS: { message: 'Specify a mineral (lithium, cobalt, nickel, etc.) for BGS data' } },
            },
        });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should reject unknown sources', async () => {
        const fetchMock = mockFetch();

        const result = await registryFor(['cmm']).invoke('search_all_sources', { query: 'lithium', sources: ['USGS'] });

        expect(result).toEqual({
            ok: false,
            error: { kind: 'ValidationError', reason: 'sources: unknown source "USGS"; use CLAIMM or BGS', param: 'sources' },
        });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should describe both sources with the CLAIMM topic counts', async () => {
        mockFetch(claimmSample());

        const result = await registryFor(['cmm']).invoke('get_data_overview', {});

        expect(result).toMatchObject({
            ok: true,
            output: {
                sources: {
                    CLAIMM: {
                        name: 'NETL EDX CLAIMM',
                        categories: { 'Produced Water': 1, 'Coal & Coal Byproducts': 1, Other: 1 },
                    },
                    BGS: { name: 'BGS World Mineral Statistics', time_range: '1970-2023' },
                },
            },
        });
    });

    it('should still describe the sources when the CLAIMM counts fail', async () => {
        mockFetch(jsonResponse({}, 500, 'Server Error'));

        const result = await registryFor(['cmm']).invoke('get_data_overview', {});

        expect(result).toMatchObject({
            ok: true,
            output: { sources: { CLAIMM: { categories_error: 'NetworkError: HTTP 500: Server Error' } } },
        });
    });
});

describe('Comtrade tools', () => {
    it('should list the critical minerals without a request', async () => {
        const fetchMock = mockFetch();

        const result = await registryFor(['comtrade']).invoke('list_critical_minerals', {});

        expect(result.ok).toBe(true);
        expect(result.ok && typeof result.output === 'object' ? result.output['count'] : null).toBeGreaterThan(0);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should reject HS levels other than 2, 4 and 6', async () => {
        const fetchMock = mockFetch();

        const result = await registryFor(['comtrade']).invoke('list_commodity_codes', { hs_level: 3 });

        expect(result).toEqual({
            ok: false,
            error: { kind: 'ValidationError', reason: 'hs_level: must be one of 2, 4, 6', param: 'hs_level' },
        });
        expect(fetchMock).not.toHaveBeenCalled();
    });
});

describe('BGS tools', () => {
    it('should reject a year range that runs backwards before any request', async () => {
        const fetchMock = mockFetch();

        const result = await registryFor(['bgs']).invoke('search_production', {
            commodity: 'lithium minerals',
            year_from: 2022,
            year_to: 2015,
        });

        expect(result).toEqual({
            ok: false,
            error: { kind: 'ValidationError', reason: 'year_from: must not be after year_to', param: 'year_from' },
        });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should require at least one country to compare', async () => {
        const fetchMock = mockFetch();

        const result = await registryFor(['bgs']).invoke('compare_countries', { commodity: 'lithium minerals', countries: [] });

        expect(result).toEqual({
            ok: false,
            error: { kind: 'ValidationError', reason: 'countries: must name at least 1 item', param: 'countries' },
        });
        expect(fetchMock).not.toHaveBeenCalled();
    });
});

describe('toCallToolResult', () => {
    it('should pass text through and pretty-print structured output', () => {
        expect(toCallToolResult({ ok: true, output: 'plain' })).toEqual({ content: [{ type: 'text', text: 'plain' }] });
        expect(toCallToolResult({ ok: true, output: { count: 1 } })).toEqual({
            content: [{ type: 'text', text: '{\n  "count": 1\n}' }],
        });
    });

    it('should flag failures with kind and reason', () => {
        expect(toCallToolResult({ ok: false, error: { kind: 'ValidationError', reason: 'query: is required', param: 'query' } })).toEqual({
            content: [{ type: 'text', text: 'ValidationError: query: is required' }],
            isError: true,
        });
    });
});

describe('MCP server', () => {
    async function connect() {
        const server = createMcpServer(registryFor(['claimm']));
        const client = new Client({ name: 'test-client', version: '1.0.0' });
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        await server.connect(serverTransport);
        await client.connect(clientTransport);
        return { client, server };
    }

    it('should advertise tools with their input schemas', async () => {
        const { client, server } = await connect();

        const { tools } = await client.listTools();

        expect(tools.map((tool) => tool.name)).toEqual([
            'search_claimm_data',
            'list_claimm_datasets',
            'get_dataset_details',
            'get_resource_details',
            'get_download_url',
            'search_resources',
            'get_claimm_statistics',
            'get_datasets_by_category',
            'ask_about_data',
            'summarize_dataset',
        ]);
        expect(tools[4]?.inputSchema).toEqual({
            type: 'object',
            properties: { resource_id: { type: 'string', description: 'EDX resource (file) id' } },
            required: ['resource_id'],
        });

        await client.close();
        await server.close();
    });

    it('should answer tool calls and mark failures', async () => {
        mockFetch();
        const { client, server } = await connect();

        const ok = await client.callTool({ name: 'get_download_url', arguments: { resource_id: 'res-9' } });
        const failed = await client.callTool({ name: 'get_download_url', arguments: {} });

        expect(ok.content).toEqual([{ type: 'text', text: 'https://edx.netl.doe.gov/resource/res-9/download' }]);
        expect(failed).toMatchObject({
            content: [{ type: 'text', text: 'ValidationError: resource_id: is required' }],
            isError: true,
        });

        await client.close();
        await server.close();
    });
});
