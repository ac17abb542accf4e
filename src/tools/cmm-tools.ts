import type { Logger } from 'pino';
import type { ToolRegistry } from '../registry/tool-registry.js';
import { readInt, readList, readString } from '../registry/params.js';
import { BgsClient } from '../sources/bgs.js';
import { categorizeDatasets, EdxClient } from '../sources/edx.js';
import { toWire } from '../sources/utils.js';
import { getReferenceData } from '../data/reference.js';
import type { JsonValue, ToolArgs } from '../types/index.js';
import { describeError, NetworkError, ValidationError } from '../utils/errors.js';
import type { ToolDependencies } from './dependencies.js';

type JsonObject = { [key: string]: JsonValue };

export type CmmSource = 'CLAIMM' | 'BGS';

export const CMM_SOURCES: readonly CmmSource[] = ['CLAIMM', 'BGS'];

const CLAIMM_KEYWORD = 'claimm';

/** Datasets sampled for the CLAIMM category counts */
const OVERVIEW_SAMPLE = 200;

/**
 * BGS commodity for the first known mineral term found in a free-text query.
 */
export function bgsCommodityFor(query: string): string | null {
    const lower = query.toLowerCase();
    const match = getReferenceData().cmm.bgsCommodities.find((entry) => lower.includes(entry.term));
    return match ? match.commodity : null;
}

/**
 * Cross-source tools over CLAIMM (NETL EDX) and BGS World Mineral Statistics.
 */
export function registerCmmTools(registry: ToolRegistry, deps: ToolDependencies): void {
    const { config, httpClient } = deps;
    const edx = new EdxClient(httpClient, config.edx, config.credentials);
    const bgs = new BgsClient(httpClient, config.bgs);

    registry.register(
        {
            name: 'search_all_sources',
            description:
                'Search CLAIMM datasets and BGS production statistics in one call. ' +
                'BGS is searched when the query names a mineral such as lithium, cobalt or nickel.',
            params: [
                { name: 'query', type: 'string', description: 'Search query', required: true, nonEmpty: true },
                {
                    name: 'sources',
                    type: 'string[]',
                    description: `Sources to search: ${CMM_SOURCES.join(', ')}`,
                    default: [...CMM_SOURCES],
                    minItems: 1,
                },
                {
                    name: 'limit',
                    type: 'integer',
                    description: 'Maximum results per source',
                    default: 20,
                    minimum: 1,
                    maximum: Math.min(config.edx.maxResults, config.bgs.maxResults),
                },
            ],
            check: checkSources,
        },
        async (args, { signal, logger }) => {
            const query = readString(args, 'query');
            const limit = readInt(args, 'limit');
            const wanted = readSources(args);

            const searches = wanted.map(async (source): Promise<[CmmSource, JsonObject]> => {
                if (source === 'CLAIMM') {
                    return [source, await isolate(source, signal, logger, async () => {
                        const datasets = await edx.searchDatasets({ query: `${CLAIMM_KEYWORD} ${query}`, limit }, { signal });
                        return {
                            count: datasets.length,
                            datasets: datasets.map(({ record }) => toWire(record)),
                        };
                    })];
                }

                const commodity = bgsCommodityFor(query);
                if (!commodity) {
                    return [source, { message: 'Specify a mineral (lithium, cobalt, nickel, etc.) for BGS data' }];
                }
                return [source, await isolate(source, signal, logger, async () => {
                    const records = await bgs.searchProduction({ commodity, limit }, { signal });
                    return { commodity, count: records.length, records: records.map(toWire) };
                })];
            });

            const sources: JsonObject = {};
            for (const [source, result] of await Promise.all(searches)) {
                sources[source] = result;
            }
            return { query, sources };
        }
    );

    registry.register(
        {
            name: 'get_data_overview',
            description: 'What the CLAIMM and BGS sources hold: coverage, data types and CLAIMM topic counts.',
            params: [],
        },
        async (_args, { signal, logger }) => {
            const claimm: JsonObject = {
                name: 'NETL EDX CLAIMM',
                description: 'US Critical Minerals and Materials datasets',
                url: 'https://edx.netl.doe.gov/edxapps/claimm/',
                data_types: ['Datasets', 'CSV files', 'Schemas'],
            };

            const categories = await isolate('CLAIMM', signal, logger, async () => {
                const datasets = await edx.searchDatasets(
                    { query: CLAIMM_KEYWORD, limit: Math.min(OVERVIEW_SAMPLE, config.edx.maxResults) },
                    { signal }
                );
                const counts: JsonObject = {};
                for (const category of categorizeDatasets(datasets)) {
                    counts[category.label] = category.datasets.length;
                }
                return counts;
            });
            const failure = categories['error'];
            if (typeof failure === 'string') {
                claimm['categories_error'] = failure;
            } else {
                claimm['categories'] = categories;
            }

            return {
                sources: {
                    CLAIMM: claimm,
                    BGS: {
                        name: 'BGS World Mineral Statistics',
                        description: 'Global mineral production and trade statistics',
                        url: 'https://www.bgs.ac.uk/mineralsuk/statistics/world-mineral-statistics/',
                        data_types: ['Production', 'Imports', 'Exports'],
                        time_range: '1970-2023',
                        commodities: [...getReferenceData().bgs.critical],
                    },
                },
            };
        }
    );
}

function checkSources(args: ToolArgs): void {
    readSources(args);
}

function readSources(args: ToolArgs): CmmSource[] {
    const selected: CmmSource[] = [];
    for (const item of readList(args, 'sources')) {
        const source = CMM_SOURCES.find((name) => name === item.trim().toUpperCase());
        if (!source) {
            throw new ValidationError('sources', `unknown source "${item}"; use ${CMM_SOURCES.join(' or ')}`);
        }
        if (!selected.includes(source)) selected.push(source);
    }
    return selected;
}

/**
 * Run one source's share of a cross-source call. A failure becomes an `error` entry
 * for that source only; cancellation still aborts the whole call.
 */
async function isolate(
    source: CmmSource,
    signal: AbortSignal | undefined,
    logger: Logger,
    work: () => Promise<JsonObject>
): Promise<JsonObject> {
    try {
        return await work();
    } catch (error) {
        if (signal?.aborted) {
            throw new NetworkError('Request was cancelled', 0, {}, { cause: error });
        }
        const { kind, reason } = describeError(error);
        logger.warn({ source, kind, reason }, 'Source search failed');
        return { error: `${kind}: ${reason}` };
    }
}
