import type { ToolRegistry } from '../registry/tool-registry.js';
import { orderedRange, readInt, readOptionalInt, readString } from '../registry/params.js';
import { ScholarClient } from '../sources/scholar.js';
import { toWire } from '../sources/utils.js';
import type { ToolDependencies } from './dependencies.js';

export function registerScholarTools(registry: ToolRegistry, deps: ToolDependencies): void {
    const { config, httpClient } = deps;
    const client = new ScholarClient(httpClient, config.scholar, config.credentials);

    registry.register(
        {
            name: 'search_scholar',
            description: 'Search Google Scholar (via SerpAPI) for papers, with optional publication year bounds.',
            params: [
                { name: 'query', type: 'string', description: 'Search query', required: true, nonEmpty: true },
                { name: 'year_from', type: 'integer', description: 'Earliest publication year', minimum: 1900, maximum: 2100 },
                { name: 'year_to', type: 'integer', description: 'Latest publication year', minimum: 1900, maximum: 2100 },
                {
                    name: 'num_results',
                    type: 'integer',
                    description: 'Number of results',
                    default: 10,
                    minimum: 1,
                    maximum: config.scholar.maxResults,
                },
            ],
            check: orderedRange('year_from', 'year_to'),
        },
        async (args, { signal }) => {
            const results = await client.search(
                {
                    query: readString(args, 'query'),
                    yearFrom: readOptionalInt(args, 'year_from'),
                    yearTo: readOptionalInt(args, 'year_to'),
                    numResults: readInt(args, 'num_results'),
                },
                { signal }
            );
            return {
                query: results.query,
                total_results: results.totalResults,
                papers: results.papers.map(toWire),
            };
        }
    );
}
