import type { ToolRegistry } from '../registry/tool-registry.js';
import { readEnum, readInt, readList, readOptionalString, readString } from '../registry/params.js';
import { categorizeDatasets, EdxClient, filterByFormat, type EdxDataset } from '../sources/edx.js';
import { collapseWhitespace, fieldOr } from '../sources/utils.js';
import { formatNumber, truncate } from '../format/text.js';
import { LLM_PROVIDERS, type JsonValue, type ParamSpec, type SourceRecord, type ToolArgs } from '../types/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { ToolDependencies } from './dependencies.js';
import { llmParams } from './llm-params.js';

/** Keyword that scopes free-text searches to CLAIMM submissions */
const CLAIMM_KEYWORD = 'claimm';

/** Datasets sampled for statistics and categories */
const OVERVIEW_SAMPLE = 200;

/** Datasets listed when a question names no dataset or file */
const QUESTION_MATCHES = 5;

const formatFilterParam: ParamSpec = {
    name: 'format_filter',
    type: 'string',
    description: 'Only files of this format, e.g. "CSV"',
};

const datasetIdParam: ParamSpec = {
    name: 'dataset_id',
    type: 'string',
    description: 'EDX dataset id or name',
    required: true,
    nonEmpty: true,
};

const resourceIdParam: ParamSpec = {
    name: 'resource_id',
    type: 'string',
    description: 'EDX resource (file) id',
    required: true,
    nonEmpty: true,
};

export function registerClaimmTools(registry: ToolRegistry, deps: ToolDependencies): void {
    const { config, httpClient, summarizer } = deps;
    const client = new EdxClient(httpClient, config.edx, config.credentials);

    registry.register(
        {
            name: 'search_claimm_data',
            description:
                'Search CLAIMM datasets on NETL EDX (critical minerals and materials from mine waste and coal by-products).',
            params: [
                { name: 'query', type: 'string', description: 'Free-text search', required: true, nonEmpty: true },
                { name: 'tags', type: 'string[]', description: 'Only datasets carrying all of these tags' },
                {
                    name: 'limit',
                    type: 'integer',
                    description: 'Maximum number of datasets',
                    default: 20,
                    minimum: 1,
                    maximum: config.edx.maxResults,
                },
                formatFilterParam,
            ],
        },
        async (args, { signal }) => {
            const query = readString(args, 'query');
            const format = readOptionalString(args, 'format_filter');
            const found = await client.searchDatasets(
                { query: `${CLAIMM_KEYWORD} ${query}`, tags: readList(args, 'tags'), limit: readInt(args, 'limit') },
                { signal }
            );
            const datasets = format ? filterByFormat(found, format) : found;

            if (datasets.length === 0) {
                return `No CLAIMM datasets found for "${query}"${format ? ` with ${format} files` : ''}.`;
            }

            const lines = [`**CLAIMM search: "${query}"** (${datasets.length} found)`, ''];
            datasets.forEach((dataset, index) => {
                lines.push(`${index + 1}. **${dataset.record.title}**`);
                lines.push(`   - Dataset ID: \`${dataset.record.id}\``);
                const notes = dataset.record.text['notes'];
                if (notes?.present) lines.push(`   - ${truncate(notes.value.replace(/\s+/g, ' '), 200)}`);
                lines.push(...resourceLines(dataset.resources, 5, '   '));
                lines.push('');
            });
            return lines.join('\n');
        }
    );

    registry.register(
        {
            name: 'list_claimm_datasets',
            description: 'List the datasets of the CLAIMM group on EDX.',
            params: [
                {
                    name: 'limit',
                    type: 'integer',
                    description: 'Maximum number of datasets',
                    default: 50,
                    minimum: 1,
                    maximum: config.edx.maxResults,
                },
            ],
        },
        async (args, { signal }) => {
            const datasets = await client.listGroupDatasets(undefined, readInt(args, 'limit'), { signal });
            if (datasets.length === 0) {
                return 'No datasets found in CLAIMM.';
            }

            const lines = [`**CLAIMM Datasets** (${datasets.length} found)`, ''];
            for (const dataset of datasets) {
                const formats = dataset.record.lists['formats'] ?? [];
                const tags = dataset.record.lists['tags'] ?? [];
                lines.push(`- **${dataset.record.title}**`);
                lines.push(`  - ID: \`${dataset.record.id}\``);
                lines.push(`  - Files: ${dataset.resources.length} (${formats.length > 0 ? formats.join(', ') : 'unknown formats'})`);
                lines.push(`  - Tags: ${tags.length > 0 ? tags.slice(0, 5).join(', ') : 'None'}`);
                lines.push(...resourceLines(dataset.resources, 3, '  '));
                lines.push('');
            }
            return lines.join('\n');
        }
    );

    registry.register(
        {
            name: 'get_dataset_details',
            description: 'Full description of one CLAIMM dataset and all of its files.',
            params: [datasetIdParam],
        },
        async (args, { signal }) => formatDataset(await client.getDataset(readString(args, 'dataset_id'), { signal }))
    );

    registry.register(
        {
            name: 'get_resource_details',
            description: 'Details of one file in a CLAIMM dataset, including its download URL.',
            params: [resourceIdParam],
        },
        async (args, { signal }) => {
            const resource = await client.getResource(readString(args, 'resource_id'), { signal });
            return [
                `**${resource.title}**`,
                '',
                '**Details:**',
                `- ID: \`${resource.id}\``,
                `- Format: ${fieldOr(resource.text['format'], 'Unknown')}`,
                `- Size: ${formatSize(resource)}`,
                `- Created: ${fieldOr(resource.text['created'], 'Unknown')}`,
                `- Last Modified: ${fieldOr(resource.text['last_modified'], 'Unknown')}`,
                '',
                '**Description:**',
                fieldOr(resource.text['description'], 'No description available.'),
                '',
                '**Download URL:**',
                fieldOr(resource.text['download_url'], client.getDownloadUrl(resource.id)),
            ].join('\n');
        }
    );

    registry.register(
        {
            name: 'get_download_url',
            description: 'Direct download URL of a CLAIMM file. No request is made.',
            params: [resourceIdParam],
        },
        async (args) => client.getDownloadUrl(readString(args, 'resource_id'))
    );

    registry.register(
        {
            name: 'search_resources',
            description: 'Search individual files across EDX datasets by name and/or format.',
            params: [
                { name: 'query', type: 'string', description: 'Text matched against file names' },
                formatFilterParam,
                {
                    name: 'limit',
                    type: 'integer',
                    description: 'Maximum number of files',
                    default: 20,
                    minimum: 1,
                    maximum: config.edx.maxResults,
                },
            ],
            check: requireQueryOrFormat,
        },
        async (args, { signal }) => {
            const page = await client.searchResources(
                {
                    name: readOptionalString(args, 'query'),
                    format: readOptionalString(args, 'format_filter'),
                    limit: readInt(args, 'limit'),
                },
                { signal }
            );

            return {
                count: page.count,
                returned: page.resources.length,
                resources: page.resources.map(resourceToJson),
            };
        }
    );

    registry.register(
        {
            name: 'get_claimm_statistics',
            description: 'Dataset and file counts, file formats and most used tags across CLAIMM submissions.',
            params: [],
        },
        async (_args, { signal }) => {
            const datasets = await client.searchDatasets(
                { query: CLAIMM_KEYWORD, limit: Math.min(OVERVIEW_SAMPLE, config.edx.maxResults) },
                { signal }
            );

            const formats = new Map<string, number>();
            const tags = new Map<string, number>();
            let totalResources = 0;
            for (const dataset of datasets) {
                totalResources += dataset.resources.length;
                for (const resource of dataset.resources) {
                    increment(formats, fieldOr(resource.text['format'], 'Unknown'));
                }
                for (const tag of dataset.record.lists['tags'] ?? []) {
                    increment(tags, tag);
                }
            }

            return {
                total_datasets: datasets.length,
                total_resources: totalResources,
                formats: rankCounts(formats).map(([format, count]) => ({ format, count })),
                top_tags: rankCounts(tags).slice(0, 20).map(([tag, count]) => ({ tag, count })),
            };
        }
    );

    registry.register(
        {
            name: 'get_datasets_by_category',
            description:
                'CLAIMM datasets grouped by topic (rare earths, produced water, coal by-products, mine waste, ' +
                'lithium, geology, geochemistry).',
            params: [],
        },
        async (_args, { signal }) => {
            const datasets = await client.searchDatasets(
                { query: CLAIMM_KEYWORD, limit: Math.min(OVERVIEW_SAMPLE, config.edx.maxResults) },
                { signal }
            );
            const categories = categorizeDatasets(datasets);

            const counts: { [label: string]: JsonValue } = {};
            const listing: { [label: string]: JsonValue } = {};
            for (const category of categories) {
                counts[category.label] = category.datasets.length;
                listing[category.label] = category.datasets.map(({ record, resources }) => ({
                    id: record.id,
                    title: record.title,
                    resource_count: resources.length,
                }));
            }

            return { total_datasets: datasets.length, category_counts: counts, categories: listing };
        }
    );

    registry.register(
        {
            name: 'ask_about_data',
            description:
                'Answer a question about a CLAIMM dataset or file with an LLM. ' +
                'Without an id, lists datasets matching the question instead.',
            params: [
                { name: 'question', type: 'string', description: 'Question about the data', required: true, nonEmpty: true },
                { name: 'dataset_id', type: 'string', description: 'EDX dataset id or name' },
                { name: 'resource_id', type: 'string', description: 'EDX resource (file) id; takes precedence' },
                ...llmParams(config.llm.defaultProvider),
            ],
        },
        async (args, { signal, logger }) => {
            const question = readString(args, 'question');
            const resourceId = readOptionalString(args, 'resource_id');
            const datasetId = readOptionalString(args, 'dataset_id');

            if (!resourceId && !datasetId) {
                const datasets = await client.searchDatasets(
                    { query: `${CLAIMM_KEYWORD} ${question}`, limit: QUESTION_MATCHES },
                    { signal }
                );
                return matchingDatasetsAnswer(question, datasets);
            }

            const provider = readEnum(args, 'llm_provider', LLM_PROVIDERS);
            summarizer.requireCredential(provider);

            let context: string;
            if (resourceId) {
                const resource = await client.getResource(resourceId, { signal });
                const packageId = fieldOr(resource.text['package_id'], null);
                let parent: EdxDataset | null = null;
                if (packageId) {
                    try {
                        parent = await client.getDataset(packageId, { signal });
                    } catch (error) {
                        if (!(error instanceof NotFoundError)) throw error;
                        logger.warn({ resourceId, packageId }, 'Parent dataset of resource not found');
                    }
                }
                context = resourceText(resource, parent);
            } else {
                context = datasetText(await client.getDataset(datasetId ?? '', { signal }));
            }

            const answer = await summarizer.summarize(context, provider, readString(args, 'model'), {
                instruction:
                    'Answer the question below using only the data description that follows. ' +
                    'If the description does not answer it, say so and suggest which file to inspect.\n\n' +
                    `Question: ${question}`,
                signal,
            });

            return [
                `**Question:** ${question}`,
                `Answered using: ${answer.provider} (${answer.model})`,
                '',
                answer.text,
            ].join('\n');
        }
    );

    registry.register(
        {
            name: 'summarize_dataset',
            description: 'Summarize a CLAIMM dataset (description and file list) with an LLM.',
            params: [datasetIdParam, ...llmParams(config.llm.defaultProvider)],
        },
        async (args, { signal }) => {
            const provider = readEnum(args, 'llm_provider', LLM_PROVIDERS);
            summarizer.requireCredential(provider);

            const dataset = await client.getDataset(readString(args, 'dataset_id'), { signal });
            const summary = await summarizer.summarize(
                datasetText(dataset),
                provider,
                readString(args, 'model'),
                {
                    instruction:
                        'Summarize this dataset for a researcher working on critical minerals. ' +
                        'Describe what was measured, the materials and locations covered, and which files hold the data.',
                    signal,
                }
            );

            return [
                `Summary of CLAIMM dataset: ${dataset.record.title}`,
                `Generated using: ${summary.provider} (${summary.model})`,
                '',
                summary.text,
                '',
                '---',
                `Dataset ID: ${dataset.record.id}`,
            ].join('\n');
        }
    );
}

function requireQueryOrFormat(args: ToolArgs): void {
    if (!readOptionalString(args, 'query') && !readOptionalString(args, 'format_filter')) {
        throw new ValidationError('query', 'give a query, a format_filter or both');
    }
}

function increment(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

/** Entries by descending count; ties keep first-seen order */
function rankCounts(counts: Map<string, number>): Array<[string, number]> {
    return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

// ─── Formatting ─────────────────────────────────────────────

function resourceToJson(resource: SourceRecord): { [key: string]: JsonValue } {
    return {
        id: resource.id,
        name: resource.title,
        description: fieldOr(resource.text['description'], null),
        format: fieldOr(resource.text['format'], null),
        size: fieldOr(resource.numbers['size'], null),
        download_url: fieldOr(resource.text['download_url'], null),
        dataset_id: fieldOr(resource.text['package_id'], null),
    };
}

function matchingDatasetsAnswer(question: string, datasets: EdxDataset[]): string {
    if (datasets.length === 0) {
        return "I couldn't find relevant data to answer your question. Try rephrasing or use search_claimm_data first.";
    }

    const lines = [`Based on searching CLAIMM for "${question}", here are relevant datasets:`, ''];
    for (const { record } of datasets) {
        const notes = record.text['notes'];
        lines.push(`- **${record.title}** (\`${record.id}\`)${notes?.present ? `: ${truncate(collapseWhitespace(notes.value), 200)}` : ''}`);
    }
    lines.push('', 'To get more specific information, please provide a dataset_id or resource_id.');
    return lines.join('\n');
}

function resourceLines(resources: SourceRecord[], limit: number, indent: string): string[] {
    const lines = resources.slice(0, limit).map((resource) => {
        const format = resource.text['format'];
        const formatInfo = format?.present ? ` (${format.value})` : '';
        return `${indent}- ${truncate(resource.title, 50)}${formatInfo}: ${fieldOr(resource.text['download_url'], 'no download link')}`;
    });
    if (resources.length > limit) {
        lines.push(`${indent}- *... and ${resources.length - limit} more files*`);
    }
    return lines;
}

function formatSize(resource: SourceRecord): string {
    const size = resource.numbers['size'];
    return size?.present && size.value > 0 ? `${formatNumber(size.value, 0)} bytes` : 'Unknown size';
}

function formatDataset(dataset: EdxDataset): string {
    const { record, resources } = dataset;
    const tags = record.lists['tags'] ?? [];

    const lines = [
        `**${record.title}**`,
        '',
        '**Description:**',
        fieldOr(record.text['notes'], 'No description available.'),
        '',
        '**Metadata:**',
        `- ID: \`${record.id}\``,
        `- Author: ${fieldOr(record.text['author'], 'Unknown')}`,
        `- Organization: ${fieldOr(record.text['organization'], 'Unknown')}`,
        `- Created: ${fieldOr(record.text['metadata_created'], 'Unknown')}`,
        `- Modified: ${fieldOr(record.text['metadata_modified'], 'Unknown')}`,
        `- Tags: ${tags.length > 0 ? tags.join(', ') : 'None'}`,
        '',
        `**Resources (${resources.length} files):**`,
    ];

    for (const resource of resources) {
        lines.push(
            '',
            `- **${resource.title}**`,
            `  - ID: \`${resource.id}\``,
            `  - Format: ${fieldOr(resource.text['format'], 'Unknown')}`,
            `  - Size: ${formatSize(resource)}`,
            `  - Download: ${fieldOr(resource.text['download_url'], 'Unavailable')}`
        );
    }
    return lines.join('\n');
}

/**
 * Text handed to the LLM: title, description, tags and file list.
 */
function datasetText(dataset: EdxDataset): string {
    const { record, resources } = dataset;
    const parts = [`Title: ${record.title}`];

    const notes = record.text['notes'];
    if (notes?.present) parts.push(`Description:\n${notes.value}`);
    const tags = record.lists['tags'] ?? [];
    if (tags.length > 0) parts.push(`Tags: ${tags.join(', ')}`);

    if (resources.length > 0) {
        parts.push(`Files:\n${resources.map((resource) => {
            const format = fieldOr(resource.text['format'], 'unknown format');
            const description = fieldOr(resource.text['description'], '');
            return `- ${resource.title} (${format})${description ? `: ${description}` : ''}`;
        }).join('\n')}`);
    }
    return parts.join('\n\n');
}

/**
 * Text handed to the LLM for a single file, with its dataset when known.
 */
function resourceText(resource: SourceRecord, parent: EdxDataset | null): string {
    const parts = [
        `File: ${resource.title}`,
        `Format: ${fieldOr(resource.text['format'], 'unknown')}`,
        `Size: ${formatSize(resource)}`,
    ];
    const description = resource.text['description'];
    if (description?.present) parts.push(`Description:\n${description.value}`);
    if (parent) parts.push(`Part of dataset:\n${datasetText(parent)}`);
    return parts.join('\n\n');
}
