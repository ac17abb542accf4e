import type { ToolRegistry } from '../registry/tool-registry.js';
import { readEnum, readInt, readString } from '../registry/params.js';
import { ArxivClient } from '../sources/arxiv.js';
import { formatPaperBrief, formatPaperDetail, paperSummaryInstruction } from '../format/papers.js';
import { RULE, THIN_RULE } from '../format/text.js';
import { searchAndSummarize, MAX_SUMMARIZED_ITEMS } from '../workflow/search-and-summarize.js';
import { ARXIV_SORT_OPTIONS, LLM_PROVIDERS } from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';
import type { ToolDependencies } from './dependencies.js';
import { llmParams } from './llm-params.js';

export function registerArxivTools(registry: ToolRegistry, deps: ToolDependencies): void {
    const { config, httpClient, summarizer } = deps;
    const client = new ArxivClient(httpClient, config.arxiv);

    registry.register(
        {
            name: 'search_arxiv',
            description:
                'Search arXiv for papers. Field prefixes such as ti:, au: and abs: are supported ' +
                '(e.g. "ti:transformer AND au:vaswani"); other queries search all fields.',
            params: [
                { name: 'query', type: 'string', description: 'Search query', required: true, nonEmpty: true },
                {
                    name: 'max_results',
                    type: 'integer',
                    description: 'Maximum number of papers to return',
                    default: 10,
                    minimum: 1,
                    maximum: config.arxiv.maxResults,
                },
                {
                    name: 'sort_by',
                    type: 'string',
                    description: 'Sort order',
                    enum: ARXIV_SORT_OPTIONS,
                    default: config.arxiv.defaultSort,
                },
            ],
        },
        async (args, { signal }) => {
            const query = readString(args, 'query');
            const papers = await client.search(
                query,
                readInt(args, 'max_results'),
                readEnum(args, 'sort_by', ARXIV_SORT_OPTIONS),
                { signal }
            );

            if (papers.length === 0) {
                return `No papers found matching query: '${query}'`;
            }

            const lines = [`Found ${papers.length} papers matching '${query}':`, RULE];
            papers.forEach((paper, index) => {
                lines.push('', `${index + 1}. ${formatPaperBrief(paper)}`, THIN_RULE);
            });
            return lines.join('\n');
        }
    );

    registry.register(
        {
            name: 'get_arxiv_paper',
            description: 'Get full details of one arXiv paper, including its abstract.',
            params: [
                {
                    name: 'arxiv_id',
                    type: 'string',
                    description: 'arXiv identifier, e.g. "2301.07041" or "cs.AI/0001001"',
                    required: true,
                    nonEmpty: true,
                },
            ],
        },
        async (args, { signal }) => {
            const id = readString(args, 'arxiv_id');
            const paper = await client.getById(id, { signal });
            if (!paper) {
                throw new NotFoundError(`Paper not found: ${id}`);
            }
            return formatPaperDetail(paper);
        }
    );

    registry.register(
        {
            name: 'summarize_paper_with_llm',
            description:
                'Fetch an arXiv paper and summarize its problem, method, findings and significance with an LLM.',
            params: [
                {
                    name: 'arxiv_id',
                    type: 'string',
                    description: 'arXiv identifier of the paper to summarize',
                    required: true,
                    nonEmpty: true,
                },
                ...llmParams(config.llm.defaultProvider),
            ],
        },
        async (args, { signal }) => {
            const provider = readEnum(args, 'llm_provider', LLM_PROVIDERS);
            summarizer.requireCredential(provider);

            const id = readString(args, 'arxiv_id');
            const paper = await client.getById(id, { signal });
            if (!paper) {
                throw new NotFoundError(`Paper not found: ${id}`);
            }

            const summary = await summarizer.summarize(
                formatPaperDetail(paper),
                provider,
                readString(args, 'model'),
                { instruction: paperSummaryInstruction(), signal }
            );

            return [
                `Summary of arXiv paper: ${paper.id}`,
                `Generated using: ${summary.provider} (${summary.model})`,
                '',
                summary.text,
                '',
                '---',
                `Original paper: http://arxiv.org/abs/${paper.id}`,
            ].join('\n');
        }
    );

    registry.register(
        {
            name: 'search_and_summarize',
            description: 'Search arXiv and summarize the top matching papers with an LLM.',
            params: [
                { name: 'query', type: 'string', description: 'Search query', required: true, nonEmpty: true },
                {
                    name: 'max_papers',
                    type: 'integer',
                    description: 'Number of top papers to summarize',
                    default: 3,
                    minimum: 1,
                    maximum: MAX_SUMMARIZED_ITEMS,
                },
                ...llmParams(config.llm.defaultProvider).filter((param) => param.name === 'llm_provider'),
            ],
        },
        async (args, { signal }) => {
            const query = readString(args, 'query');
            const provider = readEnum(args, 'llm_provider', LLM_PROVIDERS);
            summarizer.requireCredential(provider);
            const maxItems = readInt(args, 'max_papers');

            const items = await searchAndSummarize({
                search: (abort) => client.search(query, maxItems, config.arxiv.defaultSort, { signal: abort }),
                summarize: (paper, abort) =>
                    summarizer.summarize(formatPaperDetail(paper), provider, undefined, {
                        instruction: paperSummaryInstruction(),
                        signal: abort,
                    }),
                maxItems,
                signal,
            });

            if (items.length === 0) {
                return `No papers found matching query: '${query}'`;
            }

            const lines = [`Search query: '${query}'`, `Summaries for the top ${items.length} papers`, RULE];
            items.forEach((item, index) => {
                lines.push('', `${index + 1}. ${item.record.title} (arXiv ${item.record.id})`, '');
                if ('summary' in item) {
                    lines.push(`Generated using: ${item.summary.provider} (${item.summary.model})`, '', item.summary.text);
                } else {
                    lines.push(`Summary failed: ${item.error.kind}: ${item.error.reason}`);
                }
                lines.push(RULE);
            });
            return lines.join('\n');
        }
    );
}
