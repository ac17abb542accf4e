import type { Logger } from 'pino';
import type { CallOptions, Credentials, SourceClient, SourceConfig, SourceRecord } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { AuthError, NetworkError, ParseError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { ABSENT, arrayAt, isRecord, numberField, objectAt, present, textField } from './utils.js';

export interface ScholarQuery {
    query: string;
    yearFrom?: number;
    yearTo?: number;
    numResults?: number;
}

export interface ScholarResults {
    query: string;
    totalResults: number | null;
    papers: SourceRecord[];
}

/**
 * Google Scholar search through SerpAPI.
 *
 * @see https://serpapi.com/google-scholar-api
 */
export class ScholarClient implements SourceClient {
    readonly sourceId = 'scholar' as const;
    private readonly logger: Logger;

    constructor(
        private readonly httpClient: HttpClient,
        private readonly config: SourceConfig,
        private readonly credentials: Pick<Credentials, 'serpApiKey'> = {}
    ) {
        this.logger = getLogger().child({ source: this.sourceId });
    }

    async search(query: ScholarQuery, options: CallOptions = {}): Promise<ScholarResults> {
        const text = query.query.trim();
        if (!text) {
            throw new ValidationError('query', 'must not be empty');
        }
        const numResults = query.numResults ?? 10;
        if (!Number.isInteger(numResults) || numResults < 1 || numResults > this.config.maxResults) {
            throw new ValidationError('num_results', `must be an integer between 1 and ${this.config.maxResults}`);
        }
        if (query.yearFrom !== undefined && query.yearTo !== undefined && query.yearFrom > query.yearTo) {
            throw new ValidationError('year_from', 'must not be after year_to');
        }

        const apiKey = this.credentials.serpApiKey;
        if (!apiKey) {
            throw new AuthError('SERPAPI_API_KEY is not set');
        }

        const params = new URLSearchParams({ engine: 'google_scholar', q: text, num: String(numResults) });
        if (query.yearFrom !== undefined) params.set('as_ylo', String(query.yearFrom));
        if (query.yearTo !== undefined) params.set('as_yhi', String(query.yearTo));

        this.logger.debug({ query: text, numResults }, 'Scholar query');
        params.set('api_key', apiKey);

        let data: unknown;
        try {
            const response = await this.httpClient.get(`${this.config.baseUrl}?${params.toString()}`, {
                source: this.sourceId,
                headers: { Accept: 'application/json' },
                signal: options.signal,
            });
            data = response.data;
        } catch (error) {
            if (error instanceof NetworkError && (error.status === 401 || error.status === 403)) {
                throw new AuthError('SerpAPI rejected the API key', { cause: error });
            }
            throw error;
        }

        if (!isRecord(data)) {
            throw new ParseError('SerpAPI response is not a JSON object');
        }

        const total = numberField(objectAt(data, 'search_information'), 'total_results');
        return {
            query: text,
            totalResults: total.present ? total.value : null,
            papers: this.parseResults(arrayAt(data, 'organic_results')).slice(0, numResults),
        };
    }

    /**
     * Normalize `organic_results`. Entries without a title are skipped.
     */
    parseResults(results: unknown[]): SourceRecord[] {
        const records: SourceRecord[] = [];

        for (const result of results) {
            const title = textField(result, 'title');
            const resultId = textField(result, 'result_id');
            const link = textField(result, 'link');
            const id = resultId.present ? resultId : link;

            if (!title.present || !id.present) {
                this.logger.warn({ position: isRecord(result) ? result['position'] : null }, 'Skipping Scholar result without id or title');
                continue;
            }

            const publication = objectAt(result, 'publication_info');
            const summary = textField(publication, 'summary');
            const authors = arrayAt(publication, 'authors')
                .map((author) => textField(author, 'name'))
                .flatMap((name) => (name.present ? [name.value] : []));

            const citedBy = objectAt(objectAt(result, 'inline_links'), 'cited_by');

            records.push({
                source: 'scholar',
                id: id.value,
                title: title.value,
                text: {
                    link,
                    snippet: textField(result, 'snippet'),
                    publication: summary,
                },
                numbers: {
                    year: summary.present ? yearInSummary(summary.value) : ABSENT,
                    cited_by: numberField(citedBy, 'total'),
                },
                lists: {
                    authors,
                },
            });
        }

        return records;
    }
}

/**
 * Publication year from a SerpAPI summary such as "J Doe, A Roe - Minerals, 2021 - mdpi.com".
 */
function yearInSummary(summary: string): ReturnType<typeof numberField> {
    const match = summary.match(/\b(19|20)\d{2}\b/);
    return match ? present(parseInt(match[0], 10)) : ABSENT;
}
