import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { Logger } from 'pino';
import type { ArxivConfig, ArxivSortBy, CallOptions, Field, SourceClient, SourceRecord } from '../types/index.js';
import { ARXIV_SORT_OPTIONS } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { ParseError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
    ABSENT,
    arrayAt,
    arxivIdFromUrl,
    collapseWhitespace,
    isArxivId,
    isRecord,
    present,
    stripArxivVersion,
    yearFrom,
} from './utils.js';

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    parseTagValue: false,
    trimValues: true,
    isArray: (name) => ['entry', 'author', 'link', 'category'].includes(name),
});

/**
 * arXiv source client.
 * Queries the Atom export API and normalizes each entry into a SourceRecord.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivClient implements SourceClient {
    readonly sourceId = 'arxiv' as const;
    private readonly logger: Logger;

    constructor(
        private readonly httpClient: HttpClient,
        private readonly config: ArxivConfig
    ) {
        this.logger = getLogger().child({ source: this.sourceId });
    }

    /**
     * Search papers. Queries without a field prefix (ti:, au:, abs:, ...) search all fields.
     */
    async search(
        query: string,
        maxResults = 10,
        sortBy: ArxivSortBy = this.config.defaultSort,
        options: CallOptions = {}
    ): Promise<SourceRecord[]> {
        const trimmed = query.trim();
        if (!trimmed) {
            throw new ValidationError('query', 'must not be empty');
        }
        if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > this.config.maxResults) {
            throw new ValidationError('max_results', `must be an integer between 1 and ${this.config.maxResults}`);
        }
        if (!ARXIV_SORT_OPTIONS.includes(sortBy)) {
            throw new ValidationError('sort_by', `must be one of ${ARXIV_SORT_OPTIONS.join(', ')}`);
        }

        const params = new URLSearchParams({
            search_query: trimmed.includes(':') ? trimmed : `all:${trimmed}`,
            start: '0',
            max_results: String(maxResults),
            sortBy,
            sortOrder: 'descending',
        });

        const records = await this.fetchFeed(`${this.config.baseUrl}?${params.toString()}`, options);
        return records.slice(0, maxResults);
    }

    /**
     * Fetch a single paper. Malformed identifiers are rejected before any request.
     * @returns null when arXiv has no such paper
     */
    async getById(arxivId: string, options: CallOptions = {}): Promise<SourceRecord | null> {
        const id = arxivId.trim();
        if (!isArxivId(id)) {
            throw new ValidationError('arxiv_id', 'must look like 2301.07041 or cs.AI/0001001');
        }

        const params = new URLSearchParams({ id_list: stripArxivVersion(id) });
        const records = await this.fetchFeed(`${this.config.baseUrl}?${params.toString()}`, options);
        return records[0] ?? null;
    }

    /**
     * Parse an Atom feed into records. Entries without an id or title are skipped.
     */
    parseFeed(xml: string): SourceRecord[] {
        const validation = XMLValidator.validate(xml);
        if (validation !== true) {
            this.logger.error({ error: validation.err, body: xml.slice(0, 500) }, 'Invalid Atom XML');
            throw new ParseError('arXiv returned malformed XML');
        }

        const document: unknown = parser.parse(xml);
        const feed = isRecord(document) ? document['feed'] : undefined;
        if (!isRecord(feed)) {
            this.logger.error({ body: xml.slice(0, 500) }, 'Atom document has no feed element');
            throw new ParseError('arXiv response has no feed element');
        }

        const records: SourceRecord[] = [];
        for (const entry of arrayAt(feed, 'entry')) {
            const record = this.normalizeEntry(entry);
            if (record) {
                records.push(record);
            }
        }
        return records;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async fetchFeed(url: string, options: CallOptions): Promise<SourceRecord[]> {
        this.logger.info({ url }, 'arXiv query');
        const response = await this.httpClient.get(url, {
            source: this.sourceId,
            responseType: 'text',
            headers: { Accept: 'application/atom+xml' },
            signal: options.signal,
        });

        const xml = typeof response.data === 'string' ? response.data : '';
        return this.parseFeed(xml);
    }

    private normalizeEntry(entry: unknown): SourceRecord | null {
        const rawId = nodeText(entry, 'id');
        const title = nodeText(entry, 'title');

        if (!rawId.present || !title.present) {
            this.logger.warn({ id: rawId.present ? rawId.value : null }, 'Skipping arXiv entry without id or title');
            return null;
        }

        // Errors (e.g. an unknown id_list value) come back as a feed entry
        if (rawId.value.includes('/api/errors')) {
            this.logger.warn({ id: rawId.value, title: title.value }, 'arXiv reported an error entry');
            return null;
        }

        const id = arxivIdFromUrl(rawId.value);
        const published = nodeText(entry, 'published');

        const authors = arrayAt(entry, 'author')
            .map((author) => nodeText(author, 'name'))
            .filter(isPresent)
            .map((name) => name.value);

        const categories = arrayAt(entry, 'category')
            .map((category) => (isRecord(category) ? category['@_term'] : undefined))
            .filter((term): term is string => typeof term === 'string' && term.length > 0);

        const pdfLink = arrayAt(entry, 'link')
            .filter(isRecord)
            .find((link) => link['@_title'] === 'pdf');
        const pdfHref = pdfLink?.['@_href'];

        const primary = isRecord(entry) ? entry['primary_category'] : undefined;
        const primaryTerm = isRecord(primary) ? primary['@_term'] : undefined;

        return {
            source: 'arxiv',
            id,
            title: collapseWhitespace(title.value),
            text: {
                abstract: mapField(nodeText(entry, 'summary'), collapseWhitespace),
                published,
                updated: nodeText(entry, 'updated'),
                pdf_url: present(typeof pdfHref === 'string' ? pdfHref : `http://arxiv.org/pdf/${id}.pdf`),
                abs_url: present(`http://arxiv.org/abs/${id}`),
                primary_category: typeof primaryTerm === 'string' ? present(primaryTerm) : ABSENT,
                comment: mapField(nodeText(entry, 'comment'), collapseWhitespace),
                journal_ref: nodeText(entry, 'journal_ref'),
                doi: nodeText(entry, 'doi'),
            },
            numbers: {
                year: yearFrom(published),
            },
            lists: {
                authors,
                categories,
            },
        };
    }
}

/**
 * Text of a child element, whether it parsed to a plain string or to an
 * object carrying attributes alongside `#text`.
 */
function nodeText(node: unknown, key: string): Field<string> {
    if (!isRecord(node)) return ABSENT;
    const value = node[key];
    const text = isRecord(value) ? value['#text'] : value;
    if (typeof text === 'string' && text.trim()) {
        return present(text.trim());
    }
    return ABSENT;
}

function mapField(field: Field<string>, fn: (value: string) => string): Field<string> {
    return field.present ? present(fn(field.value)) : ABSENT;
}

function isPresent<T>(field: Field<T>): field is { present: true; value: T } {
    return field.present;
}
