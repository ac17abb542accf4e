import type { Logger } from 'pino';
import type { CallOptions, Credentials, EdxConfig, SourceClient, SourceRecord } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { NetworkError, NotFoundError, ParseError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { getReferenceData } from '../data/reference.js';
import { arrayAt, isRecord, numberField, objectAt, present, textField } from './utils.js';

export interface EdxSearchQuery {
    query?: string;
    tags?: string[];
    limit?: number;
}

export interface EdxResourceQuery {
    /** Matched against resource names */
    name?: string;
    /** File format, e.g. "CSV" */
    format?: string;
    limit?: number;
}

export interface EdxResourcePage {
    /** Total matches reported by the server */
    count: number;
    resources: SourceRecord[];
}

export interface DatasetCategory {
    label: string;
    datasets: EdxDataset[];
}

/**
 * A CKAN package with its resources, each normalized separately.
 */
export interface EdxDataset {
    record: SourceRecord;
    resources: SourceRecord[];
}

/**
 * NETL Energy Data eXchange client (CKAN action API).
 * Read-only: the CLAIMM tools only search and describe submissions.
 *
 * @see https://docs.ckan.org/en/latest/api/
 */
export class EdxClient implements SourceClient {
    readonly sourceId = 'edx' as const;
    private readonly logger: Logger;

    constructor(
        private readonly httpClient: HttpClient,
        private readonly config: EdxConfig,
        private readonly credentials: Pick<Credentials, 'edxApiKey'> = {}
    ) {
        this.logger = getLogger().child({ source: this.sourceId });
    }

    /**
     * Search datasets (`package_search`). Tag filters are ANDed.
     */
    async searchDatasets(query: EdxSearchQuery, options: CallOptions = {}): Promise<EdxDataset[]> {
        const limit = this.checkLimit(query.limit ?? 20);

        const params = new URLSearchParams({ rows: String(limit) });
        if (query.query?.trim()) {
            params.set('q', query.query.trim());
        }

        const tags = query.tags ?? [];
        if (tags.length > 0) {
            params.set('fq', tags.map((tag) => `tags:${tag}`).join(' AND '));
        }

        const result = await this.action('package_search', params, options);
        return this.parseDatasets(arrayAt(result, 'results'));
    }

    /**
     * Search files across all datasets (`resource_search`).
     * Each criterion is sent as its own `query` term, `field:value`.
     */
    async searchResources(query: EdxResourceQuery, options: CallOptions = {}): Promise<EdxResourcePage> {
        const limit = this.checkLimit(query.limit ?? 20);

        const params = new URLSearchParams({ limit: String(limit) });
        const name = query.name?.trim();
        if (name) params.append('query', `name:${name}`);
        const format = query.format?.trim();
        if (format) params.append('query', `format:${format.toUpperCase()}`);

        const result = await this.action('resource_search', params, options);
        const resources: SourceRecord[] = [];
        for (const raw of arrayAt(result, 'results')) {
            const resource = this.parseResource(raw, null);
            if (resource) resources.push(resource);
        }

        const count = numberField(result, 'count');
        return { count: count.present ? count.value : resources.length, resources };
    }

    /**
     * One dataset by id or name (`package_show`).
     */
    async getDataset(datasetId: string, options: CallOptions = {}): Promise<EdxDataset> {
        const id = requireId('dataset_id', datasetId);
        const result = await this.action('package_show', new URLSearchParams({ id }), options, `Dataset ${id}`);

        const dataset = this.parseDataset(result);
        if (!dataset) {
            throw new ParseError('EDX returned a dataset without id or title');
        }
        return dataset;
    }

    /**
     * One resource (file) by id (`resource_show`).
     */
    async getResource(resourceId: string, options: CallOptions = {}): Promise<SourceRecord> {
        const id = requireId('resource_id', resourceId);
        const result = await this.action('resource_show', new URLSearchParams({ id }), options, `Resource ${id}`);

        const resource = this.parseResource(result, null);
        if (!resource) {
            throw new ParseError('EDX returned a resource without id');
        }
        return resource;
    }

    /**
     * Datasets of a group (`group_show` with `include_datasets`). Defaults to the CLAIMM group.
     */
    async listGroupDatasets(group: string | undefined, limit: number, options: CallOptions = {}): Promise<EdxDataset[]> {
        this.checkLimit(limit);

        const groupName = group?.trim() || this.config.group;
        const params = new URLSearchParams({
            id: groupName,
            include_datasets: 'true',
            limit: String(limit),
        });

        const result = await this.action('group_show', params, options, `Group ${groupName}`);
        return this.parseDatasets(arrayAt(result, 'packages')).slice(0, limit);
    }

    /**
     * Direct download link of a resource. Computed locally, no request.
     */
    getDownloadUrl(resourceId: string): string {
        const id = requireId('resource_id', resourceId);
        return `${new URL(this.config.baseUrl).origin}/resource/${encodeURIComponent(id)}/download`;
    }

    parseDatasets(packages: unknown[]): EdxDataset[] {
        const datasets: EdxDataset[] = [];
        for (const pkg of packages) {
            const dataset = this.parseDataset(pkg);
            if (dataset) datasets.push(dataset);
        }
        return datasets;
    }

    // ─── Private helpers ──────────────────────────────────────

    private checkLimit(limit: number): number {
        if (!Number.isInteger(limit) || limit < 1 || limit > this.config.maxResults) {
            throw new ValidationError('limit', `must be an integer between 1 and ${this.config.maxResults}`);
        }
        return limit;
    }

    /**
     * Call a CKAN action and unwrap the `{success, result}` envelope.
     * A 404 from a *_show action means the id is unknown.
     */
    private async action(
        name: string,
        params: URLSearchParams,
        options: CallOptions,
        notFoundLabel?: string
    ): Promise<Record<string, unknown>> {
        const url = `${this.config.baseUrl}/${name}?${params.toString()}`;
        this.logger.debug({ url }, 'EDX action');

        const headers: Record<string, string> = { Accept: 'application/json' };
        if (this.credentials.edxApiKey) {
            headers['X-CKAN-API-Key'] = this.credentials.edxApiKey;
        }

        let data: unknown;
        try {
            const response = await this.httpClient.get(url, { source: this.sourceId, headers, signal: options.signal });
            data = response.data;
        } catch (error) {
            if (notFoundLabel && error instanceof NetworkError && error.status === 404) {
                throw new NotFoundError(`${notFoundLabel} not found`, { cause: error });
            }
            throw error;
        }

        if (!isRecord(data) || data['success'] !== true) {
            const ckanError = objectAt(data, 'error');
            this.logger.error({ action: name, error: ckanError }, 'EDX action failed');
            const message = textField(ckanError, 'message');
            throw new ParseError(message.present ? `EDX ${name} failed: ${message.value}` : `EDX ${name} failed`);
        }

        const result = data['result'];
        if (!isRecord(result)) {
            throw new ParseError(`EDX ${name} returned no result object`);
        }
        return result;
    }

    private parseDataset(pkg: unknown): EdxDataset | null {
        const id = textField(pkg, 'id');
        const name = textField(pkg, 'name');
        const title = textField(pkg, 'title');
        const label = title.present ? title : name;

        if (!id.present || !label.present) {
            this.logger.warn({ id: id.present ? id.value : null }, 'Skipping EDX dataset without id or title');
            return null;
        }

        const resources: SourceRecord[] = [];
        for (const raw of arrayAt(pkg, 'resources')) {
            const resource = this.parseResource(raw, id.value);
            if (resource) resources.push(resource);
        }

        const tags = arrayAt(pkg, 'tags')
            .map((tag) => textField(tag, 'name'))
            .flatMap((tag) => (tag.present ? [tag.value] : []));

        const formats = [...new Set(resources.flatMap((resource) => {
            const format = resource.text['format'];
            return format?.present ? [format.value] : [];
        }))];

        return {
            record: {
                source: 'edx',
                id: id.value,
                title: label.value,
                text: {
                    name,
                    notes: textField(pkg, 'notes'),
                    author: textField(pkg, 'author'),
                    organization: textField(objectAt(pkg, 'organization'), 'title'),
                    metadata_created: textField(pkg, 'metadata_created'),
                    metadata_modified: textField(pkg, 'metadata_modified'),
                },
                numbers: {
                    resource_count: present(resources.length),
                },
                lists: {
                    tags,
                    resource_ids: resources.map((resource) => resource.id),
                    formats,
                },
            },
            resources,
        };
    }

    private parseResource(raw: unknown, packageId: string | null): SourceRecord | null {
        const id = textField(raw, 'id');
        if (!id.present) {
            this.logger.warn('Skipping EDX resource without id');
            return null;
        }

        const name = textField(raw, 'name');
        const ownPackage = textField(raw, 'package_id');

        return {
            source: 'edx',
            id: id.value,
            title: name.present ? name.value : id.value,
            text: {
                description: textField(raw, 'description'),
                format: textField(raw, 'format'),
                url: textField(raw, 'url'),
                created: textField(raw, 'created'),
                last_modified: textField(raw, 'last_modified'),
                package_id: ownPackage.present || packageId === null ? ownPackage : present(packageId),
                download_url: present(this.getDownloadUrl(id.value)),
            },
            numbers: {
                size: numberField(raw, 'size'),
            },
            lists: {},
        };
    }
}

function requireId(param: string, value: string): string {
    const trimmed = value.trim();
    if (!trimmed) {
        throw new ValidationError(param, 'must not be empty');
    }
    return trimmed;
}

/**
 * Keep only the files of the given format (case-insensitive). Datasets left without files are dropped.
 */
export function filterByFormat(datasets: EdxDataset[], format: string): EdxDataset[] {
    const wanted = format.trim().toLowerCase();
    return datasets.flatMap((dataset) => {
        const resources = dataset.resources.filter((resource) => {
            const resourceFormat = resource.text['format'];
            return resourceFormat?.present && resourceFormat.value.toLowerCase() === wanted;
        });
        return resources.length > 0 ? [{ ...dataset, resources }] : [];
    });
}

/**
 * Sort datasets into the static keyword categories by title, description and tags.
 * The first matching category wins; unmatched datasets go under "Other". Empty categories are left out.
 */
export function categorizeDatasets(datasets: EdxDataset[]): DatasetCategory[] {
    const categories = getReferenceData().edx.categories;
    const groups: DatasetCategory[] = categories.map((category) => ({ label: category.label, datasets: [] }));
    const other: EdxDataset[] = [];

    for (const dataset of datasets) {
        const { record } = dataset;
        const notes = record.text['notes'];
        const haystack = [record.title, notes?.present ? notes.value : '', ...(record.lists['tags'] ?? [])]
            .join(' ')
            .toLowerCase();

        const index = categories.findIndex((category) => category.keywords.some((keyword) => haystack.includes(keyword)));
        const group = groups[index];
        if (group) {
            group.datasets.push(dataset);
        } else {
            other.push(dataset);
        }
    }

    return [...groups, { label: 'Other', datasets: other }].filter((group) => group.datasets.length > 0);
}
