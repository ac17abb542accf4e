import type { Logger } from 'pino';
import type { CallOptions, SourceClient, SourceConfig, SourceRecord } from '../types/index.js';
import { getReferenceData } from '../data/reference.js';
import type { HttpClient } from '../utils/http-client.js';
import { ParseError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { arrayAt, fieldOr, isRecord, numberField, objectAt, textField, yearFrom } from './utils.js';

export type BgsStatisticType = 'Production' | 'Imports' | 'Exports';

export const BGS_STATISTIC_TYPES: readonly BgsStatisticType[] = ['Production', 'Imports', 'Exports'];

/** Largest page the OGC endpoint is asked for */
const PAGE_SIZE = 1000;

/** Offsets sampled when collecting the full commodity list */
const COMMODITY_SAMPLE_OFFSETS = [0, 5000, 10000, 20000];

export interface BgsSearchQuery {
    commodity?: string;
    /** Country name, or an ISO2/ISO3 code when three characters or fewer */
    country?: string;
    yearFrom?: number;
    yearTo?: number;
    statisticType?: BgsStatisticType;
    limit?: number;
}

export interface BgsCountry {
    name: string;
    iso2: string | null;
    iso3: string | null;
}

export interface RankingRow {
    country: string;
    iso3: string | null;
    quantity: number;
    /** Percentage of the listed total */
    share: number;
}

export interface CommodityRanking {
    year: number;
    units: string | null;
    rows: RankingRow[];
    total: number;
}

export interface SeriesPoint {
    year: number;
    quantity: number;
    /** Percent change against the previous point, null for the first or after a zero */
    change: number | null;
}

export interface TimeSeries {
    /** Country label, or null for the global aggregate */
    country: string | null;
    units: string | null;
    points: SeriesPoint[];
}

export interface CountryComparison {
    units: string | null;
    /** Resolved country label → yearly values, ascending */
    countries: Array<{ label: string; values: Array<{ year: number; quantity: number | null }> }>;
}

export interface CountryProfile {
    country: string;
    year: number | null;
    commodities: Array<{ commodity: string; quantity: number; units: string | null }>;
}

/**
 * BGS World Mineral Statistics client (OGC API Features).
 *
 * @see https://ogcapi.bgs.ac.uk/collections/world-mineral-statistics
 */
export class BgsClient implements SourceClient {
    readonly sourceId = 'bgs' as const;
    private readonly logger: Logger;

    constructor(
        private readonly httpClient: HttpClient,
        private readonly config: SourceConfig
    ) {
        this.logger = getLogger().child({ source: this.sourceId });
    }

    /**
     * Search production or trade statistics. Pages through the collection,
     * drops rows outside the year range, and returns newest first.
     */
    async searchProduction(query: BgsSearchQuery, options: CallOptions = {}): Promise<SourceRecord[]> {
        const limit = query.limit ?? 1000;
        this.checkLimit(limit);

        const params: Record<string, string> = {
            bgs_statistic_type_trans: query.statisticType ?? 'Production',
        };
        if (query.commodity) {
            params['bgs_commodity_trans'] = query.commodity;
        }
        Object.assign(params, countryFilter(query.country));

        const collected: SourceRecord[] = [];
        let offset = 0;

        while (collected.length < limit) {
            const pageSize = Math.min(PAGE_SIZE, limit - collected.length);
            const features = await this.fetchItems(params, pageSize, offset, options);
            if (features.length === 0) break;

            for (const record of this.parseFeatures(features)) {
                const year = fieldOr(record.numbers['year'], null);
                if (year !== null && query.yearFrom !== undefined && year < query.yearFrom) continue;
                if (year !== null && query.yearTo !== undefined && year > query.yearTo) continue;
                collected.push(record);
                if (collected.length >= limit) break;
            }

            if (features.length < pageSize) break;
            offset += pageSize;
        }

        return collected.sort((a, b) => yearOf(b) - yearOf(a)).slice(0, limit);
    }

    /**
     * Countries ranked by summed quantity for one year (latest available when omitted).
     * @returns null when nothing matches
     */
    async getCommodityRanking(
        commodity: string,
        year: number | undefined,
        statisticType: BgsStatisticType,
        topN: number,
        options: CallOptions = {}
    ): Promise<CommodityRanking | null> {
        const records = await this.searchProduction(
            { commodity, statisticType, limit: this.config.maxResults },
            options
        );
        return rankCountries(records, year, topN);
    }

    /**
     * Year-ascending series. Without a country the yearly totals of all countries are used.
     */
    async getTimeSeries(
        commodity: string,
        country: string | undefined,
        statisticType: BgsStatisticType,
        options: CallOptions = {}
    ): Promise<TimeSeries | null> {
        const records = await this.searchProduction(
            { commodity, country, statisticType, limit: this.config.maxResults },
            options
        );
        return buildTimeSeries(records, country !== undefined);
    }

    /**
     * One query per country, issued in order.
     */
    async compareCountries(
        commodity: string,
        countries: string[],
        range: { yearFrom?: number; yearTo?: number },
        statisticType: BgsStatisticType,
        options: CallOptions = {}
    ): Promise<CountryComparison> {
        const comparison: CountryComparison = { units: null, countries: [] };

        for (const country of countries) {
            const records = await this.searchProduction(
                { commodity, country, ...range, statisticType, limit: PAGE_SIZE },
                options
            );

            const first = records[0];
            const label = first ? fieldOr(first.text['country'], country) : country;
            const values = [...records]
                .sort((a, b) => yearOf(a) - yearOf(b))
                .filter((record) => record.numbers['year']?.present)
                .map((record) => ({
                    year: yearOf(record),
                    quantity: fieldOr(record.numbers['quantity'], null),
                }));

            for (const record of records) {
                comparison.units = fieldOr(record.text['units'], comparison.units);
            }
            comparison.countries.push({ label, values });
        }

        return comparison;
    }

    /**
     * Every commodity a country reports for one year (latest available when omitted).
     */
    async getCountryProfile(
        country: string,
        year: number | undefined,
        statisticType: BgsStatisticType,
        options: CallOptions = {}
    ): Promise<CountryProfile | null> {
        const records = await this.searchProduction(
            { country, statisticType, limit: this.config.maxResults },
            options
        );
        return buildCountryProfile(records, year);
    }

    /**
     * Commodity names. The critical list is static; the full list is sampled from the collection.
     */
    async listCommodities(criticalOnly: boolean, options: CallOptions = {}): Promise<string[]> {
        if (criticalOnly) {
            return [...getReferenceData().bgs.critical];
        }

        const commodities = new Set<string>();
        const pageSize = this.config.maxResults;
        for (const offset of COMMODITY_SAMPLE_OFFSETS) {
            const features = await this.fetchItems({}, pageSize, offset, options);
            for (const feature of features) {
                const commodity = textField(objectAt(feature, 'properties'), 'bgs_commodity_trans');
                if (commodity.present) commodities.add(commodity.value);
            }
            if (features.length < pageSize) break;
        }

        return [...commodities].sort((a, b) => a.localeCompare(b));
    }

    /**
     * Distinct countries, optionally only those reporting a commodity.
     */
    async listCountries(commodity: string | undefined, options: CallOptions = {}): Promise<BgsCountry[]> {
        const params: Record<string, string> = {};
        if (commodity) params['bgs_commodity_trans'] = commodity;

        const features = await this.fetchItems(params, this.config.maxResults, 0, options);
        const countries = new Map<string, BgsCountry>();

        for (const feature of features) {
            const props = objectAt(feature, 'properties');
            const name = textField(props, 'country_trans');
            if (!name.present || countries.has(name.value)) continue;
            countries.set(name.value, {
                name: name.value,
                iso2: fieldOr(textField(props, 'country_iso2_code'), null),
                iso3: fieldOr(textField(props, 'country_iso3_code'), null),
            });
        }

        return [...countries.values()].sort((a, b) => a.name.localeCompare(b.name));
    }

    /**
     * Normalize GeoJSON features. Rows without a commodity or country are skipped.
     */
    parseFeatures(features: unknown[]): SourceRecord[] {
        const records: SourceRecord[] = [];

        for (const feature of features) {
            const props = objectAt(feature, 'properties');
            const commodity = textField(props, 'bgs_commodity_trans');
            const country = textField(props, 'country_trans');

            if (!commodity.present || !country.present) {
                this.logger.warn({ id: isRecord(feature) ? feature['id'] : null }, 'Skipping BGS feature without commodity or country');
                continue;
            }

            const yearText = textField(props, 'year');
            const year = yearFrom(yearText);
            const featureId = textField(feature, 'id');
            const id = featureId.present
                ? featureId.value
                : [commodity.value, country.value, yearText.present ? yearText.value : ''].join('|');

            records.push({
                source: 'bgs',
                id,
                title: `${country.value}: ${commodity.value}`,
                text: {
                    commodity,
                    sub_commodity: textField(props, 'bgs_sub_commodity_trans'),
                    statistic_type: textField(props, 'bgs_statistic_type_trans'),
                    country,
                    country_iso2: textField(props, 'country_iso2_code'),
                    country_iso3: textField(props, 'country_iso3_code'),
                    units: textField(props, 'units'),
                    yearbook_table: textField(props, 'yearbook_table_trans'),
                    notes: textField(props, 'concat_table_notes_text'),
                },
                numbers: {
                    year,
                    quantity: numberField(props, 'quantity'),
                },
                lists: {},
            });
        }

        return records;
    }

    // ─── Private helpers ──────────────────────────────────────

    private async fetchItems(
        filters: Record<string, string>,
        limit: number,
        offset: number,
        options: CallOptions
    ): Promise<unknown[]> {
        const params = new URLSearchParams({ ...filters, limit: String(limit), offset: String(offset) });
        const url = `${this.config.baseUrl}/items?${params.toString()}`;
        this.logger.debug({ url }, 'BGS query');

        const response = await this.httpClient.get(url, {
            source: this.sourceId,
            headers: { Accept: 'application/json' },
            signal: options.signal,
        });

        if (!isRecord(response.data)) {
            this.logger.error({ url }, 'BGS response is not a JSON object');
            throw new ParseError('BGS response is not a feature collection');
        }
        return arrayAt(response.data, 'features');
    }

    private checkLimit(limit: number): void {
        if (!Number.isInteger(limit) || limit < 1 || limit > this.config.maxResults) {
            throw new ValidationError('limit', `must be an integer between 1 and ${this.config.maxResults}`);
        }
    }
}

// ─── Aggregations ─────────────────────────────────────────

/**
 * Query parameters selecting a country by name or ISO code.
 */
export function countryFilter(country: string | undefined): Record<string, string> {
    const trimmed = country?.trim();
    if (!trimmed) return {};
    if (trimmed.length > 3) return { country_trans: trimmed };
    return trimmed.length === 2
        ? { country_iso2_code: trimmed.toUpperCase() }
        : { country_iso3_code: trimmed.toUpperCase() };
}

export function rankCountries(records: SourceRecord[], year: number | undefined, topN: number): CommodityRanking | null {
    const years = records
        .map((record) => fieldOr(record.numbers['year'], null))
        .filter((value): value is number => value !== null);
    if (years.length === 0) return null;

    const targetYear = year ?? Math.max(...years);
    const totals = new Map<string, { country: string; iso3: string | null; quantity: number; units: string | null }>();

    for (const record of records) {
        const quantity = record.numbers['quantity'];
        if (fieldOr(record.numbers['year'], null) !== targetYear || !quantity?.present) continue;

        const country = fieldOr(record.text['country'], record.title);
        const entry = totals.get(country) ?? {
            country,
            iso3: fieldOr(record.text['country_iso3'], null),
            quantity: 0,
            units: fieldOr(record.text['units'], null),
        };
        entry.quantity += quantity.value;
        totals.set(country, entry);
    }

    if (totals.size === 0) return null;

    const ranked = [...totals.values()].sort((a, b) => b.quantity - a.quantity).slice(0, topN);
    const total = ranked.reduce((sum, row) => sum + row.quantity, 0);

    return {
        year: targetYear,
        units: ranked[0]?.units ?? null,
        rows: ranked.map((row) => ({
            country: row.country,
            iso3: row.iso3,
            quantity: row.quantity,
            share: total > 0 ? (row.quantity / total) * 100 : 0,
        })),
        total,
    };
}

export function buildTimeSeries(records: SourceRecord[], singleCountry: boolean): TimeSeries | null {
    const totals = new Map<number, number>();
    let units: string | null = null;
    let country: string | null = null;

    for (const record of records) {
        const year = record.numbers['year'];
        const quantity = record.numbers['quantity'];
        if (!year?.present || !quantity?.present) continue;
        totals.set(year.value, (totals.get(year.value) ?? 0) + quantity.value);
        units = fieldOr(record.text['units'], units);
        if (singleCountry && country === null) {
            country = fieldOr(record.text['country'], null);
        }
    }

    if (totals.size === 0) return null;

    let previous: number | null = null;
    const points: SeriesPoint[] = [];
    for (const year of [...totals.keys()].sort((a, b) => a - b)) {
        const quantity = totals.get(year) ?? 0;
        points.push({
            year,
            quantity,
            change: previous !== null && previous > 0 ? ((quantity - previous) / previous) * 100 : null,
        });
        previous = quantity;
    }

    return { country, units, points };
}

export function buildCountryProfile(records: SourceRecord[], year: number | undefined): CountryProfile | null {
    const first = records[0];
    if (!first) return null;

    const years = records
        .map((record) => fieldOr(record.numbers['year'], null))
        .filter((value): value is number => value !== null);
    const targetYear = year ?? (years.length > 0 ? Math.max(...years) : null);

    const byCommodity = new Map<string, { commodity: string; quantity: number; units: string | null }>();
    for (const record of records) {
        const quantity = record.numbers['quantity'];
        if (fieldOr(record.numbers['year'], null) !== targetYear || !quantity?.present) continue;

        const commodity = fieldOr(record.text['commodity'], record.title);
        const entry = byCommodity.get(commodity) ?? {
            commodity,
            quantity: 0,
            units: fieldOr(record.text['units'], null),
        };
        entry.quantity += quantity.value;
        byCommodity.set(commodity, entry);
    }

    return {
        country: fieldOr(first.text['country'], first.title),
        year: targetYear,
        commodities: [...byCommodity.values()].sort((a, b) => b.quantity - a.quantity),
    };
}

/**
 * Group commodity names under the static category keywords; unmatched names go under "Other".
 */
export function categorizeCommodities(commodities: string[]): Array<{ label: string; items: string[] }> {
    const categories = getReferenceData().bgs.categories;
    const groups: Array<{ label: string; items: string[] }> = categories.map((category) => ({
        label: category.label,
        items: [],
    }));
    const other: string[] = [];

    for (const commodity of commodities) {
        const lower = commodity.toLowerCase();
        const index = categories.findIndex((category) => category.keywords.some((keyword) => lower.includes(keyword)));
        const group = groups[index];
        if (group) {
            group.items.push(commodity);
        } else {
            other.push(commodity);
        }
    }

    return [...groups, { label: 'Other', items: other }].filter((group) => group.items.length > 0);
}

function yearOf(record: SourceRecord): number {
    return fieldOr(record.numbers['year'], 0);
}
