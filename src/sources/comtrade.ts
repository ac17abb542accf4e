import type { Logger } from 'pino';
import type { CallOptions, Credentials, SourceClient, SourceConfig, SourceRecord } from '../types/index.js';
import { getReferenceData, type ComtradeMineral } from '../data/reference.js';
import type { HttpClient } from '../utils/http-client.js';
import { describeError, NetworkError, ParseError, ToolError, ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { arrayAt, fieldOr, isRecord, numberField, present, textField } from './utils.js';

export type TradeFlow = 'M' | 'X' | 'M,X';

export const TRADE_FLOWS: readonly TradeFlow[] = ['M', 'X', 'M,X'];

export interface TradeQuery {
    reporter: string;
    partner?: string;
    commodity?: string;
    flow?: TradeFlow;
    period?: string;
    maxRecords?: number;
}

export interface ReferenceEntry {
    id: string;
    text: string;
    iso3: string | null;
    parent: string | null;
}

export interface ApiStatus {
    status: 'connected' | 'unauthorized' | 'timeout' | 'error';
    api_key_configured: boolean;
    message: string;
}

export interface TradeSummary {
    commodity: string;
    rows: Array<{ country: string; value: number; share: number }>;
    total: number;
    /** Reporter codes whose query failed, with the failure kind */
    failed: Array<{ reporter: string; kind: string; reason: string }>;
}

export interface TradeProfile {
    country_code: string;
    year: string;
    imports: Record<string, number>;
    exports: Record<string, number>;
    total_imports: number;
    total_exports: number;
    trade_balance: number;
    failed: Array<{ mineral: string; kind: string; reason: string }>;
}

const REFERENCE_FILES = {
    reporters: 'Reporters.json',
    partners: 'partnerAreas.json',
    commodities: 'HS.json',
} as const;

export type ReferenceList = keyof typeof REFERENCE_FILES;

/**
 * UN Comtrade client (annual HS commodity data, API v1).
 *
 * @see https://comtradedeveloper.un.org/
 */
export class ComtradeClient implements SourceClient {
    readonly sourceId = 'comtrade' as const;
    private readonly logger: Logger;

    constructor(
        private readonly httpClient: HttpClient,
        private readonly config: SourceConfig,
        private readonly credentials: Pick<Credentials, 'comtradeApiKey'> = {}
    ) {
        this.logger = getLogger().child({ source: this.sourceId });
    }

    get hasApiKey(): boolean {
        return Boolean(this.credentials.comtradeApiKey);
    }

    /**
     * Raw trade rows for one query. Rows missing their key codes are skipped.
     */
    async getTradeData(query: TradeQuery, options: CallOptions = {}): Promise<SourceRecord[]> {
        const maxRecords = query.maxRecords ?? this.config.maxResults;
        if (!Number.isInteger(maxRecords) || maxRecords < 1 || maxRecords > this.config.maxResults) {
            throw new ValidationError('max_records', `must be an integer between 1 and ${this.config.maxResults}`);
        }
        const flow = query.flow ?? 'M';
        if (!TRADE_FLOWS.includes(flow)) {
            throw new ValidationError('flow', `must be one of ${TRADE_FLOWS.join(', ')}`);
        }

        const params = new URLSearchParams({
            reporterCode: requireCodes('reporter', query.reporter),
            partnerCode: requireCodes('partner', query.partner ?? '0'),
            cmdCode: requireCodes('commodity', query.commodity ?? 'TOTAL', true),
            flowCode: flow,
            period: requireCodes('year', query.period ?? '2023'),
            maxRecords: String(maxRecords),
        });

        const data = await this.getJson(`${this.dataUrl}?${params.toString()}`, options);
        const apiError = textField(data, 'error');
        if (!Array.isArray(data['data']) && apiError.present) {
            this.logger.error({ error: apiError.value }, 'Comtrade reported an error');
            throw new ParseError(`Comtrade error: ${apiError.value}`);
        }

        return this.parseRows(arrayAt(data, 'data'));
    }

    /**
     * Trade rows for a critical mineral, querying all of its HS codes at once.
     */
    async getCriticalMineralTrade(
        mineral: string,
        query: Omit<TradeQuery, 'commodity' | 'reporter'> & { reporter?: string },
        options: CallOptions = {}
    ): Promise<{ mineral: ComtradeMineral; records: SourceRecord[] }> {
        const entry = findMineral(mineral);
        const records = await this.getTradeData(
            {
                ...query,
                reporter: query.reporter ?? '0',
                commodity: entry.hsCodes.join(','),
                flow: query.flow ?? 'M,X',
            },
            options
        );
        return { mineral: entry, records };
    }

    /**
     * World trade of one commodity for each reporter, ranked by value.
     * Reporters are queried one at a time; a failed reporter is listed, not fatal.
     */
    async getCommodityTradeSummary(
        commodity: string,
        year: string,
        flow: 'M' | 'X',
        reporters: string[],
        options: CallOptions = {}
    ): Promise<TradeSummary> {
        const totals = new Map<string, number>();
        const failed: TradeSummary['failed'] = [];
        let commodityName: string | null = null;

        for (const reporter of reporters) {
            try {
                const records = await this.getTradeData(
                    { reporter, partner: '0', commodity, flow, period: year, maxRecords: 10 },
                    options
                );
                for (const record of records) {
                    const value = fieldOr(record.numbers['trade_value'], 0);
                    if (!value) continue;
                    const country = fieldOr(record.text['reporter'], reporter);
                    totals.set(country, (totals.get(country) ?? 0) + value);
                    commodityName = commodityName ?? fieldOr(record.text['commodity'], null);
                }
            } catch (error) {
                if (options.signal?.aborted || error instanceof ValidationError) throw error;
                this.logger.warn({ reporter, error }, 'Reporter query failed');
                failed.push({ reporter, ...describeError(error) });
            }
        }

        const ranked = [...totals.entries()].sort((a, b) => b[1] - a[1]);
        const total = ranked.reduce((sum, [, value]) => sum + value, 0);

        return {
            commodity: commodityName ?? commodity,
            rows: ranked.map(([country, value]) => ({
                country,
                value,
                share: total > 0 ? (value / total) * 100 : 0,
            })),
            total,
            failed,
        };
    }

    /**
     * Imports and exports of every critical mineral for one country.
     */
    async getCountryTradeProfile(country: string, year: string, options: CallOptions = {}): Promise<TradeProfile> {
        const profile: TradeProfile = {
            country_code: country,
            year,
            imports: {},
            exports: {},
            total_imports: 0,
            total_exports: 0,
            trade_balance: 0,
            failed: [],
        };

        for (const mineral of getReferenceData().comtrade.minerals) {
            try {
                const records = await this.getTradeData(
                    {
                        reporter: country,
                        partner: '0',
                        commodity: mineral.hsCodes.join(','),
                        flow: 'M,X',
                        period: year,
                        maxRecords: 50,
                    },
                    options
                );

                const sumFlow = (code: string): number => records
                    .filter((record) => fieldOr(record.text['flow_code'], null) === code)
                    .reduce((sum, record) => sum + fieldOr(record.numbers['trade_value'], 0), 0);

                const imported = sumFlow('M');
                const exported = sumFlow('X');
                if (imported > 0) profile.imports[mineral.name] = imported;
                if (exported > 0) profile.exports[mineral.name] = exported;
            } catch (error) {
                if (options.signal?.aborted || error instanceof ValidationError) throw error;
                this.logger.warn({ country, mineral: mineral.id, error }, 'Mineral query failed');
                profile.failed.push({ mineral: mineral.id, ...describeError(error) });
            }
        }

        profile.total_imports = Object.values(profile.imports).reduce((sum, value) => sum + value, 0);
        profile.total_exports = Object.values(profile.exports).reduce((sum, value) => sum + value, 0);
        profile.trade_balance = profile.total_exports - profile.total_imports;
        return profile;
    }

    /**
     * Reporter, partner or HS commodity reference list.
     */
    async getReferenceList(list: ReferenceList, options: CallOptions = {}): Promise<ReferenceEntry[]> {
        const data = await this.getJson(`${this.config.baseUrl}/files/v1/app/reference/${REFERENCE_FILES[list]}`, options);

        const entries: ReferenceEntry[] = [];
        for (const item of arrayAt(data, 'results')) {
            const id = textField(item, 'id');
            const text = textField(item, 'text');
            if (!id.present || !text.present) continue;
            entries.push({
                id: id.value,
                text: text.value,
                iso3: fieldOr(textField(item, 'reporterCodeIsoAlpha3'), fieldOr(textField(item, 'PartnerCodeIsoAlpha3'), null)),
                parent: fieldOr(textField(item, 'parent'), null),
            });
        }
        return entries;
    }

    /**
     * Request one row from the data endpoint and report what happened.
     * Query the data endpoint with a one-row query and report what happened.
     */
    async checkStatus(options: CallOptions = {}): Promise<ApiStatus> {
        const api_key_configured = this.hasApiKey;
        try {
            await this.getTradeData(
                { reporter: '842', partner: '0', commodity: 'TOTAL', flow: 'M', period: '2023', maxRecords: 1 },
                options
            );
            return { status: 'connected', api_key_configured, message: 'UN Comtrade API is accessible' };
        } catch (error) {
            if (options.signal?.aborted) throw error;
            if (error instanceof NetworkError && error.timeout) {
                return { status: 'timeout', api_key_configured, message: 'Request timed out' };
            }
            if (error instanceof NetworkError && (error.status === 401 || error.status === 403)) {
                return { status: 'unauthorized', api_key_configured, message: 'Invalid or missing API key' };
            }
            const message = error instanceof ToolError ? error.reason : 'Unexpected error';
            this.logger.warn({ error }, 'Comtrade status check failed');
            return { status: 'error', api_key_configured, message };
        }
    }

    parseRows(rows: unknown[]): SourceRecord[] {
        const records: SourceRecord[] = [];

        for (const row of rows) {
            const period = textField(row, 'period');
            const reporterCode = numberField(row, 'reporterCode');
            const partnerCode = numberField(row, 'partnerCode');
            const flowCode = textField(row, 'flowCode');
            const cmdCode = textField(row, 'cmdCode');

            if (!period.present || !reporterCode.present || !partnerCode.present || !flowCode.present || !cmdCode.present) {
                this.logger.warn({ row: isRecord(row) ? Object.keys(row) : typeof row }, 'Skipping malformed Comtrade row');
                continue;
            }

            const reporter = fieldOr(textField(row, 'reporterDesc'), `Country ${reporterCode.value}`);
            const partner = partnerCode.value === 0
                ? 'World'
                : fieldOr(textField(row, 'partnerDesc'), `Country ${partnerCode.value}`);

            records.push({
                source: 'comtrade',
                id: [period.value, reporterCode.value, partnerCode.value, flowCode.value, cmdCode.value].join('-'),
                title: `${reporter} / ${partner} / ${cmdCode.value} (${period.value})`,
                text: {
                    period,
                    reporter: present(reporter),
                    partner: present(partner),
                    flow_code: flowCode,
                    flow: textField(row, 'flowDesc'),
                    commodity_code: cmdCode,
                    commodity: textField(row, 'cmdDesc'),
                    quantity_unit: textField(row, 'qtyUnitAbbr'),
                },
                numbers: {
                    reporter_code: reporterCode,
                    partner_code: partnerCode,
                    trade_value: numberField(row, 'primaryValue'),
                    net_weight: numberField(row, 'netWgt'),
                    quantity: numberField(row, 'qty'),
                },
                lists: {},
            });
        }

        return records;
    }

    // ─── Private helpers ──────────────────────────────────────

    private get dataUrl(): string {
        return `${this.config.baseUrl}/data/v1/get/C/A/HS`;
    }

    private async getJson(url: string, options: CallOptions): Promise<Record<string, unknown>> {
        this.logger.debug({ url }, 'Comtrade query');

        const headers: Record<string, string> = { Accept: 'application/json' };
        if (this.credentials.comtradeApiKey) {
            headers['Ocp-Apim-Subscription-Key'] = this.credentials.comtradeApiKey;
        }

        const response = await this.httpClient.get(url, { source: this.sourceId, headers, signal: options.signal });
        if (!isRecord(response.data)) {
            throw new ParseError('Comtrade response is not a JSON object');
        }
        return response.data;
    }
}

/**
 * Look up a critical mineral by id; spaces and case are ignored ("Rare Earth" → rare_earth).
 */
export function findMineral(mineral: string): ComtradeMineral {
    const key = mineral.trim().toLowerCase().replace(/\s+/g, '_');
    const minerals = getReferenceData().comtrade.minerals;
    const entry = minerals.find((candidate) => candidate.id === key);
    if (!entry) {
        throw new ValidationError('mineral', `unknown mineral; available: ${minerals.map((m) => m.id).join(', ')}`);
    }
    return entry;
}

/**
 * Comma-separated numeric codes ("842" or "842,156"). HS queries also accept TOTAL.
 */
function requireCodes(param: string, value: string, allowTotal = false): string {
    const trimmed = value.replace(/\s+/g, '');
    if (allowTotal && trimmed.toUpperCase() === 'TOTAL') return 'TOTAL';
    if (!/^\d+(,\d+)*$/.test(trimmed)) {
        throw new ValidationError(param, 'must be a numeric code or a comma-separated list of codes');
    }
    return trimmed;
}
