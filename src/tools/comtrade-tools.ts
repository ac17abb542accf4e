import type { ToolRegistry } from '../registry/tool-registry.js';
import { readEnum, readInt, readList, readOptionalString, readString } from '../registry/params.js';
import { ComtradeClient, TRADE_FLOWS, type ReferenceEntry, type ReferenceList } from '../sources/comtrade.js';
import { toWire } from '../sources/utils.js';
import { getReferenceData } from '../data/reference.js';
import { formatNumber, formatPercent, markdownTable } from '../format/text.js';
import type { JsonValue, ParamSpec, ToolArgs } from '../types/index.js';
import type { ToolDependencies } from './dependencies.js';

const HS_LEVELS = [2, 4, 6] as const;

const yearParam: ParamSpec = {
    name: 'year',
    type: 'string',
    description: 'Year, or comma-separated years (e.g. "2020,2021,2022")',
    default: '2023',
};

const searchParam: ParamSpec = { name: 'search', type: 'string', description: 'Case-insensitive text filter' };

function limitParam(maximum: number): ParamSpec {
    return { name: 'limit', type: 'integer', description: 'Maximum entries', default: 50, minimum: 1, maximum };
}

export function registerComtradeTools(registry: ToolRegistry, deps: ToolDependencies): void {
    const { config, httpClient } = deps;
    const client = new ComtradeClient(httpClient, config.comtrade, config.credentials);
    const maxRecords = config.comtrade.maxResults;

    registry.register(
        {
            name: 'get_api_status',
            description: 'Check UN Comtrade connectivity and whether an API key is configured.',
            params: [],
        },
        async (_args, { signal }) => {
            const status = await client.checkStatus({ signal });
            return { status: status.status, api_key_configured: status.api_key_configured, message: status.message };
        }
    );

    registry.register(
        {
            name: 'list_critical_minerals',
            description: 'Critical minerals with the HS codes queried for each.',
            params: [],
        },
        async () => {
            const minerals = getReferenceData().comtrade.minerals;
            return {
                count: minerals.length,
                minerals: minerals.map((mineral) => ({ id: mineral.id, name: mineral.name, hs_codes: [...mineral.hsCodes] })),
                usage: "Use get_critical_mineral_trade with mineral='lithium' (or another id) to query",
            };
        }
    );

    const registerReferenceTool = (name: string, list: ReferenceList, key: string, description: string, note: string): void => {
        registry.register(
            { name, description, params: [searchParam, limitParam(maxRecords)] },
            async (args, { signal }) => {
                const entries = filterEntries(await client.getReferenceList(list, { signal }), args);
                return { count: entries.length, [key]: entries.map(entryToJson), note };
            }
        );
    };

    registerReferenceTool(
        'list_reporters',
        'reporters',
        'reporters',
        'Reporter countries and their numeric codes.',
        "Use 'id' as the reporter code in queries"
    );
    registerReferenceTool(
        'list_partners',
        'partners',
        'partners',
        'Partner countries and areas with their numeric codes.',
        "Use 'id' as the partner code in queries. Code 0 = World total."
    );

    registry.register(
        {
            name: 'list_commodity_codes',
            description: 'HS commodity codes at one level of detail.',
            params: [
                searchParam,
                { name: 'hs_level', type: 'integer', description: 'HS code digits', default: 4, enum: HS_LEVELS },
                limitParam(maxRecords),
            ],
        },
        async (args, { signal }) => {
            const level = readInt(args, 'hs_level');
            const codes = (await client.getReferenceList('commodities', { signal })).filter((entry) => entry.id.length === level);
            const entries = filterEntries(codes, args, true);
            return {
                count: entries.length,
                commodities: entries.map(entryToJson),
                note: `Showing HS-${level} codes. Use 'id' as the commodity code in queries.`,
            };
        }
    );

    registry.register(
        {
            name: 'get_trade_data',
            description: 'Annual trade records for a reporter, partner and HS commodity code.',
            params: [
                { name: 'reporter', type: 'string', description: 'Reporter code (842 = USA, 156 = China)', required: true, nonEmpty: true },
                { name: 'commodity', type: 'string', description: 'HS code(s), comma-separated, or TOTAL', required: true, nonEmpty: true },
                { name: 'partner', type: 'string', description: 'Partner code; 0 = World', default: '0' },
                { name: 'flow', type: 'string', description: 'M = imports, X = exports', enum: TRADE_FLOWS, default: 'M' },
                yearParam,
                { name: 'max_records', type: 'integer', description: 'Maximum records', default: 100, minimum: 1, maximum: maxRecords },
            ],
        },
        async (args, { signal }) => {
            const query = {
                reporter: readString(args, 'reporter'),
                partner: readString(args, 'partner'),
                commodity: readString(args, 'commodity'),
                flow: readEnum(args, 'flow', TRADE_FLOWS),
                period: readString(args, 'year'),
                maxRecords: readInt(args, 'max_records'),
            };
            const records = await client.getTradeData(query, { signal });
            return {
                count: records.length,
                query: {
                    reporter: query.reporter,
                    partner: query.partner,
                    commodity: query.commodity,
                    flow: query.flow,
                    year: query.period,
                },
                records: records.map(toWire),
            };
        }
    );

    registry.register(
        {
            name: 'get_critical_mineral_trade',
            description: `Trade records for a critical mineral using its preset HS codes (${getReferenceData().comtrade.minerals.map((m) => m.id).join(', ')}).`,
            params: [
                { name: 'mineral', type: 'string', description: 'Mineral id, e.g. "lithium" or "rare_earth"', required: true, nonEmpty: true },
                { name: 'reporter', type: 'string', description: 'Reporter code; 0 = all', default: '0' },
                { name: 'partner', type: 'string', description: 'Partner code; 0 = World', default: '0' },
                { name: 'flow', type: 'string', description: 'M, X, or M,X for both', enum: TRADE_FLOWS, default: 'M,X' },
                yearParam,
                { name: 'max_records', type: 'integer', description: 'Maximum records', default: 100, minimum: 1, maximum: maxRecords },
            ],
        },
        async (args, { signal }) => {
            const flow = readEnum(args, 'flow', TRADE_FLOWS);
            const query = {
                reporter: readString(args, 'reporter'),
                partner: readString(args, 'partner'),
                flow,
                period: readString(args, 'year'),
                maxRecords: readInt(args, 'max_records'),
            };
            const { mineral, records } = await client.getCriticalMineralTrade(readString(args, 'mineral'), query, { signal });
            return {
                count: records.length,
                mineral: mineral.name,
                hs_codes_queried: [...mineral.hsCodes],
                query: { reporter: query.reporter, partner: query.partner, flow, year: query.period },
                records: records.map(toWire),
            };
        }
    );

    registry.register(
        {
            name: 'get_commodity_trade_summary',
            description: 'World trade of one HS commodity for several reporters, ranked by value.',
            params: [
                { name: 'commodity', type: 'string', description: 'HS commodity code, e.g. "2602"', required: true, nonEmpty: true },
                { name: 'year', type: 'string', description: 'Year to query', default: '2023' },
                { name: 'flow', type: 'string', description: 'M = imports, X = exports', enum: ['M', 'X'], default: 'M' },
                {
                    name: 'reporters',
                    type: 'string[]',
                    description: 'Reporter codes (default: ten major economies)',
                    default: getReferenceData().comtrade.majorEconomies,
                },
            ],
        },
        async (args, { signal }) => {
            const commodity = readString(args, 'commodity');
            const year = readString(args, 'year');
            const flow = readEnum(args, 'flow', ['M', 'X'] as const);

            const summary = await client.getCommodityTradeSummary(commodity, year, flow, readList(args, 'reporters'), { signal });
            if (summary.rows.length === 0) {
                return `No ${flow} data found for commodity ${commodity} in ${year}${failureNote(summary.failed)}`;
            }

            const table = markdownTable(
                ['Rank', 'Country', 'Value (USD)', 'Share'],
                summary.rows.map((row, index) => [index + 1, row.country, `$${formatNumber(row.value, 0)}`, formatPercent(row.share)])
            );
            return [
                `**${summary.commodity} - ${flow === 'M' ? 'Imports' : 'Exports'} (${year})**`,
                '',
                table,
                '',
                `**Total: $${formatNumber(summary.total, 0)}**${failureNote(summary.failed)}`,
            ].join('\n');
        }
    );

    registry.register(
        {
            name: 'get_country_trade_profile',
            description: "A country's imports and exports of each critical mineral, with the trade balance.",
            params: [
                { name: 'country', type: 'string', description: 'Reporter code, e.g. "842" for USA', required: true, nonEmpty: true },
                { name: 'year', type: 'string', description: 'Year to query', default: '2023' },
            ],
        },
        async (args, { signal }) => {
            const profile = await client.getCountryTradeProfile(readString(args, 'country'), readString(args, 'year'), { signal });
            return {
                country_code: profile.country_code,
                year: profile.year,
                imports: { ...profile.imports },
                exports: { ...profile.exports },
                total_imports: profile.total_imports,
                total_exports: profile.total_exports,
                trade_balance: profile.trade_balance,
                failed: profile.failed.map((failure) => ({ ...failure })),
            };
        }
    );
}

function filterEntries(entries: ReferenceEntry[], args: ToolArgs, matchIds = false): ReferenceEntry[] {
    const search = readOptionalString(args, 'search')?.toLowerCase();
    const matching = search
        ? entries.filter((entry) => entry.text.toLowerCase().includes(search) || (matchIds && entry.id.includes(search)))
        : entries;
    return matching.slice(0, readInt(args, 'limit'));
}

function entryToJson(entry: ReferenceEntry): { [key: string]: JsonValue } {
    return { id: entry.id, text: entry.text, iso3: entry.iso3, parent: entry.parent };
}

function failureNote(failed: Array<{ reporter: string; kind: string }>): string {
    if (failed.length === 0) return '';
    return `\n\nQueries failed for reporters: ${failed.map((failure) => `${failure.reporter} (${failure.kind})`).join(', ')}`;
}
