import type { ToolRegistry } from '../registry/tool-registry.js';
import {
    orderedRange,
    readBool,
    readEnum,
    readInt,
    readList,
    readOptionalInt,
    readOptionalString,
    readString,
} from '../registry/params.js';
import {
    BGS_STATISTIC_TYPES,
    BgsClient,
    categorizeCommodities,
    type BgsStatisticType,
} from '../sources/bgs.js';
import { fieldOr } from '../sources/utils.js';
import { formatNumber, formatPercent, markdownTable } from '../format/text.js';
import type { ParamSpec, ToolArgs } from '../types/index.js';
import type { ToolDependencies } from './dependencies.js';

const statisticParam: ParamSpec = {
    name: 'statistic_type',
    type: 'string',
    description: 'Kind of statistic',
    enum: BGS_STATISTIC_TYPES,
    default: 'Production',
};

const commodityParam: ParamSpec = {
    name: 'commodity',
    type: 'string',
    description: 'Commodity name as used by BGS, e.g. "lithium minerals" or "cobalt, mine"',
    required: true,
    nonEmpty: true,
};

const yearRangeParams: ParamSpec[] = [
    { name: 'year_from', type: 'integer', description: 'First year (inclusive)', minimum: 1900, maximum: 2100 },
    { name: 'year_to', type: 'integer', description: 'Last year (inclusive)', minimum: 1900, maximum: 2100 },
];

const checkYearRange = orderedRange('year_from', 'year_to');

const API_INFO = `**BGS World Mineral Statistics API**

**Data Source:** British Geological Survey
**License:** Open Government Licence

**API Endpoint:** {baseUrl}

**Time Coverage:**
- Full data: 1970 - 2022+
- Historical archives: 1913 - 1969 (PDF only)

**Statistics Types:**
- Production (mine output)
- Imports
- Exports

**Data Fields:**
- \`commodity\`: Mineral/metal name
- \`country\`: Country name
- \`country_iso2/iso3\`: ISO country codes
- \`year\`: Data year
- \`quantity\`: Numeric value
- \`units\`: Measurement units (tonnes, kg, etc.)

**Usage Tips:**
1. Use \`list_commodities\` with \`critical_only=true\` for strategic minerals
2. Use \`get_commodity_ranking\` for top producers
3. Use \`get_time_series\` for trend analysis
4. Use \`compare_countries\` for supply chain analysis

**Website:** https://www.bgs.ac.uk/mineralsuk/statistics/world-mineral-statistics/
`;

export function registerBgsTools(registry: ToolRegistry, deps: ToolDependencies): void {
    const { config, httpClient } = deps;
    const client = new BgsClient(httpClient, config.bgs);

    registry.register(
        {
            name: 'list_commodities',
            description: 'List mineral commodities in the BGS database, grouped by category.',
            params: [
                {
                    name: 'critical_only',
                    type: 'boolean',
                    description: 'Only the predefined critical minerals (no request needed)',
                    default: false,
                },
            ],
        },
        async (args, { signal }) => {
            const criticalOnly = readBool(args, 'critical_only');
            const commodities = await client.listCommodities(criticalOnly, { signal });

            const sections = [
                criticalOnly ? '**Critical Minerals (Pre-defined List)**' : '**All Available Commodities**',
                `Total: ${commodities.length} commodities`,
            ];
            for (const group of categorizeCommodities(commodities)) {
                sections.push(`**${group.label}:**\n${group.items.map((item) => `- ${item}`).join('\n')}`);
            }
            return sections.join('\n\n');
        }
    );

    registry.register(
        {
            name: 'list_countries',
            description: 'List countries with mineral statistics, optionally only those reporting a commodity.',
            params: [{ name: 'commodity', type: 'string', description: 'Only countries reporting this commodity' }],
        },
        async (args, { signal }) => {
            const commodity = readOptionalString(args, 'commodity');
            const countries = await client.listCountries(commodity, { signal });

            const heading = commodity ? `**Countries Producing: ${commodity}**` : '**Countries in BGS Database**';
            const table = markdownTable(
                ['Country', 'ISO2', 'ISO3'],
                countries.map((country) => [country.name, country.iso2 ?? '-', country.iso3 ?? '-'])
            );
            return `${heading}\n\nTotal: ${countries.length} countries\n\n${table}`;
        }
    );

    registry.register(
        {
            name: 'search_production',
            description: 'Search production, import or export statistics for a commodity.',
            params: [
                commodityParam,
                { name: 'country', type: 'string', description: 'Country name or ISO2/ISO3 code' },
                ...yearRangeParams,
                statisticParam,
                {
                    name: 'limit',
                    type: 'integer',
                    description: 'Maximum number of records',
                    default: 50,
                    minimum: 1,
                    maximum: config.bgs.maxResults,
                },
            ],
            check: checkYearRange,
        },
        async (args, { signal }) => {
            const commodity = readString(args, 'commodity');
            const country = readOptionalString(args, 'country');
            const { yearFrom, yearTo } = readYearRange(args);
            const statisticType = readStatistic(args);

            const records = await client.searchProduction(
                { commodity, country, yearFrom, yearTo, statisticType, limit: readInt(args, 'limit') },
                { signal }
            );

            if (records.length === 0) {
                return `No ${statisticType.toLowerCase()} data found for ${commodity}${country ? ` in ${country}` : ''}`;
            }

            const lines = [`**${commodity} - ${statisticType}**`, ''];
            if (country) lines.push(`Country: ${country}`);
            if (yearFrom !== undefined || yearTo !== undefined) {
                lines.push(`Years: ${yearFrom ?? 'start'} - ${yearTo ?? 'present'}`);
            }
            lines.push(`Records: ${records.length}`, '');
            lines.push(markdownTable(
                ['Country', 'Year', 'Quantity', 'Units'],
                records.map((record) => {
                    const quantity = record.numbers['quantity'];
                    return [
                        fieldOr(record.text['country'], record.title),
                        fieldOr(record.numbers['year'], 'N/A'),
                        quantity?.present ? formatNumber(quantity.value) : 'N/A',
                        fieldOr(record.text['units'], 'N/A'),
                    ];
                })
            ));
            return lines.join('\n');
        }
    );

    registry.register(
        {
            name: 'get_commodity_ranking',
            description: 'Top countries for a commodity in one year (latest year when omitted), with shares.',
            params: [
                commodityParam,
                { name: 'year', type: 'integer', description: 'Year to rank', minimum: 1900, maximum: 2100 },
                statisticParam,
                { name: 'top_n', type: 'integer', description: 'Number of countries', default: 15, minimum: 1, maximum: 100 },
            ],
        },
        async (args, { signal }) => {
            const commodity = readString(args, 'commodity');
            const year = readOptionalInt(args, 'year');
            const statisticType = readStatistic(args);

            const ranking = await client.getCommodityRanking(commodity, year, statisticType, readInt(args, 'top_n'), { signal });
            if (!ranking) {
                return `No data found for ${commodity}${year !== undefined ? ` in ${year}` : ''}`;
            }

            const units = ranking.units ?? 'N/A';
            const table = markdownTable(
                ['Rank', 'Country', 'Quantity', 'Share'],
                ranking.rows.map((row, index) => [index + 1, row.country, formatNumber(row.quantity), formatPercent(row.share)])
            );
            return [
                `**${commodity} - Top ${statisticType} Countries (${ranking.year})**`,
                '',
                `Units: ${units}`,
                '',
                table,
                '',
                `**Total (top ${ranking.rows.length}): ${formatNumber(ranking.total)} ${units}**`,
            ].join('\n');
        }
    );

    registry.register(
        {
            name: 'get_time_series',
            description: 'Yearly values for a commodity with year-over-year change; global totals without a country.',
            params: [
                commodityParam,
                { name: 'country', type: 'string', description: 'Country name or ISO2/ISO3 code' },
                statisticParam,
            ],
        },
        async (args, { signal }) => {
            const commodity = readString(args, 'commodity');
            const country = readOptionalString(args, 'country');
            const statisticType = readStatistic(args);

            const series = await client.getTimeSeries(commodity, country, statisticType, { signal });
            if (!series) {
                return `No time series data found for ${commodity}${country ? ` in ${country}` : ''}`;
            }

            const scope = series.country ?? 'Global';
            const table = markdownTable(
                ['Year', country ? 'Quantity' : 'Total Quantity', 'YoY Change'],
                series.points.map((point) => [
                    point.year,
                    formatNumber(point.quantity),
                    point.change === null ? '-' : formatPercent(point.change, { signed: true }),
                ])
            );
            return [
                `**${commodity} - ${scope} ${statisticType} Time Series**`,
                '',
                `Units: ${series.units ?? 'N/A'}`,
                '',
                table,
            ].join('\n');
        }
    );

    registry.register(
        {
            name: 'compare_countries',
            description: 'Compare a commodity across countries, one column per country and one row per year.',
            params: [
                commodityParam,
                {
                    name: 'countries',
                    type: 'string[]',
                    description: 'Country names or ISO codes',
                    required: true,
                    minItems: 1,
                },
                ...yearRangeParams,
                statisticParam,
            ],
            check: checkYearRange,
        },
        async (args, { signal }) => {
            const commodity = readString(args, 'commodity');
            const countries = readList(args, 'countries');
            const statisticType = readStatistic(args);

            const comparison = await client.compareCountries(commodity, countries, readYearRange(args), statisticType, { signal });
            if (comparison.countries.every((country) => country.values.length === 0)) {
                return `No comparison data found for ${commodity} in specified countries`;
            }

            const years = [...new Set(comparison.countries.flatMap((country) => country.values.map((value) => value.year)))]
                .sort((a, b) => a - b);
            const table = markdownTable(
                ['Year', ...comparison.countries.map((country) => country.label.slice(0, 15))],
                years.map((year) => [
                    year,
                    ...comparison.countries.map((country) => {
                        const quantity = country.values.find((value) => value.year === year)?.quantity;
                        return quantity === undefined || quantity === null ? '-' : formatNumber(quantity, 0);
                    }),
                ])
            );
            return [
                `**${commodity} - Country Comparison (${statisticType})**`,
                '',
                `Units: ${comparison.units ?? 'N/A'}`,
                '',
                table,
            ].join('\n');
        }
    );

    registry.register(
        {
            name: 'get_country_profile',
            description: 'Every commodity a country reports for one year (latest year when omitted).',
            params: [
                { name: 'country', type: 'string', description: 'Country name or ISO2/ISO3 code', required: true, nonEmpty: true },
                { name: 'year', type: 'integer', description: 'Year to profile', minimum: 1900, maximum: 2100 },
                statisticParam,
            ],
        },
        async (args, { signal }) => {
            const country = readString(args, 'country');
            const statisticType = readStatistic(args);

            const profile = await client.getCountryProfile(country, readOptionalInt(args, 'year'), statisticType, { signal });
            if (!profile) {
                return `No ${statisticType.toLowerCase()} data found for ${country}`;
            }

            const table = markdownTable(
                ['Commodity', 'Quantity', 'Units'],
                profile.commodities.map((row) => [row.commodity, formatNumber(row.quantity), row.units ?? 'N/A'])
            );
            return [
                `**${profile.country} - ${statisticType} Profile (${profile.year ?? 'N/A'})**`,
                '',
                `Commodities: ${profile.commodities.length}`,
                '',
                table,
            ].join('\n');
        }
    );

    registry.register(
        {
            name: 'get_api_info',
            description: 'Describe the BGS World Mineral Statistics API and its coverage.',
            params: [],
        },
        async () => API_INFO.replace('{baseUrl}', config.bgs.baseUrl)
    );
}

function readStatistic(args: ToolArgs): BgsStatisticType {
    return readEnum(args, 'statistic_type', BGS_STATISTIC_TYPES);
}

function readYearRange(args: ToolArgs): { yearFrom?: number; yearTo?: number } {
    return { yearFrom: readOptionalInt(args, 'year_from'), yearTo: readOptionalInt(args, 'year_to') };
}
