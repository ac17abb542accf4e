import type { LlmProviderName } from './llm-provider.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Names of the tool servers a process can expose.
 */
export type ServerName = 'arxiv' | 'bgs' | 'claimm' | 'cmm' | 'comtrade' | 'scholar';

export const SERVER_NAMES: readonly ServerName[] = ['arxiv', 'bgs', 'claimm', 'cmm', 'comtrade', 'scholar'];

/**
 * arXiv sort keys accepted by the export API.
 */
export type ArxivSortBy = 'relevance' | 'lastUpdatedDate' | 'submittedDate';

export const ARXIV_SORT_OPTIONS: readonly ArxivSortBy[] = ['relevance', 'lastUpdatedDate', 'submittedDate'];

/**
 * Settings shared by every external source.
 */
export interface SourceConfig {
    /** Fixed base endpoint */
    baseUrl: string;
    /** Upper bound on result counts accepted from callers */
    maxResults: number;
    /** Minimum spacing between requests to this source, in milliseconds */
    minIntervalMs: number;
}

export interface ArxivConfig extends SourceConfig {
    defaultSort: ArxivSortBy;
}

export interface EdxConfig extends SourceConfig {
    /** EDX group holding the CLAIMM submissions */
    group: string;
}

/**
 * LLM configuration. Models given here replace the "auto" defaults.
 */
export interface LlmConfig {
    defaultProvider: LlmProviderName;
    models: Record<LlmProviderName, string>;
    baseUrls: Record<LlmProviderName, string>;
    maxTokens: number;
    timeoutMs: number;
}

/**
 * Credentials are read from the environment only, never from the config file.
 */
export interface Credentials {
    openaiApiKey?: string;
    anthropicApiKey?: string;
    edxApiKey?: string;
    comtradeApiKey?: string;
    serpApiKey?: string;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ToolsConfig {
    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Which servers to expose
    servers: ServerName[];

    // Network
    requestTimeoutMs: number;

    // Sources
    arxiv: ArxivConfig;
    bgs: SourceConfig;
    edx: EdxConfig;
    comtrade: SourceConfig;
    scholar: SourceConfig;

    // LLM
    llm: LlmConfig;

    credentials: Credentials;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ToolsConfig = {
    logLevel: 'info',
    jsonLogs: false,
    servers: [...SERVER_NAMES],
    requestTimeoutMs: 30000,
    arxiv: {
        baseUrl: 'https://export.arxiv.org/api/query',
        maxResults: 100,
        minIntervalMs: 3000,
        defaultSort: 'relevance',
    },
    bgs: {
        baseUrl: 'https://ogcapi.bgs.ac.uk/collections/world-mineral-statistics',
        maxResults: 5000,
        minIntervalMs: 200,
    },
    edx: {
        baseUrl: 'https://edx.netl.doe.gov/api/3/action',
        maxResults: 1000,
        minIntervalMs: 200,
        group: 'claimm-mine-waste',
    },
    comtrade: {
        baseUrl: 'https://comtradeapi.un.org',
        maxResults: 500,
        minIntervalMs: 300,
    },
    scholar: {
        baseUrl: 'https://serpapi.com/search.json',
        maxResults: 20,
        minIntervalMs: 1000,
    },
    llm: {
        defaultProvider: 'openai',
        models: {
            openai: 'gpt-4o',
            anthropic: 'claude-sonnet-4-20250514',
        },
        baseUrls: {
            openai: 'https://api.openai.com/v1',
            anthropic: 'https://api.anthropic.com/v1',
        },
        maxTokens: 1000,
        timeoutMs: 60000,
    },
    credentials: {},
};
