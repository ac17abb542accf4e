import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    SERVER_NAMES,
    LLM_PROVIDERS,
    type ToolsConfig,
    type Credentials,
    type LlmProviderName,
    type ServerName,
} from '../types/index.js';
import { getLogger } from './logger.js';

const CONFIG_MODULE = 'mineraldata';

const sourceSchema = z.object({
    baseUrl: z.string().url(),
    maxResults: z.number().int().positive(),
    minIntervalMs: z.number().int().nonnegative(),
}).partial();

const providerName = z.enum(['openai', 'anthropic']);

/**
 * Shape accepted from mineraldata.config.json. Credentials are not accepted here.
 */
const fileConfigSchema = z.object({
    logLevel: z.enum(['error', 'warn', 'info', 'debug']),
    jsonLogs: z.boolean(),
    servers: z.array(z.enum(['arxiv', 'bgs', 'claimm', 'cmm', 'comtrade', 'scholar'])),
    requestTimeoutMs: z.number().int().positive(),
    arxiv: sourceSchema.extend({ defaultSort: z.enum(['relevance', 'lastUpdatedDate', 'submittedDate']) }).partial(),
    bgs: sourceSchema,
    edx: sourceSchema.extend({ group: z.string().min(1) }).partial(),
    comtrade: sourceSchema,
    scholar: sourceSchema,
    llm: z.object({
        defaultProvider: providerName,
        models: z.object({ openai: z.string().min(1), anthropic: z.string().min(1) }).partial(),
        baseUrls: z.object({ openai: z.string().url(), anthropic: z.string().url() }).partial(),
        maxTokens: z.number().int().positive(),
        timeoutMs: z.number().int().positive(),
    }).partial(),
}).partial().strict();

type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Overrides coming from CLI flags.
 */
export interface CliOverrides {
    logLevel?: ToolsConfig['logLevel'];
    jsonLogs?: boolean;
    servers?: ServerName[];
    requestTimeoutMs?: number;
}

/**
 * Load configuration from mineraldata.config.json using cosmiconfig.
 * Returns null when no config file is found; defaults then apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig(CONFIG_MODULE, {
        searchPlaces: [`${CONFIG_MODULE}.config.json`],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = fileConfigSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues },
                    'Invalid config file, using defaults'
                );
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables (non-secret settings).
 */
function loadEnvVars(env: NodeJS.ProcessEnv): FileConfig {
    const result: FileConfig = {};

    const logLevel = env['LOG_LEVEL'];
    if (logLevel === 'error' || logLevel === 'warn' || logLevel === 'info' || logLevel === 'debug') {
        result.logLevel = logLevel;
    }

    const timeout = parseInt(env['REQUEST_TIMEOUT_MS'] ?? '', 10);
    if (!isNaN(timeout) && timeout > 0) {
        result.requestTimeoutMs = timeout;
    }

    const provider = env['DEFAULT_LLM_PROVIDER'];
    const llm: NonNullable<FileConfig['llm']> = {};
    if (isProviderName(provider)) {
        llm.defaultProvider = provider;
    }
    const models: { openai?: string; anthropic?: string } = {};
    if (env['OPENAI_MODEL']) models.openai = env['OPENAI_MODEL'];
    if (env['ANTHROPIC_MODEL']) models.anthropic = env['ANTHROPIC_MODEL'];
    if (Object.keys(models).length > 0) llm.models = models;
    if (Object.keys(llm).length > 0) result.llm = llm;

    const edx: NonNullable<FileConfig['edx']> = {};
    if (env['EDX_BASE_URL']) edx.baseUrl = env['EDX_BASE_URL'];
    if (env['CLAIMM_GROUP']) edx.group = env['CLAIMM_GROUP'];
    if (Object.keys(edx).length > 0) result.edx = edx;

    return result;
}

/**
 * API keys, one variable per provider. Absent keys disable only the tools that need them.
 */
export function loadCredentials(env: NodeJS.ProcessEnv): Credentials {
    const pick = (name: string): string | undefined => {
        const value = env[name]?.trim();
        return value ? value : undefined;
    };

    return {
        openaiApiKey: pick('OPENAI_API_KEY'),
        anthropicApiKey: pick('ANTHROPIC_API_KEY'),
        edxApiKey: pick('EDX_API_KEY'),
        comtradeApiKey: pick('UNCOMTRADE_API_KEY'),
        serpApiKey: pick('SERPAPI_API_KEY'),
    };
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults.
 * The result is deep-frozen: nothing may mutate it at run time.
 */
export async function resolveConfig(
    cliFlags: CliOverrides,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<Readonly<ToolsConfig>> {
    const env = options.env ?? process.env;
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(env);

    return deepFreeze(mergeConfig([fileConfig ?? {}, envConfig, cliFlags], loadCredentials(env)));
}

/**
 * Layer partial configs over DEFAULT_CONFIG, later layers winning.
 */
export function mergeConfig(layers: FileConfig[], credentials: Credentials): ToolsConfig {
    const merged: ToolsConfig = {
        ...DEFAULT_CONFIG,
        servers: [...DEFAULT_CONFIG.servers],
        arxiv: { ...DEFAULT_CONFIG.arxiv },
        bgs: { ...DEFAULT_CONFIG.bgs },
        edx: { ...DEFAULT_CONFIG.edx },
        comtrade: { ...DEFAULT_CONFIG.comtrade },
        scholar: { ...DEFAULT_CONFIG.scholar },
        llm: {
            ...DEFAULT_CONFIG.llm,
            models: { ...DEFAULT_CONFIG.llm.models },
            baseUrls: { ...DEFAULT_CONFIG.llm.baseUrls },
        },
        credentials,
    };

    for (const layer of layers) {
        if (layer.logLevel !== undefined) merged.logLevel = layer.logLevel;
        if (layer.jsonLogs !== undefined) merged.jsonLogs = layer.jsonLogs;
        if (layer.servers !== undefined && layer.servers.length > 0) merged.servers = [...layer.servers];
        if (layer.requestTimeoutMs !== undefined) merged.requestTimeoutMs = layer.requestTimeoutMs;

        // Deep merge nested objects
        merged.arxiv = { ...merged.arxiv, ...layer.arxiv };
        merged.bgs = { ...merged.bgs, ...layer.bgs };
        merged.edx = { ...merged.edx, ...layer.edx };
        merged.comtrade = { ...merged.comtrade, ...layer.comtrade };
        merged.scholar = { ...merged.scholar, ...layer.scholar };

        if (layer.llm) {
            const { models, baseUrls, ...rest } = layer.llm;
            merged.llm = {
                ...merged.llm,
                ...rest,
                models: { ...merged.llm.models, ...models },
                baseUrls: { ...merged.llm.baseUrls, ...baseUrls },
            };
        }
    }

    return merged;
}

function deepFreeze<T>(value: T): Readonly<T> {
    if (value && typeof value === 'object') {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

function isProviderName(value: string | undefined): value is LlmProviderName {
    return LLM_PROVIDERS.some((name) => name === value);
}

export function isServerName(value: string): value is ServerName {
    return SERVER_NAMES.some((name) => name === value);
}
