import { Command } from 'commander';
import { resolveConfig, isServerName, type CliOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { createSummarizer } from '../llm/summarizer.js';
import { buildRegistry } from '../tools/index.js';
import { toJsonSchema, type ToolRegistry } from '../registry/tool-registry.js';
import { serveStdio, SERVER_VERSION } from '../server/mcp-server.js';
import type { LogLevel, ServerName, ToolsConfig } from '../types/index.js';

interface CommonOptions {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    timeout?: string;
}

const program = new Command();

program
    .name('mineral-data-tools')
    .description('Tool servers for critical-minerals research: arXiv, BGS, NETL EDX/CLAIMM, UN Comtrade, Google Scholar.')
    .version(SERVER_VERSION);

function withCommonOptions(command: Command): Command {
    return command
        .option('--log-level <level>', 'Log level: debug | info | warn | error')
        .option('--json-logs', 'Output JSON logs')
        .option('--timeout <ms>', 'Per-request timeout in milliseconds');
}

function parseServers(names: string[]): ServerName[] | undefined {
    if (names.length === 0) return undefined;
    const invalid = names.filter((name) => !isServerName(name));
    if (invalid.length > 0) {
        throw new Error(`Unknown server(s): ${invalid.join(', ')}. Valid: arxiv, bgs, claimm, comtrade, scholar`);
    }
    return names.filter(isServerName);
}

/**
 * Resolve configuration, start logging and build the sealed registry.
 */
async function bootstrap(servers: string[], opts: CommonOptions): Promise<{ config: Readonly<ToolsConfig>; registry: ToolRegistry }> {
    const timeout = opts.timeout ? parseInt(opts.timeout, 10) : NaN;
    const overrides: CliOverrides = {
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        servers: parseServers(servers),
        requestTimeoutMs: timeout > 0 ? timeout : undefined,
    };

    const config = await resolveConfig(overrides);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const httpClient = createHttpClient(config);
    const summarizer = createSummarizer(config, httpClient);
    return { config, registry: buildRegistry(config.servers, { config, httpClient, summarizer }) };
}

// ─── SERVE command ────────────────────────────────────────

withCommonOptions(
    program
        .command('serve')
        .description('Run an MCP server on stdio exposing the tools of the given servers (default: all)')
        .argument('[servers...]', 'Servers: arxiv | bgs | claimm | cmm | comtrade | scholar')
).action(async (servers: string[], opts: CommonOptions) => {
    try {
        const { config, registry } = await bootstrap(servers, opts);
        getLogger().info({ servers: config.servers }, 'Starting tool server');
        await serveStdio(registry);
    } catch (error) {
        getLogger().error({ error }, 'Server failed to start');
        process.exit(1);
    }
});

// ─── TOOLS command ────────────────────────────────────────

withCommonOptions(
    program
        .command('tools')
        .description('List the tools of the given servers')
        .argument('[servers...]', 'Servers: arxiv | bgs | claimm | cmm | comtrade | scholar')
        .option('--schema', 'Print the JSON input schema of each tool')
).action(async (servers: string[], opts: CommonOptions & { schema?: boolean }) => {
    try {
        const { registry } = await bootstrap(servers, opts);
        for (const descriptor of registry.describe()) {
            console.log(`${descriptor.name}: ${descriptor.description}`);
            if (opts.schema) {
                console.log(JSON.stringify(toJsonSchema(descriptor), null, 2));
            }
        }
    } catch (error) {
        getLogger().error({ error }, 'Listing tools failed');
        process.exit(1);
    }
});

// ─── CALL command ─────────────────────────────────────────

withCommonOptions(
    program
        .command('call')
        .description('Invoke one tool and print its output')
        .argument('<tool>', 'Tool name')
        .argument('[args]', 'Arguments as a JSON object', '{}')
).action(async (tool: string, rawArgs: string, opts: CommonOptions) => {
    let args: unknown;
    try {
        args = JSON.parse(rawArgs);
    } catch {
        console.error(`Arguments must be a JSON object, got: ${rawArgs}`);
        process.exit(1);
    }

    try {
        const { registry } = await bootstrap([], opts);
        const controller = new AbortController();
        process.once('SIGINT', () => controller.abort());

        const result = await registry.invoke(tool, args, controller.signal);
        if (!result.ok) {
            console.error(`${result.error.kind}: ${result.error.reason}`);
            process.exitCode = 1;
            return;
        }
        console.log(typeof result.output === 'string' ? result.output : JSON.stringify(result.output, null, 2));
    } catch (error) {
        getLogger().error({ error }, 'Call failed');
        process.exit(1);
    }
});

program.parseAsync().catch((error: unknown) => {
    getLogger().error({ error }, 'Command failed');
    process.exit(1);
});
