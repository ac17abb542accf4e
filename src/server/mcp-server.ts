import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { toJsonSchema, type ToolRegistry } from '../registry/tool-registry.js';
import type { InvokeResult } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export const SERVER_NAME = 'mineral-data-tools';
export const SERVER_VERSION = '1.0.0';

export interface CallToolResult {
    [key: string]: unknown;
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
}

/**
 * Render an invocation result as MCP tool content. Structured output is
 * pretty-printed JSON; failures carry their kind and reason only.
 */
export function toCallToolResult(result: InvokeResult): CallToolResult {
    if (!result.ok) {
        return {
            content: [{ type: 'text', text: `${result.error.kind}: ${result.error.reason}` }],
            isError: true,
        };
    }
    const text = typeof result.output === 'string' ? result.output : JSON.stringify(result.output, null, 2);
    return { content: [{ type: 'text', text }] };
}

/**
 * MCP server exposing every tool of a sealed registry.
 */
export function createMcpServer(registry: ToolRegistry): Server {
    const server = new Server(
        { name: SERVER_NAME, version: SERVER_VERSION },
        { capabilities: { tools: {} } }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: registry.describe().map((descriptor) => ({
            name: descriptor.name,
            description: descriptor.description,
            inputSchema: toJsonSchema(descriptor),
        })),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
        const result = await registry.invoke(request.params.name, request.params.arguments ?? {}, extra.signal);
        return toCallToolResult(result);
    });

    return server;
}

/**
 * Serve the registry over stdio until the client disconnects.
 */
export async function serveStdio(registry: ToolRegistry): Promise<void> {
    const server = createMcpServer(registry);
    const transport = new StdioServerTransport();

    server.onerror = (error) => {
        getLogger().error({ error }, 'MCP server error');
    };

    await server.connect(transport);
    getLogger().info({ tools: registry.describe().length }, 'MCP server listening on stdio');
}
