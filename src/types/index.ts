/**
 * Barrel export for all shared types.
 */
export type { Field, SourceTag, SourceRecord, WireRecord } from './record.js';
export { DEFAULT_CONFIG, SERVER_NAMES, ARXIV_SORT_OPTIONS } from './config.js';
export type {
    ToolsConfig,
    LogLevel,
    ServerName,
    ArxivSortBy,
    SourceConfig,
    ArxivConfig,
    EdxConfig,
    LlmConfig,
    Credentials,
} from './config.js';
export type { SourceClient, CallOptions } from './source-client.js';
export { LLM_PROVIDERS } from './llm-provider.js';
export type {
    LlmProvider,
    LlmProviderName,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
export type {
    ParamSpec,
    StringParam,
    IntegerParam,
    BooleanParam,
    StringListParam,
    ToolDescriptor,
    JsonValue,
    ToolOutput,
    ToolArgs,
    ToolContext,
    ToolHandler,
    ToolDefinition,
    ToolFailure,
    InvokeResult,
} from './tool.js';
