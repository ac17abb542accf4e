import type { ToolsConfig } from '../types/index.js';
import type { Summarizer } from '../llm/summarizer.js';
import type { HttpClient } from '../utils/http-client.js';

/**
 * Shared services handed to every tool module.
 */
export interface ToolDependencies {
    config: Readonly<ToolsConfig>;
    httpClient: HttpClient;
    summarizer: Summarizer;
}
