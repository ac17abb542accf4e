import type { LlmProviderName, ParamSpec } from '../types/index.js';
import { LLM_PROVIDERS } from '../types/index.js';
import { AUTO_MODEL } from '../llm/summarizer.js';

/**
 * Provider and model parameters shared by the summarizing tools.
 */
export function llmParams(defaultProvider: LlmProviderName): ParamSpec[] {
    return [
        {
            name: 'llm_provider',
            type: 'string',
            description: 'LLM vendor to summarize with',
            enum: LLM_PROVIDERS,
            default: defaultProvider,
        },
        {
            name: 'model',
            type: 'string',
            description: `Model name, or "${AUTO_MODEL}" for the provider default`,
            default: AUTO_MODEL,
        },
    ];
}
