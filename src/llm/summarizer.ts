import type { LlmConfig, LlmProvider, LlmProviderName, ToolsConfig } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAiProvider } from './openai.js';

/** Model value that selects the provider's configured default */
export const AUTO_MODEL = 'auto';

export const DEFAULT_INSTRUCTION =
    'Summarize the following text concisely for a technical reader. ' +
    'Cover the main problem, the approach, and the key findings.';

const SYSTEM_PROMPT = 'You are a research assistant that summarizes technical material clearly and concisely.';

export interface SummaryOptions {
    /** Replaces the default instruction placed before the text */
    instruction?: string;
    signal?: AbortSignal;
}

export interface Summary {
    text: string;
    provider: LlmProviderName;
    model: string;
}

/**
 * Single-turn summarization against one of the configured LLM providers.
 * The chosen provider never falls back to another one.
 */
export class Summarizer {
    constructor(
        private readonly providers: Readonly<Record<LlmProviderName, LlmProvider>>,
        private readonly config: Readonly<LlmConfig>
    ) {}

    get defaultProvider(): LlmProviderName {
        return this.config.defaultProvider;
    }

    /**
     * Concrete model for a request: "auto" or nothing selects the provider default.
     */
    resolveModel(provider: LlmProviderName, model?: string): string {
        const requested = model?.trim();
        return !requested || requested === AUTO_MODEL ? this.config.models[provider] : requested;
    }

    /**
     * Fails with AuthError when the provider has no API key, before any other work is done.
     */
    requireCredential(provider: LlmProviderName = this.config.defaultProvider): void {
        this.providers[provider].requireCredential();
    }

    async summarize(
        text: string,
        provider: LlmProviderName = this.config.defaultProvider,
        model?: string,
        options: SummaryOptions = {}
    ): Promise<Summary> {
        const body = text.trim();
        if (!body) {
            throw new ValidationError('text', 'nothing to summarize');
        }

        const resolvedModel = this.resolveModel(provider, model);
        const prompt = `${options.instruction ?? DEFAULT_INSTRUCTION}\n\n${body}`;

        getLogger().debug({ provider, model: resolvedModel, chars: body.length }, 'Requesting summary');

        const result = await this.providers[provider].complete(prompt, {
            model: resolvedModel,
            maxTokens: this.config.maxTokens,
            systemPrompt: SYSTEM_PROMPT,
            signal: options.signal,
        });

        getLogger().debug({ provider, model: result.model, usage: result.usage }, 'Summary received');
        return { text: result.text, provider, model: resolvedModel };
    }
}

/**
 * Summarizer wired to both vendors with credentials from configuration.
 */
export function createSummarizer(config: Readonly<ToolsConfig>, httpClient: HttpClient): Summarizer {
    const { llm, credentials } = config;
    return new Summarizer(
        {
            openai: new OpenAiProvider(httpClient, {
                apiKey: credentials.openaiApiKey,
                baseUrl: llm.baseUrls.openai,
                timeoutMs: llm.timeoutMs,
            }),
            anthropic: new AnthropicProvider(httpClient, {
                apiKey: credentials.anthropicApiKey,
                baseUrl: llm.baseUrls.anthropic,
                timeoutMs: llm.timeoutMs,
            }),
        },
        llm
    );
}
