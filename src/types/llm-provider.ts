/**
 * LLM vendors a summary can be requested from.
 */
export type LlmProviderName = 'openai' | 'anthropic';

export const LLM_PROVIDERS: readonly LlmProviderName[] = ['openai', 'anthropic'];

/**
 * Interface for LLM provider adapters (OpenAI, Anthropic).
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: LlmProviderName;

    /**
     * The configured API key. Throws AuthError when none is set.
     */
    requireCredential(): string;

    /**
     * Send a single-turn completion request to the LLM.
     * @returns The first generated text segment
     */
    complete(prompt: string, params: LlmCompletionParams): Promise<LlmCompletionResult>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Concrete model name (already resolved from "auto") */
    model: string;
    /** Maximum tokens in response */
    maxTokens: number;
    /** System prompt */
    systemPrompt?: string;
    /** Abort signal from the calling tool invocation */
    signal?: AbortSignal;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Generated text */
    text: string;
    /** Token usage, when the provider reports it */
    usage: {
        promptTokens: number;
        completionTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: LlmProviderName;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key; providers refuse to run without one */
    apiKey?: string;
    /** Base URL of the vendor API */
    baseUrl: string;
    /** Request timeout in milliseconds */
    timeoutMs: number;
}
