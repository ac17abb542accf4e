import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { AuthError, ParseError, ProviderError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { arrayAt, isRecord, numberField, objectAt, textField } from '../sources/utils.js';
import { postToProvider } from './request.js';

/**
 * OpenAI Chat Completions provider.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */
export class OpenAiProvider implements LlmProvider {
    readonly name = 'openai' as const;

    constructor(
        private readonly httpClient: HttpClient,
        private readonly options: LlmProviderOptions
    ) {}

    requireCredential(): string {
        if (!this.options.apiKey) {
            throw new AuthError('OPENAI_API_KEY is not set');
        }
        return this.options.apiKey;
    }

    async complete(prompt: string, params: LlmCompletionParams): Promise<LlmCompletionResult> {
        const apiKey = this.requireCredential();

        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) {
            messages.push({ role: 'system', content: params.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        const body: Record<string, unknown> = {
            model: params.model,
            messages,
            max_tokens: params.maxTokens,
        };

        const data = await postToProvider(this.httpClient, `${this.options.baseUrl}/chat/completions`, body, {
            provider: this.name,
            headers: { Authorization: `Bearer ${apiKey}` },
            timeoutMs: this.options.timeoutMs,
            signal: params.signal,
        });

        return this.parseCompletion(data, params.model);
    }

    /**
     * Extract the first choice. Filtered, truncated, refused or empty answers are provider errors.
     */
    parseCompletion(data: unknown, requestedModel: string): LlmCompletionResult {
        if (!isRecord(data)) {
            throw new ParseError('OpenAI response is not a JSON object');
        }

        const choice = arrayAt(data, 'choices')[0];
        const message = objectAt(choice, 'message');
        if (!message) {
            getLogger().error({ provider: this.name, response: data }, 'OpenAI response has no message');
            throw new ParseError('OpenAI response has no message');
        }

        const finishReason = textField(choice, 'finish_reason');
        if (finishReason.present && finishReason.value === 'content_filter') {
            throw new ProviderError('OpenAI withheld the answer (content filter)');
        }
        if (finishReason.present && finishReason.value === 'length') {
            throw new ProviderError('OpenAI answer was cut off at the token limit');
        }

        const refusal = textField(message, 'refusal');
        if (refusal.present) {
            throw new ProviderError(`OpenAI refused: ${refusal.value}`);
        }

        const content = textField(message, 'content');
        if (!content.present) {
            throw new ProviderError('OpenAI returned an empty answer');
        }

        const usage = objectAt(data, 'usage');
        const model = textField(data, 'model');
        return {
            text: content.value,
            usage: {
                promptTokens: fieldValue(numberField(usage, 'prompt_tokens')),
                completionTokens: fieldValue(numberField(usage, 'completion_tokens')),
            },
            model: model.present ? model.value : requestedModel,
            provider: this.name,
        };
    }
}

function fieldValue(field: ReturnType<typeof numberField>): number {
    return field.present ? field.value : 0;
}
