import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { AuthError, ParseError, ProviderError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { arrayAt, isRecord, numberField, objectAt, textField } from '../sources/utils.js';
import { postToProvider } from './request.js';

const ANTHROPIC_VERSION = '2023-06-01';

/**
 * Anthropic Messages API provider.
 *
 * @see https://docs.anthropic.com/en/api/messages
 */
export class AnthropicProvider implements LlmProvider {
    readonly name = 'anthropic' as const;

    constructor(
        private readonly httpClient: HttpClient,
        private readonly options: LlmProviderOptions
    ) {}

    requireCredential(): string {
        if (!this.options.apiKey) {
            throw new AuthError('ANTHROPIC_API_KEY is not set');
        }
        return this.options.apiKey;
    }

    async complete(prompt: string, params: LlmCompletionParams): Promise<LlmCompletionResult> {
        const apiKey = this.requireCredential();

        const body: Record<string, unknown> = {
            model: params.model,
            max_tokens: params.maxTokens,
            messages: [{ role: 'user', content: prompt }],
        };
        if (params.systemPrompt) {
            body['system'] = params.systemPrompt;
        }

        const data = await postToProvider(this.httpClient, `${this.options.baseUrl}/messages`, body, {
            provider: this.name,
            headers: {
                'x-api-key': apiKey,
                'anthropic-version': ANTHROPIC_VERSION,
            },
            timeoutMs: this.options.timeoutMs,
            signal: params.signal,
        });

        return this.parseMessage(data, params.model);
    }

    /**
     * Join the text blocks of a message. Refusals, truncation and text-less answers are provider errors.
     */
    parseMessage(data: unknown, requestedModel: string): LlmCompletionResult {
        if (!isRecord(data)) {
            throw new ParseError('Anthropic response is not a JSON object');
        }

        const stopReason = textField(data, 'stop_reason');
        if (stopReason.present && stopReason.value === 'refusal') {
            throw new ProviderError('Anthropic refused to answer');
        }
        if (stopReason.present && stopReason.value === 'max_tokens') {
            throw new ProviderError('Anthropic answer was cut off at the token limit');
        }

        const text = arrayAt(data, 'content')
            .filter((block) => isRecord(block) && block['type'] === 'text')
            .map((block) => textField(block, 'text'))
            .flatMap((field) => (field.present ? [field.value] : []))
            .join('\n')
            .trim();

        if (!text) {
            getLogger().warn({ provider: this.name, stopReason: stopReason.present ? stopReason.value : null }, 'No text block in answer');
            throw new ProviderError('Anthropic returned no text');
        }

        const usage = objectAt(data, 'usage');
        const inputTokens = numberField(usage, 'input_tokens');
        const outputTokens = numberField(usage, 'output_tokens');
        const model = textField(data, 'model');

        return {
            text,
            usage: {
                promptTokens: inputTokens.present ? inputTokens.value : 0,
                completionTokens: outputTokens.present ? outputTokens.value : 0,
            },
            model: model.present ? model.value : requestedModel,
            provider: this.name,
        };
    }
}
