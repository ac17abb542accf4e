import type { LlmProviderName } from '../types/index.js';
import type { HttpClient } from '../utils/http-client.js';
import { AuthError, NetworkError } from '../utils/errors.js';

/**
 * POST a JSON body to an LLM vendor. Rejected credentials become AuthError.
 */
export async function postToProvider(
    httpClient: HttpClient,
    url: string,
    body: object,
    options: {
        provider: LlmProviderName;
        headers: Record<string, string>;
        timeoutMs: number;
        signal?: AbortSignal;
    }
): Promise<unknown> {
    try {
        const response = await httpClient.post(url, body, {
            source: options.provider,
            headers: { Accept: 'application/json', ...options.headers },
            timeout: options.timeoutMs,
            signal: options.signal,
        });
        return response.data;
    } catch (error) {
        if (error instanceof NetworkError && (error.status === 401 || error.status === 403)) {
            throw new AuthError(`${options.provider} rejected the API key`, { cause: error });
        }
        throw error;
    }
}
