import type { ToolsConfig } from '../types/index.js';
import { NetworkError, ParseError, RateLimitError, ToolError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    /**
     * Take a token, waiting for one when the bucket is empty.
     * @returns false when the signal aborted first; no token is consumed then
     */
    async acquire(signal?: AbortSignal): Promise<boolean> {
        if (signal?.aborted) return false;
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return true;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        this.tokens -= 1;
        const waited = await sleep(waitMs, signal);
        if (!waited) {
            this.tokens += 1;
            return false;
        }
        this.refill();
        return true;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Rate used for sources without an explicit minimum interval.
 */
const DEFAULT_RATE = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    signal?: AbortSignal;
    /** How to decode the body; defaults to JSON */
    responseType?: 'json' | 'text';
}

/**
 * HTTP response wrapper. `data` is the decoded body, still untyped:
 * callers extract fields from it explicitly.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
}

export interface HttpClientOptions {
    timeout?: number;
    userAgent?: string;
    /** Minimum spacing between requests, per source name */
    minIntervals?: Record<string, number>;
}

/**
 * Centralized HTTP client with per-source rate limiting and request timeouts.
 * Failed requests are reported, never retried here.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly minIntervals: Record<string, number>;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.userAgent = options?.userAgent ?? 'mineral-data-tools/1.0';
        this.minIntervals = { ...options?.minIntervals };
    }

    /**
     * Make an HTTP request with rate limiting and a timeout.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
            signal,
            responseType = 'json',
        } = options;

        const logger = getLogger();
        const safeUrl = redactUrl(url);

        // Acquire rate limit token
        const acquired = await this.getBucket(source).acquire(signal);
        if (!acquired) {
            throw new NetworkError('Request was cancelled', 0, { url: safeUrl });
        }

        // Build request options
        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        const controller = new AbortController();
        let timedOut = false;
        const timeoutId = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, timeout);
        const onCallerAbort = (): void => controller.abort();
        signal?.addEventListener('abort', onCallerAbort, { once: true });

        try {
            logger.debug({ method, url: safeUrl, source }, 'HTTP request');

            const response = await fetch(url, {
                method,
                headers: requestHeaders,
                body: requestBody,
                signal: controller.signal,
            });

            const raw = await response.text();

            // Build headers map
            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (response.status === 429) {
                const retryAfterMs = this.parseRetryAfter(response.headers.get('retry-after'));
                logger.warn({ url: safeUrl, source, retryAfterMs }, 'Rate limited by source');
                throw new RateLimitError('Rate limit exceeded, try again later', retryAfterMs, {
                    body: raw.slice(0, 2000),
                    url: safeUrl,
                });
            }

            if (!response.ok) {
                logger.warn(
                    { status: response.status, url: safeUrl, source, body: raw.slice(0, 2000) },
                    'HTTP error from source'
                );
                throw new NetworkError(
                    `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ''}`,
                    response.status,
                    { body: raw.slice(0, 2000), url: safeUrl }
                );
            }

            return {
                status: response.status,
                headers: responseHeaders,
                data: responseType === 'json' ? this.decodeJson(raw, safeUrl) : raw,
            };
        } catch (error) {
            if (error instanceof ToolError) throw error;

            if (timedOut) {
                logger.warn({ url: safeUrl, source, timeout }, 'Request timed out');
                throw new NetworkError(`Request timed out after ${timeout}ms`, 0, { timeout: true, url: safeUrl });
            }

            if (signal?.aborted) {
                throw new NetworkError('Request was cancelled', 0, { url: safeUrl }, { cause: error });
            }

            logger.error({ url: safeUrl, source, error }, 'Network error');
            throw new NetworkError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0,
                { url: safeUrl },
                { cause: error }
            );
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onCallerAbort);
        }
    }

    /**
     * Convenience method for GET requests.
     */
    async get(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post(url: string, body: object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
    }

    private decodeJson(raw: string, url: string): unknown {
        try {
            return JSON.parse(raw);
        } catch (error) {
            getLogger().warn({ url, body: raw.slice(0, 500), error }, 'Response body is not JSON');
            throw new ParseError('Response body is not valid JSON', { cause: error });
        }
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const minInterval = this.minIntervals[source];
            bucket = minInterval && minInterval > 0
                ? new TokenBucket(1000 / minInterval, 1)
                : new TokenBucket(DEFAULT_RATE.tokensPerSecond, DEFAULT_RATE.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }
}

/**
 * Mask credentials passed as query parameters before a URL is logged or reported.
 */
export function redactUrl(url: string): string {
    return url.replace(/([?&](?:api_key|apikey|key|token)=)[^&]*/gi, '$1[redacted]');
}

/**
 * Sleep for the specified number of milliseconds.
 * Resolves false as soon as the signal aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve(false);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve(true);
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Create an HTTP client whose per-source spacing follows the configuration.
 */
export function createHttpClient(config: Readonly<ToolsConfig>): HttpClient {
    return new HttpClient({
        timeout: config.requestTimeoutMs,
        minIntervals: {
            arxiv: config.arxiv.minIntervalMs,
            bgs: config.bgs.minIntervalMs,
            edx: config.edx.minIntervalMs,
            comtrade: config.comtrade.minIntervalMs,
            scholar: config.scholar.minIntervalMs,
        },
    });
}
