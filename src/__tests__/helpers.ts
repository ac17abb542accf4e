import { readFileSync } from 'node:fs';
import { vi } from 'vitest';
import type { Credentials, ToolsConfig } from '../types/index.js';
import { mergeConfig } from '../utils/config.js';
import { HttpClient } from '../utils/http-client.js';

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * Replace global fetch with a mock answering the given responses in order.
 * Any request beyond them fails.
 */
export function mockFetch(...responses: Array<Response | Error>) {
    const fetchMock = vi.fn<FetchFn>();
    for (const response of responses) {
        if (response instanceof Error) {
            fetchMock.mockRejectedValueOnce(response);
        } else {
            fetchMock.mockResolvedValueOnce(response);
        }
    }
    fetchMock.mockRejectedValue(new Error('unexpected request'));
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

export type FetchMock = ReturnType<typeof mockFetch>;

export function jsonResponse(body: unknown, status = 200, statusText = ''): Response {
    return new Response(JSON.stringify(body), {
        status,
        statusText,
        headers: { 'content-type': 'application/json' },
    });
}

export function textResponse(body: string, status = 200): Response {
    return new Response(body, { status, headers: { 'content-type': 'application/atom+xml' } });
}

export function calledUrl(fetchMock: FetchMock, index = 0): URL {
    const input = fetchMock.mock.calls[index]?.[0];
    return new URL(typeof input === 'string' ? input : String(input));
}

export function calledHeaders(fetchMock: FetchMock, index = 0): Headers {
    return new Headers(fetchMock.mock.calls[index]?.[1]?.headers);
}

export function calledBody(fetchMock: FetchMock, index = 0): unknown {
    return JSON.parse(String(fetchMock.mock.calls[index]?.[1]?.body));
}

export function testConfig(credentials: Credentials = {}): ToolsConfig {
    return mergeConfig([], credentials);
}

export function testHttpClient(): HttpClient {
    return new HttpClient({ timeout: 5000 });
}

export function readFixture(name: string): string {
    return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

export function jsonFixture(name: string): unknown {
    return JSON.parse(readFixture(name));
}
