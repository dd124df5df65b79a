import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { createSilentLogger } from '../utils/logger.js';
import { brokenBodyResponse, jsonResponse } from './fixtures.js';

function makeClient(sleep = vi.fn(async (_ms: number) => {})): { client: HttpClient; sleep: typeof sleep } {
    const client = new HttpClient({
        timeout: 5000,
        version: '2.0.0',
        email: 'team@example.cl',
        sleep,
        logger: createSilentLogger(),
    });
    return { client, sleep };
}

describe('HttpClient', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            const { client } = makeClient();
            expect(client.getRequestCount('openalex')).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
        });

        it('should count every attempt per source and reset', async () => {
            const mockFetch = vi
                .fn()
                .mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
                .mockResolvedValueOnce(jsonResponse({ ok: true }));
            vi.stubGlobal('fetch', mockFetch);

            const { client } = makeClient();
            await client.getJson('https://api.example.org/x', { source: 'openalex' });

            expect(client.getAllRequestCounts()).toEqual({ openalex: 2 });
            client.resetCounts();
            expect(client.getRequestCount('openalex')).toBe(0);
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const error = new HttpError('Bad Request', 400, false, { error: 'bad request' });
            expect(error.response).toEqual({ error: 'bad request' });
        });
    });

    describe('getJson', () => {
        it('should return parsed body and send the user agent', async () => {
            const mockFetch = vi.fn().mockResolvedValue(jsonResponse({ results: [1, 2] }));
            vi.stubGlobal('fetch', mockFetch);

            const { client } = makeClient();
            const response = await client.getJson('https://api.example.org/authors');

            expect(response.ok).toBe(true);
            expect(response.status).toBe(200);
            expect(response.data).toEqual({ results: [1, 2] });
            expect(response.headers['content-type']).toBe('application/json');
            expect(mockFetch).toHaveBeenCalledWith(
                'https://api.example.org/authors',
                expect.objectContaining({
                    method: 'GET',
                    headers: { 'User-Agent': 'scholarank/2.0.0 (mailto:team@example.cl)' },
                })
            );
        });

        it('should reject malformed JSON without retrying', async () => {
            const mockFetch = vi.fn().mockImplementation(() => Promise.resolve(new Response('<html>oops</html>')));
            vi.stubGlobal('fetch', mockFetch);

            const { client } = makeClient();
            const error = await client.getJson('https://api.example.org/bad').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 200, retryable: false });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });
    });

    describe('getText', () => {
        it('should return the body as text', async () => {
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('<html>profile</html>')));

            const { client } = makeClient();
            const response = await client.getText('https://scholar.example.org/citations?user=x');

            expect(response.data).toBe('<html>profile</html>');
        });
    });

    describe('retry', () => {
        it('should retry a 503 once after the fixed backoff', async () => {
            const mockFetch = vi
                .fn()
                .mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
                .mockResolvedValueOnce(jsonResponse({ page: 2 }));
            vi.stubGlobal('fetch', mockFetch);

            const { client, sleep } = makeClient();
            const response = await client.getJson('https://api.example.org/retry');

            expect(response.data).toEqual({ page: 2 });
            expect(mockFetch).toHaveBeenCalledTimes(2);
            expect(sleep).toHaveBeenCalledWith(2000);
        });

        it('should retry a network error', async () => {
            const mockFetch = vi
                .fn()
                .mockRejectedValueOnce(new TypeError('fetch failed'))
                .mockResolvedValueOnce(jsonResponse({ ok: 1 }));
            vi.stubGlobal('fetch', mockFetch);

            const { client } = makeClient();
            const response = await client.getJson('https://api.example.org/net');

            expect(response.data).toEqual({ ok: 1 });
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should give up after the retry budget with the last error', async () => {
            const mockFetch = vi
                .fn()
                .mockImplementation(() =>
                    Promise.resolve(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
                );
            vi.stubGlobal('fetch', mockFetch);

            const { client } = makeClient();
            const error = await client.getJson('https://api.example.org/down').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 503, retryable: true, message: 'HTTP 503: Service Unavailable' });
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should report a transport failure with status 0', async () => {
            vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));

            const { client } = makeClient();
            const error = await client.getJson('https://api.example.org/gone').catch((e: unknown) => e);

            expect(error).toMatchObject({ status: 0, retryable: true, message: 'Network error: fetch failed' });
        });

        it('should not retry a 404', async () => {
            const mockFetch = vi.fn().mockResolvedValue(new Response('missing', { status: 404, statusText: 'Not Found' }));
            vi.stubGlobal('fetch', mockFetch);

            const { client, sleep } = makeClient();
            const error = await client.getJson('https://api.example.org/none').catch((e: unknown) => e);

            expect(error).toMatchObject({ status: 404, retryable: false });
            expect(mockFetch).toHaveBeenCalledTimes(1);
            expect(sleep).not.toHaveBeenCalled();
        });

        it('should honour a per-request retry count', async () => {
            const mockFetch = vi
                .fn()
                .mockImplementation(() => Promise.resolve(new Response('', { status: 500, statusText: 'Server Error' })));
            vi.stubGlobal('fetch', mockFetch);

            const { client } = makeClient();
            await expect(client.getJson('https://api.example.org/once', { retries: 0 })).rejects.toThrow(
                'HTTP 500: Server Error'
            );
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });
    });

    describe('abortWhen', () => {
        it('should stop on a matching failed response without retrying', async () => {
            const mockFetch = vi
                .fn()
                .mockImplementation(() =>
                    Promise.resolve(new Response('captcha required', { status: 503, statusText: 'Service Unavailable' }))
                );
            vi.stubGlobal('fetch', mockFetch);

            const { client, sleep } = makeClient();
            const error = await client
                .getText('https://pages.example.org/p', { abortWhen: (_status, body) => body.includes('captcha') })
                .catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 503, retryable: false, aborted: true, response: 'captcha required' });
            expect(mockFetch).toHaveBeenCalledTimes(1);
            expect(sleep).not.toHaveBeenCalled();
        });

        it('should retry when the check does not match', async () => {
            const mockFetch = vi
                .fn()
                .mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
                .mockResolvedValueOnce(new Response('fine'));
            vi.stubGlobal('fetch', mockFetch);

            const { client } = makeClient();
            const response = await client.getText('https://pages.example.org/p', {
                abortWhen: (_status, body) => body.includes('captcha'),
            });

            expect(response.data).toBe('fine');
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });
    });

    describe('body failures', () => {
        it('should retry a body that fails mid-read', async () => {
            const mockFetch = vi
                .fn()
                .mockResolvedValueOnce(brokenBodyResponse())
                .mockResolvedValueOnce(jsonResponse({ ok: 2 }));
            vi.stubGlobal('fetch', mockFetch);

            const { client, sleep } = makeClient();
            const response = await client.getJson('https://api.example.org/body');

            expect(response.data).toEqual({ ok: 2 });
            expect(mockFetch).toHaveBeenCalledTimes(2);
            expect(sleep).toHaveBeenCalledWith(2000);
        });

        it('should surface a persistent body failure as a transport HttpError', async () => {
            vi.stubGlobal('fetch', vi.fn().mockImplementation(() => Promise.resolve(brokenBodyResponse())));

            const { client } = makeClient();
            const error = await client.getText('https://api.example.org/body').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 0, retryable: true, message: 'Network error: terminated' });
        });
    });

    describe('rate limiting', () => {
        it('should wait for a token once the source burst is spent', async () => {
            vi.stubGlobal(
                'fetch',
                vi.fn().mockImplementation(() => Promise.resolve(jsonResponse({ ok: true })))
            );

            const { client, sleep } = makeClient();
            // serpapi allows a burst of one request per second
            await client.getJson('https://serp.example.org/1', { source: 'serpapi' });
            expect(sleep).not.toHaveBeenCalled();

            await client.getJson('https://serp.example.org/2', { source: 'serpapi' });
            expect(sleep).toHaveBeenCalledTimes(1);
            const waited = sleep.mock.calls[0]?.[0] ?? 0;
            expect(waited).toBeGreaterThan(500);
            expect(waited).toBeLessThanOrEqual(1000);
        });
    });
});
