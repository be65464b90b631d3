import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { z } from 'zod';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { FetchExhaustedError } from '../utils/errors.js';

const ValueSchema = z.object({ value: z.number() });

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json', ...headers } });
}

describe('HttpClient', () => {
    let sleep: Mock<(ms: number) => Promise<void>>;
    let client: HttpClient;

    beforeEach(() => {
        sleep = vi.fn(async (_ms: number) => {});
        client = new HttpClient({ timeout: 5000, maxRetries: 2, sleep });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('s2')).toBe(0);
        });

        it('should count every attempt per source', async () => {
            vi.stubGlobal(
                'fetch',
                vi
                    .fn()
                    .mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 503))
                    .mockImplementation(async () => jsonResponse({ value: 1 }))
            );

            await client.get('https://api.example.com/a', { schema: ValueSchema, source: 's2' });
            await client.get('https://api.example.com/b', { schema: ValueSchema });

            expect(client.getRequestCount('s2')).toBe(2);
            expect(client.getRequestCount('default')).toBe(1);
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

    describe('rate limiting', () => {
        it('should wait for a token once the burst is spent', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ value: 1 })));

            for (const n of [1, 2, 3]) {
                await client.get(`https://api.example.com/${n}`, { schema: ValueSchema, source: 's2' });
            }

            // s2 allows one request per second with no burst; the no-op sleep
            // lets no time pass, so the deficit grows by one token per request
            const waits = sleep.mock.calls.map(([ms]) => ms);
            expect(waits).toHaveLength(2);
            expect(waits[0]).toBeGreaterThan(900);
            expect(waits[0]).toBeLessThanOrEqual(1000);
            expect(waits[1]).toBeGreaterThan(1900);
            expect(waits[1]).toBeLessThanOrEqual(2000);
        });
    });

    describe('retries', () => {
        it('should retry 5xx responses and return the eventual success', async () => {
            const fetchMock = vi
                .fn()
                .mockResolvedValueOnce(jsonResponse({ error: 'unavailable' }, 503))
                .mockResolvedValueOnce(jsonResponse({ error: 'unavailable' }, 503))
                .mockResolvedValueOnce(jsonResponse({ value: 42 }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.get('https://api.example.com/x', { schema: ValueSchema });

            expect(response.data).toEqual({ value: 42 });
            expect(fetchMock).toHaveBeenCalledTimes(3);
            expect(sleep).toHaveBeenCalledTimes(2);
        });

        it('should honour Retry-After on 429', async () => {
            vi.stubGlobal(
                'fetch',
                vi
                    .fn()
                    .mockResolvedValueOnce(jsonResponse({}, 429, { 'retry-after': '2' }))
                    .mockResolvedValueOnce(jsonResponse({ value: 1 }))
            );

            await client.get('https://api.example.com/x', { schema: ValueSchema });

            expect(sleep).toHaveBeenCalledWith(2000);
        });

        it('should throw FetchExhaustedError after maxRetries retries', async () => {
            const fetchMock = vi.fn(async () => jsonResponse({ error: 'boom' }, 500));
            vi.stubGlobal('fetch', fetchMock);

            const error = await client.get('https://api.example.com/x', { schema: ValueSchema }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(FetchExhaustedError);
            expect(error).toMatchObject({ attempts: 3, url: 'https://api.example.com/x', code: 'FETCH_EXHAUSTED' });
            expect(fetchMock).toHaveBeenCalledTimes(3);
        });

        it('should not retry a 404', async () => {
            const fetchMock = vi.fn(async () => jsonResponse({ error: 'missing' }, 404));
            vi.stubGlobal('fetch', fetchMock);

            await expect(client.get('https://api.example.com/x', { schema: ValueSchema })).rejects.toMatchObject({
                name: 'HttpError',
                status: 404,
                retryable: false,
            });
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it('should retry a body that fails the schema', async () => {
            const fetchMock = vi
                .fn()
                .mockResolvedValueOnce(jsonResponse({ value: 'not a number' }))
                .mockResolvedValueOnce(jsonResponse({ value: 7 }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.get('https://api.example.com/x', { schema: ValueSchema });

            expect(response.data.value).toBe(7);
            expect(fetchMock).toHaveBeenCalledTimes(2);
        });

        it('should retry a body that is not JSON', async () => {
            vi.stubGlobal(
                'fetch',
                vi
                    .fn()
                    .mockResolvedValueOnce(new Response('<html>oops</html>', { status: 200 }))
                    .mockResolvedValueOnce(jsonResponse({ value: 3 }))
            );

            const response = await client.get('https://api.example.com/x', { schema: ValueSchema });
            expect(response.data.value).toBe(3);
        });

        it('should retry transport failures', async () => {
            const fetchMock = vi
                .fn()
                .mockRejectedValueOnce(new TypeError('fetch failed'))
                .mockResolvedValueOnce(jsonResponse({ value: 5 }));
            vi.stubGlobal('fetch', fetchMock);

            const response = await client.get('https://api.example.com/x', { schema: ValueSchema });
            expect(response.data.value).toBe(5);
        });

        it.each(['EAI_AGAIN', 'ENETUNREACH', 'EHOSTUNREACH', 'EPIPE', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT'])(
            'should retry a transport failure caused by %s',
            async (code) => {
                const fetchMock = vi
                    .fn()
                    .mockRejectedValueOnce(new TypeError('fetch failed', { cause: { code } }))
                    .mockResolvedValueOnce(jsonResponse({ value: 9 }));
                vi.stubGlobal('fetch', fetchMock);
                const patient = new HttpClient({ timeout: 5000, maxRetries: 3, sleep });

                const response = await patient.get('https://api.example.com/x', { schema: ValueSchema });

                expect(response.data.value).toBe(9);
                expect(fetchMock).toHaveBeenCalledTimes(2);
            }
        );

        it('should end a persistent transport failure in FetchExhaustedError', async () => {
            const fetchMock = vi.fn(async () => {
                throw new TypeError('fetch failed', { cause: { code: 'ENETUNREACH' } });
            });
            vi.stubGlobal('fetch', fetchMock);

            const error = await client.get('https://api.example.com/x', { schema: ValueSchema }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(FetchExhaustedError);
            expect(error).toMatchObject({
                attempts: 3,
                message: 'Request failed after 3 attempts: https://api.example.com/x (Network error: fetch failed (ENETUNREACH))',
            });
            expect(fetchMock).toHaveBeenCalledTimes(3);
        });

        it('should send JSON bodies on POST', async () => {
            const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ value: 1 }));
            vi.stubGlobal('fetch', fetchMock);

            await client.post('https://api.example.com/batch', { ids: ['a'] }, { schema: ValueSchema });

            const init = fetchMock.mock.calls[0]?.[1];
            expect(init?.method).toBe('POST');
            expect(init?.body).toBe('{"ids":["a"]}');
            expect(init?.headers).toMatchObject({ 'Content-Type': 'application/json' });
        });
    });
});
