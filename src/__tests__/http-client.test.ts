import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError } from '../utils/http-client.js';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

describe('HttpClient', () => {
    let client: HttpClient;
    let mockFetch: ReturnType<typeof vi.fn>;

    beforeEach(() => {
        client = new HttpClient({
            timeout: 5000,
            initialBackoffMs: 1,
            maxBackoffMs: 5,
            rateLimits: { test: { tokensPerSecond: 1000, maxBurst: 1000 } },
        });
        mockFetch = vi.fn();
        vi.stubGlobal('fetch', mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('arxiv')).toBe(0);
            expect(client.getRequestCount('s2')).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
        });

        it('should track request counts per source', async () => {
            mockFetch.mockImplementation(async () => jsonResponse({ ok: true }));

            await client.get('https://api.example.com/a', { source: 'test' });
            await client.get('https://api.example.com/b', { source: 'test' });

            expect(client.getRequestCount('test')).toBe(2);
            expect(client.getAllRequestCounts()).toEqual({ test: 2 });
        });

        it('should reset counts', async () => {
            mockFetch.mockImplementation(async () => jsonResponse({ ok: true }));
            await client.get('https://api.example.com/a', { source: 'test' });

            client.resetCounts();
            expect(client.getAllRequestCounts()).toEqual({});
        });
    });

    describe('responses', () => {
        it('should parse JSON bodies', async () => {
            mockFetch.mockResolvedValue(jsonResponse({ total: 3 }));

            const response = await client.get<{ total: number }>('https://api.example.com/json', { source: 'test' });

            expect(response.status).toBe(200);
            expect(response.ok).toBe(true);
            expect(response.data).toEqual({ total: 3 });
            expect(response.headers['content-type']).toBe('application/json');
        });

        it('should return non-JSON bodies as text', async () => {
            mockFetch.mockResolvedValue(new Response('<feed></feed>', {
                status: 200,
                headers: { 'content-type': 'application/atom+xml; charset=utf-8' },
            }));

            const response = await client.get('https://export.example.com/api', { source: 'test' });
            expect(response.data).toBe('<feed></feed>');
        });

        it('should send the User-Agent header', async () => {
            mockFetch.mockResolvedValue(jsonResponse({}));
            const versioned = new HttpClient({ version: '9.9.9', email: 'dev@example.com' });

            await versioned.get('https://api.example.com/ua');

            const init = mockFetch.mock.calls[0]?.[1];
            expect(init.headers['User-Agent']).toBe('AIResearchHub/9.9.9 (mailto:dev@example.com)');
        });

        it('should serialize object bodies as JSON on POST', async () => {
            mockFetch.mockResolvedValue(jsonResponse({ done: true }));

            await client.post('https://api.example.com/generate', { prompt: 'hi' }, { source: 'test' });

            const init = mockFetch.mock.calls[0]?.[1];
            expect(init.method).toBe('POST');
            expect(init.body).toBe('{"prompt":"hi"}');
            expect(init.headers['Content-Type']).toBe('application/json');
        });
    });

    describe('errors and retries', () => {
        it('should throw a non-retryable HttpError on 404 without retrying', async () => {
            mockFetch.mockImplementation(async () => jsonResponse({ error: 'missing' }, 404));

            const error = await client.get('https://api.example.com/missing', { source: 'test' }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 404, retryable: false, response: { error: 'missing' } });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should retry 503 responses and succeed', async () => {
            mockFetch
                .mockResolvedValueOnce(jsonResponse({}, 503))
                .mockResolvedValueOnce(jsonResponse({ recovered: true }));

            const response = await client.get('https://api.example.com/flaky', { source: 'test' });

            expect(response.data).toEqual({ recovered: true });
            expect(mockFetch).toHaveBeenCalledTimes(2);
            expect(client.getRequestCount('test')).toBe(2);
        });

        it('should give up after maxRetries', async () => {
            const limited = new HttpClient({
                maxRetries: 2,
                initialBackoffMs: 1,
                maxBackoffMs: 2,
                rateLimits: { test: { tokensPerSecond: 1000, maxBurst: 1000 } },
            });
            mockFetch.mockImplementation(async () => jsonResponse({}, 500));

            await expect(limited.get('https://api.example.com/down', { source: 'test' }))
                .rejects.toMatchObject({ status: 500, retryable: true });
            expect(mockFetch).toHaveBeenCalledTimes(3);
        });

        it('should retry network errors whose code sits on the cause', async () => {
            const socketError = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
            mockFetch
                .mockRejectedValueOnce(new TypeError('fetch failed', { cause: socketError }))
                .mockResolvedValueOnce(jsonResponse({ ok: true }));

            const response = await client.get('https://api.example.com/reset', { source: 'test' });

            expect(response.data).toEqual({ ok: true });
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should not retry unknown network errors', async () => {
            mockFetch.mockRejectedValue(new Error('boom'));

            await expect(client.get('https://api.example.com/boom', { source: 'test' }))
                .rejects.toMatchObject({ status: 0, retryable: false, message: 'Network error: boom' });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should turn aborts into timeout errors', async () => {
            const abortError = new Error('This operation was aborted');
            abortError.name = 'AbortError';
            mockFetch.mockRejectedValue(abortError);

            await expect(client.get('https://api.example.com/slow', { source: 'test', timeout: 50 }))
                .rejects.toMatchObject({ status: 0, retryable: true, message: 'Request timeout after 50ms: https://api.example.com/slow' });
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
    });

    describe('rate limiting', () => {
        it('should throttle requests based on source rate limits', async () => {
            mockFetch.mockImplementation(async () => jsonResponse({ data: 'ok' }));
            client.setRateLimit('slow', { tokensPerSecond: 10, maxBurst: 1 });

            const start = Date.now();

            // One token up front, then one every 100ms
            await Promise.all([
                client.request('https://api.example.com/1', { source: 'slow' }),
                client.request('https://api.example.com/2', { source: 'slow' }),
                client.request('https://api.example.com/3', { source: 'slow' }),
            ]);

            const elapsed = Date.now() - start;

            expect(elapsed).toBeGreaterThanOrEqual(150);
            expect(client.getRequestCount('slow')).toBe(3);
        });
    });
});
