/**
 * Tests for HttpClient
 */
import { describe, it, expect, vi } from 'vitest';
import { HttpClient, type AccessTokenProvider } from '../../src/client/HttpClient.js';
import { ApiRequestError, NoTokenError, ServerError } from '../../src/utils/errors.js';
import { authorizationOf, fakeApi, paramsOf, recordingSleep, sequence } from '../helpers/fake-spotify.js';

function staticToken(token = 'test-access-token'): AccessTokenProvider {
    return { getAccessToken: vi.fn(async () => token) };
}

describe('HttpClient', () => {
    it('should send the bearer token and query params', async () => {
        const api = fakeApi(sequence([{ status: 200, data: { id: 'user-1' } }]));
        const client = new HttpClient({ tokenManager: staticToken(), adapter: api.adapter });

        const data = await client.get<{ id: string }>('/me', { limit: 5 });

        expect(data).toEqual({ id: 'user-1' });
        expect(api.requests).toHaveLength(1);
        expect(api.requests[0].url).toBe('/me');
        expect(api.requests[0].baseURL).toBe('https://api.spotify.com/v1');
        expect(paramsOf(api.requests[0])).toEqual({ limit: 5 });
        expect(authorizationOf(api.requests[0])).toBe('Bearer test-access-token');
    });

    it('should honour a custom base URL', async () => {
        const api = fakeApi(sequence([{ status: 200, data: {} }]));
        const client = new HttpClient({
            baseUrl: 'http://localhost:9999/v1',
            tokenManager: staticToken(),
            adapter: api.adapter,
        });

        await client.get('/me');

        expect(api.requests[0].baseURL).toBe('http://localhost:9999/v1');
    });

    it('should wait out 429 responses and then return the payload', async () => {
        const api = fakeApi(
            sequence([
                { status: 429, headers: { 'retry-after': '1' } },
                { status: 429 },
                { status: 200, data: { ok: true } },
            ]),
        );
        const { sleep, delays } = recordingSleep();
        const client = new HttpClient({ tokenManager: staticToken(), adapter: api.adapter, sleep });

        await expect(client.get('/me')).resolves.toEqual({ ok: true });
        expect(api.requests).toHaveLength(3);
        expect(delays).toEqual([1000, 1000]);
    });

    it('should stop after three server errors with backoff between them', async () => {
        const api = fakeApi(sequence([{ status: 500 }, { status: 500 }, { status: 500 }]));
        const { sleep, delays } = recordingSleep();
        const client = new HttpClient({ tokenManager: staticToken(), adapter: api.adapter, sleep });

        const error = await client.get('/me').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ServerError);
        expect(error).toMatchObject({ action: 'GET /me', attempts: 3, status: 500 });
        expect(api.requests).toHaveLength(3);
        expect(delays).toEqual([1000, 2000]);
    });

    it('should retry network failures', async () => {
        const api = fakeApi(sequence([new Error('socket hang up'), { status: 200, data: { ok: 1 } }]));
        const { sleep, delays } = recordingSleep();
        const client = new HttpClient({ tokenManager: staticToken(), adapter: api.adapter, sleep });

        await expect(client.get('/me')).resolves.toEqual({ ok: 1 });
        expect(delays).toEqual([1000]);
    });

    it('should not retry client errors', async () => {
        const api = fakeApi(sequence([{ status: 404, data: { error: { status: 404, message: 'Not found' } } }]));
        const { sleep, delays } = recordingSleep();
        const client = new HttpClient({ tokenManager: staticToken(), adapter: api.adapter, sleep });

        const error = await client.get('/tracks/missing').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ApiRequestError);
        expect(error).toMatchObject({ status: 404, attempts: 1 });
        expect(api.requests).toHaveLength(1);
        expect(delays).toEqual([]);
    });

    it('should check the token before every request and rebuild only when it changes', async () => {
        const tokens = ['token-a', 'token-a', 'token-b'];
        const getAccessToken = vi.fn(async () => tokens.shift() ?? 'token-b');
        const api = fakeApi(() => ({ status: 200, data: {} }));
        const client = new HttpClient({ tokenManager: { getAccessToken }, adapter: api.adapter });

        await client.get('/me');
        await client.get('/me');
        await client.get('/me');

        expect(getAccessToken).toHaveBeenCalledTimes(3);
        expect(api.requests.map(authorizationOf)).toEqual(['Bearer token-a', 'Bearer token-a', 'Bearer token-b']);
    });

    it('should pass token errors through without making a request or retrying', async () => {
        const api = fakeApi(() => ({ status: 200 }));
        const getAccessToken = vi.fn(async () => Promise.reject(new NoTokenError()));
        const { sleep, delays } = recordingSleep();
        const client = new HttpClient({ tokenManager: { getAccessToken }, adapter: api.adapter, sleep });

        await expect(client.get('/me')).rejects.toBeInstanceOf(NoTokenError);
        expect(getAccessToken).toHaveBeenCalledTimes(1);
        expect(api.requests).toHaveLength(0);
        expect(delays).toEqual([]);
    });

    it('should check the token again before each retry', async () => {
        const tokens = ['token-a', 'token-b'];
        const getAccessToken = vi.fn(async () => tokens.shift() ?? 'token-b');
        const api = fakeApi(sequence([{ status: 429, headers: { 'retry-after': '30' } }, { status: 200, data: {} }]));
        const { sleep, delays } = recordingSleep();
        const client = new HttpClient({ tokenManager: { getAccessToken }, adapter: api.adapter, sleep });

        await client.get('/me');

        expect(delays).toEqual([30000]);
        expect(api.requests.map(authorizationOf)).toEqual(['Bearer token-a', 'Bearer token-b']);
    });

    it('should apply a per-call retry override', async () => {
        const api = fakeApi(sequence([{ status: 500 }]));
        const { sleep, delays } = recordingSleep();
        const client = new HttpClient({ tokenManager: staticToken(), adapter: api.adapter, sleep });

        const error = await client
            .get('/audio-features', { ids: 't1' }, { retryPolicy: { maxAttempts: 1 } })
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ServerError);
        expect(error).toMatchObject({ attempts: 1 });
        expect(api.requests).toHaveLength(1);
        expect(delays).toEqual([]);
    });

    it('should drain every page in order', async () => {
        const api = fakeApi(
            sequence([
                { status: 200, data: { items: [1, 2], next: 'https://api.spotify.com/v1/me/top/tracks?offset=2' } },
                { status: 200, data: { items: [3, 4], next: 'https://api.spotify.com/v1/me/top/tracks?offset=4' } },
                { status: 200, data: { items: [5], next: null } },
            ]),
        );
        const client = new HttpClient({ tokenManager: staticToken(), adapter: api.adapter });

        const items = await client.getAllPages<number>('/me/top/tracks', { limit: 2 });

        expect(items).toEqual([1, 2, 3, 4, 5]);
        expect(api.requests.map((r) => r.url)).toEqual([
            '/me/top/tracks',
            'https://api.spotify.com/v1/me/top/tracks?offset=2',
            'https://api.spotify.com/v1/me/top/tracks?offset=4',
        ]);
    });

    it('should retry a failing page on its own', async () => {
        const api = fakeApi(
            sequence([
                { status: 200, data: { items: ['a'], next: 'https://api.spotify.com/v1/next' } },
                { status: 503 },
                { status: 200, data: { items: ['b'], next: null } },
            ]),
        );
        const { sleep, delays } = recordingSleep();
        const client = new HttpClient({ tokenManager: staticToken(), adapter: api.adapter, sleep });

        await expect(client.getAllPages<string>('/me/top/artists')).resolves.toEqual(['a', 'b']);
        expect(delays).toEqual([1000]);
    });

    it('should route pauses through the injected sleep', async () => {
        const { sleep, delays } = recordingSleep();
        const client = new HttpClient({ tokenManager: staticToken(), sleep });

        await client.pause(200);

        expect(delays).toEqual([200]);
    });
});
