/**
 * In-process stand-ins for the Spotify Web API and the token store
 */
import { AxiosError, AxiosHeaders, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import type { SpotifyTokens, TokenStore } from '../../src/auth/TokenStore.js';

export interface FakeReply {
    status: number;
    data?: unknown;
    headers?: Record<string, string>;
}

/** A reply, or an Error to simulate a failure without an HTTP response */
export type FakeOutcome = FakeReply | Error;

export type FakeRoute = (config: InternalAxiosRequestConfig) => FakeOutcome;

export interface FakeApi {
    adapter: AxiosAdapter;
    requests: InternalAxiosRequestConfig[];
}

/**
 * Axios adapter that answers every request through `route` and settles the
 * way axios' own adapters do (non-2xx rejects with an AxiosError).
 */
export function fakeApi(route: FakeRoute): FakeApi {
    const requests: InternalAxiosRequestConfig[] = [];

    const adapter: AxiosAdapter = async (config) => {
        requests.push(config);
        const outcome = route(config);
        if (outcome instanceof Error) {
            throw outcome;
        }

        const response: AxiosResponse = {
            data: outcome.data ?? null,
            status: outcome.status,
            statusText: String(outcome.status),
            headers: new AxiosHeaders(outcome.headers ?? {}),
            config,
        };

        if (outcome.status >= 200 && outcome.status < 300) {
            return response;
        }

        throw new AxiosError(
            `Request failed with status code ${outcome.status}`,
            outcome.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
            config,
            null,
            response,
        );
    };

    return { adapter, requests };
}

/**
 * Route that plays back `outcomes` in order, one per request.
 */
export function sequence(outcomes: FakeOutcome[]): FakeRoute {
    let index = 0;
    return (config) => {
        const outcome = outcomes[index++];
        if (!outcome) {
            throw new Error(`Unexpected request #${index} to ${config.url}`);
        }
        return outcome;
    };
}

export function paramsOf(config: InternalAxiosRequestConfig): Record<string, unknown> {
    const params: unknown = config.params;
    return params && typeof params === 'object' ? { ...params } : {};
}

export function authorizationOf(config: InternalAxiosRequestConfig): unknown {
    return config.headers.get('Authorization');
}

export class MemoryStore implements TokenStore {
    saved: SpotifyTokens[] = [];

    constructor(public tokens: SpotifyTokens | null = null) { }

    async save(tokens: SpotifyTokens): Promise<void> {
        this.tokens = tokens;
        this.saved.push(tokens);
    }

    async load(): Promise<SpotifyTokens | null> {
        return this.tokens;
    }

    async clear(): Promise<void> {
        this.tokens = null;
    }

    async exists(): Promise<boolean> {
        return this.tokens !== null;
    }
}

export function validTokens(overrides: Partial<SpotifyTokens> = {}): SpotifyTokens {
    return {
        accessToken: 'test-access-token',
        refreshToken: 'test-refresh-token',
        tokenType: 'Bearer',
        expiresIn: 3600,
        expiresAt: Date.now() + 3600 * 1000,
        scope: 'user-top-read',
        ...overrides,
    };
}

/** Sleep stand-in that records requested delays and returns immediately */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
    const delays: number[] = [];
    return {
        delays,
        sleep: async (ms: number) => {
            delays.push(ms);
        },
    };
}
