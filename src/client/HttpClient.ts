/**
 * HTTP Client
 * Axios wrapper with token injection, retry policy and pagination draining
 */

import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import type { Paging } from '../types/spotify.js';
import {
    DEFAULT_RETRY_POLICY,
    executeWithRetry,
    sleep as realSleep,
    type RetryListener,
    type RetryPolicy,
    type Sleep,
} from './RetryPolicy.js';
import { TunelogError } from '../utils/errors.js';

const DEFAULT_BASE_URL = 'https://api.spotify.com/v1';

/** The one thing the client needs from the auth layer */
export interface AccessTokenProvider {
    getAccessToken(): Promise<string>;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
    /** Per-call override of the client's retry policy */
    retryPolicy?: Partial<RetryPolicy>;
}

export interface HttpClientConfig {
    baseUrl?: string;
    tokenManager: AccessTokenProvider;
    retryPolicy?: Partial<RetryPolicy>;
    timeout?: number;
    /** Custom axios adapter; tests use it to serve canned responses */
    adapter?: AxiosAdapter;
    sleep?: Sleep;
    onRetry?: RetryListener;
}

export class HttpClient {
    private readonly tokenManager: AccessTokenProvider;
    private readonly baseUrl: string;
    private readonly timeout: number;
    private readonly adapter?: AxiosAdapter;
    private readonly retryPolicy: RetryPolicy;
    private readonly sleepFn: Sleep;
    private readonly onRetry?: RetryListener;

    private transport: AxiosInstance | null = null;
    private transportToken: string | null = null;

    constructor(config: HttpClientConfig) {
        this.tokenManager = config.tokenManager;
        this.baseUrl = config.baseUrl || DEFAULT_BASE_URL;
        this.timeout = config.timeout || 30000;
        this.adapter = config.adapter;
        this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...config.retryPolicy };
        this.sleepFn = config.sleep ?? realSleep;
        this.onRetry = config.onRetry;
    }

    /**
     * Validate the token, then reuse the axios instance if it was built for
     * the same token; otherwise rebuild it.
     */
    private async getTransport(): Promise<AxiosInstance> {
        const accessToken = await this.tokenManager.getAccessToken();

        if (!this.transport || this.transportToken !== accessToken) {
            this.transport = axios.create({
                baseURL: this.baseUrl,
                timeout: this.timeout,
                adapter: this.adapter,
                headers: {
                    Authorization: `Bearer ${accessToken}`,
                    'Content-Type': 'application/json',
                },
            });
            this.transportToken = accessToken;
        }

        return this.transport;
    }

    /**
     * One logical GET under the retry policy. `url` may be relative to the
     * base URL or an absolute "next" link. The token is checked before every
     * attempt; token errors propagate without a retry.
     */
    async get<T = unknown>(url: string, params?: QueryParams, options: RequestOptions = {}): Promise<T> {
        return executeWithRetry(
            `GET ${url}`,
            async () => {
                const transport = await this.getTransport();
                const response = await transport.get<T>(url, { params });
                return response.data;
            },
            {
                policy: { ...this.retryPolicy, ...options.retryPolicy },
                sleep: this.sleepFn,
                onRetry: this.onRetry,
                rethrow: (error) => error instanceof TunelogError,
            },
        );
    }

    /**
     * Follow `next` links until exhausted and return every item in page order.
     * Each page is its own logical request (token check + retries).
     */
    async getAllPages<T>(url: string, params?: QueryParams): Promise<T[]> {
        let page = await this.get<Paging<T>>(url, params);
        const items = [...page.items];

        while (page.next) {
            page = await this.get<Paging<T>>(page.next);
            items.push(...page.items);
        }

        return items;
    }

    /** Deliberate pacing between requests */
    async pause(ms: number): Promise<void> {
        await this.sleepFn(ms);
    }
}
