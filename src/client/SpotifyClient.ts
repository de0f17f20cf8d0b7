/**
 * Spotify Client
 * Main facade providing unified access to auth and the Web API
 */

import type { AxiosAdapter } from 'axios';
import {
    TokenManager,
    type AuthStatus,
    type InteractiveFlowOptions,
    type SpotifyTokens,
    type TokenStore,
} from '../auth/index.js';
import { HttpClient } from './HttpClient.js';
import type { RetryListener, RetryPolicy, Sleep } from './RetryPolicy.js';
import { PersonalizationApi } from '../api/PersonalizationApi.js';
import { PlayerApi } from '../api/PlayerApi.js';
import { TracksApi } from '../api/TracksApi.js';
import { UsersApi } from '../api/UsersApi.js';
import type { Config } from '../utils/config.js';
import type { UserProfile } from '../types/spotify.js';

export interface SpotifyClientOptions {
    baseUrl?: string;
    store?: TokenStore;
    retryPolicy?: Partial<RetryPolicy>;
    adapter?: AxiosAdapter;
    sleep?: Sleep;
    onRetry?: RetryListener;
}

export class SpotifyClient {
    private readonly tokenManager: TokenManager;
    private readonly httpClient: HttpClient;

    // API clients
    public readonly personalization: PersonalizationApi;
    public readonly player: PlayerApi;
    public readonly tracks: TracksApi;
    public readonly users: UsersApi;

    constructor(config: Config, options: SpotifyClientOptions = {}) {
        this.tokenManager = new TokenManager({
            credentials: config.credentials,
            tokenFile: config.tokenFile,
            store: options.store,
        });

        this.httpClient = new HttpClient({
            baseUrl: options.baseUrl,
            tokenManager: this.tokenManager,
            retryPolicy: options.retryPolicy,
            adapter: options.adapter,
            sleep: options.sleep,
            onRetry: options.onRetry,
        });

        this.personalization = new PersonalizationApi(this.httpClient);
        this.player = new PlayerApi(this.httpClient);
        this.tracks = new TracksApi(this.httpClient);
        this.users = new UsersApi(this.httpClient);
    }

    // ── Auth ──────────────────────────────────────────

    async getAuthStatus(): Promise<AuthStatus> {
        return this.tokenManager.getStatus();
    }

    getAuthorizeUrl(): string {
        return this.tokenManager.getAuthorizeUrl();
    }

    async hasTokens(): Promise<boolean> {
        return this.tokenManager.hasTokens();
    }

    async hasUsableTokens(): Promise<boolean> {
        return this.tokenManager.hasUsableTokens();
    }

    async authenticate(options: InteractiveFlowOptions): Promise<SpotifyTokens> {
        return this.tokenManager.runInteractiveFlow(options);
    }

    async refreshToken(): Promise<SpotifyTokens> {
        return this.tokenManager.refresh();
    }

    async logout(): Promise<void> {
        await this.tokenManager.logout();
    }

    // ── Convenience ───────────────────────────────────

    async whoami(): Promise<UserProfile> {
        return this.users.getMe();
    }
}
