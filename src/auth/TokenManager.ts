/**
 * Token Manager
 * Manages token lifecycle: storage, refresh, validation, interactive login
 */

import type { TokenStore, SpotifyTokens } from './TokenStore.js';
import { OAuthFlow, DEFAULT_SCOPES } from './OAuthFlow.js';
import { FileStore } from './FileStore.js';
import type { Credentials } from '../utils/config.js';
import { NoRefreshTokenError, NoTokenError } from '../utils/errors.js';

/** Refresh this long before the recorded expiry so a token never lapses mid-request */
export const REFRESH_MARGIN_MS = 60 * 1000;

export function isExpired(tokens: SpotifyTokens, now: number = Date.now()): boolean {
    return tokens.expiresAt <= now + REFRESH_MARGIN_MS;
}

export interface TokenManagerConfig {
    credentials: Credentials;
    tokenFile: string;
    store?: TokenStore;
    oauthFlow?: OAuthFlow;
    scopes?: readonly string[];
}

export interface AuthStatus {
    authenticated: boolean;
    expiresAt?: Date;
    isExpired?: boolean;
    canRefresh?: boolean;
    scope?: string;
}

export interface InteractiveFlowOptions {
    /** Open the authorization URL in a browser before prompting */
    interactive: boolean;
    openBrowser: (url: string) => Promise<unknown>;
    /** Resolves with the operator's answer; blocks until one arrives */
    prompt: (question: string) => Promise<string>;
    onAuthorizeUrl?: (url: string) => void;
}

export class TokenManager {
    private readonly oauthFlow: OAuthFlow;
    private readonly store: TokenStore;
    private readonly scopes: readonly string[];

    constructor(config: TokenManagerConfig) {
        this.oauthFlow = config.oauthFlow ?? new OAuthFlow(config.credentials);
        this.store = config.store ?? new FileStore(config.tokenFile);
        this.scopes = config.scopes ?? DEFAULT_SCOPES;
    }

    async getStatus(): Promise<AuthStatus> {
        const tokens = await this.store.load();

        if (!tokens) {
            return { authenticated: false };
        }

        const expired = isExpired(tokens);
        const canRefresh = !!tokens.refreshToken;

        return {
            authenticated: !expired || canRefresh,
            expiresAt: new Date(tokens.expiresAt),
            isExpired: expired,
            canRefresh,
            scope: tokens.scope,
        };
    }

    /**
     * Get valid access token (refreshes if needed).
     * Reads the store on every call so clearing the token file takes effect immediately.
     */
    async getAccessToken(): Promise<string> {
        const tokens = await this.store.load();

        if (!tokens) {
            throw new NoTokenError();
        }

        if (!isExpired(tokens)) {
            return tokens.accessToken;
        }

        if (!tokens.refreshToken) {
            throw new NoRefreshTokenError();
        }

        const refreshed = await this.oauthFlow.refreshToken(tokens.refreshToken);
        await this.store.save(refreshed);
        return refreshed.accessToken;
    }

    getAuthorizeUrl(): string {
        return this.oauthFlow.buildAuthorizationUrl(this.scopes);
    }

    /**
     * Authorize → prompt → exchange. Nothing is persisted unless the exchange succeeds.
     */
    async runInteractiveFlow(options: InteractiveFlowOptions): Promise<SpotifyTokens> {
        const authUrl = this.getAuthorizeUrl();
        options.onAuthorizeUrl?.(authUrl);

        if (options.interactive) {
            await options.openBrowser(authUrl);
        }

        const redirectUrl = (await options.prompt('Redirect URL: ')).trim();
        const code = this.oauthFlow.extractCode(redirectUrl);
        const tokens = await this.oauthFlow.exchangeCode(code);

        await this.store.save(tokens);
        return tokens;
    }

    async refresh(): Promise<SpotifyTokens> {
        const tokens = await this.store.load();

        if (!tokens) {
            throw new NoTokenError();
        }
        if (!tokens.refreshToken) {
            throw new NoRefreshTokenError();
        }

        const newTokens = await this.oauthFlow.refreshToken(tokens.refreshToken);
        await this.store.save(newTokens);
        return newTokens;
    }

    /** A token file is present, readable or not */
    async hasTokens(): Promise<boolean> {
        return this.store.exists();
    }

    /** Stored tokens load; a corrupt file counts as none */
    async hasUsableTokens(): Promise<boolean> {
        return (await this.store.load()) !== null;
    }

    async logout(): Promise<void> {
        await this.store.clear();
    }
}
