/**
 * OAuth Flow
 * Spotify authorization code flow: authorize URL, redirect parsing, token exchange and refresh
 */

import { z } from 'zod';
import type { SpotifyTokens } from './TokenStore.js';
import type { Credentials } from '../utils/config.js';
import {
    AuthorizationDeniedError,
    MissingAuthorizationCodeError,
    TokenExchangeError,
    TokenRefreshError,
} from '../utils/errors.js';

const TokenResponseSchema = z.object({
    access_token: z.string().min(1),
    refresh_token: z.string().optional(),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
    scope: z.string().optional(),
});

type TokenResponse = z.infer<typeof TokenResponseSchema>;

export const SPOTIFY_AUTHORIZE_URL = 'https://accounts.spotify.com/authorize';
export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';

export const DEFAULT_SCOPES: readonly string[] = [
    'user-top-read',
    'user-read-recently-played',
    'user-library-read',
];

const DEFAULT_EXPIRES_IN = 3600;

function parseTokenResponse(text: string): TokenResponse | null {
    try {
        const parsed = TokenResponseSchema.safeParse(JSON.parse(text));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

export interface OAuthConfig extends Credentials {
    authorizeUrl?: string;
    tokenUrl?: string;
}

export class OAuthFlow {
    private readonly config: OAuthConfig;
    private readonly authorizeUrl: string;
    private readonly tokenUrl: string;

    constructor(config: OAuthConfig) {
        this.config = config;
        this.authorizeUrl = config.authorizeUrl || SPOTIFY_AUTHORIZE_URL;
        this.tokenUrl = config.tokenUrl || SPOTIFY_TOKEN_URL;
    }

    /**
     * Get the authorization URL to open in browser
     */
    buildAuthorizationUrl(scopes: readonly string[] = DEFAULT_SCOPES, state?: string): string {
        const params = new URLSearchParams({
            client_id: this.config.clientId,
            response_type: 'code',
            redirect_uri: this.config.redirectUri,
            scope: scopes.join(' '),
            show_dialog: 'false',
        });

        if (state) {
            params.set('state', state);
        }

        return `${this.authorizeUrl}?${params.toString()}`;
    }

    /**
     * Pull the authorization code out of the URL the provider redirected to
     */
    extractCode(redirectUrl: string): string {
        let params: URLSearchParams;
        try {
            params = new URL(redirectUrl).searchParams;
        } catch {
            throw new MissingAuthorizationCodeError();
        }

        const code = params.get('code');
        if (code) {
            return code;
        }

        const error = params.get('error');
        if (error) {
            throw new AuthorizationDeniedError(error);
        }

        throw new MissingAuthorizationCodeError();
    }

    /**
     * Exchange authorization code for tokens
     */
    async exchangeCode(code: string): Promise<SpotifyTokens> {
        const response = await this.postToken({
            grant_type: 'authorization_code',
            code,
            redirect_uri: this.config.redirectUri,
        });

        const text = await response.text();
        const data = response.ok ? parseTokenResponse(text) : null;
        if (!data) {
            throw new TokenExchangeError(response.status, text);
        }

        return this.toTokens(data, data.refresh_token);
    }

    /**
     * Refresh an expired access token. Spotify may omit the refresh token in
     * the response; the last known one is carried forward.
     */
    async refreshToken(refreshToken: string): Promise<SpotifyTokens> {
        const response = await this.postToken({
            grant_type: 'refresh_token',
            refresh_token: refreshToken,
        });

        const text = await response.text();
        const data = response.ok ? parseTokenResponse(text) : null;
        if (!data) {
            throw new TokenRefreshError(response.status, text);
        }

        return this.toTokens(data, data.refresh_token || refreshToken);
    }

    private postToken(form: Record<string, string>): Promise<Response> {
        const basic = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString('base64');

        return fetch(this.tokenUrl, {
            method: 'POST',
            headers: {
                Authorization: `Basic ${basic}`,
                'Content-Type': 'application/x-www-form-urlencoded',
            },
            body: new URLSearchParams(form).toString(),
        });
    }

    private toTokens(data: TokenResponse, refreshToken: string | undefined): SpotifyTokens {
        const expiresIn = data.expires_in ?? DEFAULT_EXPIRES_IN;
        return {
            accessToken: data.access_token,
            refreshToken,
            tokenType: data.token_type || 'Bearer',
            expiresIn,
            expiresAt: Date.now() + expiresIn * 1000,
            scope: data.scope || '',
        };
    }
}
