/**
 * Error utilities
 * Error taxonomy plus shared formatting for CLI and MCP error handling
 */

import { AxiosError } from 'axios';

export class TunelogError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

// ── Configuration ─────────────────────────────────────

export class ConfigurationError extends TunelogError {
    constructor(readonly missing: string[]) {
        super(
            `Missing Spotify credentials: ${missing.join(', ')}.\n` +
            'Set them in your environment or in a .env file in the working directory.',
        );
    }
}

// ── Authorization ─────────────────────────────────────

export class AuthorizationDeniedError extends TunelogError {
    constructor(readonly error: string) {
        super(`Authorization failed: ${error}`);
    }
}

export class MissingAuthorizationCodeError extends TunelogError {
    constructor() {
        super('No authorization code found in redirect URL');
    }
}

export class TokenExchangeError extends TunelogError {
    constructor(readonly status: number, readonly body: string) {
        super(`Token exchange failed (HTTP ${status}): ${body}`);
    }
}

export class TokenRefreshError extends TunelogError {
    constructor(readonly status: number, readonly body: string) {
        super(`Token refresh failed (HTTP ${status}): ${body}`);
    }
}

export class NoTokenError extends TunelogError {
    constructor() {
        super('No tokens found. Run: tunelog auth login');
    }
}

export class NoRefreshTokenError extends TunelogError {
    constructor() {
        super('Token expired and no refresh token available. Run: tunelog auth login');
    }
}

// ── API requests ──────────────────────────────────────

export interface RequestFailureDetails {
    /** e.g. "GET /me/top/tracks" */
    action: string;
    attempts: number;
    status?: number;
    cause: unknown;
}

export abstract class RequestFailure extends TunelogError {
    readonly action: string;
    readonly attempts: number;
    readonly status?: number;

    constructor(summary: string, details: RequestFailureDetails) {
        const status = details.status !== undefined ? ` (HTTP ${details.status})` : '';
        super(`${details.action} ${summary}${status} after ${details.attempts} attempt(s)`, {
            cause: details.cause,
        });
        this.action = details.action;
        this.attempts = details.attempts;
        this.status = details.status;
    }
}

export class RateLimitedError extends RequestFailure {
    constructor(details: RequestFailureDetails) {
        super('was rate limited', details);
    }
}

export class ServerError extends RequestFailure {
    constructor(details: RequestFailureDetails) {
        super('failed with a server error', details);
    }
}

export class TransientError extends RequestFailure {
    constructor(details: RequestFailureDetails) {
        super('failed', details);
    }
}

/** Non-retryable HTTP failure (4xx other than 429) */
export class ApiRequestError extends RequestFailure {
    constructor(details: RequestFailureDetails) {
        super('was rejected', details);
    }
}

/**
 * Extracts a human-readable message from an unknown error value.
 * For AxiosErrors, prefers the Spotify error body ({ error: { status, message } })
 * over the generic HTTP status. Typed request failures append the API's
 * explanation from their cause.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof AxiosError && error.response) {
        const detail = spotifyErrorDetail(error.response.data);
        return detail ?? `HTTP ${error.response.status || 'unknown'}`;
    }
    if (error instanceof RequestFailure && error.cause instanceof AxiosError && error.cause.response) {
        const detail = spotifyErrorDetail(error.cause.response.data);
        return detail ? `${error.message}: ${detail}` : error.message;
    }
    return error instanceof Error ? error.message : String(error);
}

function spotifyErrorDetail(data: unknown): string | undefined {
    if (typeof data === 'string' && data.length > 0) return data;
    if (!data || typeof data !== 'object') return undefined;

    if ('error' in data) {
        const inner = data.error;
        if (typeof inner === 'string') {
            return 'error_description' in data && typeof data.error_description === 'string'
                ? `${inner}: ${data.error_description}`
                : inner;
        }
        if (inner && typeof inner === 'object' && 'message' in inner && typeof inner.message === 'string') {
            return inner.message;
        }
    }
    if ('message' in data && typeof data.message === 'string') return data.message;
    return undefined;
}
