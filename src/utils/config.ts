/**
 * Config utility
 *
 * Resolution chain (highest priority wins):
 * 1. Environment variables (SPOTIFY_CLIENT_ID, etc.)
 * 2. Project-local .env (cwd fallback)
 *
 * Nothing is cached at module level: callers build a Config once at start-up
 * and pass it down.
 */

import { config as dotenvConfig } from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { ConfigurationError } from './errors.js';

export const DEFAULT_REDIRECT_URI = 'http://localhost:8888/callback';
export const DEFAULT_TOKEN_FILE = path.join('data', 'token.json');
export const DEFAULT_DATA_DIR = 'data';

export interface Credentials {
    readonly clientId: string;
    readonly clientSecret: string;
    readonly redirectUri: string;
}

export interface Config {
    credentials: Credentials;
    /** Absolute path of the JSON token file */
    tokenFile: string;
    /** Absolute path of the directory holding raw/ and processed/ */
    dataDir: string;
}

/**
 * Load a project-local .env as the lowest-priority layer.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
    const envPath = path.resolve(cwd, '.env');
    if (fs.existsSync(envPath)) {
        dotenvConfig({ path: envPath, override: false });
    }
}

export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
    const clientId = env.SPOTIFY_CLIENT_ID;
    const clientSecret = env.SPOTIFY_CLIENT_SECRET;

    if (!clientId || !clientSecret) {
        const missing: string[] = [];
        if (!clientId) missing.push('SPOTIFY_CLIENT_ID');
        if (!clientSecret) missing.push('SPOTIFY_CLIENT_SECRET');
        throw new ConfigurationError(missing);
    }

    return Object.freeze({
        clientId,
        clientSecret,
        redirectUri: env.SPOTIFY_REDIRECT_URI || DEFAULT_REDIRECT_URI,
    });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
    return {
        credentials: loadCredentials(env),
        tokenFile: path.resolve(cwd, env.SPOTIFY_TOKEN_FILE || DEFAULT_TOKEN_FILE),
        dataDir: path.resolve(cwd, env.SPOTIFY_DATA_DIR || DEFAULT_DATA_DIR),
    };
}
