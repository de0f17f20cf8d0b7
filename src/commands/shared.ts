/**
 * Shared command utilities
 * Common helpers used across all CLI command modules
 */

import * as readline from 'readline';
import { loadConfig, loadEnvFile, type Config } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { SpotifyClient } from '../client/SpotifyClient.js';
import type { RetryListener } from '../client/RetryPolicy.js';

/**
 * Resolve configuration from the environment (and a local .env).
 */
export function resolveConfig(): Config {
    loadEnvFile();
    return loadConfig();
}

export const reportRetry: RetryListener = ({ action, outcome, delayMs }) => {
    const wait = `${(delayMs / 1000).toFixed(1)}s`;
    switch (outcome.kind) {
        case 'rate_limited':
            log.warn(`Rate limited on ${action}. Waiting ${wait}...`);
            break;
        case 'server_error':
            log.warn(`Server error (HTTP ${outcome.status}) on ${action}. Retrying in ${wait}...`);
            break;
        default:
            log.warn(`Request error on ${action}. Retrying in ${wait}...`);
            break;
    }
};

/**
 * Creates a SpotifyClient from the resolved configuration.
 * Used by all CLI commands that talk to Spotify.
 */
export function createClient(config: Config = resolveConfig()): SpotifyClient {
    return new SpotifyClient(config, { onRetry: reportRetry });
}

/**
 * Ask a single question on the terminal; resolves with the trimmed answer.
 */
export function ask(question: string): Promise<string> {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
    });

    return new Promise((resolve) => {
        rl.question(question, (answer) => {
            rl.close();
            resolve(answer.trim());
        });
    });
}

/**
 * Log a command failure and exit non-zero.
 */
export function fail(context: string, error: unknown): never {
    log.error(`${context}: ${errorMessage(error)}`);
    process.exit(1);
}
