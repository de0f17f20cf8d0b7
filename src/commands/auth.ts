/**
 * Auth CLI Commands
 * tunelog auth init | login | status | refresh | logout
 */

import { Command } from 'commander';
import open from 'open';
import ora from 'ora';
import { log } from '../utils/logger.js';
import { formatDate } from '../utils/formatter.js';
import type { SpotifyClient } from '../client/SpotifyClient.js';
import { ask, createClient, fail, resolveConfig } from './shared.js';

async function login(client: SpotifyClient, interactive: boolean): Promise<void> {
    const tokens = await client.authenticate({
        interactive,
        openBrowser: (url) => open(url),
        prompt: (question) => {
            console.log();
            log.info('After authorizing, paste the full redirect URL here:');
            return ask(question);
        },
        onAuthorizeUrl: (url) => {
            if (interactive) {
                log.info('Opening browser for Spotify authorization...');
                log.dim(`  ${url}`);
            } else {
                log.info('Please visit this URL to authorize:');
                console.log(url);
            }
        },
    });

    log.success('Authentication successful! Tokens saved.');
    log.kv('Expires', formatDate(tokens.expiresAt));
    log.kv('Scope', tokens.scope || '-');
}

export function createAuthCommand(): Command {
    const auth = new Command('auth').description('Manage Spotify authentication');

    auth.command('init')
        .description('Authenticate once: keep existing tokens or run the OAuth flow')
        .option('--no-browser', 'Print the authorization URL instead of opening a browser')
        .action(async (opts: { browser: boolean }) => {
            try {
                const config = resolveConfig();
                const client = createClient(config);

                if (await client.hasUsableTokens()) {
                    log.success('Tokens already exist!');
                    log.dim(`  If you need to re-authenticate, run "tunelog auth logout" or delete ${config.tokenFile}.`);
                    return;
                }
                if (await client.hasTokens()) {
                    log.warn(`Could not read tokens from ${config.tokenFile}; it will be replaced.`);
                }

                log.info('Starting Spotify authentication...');
                await login(client, opts.browser);
            } catch (error) {
                fail('Authentication failed', error);
            }
        });

    auth.command('login')
        .description('Authenticate with Spotify via OAuth (replaces stored tokens)')
        .option('--no-browser', 'Print the authorization URL instead of opening a browser')
        .action(async (opts: { browser: boolean }) => {
            try {
                await login(createClient(), opts.browser);
            } catch (error) {
                fail('Authentication failed', error);
            }
        });

    auth.command('status')
        .description('Show current authentication status')
        .action(async () => {
            try {
                const client = createClient();
                const status = await client.getAuthStatus();

                if (!status.authenticated) {
                    log.warn('Not authenticated. Run: tunelog auth login');
                    return;
                }

                log.success('Authenticated');
                if (status.expiresAt) {
                    log.kv('Token Expires', status.expiresAt.toLocaleString());
                    log.kv('Expired', status.isExpired ? 'Yes' : 'No');
                    log.kv('Can Refresh', status.canRefresh ? 'Yes' : 'No');
                    log.kv('Scope', status.scope || '-');
                }

                const spinner = ora('Fetching profile...').start();
                try {
                    const me = await client.whoami();
                    spinner.stop();
                    log.kv('User', `${me.display_name ?? me.id} (${me.id})`);
                    if (me.product) log.kv('Plan', me.product);
                } catch (error) {
                    spinner.stop();
                    log.dim(`  Could not fetch user details: ${error instanceof Error ? error.message : error}`);
                }
            } catch (error) {
                fail('Status check failed', error);
            }
        });

    auth.command('refresh')
        .description('Force a token refresh')
        .action(async () => {
            try {
                const tokens = await createClient().refreshToken();
                log.success('Token refreshed');
                log.kv('Expires', formatDate(tokens.expiresAt));
            } catch (error) {
                fail('Refresh failed', error);
            }
        });

    auth.command('logout')
        .description('Delete the stored token file')
        .action(async () => {
            try {
                await createClient().logout();
                log.success('Logged out successfully');
            } catch (error) {
                fail('Logout failed', error);
            }
        });

    return auth;
}
