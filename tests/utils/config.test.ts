/**
 * Tests for config
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, loadCredentials, loadEnvFile } from '../../src/utils/config.js';
import { ConfigurationError } from '../../src/utils/errors.js';

describe('config', () => {
    describe('loadCredentials', () => {
        it('should read credentials and default the redirect URI', () => {
            const credentials = loadCredentials({
                SPOTIFY_CLIENT_ID: 'test-client-id',
                SPOTIFY_CLIENT_SECRET: 'test-secret',
            });

            expect(credentials).toEqual({
                clientId: 'test-client-id',
                clientSecret: 'test-secret',
                redirectUri: 'http://localhost:8888/callback',
            });
            expect(Object.isFrozen(credentials)).toBe(true);
        });

        it('should honour a custom redirect URI', () => {
            expect(
                loadCredentials({
                    SPOTIFY_CLIENT_ID: 'test-client-id',
                    SPOTIFY_CLIENT_SECRET: 'test-secret',
                    SPOTIFY_REDIRECT_URI: 'http://127.0.0.1:9000/cb',
                }).redirectUri,
            ).toBe('http://127.0.0.1:9000/cb');
        });

        it('should name every missing variable', () => {
            const error = (() => {
                try {
                    loadCredentials({ SPOTIFY_CLIENT_SECRET: '' });
                } catch (e) {
                    return e;
                }
            })();

            expect(error).toBeInstanceOf(ConfigurationError);
            expect(error).toMatchObject({ missing: ['SPOTIFY_CLIENT_ID', 'SPOTIFY_CLIENT_SECRET'] });
        });

        it('should name only the missing secret', () => {
            expect(() => loadCredentials({ SPOTIFY_CLIENT_ID: 'test-client-id' })).toThrow(
                /Missing Spotify credentials: SPOTIFY_CLIENT_SECRET\./,
            );
        });
    });

    describe('loadConfig', () => {
        const env = { SPOTIFY_CLIENT_ID: 'test-client-id', SPOTIFY_CLIENT_SECRET: 'test-secret' };

        it('should resolve default paths against the working directory', () => {
            const config = loadConfig(env, '/work');

            expect(config.tokenFile).toBe(path.resolve('/work', 'data', 'token.json'));
            expect(config.dataDir).toBe(path.resolve('/work', 'data'));
        });

        it('should take overrides from the environment', () => {
            const config = loadConfig(
                { ...env, SPOTIFY_TOKEN_FILE: 'secrets/t.json', SPOTIFY_DATA_DIR: '/var/tunelog' },
                '/work',
            );

            expect(config.tokenFile).toBe(path.resolve('/work', 'secrets/t.json'));
            expect(config.dataDir).toBe('/var/tunelog');
        });
    });

    describe('loadEnvFile', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tunelog-env-'));
        });

        afterEach(() => {
            delete process.env.TUNELOG_TEST_FROM_DOTENV;
            delete process.env.TUNELOG_TEST_PRESET;
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('should load .env without overriding the environment', () => {
            fs.writeFileSync(
                path.join(dir, '.env'),
                'TUNELOG_TEST_FROM_DOTENV=from-file\nTUNELOG_TEST_PRESET=from-file\n',
            );
            process.env.TUNELOG_TEST_PRESET = 'from-env';

            loadEnvFile(dir);

            expect(process.env.TUNELOG_TEST_FROM_DOTENV).toBe('from-file');
            expect(process.env.TUNELOG_TEST_PRESET).toBe('from-env');
        });

        it('should do nothing when there is no .env', () => {
            expect(() => loadEnvFile(dir)).not.toThrow();
            expect(process.env.TUNELOG_TEST_FROM_DOTENV).toBeUndefined();
        });
    });
});
