/**
 * Tests for FileStore
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileStore } from '../../src/auth/FileStore.js';
import type { SpotifyTokens } from '../../src/auth/TokenStore.js';

const tokens: SpotifyTokens = {
    accessToken: 'test-access-token',
    refreshToken: 'test-refresh-token',
    tokenType: 'Bearer',
    expiresIn: 3600,
    expiresAt: 1767225600123,
    scope: 'user-top-read user-read-recently-played',
};

describe('FileStore', () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tunelog-store-'));
        file = path.join(dir, 'token.json');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should round-trip tokens', async () => {
        const store = new FileStore(file);
        await store.save(tokens);

        await expect(store.load()).resolves.toEqual(tokens);
    });

    it('should write the provider field names with expires_at in seconds', async () => {
        await new FileStore(file).save(tokens);

        const onDisk = JSON.parse(fs.readFileSync(file, 'utf8'));
        expect(onDisk).toEqual({
            access_token: 'test-access-token',
            token_type: 'Bearer',
            scope: 'user-top-read user-read-recently-played',
            expires_in: 3600,
            refresh_token: 'test-refresh-token',
            expires_at: 1767225600.123,
        });
    });

    it('should omit refresh_token when there is none', async () => {
        const store = new FileStore(file);
        await store.save({ ...tokens, refreshToken: undefined });

        expect(Object.keys(JSON.parse(fs.readFileSync(file, 'utf8')))).not.toContain('refresh_token');
        await expect(store.load()).resolves.toMatchObject({ refreshToken: undefined });
    });

    it('should create missing parent directories', async () => {
        const nested = path.join(dir, 'a', 'b', 'token.json');
        await new FileStore(nested).save(tokens);

        expect(fs.existsSync(nested)).toBe(true);
    });

    it('should leave no temp file behind and restrict permissions', async () => {
        await new FileStore(file).save(tokens);

        expect(fs.readdirSync(dir)).toEqual(['token.json']);
        expect(fs.statSync(file).mode & 0o777).toBe(0o600);
    });

    it('should remove the temp file when the write cannot complete', async () => {
        // A directory in the way makes the final rename fail
        fs.mkdirSync(file);

        await expect(new FileStore(file).save(tokens)).rejects.toThrow();
        expect(fs.readdirSync(dir)).toEqual(['token.json']);
        expect(fs.statSync(file).isDirectory()).toBe(true);
    });

    it('should replace an existing file', async () => {
        const store = new FileStore(file);
        await store.save(tokens);
        await store.save({ ...tokens, accessToken: 'test-access-token-2' });

        await expect(store.load()).resolves.toMatchObject({ accessToken: 'test-access-token-2' });
    });

    it('should load a missing file as null', async () => {
        await expect(new FileStore(file).load()).resolves.toBeNull();
    });

    it('should load a corrupt file as null and keep it on disk', async () => {
        fs.writeFileSync(file, '{not json');

        await expect(new FileStore(file).load()).resolves.toBeNull();
        expect(fs.readFileSync(file, 'utf8')).toBe('{not json');
    });

    it('should load a file without an access token as null', async () => {
        fs.writeFileSync(file, JSON.stringify({ expires_at: 1767225600 }));

        await expect(new FileStore(file).load()).resolves.toBeNull();
    });

    it('should fill defaults for optional fields', async () => {
        fs.writeFileSync(file, JSON.stringify({ access_token: 'test-access-token', expires_at: 1767225600.5 }));

        await expect(new FileStore(file).load()).resolves.toEqual({
            accessToken: 'test-access-token',
            refreshToken: undefined,
            tokenType: 'Bearer',
            expiresIn: 3600,
            expiresAt: 1767225600500,
            scope: '',
        });
    });

    it('should report existence and clear the file', async () => {
        const store = new FileStore(file);
        expect(await store.exists()).toBe(false);

        await store.save(tokens);
        expect(await store.exists()).toBe(true);

        await store.clear();
        expect(await store.exists()).toBe(false);
        await expect(store.clear()).resolves.toBeUndefined();
    });
});
