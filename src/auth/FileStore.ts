/**
 * File Token Store
 * Plain JSON token file (default data/token.json), written via temp file + rename
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { TokenStore, SpotifyTokens } from './TokenStore.js';

/**
 * On-disk shape: the provider's token response plus an injected expires_at
 * (seconds since epoch, floating point).
 */
const StoredTokenSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string().default('Bearer'),
    scope: z.string().default(''),
    expires_in: z.number().default(3600),
    refresh_token: z.string().min(1).optional(),
    expires_at: z.number(),
});

type StoredToken = z.infer<typeof StoredTokenSchema>;

function toStored(tokens: SpotifyTokens): StoredToken {
    return {
        access_token: tokens.accessToken,
        token_type: tokens.tokenType,
        scope: tokens.scope,
        expires_in: tokens.expiresIn,
        refresh_token: tokens.refreshToken,
        expires_at: tokens.expiresAt / 1000,
    };
}

function fromStored(stored: StoredToken): SpotifyTokens {
    return {
        accessToken: stored.access_token,
        refreshToken: stored.refresh_token,
        tokenType: stored.token_type,
        expiresIn: stored.expires_in,
        // Exact for integer-millisecond instants
        expiresAt: Math.round(stored.expires_at * 1000),
        scope: stored.scope,
    };
}

export class FileStore implements TokenStore {
    constructor(private readonly filePath: string) { }

    get path(): string {
        return this.filePath;
    }

    async save(tokens: SpotifyTokens): Promise<void> {
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

        const tmpPath = `${this.filePath}.${process.pid}.tmp`;
        try {
            fs.writeFileSync(tmpPath, JSON.stringify(toStored(tokens), null, 2) + '\n', { mode: 0o600 });
            fs.renameSync(tmpPath, this.filePath);
        } catch (error) {
            fs.rmSync(tmpPath, { force: true });
            throw error;
        }
    }

    async load(): Promise<SpotifyTokens | null> {
        if (!fs.existsSync(this.filePath)) {
            return null;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
        } catch {
            // Corrupt state is treated as no state; the operator re-authenticates
            return null;
        }

        const parsed = StoredTokenSchema.safeParse(raw);
        return parsed.success ? fromStored(parsed.data) : null;
    }

    async clear(): Promise<void> {
        if (fs.existsSync(this.filePath)) {
            fs.unlinkSync(this.filePath);
        }
    }

    async exists(): Promise<boolean> {
        return fs.existsSync(this.filePath);
    }
}
