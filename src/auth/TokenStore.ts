/**
 * Token persistence contract
 * One credential set per store; the CLI and the MCP server share the same file.
 */

export interface SpotifyTokens {
    accessToken: string;
    /** Absent when the provider never issued one; refresh is then impossible */
    refreshToken?: string;
    tokenType: string;
    expiresIn: number; // seconds, as issued
    expiresAt: number; // Unix timestamp ms
    /** Space-separated granted scopes */
    scope: string;
}

export interface TokenStore {
    /** Replaces whatever was stored before */
    save(tokens: SpotifyTokens): Promise<void>;
    /** Resolves null when nothing usable is stored */
    load(): Promise<SpotifyTokens | null>;
    clear(): Promise<void>;
    exists(): Promise<boolean>;
}
