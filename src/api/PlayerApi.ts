/**
 * Player API
 * Recently played history
 */

import type { HttpClient } from '../client/HttpClient.js';
import type { CursorPaging, PlayHistory } from '../types/spotify.js';
import { MAX_PAGE_LIMIT, clampLimit } from './PersonalizationApi.js';

export class PlayerApi {
    constructor(private readonly http: HttpClient) { }

    /**
     * Most recent plays, newest first. Spotify keeps only the last 50, so a
     * single page is the whole history.
     */
    async getRecentlyPlayed(limit: number = MAX_PAGE_LIMIT): Promise<PlayHistory[]> {
        const page = await this.http.get<CursorPaging<PlayHistory>>('/me/player/recently-played', {
            limit: clampLimit(limit),
        });
        return page.items ?? [];
    }
}
