/**
 * Personalization API
 * The user's top tracks and artists per time range
 */

import type { HttpClient } from '../client/HttpClient.js';
import type { Artist, TimeRange, Track } from '../types/spotify.js';

/** Spotify's per-page maximum */
export const MAX_PAGE_LIMIT = 50;

export class PersonalizationApi {
    constructor(private readonly http: HttpClient) { }

    /**
     * All top tracks for the range; every continuation page is drained.
     */
    async getTopTracks(timeRange: TimeRange = 'medium_term', limit: number = MAX_PAGE_LIMIT): Promise<Track[]> {
        return this.http.getAllPages<Track>('/me/top/tracks', {
            time_range: timeRange,
            limit: clampLimit(limit),
        });
    }

    async getTopArtists(timeRange: TimeRange = 'medium_term', limit: number = MAX_PAGE_LIMIT): Promise<Artist[]> {
        return this.http.getAllPages<Artist>('/me/top/artists', {
            time_range: timeRange,
            limit: clampLimit(limit),
        });
    }
}

export function clampLimit(limit: number): number {
    return Math.min(Math.max(Math.trunc(limit) || 1, 1), MAX_PAGE_LIMIT);
}
