/**
 * Spotify Web API payloads
 * Only the fields tunelog reads; everything the API may omit is optional.
 */

export type TimeRange = 'short_term' | 'medium_term' | 'long_term';

export const TIME_RANGES: readonly TimeRange[] = ['short_term', 'medium_term', 'long_term'];

export interface ExternalUrls {
    spotify?: string;
}

export interface Image {
    url: string;
    height: number | null;
    width: number | null;
}

export interface SimplifiedArtist {
    id: string;
    name: string;
    external_urls?: ExternalUrls;
}

export interface Artist extends SimplifiedArtist {
    genres?: string[];
    popularity?: number;
    followers?: { total: number | null };
    images?: Image[];
}

export interface Album {
    id: string;
    name: string;
    release_date?: string;
    images?: Image[];
}

export interface Track {
    id: string;
    name: string;
    artists: SimplifiedArtist[];
    album?: Album;
    popularity?: number;
    duration_ms?: number;
    explicit?: boolean;
    preview_url?: string | null;
    external_urls?: ExternalUrls;
}

export interface AudioFeatures {
    id: string;
    danceability?: number;
    energy?: number;
    key?: number;
    loudness?: number;
    mode?: number;
    speechiness?: number;
    acousticness?: number;
    instrumentalness?: number;
    liveness?: number;
    valence?: number;
    tempo?: number;
    duration_ms?: number;
    time_signature?: number;
}

export interface PlayHistory {
    track: Track;
    played_at: string;
    context?: { type: string; uri: string } | null;
}

export interface UserProfile {
    id: string;
    display_name: string | null;
    email?: string;
    country?: string;
    product?: string;
    followers?: { total: number | null };
}

/** Offset-based page with a "next" pointer */
export interface Paging<T> {
    items: T[];
    next: string | null;
    total?: number;
    limit?: number;
    offset?: number;
}

/** Cursor-based page (recently played) */
export interface CursorPaging<T> {
    items: T[];
    next: string | null;
    cursors?: { after?: string; before?: string } | null;
    limit?: number;
}

export interface AudioFeaturesResponse {
    audio_features: Array<AudioFeatures | null>;
}
