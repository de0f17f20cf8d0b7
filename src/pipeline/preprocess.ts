/**
 * Preprocess pipeline
 * Flattens raw API JSON into CSV tables under <dataDir>/processed
 */

import * as path from 'path';
import { z } from 'zod';
import {
    TIME_RANGES,
    type Artist,
    type AudioFeatures,
    type PlayHistory,
    type TimeRange,
    type Track,
} from '../types/spotify.js';
import { toCsv } from '../utils/formatter.js';
import { log } from '../utils/logger.js';
import { processedDir, rawDir, readJsonArray, writeText } from './files.js';

// ── Raw file schemas ──────────────────────────────────

const ExternalUrlsSchema = z.object({ spotify: z.string().optional() });

const SimplifiedArtistSchema = z.object({
    id: z.string(),
    name: z.string(),
    external_urls: ExternalUrlsSchema.optional(),
});

const TrackSchema = z.object({
    id: z.string(),
    name: z.string(),
    artists: z.array(SimplifiedArtistSchema).default([]),
    album: z.object({ id: z.string(), name: z.string() }).optional(),
    popularity: z.number().optional(),
    duration_ms: z.number().optional(),
    explicit: z.boolean().optional(),
    preview_url: z.string().nullable().optional(),
    external_urls: ExternalUrlsSchema.optional(),
});

const ArtistSchema = SimplifiedArtistSchema.extend({
    genres: z.array(z.string()).optional(),
    popularity: z.number().optional(),
    followers: z.object({ total: z.number().nullable() }).optional(),
});

const optionalNumber = z.number().optional();

const AudioFeaturesSchema = z.object({
    id: z.string(),
    danceability: optionalNumber,
    energy: optionalNumber,
    key: optionalNumber,
    loudness: optionalNumber,
    mode: optionalNumber,
    speechiness: optionalNumber,
    acousticness: optionalNumber,
    instrumentalness: optionalNumber,
    liveness: optionalNumber,
    valence: optionalNumber,
    tempo: optionalNumber,
    duration_ms: optionalNumber,
    time_signature: optionalNumber,
});

const PlayHistorySchema = z.object({
    track: TrackSchema,
    played_at: z.string(),
});

// ── Rows ──────────────────────────────────────────────

export interface TrackRow {
    track_id: string;
    track_name: string;
    artist_names: string;
    artist_ids: string;
    primary_artist: string | null;
    album_name: string | null;
    album_id: string | null;
    popularity: number | null;
    duration_ms: number | null;
    explicit: boolean;
    preview_url: string | null;
    external_url: string | null;
}

export interface FeatureColumns {
    danceability: number | null;
    energy: number | null;
    key: number | null;
    loudness: number | null;
    mode: number | null;
    speechiness: number | null;
    acousticness: number | null;
    instrumentalness: number | null;
    liveness: number | null;
    valence: number | null;
    tempo: number | null;
    duration_ms_feature: number | null;
    time_signature: number | null;
}

export interface TrackFeatureRow extends TrackRow, FeatureColumns {
    time_range: TimeRange;
}

export interface ArtistRow {
    artist_id: string;
    artist_name: string;
    genres: string;
    popularity: number | null;
    followers: number;
    external_url: string | null;
    time_range: TimeRange;
}

export interface PlayRow {
    track_id: string;
    track_name: string;
    artist_names: string;
    played_at: string;
    /** YYYY-MM-DD, UTC */
    date: string;
    hour: number;
    day_of_week: string;
    /** 0 = Monday */
    day_of_week_num: number;
}

export const TRACK_COLUMNS: ReadonlyArray<keyof TrackFeatureRow> = [
    'track_id',
    'track_name',
    'artist_names',
    'artist_ids',
    'primary_artist',
    'album_name',
    'album_id',
    'popularity',
    'duration_ms',
    'explicit',
    'preview_url',
    'external_url',
    'time_range',
    'danceability',
    'energy',
    'key',
    'loudness',
    'mode',
    'speechiness',
    'acousticness',
    'instrumentalness',
    'liveness',
    'valence',
    'tempo',
    'duration_ms_feature',
    'time_signature',
];

export const ARTIST_COLUMNS: ReadonlyArray<keyof ArtistRow> = [
    'artist_id',
    'artist_name',
    'genres',
    'popularity',
    'followers',
    'external_url',
    'time_range',
];

export const PLAY_COLUMNS: ReadonlyArray<keyof PlayRow> = [
    'track_id',
    'track_name',
    'artist_names',
    'played_at',
    'date',
    'hour',
    'day_of_week',
    'day_of_week_num',
];

const DAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

// ── Flattening ────────────────────────────────────────

export function flattenTrack(track: Track): TrackRow {
    const artists = track.artists ?? [];
    const names = artists.map((a) => a.name);

    return {
        track_id: track.id,
        track_name: track.name,
        artist_names: names.join(', '),
        artist_ids: artists.map((a) => a.id).join(', '),
        primary_artist: names[0] ?? null,
        album_name: track.album?.name ?? null,
        album_id: track.album?.id ?? null,
        popularity: track.popularity ?? null,
        duration_ms: track.duration_ms ?? null,
        explicit: track.explicit ?? false,
        preview_url: track.preview_url ?? null,
        external_url: track.external_urls?.spotify ?? null,
    };
}

function featureColumns(features: AudioFeatures | undefined): FeatureColumns {
    return {
        danceability: features?.danceability ?? null,
        energy: features?.energy ?? null,
        key: features?.key ?? null,
        loudness: features?.loudness ?? null,
        mode: features?.mode ?? null,
        speechiness: features?.speechiness ?? null,
        acousticness: features?.acousticness ?? null,
        instrumentalness: features?.instrumentalness ?? null,
        liveness: features?.liveness ?? null,
        valence: features?.valence ?? null,
        tempo: features?.tempo ?? null,
        duration_ms_feature: features?.duration_ms ?? null,
        time_signature: features?.time_signature ?? null,
    };
}

/**
 * One row per (time range, track). Tracks without features keep null feature
 * columns, whether the endpoint failed entirely or only for that track.
 */
export function mergeTracksWithFeatures(
    tracksByRange: Partial<Record<TimeRange, Track[]>>,
    audioFeatures: AudioFeatures[],
): TrackFeatureRow[] {
    const featuresById = new Map(audioFeatures.map((f) => [f.id, f]));
    const rows: TrackFeatureRow[] = [];

    for (const timeRange of TIME_RANGES) {
        for (const track of tracksByRange[timeRange] ?? []) {
            rows.push({
                ...flattenTrack(track),
                time_range: timeRange,
                ...featureColumns(featuresById.get(track.id)),
            });
        }
    }

    return rows;
}

export function flattenArtists(artistsByRange: Partial<Record<TimeRange, Artist[]>>): ArtistRow[] {
    const rows: ArtistRow[] = [];

    for (const timeRange of TIME_RANGES) {
        for (const artist of artistsByRange[timeRange] ?? []) {
            rows.push({
                artist_id: artist.id,
                artist_name: artist.name,
                genres: (artist.genres ?? []).join(', '),
                popularity: artist.popularity ?? null,
                followers: artist.followers?.total ?? 0,
                external_url: artist.external_urls?.spotify ?? null,
                time_range: timeRange,
            });
        }
    }

    return rows;
}

/**
 * Adds UTC date/hour/weekday columns. Entries with an unparseable played_at are skipped.
 */
export function flattenRecentlyPlayed(items: PlayHistory[]): PlayRow[] {
    const rows: PlayRow[] = [];

    for (const item of items) {
        const playedAt = new Date(item.played_at);
        if (!item.played_at || Number.isNaN(playedAt.getTime())) continue;

        const dayNum = (playedAt.getUTCDay() + 6) % 7;
        rows.push({
            track_id: item.track.id,
            track_name: item.track.name,
            artist_names: (item.track.artists ?? []).map((a) => a.name).join(', '),
            played_at: item.played_at,
            date: playedAt.toISOString().slice(0, 10),
            hour: playedAt.getUTCHours(),
            day_of_week: DAY_NAMES[dayNum],
            day_of_week_num: dayNum,
        });
    }

    return rows;
}

// ── Orchestration ─────────────────────────────────────

export interface ProcessedData {
    tracks: TrackFeatureRow[];
    artists: ArtistRow[];
    recentlyPlayed: PlayRow[];
}

export function loadRawData(dataDir: string): {
    tracks: Partial<Record<TimeRange, Track[]>>;
    artists: Partial<Record<TimeRange, Artist[]>>;
    audioFeatures: AudioFeatures[];
    recentlyPlayed: PlayHistory[];
} {
    const dir = rawDir(dataDir);
    const tracks: Partial<Record<TimeRange, Track[]>> = {};
    const artists: Partial<Record<TimeRange, Artist[]>> = {};

    for (const timeRange of TIME_RANGES) {
        const rangeTracks = readJsonArray(path.join(dir, `top_tracks_${timeRange}.json`), TrackSchema);
        if (rangeTracks.length > 0) tracks[timeRange] = rangeTracks;

        const rangeArtists = readJsonArray(path.join(dir, `top_artists_${timeRange}.json`), ArtistSchema);
        if (rangeArtists.length > 0) artists[timeRange] = rangeArtists;
    }

    return {
        tracks,
        artists,
        audioFeatures: readJsonArray(path.join(dir, 'audio_features.json'), AudioFeaturesSchema),
        recentlyPlayed: readJsonArray(path.join(dir, 'recently_played.json'), PlayHistorySchema),
    };
}

/**
 * Read <dataDir>/raw and write tracks.csv, artists.csv and (when there are
 * plays) recently_played.csv under <dataDir>/processed.
 */
export function preprocessAll(dataDir: string): ProcessedData {
    const raw = loadRawData(dataDir);
    const outDir = processedDir(dataDir);

    if (raw.audioFeatures.length === 0) {
        log.warn('No audio features available - tracks will have empty audio feature columns');
    }

    const tracks = mergeTracksWithFeatures(raw.tracks, raw.audioFeatures);
    writeText(path.join(outDir, 'tracks.csv'), toCsv(TRACK_COLUMNS, tracks));
    log.success(`Saved ${tracks.length} tracks to ${path.join(outDir, 'tracks.csv')}`);

    const artists = flattenArtists(raw.artists);
    writeText(path.join(outDir, 'artists.csv'), toCsv(ARTIST_COLUMNS, artists));
    log.success(`Saved ${artists.length} artist records to ${path.join(outDir, 'artists.csv')}`);

    const recentlyPlayed = flattenRecentlyPlayed(raw.recentlyPlayed);
    if (recentlyPlayed.length > 0) {
        writeText(path.join(outDir, 'recently_played.csv'), toCsv(PLAY_COLUMNS, recentlyPlayed));
        log.success(`Saved ${recentlyPlayed.length} recently played records to ${path.join(outDir, 'recently_played.csv')}`);
    }

    return { tracks, artists, recentlyPlayed };
}
