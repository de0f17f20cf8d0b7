/**
 * Fetch pipeline
 * Pulls listening data through the API client and saves raw JSON under <dataDir>/raw
 */

import * as path from 'path';
import type { SpotifyClient } from '../client/SpotifyClient.js';
import {
    TIME_RANGES,
    type Artist,
    type AudioFeatures,
    type PlayHistory,
    type TimeRange,
    type Track,
} from '../types/spotify.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { rawDir, writeJson } from './files.js';

export interface FetchReporter {
    step(message: string): void;
    done(message: string): void;
    warn(message: string): void;
}

const consoleReporter: FetchReporter = {
    step: (message) => log.info(message),
    done: (message) => log.success(message),
    warn: (message) => log.warn(message),
};

export interface FetchOptions {
    timeRanges?: readonly TimeRange[];
    includeRecentlyPlayed?: boolean;
    recentlyPlayedLimit?: number;
    reporter?: FetchReporter;
}

export interface FetchedData {
    tracks: Partial<Record<TimeRange, Track[]>>;
    artists: Partial<Record<TimeRange, Artist[]>>;
    audioFeatures: AudioFeatures[];
    recentlyPlayed: PlayHistory[] | null;
}

/**
 * Unique track ids across all ranges, in first-seen order
 */
export function collectTrackIds(tracksByRange: Partial<Record<TimeRange, Track[]>>): string[] {
    const ids = new Set<string>();
    for (const timeRange of TIME_RANGES) {
        for (const track of tracksByRange[timeRange] ?? []) {
            ids.add(track.id);
        }
    }
    return [...ids];
}

export async function fetchAllData(
    client: SpotifyClient,
    dataDir: string,
    options: FetchOptions = {},
): Promise<FetchedData> {
    const timeRanges = options.timeRanges ?? TIME_RANGES;
    const reporter = options.reporter ?? consoleReporter;
    const outDir = rawDir(dataDir);

    const tracks: Partial<Record<TimeRange, Track[]>> = {};
    for (const timeRange of timeRanges) {
        reporter.step(`Fetching top tracks (${timeRange})...`);
        const items = await client.personalization.getTopTracks(timeRange);
        tracks[timeRange] = items;

        const file = path.join(outDir, `top_tracks_${timeRange}.json`);
        writeJson(file, items);
        reporter.done(`Saved ${items.length} tracks to ${file}`);
    }

    // The audio-features endpoint is unavailable to newer Spotify apps;
    // the rest of the data is still worth saving without it.
    const trackIds = collectTrackIds(tracks);
    let audioFeatures: AudioFeatures[] = [];
    if (trackIds.length > 0) {
        reporter.step(`Fetching audio features for ${trackIds.length} tracks...`);
        try {
            audioFeatures = await client.tracks.getAudioFeatures(trackIds);
        } catch (error) {
            reporter.warn(`Could not fetch audio features (${errorMessage(error)}). Continuing without them.`);
        }
        if (audioFeatures.length === 0) {
            reporter.warn('No audio features retrieved. Continuing without them.');
        }
    }
    const featuresFile = path.join(outDir, 'audio_features.json');
    writeJson(featuresFile, audioFeatures);
    reporter.done(`Saved ${audioFeatures.length} audio features to ${featuresFile}`);

    const artists: Partial<Record<TimeRange, Artist[]>> = {};
    for (const timeRange of timeRanges) {
        reporter.step(`Fetching top artists (${timeRange})...`);
        const items = await client.personalization.getTopArtists(timeRange);
        artists[timeRange] = items;

        const file = path.join(outDir, `top_artists_${timeRange}.json`);
        writeJson(file, items);
        reporter.done(`Saved ${items.length} artists to ${file}`);
    }

    let recentlyPlayed: PlayHistory[] | null = null;
    if (options.includeRecentlyPlayed ?? true) {
        const limit = options.recentlyPlayedLimit ?? 50;
        reporter.step(`Fetching ${limit} recently played tracks...`);
        recentlyPlayed = await client.player.getRecentlyPlayed(limit);

        const file = path.join(outDir, 'recently_played.json');
        writeJson(file, recentlyPlayed);
        reporter.done(`Saved ${recentlyPlayed.length} recently played tracks to ${file}`);
    }

    return { tracks, artists, audioFeatures, recentlyPlayed };
}
