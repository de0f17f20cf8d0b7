/**
 * Tracks API
 * Track lookup and batched audio features
 */

import type { HttpClient, RequestOptions } from '../client/HttpClient.js';
import type { AudioFeatures, AudioFeaturesResponse, Track } from '../types/spotify.js';
import { errorMessage } from '../utils/errors.js';
import { log } from '../utils/logger.js';

export const AUDIO_FEATURES_BATCH_SIZE = 20;
export const INTER_BATCH_DELAY_MS = 200;
export const INTER_ITEM_DELAY_MS = 100;

/** A failed batch goes straight to per-track requests; only rate limits are waited out */
const BATCH_REQUEST: RequestOptions = { retryPolicy: { retryOn: ['rate_limited'] } };

/** Per-track requests get one attempt each */
const SINGLE_REQUEST: RequestOptions = { retryPolicy: { maxAttempts: 1 } };

export class TracksApi {
    constructor(private readonly http: HttpClient) { }

    async getTrack(trackId: string): Promise<Track> {
        return this.http.get<Track>(`/tracks/${encodeURIComponent(trackId)}`);
    }

    /**
     * Best-effort: a failed batch falls back to one request per id, and ids
     * that still fail (or come back null) are left out of the result.
     */
    async getAudioFeatures(trackIds: string[]): Promise<AudioFeatures[]> {
        const features: AudioFeatures[] = [];

        for (let i = 0; i < trackIds.length; i += AUDIO_FEATURES_BATCH_SIZE) {
            const batch = trackIds.slice(i, i + AUDIO_FEATURES_BATCH_SIZE);

            try {
                features.push(...(await this.fetchFeatures(batch, BATCH_REQUEST)));
            } catch (error) {
                log.debug(`Audio features batch of ${batch.length} failed (${errorMessage(error)}); retrying per track`);
                features.push(...(await this.fetchIndividually(batch)));
            }

            if (i + AUDIO_FEATURES_BATCH_SIZE < trackIds.length) {
                await this.http.pause(INTER_BATCH_DELAY_MS);
            }
        }

        return features;
    }

    private async fetchFeatures(ids: string[], options: RequestOptions): Promise<AudioFeatures[]> {
        const response = await this.http.get<AudioFeaturesResponse>(
            '/audio-features',
            { ids: ids.join(',') },
            options,
        );
        return (response.audio_features ?? []).filter((f): f is AudioFeatures => f !== null);
    }

    private async fetchIndividually(ids: string[]): Promise<AudioFeatures[]> {
        const features: AudioFeatures[] = [];

        for (const id of ids) {
            await this.http.pause(INTER_ITEM_DELAY_MS);
            try {
                features.push(...(await this.fetchFeatures([id], SINGLE_REQUEST)));
            } catch (error) {
                log.debug(`Dropping audio features for ${id}: ${errorMessage(error)}`);
            }
        }

        return features;
    }
}
