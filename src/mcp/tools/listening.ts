/**
 * MCP Tool Registrar — Listening data tools
 * get_top_tracks, get_top_artists, get_recently_played, get_audio_features
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { SpotifyClient } from '../../client/SpotifyClient.js';
import { flattenArtists, flattenRecentlyPlayed, flattenTrack } from '../../pipeline/preprocess.js';
import type { Artist, TimeRange } from '../../types/spotify.js';
import { mcpError, mcpJson } from './shared.js';

const timeRange = z
    .enum(['short_term', 'medium_term', 'long_term'])
    .optional()
    .describe(
        'short_term ≈ last 4 weeks, medium_term ≈ last 6 months (default), long_term ≈ several years',
    );

export function registerListeningTools(server: McpServer, client: SpotifyClient) {
    server.registerTool(
        'get_top_tracks',
        {
            title: 'Get Top Tracks',
            description:
                "Returns the user's top tracks for a time range, flattened to track id, name, artists, album, popularity and duration. All result pages are fetched.",
            inputSchema: {
                timeRange,
                limit: z.number().int().min(1).optional().describe('Maximum number of tracks to return'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ timeRange, limit }) => {
            try {
                const tracks = await client.personalization.getTopTracks(timeRange ?? 'medium_term');
                const rows = tracks.map(flattenTrack);
                return mcpJson({ total: rows.length, tracks: limit ? rows.slice(0, limit) : rows });
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'get_top_artists',
        {
            title: 'Get Top Artists',
            description:
                "Returns the user's top artists for a time range with genres, popularity and follower counts. All result pages are fetched.",
            inputSchema: {
                timeRange,
                limit: z.number().int().min(1).optional().describe('Maximum number of artists to return'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ timeRange, limit }) => {
            try {
                const range = timeRange ?? 'medium_term';
                const artists = await client.personalization.getTopArtists(range);
                const byRange: Partial<Record<TimeRange, Artist[]>> = {};
                byRange[range] = artists;
                const rows = flattenArtists(byRange);
                return mcpJson({ total: rows.length, artists: limit ? rows.slice(0, limit) : rows });
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'get_recently_played',
        {
            title: 'Get Recently Played',
            description:
                'Returns up to 50 most recently played tracks with UTC play time, hour and weekday. Useful for listening-time patterns.',
            inputSchema: {
                limit: z.number().int().min(1).max(50).optional().describe('Number of plays (default 50)'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ limit }) => {
            try {
                const plays = await client.player.getRecentlyPlayed(limit ?? 50);
                return mcpJson(flattenRecentlyPlayed(plays));
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'get_audio_features',
        {
            title: 'Get Audio Features',
            description:
                'Returns audio features (danceability, energy, valence, tempo, ...) for the given track ids. Best-effort: tracks the API cannot describe are omitted, and the endpoint may be unavailable to newer Spotify apps.',
            inputSchema: {
                trackIds: z.array(z.string()).min(1).describe('Spotify track ids'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ trackIds }) => {
            try {
                const features = await client.tracks.getAudioFeatures(trackIds);
                return mcpJson({ requested: trackIds.length, returned: features.length, features });
            } catch (error) {
                return mcpError(error);
            }
        },
    );
}
