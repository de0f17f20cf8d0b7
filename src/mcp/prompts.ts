/**
 * MCP Prompt Registrar
 * Guided workflow prompts over the listening tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

export function registerPrompts(server: McpServer) {
    server.registerPrompt(
        'listening-report',
        {
            title: 'Listening Report',
            description:
                "Summarizes the user's listening habits for a time range: favourite artists and genres, track characteristics, and when they listen.",
            argsSchema: {
                timeRange: z.string().describe('short_term, medium_term or long_term'),
            },
        },
        async ({ timeRange }) => ({
            messages: [
                {
                    role: 'user' as const,
                    content: {
                        type: 'text' as const,
                        text: `Write a listening report for the ${timeRange} range:

1. **Check auth**: Use auth_status. If not authenticated, stop and tell me to run "tunelog auth login".
2. **Artists**: Use get_top_artists with timeRange=${timeRange}. List the top 10 and the most common genres.
3. **Tracks**: Use get_top_tracks with timeRange=${timeRange}. Note repeat artists, explicit share and average popularity.
4. **Sound**: Use get_audio_features on the top 20 track ids. If nothing comes back, say audio features are unavailable and skip this step.
5. **When**: Use get_recently_played and summarize plays by hour of day and weekday.

Keep it short, with one section per step.`,
                    },
                },
            ],
        }),
    );
}
