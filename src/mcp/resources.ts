/**
 * MCP Resource Registrar
 * Registers read-only data resources exposed via tunelog:// URIs
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SpotifyClient } from '../client/SpotifyClient.js';
import { errorMessage } from '../utils/errors.js';

export function registerResources(server: McpServer, client: SpotifyClient) {
    server.registerResource(
        'auth-status',
        'tunelog://auth/status',
        {
            description: 'Stored token status: whether authenticated, expiry instant, refreshability and granted scopes',
            mimeType: 'application/json',
        },
        async (uri) => {
            try {
                const status = await client.getAuthStatus();
                return {
                    contents: [
                        {
                            uri: uri.href,
                            text: JSON.stringify(status, null, 2),
                            mimeType: 'application/json',
                        },
                    ],
                };
            } catch (error) {
                return {
                    contents: [
                        {
                            uri: uri.href,
                            text: JSON.stringify({ authenticated: false, error: errorMessage(error) }, null, 2),
                            mimeType: 'application/json',
                        },
                    ],
                };
            }
        },
    );
}
