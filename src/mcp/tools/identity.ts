/**
 * MCP Tool Registrar — Identity tools
 * auth_status, whoami
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SpotifyClient } from '../../client/SpotifyClient.js';
import { errorMessage } from '../../utils/errors.js';
import { mcpError, mcpJson } from './shared.js';

export function registerIdentityTools(server: McpServer, client: SpotifyClient) {
    server.registerTool(
        'auth_status',
        {
            title: 'Auth Status',
            description:
                'Reports whether Spotify tokens are stored, when the access token expires, whether it can be refreshed, and which scopes were granted. Does not call the Spotify API.',
            annotations: { readOnlyHint: true },
        },
        async () => {
            try {
                const status = await client.getAuthStatus();
                return mcpJson({
                    authenticated: status.authenticated,
                    expiresAt: status.expiresAt?.toISOString() ?? null,
                    isExpired: status.isExpired ?? null,
                    canRefresh: status.canRefresh ?? null,
                    scope: status.scope ?? null,
                });
            } catch (error) {
                return mcpError(error);
            }
        },
    );

    server.registerTool(
        'whoami',
        {
            title: 'Who Am I',
            description:
                'Returns the Spotify profile of the authenticated user (id, display name, country, plan). Use this first to confirm authentication is working.',
            annotations: { readOnlyHint: true },
        },
        async () => {
            try {
                const me = await client.whoami();
                return mcpJson({
                    id: me.id,
                    displayName: me.display_name,
                    country: me.country ?? null,
                    product: me.product ?? null,
                });
            } catch (error) {
                return {
                    content: [
                        {
                            type: 'text',
                            text: `Auth error: ${errorMessage(error)}. Run "tunelog auth login" first.`,
                        },
                    ],
                    isError: true,
                };
            }
        },
    );
}
