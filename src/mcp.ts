#!/usr/bin/env node
/**
 * tunelog MCP Server
 * Exposes read-only Spotify listening data via Model Context Protocol
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, loadEnvFile } from './utils/config.js';
import { SpotifyClient } from './client/SpotifyClient.js';
import { VERSION } from './version.js';
import { registerIdentityTools, registerListeningTools } from './mcp/tools/index.js';
import { registerResources } from './mcp/resources.js';
import { registerPrompts } from './mcp/prompts.js';

class TunelogMcpServer {
    private server: McpServer;
    private client: SpotifyClient;

    constructor() {
        this.server = new McpServer({
            name: 'tunelog',
            version: VERSION,
        });

        loadEnvFile();
        this.client = new SpotifyClient(loadConfig(), {
            // stdout carries the protocol
            onRetry: ({ action, delayMs }) => console.error(`Retrying ${action} in ${delayMs}ms`),
        });

        registerIdentityTools(this.server, this.client);
        registerListeningTools(this.server, this.client);
        registerResources(this.server, this.client);
        registerPrompts(this.server);
    }

    async start() {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        console.error('tunelog MCP Server running on stdio');
    }
}

try {
    const server = new TunelogMcpServer();
    server.start().catch((err) => console.error(`Failed to start: ${err}`));
} catch (err) {
    console.error(`Failed to start: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
}
