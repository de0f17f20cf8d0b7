/**
 * Response builders shared by the tunelog MCP tools
 */

import { errorMessage } from '../../utils/errors.js';

export function mcpJson(value: unknown) {
    return {
        content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
    };
}

/**
 * Tool failures are reported in-band, never thrown.
 */
export function mcpError(error: unknown) {
    return {
        content: [{ type: 'text' as const, text: `Error: ${errorMessage(error)}` }],
        isError: true as const,
    };
}
