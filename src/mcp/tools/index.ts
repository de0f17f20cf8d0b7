/**
 * MCP Tool Registrars — barrel export
 */

export { registerIdentityTools } from './identity.js';
export { registerListeningTools } from './listening.js';
