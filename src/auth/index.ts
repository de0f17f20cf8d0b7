export { OAuthFlow, DEFAULT_SCOPES, type OAuthConfig } from './OAuthFlow.js';
export {
    TokenManager,
    isExpired,
    REFRESH_MARGIN_MS,
    type TokenManagerConfig,
    type AuthStatus,
    type InteractiveFlowOptions,
} from './TokenManager.js';
export { FileStore } from './FileStore.js';
export type { TokenStore, SpotifyTokens } from './TokenStore.js';
