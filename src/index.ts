/**
 * tunelog — Library Barrel Export
 */

// Client
export { SpotifyClient, type SpotifyClientOptions } from './client/SpotifyClient.js';
export { HttpClient, type HttpClientConfig, type AccessTokenProvider, type QueryParams, type RequestOptions } from './client/HttpClient.js';
export {
    DEFAULT_RETRY_POLICY,
    executeWithRetry,
    classifyResponse,
    classifyFailure,
    decideRetry,
    backoffDelay,
    parseRetryAfter,
    type RetryPolicy,
    type AttemptOutcome,
    type RetryDecision,
    type RetryableKind,
    type RetryListener,
    type Sleep,
} from './client/RetryPolicy.js';

// Auth
export {
    TokenManager,
    isExpired,
    REFRESH_MARGIN_MS,
    type TokenManagerConfig,
    type AuthStatus,
    type InteractiveFlowOptions,
} from './auth/TokenManager.js';
export { OAuthFlow, DEFAULT_SCOPES, type OAuthConfig } from './auth/OAuthFlow.js';
export { FileStore } from './auth/FileStore.js';
export type { TokenStore, SpotifyTokens } from './auth/TokenStore.js';

// APIs
export { PersonalizationApi, PlayerApi, TracksApi, UsersApi } from './api/index.js';
export type * from './types/spotify.js';
export { TIME_RANGES } from './types/spotify.js';

// Pipelines
export { fetchAllData, collectTrackIds, type FetchOptions, type FetchedData, type FetchReporter } from './pipeline/fetch.js';
export {
    preprocessAll,
    mergeTracksWithFeatures,
    flattenTrack,
    flattenArtists,
    flattenRecentlyPlayed,
    type TrackRow,
    type TrackFeatureRow,
    type ArtistRow,
    type PlayRow,
} from './pipeline/preprocess.js';

// Utils
export { loadConfig, loadCredentials, loadEnvFile, type Config, type Credentials } from './utils/config.js';
export * from './utils/errors.js';
