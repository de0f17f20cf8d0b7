export { PersonalizationApi, MAX_PAGE_LIMIT, clampLimit } from './PersonalizationApi.js';
export { PlayerApi } from './PlayerApi.js';
export {
    TracksApi,
    AUDIO_FEATURES_BATCH_SIZE,
    INTER_BATCH_DELAY_MS,
    INTER_ITEM_DELAY_MS,
} from './TracksApi.js';
export { UsersApi } from './UsersApi.js';
