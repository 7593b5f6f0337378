export { CacheDatabase, TIMELINE_FILE } from './cache-database.js';
export type { CacheDatabaseOptions } from './cache-database.js';
export { SqliteCacheSource } from './source.js';
export type { CacheSource, SqlRow, SqlValue } from './source.js';
export {
    ChatEntry,
    DialogEntry,
    EncryptedChatEntry,
    MediaEntry,
    MessageEntry,
    SentFileEntry,
    UserEntry,
    UserSettingsEntry,
    photoInfo,
} from './entities.js';
export type { EncryptedChatColumns, MessageColumns } from './entities.js';
export { dumpTables, renderDecoded } from './dump.js';
export type { CacheTables } from './dump.js';
export {
    TIMELINE_COLUMNS,
    buildTimeline,
    decodeMarkers,
    messageMedia,
    renderTimeline,
    sortTimeline,
    toRowString,
} from './timeline.js';
export type { TimelineRow, TimelineTables } from './timeline.js';
export { escapeCsv, toDate, dictToString } from './fields.js';
