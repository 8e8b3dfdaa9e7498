export { createSyncEngine } from './bootstrap';
export type { SyncEngine } from './bootstrap';
export {
    getConfigPath,
    loadSyncConfig,
    resolveSyncConfig,
    saveRawSyncConfig,
    validateSyncConfig
} from './config_manager';
export type { SyncConfig, SyncConfigFile } from './config_manager';

export { normalizeEntryPath, packArchive, unpackArchive } from './features/backup/archive/archive-codec';
export type { ArchiveEntry } from './features/backup/archive/archive-codec';
export { resolveFileRoots } from './features/backup/app-directories';
export { BackupService } from './features/backup/backup-service';
export type { BackupServiceDeps } from './features/backup/backup-service';
export * from './features/backup/errors';
export { mergeChats, overwriteChats, parseChatsArchive } from './features/backup/mergers/chat-merger';
export { restoreFileTree } from './features/backup/mergers/file-tree-merger';
export { SETTING_MERGE_STRATEGIES, mergeSettingValue } from './features/backup/mergers/setting-mergers';
export { RestorePlanner } from './features/backup/restore-planner';
export {
    DEFAULT_RESTORE_OPTIONS,
    createRestoreOptions,
    isFullOverwrite,
    resolveRestoreOptions,
    restoreOptionsFromMode
} from './features/backup/restore-options';
export { LOCAL_ONLY_SETTING_KEYS, PROVIDER_SETTING_KEYS } from './features/backup/settings-keys';
export { SnapshotBuilder } from './features/backup/snapshot/snapshot-builder';
export * from './features/backup/types';
export { buildBackupFileName, timestampFromBackupName } from './features/backup/webdav/backup-filename';
export {
    createWebDavConfig,
    webDavConfigFromJsonString,
    webDavConfigToJsonString
} from './features/backup/webdav/webdav-config';
export { WebDavTransport } from './features/backup/webdav/webdav-transport';

export { closeDatabase, createTables, openDatabase } from './infrastructure/database/db-connection';
export * from './infrastructure/repositories';
export * from './models/chat';
export { LogLevel, logger } from './utils/logger';
