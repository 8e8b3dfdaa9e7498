import { SyncConfig, loadSyncConfig } from './config_manager';
import { resolveFileRoots } from './features/backup/app-directories';
import { BackupService } from './features/backup/backup-service';
import { closeDatabase, openDatabase } from './infrastructure/database/db-connection';
import { SqliteChatService, SqliteSettingsStore, createRepositoryFactory } from './infrastructure/repositories';
import { logger } from './utils/logger';

export interface SyncEngine {
    config: SyncConfig;
    service: BackupService;
    settings: SqliteSettingsStore;
    chats: SqliteChatService;
    close(): void;
}

/**
 * Open the database under the configured data directory and wire a
 * BackupService around it. Call `close()` when done.
 */
export function createSyncEngine(config: SyncConfig = loadSyncConfig()): SyncEngine {
    logger.setLevelByName(config.logLevel);

    const db = openDatabase(config.databasePath);
    const repositories = createRepositoryFactory(db);
    const fileRoots = resolveFileRoots(config.dataDir);

    const service = new BackupService({
        settings: repositories.settings,
        chats: repositories.chats,
        fileRoots,
        tempRoot: config.tempDir
    });

    logger.info(`[Bootstrap] Sync engine ready (data: ${config.dataDir})`);

    return {
        config,
        service,
        settings: repositories.settings,
        chats: repositories.chats,
        close: () => closeDatabase(db)
    };
}
