/**
 * Repository Factory
 *
 * Creates the stores used by the backup engine on top of one database
 * connection.
 */

import type Database from 'better-sqlite3';
import type { RepositoryFactory } from './interfaces';
import { SqliteChatService } from './sqlite-chat.repository';
import { SqliteSettingsStore } from './sqlite-settings.repository';

export interface SqliteRepositories extends RepositoryFactory {
    settings: SqliteSettingsStore;
    chats: SqliteChatService;
}

export function createRepositoryFactory(db: Database.Database): SqliteRepositories {
    return {
        settings: new SqliteSettingsStore(db),
        chats: new SqliteChatService(db)
    };
}
