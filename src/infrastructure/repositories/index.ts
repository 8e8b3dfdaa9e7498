/**
 * Repository Module Exports
 */

// Interfaces
export * from './interfaces';

// SQLite Implementations
export { SqliteChatService } from './sqlite-chat.repository';
export { SqliteSettingsStore } from './sqlite-settings.repository';

// Factory
export { createRepositoryFactory } from './repository-factory';
export type { SqliteRepositories } from './repository-factory';
