/**
 * Database Connection Manager
 *
 * Opens the connection shared by one engine's settings store and chat
 * service. Each caller owns the handle it opens and closes it itself.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../../utils/logger';

const IN_MEMORY = ':memory:';

/**
 * Open the database at `dbPath` and create missing tables.
 */
export function openDatabase(dbPath: string): Database.Database {
    if (dbPath !== IN_MEMORY) {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const database = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
        database.pragma('journal_mode = WAL');
    }
    createTables(database);

    logger.info('[Database] Initialized at', dbPath);
    return database;
}

export function closeDatabase(database: Database.Database): void {
    if (database.open) {
        database.close();
        logger.info('[Database] Closed');
    }
}

/**
 * Create all database tables.
 * Message and conversation ids are unique across the whole database; `seq`
 * keeps insertion order.
 */
export function createTables(database: Database.Database): void {
    database.exec(`
        CREATE TABLE IF NOT EXISTS settings (
            key TEXT PRIMARY KEY,
            value TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS conversations (
            seq INTEGER PRIMARY KEY AUTOINCREMENT,
            id TEXT NOT NULL UNIQUE,
            data TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS messages (
            seq INTEGER PRIMARY KEY AUTOINCREMENT,
            id TEXT NOT NULL UNIQUE,
            conversation_id TEXT NOT NULL,
            data TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id, seq);

        CREATE TABLE IF NOT EXISTS tool_events (
            message_id TEXT PRIMARY KEY,
            events TEXT NOT NULL
        );

        CREATE TABLE IF NOT EXISTS thought_signatures (
            message_id TEXT PRIMARY KEY,
            signature TEXT NOT NULL
        );
    `);
}
