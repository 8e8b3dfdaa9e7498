import Database from 'better-sqlite3';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { resolveFileRoots } from '../../src/features/backup/app-directories';
import { walkFiles } from '../../src/features/backup/fs-utils';
import { FileRoots } from '../../src/features/backup/types';
import { createTables } from '../../src/infrastructure/database/db-connection';
import { SqliteChatService, SqliteSettingsStore, createRepositoryFactory } from '../../src/infrastructure/repositories';
import { ChatMessage, ChatsArchive, Conversation } from '../../src/models/chat';

/** One device: a private in-memory database plus data and temp directories. */
export interface TestDevice {
    root: string;
    db: Database.Database;
    settings: SqliteSettingsStore;
    chats: SqliteChatService;
    fileRoots: FileRoots;
    tempRoot: string;
}

export async function makeTempDir(prefix = 'sync-test-'): Promise<string> {
    return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function createTestDevice(): Promise<TestDevice> {
    const root = await makeTempDir();
    const db = new Database(':memory:');
    createTables(db);
    const { settings, chats } = createRepositoryFactory(db);
    const tempRoot = path.join(root, 'tmp');
    await fs.promises.mkdir(tempRoot, { recursive: true });
    return { root, db, settings, chats, fileRoots: resolveFileRoots(path.join(root, 'data')), tempRoot };
}

export async function disposeTestDevice(device: TestDevice): Promise<void> {
    device.db.close();
    await fs.promises.rm(device.root, { recursive: true, force: true });
}

/** Write `files` (posix relative path → text) under `root`. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
    for (const [rel, content] of Object.entries(files)) {
        const target = path.join(root, ...rel.split('/'));
        await fs.promises.mkdir(path.dirname(target), { recursive: true });
        await fs.promises.writeFile(target, content);
    }
}

export async function readTree(root: string): Promise<Record<string, string>> {
    const out: Record<string, string> = {};
    for (const rel of await walkFiles(root)) {
        out[rel] = await fs.promises.readFile(path.join(root, ...rel.split('/')), 'utf-8');
    }
    return out;
}

export function conversation(id: string, title = `Conversation ${id}`): Conversation {
    return { id, title };
}

export function message(id: string, conversationId: string, role = 'user', content = `text of ${id}`): ChatMessage {
    return { id, conversationId, role, content };
}

export function chatsArchive(parts: Partial<ChatsArchive>): ChatsArchive {
    return {
        version: 1,
        conversations: [],
        messages: [],
        toolEvents: {},
        geminiThoughtSigs: {},
        ...parts
    };
}

/** Conversation ids mapped to their message ids, in stored order. */
export async function chatLayout(chats: SqliteChatService): Promise<Record<string, string[]>> {
    const layout: Record<string, string[]> = {};
    for (const c of await chats.getAllConversations()) {
        layout[c.id] = (await chats.getMessages(c.id)).map(m => m.id);
    }
    return layout;
}
