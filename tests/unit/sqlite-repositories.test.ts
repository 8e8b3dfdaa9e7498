import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTables } from '../../src/infrastructure/database/db-connection';
import { SqliteChatService, SqliteSettingsStore } from '../../src/infrastructure/repositories';
import { conversation, message } from '../helpers/fixtures';

describe('SQLite repositories', () => {
    let db: Database.Database;

    beforeEach(() => {
        db = new Database(':memory:');
        createTables(db);
    });

    afterEach(() => {
        db.close();
    });

    describe('SqliteSettingsStore', () => {
        let store: SqliteSettingsStore;

        beforeEach(() => {
            store = new SqliteSettingsStore(db);
        });

        it('should keep value types through storage', () => {
            store.set('flag', true);
            store.set('count', 3.5);
            store.set('name', 'kelivo');
            store.set('list', ['a', 'b']);

            expect(store.getAll()).toEqual({ count: 3.5, flag: true, list: ['a', 'b'], name: 'kelivo' });
            expect(store.get('missing')).toBeNull();
        });

        it('should leave local-only keys out of the snapshot', async () => {
            store.set('window_width_v1', 1280);
            store.set('theme_mode', 'dark');

            expect(await store.snapshot()).toEqual({ theme_mode: 'dark' });
        });

        it('should refuse to restore local-only keys', async () => {
            store.set('window_maximized_v1', false);

            await store.restoreSingle('window_maximized_v1', true);
            await store.restoreAll({ window_maximized_v1: true, window_pos_x_v1: 10 });

            expect(store.get('window_maximized_v1')).toBe(false);
            expect(store.get('window_pos_x_v1')).toBeNull();
        });

        it('should coerce restored values and ignore unsupported shapes', async () => {
            await store.restoreSingle('list', ['a', 1, 'b', null]);
            await store.restoreSingle('object', { nested: true });
            await store.restoreSingle('nothing', null);

            expect(store.getAll()).toEqual({ list: ['a', 'b'] });
        });

        it('should keep keys that restoreAll does not mention', async () => {
            store.set('kept', 'yes');
            store.set('replaced', 'old');

            await store.restoreAll({ replaced: 'new', added: 1 });

            expect(store.getAll()).toEqual({ added: 1, kept: 'yes', replaced: 'new' });
        });
    });

    describe('SqliteChatService', () => {
        let chats: SqliteChatService;

        beforeEach(() => {
            chats = new SqliteChatService(db);
        });

        it('should return conversations and messages in insertion order', async () => {
            await chats.restoreConversation(conversation('c2'), [message('m2', 'c2'), message('m1', 'c2')]);
            await chats.restoreConversation(conversation('c1'), []);
            await chats.addMessageDirectly('c1', message('m3', 'other'));

            expect((await chats.getAllConversations()).map(c => c.id)).toEqual(['c2', 'c1']);
            expect((await chats.getMessages('c2')).map(m => m.id)).toEqual(['m2', 'm1']);
            expect(await chats.getMessages('c1')).toEqual([
                { id: 'm3', conversationId: 'c1', role: 'user', content: 'text of m3' }
            ]);
        });

        it('should keep extra conversation fields', async () => {
            await chats.restoreConversation({ id: 'c1', title: 'Trip', pinned: true }, []);

            expect(await chats.getAllConversations()).toEqual([{ id: 'c1', title: 'Trip', pinned: true }]);
        });

        it('should reject a message id that already exists', async () => {
            await chats.restoreConversation(conversation('c1'), [message('m1', 'c1')]);

            await expect(chats.addMessageDirectly('c1', message('m1', 'c1'))).rejects.toThrow();
        });

        it('should store tool events and thought signatures per message', async () => {
            expect(await chats.getToolEvents('m1')).toEqual([]);
            expect(await chats.getGeminiThoughtSignature('m1')).toBeNull();

            await chats.setToolEvents('m1', [{ tool: 'search', query: 'weather' }]);
            await chats.setGeminiThoughtSignature('m1', 'sig-1');

            expect(await chats.getToolEvents('m1')).toEqual([{ tool: 'search', query: 'weather' }]);
            expect(await chats.getGeminiThoughtSignature('m1')).toBe('sig-1');
        });

        it('should remove everything on clearAllData', async () => {
            await chats.restoreConversation(conversation('c1'), [message('m1', 'c1', 'assistant')]);
            await chats.setToolEvents('m1', [{ tool: 'x' }]);
            await chats.setGeminiThoughtSignature('m1', 'sig');

            await chats.clearAllData();

            expect(await chats.getAllConversations()).toEqual([]);
            expect(await chats.getMessages('c1')).toEqual([]);
            expect(await chats.getToolEvents('m1')).toEqual([]);
            expect(await chats.getGeminiThoughtSignature('m1')).toBeNull();
        });
    });
});
