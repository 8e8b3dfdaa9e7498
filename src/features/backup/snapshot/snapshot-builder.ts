import path from 'path';
import { ChatService, SettingsStore } from '../../../infrastructure/repositories/interfaces';
import { CHATS_ARCHIVE_VERSION, ChatsArchive } from '../../../models/chat';
import { logger } from '../../../utils/logger';
import { ArchiveEntry } from '../archive/archive-codec';
import { walkFiles } from '../fs-utils';
import { isLocalOnlyKey } from '../settings-keys';
import { FILE_TREES, FileRoots, SettingsMap, WebDavConfig } from '../types';

export const SETTINGS_ENTRY = 'settings.json';
export const CHATS_ENTRY = 'chats.json';

export interface SnapshotSources {
    settings: SettingsStore;
    chats: ChatService;
    fileRoots: FileRoots;
}

/**
 * Reads the current local state and turns it into archive entries.
 */
export class SnapshotBuilder {
    constructor(private readonly sources: SnapshotSources) { }

    async buildSettingsBlob(): Promise<string> {
        const all = await this.sources.settings.snapshot();
        const shared: SettingsMap = {};
        for (const [key, value] of Object.entries(all)) {
            if (!isLocalOnlyKey(key)) shared[key] = value;
        }
        return JSON.stringify(shared);
    }

    async buildChatsBlob(): Promise<string> {
        const { chats } = this.sources;
        const archive: ChatsArchive = {
            version: CHATS_ARCHIVE_VERSION,
            conversations: [],
            messages: [],
            toolEvents: {},
            geminiThoughtSigs: {}
        };

        for (const conversation of await chats.getAllConversations()) {
            archive.conversations.push(conversation);
            for (const message of await chats.getMessages(conversation.id)) {
                archive.messages.push(message);
                if (message.role !== 'assistant') continue;

                const events = await chats.getToolEvents(message.id);
                if (events.length > 0) archive.toolEvents[message.id] = events;

                const signature = await chats.getGeminiThoughtSignature(message.id);
                if (signature) archive.geminiThoughtSigs[message.id] = signature;
            }
        }

        return JSON.stringify(archive);
    }

    /** One `file` entry per regular file, prefixed with its tree name. */
    async buildFileTrees(): Promise<ArchiveEntry[]> {
        const entries: ArchiveEntry[] = [];
        for (const tree of FILE_TREES) {
            const root = this.sources.fileRoots[tree];
            for (const rel of await walkFiles(root)) {
                entries.push({
                    kind: 'file',
                    path: `${tree}/${rel}`,
                    sourcePath: path.join(root, ...rel.split('/'))
                });
            }
        }
        return entries;
    }

    async buildArchiveEntries(cfg: WebDavConfig): Promise<ArchiveEntry[]> {
        const entries: ArchiveEntry[] = [
            { kind: 'bytes', path: SETTINGS_ENTRY, data: await this.buildSettingsBlob() }
        ];
        if (cfg.includeChats) {
            entries.push({ kind: 'bytes', path: CHATS_ENTRY, data: await this.buildChatsBlob() });
        }
        if (cfg.includeFiles) {
            const files = await this.buildFileTrees();
            logger.debug(`[SnapshotBuilder] ${files.length} files to archive`);
            entries.push(...files);
        }
        return entries;
    }
}
