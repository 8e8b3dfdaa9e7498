import { ChatService } from '../../../infrastructure/repositories/interfaces';
import { ChatMessage, ChatsArchive, ChatsArchiveSchema } from '../../../models/chat';
import { logger } from '../../../utils/logger';
import { ArchiveCorruptError, errorMessage } from '../errors';

export interface ChatRestoreResult {
    conversationsRestored: number;
    messagesAdded: number;
    warnings: string[];
}

export function parseChatsArchive(content: string): ChatsArchive {
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (err) {
        throw new ArchiveCorruptError(`chats.json: ${errorMessage(err)}`);
    }
    const result = ChatsArchiveSchema.safeParse(raw);
    if (!result.success) {
        const detail = result.error.issues.map(iss => `${iss.path.join('.')}: ${iss.message}`).join('; ');
        throw new ArchiveCorruptError(`chats.json: ${detail}`);
    }
    return result.data;
}

/**
 * Group messages by conversation, keeping the first occurrence of each id and
 * skipping ids in `exclude`.
 */
function groupMessages(messages: ChatMessage[], exclude: ReadonlySet<string>): Map<string, ChatMessage[]> {
    const seen = new Set<string>();
    const byConversation = new Map<string, ChatMessage[]>();
    for (const message of messages) {
        if (exclude.has(message.id) || seen.has(message.id)) continue;
        seen.add(message.id);
        const group = byConversation.get(message.conversationId);
        if (group) {
            group.push(message);
        } else {
            byConversation.set(message.conversationId, [message]);
        }
    }
    return byConversation;
}

/**
 * Attach tool events and thought signatures to messages that exist locally.
 * With `onlyWhenMissing`, values already present are left alone.
 */
async function applyMessageExtras(
    chats: ChatService,
    archive: ChatsArchive,
    messageIds: ReadonlySet<string>,
    onlyWhenMissing: boolean,
    warnings: string[]
): Promise<void> {
    for (const [messageId, events] of Object.entries(archive.toolEvents)) {
        if (!messageIds.has(messageId) || events.length === 0) continue;
        try {
            if (onlyWhenMissing && (await chats.getToolEvents(messageId)).length > 0) continue;
            await chats.setToolEvents(messageId, events);
        } catch (err) {
            warnings.push(`tool events for ${messageId}: ${errorMessage(err)}`);
        }
    }

    for (const [messageId, signature] of Object.entries(archive.geminiThoughtSigs)) {
        if (!messageIds.has(messageId) || !signature) continue;
        try {
            if (onlyWhenMissing && (await chats.getGeminiThoughtSignature(messageId)) !== null) continue;
            await chats.setGeminiThoughtSignature(messageId, signature);
        } catch (err) {
            warnings.push(`thought signature for ${messageId}: ${errorMessage(err)}`);
        }
    }
}

/** Replace all local chat state with the archive's. */
export async function overwriteChats(chats: ChatService, archive: ChatsArchive): Promise<ChatRestoreResult> {
    const result: ChatRestoreResult = { conversationsRestored: 0, messagesAdded: 0, warnings: [] };
    await chats.clearAllData();

    const byConversation = groupMessages(archive.messages, new Set());
    const restoredConversations = new Set<string>();
    const restoredMessages = new Set<string>();

    for (const conversation of archive.conversations) {
        if (restoredConversations.has(conversation.id)) continue;
        const messages = byConversation.get(conversation.id) ?? [];
        await chats.restoreConversation(conversation, messages);
        restoredConversations.add(conversation.id);
        for (const message of messages) restoredMessages.add(message.id);
        result.conversationsRestored++;
        result.messagesAdded += messages.length;
    }

    await applyMessageExtras(chats, archive, restoredMessages, false, result.warnings);
    return result;
}

/**
 * Add conversations and messages the device does not have yet. Message ids are
 * global: a message already stored under any conversation is not added again.
 */
export async function mergeChats(chats: ChatService, archive: ChatsArchive): Promise<ChatRestoreResult> {
    const result: ChatRestoreResult = { conversationsRestored: 0, messagesAdded: 0, warnings: [] };

    const conversationIds = new Set<string>();
    const messageIds = new Set<string>();
    for (const conversation of await chats.getAllConversations()) {
        conversationIds.add(conversation.id);
        for (const message of await chats.getMessages(conversation.id)) {
            messageIds.add(message.id);
        }
    }

    const byConversation = groupMessages(archive.messages, messageIds);

    for (const conversation of archive.conversations) {
        const incoming = byConversation.get(conversation.id) ?? [];
        // A conversation listed twice gets its messages once
        byConversation.delete(conversation.id);

        if (!conversationIds.has(conversation.id)) {
            await chats.restoreConversation(conversation, incoming);
            conversationIds.add(conversation.id);
            result.conversationsRestored++;
        } else {
            for (const message of incoming) {
                await chats.addMessageDirectly(conversation.id, message);
            }
        }
        for (const message of incoming) messageIds.add(message.id);
        result.messagesAdded += incoming.length;
    }

    if (byConversation.size > 0) {
        logger.warn(`[ChatMerger] Dropped messages of ${byConversation.size} conversation(s) missing from the archive`);
    }

    await applyMessageExtras(chats, archive, messageIds, true, result.warnings);
    return result;
}
