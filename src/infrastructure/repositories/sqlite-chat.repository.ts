import Database from 'better-sqlite3';
import { z } from 'zod';
import {
    ChatMessage,
    ChatMessageSchema,
    Conversation,
    ConversationSchema,
    ToolEvent,
    ToolEventSchema
} from '../../models/chat';
import { logger } from '../../utils/logger';
import { ChatService } from './interfaces';

interface DataRow {
    id: string;
    data: string;
}

const ToolEventListSchema = z.array(ToolEventSchema);

function decodeRows<S extends z.ZodTypeAny>(table: string, rows: DataRow[], schema: S): z.infer<S>[] {
    const out: z.infer<S>[] = [];
    for (const row of rows) {
        try {
            const result = schema.safeParse(JSON.parse(row.data));
            if (result.success) {
                out.push(result.data);
            } else {
                logger.warn(`[ChatService] Skipping malformed ${table} row "${row.id}"`);
            }
        } catch (err) {
            logger.warn(`[ChatService] Skipping unreadable ${table} row "${row.id}":`, err);
        }
    }
    return out;
}

/**
 * Conversations and messages stored as JSON documents, with tool events and
 * thought signatures kept per message id.
 */
export class SqliteChatService implements ChatService {
    constructor(private db: Database.Database) { }

    private insertMessage(conversationId: string, message: ChatMessage): void {
        const stored: ChatMessage = { ...message, conversationId };
        this.db.prepare<[string, string, string]>(
            'INSERT INTO messages (id, conversation_id, data) VALUES (?, ?, ?)'
        ).run(message.id, conversationId, JSON.stringify(stored));
    }

    async getAllConversations(): Promise<Conversation[]> {
        const rows = this.db.prepare<[], DataRow>('SELECT id, data FROM conversations ORDER BY seq').all();
        return decodeRows('conversation', rows, ConversationSchema);
    }

    async getMessages(conversationId: string): Promise<ChatMessage[]> {
        const rows = this.db.prepare<[string], DataRow>(
            'SELECT id, data FROM messages WHERE conversation_id = ? ORDER BY seq'
        ).all(conversationId);
        return decodeRows('message', rows, ChatMessageSchema);
    }

    async getToolEvents(messageId: string): Promise<ToolEvent[]> {
        const row = this.db.prepare<[string], { events: string }>(
            'SELECT events FROM tool_events WHERE message_id = ?'
        ).get(messageId);
        if (!row) return [];
        try {
            const result = ToolEventListSchema.safeParse(JSON.parse(row.events));
            return result.success ? result.data : [];
        } catch (err) {
            logger.warn(`[ChatService] Unreadable tool events for "${messageId}":`, err);
            return [];
        }
    }

    async getGeminiThoughtSignature(messageId: string): Promise<string | null> {
        const row = this.db.prepare<[string], { signature: string }>(
            'SELECT signature FROM thought_signatures WHERE message_id = ?'
        ).get(messageId);
        return row?.signature ?? null;
    }

    async setToolEvents(messageId: string, events: ToolEvent[]): Promise<void> {
        this.db.prepare<[string, string]>(`
            INSERT INTO tool_events (message_id, events)
            VALUES (?, ?)
            ON CONFLICT(message_id) DO UPDATE SET events = excluded.events
        `).run(messageId, JSON.stringify(events));
    }

    async setGeminiThoughtSignature(messageId: string, signature: string): Promise<void> {
        this.db.prepare<[string, string]>(`
            INSERT INTO thought_signatures (message_id, signature)
            VALUES (?, ?)
            ON CONFLICT(message_id) DO UPDATE SET signature = excluded.signature
        `).run(messageId, signature);
    }

    async clearAllData(): Promise<void> {
        this.db.exec(`
            DELETE FROM thought_signatures;
            DELETE FROM tool_events;
            DELETE FROM messages;
            DELETE FROM conversations;
        `);
        logger.info('[ChatService] Cleared all chat data');
    }

    async restoreConversation(conversation: Conversation, messages: ChatMessage[]): Promise<void> {
        const insert = this.db.transaction(() => {
            this.db.prepare<[string, string]>(
                'INSERT INTO conversations (id, data) VALUES (?, ?)'
            ).run(conversation.id, JSON.stringify(conversation));
            for (const message of messages) {
                this.insertMessage(conversation.id, message);
            }
        });
        insert();
    }

    async addMessageDirectly(conversationId: string, message: ChatMessage): Promise<void> {
        this.insertMessage(conversationId, message);
    }
}
