/**
 * Repository Interfaces
 *
 * Storage contracts the backup engine depends on. The SQLite implementations
 * live next to this file; tests may substitute in-memory fakes.
 */

import type { ChatMessage, Conversation, ToolEvent } from '../../models/chat';
import type { SettingsMap } from '../../features/backup/types';

// =============================================================================
// Settings Store
// =============================================================================

export interface SettingsStore {
    /** Every shareable setting. Local-only keys are never included. */
    snapshot(): Promise<SettingsMap>;

    /**
     * Write every entry of `values` as {@link restoreSingle} would. Keys absent
     * from `values` keep their current value.
     */
    restoreAll(values: Record<string, unknown>): Promise<void>;

    /**
     * Write one setting. Lists keep only their string items; other values that
     * are not a boolean, number or string are ignored, as are local-only keys.
     */
    restoreSingle(key: string, value: unknown): Promise<void>;
}

// =============================================================================
// Chat Service
// =============================================================================

export interface ChatService {
    getAllConversations(): Promise<Conversation[]>;

    /** Messages of one conversation in insertion order. */
    getMessages(conversationId: string): Promise<ChatMessage[]>;

    getToolEvents(messageId: string): Promise<ToolEvent[]>;

    getGeminiThoughtSignature(messageId: string): Promise<string | null>;

    setToolEvents(messageId: string, events: ToolEvent[]): Promise<void>;

    setGeminiThoughtSignature(messageId: string, signature: string): Promise<void>;

    /** Drop every conversation, message, tool event and signature. */
    clearAllData(): Promise<void>;

    /** Insert a conversation together with its messages. */
    restoreConversation(conversation: Conversation, messages: ChatMessage[]): Promise<void>;

    /** Append a message to an existing conversation. */
    addMessageDirectly(conversationId: string, message: ChatMessage): Promise<void>;
}

// =============================================================================
// Repository Factory
// =============================================================================

export interface RepositoryFactory {
    settings: SettingsStore;
    chats: ChatService;
}
