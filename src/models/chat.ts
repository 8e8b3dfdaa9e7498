import { z } from 'zod';

// Unknown fields are carried through untouched so a backup never drops data
// written by a newer client.
export const ConversationSchema = z
    .object({
        id: z.string()
    })
    .passthrough();

export const ChatMessageSchema = z
    .object({
        id: z.string(),
        conversationId: z.string(),
        role: z.string()
    })
    .passthrough();

export const ToolEventSchema = z.record(z.string(), z.unknown());

export const CHATS_ARCHIVE_VERSION = 1;

/** Layout of chats.json inside a backup archive. */
export const ChatsArchiveSchema = z.object({
    version: z.number().int().default(CHATS_ARCHIVE_VERSION),
    conversations: z.array(ConversationSchema).default([]),
    messages: z.array(ChatMessageSchema).default([]),
    toolEvents: z.record(z.string(), z.array(ToolEventSchema)).default({}),
    geminiThoughtSigs: z.record(z.string(), z.string()).default({})
});

export type Conversation = z.infer<typeof ConversationSchema>;
export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type ToolEvent = z.infer<typeof ToolEventSchema>;
export type ChatsArchive = z.infer<typeof ChatsArchiveSchema>;
