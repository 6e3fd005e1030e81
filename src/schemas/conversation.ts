/**
 * Conversation Schema
 * Append-only log of chat turns, tagged with the entity each turn is about
 */

import { z } from "zod";

export const ConversationRoleSchema = z.enum(["user", "assistant", "system"]);
export type ConversationRole = z.infer<typeof ConversationRoleSchema>;

export const ConversationEntrySchema = z.object({
  id: z.number().int().positive(),
  chatId: z.string(),
  role: ConversationRoleSchema,
  text: z.string(),
  entityId: z.number().int().positive().nullable(),
  timestamp: z.string(),
});

export type ConversationEntry = z.infer<typeof ConversationEntrySchema>;

export type NewConversationEntry = Omit<ConversationEntry, "id" | "timestamp">;

/**
 * Per-chat context handed in by the chat transport
 */
export interface ChatContext {
  chatId: string;
}
