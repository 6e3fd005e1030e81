/**
 * Entity Store
 * Persistence contract for entities, source records and the conversation log.
 * The store owns entity status: every status change goes through updateStatus.
 */

import type { Entity, EntityMetadata, EntityStatus } from "../schemas/entity.js";
import type { NewSourceRecord, SourceRecord } from "../schemas/source.js";
import type { ConversationEntry, NewConversationEntry } from "../schemas/conversation.js";

export interface EntityUpdate {
  description?: string | null;
  metadata?: EntityMetadata | null;
  lastResearchedAt?: string | null;
}

export interface EntityStore {
  /** Create a new entity in status `created`; names are unique case-insensitively */
  createEntity(name: string): Promise<Entity>;
  getEntity(id: number): Promise<Entity | null>;
  /** Case- and whitespace-insensitive lookup */
  getEntityByName(name: string): Promise<Entity | null>;
  listEntities(filter?: { status?: EntityStatus }): Promise<Entity[]>;
  /** Reject disallowed transitions with InvalidStatusTransitionError */
  updateStatus(id: number, to: EntityStatus): Promise<Entity>;
  updateEntity(id: number, update: EntityUpdate): Promise<Entity>;

  addSource(record: NewSourceRecord): Promise<SourceRecord>;
  listSources(entityId: number): Promise<SourceRecord[]>;
  clearSources(entityId: number): Promise<number>;

  appendConversation(entry: NewConversationEntry): Promise<ConversationEntry>;
  /** Most recent entries of a chat, newest first */
  recentConversation(chatId: string, limit: number): Promise<ConversationEntry[]>;
}

// ============================================================
// ROW TYPES (database shape)
// ============================================================

export interface EntityRow {
  id: number;
  name: string;
  name_key: string;
  status: EntityStatus;
  description: string | null;
  metadata_json: EntityMetadata | null;
  created_at: string;
  updated_at: string;
  last_researched_at: string | null;
}

export interface SourceRow {
  id: number;
  entity_id: number;
  source_type: SourceRecord["sourceType"];
  origin_url: string;
  title: string | null;
  local_path: string | null;
  created_at: string;
}

export interface ConversationRow {
  id: number;
  chat_id: string;
  role: ConversationEntry["role"];
  text: string;
  entity_id: number | null;
  timestamp: string;
}
