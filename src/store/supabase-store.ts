/**
 * Supabase Entity Store
 * EntityStore over the entities, sources and conversation tables (db/schema.sql)
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import {
  canTransition,
  entityNameKey,
  normalizeEntityName,
  type Entity,
  type EntityStatus,
} from "../schemas/entity.js";
import type { NewSourceRecord, SourceRecord } from "../schemas/source.js";
import type { ConversationEntry, NewConversationEntry } from "../schemas/conversation.js";
import { InvalidStatusTransitionError, NotFoundError, StoreError } from "../core/errors.js";
import { entityDir } from "./files.js";
import type {
  ConversationRow,
  EntityRow,
  EntityStore,
  EntityUpdate,
  SourceRow,
} from "./types.js";

// ============================================================
// ROW MAPPING
// ============================================================

/**
 * The store directory is not persisted; it follows from the id
 */
export function toEntity(row: EntityRow, dataDir: string): Entity {
  return {
    id: row.id,
    name: row.name,
    status: row.status,
    storeDir: entityDir(dataDir, row.id),
    description: row.description,
    metadata: row.metadata_json,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastResearchedAt: row.last_researched_at,
  };
}

function toSource(row: SourceRow): SourceRecord {
  return {
    id: row.id,
    entityId: row.entity_id,
    sourceType: row.source_type,
    originUrl: row.origin_url,
    title: row.title,
    localPath: row.local_path,
    createdAt: row.created_at,
  };
}

function toConversation(row: ConversationRow): ConversationEntry {
  return {
    id: row.id,
    chatId: row.chat_id,
    role: row.role,
    text: row.text,
    entityId: row.entity_id,
    timestamp: row.timestamp,
  };
}

const UNIQUE_VIOLATION = "23505";

export class SupabaseEntityStore implements EntityStore {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly dataDir: string
  ) {}

  // ============================================================
  // ENTITIES
  // ============================================================

  async createEntity(name: string): Promise<Entity> {
    const normalized = normalizeEntityName(name);
    const now = new Date().toISOString();

    const { data, error } = await this.supabase
      .from("entities")
      .insert({
        name: normalized,
        name_key: entityNameKey(normalized),
        status: "created",
        created_at: now,
        updated_at: now,
      })
      .select()
      .single<EntityRow>();

    if (error) {
      const reason = error.code === UNIQUE_VIOLATION ? `entity "${normalized}" already exists` : error.message;
      throw new StoreError("createEntity", reason);
    }

    return toEntity(data, this.dataDir);
  }

  async getEntity(id: number): Promise<Entity | null> {
    const { data, error } = await this.supabase
      .from("entities")
      .select()
      .eq("id", id)
      .maybeSingle<EntityRow>();

    if (error) {
      throw new StoreError("getEntity", error.message);
    }

    return data ? toEntity(data, this.dataDir) : null;
  }

  async getEntityByName(name: string): Promise<Entity | null> {
    const { data, error } = await this.supabase
      .from("entities")
      .select()
      .eq("name_key", entityNameKey(name))
      .maybeSingle<EntityRow>();

    if (error) {
      throw new StoreError("getEntityByName", error.message);
    }

    return data ? toEntity(data, this.dataDir) : null;
  }

  async listEntities(filter?: { status?: EntityStatus }): Promise<Entity[]> {
    let query = this.supabase.from("entities").select().order("name", { ascending: true });

    if (filter?.status) {
      query = query.eq("status", filter.status);
    }

    const { data, error } = await query.returns<EntityRow[]>();

    if (error) {
      throw new StoreError("listEntities", error.message);
    }

    return (data ?? []).map((row) => toEntity(row, this.dataDir));
  }

  async updateStatus(id: number, to: EntityStatus): Promise<Entity> {
    const current = await this.getEntity(id);
    if (!current) {
      throw new NotFoundError(`entity ${id}`);
    }
    if (!canTransition(current.status, to)) {
      throw new InvalidStatusTransitionError(id, current.status, to);
    }

    // Compare-and-set on the status we validated against
    const { data, error } = await this.supabase
      .from("entities")
      .update({ status: to, updated_at: new Date().toISOString() })
      .eq("id", id)
      .eq("status", current.status)
      .select()
      .maybeSingle<EntityRow>();

    if (error) {
      throw new StoreError("updateStatus", error.message);
    }
    if (!data) {
      throw new StoreError("updateStatus", `entity ${id} changed status concurrently`);
    }

    return toEntity(data, this.dataDir);
  }

  async updateEntity(id: number, update: EntityUpdate): Promise<Entity> {
    const patch: Record<string, unknown> = { updated_at: new Date().toISOString() };
    if (update.description !== undefined) patch.description = update.description;
    if (update.metadata !== undefined) patch.metadata_json = update.metadata;
    if (update.lastResearchedAt !== undefined) patch.last_researched_at = update.lastResearchedAt;

    const { data, error } = await this.supabase
      .from("entities")
      .update(patch)
      .eq("id", id)
      .select()
      .maybeSingle<EntityRow>();

    if (error) {
      throw new StoreError("updateEntity", error.message);
    }
    if (!data) {
      throw new NotFoundError(`entity ${id}`);
    }

    return toEntity(data, this.dataDir);
  }

  // ============================================================
  // SOURCES
  // ============================================================

  async addSource(record: NewSourceRecord): Promise<SourceRecord> {
    const { data, error } = await this.supabase
      .from("sources")
      .insert({
        entity_id: record.entityId,
        source_type: record.sourceType,
        origin_url: record.originUrl,
        title: record.title,
        local_path: record.localPath,
      })
      .select()
      .single<SourceRow>();

    if (error) {
      throw new StoreError("addSource", error.message);
    }

    return toSource(data);
  }

  async listSources(entityId: number): Promise<SourceRecord[]> {
    const { data, error } = await this.supabase
      .from("sources")
      .select()
      .eq("entity_id", entityId)
      .order("id", { ascending: true })
      .returns<SourceRow[]>();

    if (error) {
      throw new StoreError("listSources", error.message);
    }

    return (data ?? []).map(toSource);
  }

  async clearSources(entityId: number): Promise<number> {
    const { data, error } = await this.supabase
      .from("sources")
      .delete()
      .eq("entity_id", entityId)
      .select("id");

    if (error) {
      throw new StoreError("clearSources", error.message);
    }

    return data?.length ?? 0;
  }

  // ============================================================
  // CONVERSATION
  // ============================================================

  async appendConversation(entry: NewConversationEntry): Promise<ConversationEntry> {
    const { data, error } = await this.supabase
      .from("conversation")
      .insert({
        chat_id: entry.chatId,
        role: entry.role,
        text: entry.text,
        entity_id: entry.entityId,
      })
      .select()
      .single<ConversationRow>();

    if (error) {
      throw new StoreError("appendConversation", error.message);
    }

    return toConversation(data);
  }

  async recentConversation(chatId: string, limit: number): Promise<ConversationEntry[]> {
    const { data, error } = await this.supabase
      .from("conversation")
      .select()
      .eq("chat_id", chatId)
      .order("id", { ascending: false })
      .limit(limit)
      .returns<ConversationRow[]>();

    if (error) {
      throw new StoreError("recentConversation", error.message);
    }

    return (data ?? []).map(toConversation);
  }
}
