/**
 * In-memory Entity Store
 * Complete EntityStore kept in Maps, for local development and tests.
 * Data does not persist between restarts.
 */

import { InvalidStatusTransitionError, NotFoundError, StoreError } from "../core/errors.js";
import {
  canTransition,
  entityNameKey,
  normalizeEntityName,
  type Entity,
  type EntityStatus,
} from "../schemas/entity.js";
import type { NewSourceRecord, SourceRecord } from "../schemas/source.js";
import type { ConversationEntry, NewConversationEntry } from "../schemas/conversation.js";
import { entityDir } from "./files.js";
import type { EntityStore, EntityUpdate } from "./types.js";

export class MemoryEntityStore implements EntityStore {
  readonly entities = new Map<number, Entity>();
  readonly sources = new Map<number, SourceRecord>();
  readonly conversation: ConversationEntry[] = [];

  private nextEntityId = 1;
  private nextSourceId = 1;
  private nextEntryId = 1;

  constructor(private readonly dataDir = "./data") {}

  async createEntity(name: string): Promise<Entity> {
    const normalized = normalizeEntityName(name);
    if (await this.getEntityByName(normalized)) {
      throw new StoreError("createEntity", `entity "${normalized}" already exists`);
    }
    return this.seedEntity({ name: normalized });
  }

  /**
   * Insert an entity as-is, bypassing the lifecycle (test setup)
   */
  seedEntity(partial: Partial<Entity> & { name: string }): Entity {
    const id = partial.id ?? this.nextEntityId;
    this.nextEntityId = Math.max(this.nextEntityId, id + 1);

    const now = new Date().toISOString();
    const entity: Entity = {
      status: "created",
      storeDir: entityDir(this.dataDir, id),
      description: null,
      metadata: null,
      createdAt: now,
      updatedAt: now,
      lastResearchedAt: null,
      ...partial,
      id,
    };
    this.entities.set(id, entity);
    return entity;
  }

  async getEntity(id: number): Promise<Entity | null> {
    return this.entities.get(id) ?? null;
  }

  async getEntityByName(name: string): Promise<Entity | null> {
    const key = entityNameKey(name);
    for (const entity of this.entities.values()) {
      if (entityNameKey(entity.name) === key) return entity;
    }
    return null;
  }

  async listEntities(filter?: { status?: EntityStatus }): Promise<Entity[]> {
    return [...this.entities.values()]
      .filter((e) => !filter?.status || e.status === filter.status)
      .sort((a, b) => a.id - b.id);
  }

  async updateStatus(id: number, to: EntityStatus): Promise<Entity> {
    const entity = this.require(id);
    if (!canTransition(entity.status, to)) {
      throw new InvalidStatusTransitionError(id, entity.status, to);
    }
    return this.save({ ...entity, status: to });
  }

  async updateEntity(id: number, update: EntityUpdate): Promise<Entity> {
    const entity = this.require(id);
    return this.save({
      ...entity,
      description: update.description !== undefined ? update.description : entity.description,
      metadata: update.metadata !== undefined ? update.metadata : entity.metadata,
      lastResearchedAt: update.lastResearchedAt !== undefined ? update.lastResearchedAt : entity.lastResearchedAt,
    });
  }

  async addSource(record: NewSourceRecord): Promise<SourceRecord> {
    this.require(record.entityId);
    const saved: SourceRecord = { ...record, id: this.nextSourceId++, createdAt: new Date().toISOString() };
    this.sources.set(saved.id, saved);
    return saved;
  }

  async listSources(entityId: number): Promise<SourceRecord[]> {
    return [...this.sources.values()].filter((s) => s.entityId === entityId).sort((a, b) => a.id - b.id);
  }

  async clearSources(entityId: number): Promise<number> {
    let removed = 0;
    for (const [id, source] of this.sources) {
      if (source.entityId === entityId) {
        this.sources.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async appendConversation(entry: NewConversationEntry): Promise<ConversationEntry> {
    const saved: ConversationEntry = { ...entry, id: this.nextEntryId++, timestamp: new Date().toISOString() };
    this.conversation.push(saved);
    return saved;
  }

  async recentConversation(chatId: string, limit: number): Promise<ConversationEntry[]> {
    return this.conversation
      .filter((e) => e.chatId === chatId)
      .sort((a, b) => b.id - a.id)
      .slice(0, limit);
  }

  private require(id: number): Entity {
    const entity = this.entities.get(id);
    if (!entity) {
      throw new NotFoundError(`entity ${id}`);
    }
    return entity;
  }

  private save(entity: Entity): Entity {
    const saved = { ...entity, updatedAt: new Date().toISOString() };
    this.entities.set(saved.id, saved);
    return saved;
  }
}
