/**
 * Entity Schema
 * A researchable game and its lifecycle
 */

import { z } from "zod";

/**
 * Research lifecycle status
 */
export const EntityStatusSchema = z.enum(["created", "researching", "ready", "failed"]);
export type EntityStatus = z.infer<typeof EntityStatusSchema>;

/**
 * Player count range
 */
export const PlayerCountSchema = z.object({
  min: z.number().int().positive(),
  max: z.number().int().positive(),
});

/**
 * Tutorial video chosen for the game
 */
export const TutorialVideoSchema = z.object({
  url: z.string().url(),
  title: z.string(),
  channel: z.string().nullable(),
});

/**
 * Structured facts gathered during research
 */
export const EntityMetadataSchema = z.object({
  difficulty: z.number().min(1).max(5).nullable(),
  playerCount: PlayerCountSchema.nullable(),
  referenceUrl: z.string().url().nullable(),
  tutorialVideo: TutorialVideoSchema.nullable(),
});

export const EntitySchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  status: EntityStatusSchema,
  storeDir: z.string(),
  description: z.string().nullable(),
  metadata: EntityMetadataSchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  lastResearchedAt: z.string().nullable(),
});

export type PlayerCount = z.infer<typeof PlayerCountSchema>;
export type TutorialVideo = z.infer<typeof TutorialVideoSchema>;
export type EntityMetadata = z.infer<typeof EntityMetadataSchema>;
export type Entity = z.infer<typeof EntitySchema>;

export const EMPTY_METADATA: EntityMetadata = {
  difficulty: null,
  playerCount: null,
  referenceUrl: null,
  tutorialVideo: null,
};

// ============================================================
// STATUS TRANSITIONS
// ============================================================

const TRANSITIONS: Record<EntityStatus, EntityStatus[]> = {
  created: ["researching", "failed"],
  researching: ["ready", "failed"],
  // Explicit re-research starts a new run
  ready: ["researching"],
  failed: ["researching"],
};

/**
 * Whether an entity may move from one status to another
 */
export function canTransition(from: EntityStatus, to: EntityStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Canonical form of an entity name: trimmed, inner whitespace collapsed
 */
export function normalizeEntityName(name: string): string {
  return name.trim().replace(/\s+/g, " ");
}

/**
 * Key used for case-insensitive name matching
 */
export function entityNameKey(name: string): string {
  return normalizeEntityName(name).toLowerCase();
}
