/**
 * Source Record Schema
 * One discovered or downloaded document tied to an entity
 */

import { z } from "zod";

export const SourceTypeSchema = z.enum(["document", "webpage", "link", "video", "text", "other"]);
export type SourceType = z.infer<typeof SourceTypeSchema>;

export const SourceRecordSchema = z.object({
  id: z.number().int().positive(),
  entityId: z.number().int().positive(),
  sourceType: SourceTypeSchema,
  originUrl: z.string(),
  title: z.string().nullable(),
  /** Null means reference only, nothing downloaded */
  localPath: z.string().nullable(),
  createdAt: z.string(),
});

export type SourceRecord = z.infer<typeof SourceRecordSchema>;

export type NewSourceRecord = Omit<SourceRecord, "id" | "createdAt">;

/**
 * A source found during discovery, before it is saved
 */
export interface DiscoveredSource {
  url: string;
  title: string;
  sourceType: SourceType;
}

/**
 * Source types whose saved artifact is plain text usable for indexing
 */
export const TEXT_BEARING_TYPES: readonly SourceType[] = ["webpage", "video", "text"];
