/**
 * Extraction Schemas
 * Shapes of the structured responses returned by classification calls.
 * Every response is validated at the boundary; a mismatch is an ExtractionError.
 */

import { z } from "zod";
import type { PlayerCount } from "./entity.js";

/**
 * Game name mentioned in a chat message
 */
export const GameNameExtractionSchema = z.object({
  candidateName: z.string().nullable(),
  confidence: z.enum(["high", "medium", "low"]),
});

/**
 * Facts read off the reference page
 */
export const MetadataExtractionSchema = z.object({
  difficulty_score: z.number().min(1).max(5).nullable(),
  player_count: z.string().nullable(),
});

/**
 * Category assigned by the discovery agent
 */
export const DiscoveredTypeSchema = z.enum([
  "rulebook",
  "publisher",
  "bgg",
  "wiki",
  "guide",
  "video",
  "other",
]);

export const WebSourcesSchema = z.object({
  topic: z.string().optional(),
  sources: z.array(
    z.object({
      title: z.string().default(""),
      url: z.string(),
      type: DiscoveredTypeSchema.catch("other"),
      notes: z.string().optional(),
    })
  ),
});

export const DescriptionSchema = z.object({
  description: z.string().min(1),
});

export const SearchResultsSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(""),
      url: z.string(),
      snippet: z.string().default(""),
    })
  ),
});

export const GeneratedAnswerSchema = z.object({
  answer: z.string().min(1),
  citations: z
    .array(
      z.object({
        title: z.string().default(""),
        url: z.string(),
      })
    )
    .default([]),
});

export type GameNameExtraction = z.infer<typeof GameNameExtractionSchema>;
export type MetadataExtraction = z.infer<typeof MetadataExtractionSchema>;
export type DiscoveredType = z.infer<typeof DiscoveredTypeSchema>;
export type WebSources = z.infer<typeof WebSourcesSchema>;
export type Description = z.infer<typeof DescriptionSchema>;
export type SearchResults = z.infer<typeof SearchResultsSchema>;
export type GeneratedAnswer = z.infer<typeof GeneratedAnswerSchema>;

/**
 * Parse a player count like "2-4", "1 – 5" or "4" into a range
 */
export function parsePlayerCount(value: string | null): PlayerCount | null {
  if (!value) return null;

  const match = value.match(/(\d+)\s*(?:[-–—]|to)\s*(\d+)/i);
  if (match) {
    const min = Number(match[1]);
    const max = Number(match[2]);
    if (min > 0 && max >= min) {
      return { min, max };
    }
    return null;
  }

  const single = value.match(/\d+/);
  if (single) {
    const n = Number(single[0]);
    return n > 0 ? { min: n, max: n } : null;
  }

  return null;
}
