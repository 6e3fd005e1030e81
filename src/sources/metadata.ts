/**
 * Reference page metadata
 * Fetches the reference page and extracts difficulty and player count from it.
 * Values come from the page only; an unreachable page yields no metadata at all.
 */

import type { HttpClient } from "../core/http.js";
import type { ChildLogger } from "../core/logger.js";
import { NetworkError, SourceError } from "../core/errors.js";
import type { Classifier } from "../capabilities/types.js";
import type { PlayerCount } from "../schemas/entity.js";
import { MetadataExtractionSchema, parsePlayerCount } from "../schemas/extraction.js";
import { getMetadataPrompt } from "../agents/prompts.js";
import { extractJsonLd, htmlToText } from "./html.js";

export interface ReferenceMetadata {
  difficulty: number | null;
  playerCount: PlayerCount | null;
  referenceUrl: string | null;
}

export const NO_REFERENCE_METADATA: ReferenceMetadata = {
  difficulty: null,
  playerCount: null,
  referenceUrl: null,
};

/**
 * Structured markup first, then visible text, capped at maxChars
 */
export function buildPageContent(html: string, maxChars: number): string {
  const jsonLd = extractJsonLd(html);
  const parts: string[] = [];
  if (jsonLd.length > 0) {
    parts.push(`Structured data:\n${jsonLd.join("\n")}`);
  }
  parts.push(`Page text:\n${htmlToText(html)}`);
  return parts.join("\n\n").slice(0, maxChars);
}

export async function fetchReferenceMetadata(
  gameName: string,
  referenceUrl: string | null,
  deps: { http: HttpClient; classifier: Classifier },
  options: { maxChars: number; correlationId?: string },
  log: ChildLogger
): Promise<ReferenceMetadata> {
  if (!referenceUrl) {
    log.info("No reference page; skipping metadata");
    return NO_REFERENCE_METADATA;
  }

  let html: string;
  try {
    const response = await deps.http.get(referenceUrl, { source: "reference-page" });
    html = response.text();
  } catch (error) {
    if (error instanceof SourceError || error instanceof NetworkError) {
      log.warn("Reference page unreachable; metadata omitted", {
        url: referenceUrl,
        error: error.message,
      });
      return NO_REFERENCE_METADATA;
    }
    throw error;
  }

  const extracted = await deps.classifier.classify({
    task: "metadata",
    prompt: getMetadataPrompt({ gameName, pageContent: buildPageContent(html, options.maxChars) }),
    schema: MetadataExtractionSchema,
    correlationId: options.correlationId,
  });

  return {
    difficulty: extracted.difficulty_score,
    playerCount: parsePlayerCount(extracted.player_count),
    referenceUrl,
  };
}
