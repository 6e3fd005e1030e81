/**
 * Entity Resolver
 * Works out which game a chat message is about.
 *
 * ORDER (first success wins):
 * 1. Candidate name from the message (structured extraction)
 * 2. Fuzzy match of the candidate against known names
 * 3. Most recent entity-tagged turn in the chat history
 * 4. A confidently named game that is not in the library ("mentioned")
 * 5. Unresolved
 *
 * The resolver never creates entities.
 */

import type { Classifier } from "../capabilities/types.js";
import { logger } from "../core/logger.js";
import type { Entity } from "../schemas/entity.js";
import type { ConversationEntry } from "../schemas/conversation.js";
import { GameNameExtractionSchema, type GameNameExtraction } from "../schemas/extraction.js";
import type { EntityStore } from "../store/types.js";
import { getGameNamePrompt } from "../agents/prompts.js";
import { bestNameMatch } from "./fuzzy.js";

export type Resolution =
  | { kind: "resolved"; entity: Entity; via: "mention" | "history" }
  | { kind: "mentioned"; name: string }
  | { kind: "unresolved" };

export class EntityResolver {
  constructor(
    private readonly deps: { store: EntityStore; classifier: Classifier },
    private readonly options: { fuzzyThreshold: number }
  ) {}

  async resolve(
    userText: string,
    knownEntityNames: string[],
    recentHistory: ConversationEntry[],
    correlationId?: string
  ): Promise<Resolution> {
    const log = logger.child({ correlationId, phase: "resolve" });

    const extraction = await this.extractCandidate(userText, knownEntityNames, correlationId);
    const candidate = extraction?.candidateName?.trim() || null;

    if (candidate && knownEntityNames.length > 0) {
      const match = bestNameMatch(candidate, knownEntityNames, this.options.fuzzyThreshold);
      if (match) {
        const entity = await this.deps.store.getEntityByName(match.name);
        if (entity) {
          log.debug("Resolved by mention", { candidate, match: match.name, score: match.score });
          return { kind: "resolved", entity, via: "mention" };
        }
      }
    }

    const newestFirst = [...recentHistory].sort((a, b) => b.id - a.id);
    for (const entry of newestFirst) {
      if (entry.entityId === null) continue;
      const entity = await this.deps.store.getEntity(entry.entityId);
      if (entity) {
        log.debug("Resolved from history", { entityId: entity.id, entryId: entry.id });
        return { kind: "resolved", entity, via: "history" };
      }
    }

    if (candidate && extraction?.confidence === "high") {
      log.debug("Game mentioned but not in library", { candidate });
      return { kind: "mentioned", name: candidate };
    }

    return { kind: "unresolved" };
  }

  /**
   * A failed extraction counts as "no candidate"
   */
  private async extractCandidate(
    userText: string,
    knownNames: string[],
    correlationId?: string
  ): Promise<GameNameExtraction | null> {
    try {
      return await this.deps.classifier.classify({
        task: "game-name",
        prompt: getGameNamePrompt({ userText, knownNames }),
        schema: GameNameExtractionSchema,
        correlationId,
      });
    } catch (error) {
      logger.warn("Game name extraction failed", {
        correlationId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
