/**
 * Document Ingestor
 * Rebuilds an entity's vector index from the text artifacts of its source records
 */

import fs from "fs/promises";
import path from "path";
import type { IndexLimits } from "../core/config.js";
import { logger } from "../core/logger.js";
import type { SourceRecord } from "../schemas/source.js";
import type { EntityStore } from "../store/types.js";
import { isMissing, withExtension } from "../store/files.js";
import { chunkWords } from "./chunker.js";
import type { ChunkInput, VectorIndex } from "./vector-index.js";

export interface IngestSummary {
  entityId: number;
  /** Text-bearing sources that contributed chunks */
  documents: number;
  chunks: number;
}

/**
 * Path of the plain-text artifact of a record, or null when it has none
 */
export function textArtifactPath(record: SourceRecord): string | null {
  if (!record.localPath) return null;

  switch (record.sourceType) {
    case "webpage":
      return path.join(path.dirname(record.localPath), withExtension(path.basename(record.localPath), "txt"));
    case "video":
    case "text":
      return record.localPath;
    default:
      return null;
  }
}

export class DocumentIngestor {
  constructor(
    private readonly store: EntityStore,
    private readonly index: VectorIndex,
    private readonly limits: IndexLimits
  ) {}

  async ingest(entityId: number): Promise<IngestSummary> {
    const log = logger.child({ entityId, phase: "ingest" });
    const sources = await this.store.listSources(entityId);

    const inputs: ChunkInput[] = [];
    let documents = 0;

    for (const source of sources) {
      if (source.sourceType === "document" && source.localPath) {
        // PDF text extraction is not implemented
        log.debug("Skipping document without text extraction", { sourceId: source.id });
        continue;
      }

      const text = await this.readText(source);
      if (!text) continue;

      const chunks = chunkWords(text, this.limits.chunkWords, this.limits.chunkOverlap);
      if (chunks.length === 0) continue;

      documents++;
      for (const chunk of chunks) {
        inputs.push({
          sourceId: source.id,
          sourceTitle: source.title,
          text: chunk.text,
          overlapWithPrevious: chunk.overlapWithPrevious,
        });
      }
    }

    await this.index.build(entityId, inputs);

    log.info("Index rebuilt", { documents, chunks: inputs.length });
    log.metric("index_chunks", inputs.length);

    return { entityId, documents, chunks: inputs.length };
  }

  /**
   * Drop the entity's index ahead of a fresh research run
   */
  async reset(entityId: number): Promise<void> {
    await this.index.remove(entityId);
  }

  /**
   * Text of a record's artifact; a missing file is treated as empty
   */
  async readText(source: SourceRecord): Promise<string | null> {
    const textPath = textArtifactPath(source);
    if (!textPath) return null;

    try {
      return await fs.readFile(textPath, "utf-8");
    } catch (error) {
      if (isMissing(error)) {
        logger.warn("Text artifact missing", { sourceId: source.id, path: textPath });
        return null;
      }
      throw error;
    }
  }
}
