/**
 * Vector Index
 * Per-entity flat cosine index persisted as JSON (<dataDir>/indexes/<id>/index.json).
 * Rebuilt wholesale; vectors are stored L2-normalized so cosine is a dot product.
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { Embedder } from "../capabilities/types.js";
import { SourceError, StoreError } from "../core/errors.js";
import { indexDir, isMissing } from "../store/files.js";

const IndexedChunkSchema = z.object({
  ordinal: z.number().int().nonnegative(),
  sourceId: z.number().int(),
  sourceTitle: z.string().nullable(),
  text: z.string(),
  overlapWithPrevious: z.number().int().nonnegative(),
  vector: z.array(z.number()),
});

const IndexFileSchema = z.object({
  entityId: z.number().int(),
  dimension: z.number().int().nonnegative(),
  chunks: z.array(IndexedChunkSchema),
});

export type IndexedChunk = z.infer<typeof IndexedChunkSchema>;
export type IndexFile = z.infer<typeof IndexFileSchema>;

/**
 * Chunk handed in for indexing, before it has a vector
 */
export interface ChunkInput {
  sourceId: number;
  sourceTitle: string | null;
  text: string;
  overlapWithPrevious: number;
}

export interface SearchHit {
  chunkText: string;
  sourceId: number;
  sourceTitle: string | null;
  ordinal: number;
  score: number;
}

export function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) return vector.map(() => 0);
  return vector.map((v) => v / norm);
}

export function dot(a: number[], b: number[]): number {
  let sum = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export class VectorIndex {
  constructor(
    private readonly dataDir: string,
    private readonly embedder: Embedder,
    private readonly batchSize: number
  ) {}

  indexPath(entityId: number): string {
    return path.join(indexDir(this.dataDir, entityId), "index.json");
  }

  /**
   * Replace the entity's index with the given chunks. Ordinals follow input order.
   */
  async build(entityId: number, inputs: ChunkInput[]): Promise<IndexFile> {
    const vectors: number[][] = [];

    for (let i = 0; i < inputs.length; i += this.batchSize) {
      const batch = inputs.slice(i, i + this.batchSize);
      const embedded = await this.embedder.embed(batch.map((c) => c.text));
      if (embedded.length !== batch.length) {
        throw new SourceError(
          `embedder returned ${embedded.length} vectors for ${batch.length} texts`,
          "embedder"
        );
      }
      vectors.push(...embedded);
    }

    const dimension = vectors.length > 0 ? vectors[0].length : 0;
    if (vectors.some((v) => v.length !== dimension)) {
      throw new SourceError("embedder returned vectors of mixed dimension", "embedder");
    }

    const index: IndexFile = {
      entityId,
      dimension,
      chunks: inputs.map((input, ordinal) => ({
        ordinal,
        sourceId: input.sourceId,
        sourceTitle: input.sourceTitle,
        text: input.text,
        overlapWithPrevious: input.overlapWithPrevious,
        vector: l2Normalize(vectors[ordinal]),
      })),
    };

    await this.write(entityId, index);
    return index;
  }

  /**
   * Top-k chunks by cosine similarity; ties go to the lower ordinal.
   * An entity without an index yields no hits.
   */
  async search(entityId: number, queryText: string, k: number): Promise<SearchHit[]> {
    const index = await this.load(entityId);
    if (!index || index.chunks.length === 0 || k <= 0) {
      return [];
    }

    const [queryVector] = await this.embedder.embed([queryText]);
    if (!queryVector) {
      throw new SourceError("embedder returned no query vector", "embedder");
    }
    const query = l2Normalize(queryVector);

    return index.chunks
      .map((chunk) => ({
        chunkText: chunk.text,
        sourceId: chunk.sourceId,
        sourceTitle: chunk.sourceTitle,
        ordinal: chunk.ordinal,
        score: dot(query, chunk.vector),
      }))
      .sort((a, b) => b.score - a.score || a.ordinal - b.ordinal)
      .slice(0, k);
  }

  async load(entityId: number): Promise<IndexFile | null> {
    let content: string;
    try {
      content = await fs.readFile(this.indexPath(entityId), "utf-8");
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }

    const parsed = IndexFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new StoreError("loadIndex", `index of entity ${entityId} is malformed`);
    }
    return parsed.data;
  }

  async remove(entityId: number): Promise<void> {
    await fs.rm(indexDir(this.dataDir, entityId), { recursive: true, force: true });
  }

  private async write(entityId: number, index: IndexFile): Promise<void> {
    const filePath = this.indexPath(entityId);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    // Atomic replace
    const tmpPath = `${filePath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(index), "utf-8");
    await fs.rename(tmpPath, filePath);
  }
}
