/**
 * OpenAI Embedder
 */

import OpenAI from "openai";
import { SourceError } from "../core/errors.js";
import type { Embedder } from "./types.js";

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(
    options: { apiKey: string; model: string; timeoutMs?: number },
    client?: OpenAI
  ) {
    this.model = options.model;
    this.client = client ?? new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs ?? 60000 });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
      });

      return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw new SourceError(`Embedding request failed: ${error.message}`, "openai", {
          cause: error,
          statusCode: error.status,
        });
      }
      throw error;
    }
  }
}
