/**
 * Capability Interfaces
 * External providers consumed by the pipelines. Each has one production
 * adapter in this directory and an in-process fake under src/testing.
 */

import type { ZodType, ZodTypeDef } from "zod";

// ============================================================
// LANGUAGE MODEL
// ============================================================

export interface ClassifyRequest<T> {
  /** Short task name for logs and errors */
  task: string;
  prompt: string;
  schema: ZodType<T, ZodTypeDef, unknown>;
  /** Allow the model to search the web while answering */
  webSearch?: boolean;
  correlationId?: string;
}

/**
 * Structured-output call; rejects with ExtractionError on an invalid response
 */
export interface Classifier {
  classify<T>(request: ClassifyRequest<T>): Promise<T>;
}

export interface WebCitation {
  title: string;
  url: string;
}

export interface GenerateRequest {
  prompt: string;
  /** Game the question is about, when known */
  subject?: string | null;
  /** Retrieved context, possibly empty */
  context: string;
  enableWebSearch: boolean;
  correlationId?: string;
}

export interface GenerateResult {
  text: string;
  webCitations: WebCitation[];
  usedWebSearch: boolean;
}

/**
 * Hybrid answer generation over provided context plus live web search
 */
export interface Generator {
  generate(request: GenerateRequest): Promise<GenerateResult>;
}

/**
 * Text embeddings; one vector per input, same order
 */
export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

// ============================================================
// SEARCH & PROVIDERS
// ============================================================

export interface WebSearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearcher {
  search(query: string, limit: number): Promise<WebSearchResult[]>;
}

export interface VideoCandidate {
  videoId: string;
  url: string;
  title: string;
  channel: string;
  viewCount: number;
  likeCount: number;
}

export interface VideoSearcher {
  /** Up to `perQuery` results for each query, statistics included */
  searchVideos(queries: string[], perQuery: number): Promise<VideoCandidate[]>;
  /** Existence check; false for removed, private or unreachable videos */
  validateVideo(url: string, timeoutMs: number): Promise<boolean>;
}

export interface TranscriptFetcher {
  /** Caption text, or null when the video has none */
  fetchTranscript(videoId: string): Promise<string | null>;
}

/**
 * Structured reference-site lookup. Resolves to the page URL or null when
 * there is no exact match; rejects with AuthRequiredError when credentials are needed.
 */
export interface ReferenceLookup {
  lookupExact(name: string): Promise<string | null>;
}
