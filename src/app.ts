/**
 * Assistant
 * Facade over research and answering, consumed by the chat transport and the file browser
 */

import type { Config } from "./core/config.js";
import { getConfig } from "./core/config.js";
import { logger } from "./core/logger.js";
import { NotFoundError } from "./core/errors.js";
import { ClaudeAgentRunner } from "./core/agent-runner.js";
import { FetchHttpClient, type HttpClient } from "./core/http.js";
import type {
  Classifier,
  Embedder,
  Generator,
  ReferenceLookup,
  TranscriptFetcher,
  VideoSearcher,
  WebSearcher,
} from "./capabilities/types.js";
import { ClaudeClassifier, ClaudeGenerator, ClaudeWebSearcher } from "./capabilities/claude.js";
import { OpenAIEmbedder } from "./capabilities/openai-embedder.js";
import { TimedTextTranscriptFetcher, YouTubeApiSearcher } from "./capabilities/youtube.js";
import { BggXmlLookup } from "./capabilities/bgg.js";
import type { Entity, EntityStatus } from "./schemas/entity.js";
import type { SourceRecord } from "./schemas/source.js";
import type { ChatContext } from "./schemas/conversation.js";
import type { EntityStore } from "./store/types.js";
import { SupabaseEntityStore } from "./store/supabase-store.js";
import { getSupabase } from "./store/supabase.js";
import { listArtifacts, resolveArtifactPath, type ArtifactInfo } from "./store/files.js";
import { VectorIndex } from "./ingest/vector-index.js";
import { DocumentIngestor } from "./ingest/ingestor.js";
import { SourceSaver } from "./ingest/saver.js";
import { EntityResolver } from "./resolver/entity-resolver.js";
import {
  ResearchOrchestrator,
  type ResearchOptions,
  type ResearchResult,
} from "./pipeline/research-pipeline.js";
import { AnswerComposer, type AnswerResult } from "./answer/answer-composer.js";

/**
 * Everything the assistant talks to
 */
export interface AssistantDeps {
  store: EntityStore;
  http: HttpClient;
  classifier: Classifier;
  generator: Generator;
  embedder: Embedder;
  searcher: WebSearcher;
  lookup: ReferenceLookup;
  videos?: VideoSearcher;
  transcripts: TranscriptFetcher;
}

export type AssistantSettings = Pick<Config, "research" | "index" | "answer"> & {
  dataDir: string;
  publicBaseUrl: string;
};

export class Assistant {
  readonly orchestrator: ResearchOrchestrator;
  readonly composer: AnswerComposer;
  readonly ingestor: DocumentIngestor;
  readonly index: VectorIndex;

  constructor(
    private readonly deps: AssistantDeps,
    private readonly settings: AssistantSettings
  ) {
    this.index = new VectorIndex(settings.dataDir, deps.embedder, settings.index.embedBatchSize);
    this.ingestor = new DocumentIngestor(deps.store, this.index, settings.index);

    const saver = new SourceSaver({
      store: deps.store,
      http: deps.http,
      transcripts: deps.transcripts,
      dataDir: settings.dataDir,
    });

    this.orchestrator = new ResearchOrchestrator(
      {
        store: deps.store,
        classifier: deps.classifier,
        searcher: deps.searcher,
        lookup: deps.lookup,
        videos: deps.videos,
        http: deps.http,
        saver,
        ingestor: this.ingestor,
      },
      { limits: settings.research, dataDir: settings.dataDir }
    );

    const resolver = new EntityResolver(
      { store: deps.store, classifier: deps.classifier },
      { fuzzyThreshold: settings.answer.fuzzyThreshold }
    );

    this.composer = new AnswerComposer(
      { store: deps.store, resolver, index: this.index, generator: deps.generator },
      { limits: settings.answer, topK: settings.index.topK, publicBaseUrl: settings.publicBaseUrl }
    );
  }

  resolveAndAnswer(text: string, chat: ChatContext): Promise<AnswerResult> {
    return this.composer.answer(text, chat);
  }

  startResearch(entityName: string, options: ResearchOptions = {}): Promise<ResearchResult> {
    return this.orchestrator.research(entityName, options);
  }

  listEntities(status?: EntityStatus): Promise<Entity[]> {
    return this.deps.store.listEntities(status ? { status } : undefined);
  }

  async getEntity(id: number): Promise<Entity> {
    const entity = await this.deps.store.getEntity(id);
    if (!entity) {
      throw new NotFoundError(`entity ${id}`);
    }
    return entity;
  }

  async listSources(entityId: number): Promise<SourceRecord[]> {
    await this.getEntity(entityId);
    return this.deps.store.listSources(entityId);
  }

  listArtifacts(entityId: number): Promise<ArtifactInfo[]> {
    return listArtifacts(this.settings.dataDir, entityId);
  }

  /**
   * Path of (entityId, filename) under the entity directory; rejects traversal
   */
  resolveArtifactPath(entityId: number, filename: string): Promise<string> {
    return resolveArtifactPath(this.settings.dataDir, entityId, filename);
  }
}

/**
 * Production wiring from configuration
 */
export function createAssistant(config: Config = getConfig()): Assistant {
  logger.configure({ level: config.defaults.logLevel, format: config.defaults.logFormat });

  const runner = new ClaudeAgentRunner({ profiles: config.profiles });
  const http = new FetchHttpClient({ userAgent: config.http.userAgent, timeoutMs: config.http.timeoutMs });

  let videos: VideoSearcher | undefined;
  if (config.youtube.apiKey) {
    videos = new YouTubeApiSearcher(config.youtube.apiKey, http);
  } else {
    logger.warn("YOUTUBE_API_KEY not set; tutorial videos come from web search only");
  }

  const deps: AssistantDeps = {
    store: new SupabaseEntityStore(getSupabase(), config.defaults.dataDir),
    http,
    classifier: new ClaudeClassifier(runner),
    generator: new ClaudeGenerator(runner),
    embedder: new OpenAIEmbedder({
      apiKey: config.openai.apiKey,
      model: config.openai.embeddingModel,
    }),
    searcher: new ClaudeWebSearcher(runner),
    lookup: new BggXmlLookup(http, config.bgg.apiToken),
    videos,
    transcripts: new TimedTextTranscriptFetcher(http),
  };

  return new Assistant(deps, {
    research: config.research,
    index: config.index,
    answer: config.answer,
    dataDir: config.defaults.dataDir,
    publicBaseUrl: config.defaults.publicBaseUrl,
  });
}

export type { AnswerResult, ResearchResult, ResearchOptions, ArtifactInfo };
export * from "./schemas/index.js";
