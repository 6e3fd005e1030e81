/**
 * Research Pipeline - Main Orchestrator
 * Builds the knowledge base for one game and drives its status lifecycle
 *
 * PIPELINE PHASES:
 * ================
 * Phase 1: ENTITY
 *   - Get or create the entity by name (case-insensitive)
 *   - Already ready and not forced → return stored state
 *   - Transition to researching before any network call
 *   - Clear previous source records, artifacts and index
 *
 * Phase 2: REFERENCE PAGE
 *   - Strategy chain: bgg-xml-api → web-search
 *
 * Phase 3: FAN-OUT (parallel, independent failure domains)
 *   - Web research discovery (capped, typed, deduplicated)
 *   - Reference page metadata (difficulty, player count)
 *   - Tutorial video: youtube-api → web-search
 *   - Joined with Promise.allSettled; a failed task contributes nothing
 *
 * Phase 4: SAVE
 *   - Validate the video (oEmbed); invalid videos are dropped
 *   - Deduplicate by normalized URL
 *   - Save sources in batches; a failing source is skipped
 *
 * Phase 5: INDEX + DESCRIBE
 *   - Rebuild the vector index (failure logged, run continues)
 *   - Description from the first text-bearing sources
 *
 * Phase 6: FINALIZE
 *   - Persist metadata and description, transition to ready
 *   - Any error after phase 1 flips the entity to failed
 */

import { randomUUID } from "crypto";
import type { ResearchLimits } from "../core/config.js";
import type { HttpClient } from "../core/http.js";
import { logger, type ChildLogger } from "../core/logger.js";
import { ResearchError, ValidationError, toError } from "../core/errors.js";
import { inBatches, toSettled, valueOr, type StrategyOutcome } from "../core/strategies.js";
import type {
  Classifier,
  ReferenceLookup,
  VideoSearcher,
  WebSearcher,
} from "../capabilities/types.js";
import {
  normalizeEntityName,
  type Entity,
  type EntityMetadata,
  type EntityStatus,
  type TutorialVideo,
} from "../schemas/entity.js";
import type { DiscoveredSource } from "../schemas/source.js";
import { DescriptionSchema } from "../schemas/extraction.js";
import type { EntityStore } from "../store/types.js";
import { clearEntityDir } from "../store/files.js";
import { discoverReferencePage } from "../sources/reference.js";
import { discoverWebSources } from "../sources/web-research.js";
import { fetchReferenceMetadata, type ReferenceMetadata } from "../sources/metadata.js";
import { findTutorialVideo } from "../sources/video.js";
import { dedupeByUrl } from "../sources/urls.js";
import { getDescriptionPrompt } from "../agents/prompts.js";
import { validateYouTubeVideo } from "../capabilities/youtube.js";
import type { SourceSaver } from "../ingest/saver.js";
import type { DocumentIngestor } from "../ingest/ingestor.js";

/**
 * Outcome of a research run
 */
export interface ResearchResult {
  entityId: number;
  name: string;
  status: EntityStatus;
  sourceCount: number;
  downloadedCount: number;
  linkedCount: number;
  description: string | null;
  metadata: EntityMetadata | null;
  /** Set when the run did not complete */
  error?: string;
}

export interface ResearchOptions {
  /** Re-run the full pipeline for an entity that is already ready */
  force?: boolean;
  correlationId?: string;
}

export interface ResearchDeps {
  store: EntityStore;
  classifier: Classifier;
  searcher: WebSearcher;
  lookup: ReferenceLookup;
  /** Absent without a YouTube API key */
  videos?: VideoSearcher;
  http: HttpClient;
  saver: SourceSaver;
  ingestor: DocumentIngestor;
}

const NO_VIDEO: StrategyOutcome<TutorialVideo> = { value: null, strategy: null, attempts: [] };

/**
 * Research orchestrator
 */
export class ResearchOrchestrator {
  constructor(
    private readonly deps: ResearchDeps,
    private readonly options: { limits: ResearchLimits; dataDir: string }
  ) {}

  async research(entityName: string, options: ResearchOptions = {}): Promise<ResearchResult> {
    const name = normalizeEntityName(entityName);
    if (!name) {
      throw new ValidationError("a game name is required", { field: "entityName" });
    }

    const correlationId = options.correlationId ?? randomUUID();

    let entity: Entity;
    try {
      entity = (await this.deps.store.getEntityByName(name)) ?? (await this.deps.store.createEntity(name));
    } catch (error) {
      throw new ResearchError(name, "could not load or create the entity", toError(error));
    }

    const log = logger.child({ correlationId, entityId: entity.id, entityName: entity.name });

    if (entity.status === "ready" && !options.force) {
      log.info("Already researched; returning stored state");
      return this.storedResult(entity);
    }
    if (entity.status === "researching") {
      log.warn("Research already in progress");
      return { ...(await this.storedResult(entity)), error: "research already in progress" };
    }

    const startTime = Date.now();
    log.info("Starting research", { force: options.force ?? false });

    try {
      const result = await this.run(entity, correlationId, log);
      log.info("Research complete", {
        sources: result.sourceCount,
        downloaded: result.downloadedCount,
        linked: result.linkedCount,
      });
      log.metric("research_duration_ms", Date.now() - startTime);
      return result;
    } catch (error) {
      const err = toError(error);
      log.error("Research failed", err);
      return this.fail(entity, err, log);
    }
  }

  private async run(entity: Entity, correlationId: string, log: ChildLogger): Promise<ResearchResult> {
    const { store, ingestor } = this.deps;
    const limits = this.options.limits;

    // ============================================================
    // PHASE 1: ENTITY
    // ============================================================
    await store.updateStatus(entity.id, "researching");
    const cleared = await store.clearSources(entity.id);
    await clearEntityDir(this.options.dataDir, entity.id);
    await ingestor.reset(entity.id);
    if (cleared > 0) {
      log.debug("Cleared previous sources", { cleared });
    }

    // ============================================================
    // PHASE 2: REFERENCE PAGE
    // ============================================================
    const reference = await discoverReferencePage(
      entity.name,
      { lookup: this.deps.lookup, searcher: this.deps.searcher },
      log.child({ phase: "reference" })
    );
    const referenceUrl = reference.value;

    // ============================================================
    // PHASE 3: FAN-OUT
    // ============================================================
    const [webSettled, metadataSettled, videoSettled] = await Promise.allSettled([
      discoverWebSources(
        entity.name,
        { classifier: this.deps.classifier },
        { maxSources: limits.maxSources, correlationId }
      ),
      fetchReferenceMetadata(
        entity.name,
        referenceUrl,
        { http: this.deps.http, classifier: this.deps.classifier },
        { maxChars: limits.metadataChars, correlationId },
        log.child({ phase: "metadata" })
      ),
      findTutorialVideo(
        entity.name,
        { videos: this.deps.videos, searcher: this.deps.searcher },
        log.child({ phase: "video" })
      ),
    ]);

    const webSources = valueOr(toSettled(webSettled), [], "web-research", log);
    const metadataFallback: ReferenceMetadata = { difficulty: null, playerCount: null, referenceUrl };
    const referenceMetadata = valueOr(toSettled(metadataSettled), metadataFallback, "metadata", log);
    const videoOutcome = valueOr(toSettled(videoSettled), NO_VIDEO, "tutorial-video", log);

    log.info("Parallel fetch complete", {
      webSources: webSources.length,
      difficulty: referenceMetadata.difficulty,
      video: videoOutcome.value?.url ?? null,
    });

    // ============================================================
    // PHASE 4: SAVE
    // ============================================================
    const video = await this.validateVideo(videoOutcome.value, log);

    const candidates: DiscoveredSource[] = [];
    if (referenceUrl) {
      candidates.push({ url: referenceUrl, title: `${entity.name} (BoardGameGeek)`, sourceType: "webpage" });
    }
    candidates.push(...webSources);
    if (video) {
      candidates.push({ url: video.url, title: video.title, sourceType: "video" });
    }
    const sources = dedupeByUrl(candidates);

    const saved = await inBatches(sources, limits.saveConcurrency, (source) =>
      this.deps.saver.save(entity.id, source, log.child({ phase: "save", source: source.url }))
    );

    let downloadedCount = 0;
    let linkedCount = 0;
    saved.forEach((outcome, i) => {
      if (outcome.ok) {
        if (outcome.value.downloaded) downloadedCount++;
        else linkedCount++;
      } else {
        log.warn("Source skipped", { url: sources[i].url, error: outcome.error.message });
      }
    });

    // ============================================================
    // PHASE 5: INDEX + DESCRIBE
    // ============================================================
    try {
      await ingestor.ingest(entity.id);
    } catch (error) {
      log.error("Index rebuild failed; continuing without index", error);
    }

    const description = await this.describe(entity, correlationId, log);

    // ============================================================
    // PHASE 6: FINALIZE
    // ============================================================
    const metadata: EntityMetadata = {
      difficulty: referenceMetadata.difficulty,
      playerCount: referenceMetadata.playerCount,
      referenceUrl: referenceMetadata.referenceUrl,
      tutorialVideo: video,
    };

    await store.updateEntity(entity.id, {
      description,
      metadata,
      lastResearchedAt: new Date().toISOString(),
    });
    const ready = await store.updateStatus(entity.id, "ready");

    log.metric("research_sources", downloadedCount + linkedCount);

    return {
      entityId: ready.id,
      name: ready.name,
      status: ready.status,
      sourceCount: downloadedCount + linkedCount,
      downloadedCount,
      linkedCount,
      description,
      metadata,
    };
  }

  /**
   * Existence check; anything but a confirmed video is dropped
   */
  private async validateVideo(video: TutorialVideo | null, log: ChildLogger): Promise<TutorialVideo | null> {
    if (!video) return null;

    const timeoutMs = this.options.limits.videoValidationTimeoutMs;
    let valid: boolean;
    try {
      valid = this.deps.videos
        ? await this.deps.videos.validateVideo(video.url, timeoutMs)
        : await validateYouTubeVideo(this.deps.http, video.url, timeoutMs);
    } catch (error) {
      log.warn("Video validation failed", { url: video.url, error: toError(error).message });
      valid = false;
    }

    if (!valid) {
      log.warn("Dropping invalid video", { url: video.url });
      return null;
    }
    return video;
  }

  /**
   * Short description from the first text-bearing sources; null when there is no text or the call fails
   */
  private async describe(entity: Entity, correlationId: string, log: ChildLogger): Promise<string | null> {
    const limits = this.options.limits;
    const records = await this.deps.store.listSources(entity.id);

    const parts: string[] = [];
    for (const record of records) {
      if (parts.length >= limits.descriptionSources) break;
      const text = await this.deps.ingestor.readText(record);
      if (!text || !text.trim()) continue;
      parts.push(`Source: ${record.title ?? record.originUrl}\n${text.slice(0, limits.descriptionCharsPerSource)}`);
    }

    if (parts.length === 0) {
      log.warn("No text available for a description");
      return null;
    }

    try {
      const result = await this.deps.classifier.classify({
        task: "description",
        prompt: getDescriptionPrompt({
          gameName: entity.name,
          sourcesSummary: parts.join("\n\n").slice(0, limits.descriptionChars),
        }),
        schema: DescriptionSchema,
        correlationId,
      });
      return result.description.trim();
    } catch (error) {
      log.warn("Description generation failed", { error: toError(error).message });
      return null;
    }
  }

  private async fail(entity: Entity, error: Error, log: ChildLogger): Promise<ResearchResult> {
    let status: EntityStatus = entity.status;
    try {
      const failed = await this.deps.store.updateStatus(entity.id, "failed");
      status = failed.status;
    } catch (statusError) {
      log.error("Could not mark entity failed", statusError);
    }

    return {
      entityId: entity.id,
      name: entity.name,
      status,
      sourceCount: 0,
      downloadedCount: 0,
      linkedCount: 0,
      description: entity.description,
      metadata: entity.metadata,
      error: error.message,
    };
  }

  private async storedResult(entity: Entity): Promise<ResearchResult> {
    const sources = await this.deps.store.listSources(entity.id);
    const downloadedCount = sources.filter((s) => s.localPath !== null).length;

    return {
      entityId: entity.id,
      name: entity.name,
      status: entity.status,
      sourceCount: sources.length,
      downloadedCount,
      linkedCount: sources.length - downloadedCount,
      description: entity.description,
      metadata: entity.metadata,
    };
  }
}
