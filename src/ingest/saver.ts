/**
 * Source Saver
 * Downloads one discovered source into the entity directory and records it.
 *
 * video    → transcript .txt, or reference only when there are no captions
 * document → stored as-is
 * webpage  → .html plus companion .txt (a PDF response is stored as a document)
 * text     → .txt
 * link     → reference only
 */

import fs from "fs/promises";
import path from "path";
import type { HttpClient } from "../core/http.js";
import type { ChildLogger } from "../core/logger.js";
import { NetworkError, SourceError } from "../core/errors.js";
import type { TranscriptFetcher } from "../capabilities/types.js";
import type { DiscoveredSource, SourceRecord, SourceType } from "../schemas/source.js";
import type { EntityStore } from "../store/types.js";
import { artifactFileName, ensureEntityDir, withExtension } from "../store/files.js";
import { htmlToText } from "../sources/html.js";
import { youTubeVideoId } from "../sources/urls.js";

export interface SaveOutcome {
  record: SourceRecord;
  downloaded: boolean;
}

export function isPdf(contentType: string, url: string): boolean {
  return contentType.includes("application/pdf") || new URL(url).pathname.toLowerCase().endsWith(".pdf");
}

export class SourceSaver {
  constructor(
    private readonly deps: {
      store: EntityStore;
      http: HttpClient;
      transcripts: TranscriptFetcher;
      dataDir: string;
    }
  ) {}

  async save(entityId: number, source: DiscoveredSource, log: ChildLogger): Promise<SaveOutcome> {
    switch (source.sourceType) {
      case "video":
        return this.saveVideo(entityId, source, log);
      case "link":
      case "other":
        return this.record(entityId, source, source.sourceType, null);
      case "document":
      case "webpage":
      case "text":
        return this.download(entityId, source);
    }
  }

  private async saveVideo(entityId: number, source: DiscoveredSource, log: ChildLogger): Promise<SaveOutcome> {
    const videoId = youTubeVideoId(source.url);
    if (!videoId) {
      return this.record(entityId, source, "link", null);
    }

    let transcript: string | null = null;
    try {
      transcript = await this.deps.transcripts.fetchTranscript(videoId);
    } catch (error) {
      if (!(error instanceof SourceError || error instanceof NetworkError)) throw error;
      log.debug("Transcript unavailable", { url: source.url, error: error.message });
    }

    if (!transcript) {
      return this.record(entityId, source, "video", null);
    }

    const dir = await ensureEntityDir(this.deps.dataDir, entityId);
    const filePath = path.join(dir, `youtube-${videoId}.txt`);
    await fs.writeFile(filePath, `YouTube Video: ${source.title}\nURL: ${source.url}\n\n${transcript}`, "utf-8");

    return this.record(entityId, source, "video", filePath);
  }

  private async download(entityId: number, source: DiscoveredSource): Promise<SaveOutcome> {
    const response = await this.deps.http.get(source.url, { source: "download" });
    const dir = await ensureEntityDir(this.deps.dataDir, entityId);

    if (isPdf(response.contentType, response.url) || isPdf(response.contentType, source.url)) {
      const filePath = path.join(dir, artifactFileName(source.title, source.url, "pdf"));
      await fs.writeFile(filePath, response.body);
      return this.record(entityId, source, "document", filePath);
    }

    if (source.sourceType === "text" || response.contentType.startsWith("text/plain")) {
      const filePath = path.join(dir, artifactFileName(source.title, source.url, "txt"));
      await fs.writeFile(filePath, response.text(), "utf-8");
      return this.record(entityId, source, "text", filePath);
    }

    const htmlName = artifactFileName(source.title, source.url, "html");
    const htmlPath = path.join(dir, htmlName);
    await fs.writeFile(htmlPath, response.body);
    await fs.writeFile(path.join(dir, withExtension(htmlName, "txt")), htmlToText(response.text()), "utf-8");

    return this.record(entityId, source, "webpage", htmlPath);
  }

  private async record(
    entityId: number,
    source: DiscoveredSource,
    sourceType: SourceType,
    localPath: string | null
  ): Promise<SaveOutcome> {
    const record = await this.deps.store.addSource({
      entityId,
      sourceType,
      originUrl: source.url,
      title: source.title,
      localPath,
    });
    return { record, downloaded: localPath !== null };
  }
}
