import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import { DocumentIngestor, textArtifactPath } from "./ingestor.js";
import { VectorIndex } from "./vector-index.js";
import { DEFAULT_INDEX_LIMITS } from "../core/config.js";
import type { SourceRecord } from "../schemas/source.js";
import { MemoryEntityStore } from "../store/memory-store.js";
import { ensureEntityDir } from "../store/files.js";
import { FakeEmbedder, makeTempDir, words } from "../testing/fakes.js";

// --- Test Fixtures ---

function createMockRecord(overrides: Partial<SourceRecord> = {}): SourceRecord {
  return {
    id: 1,
    entityId: 1,
    sourceType: "webpage",
    originUrl: "https://example.com/guide",
    title: "Guide",
    localPath: "/data/entities/1/guide-1f102ffe.html",
    createdAt: "2024-01-01T00:00:00Z",
    ...overrides,
  };
}

describe("textArtifactPath", () => {
  it("uses the text companion of a webpage", () => {
    expect(textArtifactPath(createMockRecord())).toBe("/data/entities/1/guide-1f102ffe.txt");
  });

  it("uses the file itself for transcripts and text", () => {
    const video = createMockRecord({ sourceType: "video", localPath: "/data/entities/1/youtube-abcdefghijk.txt" });
    expect(textArtifactPath(video)).toBe("/data/entities/1/youtube-abcdefghijk.txt");
    expect(textArtifactPath(createMockRecord({ sourceType: "text", localPath: "/d/a.txt" }))).toBe("/d/a.txt");
  });

  it("has no text for documents and references", () => {
    expect(textArtifactPath(createMockRecord({ sourceType: "document", localPath: "/d/a.pdf" }))).toBeNull();
    expect(textArtifactPath(createMockRecord({ sourceType: "link", localPath: null }))).toBeNull();
    expect(textArtifactPath(createMockRecord({ localPath: null }))).toBeNull();
  });
});

describe("DocumentIngestor", () => {
  let dataDir: string;
  let store: MemoryEntityStore;
  let index: VectorIndex;
  let ingestor: DocumentIngestor;

  beforeEach(async () => {
    dataDir = await makeTempDir();
    store = new MemoryEntityStore(dataDir);
    store.seedEntity({ id: 1, name: "Catan" });
    index = new VectorIndex(dataDir, new FakeEmbedder(), DEFAULT_INDEX_LIMITS.embedBatchSize);
    ingestor = new DocumentIngestor(store, index, DEFAULT_INDEX_LIMITS);

    const dir = await ensureEntityDir(dataDir, 1);
    await fs.writeFile(path.join(dir, "guide.html"), "<p>ignored</p>");
    await fs.writeFile(path.join(dir, "guide.txt"), words(1001));
    await fs.writeFile(path.join(dir, "youtube-abcdefghijk.txt"), "YouTube Video: Catan\nURL: u\n\nroll the dice");
    await fs.writeFile(path.join(dir, "rules.pdf"), "%PDF-1.4");

    await store.addSource({
      entityId: 1,
      sourceType: "webpage",
      originUrl: "https://example.com/guide",
      title: "Guide",
      localPath: path.join(dir, "guide.html"),
    });
    await store.addSource({
      entityId: 1,
      sourceType: "video",
      originUrl: "https://www.youtube.com/watch?v=abcdefghijk",
      title: "Catan",
      localPath: path.join(dir, "youtube-abcdefghijk.txt"),
    });
    await store.addSource({
      entityId: 1,
      sourceType: "document",
      originUrl: "https://example.com/rules.pdf",
      title: "Rules",
      localPath: path.join(dir, "rules.pdf"),
    });
    await store.addSource({
      entityId: 1,
      sourceType: "link",
      originUrl: "https://vimeo.com/12345",
      title: "Playthrough",
      localPath: null,
    });
    await store.addSource({
      entityId: 1,
      sourceType: "text",
      originUrl: "https://example.com/faq.txt",
      title: "FAQ",
      localPath: path.join(dir, "missing.txt"),
    });
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it("chunks every text-bearing source into the index", async () => {
    const summary = await ingestor.ingest(1);

    expect(summary).toEqual({ entityId: 1, documents: 2, chunks: 3 });

    const loaded = await index.load(1);
    expect(loaded?.chunks.map((c) => [c.sourceId, c.sourceTitle, c.overlapWithPrevious])).toEqual([
      [1, "Guide", 0],
      [1, "Guide", 200],
      [2, "Catan", 0],
    ]);
  });

  it("produces the same index when run twice", async () => {
    await ingestor.ingest(1);
    const first = await fs.readFile(index.indexPath(1), "utf-8");

    const again = await ingestor.ingest(1);
    const second = await fs.readFile(index.indexPath(1), "utf-8");

    expect(again.chunks).toBe(3);
    expect(second).toBe(first);
  });

  it("writes an empty index for an entity without text", async () => {
    store.seedEntity({ id: 2, name: "Azul" });

    expect(await ingestor.ingest(2)).toEqual({ entityId: 2, documents: 0, chunks: 0 });
    expect(await index.search(2, "tiles", 5)).toEqual([]);
  });

  it("drops the index on reset", async () => {
    await ingestor.ingest(1);
    await ingestor.reset(1);

    expect(await index.load(1)).toBeNull();
  });

  it("reads null for a missing artifact", async () => {
    const [, , , , faq] = await store.listSources(1);
    expect(await ingestor.readText(faq)).toBeNull();
  });
});
