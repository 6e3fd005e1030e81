import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import { APOLOGY, AnswerComposer, buildContext, fileUrl, filesUrl, researchDisclaimer } from "./answer-composer.js";
import { DEFAULT_ANSWER_LIMITS } from "../core/config.js";
import { StoreError } from "../core/errors.js";
import type { NewConversationEntry, ConversationEntry } from "../schemas/conversation.js";
import { VectorIndex, type ChunkInput, type SearchHit } from "../ingest/vector-index.js";
import { EntityResolver } from "../resolver/entity-resolver.js";
import { MemoryEntityStore } from "../store/memory-store.js";
import { entityDir } from "../store/files.js";
import { FakeEmbedder, FakeGenerator, ScriptedClassifier, makeTempDir } from "../testing/fakes.js";

const BASE_URL = "http://localhost:8000";

// --- Test Fixtures ---

function createMockHit(overrides: Partial<SearchHit> = {}): SearchHit {
  return { chunkText: "abc", sourceId: 1, sourceTitle: "T", ordinal: 0, score: 0.5, ...overrides };
}

describe("buildContext", () => {
  it("formats each hit with its source and score", () => {
    const { context, used } = buildContext(
      [createMockHit(), createMockHit({ sourceTitle: null, sourceId: 2, chunkText: "def", score: 0.25 })],
      1000
    );

    expect(context).toBe("[Source: T (score: 0.50)]\nabc\n\n[Source: source 2 (score: 0.25)]\ndef");
    expect(used).toHaveLength(2);
  });

  it("stops before the character limit", () => {
    // each block is 29 characters
    const hits = [createMockHit(), createMockHit({ ordinal: 1 }), createMockHit({ ordinal: 2 })];

    const { context, used } = buildContext(hits, 60);

    expect(used.map((h) => h.ordinal)).toEqual([0, 1]);
    expect(context.length).toBe(60);
  });

  it("truncates a single oversized block", () => {
    const { context, used } = buildContext([createMockHit({ chunkText: "x".repeat(100) })], 40);

    expect(context).toBe(`[Source: T (score: 0.50)]\n${"x".repeat(14)}`);
    expect(used).toHaveLength(1);
  });

  it("is empty without hits", () => {
    expect(buildContext([], 100)).toEqual({ context: "", used: [] });
  });
});

describe("links and disclaimers", () => {
  it("builds file URLs", () => {
    expect(filesUrl(BASE_URL, 3)).toBe("http://localhost:8000/entities/3/files");
    expect(fileUrl(BASE_URL, 3, "catan rules.pdf")).toBe("http://localhost:8000/entities/3/files/catan%20rules.pdf");
  });

  it("words the disclaimer by status", () => {
    expect(researchDisclaimer("Catan", "researching")).toBe(
      "Note: research on Catan is still in progress, so this answer comes from web search only."
    );
    expect(researchDisclaimer("Root", null)).toBe(
      "Note: I haven't researched Root yet, so this answer comes from web search only. Ask me to research it for answers grounded in its rulebook."
    );
  });
});

describe("AnswerComposer", () => {
  let dataDir: string;
  let store: MemoryEntityStore;
  let classifier: ScriptedClassifier;
  let generator: FakeGenerator;
  let index: VectorIndex;
  let composer: AnswerComposer;

  function createComposer(withStore: MemoryEntityStore): AnswerComposer {
    const resolver = new EntityResolver({ store: withStore, classifier }, { fuzzyThreshold: 0.6 });
    return new AnswerComposer(
      { store: withStore, resolver, index, generator },
      { limits: DEFAULT_ANSWER_LIMITS, topK: 5, publicBaseUrl: BASE_URL }
    );
  }

  beforeEach(async () => {
    dataDir = await makeTempDir();
    store = new MemoryEntityStore(dataDir);
    classifier = new ScriptedClassifier();
    generator = new FakeGenerator({
      text: "First to 10 points wins.",
      webCitations: [{ title: "Rules summary", url: "https://example.com/summary" }],
      usedWebSearch: true,
    });
    index = new VectorIndex(dataDir, new FakeEmbedder(), 16);
    composer = createComposer(store);
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  async function seedResearchedCatan(): Promise<void> {
    store.seedEntity({ id: 1, name: "Catan", status: "ready" });
    const saved = await store.addSource({
      entityId: 1,
      sourceType: "webpage",
      originUrl: "https://example.com/catan-rules",
      title: "Catan rules",
      localPath: path.join(entityDir(dataDir, 1), "catan-rules.html"),
    });
    const linked = await store.addSource({
      entityId: 1,
      sourceType: "video",
      originUrl: "https://www.youtube.com/watch?v=abcdefghijk",
      title: "How to play Catan",
      localPath: null,
    });
    await index.build(1, [
      { sourceId: saved.id, sourceTitle: "Catan rules", text: "To win Catan reach ten victory points", overlapWithPrevious: 0 },
      { sourceId: saved.id, sourceTitle: "Catan rules", text: "The robber blocks a hex", overlapWithPrevious: 0 },
      { sourceId: linked.id, sourceTitle: "How to play Catan", text: "win by points", overlapWithPrevious: 0 },
    ]);
  }

  it("answers from the index with library citations", async () => {
    await seedResearchedCatan();
    classifier.set("game-name", { candidateName: "Catan", confidence: "high" });

    const result = await composer.answer("how do you win in Catan?", { chatId: "chat-1" });

    expect(result.entityId).toBe(1);
    expect(result.resolution).toBe("resolved");
    expect(result.usedWebSearch).toBe(true);
    expect(result.webCitations).toEqual([{ title: "Rules summary", url: "https://example.com/summary" }]);
    expect(result.citedInternalSources).toEqual([
      { sourceId: 1, title: "Catan rules", url: "http://localhost:8000/entities/1/files/catan-rules.html" },
      { sourceId: 2, title: "How to play Catan", url: "https://www.youtube.com/watch?v=abcdefghijk" },
    ]);
    expect(result.text).toBe(
      [
        "First to 10 points wins.",
        "",
        "Library sources:",
        "- Catan rules: http://localhost:8000/entities/1/files/catan-rules.html",
        "- How to play Catan: https://www.youtube.com/watch?v=abcdefghijk",
        "All files: http://localhost:8000/entities/1/files",
      ].join("\n")
    );

    const request = generator.requests[0];
    expect(request.subject).toBe("Catan");
    expect(request.enableWebSearch).toBe(true);
    expect(request.context.startsWith("[Source: Catan rules (score: ")).toBe(true);
  });

  it("logs both turns tagged with the entity", async () => {
    await seedResearchedCatan();
    classifier.set("game-name", { candidateName: "Catan", confidence: "high" });

    const result = await composer.answer("how do you win in Catan?", { chatId: "chat-1" });

    const turns = await store.recentConversation("chat-1", 10);
    expect(turns.map((t) => [t.role, t.text, t.entityId])).toEqual([
      ["assistant", result.text, 1],
      ["user", "how do you win in Catan?", 1],
    ]);
  });

  it("resolves a follow-up from the chat history", async () => {
    store.seedEntity({ id: 5, name: "Wingspan", status: "ready" });
    await store.appendConversation({ chatId: "chat-1", role: "user", text: "tell me about Wingspan", entityId: 5 });
    classifier.set("game-name", { candidateName: null, confidence: "low" });
    generator.respondWith({ text: "Up to five players.", webCitations: [], usedWebSearch: false });

    const result = await composer.answer("how many players?", { chatId: "chat-1" });

    expect(result.entityId).toBe(5);
    expect(result.text).toBe("Up to five players.");
    expect(result.citedInternalSources).toEqual([]);
    expect(generator.requests[0].context).toBe("");
  });

  it("adds the disclaimer for a game that has not been researched", async () => {
    store.seedEntity({ id: 2, name: "Azul", status: "created" });
    classifier.set("game-name", { candidateName: "Azul", confidence: "high" });
    generator.respondWith({ text: "Score tiles.", webCitations: [], usedWebSearch: true });

    const result = await composer.answer("how do you score in Azul?", { chatId: "chat-1" });

    expect(result.entityId).toBe(2);
    expect(result.citedInternalSources).toEqual([]);
    expect(result.text).toBe(
      "Score tiles.\n\nNote: I haven't researched Azul yet, so this answer comes from web search only. Ask me to research it for answers grounded in its rulebook."
    );
  });

  it("says research is in progress for a researching game", async () => {
    store.seedEntity({ id: 1, name: "Catan", status: "researching" });
    classifier.set("game-name", { candidateName: "Catan", confidence: "high" });
    generator.respondWith({ text: "Ten points.", webCitations: [], usedWebSearch: true });

    const result = await composer.answer("how to win Catan", { chatId: "chat-1" });

    expect(result.text).toBe(
      "Ten points.\n\nNote: research on Catan is still in progress, so this answer comes from web search only."
    );
  });

  it("answers about a game outside the library with a disclaimer", async () => {
    classifier.set("game-name", { candidateName: "Root", confidence: "high" });
    generator.respondWith({ text: "Factions differ.", webCitations: [], usedWebSearch: true });

    const result = await composer.answer("how does Root work?", { chatId: "chat-1" });

    expect(result.resolution).toBe("mentioned");
    expect(result.entityId).toBeNull();
    expect(generator.requests[0].subject).toBe("Root");
    expect(result.text).toBe(
      "Factions differ.\n\nNote: I haven't researched Root yet, so this answer comes from web search only. Ask me to research it for answers grounded in its rulebook."
    );
  });

  it("answers without a game when nothing resolves", async () => {
    classifier.set("game-name", { candidateName: null, confidence: "low" });
    generator.respondWith({ text: "Hello!", webCitations: [], usedWebSearch: false });

    const result = await composer.answer("hi there", { chatId: "chat-1" });

    expect(result).toEqual({
      text: "Hello!",
      citedInternalSources: [],
      webCitations: [],
      usedWebSearch: false,
      entityId: null,
      resolution: "unresolved",
    });
    expect(generator.requests[0].subject).toBeNull();
  });

  it("apologizes when generation fails and still logs the turn", async () => {
    await seedResearchedCatan();
    classifier.set("game-name", { candidateName: "Catan", confidence: "high" });
    generator.respondWith(new Error("model unavailable"));

    const result = await composer.answer("how do you win in Catan?", { chatId: "chat-1" });

    expect(result.text).toBe(APOLOGY);
    expect(result.citedInternalSources).toEqual([]);
    expect(result.entityId).toBe(1);
    const turns = await store.recentConversation("chat-1", 10);
    expect(turns.map((t) => t.text)).toEqual([APOLOGY, "how do you win in Catan?"]);
  });

  it("still answers when the conversation log is unavailable", async () => {
    class ReadOnlyStore extends MemoryEntityStore {
      override async appendConversation(_entry: NewConversationEntry): Promise<ConversationEntry> {
        throw new StoreError("appendConversation", "read-only");
      }
    }
    const readOnly = new ReadOnlyStore(dataDir);
    classifier.set("game-name", { candidateName: null, confidence: "low" });
    generator.respondWith({ text: "Hello!", webCitations: [], usedWebSearch: false });

    const result = await createComposer(readOnly).answer("hi", { chatId: "chat-1" });

    expect(result.text).toBe("Hello!");
  });

  it("caps internal citations", async () => {
    store.seedEntity({ id: 1, name: "Catan", status: "ready" });
    const chunks: ChunkInput[] = [];
    for (let i = 0; i < 7; i++) {
      const source = await store.addSource({
        entityId: 1,
        sourceType: "link",
        originUrl: `https://example.com/${i}`,
        title: `Link ${i}`,
        localPath: null,
      });
      chunks.push({ sourceId: source.id, sourceTitle: source.title, text: "catan", overlapWithPrevious: 0 });
    }
    await index.build(1, chunks);
    const wide = new AnswerComposer(
      {
        store,
        resolver: new EntityResolver({ store, classifier }, { fuzzyThreshold: 0.6 }),
        index,
        generator,
      },
      { limits: DEFAULT_ANSWER_LIMITS, topK: 7, publicBaseUrl: BASE_URL }
    );
    classifier.set("game-name", { candidateName: "Catan", confidence: "high" });

    const result = await wide.answer("catan", { chatId: "chat-1" });

    expect(result.citedInternalSources.map((c) => c.title)).toEqual(["Link 0", "Link 1", "Link 2", "Link 3", "Link 4"]);
  });
});
