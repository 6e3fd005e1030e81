/**
 * Answer Composer
 * Hybrid answers: indexed library context plus live web search, with citations
 *
 * FLOW:
 * =====
 * answer(userText, chat)
 *   ├─ Resolve the game (failures degrade to unresolved)
 *   ├─ Ready entity → top-k chunks from its index (failures degrade to no context)
 *   ├─ Generate with web search enabled
 *   ├─ Append internal citations or the not-researched disclaimer
 *   └─ Log the user and assistant turns, tagged with the entity
 */

import path from "path";
import { randomUUID } from "crypto";
import type { AnswerLimits } from "../core/config.js";
import { logger, type ChildLogger } from "../core/logger.js";
import { toError } from "../core/errors.js";
import type { Generator, WebCitation } from "../capabilities/types.js";
import type { ChatContext } from "../schemas/conversation.js";
import type { Entity } from "../schemas/entity.js";
import type { SourceRecord } from "../schemas/source.js";
import type { EntityStore } from "../store/types.js";
import type { SearchHit, VectorIndex } from "../ingest/vector-index.js";
import type { EntityResolver, Resolution } from "../resolver/entity-resolver.js";

export interface InternalCitation {
  sourceId: number;
  title: string;
  /** File URL when the source was downloaded, otherwise its origin */
  url: string;
}

export interface AnswerResult {
  text: string;
  citedInternalSources: InternalCitation[];
  webCitations: WebCitation[];
  usedWebSearch: boolean;
  entityId: number | null;
  resolution: Resolution["kind"];
}

export const APOLOGY =
  "Sorry, I couldn't put an answer together just now. Please try again in a moment.";

/**
 * Context blocks for the generator, bounded to maxChars. Returns the hits that made it in.
 */
export function buildContext(hits: SearchHit[], maxChars: number): { context: string; used: SearchHit[] } {
  const blocks: string[] = [];
  const used: SearchHit[] = [];
  let length = 0;

  for (const hit of hits) {
    const title = hit.sourceTitle ?? `source ${hit.sourceId}`;
    const block = `[Source: ${title} (score: ${hit.score.toFixed(2)})]\n${hit.chunkText}`;
    const separator = blocks.length > 0 ? 2 : 0;

    if (length + separator + block.length > maxChars) {
      if (blocks.length === 0) {
        blocks.push(block.slice(0, maxChars));
        used.push(hit);
      }
      break;
    }

    blocks.push(block);
    used.push(hit);
    length += separator + block.length;
  }

  return { context: blocks.join("\n\n"), used };
}

export function filesUrl(publicBaseUrl: string, entityId: number): string {
  return `${publicBaseUrl}/entities/${entityId}/files`;
}

export function fileUrl(publicBaseUrl: string, entityId: number, filename: string): string {
  return `${filesUrl(publicBaseUrl, entityId)}/${encodeURIComponent(filename)}`;
}

export function researchDisclaimer(name: string, status: Entity["status"] | null): string {
  if (status === "researching") {
    return `Note: research on ${name} is still in progress, so this answer comes from web search only.`;
  }
  return `Note: I haven't researched ${name} yet, so this answer comes from web search only. Ask me to research it for answers grounded in its rulebook.`;
}

export class AnswerComposer {
  constructor(
    private readonly deps: {
      store: EntityStore;
      resolver: EntityResolver;
      index: VectorIndex;
      generator: Generator;
    },
    private readonly options: { limits: AnswerLimits; topK: number; publicBaseUrl: string }
  ) {}

  async answer(userText: string, chat: ChatContext): Promise<AnswerResult> {
    const correlationId = randomUUID();
    const log = logger.child({ correlationId, chatId: chat.chatId, phase: "answer" });

    const resolution = await this.resolve(userText, chat, correlationId, log);
    const entity = resolution.kind === "resolved" ? resolution.entity : null;

    const hits = entity && entity.status === "ready" ? await this.retrieve(entity, userText, log) : [];
    const { context, used } = buildContext(hits, this.options.limits.contextChars);

    const subject = entity ? entity.name : resolution.kind === "mentioned" ? resolution.name : null;

    let result: AnswerResult;
    try {
      const generated = await this.deps.generator.generate({
        prompt: userText,
        subject,
        context,
        enableWebSearch: true,
        correlationId,
      });

      const citations = entity && used.length > 0 ? await this.citations(entity, used, log) : [];

      const sections = [generated.text.trim()];
      if (entity && citations.length > 0) {
        sections.push(this.formatCitations(entity.id, citations));
      }
      if (entity && entity.status !== "ready") {
        sections.push(researchDisclaimer(entity.name, entity.status));
      } else if (resolution.kind === "mentioned") {
        sections.push(researchDisclaimer(resolution.name, null));
      }

      result = {
        text: sections.join("\n\n"),
        citedInternalSources: citations,
        webCitations: generated.webCitations,
        usedWebSearch: generated.usedWebSearch,
        entityId: entity?.id ?? null,
        resolution: resolution.kind,
      };
    } catch (error) {
      log.error("Answer generation failed", error);
      result = {
        text: APOLOGY,
        citedInternalSources: [],
        webCitations: [],
        usedWebSearch: false,
        entityId: entity?.id ?? null,
        resolution: resolution.kind,
      };
    }

    await this.record(chat, userText, result, log);

    log.info("Answered", {
      resolution: resolution.kind,
      entityId: result.entityId,
      chunks: used.length,
      usedWebSearch: result.usedWebSearch,
    });

    return result;
  }

  private async resolve(
    userText: string,
    chat: ChatContext,
    correlationId: string,
    log: ChildLogger
  ): Promise<Resolution> {
    try {
      const [entities, history] = await Promise.all([
        this.deps.store.listEntities(),
        this.deps.store.recentConversation(chat.chatId, this.options.limits.historyWindow),
      ]);
      return await this.deps.resolver.resolve(
        userText,
        entities.map((e) => e.name),
        history,
        correlationId
      );
    } catch (error) {
      log.warn("Resolution failed; answering without a game", { error: toError(error).message });
      return { kind: "unresolved" };
    }
  }

  private async retrieve(entity: Entity, userText: string, log: ChildLogger): Promise<SearchHit[]> {
    try {
      return await this.deps.index.search(entity.id, userText, this.options.topK);
    } catch (error) {
      log.warn("Index search failed; answering without context", { error: toError(error).message });
      return [];
    }
  }

  /**
   * Unique sources of the used chunks, in rank order
   */
  private async citations(entity: Entity, used: SearchHit[], log: ChildLogger): Promise<InternalCitation[]> {
    let records = new Map<number, SourceRecord>();
    try {
      const sources = await this.deps.store.listSources(entity.id);
      records = new Map(sources.map((s): [number, SourceRecord] => [s.id, s]));
    } catch (error) {
      log.warn("Could not load sources for citations", { error: toError(error).message });
    }

    const citations: InternalCitation[] = [];
    const seen = new Set<number>();

    for (const hit of used) {
      if (seen.has(hit.sourceId)) continue;
      seen.add(hit.sourceId);

      const record = records.get(hit.sourceId);
      const title = hit.sourceTitle ?? record?.title ?? `source ${hit.sourceId}`;
      const url = record?.localPath
        ? fileUrl(this.options.publicBaseUrl, entity.id, path.basename(record.localPath))
        : (record?.originUrl ?? filesUrl(this.options.publicBaseUrl, entity.id));

      citations.push({ sourceId: hit.sourceId, title, url });
      if (citations.length >= this.options.limits.maxInternalCitations) break;
    }

    return citations;
  }

  private formatCitations(entityId: number, citations: InternalCitation[]): string {
    const lines = citations.map((c) => `- ${c.title}: ${c.url}`);
    return [`Library sources:`, ...lines, `All files: ${filesUrl(this.options.publicBaseUrl, entityId)}`].join("\n");
  }

  private async record(chat: ChatContext, userText: string, result: AnswerResult, log: ChildLogger): Promise<void> {
    try {
      await this.deps.store.appendConversation({
        chatId: chat.chatId,
        role: "user",
        text: userText,
        entityId: result.entityId,
      });
      await this.deps.store.appendConversation({
        chatId: chat.chatId,
        role: "assistant",
        text: result.text,
        entityId: result.entityId,
      });
    } catch (error) {
      log.warn("Could not record conversation", { error: toError(error).message });
    }
  }
}
