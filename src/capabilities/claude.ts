/**
 * Claude Capabilities
 * Classifier, Generator and WebSearcher backed by Claude Agent SDK runs
 */

import type { AgentRunner } from "../core/agent-runner.js";
import { logger } from "../core/logger.js";
import { ExtractionError } from "../core/errors.js";
import { GeneratedAnswerSchema, SearchResultsSchema } from "../schemas/extraction.js";
import { ANSWER_SYSTEM_PROMPT, getAnswerPrompt, getWebSearchPrompt } from "../agents/prompts.js";
import { parseStructured } from "./json.js";
import type {
  ClassifyRequest,
  Classifier,
  GenerateRequest,
  GenerateResult,
  Generator,
  WebSearchResult,
  WebSearcher,
} from "./types.js";

const JSON_ONLY_SYSTEM_PROMPT =
  "You return a single JSON object matching the requested format. No prose before or after it.";

/**
 * Structured extraction: one run under the extract profile (or search, when web search is allowed)
 */
export class ClaudeClassifier implements Classifier {
  constructor(private readonly runner: AgentRunner) {}

  async classify<T>(request: ClassifyRequest<T>): Promise<T> {
    const result = await this.runner.run({
      profile: request.webSearch ? "research" : "extract",
      prompt: request.prompt,
      systemPrompt: JSON_ONLY_SYSTEM_PROMPT,
      correlationId: request.correlationId,
      context: { task: request.task },
    });

    return parseStructured(request.task, result.output, request.schema);
  }
}

/**
 * Hybrid answers under the answer profile (WebSearch enabled)
 */
export class ClaudeGenerator implements Generator {
  constructor(private readonly runner: AgentRunner) {}

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    const result = await this.runner.run({
      profile: request.enableWebSearch ? "answer" : "extract",
      prompt: getAnswerPrompt({
        question: request.prompt,
        gameName: request.subject ?? null,
        context: request.context,
        enableWebSearch: request.enableWebSearch,
      }),
      systemPrompt: ANSWER_SYSTEM_PROMPT,
      correlationId: request.correlationId,
      context: { task: "answer" },
    });

    const usedWebSearch = result.toolsUsed.includes("WebSearch");

    try {
      const parsed = parseStructured("answer", result.output, GeneratedAnswerSchema);
      return {
        text: parsed.answer,
        webCitations: parsed.citations.filter((c) => /^https?:\/\//.test(c.url)),
        usedWebSearch,
      };
    } catch (error) {
      if (!(error instanceof ExtractionError) || !result.output.trim()) {
        throw error;
      }
      // Plain-text answers are still answers; citations are lost
      logger.warn("Answer was not structured, using raw text", {
        correlationId: request.correlationId,
        error: error.message,
      });
      return { text: result.output.trim(), webCitations: [], usedWebSearch };
    }
  }
}

/**
 * Web search through the WebSearch tool
 */
export class ClaudeWebSearcher implements WebSearcher {
  constructor(private readonly runner: AgentRunner) {}

  async search(query: string, limit: number): Promise<WebSearchResult[]> {
    const result = await this.runner.run({
      profile: "search",
      prompt: getWebSearchPrompt({ query, limit }),
      systemPrompt: JSON_ONLY_SYSTEM_PROMPT,
      context: { task: "web-search" },
    });

    const parsed = parseStructured("web-search", result.output, SearchResultsSchema);
    return parsed.results.slice(0, limit);
  }
}
