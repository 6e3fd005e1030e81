import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ClaudeClassifier, ClaudeGenerator, ClaudeWebSearcher } from "./claude.js";
import type { AgentRunRequest, AgentRunResult, AgentRunner } from "../core/agent-runner.js";
import { ExtractionError } from "../core/errors.js";

// --- Test Fixtures ---

class FakeRunner implements AgentRunner {
  readonly requests: AgentRunRequest[] = [];

  constructor(
    private readonly output: string,
    private readonly toolsUsed: string[] = []
  ) {}

  async run(request: AgentRunRequest): Promise<AgentRunResult> {
    this.requests.push(request);
    return { output: this.output, costUsd: 0.01, durationMs: 5, turns: 1, toolsUsed: this.toolsUsed };
  }
}

describe("ClaudeClassifier", () => {
  const Schema = z.object({ candidateName: z.string().nullable() });

  it("runs structured extraction under the extract profile", async () => {
    const runner = new FakeRunner('{"candidateName": "Catan"}');
    const classifier = new ClaudeClassifier(runner);

    const result = await classifier.classify({ task: "game-name", prompt: "which game?", schema: Schema });

    expect(result).toEqual({ candidateName: "Catan" });
    expect(runner.requests[0]).toMatchObject({ profile: "extract", prompt: "which game?", context: { task: "game-name" } });
  });

  it("switches to the research profile when web search is allowed", async () => {
    const runner = new FakeRunner('{"candidateName": null}');

    await new ClaudeClassifier(runner).classify({ task: "web-research", prompt: "p", schema: Schema, webSearch: true });

    expect(runner.requests[0].profile).toBe("research");
  });

  it("rejects output that does not match", async () => {
    const classifier = new ClaudeClassifier(new FakeRunner("I am not sure."));

    await expect(classifier.classify({ task: "game-name", prompt: "p", schema: Schema })).rejects.toBeInstanceOf(
      ExtractionError
    );
  });
});

describe("ClaudeGenerator", () => {
  it("returns the answer with web citations", async () => {
    const runner = new FakeRunner(
      JSON.stringify({
        answer: "Ten victory points.",
        citations: [
          { title: "Rules", url: "https://example.com/rules" },
          { title: "Bad", url: "javascript:alert(1)" },
        ],
      }),
      ["WebSearch"]
    );

    const result = await new ClaudeGenerator(runner).generate({
      prompt: "how to win?",
      subject: "Catan",
      context: "[Source: Rules (score: 0.90)]\nReach ten points.",
      enableWebSearch: true,
    });

    expect(result).toEqual({
      text: "Ten victory points.",
      webCitations: [{ title: "Rules", url: "https://example.com/rules" }],
      usedWebSearch: true,
    });
    expect(runner.requests[0].profile).toBe("answer");
    expect(runner.requests[0].prompt).toContain("Reach ten points.");
  });

  it("keeps a plain-text answer without citations", async () => {
    const runner = new FakeRunner("  Ten victory points.  ");

    const result = await new ClaudeGenerator(runner).generate({ prompt: "q", context: "", enableWebSearch: false });

    expect(result).toEqual({ text: "Ten victory points.", webCitations: [], usedWebSearch: false });
    expect(runner.requests[0].profile).toBe("extract");
  });

  it("rejects an empty answer", async () => {
    const generator = new ClaudeGenerator(new FakeRunner("   "));
    await expect(generator.generate({ prompt: "q", context: "", enableWebSearch: true })).rejects.toBeInstanceOf(
      ExtractionError
    );
  });
});

describe("ClaudeWebSearcher", () => {
  it("returns at most the requested number of results", async () => {
    const runner = new FakeRunner(
      JSON.stringify({
        results: [
          { title: "A", url: "https://a.example", snippet: "a" },
          { title: "B", url: "https://b.example" },
          { url: "https://c.example" },
        ],
      })
    );

    const results = await new ClaudeWebSearcher(runner).search("catan rules", 2);

    expect(results).toEqual([
      { title: "A", url: "https://a.example", snippet: "a" },
      { title: "B", url: "https://b.example", snippet: "" },
    ]);
    expect(runner.requests[0].profile).toBe("search");
    expect(runner.requests[0].prompt).toContain("Search the web for: catan rules");
  });
});
