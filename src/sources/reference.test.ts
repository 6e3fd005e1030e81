import { describe, it, expect } from "vitest";
import { REFERENCE_PAGE_PATTERN, discoverReferencePage } from "./reference.js";
import { logger } from "../core/logger.js";
import { AuthRequiredError } from "../core/errors.js";
import { FakeReferenceLookup, FakeWebSearcher } from "../testing/fakes.js";

const log = logger.child({ phase: "test" });

describe("REFERENCE_PAGE_PATTERN", () => {
  it("matches game pages only", () => {
    expect(REFERENCE_PAGE_PATTERN.test("https://boardgamegeek.com/boardgame/13/catan")).toBe(true);
    expect(REFERENCE_PAGE_PATTERN.test("https://www.boardgamegeek.com/boardgame/13")).toBe(true);
    expect(REFERENCE_PAGE_PATTERN.test("https://boardgamegeek.com/boardgamefamily/13")).toBe(false);
    expect(REFERENCE_PAGE_PATTERN.test("https://example.com/boardgame/13")).toBe(false);
  });
});

describe("discoverReferencePage", () => {
  it("uses the exact lookup first", async () => {
    const lookup = new FakeReferenceLookup("https://boardgamegeek.com/boardgame/13");
    const searcher = new FakeWebSearcher();

    const outcome = await discoverReferencePage("Catan", { lookup, searcher }, log);

    expect(outcome.value).toBe("https://boardgamegeek.com/boardgame/13");
    expect(outcome.strategy).toBe("bgg-xml-api");
    expect(lookup.names).toEqual(["Catan"]);
    expect(searcher.queries).toEqual([]);
  });

  it("falls back to site-scoped web search when the API needs credentials", async () => {
    const lookup = new FakeReferenceLookup(new AuthRequiredError("bgg-xml-api"));
    const searcher = new FakeWebSearcher(() => [
      { title: "Catan family", url: "https://boardgamegeek.com/boardgamefamily/3", snippet: "" },
      { title: "Catan", url: "https://boardgamegeek.com/boardgame/13/catan", snippet: "" },
    ]);

    const outcome = await discoverReferencePage("Catan", { lookup, searcher }, log);

    expect(outcome.value).toBe("https://boardgamegeek.com/boardgame/13/catan");
    expect(outcome.strategy).toBe("web-search");
    expect(outcome.attempts).toEqual([
      { strategy: "bgg-xml-api", outcome: "error", error: "bgg-xml-api requires authentication" },
    ]);
    expect(searcher.queries).toEqual(["site:boardgamegeek.com/boardgame Catan"]);
  });

  it("returns null when neither strategy finds a page", async () => {
    const outcome = await discoverReferencePage(
      "Unknown Game",
      { lookup: new FakeReferenceLookup(null), searcher: new FakeWebSearcher() },
      log
    );

    expect(outcome.value).toBeNull();
    expect(outcome.attempts.map((a) => a.outcome)).toEqual(["empty", "empty"]);
  });
});
