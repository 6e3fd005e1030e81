/**
 * Reference page discovery
 * Finds the game's BoardGameGeek page: exact API lookup first, site-scoped web search second
 */

import type { ChildLogger } from "../core/logger.js";
import { runStrategies, type Strategy, type StrategyOutcome } from "../core/strategies.js";
import type { ReferenceLookup, WebSearcher } from "../capabilities/types.js";

export const REFERENCE_PAGE_PATTERN = /^https?:\/\/(?:www\.)?boardgamegeek\.com\/boardgame\/\d+/i;

export interface ReferenceDeps {
  lookup: ReferenceLookup;
  searcher: WebSearcher;
}

export function referenceStrategies(gameName: string, deps: ReferenceDeps): Strategy<string>[] {
  return [
    {
      name: "bgg-xml-api",
      run: () => deps.lookup.lookupExact(gameName),
    },
    {
      name: "web-search",
      run: async () => {
        const results = await deps.searcher.search(`site:boardgamegeek.com/boardgame ${gameName}`, 10);
        const hit = results.find((r) => REFERENCE_PAGE_PATTERN.test(r.url));
        return hit ? hit.url : null;
      },
    },
  ];
}

export function discoverReferencePage(
  gameName: string,
  deps: ReferenceDeps,
  log: ChildLogger
): Promise<StrategyOutcome<string>> {
  return runStrategies("reference-page", referenceStrategies(gameName, deps), log);
}
