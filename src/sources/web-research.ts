/**
 * Web research discovery
 * One web-search agent run that returns candidate sources with a category
 */

import type { Classifier } from "../capabilities/types.js";
import type { DiscoveredSource, SourceType } from "../schemas/source.js";
import { WebSourcesSchema, type DiscoveredType } from "../schemas/extraction.js";
import { getWebResearchPrompt } from "../agents/prompts.js";
import { dedupeByUrl, isHttpUrl, youTubeVideoId } from "./urls.js";

/**
 * Declared storage type of a discovered source
 */
export function inferSourceType(discovered: DiscoveredType, url: string): SourceType {
  if (youTubeVideoId(url)) return "video";

  const pathname = new URL(url).pathname.toLowerCase();
  if (pathname.endsWith(".pdf")) return "document";
  if (pathname.endsWith(".txt")) return "text";

  // A video hosted anywhere else is kept as a plain link
  if (discovered === "video") return "link";

  return "webpage";
}

export async function discoverWebSources(
  gameName: string,
  deps: { classifier: Classifier },
  options: { maxSources: number; correlationId?: string }
): Promise<DiscoveredSource[]> {
  const response = await deps.classifier.classify({
    task: "web-research",
    prompt: getWebResearchPrompt({ gameName, maxSources: options.maxSources }),
    schema: WebSourcesSchema,
    webSearch: true,
    correlationId: options.correlationId,
  });

  const sources = response.sources
    .filter((s) => isHttpUrl(s.url))
    .map((s) => ({
      url: s.url,
      title: s.title.trim() || s.url,
      sourceType: inferSourceType(s.type, s.url),
    }));

  return dedupeByUrl(sources).slice(0, options.maxSources);
}
